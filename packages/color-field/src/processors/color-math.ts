/**
 * Color space conversion utilities
 * Per-pixel RGB <-> HSL conversion plus the buffer-wide forms used by the pipeline
 */

import type { HSLBuffer, HSLPixel, RGBImage, RGBPixel } from './types';

/**
 * Wrap a hue angle into [0, 360)
 *
 * @param h - Hue in degrees, any sign or magnitude
 * @returns Hue in [0, 360)
 */
export function wrapHue(h: number): number {
    const wrapped = ((h % 360) + 360) % 360;
    // -1e-15 wraps to 360 in floating point
    return wrapped >= 360 ? 0 : wrapped;
}

/**
 * Clamp a value to [0, 1] range
 */
export function clamp01(value: number): number {
    return Math.max(0, Math.min(1, value));
}

/**
 * Quantize a normalized channel to an 8-bit value (round, then clamp)
 */
export function quantizeChannel(value: number): number {
    return Math.round(clamp01(value) * 255);
}

/**
 * Convert RGB to HSL (Hue, Saturation, Lightness)
 *
 * Gray input (max === min) is achromatic: hue and saturation are fixed at 0.
 *
 * @param r - Red channel (0-1)
 * @param g - Green channel (0-1)
 * @param b - Blue channel (0-1)
 * @returns [hue (0-360), saturation (0-1), lightness (0-1)]
 */
export function rgbToHsl(r: number, g: number, b: number): HSLPixel {
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const l = (max + min) / 2;

    if (max === min) {
        return [0, 0, l]; // Achromatic
    }

    const d = max - min;
    const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);

    let h: number;
    if (max === r) {
        h = (g - b) / d + (g < b ? 6 : 0);
    } else if (max === g) {
        h = (b - r) / d + 2;
    } else {
        h = (r - g) / d + 4;
    }

    return [wrapHue(h * 60), clamp01(s), clamp01(l)];
}

/**
 * Convert HSL to RGB using the chroma / intermediate / match construction
 *
 * @param h - Hue (degrees, wrapped into 0-360)
 * @param s - Saturation (0-1)
 * @param l - Lightness (0-1)
 * @returns [red, green, blue] (0-1)
 */
export function hslToRgb(h: number, s: number, l: number): RGBPixel {
    if (s === 0) {
        return [l, l, l]; // Grayscale
    }

    const hue = wrapHue(h);
    const c = (1 - Math.abs(2 * l - 1)) * s;
    const x = c * (1 - Math.abs(((hue / 60) % 2) - 1));
    const m = l - c / 2;

    let r = 0;
    let g = 0;
    let b = 0;
    if (hue < 60) {
        [r, g, b] = [c, x, 0];
    } else if (hue < 120) {
        [r, g, b] = [x, c, 0];
    } else if (hue < 180) {
        [r, g, b] = [0, c, x];
    } else if (hue < 240) {
        [r, g, b] = [0, x, c];
    } else if (hue < 300) {
        [r, g, b] = [x, 0, c];
    } else {
        [r, g, b] = [c, 0, x];
    }

    return [r + m, g + m, b + m];
}

/**
 * Convert every pixel of an RGB image to HSL
 */
export function rgbImageToHsl(image: RGBImage): HSLBuffer {
    const data = new Float64Array(image.data.length);
    for (let i = 0; i < data.length; i += 3) {
        const [h, s, l] = rgbToHsl(image.data[i], image.data[i + 1], image.data[i + 2]);
        data[i] = h;
        data[i + 1] = s;
        data[i + 2] = l;
    }
    return { width: image.width, height: image.height, data };
}

/**
 * Convert every pixel of an HSL buffer back to RGB
 */
export function hslBufferToRgb(buffer: HSLBuffer): RGBImage {
    const data = new Float64Array(buffer.data.length);
    for (let i = 0; i < data.length; i += 3) {
        const [r, g, b] = hslToRgb(buffer.data[i], buffer.data[i + 1], buffer.data[i + 2]);
        data[i] = r;
        data[i + 1] = g;
        data[i + 2] = b;
    }
    return { width: buffer.width, height: buffer.height, data };
}
