/**
 * Color field pipeline
 * Runs every in-memory stage in order: validate, RGB -> HSL, fields, composite, adjust, HSL -> RGB
 */

import { adjustHslBuffer } from '../adjust/curve-adjuster';
import { resolveFocusPoints } from '../config/validate';
import type { ColorFieldConfig, FocusPoint } from '../config/types';
import { ConfigurationError } from '../config/errors';
import { compositeFields } from '../field/compositor';
import { computeInfluenceField } from '../field/radial-influence';
import type { CompositeField } from '../field/types';
import { hslBufferToRgb, quantizeChannel, rgbImageToHsl } from './color-math';
import type { RGBImage } from './types';

export interface ColorFieldResult {
    image: RGBImage;
    composite: CompositeField;
    focusPoints: FocusPoint[];
}

/**
 * Apply the color field adjustment to a normalized image
 *
 * @param image - Source image (not mutated)
 * @param config - Color field configuration, validated before any pixel work
 * @returns Adjusted image plus the intermediate composite field
 */
export function applyColorField(image: RGBImage, config: ColorFieldConfig): ColorFieldResult {
    // Step 1: Validate and place the focus points on this image
    const focusPoints = resolveFocusPoints(config, image.width, image.height);

    // Step 2: RGB -> HSL
    const hsl = rgbImageToHsl(image);

    // Step 3: One influence field per focus, merged in registration order
    const fields = focusPoints.map(focus => computeInfluenceField(focus, image.width, image.height));
    const composite = compositeFields(fields);

    // Step 4: Curve adjustment
    const adjusted = adjustHslBuffer(hsl, composite, focusPoints, {
        maxHueShiftDegrees: config.maxHueShiftDegrees,
        maxSaturationAdjust: config.maxSaturationAdjust,
        maxLightnessAdjust: config.maxLightnessAdjust
    });

    // Step 5: HSL -> RGB
    return {
        image: hslBufferToRgb(adjusted),
        composite,
        focusPoints
    };
}

/**
 * Convert interleaved 8-bit RGB bytes to a normalized image
 */
export function normalizeRaw(bytes: Uint8Array, width: number, height: number): RGBImage {
    const expected = width * height * 3;
    if (bytes.length !== expected) {
        throw new ConfigurationError('raw', `expected ${expected} bytes for ${width}x${height} RGB, got ${bytes.length}`);
    }

    const data = new Float64Array(expected);
    for (let i = 0; i < expected; i++) {
        data[i] = bytes[i] / 255;
    }
    return { width, height, data };
}

/**
 * Quantize a normalized image to interleaved 8-bit RGB bytes
 */
export function quantizeImage(image: RGBImage): Uint8Array {
    const bytes = new Uint8Array(image.data.length);
    for (let i = 0; i < image.data.length; i++) {
        bytes[i] = quantizeChannel(image.data[i]);
    }
    return bytes;
}
