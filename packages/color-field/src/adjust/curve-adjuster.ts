/**
 * Curve adjuster
 * Moves hue toward the dominant focus's target and offsets saturation/lightness,
 * all scaled by the composite weight.
 */

import { clamp01, wrapHue } from '../processors/color-math';
import type { HSLBuffer, HSLPixel } from '../processors/types';
import { ConfigurationError } from '../config/errors';
import type { AdjustmentParams, FocusPoint } from '../config/types';
import type { CompositeField } from '../field/types';

/**
 * Adjust a single HSL pixel
 *
 * @param pixel - Original [h, s, l]
 * @param weight - Composite weight at the pixel (0-1)
 * @param focus - Dominant focus at the pixel
 * @param params - Global adjustment magnitudes
 * @returns Adjusted [h, s, l], hue wrapped to [0, 360) and s/l clamped
 */
export function adjustPixel(
    pixel: HSLPixel,
    weight: number,
    focus: FocusPoint,
    params: AdjustmentParams
): HSLPixel {
    const [h, s, l] = pixel;

    // Partial pull toward the target, not a replacement
    const hAdjusted = wrapHue(h + (focus.targetHue - h) * weight * (params.maxHueShiftDegrees / 360));
    const sAdjusted = clamp01(s + weight * params.maxSaturationAdjust * focus.saturationSign);
    const lAdjusted = clamp01(l + weight * params.maxLightnessAdjust * focus.lightnessSign);

    return [hAdjusted, sAdjusted, lAdjusted];
}

/**
 * Adjust every pixel of an HSL buffer
 *
 * @param buffer - Original HSL values (not mutated)
 * @param composite - Composite field of the same size
 * @param focusPoints - Resolved focus points in registration order
 * @param params - Global adjustment magnitudes
 * @returns New HSL buffer
 */
export function adjustHslBuffer(
    buffer: HSLBuffer,
    composite: CompositeField,
    focusPoints: readonly FocusPoint[],
    params: AdjustmentParams
): HSLBuffer {
    if (buffer.width !== composite.width || buffer.height !== composite.height) {
        throw new ConfigurationError(
            'composite',
            `field size ${composite.width}x${composite.height} does not match image ${buffer.width}x${buffer.height}`
        );
    }
    if (focusPoints.length !== composite.focusIds.length) {
        throw new ConfigurationError(
            'focusPoints',
            `expected ${composite.focusIds.length} focus points, got ${focusPoints.length}`
        );
    }

    const data = new Float64Array(buffer.data.length);
    const size = buffer.width * buffer.height;

    for (let p = 0; p < size; p++) {
        const i = p * 3;
        const focus = focusPoints[composite.dominant[p]];
        const [h, s, l] = adjustPixel(
            [buffer.data[i], buffer.data[i + 1], buffer.data[i + 2]],
            composite.total[p],
            focus,
            params
        );
        data[i] = h;
        data[i + 1] = s;
        data[i + 2] = l;
    }

    return { width: buffer.width, height: buffer.height, data };
}
