/**
 * Plain Euclidean RGB difference between two images
 * Not a perceptual metric.
 */

import { ConfigurationError } from '../config/errors';
import type { RGBImage } from '../processors/types';

export interface ColorDifferenceMap {
    width: number;
    height: number;
    values: Float64Array;
}

export interface DifferenceStats {
    min: number;
    max: number;
    mean: number;
}

export function computeColorDifference(original: RGBImage, processed: RGBImage): ColorDifferenceMap {
    if (original.width !== processed.width || original.height !== processed.height) {
        throw new ConfigurationError(
            'processed',
            `image size ${processed.width}x${processed.height} does not match ${original.width}x${original.height}`
        );
    }

    const size = original.width * original.height;
    const values = new Float64Array(size);
    for (let p = 0; p < size; p++) {
        const i = p * 3;
        const dr = original.data[i] - processed.data[i];
        const dg = original.data[i + 1] - processed.data[i + 1];
        const db = original.data[i + 2] - processed.data[i + 2];
        values[p] = Math.sqrt(dr * dr + dg * dg + db * db);
    }

    return { width: original.width, height: original.height, values };
}

export function summarizeDifference(map: ColorDifferenceMap): DifferenceStats {
    if (map.values.length === 0) {
        return { min: 0, max: 0, mean: 0 };
    }

    let min = Infinity;
    let max = -Infinity;
    let sum = 0;
    for (const value of map.values) {
        min = Math.min(min, value);
        max = Math.max(max, value);
        sum += value;
    }

    return { min, max, mean: sum / map.values.length };
}

/**
 * Scale a difference map to 8-bit gray, brightest at the largest difference
 * An all-zero map stays black.
 */
export function differenceToGrayscale(map: ColorDifferenceMap): Uint8Array {
    const { max } = summarizeDifference(map);
    const bytes = new Uint8Array(map.values.length);
    if (max === 0) {
        return bytes;
    }

    for (let p = 0; p < map.values.length; p++) {
        bytes[p] = Math.round((map.values[p] / max) * 255);
    }
    return bytes;
}
