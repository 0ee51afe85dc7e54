/**
 * Field compositor
 * Sums influence fields into a clipped total weight and records the dominant focus per pixel.
 */

import { clamp01 } from '../processors/color-math';
import { ConfigurationError } from '../config/errors';
import type { CompositeField, InfluenceField } from './types';

/**
 * Composite one or more influence fields
 *
 * Dominance uses a strict greater-than comparison, so on equal weights
 * the earliest registered field keeps the pixel.
 *
 * @param fields - Influence fields in registration order, all the same size
 */
export function compositeFields(fields: readonly InfluenceField[]): CompositeField {
    const [first] = fields;
    if (first === undefined) {
        throw new ConfigurationError('focusPoints', 'at least one influence field is required');
    }

    const { width, height } = first;
    for (const field of fields) {
        if (field.width !== width || field.height !== height) {
            throw new ConfigurationError(
                field.focusId,
                `field size ${field.width}x${field.height} does not match ${width}x${height}`
            );
        }
    }

    const size = width * height;
    const total = new Float64Array(size);
    const dominant = new Uint32Array(size);

    for (let p = 0; p < size; p++) {
        let sum = 0;
        let best = 0;
        let bestWeight = first.weights[p];
        for (let f = 0; f < fields.length; f++) {
            const weight = fields[f].weights[p];
            sum += weight;
            if (weight > bestWeight) {
                bestWeight = weight;
                best = f;
            }
        }
        total[p] = clamp01(sum);
        dominant[p] = best;
    }

    return {
        width,
        height,
        total,
        dominant,
        focusIds: fields.map(field => field.focusId)
    };
}

/**
 * Id of the dominant focus at pixel (x, y)
 */
export function dominantFocusAt(composite: CompositeField, x: number, y: number): string {
    if (x < 0 || x >= composite.width || y < 0 || y >= composite.height) {
        throw new RangeError(`pixel (${x}, ${y}) is outside the ${composite.width}x${composite.height} field`);
    }
    return composite.focusIds[composite.dominant[y * composite.width + x]];
}
