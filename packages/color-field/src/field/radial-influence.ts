/**
 * Radial influence field
 * Linear falloff from 1 at the focus center to 0 at the focus radius.
 */

import { clamp01 } from '../processors/color-math';
import { ConfigurationError } from '../config/errors';
import type { FocusPoint } from '../config/types';
import type { InfluenceField } from './types';

/**
 * Weight at a given distance from the center
 *
 * @param distance - Euclidean distance in pixels
 * @param radius - Focus radius in pixels (> 0)
 * @returns Weight (0-1)
 */
export function radialWeight(distance: number, radius: number): number {
    return clamp01(1 - distance / radius);
}

/**
 * Compute the weight map of one focus point over a width x height grid
 */
export function computeInfluenceField(focus: FocusPoint, width: number, height: number): InfluenceField {
    if (!Number.isFinite(focus.radius) || focus.radius <= 0) {
        throw new ConfigurationError(`${focus.id}.radius`, `must be greater than 0, got ${focus.radius}`);
    }
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
        throw new ConfigurationError('dimensions', `invalid field size ${width}x${height}`);
    }

    const weights = new Float64Array(width * height);
    for (let y = 0; y < height; y++) {
        const dy = y - focus.centerY;
        const row = y * width;
        for (let x = 0; x < width; x++) {
            const dx = x - focus.centerX;
            weights[row + x] = radialWeight(Math.sqrt(dx * dx + dy * dy), focus.radius);
        }
    }

    return { focusId: focus.id, width, height, weights };
}
