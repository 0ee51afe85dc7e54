import { describe, it, expect } from 'vitest';

import {
    computeColorDifference,
    differenceToGrayscale,
    summarizeDifference
} from '../../analysis/color-difference';
import { ConfigurationError } from '../../config/errors';

const image = (values: number[], width = values.length / 3, height = 1) => ({
    width,
    height,
    data: new Float64Array(values)
});

describe('computeColorDifference', () => {
    it('should measure Euclidean RGB distance per pixel', () => {
        const original = image([0, 0, 0, 1, 1, 1, 0.5, 0.5, 0.5]);
        const processed = image([1, 0, 0, 1, 1, 1, 0.5, 0.8, 0.9]);

        const map = computeColorDifference(original, processed);

        expect(map.width).toBe(3);
        expect(map.height).toBe(1);
        expect(map.values[0]).toBe(1);
        expect(map.values[1]).toBe(0);
        // sqrt(0.3^2 + 0.4^2) = 0.5
        expect(map.values[2]).toBeCloseTo(0.5, 10);
    });

    it('should reject images of different sizes', () => {
        expect(() => computeColorDifference(image([0, 0, 0]), image([0, 0, 0, 0, 0, 0]))).toThrow(ConfigurationError);
    });
});

describe('summarizeDifference', () => {
    it('should report min, max and mean', () => {
        const stats = summarizeDifference({ width: 4, height: 1, values: new Float64Array([0, 0.5, 1, 0.5]) });
        expect(stats).toEqual({ min: 0, max: 1, mean: 0.5 });
    });

    it('should report zeros for an empty map', () => {
        expect(summarizeDifference({ width: 0, height: 0, values: new Float64Array(0) })).toEqual({
            min: 0,
            max: 0,
            mean: 0
        });
    });
});

describe('differenceToGrayscale', () => {
    it('should scale to the largest difference', () => {
        const bytes = differenceToGrayscale({ width: 3, height: 1, values: new Float64Array([0, 0.25, 0.5]) });
        // 0.25 / 0.5 * 255 = 127.5 -> 128
        expect(Array.from(bytes)).toEqual([0, 128, 255]);
    });

    it('should stay black when nothing changed', () => {
        const bytes = differenceToGrayscale({ width: 2, height: 1, values: new Float64Array(2) });
        expect(Array.from(bytes)).toEqual([0, 0]);
    });
});
