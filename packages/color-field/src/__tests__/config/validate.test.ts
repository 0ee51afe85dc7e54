import { describe, it, expect } from 'vitest';

import { ConfigurationError, isConfigurationError } from '../../config/errors';
import type { ColorFieldConfig } from '../../config/types';
import { resolveFocusPoints, validateColorFieldConfig } from '../../config/validate';

const createConfig = (): ColorFieldConfig => ({
    focusPoints: [
        { id: 'red', centerXFraction: 0.1, centerYFraction: 0.9, radiusPixels: 200, targetHueDegrees: 0 },
        { id: 'blue', centerXFraction: 0.9, centerYFraction: 0.1, radiusPixels: 200, targetHueDegrees: 240 }
    ],
    maxHueShiftDegrees: 30,
    maxSaturationAdjust: 0.2,
    maxLightnessAdjust: 0.1,
    secondaryMixFactor: 0.5
});

const expectConfigError = (config: ColorFieldConfig, parameter: string) => {
    try {
        validateColorFieldConfig(config);
    } catch (error) {
        expect(isConfigurationError(error)).toBe(true);
        if (error instanceof ConfigurationError) {
            expect(error.parameter).toBe(parameter);
        }
        return;
    }
    throw new Error(`expected ${parameter} to be rejected`);
};

describe('validateColorFieldConfig', () => {
    it('should accept the reference configuration', () => {
        expect(() => validateColorFieldConfig(createConfig())).not.toThrow();
    });

    it('should require at least one focus point', () => {
        expectConfigError({ ...createConfig(), focusPoints: [] }, 'focusPoints');
    });

    it('should reject a non-positive radius', () => {
        const config = createConfig();
        config.focusPoints[1].radiusPixels = 0;
        expectConfigError(config, 'focusPoints[1].radiusPixels');
    });

    it('should reject a hue of 360 or more', () => {
        const config = createConfig();
        config.focusPoints[0].targetHueDegrees = 360;
        expectConfigError(config, 'focusPoints[0].targetHueDegrees');
    });

    it('should reject negative hue', () => {
        const config = createConfig();
        config.focusPoints[0].targetHueDegrees = -1;
        expectConfigError(config, 'focusPoints[0].targetHueDegrees');
    });

    it('should reject fractions outside [0, 1]', () => {
        const config = createConfig();
        config.focusPoints[0].centerYFraction = 1.01;
        expectConfigError(config, 'focusPoints[0].centerYFraction');
    });

    it('should reject non-finite values', () => {
        const config = createConfig();
        config.focusPoints[1].centerXFraction = Number.NaN;
        expectConfigError(config, 'focusPoints[1].centerXFraction');
        expectConfigError({ ...createConfig(), maxHueShiftDegrees: Infinity }, 'maxHueShiftDegrees');
    });

    it('should reject duplicate and empty ids', () => {
        const duplicate = createConfig();
        duplicate.focusPoints[1].id = 'red';
        expectConfigError(duplicate, 'focusPoints[1].id');

        const empty = createConfig();
        empty.focusPoints[0].id = '  ';
        expectConfigError(empty, 'focusPoints[0].id');
    });

    it('should bound the global magnitudes', () => {
        expectConfigError({ ...createConfig(), maxSaturationAdjust: 1.5 }, 'maxSaturationAdjust');
        expectConfigError({ ...createConfig(), maxLightnessAdjust: -2 }, 'maxLightnessAdjust');
        expectConfigError({ ...createConfig(), secondaryMixFactor: 2 }, 'secondaryMixFactor');
    });

    it('should bound explicit signs', () => {
        const config = createConfig();
        config.focusPoints[0].lightnessSign = 2;
        expectConfigError(config, 'focusPoints[0].lightnessSign');
    });

    it('should describe the offending value in the message', () => {
        const config = createConfig();
        config.focusPoints[0].radiusPixels = -5;
        expect(() => validateColorFieldConfig(config)).toThrow(
            'focusPoints[0].radiusPixels: must be greater than 0, got -5'
        );
    });
});

describe('resolveFocusPoints', () => {
    it('should truncate centers to pixel coordinates', () => {
        const [red, blue] = resolveFocusPoints(createConfig(), 799, 599);

        // 0.1 * 799 = 79.9, 0.9 * 599 = 539.1
        expect(red).toMatchObject({ id: 'red', centerX: 79, centerY: 539, radius: 200, targetHue: 0 });
        // 0.9 * 799 = 719.1, 0.1 * 599 = 59.9
        expect(blue).toMatchObject({ id: 'blue', centerX: 719, centerY: 59, radius: 200, targetHue: 240 });
    });

    it('should default signs to +1 for the first focus and -1 for the rest', () => {
        const config = createConfig();
        config.focusPoints.push({
            id: 'green',
            centerXFraction: 0.5,
            centerYFraction: 0.5,
            radiusPixels: 10,
            targetHueDegrees: 120,
            saturationSign: 1
        });

        const resolved = resolveFocusPoints(config, 10, 10);

        expect(resolved.map(focus => [focus.saturationSign, focus.lightnessSign])).toEqual([
            [1, 1],
            [-1, -1],
            [1, -1]
        ]);
    });

    it('should reject invalid dimensions before validating', () => {
        expect(() => resolveFocusPoints(createConfig(), 0, 10)).toThrow('width: must be a positive integer, got 0');
    });
});
