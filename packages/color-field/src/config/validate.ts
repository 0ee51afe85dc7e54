import { ConfigurationError } from './errors';
import type { ColorFieldConfig, FocusPoint, FocusPointConfig } from './types';

const requireFinite = (parameter: string, value: number): void => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigurationError(parameter, `must be a finite number, got ${String(value)}`);
    }
};

const requireRange = (parameter: string, value: number, min: number, max: number): void => {
    requireFinite(parameter, value);
    if (value < min || value > max) {
        throw new ConfigurationError(parameter, `must be within [${min}, ${max}], got ${value}`);
    }
};

const validateFocusPoint = (focus: FocusPointConfig, index: number): void => {
    const prefix = `focusPoints[${index}]`;

    if (typeof focus !== 'object' || focus === null) {
        throw new ConfigurationError(prefix, 'must be an object');
    }

    if (typeof focus.id !== 'string' || focus.id.trim().length === 0) {
        throw new ConfigurationError(`${prefix}.id`, 'must be a non-empty string');
    }

    requireRange(`${prefix}.centerXFraction`, focus.centerXFraction, 0, 1);
    requireRange(`${prefix}.centerYFraction`, focus.centerYFraction, 0, 1);

    requireFinite(`${prefix}.radiusPixels`, focus.radiusPixels);
    if (focus.radiusPixels <= 0) {
        throw new ConfigurationError(`${prefix}.radiusPixels`, `must be greater than 0, got ${focus.radiusPixels}`);
    }

    requireFinite(`${prefix}.targetHueDegrees`, focus.targetHueDegrees);
    if (focus.targetHueDegrees < 0 || focus.targetHueDegrees >= 360) {
        throw new ConfigurationError(
            `${prefix}.targetHueDegrees`,
            `must be within [0, 360), got ${focus.targetHueDegrees}`
        );
    }

    if (focus.saturationSign !== undefined) {
        requireRange(`${prefix}.saturationSign`, focus.saturationSign, -1, 1);
    }
    if (focus.lightnessSign !== undefined) {
        requireRange(`${prefix}.lightnessSign`, focus.lightnessSign, -1, 1);
    }
};

/**
 * Validate a color field configuration before any pixel work starts
 *
 * @throws ConfigurationError naming the first offending parameter
 */
export function validateColorFieldConfig(config: ColorFieldConfig): void {
    if (!Array.isArray(config.focusPoints) || config.focusPoints.length === 0) {
        throw new ConfigurationError('focusPoints', 'at least one focus point is required');
    }

    const seen = new Set<string>();
    config.focusPoints.forEach((focus, index) => {
        validateFocusPoint(focus, index);
        if (seen.has(focus.id)) {
            throw new ConfigurationError(`focusPoints[${index}].id`, `duplicate focus id '${focus.id}'`);
        }
        seen.add(focus.id);
    });

    requireFinite('maxHueShiftDegrees', config.maxHueShiftDegrees);
    requireRange('maxSaturationAdjust', config.maxSaturationAdjust, -1, 1);
    requireRange('maxLightnessAdjust', config.maxLightnessAdjust, -1, 1);
    requireRange('secondaryMixFactor', config.secondaryMixFactor, 0, 1);
}

const requireDimension = (parameter: string, value: number): void => {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(parameter, `must be a positive integer, got ${value}`);
    }
};

/**
 * Resolve fractional focus centers to pixel coordinates for an image size
 *
 * Centers are truncated toward zero, so a fraction of 1 lands one pixel past the last column/row.
 * Unset signs default to +1 for the first focus and -1 for the rest.
 */
export function resolveFocusPoints(config: ColorFieldConfig, width: number, height: number): FocusPoint[] {
    requireDimension('width', width);
    requireDimension('height', height);
    validateColorFieldConfig(config);

    return config.focusPoints.map((focus, index) => {
        const defaultSign = index === 0 ? 1 : -1;
        return {
            id: focus.id,
            centerX: Math.trunc(focus.centerXFraction * width),
            centerY: Math.trunc(focus.centerYFraction * height),
            radius: focus.radiusPixels,
            targetHue: focus.targetHueDegrees,
            saturationSign: focus.saturationSign ?? defaultSign,
            lightnessSign: focus.lightnessSign ?? defaultSign
        };
    });
}
