/**
 * Color field configuration
 */

export interface FocusPointConfig {
    /** Unique label, reported as the dominant focus */
    id: string;

    /** Horizontal center as a fraction of the image width (0-1) */
    centerXFraction: number;

    /** Vertical center as a fraction of the image height (0-1) */
    centerYFraction: number;

    /** Distance in pixels at which the influence reaches 0 (> 0) */
    radiusPixels: number;

    /** Hue pulled toward where this focus dominates (0-360) */
    targetHueDegrees: number;

    /** Direction of the saturation adjustment (-1 to 1). Defaults to +1 for the first focus, -1 otherwise */
    saturationSign?: number;

    /** Direction of the lightness adjustment (-1 to 1). Defaults to +1 for the first focus, -1 otherwise */
    lightnessSign?: number;
}

export interface ColorFieldConfig {
    /** Registration order matters: earlier foci win dominance ties */
    focusPoints: FocusPointConfig[];

    /** Hue shift at full influence, as degrees out of 360 */
    maxHueShiftDegrees: number;

    /** Saturation offset at full influence (-1 to 1) */
    maxSaturationAdjust: number;

    /** Lightness offset at full influence (-1 to 1) */
    maxLightnessAdjust: number;

    /** Accepted and validated (0-1) but currently inert */
    secondaryMixFactor: number;
}

/**
 * A focus point resolved against concrete image dimensions
 */
export interface FocusPoint {
    id: string;
    centerX: number;
    centerY: number;
    radius: number;
    targetHue: number;
    saturationSign: number;
    lightnessSign: number;
}

/**
 * Global magnitudes consumed by the curve adjuster
 */
export type AdjustmentParams = Pick<
    ColorFieldConfig,
    'maxHueShiftDegrees' | 'maxSaturationAdjust' | 'maxLightnessAdjust'
>;
