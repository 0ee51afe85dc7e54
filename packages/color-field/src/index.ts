/**
 * @huefield/color-field
 * Radial multi-focus HSL adjustment
 */

// Configuration
export type { ColorFieldConfig, FocusPointConfig, FocusPoint, AdjustmentParams } from './config/types';
export { ConfigurationError, isConfigurationError } from './config/errors';
export { validateColorFieldConfig, resolveFocusPoints } from './config/validate';

// Color space conversion
export type { RGBPixel, HSLPixel, RGBImage, HSLBuffer } from './processors/types';
export {
    rgbToHsl,
    hslToRgb,
    wrapHue,
    clamp01,
    quantizeChannel,
    rgbImageToHsl,
    hslBufferToRgb
} from './processors/color-math';

// Fields
export type { InfluenceField, CompositeField } from './field/types';
export { radialWeight, computeInfluenceField } from './field/radial-influence';
export { compositeFields, dominantFocusAt } from './field/compositor';

// Adjustment
export { adjustPixel, adjustHslBuffer } from './adjust/curve-adjuster';

// Pipeline
export type { ColorFieldResult } from './processors/pipeline';
export { applyColorField, normalizeRaw, quantizeImage } from './processors/pipeline';

// Analysis
export type { ColorDifferenceMap, DifferenceStats } from './analysis/color-difference';
export { computeColorDifference, summarizeDifference, differenceToGrayscale } from './analysis/color-difference';
