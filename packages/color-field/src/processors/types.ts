/**
 * Pixel and buffer shapes shared by the color-field stages
 */

/** [red, green, blue], each 0-1 */
export type RGBPixel = [number, number, number];

/** [hue (0-360), saturation (0-1), lightness (0-1)] */
export type HSLPixel = [number, number, number];

/**
 * Decoded image with normalized channels
 * `data` holds width * height RGB triples, row-major
 */
export interface RGBImage {
    width: number;
    height: number;
    data: Float64Array;
}

/**
 * Per-pixel HSL triples laid out like {@link RGBImage}
 */
export interface HSLBuffer {
    width: number;
    height: number;
    data: Float64Array;
}
