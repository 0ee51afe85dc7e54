/**
 * Proximity weight map for a single focus point
 * One weight (0-1) per pixel, row-major
 */
export interface InfluenceField {
    focusId: string;
    width: number;
    height: number;
    weights: Float64Array;
}

/**
 * Merge of every influence field
 */
export interface CompositeField {
    width: number;
    height: number;

    /** Clipped sum of all weights (0-1) */
    total: Float64Array;

    /** Index into `focusIds` of the focus with the strictly greatest weight */
    dominant: Uint32Array;

    /** Focus ids in registration order */
    focusIds: string[];
}
