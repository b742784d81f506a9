/**
 * Core Types for online-bounds
 *
 * Shapes shared by the streaming estimators, the batch reference and the
 * reporting layer. Every figure that may not exist yet is typed
 * `number | undefined`; callers branch on availability instead of consuming a
 * placeholder number.
 */

// =============================================================================
// SAMPLES
// =============================================================================

/**
 * A single finite sample. Never retained by the streaming estimators.
 */
export type Sample = number;

/**
 * Probability → estimate. `undefined` while the estimate is not available.
 */
export type QuantileMap = ReadonlyMap<number, number | undefined>;

// =============================================================================
// STREAMING OUTPUTS
// =============================================================================

/**
 * Everything an OnlineAggregator can report at a given moment.
 */
export interface OnlineSnapshot {
    /** Samples consumed so far */
    count: number;
    /** Running minimum (+Infinity before the first sample) */
    min: number;
    /** Running maximum (-Infinity before the first sample) */
    max: number;
    /** Running mean (0 before the first sample) */
    mean: number;
    /** Sample standard deviation, undefined below 2 samples */
    std: number | undefined;
    /** Tracked quantile estimates */
    quantiles: QuantileMap;
    /** max |x - running mean| */
    envelopeMean: number;
    /** max |x - running median|, undefined until the median estimator is ready */
    envelopeMedian: number | undefined;
}

// =============================================================================
// BATCH OUTPUTS
// =============================================================================

/**
 * Statistics computed from a fully materialized sample set.
 */
export interface BatchStats {
    count: number;
    min: number;
    max: number;
    mean: number;
    std: number | undefined;
    /** Linear-interpolation quantiles */
    quantiles: QuantileMap;
    /** max |x - mean| */
    envelopeMean: number;
    /** max |x - median| */
    envelopeMedian: number;
    /** Wall time of the computation in seconds */
    timeSeconds: number;
}
