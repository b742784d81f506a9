/**
 * Constants for online-bounds
 *
 * Fixed values used throughout the estimators, the signal generator and the CLI.
 * Change these once here, updates everywhere.
 */

// =============================================================================
// P² ESTIMATOR
// =============================================================================

/**
 * Number of markers kept by every P² estimator.
 * Also the number of samples buffered before the estimator is ready.
 */
export const MARKER_COUNT = 5;

/**
 * Index of the marker whose height is the quantile estimate.
 */
export const ESTIMATE_MARKER = 2;

/**
 * Probability of the estimator that centers the median envelope.
 */
export const MEDIAN_PROBABILITY = 0.5;

/**
 * Probabilities tracked when the caller does not name any.
 */
export const DEFAULT_QUANTILES: readonly number[] = [0.1, 0.5, 0.9];

// =============================================================================
// RUN DEFAULTS
// =============================================================================

/** Samples generated per comparison run. */
export const DEFAULT_SAMPLE_COUNT = 200_000;

/** Seed of the synthetic stream. */
export const DEFAULT_SEED = 7;

/**
 * Fraction of samples turned into outliers.
 * 0.005 = 0.5% of the stream.
 */
export const DEFAULT_OUTLIER_RATE = 0.005;

// =============================================================================
// SYNTHETIC SIGNAL SHAPE
// =============================================================================

/** Level the signal oscillates around. */
export const SIGNAL_BASELINE = 50;

/** Standard deviation of the gaussian noise. */
export const SIGNAL_NOISE_STD = 2;

/** Amplitude of the slow sine drift. */
export const SIGNAL_DRIFT_AMPLITUDE = 0.5;

/**
 * Phase span of the drift over the whole stream (6 full periods).
 */
export const SIGNAL_DRIFT_SPAN = 12 * Math.PI;

/**
 * Offsets added to outlier samples, picked with equal odds.
 */
export const OUTLIER_OFFSETS: readonly [number, number] = [50, -30];
