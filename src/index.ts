/**
 * online-bounds Entry Point
 *
 * Constant-memory streaming statistics: P² quantiles, Welford mean/variance,
 * running extrema and L∞ deviation envelopes, plus the batch reference and
 * comparison tooling used to validate them.
 */

export { P2Quantile, type EstimatorPhase } from "./estimators/p2-quantile.ts";
export { OnlineAggregator } from "./estimators/online-aggregator.ts";
export { InvalidArgumentError } from "./core/errors.ts";
export {
    ProbabilitySchema,
    RunConfigSchema,
    parseProbability,
    parseRunConfig,
    type RunConfig,
    type RunConfigInput,
} from "./core/config.ts";
export { DEFAULT_QUANTILES, MARKER_COUNT } from "./core/constants.ts";
export type { BatchStats, OnlineSnapshot, QuantileMap, Sample } from "./core/types.ts";
export { computeBatchStats, quantileLinear } from "./reference/batch-stats.ts";
export { createRng, makeSignal, type Rng, type SignalOptions } from "./signal/generator.ts";
export {
    absoluteError,
    compareStreams,
    runBatch,
    runOnline,
    type ComparisonResult,
    type OnlineRunResult,
} from "./runner/compare.ts";
export { formatComparisonReport, formatQuantiles, formatValue, quantileLabel } from "./output/report.ts";
