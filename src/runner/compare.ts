/**
 * Streaming vs Batch Comparison
 *
 * @module runner/compare
 * @description
 * Runs the same sample set through the OnlineAggregator and the batch
 * reference, times the streaming path per sample, and reports the absolute
 * quantile error of the streaming estimates.
 */

import type { RunConfig } from "../core/config.ts";
import type { BatchStats, OnlineSnapshot, QuantileMap } from "../core/types.ts";
import { OnlineAggregator } from "../estimators/online-aggregator.ts";
import { computeBatchStats, quantileLinear } from "../reference/batch-stats.ts";
import { makeSignal } from "../signal/generator.ts";
import { mean } from "../utils/math.ts";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Streaming outputs plus per-sample latency diagnostics.
 */
export interface OnlineRunResult extends OnlineSnapshot {
    /** Average update latency in milliseconds */
    avgLatencyMs: number | undefined;
    /** 95th percentile update latency in milliseconds */
    p95LatencyMs: number | undefined;
}

export interface ComparisonResult {
    config: RunConfig;
    batch: BatchStats;
    online: OnlineRunResult;
    /** |online - batch| per probability, undefined where the online estimate is */
    absoluteErrors: QuantileMap;
}

// =============================================================================
// RUNNERS
// =============================================================================

/**
 * Feed every sample to a fresh aggregator, timing each update.
 */
export function runOnline(samples: ArrayLike<number>, quantiles: readonly number[]): OnlineRunResult {
    const aggregator = new OnlineAggregator(quantiles);
    const latencies = new Float64Array(samples.length);

    for (let i = 0; i < samples.length; i++) {
        const started = performance.now();
        aggregator.update(samples[i]);
        latencies[i] = performance.now() - started;
    }

    return {
        ...aggregator.snapshot(),
        avgLatencyMs: mean(latencies),
        p95LatencyMs: quantileLinear(latencies.sort(), 0.95),
    };
}

/**
 * Batch reference over the same samples.
 */
export function runBatch(samples: ArrayLike<number>, quantiles: readonly number[]): BatchStats {
    return computeBatchStats(samples, quantiles);
}

/**
 * |a - b| that stays undefined when either side is.
 */
export function absoluteError(a: number | undefined, b: number | undefined): number | undefined {
    if (a === undefined || b === undefined) return undefined;
    return Math.abs(a - b);
}

/**
 * Generate the configured stream and compare both computations on it.
 */
export function compareStreams(config: RunConfig): ComparisonResult {
    const samples = makeSignal({ n: config.n, seed: config.seed, outlierRate: config.outlierRate });

    const batch = runBatch(samples, config.quantiles);
    const online = runOnline(samples, config.quantiles);

    const absoluteErrors = new Map<number, number | undefined>();
    for (const [q, reference] of batch.quantiles) {
        absoluteErrors.set(q, absoluteError(online.quantiles.get(q), reference));
    }

    return { config, batch, online, absoluteErrors };
}
