/**
 * Batch Reference Statistics
 *
 * @module reference/batch-stats
 * @description
 * Full-scan counterparts of the streaming outputs. Stores and sorts the whole
 * sample set (O(n) memory, O(n log n) time); used only to measure how far the
 * streaming estimates drift from exact figures.
 */

import { MEDIAN_PROBABILITY } from "../core/constants.ts";
import type { BatchStats } from "../core/types.ts";
import { max, maxAbsDeviation, mean, min, stddevSample } from "../utils/math.ts";

// =============================================================================
// QUANTILES
// =============================================================================

/**
 * Quantile of an ascending array by linear interpolation between the two
 * closest order statistics (h = (n - 1) * q).
 * Returns undefined for empty arrays.
 */
export function quantileLinear(sorted: ArrayLike<number>, q: number): number | undefined {
    if (sorted.length === 0) return undefined;
    const h = (sorted.length - 1) * q;
    const lo = Math.floor(h);
    const hi = Math.min(lo + 1, sorted.length - 1);
    return sorted[lo] + (h - lo) * (sorted[hi] - sorted[lo]);
}

// =============================================================================
// FULL SCAN
// =============================================================================

/**
 * Compute every streaming output exactly from a materialized sample set.
 *
 * @param samples - Complete sample set, left unmodified
 * @param quantiles - Probabilities to report
 * @throws Error if samples is empty
 */
export function computeBatchStats(samples: ArrayLike<number>, quantiles: readonly number[]): BatchStats {
    const started = performance.now();

    const average = mean(samples);
    if (average === undefined) {
        throw new Error("Cannot compute statistics of an empty sample set");
    }

    const sorted = Float64Array.from(samples).sort();
    const quantileMap = new Map<number, number | undefined>();
    for (const q of [...new Set(quantiles)].sort((a, b) => a - b)) {
        quantileMap.set(q, quantileLinear(sorted, q));
    }
    const median = quantileMap.get(MEDIAN_PROBABILITY) ?? quantileLinear(sorted, MEDIAN_PROBABILITY) ?? average;

    const result: Omit<BatchStats, "timeSeconds"> = {
        count: samples.length,
        min: min(samples),
        max: max(samples),
        mean: average,
        std: stddevSample(samples),
        quantiles: quantileMap,
        envelopeMean: maxAbsDeviation(samples, average),
        envelopeMedian: maxAbsDeviation(samples, median),
    };
    return { ...result, timeSeconds: (performance.now() - started) / 1000 };
}
