/**
 * Online Aggregator
 *
 * @module estimators/online-aggregator
 * @description
 * Single-pass summary of a sample stream in constant memory: running min/max,
 * Welford mean and variance, one P² estimator per tracked probability, and two
 * L∞ deviation envelopes (around the running mean and the running median).
 *
 * Sample order matters: the envelopes use the centers as they stand after
 * each sample, and the P² markers depend on arrival order. Two aggregators fed
 * with shards of one stream cannot be merged.
 */

import { DEFAULT_QUANTILES, MEDIAN_PROBABILITY } from "../core/constants.ts";
import type { OnlineSnapshot, QuantileMap, Sample } from "../core/types.ts";
import { P2Quantile } from "./p2-quantile.ts";

/**
 * Running statistics over an unbounded stream.
 *
 * @example
 * ```typescript
 * const agg = new OnlineAggregator([0.5, 0.99]);
 * for (const x of readings) agg.update(x);
 * const { mean, std, envelopeMedian } = agg.snapshot();
 * ```
 */
export class OnlineAggregator {
    private n = 0;
    private lo = Infinity;
    private hi = -Infinity;
    private mu = 0;
    /** Sum of squared deviations from the running mean */
    private m2 = 0;

    private envMean = 0;
    /** undefined until the median estimator is ready */
    private envMedian: number | undefined = undefined;

    /** One estimator per distinct probability */
    private readonly estimators: Map<number, P2Quantile> = new Map();

    /**
     * @param probabilities - Quantiles to track; duplicates collapse to one estimator
     * @throws InvalidArgumentError if any probability is outside (0, 1)
     */
    constructor(probabilities: readonly number[] = DEFAULT_QUANTILES) {
        for (const p of probabilities) {
            if (!this.estimators.has(p)) this.estimators.set(p, new P2Quantile(p));
        }
    }

    // =========================================================================
    // UPDATE
    // =========================================================================

    /**
     * Consume one sample.
     */
    update(x: Sample): void {
        if (x < this.lo) this.lo = x;
        if (x > this.hi) this.hi = x;

        // Welford
        this.n += 1;
        const delta = x - this.mu;
        this.mu += delta / this.n;
        this.m2 += delta * (x - this.mu);

        for (const estimator of this.estimators.values()) estimator.update(x);

        this.envMean = Math.max(this.envMean, Math.abs(x - this.mu));

        const median = this.estimators.get(MEDIAN_PROBABILITY)?.value();
        if (median !== undefined) {
            this.envMedian = Math.max(this.envMedian ?? 0, Math.abs(x - median));
        }
    }

    // =========================================================================
    // QUERIES
    // =========================================================================

    get count(): number {
        return this.n;
    }

    /** +Infinity before the first sample */
    get min(): number {
        return this.lo;
    }

    /** -Infinity before the first sample */
    get max(): number {
        return this.hi;
    }

    get mean(): number {
        return this.mu;
    }

    /** Max |x - running mean| so far. */
    get meanEnvelope(): number {
        return this.envMean;
    }

    /** Max |x - running median| since the median estimator became ready. */
    get medianEnvelope(): number | undefined {
        return this.envMedian;
    }

    /**
     * Sample variance (denominator n - 1), undefined below 2 samples.
     */
    variance(): number | undefined {
        return this.n > 1 ? this.m2 / (this.n - 1) : undefined;
    }

    /**
     * Sample standard deviation, undefined below 2 samples.
     */
    std(): number | undefined {
        const v = this.variance();
        return v === undefined ? undefined : Math.sqrt(v);
    }

    /**
     * Estimate for a tracked probability. Undefined when `p` is not tracked or
     * its estimator is not ready yet.
     */
    quantile(p: number): number | undefined {
        return this.estimators.get(p)?.value();
    }

    /**
     * Tracked probabilities, ascending.
     */
    probabilities(): number[] {
        return [...this.estimators.keys()].sort((a, b) => a - b);
    }

    /**
     * All tracked estimates, keyed by probability in ascending order.
     */
    quantiles(): QuantileMap {
        return new Map(this.probabilities().map((p) => [p, this.quantile(p)] as const));
    }

    /**
     * Every output at once.
     */
    snapshot(): OnlineSnapshot {
        return {
            count: this.n,
            min: this.lo,
            max: this.hi,
            mean: this.mu,
            std: this.std(),
            quantiles: this.quantiles(),
            envelopeMean: this.envMean,
            envelopeMedian: this.envMedian,
        };
    }
}
