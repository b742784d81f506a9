/**
 * Online Aggregator Tests
 *
 * Running extrema, Welford mean/std, quantile ownership and the two
 * deviation envelopes.
 */

import { describe, it, expect } from "vitest";
import { OnlineAggregator } from "../../src/estimators/online-aggregator.ts";
import { InvalidArgumentError } from "../../src/core/errors.ts";
import { mean, stddevSample } from "../../src/utils/math.ts";
import { normalSamples, tiedSamples } from "../test-utils.ts";

// =============================================================================
// INITIAL STATE
// =============================================================================

describe("OnlineAggregator - Initial State", () => {
    it("starts empty", () => {
        const agg = new OnlineAggregator();

        expect(agg.count).toBe(0);
        expect(agg.min).toBe(Infinity);
        expect(agg.max).toBe(-Infinity);
        expect(agg.mean).toBe(0);
        expect(agg.std()).toBeUndefined();
        expect(agg.variance()).toBeUndefined();
        expect(agg.meanEnvelope).toBe(0);
        expect(agg.medianEnvelope).toBeUndefined();
    });

    it("tracks 0.1, 0.5 and 0.9 by default", () => {
        const agg = new OnlineAggregator();

        expect(agg.probabilities()).toEqual([0.1, 0.5, 0.9]);
        expect([...agg.quantiles().entries()]).toEqual([
            [0.1, undefined],
            [0.5, undefined],
            [0.9, undefined],
        ]);
    });

    it("collapses duplicate probabilities", () => {
        const agg = new OnlineAggregator([0.5, 0.5]);

        expect(agg.probabilities()).toEqual([0.5]);
        expect(agg.quantiles().size).toBe(1);
    });

    it("rejects an out-of-range probability", () => {
        expect(() => new OnlineAggregator([0.5, 1])).toThrow(InvalidArgumentError);
    });
});

// =============================================================================
// EXTREMA AND MOMENTS
// =============================================================================

describe("OnlineAggregator - Extrema and Moments", () => {
    it("reports running max and min after each sample", () => {
        const agg = new OnlineAggregator();
        const maxes: number[] = [];
        const mins: number[] = [];

        for (const x of [3, 1, 4, 2, 10, 6]) {
            agg.update(x);
            maxes.push(agg.max);
            mins.push(agg.min);
        }

        expect(maxes).toEqual([3, 3, 4, 4, 10, 10]);
        expect(mins).toEqual([3, 1, 1, 1, 1, 1]);
    });

    it("computes mean and sample std of a small stream", () => {
        const agg = new OnlineAggregator();
        for (const x of [3, 1, 4, 2, 10, 6]) agg.update(x);

        expect(agg.count).toBe(6);
        expect(agg.mean).toBeCloseTo(26 / 6, 12);
        expect(agg.variance()).toBeCloseTo(32 / 3, 12);
        expect(agg.std()).toBeCloseTo(Math.sqrt(32 / 3), 12);
    });

    it("leaves std undefined after a single sample", () => {
        const agg = new OnlineAggregator();
        agg.update(42);

        expect(agg.mean).toBe(42);
        expect(agg.std()).toBeUndefined();
    });

    it("matches a full scan on 50,000 normal samples", () => {
        const samples = normalSamples(50_000, 1);
        const agg = new OnlineAggregator();
        for (const x of samples) agg.update(x);

        expect(Math.abs(agg.mean - (mean(samples) ?? Number.NaN))).toBeLessThan(1e-3);
        expect(Math.abs((agg.std() ?? Number.NaN) - (stddevSample(samples) ?? Number.NaN))).toBeLessThan(1e-3);
    });

    it("keeps max non-decreasing and min non-increasing", () => {
        const agg = new OnlineAggregator();
        let previousMax = -Infinity;
        let previousMin = Infinity;

        for (const x of normalSamples(2000, 5)) {
            agg.update(x);
            expect(agg.max).toBeGreaterThanOrEqual(previousMax);
            expect(agg.min).toBeLessThanOrEqual(previousMin);
            previousMax = agg.max;
            previousMin = agg.min;
        }
    });
});

// =============================================================================
// QUANTILES
// =============================================================================

describe("OnlineAggregator - Quantiles", () => {
    it("returns undefined for an untracked probability", () => {
        const agg = new OnlineAggregator([0.5]);
        for (const x of [1, 2, 3, 4, 5]) agg.update(x);

        expect(agg.quantile(0.5)).toBe(3);
        expect(agg.quantile(0.25)).toBeUndefined();
    });

    it("forwards every sample to each estimator", () => {
        const agg = new OnlineAggregator([0.1, 0.5, 0.9]);
        for (const x of [5, 4, 3, 2, 1]) agg.update(x);

        // Right after bootstrap every estimator reads the sorted middle sample
        expect([...agg.quantiles().values()]).toEqual([3, 3, 3]);
    });
});

// =============================================================================
// ENVELOPES
// =============================================================================

describe("OnlineAggregator - Envelopes", () => {
    it("defines the median envelope once the median estimator is ready", () => {
        const agg = new OnlineAggregator();
        const envelopes: (number | undefined)[] = [];

        for (const x of [3, 1, 4, 2, 10, 6]) {
            agg.update(x);
            envelopes.push(agg.medianEnvelope);
        }

        // Median is 3 after the 5th sample: |10 - 3| = 7, then |6 - 3| = 3
        expect(envelopes).toEqual([undefined, undefined, undefined, undefined, 7, 7]);
    });

    it("measures the mean envelope against the post-update mean", () => {
        const agg = new OnlineAggregator();
        const envelopes: number[] = [];

        for (const x of [3, 1, 4, 2, 10, 6]) {
            agg.update(x);
            envelopes.push(agg.meanEnvelope);
        }

        expect(envelopes[0]).toBe(0);
        expect(envelopes[1]).toBe(1);
        expect(envelopes[2]).toBeCloseTo(4 / 3, 12);
        expect(envelopes[3]).toBeCloseTo(4 / 3, 12);
        expect(envelopes[4]).toBeCloseTo(6, 12);
        expect(envelopes[5]).toBeCloseTo(6, 12);
    });

    it("never defines the median envelope without a 0.5 estimator", () => {
        const agg = new OnlineAggregator([0.1, 0.9]);
        for (const x of normalSamples(100, 2)) agg.update(x);

        expect(agg.medianEnvelope).toBeUndefined();
        expect(agg.meanEnvelope).toBeGreaterThan(0);
    });

    it("keeps both envelopes non-negative and non-decreasing", () => {
        const agg = new OnlineAggregator([0.5]);
        let previousMean = 0;
        let previousMedian: number | undefined;

        for (const x of tiedSamples(3000, 8, 7)) {
            agg.update(x);
            expect(agg.meanEnvelope).toBeGreaterThanOrEqual(previousMean);
            previousMean = agg.meanEnvelope;

            const median = agg.medianEnvelope;
            if (agg.count < 5) {
                expect(median).toBeUndefined();
                continue;
            }
            expect(median).toBeDefined();
            expect(median ?? -1).toBeGreaterThanOrEqual(previousMedian ?? 0);
            previousMedian = median;
        }
    });

    it("bundles every output in a snapshot", () => {
        const agg = new OnlineAggregator([0.5]);
        for (const x of [3, 1, 4, 2, 10]) agg.update(x);

        const snapshot = agg.snapshot();
        expect(snapshot.count).toBe(5);
        expect(snapshot.min).toBe(1);
        expect(snapshot.max).toBe(10);
        expect(snapshot.mean).toBeCloseTo(4, 12);
        expect(snapshot.std).toBeCloseTo(Math.sqrt(12.5), 12);
        expect(snapshot.quantiles.get(0.5)).toBe(3);
        expect(snapshot.envelopeMean).toBeCloseTo(6, 12);
        expect(snapshot.envelopeMedian).toBe(7);
    });
});
