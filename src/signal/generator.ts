/**
 * Synthetic Stream Source
 *
 * @module signal/generator
 * @description
 * Reproducible test signal: a noisy baseline with a slow sine drift and a
 * sprinkling of large one-sided outliers. The same seed always yields the same
 * samples.
 */

import {
    OUTLIER_OFFSETS,
    SIGNAL_BASELINE,
    SIGNAL_DRIFT_AMPLITUDE,
    SIGNAL_DRIFT_SPAN,
    SIGNAL_NOISE_STD,
} from "../core/constants.ts";

// =============================================================================
// SEEDED RANDOM
// =============================================================================

/**
 * Seeded pseudo-random source.
 */
export interface Rng {
    /** Uniform in [0, 1) */
    uniform(): number;
    /** Standard normal */
    normal(): number;
    /** Uniform integer in [0, maxExclusive) */
    int(maxExclusive: number): number;
}

/**
 * Create a mulberry32 generator.
 */
export function createRng(seed: number): Rng {
    let a = seed >>> 0;

    const uniform = (): number => {
        a = (a + 0x6d2b79f5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };

    return {
        uniform,
        normal(): number {
            // Box-Muller transform
            let u1 = 0;
            while (u1 === 0) u1 = uniform();
            const u2 = uniform();
            return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        },
        int(maxExclusive: number): number {
            return Math.floor(uniform() * maxExclusive);
        },
    };
}

// =============================================================================
// SIGNAL
// =============================================================================

export interface SignalOptions {
    /** Number of samples */
    n: number;
    seed: number;
    /** Fraction of samples shifted into outliers */
    outlierRate: number;
}

/**
 * Generate the synthetic signal.
 *
 * Each sample is `50 + 2·N(0,1) + 0.5·sin(t)` with t evenly spaced over
 * [0, 12π]; `floor(outlierRate · n)` distinct samples are then shifted by +50
 * or -30.
 */
export function makeSignal({ n, seed, outlierRate }: SignalOptions): Float64Array {
    const rng = createRng(seed);
    const samples = new Float64Array(n);
    const step = n > 1 ? SIGNAL_DRIFT_SPAN / (n - 1) : 0;

    for (let i = 0; i < n; i++) {
        samples[i] =
            SIGNAL_BASELINE + SIGNAL_NOISE_STD * rng.normal() + SIGNAL_DRIFT_AMPLITUDE * Math.sin(i * step);
    }

    const outliers = Math.min(n, Math.floor(outlierRate * n));
    for (const index of sampleIndices(rng, n, outliers)) {
        samples[index] += OUTLIER_OFFSETS[rng.int(OUTLIER_OFFSETS.length)];
    }
    return samples;
}

/**
 * Pick k distinct indices from [0, n) with a partial Fisher-Yates shuffle.
 */
function sampleIndices(rng: Rng, n: number, k: number): Uint32Array {
    const pool = new Uint32Array(n);
    for (let i = 0; i < n; i++) pool[i] = i;
    for (let i = 0; i < k; i++) {
        const j = i + rng.int(n - i);
        const tmp = pool[i];
        pool[i] = pool[j];
        pool[j] = tmp;
    }
    return pool.subarray(0, k);
}
