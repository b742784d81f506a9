/**
 * P² Streaming Quantile Estimator
 *
 * @module estimators/p2-quantile
 * @description
 * Jain & Chlamtac (1985) piecewise-parabolic estimator for a single quantile.
 * Five markers approximate the stream's empirical distribution; the middle
 * marker's height is the estimate. Memory and per-sample time are constant.
 *
 * @architecture
 * Two-phase state machine, irreversible:
 *
 * ```
 *   bootstrapping ──(5th sample)──► ready
 * ```
 *
 * - bootstrapping: the first 5 raw samples are buffered
 * - ready: heights, 1-based positions, desired positions and desired
 *   increments live in four fixed-length Float64Arrays
 *
 * Marker positions only ever hold integers; desired positions are fractional.
 */

import { ESTIMATE_MARKER, MARKER_COUNT } from "../core/constants.ts";
import { parseProbability } from "../core/config.ts";
import { nextDown, nextUp } from "../utils/math.ts";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Marker set of a ready estimator. Every array has MARKER_COUNT slots.
 */
interface MarkerSet {
    /** Marker heights, weakly increasing */
    heights: Float64Array;
    /** Samples at or below each marker, strictly increasing */
    positions: Float64Array;
    /** Where each marker should sit for the target probability */
    desired: Float64Array;
    /** Added to `desired` on every sample */
    increments: Float64Array;
}

type EstimatorState =
    | { phase: "bootstrapping"; buffer: number[] }
    | { phase: "ready"; markers: MarkerSet };

export type EstimatorPhase = EstimatorState["phase"];

// =============================================================================
// ESTIMATOR
// =============================================================================

/**
 * Streaming estimate of the q-th quantile.
 *
 * @example
 * ```typescript
 * const p90 = new P2Quantile(0.9);
 * for (const latency of latencies) p90.update(latency);
 * p90.value(); // undefined until 5 samples were seen
 * ```
 */
export class P2Quantile {
    readonly probability: number;

    private state: EstimatorState = { phase: "bootstrapping", buffer: [] };

    /**
     * @throws InvalidArgumentError unless 0 < q < 1
     */
    constructor(q: number) {
        this.probability = parseProbability(q);
    }

    // =========================================================================
    // PUBLIC API
    // =========================================================================

    get phase(): EstimatorPhase {
        return this.state.phase;
    }

    /**
     * Whether at least MARKER_COUNT samples were consumed.
     */
    ready(): boolean {
        return this.state.phase === "ready";
    }

    /**
     * Current estimate, or undefined while bootstrapping.
     */
    value(): number | undefined {
        if (this.state.phase !== "ready") return undefined;
        return this.state.markers.heights[ESTIMATE_MARKER];
    }

    /**
     * Number of samples consumed so far.
     */
    count(): number {
        if (this.state.phase !== "ready") return this.state.buffer.length;
        return this.state.markers.positions[MARKER_COUNT - 1];
    }

    /**
     * Copy of the marker heights, undefined while bootstrapping.
     */
    heights(): number[] | undefined {
        if (this.state.phase !== "ready") return undefined;
        return Array.from(this.state.markers.heights);
    }

    /**
     * Copy of the 1-based marker positions, undefined while bootstrapping.
     */
    positions(): number[] | undefined {
        if (this.state.phase !== "ready") return undefined;
        return Array.from(this.state.markers.positions);
    }

    /**
     * Consume one sample.
     */
    update(x: number): void {
        if (this.state.phase === "bootstrapping") {
            this.bootstrap(this.state.buffer, x);
            return;
        }
        this.advance(this.state.markers, x);
    }

    // =========================================================================
    // BOOTSTRAP
    // =========================================================================

    private bootstrap(buffer: number[], x: number): void {
        buffer.push(x);
        if (buffer.length < MARKER_COUNT) return;

        const q = this.probability;
        buffer.sort((a, b) => a - b);
        this.state = {
            phase: "ready",
            markers: {
                heights: Float64Array.from(buffer),
                positions: Float64Array.of(1, 2, 3, 4, 5),
                desired: Float64Array.of(1, 1 + 2 * q, 1 + 4 * q, 3 + 2 * q, 5),
                increments: Float64Array.of(0, q / 2, q, (1 + q) / 2, 1),
            },
        };
    }

    // =========================================================================
    // STEADY STATE
    // =========================================================================

    private advance(m: MarkerSet, x: number): void {
        const { heights, positions, desired, increments } = m;
        const last = MARKER_COUNT - 1;

        // Cell k: first marker at or above x, kept within [1, 4]
        let k = 1;
        while (k < last && heights[k] < x) k++;
        if (x < heights[0]) {
            heights[0] = x;
            k = 1;
        } else if (x > heights[last]) {
            heights[last] = x;
            k = last;
        }

        for (let i = k; i < MARKER_COUNT; i++) positions[i] += 1;
        for (let i = 0; i < MARKER_COUNT; i++) desired[i] += increments[i];

        for (let i = 1; i < last; i++) {
            const d = desired[i] - positions[i];
            const roomAbove = positions[i + 1] - positions[i] > 1;
            const roomBelow = positions[i - 1] - positions[i] < -1;
            if (!((d >= 1 && roomAbove) || (d <= -1 && roomBelow))) continue;

            const s = d >= 1 ? 1 : -1;
            let h = parabolic(m, i, s);
            if (!(heights[i - 1] < h && h < heights[i + 1])) {
                h = linear(m, i, s);
            }
            heights[i] = clampBetween(h, heights[i - 1], heights[i + 1]);
            positions[i] += s;
        }
    }
}

// =============================================================================
// INTERPOLATION
// =============================================================================

/**
 * Piecewise-parabolic prediction for marker i moved by s (±1).
 */
function parabolic({ heights: h, positions: n }: MarkerSet, i: number, s: number): number {
    const upper = ((n[i] - n[i - 1] + s) * (h[i + 1] - h[i])) / (n[i + 1] - n[i]);
    const lower = ((n[i + 1] - n[i] - s) * (h[i] - h[i - 1])) / (n[i] - n[i - 1]);
    return h[i] + (s * (upper + lower)) / (n[i + 1] - n[i - 1]);
}

/**
 * Linear step from marker i toward marker i + s.
 */
function linear({ heights: h, positions: n }: MarkerSet, i: number, s: number): number {
    return h[i] + (s * (h[i + s] - h[i])) / (n[i + s] - n[i]);
}

/**
 * Restore ordering after an adjustment.
 *
 * A height touching a neighbour is stepped one double inside it. When the
 * neighbours leave no double strictly between them, the height is clamped
 * into [left, right] so ordering stays weak.
 */
function clampBetween(h: number, left: number, right: number): number {
    let result = h;
    if (result <= left) result = nextUp(left);
    if (result >= right) result = nextDown(right);
    if (result < left || result > right) {
        result = Math.min(Math.max(h, left), right);
    }
    return result;
}
