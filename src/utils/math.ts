/**
 * Math Utilities
 *
 * Shared full-scan helpers used by the batch reference and the latency
 * diagnostics, plus float stepping used by the P² ordering clamp.
 */

/**
 * Calculate sum of an array of numbers.
 */
export function sum(values: ArrayLike<number>): number {
    let total = 0;
    for (let i = 0; i < values.length; i++) total += values[i];
    return total;
}

/**
 * Calculate arithmetic mean of an array of numbers.
 * Returns undefined for empty arrays.
 */
export function mean(values: ArrayLike<number>): number | undefined {
    if (values.length === 0) return undefined;
    return sum(values) / values.length;
}

/**
 * Calculate sample standard deviation (denominator n - 1).
 * Returns undefined for arrays with fewer than 2 elements.
 */
export function stddevSample(values: ArrayLike<number>): number | undefined {
    const m = mean(values);
    if (m === undefined || values.length < 2) return undefined;
    let sumSq = 0;
    for (let i = 0; i < values.length; i++) {
        const d = values[i] - m;
        sumSq += d * d;
    }
    return Math.sqrt(sumSq / (values.length - 1));
}

/**
 * Calculate minimum value in array.
 * Returns Infinity for empty arrays.
 */
export function min(values: ArrayLike<number>): number {
    let result = Infinity;
    for (let i = 0; i < values.length; i++) {
        if (values[i] < result) result = values[i];
    }
    return result;
}

/**
 * Calculate maximum value in array.
 * Returns -Infinity for empty arrays.
 */
export function max(values: ArrayLike<number>): number {
    let result = -Infinity;
    for (let i = 0; i < values.length; i++) {
        if (values[i] > result) result = values[i];
    }
    return result;
}

/**
 * Largest |x - center| over the array. Returns 0 for empty arrays.
 */
export function maxAbsDeviation(values: ArrayLike<number>, center: number): number {
    let result = 0;
    for (let i = 0; i < values.length; i++) {
        const d = Math.abs(values[i] - center);
        if (d > result) result = d;
    }
    return result;
}

// =============================================================================
// FLOAT STEPPING
// =============================================================================

const stepView = new DataView(new ArrayBuffer(8));

/**
 * Smallest double strictly greater than x.
 * NaN and +Infinity are returned unchanged.
 */
export function nextUp(x: number): number {
    if (Number.isNaN(x) || x === Infinity) return x;
    if (x === 0) return Number.MIN_VALUE;
    stepView.setFloat64(0, x);
    const bits = stepView.getBigInt64(0);
    // Same-sign doubles are ordered like their bit patterns read as sign-magnitude
    stepView.setBigInt64(0, x > 0 ? bits + 1n : bits - 1n);
    return stepView.getFloat64(0);
}

/**
 * Largest double strictly less than x.
 * NaN and -Infinity are returned unchanged.
 */
export function nextDown(x: number): number {
    return -nextUp(-x);
}
