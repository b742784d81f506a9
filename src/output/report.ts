/**
 * Comparison Report
 *
 * Plain-text rendering of a ComparisonResult. Pure: returns strings, never
 * prints.
 */

import type { QuantileMap } from "../core/types.ts";
import type { ComparisonResult } from "../runner/compare.ts";

const NOT_AVAILABLE = "n/a";

/**
 * Fixed-point number, or "n/a" when the value is not available.
 */
export function formatValue(value: number | undefined, digits: number = 4): string {
    return value === undefined ? NOT_AVAILABLE : value.toFixed(digits);
}

/**
 * Percent label of a probability: 0.1 → "q10", 0.05 → "q05".
 */
export function quantileLabel(q: number): string {
    return `q${String(Math.round(q * 100)).padStart(2, "0")}`;
}

/**
 * `q10=1.2345, q50=3.0000, ...` in ascending probability order.
 */
export function formatQuantiles(quantiles: QuantileMap, digits: number = 4): string {
    return [...quantiles.entries()]
        .sort(([a], [b]) => a - b)
        .map(([q, v]) => `${quantileLabel(q)}=${formatValue(v, digits)}`)
        .join(", ");
}

/**
 * Full side-by-side report of a comparison run.
 */
export function formatComparisonReport(result: ComparisonResult): string {
    const { config, batch, online, absoluteErrors } = result;
    const lines: string[] = [];

    lines.push(
        `Generated stream: n=${config.n.toLocaleString("en-US")} ` +
            `(seed=${config.seed}, outliers~${(config.outlierRate * 100).toFixed(2)}%)`,
        "",
        "BATCH (reference): O(n) time, O(n) memory",
        `  time: ${batch.timeSeconds.toFixed(4)}s`,
        `  min/max: ${formatValue(batch.min)} / ${formatValue(batch.max)}`,
        `  mean±std: ${formatValue(batch.mean)} ± ${formatValue(batch.std)}`,
        `  quantiles (linear): ${formatQuantiles(batch.quantiles)}`,
        `  L∞ envelope (mean):   ${formatValue(batch.envelopeMean)}`,
        `  L∞ envelope (median): ${formatValue(batch.envelopeMedian)}`,
        "",
        "ONLINE (streaming): O(1) time per sample, O(1) memory",
        `  avg latency per sample: ${formatValue(online.avgLatencyMs, 6)} ms ` +
            `(p95 ${formatValue(online.p95LatencyMs, 6)} ms)`,
        `  min/max: ${formatValue(online.min)} / ${formatValue(online.max)}`,
        `  mean±std: ${formatValue(online.mean)} ± ${formatValue(online.std)}`,
        `  quantiles (P²): ${formatQuantiles(online.quantiles)}`,
        `  L∞ envelope (mean):   ${formatValue(online.envelopeMean)}`,
        `  L∞ envelope (median): ${formatValue(online.envelopeMedian)}`,
        "",
        "|P² - batch| absolute quantile error:",
    );

    for (const [q, err] of [...absoluteErrors.entries()].sort(([a], [b]) => a - b)) {
        lines.push(`  ${quantileLabel(q)}: ${formatValue(err, 6)}`);
    }

    return lines.join("\n");
}
