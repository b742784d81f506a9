/**
 * Run Configuration
 *
 * Defines Zod schemas for validating probabilities and comparison-run input.
 */

import { z } from "zod";
import {
    DEFAULT_OUTLIER_RATE,
    DEFAULT_QUANTILES,
    DEFAULT_SAMPLE_COUNT,
    DEFAULT_SEED,
} from "./constants.ts";
import { InvalidArgumentError } from "./errors.ts";

// =============================================================================
// ZOD SCHEMAS
// =============================================================================

/**
 * Target probability of a quantile estimator: open interval (0, 1).
 */
export const ProbabilitySchema = z
    .number()
    .gt(0, { message: "probability must be greater than 0" })
    .lt(1, { message: "probability must be less than 1" })
    .describe("Target probability of a tracked quantile");

/**
 * Schema for one comparison run (synthetic stream + tracked quantiles).
 */
export const RunConfigSchema = z.object({
    n: z.number().int().positive().default(DEFAULT_SAMPLE_COUNT).describe("Number of samples to generate"),
    seed: z.number().int().default(DEFAULT_SEED).describe("Seed of the synthetic stream"),
    outlierRate: z
        .number()
        .min(0)
        .max(1)
        .default(DEFAULT_OUTLIER_RATE)
        .describe("Fraction of samples shifted into outliers"),
    quantiles: z
        .array(ProbabilitySchema)
        .min(1)
        .default(() => [...DEFAULT_QUANTILES])
        .describe("Probabilities to track"),
});

export type RunConfig = z.output<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

// =============================================================================
// PARSERS
// =============================================================================

/**
 * Join zod issues into a single line: `path: message; path: message`.
 */
function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
        .join("; ");
}

/**
 * Validate a target probability.
 *
 * @throws InvalidArgumentError unless 0 < q < 1
 */
export function parseProbability(q: number): number {
    const result = ProbabilitySchema.safeParse(q);
    if (!result.success) {
        throw new InvalidArgumentError(`Invalid probability ${q}: ${describeIssues(result.error)}`, q);
    }
    return result.data;
}

/**
 * Validate run input and fill in defaults.
 *
 * @throws InvalidArgumentError listing every rejected field
 */
export function parseRunConfig(input: RunConfigInput = {}): RunConfig {
    const result = RunConfigSchema.safeParse(input);
    if (!result.success) {
        throw new InvalidArgumentError(`Invalid run configuration: ${describeIssues(result.error)}`, input);
    }
    return result.data;
}
