/**
 * Command-line arguments
 *
 * `--n <int> --seed <int> --outlier-rate <float> --q <p> [--q <p> ...]`
 *
 * Repeated `--q` flags replace the default tracked set.
 */

import { parseArgs } from "node:util";
import { parseRunConfig, type RunConfig, type RunConfigInput } from "../core/config.ts";
import { InvalidArgumentError } from "../core/errors.ts";

/**
 * Parse a numeric flag. Missing flags stay undefined so the schema default applies.
 */
function toNumber(flag: string, raw: string | undefined): number | undefined {
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (raw.trim() === "" || Number.isNaN(value)) {
        throw new InvalidArgumentError(`--${flag} expects a number, got "${raw}"`, raw);
    }
    return value;
}

const OPTIONS = {
    n: { type: "string" },
    seed: { type: "string" },
    "outlier-rate": { type: "string" },
    q: { type: "string", multiple: true },
} as const;

/**
 * Raw flag values; unknown flags and positionals are rejected.
 */
function readFlags(argv: readonly string[]) {
    try {
        return parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false }).values;
    } catch (error) {
        throw new InvalidArgumentError(error instanceof Error ? error.message : String(error), argv);
    }
}

/**
 * Turn argv (without the node and script entries) into a validated RunConfig.
 *
 * @throws InvalidArgumentError on unknown flags, non-numeric values or out-of-range settings
 */
export function parseCliArgs(argv: readonly string[]): RunConfig {
    const values = readFlags(argv);

    const input: RunConfigInput = {
        n: toNumber("n", values.n),
        seed: toNumber("seed", values.seed),
        outlierRate: toNumber("outlier-rate", values["outlier-rate"]),
        quantiles: values.q?.map((raw) => toNumber("q", raw) ?? Number.NaN),
    };
    return parseRunConfig(input);
}
