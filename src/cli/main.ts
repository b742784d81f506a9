/**
 * CLI entry: generate a synthetic stream, compare streaming and batch
 * statistics, print the report.
 *
 * Usage: npm run demo -- --n 200000 --seed 7 --outlier-rate 0.005 --q 0.1 --q 0.5 --q 0.9
 */

import { parseCliArgs } from "./args.ts";
import { compareStreams } from "../runner/compare.ts";
import { formatComparisonReport } from "../output/report.ts";

function main(): void {
    const config = parseCliArgs(process.argv.slice(2));
    const result = compareStreams(config);
    console.log(`\n${formatComparisonReport(result)}\n`);
}

try {
    main();
} catch (error) {
    console.error(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    process.exitCode = 1;
}
