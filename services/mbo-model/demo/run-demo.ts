/**
 * MBO Model Demo Script
 *
 * Run with: npm run demo [path/to/request.json]
 */

import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import {
  MboModelEngine,
  ScenarioRunner,
  buildStatementTables,
  createSummaryReport,
  formatPercent,
  formatStatementAsText,
} from "../src/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const defaultRequest = join(__dirname, "../../../testcases/mbo_model_v1/fixtures/consulting_mbo_v1.json");

async function main(): Promise<void> {
  const requestPath = process.argv[2] ? resolve(process.argv[2]) : defaultRequest;
  const request: unknown = JSON.parse(readFileSync(requestPath, "utf8"));

  const engine = new MboModelEngine();
  const result = await engine.run(request);

  console.log(createSummaryReport(result));
  if (!result.success || !result.results) {
    process.exitCode = 1;
    return;
  }

  for (const table of buildStatementTables(result.results)) {
    console.log("");
    console.log(formatStatementAsText(table));
  }

  const comparison = await new ScenarioRunner(engine).run(request);
  console.log("SCENARIOS");
  for (const summary of comparison.scenarios) {
    console.log(
      `  ${summary.scenario.padEnd(6)} sponsor IRR ${formatPercent(summary.sponsorIrr)}  min DSCR ${
        summary.minimumDscr === null ? "-" : summary.minimumDscr.toFixed(2)
      }x`,
    );
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
