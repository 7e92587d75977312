import { SCENARIO_NAMES } from "../types/inputs.js";
import type { ScenarioName } from "../types/inputs.js";
import { validateRequest } from "../validate/validate.js";
import { MboModelEngine } from "./model-engine.js";
import type { MboModelResult } from "./model-engine.js";

export interface ScenarioSummary {
  scenario: ScenarioName;
  success: boolean;
  finalYearRevenue: number | null;
  finalYearEbitda: number | null;
  minimumCash: number | null;
  minimumDscr: number | null;
  sponsorIrr: number | null;
  investorIrr: number | null;
  equityMoic: number | null;
  warnings: string[];
  errors: string[];
}

export interface ScenarioComparison {
  success: boolean;
  scenarios: ScenarioSummary[];
  runs: Partial<Record<ScenarioName, MboModelResult>>;
  errors: string[];
}

function summarize(scenario: ScenarioName, result: MboModelResult): ScenarioSummary {
  const metrics = result.results?.metrics;
  return {
    scenario,
    success: result.success,
    finalYearRevenue: metrics?.finalYearRevenue ?? null,
    finalYearEbitda: metrics?.finalYearEbitda ?? null,
    minimumCash: metrics?.minimumCash ?? null,
    minimumDscr: metrics?.minimumDscr ?? null,
    sponsorIrr: metrics?.sponsorIrr ?? null,
    investorIrr: metrics?.investorIrr ?? null,
    equityMoic: metrics?.equityMoic ?? null,
    warnings: result.warnings,
    errors: result.errors ?? [],
  };
}

/**
 * Runs the model once per revenue scenario defined in the request (base, best, worst)
 * and lines up the headline metrics side by side.
 */
export class ScenarioRunner {
  constructor(private readonly engine: MboModelEngine = new MboModelEngine()) {}

  async run(request: unknown): Promise<ScenarioComparison> {
    const contract = validateRequest(request, this.engine.config.contractsDir);
    if (!contract.valid) {
      return { success: false, scenarios: [], runs: {}, errors: contract.errors };
    }

    const defined = SCENARIO_NAMES.filter((name) => contract.inputs.modules.revenue.scenarios[name] !== undefined);
    const runs: Partial<Record<ScenarioName, MboModelResult>> = {};
    const scenarios: ScenarioSummary[] = [];

    for (const scenario of defined) {
      const result = await this.engine.run(contract.inputs, { scenario });
      runs[scenario] = result;
      scenarios.push(summarize(scenario, result));
    }

    return {
      success: scenarios.every((summary) => summary.success),
      scenarios,
      runs,
      errors: scenarios.flatMap((summary) => summary.errors.map((error) => `${summary.scenario}: ${error}`)),
    };
  }
}
