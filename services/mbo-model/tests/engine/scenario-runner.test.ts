import { describe, expect, it } from "vitest";

import { MboModelEngine } from "../../src/engine/model-engine.js";
import { ScenarioRunner } from "../../src/engine/scenario-runner.js";
import { createSimpleInputs } from "../helpers.js";

const createRunner = () => new ScenarioRunner(new MboModelEngine({ config: { logLevel: "silent" } }));

describe("ScenarioRunner", () => {
  it("runs every defined scenario in order", async () => {
    const inputs = createSimpleInputs();
    inputs.modules.revenue.scenarios.best = { workdays_per_year: 200, utilization_rate: 0.6, group_day_rate: 10 };
    inputs.modules.revenue.scenarios.worst = { workdays_per_year: 200, utilization_rate: 0.45, group_day_rate: 10 };

    const comparison = await createRunner().run(inputs);

    expect(comparison.success).toBe(true);
    expect(comparison.scenarios.map((summary) => summary.scenario)).toEqual(["base", "best", "worst"]);
    expect(comparison.scenarios[0]?.finalYearRevenue).toBeCloseTo(10000, 6);
    expect(comparison.scenarios[1]?.finalYearRevenue).toBeCloseTo(12000, 6);
    expect(comparison.scenarios[2]?.finalYearRevenue).toBeCloseTo(9000, 6);
    expect(comparison.runs.best?.results?.scenario).toBe("best");
  });

  it("skips scenarios that are not defined", async () => {
    const comparison = await createRunner().run(createSimpleInputs());

    expect(comparison.scenarios.map((summary) => summary.scenario)).toEqual(["base"]);
    expect(comparison.runs.worst).toBeUndefined();
  });

  it("prefixes errors with the failing scenario", async () => {
    const inputs = createSimpleInputs();
    inputs.modules.transaction.sponsor_equity = 1000;
    inputs.modules.transaction.investor_equity = 0;

    const comparison = await createRunner().run(inputs);

    expect(comparison.success).toBe(false);
    expect(comparison.errors).toEqual(["base: transaction: funding gap at close: uses 10100 exceed sources 8000"]);
  });

  it("stops at the contract", async () => {
    const comparison = await createRunner().run({});

    expect(comparison.success).toBe(false);
    expect(comparison.scenarios).toEqual([]);
    expect(comparison.errors).toContain("/: must have required property 'contract'");
  });
});
