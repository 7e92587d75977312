import { describe, expect, it } from "vitest";

import { MboModelEngine, createSummaryReport } from "../../src/engine/model-engine.js";
import { createSimpleInputs } from "../helpers.js";

const createEngine = () => new MboModelEngine({ config: { logLevel: "silent" } });

describe("MboModelEngine", () => {
  it("resolves the interest circularity and closes all statements", async () => {
    const result = await createEngine().run(createSimpleInputs());

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([]);

    const results = result.results;
    expect(results?.labels).toEqual(["FY2026", "FY2027", "FY2028"]);
    expect(results?.solver.converged).toBe(true);
    expect(results?.solver.iterations).toBe(2);
    expect(results?.solver.deltas[1]).toBe(0);

    expect(results?.pnl.map((row) => row.interestExpense)).toEqual(
      results?.debt.map((row) => row.totalInterest),
    );
    expect(results?.pnl[0]?.netIncome).toBeCloseTo(1575, 6);
    expect(results?.pnl[2]?.netIncome).toBeCloseTo(1725, 6);
    expect(results?.cashflow[2]?.closingCash).toBeCloseTo(2850, 6);
    expect(results?.balanceSheet).toHaveLength(4);
    expect(results?.balanceSheet[0]?.label).toBe("Close");
    expect(results?.balanceSheet[3]?.equity).toBeCloseTo(8850, 6);
    expect(results?.checks.every((check) => check.passed)).toBe(true);
  });

  it("populates summary metrics", async () => {
    const result = await createEngine().run(createSimpleInputs());
    const metrics = result.results?.metrics;

    expect(metrics?.finalYearRevenue).toBe(10000);
    expect(metrics?.finalYearEbitda).toBe(3000);
    expect(metrics?.averageEbitdaMargin).toBeCloseTo(0.3, 9);
    expect(metrics?.cumulativeFreeCashflow).toBeCloseTo(4950, 6);
    expect(metrics?.minimumCash).toBe(900);
    expect(metrics?.minimumDscr).toBeCloseTo(2275 / 1700, 6);
    expect(metrics?.peakLeverage).toBeCloseTo(2, 9);
    expect(metrics?.equityMoic).toBeCloseTo(13850 / 4000, 6);
    expect(metrics?.equityIrr).toBeCloseTo(Math.cbrt(13850 / 4000) - 1, 6);
  });

  it("converges when interest depends on the swept balance", async () => {
    const inputs = createSimpleInputs();
    inputs.modules.debt = { ...inputs.modules.debt, interest_basis: "average", cash_sweep: { sweep_pct: 0.5 } };

    const result = await createEngine().run(inputs);
    const solver = result.results?.solver;

    expect(result.success).toBe(true);
    expect(solver?.converged).toBe(true);
    expect(solver?.iterations).toBeGreaterThan(2);
    result.results?.pnl.forEach((row, i) => {
      expect(Math.abs(row.interestExpense - (result.results?.debt[i]?.totalInterest ?? 0))).toBeLessThanOrEqual(0.01);
    });
  });

  it("warns when the financing loop hits its iteration cap", async () => {
    const inputs = createSimpleInputs();
    inputs.modules.solver = { max_iterations: 1 };

    const result = await createEngine().run(inputs);

    expect(result.success).toBe(true);
    expect(result.results?.solver.converged).toBe(false);
    expect(result.warnings).toContain("Interest circularity did not converge after 1 iterations (last change 700.0000)");
  });

  it("runs the scenario passed in the options", async () => {
    const inputs = createSimpleInputs();
    inputs.modules.revenue.scenarios.worst = { workdays_per_year: 200, utilization_rate: 0.45, group_day_rate: 10 };

    const result = await createEngine().run(inputs, { scenario: "worst" });

    expect(result.results?.scenario).toBe("worst");
    expect(result.results?.metrics.finalYearRevenue).toBeCloseTo(9000, 6);
  });

  it("rejects requests that break the contract", async () => {
    const result = await createEngine().run({ contract: { contract_version: "MBO_MODEL_V1", engine_version: "0.1.0" } });

    expect(result.success).toBe(false);
    expect(result.errors).toContain("/: must have required property 'deal'");
  });

  it("reports semantic validation errors with their path", async () => {
    const inputs = createSimpleInputs();
    inputs.modules.staffing.consultant_fte = [10, 10];
    inputs.modules.returns.exit_year = 4;

    const result = await createEngine().run(inputs);

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      "staffing.consultant_fte: must have exactly 3 entries (one per year)",
      "returns.exit_year: exit_year must be an integer between 1 and 3",
    ]);
  });

  it("rejects a deal whose sources do not cover its uses", async () => {
    const inputs = createSimpleInputs();
    inputs.modules.transaction.sponsor_equity = 1000;
    inputs.modules.transaction.investor_equity = 0;

    const result = await createEngine().run(inputs);

    expect(result.errors).toEqual(["transaction: funding gap at close: uses 10100 exceed sources 8000"]);
  });

  it("rejects an undefined scenario", async () => {
    const result = await createEngine().run(createSimpleInputs(), { scenario: "best" });

    expect(result.errors).toEqual(["revenue.scenarios.best: scenario is not defined"]);
  });
});

describe("createSummaryReport", () => {
  it("summarises a successful run", async () => {
    const result = await createEngine().run(createSimpleInputs());
    const lines = createSummaryReport(result).split("\n");

    expect(lines[0]).toBe("=".repeat(60));
    expect(lines[1]).toBe("MBO SUMMARY: Test Consulting (base case)");
    expect(lines).toContain("  Final-Year Revenue: EUR 10,000");
    expect(lines).toContain("  Debt at Close: EUR 7,000");
    expect(lines).toContain("  Peak Leverage: 2.00x");
    expect(lines).toContain("  Solver: 2 iteration(s), converged");
    expect(lines).not.toContain("WARNINGS");
  });

  it("lists errors for a failed run", () => {
    expect(createSummaryReport({ success: false, errors: ["bad input"], warnings: [] })).toBe(
      "MBO Model Failed:\nbad input",
    );
  });
});
