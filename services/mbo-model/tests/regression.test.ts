import { describe, expect, it } from "vitest";

import { MboModelEngine } from "../src/engine/model-engine.js";
import { ScenarioRunner } from "../src/engine/scenario-runner.js";
import { loadFixture } from "./helpers.js";

const engine = new MboModelEngine({ config: { logLevel: "silent" } });

describe("MBO_MODEL_V1 regression", () => {
  it("consulting_mbo_v1 closes all statements", async () => {
    const result = await engine.run(loadFixture("consulting_mbo_v1.json"));

    expect(result.errors).toBeUndefined();
    expect(result.success).toBe(true);

    const results = result.results;
    expect(results?.labels).toEqual(["FY2026", "FY2027", "FY2028", "FY2029", "FY2030"]);
    expect(results?.solver.converged).toBe(true);
    expect(results?.checks.map((check) => check.name)).toEqual([
      "balance_sheet_balances",
      "cash_reconciles",
      "debt_non_negative",
      "net_income_ties",
    ]);
    expect(results?.checks.every((check) => check.passed)).toBe(true);

    for (const row of results?.balanceSheet ?? []) {
      expect(Math.abs(row.balanceCheck)).toBeLessThanOrEqual(1);
      expect(row.seniorDebt).toBeGreaterThanOrEqual(0);
      expect(row.revolver).toBeGreaterThanOrEqual(0);
    }
  });

  it("consulting_mbo_v1 keeps P&L interest within solver tolerance of the debt schedule", async () => {
    const result = await engine.run(loadFixture("consulting_mbo_v1.json"));
    const debt = result.results?.debt ?? [];

    expect(result.results?.pnl).toHaveLength(5);
    result.results?.pnl.forEach((row, i) => {
      const debtRow = debt[i];
      expect(Math.abs(row.interestExpense - (debtRow?.totalInterest ?? 0))).toBeLessThanOrEqual(0.01);
    });
  });

  it("consulting_mbo_v1 holds one year of taxes payable and pays the opening balance first", async () => {
    const result = await engine.run(loadFixture("consulting_mbo_v1.json"));
    const results = result.results;

    expect(results?.balanceSheet[0]?.taxPayable).toBe(200000);
    expect(results?.balanceSheet[1]?.taxPayable).toBeCloseTo(results?.pnl[0]?.taxes ?? Number.NaN, 6);
  });

  it("consulting_mbo_v1 ranks scenarios by revenue", async () => {
    const comparison = await new ScenarioRunner(engine).run(loadFixture("consulting_mbo_v1.json"));
    const revenue = comparison.scenarios.map((summary) => summary.finalYearRevenue ?? 0);

    expect(comparison.success).toBe(true);
    expect(comparison.scenarios.map((summary) => summary.scenario)).toEqual(["base", "best", "worst"]);
    expect(revenue[1]).toBeGreaterThan(revenue[0] ?? 0);
    expect(revenue[0]).toBeGreaterThan(revenue[2] ?? 0);
  });
});
