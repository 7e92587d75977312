import { describe, expect, it } from "vitest";

import { BalanceSheetModule } from "../../src/modules/balance-sheet/balance-sheet-module.js";
import { computeClosingFunds } from "../../src/modules/transaction.js";
import type { MboModelInputs } from "../../src/types/inputs.js";
import { createSimpleInputs, createTestContext, financingModules, operatingModules, runModules } from "../helpers.js";

function runBalanceSheet(inputs: MboModelInputs) {
  const context = createTestContext(inputs);
  runModules(context, [...operatingModules(), ...financingModules()]);
  return new BalanceSheetModule().compute(context).outputs;
}

describe("computeClosingFunds", () => {
  it("balances sources and uses at close", () => {
    const { transaction, debt, tax } = createSimpleInputs().modules;
    const funds = computeClosingFunds(transaction, debt, tax);

    expect(funds.totalSources).toBe(11000);
    expect(funds.transactionCosts).toBe(100);
    expect(funds.totalUses).toBe(10100);
    expect(funds.openingCash).toBe(900);
    expect(funds.goodwill).toBe(7000);
    expect(funds.openingEquity).toBe(3900);
  });
});

describe("BalanceSheetModule", () => {
  it("opens at close and balances every year", () => {
    const outputs = runBalanceSheet(createSimpleInputs());

    expect(outputs?.cash.toArray()).toEqual([900, 2000, 3100, 4200]);
    expect(outputs?.seniorDebt.toArray()).toEqual([7000, 6000, 5000, 4000]);
    expect(outputs?.equity.toArray()).toEqual([3900, 6000, 8100, 10200]);
    expect(outputs?.totalAssets.get(0)).toBe(10900);
    expect(outputs?.totalAssets.get(3)).toBe(14200);
    expect(outputs?.balanceCheck.toArray()).toEqual([0, 0, 0, 0]);
  });

  it("carries the opening tax payable into goodwill and liabilities", () => {
    const inputs = createSimpleInputs();
    inputs.modules.tax = { tax_rate_pct: 0.25, payment_lag_years: 1, opening_tax_payable: 300 };
    const outputs = runBalanceSheet(inputs);

    expect(outputs?.goodwill.get(0)).toBe(7300);
    expect(outputs?.taxPayable.toArray()).toEqual([300, 700, 700, 700]);
    expect(outputs?.balanceCheck.toArray()).toEqual([0, 0, 0, 0]);
  });

  it("reduces equity by dividends", () => {
    const inputs = createSimpleInputs();
    inputs.modules.distributions = { payout_ratio_pct: 0.5, start_year: 2 };
    const outputs = runBalanceSheet(inputs);

    expect(outputs?.equity.toArray()).toEqual([3900, 6000, 7050, 8100]);
    expect(outputs?.balanceCheck.toArray()).toEqual([0, 0, 0, 0]);
  });

  it("rejects a funding gap at close", () => {
    const { transaction, debt, tax } = createSimpleInputs().modules;
    const result = new BalanceSheetModule().validate({
      transaction: { ...transaction, sponsor_equity: 1000, investor_equity: 0 },
      debt,
      tax,
    });

    expect(result.errors).toEqual([
      { path: "transaction", message: "funding gap at close: uses 10100 exceed sources 8000" },
    ]);
  });
});
