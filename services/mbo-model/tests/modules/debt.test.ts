import { describe, expect, it } from "vitest";

import { DebtModule, scheduledPrincipal } from "../../src/modules/debt/debt-module.js";
import type { MboModelInputs } from "../../src/types/inputs.js";
import type { ModelContext } from "../../src/types/context.js";
import { CashflowModule } from "../../src/modules/cashflow/cashflow-module.js";
import { PnlModule } from "../../src/modules/pnl/pnl-module.js";
import { createSimpleInputs, createTestContext, operatingModules, runModules } from "../helpers.js";

// Single pass with a zero interest estimate: net income and free cashflow are 2,100 a year
function runDebt(inputs: MboModelInputs): ModelContext {
  const context = createTestContext(inputs);
  runModules(context, [...operatingModules(), new PnlModule(), new CashflowModule(), new DebtModule()]);
  return context;
}

describe("scheduledPrincipal", () => {
  it("spreads linear repayments evenly after the grace period", () => {
    expect(
      scheduledPrincipal({ amount: 1000, interest_rate_pct: 0.1, amortization_years: 2, grace_years: 1 }, 3).toArray(),
    ).toEqual([0, 500, 500]);
  });

  it("repays a bullet at maturity, or not at all inside the horizon", () => {
    const bullet = { amount: 1000, interest_rate_pct: 0.1, amortization_type: "bullet" as const };

    expect(scheduledPrincipal({ ...bullet, amortization_years: 2 }, 3).toArray()).toEqual([0, 1000, 0]);
    expect(scheduledPrincipal({ ...bullet, amortization_years: 2, grace_years: 1 }, 3).toArray()).toEqual([0, 0, 1000]);
    expect(scheduledPrincipal({ ...bullet, amortization_years: 5 }, 3).toArray()).toEqual([0, 0, 0]);
  });

  it("derives annuity principal from a level payment", () => {
    const principal = scheduledPrincipal(
      { amount: 1000, interest_rate_pct: 0.1, amortization_type: "annuity", amortization_years: 2 },
      3,
    );

    expect(principal.get(0)).toBeCloseTo(476.1904761904762, 9);
    expect(principal.get(1)).toBeCloseTo(523.8095238095238, 9);
    expect(principal.get(2)).toBe(0);
    expect(principal.sum()).toBeCloseTo(1000, 9);
  });
});

describe("DebtModule", () => {
  it("amortizes the senior loan and accumulates cash", () => {
    const debt = runDebt(createSimpleInputs()).outputs.debt;

    expect(debt?.scheduledRepayment.toArray()).toEqual([1000, 1000, 1000]);
    expect(debt?.seniorClosing.toArray()).toEqual([6000, 5000, 4000]);
    expect(debt?.cashOpening.toArray()).toEqual([900, 2000, 3100]);
    expect(debt?.cashClosing.toArray()).toEqual([2000, 3100, 4200]);
    expect(debt?.financingCashflow.toArray()).toEqual([-1000, -1000, -1000]);
    expect(debt?.seniorInterest.get(0)).toBeCloseTo(700, 9);
    expect(debt?.seniorInterest.get(1)).toBeCloseTo(600, 9);
    expect(debt?.seniorInterest.get(2)).toBeCloseTo(500, 9);
  });

  it("sweeps a share of excess cash into the senior loan", () => {
    const inputs = createSimpleInputs();
    inputs.modules.debt = { ...inputs.modules.debt, cash_sweep: { sweep_pct: 0.5 } };
    const debt = runDebt(inputs).outputs.debt;

    expect(debt?.cashSweep.toArray()).toEqual([1000, 1050, 1075]);
    expect(debt?.seniorClosing.toArray()).toEqual([5000, 2950, 875]);
    expect(debt?.cashClosing.toArray()).toEqual([1000, 1050, 1075]);
    expect(debt?.seniorInterest.get(2)).toBeCloseTo(295, 9);
  });

  it("charges interest on the average balance", () => {
    const inputs = createSimpleInputs();
    inputs.modules.debt = { ...inputs.modules.debt, interest_basis: "average", cash_sweep: { sweep_pct: 0.5 } };
    const debt = runDebt(inputs).outputs.debt;

    expect(debt?.interestBasis).toBe("average");
    expect(debt?.seniorInterest.get(0)).toBeCloseTo(600, 9);
    expect(debt?.seniorInterest.get(1)).toBeCloseTo(397.5, 9);
  });

  it("applies special repayments on top of the schedule", () => {
    const inputs = createSimpleInputs();
    const senior = inputs.modules.debt?.senior;
    if (!senior) throw new Error("missing senior loan");
    senior.special_repayments = [{ year: 2, amount: 500 }];
    const debt = runDebt(inputs).outputs.debt;

    expect(debt?.specialRepayment.toArray()).toEqual([0, 500, 0]);
    expect(debt?.seniorClosing.toArray()).toEqual([6000, 4500, 3500]);
    expect(debt?.cashClosing.get(1)).toBe(2600);
  });

  it("draws the revolver to hold minimum cash and repays it from excess", () => {
    const inputs = createSimpleInputs();
    inputs.modules.capex = {
      method: "fixed",
      capex_amount: [3000, 200, 200],
      depreciation_method: "fixed",
      depreciation_amount: 200,
    };
    inputs.modules.debt = {
      ...inputs.modules.debt,
      revolver: { limit: 1000, interest_rate_pct: 0.1, commitment_fee_pct: 0.01 },
      minimum_cash: 500,
    };
    const context = runDebt(inputs);
    const debt = context.outputs.debt;

    expect(debt?.revolverDraw.toArray()).toEqual([1000, 0, 0]);
    expect(debt?.revolverRepayment.toArray()).toEqual([0, 800, 200]);
    expect(debt?.revolverClosing.toArray()).toEqual([1000, 200, 0]);
    expect(debt?.cashClosing.toArray()).toEqual([200, 500, 1400]);
    expect(debt?.fundingShortfall.toArray()).toEqual([300, 0, 0]);
    expect(debt?.revolverInterest.get(1)).toBeCloseTo(100, 9);
    expect(debt?.revolverInterest.get(2)).toBeCloseTo(20, 9);
    expect(debt?.commitmentFee.get(0)).toBeCloseTo(10, 9);
    expect(debt?.commitmentFee.get(2)).toBeCloseTo(8, 9);
    expect(context.warnings).toContain("Cash falls below the minimum balance in FY2026: revolver capacity short by 300");
  });

  it("pays dividends from the start year out of excess cash", () => {
    const inputs = createSimpleInputs();
    inputs.modules.distributions = { payout_ratio_pct: 0.5, start_year: 2 };
    const debt = runDebt(inputs).outputs.debt;

    expect(debt?.dividends.toArray()).toEqual([0, 1050, 1050]);
    expect(debt?.cashClosing.toArray()).toEqual([2000, 2050, 2100]);
  });

  it("computes coverage and leverage and flags covenant breaches", () => {
    const inputs = createSimpleInputs();
    inputs.modules.debt = { ...inputs.modules.debt, covenants: { min_dscr: 1.5, max_leverage: 1.5 } };
    const context = runDebt(inputs);
    const debt = context.outputs.debt;

    expect(debt?.cfads.toArray()).toEqual([2100, 2100, 2100]);
    expect(debt?.dscr[0]).toBeCloseTo(2100 / 1700, 9);
    expect(debt?.leverage[0]).toBeCloseTo(2, 9);
    expect(debt?.minimumDscr).toBeCloseTo(2100 / 1700, 9);
    expect(debt?.covenantBreach).toEqual([true, true, true]);
    expect(context.warnings).toContain("DSCR covenant breached in FY2026 (1.24x vs min 1.50x)");
    expect(context.warnings).toContain("Leverage covenant breached in FY2026 (2.00x vs max 1.50x)");
  });

  it("treats leverage as undefined and breached when EBITDA is zero", () => {
    const inputs = createSimpleInputs();
    inputs.modules.costs = { ...inputs.modules.costs, management_cost: 4000 };
    inputs.modules.debt = { ...inputs.modules.debt, covenants: { max_leverage: 3 } };
    const context = runDebt(inputs);
    const debt = context.outputs.debt;

    expect(context.outputs.pnl?.ebitda.toArray()).toEqual([0, 0, 0]);
    expect(debt?.seniorClosing.toArray()).toEqual([6000, 5000, 4000]);
    expect(debt?.leverage).toEqual([null, null, null]);
    expect(debt?.covenantBreach).toEqual([true, true, true]);
    expect(context.warnings).toContain("Leverage covenant breached in FY2026 (n/a vs max 3.00x)");
  });

  it("caps special repayments and sweeps at the remaining senior balance", () => {
    const inputs = createSimpleInputs();
    const senior = inputs.modules.debt?.senior;
    if (!senior) throw new Error("missing senior loan");
    senior.special_repayments = [{ year: 1, amount: 99999 }];
    inputs.modules.debt = {
      ...inputs.modules.debt,
      senior,
      revolver: { limit: 5000, interest_rate_pct: 0.1 },
      cash_sweep: { sweep_pct: 1 },
    };
    const debt = runDebt(inputs).outputs.debt;

    expect(debt?.specialRepayment.toArray()).toEqual([6000, 0, 0]);
    expect(debt?.seniorClosing.toArray()).toEqual([0, 0, 0]);
    expect(debt?.cashSweep.toArray()).toEqual([0, 0, 0]);
    expect(debt?.revolverDraw.toArray()).toEqual([4000, 0, 0]);
    expect(debt?.revolverRepayment.toArray()).toEqual([0, 2100, 1900]);
    expect(debt?.cashClosing.toArray()).toEqual([0, 0, 200]);
  });

  it("pays no dividends in a year that draws the revolver", () => {
    const inputs = createSimpleInputs();
    inputs.modules.capex = {
      method: "fixed",
      capex_amount: [3000, 200, 200],
      depreciation_method: "fixed",
      depreciation_amount: 200,
    };
    inputs.modules.debt = {
      ...inputs.modules.debt,
      revolver: { limit: 1000, interest_rate_pct: 0.1 },
      minimum_cash: 500,
    };
    inputs.modules.distributions = { payout_ratio_pct: 1, start_year: 1 };
    const debt = runDebt(inputs).outputs.debt;

    expect(debt?.revolverDraw.toArray()).toEqual([1000, 0, 0]);
    expect(debt?.dividends.toArray()).toEqual([0, 0, 900]);
    expect(debt?.cashClosing.toArray()).toEqual([200, 500, 500]);
  });

  it("reports no coverage ratio without debt service", () => {
    const inputs = createSimpleInputs();
    inputs.modules.transaction.sponsor_equity = 9100;
    inputs.modules.debt = undefined;
    const debt = runDebt(inputs).outputs.debt;

    expect(debt?.dscr).toEqual([null, null, null]);
    expect(debt?.leverage).toEqual([0, 0, 0]);
    expect(debt?.minimumDscr).toBeNull();
    expect(debt?.cashClosing.toArray()).toEqual([2100, 4200, 6300]);
  });

  it("validates facility terms", () => {
    const result = new DebtModule().validate(
      {
        debt: {
          senior: { amount: 1000, interest_rate_pct: 0.1, special_repayments: [{ year: 4, amount: 100 }] },
          revolver: { limit: 100, interest_rate_pct: 0.1, opening_balance: 200 },
        },
        distributions: { payout_ratio_pct: 1.5 },
      },
      3,
    );

    expect(result.errors).toEqual([
      { path: "debt.senior.special_repayments[0].year", message: "year must be between 1 and 3" },
      { path: "debt.revolver.opening_balance", message: "opening_balance must be between 0 and limit" },
      { path: "distributions.payout_ratio_pct", message: "payout_ratio_pct must be between 0 and 1" },
    ]);
  });
});
