import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { Timeline } from "../src/core/timeline.js";
import { createModelContext } from "../src/runtime/context.js";
import type { ModelContext } from "../src/types/context.js";
import type { MboModelInputs } from "../src/types/inputs.js";
import type { Module } from "../src/types/module.js";
import { RevenueModule } from "../src/modules/revenue/revenue-module.js";
import { CostModule } from "../src/modules/costs/cost-module.js";
import { CapexModule } from "../src/modules/capex/capex-module.js";
import { WorkingCapitalModule } from "../src/modules/working-capital/working-capital-module.js";
import { PnlModule } from "../src/modules/pnl/pnl-module.js";
import { CashflowModule } from "../src/modules/cashflow/cashflow-module.js";
import { DebtModule } from "../src/modules/debt/debt-module.js";
import { BalanceSheetModule } from "../src/modules/balance-sheet/balance-sheet-module.js";
import { ReturnsModule } from "../src/modules/returns/returns-module.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, "../../../testcases/mbo_model_v1/fixtures");

export function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(join(fixturesDir, name), "utf8"));
}

/**
 * Three-year deal with round numbers:
 * revenue 10,000, EBITDA 3,000, flat fixed assets and working capital,
 * senior 7,000 at 10% repaid 1,000 a year on opening balances.
 */
export function createSimpleInputs(): MboModelInputs {
  return {
    contract: { contract_version: "MBO_MODEL_V1", engine_version: "0.1.0" },
    deal: {
      company_name: "Test Consulting",
      currency: "EUR",
      close_date: "2026-01-01",
      horizon_years: 3,
    },
    modules: {
      transaction: {
        purchase_price: 10000,
        transaction_cost_pct: 0.01,
        sponsor_equity: 3000,
        investor_equity: 1000,
        opening_net_working_capital: 1000,
        opening_fixed_assets: 2000,
      },
      staffing: { consultant_fte: 10 },
      revenue: {
        scenarios: {
          base: { workdays_per_year: 200, utilization_rate: 0.5, group_day_rate: 10 },
        },
      },
      costs: {
        consultant_loaded_cost: 500,
        management_cost: 1000,
        fixed_overhead: { office_rent: 1000 },
      },
      capex: {
        method: "fixed",
        capex_amount: 200,
        depreciation_method: "fixed",
        depreciation_amount: 200,
      },
      working_capital: { method: "pct_of_revenue", nwc_pct_revenue: 0.1 },
      tax: { tax_rate_pct: 0.25, payment_lag_years: 0 },
      debt: {
        senior: {
          amount: 7000,
          interest_rate_pct: 0.1,
          amortization_type: "linear",
          amortization_years: 7,
        },
        interest_basis: "opening",
      },
      returns: { exit_year: 3, exit_multiple: 5 },
    },
  };
}

export function createTestContext(inputs: MboModelInputs): ModelContext {
  const timeline = new Timeline({
    closeDate: inputs.deal.close_date,
    horizonYears: inputs.deal.horizon_years,
  });
  return createModelContext(timeline, inputs);
}

export const operatingModules = (): Module<unknown>[] => [
  new RevenueModule(),
  new CostModule(),
  new CapexModule(),
  new WorkingCapitalModule(),
];

export const financingModules = (): Module<unknown>[] => [new PnlModule(), new CashflowModule(), new DebtModule()];

export const closingModules = (): Module<unknown>[] => [new BalanceSheetModule(), new ReturnsModule()];

export function runModules(context: ModelContext, modules: Module<unknown>[]): void {
  for (const module of modules) {
    const result = module.compute(context);
    if (!result.success) {
      throw new Error(`${module.name} failed: ${(result.errors ?? []).join(", ")}`);
    }
  }
}
