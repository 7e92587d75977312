import type { Series } from "../core/series.js";
import type { Timeline } from "../core/timeline.js";
import type { MboModelInputs, ScenarioName } from "./inputs.js";
import type { RevenueModuleOutputs } from "../modules/revenue/revenue-module.js";
import type { CostModuleOutputs } from "../modules/costs/cost-module.js";
import type { CapexModuleOutputs } from "../modules/capex/capex-module.js";
import type { WorkingCapitalModuleOutputs } from "../modules/working-capital/working-capital-module.js";
import type { PnlModuleOutputs } from "../modules/pnl/pnl-module.js";
import type { CashflowModuleOutputs } from "../modules/cashflow/cashflow-module.js";
import type { DebtModuleOutputs } from "../modules/debt/debt-module.js";
import type { BalanceSheetModuleOutputs } from "../modules/balance-sheet/balance-sheet-module.js";
import type { ReturnsModuleOutputs } from "../modules/returns/returns-module.js";

export interface ModelOutputs {
  revenue?: RevenueModuleOutputs;
  costs?: CostModuleOutputs;
  capex?: CapexModuleOutputs;
  working_capital?: WorkingCapitalModuleOutputs;
  pnl?: PnlModuleOutputs;
  cashflow?: CashflowModuleOutputs;
  debt?: DebtModuleOutputs;
  balance_sheet?: BalanceSheetModuleOutputs;
  returns?: ReturnsModuleOutputs;
}

export interface ModelContext {
  timeline: Timeline;
  inputs: MboModelInputs;
  scenario: ScenarioName;
  outputs: ModelOutputs;
  // Interest expense fed into the P&L; updated by the engine on every pass of the financing loop
  interestEstimate: Series;
  metrics: ModelMetrics;
  warnings: string[];
}

export interface ModelMetrics {
  finalYearRevenue?: number;
  finalYearEbitda?: number;
  averageEbitdaMargin?: number;
  cumulativeFreeCashflow?: number;
  minimumCash?: number;
  minimumDscr?: number | null;
  averageDscr?: number | null;
  peakLeverage?: number | null;
  sponsorIrr?: number | null;
  investorIrr?: number | null;
  equityIrr?: number | null;
  equityMoic?: number | null;
}
