export { RevenueModule } from "./revenue/revenue-module.js";
export type { RevenueModuleOutputs } from "./revenue/revenue-module.js";

export { CostModule } from "./costs/cost-module.js";
export type { CostModuleOutputs, CostLine } from "./costs/cost-module.js";

export { CapexModule } from "./capex/capex-module.js";
export type { CapexModuleOutputs } from "./capex/capex-module.js";

export { WorkingCapitalModule } from "./working-capital/working-capital-module.js";
export type { WorkingCapitalModuleOutputs } from "./working-capital/working-capital-module.js";

export { PnlModule } from "./pnl/pnl-module.js";
export type { PnlModuleOutputs } from "./pnl/pnl-module.js";

export { CashflowModule } from "./cashflow/cashflow-module.js";
export type { CashflowModuleOutputs } from "./cashflow/cashflow-module.js";

export { DebtModule, scheduledPrincipal } from "./debt/debt-module.js";
export type { DebtModuleInputs, DebtModuleOutputs } from "./debt/debt-module.js";

export { BalanceSheetModule } from "./balance-sheet/balance-sheet-module.js";
export type { BalanceSheetModuleInputs, BalanceSheetModuleOutputs } from "./balance-sheet/balance-sheet-module.js";

export { ReturnsModule } from "./returns/returns-module.js";
export type { EquityHolder, EquityReturn, ReturnsModuleOutputs } from "./returns/returns-module.js";

export { computeClosingFunds } from "./transaction.js";
export type { ClosingFunds } from "./transaction.js";
