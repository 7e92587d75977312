// Core primitives
export { Timeline } from "./core/timeline.js";
export type { TimelineConfig } from "./core/timeline.js";
export { Series } from "./core/series.js";
export { resolveYearly } from "./core/yearly.js";
export { pmt, irr, npv, moic } from "./core/math-utils.js";

// Configuration and runtime
export { loadConfig } from "./config.js";
export type { ModelConfig } from "./config.js";
export { createLogger } from "./runtime/logger.js";
export type { Logger, LogLevel } from "./runtime/logger.js";
export { validateRequest } from "./validate/validate.js";
export type { RequestValidation } from "./validate/validate.js";

// Types (all type-only exports)
export type {
  MboModelInputs,
  ContractInput,
  DealInput,
  ModulesInput,
  TransactionInput,
  StaffingInput,
  ScenarioName,
  RevenueDriversInput,
  RevenueInput,
  VariableCostInput,
  CostInput,
  CapexInput,
  WorkingCapitalInput,
  TaxInput,
  AmortizationType,
  SeniorLoanInput,
  RevolverInput,
  InterestBasis,
  DebtInput,
  DistributionInput,
  ReturnsInput,
  SolverInput,
  YearlyValue,
} from "./types/inputs.js";
export type { ModelContext, ModelMetrics, ModelOutputs } from "./types/context.js";
export type { Module, ModuleName, ModuleResult, ValidationResult, ValidationError } from "./types/module.js";

// Modules
export * from "./modules/index.js";

// Engine
export { MboModelEngine, createSummaryReport } from "./engine/model-engine.js";
export type { MboModelResult, ModelValidation, MboModelEngineOptions, RunOptions } from "./engine/model-engine.js";
export { ScenarioRunner } from "./engine/scenario-runner.js";
export type { ScenarioComparison, ScenarioSummary } from "./engine/scenario-runner.js";
export type {
  ModelResults,
  PnlRow,
  CashflowRow,
  DebtRow,
  BalanceSheetRow,
  SolverTrace,
} from "./engine/results.js";
export type { IntegrityCheck, IntegrityCheckName } from "./engine/integrity.js";

// Formatters
export {
  buildPnlTable,
  buildCashflowTable,
  buildDebtTable,
  buildBalanceSheetTable,
  buildEquityCashflowTable,
  buildStatementTables,
  formatStatementAsText,
  formatStatementAsJson,
  formatCurrency,
  formatPercent,
  formatMultiple,
} from "./formatters/statements.js";
export type { StatementRow, StatementTable, RowFormat } from "./formatters/statements.js";
