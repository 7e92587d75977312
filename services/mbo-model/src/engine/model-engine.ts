import { Timeline } from "../core/timeline.js";
import { errorMessage } from "../core/yearly.js";
import { loadConfig } from "../config.js";
import type { ModelConfig } from "../config.js";
import { createModelContext, requireOutputs } from "../runtime/context.js";
import { createLogger } from "../runtime/logger.js";
import type { Logger } from "../runtime/logger.js";
import type { ModelContext } from "../types/context.js";
import type { MboModelInputs, ScenarioName } from "../types/inputs.js";
import type { Module, ModuleName, ValidationError } from "../types/module.js";
import { validateRequest } from "../validate/validate.js";
import { validateStaffing } from "../modules/staffing.js";
import { RevenueModule } from "../modules/revenue/revenue-module.js";
import { CostModule } from "../modules/costs/cost-module.js";
import { CapexModule } from "../modules/capex/capex-module.js";
import { WorkingCapitalModule } from "../modules/working-capital/working-capital-module.js";
import { PnlModule } from "../modules/pnl/pnl-module.js";
import { CashflowModule } from "../modules/cashflow/cashflow-module.js";
import { DebtModule } from "../modules/debt/debt-module.js";
import { BalanceSheetModule } from "../modules/balance-sheet/balance-sheet-module.js";
import { ReturnsModule } from "../modules/returns/returns-module.js";
import { runIntegrityChecks } from "./integrity.js";
import type { IntegrityCheck } from "./integrity.js";
import { assembleResults } from "./results.js";
import type { ModelResults, SolverTrace } from "./results.js";

export interface MboModelResult {
  success: boolean;
  context?: ModelContext;
  results?: ModelResults;
  checks?: IntegrityCheck[];
  errors?: string[];
  warnings: string[];
}

export interface ModelValidation {
  valid: boolean;
  errors: ValidationError[];
}

export interface MboModelEngineOptions {
  config?: Partial<ModelConfig>;
  logger?: Logger;
}

export interface RunOptions {
  // Overrides revenue.selected_scenario
  scenario?: ScenarioName;
}

export class MboModelEngine {
  readonly config: ModelConfig;
  private readonly logger: Logger;
  // Run once, before the financing loop
  private readonly operatingModules: Module<unknown>[];
  // Re-run until interest expense settles
  private readonly financingModules: Module<unknown>[];
  // Run once on the converged state
  private readonly closingModules: Module<unknown>[];

  constructor(options: MboModelEngineOptions = {}) {
    this.config = { ...loadConfig(), ...options.config };
    this.logger = options.logger ?? createLogger("mbo-engine", this.config.logLevel);

    this.operatingModules = [
      new RevenueModule(),
      new CostModule(),
      new CapexModule(),
      new WorkingCapitalModule(),
    ];
    this.financingModules = [new PnlModule(), new CashflowModule(), new DebtModule()];
    this.closingModules = [new BalanceSheetModule(), new ReturnsModule()];
  }

  get modules(): Module<unknown>[] {
    return [...this.operatingModules, ...this.financingModules, ...this.closingModules];
  }

  /**
   * Semantic validation of every module block, after the request has passed the JSON contract
   */
  validateAll(inputs: MboModelInputs): ModelValidation {
    const allErrors: ValidationError[] = [];
    const horizon = inputs.deal.horizon_years;

    try {
      new Timeline({ closeDate: inputs.deal.close_date, horizonYears: horizon });
    } catch (e) {
      allErrors.push({ path: "deal", message: errorMessage(e) });
      return { valid: false, errors: allErrors };
    }

    allErrors.push(...validateStaffing(inputs.modules.staffing, horizon));

    const solver = inputs.modules.solver;
    if (solver?.tolerance !== undefined && solver.tolerance <= 0) {
      allErrors.push({ path: "solver.tolerance", message: "tolerance must be positive" });
    }

    for (const module of this.modules) {
      const moduleInputs = this.getModuleInputs(inputs, module.name);
      const validation = module.validate(moduleInputs, horizon);
      if (!validation.valid) {
        allErrors.push(...validation.errors);
      }
    }

    return {
      valid: allErrors.length === 0,
      errors: allErrors,
    };
  }

  /**
   * Run the full model: validate, project operations, resolve the interest circularity,
   * close the balance sheet and compute equity returns
   */
  async run(request: unknown, options: RunOptions = {}): Promise<MboModelResult> {
    const contract = validateRequest(request, this.config.contractsDir);
    if (!contract.valid) {
      this.logger.warn("Request rejected by contract", { errors: contract.errors.length });
      return { success: false, errors: contract.errors, warnings: [] };
    }
    const inputs = contract.inputs;

    const validation = this.validateAll(inputs);
    if (!validation.valid) {
      this.logger.warn("Request failed validation", { errors: validation.errors.length });
      return {
        success: false,
        errors: validation.errors.map((e) => `${e.path}: ${e.message}`),
        warnings: [],
      };
    }

    const scenario = options.scenario ?? inputs.modules.revenue.selected_scenario ?? "base";
    if (!inputs.modules.revenue.scenarios[scenario]) {
      return {
        success: false,
        errors: [`revenue.scenarios.${scenario}: scenario is not defined`],
        warnings: [],
      };
    }

    const timeline = new Timeline({
      closeDate: inputs.deal.close_date,
      horizonYears: inputs.deal.horizon_years,
    });
    const context = createModelContext(timeline, inputs);
    context.scenario = scenario;

    this.logger.info("Model run started", {
      company: inputs.deal.company_name,
      scenario,
      horizonYears: timeline.horizonYears,
    });

    for (const module of this.operatingModules) {
      const failure = this.runModule(module, context);
      if (failure) {
        return failure;
      }
    }

    const solverResult = this.solveFinancing(context);
    if ("success" in solverResult) {
      return solverResult;
    }
    const solver = solverResult;

    for (const module of this.closingModules) {
      const failure = this.runModule(module, context);
      if (failure) {
        return failure;
      }
    }

    const checks = runIntegrityChecks(context, this.config.balanceTolerance);
    const failed = checks.filter((check) => !check.passed);
    if (failed.length > 0) {
      this.logger.error("Integrity checks failed", { checks: failed.map((check) => check.name) });
      return {
        success: false,
        context,
        checks,
        errors: failed.map((check) => `Integrity check ${check.name} failed: ${check.message}`),
        warnings: context.warnings,
      };
    }

    this.calculateSummaryMetrics(context);

    this.logger.info("Model run complete", {
      scenario,
      iterations: solver.iterations,
      converged: solver.converged,
      warnings: context.warnings.length,
    });

    return {
      success: true,
      context,
      results: assembleResults(context, solver, checks),
      checks,
      warnings: context.warnings,
    };
  }

  /**
   * Fixed-point iteration on the interest series: P&L → cashflow → debt, feeding the debt
   * module's interest back into the P&L until the largest change is within tolerance
   */
  private solveFinancing(context: ModelContext): SolverTrace | MboModelResult {
    const solverInputs = context.inputs.modules.solver;
    const maxIterations = solverInputs?.max_iterations ?? this.config.solverMaxIterations;
    const tolerance = solverInputs?.tolerance ?? this.config.solverTolerance;
    const warningBaseline = context.warnings.length;
    const deltas: number[] = [];
    let converged = false;

    for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
      // Only the final pass's warnings are kept
      context.warnings.length = warningBaseline;

      for (const module of this.financingModules) {
        const failure = this.runModule(module, context);
        if (failure) {
          return failure;
        }
      }

      const interest = requireOutputs(context, "debt").totalInterest;
      const delta = interest.maxAbsDiff(context.interestEstimate);
      deltas.push(delta);
      this.logger.debug("Financing pass", { iteration, delta });

      if (delta <= tolerance) {
        converged = true;
        break;
      }
      context.interestEstimate = interest;
    }

    if (!converged) {
      const last = deltas[deltas.length - 1] ?? 0;
      context.warnings.push(
        `Interest circularity did not converge after ${maxIterations} iterations (last change ${last.toFixed(4)})`,
      );
      this.logger.warn("Financing loop did not converge", { maxIterations, lastDelta: last });
    }

    return { iterations: deltas.length, converged, tolerance, maxIterations, deltas };
  }

  private runModule(module: Module<unknown>, context: ModelContext): MboModelResult | null {
    try {
      const result = module.compute(context);
      if (!result.success) {
        this.logger.error("Module failed", { module: module.name, errors: result.errors });
        return {
          success: false,
          errors: result.errors ?? [`Module ${module.name} failed`],
          warnings: context.warnings,
        };
      }
      return null;
    } catch (e) {
      this.logger.error("Module threw", { module: module.name, error: errorMessage(e) });
      return {
        success: false,
        errors: [`Module ${module.name} threw: ${errorMessage(e)}`],
        warnings: context.warnings,
      };
    }
  }

  /**
   * Get module-specific inputs from the full inputs object
   */
  private getModuleInputs(inputs: MboModelInputs, moduleName: ModuleName): unknown {
    const modules = inputs.modules;
    switch (moduleName) {
      case "revenue":
        return modules.revenue;
      case "costs":
        return modules.costs;
      case "capex":
        return modules.capex;
      case "working_capital":
        return modules.working_capital;
      case "pnl":
      case "cashflow":
        return modules.tax;
      case "debt":
        return { debt: modules.debt, distributions: modules.distributions };
      case "balance_sheet":
        return { transaction: modules.transaction, debt: modules.debt, tax: modules.tax };
      case "returns":
        return modules.returns;
    }
  }

  /**
   * Calculate and populate summary metrics
   */
  private calculateSummaryMetrics(context: ModelContext): void {
    const metrics = context.metrics;
    const pnl = requireOutputs(context, "pnl");
    const costs = requireOutputs(context, "costs");
    const cashflow = requireOutputs(context, "cashflow");
    const debt = requireOutputs(context, "debt");
    const balanceSheet = requireOutputs(context, "balance_sheet");
    const returns = requireOutputs(context, "returns");

    metrics.finalYearRevenue = pnl.revenue.last();
    metrics.finalYearEbitda = pnl.ebitda.last();
    metrics.averageEbitdaMargin = costs.ebitdaMargin.sum() / costs.ebitdaMargin.length;
    metrics.cumulativeFreeCashflow = cashflow.freeCashflow.sum();
    metrics.minimumCash = balanceSheet.cash.min();
    metrics.minimumDscr = debt.minimumDscr;
    metrics.averageDscr = debt.averageDscr;
    const leverage = debt.leverage.filter((value): value is number => value !== null);
    metrics.peakLeverage = leverage.length > 0 ? Math.max(...leverage) : null;
    metrics.sponsorIrr = returns.sponsor.irr;
    metrics.investorIrr = returns.investor.irr;
    metrics.equityIrr = returns.total.irr;
    metrics.equityMoic = returns.total.moic;

    if (metrics.equityIrr !== null && metrics.equityIrr < 0) {
      context.warnings.push("Equity IRR is negative - the buyout destroys equity value");
    }
    if (metrics.equityMoic !== null && metrics.equityMoic < 1.0) {
      context.warnings.push("Equity multiple is below 1.0x - equity holders lose money");
    }
  }
}

/**
 * Create a summary report from model results
 */
export function createSummaryReport(result: MboModelResult): string {
  if (!result.success || !result.results) {
    return `MBO Model Failed:\n${result.errors?.join("\n") ?? "Unknown error"}`;
  }

  const r = result.results;
  const m = r.metrics;
  const close = r.balanceSheet[0];
  const pct = (value: number | null | undefined) =>
    value === null || value === undefined ? "n/a" : `${(value * 100).toFixed(2)}%`;
  const times = (value: number | null | undefined) =>
    value === null || value === undefined ? "n/a" : `${value.toFixed(2)}x`;
  const amount = (value: number | undefined) => `${r.currency} ${Math.round(value ?? 0).toLocaleString("en-US")}`;

  const lines: string[] = [
    "=".repeat(60),
    `MBO SUMMARY: ${r.companyName} (${r.scenario} case)`,
    "=".repeat(60),
    "",
    "OPERATIONS",
    `  Final-Year Revenue: ${amount(m.finalYearRevenue)}`,
    `  Final-Year EBITDA: ${amount(m.finalYearEbitda)}`,
    `  Avg EBITDA Margin: ${pct(m.averageEbitdaMargin)}`,
    `  Cumulative FCF: ${amount(m.cumulativeFreeCashflow)}`,
    "",
    "FINANCING",
    `  Debt at Close: ${amount(close ? close.seniorDebt + close.revolver : 0)}`,
    `  Min DSCR: ${times(m.minimumDscr)}`,
    `  Avg DSCR: ${times(m.averageDscr)}`,
    `  Peak Leverage: ${times(m.peakLeverage)}`,
    `  Min Cash: ${amount(m.minimumCash)}`,
    `  Solver: ${r.solver.iterations} iteration(s), ${r.solver.converged ? "converged" : "not converged"}`,
    "",
    "RETURNS",
    `  Exit: ${r.returns.exitLabel} at ${times(r.returns.exitMultiple)} ${r.returns.multipleBasis.toUpperCase()}`,
    `  Equity Value at Exit: ${amount(r.returns.equityValue)}`,
    `  Sponsor IRR: ${pct(m.sponsorIrr)}`,
    `  Investor IRR: ${pct(m.investorIrr)}`,
    `  Equity IRR: ${pct(m.equityIrr)}`,
    `  Equity Multiple: ${times(m.equityMoic)}`,
  ];

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push("WARNINGS");
    for (const warning of result.warnings) {
      lines.push(`  ! ${warning}`);
    }
  }

  lines.push("");
  lines.push("=".repeat(60));

  return lines.join("\n");
}
