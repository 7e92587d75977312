import type { Series } from "../../core/series.js";
import { checkYearly, isRecord, resolveYearly } from "../../core/yearly.js";
import { requireOutputs } from "../../runtime/context.js";
import type { ModelContext } from "../../types/context.js";
import type { WorkingCapitalInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export const DAYS_PER_YEAR = 365;

export interface WorkingCapitalModuleOutputs {
  receivables: Series;
  payables: Series;
  openingNetWorkingCapital: number;
  netWorkingCapital: Series;
  // Positive values absorb cash
  changeInNetWorkingCapital: Series;
}

type WorkingCapitalModuleResult = ModuleResult<WorkingCapitalModuleOutputs>;

function assertWorkingCapitalInput(inputs: unknown): asserts inputs is WorkingCapitalInput | undefined {
  if (inputs === undefined) return;
  if (!isRecord(inputs)) {
    throw new TypeError("working_capital must be an object");
  }
}

export class WorkingCapitalModule implements Module<WorkingCapitalModuleOutputs> {
  readonly name = "working_capital";
  readonly version = "0.1.0";
  readonly dependencies = ["revenue", "costs"] as const;

  validate(inputs: unknown, horizonYears: number): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertWorkingCapitalInput(inputs);
    } catch (e) {
      errors.push({ path: "working_capital", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    if (inputs) {
      if (inputs.method !== undefined && inputs.method !== "pct_of_revenue" && inputs.method !== "days") {
        errors.push({ path: "working_capital.method", message: "method must be pct_of_revenue or days" });
      }
      errors.push(
        ...checkYearly(inputs.nwc_pct_revenue, "working_capital.nwc_pct_revenue", horizonYears, { min: -1, max: 1 }),
        ...checkYearly(inputs.receivable_days, "working_capital.receivable_days", horizonYears, { min: 0, max: 365 }),
        ...checkYearly(inputs.payable_days, "working_capital.payable_days", horizonYears, { min: 0, max: 365 }),
      );
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): WorkingCapitalModuleResult {
    const horizon = context.timeline.horizonYears;
    const inputs: WorkingCapitalInput = context.inputs.modules.working_capital ?? {};
    const revenue = requireOutputs(context, "revenue").totalRevenue;
    const costs = requireOutputs(context, "costs");
    const openingNetWorkingCapital = context.inputs.modules.transaction.opening_net_working_capital ?? 0;

    let receivables: Series;
    let payables: Series;
    if (inputs.method === "days") {
      receivables = revenue.multiply(resolveYearly(inputs.receivable_days, horizon)).divide(DAYS_PER_YEAR);
      // Personnel is paid in-period; only third-party spend sits in payables
      payables = costs.overheadCosts
        .add(costs.variableCosts)
        .multiply(resolveYearly(inputs.payable_days, horizon))
        .divide(DAYS_PER_YEAR);
    } else {
      receivables = revenue.multiply(resolveYearly(inputs.nwc_pct_revenue, horizon));
      payables = receivables.multiply(0);
    }

    const netWorkingCapital = receivables.subtract(payables);
    const changeInNetWorkingCapital = netWorkingCapital.change(openingNetWorkingCapital);

    const outputs: WorkingCapitalModuleOutputs = {
      receivables,
      payables,
      openingNetWorkingCapital,
      netWorkingCapital,
      changeInNetWorkingCapital,
    };

    context.outputs.working_capital = outputs;
    return { success: true, outputs };
  }
}
