import type { Series } from "../../core/series.js";
import { isRecord } from "../../core/yearly.js";
import { requireOutputs } from "../../runtime/context.js";
import type { ModelContext } from "../../types/context.js";
import type { TaxInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export const DEFAULT_TAX_RATE = 0.3;

export interface PnlModuleOutputs {
  revenue: Series;
  personnelCosts: Series;
  overheadCosts: Series;
  variableCosts: Series;
  ebitda: Series;
  depreciation: Series;
  ebit: Series;
  interestExpense: Series;
  ebt: Series;
  taxes: Series;
  netIncome: Series;
}

type PnlModuleResult = ModuleResult<PnlModuleOutputs>;

function assertTaxInput(inputs: unknown): asserts inputs is TaxInput | undefined {
  if (inputs === undefined) return;
  if (!isRecord(inputs) || typeof inputs.tax_rate_pct !== "number") {
    throw new TypeError("tax.tax_rate_pct is required when tax is provided");
  }
}

export class PnlModule implements Module<PnlModuleOutputs> {
  readonly name = "pnl";
  readonly version = "0.1.0";
  readonly dependencies = ["revenue", "costs", "capex"] as const;

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertTaxInput(inputs);
    } catch (e) {
      errors.push({ path: "tax", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    if (inputs && (inputs.tax_rate_pct < 0 || inputs.tax_rate_pct >= 1)) {
      errors.push({ path: "tax.tax_rate_pct", message: "tax_rate_pct must be in [0, 1)" });
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): PnlModuleResult {
    const revenue = requireOutputs(context, "revenue").totalRevenue;
    const costs = requireOutputs(context, "costs");
    const depreciation = requireOutputs(context, "capex").depreciation;
    const taxRate = context.inputs.modules.tax?.tax_rate_pct ?? DEFAULT_TAX_RATE;

    const ebit = costs.ebitda.subtract(depreciation);
    const interestExpense = context.interestEstimate;
    const ebt = ebit.subtract(interestExpense);
    // Losses are not carried forward
    const taxes = ebt.maximum(0).multiply(taxRate);
    const netIncome = ebt.subtract(taxes);

    const outputs: PnlModuleOutputs = {
      revenue,
      personnelCosts: costs.personnelCosts,
      overheadCosts: costs.overheadCosts,
      variableCosts: costs.variableCosts,
      ebitda: costs.ebitda,
      depreciation,
      ebit,
      interestExpense,
      ebt,
      taxes,
      netIncome,
    };

    context.outputs.pnl = outputs;
    return { success: true, outputs };
  }
}
