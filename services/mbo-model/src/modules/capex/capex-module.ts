import { Series } from "../../core/series.js";
import { checkYearly, isRecord, resolveYearly } from "../../core/yearly.js";
import { requireOutputs } from "../../runtime/context.js";
import type { ModelContext } from "../../types/context.js";
import type { CapexInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export const DEFAULT_CAPEX_PCT_REVENUE = 0.01;
export const DEFAULT_DEPRECIATION_RATE = 0.2;

export interface CapexModuleOutputs {
  capex: Series;
  maintenanceCapex: Series;
  depreciation: Series;
  openingFixedAssets: number;
  fixedAssets: Series;
}

type CapexModuleResult = ModuleResult<CapexModuleOutputs>;

function assertCapexInput(inputs: unknown): asserts inputs is CapexInput | undefined {
  if (inputs === undefined) return;
  if (!isRecord(inputs)) {
    throw new TypeError("capex must be an object");
  }
}

export class CapexModule implements Module<CapexModuleOutputs> {
  readonly name = "capex";
  readonly version = "0.1.0";
  readonly dependencies = ["revenue"] as const;

  validate(inputs: unknown, horizonYears: number): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertCapexInput(inputs);
    } catch (e) {
      errors.push({ path: "capex", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    if (inputs) {
      if (inputs.method === "fixed" && inputs.capex_amount === undefined) {
        errors.push({ path: "capex.capex_amount", message: "capex_amount is required for the fixed method" });
      }
      if (inputs.depreciation_method === "fixed" && inputs.depreciation_amount === undefined) {
        errors.push({
          path: "capex.depreciation_amount",
          message: "depreciation_amount is required for the fixed depreciation method",
        });
      }
      if (
        inputs.depreciation_rate_pct !== undefined &&
        (inputs.depreciation_rate_pct < 0 || inputs.depreciation_rate_pct > 1)
      ) {
        errors.push({ path: "capex.depreciation_rate_pct", message: "depreciation_rate_pct must be between 0 and 1" });
      }
      errors.push(
        ...checkYearly(inputs.capex_pct_revenue, "capex.capex_pct_revenue", horizonYears, { min: 0, max: 1 }),
        ...checkYearly(inputs.capex_amount, "capex.capex_amount", horizonYears, { min: 0 }),
        ...checkYearly(inputs.maintenance_capex_pct_revenue, "capex.maintenance_capex_pct_revenue", horizonYears, {
          min: 0,
          max: 1,
        }),
        ...checkYearly(inputs.depreciation_amount, "capex.depreciation_amount", horizonYears, { min: 0 }),
      );
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): CapexModuleResult {
    const horizon = context.timeline.horizonYears;
    const inputs: CapexInput = context.inputs.modules.capex ?? {};
    const revenue = requireOutputs(context, "revenue").totalRevenue;

    const capex =
      inputs.method === "fixed"
        ? resolveYearly(inputs.capex_amount, horizon)
        : revenue.multiply(resolveYearly(inputs.capex_pct_revenue, horizon, DEFAULT_CAPEX_PCT_REVENUE));
    const maintenanceCapex =
      inputs.maintenance_capex_pct_revenue === undefined
        ? capex
        : revenue.multiply(resolveYearly(inputs.maintenance_capex_pct_revenue, horizon));

    const openingFixedAssets = context.inputs.modules.transaction.opening_fixed_assets ?? 0;
    const rate = inputs.depreciation_rate_pct ?? DEFAULT_DEPRECIATION_RATE;
    const fixedAmounts = resolveYearly(inputs.depreciation_amount, horizon);

    const depreciation: number[] = [];
    const fixedAssets: number[] = [];
    let priorFixedAssets = openingFixedAssets;

    for (let i = 0; i < horizon; i += 1) {
      const depreciableBase = priorFixedAssets + capex.get(i);
      const charge =
        inputs.depreciation_method === "fixed" ? fixedAmounts.get(i) : depreciableBase * rate;
      // Never depreciate below zero book value
      const capped = Math.min(charge, Math.max(depreciableBase, 0));
      depreciation.push(capped);
      priorFixedAssets = depreciableBase - capped;
      fixedAssets.push(priorFixedAssets);
    }

    const outputs: CapexModuleOutputs = {
      capex,
      maintenanceCapex,
      depreciation: Series.fromArray(depreciation),
      openingFixedAssets,
      fixedAssets: Series.fromArray(fixedAssets),
    };

    context.outputs.capex = outputs;
    return { success: true, outputs };
  }
}
