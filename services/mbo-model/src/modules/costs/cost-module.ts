import { Series } from "../../core/series.js";
import { checkYearly, isRecord, resolveYearly } from "../../core/yearly.js";
import { requireOutputs } from "../../runtime/context.js";
import { requireStaffing } from "../staffing.js";
import type { ModelContext } from "../../types/context.js";
import type { CostInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export interface CostLine {
  name: string;
  values: Series;
}

export interface CostModuleOutputs {
  inflationFactor: Series;
  consultantCost: Series;
  backofficeCost: Series;
  managementCost: Series;
  personnelCosts: Series;
  overheadLines: CostLine[];
  overheadCosts: Series;
  variableLines: CostLine[];
  variableCosts: Series;
  totalOperatingCosts: Series;
  ebitda: Series;
  ebitdaMargin: Series;
}

type CostModuleResult = ModuleResult<CostModuleOutputs>;

function assertCostInput(inputs: unknown): asserts inputs is CostInput {
  if (!isRecord(inputs)) {
    throw new TypeError("costs must be an object");
  }
  if (inputs.consultant_loaded_cost === undefined) {
    throw new TypeError("costs.consultant_loaded_cost is required");
  }
}

export class CostModule implements Module<CostModuleOutputs> {
  readonly name = "costs";
  readonly version = "0.1.0";
  readonly dependencies = ["revenue"] as const;

  validate(inputs: unknown, horizonYears: number): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertCostInput(inputs);
    } catch (e) {
      errors.push({ path: "costs", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    errors.push(
      ...checkYearly(inputs.consultant_loaded_cost, "costs.consultant_loaded_cost", horizonYears, { min: 0 }),
      ...checkYearly(inputs.backoffice_loaded_cost, "costs.backoffice_loaded_cost", horizonYears, { min: 0 }),
      ...checkYearly(inputs.management_cost, "costs.management_cost", horizonYears, { min: 0 }),
    );

    for (const [name, value] of Object.entries(inputs.fixed_overhead ?? {})) {
      errors.push(...checkYearly(value, `costs.fixed_overhead.${name}`, horizonYears, { min: 0 }));
    }

    (inputs.variable_costs ?? []).forEach((line, i) => {
      const path = `costs.variable_costs[${i}]`;
      if (line.mode !== "pct_of_revenue" && line.mode !== "fixed") {
        errors.push({ path: `${path}.mode`, message: "mode must be pct_of_revenue or fixed" });
      }
      const range = line.mode === "pct_of_revenue" ? { min: 0, max: 1 } : { min: 0 };
      errors.push(...checkYearly(line.value, `${path}.value`, horizonYears, range));
    });

    const inflation = inputs.inflation;
    if (inflation && (inflation.rate_pct <= -1 || inflation.rate_pct > 1)) {
      errors.push({ path: "costs.inflation.rate_pct", message: "rate_pct must be between -1 and 1" });
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): CostModuleResult {
    const horizon = context.timeline.horizonYears;
    const inputs = context.inputs.modules.costs;
    const revenue = requireOutputs(context, "revenue").totalRevenue;
    const { consultantFte, backofficeFte } = requireStaffing(context);

    const inflation = inputs.inflation;
    const inflationFactor =
      inflation && inflation.apply
        ? Series.fromGrowth(1, inflation.rate_pct, horizon)
        : Series.constant(1, horizon);
    const inflate = (value: Series) => value.multiply(inflationFactor);

    const consultantCost = inflate(consultantFte.multiply(resolveYearly(inputs.consultant_loaded_cost, horizon)));
    const backofficeCost = inflate(backofficeFte.multiply(resolveYearly(inputs.backoffice_loaded_cost, horizon)));
    const managementCost = inflate(resolveYearly(inputs.management_cost, horizon));
    const personnelCosts = consultantCost.add(backofficeCost).add(managementCost);

    const overheadLines: CostLine[] = Object.entries(inputs.fixed_overhead ?? {}).map(([name, value]) => ({
      name,
      values: inflate(resolveYearly(value, horizon)),
    }));
    const overheadCosts = sumLines(overheadLines, horizon);

    const variableLines: CostLine[] = (inputs.variable_costs ?? []).map((line) => {
      const value = resolveYearly(line.value, horizon);
      return {
        name: line.name,
        values: line.mode === "pct_of_revenue" ? revenue.multiply(value) : inflate(value),
      };
    });
    const variableCosts = sumLines(variableLines, horizon);

    const totalOperatingCosts = personnelCosts.add(overheadCosts).add(variableCosts);
    const ebitda = revenue.subtract(totalOperatingCosts);
    const ebitdaMargin = ebitda.divide(revenue);

    if (ebitda.min() < 0) {
      context.warnings.push("EBITDA is negative in at least one projection year");
    }

    const outputs: CostModuleOutputs = {
      inflationFactor,
      consultantCost,
      backofficeCost,
      managementCost,
      personnelCosts,
      overheadLines,
      overheadCosts,
      variableLines,
      variableCosts,
      totalOperatingCosts,
      ebitda,
      ebitdaMargin,
    };

    context.outputs.costs = outputs;
    return { success: true, outputs };
  }
}

function sumLines(lines: CostLine[], horizon: number): Series {
  return lines.reduce((total, line) => total.add(line.values), Series.zeros(horizon));
}
