import type { Series } from "../../core/series.js";
import { checkYearly, isRecord, resolveYearly } from "../../core/yearly.js";
import { requireStaffing } from "../staffing.js";
import type { ModelContext } from "../../types/context.js";
import { SCENARIO_NAMES } from "../../types/inputs.js";
import type { RevenueDriversInput, RevenueInput, ScenarioName } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export interface RevenueModuleOutputs {
  scenario: ScenarioName;
  consultantFte: Series;
  capacityDays: Series;
  adjustedCapacityDays: Series;
  groupShare: Series;
  externalShare: Series;
  groupDayRate: Series;
  externalDayRate: Series;
  modeledGroupRevenue: Series;
  guaranteedGroupRevenue: Series;
  groupRevenue: Series;
  externalRevenue: Series;
  totalRevenue: Series;
}

type RevenueModuleResult = ModuleResult<RevenueModuleOutputs>;

function assertRevenueInput(inputs: unknown): asserts inputs is RevenueInput {
  if (!isRecord(inputs)) {
    throw new TypeError("revenue must be an object");
  }
  if (!isRecord(inputs.scenarios) || !isRecord(inputs.scenarios.base)) {
    throw new TypeError("revenue.scenarios.base is required");
  }
}

function validateDrivers(
  drivers: RevenueDriversInput,
  path: string,
  horizonYears: number,
): ValidationError[] {
  return [
    ...checkYearly(drivers.workdays_per_year, `${path}.workdays_per_year`, horizonYears, { min: 0, max: 366 }),
    ...checkYearly(drivers.utilization_rate, `${path}.utilization_rate`, horizonYears, { min: 0, max: 1 }),
    ...checkYearly(drivers.group_day_rate, `${path}.group_day_rate`, horizonYears, { min: 0 }),
    ...checkYearly(drivers.external_day_rate, `${path}.external_day_rate`, horizonYears, { min: 0 }),
    ...checkYearly(drivers.day_rate_growth_pct, `${path}.day_rate_growth_pct`, horizonYears, { min: -0.99 }),
    ...checkYearly(drivers.revenue_growth_pct, `${path}.revenue_growth_pct`, horizonYears, { min: -1 }),
    ...checkYearly(drivers.group_capacity_share_pct, `${path}.group_capacity_share_pct`, horizonYears, { min: 0 }),
    ...checkYearly(drivers.external_capacity_share_pct, `${path}.external_capacity_share_pct`, horizonYears, {
      min: 0,
    }),
    ...checkYearly(drivers.guarantee_pct, `${path}.guarantee_pct`, horizonYears, { min: 0 }),
    ...(drivers.reference_revenue !== undefined && drivers.reference_revenue < 0
      ? [{ path: `${path}.reference_revenue`, message: "reference_revenue must be non-negative" }]
      : []),
  ];
}

export class RevenueModule implements Module<RevenueModuleOutputs> {
  readonly name = "revenue";
  readonly version = "0.1.0";
  readonly dependencies = [] as const;

  validate(inputs: unknown, horizonYears: number): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertRevenueInput(inputs);
    } catch (e) {
      errors.push({ path: "revenue", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    for (const name of SCENARIO_NAMES) {
      const drivers = inputs.scenarios[name];
      if (drivers) {
        errors.push(...validateDrivers(drivers, `revenue.scenarios.${name}`, horizonYears));
      }
    }

    const selected = inputs.selected_scenario ?? "base";
    if (!inputs.scenarios[selected]) {
      errors.push({
        path: "revenue.selected_scenario",
        message: `scenario "${selected}" is not defined`,
      });
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): RevenueModuleResult {
    const horizon = context.timeline.horizonYears;
    const drivers = context.inputs.modules.revenue.scenarios[context.scenario];
    if (!drivers) {
      return { success: false, errors: [`Revenue scenario "${context.scenario}" is not defined`] };
    }

    const { consultantFte } = requireStaffing(context);
    const workdays = resolveYearly(drivers.workdays_per_year, horizon);
    const utilization = resolveYearly(drivers.utilization_rate, horizon);
    const revenueGrowth = resolveYearly(drivers.revenue_growth_pct, horizon);

    const capacityDays = consultantFte.multiply(workdays).multiply(utilization);
    const adjustedCapacityDays = capacityDays.multiply(revenueGrowth.add(1));

    // Shares are normalised so that group + external always covers the full capacity
    const rawGroupShare = resolveYearly(drivers.group_capacity_share_pct, horizon, 1);
    const rawExternalShare = resolveYearly(drivers.external_capacity_share_pct, horizon, 0);
    const shareTotal = rawGroupShare.add(rawExternalShare);
    const groupShare = rawGroupShare.divide(shareTotal);
    const externalShare = rawExternalShare.divide(shareTotal);

    const rateGrowth = resolveYearly(drivers.day_rate_growth_pct, horizon);
    const growthFactor = rateGrowth.map((rate, i) => Math.pow(1 + rate, i));
    const groupDayRate = resolveYearly(drivers.group_day_rate, horizon).multiply(growthFactor);
    const externalDayRate = resolveYearly(drivers.external_day_rate, horizon).multiply(growthFactor);

    const modeledGroupRevenue = adjustedCapacityDays.multiply(groupShare).multiply(groupDayRate);
    const guaranteedGroupRevenue = resolveYearly(drivers.guarantee_pct, horizon).multiply(
      drivers.reference_revenue ?? 0,
    );
    const groupRevenue = modeledGroupRevenue.map((value, i) =>
      Math.max(value, guaranteedGroupRevenue.get(i)),
    );
    const externalRevenue = adjustedCapacityDays.multiply(externalShare).multiply(externalDayRate);
    const totalRevenue = groupRevenue.add(externalRevenue);

    if (totalRevenue.min() <= 0) {
      context.warnings.push(`Revenue is zero in at least one year of the ${context.scenario} scenario`);
    }

    const outputs: RevenueModuleOutputs = {
      scenario: context.scenario,
      consultantFte,
      capacityDays,
      adjustedCapacityDays,
      groupShare,
      externalShare,
      groupDayRate,
      externalDayRate,
      modeledGroupRevenue,
      guaranteedGroupRevenue,
      groupRevenue,
      externalRevenue,
      totalRevenue,
    };

    context.outputs.revenue = outputs;
    return { success: true, outputs };
  }
}
