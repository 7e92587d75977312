import type { Series } from "../core/series.js";
import { checkYearly, isRecord, resolveYearly } from "../core/yearly.js";
import type { ModelContext } from "../types/context.js";
import type { ValidationError } from "../types/module.js";

export interface Staffing {
  consultantFte: Series;
  backofficeFte: Series;
}

// Headcount is shared by the revenue and cost modules, so it lives in its own block
export function validateStaffing(inputs: unknown, horizonYears: number): ValidationError[] {
  if (!isRecord(inputs)) {
    return [{ path: "staffing", message: "staffing is required" }];
  }
  if (inputs.consultant_fte === undefined) {
    return [{ path: "staffing.consultant_fte", message: "consultant_fte is required" }];
  }
  return [
    ...checkYearly(inputs.consultant_fte, "staffing.consultant_fte", horizonYears, { min: 0 }),
    ...checkYearly(inputs.backoffice_fte, "staffing.backoffice_fte", horizonYears, { min: 0 }),
  ];
}

export function requireStaffing(context: ModelContext): Staffing {
  const staffing = context.inputs.modules.staffing;
  const horizon = context.timeline.horizonYears;
  return {
    consultantFte: resolveYearly(staffing.consultant_fte, horizon),
    backofficeFte: resolveYearly(staffing.backoffice_fte, horizon),
  };
}
