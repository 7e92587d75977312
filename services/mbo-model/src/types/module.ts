import type { ModelContext } from "./context.js";

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ModuleResult<T = Record<string, unknown>> {
  success: boolean;
  outputs?: T;
  errors?: string[];
}

export type ModuleName =
  | "revenue"
  | "costs"
  | "capex"
  | "working_capital"
  | "pnl"
  | "cashflow"
  | "debt"
  | "balance_sheet"
  | "returns";

export interface Module<T = unknown> {
  readonly name: ModuleName;
  readonly version: string;
  readonly dependencies: readonly ModuleName[];
  /** Checks this module's block of the request; `horizonYears` sizes yearly arrays. */
  validate(inputs: unknown, horizonYears: number): ValidationResult;
  compute(context: ModelContext): ModuleResult<T>;
}
