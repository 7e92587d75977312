// TypeScript types matching contracts/mbo_model_v1.schema.json

import type { YearlyValue } from "../core/yearly.js";

export type { YearlyValue };

export interface MboModelInputs {
  contract: ContractInput;
  deal: DealInput;
  modules: ModulesInput;
}

export interface ContractInput {
  contract_version: "MBO_MODEL_V1";
  engine_version: string;
}

export interface DealInput {
  company_name: string;
  currency: string;
  close_date: string;
  horizon_years: number;
}

export interface ModulesInput {
  transaction: TransactionInput;
  staffing: StaffingInput;
  revenue: RevenueInput;
  costs: CostInput;
  capex?: CapexInput;
  working_capital?: WorkingCapitalInput;
  tax?: TaxInput;
  debt?: DebtInput;
  distributions?: DistributionInput;
  returns: ReturnsInput;
  solver?: SolverInput;
}

export interface TransactionInput {
  purchase_price: number;
  transaction_cost_pct?: number;
  sponsor_equity: number;
  investor_equity?: number;
  opening_net_working_capital?: number;
  opening_fixed_assets?: number;
}

export interface StaffingInput {
  consultant_fte: YearlyValue;
  backoffice_fte?: YearlyValue;
}

export type ScenarioName = "base" | "best" | "worst";

export const SCENARIO_NAMES: readonly ScenarioName[] = ["base", "best", "worst"];

export interface RevenueDriversInput {
  workdays_per_year: YearlyValue;
  utilization_rate: YearlyValue;
  group_day_rate: YearlyValue;
  external_day_rate?: YearlyValue;
  day_rate_growth_pct?: YearlyValue;
  revenue_growth_pct?: YearlyValue;
  group_capacity_share_pct?: YearlyValue;
  external_capacity_share_pct?: YearlyValue;
  reference_revenue?: number;
  guarantee_pct?: YearlyValue;
}

export interface RevenueInput {
  selected_scenario?: ScenarioName;
  scenarios: {
    base: RevenueDriversInput;
    best?: RevenueDriversInput;
    worst?: RevenueDriversInput;
  };
}

export type VariableCostMode = "pct_of_revenue" | "fixed";

export interface VariableCostInput {
  name: string;
  mode: VariableCostMode;
  value: YearlyValue;
}

export interface InflationInput {
  apply: boolean;
  rate_pct: number;
}

export interface CostInput {
  consultant_loaded_cost: YearlyValue;
  backoffice_loaded_cost?: YearlyValue;
  management_cost?: YearlyValue;
  fixed_overhead?: Record<string, YearlyValue>;
  variable_costs?: VariableCostInput[];
  inflation?: InflationInput;
}

export type CapexMethod = "pct_of_revenue" | "fixed";

export type DepreciationMethod = "declining_balance" | "fixed";

export interface CapexInput {
  method?: CapexMethod;
  capex_pct_revenue?: YearlyValue;
  capex_amount?: YearlyValue;
  maintenance_capex_pct_revenue?: YearlyValue;
  depreciation_method?: DepreciationMethod;
  depreciation_rate_pct?: number;
  depreciation_amount?: YearlyValue;
}

export type WorkingCapitalMethod = "pct_of_revenue" | "days";

export interface WorkingCapitalInput {
  method?: WorkingCapitalMethod;
  nwc_pct_revenue?: YearlyValue;
  receivable_days?: YearlyValue;
  payable_days?: YearlyValue;
}

export interface TaxInput {
  tax_rate_pct: number;
  payment_lag_years?: 0 | 1;
  opening_tax_payable?: number;
}

export type AmortizationType = "linear" | "bullet" | "annuity";

export interface SpecialRepaymentInput {
  year: number;
  amount: number;
}

export interface SeniorLoanInput {
  amount: number;
  interest_rate_pct: number;
  amortization_type?: AmortizationType;
  amortization_years?: number;
  grace_years?: number;
  special_repayments?: SpecialRepaymentInput[];
}

export interface RevolverInput {
  limit: number;
  interest_rate_pct: number;
  commitment_fee_pct?: number;
  opening_balance?: number;
}

export type InterestBasis = "opening" | "average";

export interface CovenantInput {
  min_dscr?: number;
  max_leverage?: number;
}

export interface DebtInput {
  senior?: SeniorLoanInput;
  revolver?: RevolverInput;
  cash_sweep?: { sweep_pct: number };
  minimum_cash?: number;
  interest_basis?: InterestBasis;
  covenants?: CovenantInput;
}

export interface DistributionInput {
  payout_ratio_pct: number;
  start_year?: number;
}

export type MultipleBasis = "ebitda" | "ebit";

export interface ReturnsInput {
  exit_year: number;
  exit_multiple: number;
  multiple_basis?: MultipleBasis;
}

export interface SolverInput {
  max_iterations?: number;
  tolerance?: number;
}
