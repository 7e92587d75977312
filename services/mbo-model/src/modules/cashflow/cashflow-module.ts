import type { Series } from "../../core/series.js";
import { isRecord } from "../../core/yearly.js";
import { requireOutputs } from "../../runtime/context.js";
import type { ModelContext } from "../../types/context.js";
import type { TaxInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export const DEFAULT_TAX_PAYMENT_LAG_YEARS = 1;

/** Cashflow before financing; the debt module adds the financing lines. */
export interface CashflowModuleOutputs {
  netIncome: Series;
  depreciation: Series;
  changeInNetWorkingCapital: Series;
  taxesPaid: Series;
  changeInTaxPayable: Series;
  taxPayable: Series;
  openingTaxPayable: number;
  operatingCashflow: Series;
  capex: Series;
  investingCashflow: Series;
  freeCashflow: Series;
}

type CashflowModuleResult = ModuleResult<CashflowModuleOutputs>;

function assertTaxInput(inputs: unknown): asserts inputs is TaxInput | undefined {
  if (inputs === undefined) return;
  if (!isRecord(inputs)) {
    throw new TypeError("tax must be an object");
  }
}

export class CashflowModule implements Module<CashflowModuleOutputs> {
  readonly name = "cashflow";
  readonly version = "0.1.0";
  readonly dependencies = ["pnl", "capex", "working_capital"] as const;

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertTaxInput(inputs);
    } catch (e) {
      errors.push({ path: "tax", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    if (inputs) {
      const lag = inputs.payment_lag_years;
      if (lag !== undefined && lag !== 0 && lag !== 1) {
        errors.push({ path: "tax.payment_lag_years", message: "payment_lag_years must be 0 or 1" });
      }
      if (inputs.opening_tax_payable !== undefined && inputs.opening_tax_payable < 0) {
        errors.push({ path: "tax.opening_tax_payable", message: "opening_tax_payable must be non-negative" });
      }
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): CashflowModuleResult {
    const pnl = requireOutputs(context, "pnl");
    const capexOutputs = requireOutputs(context, "capex");
    const workingCapital = requireOutputs(context, "working_capital");
    const tax = context.inputs.modules.tax;
    const lag = tax?.payment_lag_years ?? DEFAULT_TAX_PAYMENT_LAG_YEARS;
    const openingTaxPayable = tax?.opening_tax_payable ?? 0;

    // With a one-year lag, each year's charge stays payable and year 1 settles the balance carried in at close
    const taxPayable = lag === 0 ? pnl.taxes.multiply(0) : pnl.taxes;
    const changeInTaxPayable = taxPayable.change(openingTaxPayable);
    const taxesPaid = pnl.taxes.subtract(changeInTaxPayable);

    const operatingCashflow = pnl.netIncome
      .add(pnl.depreciation)
      .subtract(workingCapital.changeInNetWorkingCapital)
      .add(changeInTaxPayable);
    const investingCashflow = capexOutputs.capex.negate();
    const freeCashflow = operatingCashflow.add(investingCashflow);

    const outputs: CashflowModuleOutputs = {
      netIncome: pnl.netIncome,
      depreciation: pnl.depreciation,
      changeInNetWorkingCapital: workingCapital.changeInNetWorkingCapital,
      taxesPaid,
      changeInTaxPayable,
      taxPayable,
      openingTaxPayable,
      operatingCashflow,
      capex: capexOutputs.capex,
      investingCashflow,
      freeCashflow,
    };

    context.outputs.cashflow = outputs;
    return { success: true, outputs };
  }
}
