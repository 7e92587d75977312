import { Series } from "../../core/series.js";
import { isRecord } from "../../core/yearly.js";
import { requireOutputs } from "../../runtime/context.js";
import { computeClosingFunds } from "../transaction.js";
import type { ClosingFunds } from "../transaction.js";
import type { ModelContext } from "../../types/context.js";
import type { DebtInput, TaxInput, TransactionInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export interface BalanceSheetModuleInputs {
  transaction?: TransactionInput;
  debt?: DebtInput;
  tax?: TaxInput;
}

/** Every series has horizon + 1 entries; index 0 is the balance sheet at close. */
export interface BalanceSheetModuleOutputs {
  closingFunds: ClosingFunds;
  cash: Series;
  netWorkingCapital: Series;
  fixedAssets: Series;
  goodwill: Series;
  totalAssets: Series;
  seniorDebt: Series;
  revolver: Series;
  taxPayable: Series;
  totalLiabilities: Series;
  equity: Series;
  totalLiabilitiesAndEquity: Series;
  balanceCheck: Series;
}

type BalanceSheetModuleResult = ModuleResult<BalanceSheetModuleOutputs>;

function assertBalanceSheetInputs(
  inputs: unknown,
): asserts inputs is BalanceSheetModuleInputs & { transaction: TransactionInput } {
  if (!isRecord(inputs) || !isRecord(inputs.transaction)) {
    throw new TypeError("transaction is required");
  }
}

export class BalanceSheetModule implements Module<BalanceSheetModuleOutputs> {
  readonly name = "balance_sheet";
  readonly version = "0.1.0";
  readonly dependencies = ["capex", "working_capital", "cashflow", "debt"] as const;

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertBalanceSheetInputs(inputs);
    } catch (e) {
      errors.push({ path: "transaction", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    const { transaction, debt, tax } = inputs;
    if (transaction.purchase_price <= 0) {
      errors.push({ path: "transaction.purchase_price", message: "purchase_price must be positive" });
    }
    const costPct = transaction.transaction_cost_pct;
    if (costPct !== undefined && (costPct < 0 || costPct > 1)) {
      errors.push({ path: "transaction.transaction_cost_pct", message: "transaction_cost_pct must be between 0 and 1" });
    }
    if (transaction.sponsor_equity < 0) {
      errors.push({ path: "transaction.sponsor_equity", message: "sponsor_equity must be non-negative" });
    }
    if ((transaction.investor_equity ?? 0) < 0) {
      errors.push({ path: "transaction.investor_equity", message: "investor_equity must be non-negative" });
    }
    if (transaction.sponsor_equity + (transaction.investor_equity ?? 0) <= 0) {
      errors.push({ path: "transaction.sponsor_equity", message: "total equity contribution must be positive" });
    }
    if ((transaction.opening_fixed_assets ?? 0) < 0) {
      errors.push({ path: "transaction.opening_fixed_assets", message: "opening_fixed_assets must be non-negative" });
    }

    if (errors.length === 0) {
      const funds = computeClosingFunds(transaction, debt, tax);
      if (funds.openingCash < 0) {
        errors.push({
          path: "transaction",
          message: `funding gap at close: uses ${funds.totalUses.toFixed(0)} exceed sources ${funds.totalSources.toFixed(0)}`,
        });
      }
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): BalanceSheetModuleResult {
    const { transaction, debt, tax } = context.inputs.modules;
    const capex = requireOutputs(context, "capex");
    const workingCapital = requireOutputs(context, "working_capital");
    const cashflow = requireOutputs(context, "cashflow");
    const debtOutputs = requireOutputs(context, "debt");
    const funds = computeClosingFunds(transaction, debt, tax);

    const withClose = (opening: number, values: Series) => Series.fromArray([opening, ...values.values]);

    const cash = withClose(funds.openingCash, debtOutputs.cashClosing);
    const netWorkingCapital = withClose(funds.openingNetWorkingCapital, workingCapital.netWorkingCapital);
    const fixedAssets = withClose(funds.openingFixedAssets, capex.fixedAssets);
    const goodwill = Series.constant(funds.goodwill, cash.length);
    const totalAssets = cash.add(netWorkingCapital).add(fixedAssets).add(goodwill);

    const seniorDebt = withClose(funds.seniorDebt, debtOutputs.seniorClosing);
    const revolver = withClose(funds.revolver, debtOutputs.revolverClosing);
    const taxPayable = withClose(funds.openingTaxPayable, cashflow.taxPayable);
    const totalLiabilities = seniorDebt.add(revolver).add(taxPayable);

    const retained = cashflow.netIncome.subtract(debtOutputs.dividends).cumulative();
    const equity = withClose(funds.openingEquity, retained.add(funds.openingEquity));
    const totalLiabilitiesAndEquity = totalLiabilities.add(equity);
    const balanceCheck = totalAssets.subtract(totalLiabilitiesAndEquity);

    const outputs: BalanceSheetModuleOutputs = {
      closingFunds: funds,
      cash,
      netWorkingCapital,
      fixedAssets,
      goodwill,
      totalAssets,
      seniorDebt,
      revolver,
      taxPayable,
      totalLiabilities,
      equity,
      totalLiabilitiesAndEquity,
      balanceCheck,
    };

    context.outputs.balance_sheet = outputs;
    return { success: true, outputs };
  }
}
