import type { Series } from "../core/series.js";
import { requireOutputs } from "../runtime/context.js";
import type { ModelContext } from "../types/context.js";

export type IntegrityCheckName =
  | "balance_sheet_balances"
  | "cash_reconciles"
  | "debt_non_negative"
  | "net_income_ties";

export interface IntegrityCheck {
  name: IntegrityCheckName;
  passed: boolean;
  maxDeviation: number;
  message: string;
}

function worstAbs(series: Series): number {
  return series.values.reduce((worst, value) => Math.max(worst, Math.abs(value)), 0);
}

export function runIntegrityChecks(context: ModelContext, tolerance: number): IntegrityCheck[] {
  const pnl = requireOutputs(context, "pnl");
  const cashflow = requireOutputs(context, "cashflow");
  const debt = requireOutputs(context, "debt");
  const balanceSheet = requireOutputs(context, "balance_sheet");
  const openingCash = balanceSheet.cash.get(0);

  const imbalance = worstAbs(balanceSheet.balanceCheck);

  // Opening cash plus cumulative free cashflow and financing flows must land on closing cash
  const reconciledCash = cashflow.freeCashflow.add(debt.financingCashflow).cumulative().add(openingCash);
  const cashGap = reconciledCash.maxAbsDiff(debt.cashClosing);

  const lowestDebt = Math.min(debt.seniorClosing.min(), debt.revolverClosing.min(), 0);
  const incomeGap = pnl.netIncome.maxAbsDiff(cashflow.netIncome);

  return [
    {
      name: "balance_sheet_balances",
      passed: imbalance <= tolerance,
      maxDeviation: imbalance,
      message: `Assets minus liabilities and equity: max deviation ${imbalance.toFixed(4)}`,
    },
    {
      name: "cash_reconciles",
      passed: cashGap <= tolerance,
      maxDeviation: cashGap,
      message: `Cumulative cashflow against closing cash: max deviation ${cashGap.toFixed(4)}`,
    },
    {
      name: "debt_non_negative",
      passed: lowestDebt >= -1e-6,
      maxDeviation: Math.max(-lowestDebt, 0),
      message: `Lowest closing debt balance ${lowestDebt.toFixed(4)}`,
    },
    {
      name: "net_income_ties",
      passed: incomeGap <= 1e-6,
      maxDeviation: incomeGap,
      message: `P&L net income against cashflow starting line: max deviation ${incomeGap.toFixed(4)}`,
    },
  ];
}
