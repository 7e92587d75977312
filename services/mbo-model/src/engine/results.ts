import { requireOutputs } from "../runtime/context.js";
import type { ModelContext, ModelMetrics } from "../types/context.js";
import type { ScenarioName } from "../types/inputs.js";
import type { ReturnsModuleOutputs } from "../modules/returns/returns-module.js";
import type { IntegrityCheck } from "./integrity.js";

export interface PnlRow {
  year: number;
  label: string;
  revenue: number;
  groupRevenue: number;
  externalRevenue: number;
  personnelCosts: number;
  overheadCosts: number;
  variableCosts: number;
  ebitda: number;
  ebitdaMargin: number;
  depreciation: number;
  ebit: number;
  interestExpense: number;
  ebt: number;
  taxes: number;
  netIncome: number;
}

export interface CashflowRow {
  year: number;
  label: string;
  netIncome: number;
  depreciation: number;
  changeInNetWorkingCapital: number;
  changeInTaxPayable: number;
  operatingCashflow: number;
  capex: number;
  investingCashflow: number;
  freeCashflow: number;
  scheduledRepayment: number;
  specialRepayment: number;
  cashSweep: number;
  revolverDraw: number;
  revolverRepayment: number;
  dividends: number;
  financingCashflow: number;
  netCashflow: number;
  openingCash: number;
  closingCash: number;
}

export interface DebtRow {
  year: number;
  label: string;
  seniorOpening: number;
  scheduledRepayment: number;
  specialRepayment: number;
  cashSweep: number;
  seniorClosing: number;
  seniorInterest: number;
  revolverOpening: number;
  revolverDraw: number;
  revolverRepayment: number;
  revolverClosing: number;
  revolverInterest: number;
  commitmentFee: number;
  totalInterest: number;
  totalDebt: number;
  debtService: number;
  cfads: number;
  dscr: number | null;
  leverage: number | null;
  covenantBreach: boolean;
}

export interface BalanceSheetRow {
  year: number;
  label: string;
  cash: number;
  netWorkingCapital: number;
  fixedAssets: number;
  goodwill: number;
  totalAssets: number;
  seniorDebt: number;
  revolver: number;
  taxPayable: number;
  totalLiabilities: number;
  equity: number;
  totalLiabilitiesAndEquity: number;
  balanceCheck: number;
}

export interface SolverTrace {
  iterations: number;
  converged: boolean;
  tolerance: number;
  maxIterations: number;
  // Largest absolute interest change per pass
  deltas: number[];
}

export interface ModelResults {
  companyName: string;
  currency: string;
  scenario: ScenarioName;
  years: number[];
  labels: string[];
  pnl: PnlRow[];
  cashflow: CashflowRow[];
  debt: DebtRow[];
  balanceSheet: BalanceSheetRow[];
  returns: ReturnsModuleOutputs;
  checks: IntegrityCheck[];
  solver: SolverTrace;
  metrics: ModelMetrics;
}

export function assembleResults(context: ModelContext, solver: SolverTrace, checks: IntegrityCheck[]): ModelResults {
  const { timeline } = context;
  const revenue = requireOutputs(context, "revenue");
  const pnl = requireOutputs(context, "pnl");
  const costs = requireOutputs(context, "costs");
  const cashflow = requireOutputs(context, "cashflow");
  const debt = requireOutputs(context, "debt");
  const balanceSheet = requireOutputs(context, "balance_sheet");
  const returns = requireOutputs(context, "returns");

  const pnlRows: PnlRow[] = timeline.years.map((year, i) => ({
    year,
    label: timeline.label(year),
    revenue: pnl.revenue.get(i),
    groupRevenue: revenue.groupRevenue.get(i),
    externalRevenue: revenue.externalRevenue.get(i),
    personnelCosts: pnl.personnelCosts.get(i),
    overheadCosts: pnl.overheadCosts.get(i),
    variableCosts: pnl.variableCosts.get(i),
    ebitda: pnl.ebitda.get(i),
    ebitdaMargin: costs.ebitdaMargin.get(i),
    depreciation: pnl.depreciation.get(i),
    ebit: pnl.ebit.get(i),
    interestExpense: pnl.interestExpense.get(i),
    ebt: pnl.ebt.get(i),
    taxes: pnl.taxes.get(i),
    netIncome: pnl.netIncome.get(i),
  }));

  const cashflowRows: CashflowRow[] = timeline.years.map((year, i) => ({
    year,
    label: timeline.label(year),
    netIncome: cashflow.netIncome.get(i),
    depreciation: cashflow.depreciation.get(i),
    changeInNetWorkingCapital: cashflow.changeInNetWorkingCapital.get(i),
    changeInTaxPayable: cashflow.changeInTaxPayable.get(i),
    operatingCashflow: cashflow.operatingCashflow.get(i),
    capex: cashflow.capex.get(i),
    investingCashflow: cashflow.investingCashflow.get(i),
    freeCashflow: cashflow.freeCashflow.get(i),
    scheduledRepayment: debt.scheduledRepayment.get(i),
    specialRepayment: debt.specialRepayment.get(i),
    cashSweep: debt.cashSweep.get(i),
    revolverDraw: debt.revolverDraw.get(i),
    revolverRepayment: debt.revolverRepayment.get(i),
    dividends: debt.dividends.get(i),
    financingCashflow: debt.financingCashflow.get(i),
    netCashflow: debt.netCashflow.get(i),
    openingCash: debt.cashOpening.get(i),
    closingCash: debt.cashClosing.get(i),
  }));

  const debtRows: DebtRow[] = timeline.years.map((year, i) => ({
    year,
    label: timeline.label(year),
    seniorOpening: debt.seniorOpening.get(i),
    scheduledRepayment: debt.scheduledRepayment.get(i),
    specialRepayment: debt.specialRepayment.get(i),
    cashSweep: debt.cashSweep.get(i),
    seniorClosing: debt.seniorClosing.get(i),
    seniorInterest: debt.seniorInterest.get(i),
    revolverOpening: debt.revolverOpening.get(i),
    revolverDraw: debt.revolverDraw.get(i),
    revolverRepayment: debt.revolverRepayment.get(i),
    revolverClosing: debt.revolverClosing.get(i),
    revolverInterest: debt.revolverInterest.get(i),
    commitmentFee: debt.commitmentFee.get(i),
    totalInterest: debt.totalInterest.get(i),
    totalDebt: debt.totalDebt.get(i),
    debtService: debt.debtService.get(i),
    cfads: debt.cfads.get(i),
    dscr: debt.dscr[i] ?? null,
    leverage: debt.leverage[i] ?? null,
    covenantBreach: debt.covenantBreach[i] ?? false,
  }));

  const balanceSheetRows: BalanceSheetRow[] = [0, ...timeline.years].map((year) => ({
    year,
    label: timeline.label(year),
    cash: balanceSheet.cash.get(year),
    netWorkingCapital: balanceSheet.netWorkingCapital.get(year),
    fixedAssets: balanceSheet.fixedAssets.get(year),
    goodwill: balanceSheet.goodwill.get(year),
    totalAssets: balanceSheet.totalAssets.get(year),
    seniorDebt: balanceSheet.seniorDebt.get(year),
    revolver: balanceSheet.revolver.get(year),
    taxPayable: balanceSheet.taxPayable.get(year),
    totalLiabilities: balanceSheet.totalLiabilities.get(year),
    equity: balanceSheet.equity.get(year),
    totalLiabilitiesAndEquity: balanceSheet.totalLiabilitiesAndEquity.get(year),
    balanceCheck: balanceSheet.balanceCheck.get(year),
  }));

  return {
    companyName: context.inputs.deal.company_name,
    currency: context.inputs.deal.currency,
    scenario: context.scenario,
    years: timeline.years,
    labels: timeline.labels,
    pnl: pnlRows,
    cashflow: cashflowRows,
    debt: debtRows,
    balanceSheet: balanceSheetRows,
    returns,
    checks,
    solver,
    metrics: context.metrics,
  };
}
