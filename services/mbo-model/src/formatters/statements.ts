/**
 * Statement formatters
 *
 * Turn model results into row/column tables (P&L, cashflow, debt schedule,
 * balance sheet, equity cashflows) and render them as aligned text or JSON.
 */

import type { ModelResults } from "../engine/results.js";

export type RowFormat = "currency" | "percent" | "multiple" | "text";

export interface StatementRow {
  label: string;
  values: (string | number | null)[];
  isHeader?: boolean;
  isSubtotal?: boolean;
  isTotal?: boolean;
  format?: RowFormat;
  indent?: number;
}

export interface StatementTable {
  title: string;
  currency: string;
  columns: number[];
  columnLabels: string[];
  rows: StatementRow[];
}

/**
 * Formats a number as a whole-unit currency string
 */
export function formatCurrency(value: number | null | undefined, currency = "EUR"): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  const rounded = Math.round(value);
  if (rounded === 0) return "0";
  const formatted = Math.abs(rounded).toLocaleString("en-US", {
    style: "currency",
    currency,
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  });
  return rounded < 0 ? `-${formatted}` : formatted;
}

/**
 * Formats a number as percentage string
 */
export function formatPercent(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  return `${(value * 100).toFixed(1)}%`;
}

export function formatMultiple(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  return `${value.toFixed(2)}x`;
}

function header(label: string): StatementRow {
  return { label, values: [], isHeader: true };
}

function spacer(): StatementRow {
  return { label: "", values: [] };
}

export function buildPnlTable(results: ModelResults): StatementTable {
  const rows = results.pnl;
  const values = (pick: (row: ModelResults["pnl"][number]) => number) => rows.map(pick);

  return {
    title: "Profit and Loss",
    currency: results.currency,
    columns: results.years,
    columnLabels: results.labels,
    rows: [
      header("Revenue"),
      { label: "Group Revenue", values: values((r) => r.groupRevenue), format: "currency", indent: 1 },
      { label: "External Revenue", values: values((r) => r.externalRevenue), format: "currency", indent: 1 },
      { label: "Total Revenue", values: values((r) => r.revenue), format: "currency", isSubtotal: true },
      spacer(),
      header("Operating Costs"),
      { label: "Personnel", values: values((r) => -r.personnelCosts), format: "currency", indent: 1 },
      { label: "Overhead", values: values((r) => -r.overheadCosts), format: "currency", indent: 1 },
      { label: "Variable Costs", values: values((r) => -r.variableCosts), format: "currency", indent: 1 },
      { label: "EBITDA", values: values((r) => r.ebitda), format: "currency", isSubtotal: true },
      { label: "EBITDA Margin", values: values((r) => r.ebitdaMargin), format: "percent", indent: 1 },
      { label: "Depreciation", values: values((r) => -r.depreciation), format: "currency", indent: 1 },
      { label: "EBIT", values: values((r) => r.ebit), format: "currency", isSubtotal: true },
      { label: "Interest Expense", values: values((r) => -r.interestExpense), format: "currency", indent: 1 },
      { label: "EBT", values: values((r) => r.ebt), format: "currency", isSubtotal: true },
      { label: "Taxes", values: values((r) => -r.taxes), format: "currency", indent: 1 },
      { label: "Net Income", values: values((r) => r.netIncome), format: "currency", isTotal: true },
    ],
  };
}

export function buildCashflowTable(results: ModelResults): StatementTable {
  const rows = results.cashflow;
  const values = (pick: (row: ModelResults["cashflow"][number]) => number) => rows.map(pick);

  return {
    title: "Cashflow Statement",
    currency: results.currency,
    columns: results.years,
    columnLabels: results.labels,
    rows: [
      header("Operating Activities"),
      { label: "Net Income", values: values((r) => r.netIncome), format: "currency", indent: 1 },
      { label: "Depreciation", values: values((r) => r.depreciation), format: "currency", indent: 1 },
      { label: "Change in NWC", values: values((r) => -r.changeInNetWorkingCapital), format: "currency", indent: 1 },
      { label: "Change in Tax Payable", values: values((r) => r.changeInTaxPayable), format: "currency", indent: 1 },
      { label: "Operating Cashflow", values: values((r) => r.operatingCashflow), format: "currency", isSubtotal: true },
      { label: "Capex", values: values((r) => -r.capex), format: "currency", indent: 1 },
      { label: "Investing Cashflow", values: values((r) => r.investingCashflow), format: "currency", isSubtotal: true },
      { label: "Free Cashflow", values: values((r) => r.freeCashflow), format: "currency", isSubtotal: true },
      spacer(),
      header("Financing Activities"),
      { label: "Scheduled Repayment", values: values((r) => -r.scheduledRepayment), format: "currency", indent: 1 },
      { label: "Special Repayment", values: values((r) => -r.specialRepayment), format: "currency", indent: 1 },
      { label: "Cash Sweep", values: values((r) => -r.cashSweep), format: "currency", indent: 1 },
      { label: "Revolver Draw", values: values((r) => r.revolverDraw), format: "currency", indent: 1 },
      { label: "Revolver Repayment", values: values((r) => -r.revolverRepayment), format: "currency", indent: 1 },
      { label: "Dividends", values: values((r) => -r.dividends), format: "currency", indent: 1 },
      { label: "Financing Cashflow", values: values((r) => r.financingCashflow), format: "currency", isSubtotal: true },
      spacer(),
      { label: "Net Cashflow", values: values((r) => r.netCashflow), format: "currency" },
      { label: "Opening Cash", values: values((r) => r.openingCash), format: "currency" },
      { label: "Closing Cash", values: values((r) => r.closingCash), format: "currency", isTotal: true },
    ],
  };
}

export function buildDebtTable(results: ModelResults): StatementTable {
  const rows = results.debt;
  const values = (pick: (row: ModelResults["debt"][number]) => number | null) => rows.map(pick);

  return {
    title: "Debt Schedule",
    currency: results.currency,
    columns: results.years,
    columnLabels: results.labels,
    rows: [
      header("Senior Loan"),
      { label: "Opening Balance", values: values((r) => r.seniorOpening), format: "currency", indent: 1 },
      { label: "Scheduled Repayment", values: values((r) => -r.scheduledRepayment), format: "currency", indent: 1 },
      { label: "Special Repayment", values: values((r) => -r.specialRepayment), format: "currency", indent: 1 },
      { label: "Cash Sweep", values: values((r) => -r.cashSweep), format: "currency", indent: 1 },
      { label: "Closing Balance", values: values((r) => r.seniorClosing), format: "currency", isSubtotal: true },
      { label: "Interest", values: values((r) => r.seniorInterest), format: "currency", indent: 1 },
      spacer(),
      header("Revolver"),
      { label: "Opening Balance", values: values((r) => r.revolverOpening), format: "currency", indent: 1 },
      { label: "Draw", values: values((r) => r.revolverDraw), format: "currency", indent: 1 },
      { label: "Repayment", values: values((r) => -r.revolverRepayment), format: "currency", indent: 1 },
      { label: "Closing Balance", values: values((r) => r.revolverClosing), format: "currency", isSubtotal: true },
      { label: "Interest", values: values((r) => r.revolverInterest), format: "currency", indent: 1 },
      { label: "Commitment Fee", values: values((r) => r.commitmentFee), format: "currency", indent: 1 },
      spacer(),
      header("Credit Metrics"),
      { label: "Total Interest", values: values((r) => r.totalInterest), format: "currency", indent: 1 },
      { label: "Debt Service", values: values((r) => r.debtService), format: "currency", indent: 1 },
      { label: "CFADS", values: values((r) => r.cfads), format: "currency", indent: 1 },
      { label: "DSCR", values: values((r) => r.dscr), format: "multiple", indent: 1 },
      { label: "Leverage (Debt / EBITDA)", values: values((r) => r.leverage), format: "multiple", indent: 1 },
      {
        label: "Covenant Breach",
        values: rows.map((r) => (r.covenantBreach ? "YES" : "no")),
        format: "text",
        indent: 1,
      },
      { label: "Total Debt", values: values((r) => r.totalDebt), format: "currency", isTotal: true },
    ],
  };
}

export function buildBalanceSheetTable(results: ModelResults): StatementTable {
  const rows = results.balanceSheet;
  const values = (pick: (row: ModelResults["balanceSheet"][number]) => number) => rows.map(pick);

  return {
    title: "Balance Sheet",
    currency: results.currency,
    columns: rows.map((row) => row.year),
    columnLabels: rows.map((row) => row.label),
    rows: [
      header("Assets"),
      { label: "Cash", values: values((r) => r.cash), format: "currency", indent: 1 },
      { label: "Net Working Capital", values: values((r) => r.netWorkingCapital), format: "currency", indent: 1 },
      { label: "Fixed Assets", values: values((r) => r.fixedAssets), format: "currency", indent: 1 },
      { label: "Goodwill", values: values((r) => r.goodwill), format: "currency", indent: 1 },
      { label: "Total Assets", values: values((r) => r.totalAssets), format: "currency", isSubtotal: true },
      spacer(),
      header("Liabilities and Equity"),
      { label: "Senior Debt", values: values((r) => r.seniorDebt), format: "currency", indent: 1 },
      { label: "Revolver", values: values((r) => r.revolver), format: "currency", indent: 1 },
      { label: "Tax Payable", values: values((r) => r.taxPayable), format: "currency", indent: 1 },
      { label: "Total Liabilities", values: values((r) => r.totalLiabilities), format: "currency", isSubtotal: true },
      { label: "Equity", values: values((r) => r.equity), format: "currency", indent: 1 },
      {
        label: "Total Liabilities and Equity",
        values: values((r) => r.totalLiabilitiesAndEquity),
        format: "currency",
        isTotal: true,
      },
      { label: "Balance Check", values: values((r) => r.balanceCheck), format: "currency" },
    ],
  };
}

export function buildEquityCashflowTable(results: ModelResults): StatementTable {
  const { returns } = results;
  const columns = Array.from({ length: returns.exitYear + 1 }, (_, i) => i);
  const columnLabels = columns.map((year) => (year === 0 ? "Close" : results.labels[year - 1] ?? `Year ${year}`));
  const holders = [returns.sponsor, returns.investor, returns.total];
  const title = (holder: string) => holder.charAt(0).toUpperCase() + holder.slice(1);

  return {
    title: "Equity Cashflows",
    currency: results.currency,
    columns,
    columnLabels,
    rows: [
      header("Cashflows"),
      ...holders.map((holder): StatementRow => ({
        label: title(holder.holder),
        values: holder.cashflows,
        format: "currency",
        indent: 1,
        isTotal: holder.holder === "total",
      })),
      spacer(),
      header("Returns"),
      ...holders.map((holder): StatementRow => ({
        label: `${title(holder.holder)} IRR`,
        values: [holder.irr],
        format: "percent",
        indent: 1,
      })),
      ...holders.map((holder): StatementRow => ({
        label: `${title(holder.holder)} MOIC`,
        values: [holder.moic],
        format: "multiple",
        indent: 1,
      })),
    ],
  };
}

export function buildStatementTables(results: ModelResults): StatementTable[] {
  return [
    buildPnlTable(results),
    buildCashflowTable(results),
    buildDebtTable(results),
    buildBalanceSheetTable(results),
    buildEquityCashflowTable(results),
  ];
}

function formatValue(value: string | number | null, format: RowFormat | undefined, currency: string): string {
  if (value === null) return "-";
  if (typeof value === "string") return value;
  switch (format) {
    case "currency":
      return formatCurrency(value, currency);
    case "percent":
      return formatPercent(value);
    case "multiple":
      return formatMultiple(value);
    default:
      return value.toString();
  }
}

/**
 * Renders a table as fixed-width text, one line per row
 */
export function formatStatementAsText(table: StatementTable): string {
  const colWidth = 15;
  const labelWidth = 32;
  const width = labelWidth + table.columnLabels.length * colWidth;

  let output = `${table.title.toUpperCase()} (${table.currency})\n`;
  output += "".padEnd(labelWidth) + table.columnLabels.map((l) => l.padStart(colWidth)).join("") + "\n";
  output += "=".repeat(width) + "\n";

  for (const row of table.rows) {
    if (row.label === "") {
      output += "\n";
      continue;
    }

    const label = "  ".repeat(row.indent ?? 0) + row.label;

    if (row.isHeader) {
      output += `${label.toUpperCase()}\n`;
      output += "-".repeat(width) + "\n";
      continue;
    }

    const formattedValues = row.values.map((v) => formatValue(v, row.format, table.currency));
    output += label.padEnd(labelWidth) + formattedValues.map((v) => v.padStart(colWidth)).join("") + "\n";

    if (row.isTotal) {
      output += "=".repeat(width) + "\n";
    } else if (row.isSubtotal) {
      output += "-".repeat(width) + "\n";
    }
  }

  return output;
}

function toKey(label: string): string {
  return label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Converts a table to a JSON-friendly shape keyed by section, line and column label
 */
export function formatStatementAsJson(table: StatementTable): Record<string, unknown> {
  const sections: Record<string, Record<string, Record<string, string | number | null>>> = {};
  let currentSection = "summary";

  for (const row of table.rows) {
    if (row.isHeader && row.label) {
      currentSection = toKey(row.label);
      sections[currentSection] = {};
      continue;
    }

    if (row.label) {
      const values: Record<string, string | number | null> = {};
      table.columnLabels.forEach((columnLabel, i) => {
        values[columnLabel] = row.values[i] ?? null;
      });

      const section = sections[currentSection] ?? {};
      section[toKey(row.label)] = values;
      sections[currentSection] = section;
    }
  }

  return {
    title: table.title,
    currency: table.currency,
    columns: table.columns,
    column_labels: table.columnLabels,
    sections,
  };
}
