import type { DebtInput, TaxInput, TransactionInput } from "../types/inputs.js";

/** Sources and uses of funds at close, and the opening balance sheet they imply. */
export interface ClosingFunds {
  seniorDebt: number;
  revolver: number;
  sponsorEquity: number;
  investorEquity: number;
  totalSources: number;
  purchasePrice: number;
  transactionCosts: number;
  totalUses: number;
  openingCash: number;
  openingNetWorkingCapital: number;
  openingFixedAssets: number;
  openingTaxPayable: number;
  goodwill: number;
  openingEquity: number;
}

export function computeClosingFunds(
  transaction: TransactionInput,
  debt: DebtInput | undefined,
  tax: TaxInput | undefined,
): ClosingFunds {
  const seniorDebt = debt?.senior?.amount ?? 0;
  const revolver = debt?.revolver?.opening_balance ?? 0;
  const sponsorEquity = transaction.sponsor_equity;
  const investorEquity = transaction.investor_equity ?? 0;
  const purchasePrice = transaction.purchase_price;
  const transactionCosts = purchasePrice * (transaction.transaction_cost_pct ?? 0);
  const openingNetWorkingCapital = transaction.opening_net_working_capital ?? 0;
  const openingFixedAssets = transaction.opening_fixed_assets ?? 0;
  const openingTaxPayable = tax?.opening_tax_payable ?? 0;

  const totalSources = seniorDebt + revolver + sponsorEquity + investorEquity;
  const totalUses = purchasePrice + transactionCosts;

  return {
    seniorDebt,
    revolver,
    sponsorEquity,
    investorEquity,
    totalSources,
    purchasePrice,
    transactionCosts,
    totalUses,
    openingCash: totalSources - totalUses,
    openingNetWorkingCapital,
    openingFixedAssets,
    openingTaxPayable,
    // Purchase price not allocated to the acquired net assets
    goodwill: purchasePrice - openingNetWorkingCapital - openingFixedAssets + openingTaxPayable,
    // Transaction costs are expensed against equity at close
    openingEquity: sponsorEquity + investorEquity - transactionCosts,
  };
}
