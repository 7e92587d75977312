import { Series } from "../../core/series.js";
import { pmt, ratioOrNull } from "../../core/math-utils.js";
import { isRecord } from "../../core/yearly.js";
import { addWarning, requireOutputs } from "../../runtime/context.js";
import { computeClosingFunds } from "../transaction.js";
import type { ModelContext } from "../../types/context.js";
import type { DebtInput, DistributionInput, InterestBasis, SeniorLoanInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export const DEFAULT_AMORTIZATION_YEARS = 5;
export const DEFAULT_INTEREST_BASIS: InterestBasis = "average";

/** The debt module runs the whole cash waterfall, so it also owns dividend policy. */
export interface DebtModuleInputs {
  debt?: DebtInput;
  distributions?: DistributionInput;
}

export interface DebtModuleOutputs {
  interestBasis: InterestBasis;
  seniorOpening: Series;
  scheduledRepayment: Series;
  specialRepayment: Series;
  cashSweep: Series;
  seniorClosing: Series;
  seniorInterest: Series;
  revolverOpening: Series;
  revolverDraw: Series;
  revolverRepayment: Series;
  revolverClosing: Series;
  revolverInterest: Series;
  commitmentFee: Series;
  totalInterest: Series;
  totalDebt: Series;
  dividends: Series;
  financingCashflow: Series;
  netCashflow: Series;
  cashOpening: Series;
  cashClosing: Series;
  fundingShortfall: Series;
  cfads: Series;
  debtService: Series;
  dscr: (number | null)[];
  leverage: (number | null)[];
  covenantBreach: boolean[];
  minimumDscr: number | null;
  averageDscr: number | null;
}

type DebtModuleResult = ModuleResult<DebtModuleOutputs>;

interface WaterfallColumns {
  seniorOpening: number[];
  scheduledRepayment: number[];
  specialRepayment: number[];
  cashSweep: number[];
  seniorClosing: number[];
  seniorInterest: number[];
  revolverOpening: number[];
  revolverDraw: number[];
  revolverRepayment: number[];
  revolverClosing: number[];
  revolverInterest: number[];
  commitmentFee: number[];
  dividends: number[];
  cashOpening: number[];
  cashClosing: number[];
  fundingShortfall: number[];
}

function assertDebtModuleInputs(inputs: unknown): asserts inputs is DebtModuleInputs {
  if (!isRecord(inputs)) {
    throw new TypeError("debt inputs must be an object");
  }
  if (inputs.debt !== undefined && !isRecord(inputs.debt)) {
    throw new TypeError("debt must be an object");
  }
  if (inputs.distributions !== undefined && !isRecord(inputs.distributions)) {
    throw new TypeError("distributions must be an object");
  }
}

/**
 * Contractual principal per year before caps, sweeps and special repayments.
 * Repayment starts after the grace period and runs for `amortization_years`.
 */
export function scheduledPrincipal(senior: SeniorLoanInput, horizonYears: number): Series {
  const years = senior.amortization_years ?? DEFAULT_AMORTIZATION_YEARS;
  const grace = senior.grace_years ?? 0;
  const type = senior.amortization_type ?? "linear";
  const principal = new Array<number>(horizonYears).fill(0);

  if (senior.amount <= 0) {
    return Series.fromArray(principal);
  }

  if (type === "bullet") {
    const year = grace + years;
    if (year <= horizonYears) {
      principal[year - 1] = senior.amount;
    }
    return Series.fromArray(principal);
  }

  if (type === "annuity") {
    const payment = -pmt(senior.interest_rate_pct, years, senior.amount);
    let balance = senior.amount;
    for (let year = grace + 1; year <= Math.min(grace + years, horizonYears); year += 1) {
      const portion = Math.min(payment - balance * senior.interest_rate_pct, balance);
      principal[year - 1] = portion;
      balance -= portion;
    }
    return Series.fromArray(principal);
  }

  for (let year = grace + 1; year <= Math.min(grace + years, horizonYears); year += 1) {
    principal[year - 1] = senior.amount / years;
  }
  return Series.fromArray(principal);
}

function interestBase(basis: InterestBasis, opening: number, closing: number): number {
  return basis === "opening" ? opening : (opening + closing) / 2;
}

export class DebtModule implements Module<DebtModuleOutputs> {
  readonly name = "debt";
  readonly version = "0.1.0";
  readonly dependencies = ["pnl", "cashflow", "capex"] as const;

  validate(inputs: unknown, horizonYears: number): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertDebtModuleInputs(inputs);
    } catch (e) {
      errors.push({ path: "debt", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    const { debt, distributions } = inputs;

    if (debt?.senior) {
      const senior = debt.senior;
      if (senior.amount < 0) {
        errors.push({ path: "debt.senior.amount", message: "amount must be non-negative" });
      }
      if (senior.interest_rate_pct < 0 || senior.interest_rate_pct > 1) {
        errors.push({ path: "debt.senior.interest_rate_pct", message: "interest_rate_pct must be between 0 and 1" });
      }
      if (
        senior.amortization_years !== undefined &&
        (!Number.isInteger(senior.amortization_years) || senior.amortization_years <= 0)
      ) {
        errors.push({ path: "debt.senior.amortization_years", message: "amortization_years must be a positive integer" });
      }
      if (senior.grace_years !== undefined && (!Number.isInteger(senior.grace_years) || senior.grace_years < 0)) {
        errors.push({ path: "debt.senior.grace_years", message: "grace_years must be a non-negative integer" });
      }
      (senior.special_repayments ?? []).forEach((repayment, i) => {
        if (!Number.isInteger(repayment.year) || repayment.year < 1 || repayment.year > horizonYears) {
          errors.push({
            path: `debt.senior.special_repayments[${i}].year`,
            message: `year must be between 1 and ${horizonYears}`,
          });
        }
        if (repayment.amount < 0) {
          errors.push({ path: `debt.senior.special_repayments[${i}].amount`, message: "amount must be non-negative" });
        }
      });
    }

    if (debt?.revolver) {
      const revolver = debt.revolver;
      if (revolver.limit < 0) {
        errors.push({ path: "debt.revolver.limit", message: "limit must be non-negative" });
      }
      if (revolver.interest_rate_pct < 0 || revolver.interest_rate_pct > 1) {
        errors.push({ path: "debt.revolver.interest_rate_pct", message: "interest_rate_pct must be between 0 and 1" });
      }
      if (revolver.commitment_fee_pct !== undefined && (revolver.commitment_fee_pct < 0 || revolver.commitment_fee_pct > 1)) {
        errors.push({ path: "debt.revolver.commitment_fee_pct", message: "commitment_fee_pct must be between 0 and 1" });
      }
      const opening = revolver.opening_balance ?? 0;
      if (opening < 0 || opening > revolver.limit) {
        errors.push({ path: "debt.revolver.opening_balance", message: "opening_balance must be between 0 and limit" });
      }
    }

    if (debt?.cash_sweep && (debt.cash_sweep.sweep_pct < 0 || debt.cash_sweep.sweep_pct > 1)) {
      errors.push({ path: "debt.cash_sweep.sweep_pct", message: "sweep_pct must be between 0 and 1" });
    }
    if (debt?.minimum_cash !== undefined && debt.minimum_cash < 0) {
      errors.push({ path: "debt.minimum_cash", message: "minimum_cash must be non-negative" });
    }
    if (debt?.interest_basis !== undefined && debt.interest_basis !== "opening" && debt.interest_basis !== "average") {
      errors.push({ path: "debt.interest_basis", message: "interest_basis must be opening or average" });
    }
    if (debt?.covenants?.min_dscr !== undefined && debt.covenants.min_dscr < 0) {
      errors.push({ path: "debt.covenants.min_dscr", message: "min_dscr must be greater than or equal to 0" });
    }
    if (debt?.covenants?.max_leverage !== undefined && debt.covenants.max_leverage <= 0) {
      errors.push({ path: "debt.covenants.max_leverage", message: "max_leverage must be greater than 0" });
    }

    if (distributions) {
      if (distributions.payout_ratio_pct < 0 || distributions.payout_ratio_pct > 1) {
        errors.push({ path: "distributions.payout_ratio_pct", message: "payout_ratio_pct must be between 0 and 1" });
      }
      const start = distributions.start_year;
      if (start !== undefined && (!Number.isInteger(start) || start < 1)) {
        errors.push({ path: "distributions.start_year", message: "start_year must be a positive integer" });
      }
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): DebtModuleResult {
    const horizon = context.timeline.horizonYears;
    const { transaction, debt, distributions, tax } = context.inputs.modules;
    const pnl = requireOutputs(context, "pnl");
    const cashflow = requireOutputs(context, "cashflow");
    const capex = requireOutputs(context, "capex");

    const senior = debt?.senior;
    const revolver = debt?.revolver;
    const basis = debt?.interest_basis ?? DEFAULT_INTEREST_BASIS;
    const minimumCash = debt?.minimum_cash ?? 0;
    const sweepPct = debt?.cash_sweep?.sweep_pct ?? 0;
    const payoutRatio = distributions?.payout_ratio_pct ?? 0;
    const payoutStartYear = distributions?.start_year ?? 1;
    const revolverLimit = revolver?.limit ?? 0;

    const schedule = senior ? scheduledPrincipal(senior, horizon) : Series.zeros(horizon);
    const specialByYear = new Map<number, number>();
    for (const repayment of senior?.special_repayments ?? []) {
      specialByYear.set(repayment.year, (specialByYear.get(repayment.year) ?? 0) + repayment.amount);
    }

    const funds = computeClosingFunds(transaction, debt, tax);
    let seniorBalance = funds.seniorDebt;
    let revolverBalance = funds.revolver;
    let cash = funds.openingCash;

    const rows: WaterfallColumns = {
      seniorOpening: [],
      scheduledRepayment: [],
      specialRepayment: [],
      cashSweep: [],
      seniorClosing: [],
      seniorInterest: [],
      revolverOpening: [],
      revolverDraw: [],
      revolverRepayment: [],
      revolverClosing: [],
      revolverInterest: [],
      commitmentFee: [],
      dividends: [],
      cashOpening: [],
      cashClosing: [],
      fundingShortfall: [],
    };

    for (let i = 0; i < horizon; i += 1) {
      const year = i + 1;
      const label = context.timeline.label(year);
      const seniorOpening = seniorBalance;
      const revolverOpening = revolverBalance;
      const cashOpening = cash;

      const scheduled = Math.min(schedule.get(i), seniorOpening);
      const special = Math.min(specialByYear.get(year) ?? 0, seniorOpening - scheduled);
      const cashBeforeFunding = cashOpening + cashflow.freeCashflow.get(i) - scheduled - special;

      let draw = 0;
      let revolverRepayment = 0;
      let sweep = 0;
      let dividends = 0;
      let shortfall = 0;

      if (cashBeforeFunding < minimumCash) {
        const need = minimumCash - cashBeforeFunding;
        draw = Math.min(need, Math.max(revolverLimit - revolverOpening, 0));
        shortfall = need - draw;
        if (shortfall > 0.005) {
          addWarning(
            context,
            `Cash falls below the minimum balance in ${label}: revolver capacity short by ${shortfall.toFixed(0)}`,
          );
        }
      } else {
        let excess = cashBeforeFunding - minimumCash;
        revolverRepayment = Math.min(revolverOpening, excess);
        excess -= revolverRepayment;
        sweep = Math.min(excess * sweepPct, seniorOpening - scheduled - special);
        excess -= sweep;
        if (year >= payoutStartYear) {
          dividends = Math.min(payoutRatio * Math.max(pnl.netIncome.get(i), 0), excess);
        }
      }

      seniorBalance = seniorOpening - scheduled - special - sweep;
      revolverBalance = revolverOpening + draw - revolverRepayment;
      cash = cashBeforeFunding + draw - revolverRepayment - sweep - dividends;

      const revolverBase = interestBase(basis, revolverOpening, revolverBalance);
      rows.seniorOpening.push(seniorOpening);
      rows.scheduledRepayment.push(scheduled);
      rows.specialRepayment.push(special);
      rows.cashSweep.push(sweep);
      rows.seniorClosing.push(seniorBalance);
      rows.seniorInterest.push((senior?.interest_rate_pct ?? 0) * interestBase(basis, seniorOpening, seniorBalance));
      rows.revolverOpening.push(revolverOpening);
      rows.revolverDraw.push(draw);
      rows.revolverRepayment.push(revolverRepayment);
      rows.revolverClosing.push(revolverBalance);
      rows.revolverInterest.push((revolver?.interest_rate_pct ?? 0) * revolverBase);
      rows.commitmentFee.push((revolver?.commitment_fee_pct ?? 0) * Math.max(revolverLimit - revolverBase, 0));
      rows.dividends.push(dividends);
      rows.cashOpening.push(cashOpening);
      rows.cashClosing.push(cash);
      rows.fundingShortfall.push(shortfall);
    }

    const scheduledRepayment = Series.fromArray(rows.scheduledRepayment);
    const specialRepayment = Series.fromArray(rows.specialRepayment);
    const cashSweep = Series.fromArray(rows.cashSweep);
    const revolverDraw = Series.fromArray(rows.revolverDraw);
    const revolverRepayment = Series.fromArray(rows.revolverRepayment);
    const dividends = Series.fromArray(rows.dividends);
    const seniorClosing = Series.fromArray(rows.seniorClosing);
    const revolverClosing = Series.fromArray(rows.revolverClosing);
    const seniorInterest = Series.fromArray(rows.seniorInterest);
    const revolverInterest = Series.fromArray(rows.revolverInterest);
    const commitmentFee = Series.fromArray(rows.commitmentFee);
    const totalInterest = seniorInterest.add(revolverInterest).add(commitmentFee);
    const totalDebt = seniorClosing.add(revolverClosing);

    const financingCashflow = revolverDraw
      .subtract(scheduledRepayment)
      .subtract(specialRepayment)
      .subtract(cashSweep)
      .subtract(revolverRepayment)
      .subtract(dividends);
    const netCashflow = cashflow.freeCashflow.add(financingCashflow);

    // Credit metrics
    const cfads = pnl.ebitda
      .subtract(cashflow.taxesPaid)
      .subtract(capex.maintenanceCapex)
      .subtract(cashflow.changeInNetWorkingCapital);
    const debtService = totalInterest.add(scheduledRepayment);
    const dscr = cfads.values.map((value, i) => ratioOrNull(value, debtService.get(i)));
    const leverage = totalDebt.values.map((value, i) =>
      value > 0 ? ratioOrNull(value, pnl.ebitda.get(i)) : 0,
    );

    const minDscr = debt?.covenants?.min_dscr;
    const maxLeverage = debt?.covenants?.max_leverage;
    const covenantBreach = context.timeline.years.map((year, i) => {
      const label = context.timeline.label(year);
      let breached = false;
      const yearDscr = dscr[i] ?? null;
      if (minDscr !== undefined && yearDscr !== null && yearDscr < minDscr) {
        addWarning(context, `DSCR covenant breached in ${label} (${yearDscr.toFixed(2)}x vs min ${minDscr.toFixed(2)}x)`);
        breached = true;
      }
      const yearLeverage = leverage[i] ?? null;
      if (maxLeverage !== undefined && (yearLeverage === null || yearLeverage > maxLeverage)) {
        const shown = yearLeverage === null ? "n/a" : `${yearLeverage.toFixed(2)}x`;
        addWarning(context, `Leverage covenant breached in ${label} (${shown} vs max ${maxLeverage.toFixed(2)}x)`);
        breached = true;
      }
      return breached;
    });

    const validDscr = dscr.filter((value): value is number => value !== null);
    const minimumDscr = validDscr.length > 0 ? Math.min(...validDscr) : null;
    const averageDscr =
      validDscr.length > 0 ? validDscr.reduce((total, value) => total + value, 0) / validDscr.length : null;

    const outputs: DebtModuleOutputs = {
      interestBasis: basis,
      seniorOpening: Series.fromArray(rows.seniorOpening),
      scheduledRepayment,
      specialRepayment,
      cashSweep,
      seniorClosing,
      seniorInterest,
      revolverOpening: Series.fromArray(rows.revolverOpening),
      revolverDraw,
      revolverRepayment,
      revolverClosing,
      revolverInterest,
      commitmentFee,
      totalInterest,
      totalDebt,
      dividends,
      financingCashflow,
      netCashflow,
      cashOpening: Series.fromArray(rows.cashOpening),
      cashClosing: Series.fromArray(rows.cashClosing),
      fundingShortfall: Series.fromArray(rows.fundingShortfall),
      cfads,
      debtService,
      dscr,
      leverage,
      covenantBreach,
      minimumDscr,
      averageDscr,
    };

    context.outputs.debt = outputs;
    return { success: true, outputs };
  }
}
