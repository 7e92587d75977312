import { irr, moic } from "../../core/math-utils.js";
import { isRecord } from "../../core/yearly.js";
import { requireOutputs } from "../../runtime/context.js";
import { computeClosingFunds } from "../transaction.js";
import type { ModelContext } from "../../types/context.js";
import type { MultipleBasis, ReturnsInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export type EquityHolder = "sponsor" | "investor" | "total";

export interface EquityReturn {
  holder: EquityHolder;
  ownershipPct: number;
  invested: number;
  // Year 0 (contribution) through the exit year
  cashflows: number[];
  distributions: number;
  exitProceeds: number;
  moic: number | null;
  irr: number | null;
}

export interface ReturnsModuleOutputs {
  exitYear: number;
  exitLabel: string;
  multipleBasis: MultipleBasis;
  exitMetric: number;
  exitMultiple: number;
  enterpriseValue: number;
  netDebt: number;
  equityValue: number;
  sponsor: EquityReturn;
  investor: EquityReturn;
  total: EquityReturn;
}

type ReturnsModuleResult = ModuleResult<ReturnsModuleOutputs>;

function assertReturnsInput(inputs: unknown): asserts inputs is ReturnsInput {
  if (!isRecord(inputs)) {
    throw new TypeError("returns is required");
  }
  if (typeof inputs.exit_year !== "number" || typeof inputs.exit_multiple !== "number") {
    throw new TypeError("returns.exit_year and returns.exit_multiple are required");
  }
}

export class ReturnsModule implements Module<ReturnsModuleOutputs> {
  readonly name = "returns";
  readonly version = "0.1.0";
  readonly dependencies = ["pnl", "debt", "balance_sheet"] as const;

  validate(inputs: unknown, horizonYears: number): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertReturnsInput(inputs);
    } catch (e) {
      errors.push({ path: "returns", message: e instanceof Error ? e.message : String(e) });
      return { valid: false, errors };
    }

    if (!Number.isInteger(inputs.exit_year) || inputs.exit_year < 1 || inputs.exit_year > horizonYears) {
      errors.push({ path: "returns.exit_year", message: `exit_year must be an integer between 1 and ${horizonYears}` });
    }
    if (inputs.exit_multiple <= 0) {
      errors.push({ path: "returns.exit_multiple", message: "exit_multiple must be positive" });
    }
    if (inputs.multiple_basis !== undefined && inputs.multiple_basis !== "ebitda" && inputs.multiple_basis !== "ebit") {
      errors.push({ path: "returns.multiple_basis", message: "multiple_basis must be ebitda or ebit" });
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: ModelContext): ReturnsModuleResult {
    const { returns, transaction, debt, tax } = context.inputs.modules;
    const pnl = requireOutputs(context, "pnl");
    const debtOutputs = requireOutputs(context, "debt");
    const funds = computeClosingFunds(transaction, debt, tax);

    const exitYear = returns.exit_year;
    const exitIndex = exitYear - 1;
    const multipleBasis = returns.multiple_basis ?? "ebitda";
    const exitMetric = (multipleBasis === "ebit" ? pnl.ebit : pnl.ebitda).get(exitIndex);
    const enterpriseValue = exitMetric * returns.exit_multiple;
    const netDebt = debtOutputs.totalDebt.get(exitIndex) - debtOutputs.cashClosing.get(exitIndex);
    const equityValue = Math.max(enterpriseValue - netDebt, 0);

    if (enterpriseValue - netDebt < 0) {
      context.warnings.push("Net debt exceeds enterprise value at exit; equity value floored at zero");
    }

    const totalEquity = funds.sponsorEquity + funds.investorEquity;
    const dividends = debtOutputs.dividends.slice(0, exitYear).toArray();

    const buildReturn = (holder: EquityHolder, invested: number): EquityReturn => {
      const ownershipPct = totalEquity > 0 ? invested / totalEquity : 0;
      const exitProceeds = equityValue * ownershipPct;
      const distributions = dividends.reduce((total, value) => total + value * ownershipPct, 0);
      const cashflows = [
        -invested,
        ...dividends.map((value, i) => value * ownershipPct + (i === exitIndex ? exitProceeds : 0)),
      ];

      let holderIrr: number | null = null;
      if (invested > 0) {
        try {
          holderIrr = irr(cashflows);
        } catch (e) {
          context.warnings.push(
            `IRR calculation failed for ${holder} equity: ${e instanceof Error ? e.message : String(e)}`,
          );
        }
      }

      return {
        holder,
        ownershipPct,
        invested,
        cashflows,
        distributions,
        exitProceeds,
        moic: moic(invested, distributions + exitProceeds),
        irr: holderIrr,
      };
    };

    const outputs: ReturnsModuleOutputs = {
      exitYear,
      exitLabel: context.timeline.label(exitYear),
      multipleBasis,
      exitMetric,
      exitMultiple: returns.exit_multiple,
      enterpriseValue,
      netDebt,
      equityValue,
      sponsor: buildReturn("sponsor", funds.sponsorEquity),
      investor: buildReturn("investor", funds.investorEquity),
      total: buildReturn("total", totalEquity),
    };

    context.outputs.returns = outputs;
    return { success: true, outputs };
  }
}
