const RATE_FLOOR = -0.999999999999;
const RATE_TOLERANCE = 1e-12;

function assertFiniteNumber(value: number, name: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`${name} must be a finite number`);
  }
}

function assertRate(rate: number, name: string): void {
  assertFiniteNumber(rate, name);
  if (rate <= -1) {
    throw new RangeError(`${name} must be greater than -1`);
  }
}

function assertCashflowArray(cashflows: number[]): void {
  if (!Array.isArray(cashflows)) {
    throw new TypeError("cashflows must be an array");
  }
  cashflows.forEach((value, i) => assertFiniteNumber(value, `cashflows[${i}]`));
}

// Level end-of-year payment that repays `principal` over `years` (negative, as spreadsheets report it)
export function pmt(rate: number, years: number, principal: number): number {
  assertRate(rate, "rate");
  assertFiniteNumber(principal, "principal");
  if (!Number.isInteger(years) || years <= 0) {
    throw new RangeError("years must be a positive integer");
  }

  if (rate === 0) {
    return -principal / years;
  }

  const growth = Math.pow(1 + rate, years);
  return -(principal * rate * growth) / (growth - 1);
}

// Net present value with year 0 undiscounted
export function npv(rate: number, cashflows: number[]): number {
  assertRate(rate, "rate");
  assertCashflowArray(cashflows);

  let total = 0;
  let factor = 1;
  for (const cashflow of cashflows) {
    total += cashflow / factor;
    factor *= 1 + rate;
  }
  return total;
}

// d(NPV)/d(rate)
function npvSlope(rate: number, cashflows: number[]): number {
  let total = 0;
  let factor = Math.pow(1 + rate, 2);
  for (let year = 1; year < cashflows.length; year += 1) {
    total -= (year * (cashflows[year] ?? 0)) / factor;
    factor *= 1 + rate;
  }
  return total;
}

function newtonRate(cashflows: number[], guess: number): number | null {
  let rate = guess;
  for (let i = 0; i < 50; i += 1) {
    const value = npv(rate, cashflows);
    const slope = npvSlope(rate, cashflows);
    if (!Number.isFinite(slope) || slope === 0) {
      return null;
    }
    const next = Math.max(rate - value / slope, RATE_FLOOR);
    if (!Number.isFinite(next)) {
      return null;
    }
    if (Math.abs(next - rate) < RATE_TOLERANCE) {
      return next;
    }
    rate = next;
  }
  return null;
}

function bisectRate(cashflows: number[], guess: number): number {
  let low = RATE_FLOOR;
  let high = Math.max(guess, 0.1);
  const lowSign = Math.sign(npv(low, cashflows));

  // Widen the upper bound until NPV changes sign
  for (let i = 0; i < 60 && Math.sign(npv(high, cashflows)) === lowSign; i += 1) {
    high = high < 1 ? 1 : high * 2;
  }
  if (Math.sign(npv(high, cashflows)) === lowSign) {
    throw new Error("IRR could not be bracketed");
  }

  for (let i = 0; i < 200 && high - low > RATE_TOLERANCE; i += 1) {
    const mid = (low + high) / 2;
    if (Math.sign(npv(mid, cashflows)) === lowSign) {
      low = mid;
    } else {
      high = mid;
    }
  }
  return (low + high) / 2;
}

/**
 * Internal rate of return for annual cashflows, year 0 first.
 * Newton steps from `guess`, falling back to bisection when they stall.
 */
export function irr(cashflows: number[], guess = 0.1): number {
  assertCashflowArray(cashflows);
  assertFiniteNumber(guess, "guess");
  if (cashflows.length < 2) {
    throw new TypeError("cashflows must be an array with at least 2 entries");
  }
  if (!cashflows.some((value) => value > 0) || !cashflows.some((value) => value < 0)) {
    throw new Error("cashflows must include at least one positive and one negative value");
  }

  return newtonRate(cashflows, guess) ?? bisectRate(cashflows, guess);
}

// Multiple on invested capital; null when nothing was invested
export function moic(invested: number, returned: number): number | null {
  assertFiniteNumber(invested, "invested");
  assertFiniteNumber(returned, "returned");
  return invested > 0 ? returned / invested : null;
}

export function ratioOrNull(numerator: number, denominator: number): number | null {
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator <= 0) {
    return null;
  }
  return numerator / denominator;
}
