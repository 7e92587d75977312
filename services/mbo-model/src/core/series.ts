/**
 * Immutable per-year numeric series. Index 0 is the first projection year.
 */
export class Series {
  readonly values: readonly number[];
  readonly length: number;

  constructor(values: readonly number[]) {
    const copied = Array.from(values, (value, index) => {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new TypeError(`values[${index}] must be a finite number`);
      }
      return value;
    });

    this.values = Object.freeze(copied);
    this.length = copied.length;
  }

  static zeros(length: number): Series {
    Series.assertLength(length);
    return new Series(Array.from({ length }, () => 0));
  }

  static fromArray(arr: readonly number[]): Series {
    return new Series(arr);
  }

  static constant(value: number, length: number): Series {
    Series.assertFiniteNumber(value, "value");
    Series.assertLength(length);
    return new Series(Array.from({ length }, () => value));
  }

  /** Compounding series: initial × (1 + rate)^i. */
  static fromGrowth(initial: number, annualRate: number, length: number): Series {
    Series.assertFiniteNumber(initial, "initial");
    Series.assertFiniteNumber(annualRate, "annualRate");
    if (annualRate <= -1) {
      throw new RangeError("annualRate must be greater than -1");
    }
    Series.assertLength(length);

    const factor = 1 + annualRate;
    return new Series(Array.from({ length }, (_, i) => initial * Math.pow(factor, i)));
  }

  get(index: number): number {
    Series.assertIndex(index, "index");
    if (index < 0 || index >= this.length) {
      throw new RangeError(`index must be between 0 and ${Math.max(0, this.length - 1)}`);
    }
    return this.values[index] ?? 0;
  }

  slice(start: number, end?: number): Series {
    Series.assertIndex(start, "start");
    if (end !== undefined) {
      Series.assertIndex(end, "end");
    }
    return new Series(this.values.slice(start, end));
  }

  add(other: Series | number): Series {
    return this.elementwise(other, (a, b) => a + b);
  }

  subtract(other: Series | number): Series {
    return this.elementwise(other, (a, b) => a - b);
  }

  multiply(other: Series | number): Series {
    return this.elementwise(other, (a, b) => a * b);
  }

  /** Division where a zero divisor yields 0. */
  divide(other: Series | number): Series {
    return this.elementwise(other, (a, b) => (b === 0 ? 0 : a / b));
  }

  negate(): Series {
    return this.map((value) => -value);
  }

  maximum(floor: number): Series {
    return this.map((value) => Math.max(value, floor));
  }

  sum(): number {
    let total = 0;
    for (const value of this.values) {
      total += value;
    }
    return total;
  }

  cumulative(): Series {
    let runningTotal = 0;
    return new Series(
      this.values.map((value) => {
        runningTotal += value;
        return runningTotal;
      }),
    );
  }

  /** Shift values one year later, filling year 1 with `opening`. */
  lag(opening: number): Series {
    Series.assertFiniteNumber(opening, "opening");
    return new Series(this.values.map((_, index) => (index === 0 ? opening : this.values[index - 1] ?? 0)));
  }

  /** Year-on-year change against `opening` for year 1. */
  change(opening: number): Series {
    return this.subtract(this.lag(opening));
  }

  /** Largest absolute elementwise difference against another series. */
  maxAbsDiff(other: Series): number {
    if (other.length !== this.length) {
      throw new Error(`Series length mismatch: ${this.length} vs ${other.length}`);
    }
    let largest = 0;
    for (let i = 0; i < this.length; i += 1) {
      largest = Math.max(largest, Math.abs((this.values[i] ?? 0) - other.get(i)));
    }
    return largest;
  }

  min(): number {
    return this.length === 0 ? 0 : Math.min(...this.values);
  }

  last(): number {
    return this.length === 0 ? 0 : this.values[this.length - 1] ?? 0;
  }

  toArray(): number[] {
    return Array.from(this.values);
  }

  map(fn: (value: number, index: number) => number): Series {
    return new Series(
      this.values.map((value, index) => {
        const mapped = fn(value, index);
        if (typeof mapped !== "number" || !Number.isFinite(mapped)) {
          throw new TypeError(`map() callback must return a finite number (index ${index})`);
        }
        return mapped;
      }),
    );
  }

  private elementwise(other: Series | number, fn: (left: number, right: number) => number): Series {
    if (typeof other === "number") {
      Series.assertFiniteNumber(other, "other");
      return new Series(this.values.map((value) => fn(value, other)));
    }

    if (other.length !== this.length) {
      throw new Error(`Series length mismatch: ${this.length} vs ${other.length}`);
    }

    return new Series(this.values.map((value, index) => fn(value, other.get(index))));
  }

  private static assertIndex(value: number, name: string): void {
    if (!Number.isInteger(value)) {
      throw new TypeError(`${name} must be an integer`);
    }
  }

  private static assertLength(length: number): void {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError("length must be a non-negative integer");
    }
  }

  private static assertFiniteNumber(value: number, name: string): void {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new TypeError(`${name} must be a finite number`);
    }
  }
}
