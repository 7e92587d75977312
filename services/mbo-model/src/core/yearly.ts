import { Series } from "./series.js";

/** A scalar applied to every projection year, or one value per year. */
export type YearlyValue = number | number[];

export function resolveYearly(value: YearlyValue | undefined, horizonYears: number, fallback = 0): Series {
  if (value === undefined) {
    return Series.constant(fallback, horizonYears);
  }
  if (typeof value === "number") {
    return Series.constant(value, horizonYears);
  }
  if (value.length !== horizonYears) {
    throw new RangeError(`expected ${horizonYears} yearly values, received ${value.length}`);
  }
  return Series.fromArray(value);
}

/** Path-tagged check used by module validators. */
export function checkYearly(
  value: unknown,
  path: string,
  horizonYears: number,
  range: { min?: number; max?: number } = {},
): { path: string; message: string }[] {
  if (value === undefined) {
    return [];
  }
  const entries: unknown[] | null = typeof value === "number" ? [value] : Array.isArray(value) ? value : null;
  if (entries === null) {
    return [{ path, message: "must be a number or an array of numbers" }];
  }
  if (Array.isArray(value) && value.length !== horizonYears) {
    return [{ path, message: `must have exactly ${horizonYears} entries (one per year)` }];
  }

  const errors: { path: string; message: string }[] = [];
  entries.forEach((entry, index) => {
    const at = Array.isArray(value) ? `${path}[${index}]` : path;
    if (typeof entry !== "number" || !Number.isFinite(entry)) {
      errors.push({ path: at, message: "must be a finite number" });
      return;
    }
    if (range.min !== undefined && entry < range.min) {
      errors.push({ path: at, message: `must be >= ${range.min}` });
    }
    if (range.max !== undefined && entry > range.max) {
      errors.push({ path: at, message: `must be <= ${range.max}` });
    }
  });
  return errors;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
