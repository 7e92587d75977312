import { DateTime } from "luxon";

export interface TimelineConfig {
  closeDate: string; // ISO date of the buyout close (e.g., '2026-01-01')
  horizonYears: number; // Number of annual projection periods
}

/**
 * Annual projection calendar. Year 0 is the close; year t (1..horizon) is the
 * twelve months ending the day before the t-th anniversary of the close.
 */
export class Timeline {
  readonly closeDate: DateTime;
  readonly horizonYears: number;
  readonly years: number[];

  constructor(config: TimelineConfig) {
    if (!Number.isInteger(config.horizonYears) || config.horizonYears <= 0) {
      throw new Error("horizonYears must be a positive integer");
    }

    const closeDate = DateTime.fromISO(config.closeDate, { zone: "utc" }).startOf("day");
    if (!closeDate.isValid) {
      throw new Error(`Invalid closeDate: ${config.closeDate}`);
    }

    this.closeDate = closeDate;
    this.horizonYears = config.horizonYears;
    this.years = Array.from({ length: this.horizonYears }, (_, i) => i + 1);
  }

  /** Last day of projection year `year`; year 0 is the close date itself. */
  periodEnd(year: number): DateTime {
    this.assertYear(year);
    return year === 0 ? this.closeDate : this.closeDate.plus({ years: year }).minus({ days: 1 });
  }

  /** "Close" for year 0, otherwise the fiscal year named after its end date. */
  label(year: number): string {
    return year === 0 ? "Close" : `FY${this.periodEnd(year).year}`;
  }

  get labels(): string[] {
    return this.years.map((year) => this.label(year));
  }

  private assertYear(year: number): void {
    if (!Number.isInteger(year) || year < 0 || year > this.horizonYears) {
      throw new RangeError(`year must be an integer between 0 and ${this.horizonYears}`);
    }
  }
}
