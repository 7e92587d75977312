import { describe, expect, it } from "vitest";

import { Timeline } from "../../src/core/timeline.js";

describe("Timeline", () => {
  it("constructs with a valid config", () => {
    const timeline = new Timeline({ closeDate: "2026-01-01", horizonYears: 3 });

    expect(timeline.closeDate.toISODate()).toBe("2026-01-01");
    expect(timeline.horizonYears).toBe(3);
    expect(timeline.years).toEqual([1, 2, 3]);
  });

  it("labels fiscal years by their end date", () => {
    const calendar = new Timeline({ closeDate: "2026-01-01", horizonYears: 3 });
    expect(calendar.labels).toEqual(["FY2026", "FY2027", "FY2028"]);
    expect(calendar.label(0)).toBe("Close");

    const midYear = new Timeline({ closeDate: "2026-07-01", horizonYears: 2 });
    expect(midYear.labels).toEqual(["FY2027", "FY2028"]);
  });

  it("periodEnd closes each projection year the day before the anniversary", () => {
    const timeline = new Timeline({ closeDate: "2026-07-01", horizonYears: 3 });

    expect(timeline.periodEnd(0).toISODate()).toBe("2026-07-01");
    expect(timeline.periodEnd(1).toISODate()).toBe("2027-06-30");
    expect(timeline.periodEnd(3).toISODate()).toBe("2029-06-30");
    expect(() => timeline.periodEnd(4)).toThrow("year must be an integer between 0 and 3");
  });

  it("throws for invalid configs", () => {
    expect(() => new Timeline({ closeDate: "2026-01-01", horizonYears: 0 })).toThrow(
      "horizonYears must be a positive integer",
    );
    expect(() => new Timeline({ closeDate: "not-a-date", horizonYears: 3 })).toThrow(
      "Invalid closeDate: not-a-date",
    );
  });
});
