import { describe, it, expect } from "vitest";
import {
  assertPeriodSequence,
  DATE_RANGE_ERROR,
  dateRangePeriod,
  discreteMonthPeriods,
  MONTH_RANGE_ERROR,
  MONTH_VALUE_ERROR,
  monthlyPeriods,
  monthPeriod,
  monthRangePeriods,
  validateDateRange,
  validateMonthRange,
  yearPeriod,
} from "../periods";
import { getDateKey } from "../date-utils";
import { day } from "./fixtures";

const keys = (p: { start: Date; end: Date }) => [getDateKey(p.start), getDateKey(p.end)];

describe("period builders", () => {
  it("covers a calendar year", () => {
    const p = yearPeriod(2024);
    expect(p.label).toBe("2024");
    expect(keys(p)).toEqual(["2024-01-01", "2024-12-31"]);
  });

  it("ends a month on its last day", () => {
    const feb = monthPeriod(2024, 2);
    expect(feb.label).toBe("Feb 2024");
    expect(keys(feb)).toEqual(["2024-02-01", "2024-02-29"]);
  });

  it("builds one period per month of a range", () => {
    const periods = monthRangePeriods(2024, 3, 5);
    expect(periods.map((p) => p.label)).toEqual(["Mar 2024", "Apr 2024", "May 2024"]);
  });

  it("rejects a month range that runs backwards", () => {
    expect(() => monthRangePeriods(2024, 6, 3)).toThrow(MONTH_RANGE_ERROR);
  });

  it("labels a date range by its ends", () => {
    const p = dateRangePeriod(day("2024-01-15"), day("2024-03-10"));
    expect(p.label).toBe("2024-01-15 to 2024-03-10");
    expect(() => dateRangePeriod(day("2024-03-10"), day("2024-01-15"))).toThrow(DATE_RANGE_ERROR);
  });

  it("splits a date range at month boundaries", () => {
    const periods = monthlyPeriods(day("2024-01-15"), day("2024-03-10"));
    expect(periods.map((p) => p.label)).toEqual([
      "2024-01-15 to 2024-01-31",
      "Feb 2024",
      "2024-03-01 to 2024-03-10",
    ]);
    expect(periods.map(keys)).toEqual([
      ["2024-01-15", "2024-01-31"],
      ["2024-02-01", "2024-02-29"],
      ["2024-03-01", "2024-03-10"],
    ]);
  });

  it("keeps a single-day range as one period", () => {
    const periods = monthlyPeriods(day("2024-05-31"), day("2024-05-31"));
    expect(periods.map(keys)).toEqual([["2024-05-31", "2024-05-31"]]);
  });

  it("sorts and deduplicates a discrete month selection", () => {
    const periods = discreteMonthPeriods(["2024-03", "2023-12", "2024-03"]);
    expect(periods.map((p) => p.label)).toEqual(["Dec 2023", "Mar 2024"]);
    expect(() => discreteMonthPeriods(["2024-13"])).toThrow('Invalid month "2024-13"');
  });
});

describe("validation", () => {
  it("reports user-facing messages", () => {
    expect(validateMonthRange(1, 12)).toBeNull();
    expect(validateMonthRange(5, 5)).toBeNull();
    expect(validateMonthRange(7, 2)).toBe(MONTH_RANGE_ERROR);
    expect(validateMonthRange(0, 2)).toBe(MONTH_VALUE_ERROR);
    expect(validateDateRange(day("2024-01-02"), day("2024-01-01"))).toBe(DATE_RANGE_ERROR);
    expect(validateDateRange(day("2024-01-01"), day("2024-01-01"))).toBeNull();
  });

  it("requires ordered, non-overlapping periods", () => {
    expect(() => assertPeriodSequence([])).toThrow("At least one period is required");
    expect(() => assertPeriodSequence([monthPeriod(2024, 1), monthPeriod(2024, 1)])).toThrow(
      'Period "Jan 2024" overlaps or precedes "Jan 2024"'
    );
    expect(() => assertPeriodSequence([monthPeriod(2024, 2), monthPeriod(2024, 1)])).toThrow();
    expect(() => assertPeriodSequence([monthPeriod(2024, 1), monthPeriod(2024, 3)])).not.toThrow();
  });
});
