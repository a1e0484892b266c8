import {
  addDays,
  differenceInCalendarDays,
  endOfMonth,
  format,
  startOfDay,
  startOfMonth,
} from "date-fns";
import type { Period } from "@/types/subscriptions";
import { getDateKey, parseMonthKey } from "./date-utils";

export const MONTH_RANGE_ERROR = "Start month should be before end month.";
export const DATE_RANGE_ERROR = "Start date should be on or before end date.";
export const MONTH_VALUE_ERROR = "Months must be between 1 and 12.";

/** User-facing message for an invalid start/end month pair, or null. */
export function validateMonthRange(startMonth: number, endMonth: number): string | null {
  const valid = (m: number) => Number.isInteger(m) && m >= 1 && m <= 12;
  if (!valid(startMonth) || !valid(endMonth)) return MONTH_VALUE_ERROR;
  if (startMonth > endMonth) return MONTH_RANGE_ERROR;
  return null;
}

export function validateDateRange(start: Date, end: Date): string | null {
  return differenceInCalendarDays(end, start) < 0 ? DATE_RANGE_ERROR : null;
}

export function yearPeriod(year: number): Period {
  return {
    label: String(year),
    start: new Date(year, 0, 1),
    end: new Date(year, 11, 31),
  };
}

export function monthPeriod(year: number, month: number): Period {
  const start = new Date(year, month - 1, 1);
  return {
    label: format(start, "MMM yyyy"),
    start,
    end: startOfDay(endOfMonth(start)),
  };
}

/** One period per month from startMonth to endMonth (1-12, inclusive) of a year. */
export function monthRangePeriods(year: number, startMonth: number, endMonth: number): Period[] {
  const error = validateMonthRange(startMonth, endMonth);
  if (error) throw new Error(error);

  const periods: Period[] = [];
  for (let m = startMonth; m <= endMonth; m++) {
    periods.push(monthPeriod(year, m));
  }
  return periods;
}

export function dateRangePeriod(start: Date, end: Date, label?: string): Period {
  const error = validateDateRange(start, end);
  if (error) throw new Error(error);

  const s = startOfDay(start);
  const e = startOfDay(end);
  return { label: label ?? `${getDateKey(s)} to ${getDateKey(e)}`, start: s, end: e };
}

/**
 * Split a date range at month boundaries. The first and last periods may be
 * partial months; together they cover every day of the range exactly once.
 */
export function monthlyPeriods(start: Date, end: Date): Period[] {
  const range = dateRangePeriod(start, end);
  const periods: Period[] = [];

  let cursor = range.start;
  while (cursor <= range.end) {
    const monthEnd = startOfDay(endOfMonth(cursor));
    const periodEnd = monthEnd < range.end ? monthEnd : range.end;
    const fullMonth =
      cursor.getTime() === startOfMonth(cursor).getTime() && periodEnd.getTime() === monthEnd.getTime();
    periods.push({
      label: fullMonth ? format(cursor, "MMM yyyy") : `${getDateKey(cursor)} to ${getDateKey(periodEnd)}`,
      start: cursor,
      end: periodEnd,
    });
    cursor = addDays(periodEnd, 1);
  }

  return periods;
}

/**
 * Periods for a discrete month selection ("YYYY-MM" keys), sorted and
 * deduplicated. Months need not be consecutive.
 */
export function discreteMonthPeriods(monthKeys: string[]): Period[] {
  const seen = new Set<string>();
  const months: { year: number; month: number }[] = [];

  for (const key of monthKeys) {
    const parsed = parseMonthKey(key);
    if (!parsed) throw new Error(`Invalid month "${key}", expected YYYY-MM`);
    const id = `${parsed.year}-${parsed.month}`;
    if (seen.has(id)) continue;
    seen.add(id);
    months.push(parsed);
  }

  return months
    .sort((a, b) => a.year - b.year || a.month - b.month)
    .map(({ year, month }) => monthPeriod(year, month));
}

/** Throws unless periods are valid, ordered and non-overlapping. */
export function assertPeriodSequence(periods: Period[]): void {
  if (periods.length === 0) throw new Error("At least one period is required");

  for (let i = 0; i < periods.length; i++) {
    const p = periods[i];
    if (validateDateRange(p.start, p.end)) {
      throw new Error(`Period "${p.label}" ends before it starts`);
    }
    if (i > 0 && differenceInCalendarDays(p.start, periods[i - 1].end) < 1) {
      throw new Error(`Period "${p.label}" overlaps or precedes "${periods[i - 1].label}"`);
    }
  }
}
