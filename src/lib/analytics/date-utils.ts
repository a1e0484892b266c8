import {
  addDays,
  differenceInCalendarDays,
  format,
  isValid,
  parseISO,
  startOfDay,
} from "date-fns";

/**
 * Parse subscription dates into local calendar days (time of day dropped).
 *
 * Accepts Date objects plus the string formats seen in exports and in pg DATE
 * columns (returned as raw strings, see db/database.ts):
 *
 * ISO / date only:  "2024-01-28" or "2024-01-28T22:46:51Z"
 * SQL datetime:     "2024-01-28 22:46:51" or "2024-01-28 22:46:51.000"
 * US export:        "1/28/2024" or "1/28/24"
 *
 * A leading YYYY-MM-DD is taken as the calendar day as written; any time or
 * offset after it is ignored, so the day never moves with the host timezone.
 */
export function parseDate(value: string | Date | null | undefined): Date | null {
  if (value == null) return null;

  if (value instanceof Date) {
    return isValid(value) ? startOfDay(value) : null;
  }

  const cleaned = value.trim();
  if (!cleaned) return null;

  // Format 1: YYYY-MM-DD, optionally followed by a time / offset
  const dayMatch = cleaned.match(/^(\d{4}-\d{2}-\d{2})(?:[ T].*)?$/);
  if (dayMatch) {
    const d = parseISO(dayMatch[1]);
    return isValid(d) ? d : null;
  }

  // Format 2: other ISO 8601 forms
  const iso = parseISO(cleaned);
  if (isValid(iso)) return startOfDay(iso);

  // Format 3: MM/DD/YYYY with no time
  const dateOnlyMatch = cleaned.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2,4})$/);
  if (dateOnlyMatch) {
    let year = parseInt(dateOnlyMatch[3], 10);
    if (year < 100) year += 2000;
    const month = parseInt(dateOnlyMatch[1], 10) - 1;
    const day = parseInt(dateOnlyMatch[2], 10);
    const d = new Date(year, month, day);
    // Reject rollovers like 2/31
    if (isValid(d) && d.getMonth() === month && d.getDate() === day) return d;
  }

  return null;
}

export function getMonthKey(date: Date): string {
  return `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, "0")}`;
}

export function getDateKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

/** Parse "YYYY-MM" into { year, month } with month 1-12, or null. */
export function parseMonthKey(key: string): { year: number; month: number } | null {
  const match = key.trim().match(/^(\d{4})-(\d{1,2})$/);
  if (!match) return null;
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  if (month < 1 || month > 12) return null;
  return { year, month };
}

/** Inclusive day count of [start, end]; 0 or negative when end precedes start. */
export function spanDays(start: Date, end: Date): number {
  return differenceInCalendarDays(end, start) + 1;
}

/** First day no longer covered by a subscription ending on `end`. */
export function dayAfter(end: Date): Date {
  return addDays(end, 1);
}
