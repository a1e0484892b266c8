import { addYears, differenceInCalendarDays } from "date-fns";
import type {
  CanonicalSubscription,
  FinalRenewalStatus,
  RenewalPolicy,
  RenewalStatus,
  SubscriptionRecord,
  SubscriptionStatus,
} from "@/types/subscriptions";
import { dayAfter, getMonthKey, spanDays } from "./date-utils";

export interface ClassifyOptions {
  /** Report date; subscriptions ending on or after it are LIVE */
  asOf: Date;
  renewalPolicy: RenewalPolicy;
}

/**
 * Annual contract value: the span's amount scaled to 365 days, rounded to cents.
 * A span with no days has no ACV; a negative amount is floored at zero.
 */
export function computeAcv(totalAmount: number, startDate: Date, endDate: Date): number | null {
  const days = spanDays(startDate, endDate);
  if (days <= 0) return null;
  const acv = Math.round((totalAmount / days) * 365 * 100) / 100;
  return acv > 0 ? acv : 0;
}

export function subscriptionStatus(endDate: Date, asOf: Date): SubscriptionStatus {
  return differenceInCalendarDays(endDate, asOf) >= 0 ? "LIVE" : "EXPIRED";
}

export function renewalPeriod(endDate: Date): string {
  return getMonthKey(dayAfter(endDate));
}

export function finalRenewalStatus(
  status: SubscriptionStatus,
  renewal: RenewalStatus
): FinalRenewalStatus {
  if (renewal === "Not Renewed") {
    return status === "LIVE" ? "Due for Renewal" : "Non Renewal";
  }
  return renewal;
}

// ── Sibling index ────────────────────────────────────────────

interface SiblingEntry {
  dealId: string;
  start: number;
}

type SiblingMatcher = (record: CanonicalSubscription) => boolean;

function groupKey(record: CanonicalSubscription): string {
  return `${record.companyId}\u0000${record.productCategory}`;
}

/** First index whose start is >= target */
function lowerBound(entries: SiblingEntry[], target: number): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (entries[mid].start < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function buildRollingWindowMatcher(records: CanonicalSubscription[]): SiblingMatcher {
  const groups = new Map<string, SiblingEntry[]>();
  for (const r of records) {
    const key = groupKey(r);
    const list = groups.get(key) ?? [];
    list.push({ dealId: r.dealId, start: r.startDate.getTime() });
    groups.set(key, list);
  }
  for (const list of groups.values()) {
    list.sort((a, b) => a.start - b.start || a.dealId.localeCompare(b.dealId));
  }

  return (record) => {
    const siblings = groups.get(groupKey(record));
    if (!siblings) return false;
    const windowEnd = addYears(record.endDate, 1).getTime();
    for (let i = lowerBound(siblings, record.startDate.getTime()); i < siblings.length; i++) {
      if (siblings[i].start > windowEnd) break;
      if (siblings[i].dealId !== record.dealId) return true;
    }
    return false;
  };
}

function buildCalendarYearMatcher(records: CanonicalSubscription[]): SiblingMatcher {
  const groups = new Map<string, Map<number, Set<string>>>();
  for (const r of records) {
    const key = groupKey(r);
    const years = groups.get(key) ?? new Map<number, Set<string>>();
    const year = r.startDate.getFullYear();
    const deals = years.get(year) ?? new Set<string>();
    deals.add(r.dealId);
    years.set(year, deals);
    groups.set(key, years);
  }

  return (record) => {
    const deals = groups.get(groupKey(record))?.get(record.endDate.getFullYear());
    if (!deals) return false;
    for (const dealId of deals) {
      if (dealId !== record.dealId) return true;
    }
    return false;
  };
}

const MATCHERS: Record<RenewalPolicy, (records: CanonicalSubscription[]) => SiblingMatcher> = {
  "rolling-window": buildRollingWindowMatcher,
  "calendar-year": buildCalendarYearMatcher,
};

/**
 * Derive ACV, LIVE/EXPIRED status and the renewal verdict for each record.
 *
 * A live subscription is always "Due for Renewal". An expired one is "Renewed"
 * when another deal for the same company and product category matches the
 * renewal policy, otherwise "Not Renewed". Siblings are indexed once per
 * (company, category) group, so the result does not depend on input order.
 */
export function classifySubscriptions(
  records: CanonicalSubscription[],
  options: ClassifyOptions
): SubscriptionRecord[] {
  const hasRenewal = MATCHERS[options.renewalPolicy](records);

  return records.map((record) => {
    const status = subscriptionStatus(record.endDate, options.asOf);
    const renewal: RenewalStatus =
      status === "LIVE" ? "Due for Renewal" : hasRenewal(record) ? "Renewed" : "Not Renewed";

    return {
      ...record,
      acv: computeAcv(record.totalAmount, record.startDate, record.endDate),
      status,
      renewalPeriod: renewalPeriod(record.endDate),
      renewalStatus: renewal,
      finalRenewalStatus: finalRenewalStatus(status, renewal),
    };
  });
}

export interface RenewalSummaryRow {
  status: FinalRenewalStatus;
  count: number;
  acv: number;
}

/** Record count and ACV per final renewal status, in a fixed order. */
export function summarizeRenewals(records: SubscriptionRecord[]): RenewalSummaryRow[] {
  const order: FinalRenewalStatus[] = ["Renewed", "Due for Renewal", "Non Renewal"];
  const cents = new Map<FinalRenewalStatus, { count: number; cents: number }>();
  for (const status of order) cents.set(status, { count: 0, cents: 0 });

  for (const r of records) {
    const bucket = cents.get(r.finalRenewalStatus);
    if (!bucket) continue;
    bucket.count++;
    bucket.cents += Math.round((r.acv ?? 0) * 100);
  }

  return order.map((status) => {
    const bucket = cents.get(status) ?? { count: 0, cents: 0 };
    return { status, count: bucket.count, acv: bucket.cents / 100 };
  });
}
