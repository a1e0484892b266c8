import { startOfDay } from "date-fns";
import type {
  BridgeOptions,
  Period,
  PeriodBridge,
  RollForwardResult,
  SubscriptionRecord,
} from "@/types/subscriptions";
import { dayAfter } from "./date-utils";
import { assertPeriodSequence } from "./periods";

/**
 * ACV roll-forward.
 *
 * Boundary convention, used for every quantity:
 *   - a subscription is in force on each day of [startDate, endDate]
 *   - it starts on startDate and expires on endDate + 1 day
 *   - opening ACV at day t is what was in force at the close of day t - 1,
 *     i.e. startDate < t <= endDate + 1
 *
 * Each quantity counts an event date inside an inclusive period, so the sums
 * over consecutive sub-periods equal the sum over their union. Amounts are
 * accumulated in integer cents to keep the bridge identities exact.
 */

interface LedgerEntry {
  start: number;
  expiry: number;
  cents: number;
  newBusiness: boolean;
  renewal: "expiry" | "start" | null;
}

function toCents(acv: number | null): number {
  return acv == null ? 0 : Math.round(acv * 100);
}

function fromCents(cents: number): number {
  return cents / 100;
}

export const RENEWAL_IDS_ERROR =
  "Pipeline-stage renewal detection needs a renewal pipeline id and a renewal stage id.";

/** User-facing message for unusable bridge options, or null. */
export function validateBridgeOptions(options: BridgeOptions): string | null {
  if (
    options.renewalDetection === "pipeline-stage" &&
    (!options.renewalPipelineId || !options.renewalStageId)
  ) {
    return RENEWAL_IDS_ERROR;
  }
  return null;
}

function buildLedger(records: SubscriptionRecord[], options: BridgeOptions): LedgerEntry[] {
  const error = validateBridgeOptions(options);
  if (error) throw new Error(error);

  const entries: LedgerEntry[] = [];
  for (const r of records) {
    const cents = toCents(r.acv);
    if (cents === 0) continue;

    let renewal: LedgerEntry["renewal"] = null;
    if (options.renewalDetection === "renewal-period") {
      if (r.finalRenewalStatus === "Renewed") renewal = "expiry";
    } else if (
      r.pipelineId === options.renewalPipelineId &&
      r.pipelineStageId === options.renewalStageId
    ) {
      renewal = "start";
    }

    entries.push({
      start: r.startDate.getTime(),
      expiry: dayAfter(r.endDate).getTime(),
      cents,
      newBusiness: r.pipelineId === options.newBusinessPipelineId,
      renewal,
    });
  }
  return entries;
}

function openingCents(ledger: LedgerEntry[], at: Date): number {
  const t = startOfDay(at).getTime();
  let total = 0;
  for (const e of ledger) {
    if (e.start < t && t <= e.expiry) total += e.cents;
  }
  return total;
}

interface Movements {
  expiring: number;
  renewed: number;
  newBusiness: number;
}

function movementCents(ledger: LedgerEntry[], period: Period): Movements {
  const s = startOfDay(period.start).getTime();
  const e = startOfDay(period.end).getTime();
  const inPeriod = (t: number) => t >= s && t <= e;

  const totals: Movements = { expiring: 0, renewed: 0, newBusiness: 0 };
  for (const entry of ledger) {
    const expires = inPeriod(entry.expiry);
    const starts = inPeriod(entry.start);
    if (expires) totals.expiring += entry.cents;
    if (starts && entry.newBusiness) totals.newBusiness += entry.cents;
    if (entry.renewal === "expiry" ? expires : entry.renewal === "start" && starts) {
      totals.renewed += entry.cents;
    }
  }
  return totals;
}

/** ACV in force at the close of the day before `date`. */
export function openingAcv(records: SubscriptionRecord[], date: Date, options: BridgeOptions): number {
  return fromCents(openingCents(buildLedger(records, options), date));
}

/**
 * Roll ACV forward through consecutive sub-periods. The first opening is the
 * snapshot at the first period's start; every later opening is the previous
 * closing, so the final closing is opening - Σexpiring + Σrenewed + ΣnewBusiness.
 */
export function rollForward(
  records: SubscriptionRecord[],
  periods: Period[],
  options: BridgeOptions
): RollForwardResult {
  assertPeriodSequence(periods);
  const ledger = buildLedger(records, options);

  const opening = openingCents(ledger, periods[0].start);
  let balance = opening;
  const totals: Movements = { expiring: 0, renewed: 0, newBusiness: 0 };
  const bridges: PeriodBridge[] = [];

  for (const period of periods) {
    const m = movementCents(ledger, period);
    const closing = balance - m.expiring + m.renewed + m.newBusiness;

    bridges.push({
      period,
      opening: fromCents(balance),
      expiring: fromCents(m.expiring),
      renewed: fromCents(m.renewed),
      newBusiness: fromCents(m.newBusiness),
      closing: fromCents(closing),
    });

    totals.expiring += m.expiring;
    totals.renewed += m.renewed;
    totals.newBusiness += m.newBusiness;
    balance = closing;
  }

  return {
    opening: fromCents(opening),
    expiring: fromCents(totals.expiring),
    renewed: fromCents(totals.renewed),
    newBusiness: fromCents(totals.newBusiness),
    closing: fromCents(balance),
    periods: bridges,
  };
}

/** Bridge for a single period. */
export function computeBridge(
  records: SubscriptionRecord[],
  period: Period,
  options: BridgeOptions
): PeriodBridge {
  return rollForward(records, [period], options).periods[0];
}
