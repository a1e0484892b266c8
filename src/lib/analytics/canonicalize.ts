import type {
  CanonicalSubscription,
  DealProductAggregate,
  SubscriptionLineRow,
} from "@/types/subscriptions";
import { aggregateLookup } from "./aggregate";

/** Stage labels that represent a booked (or booked-then-cancelled) subscription */
export const SUBSCRIPTION_STAGE_LABELS = [
  "Closed won",
  "Closed Won Approved",
  "Renewal due",
  "Cancelled Subscription",
];

const STAGE_LABEL_SET = new Set(SUBSCRIPTION_STAGE_LABELS.map((l) => l.toLowerCase()));

export interface CanonicalizeOptions {
  pipelineAllowList: string[];
  stageLabels?: string[];
}

export function canonicalKey(
  record: Pick<CanonicalSubscription, "dealId" | "companyId" | "productCategory">
): string {
  return `${record.dealId}\u0000${record.companyId}\u0000${record.productCategory}`;
}

/**
 * One record per (deal, company, product category). When the upstream join
 * fans out into several rows for the same key, the latest end date wins;
 * equal end dates keep the first row seen.
 */
export function dedupeSubscriptions<T extends CanonicalSubscription>(records: T[]): T[] {
  const kept = new Map<string, T>();

  for (const record of records) {
    const key = canonicalKey(record);
    const existing = kept.get(key);
    if (!existing || record.endDate.getTime() > existing.endDate.getTime()) {
      kept.set(key, record);
    }
  }

  return Array.from(kept.values());
}

/** Company name A→Z, then latest end date first (the report's natural listing order) */
export function compareSubscriptions(a: CanonicalSubscription, b: CanonicalSubscription): number {
  return (
    a.companyName.localeCompare(b.companyName) ||
    b.endDate.getTime() - a.endDate.getTime() ||
    a.dealId.localeCompare(b.dealId) ||
    a.productCategory.localeCompare(b.productCategory)
  );
}

/**
 * Join aggregated deal/category rows back to their deal and company attributes,
 * keep only booked stages on allowed pipelines, and deduplicate.
 */
export function canonicalizeSubscriptions(
  rows: SubscriptionLineRow[],
  aggregates: DealProductAggregate[],
  options: CanonicalizeOptions
): CanonicalSubscription[] {
  const stageLabels = options.stageLabels
    ? new Set(options.stageLabels.map((l) => l.toLowerCase()))
    : STAGE_LABEL_SET;
  const pipelines = new Set(options.pipelineAllowList);
  const lookup = aggregateLookup(aggregates);

  const joined: CanonicalSubscription[] = [];
  for (const row of rows) {
    if (!row.productCategory) continue;
    if (!stageLabels.has(row.pipelineStageLabel.toLowerCase())) continue;
    if (!pipelines.has(row.pipelineId)) continue;

    const agg = lookup(row.dealId, row.productCategory);
    if (!agg) continue;

    joined.push({
      dealId: row.dealId,
      pipelineId: row.pipelineId,
      pipelineStageId: row.pipelineStageId,
      companyId: row.companyId,
      companyName: row.companyName,
      region: row.region,
      productCategory: agg.productCategory,
      productBundle: agg.productBundle,
      startDate: agg.startDate,
      endDate: agg.endDate,
      totalAmount: agg.totalAmount,
    });
  }

  return dedupeSubscriptions(joined).sort(compareSubscriptions);
}
