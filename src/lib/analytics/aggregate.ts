import type { DealProductAggregate, SubscriptionLineRow } from "@/types/subscriptions";

interface AggregateBucket {
  dealId: string;
  productCategory: string;
  totalAmount: number;
  startDate: Date;
  endDate: Date;
  /** bundle of the latest-ending line seen so far */
  productBundle: string | null;
  bundleEnd: Date;
  lineItemIds: Set<string>;
  lineItemCount: number;
}

function aggregateKey(dealId: string, productCategory: string): string {
  return `${dealId}\u0000${productCategory}`;
}

function pickBundle(bucket: AggregateBucket, bundle: string | null, end: Date): void {
  const cmp = end.getTime() - bucket.bundleEnd.getTime();
  if (cmp > 0) {
    bucket.productBundle = bundle;
    bucket.bundleEnd = end;
  } else if (cmp === 0 && bundle !== null) {
    if (bucket.productBundle === null || bundle.localeCompare(bucket.productBundle) < 0) {
      bucket.productBundle = bundle;
    }
  }
}

/**
 * Collapse line items into one row per (deal, product category).
 *
 * Bundles under the same category merge into a single span and sum.
 * Lines without a product are dropped (inner join on product), soft-deleted
 * amounts never reach the sum, and a line item repeated by the company
 * fan-out is counted once.
 */
export function aggregateDealProducts(rows: SubscriptionLineRow[]): DealProductAggregate[] {
  const buckets = new Map<string, AggregateBucket>();

  for (const row of rows) {
    if (!row.productId || !row.productCategory) continue;
    if (row.amountDeleted) continue;
    if (!row.startDate || !row.endDate) continue;

    const key = aggregateKey(row.dealId, row.productCategory);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = {
        dealId: row.dealId,
        productCategory: row.productCategory,
        totalAmount: 0,
        startDate: row.startDate,
        endDate: row.endDate,
        productBundle: row.productBundle,
        bundleEnd: row.endDate,
        lineItemIds: new Set(),
        lineItemCount: 0,
      };
      buckets.set(key, bucket);
    }

    // Same line item joined once per company: count it a single time
    if (row.lineItemId) {
      if (bucket.lineItemIds.has(row.lineItemId)) continue;
      bucket.lineItemIds.add(row.lineItemId);
    }

    bucket.lineItemCount++;
    bucket.totalAmount += row.amount ?? 0;
    if (row.startDate < bucket.startDate) bucket.startDate = row.startDate;
    if (row.endDate > bucket.endDate) bucket.endDate = row.endDate;
    pickBundle(bucket, row.productBundle, row.endDate);
  }

  return Array.from(buckets.values()).map((b) => ({
    dealId: b.dealId,
    productCategory: b.productCategory,
    productBundle: b.productBundle,
    totalAmount: Math.round(b.totalAmount * 100) / 100,
    startDate: b.startDate,
    endDate: b.endDate,
    lineItemCount: b.lineItemCount,
  }));
}

export function aggregateLookup(
  aggregates: DealProductAggregate[]
): (dealId: string, productCategory: string) => DealProductAggregate | undefined {
  const index = new Map<string, DealProductAggregate>();
  for (const agg of aggregates) {
    index.set(aggregateKey(agg.dealId, agg.productCategory), agg);
  }
  return (dealId, productCategory) => index.get(aggregateKey(dealId, productCategory));
}
