import { ALL } from "@/types/subscriptions";
import type {
  DimensionOptions,
  DimensionSelection,
  SubscriptionRecord,
} from "@/types/subscriptions";

type Predicate = (record: SubscriptionRecord) => boolean;

function isAll(value: string | undefined): boolean {
  return value === undefined || value === ALL;
}

function buildPredicates(selection: DimensionSelection): Predicate[] {
  const predicates: Predicate[] = [];
  const { region, productCategory, productBundle } = selection;

  if (!isAll(region)) predicates.push((r) => r.region === region);
  if (!isAll(productCategory)) predicates.push((r) => r.productCategory === productCategory);
  if (!isAll(productBundle)) predicates.push((r) => r.productBundle === productBundle);

  return predicates;
}

/**
 * Restrict records to the selected region / category / bundle.
 * "All" (or a missing key) leaves that dimension unfiltered; records with no
 * value for a dimension only survive "All".
 */
export function applyFilters(
  records: SubscriptionRecord[],
  selection: DimensionSelection
): SubscriptionRecord[] {
  const predicates = buildPredicates(selection);
  if (predicates.length === 0) return records;
  return records.filter((r) => predicates.every((p) => p(r)));
}

function distinct(values: (string | null)[]): string[] {
  const set = new Set<string>();
  for (const v of values) {
    if (v) set.add(v);
  }
  return [ALL, ...Array.from(set).sort((a, b) => a.localeCompare(b))];
}

/** Selectable values per dimension, "All" first. */
export function getFilterOptions(records: SubscriptionRecord[]): DimensionOptions {
  return {
    regions: distinct(records.map((r) => r.region)),
    productCategories: distinct(records.map((r) => r.productCategory)),
    productBundles: distinct(records.map((r) => r.productBundle)),
  };
}
