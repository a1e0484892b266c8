import { getPool } from "./database";
import { normalizeRecordKeys, parseCSV, parseRows } from "../parser/csv-parser";
import { SubscriptionLineSchema } from "../parser/schemas";
import {
  getCachedLoad,
  requestKey,
  setCachedLoad,
  type SourceRequest,
} from "../cache/query-cache";
import type { SubscriptionLineRow } from "@/types/subscriptions";

// ── Types ────────────────────────────────────────────────────

export interface SubscriptionLoadResult {
  rows: SubscriptionLineRow[];
  /** false when the source could not be reached or read */
  ok: boolean;
  warnings: string[];
  /** rows that failed schema validation */
  rejected: number;
  /** rows dropped because a subscription date could not be parsed */
  droppedDates: number;
}

export type QueryRunner = (sql: string) => Promise<{ rows: Record<string, unknown>[] }>;

export interface LoadOptions {
  /** Defaults to the shared pg pool */
  runQuery?: QueryRunner;
  cacheTtlMs?: number;
}

/**
 * Line items of every deal with their deal, stage, company and product
 * attributes. Stage and pipeline filtering happen in-process (canonicalize.ts)
 * so the query text, and with it the cache key, stays stable.
 *
 * Fan-out: a deal linked to several companies returns each line once per company.
 */
export const SUBSCRIPTION_LINES_QUERY = `
  SELECT
    deal.deal_id,
    deal.deal_pipeline_id,
    deal.deal_pipeline_stage_id,
    stage.label AS pipeline_stage_label,
    company.id AS company_id,
    company.property_name AS company_name,
    company.property_region_dfe_ AS region,
    line_item.id AS line_item_id,
    product.id AS product_id,
    product.property_product_category AS product_category,
    product.property_bundle AS product_bundle,
    line_item.property_amount AS amount,
    COALESCE(line_item._fivetran_deleted, FALSE) AS amount_deleted,
    line_item.property_subscription_start_date::date AS start_date,
    line_item.property_subscription_end_date::date AS end_date
  FROM hubspot.deal AS deal
  JOIN hubspot.deal_pipeline_stage AS stage
    ON stage.stage_id = deal.deal_pipeline_stage_id
  JOIN hubspot.deal_company AS deal_company
    ON deal_company.deal_id = deal.deal_id
  JOIN hubspot.company AS company
    ON company.id = deal_company.company_id
  JOIN hubspot.line_item_deal AS line_item_deal
    ON line_item_deal.deal_id = deal.deal_id
  JOIN hubspot.line_item AS line_item
    ON line_item.id = line_item_deal.line_item_id
  LEFT JOIN hubspot.product AS product
    ON product.id = line_item.product_id
  ORDER BY company.property_name, deal.deal_id
`;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function failed(message: string): SubscriptionLoadResult {
  return { rows: [], ok: false, warnings: [message], rejected: 0, droppedDates: 0 };
}

/** Validate raw rows and drop the ones whose dates did not parse. */
export function toSubscriptionLines(
  rawRows: unknown[],
  sourceLabel: string
): SubscriptionLoadResult {
  const { data, warnings, rejected } = parseRows(rawRows, SubscriptionLineSchema);
  return finish(data, warnings, rejected, sourceLabel);
}

function finish(
  data: SubscriptionLineRow[],
  warnings: string[],
  rejected: number,
  sourceLabel: string
): SubscriptionLoadResult {
  const rows = data.filter((r) => r.startDate !== null && r.endDate !== null);
  const droppedDates = data.length - rows.length;

  if (rejected > 0) {
    console.warn(`[subscription-source] ${sourceLabel}: ${rejected} rows failed validation`);
  }
  if (droppedDates > 0) {
    console.warn(`[subscription-source] ${sourceLabel}: dropped ${droppedDates} rows with unparseable dates`);
    warnings.push(`Dropped ${droppedDates} rows with unparseable subscription dates.`);
  }
  if (rows.length === 0) {
    warnings.push("No data returned from the query.");
  } else {
    console.log(`[subscription-source] ${sourceLabel}: loaded ${rows.length} line items`);
  }

  return { rows, ok: true, warnings, rejected, droppedDates };
}

// ── Loaders ──────────────────────────────────────────────────

export async function loadFromDatabase(
  query: string = SUBSCRIPTION_LINES_QUERY,
  runQuery?: QueryRunner
): Promise<SubscriptionLoadResult> {
  try {
    const run: QueryRunner = runQuery ?? ((sql) => getPool().query<Record<string, unknown>>(sql));
    const { rows } = await run(query);
    return toSubscriptionLines(rows.map(normalizeRecordKeys), "postgres");
  } catch (err) {
    console.warn("[subscription-source] Database load failed:", err);
    return failed(`Failed to load subscription data: ${errorMessage(err)}`);
  }
}

export function loadFromCsv(filePath: string): SubscriptionLoadResult {
  try {
    const { data, warnings, rejected } = parseCSV(filePath, SubscriptionLineSchema);
    return finish(data, warnings, rejected, filePath.split("/").pop() || filePath);
  } catch (err) {
    console.warn(`[subscription-source] CSV load failed for ${filePath}:`, err);
    return failed(`Failed to load subscription data: ${errorMessage(err)}`);
  }
}

/**
 * Load line items for a request, memoized per request descriptor.
 * Failed loads are not cached so the next interaction retries.
 */
export async function loadSubscriptionLines(
  request: SourceRequest,
  options: LoadOptions = {}
): Promise<SubscriptionLoadResult> {
  const key = requestKey(request);
  const cached = getCachedLoad(key);
  if (cached) return cached;

  const result =
    request.kind === "csv"
      ? loadFromCsv(request.filePath)
      : await loadFromDatabase(request.query, options.runQuery);

  if (result.ok) setCachedLoad(key, result, options.cacheTtlMs);
  return result;
}
