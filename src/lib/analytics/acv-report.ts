/**
 * ACV report: one rendering pass over the subscription data.
 *
 *  1. Load line items (memoized per source request)
 *  2. Aggregate per (deal, category), canonicalize, classify renewals
 *  3. Apply the dimension filters
 *  4. Year bridge plus the optional month-range, date-range and
 *     discrete-month roll-forwards
 *
 * Source failures, invalid period selections and unusable bridge options
 * never throw: they come back
 * as warnings / validation messages next to whatever could be computed.
 */

import type {
  BridgeOptions,
  DimensionOptions,
  DimensionSelection,
  Period,
  PeriodBridge,
  RenewalPolicy,
  RollForwardResult,
  SeriesPoint,
  SubscriptionLineRow,
  SubscriptionRecord,
} from "@/types/subscriptions";
import { getEnv } from "../config/env";
import type { SourceRequest } from "../cache/query-cache";
import { loadSubscriptionLines, type LoadOptions } from "../db/subscription-source";
import { aggregateDealProducts } from "./aggregate";
import { canonicalizeSubscriptions } from "./canonicalize";
import { classifySubscriptions, summarizeRenewals, type RenewalSummaryRow } from "./renewals";
import { applyFilters, getFilterOptions } from "./filters";
import {
  dateRangePeriod,
  discreteMonthPeriods,
  monthlyPeriods,
  monthRangePeriods,
  validateDateRange,
  validateMonthRange,
  yearPeriod,
} from "./periods";
import { computeBridge, rollForward, validateBridgeOptions } from "./rollforward";
import { bridgeSeries, rollForwardSeries, simplifiedSeries, summarySeries } from "./bridge-series";

export interface RecordBuildOptions {
  pipelineAllowList: string[];
  asOf: Date;
  renewalPolicy: RenewalPolicy;
}

/** Aggregate → canonicalize → classify. */
export function buildSubscriptionRecords(
  rows: SubscriptionLineRow[],
  options: RecordBuildOptions
): SubscriptionRecord[] {
  const aggregates = aggregateDealProducts(rows);
  const canonical = canonicalizeSubscriptions(rows, aggregates, {
    pipelineAllowList: options.pipelineAllowList,
  });
  return classifySubscriptions(canonical, {
    asOf: options.asOf,
    renewalPolicy: options.renewalPolicy,
  });
}

export interface AcvReportRequest {
  source: SourceRequest;
  year: number;
  selection?: DimensionSelection;
  /** 1-12, both required for the month-range view */
  startMonth?: number;
  endMonth?: number;
  dateRange?: { start: Date; end: Date };
  /** "YYYY-MM" keys for a discrete month selection */
  months?: string[];
  asOf?: Date;
  renewalPolicy?: RenewalPolicy;
  bridge?: Partial<BridgeOptions>;
  pipelineAllowList?: string[];
}

export interface RangeView {
  periods: Period[];
  result: RollForwardResult;
  /** opening, per-period movements, closing */
  series: SeriesPoint[];
  /** five bars over the whole range */
  summary: SeriesPoint[];
  simplified: SeriesPoint[];
}

export interface YearView {
  bridge: PeriodBridge;
  series: SeriesPoint[];
  simplified: SeriesPoint[];
}

export interface AcvReport {
  warnings: string[];
  validationErrors: string[];
  recordCount: number;
  filterOptions: DimensionOptions;
  renewalSummary: RenewalSummaryRow[];
  /** null when the bridge options are unusable */
  yearView: YearView | null;
  monthRangeView: RangeView | null;
  dateRangeView: RangeView | null;
  discreteMonthView: RangeView | null;
}

function rangeView(
  records: SubscriptionRecord[],
  periods: Period[],
  options: BridgeOptions
): RangeView {
  const result = rollForward(records, periods, options);
  return {
    periods,
    result,
    series: rollForwardSeries(result),
    summary: summarySeries(result),
    simplified: simplifiedSeries(result),
  };
}

export function resolveBridgeOptions(overrides: Partial<BridgeOptions> = {}): BridgeOptions {
  const env = getEnv();
  return {
    renewalDetection: overrides.renewalDetection ?? env.ACV_RENEWAL_DETECTION,
    newBusinessPipelineId: overrides.newBusinessPipelineId ?? env.ACV_NEW_BUSINESS_PIPELINE_ID,
    renewalPipelineId: overrides.renewalPipelineId ?? env.ACV_RENEWAL_PIPELINE_ID,
    renewalStageId: overrides.renewalStageId ?? env.ACV_RENEWAL_STAGE_ID,
  };
}

/** Compute every view for already-classified records. */
export function buildAcvReport(
  allRecords: SubscriptionRecord[],
  request: Omit<AcvReportRequest, "source">,
  warnings: string[] = []
): AcvReport {
  const bridgeOptions = resolveBridgeOptions(request.bridge);
  const records = applyFilters(allRecords, request.selection ?? {});
  const validationErrors: string[] = [];

  const base = {
    warnings,
    validationErrors,
    recordCount: records.length,
    filterOptions: getFilterOptions(allRecords),
    renewalSummary: summarizeRenewals(records),
  };

  const optionsError = validateBridgeOptions(bridgeOptions);
  if (optionsError) {
    validationErrors.push(optionsError);
    return { ...base, yearView: null, monthRangeView: null, dateRangeView: null, discreteMonthView: null };
  }

  const yearBridge = computeBridge(records, yearPeriod(request.year), bridgeOptions);

  let monthRangeView: RangeView | null = null;
  if (request.startMonth !== undefined && request.endMonth !== undefined) {
    const error = validateMonthRange(request.startMonth, request.endMonth);
    if (error) {
      validationErrors.push(error);
    } else {
      monthRangeView = rangeView(
        records,
        monthRangePeriods(request.year, request.startMonth, request.endMonth),
        bridgeOptions
      );
    }
  }

  let dateRangeView: RangeView | null = null;
  if (request.dateRange) {
    const { start, end } = request.dateRange;
    const error = validateDateRange(start, end);
    if (error) {
      validationErrors.push(error);
    } else {
      const periods = monthlyPeriods(start, end);
      dateRangeView = {
        ...rangeView(records, periods, bridgeOptions),
        summary: bridgeSeries(computeBridge(records, dateRangePeriod(start, end), bridgeOptions)),
      };
    }
  }

  let discreteMonthView: RangeView | null = null;
  if (request.months && request.months.length > 0) {
    try {
      discreteMonthView = rangeView(records, discreteMonthPeriods(request.months), bridgeOptions);
    } catch (err) {
      validationErrors.push(err instanceof Error ? err.message : String(err));
    }
  }

  return {
    ...base,
    yearView: {
      bridge: yearBridge,
      series: bridgeSeries(yearBridge),
      simplified: simplifiedSeries(yearBridge),
    },
    monthRangeView,
    dateRangeView,
    discreteMonthView,
  };
}

/** Load, transform and report for one user selection. */
export async function runAcvReport(
  request: AcvReportRequest,
  loadOptions: LoadOptions = {}
): Promise<AcvReport> {
  const env = getEnv();
  const loaded = await loadSubscriptionLines(request.source, {
    cacheTtlMs: env.CACHE_TTL_MS,
    ...loadOptions,
  });

  if (!loaded.ok) {
    console.warn("[acv-report] Source unavailable, reporting on an empty record set");
  }

  const records = buildSubscriptionRecords(loaded.rows, {
    pipelineAllowList: request.pipelineAllowList ?? env.ACV_PIPELINE_ALLOW_LIST,
    asOf: request.asOf ?? new Date(),
    renewalPolicy: request.renewalPolicy ?? env.ACV_RENEWAL_POLICY,
  });
  console.log(`[acv-report] ${records.length} subscriptions from ${loaded.rows.length} line items`);

  return buildAcvReport(records, request, [...loaded.warnings]);
}
