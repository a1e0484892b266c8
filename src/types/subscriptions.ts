/**
 * One line item as returned by the source query (or CSV export).
 * Deal, company and product attributes are joined in, so a line item
 * linked to several companies appears once per company.
 */
export interface SubscriptionLineRow {
  dealId: string;
  pipelineId: string;
  pipelineStageId: string;
  pipelineStageLabel: string;
  companyId: string;
  companyName: string;
  region: string | null; // older query variants have no region column
  lineItemId: string | null;
  productId: string | null;
  productCategory: string | null;
  productBundle: string | null;
  amount: number | null;
  amountDeleted: boolean;
  startDate: Date | null;
  endDate: Date | null;
}

export interface DealProductAggregate {
  dealId: string;
  productCategory: string;
  productBundle: string | null;
  totalAmount: number;
  startDate: Date;
  endDate: Date;
  lineItemCount: number;
}

/** A deduplicated subscription before status/renewal classification. */
export interface CanonicalSubscription {
  dealId: string;
  pipelineId: string;
  pipelineStageId: string;
  companyId: string;
  companyName: string;
  region: string | null;
  productCategory: string;
  productBundle: string | null;
  startDate: Date;
  endDate: Date;
  totalAmount: number;
}

export type SubscriptionStatus = "LIVE" | "EXPIRED";

export type RenewalStatus = "Renewed" | "Not Renewed" | "Due for Renewal";

export type FinalRenewalStatus = "Renewed" | "Due for Renewal" | "Non Renewal";

export interface SubscriptionRecord extends CanonicalSubscription {
  /** null when the span has no days; contributes zero everywhere */
  acv: number | null;
  status: SubscriptionStatus;
  /** "YYYY-MM" of the day after endDate */
  renewalPeriod: string;
  renewalStatus: RenewalStatus;
  finalRenewalStatus: FinalRenewalStatus;
}

/**
 * How a record's expired subscription is matched to a sibling renewal.
 * - rolling-window: sibling starts within [start, end + 1 year]
 * - calendar-year:  sibling starts in the same calendar year this one ends
 */
export type RenewalPolicy = "rolling-window" | "calendar-year";

/**
 * Which records make up "Renewed ACV" in a period.
 * - renewal-period: records classified Renewed whose renewal date falls in the period
 * - pipeline-stage: renewal-pipeline deals at the renewal stage starting in the period
 */
export type RenewalDetection = "renewal-period" | "pipeline-stage";

export const ALL = "All" as const;

export interface DimensionSelection {
  region?: string;
  productCategory?: string;
  productBundle?: string;
}

export interface DimensionOptions {
  regions: string[];
  productCategories: string[];
  productBundles: string[];
}

/** Inclusive day range */
export interface Period {
  label: string;
  start: Date;
  end: Date;
}

export interface PeriodBridge {
  period: Period;
  opening: number;
  expiring: number;
  renewed: number;
  newBusiness: number;
  closing: number;
}

export interface RollForwardResult {
  opening: number;
  expiring: number;
  renewed: number;
  newBusiness: number;
  closing: number;
  periods: PeriodBridge[];
}

export interface BridgeOptions {
  renewalDetection: RenewalDetection;
  newBusinessPipelineId: string;
  renewalPipelineId?: string;
  renewalStageId?: string;
}

export interface SeriesPoint {
  label: string;
  value: number;
}
