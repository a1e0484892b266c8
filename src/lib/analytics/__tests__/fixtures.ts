import { parseISO } from "date-fns";
import type {
  BridgeOptions,
  CanonicalSubscription,
  SubscriptionLineRow,
  SubscriptionRecord,
} from "@/types/subscriptions";

/** Local-midnight date from "YYYY-MM-DD" */
export function day(iso: string): Date {
  return parseISO(iso);
}

export function line(overrides: Partial<SubscriptionLineRow> = {}): SubscriptionLineRow {
  return {
    dealId: "D1",
    pipelineId: "default",
    pipelineStageId: "closedwon",
    pipelineStageLabel: "Closed won",
    companyId: "C1",
    companyName: "Acme",
    region: "EMEA",
    lineItemId: "L1",
    productId: "P1",
    productCategory: "Software",
    productBundle: "Core",
    amount: 1200,
    amountDeleted: false,
    startDate: day("2023-01-01"),
    endDate: day("2023-12-31"),
    ...overrides,
  };
}

export function canonical(overrides: Partial<CanonicalSubscription> = {}): CanonicalSubscription {
  return {
    dealId: "D1",
    pipelineId: "default",
    pipelineStageId: "closedwon",
    companyId: "C1",
    companyName: "Acme",
    region: "EMEA",
    productCategory: "Software",
    productBundle: "Core",
    startDate: day("2023-01-01"),
    endDate: day("2023-12-31"),
    totalAmount: 1200,
    ...overrides,
  };
}

export function record(overrides: Partial<SubscriptionRecord> = {}): SubscriptionRecord {
  return {
    ...canonical(),
    acv: 1200,
    status: "EXPIRED",
    renewalPeriod: "2024-01",
    renewalStatus: "Not Renewed",
    finalRenewalStatus: "Non Renewal",
    ...overrides,
  };
}

export const RENEWAL_PERIOD_OPTIONS: BridgeOptions = {
  renewalDetection: "renewal-period",
  newBusinessPipelineId: "default",
};

/**
 * Five subscriptions touching 2024:
 *  a  2023-03-01..2024-02-29  1200     default  Renewed      expires 2024-03-01
 *  b  2024-03-01..2025-02-28  1500     renewal  Due          starts 2024-03-01
 *  c  2024-05-15..2024-11-14  800      default  Non Renewal  expires 2024-11-15
 *  d  2023-01-01..2023-12-31  600      default  Non Renewal  expires 2024-01-01
 *  e  2024-07-01..2025-06-30  250.55   default  Due
 */
export function ledgerScenario(): SubscriptionRecord[] {
  return [
    record({
      dealId: "a",
      startDate: day("2023-03-01"),
      endDate: day("2024-02-29"),
      acv: 1200,
      renewalStatus: "Renewed",
      finalRenewalStatus: "Renewed",
    }),
    record({
      dealId: "b",
      pipelineId: "1305376",
      pipelineStageId: "renewal-won",
      startDate: day("2024-03-01"),
      endDate: day("2025-02-28"),
      acv: 1500,
      status: "LIVE",
      renewalStatus: "Due for Renewal",
      finalRenewalStatus: "Due for Renewal",
    }),
    record({
      dealId: "c",
      productCategory: "Services",
      startDate: day("2024-05-15"),
      endDate: day("2024-11-14"),
      acv: 800,
    }),
    record({
      dealId: "d",
      companyId: "C2",
      startDate: day("2023-01-01"),
      endDate: day("2023-12-31"),
      acv: 600,
    }),
    record({
      dealId: "e",
      companyId: "C3",
      startDate: day("2024-07-01"),
      endDate: day("2025-06-30"),
      acv: 250.55,
      status: "LIVE",
      renewalStatus: "Due for Renewal",
      finalRenewalStatus: "Due for Renewal",
    }),
  ];
}
