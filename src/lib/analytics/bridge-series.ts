import Papa from "papaparse";
import type { PeriodBridge, RollForwardResult, SeriesPoint } from "@/types/subscriptions";

// Waterfall input: (label, signed value) pairs. Decreases are negative,
// the first and last entries are absolute balances.

export const LABELS = {
  opening: "Opening ACV",
  expiring: "Expiring ACV",
  renewed: "Renewed ACV",
  newBusiness: "New Business ACV",
  closing: "Closing ACV",
} as const;

function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

type BridgeTotals = Pick<PeriodBridge, "opening" | "expiring" | "renewed" | "newBusiness" | "closing">;

export function bridgeSeries(bridge: BridgeTotals): SeriesPoint[] {
  return [
    { label: LABELS.opening, value: bridge.opening },
    { label: LABELS.expiring, value: negate(bridge.expiring) },
    { label: LABELS.renewed, value: bridge.renewed },
    { label: LABELS.newBusiness, value: bridge.newBusiness },
    { label: LABELS.closing, value: bridge.closing },
  ];
}

/** Five-bar view of a roll-forward's totals. */
export function summarySeries(result: RollForwardResult): SeriesPoint[] {
  return bridgeSeries(result);
}

/** Opening, then expiring/renewed/new business per sub-period, then closing. */
export function rollForwardSeries(result: RollForwardResult): SeriesPoint[] {
  const series: SeriesPoint[] = [{ label: LABELS.opening, value: result.opening }];
  for (const p of result.periods) {
    series.push(
      { label: `${p.period.label} Expiring`, value: negate(p.expiring) },
      { label: `${p.period.label} Renewed`, value: p.renewed },
      { label: `${p.period.label} New Business`, value: p.newBusiness }
    );
  }
  series.push({ label: LABELS.closing, value: result.closing });
  return series;
}

/**
 * Opening → expiring → new business → closing. Renewed ACV has no bar of its
 * own, so the closing bar still carries it.
 */
export function simplifiedSeries(bridge: BridgeTotals): SeriesPoint[] {
  return [
    { label: LABELS.opening, value: bridge.opening },
    { label: LABELS.expiring, value: negate(bridge.expiring) },
    { label: "New Business", value: bridge.newBusiness },
    { label: LABELS.closing, value: bridge.closing },
  ];
}

const gbp = new Intl.NumberFormat("en-GB", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** Bar text: absolute value in pounds, e.g. "£1,234.50" */
export function formatAcv(value: number): string {
  return `£${gbp.format(Math.abs(value))}`;
}

export function seriesToCsv(series: SeriesPoint[]): string {
  return Papa.unparse(
    series.map((p) => ({ label: p.label, value: p.value.toFixed(2) })),
    { columns: ["label", "value"] }
  );
}
