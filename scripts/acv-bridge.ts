/**
 * Print ACV bridges for one selection.
 *
 * Loads subscription line items from PostgreSQL (DATABASE_URL) or a CSV export,
 * then prints the annual bridge and any requested roll-forwards.
 *
 * Usage: npx tsx scripts/acv-bridge.ts --year 2025 --start-month 1 --end-month 6
 *        npx tsx scripts/acv-bridge.ts --csv exports/line-items.csv --months 2025-01,2025-04
 */

import * as dotenv from "dotenv";
dotenv.config({ path: ".env" });
dotenv.config({ path: ".env.local", override: true });

import { writeFileSync } from "fs";
import { parseReportArgs, USAGE, type ParsedReportArgs } from "../src/lib/cli/report-args";
import { runAcvReport, type RangeView } from "../src/lib/analytics/acv-report";
import { formatAcv, seriesToCsv } from "../src/lib/analytics/bridge-series";
import { closePool } from "../src/lib/db/database";
import type { SeriesPoint } from "../src/types/subscriptions";

function printSeries(title: string, series: SeriesPoint[]): void {
  console.log(`\n=== ${title} ===`);
  for (const point of series) {
    const sign = point.value < 0 ? "-" : " ";
    console.log(`  ${point.label.padEnd(32)} ${sign}${formatAcv(point.value)}`);
  }
}

function printRange(title: string, view: RangeView | null): void {
  if (!view) return;
  printSeries(title, view.summary);
  console.table(
    view.result.periods.map((p) => ({
      period: p.period.label,
      opening: p.opening,
      expiring: p.expiring,
      renewed: p.renewed,
      newBusiness: p.newBusiness,
      closing: p.closing,
    }))
  );
}

async function main() {
  let parsed: ParsedReportArgs;
  try {
    parsed = parseReportArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    console.error(USAGE);
    process.exit(1);
  }

  const { request, outFile } = parsed;
  const report = await runAcvReport(request);

  for (const warning of report.warnings) console.warn(`[!] ${warning}`);
  for (const error of report.validationErrors) console.error(`[x] ${error}`);

  console.log(`\n${report.recordCount} subscriptions after filters`);
  for (const row of report.renewalSummary) {
    console.log(`  ${row.status.padEnd(16)} ${String(row.count).padStart(6)}  ${formatAcv(row.acv)}`);
  }

  if (!report.yearView) {
    process.exitCode = 1;
    return;
  }

  printSeries(`ACV Breakdown for ${request.year}`, report.yearView.series);
  printRange("Month range", report.monthRangeView);
  printRange("Date range", report.dateRangeView);
  printRange("Selected months", report.discreteMonthView);

  if (outFile) {
    const view = report.monthRangeView ?? report.dateRangeView ?? report.discreteMonthView;
    writeFileSync(outFile, seriesToCsv(view ? view.series : report.yearView.series));
    console.log(`\nSeries written to ${outFile}`);
  }
}

main()
  .catch((err) => {
    console.error("ACV report failed:", err);
    process.exitCode = 1;
  })
  .finally(() => closePool());
