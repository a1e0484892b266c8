import { z } from "zod";
import { parseDate } from "../analytics/date-utils";
import { SUBSCRIPTION_LINES_QUERY } from "../db/subscription-source";
import type { AcvReportRequest } from "../analytics/acv-report";
import type { BridgeOptions } from "@/types/subscriptions";

export const USAGE = `Usage: npx tsx scripts/acv-bridge.ts [options]

  --csv <file>            read line items from a CSV export instead of PostgreSQL
  --year <yyyy>           year for the annual bridge (2020-2030, default: current year)
  --start-month <1-12>    month-range roll-forward start
  --end-month <1-12>      month-range roll-forward end
  --from <yyyy-mm-dd>     date-range roll-forward start
  --to <yyyy-mm-dd>       date-range roll-forward end
  --months <list>         discrete months, e.g. 2025-01,2025-04
  --region <name>         region filter (default: All)
  --category <name>       product category filter (default: All)
  --bundle <name>         product bundle filter (default: All)
  --policy <name>         rolling-window | calendar-year
  --detection <name>      renewal-period | pipeline-stage
  --renewal-pipeline <id> renewal pipeline for pipeline-stage detection
  --renewal-stage <id>    renewal stage for pipeline-stage detection
  --as-of <yyyy-mm-dd>    report date for LIVE/EXPIRED (default: today)
  --out <file>            write the main series as CSV`;

const argsSchema = z.object({
  csv: z.string().optional(),
  year: z.coerce.number().int().min(2020).max(2030).optional(),
  startMonth: z.coerce.number().int().optional(),
  endMonth: z.coerce.number().int().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  months: z.string().optional(),
  region: z.string().optional(),
  category: z.string().optional(),
  bundle: z.string().optional(),
  policy: z.enum(["rolling-window", "calendar-year"]).optional(),
  detection: z.enum(["renewal-period", "pipeline-stage"]).optional(),
  renewalPipeline: z.string().optional(),
  renewalStage: z.string().optional(),
  asOf: z.string().optional(),
  out: z.string().optional(),
});

export interface ParsedReportArgs {
  request: AcvReportRequest;
  outFile?: string;
}

function toCamel(flag: string): string {
  return flag.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

function toKebab(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/** Split "--name value" pairs into a plain object. */
function collectFlags(argv: string[]): Record<string, string> {
  const flags: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) throw new Error(`Unexpected argument "${arg}"`);
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${arg}`);
    }
    flags[toCamel(arg.slice(2))] = value;
    i++;
  }
  return flags;
}

function requireDate(value: string, flag: string): Date {
  const date = parseDate(value);
  if (!date) throw new Error(`Invalid date for ${flag}: "${value}"`);
  return date;
}

/** Turn CLI arguments into a report request. Throws with a readable message. */
export function parseReportArgs(argv: string[], today: Date = new Date()): ParsedReportArgs {
  const result = argsSchema.strict().safeParse(collectFlags(argv));
  if (!result.success) {
    throw new Error(
      result.error.issues
        .map((i) => (i.path.length > 0 ? `--${toKebab(i.path.join("."))}: ${i.message}` : i.message))
        .join("; ")
    );
  }
  const args = result.data;

  if ((args.from === undefined) !== (args.to === undefined)) {
    throw new Error("--from and --to must be given together");
  }
  if ((args.startMonth === undefined) !== (args.endMonth === undefined)) {
    throw new Error("--start-month and --end-month must be given together");
  }

  const bridge: Partial<BridgeOptions> = {};
  if (args.detection) bridge.renewalDetection = args.detection;
  if (args.renewalPipeline) bridge.renewalPipelineId = args.renewalPipeline;
  if (args.renewalStage) bridge.renewalStageId = args.renewalStage;

  const request: AcvReportRequest = {
    source: args.csv
      ? { kind: "csv", filePath: args.csv }
      : { kind: "postgres", query: SUBSCRIPTION_LINES_QUERY },
    year: args.year ?? today.getFullYear(),
    selection: {
      region: args.region,
      productCategory: args.category,
      productBundle: args.bundle,
    },
    startMonth: args.startMonth,
    endMonth: args.endMonth,
    months: args.months
      ?.split(",")
      .map((m) => m.trim())
      .filter((m) => m.length > 0),
    asOf: args.asOf ? requireDate(args.asOf, "--as-of") : undefined,
    renewalPolicy: args.policy,
    bridge: Object.keys(bridge).length > 0 ? bridge : undefined,
  };

  if (args.from !== undefined && args.to !== undefined) {
    request.dateRange = {
      start: requireDate(args.from, "--from"),
      end: requireDate(args.to, "--to"),
    };
  }

  return { request, outFile: args.out };
}
