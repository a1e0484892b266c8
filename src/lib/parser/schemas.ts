import { z } from "zod";
import { parseDate } from "../analytics/date-utils";

/**
 * Zod schema for one subscription line item.
 * Field names match the source columns after normalizeHeader() camelCase conversion
 * and alias mapping, so the same schema validates pg rows and CSV exports.
 */

/** Required identifier: strings or numeric ids, trimmed, never empty */
const id = z
  .string()
  .or(z.number())
  .transform((val) => String(val).trim())
  .pipe(z.string().min(1, "is required"));

/** Optional text: null/undefined/blank become null */
const optionalText = z
  .unknown()
  .transform((val) => {
    if (val == null) return null;
    const s = String(val).trim();
    return s === "" ? null : s;
  });

const text = optionalText.transform((val) => val ?? "");

/** Transform "£1,200.00", "1200" or 1200 to a number; blank stays null */
const money = z
  .unknown()
  .transform((val) => {
    if (val == null) return null;
    if (typeof val === "number") return Number.isFinite(val) ? val : null;
    const cleaned = String(val).replace(/[£$€,]/g, "").trim();
    if (cleaned === "") return null;
    const num = parseFloat(cleaned);
    return isNaN(num) ? null : num;
  });

const flag = z
  .unknown()
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    if (typeof val === "string") return ["true", "1", "yes"].includes(val.trim().toLowerCase());
    return false;
  });

/** Unparseable dates become null; the source drops such rows later. */
const date = z
  .unknown()
  .transform((val) => {
    if (val instanceof Date) return parseDate(val);
    if (typeof val === "string") return parseDate(val);
    return null;
  });

export const SubscriptionLineSchema = z.object({
  dealId: id,
  pipelineId: text,
  pipelineStageId: text,
  pipelineStageLabel: text,
  companyId: id,
  companyName: text,
  region: optionalText,
  lineItemId: optionalText,
  productId: optionalText,
  productCategory: optionalText,
  productBundle: optionalText,
  amount: money,
  amountDeleted: flag,
  startDate: date,
  endDate: date,
});

