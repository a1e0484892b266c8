import Papa from "papaparse";
import { readFileSync } from "fs";
import { z } from "zod";

/**
 * Column name aliases: maps source column names (after camelCase conversion)
 * to our schema field names. The warehouse query and the HubSpot CSV export
 * use "deal_pipeline_id", "property_product_category" etc.
 */
const COLUMN_ALIASES: Record<string, string> = {
  // Deal
  dealPipelineId: "pipelineId",
  dealPipelineStageId: "pipelineStageId",
  stageId: "pipelineStageId",
  label: "pipelineStageLabel",
  stageLabel: "pipelineStageLabel",
  // Company
  propertyName: "companyName",
  propertyRegionDfe: "region",
  // Product
  propertyProductCategory: "productCategory",
  propertyBundle: "productBundle",
  // Line item
  propertyAmount: "amount",
  amountIsDeleted: "amountDeleted",
  fivetranDeleted: "amountDeleted",
  propertySubscriptionStartDate: "startDate",
  propertySubscriptionEndDate: "endDate",
  minSubscriptionStartDate: "startDate",
  maxSubscriptionEndDate: "endDate",
};

/**
 * Normalize column headers to camelCase keys, then apply aliases.
 * E.g., "deal_pipeline_id" -> "dealPipelineId" -> "pipelineId"
 *       "property_region_dfe_" -> "propertyRegionDfe" -> "region"
 *       "Company ID" -> "companyId"
 *
 * Must be idempotent: PapaParse may call transformHeader twice.
 */
export function normalizeHeader(header: string): string {
  const trimmed = header.trim();

  if (/^[a-z][a-zA-Z0-9]*$/.test(trimmed)) {
    return COLUMN_ALIASES[trimmed] || trimmed;
  }

  const camelCase = trimmed
    .replace(/[^A-Za-z0-9]+$/, "")
    .replace(/^[^A-Za-z0-9]+/, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+(.)/g, (_, char: string) => char.toUpperCase());

  return COLUMN_ALIASES[camelCase] || camelCase;
}

/** Re-key a driver row the same way CSV headers are normalized. */
export function normalizeRecordKeys(row: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    out[normalizeHeader(key)] = value;
  }
  return out;
}

/**
 * Validate already-keyed rows against a Zod schema.
 * Returns validated rows and warnings for the first rows that failed validation.
 */
export function parseRows<T>(
  rows: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { data: T[]; warnings: string[]; rejected: number } {
  const data: T[] = [];
  const warnings: string[] = [];
  let rejected = 0;

  for (let i = 0; i < rows.length; i++) {
    const result = schema.safeParse(rows[i]);

    if (result.success) {
      data.push(result.data);
    } else {
      rejected++;
      // Only warn for the first few rows to avoid spam
      if (warnings.length < 10) {
        warnings.push(
          `Row ${i + 1}: ${result.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`
        );
      }
    }
  }

  return { data, warnings, rejected };
}

/** Parse CSV text with header normalization and validate each row. */
export function parseCSVText<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { data: T[]; warnings: string[]; rejected: number } {
  // Remove BOM if present
  const cleanContent = content.replace(/^\uFEFF/, "");

  const parsed = Papa.parse<Record<string, string>>(cleanContent, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: normalizeHeader,
  });

  const result = parseRows(parsed.data, schema);

  if (parsed.errors.length > 0) {
    result.warnings.push(
      ...parsed.errors.slice(0, 5).map((e) => `CSV parse error at row ${e.row}: ${e.message}`)
    );
  }

  return result;
}

/** Parse a CSV file from disk. */
export function parseCSV<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { data: T[]; warnings: string[]; rejected: number } {
  const fileContent = readFileSync(filePath, "utf8");
  const result = parseCSVText(fileContent, schema);

  const shortPath = filePath.split("/").pop() || filePath;
  console.log(
    `[csv-parser] ${shortPath}: ${result.data.length} valid rows, ${result.rejected} rejected`
  );

  return result;
}
