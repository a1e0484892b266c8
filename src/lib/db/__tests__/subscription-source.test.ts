import { fileURLToPath } from "url";
import { types } from "pg";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  loadFromCsv,
  loadFromDatabase,
  loadSubscriptionLines,
  type QueryRunner,
} from "../subscription-source";
import { getCacheAge, invalidateSubscriptionCache, requestKey } from "../../cache/query-cache";
import { getDateKey } from "../../analytics/date-utils";
import { PG_DATE_OID } from "../database";

const FIXTURE = fileURLToPath(new URL("./fixtures/subscription-lines.csv", import.meta.url));

function driverRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    deal_id: "3001",
    deal_pipeline_id: "default",
    deal_pipeline_stage_id: "closedwon",
    pipeline_stage_label: "Closed won",
    company_id: "C1",
    company_name: "Acme",
    region: "EMEA",
    line_item_id: "L1",
    product_id: "P1",
    product_category: "Software",
    product_bundle: "Core",
    amount: "1200.00",
    amount_deleted: false,
    start_date: new Date(2024, 0, 1),
    end_date: new Date(2024, 11, 31),
    ...overrides,
  };
}

function runner(rows: Record<string, unknown>[]) {
  return vi.fn<QueryRunner>().mockResolvedValue({ rows });
}

beforeEach(() => {
  invalidateSubscriptionCache();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("loadFromDatabase", () => {
  it("maps driver columns onto line items", async () => {
    const result = await loadFromDatabase("SELECT 1", runner([driverRow()]));

    expect(result.ok).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.rows).toHaveLength(1);

    const [row] = result.rows;
    expect(row.dealId).toBe("3001");
    expect(row.pipelineId).toBe("default");
    expect(row.pipelineStageLabel).toBe("Closed won");
    expect(row.amount).toBe(1200);
    expect(row.amountDeleted).toBe(false);
    expect(row.endDate && getDateKey(row.endDate)).toBe("2024-12-31");
  });

  it("reads DATE columns as written calendar days", async () => {
    expect(types.getTypeParser(PG_DATE_OID)("2024-01-01")).toBe("2024-01-01");

    const result = await loadFromDatabase(
      "SELECT 1",
      runner([driverRow({ start_date: "2024-01-01", end_date: "2024-12-31T00:00:00Z" })])
    );
    const [row] = result.rows;
    expect(row.startDate && getDateKey(row.startDate)).toBe("2024-01-01");
    expect(row.endDate && getDateKey(row.endDate)).toBe("2024-12-31");
  });

  it("drops rows whose dates do not parse", async () => {
    const result = await loadFromDatabase(
      "SELECT 1",
      runner([driverRow(), driverRow({ line_item_id: "L2", start_date: "someday" })])
    );
    expect(result.rows).toHaveLength(1);
    expect(result.droppedDates).toBe(1);
    expect(result.warnings).toEqual(["Dropped 1 rows with unparseable subscription dates."]);
  });

  it("counts rows that fail validation", async () => {
    const result = await loadFromDatabase("SELECT 1", runner([driverRow(), driverRow({ deal_id: "  " })]));
    expect(result.rejected).toBe(1);
    expect(result.warnings).toEqual(["Row 2: dealId: is required"]);
  });

  it("warns about an empty result", async () => {
    const result = await loadFromDatabase("SELECT 1", runner([]));
    expect(result.ok).toBe(true);
    expect(result.warnings).toEqual(["No data returned from the query."]);
  });

  it("turns a query failure into a warning", async () => {
    const result = await loadFromDatabase(
      "SELECT 1",
      vi.fn<QueryRunner>().mockRejectedValue(new Error("connection refused"))
    );
    expect(result).toEqual({
      rows: [],
      ok: false,
      warnings: ["Failed to load subscription data: connection refused"],
      rejected: 0,
      droppedDates: 0,
    });
  });
});

describe("loadFromCsv", () => {
  it("reads an export with warehouse column names", () => {
    const result = loadFromCsv(FIXTURE);

    expect(result.ok).toBe(true);
    expect(result.rows.map((r) => [r.lineItemId, r.region, r.amount, r.amountDeleted])).toEqual([
      ["L1", "EMEA", 1200, false],
      ["L2", "EMEA", 300, true],
    ]);
    expect(result.warnings).toEqual(["Dropped 1 rows with unparseable subscription dates."]);
  });

  it("reports a missing file", () => {
    const result = loadFromCsv("/nonexistent/lines.csv");
    expect(result.ok).toBe(false);
    expect(result.warnings[0]).toMatch(/^Failed to load subscription data: ENOENT/);
  });
});

describe("loadSubscriptionLines", () => {
  it("memoizes per normalized query text", async () => {
    const runQuery = runner([driverRow()]);

    const first = await loadSubscriptionLines({ kind: "postgres", query: "SELECT *\n  FROM lines" }, { runQuery });
    const second = await loadSubscriptionLines({ kind: "postgres", query: "SELECT * FROM lines" }, { runQuery });

    expect(runQuery).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(getCacheAge(requestKey({ kind: "postgres", query: "SELECT * FROM lines" }))).toBe(0);
  });

  it("treats a different query as a different request", async () => {
    const runQuery = runner([driverRow()]);
    await loadSubscriptionLines({ kind: "postgres", query: "SELECT * FROM lines" }, { runQuery });
    await loadSubscriptionLines({ kind: "postgres", query: "SELECT * FROM lines WHERE 1 = 1" }, { runQuery });
    expect(runQuery).toHaveBeenCalledTimes(2);
  });

  it("reloads after invalidation", async () => {
    const runQuery = runner([driverRow()]);
    const request = { kind: "postgres", query: "SELECT * FROM lines" } as const;

    await loadSubscriptionLines(request, { runQuery });
    invalidateSubscriptionCache(requestKey(request));
    await loadSubscriptionLines(request, { runQuery });

    expect(runQuery).toHaveBeenCalledTimes(2);
  });

  it("expires entries after the TTL", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 5, 1, 9, 0, 0));
    const runQuery = runner([driverRow()]);
    const request = { kind: "postgres", query: "SELECT * FROM lines" } as const;

    await loadSubscriptionLines(request, { runQuery, cacheTtlMs: 1000 });
    vi.setSystemTime(new Date(2024, 5, 1, 9, 0, 1));
    await loadSubscriptionLines(request, { runQuery, cacheTtlMs: 1000 });
    expect(runQuery).toHaveBeenCalledTimes(1);

    vi.setSystemTime(new Date(2024, 5, 1, 9, 0, 2));
    await loadSubscriptionLines(request, { runQuery, cacheTtlMs: 1000 });
    expect(runQuery).toHaveBeenCalledTimes(2);
  });

  it("does not cache failed loads", async () => {
    const runQuery = vi
      .fn<QueryRunner>()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValueOnce({ rows: [driverRow()] });
    const request = { kind: "postgres", query: "SELECT * FROM lines" } as const;

    const failed = await loadSubscriptionLines(request, { runQuery });
    const retried = await loadSubscriptionLines(request, { runQuery });

    expect(failed.ok).toBe(false);
    expect(retried.ok).toBe(true);
    expect(runQuery).toHaveBeenCalledTimes(2);
  });

  it("loads CSV requests from disk", async () => {
    const result = await loadSubscriptionLines({ kind: "csv", filePath: FIXTURE });
    expect(result.rows).toHaveLength(2);
  });
});
