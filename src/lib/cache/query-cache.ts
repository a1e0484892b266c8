/**
 * In-memory cache of loaded subscription row sets.
 *
 * Changing a filter or period only re-runs the in-memory transforms, so the
 * load is memoized per request descriptor (source kind + normalized query text
 * or file path). A different query text is a different key; an explicit
 * `invalidateSubscriptionCache()` drops entries when the source changes.
 *
 * TTL defaults to 15 minutes as a safety net.
 */

import { resolve } from "path";
import type { SubscriptionLoadResult } from "../db/subscription-source";

const DEFAULT_TTL_MS = 15 * 60 * 1000; // 15 minutes

export type SourceRequest =
  | { kind: "postgres"; query: string }
  | { kind: "csv"; filePath: string };

interface CacheEntry {
  data: SubscriptionLoadResult;
  createdAt: number;
  ttlMs: number;
}

const entries = new Map<string, CacheEntry>();

/** Whitespace-insensitive key so reformatting a query does not refetch */
export function requestKey(request: SourceRequest): string {
  if (request.kind === "csv") return `csv:${resolve(request.filePath)}`;
  return `postgres:${request.query.replace(/\s+/g, " ").trim()}`;
}

/** Return the cached load or null if expired/missing. */
export function getCachedLoad(key: string): SubscriptionLoadResult | null {
  const cached = entries.get(key);
  if (!cached) return null;
  if (Date.now() - cached.createdAt > cached.ttlMs) {
    entries.delete(key);
    return null;
  }
  return cached.data;
}

export function setCachedLoad(
  key: string,
  data: SubscriptionLoadResult,
  ttlMs = DEFAULT_TTL_MS
): void {
  entries.set(key, { data, createdAt: Date.now(), ttlMs });
  console.log(`[query-cache] Cached ${data.rows.length} rows for ${key.slice(0, 60)}`);
}

/** Drop one request's entry, or everything when no key is given. */
export function invalidateSubscriptionCache(key?: string): void {
  if (key) entries.delete(key);
  else entries.clear();
  console.log(`[query-cache] Cache invalidated${key ? ` for ${key.slice(0, 60)}` : ""}`);
}

/** Age in seconds, or null if nothing is cached for the key. */
export function getCacheAge(key: string): number | null {
  const cached = entries.get(key);
  if (!cached) return null;
  return Math.round((Date.now() - cached.createdAt) / 1000);
}
