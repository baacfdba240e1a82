/**
 * Search Cache
 *
 * SQLite-based cache for web search results.
 * Stores search results with TTL-based expiration to reduce API quota usage.
 *
 * Cache Key: sha256(query + maxResults + provider setting + domain blacklist)
 *
 * @module search-cache
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";
import crypto from "crypto";
import { z } from "zod";
import type { SearchConfig } from "./config-schemas";
import type { WebSearchOptions, WebSearchResult } from "./web-search";

export type SearchCacheConfig = SearchConfig["cache"];

// ============================================================================
// TYPES
// ============================================================================

export interface CachedSearchResult {
  cacheKey: string;
  queryText: string;
  maxResults: number;
  results: WebSearchResult[];
  provider: string;
  cachedAt: string;
  expiresAt: string;
}

interface SearchCacheRow {
  cache_key: string;
  query_text: string;
  max_results: number;
  domain_blacklist: string | null;
  results_json: string;
  provider: string;
  cached_at: string;
  expires_at: string;
}

const CachedResultsSchema = z.array(
  z.object({
    url: z.string(),
    title: z.string(),
    snippet: z.string().nullable(),
  }),
);

// ============================================================================
// DATABASE SETUP
// ============================================================================

let db: Database | null = null;
let dbPromise: Promise<Database> | null = null;
let openPath: string | null = null;

async function getDb(dbPath: string): Promise<Database> {
  const resolved = dbPath === ":memory:" ? dbPath : path.resolve(dbPath);
  if (openPath !== null && openPath !== resolved) {
    await closeSearchCacheDb();
  }
  if (db) return db;
  if (!dbPromise) {
    openPath = resolved;
    dbPromise = (async () => {
      console.log(`[Search-Cache] Opening database at ${resolved}`);
      const instance = await open({ filename: resolved, driver: sqlite3.Database });

      await instance.exec("PRAGMA journal_mode=WAL");
      await instance.exec(`
        CREATE TABLE IF NOT EXISTS search_cache (
          cache_key TEXT PRIMARY KEY,
          query_text TEXT NOT NULL,
          max_results INTEGER NOT NULL,
          domain_blacklist TEXT,
          results_json TEXT NOT NULL,
          provider TEXT NOT NULL,
          cached_at TEXT NOT NULL,
          expires_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_search_cache_expires ON search_cache(expires_at);
      `);

      db = instance;
      return instance;
    })();
  }
  return dbPromise;
}

// ============================================================================
// CACHE KEY GENERATION
// ============================================================================

/**
 * Deterministic key from the normalized query, result count, provider setting
 * and blacklist (order-insensitive).
 */
export function generateCacheKey(options: WebSearchOptions, provider: string): string {
  const parts = [
    options.query.trim().toLowerCase(),
    options.maxResults.toString(),
    provider,
    JSON.stringify([...(options.domainBlacklist ?? [])].sort()),
  ];
  return crypto.createHash("sha256").update(parts.join("|")).digest("hex");
}

// ============================================================================
// CACHE OPERATIONS
// ============================================================================

/**
 * Cached results if present and unexpired, otherwise null. Read errors are
 * logged and treated as a miss.
 */
export async function getCachedSearchResults(
  options: WebSearchOptions,
  provider: string,
  config: SearchCacheConfig,
): Promise<CachedSearchResult | null> {
  if (!config.enabled) return null;

  try {
    const database = await getDb(config.dbPath);
    const cacheKey = generateCacheKey(options, provider);
    const now = new Date().toISOString();

    const row = await database.get<SearchCacheRow>(
      "SELECT * FROM search_cache WHERE cache_key = ? AND expires_at > ?",
      [cacheKey, now],
    );
    if (!row) return null;

    const parsed = CachedResultsSchema.safeParse(JSON.parse(row.results_json));
    if (!parsed.success) {
      console.warn(`[Search-Cache] Discarding malformed entry ${cacheKey.slice(0, 12)}`);
      return null;
    }

    console.log(
      `[Search-Cache] Cache HIT for "${options.query.substring(0, 50)}" (${parsed.data.length} results, provider: ${row.provider})`,
    );

    return {
      cacheKey,
      queryText: row.query_text,
      maxResults: row.max_results,
      results: parsed.data,
      provider: row.provider,
      cachedAt: row.cached_at,
      expiresAt: row.expires_at,
    };
  } catch (err) {
    console.error("[Search-Cache] Error reading cache:", err);
    return null;
  }
}

export async function cacheSearchResults(
  options: WebSearchOptions,
  results: WebSearchResult[],
  providerSetting: string,
  providerUsed: string,
  config: SearchCacheConfig,
): Promise<void> {
  if (!config.enabled) return;

  try {
    const database = await getDb(config.dbPath);
    const cacheKey = generateCacheKey(options, providerSetting);
    const now = new Date();
    const expiresAt = new Date(now.getTime() + config.ttlDays * 24 * 60 * 60 * 1000);

    await database.run(
      `INSERT OR REPLACE INTO search_cache
       (cache_key, query_text, max_results, domain_blacklist, results_json, provider, cached_at, expires_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        cacheKey,
        options.query,
        options.maxResults,
        options.domainBlacklist ? JSON.stringify(options.domainBlacklist) : null,
        JSON.stringify(results),
        providerUsed,
        now.toISOString(),
        expiresAt.toISOString(),
      ],
    );

    console.log(
      `[Search-Cache] Cached ${results.length} results for "${options.query.substring(0, 50)}" (provider: ${providerUsed}, TTL: ${config.ttlDays}d)`,
    );
  } catch (err) {
    console.error("[Search-Cache] Error writing cache:", err);
  }
}

// ============================================================================
// CACHE MAINTENANCE
// ============================================================================

/** Returns the number of entries deleted. */
export async function cleanupExpiredCache(config: SearchCacheConfig): Promise<number> {
  const database = await getDb(config.dbPath);
  const result = await database.run("DELETE FROM search_cache WHERE expires_at <= ?", [
    new Date().toISOString(),
  ]);
  const deleted = result.changes ?? 0;
  if (deleted > 0) {
    console.log(`[Search-Cache] Cleaned up ${deleted} expired entries`);
  }
  return deleted;
}

export async function clearAllCache(config: SearchCacheConfig): Promise<number> {
  const database = await getDb(config.dbPath);
  const result = await database.run("DELETE FROM search_cache");
  return result.changes ?? 0;
}

export async function closeSearchCacheDb(): Promise<void> {
  const pending = dbPromise;
  db = null;
  dbPromise = null;
  openPath = null;
  if (pending) {
    const instance = await pending;
    await instance.close();
    console.log("[Search-Cache] Database closed");
  }
}
