import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import {
  cacheSearchResults,
  cleanupExpiredCache,
  clearAllCache,
  closeSearchCacheDb,
  generateCacheKey,
  getCachedSearchResults,
  type SearchCacheConfig,
} from "@/lib/search-cache";

let tmpDir: string;
let cacheConfig: SearchCacheConfig;

const results = [
  { url: "https://news.example.org/a", title: "A", snippet: "first" },
  { url: "https://news.example.org/b", title: "B", snippet: null },
];

beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "corroborate-search-cache-"));
  cacheConfig = { enabled: true, ttlDays: 7, dbPath: path.join(tmpDir, "cache.db") };
});

afterAll(async () => {
  await closeSearchCacheDb();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  await clearAllCache(cacheConfig);
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("generateCacheKey", () => {
  it("normalizes the query and ignores blacklist order", () => {
    const a = generateCacheKey({ query: "  Budget Vote ", maxResults: 5, domainBlacklist: ["b.com", "a.com"] }, "auto");
    const b = generateCacheKey({ query: "budget vote", maxResults: 5, domainBlacklist: ["a.com", "b.com"] }, "auto");
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it("separates result counts and providers", () => {
    const base = { query: "q", maxResults: 5 };
    expect(generateCacheKey(base, "auto")).not.toBe(generateCacheKey({ ...base, maxResults: 6 }, "auto"));
    expect(generateCacheKey(base, "auto")).not.toBe(generateCacheKey(base, "newsapi"));
  });
});

describe("search cache", () => {
  it("round-trips results under the provider setting", async () => {
    const options = { query: "budget vote", maxResults: 5 };
    expect(await getCachedSearchResults(options, "auto", cacheConfig)).toBeNull();

    await cacheSearchResults(options, results, "auto", "Google-CSE", cacheConfig);
    const hit = await getCachedSearchResults(options, "auto", cacheConfig);

    expect(hit?.results).toEqual(results);
    expect(hit?.provider).toBe("Google-CSE");
    expect(hit?.queryText).toBe("budget vote");
    expect(await getCachedSearchResults(options, "newsapi", cacheConfig)).toBeNull();
  });

  it("expires entries after the TTL and cleans them up", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const options = { query: "old news", maxResults: 5 };
    await cacheSearchResults(options, results, "auto", "NewsAPI", { ...cacheConfig, ttlDays: 1 });

    vi.setSystemTime(new Date("2026-01-01T12:00:00.000Z"));
    expect(await getCachedSearchResults(options, "auto", cacheConfig)).not.toBeNull();

    vi.setSystemTime(new Date("2026-01-02T00:00:01.000Z"));
    expect(await getCachedSearchResults(options, "auto", cacheConfig)).toBeNull();
    expect(await cleanupExpiredCache(cacheConfig)).toBe(1);
  });

  it("does nothing when disabled", async () => {
    const disabled = { ...cacheConfig, enabled: false };
    const options = { query: "q", maxResults: 5 };
    await cacheSearchResults(options, results, "auto", "NewsAPI", disabled);
    expect(await getCachedSearchResults(options, "auto", cacheConfig)).toBeNull();
    expect(await getCachedSearchResults(options, "auto", disabled)).toBeNull();
  });

  it("clears every entry", async () => {
    await cacheSearchResults({ query: "a", maxResults: 1 }, results, "auto", "x", cacheConfig);
    await cacheSearchResults({ query: "b", maxResults: 1 }, results, "auto", "x", cacheConfig);
    expect(await clearAllCache(cacheConfig)).toBe(2);
  });
});
