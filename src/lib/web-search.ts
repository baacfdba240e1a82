/**
 * Web search entry point.
 *
 * Dispatches to the configured provider, drops blacklisted domains and
 * reads/writes the SQLite search cache. Provider modules are imported lazily.
 *
 * @module web-search
 */

import type { SearchConfig } from "./config-schemas";
import { cacheSearchResults, getCachedSearchResults } from "./search-cache";

export type WebSearchResult = {
  url: string;
  title: string;
  snippet: string | null;
};

export type WebSearchOptions = {
  query: string;
  maxResults: number;
  domainBlacklist?: string[];
  timeoutMs?: number;
};

/**
 * Thrown by providers on quota, auth or rate-limit failures. `fatal` means
 * retrying the same provider in this run is pointless.
 */
export class SearchProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly status: number,
    public readonly fatal: boolean,
    message: string,
  ) {
    super(message);
    this.name = "SearchProviderError";
  }
}

export async function searchWeb(options: WebSearchOptions, config: SearchConfig): Promise<WebSearchResult[]> {
  if (!config.enabled) {
    console.log("[Search] Search disabled by config");
    return [];
  }

  const effective: WebSearchOptions = {
    query: options.query,
    maxResults: Math.min(options.maxResults, config.maxResults),
    domainBlacklist: options.domainBlacklist ?? config.domainBlacklist,
    timeoutMs: options.timeoutMs ?? config.timeoutMs,
  };

  const cached = await getCachedSearchResults(effective, config.provider, config.cache);
  if (cached) return cached.results;

  const { results, provider } = await dispatch(effective, config.provider);
  const filtered = applyBlacklist(results, effective.domainBlacklist).slice(0, effective.maxResults);

  if (filtered.length > 0) {
    await cacheSearchResults(effective, filtered, config.provider, provider, config.cache);
  }
  return filtered;
}

async function dispatch(
  options: WebSearchOptions,
  provider: SearchConfig["provider"],
): Promise<{ results: WebSearchResult[]; provider: string }> {
  if (provider === "google-cse") {
    const { searchGoogleCse } = await import("./search-google-cse");
    return { results: await searchGoogleCse(options), provider: "Google-CSE" };
  }
  if (provider === "newsapi") {
    const { searchNewsApi } = await import("./search-newsapi");
    return { results: await searchNewsApi(options), provider: "NewsAPI" };
  }

  // auto: Google CSE first, NewsAPI for the remainder. A provider error only
  // surfaces when no provider returned anything.
  const results: WebSearchResult[] = [];
  const used: string[] = [];
  const providerErrors: SearchProviderError[] = [];

  const attempt = async (name: string, run: () => Promise<WebSearchResult[]>): Promise<void> => {
    try {
      results.push(...(await run()));
      used.push(name);
    } catch (error) {
      if (!(error instanceof SearchProviderError)) throw error;
      console.warn(`[Search] auto: ${name} failed (HTTP ${error.status}), trying next provider: ${error.message}`);
      providerErrors.push(error);
    }
  };

  const hasCse = Boolean(process.env.GOOGLE_CSE_API_KEY && process.env.GOOGLE_CSE_ID);
  const hasNewsApi = Boolean(process.env.NEWS_API_KEY);

  if (hasCse) {
    const { searchGoogleCse } = await import("./search-google-cse");
    await attempt("Google-CSE", () => searchGoogleCse(options));
  }
  if (results.length < options.maxResults && hasNewsApi) {
    const { searchNewsApi } = await import("./search-newsapi");
    const remaining = options.maxResults - results.length;
    await attempt("NewsAPI", () => searchNewsApi({ ...options, maxResults: remaining }));
  }
  if (!hasCse && !hasNewsApi) {
    console.warn("[Search] auto: no provider credentials configured (GOOGLE_CSE_API_KEY/GOOGLE_CSE_ID, NEWS_API_KEY)");
  }
  if (results.length === 0 && providerErrors.length > 0) throw providerErrors[0];
  return { results, provider: used.join("+") || "none" };
}

export function isBlacklisted(url: string, blacklist: readonly string[]): boolean {
  if (blacklist.length === 0) return false;
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return true;
  }
  return blacklist.some((entry) => {
    const d = entry.toLowerCase().replace(/^www\./, "");
    return host === d || host.endsWith(`.${d}`);
  });
}

function applyBlacklist(results: WebSearchResult[], blacklist: readonly string[] = []): WebSearchResult[] {
  if (blacklist.length === 0) return results;
  return results.filter((r) => !isBlacklisted(r.url, blacklist));
}
