/**
 * NewsAPI Provider (/v2/everything)
 *
 * https://newsapi.org/docs/endpoints/everything
 */

import { z } from "zod";
import { SearchProviderError, type WebSearchOptions, type WebSearchResult } from "./web-search";

const NewsApiResponseSchema = z.object({
  status: z.string(),
  articles: z
    .array(
      z.object({
        title: z.string().nullable().optional(),
        url: z.string().nullable().optional(),
        description: z.string().nullable().optional(),
      }),
    )
    .optional(),
});

const NEWS_API_BASE = "https://newsapi.org/v2/everything";
const DEFAULT_TIMEOUT_MS = 12_000;
const FATAL_STATUSES = new Set([401, 403, 429]);

export async function searchNewsApi(options: WebSearchOptions): Promise<WebSearchResult[]> {
  const apiKey = process.env.NEWS_API_KEY;
  if (!apiKey) {
    console.error("[Search] NewsAPI: NEWS_API_KEY not set");
    return [];
  }

  const params = new URLSearchParams({
    q: options.query,
    language: "en",
    sortBy: "relevancy",
    pageSize: String(Math.min(options.maxResults, 100)),
  });

  console.log(`[Search] NewsAPI: query "${options.query.substring(0, 60)}"`);

  try {
    const res = await fetch(`${NEWS_API_BASE}?${params.toString()}`, {
      headers: { "X-Api-Key": apiKey, Accept: "application/json" },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });

    if (!res.ok) {
      const errorBody = await res.text();
      console.error(`[Search] NewsAPI: HTTP ${res.status}: ${errorBody.substring(0, 300)}`);
      if (FATAL_STATUSES.has(res.status)) {
        throw new SearchProviderError(
          "NewsAPI",
          res.status,
          true,
          `NewsAPI HTTP ${res.status}: ${errorBody.substring(0, 200) || res.statusText}`,
        );
      }
      return [];
    }

    const parsed = NewsApiResponseSchema.safeParse(await res.json());
    if (!parsed.success || parsed.data.status !== "ok") {
      console.warn("[Search] NewsAPI: unexpected response shape");
      return [];
    }

    const out: WebSearchResult[] = [];
    for (const article of parsed.data.articles ?? []) {
      if (!article.url || !article.title) continue;
      // Removed articles come back as placeholders.
      if (article.title === "[Removed]") continue;
      out.push({ url: article.url, title: article.title, snippet: article.description ?? null });
    }
    console.log(`[Search] NewsAPI: ${out.length} results`);
    return out.slice(0, options.maxResults);
  } catch (error) {
    if (error instanceof SearchProviderError) throw error;
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(`[Search] NewsAPI: fetch failed: ${errorMsg}`);
    return [];
  }
}
