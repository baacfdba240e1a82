/**
 * Google Custom Search JSON API Provider
 *
 * https://developers.google.com/custom-search/v1/overview
 */

import { z } from "zod";
import { SearchProviderError, type WebSearchOptions, type WebSearchResult } from "./web-search";

const GoogleCseResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
});

const GOOGLE_CSE_BASE = "https://www.googleapis.com/customsearch/v1";
const DEFAULT_TIMEOUT_MS = 12_000;

export async function searchGoogleCse(options: WebSearchOptions): Promise<WebSearchResult[]> {
  const apiKey = process.env.GOOGLE_CSE_API_KEY;
  const cx = process.env.GOOGLE_CSE_ID;
  if (!apiKey || !cx) {
    console.error("[Search] Google-CSE: GOOGLE_CSE_API_KEY or GOOGLE_CSE_ID not set");
    return [];
  }

  const params = new URLSearchParams({
    key: apiKey,
    cx,
    q: options.query,
    num: String(Math.min(options.maxResults, 10)),
  });

  console.log(`[Search] Google-CSE: query "${options.query.substring(0, 60)}"`);

  try {
    const res = await fetch(`${GOOGLE_CSE_BASE}?${params.toString()}`, {
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });

    if (!res.ok) {
      const errorBody = await res.text();
      console.error(`[Search] Google-CSE: HTTP ${res.status}: ${errorBody.substring(0, 300)}`);
      if (res.status === 429 || res.status === 403) {
        throw new SearchProviderError(
          "Google-CSE",
          res.status,
          true,
          `Google CSE HTTP ${res.status}: ${errorBody.substring(0, 200) || res.statusText}`,
        );
      }
      return [];
    }

    const parsed = GoogleCseResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      console.warn("[Search] Google-CSE: unexpected response shape");
      return [];
    }

    const out: WebSearchResult[] = [];
    for (const item of parsed.data.items ?? []) {
      if (!item.link || !item.title) continue;
      out.push({ url: item.link, title: item.title, snippet: item.snippet ?? null });
    }
    console.log(`[Search] Google-CSE: ${out.length} results`);
    return out.slice(0, options.maxResults);
  } catch (error) {
    if (error instanceof SearchProviderError) throw error;
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(`[Search] Google-CSE: fetch failed: ${errorMsg}`);
    return [];
  }
}
