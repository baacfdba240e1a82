import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { searchGoogleCse } from "@/lib/search-google-cse";
import { searchNewsApi } from "@/lib/search-newsapi";
import { SearchProviderError } from "@/lib/web-search";
import { jsonResponse, stubFetch } from "@test/helpers/test-helpers";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("searchGoogleCse", () => {
  beforeEach(() => {
    vi.stubEnv("GOOGLE_CSE_API_KEY", "test-key");
    vi.stubEnv("GOOGLE_CSE_ID", "test-cx");
  });

  it("maps items and skips incomplete ones", async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        items: [
          { title: "Budget passes", link: "https://news.example.org/budget", snippet: "The council..." },
          { title: "No link" },
          { title: "No snippet", link: "https://other.example.org/x" },
        ],
      }),
    );
    const results = await searchGoogleCse({ query: '"budget passes"', maxResults: 15 });
    expect(results).toEqual([
      { url: "https://news.example.org/budget", title: "Budget passes", snippet: "The council..." },
      { url: "https://other.example.org/x", title: "No snippet", snippet: null },
    ]);

    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.origin + requested.pathname).toBe("https://www.googleapis.com/customsearch/v1");
    expect(requested.searchParams.get("q")).toBe('"budget passes"');
    expect(requested.searchParams.get("num")).toBe("10");
    expect(requested.searchParams.get("key")).toBe("test-key");
    expect(requested.searchParams.get("cx")).toBe("test-cx");
  });

  it("returns nothing without credentials", async () => {
    vi.stubEnv("GOOGLE_CSE_ID", "");
    const fetchMock = stubFetch();
    expect(await searchGoogleCse({ query: "q", maxResults: 5 })).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("throws a fatal provider error on quota exhaustion", async () => {
    stubFetch(new Response("quota exceeded", { status: 429 }));
    const error = await searchGoogleCse({ query: "q", maxResults: 5 }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SearchProviderError);
    expect(error).toMatchObject({
      provider: "Google-CSE",
      status: 429,
      fatal: true,
      message: "Google CSE HTTP 429: quota exceeded",
    });
  });

  it("returns nothing on other HTTP errors, bad shapes and network failures", async () => {
    stubFetch(
      new Response("oops", { status: 500 }),
      jsonResponse({ items: "not-a-list" }),
      new Error("socket hang up"),
    );
    expect(await searchGoogleCse({ query: "q", maxResults: 5 })).toEqual([]);
    expect(await searchGoogleCse({ query: "q", maxResults: 5 })).toEqual([]);
    expect(await searchGoogleCse({ query: "q", maxResults: 5 })).toEqual([]);
  });
});

describe("searchNewsApi", () => {
  beforeEach(() => {
    vi.stubEnv("NEWS_API_KEY", "test-key");
  });

  it("maps articles and drops removed placeholders", async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        status: "ok",
        articles: [
          { title: "Bridge reopens", url: "https://news.example.org/bridge", description: "After repairs" },
          { title: "[Removed]", url: "https://removed.com", description: null },
          { title: "No description", url: "https://news.example.org/x", description: null },
          { title: null, url: "https://news.example.org/y" },
        ],
      }),
    );
    const results = await searchNewsApi({ query: "bridge reopens", maxResults: 5 });
    expect(results).toEqual([
      { url: "https://news.example.org/bridge", title: "Bridge reopens", snippet: "After repairs" },
      { url: "https://news.example.org/x", title: "No description", snippet: null },
    ]);

    const [input, init] = fetchMock.mock.calls[0];
    const requested = new URL(String(input));
    expect(requested.searchParams.get("pageSize")).toBe("5");
    expect(requested.searchParams.get("sortBy")).toBe("relevancy");
    expect(new Headers(init?.headers).get("X-Api-Key")).toBe("test-key");
  });

  it("throws on auth failures", async () => {
    stubFetch(new Response("", { status: 401, statusText: "Unauthorized" }));
    await expect(searchNewsApi({ query: "q", maxResults: 5 })).rejects.toThrow("NewsAPI HTTP 401: Unauthorized");
  });

  it("returns nothing for an error status in the body", async () => {
    stubFetch(jsonResponse({ status: "error", code: "parameterInvalid" }));
    expect(await searchNewsApi({ query: "q", maxResults: 5 })).toEqual([]);
  });
});
