import { beforeEach, describe, expect, it, vi } from "vitest";
import { ArticleFetchError, MalformedExtractionError } from "@/lib/analyzer/errors";
import { analyzeArticle, type ReportRepository } from "@/lib/analysis-service";
import { hashContent, type StoredReport } from "@/lib/report-store";
import {
  analyzedSource,
  candidate,
  fakeCollaborators,
  hierarchyOf,
  testPipelineConfig,
} from "@test/helpers/test-helpers";

const original = hierarchyOf("original", {
  what: [{ text: "Fact one", who: ["Agency"] }, { text: "Fact two" }],
});

const REUTERS = "https://www.reuters.com/a";
const BBC = "https://www.bbc.co.uk/b";

function fakeStore(prior: { report: StoredReport; sources: ReturnType<typeof analyzedSource>[] } | null = null) {
  const store = {
    saveReport: vi.fn<ReportRepository["saveReport"]>().mockResolvedValue(42),
    updateReport: vi.fn<ReportRepository["updateReport"]>().mockResolvedValue(undefined),
    findReportByUrl: vi.fn<ReportRepository["findReportByUrl"]>().mockResolvedValue(prior?.report ?? null),
    findReportByContentHash: vi.fn<ReportRepository["findReportByContentHash"]>().mockResolvedValue(prior?.report ?? null),
    loadReportAnalysis: vi
      .fn<ReportRepository["loadReportAnalysis"]>()
      .mockResolvedValue(prior ? { originalHierarchy: original, sources: prior.sources } : null),
  };
  return store;
}

function storedReport(overrides: Partial<StoredReport> = {}): StoredReport {
  return {
    id: 7,
    articleId: 3,
    articleUrl: null,
    articleTitle: null,
    contentHash: hashContent("Article text"),
    overallScore: 100,
    confidenceLevel: "low",
    sourcesConsidered: 1,
    sourcesScored: 1,
    sourcesFiltered: 1,
    sourcesFailed: 0,
    summary: "Earlier summary",
    recommendations: "Earlier recommendations",
    details: {},
    mergeCount: 2,
    analysisAttempts: 1,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("analyzeArticle", () => {
  it("analyzes pasted text without persisting when no store is given", async () => {
    const collaborators = fakeCollaborators(original, {
      search: vi.fn(async () => [candidate(REUTERS), candidate(BBC)]),
    });

    const result = await analyzeArticle(
      { text: "Article text", title: "Headline" },
      { config: testPipelineConfig({ minSourcesForRetry: 1 }), collaborators, runId: "run-1" },
    );

    if (!result.ok) throw result.error;
    expect(result.reportId).toBeNull();
    expect(result.merged).toBe(false);
    expect(result.mergeCount).toBe(0);
    expect(result.attempts).toBe(1);
    expect(result.report.runId).toBe("run-1");
    expect(result.report.article).toEqual({ url: null, title: "Headline" });
    expect(result.report.scored.sourcesScored).toBe(2);
    expect(result.report.sources.map((s) => s.url)).toEqual([REUTERS, BBC]);
    expect(collaborators.extractFacts).toHaveBeenCalledWith("Article text", { sourceId: "original", title: "Headline" });
  });

  it("fetches URL input and takes the fetched title", async () => {
    const collaborators = fakeCollaborators(original);

    const result = await analyzeArticle(
      { url: "https://origin.example.com/story" },
      { config: testPipelineConfig({ minSourcesForRetry: 0 }), collaborators },
    );

    if (!result.ok) throw result.error;
    expect(result.report.article).toEqual({
      url: "https://origin.example.com/story",
      title: "Fetched https://origin.example.com/story",
    });
    expect(collaborators.extractFacts).toHaveBeenCalledWith("Body of https://origin.example.com/story", {
      sourceId: "original",
      title: "Fetched https://origin.example.com/story",
    });
  });

  it("returns an ArticleFetchError when the article cannot be fetched", async () => {
    const collaborators = fakeCollaborators(original, {
      fetchArticle: vi.fn(async () => {
        throw new Error("Fetch failed: HTTP 404");
      }),
    });

    const result = await analyzeArticle(
      { url: "https://origin.example.com/missing" },
      { config: testPipelineConfig(), collaborators },
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ArticleFetchError);
    expect(result.error.message).toBe("Could not fetch article: Fetch failed: HTTP 404");
    expect(collaborators.extractFacts).not.toHaveBeenCalled();
  });

  it("returns the extraction error when the article yields no hierarchy", async () => {
    const error = new MalformedExtractionError("No facts found", "original");
    const collaborators = fakeCollaborators(original, {
      extractFacts: vi.fn(async () => ({ ok: false as const, error })),
    });

    const result = await analyzeArticle({ text: "Article text" }, { config: testPipelineConfig(), collaborators });

    expect(result).toEqual({ ok: false, error });
    expect(collaborators.search).not.toHaveBeenCalled();
  });

  it("retries with optimized queries while too few sources are scored", async () => {
    const collaborators = fakeCollaborators(original, {
      search: vi.fn(async (query: string) => (query === '"optimized"' ? [candidate(REUTERS), candidate(BBC)] : [])),
    });
    const optimizeQueries = vi.fn(async () => ['"optimized"']);

    const result = await analyzeArticle(
      { text: "Article text" },
      { config: testPipelineConfig({ minSourcesForRetry: 2, maxAttempts: 3 }), collaborators, optimizeQueries },
    );

    if (!result.ok) throw result.error;
    expect(result.attempts).toBe(2);
    expect(optimizeQueries).toHaveBeenCalledTimes(1);
    expect(optimizeQueries).toHaveBeenCalledWith(original, 2);
    expect(result.report.queries.at(-1)).toBe('"optimized"');
    expect(result.report.candidatesFound).toBe(2);
    expect(result.report.scored.sourcesScored).toBe(2);
  });

  it("stops retrying when the optimizer has no queries", async () => {
    const collaborators = fakeCollaborators(original);
    const optimizeQueries = vi.fn(async () => []);

    const result = await analyzeArticle(
      { text: "Article text" },
      { config: testPipelineConfig({ minSourcesForRetry: 2, maxAttempts: 3 }), collaborators, optimizeQueries },
    );

    if (!result.ok) throw result.error;
    expect(result.attempts).toBe(1);
    expect(optimizeQueries).toHaveBeenCalledTimes(1);
    expect(result.report.scored.overallScore).toBeNull();
  });

  it("does not retry without an optimizer", async () => {
    const collaborators = fakeCollaborators(original);

    const result = await analyzeArticle(
      { text: "Article text" },
      { config: testPipelineConfig({ minSourcesForRetry: 2, maxAttempts: 3 }), collaborators },
    );

    if (!result.ok) throw result.error;
    expect(result.attempts).toBe(1);
  });

  it("saves a new report when nothing is stored for the article", async () => {
    const store = fakeStore();
    const collaborators = fakeCollaborators(original, { search: vi.fn(async () => [candidate(REUTERS)]) });

    const result = await analyzeArticle(
      { text: "Article text" },
      { config: testPipelineConfig({ minSourcesForRetry: 1 }), collaborators, store, reuseExisting: true },
    );

    if (!result.ok) throw result.error;
    expect(result.reportId).toBe(42);
    expect(result.merged).toBe(false);
    expect(store.findReportByContentHash).toHaveBeenCalledWith(hashContent("Article text"));
    expect(store.saveReport).toHaveBeenCalledWith(
      expect.objectContaining({
        article: { url: null, title: null, text: "Article text" },
        mergeCount: 0,
        analysisAttempts: 1,
        sourcesConsidered: 1,
        sourcesScored: 1,
      }),
    );
    expect(store.updateReport).not.toHaveBeenCalled();
  });

  it("does not look up prior reports unless asked to", async () => {
    const store = fakeStore();
    const collaborators = fakeCollaborators(original);

    await analyzeArticle({ url: "https://origin.example.com/story" }, { config: testPipelineConfig(), collaborators, store });

    expect(store.findReportByUrl).not.toHaveBeenCalled();
    expect(store.saveReport).toHaveBeenCalledTimes(1);
  });

  it("merges new sources into an existing report", async () => {
    const prior = analyzedSource({ url: "https://www.cdc.gov/prior", sourceType: "official", relevanceScore: 0.9, matches: 2, conflicts: 0 });
    const store = fakeStore({ report: storedReport(), sources: [prior] });
    const collaborators = fakeCollaborators(original, {
      search: vi.fn(async () => [candidate("https://www.cdc.gov/prior"), candidate(REUTERS)]),
    });

    const result = await analyzeArticle(
      { text: "Article text" },
      { config: testPipelineConfig({ minSourcesForRetry: 1 }), collaborators, store, reuseExisting: true },
    );

    if (!result.ok) throw result.error;
    expect(result.merged).toBe(true);
    expect(result.mergeCount).toBe(3);
    expect(result.reportId).toBe(7);
    expect(result.report.sources.map((s) => s.url)).toEqual([REUTERS]);
    expect(result.report.scored.sourcesConsidered).toBe(2);
    expect(collaborators.extractFacts).toHaveBeenCalledTimes(1);
    expect(store.loadReportAnalysis).toHaveBeenCalledWith(7);

    expect(store.saveReport).not.toHaveBeenCalled();
    expect(store.updateReport).toHaveBeenCalledTimes(1);
    const [reportId, record] = store.updateReport.mock.calls[0];
    expect(reportId).toBe(7);
    expect(record.mergeCount).toBe(3);
    expect(record.analysisAttempts).toBe(2);
    expect(record.sourcesFiltered).toBe(1);
    expect(record.analyzedSources.map((s) => s.url)).toEqual(["https://www.cdc.gov/prior", REUTERS]);
  });
});
