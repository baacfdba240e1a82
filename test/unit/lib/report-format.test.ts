import { describe, expect, it } from "vitest";
import { scoreSources } from "@/lib/analyzer/aggregation";
import type { AnalysisReport } from "@/lib/analyzer/fact-check-pipeline";
import { buildReportDetails } from "@/lib/analyzer/report-narrative";
import { markFailed } from "@/lib/analyzer/source-lifecycle";
import { formatAnalysisReport, formatReportListLine, formatStoredReport } from "@/lib/report-format";
import type { StoredReport } from "@/lib/report-store";
import { analyzedSource, hierarchyOf, numberedFacts, pendingSource } from "@test/helpers/test-helpers";

const official = analyzedSource({ url: "https://www.cdc.gov/report", sourceType: "official", relevanceScore: 0.9, matches: 2, conflicts: 0 });
const news = analyzedSource({ url: "https://www.reuters.com/story", sourceType: "news", relevanceScore: 0.5, matches: 1, conflicts: 1 });
const quiet = analyzedSource({
  url: "https://blog.example.org/post",
  sourceType: "blog",
  relevanceScore: 0.7,
  matches: 0,
  conflicts: 0,
  absent: 2,
});
const failed = markFailed(pendingSource("https://slow.example.com/x", "unknown"), {
  category: "timeout",
  message: "Timed out after 50ms",
});

function analysisReport(title: string | null): AnalysisReport {
  const scored = scoreSources({ analyzed: [official, news, quiet], filteredCount: 1, failedCount: 1 });
  return {
    runId: "run-1",
    article: { url: "https://origin.example.com/a", title },
    originalHierarchy: hierarchyOf("original", { what: numberedFacts(2) }),
    queries: ['"Fact 1 happened"'],
    candidatesFound: 5,
    scored,
    sources: [official, news, quiet, failed],
    narrative: { verdict: "Mostly accurate", summary: "Summary text", recommendations: "Recommendation text" },
    details: buildReportDetails(scored),
  };
}

function storedReport(overrides: Partial<StoredReport> = {}): StoredReport {
  return {
    id: 7,
    articleId: 3,
    articleUrl: "https://origin.example.com/a",
    articleTitle: "Headline",
    contentHash: "hash",
    overallScore: 84.615,
    confidenceLevel: "low",
    sourcesConsidered: 3,
    sourcesScored: 2,
    sourcesFiltered: 1,
    sourcesFailed: 1,
    summary: "Summary text",
    recommendations: "Recommendation text",
    details: {},
    mergeCount: 1,
    analysisAttempts: 2,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-02T00:00:00.000Z",
    ...overrides,
  };
}

describe("formatAnalysisReport", () => {
  it("renders scores, the source breakdown and failures", () => {
    expect(formatAnalysisReport(analysisReport("Headline"), 5).split("\n")).toEqual([
      "Report #5: Headline",
      "Score: 84.6/100  Confidence: medium",
      "Sources: 3 analyzed, 2 scored, 1 filtered, 1 failed",
      "",
      "Summary text",
      "Recommendation text",
      "",
      "Per-source breakdown:",
      "  [official] cdc.gov  agreement 100%  relevance 0.90  weight 0.90  +2/-0",
      "  [news] reuters.com  agreement 50%  relevance 0.50  weight 0.40  +1/-1",
      "  [blog] blog.example.org  agreement 0%  relevance 0.70  weight 0.00  +0/-0 (low signal)",
      "",
      "Failed sources:",
      "  https://slow.example.com/x  [timeout] Timed out after 50ms",
    ]);
  });

  it("falls back to the article URL without a title or report id", () => {
    expect(formatAnalysisReport(analysisReport(null)).split("\n")[0]).toBe("Report: https://origin.example.com/a");
  });
});

describe("formatStoredReport", () => {
  it("renders the stored summary and analyzed sources", () => {
    const text = formatStoredReport(storedReport(), [
      {
        url: "https://www.cdc.gov/report",
        domain: "cdc.gov",
        title: "CDC",
        sourceType: "official",
        query: '"query"',
        relevanceScore: 0.9,
        agreementRatio: 0.666,
        matches: 2,
        conflicts: 1,
        lowSignal: false,
      },
    ]);
    expect(text.split("\n")).toEqual([
      "Report #7: Headline",
      "Score: 84.6/100  Confidence: low",
      "Updated: 2026-01-02T00:00:00.000Z  Merges: 1  Attempts: 2",
      "",
      "Summary text",
      "Recommendation text",
      "",
      "Analyzed sources:",
      "  [official] https://www.cdc.gov/report  agreement 67%  +2/-1",
    ]);
  });

  it("omits the source section when there are no sources", () => {
    expect(formatStoredReport(storedReport({ overallScore: null })).split("\n")).toHaveLength(6);
  });
});

describe("formatReportListLine", () => {
  it("aligns score and confidence columns", () => {
    expect(formatReportListLine(storedReport())).toBe("#7   84.6  low     2026-01-01T00:00:00.000Z  Headline");
    expect(formatReportListLine(storedReport({ overallScore: null, articleTitle: null, confidenceLevel: "medium" }))).toBe(
      "#7    n/a  medium  2026-01-01T00:00:00.000Z  https://origin.example.com/a",
    );
  });
});
