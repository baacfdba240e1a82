/**
 * Extraction, comparison and query optimization against a mocked model.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  generateText: vi.fn<(options: { abortSignal?: AbortSignal }) => Promise<{ text: string }>>(),
}));

vi.mock("ai", () => ({ generateText: mocks.generateText }));
vi.mock("@/lib/analyzer/llm", () => ({
  getModelForTask: (task: string) => ({ provider: "google", modelName: `test-${task}`, model: `test-${task}` }),
}));

import { compareFactsWithLlm, toComparisonVerdicts } from "@/lib/analyzer/comparison";
import { ComparisonFailedError, MalformedExtractionError } from "@/lib/analyzer/errors";
import { extractFactsWithLlm } from "@/lib/analyzer/extraction";
import { createFallbackQueries, optimizeSearchQueries, toQueryList } from "@/lib/analyzer/query-optimizer";
import { hierarchyOf } from "@test/helpers/test-helpers";

beforeEach(() => {
  vi.stubEnv("CB_DEBUG_LOG_FILE", "false");
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  mocks.generateText.mockReset();
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

const original = hierarchyOf("original", {
  what: [{ text: "Dam construction began in May" }, { text: "Project costs 2 billion" }],
  claims: [{ text: "The dam will supply 1 million homes" }],
});
const source = hierarchyOf("news.example.com/dam", {
  what: [{ text: "Work on the dam started in May" }, { text: "Budget is 3 billion" }],
});

describe("extractFactsWithLlm", () => {
  it("builds a hierarchy from a fenced reply", async () => {
    mocks.generateText.mockResolvedValueOnce({
      text: '```json\n{"what_facts": [{"event": "Dam construction began", "importance": "high", "confidence": "high"}], "claims": []}\n```',
    });
    const result = await extractFactsWithLlm("Article text", { sourceId: "original", title: "Dam" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.hierarchy.whatFacts[0]).toMatchObject({ id: "original#what-1", text: "Dam construction began", importance: "high" });
  });

  it("returns MalformedExtractionError for a reply without JSON", async () => {
    mocks.generateText.mockResolvedValueOnce({ text: "I cannot help with that." });
    const result = await extractFactsWithLlm("Article text", { sourceId: "s1" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MalformedExtractionError);
    expect(result.error.message).toBe("Extraction reply contained no JSON object");
  });

  it("returns MalformedExtractionError when the call fails", async () => {
    mocks.generateText.mockRejectedValueOnce(new Error("model overloaded"));
    const result = await extractFactsWithLlm("Article text", { sourceId: "s1" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Extraction call failed: model overloaded");
  });

  it("rethrows when the call was aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    mocks.generateText.mockRejectedValueOnce(new Error("aborted"));
    await expect(extractFactsWithLlm("t", { sourceId: "s1", signal: controller.signal })).rejects.toThrow("aborted");
  });

  it("passes the abort signal to the model call", async () => {
    const controller = new AbortController();
    mocks.generateText.mockResolvedValueOnce({ text: '{"claims": []}' });
    await extractFactsWithLlm("t", { sourceId: "s1", signal: controller.signal });
    expect(mocks.generateText.mock.calls[0][0].abortSignal).toBe(controller.signal);
  });
});

describe("compareFactsWithLlm", () => {
  it("maps reply items to verdicts", async () => {
    mocks.generateText.mockResolvedValueOnce({
      text: JSON.stringify({
        verdicts: [
          { original_id: "original#what-1", outcome: "MATCH", source_id: "news.example.com/dam#what-1", match_strength: "strong" },
          {
            original_id: "original#what-2",
            outcome: "conflict",
            source_id: "news.example.com/dam#what-2",
            conflict_type: "partial_mismatch",
            conflict_severity: "Medium",
          },
          { original_id: "original#claim-1", outcome: "absent", source_id: "news.example.com/dam#what-1" },
        ],
        relevance_score: 0.85,
        analysis_notes: "Same project",
      }),
    });

    const result = await compareFactsWithLlm(original, source);
    expect(result).toEqual({
      ok: true,
      relevanceScore: 0.85,
      notes: "Same project",
      verdicts: [
        {
          originalEntityId: "original#what-1",
          outcome: "match",
          matchedSourceEntityId: "news.example.com/dam#what-1",
          matchStrength: "strong",
        },
        {
          originalEntityId: "original#what-2",
          outcome: "conflict",
          matchedSourceEntityId: "news.example.com/dam#what-2",
          conflictType: "partial_mismatch",
          conflictSeverity: "medium",
        },
        { originalEntityId: "original#claim-1", outcome: "absent" },
      ],
    });
  });

  it("treats a missing relevance score as not judged", async () => {
    mocks.generateText.mockResolvedValueOnce({ text: '{"verdicts": [], "relevance_score": "high"}' });
    const result = await compareFactsWithLlm(original, source);
    expect(result.ok && result.relevanceScore).toBeNull();
  });

  it("fails on a reply without verdicts", async () => {
    mocks.generateText.mockResolvedValueOnce({ text: '{"relevance_score": 0.9}' });
    const result = await compareFactsWithLlm(original, source);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ComparisonFailedError);
    expect(result.error.message).toBe("Comparison reply did not match the expected shape");
  });

  it("fails when the call throws", async () => {
    mocks.generateText.mockRejectedValueOnce(new Error("HTTP 503"));
    const result = await compareFactsWithLlm(original, source);
    expect(result.ok === false && result.error.message).toBe("Comparison call failed: HTTP 503");
  });
});

describe("toComparisonVerdicts", () => {
  it("defaults match strength and blanks out empty source ids", () => {
    expect(
      toComparisonVerdicts({
        verdicts: [{ original_id: "original#what-1", outcome: "match", source_id: "  " }],
      }),
    ).toEqual([
      { originalEntityId: "original#what-1", outcome: "match", matchedSourceEntityId: undefined, matchStrength: "moderate" },
    ]);
  });
});

describe("query optimization", () => {
  it("uses the model's queries", async () => {
    mocks.generateText.mockResolvedValueOnce({
      text: '{"primary_query": "dam construction May 2 billion", "alternative_queries": ["dam project cost", 7, ""], "keywords": ["dam"]}',
    });
    const optimized = await optimizeSearchQueries(original, 2);
    expect(optimized).toEqual({
      primaryQuery: "dam construction May 2 billion",
      alternativeQueries: ["dam project cost"],
      keywords: ["dam"],
      fallback: false,
    });
  });

  it("falls back to leading sentences when the model fails", async () => {
    mocks.generateText.mockRejectedValueOnce(new Error("quota exceeded"));
    const optimized = await optimizeSearchQueries(original, 2);
    expect(optimized).toEqual(createFallbackQueries(original));
    expect(optimized).toEqual({
      primaryQuery: "Dam construction began in May Project costs 2 billion",
      alternativeQueries: ["The dam will supply 1 million homes"],
      keywords: [],
      fallback: true,
    });
  });

  it("falls back on an empty primary query", async () => {
    mocks.generateText.mockResolvedValueOnce({ text: '{"primary_query": "  "}' });
    expect((await optimizeSearchQueries(original, 3)).fallback).toBe(true);
  });

  it("flattens optimized queries into a capped list", () => {
    expect(
      toQueryList(
        { primaryQuery: "a  b", alternativeQueries: ["c", "a b", " ", "d"], keywords: [], fallback: false },
        3,
      ),
    ).toEqual(["a b", "c", "d"]);
    expect(toQueryList(createFallbackQueries(original), 1)).toEqual(["Dam construction began in May Project costs 2 billion"]);
  });
});
