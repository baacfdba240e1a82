import { describe, expect, it } from "vitest";
import { applyRelevanceFilter, isRelevant, resolveRelevanceScore } from "@/lib/analyzer/relevance-filter";
import { hierarchyOf, pendingSource } from "@test/helpers/test-helpers";

describe("resolveRelevanceScore", () => {
  it("defaults missing scores to 0.5", () => {
    expect(resolveRelevanceScore(undefined)).toBe(0.5);
    expect(resolveRelevanceScore(null)).toBe(0.5);
    expect(resolveRelevanceScore(Number.NaN)).toBe(0.5);
    expect(resolveRelevanceScore(null, 0.7)).toBe(0.7);
  });

  it("clamps to [0,1]", () => {
    expect(resolveRelevanceScore(1.4)).toBe(1);
    expect(resolveRelevanceScore(-0.2)).toBe(0);
    expect(resolveRelevanceScore(0.35)).toBe(0.35);
  });
});

describe("isRelevant", () => {
  it("passes the threshold itself", () => {
    expect(isRelevant(0.4)).toBe(true);
    expect(isRelevant(0.39)).toBe(false);
    expect(isRelevant(0.5, 0.6)).toBe(false);
  });
});

describe("applyRelevanceFilter", () => {
  it("lets relevant sources through unchanged", () => {
    const source = pendingSource("https://news.example.com/a");
    const decision = applyRelevanceFilter(source, 0.8);
    expect(decision.passed).toBe(true);
    expect(decision.source).toBe(source);
    expect(decision.relevanceScore).toBe(0.8);
  });

  it("passes a source with no score using the default", () => {
    const decision = applyRelevanceFilter(pendingSource("https://news.example.com/a"), undefined);
    expect(decision).toMatchObject({ passed: true, relevanceScore: 0.5 });
  });

  it("marks irrelevant sources filtered and keeps their hierarchy", () => {
    const hierarchy = hierarchyOf("news.example.com/a", { what: [{ text: "Unrelated" }] });
    const decision = applyRelevanceFilter(pendingSource("https://news.example.com/a"), 0.2, {
      factHierarchy: hierarchy,
    });
    expect(decision.passed).toBe(false);
    expect(decision.source.status).toBe("filtered");
    if (decision.source.status !== "filtered") return;
    expect(decision.source.relevanceScore).toBe(0.2);
    expect(decision.source.factHierarchy).toBe(hierarchy);
  });

  it("honors a custom threshold", () => {
    const decision = applyRelevanceFilter(pendingSource("https://news.example.com/a"), 0.5, { threshold: 0.6 });
    expect(decision.passed).toBe(false);
  });
});
