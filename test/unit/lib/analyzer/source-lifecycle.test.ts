import { describe, expect, it } from "vitest";
import { IllegalSourceTransitionError } from "@/lib/analyzer/errors";
import { markAnalyzed, markFailed, markFiltered } from "@/lib/analyzer/source-lifecycle";
import { analyzedSource, pendingSource } from "@test/helpers/test-helpers";

describe("source lifecycle", () => {
  it("creates frozen pending sources", () => {
    const source = pendingSource("https://www.reuters.com/world/story", "news", '"Q"');
    expect(source).toEqual({
      status: "pending",
      url: "https://www.reuters.com/world/story",
      domain: "reuters.com",
      title: "Title of https://www.reuters.com/world/story",
      snippet: null,
      sourceType: "news",
      query: '"Q"',
    });
    expect(Object.isFrozen(source)).toBe(true);
  });

  it("moves pending to filtered without touching the original record", () => {
    const source = pendingSource("https://a.example/1");
    const filtered = markFiltered(source, 0.1);
    expect(filtered.status).toBe("filtered");
    expect(filtered.factHierarchy).toBeNull();
    expect(source.status).toBe("pending");
  });

  it("moves pending to fetch_failed with its category", () => {
    const failed = markFailed(pendingSource("https://a.example/1"), { category: "timeout", message: "slow" });
    expect(failed.status).toBe("fetch_failed");
    expect(failed.failure).toEqual({ category: "timeout", message: "slow" });
  });

  it("refuses transitions out of terminal states", () => {
    const filtered = markFiltered(pendingSource("https://a.example/1"), 0.1);
    expect(() => markFailed(filtered, { category: "fetch", message: "x" })).toThrow(IllegalSourceTransitionError);
    expect(() => markFiltered(filtered, 0.2)).toThrow("Illegal source transition filtered -> filtered for https://a.example/1");

    const analyzed = analyzedSource({ url: "https://a.example/2", sourceType: "news", relevanceScore: 1, matches: 1, conflicts: 0 });
    expect(() => markFiltered(analyzed, 0.1)).toThrow(IllegalSourceTransitionError);
    expect(() =>
      markAnalyzed(analyzed, {
        relevanceScore: 1,
        factHierarchy: analyzed.factHierarchy,
        verdicts: analyzed.verdicts,
        agreement: analyzed.agreement,
      }),
    ).toThrow(IllegalSourceTransitionError);
  });
});
