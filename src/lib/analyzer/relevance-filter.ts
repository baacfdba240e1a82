/**
 * Relevance Filter
 *
 * Cost-avoidance gate in front of comparison and scoring. A source whose
 * relevance score falls below the threshold is marked `filtered` and never
 * reaches aggregation. A missing score defaults to 0.5 so that an absent
 * judgment cannot hide a candidate from review.
 *
 * @module analyzer/relevance-filter
 */

import { markFiltered } from "./source-lifecycle";
import type { FactHierarchy, FilteredSource, PendingSource } from "./types";

export const DEFAULT_RELEVANCE_THRESHOLD = 0.4;
export const DEFAULT_RELEVANCE_SCORE = 0.5;

export interface RelevanceFilterOptions {
  threshold?: number;
  defaultScore?: number;
}

export type RelevanceDecision =
  | { passed: true; source: PendingSource; relevanceScore: number }
  | { passed: false; source: FilteredSource; relevanceScore: number };

/** Missing or non-numeric scores become the default; everything else is clamped to [0,1]. */
export function resolveRelevanceScore(
  score: number | null | undefined,
  defaultScore = DEFAULT_RELEVANCE_SCORE,
): number {
  if (typeof score !== "number" || !Number.isFinite(score)) return defaultScore;
  return Math.min(1, Math.max(0, score));
}

/** `false` iff score < threshold; the threshold itself passes. */
export function isRelevant(score: number, threshold = DEFAULT_RELEVANCE_THRESHOLD): boolean {
  return !(score < threshold);
}

export function applyRelevanceFilter(
  source: PendingSource,
  score: number | null | undefined,
  options: RelevanceFilterOptions & { factHierarchy?: FactHierarchy | null } = {},
): RelevanceDecision {
  const relevanceScore = resolveRelevanceScore(score, options.defaultScore);
  if (isRelevant(relevanceScore, options.threshold)) {
    return { passed: true, source, relevanceScore };
  }
  return {
    passed: false,
    source: markFiltered(source, relevanceScore, options.factHierarchy ?? null),
    relevanceScore,
  };
}
