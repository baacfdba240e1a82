/**
 * Weighted scoring (source agreement -> overall accuracy score + confidence)
 *
 * Per-source contribution = agreementRatio × reliabilityWeight × relevanceScore
 *
 * Overall score = 100 × Σ(contribution) / Σ(reliabilityWeight × relevanceScore)
 *
 * A weighted average rather than a mean: one low-reliability source cannot
 * outweigh several official ones, and a barely-relevant source (just over the
 * relevance threshold) counts for less than a highly relevant one.
 *
 * Low-signal sources (no match or conflict at all) stay in the breakdown and in
 * the confidence count but add nothing to either sum. With no scorable source the score is null: the
 * article is unverifiable, which is not the same claim as "0% accurate".
 *
 * @module analyzer/aggregation
 */

import type {
  AnalyzedSource,
  ConfidenceLevel,
  ReliabilityWeights,
  ScoredReport,
  SourceBreakdown,
  SourceType,
} from "./types";

export const DEFAULT_RELIABILITY_WEIGHTS: Readonly<ReliabilityWeights> = Object.freeze({
  official: 1.0,
  news: 0.8,
  blog: 0.4,
  social: 0.3,
  unknown: 0.5,
});

export interface ScoringInput {
  analyzed: readonly AnalyzedSource[];
  filteredCount: number;
  failedCount: number;
}

export interface ScoringOptions {
  reliabilityWeights?: Partial<ReliabilityWeights>;
}

/**
 * Reliability weight for a source type. Types missing from the supplied
 * table fall back to the default table.
 */
export function getReliabilityWeight(
  sourceType: SourceType,
  weights: Partial<ReliabilityWeights> = DEFAULT_RELIABILITY_WEIGHTS,
): number {
  const weight = weights[sourceType];
  return typeof weight === "number" && Number.isFinite(weight) && weight >= 0
    ? weight
    : DEFAULT_RELIABILITY_WEIGHTS[sourceType];
}

export function buildSourceBreakdown(
  source: AnalyzedSource,
  weights?: Partial<ReliabilityWeights>,
): SourceBreakdown {
  const reliabilityWeight = getReliabilityWeight(source.sourceType, weights);
  const { agreement } = source;
  const effectiveWeight = agreement.lowSignal ? 0 : reliabilityWeight * source.relevanceScore;

  return Object.freeze({
    url: source.url,
    domain: source.domain,
    title: source.title,
    sourceType: source.sourceType,
    relevanceScore: source.relevanceScore,
    agreementRatio: agreement.agreementRatio,
    lowSignal: agreement.lowSignal,
    reliabilityWeight,
    effectiveWeight,
    contribution: agreement.agreementRatio * effectiveWeight,
    matchConfidence: agreement.matchConfidence,
    matched: agreement.matched,
    conflicting: agreement.conflicting,
  });
}

/**
 * Weighted average of agreement across breakdown entries, on a 0-100 scale.
 * Returns null when no entry carries weight.
 */
export function calculateOverallScore(breakdown: readonly SourceBreakdown[]): number | null {
  let totalContribution = 0;
  let totalWeight = 0;

  for (const entry of breakdown) {
    if (entry.lowSignal) continue;
    totalContribution += entry.contribution;
    totalWeight += entry.effectiveWeight;
  }

  if (totalWeight <= 0) return null;
  return Math.min(100, Math.max(0, (100 * totalContribution) / totalWeight));
}

/**
 * Confidence from analyzed-source count and score, evaluated in order:
 *   1. fewer than 3 analyzed sources (or no score) -> low
 *   2. 5+ sources and score >= 80                  -> high
 *   3. 3-4 sources                                  -> medium
 *   4. score in [60, 80)                            -> medium
 *   5. otherwise                                    -> low
 * The count gate comes first so volume alone never buys "high" and a handful of
 * agreeing sources never claims it either.
 */
export function determineConfidenceLevel(
  analyzedCount: number,
  score: number | null,
): ConfidenceLevel {
  if (score === null || analyzedCount < 3) return "low";
  if (analyzedCount >= 5 && score >= 80) return "high";
  if (analyzedCount < 5) return "medium";
  if (score >= 60 && score < 80) return "medium";
  return "low";
}

export function scoreSources(input: ScoringInput, options: ScoringOptions = {}): ScoredReport {
  const breakdown = input.analyzed.map((s) => buildSourceBreakdown(s, options.reliabilityWeights));
  const sourcesScored = breakdown.filter((b) => !b.lowSignal && b.effectiveWeight > 0).length;
  const overallScore = calculateOverallScore(breakdown);

  return Object.freeze({
    overallScore,
    confidenceLevel: determineConfidenceLevel(input.analyzed.length, overallScore),
    sourcesConsidered: input.analyzed.length,
    sourcesScored,
    sourcesFiltered: input.filteredCount,
    sourcesFailed: input.failedCount,
    sources: Object.freeze(breakdown),
  });
}

/** One decimal for display; "n/a" when unverifiable. */
export function formatScore(score: number | null): string {
  return score === null ? "n/a" : score.toFixed(1);
}
