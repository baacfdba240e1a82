/**
 * Report narrative: summary sentence, recommendations and detail tables
 * derived from a ScoredReport. Pure functions, no LLM involved.
 *
 * @module analyzer/report-narrative
 */

import { formatScore } from "./aggregation";
import type { ScoredReport, SourceType } from "./types";

export interface ReportNarrative {
  /** Verdict band, or null when the article could not be scored. */
  verdict: string | null;
  summary: string;
  recommendations: string;
}

export interface SourceTypeBreakdown {
  count: number;
  /** Mean agreement ratio of the type's sources, in percent. */
  averageAgreement: number;
  agreements: number[];
}

export interface ReportDetails {
  scoreBreakdown: Partial<Record<SourceType, SourceTypeBreakdown>>;
  sourceDistribution: Partial<Record<SourceType, number>>;
  factVerification: {
    totalMatchingFacts: number;
    totalConflictingFacts: number;
    verificationRatio: number;
  };
}

export function verdictBand(score: number): string {
  if (score >= 80) return "highly accurate";
  if (score >= 60) return "moderately accurate";
  if (score >= 40) return "questionable accuracy";
  return "low accuracy";
}

function countFacts(report: ScoredReport): { matching: number; conflicting: number } {
  let matching = 0;
  let conflicting = 0;
  for (const s of report.sources) {
    matching += s.matched.length;
    conflicting += s.conflicting.length;
  }
  return { matching, conflicting };
}

export function buildSummary(report: ScoredReport): string {
  if (report.overallScore === null) {
    return (
      "Unable to verify: no corroborating sources could be analyzed. " +
      `Sources analyzed: ${report.sourcesConsidered}, filtered: ${report.sourcesFiltered}, failed: ${report.sourcesFailed}.`
    );
  }

  const { matching, conflicting } = countFacts(report);
  return (
    `Based on analysis of ${report.sourcesConsidered} source(s), ` +
    `the article appears to be ${verdictBand(report.overallScore)} ` +
    `with an overall score of ${formatScore(report.overallScore)}/100. ` +
    `Found ${matching} corroborating fact(s) and ${conflicting} conflicting claim(s) across sources.`
  );
}

export function buildRecommendations(report: ScoredReport): string {
  const score = report.overallScore;
  if (score === null) {
    return "The article could not be fact-checked due to lack of available sources. Exercise extreme caution with this information.";
  }

  const recommendations: string[] = [];
  if (score >= 80 && report.confidenceLevel === "high") {
    recommendations.push("The information appears reliable and well-supported by multiple sources.");
  } else if (score >= 60) {
    recommendations.push("The information has moderate support. Consider seeking additional sources for verification.");
  } else {
    recommendations.push("Exercise caution: The information has limited support or conflicting reports.");
  }

  const types = new Set(report.sources.map((s) => s.sourceType));
  if (!types.has("official")) {
    recommendations.push("No official sources were found. Consider checking government or institutional sources.");
  }
  if (types.size < 2) {
    recommendations.push("Limited source diversity. Cross-reference with different types of sources.");
  }

  return recommendations.join(" ");
}

export function buildNarrative(report: ScoredReport): ReportNarrative {
  return {
    verdict: report.overallScore === null ? null : verdictBand(report.overallScore),
    summary: buildSummary(report),
    recommendations: buildRecommendations(report),
  };
}

export function buildReportDetails(report: ScoredReport): ReportDetails {
  const scoreBreakdown: Partial<Record<SourceType, SourceTypeBreakdown>> = {};
  const sourceDistribution: Partial<Record<SourceType, number>> = {};

  for (const s of report.sources) {
    const agreement = s.agreementRatio * 100;
    const entry = scoreBreakdown[s.sourceType] ?? { count: 0, averageAgreement: 0, agreements: [] };
    entry.agreements.push(agreement);
    entry.count = entry.agreements.length;
    entry.averageAgreement = entry.agreements.reduce((sum, a) => sum + a, 0) / entry.count;
    scoreBreakdown[s.sourceType] = entry;
    sourceDistribution[s.sourceType] = (sourceDistribution[s.sourceType] ?? 0) + 1;
  }

  const { matching, conflicting } = countFacts(report);
  return {
    scoreBreakdown,
    sourceDistribution,
    factVerification: {
      totalMatchingFacts: matching,
      totalConflictingFacts: conflicting,
      verificationRatio: matching + conflicting > 0 ? matching / (matching + conflicting) : 0,
    },
  };
}
