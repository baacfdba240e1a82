/**
 * Fact-Check Pipeline
 *
 * One run: extract the article's fact hierarchy, search for prioritized
 * queries, de-duplicate candidates, then per candidate
 *
 *   [pre-score relevance] -> fetch -> extract -> compare -> [relevance gate] -> aggregate
 *
 * under a p-limit worker pool and a per-source timeout. Every source ends in
 * exactly one terminal state (analyzed, filtered, fetch_failed). Scoring runs
 * only after every scheduled task has settled.
 *
 * The run persists nothing; all run state lives in the context and locals.
 *
 * @module analyzer/fact-check-pipeline
 */

import pLimit from "p-limit";
import type { PipelineConfig } from "../config-schemas";
import { classifyError } from "../error-classification";
import { scoreSources } from "./aggregation";
import type { PipelineCollaborators } from "./collaborators";
import { aggregateComparison } from "./comparison-aggregator";
import { debugLog } from "./debug";
import type { MalformedExtractionError } from "./errors";
import { buildPrioritizedQueries } from "./query-prioritizer";
import { applyRelevanceFilter } from "./relevance-filter";
import { buildNarrative, buildReportDetails, type ReportDetails, type ReportNarrative } from "./report-narrative";
import { classifySourceType, dedupeCandidates, extractDomain, normalizeSourceKey } from "./source-classification";
import { createPendingSource, markAnalyzed, markFailed } from "./source-lifecycle";
import {
  ORIGINAL_SOURCE_ID,
  type FactHierarchy,
  type PendingSource,
  type ScoredReport,
  type SearchCandidate,
  type SettledSource,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface ArticleInput {
  url: string | null;
  title: string | null;
  text: string;
}

export interface AnalysisRunContext {
  runId: string;
  article: ArticleInput;
  config: PipelineConfig;
  collaborators: PipelineCollaborators;
  /** Already-extracted hierarchy of the article (retry attempts reuse it). */
  originalHierarchy?: FactHierarchy;
  /** Replaces the prioritized queries, e.g. optimized queries on a retry. */
  queries?: readonly string[];
  /** URLs that must not be analyzed again in this run. */
  excludeUrls?: readonly string[];
  logPrefix?: string;
}

export interface AnalysisReport {
  runId: string;
  article: { url: string | null; title: string | null };
  originalHierarchy: FactHierarchy;
  queries: string[];
  candidatesFound: number;
  scored: ScoredReport;
  sources: SettledSource[];
  narrative: ReportNarrative;
  details: ReportDetails;
}

export type AnalysisOutcome =
  | { ok: true; report: AnalysisReport }
  | { ok: false; error: MalformedExtractionError };

interface ScheduledCandidate {
  candidate: SearchCandidate;
  query: string;
}

class SourceTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Source processing timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

// ============================================================================
// SEARCH & CANDIDATES
// ============================================================================

async function collectCandidates(ctx: AnalysisRunContext, queries: readonly string[]): Promise<ScheduledCandidate[]> {
  const tag = ctx.logPrefix ?? "[Pipeline]";
  const scheduled: ScheduledCandidate[] = [];

  // Queries run in priority order so earlier queries win de-duplication.
  for (const query of queries) {
    try {
      const results = await ctx.collaborators.search(query);
      console.log(`${tag} Query ${JSON.stringify(query)} -> ${results.length} result(s)`);
      for (const candidate of results) scheduled.push({ candidate, query });
    } catch (err) {
      const classified = classifyError(err);
      console.warn(`${tag} Search failed for ${JSON.stringify(query)} (${classified.category}): ${classified.message}`);
    }
  }

  const excludeUrls = [...(ctx.excludeUrls ?? [])];
  if (ctx.article.url) excludeUrls.push(ctx.article.url);

  const unique = dedupeCandidates(
    scheduled.map((s) => ({ ...s, url: s.candidate.url })),
    { excludeUrls },
  );
  return unique.map(({ candidate, query }) => ({ candidate, query }));
}

// ============================================================================
// PER-SOURCE PROCESSING
// ============================================================================

function sourceIdFor(url: string): string {
  return normalizeSourceKey(url) ?? url;
}

function rejectOnAbort(signal: AbortSignal, timeoutMs: number): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) reject(new SourceTimeoutError(timeoutMs));
    signal.addEventListener("abort", () => reject(new SourceTimeoutError(timeoutMs)), { once: true });
  });
}

async function analyzeSource(
  ctx: AnalysisRunContext,
  original: FactHierarchy,
  pending: PendingSource,
  signal: AbortSignal,
): Promise<SettledSource> {
  const { collaborators, config } = ctx;
  const filterOptions = {
    threshold: config.relevanceThreshold,
    defaultScore: config.defaultRelevanceScore,
  };

  let preScore: number | null = null;
  if (collaborators.preScoreRelevance) {
    const decision = applyRelevanceFilter(
      pending,
      await collaborators.preScoreRelevance(original, {
        url: pending.url,
        title: pending.title,
        snippet: pending.snippet,
        domain: pending.domain,
      }),
      filterOptions,
    );
    if (!decision.passed) return decision.source;
    preScore = decision.relevanceScore;
  }

  const fetched = await collaborators.fetchArticle(pending.url, signal);
  const extraction = await collaborators.extractFacts(fetched.text, {
    sourceId: sourceIdFor(pending.url),
    title: fetched.title || pending.title,
    signal,
  });
  if (!extraction.ok) {
    return markFailed(pending, { category: "extraction", message: extraction.error.message });
  }
  const hierarchy = extraction.hierarchy;

  const comparison = await collaborators.compareFacts(original, hierarchy, signal);
  if (!comparison.ok) {
    return markFailed(pending, { category: "comparison", message: comparison.error.message });
  }

  let relevanceScore: number;
  if (preScore !== null) {
    relevanceScore = preScore;
  } else {
    const decision = applyRelevanceFilter(pending, comparison.relevanceScore, {
      ...filterOptions,
      factHierarchy: hierarchy,
    });
    if (!decision.passed) return decision.source;
    relevanceScore = decision.relevanceScore;
  }

  const aggregated = aggregateComparison(original, hierarchy, comparison.verdicts);
  if (!aggregated.ok) {
    return markFailed(pending, { category: "invalid_verdicts", message: aggregated.error.message });
  }

  return markAnalyzed(pending, {
    relevanceScore,
    factHierarchy: hierarchy,
    verdicts: comparison.verdicts,
    agreement: aggregated.agreement,
  });
}

/**
 * Run one source under the per-source timeout. Never rejects for collaborator
 * failures: they become a fetch_failed record.
 */
async function processSource(
  ctx: AnalysisRunContext,
  original: FactHierarchy,
  pending: PendingSource,
): Promise<SettledSource> {
  const timeoutMs = ctx.config.perSourceTimeoutMs;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await Promise.race([
      analyzeSource(ctx, original, pending, controller.signal),
      rejectOnAbort(controller.signal, timeoutMs),
    ]);
  } catch (err) {
    if (controller.signal.aborted) {
      return markFailed(pending, { category: "timeout", message: `Timed out after ${timeoutMs}ms` });
    }
    const classified = classifyError(err);
    return markFailed(pending, { category: classified.category, message: classified.message });
  } finally {
    clearTimeout(timer);
  }
}

function logTransition(ctx: AnalysisRunContext, source: SettledSource): void {
  const tag = ctx.logPrefix ?? "[Pipeline]";
  switch (source.status) {
    case "analyzed":
      debugLog(`${tag} ${ctx.runId} analyzed ${source.url}`, {
        relevance: source.relevanceScore,
        matches: source.agreement.matches,
        conflicts: source.agreement.conflicts,
        lowSignal: source.agreement.lowSignal,
      });
      break;
    case "filtered":
      debugLog(`${tag} ${ctx.runId} filtered ${source.url} (relevance ${source.relevanceScore.toFixed(2)})`);
      break;
    case "fetch_failed":
      debugLog(`${tag} ${ctx.runId} failed ${source.url} [${source.failure.category}] ${source.failure.message}`);
      break;
  }
}

// ============================================================================
// RUN
// ============================================================================

export async function runFactCheck(ctx: AnalysisRunContext): Promise<AnalysisOutcome> {
  const tag = ctx.logPrefix ?? "[Pipeline]";
  const { config, collaborators } = ctx;

  let original = ctx.originalHierarchy;
  if (!original) {
    const extraction = await collaborators.extractFacts(ctx.article.text, {
      sourceId: ORIGINAL_SOURCE_ID,
      title: ctx.article.title,
    });
    if (!extraction.ok) {
      console.error(`${tag} ${ctx.runId} original extraction failed: ${extraction.error.message}`);
      return { ok: false, error: extraction.error };
    }
    original = extraction.hierarchy;
  }
  const originalHierarchy = original;

  const queries = ctx.queries
    ? [...ctx.queries]
    : buildPrioritizedQueries(originalHierarchy, {
        maxQueries: config.maxQueries,
        maxPhraseWords: config.maxPhraseWords,
      });
  console.log(`${tag} ${ctx.runId} ${queries.length} quer${queries.length === 1 ? "y" : "ies"}`);

  const candidates = queries.length > 0 ? await collectCandidates(ctx, queries) : [];
  const capped = candidates.slice(0, config.maxSourcesToCheck);
  console.log(
    `${tag} ${ctx.runId} ${candidates.length} unique candidate(s), scheduling ${capped.length} (cap ${config.maxSourcesToCheck})`,
  );

  const classify = collaborators.classifySource ?? classifySourceType;
  const pendingSources = capped.map(({ candidate, query }) =>
    createPendingSource(
      candidate,
      classify(candidate.domain || extractDomain(candidate.url) || ""),
      query,
    ),
  );

  const limit = pLimit(config.maxConcurrency);
  const settledResults = await Promise.allSettled(
    pendingSources.map((pending) => limit(() => processSource(ctx, originalHierarchy, pending))),
  );

  const sources = settledResults.map((result, i): SettledSource => {
    if (result.status === "fulfilled") return result.value;
    const classified = classifyError(result.reason);
    return markFailed(pendingSources[i], { category: classified.category, message: classified.message });
  });
  sources.forEach((s) => logTransition(ctx, s));

  const analyzed = sources.flatMap((s) => (s.status === "analyzed" ? [s] : []));
  const scored = scoreSources(
    {
      analyzed,
      filteredCount: sources.filter((s) => s.status === "filtered").length,
      failedCount: sources.filter((s) => s.status === "fetch_failed").length,
    },
    { reliabilityWeights: config.reliabilityWeights },
  );

  console.log(
    `${tag} ${ctx.runId} score=${scored.overallScore === null ? "n/a" : scored.overallScore.toFixed(1)} ` +
      `confidence=${scored.confidenceLevel} analyzed=${scored.sourcesConsidered} scored=${scored.sourcesScored} ` +
      `filtered=${scored.sourcesFiltered} failed=${scored.sourcesFailed}`,
  );

  return {
    ok: true,
    report: {
      runId: ctx.runId,
      article: { url: ctx.article.url, title: ctx.article.title },
      originalHierarchy,
      queries,
      candidatesFound: candidates.length,
      scored,
      sources,
      narrative: buildNarrative(scored),
      details: buildReportDetails(scored),
    },
  };
}
