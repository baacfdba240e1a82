/**
 * Analysis Service
 *
 * Article-level orchestration around runFactCheck:
 *   - fetch the article (URL input) or take pasted text
 *   - reuse a stored report for the same URL / content and merge into it
 *   - retry with optimized queries while too few sources could be scored
 *   - rescore the union of all analyzed sources and persist the report
 *
 * @module analysis-service
 */

import crypto from "crypto";
import type { PipelineConfig } from "./config-schemas";
import { classifyError } from "./error-classification";
import { scoreSources } from "./analyzer/aggregation";
import type { PipelineCollaborators } from "./analyzer/collaborators";
import { ArticleFetchError, type MalformedExtractionError } from "./analyzer/errors";
import {
  runFactCheck,
  type AnalysisReport,
  type ArticleInput,
} from "./analyzer/fact-check-pipeline";
import { buildNarrative, buildReportDetails } from "./analyzer/report-narrative";
import { ORIGINAL_SOURCE_ID, type AnalyzedSource, type FactHierarchy, type SettledSource } from "./analyzer/types";
import {
  findReportByContentHash,
  findReportByUrl,
  hashContent,
  loadReportAnalysis,
  saveReport,
  updateReport,
  type StoredReport,
} from "./report-store";

// ============================================================================
// TYPES
// ============================================================================

export type AnalyzeInput =
  | { url: string; title?: string | null }
  | { text: string; title?: string | null };

/** The subset of the report store the service needs. */
export interface ReportRepository {
  saveReport: typeof saveReport;
  updateReport: typeof updateReport;
  findReportByUrl: typeof findReportByUrl;
  findReportByContentHash: typeof findReportByContentHash;
  loadReportAnalysis: typeof loadReportAnalysis;
}

export const sqliteReportRepository: ReportRepository = {
  saveReport,
  updateReport,
  findReportByUrl,
  findReportByContentHash,
  loadReportAnalysis,
};

export interface AnalysisServiceDeps {
  config: PipelineConfig;
  collaborators: PipelineCollaborators;
  /** Queries for retry attempts (attempt >= 2). Without it no retry happens. */
  optimizeQueries?: (hierarchy: FactHierarchy, attempt: number) => Promise<string[]>;
  /** Omit to skip persistence entirely. */
  store?: ReportRepository;
  /** Merge into an existing report for the same article instead of starting over. */
  reuseExisting?: boolean;
  runId?: string;
}

export interface AnalyzeArticleSuccess {
  ok: true;
  report: AnalysisReport;
  reportId: number | null;
  merged: boolean;
  mergeCount: number;
  attempts: number;
}

export type AnalyzeArticleResult =
  | AnalyzeArticleSuccess
  | { ok: false; error: ArticleFetchError | MalformedExtractionError };

interface PriorState {
  report: StoredReport;
  sources: AnalyzedSource[];
  originalHierarchy: FactHierarchy;
}

// ============================================================================
// STEPS
// ============================================================================

async function resolveArticle(
  input: AnalyzeInput,
  deps: AnalysisServiceDeps,
): Promise<{ ok: true; article: ArticleInput } | { ok: false; error: ArticleFetchError }> {
  if (!("url" in input)) {
    return { ok: true, article: { url: null, title: input.title ?? null, text: input.text } };
  }

  try {
    const fetched = await deps.collaborators.fetchArticle(input.url, AbortSignal.timeout(deps.config.perSourceTimeoutMs));
    return { ok: true, article: { url: input.url, title: input.title ?? fetched.title ?? null, text: fetched.text } };
  } catch (err) {
    const classified = classifyError(err);
    console.error(`[Analysis] Could not fetch ${input.url} (${classified.category}): ${classified.message}`);
    return {
      ok: false,
      error: new ArticleFetchError(`Could not fetch article: ${classified.message}`, input.url, classified.category),
    };
  }
}

async function loadPrior(article: ArticleInput, deps: AnalysisServiceDeps): Promise<PriorState | null> {
  const store = deps.store;
  if (!store || !deps.reuseExisting) return null;

  const existing = article.url
    ? await store.findReportByUrl(article.url)
    : await store.findReportByContentHash(hashContent(article.text));
  if (!existing) return null;

  const restored = await store.loadReportAnalysis(existing.id);
  if (!restored) return null;

  console.log(`[Analysis] Merging into report ${existing.id} (${restored.sources.length} prior source(s))`);
  return { report: existing, sources: restored.sources, originalHierarchy: restored.originalHierarchy };
}

// ============================================================================
// PUBLIC API
// ============================================================================

export async function analyzeArticle(input: AnalyzeInput, deps: AnalysisServiceDeps): Promise<AnalyzeArticleResult> {
  const { config, collaborators } = deps;
  const runId = deps.runId ?? crypto.randomUUID();

  const resolved = await resolveArticle(input, deps);
  if (!resolved.ok) return resolved;
  const article = resolved.article;

  const prior = await loadPrior(article, deps);

  let originalHierarchy = prior?.originalHierarchy;
  if (!originalHierarchy) {
    const extraction = await collaborators.extractFacts(article.text, {
      sourceId: ORIGINAL_SOURCE_ID,
      title: article.title,
    });
    if (!extraction.ok) return { ok: false, error: extraction.error };
    originalHierarchy = extraction.hierarchy;
  }

  const excluded = new Set<string>((prior?.sources ?? []).map((s) => s.url));
  const newSources: SettledSource[] = [];
  const allQueries: string[] = [];
  let candidatesFound = 0;
  let attempts = 0;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    let queries: string[] | undefined;
    if (attempt > 1) {
      if (!deps.optimizeQueries) break;
      queries = await deps.optimizeQueries(originalHierarchy, attempt);
      if (queries.length === 0) break;
    }

    const outcome = await runFactCheck({
      runId: `${runId}#${attempt}`,
      article,
      config,
      collaborators,
      originalHierarchy,
      queries,
      excludeUrls: [...excluded],
      logPrefix: `[Pipeline:${attempt}]`,
    });
    if (!outcome.ok) return outcome;
    attempts = attempt;

    const { report } = outcome;
    allQueries.push(...report.queries);
    candidatesFound += report.candidatesFound;
    for (const s of report.sources) {
      newSources.push(s);
      excluded.add(s.url);
    }

    const analyzedSoFar = [...(prior?.sources ?? []), ...newSources.flatMap((s) => (s.status === "analyzed" ? [s] : []))];
    const scoredSoFar = scoreSources(
      { analyzed: analyzedSoFar, filteredCount: 0, failedCount: 0 },
      { reliabilityWeights: config.reliabilityWeights },
    ).sourcesScored;

    if (scoredSoFar >= config.minSourcesForRetry) break;
    if (attempt < config.maxAttempts) {
      console.log(
        `[Analysis] ${scoredSoFar} scored source(s) after attempt ${attempt}, below ${config.minSourcesForRetry}; retrying`,
      );
    }
  }

  const newAnalyzed = newSources.flatMap((s) => (s.status === "analyzed" ? [s] : []));
  const analyzed = [...(prior?.sources ?? []), ...newAnalyzed];
  const scored = scoreSources(
    {
      analyzed,
      filteredCount: (prior?.report.sourcesFiltered ?? 0) + newSources.filter((s) => s.status === "filtered").length,
      failedCount: (prior?.report.sourcesFailed ?? 0) + newSources.filter((s) => s.status === "fetch_failed").length,
    },
    { reliabilityWeights: config.reliabilityWeights },
  );
  const narrative = buildNarrative(scored);
  const details = buildReportDetails(scored);

  const report: AnalysisReport = {
    runId,
    article: { url: article.url, title: article.title },
    originalHierarchy,
    queries: allQueries,
    candidatesFound,
    scored,
    sources: newSources,
    narrative,
    details,
  };

  const mergeCount = prior ? prior.report.mergeCount + 1 : 0;
  let reportId: number | null = null;
  if (deps.store) {
    const record = {
      article,
      originalHierarchy,
      overallScore: scored.overallScore,
      confidenceLevel: scored.confidenceLevel,
      sourcesConsidered: scored.sourcesConsidered,
      sourcesScored: scored.sourcesScored,
      sourcesFiltered: scored.sourcesFiltered,
      sourcesFailed: scored.sourcesFailed,
      summary: narrative.summary,
      recommendations: narrative.recommendations,
      details,
      mergeCount,
      analysisAttempts: (prior?.report.analysisAttempts ?? 0) + attempts,
      analyzedSources: analyzed,
    };
    if (prior) {
      await deps.store.updateReport(prior.report.id, record);
      reportId = prior.report.id;
    } else {
      reportId = await deps.store.saveReport(record);
    }
  }

  return { ok: true, report, reportId, merged: prior !== null, mergeCount, attempts };
}
