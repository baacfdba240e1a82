/**
 * Source lifecycle: pending -> (filtered | analyzed | fetch_failed).
 * Every terminal state is final; transitions return new frozen records.
 *
 * @module analyzer/source-lifecycle
 */

import { IllegalSourceTransitionError } from "./errors";
import type {
  AnalyzedSource,
  ComparisonVerdict,
  FactHierarchy,
  FailedSource,
  FilteredSource,
  PendingSource,
  SearchCandidate,
  Source,
  SourceAgreement,
  SourceFailure,
  SourceType,
} from "./types";

export function createPendingSource(
  candidate: SearchCandidate,
  sourceType: SourceType,
  query: string,
): PendingSource {
  return Object.freeze({
    status: "pending" as const,
    url: candidate.url,
    domain: candidate.domain,
    title: candidate.title,
    snippet: candidate.snippet,
    sourceType,
    query,
  });
}

function assertPending(source: Source, to: Source["status"]): asserts source is PendingSource {
  if (source.status !== "pending") {
    throw new IllegalSourceTransitionError(source.url, source.status, to);
  }
}

function baseFields(source: PendingSource) {
  return {
    url: source.url,
    domain: source.domain,
    title: source.title,
    snippet: source.snippet,
    sourceType: source.sourceType,
    query: source.query,
  };
}

export function markFiltered(
  source: Source,
  relevanceScore: number,
  factHierarchy: FactHierarchy | null = null,
): FilteredSource {
  assertPending(source, "filtered");
  return Object.freeze({ ...baseFields(source), status: "filtered" as const, relevanceScore, factHierarchy });
}

export function markFailed(source: Source, failure: SourceFailure): FailedSource {
  assertPending(source, "fetch_failed");
  return Object.freeze({ ...baseFields(source), status: "fetch_failed" as const, failure });
}

export function markAnalyzed(
  source: Source,
  details: {
    relevanceScore: number;
    factHierarchy: FactHierarchy;
    verdicts: readonly ComparisonVerdict[];
    agreement: SourceAgreement;
  },
): AnalyzedSource {
  assertPending(source, "analyzed");
  return Object.freeze({
    ...baseFields(source),
    status: "analyzed" as const,
    relevanceScore: details.relevanceScore,
    factHierarchy: details.factHierarchy,
    verdicts: Object.freeze([...details.verdicts]),
    agreement: details.agreement,
  });
}
