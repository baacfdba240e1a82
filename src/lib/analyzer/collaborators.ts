/**
 * Collaborator contract of the fact-check pipeline.
 *
 * The engine never talks to an LLM, a search API or the network directly; it
 * calls these functions. `createDefaultCollaborators` wires the production
 * adapters; tests pass in-process fakes.
 *
 * @module analyzer/collaborators
 */

import type { PipelineConfig, SearchConfig } from "../config-schemas";
import { fetchArticle } from "../retrieval";
import { searchWeb } from "../web-search";
import { compareFactsWithLlm } from "./comparison";
import { extractFactsWithLlm } from "./extraction";
import type { ExtractionResult } from "./fact-hierarchy";
import { classifySourceType, extractDomain } from "./source-classification";
import type { ComparisonVerdict, FactHierarchy, SearchCandidate, SourceType } from "./types";

export interface FetchedArticle {
  url: string;
  title: string;
  text: string;
  domain: string;
}

export type ComparisonResult =
  | {
      ok: true;
      /** Model-reported relevance in [0,1]; null/undefined means "not judged". */
      relevanceScore?: number | null;
      verdicts: ComparisonVerdict[];
      notes?: string;
    }
  | { ok: false; error: Error };

export interface ExtractFactsRequest {
  sourceId: string;
  title?: string | null;
  signal?: AbortSignal;
}

export interface PipelineCollaborators {
  extractFacts(text: string, request: ExtractFactsRequest): Promise<ExtractionResult>;
  search(query: string): Promise<SearchCandidate[]>;
  fetchArticle(url: string, signal: AbortSignal): Promise<FetchedArticle>;
  compareFacts(original: FactHierarchy, source: FactHierarchy, signal: AbortSignal): Promise<ComparisonResult>;
  /** Cheap relevance estimate before any fetch; a score below threshold skips the source. */
  preScoreRelevance?(original: FactHierarchy, candidate: SearchCandidate): Promise<number | null>;
  classifySource?(domain: string): SourceType;
}

export interface DefaultCollaboratorOptions {
  pipelineConfig: PipelineConfig;
  searchConfig: SearchConfig;
}

export function createDefaultCollaborators(options: DefaultCollaboratorOptions): PipelineCollaborators {
  const { pipelineConfig, searchConfig } = options;

  return {
    extractFacts: (text, request) =>
      extractFactsWithLlm(text, {
        sourceId: request.sourceId,
        title: request.title,
        signal: request.signal,
        config: pipelineConfig,
      }),

    search: async (query) => {
      const results = await searchWeb({ query, maxResults: pipelineConfig.resultsPerQuery }, searchConfig);
      const candidates: SearchCandidate[] = [];
      for (const r of results) {
        const domain = extractDomain(r.url);
        if (!domain) continue;
        candidates.push({ url: r.url, title: r.title, snippet: r.snippet, domain });
      }
      return candidates;
    },

    fetchArticle: (url, signal) => fetchArticle(url, { signal, timeoutMs: pipelineConfig.perSourceTimeoutMs }),

    compareFacts: (original, source, signal) =>
      compareFactsWithLlm(original, source, { signal, config: pipelineConfig }),

    classifySource: classifySourceType,
  };
}
