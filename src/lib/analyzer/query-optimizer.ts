/**
 * Retry query optimization.
 *
 * When exact-phrase queries turn up too few sources, later attempts ask the
 * model for complete-sentence queries instead. If the model call fails the
 * first sentences of the leading facts are used.
 *
 * @module analyzer/query-optimizer
 */

import { generateText } from "ai";
import { z } from "zod";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config-schemas";
import { toPromptShape } from "./fact-hierarchy";
import { tryParseFirstJsonObject } from "./json";
import { getModelForTask } from "./llm";
import { getQueryOptimizationBasePrompt } from "./prompts/base/query-optimization-base";
import type { FactHierarchy } from "./types";

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((v): v is string => typeof v === "string" && v.trim().length > 0));

const OptimizedQueriesSchema = z.object({
  primary_query: z.string().catch(""),
  alternative_queries: stringList.optional(),
  keywords: stringList.optional(),
});

export interface OptimizedQueries {
  primaryQuery: string;
  alternativeQueries: string[];
  keywords: string[];
  /** True when the model was unavailable and the sentence fallback was used. */
  fallback: boolean;
}

export interface OptimizeQueriesOptions {
  signal?: AbortSignal;
  config?: PipelineConfig;
}

function firstSentence(text: string): string {
  return text.split(".")[0].trim();
}

export function createFallbackQueries(hierarchy: FactHierarchy): OptimizedQueries {
  const parts = [
    ...hierarchy.whatFacts.slice(0, 2).map((e) => firstSentence(e.text)),
    ...hierarchy.claims.slice(0, 1).map((e) => firstSentence(e.text)),
  ].filter(Boolean);

  return {
    primaryQuery: parts.slice(0, 2).join(" "),
    alternativeQueries: parts.slice(2),
    keywords: [],
    fallback: true,
  };
}

/** Primary query first, then alternatives; blanks and repeats removed. */
export function toQueryList(optimized: OptimizedQueries, maxQueries: number): string[] {
  const out: string[] = [];
  for (const q of [optimized.primaryQuery, ...optimized.alternativeQueries]) {
    const query = q.replace(/\s+/g, " ").trim();
    if (query && !out.includes(query)) out.push(query);
    if (out.length >= maxQueries) break;
  }
  return out;
}

export async function optimizeSearchQueries(
  hierarchy: FactHierarchy,
  attempt: number,
  options: OptimizeQueriesOptions = {},
): Promise<OptimizedQueries> {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const modelInfo = getModelForTask("queries", config);
  const prompt = getQueryOptimizationBasePrompt(JSON.stringify(toPromptShape(hierarchy), null, 2), attempt);

  try {
    const result = await generateText({
      model: modelInfo.model,
      messages: [{ role: "user", content: prompt }],
      temperature: config.llmTemperature,
      abortSignal: options.signal,
    });
    const parsed = OptimizedQueriesSchema.safeParse(tryParseFirstJsonObject(result.text));
    if (!parsed.success || !parsed.data.primary_query.trim()) {
      console.warn(`[LLM] Query optimization reply unusable (attempt ${attempt}), using fallback`);
      return createFallbackQueries(hierarchy);
    }
    return {
      primaryQuery: parsed.data.primary_query.trim(),
      alternativeQueries: parsed.data.alternative_queries ?? [],
      keywords: parsed.data.keywords ?? [],
      fallback: false,
    };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[LLM] Query optimization failed (attempt ${attempt}): ${reason}; using fallback`);
    return createFallbackQueries(hierarchy);
  }
}
