/**
 * LLM fact comparison.
 *
 * Sends both hierarchies (with entity ids) to the model and maps the reply to
 * ComparisonVerdict records. Reply validation is structural only; whether the
 * ids exist and the outcomes are consistent is checked by the aggregator.
 *
 * @module analyzer/comparison
 */

import { generateText } from "ai";
import { z } from "zod";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config-schemas";
import type { ComparisonResult } from "./collaborators";
import { debugLog } from "./debug";
import { ComparisonFailedError } from "./errors";
import { toPromptShape } from "./fact-hierarchy";
import { tryParseFirstJsonObject } from "./json";
import { getModelForTask } from "./llm";
import { getCompareFactsBasePrompt } from "./prompts/base/compare-facts-base";
import type { ComparisonVerdict, FactHierarchy } from "./types";

const lowercase = (v: unknown) => (typeof v === "string" ? v.trim().toLowerCase() : v);

const VerdictItemSchema = z.object({
  original_id: z.string().min(1),
  outcome: z.preprocess(lowercase, z.enum(["match", "conflict", "absent"])),
  source_id: z.string().nullable().optional(),
  match_strength: z.preprocess(lowercase, z.enum(["strong", "moderate"])).optional().catch(undefined),
  conflict_type: z
    .preprocess(lowercase, z.enum(["contradiction", "partial_mismatch", "emphasis_difference", "context_mismatch"]))
    .optional()
    .catch(undefined),
  conflict_severity: z.preprocess(lowercase, z.enum(["high", "medium", "low"])).optional().catch(undefined),
});

export const ComparisonResponseSchema = z.object({
  verdicts: z.array(VerdictItemSchema),
  relevance_score: z.number().nullable().optional().catch(null),
  analysis_notes: z.string().nullable().optional(),
});

export type ComparisonResponse = z.infer<typeof ComparisonResponseSchema>;

export interface CompareFactsOptions {
  signal?: AbortSignal;
  config?: PipelineConfig;
}

/** Map validated reply items to verdicts. Source refs on `absent` are dropped. */
export function toComparisonVerdicts(response: ComparisonResponse): ComparisonVerdict[] {
  return response.verdicts.map((item): ComparisonVerdict => {
    if (item.outcome === "absent") {
      return { originalEntityId: item.original_id, outcome: "absent" };
    }
    const sourceId = item.source_id?.trim() || undefined;
    if (item.outcome === "match") {
      return {
        originalEntityId: item.original_id,
        outcome: "match",
        matchedSourceEntityId: sourceId,
        matchStrength: item.match_strength ?? "moderate",
      };
    }
    return {
      originalEntityId: item.original_id,
      outcome: "conflict",
      matchedSourceEntityId: sourceId,
      conflictType: item.conflict_type,
      conflictSeverity: item.conflict_severity,
    };
  });
}

export async function compareFactsWithLlm(
  original: FactHierarchy,
  source: FactHierarchy,
  options: CompareFactsOptions = {},
): Promise<ComparisonResult> {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const modelInfo = getModelForTask("compare", config);
  const prompt = getCompareFactsBasePrompt(
    JSON.stringify(toPromptShape(original), null, 2),
    JSON.stringify(toPromptShape(source), null, 2),
  );

  let responseText: string;
  try {
    const result = await generateText({
      model: modelInfo.model,
      messages: [{ role: "user", content: prompt }],
      temperature: config.llmTemperature,
      abortSignal: options.signal,
    });
    responseText = result.text;
  } catch (err) {
    if (options.signal?.aborted) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`[LLM] Comparison failed for ${source.sourceId} (${modelInfo.modelName}): ${reason}`);
    return { ok: false, error: new ComparisonFailedError(`Comparison call failed: ${reason}`, source.sourceId) };
  }

  const parsed = ComparisonResponseSchema.safeParse(tryParseFirstJsonObject(responseText));
  if (!parsed.success) {
    debugLog(`[LLM] Invalid comparison reply for ${source.sourceId}`, parsed.error.issues.slice(0, 5));
    return {
      ok: false,
      error: new ComparisonFailedError("Comparison reply did not match the expected shape", source.sourceId),
    };
  }

  return {
    ok: true,
    relevanceScore: parsed.data.relevance_score ?? null,
    verdicts: toComparisonVerdicts(parsed.data),
    notes: parsed.data.analysis_notes ?? undefined,
  };
}
