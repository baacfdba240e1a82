/**
 * LLM fact extraction.
 *
 * Renders the extraction prompt, parses the first JSON object of the reply and
 * hands it to buildFactHierarchy. Transport failures and unparsable replies are
 * returned as MalformedExtractionError; an aborted call rethrows so the caller
 * can record a timeout.
 *
 * @module analyzer/extraction
 */

import { generateText } from "ai";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config-schemas";
import { debugLog } from "./debug";
import { MalformedExtractionError } from "./errors";
import { buildFactHierarchy, type ExtractionResult } from "./fact-hierarchy";
import { tryParseFirstJsonObject } from "./json";
import { getModelForTask } from "./llm";
import { getExtractFactsBasePrompt } from "./prompts/base/extract-facts-base";

export interface ExtractFactsOptions {
  sourceId: string;
  title?: string | null;
  signal?: AbortSignal;
  config?: PipelineConfig;
}

export async function extractFactsWithLlm(text: string, options: ExtractFactsOptions): Promise<ExtractionResult> {
  const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
  const modelInfo = getModelForTask("extract", config);
  const prompt = getExtractFactsBasePrompt(text, options.title);

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
    console.error(`[LLM] Extraction failed for ${options.sourceId} (${modelInfo.modelName}): ${reason}`);
    return {
      ok: false,
      error: new MalformedExtractionError(`Extraction call failed: ${reason}`, options.sourceId),
    };
  }

  const parsed = tryParseFirstJsonObject(responseText);
  if (parsed === null) {
    debugLog(`[LLM] Unparsable extraction reply for ${options.sourceId}`, responseText.slice(0, 500));
    return {
      ok: false,
      error: new MalformedExtractionError("Extraction reply contained no JSON object", options.sourceId),
    };
  }

  return buildFactHierarchy(parsed, options.sourceId);
}
