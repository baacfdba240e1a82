/**
 * Corroborate Analyzer - LLM Provider Selection
 *
 * @module analyzer/llm
 */

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import type { LanguageModel } from "ai";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config-schemas";

export type ProviderName = PipelineConfig["llmProvider"];
export type ModelTask = "extract" | "compare" | "queries";

export interface ModelInfo {
  provider: ProviderName;
  modelName: string;
  model: LanguageModel;
}

function detectProviderFromModelName(modelName: string): ProviderName | null {
  const name = modelName.toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  if (name.includes("gpt") || /^o\d/.test(name)) return "openai";
  return null;
}

/** Extraction and query drafting run on the fast tier; comparison on the stronger one. */
export function defaultModelNameForTask(provider: ProviderName, task: ModelTask): string {
  const strong = task === "compare";
  switch (provider) {
    case "anthropic":
      return strong ? "claude-sonnet-4-20250514" : "claude-3-5-haiku-20241022";
    case "google":
      return strong ? "gemini-2.5-pro" : "gemini-2.5-flash";
    case "mistral":
      return strong ? "mistral-large-latest" : "mistral-small-latest";
    case "openai":
      return strong ? "gpt-4o" : "gpt-4o-mini";
  }
}

function modelOverrideForTask(task: ModelTask, config: PipelineConfig): string | null {
  switch (task) {
    case "extract":
    case "queries":
      return config.modelExtract;
    case "compare":
      return config.modelCompare;
  }
}

function buildModel(provider: ProviderName, modelName: string): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelName);
    case "google":
      return google(modelName);
    case "mistral":
      return mistral(modelName);
    case "openai":
      return openai(modelName);
  }
}

/**
 * Resolve the model name for a task. A per-task override naming another
 * provider's model is ignored with a warning.
 */
export function resolveModelName(task: ModelTask, config: PipelineConfig = DEFAULT_PIPELINE_CONFIG): string {
  const provider = config.llmProvider;
  const override = modelOverrideForTask(task, config);
  if (override) {
    const inferred = detectProviderFromModelName(override);
    if (inferred && inferred !== provider) {
      console.warn(
        `[LLM] Ignoring model override "${override}" for task "${task}" because provider is "${provider}"`,
      );
    } else {
      return override;
    }
  }
  return defaultModelNameForTask(provider, task);
}

export function getModelForTask(task: ModelTask, config: PipelineConfig = DEFAULT_PIPELINE_CONFIG): ModelInfo {
  const modelName = resolveModelName(task, config);
  return { provider: config.llmProvider, modelName, model: buildModel(config.llmProvider, modelName) };
}
