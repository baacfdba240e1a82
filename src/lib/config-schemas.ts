/**
 * Configuration Schemas
 *
 * Zod schemas for validating pipeline and search configuration.
 * Defaults live here; files and environment overrides are layered on top by
 * the config loader.
 *
 * @module config-schemas
 */

import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

export type ConfigType = "pipeline" | "search";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly configType: ConfigType,
    public readonly issues: string[],
  ) {
    super(`Invalid ${configType} config: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
  }
}

// ============================================================================
// PIPELINE CONFIG SCHEMA
// ============================================================================

const WeightSchema = z.number().min(0).max(1);

export const ReliabilityWeightsSchema = z.object({
  official: WeightSchema,
  news: WeightSchema,
  blog: WeightSchema,
  social: WeightSchema,
  unknown: WeightSchema,
});

export const PipelineConfigSchema = z.object({
  // === Source budget ===
  maxSourcesToCheck: z.number().int().min(1).max(50).describe("Cap on candidates scheduled per attempt"),
  perSourceTimeoutMs: z.number().int().min(1000).max(300_000).describe("Timeout for fetch + extract + compare of one source"),
  maxConcurrency: z.number().int().min(1).max(16).describe("Parallel per-source workers"),

  // === Query prioritization ===
  maxQueries: z.number().int().min(1).max(10),
  maxPhraseWords: z.number().int().min(3).max(30),
  resultsPerQuery: z.number().int().min(1).max(20),

  // === Relevance & scoring ===
  relevanceThreshold: z.number().min(0).max(1),
  defaultRelevanceScore: z.number().min(0).max(1),
  reliabilityWeights: ReliabilityWeightsSchema,

  // === Retry / curation ===
  maxAttempts: z.number().int().min(1).max(5),
  minSourcesForRetry: z.number().int().min(0).max(20),

  // === Model selection ===
  llmProvider: z.enum(["google", "openai", "anthropic", "mistral"]),
  modelExtract: z.string().min(1).nullable().describe("Override model for fact extraction"),
  modelCompare: z.string().min(1).nullable().describe("Override model for fact comparison"),
  llmTemperature: z.number().min(0).max(1),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  maxSourcesToCheck: 10,
  perSourceTimeoutMs: 30_000,
  maxConcurrency: 4,
  maxQueries: 3,
  maxPhraseWords: 10,
  resultsPerQuery: 5,
  relevanceThreshold: 0.4,
  defaultRelevanceScore: 0.5,
  reliabilityWeights: {
    official: 1.0,
    news: 0.8,
    blog: 0.4,
    social: 0.3,
    unknown: 0.5,
  },
  maxAttempts: 3,
  minSourcesForRetry: 3,
  llmProvider: "google",
  modelExtract: null,
  modelCompare: null,
  llmTemperature: 0.1,
};

// ============================================================================
// SEARCH CONFIG SCHEMA
// ============================================================================

export const SearchConfigSchema = z.object({
  enabled: z.boolean(),
  provider: z.enum(["auto", "google-cse", "newsapi"]),
  maxResults: z.number().int().min(1).max(20),
  timeoutMs: z.number().int().min(1000).max(60_000),
  domainBlacklist: z.array(z.string().regex(/^[a-z0-9.-]+$/i)).max(50),
  cache: z.object({
    enabled: z.boolean(),
    ttlDays: z.number().int().min(1).max(90),
    dbPath: z.string().min(1),
  }),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  enabled: true,
  provider: "auto",
  maxResults: 10,
  timeoutMs: 12_000,
  domainBlacklist: [],
  cache: {
    enabled: true,
    ttlDays: 7,
    dbPath: "./search-cache.db",
  },
};

// ============================================================================
// VALIDATION
// ============================================================================

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

function pipelineWarnings(config: PipelineConfig): string[] {
  const warnings: string[] = [];
  if (config.defaultRelevanceScore < config.relevanceThreshold) {
    warnings.push("defaultRelevanceScore is below relevanceThreshold: unscored sources will be filtered");
  }
  if (config.maxConcurrency > config.maxSourcesToCheck) {
    warnings.push("maxConcurrency exceeds maxSourcesToCheck");
  }
  return warnings;
}

export function validateConfig(configType: ConfigType, content: unknown): ValidationResult {
  if (configType === "pipeline") {
    const parsed = PipelineConfigSchema.safeParse(content);
    return parsed.success
      ? { valid: true, errors: [], warnings: pipelineWarnings(parsed.data) }
      : { valid: false, errors: formatZodIssues(parsed.error), warnings: [] };
  }
  const parsed = SearchConfigSchema.safeParse(content);
  return parsed.success
    ? { valid: true, errors: [], warnings: [] }
    : { valid: false, errors: formatZodIssues(parsed.error), warnings: [] };
}

function parseWithSchema<T>(configType: ConfigType, schema: z.ZodType<T>, content: unknown): T {
  const result = schema.safeParse(content);
  if (!result.success) {
    throw new ConfigValidationError(configType, formatZodIssues(result.error));
  }
  return result.data;
}

export function parsePipelineConfig(content: unknown): PipelineConfig {
  return parseWithSchema("pipeline", PipelineConfigSchema, content);
}

export function parseSearchConfig(content: unknown): SearchConfig {
  return parseWithSchema("search", SearchConfigSchema, content);
}
