/**
 * Configuration Loader
 *
 * Resolves the effective pipeline and search configuration:
 *
 *   defaults (config-schemas) <- JSON file <- CB_* environment overrides
 *
 * The file layer may be partial; nested objects are merged key by key. Each
 * environment override is applied tentatively and kept only if the result still
 * validates, so one bad variable cannot take the whole config down.
 *
 * Override policy (CB_CONFIG_ENV_OVERRIDES):
 *   - "on" (default): every mapped variable is applied
 *   - "off": environment is ignored
 *   - "allowlist:VAR1,VAR2": only the listed variables are applied
 *
 * @module config-loader
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import path from "node:path";
import type { z } from "zod";
import {
  ConfigValidationError,
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  PipelineConfigSchema,
  SearchConfigSchema,
  formatZodIssues,
  type ConfigType,
  type PipelineConfig,
  type SearchConfig,
} from "./config-schemas";

export type { PipelineConfig, SearchConfig } from "./config-schemas";
export { DEFAULT_PIPELINE_CONFIG, DEFAULT_SEARCH_CONFIG } from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

type Env = Record<string, string | undefined>;

type OverridePolicy = "on" | "off" | string; // string for "allowlist:VAR1,VAR2"

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue?: string | number | boolean | null;
}

export interface LoadConfigOptions {
  /** Explicit JSON file; `null` skips the file layer entirely. */
  filePath?: string | null;
  /** Defaults to process.env. */
  env?: Env;
}

export interface LoadedConfig<T> {
  config: T;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
  /** Path of the file layer, or "defaults" when no file was read. */
  source: string;
}

interface EnvMapping {
  fieldPath: string;
  parser: (v: string) => unknown;
}

// ============================================================================
// ENV MAPS
// ============================================================================

const int = (v: string) => parseInt(v, 10);
const float = (v: string) => parseFloat(v);
const nullableString = (v: string) => (v.trim() === "" || v === "null" ? null : v.trim());

const PIPELINE_ENV_MAP: Record<string, EnvMapping> = {
  CB_MAX_SOURCES: { fieldPath: "maxSourcesToCheck", parser: int },
  CB_SOURCE_TIMEOUT_MS: { fieldPath: "perSourceTimeoutMs", parser: int },
  CB_MAX_CONCURRENCY: { fieldPath: "maxConcurrency", parser: int },
  CB_MAX_QUERIES: { fieldPath: "maxQueries", parser: int },
  CB_RESULTS_PER_QUERY: { fieldPath: "resultsPerQuery", parser: int },
  CB_RELEVANCE_THRESHOLD: { fieldPath: "relevanceThreshold", parser: float },
  CB_DEFAULT_RELEVANCE_SCORE: { fieldPath: "defaultRelevanceScore", parser: float },
  CB_MAX_ATTEMPTS: { fieldPath: "maxAttempts", parser: int },
  CB_MIN_SOURCES_FOR_RETRY: { fieldPath: "minSourcesForRetry", parser: int },
  CB_LLM_PROVIDER: { fieldPath: "llmProvider", parser: (v) => v.trim().toLowerCase() },
  CB_MODEL_EXTRACT: { fieldPath: "modelExtract", parser: nullableString },
  CB_MODEL_COMPARE: { fieldPath: "modelCompare", parser: nullableString },
  CB_LLM_TEMPERATURE: { fieldPath: "llmTemperature", parser: float },
};

const SEARCH_ENV_MAP: Record<string, EnvMapping> = {
  CB_SEARCH_ENABLED: { fieldPath: "enabled", parser: (v) => v === "true" },
  CB_SEARCH_PROVIDER: { fieldPath: "provider", parser: (v) => v.trim().toLowerCase() },
  CB_SEARCH_MAX_RESULTS: { fieldPath: "maxResults", parser: int },
  CB_SEARCH_TIMEOUT_MS: { fieldPath: "timeoutMs", parser: int },
  CB_SEARCH_DOMAIN_BLACKLIST: {
    fieldPath: "domainBlacklist",
    parser: (v) => v.split(",").map((s) => s.trim()).filter(Boolean),
  },
  CB_SEARCH_CACHE_ENABLED: { fieldPath: "cache.enabled", parser: (v) => v === "true" },
  CB_SEARCH_CACHE_TTL_DAYS: { fieldPath: "cache.ttlDays", parser: int },
  CB_SEARCH_CACHE_DB_PATH: { fieldPath: "cache.dbPath", parser: (v) => v.trim() },
};

const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../../configs/", import.meta.url));

// ============================================================================
// PLAIN-OBJECT HELPERS
// ============================================================================

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cloneObject(value: object): PlainObject {
  const cloned: unknown = JSON.parse(JSON.stringify(value));
  return isPlainObject(cloned) ? cloned : {};
}

/** Key-by-key merge; arrays and scalars in `patch` replace the base value. */
export function mergeConfig(base: PlainObject, patch: PlainObject): PlainObject {
  const out: PlainObject = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? mergeConfig(current, value) : value;
  }
  return out;
}

function setNestedValue(obj: PlainObject, fieldPath: string, value: unknown): void {
  const parts = fieldPath.split(".");
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

function parseAllowlist(policy: OverridePolicy): Set<string> | null {
  if (!policy.startsWith("allowlist:")) return null;
  return new Set(
    policy
      .slice("allowlist:".length)
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
  );
}

function applyOverrides(
  base: PlainObject,
  envMap: Record<string, EnvMapping>,
  schema: z.ZodTypeAny,
  env: Env,
): { result: PlainObject; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  const policy: OverridePolicy = env.CB_CONFIG_ENV_OVERRIDES || "on";
  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];

  if (policy === "off") {
    return { result: base, overrides, skippedOverrides };
  }

  const allowlist = parseAllowlist(policy);
  const result = cloneObject(base);

  for (const [envVar, mapping] of Object.entries(envMap)) {
    if (allowlist && !allowlist.has(envVar)) continue;

    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsed = mapping.parser(envValue);
    const tentative = cloneObject(result);
    setNestedValue(tentative, mapping.fieldPath, parsed);

    const validation = schema.safeParse(tentative);
    if (!validation.success) {
      const reason = validation.error.issues[0]?.message ?? "invalid value";
      console.warn(`[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ${reason}`);
      skippedOverrides.push(`${envVar} (invalid: ${reason})`);
      continue;
    }

    setNestedValue(result, mapping.fieldPath, parsed);
    overrides.push({
      envVar,
      fieldPath: mapping.fieldPath,
      appliedValue:
        typeof parsed === "string" || typeof parsed === "number" || typeof parsed === "boolean" || parsed === null
          ? parsed
          : undefined,
    });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// FILE LAYER
// ============================================================================

function readConfigFile(configType: ConfigType, filePath: string): PlainObject {
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(configType, [`${filePath}: ${reason}`]);
  }
  if (!isPlainObject(content)) {
    throw new ConfigValidationError(configType, [`${filePath}: expected a JSON object`]);
  }
  return content;
}

function resolveFilePath(configType: ConfigType, filePath: string | null | undefined): string | null {
  if (filePath === null) return null;
  if (filePath !== undefined) return path.resolve(filePath);
  const fallback = path.join(DEFAULT_CONFIG_DIR, `${configType}.default.json`);
  return existsSync(fallback) ? fallback : null;
}

// ============================================================================
// PUBLIC API
// ============================================================================

function loadConfig<T>(
  configType: ConfigType,
  schema: z.ZodType<T>,
  defaults: T & object,
  envMap: Record<string, EnvMapping>,
  options: LoadConfigOptions,
): LoadedConfig<T> {
  const env = options.env ?? process.env;
  const filePath = resolveFilePath(configType, options.filePath);

  let layered = cloneObject(defaults);
  if (filePath) {
    layered = mergeConfig(layered, readConfigFile(configType, filePath));
  }

  const fileCheck = schema.safeParse(layered);
  if (!fileCheck.success) {
    throw new ConfigValidationError(configType, formatZodIssues(fileCheck.error));
  }

  const { result, overrides, skippedOverrides } = applyOverrides(layered, envMap, schema, env);
  const parsed = schema.safeParse(result);
  if (!parsed.success) {
    throw new ConfigValidationError(configType, formatZodIssues(parsed.error));
  }

  if (overrides.length > 0) {
    console.log(
      `[Config-Loader] ${configType}: applied ${overrides.length} env override(s): ` +
        overrides.map((o) => o.envVar).join(", "),
    );
  }

  return { config: parsed.data, overrides, skippedOverrides, source: filePath ?? "defaults" };
}

export function loadPipelineConfig(options: LoadConfigOptions = {}): LoadedConfig<PipelineConfig> {
  return loadConfig("pipeline", PipelineConfigSchema, DEFAULT_PIPELINE_CONFIG, PIPELINE_ENV_MAP, options);
}

export function loadSearchConfig(options: LoadConfigOptions = {}): LoadedConfig<SearchConfig> {
  return loadConfig("search", SearchConfigSchema, DEFAULT_SEARCH_CONFIG, SEARCH_ENV_MAP, options);
}

/** Environment variable names the loader understands, by config type. */
export function listEnvOverrides(configType: ConfigType): string[] {
  return Object.keys(configType === "search" ? SEARCH_ENV_MAP : PIPELINE_ENV_MAP);
}
