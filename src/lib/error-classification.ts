/**
 * Error Classification
 *
 * Maps thrown values from collaborators (fetch, LLM, search) onto the source
 * failure categories recorded in reports, plus whether a later attempt could
 * plausibly succeed.
 *
 * @module error-classification
 */

import type { SourceFailureCategory } from "./analyzer/types";
import { SearchProviderError } from "./web-search";

export type ClassifiedError = {
  category: SourceFailureCategory;
  message: string;
  retriable: boolean;
};

/** Patterns indicating provider rate limiting, outage or auth trouble */
const PROVIDER_PATTERNS = [
  /status\s*(?:code\s*)?(?:401|403|429|5\d\d)\b/i,
  /HTTP\s+(?:401|403|429|5\d\d)\b/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
  /api\s*key/i,
  /unauthorized/i,
];

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /ETIMEDOUT/i];

function readStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" ? status : null;
}

function isProviderStatus(status: number): boolean {
  return status === 401 || status === 403 || status === 429 || status >= 500;
}

/**
 * Classify an error. Anything not recognized counts as a fetch failure.
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (error instanceof SearchProviderError || name === "SearchProviderError") {
    return { category: "provider", message, retriable: false };
  }

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(message))) {
    return { category: "timeout", message, retriable: true };
  }

  const status = readStatus(error);
  if (status !== null && isProviderStatus(status)) {
    return { category: "provider", message, retriable: status === 429 || status >= 500 };
  }

  if (PROVIDER_PATTERNS.some((p) => p.test(message))) {
    return { category: "provider", message, retriable: /429|rate|too\s*many|overloaded|5\d\d/i.test(message) };
  }

  return { category: "fetch", message, retriable: false };
}
