/**
 * Error types raised or returned by the analyzer.
 *
 * @module analyzer/errors
 */

import type { SourceFailureCategory, SourceStatus } from "./types";

/**
 * Extraction output that cannot be decomposed into WHAT facts and claims.
 * Returned, not retried: the same extraction call will not self-correct.
 */
export class MalformedExtractionError extends Error {
  constructor(
    message: string,
    public readonly sourceId: string,
  ) {
    super(message);
    this.name = "MalformedExtractionError";
  }
}

/** A comparison verdict set that breaks the one-verdict-per-entity contract. */
export class VerdictValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = "VerdictValidationError";
  }
}

/** A source lifecycle transition out of a terminal state. */
export class IllegalSourceTransitionError extends Error {
  constructor(
    public readonly url: string,
    public readonly from: SourceStatus,
    public readonly to: SourceStatus,
  ) {
    super(`Illegal source transition ${from} -> ${to} for ${url}`);
    this.name = "IllegalSourceTransitionError";
  }
}

/** The comparison call failed or returned an unusable response. */
export class ComparisonFailedError extends Error {
  constructor(
    message: string,
    public readonly sourceId: string,
  ) {
    super(message);
    this.name = "ComparisonFailedError";
  }
}

/** The article under review could not be fetched. */
export class ArticleFetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly category: SourceFailureCategory,
  ) {
    super(message);
    this.name = "ArticleFetchError";
  }
}
