/**
 * Corroborate Analyzer - Shared Types
 *
 * Fact hierarchy, source lifecycle, comparison verdicts and the scored report.
 * Everything produced by the engine is frozen on construction; transitions
 * create new records instead of editing existing ones.
 *
 * @module analyzer/types
 */

// ============================================================================
// FACT HIERARCHY
// ============================================================================

export type ImportanceLevel = "high" | "medium" | "low";
export type ConfidenceLevel = "high" | "medium" | "low";
export type EntityKind = "event" | "claim";

/** Reserved source id of the article under review. */
export const ORIGINAL_SOURCE_ID = "original";

/**
 * A WHAT fact (event) or a CLAIM with its disambiguating context.
 * WHO/WHERE/WHEN never get matched on their own; they ride along with the parent fact.
 */
export interface Entity {
  readonly id: string;
  readonly text: string;
  readonly kind: EntityKind;
  readonly importance: ImportanceLevel;
  readonly confidence: ConfidenceLevel;
  readonly relatedWho: readonly string[];
  readonly relatedWhere: readonly string[];
  readonly relatedWhen: readonly string[];
  readonly sourceId: string;
}

export interface FactHierarchy {
  readonly sourceId: string;
  readonly whatFacts: readonly Entity[];
  readonly claims: readonly Entity[];
}

// ============================================================================
// SOURCES
// ============================================================================

export type SourceType = "official" | "news" | "blog" | "social" | "unknown";
export type SourceStatus = "pending" | "analyzed" | "filtered" | "fetch_failed";

export type SourceFailureCategory =
  | "timeout"
  | "fetch"
  | "extraction"
  | "comparison"
  | "invalid_verdicts"
  | "provider";

export interface SourceFailure {
  readonly category: SourceFailureCategory;
  readonly message: string;
}

/** A search hit before any analysis work. */
export interface SearchCandidate {
  url: string;
  title: string;
  snippet: string | null;
  domain: string;
}

interface SourceBase {
  readonly url: string;
  readonly domain: string;
  readonly title: string;
  readonly snippet: string | null;
  readonly sourceType: SourceType;
  /** Prioritized query that surfaced this candidate. */
  readonly query: string;
}

export interface PendingSource extends SourceBase {
  readonly status: "pending";
}

export interface FilteredSource extends SourceBase {
  readonly status: "filtered";
  readonly relevanceScore: number;
  readonly factHierarchy: FactHierarchy | null;
}

export interface FailedSource extends SourceBase {
  readonly status: "fetch_failed";
  readonly failure: SourceFailure;
}

export interface AnalyzedSource extends SourceBase {
  readonly status: "analyzed";
  readonly relevanceScore: number;
  readonly factHierarchy: FactHierarchy;
  readonly verdicts: readonly ComparisonVerdict[];
  readonly agreement: SourceAgreement;
}

export type Source = PendingSource | FilteredSource | FailedSource | AnalyzedSource;
export type SettledSource = FilteredSource | FailedSource | AnalyzedSource;

// ============================================================================
// COMPARISON
// ============================================================================

export type VerdictOutcome = "match" | "conflict" | "absent";
export type MatchStrength = "strong" | "moderate";
export type ConflictType =
  | "contradiction"
  | "partial_mismatch"
  | "emphasis_difference"
  | "context_mismatch";

export interface ComparisonVerdict {
  readonly originalEntityId: string;
  readonly outcome: VerdictOutcome;
  /** Present iff outcome is match or conflict. */
  readonly matchedSourceEntityId?: string;
  readonly matchStrength?: MatchStrength;
  readonly conflictType?: ConflictType;
  readonly conflictSeverity?: ImportanceLevel;
}

export interface EntityPair {
  readonly original: Entity;
  readonly source: Entity;
}

export interface SourceAgreement {
  readonly matches: number;
  readonly conflicts: number;
  readonly absent: number;
  /** Original WHAT facts + claims; related entities are never counted. */
  readonly comparableCount: number;
  /** matches / (matches + conflicts), 0 when nothing was comparable. */
  readonly agreementRatio: number;
  readonly lowSignal: boolean;
  /** Mean confidence weight of matched original entities (informational). */
  readonly matchConfidence: number | null;
  readonly matched: readonly EntityPair[];
  readonly conflicting: readonly EntityPair[];
}

// ============================================================================
// SCORED REPORT
// ============================================================================

export type ReliabilityWeights = Record<SourceType, number>;

export interface SourceBreakdown {
  readonly url: string;
  readonly domain: string;
  readonly title: string;
  readonly sourceType: SourceType;
  readonly relevanceScore: number;
  readonly agreementRatio: number;
  readonly lowSignal: boolean;
  readonly reliabilityWeight: number;
  /** reliabilityWeight × relevanceScore (0 for low-signal sources). */
  readonly effectiveWeight: number;
  readonly contribution: number;
  readonly matchConfidence: number | null;
  readonly matched: readonly EntityPair[];
  readonly conflicting: readonly EntityPair[];
}

export interface ScoredReport {
  /** Weighted average in [0,100]; null means unverifiable, never "false". */
  readonly overallScore: number | null;
  readonly confidenceLevel: ConfidenceLevel;
  readonly sourcesConsidered: number;
  readonly sourcesScored: number;
  readonly sourcesFiltered: number;
  readonly sourcesFailed: number;
  readonly sources: readonly SourceBreakdown[];
}
