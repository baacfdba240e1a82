/**
 * Comparison Aggregator
 *
 * Turns one source's comparison verdicts into an agreement ratio plus the
 * matched/conflicting entity pairs shown in the report.
 *
 *   agreementRatio = matches / (matches + conflicts)
 *
 * `absent` verdicts (the source simply does not discuss the fact) count toward
 * neither side. With nothing comparable the ratio is 0 and the source is flagged
 * low-signal instead of being read as 0% or 100% agreement.
 *
 * Each original entity may carry at most one verdict per source. A duplicate is
 * rejected for the whole source, whatever the two outcomes are.
 *
 * @module analyzer/comparison-aggregator
 */

import { VerdictValidationError } from "./errors";
import { findEntity, listComparableEntities } from "./fact-hierarchy";
import type {
  ComparisonVerdict,
  ConfidenceLevel,
  Entity,
  EntityPair,
  FactHierarchy,
  SourceAgreement,
} from "./types";

export type AggregationResult =
  | { ok: true; agreement: SourceAgreement }
  | { ok: false; error: VerdictValidationError };

const CONFIDENCE_WEIGHTS: Record<ConfidenceLevel, number> = {
  high: 1.0,
  medium: 0.7,
  low: 0.5,
};

// ============================================================================
// VALIDATION
// ============================================================================

export function validateVerdicts(
  original: FactHierarchy,
  sourceHierarchy: FactHierarchy,
  verdicts: readonly ComparisonVerdict[],
): VerdictValidationError | null {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const v of verdicts) {
    if (seen.has(v.originalEntityId)) {
      issues.push(`duplicate verdict for ${v.originalEntityId}`);
      continue;
    }
    seen.add(v.originalEntityId);

    if (!findEntity(original, v.originalEntityId)) {
      issues.push(`unknown original entity ${v.originalEntityId}`);
      continue;
    }

    if (v.outcome === "absent") {
      if (v.matchedSourceEntityId !== undefined) {
        issues.push(`absent verdict for ${v.originalEntityId} references ${v.matchedSourceEntityId}`);
      }
      continue;
    }

    if (v.matchedSourceEntityId === undefined) {
      issues.push(`${v.outcome} verdict for ${v.originalEntityId} has no source entity`);
    } else if (!findEntity(sourceHierarchy, v.matchedSourceEntityId)) {
      issues.push(`${v.outcome} verdict for ${v.originalEntityId} references unknown ${v.matchedSourceEntityId}`);
    }
  }

  if (issues.length === 0) return null;
  return new VerdictValidationError(
    `Invalid comparison verdicts for ${sourceHierarchy.sourceId}: ${issues.join("; ")}`,
    issues,
  );
}

// ============================================================================
// AGGREGATION
// ============================================================================

export function computeAgreementRatio(matches: number, conflicts: number): number {
  const denominator = matches + conflicts;
  return denominator > 0 ? matches / denominator : 0;
}

function meanConfidence(entities: Entity[]): number | null {
  if (entities.length === 0) return null;
  const total = entities.reduce((sum, e) => sum + CONFIDENCE_WEIGHTS[e.confidence], 0);
  return total / entities.length;
}

export function aggregateComparison(
  original: FactHierarchy,
  sourceHierarchy: FactHierarchy,
  verdicts: readonly ComparisonVerdict[],
): AggregationResult {
  const error = validateVerdicts(original, sourceHierarchy, verdicts);
  if (error) return { ok: false, error };

  const byEntity = new Map(verdicts.map((v) => [v.originalEntityId, v]));
  const comparable = listComparableEntities(original);
  const matched: EntityPair[] = [];
  const conflicting: EntityPair[] = [];
  let absent = 0;

  // Walk the original hierarchy, not the verdict list, so verdict order never matters.
  for (const entity of comparable) {
    const verdict = byEntity.get(entity.id);
    const sourceEntity =
      verdict?.matchedSourceEntityId !== undefined
        ? findEntity(sourceHierarchy, verdict.matchedSourceEntityId)
        : undefined;

    if (verdict?.outcome === "match" && sourceEntity) {
      matched.push(Object.freeze({ original: entity, source: sourceEntity }));
    } else if (verdict?.outcome === "conflict" && sourceEntity) {
      conflicting.push(Object.freeze({ original: entity, source: sourceEntity }));
    } else {
      absent++;
    }
  }

  const agreement: SourceAgreement = Object.freeze({
    matches: matched.length,
    conflicts: conflicting.length,
    absent,
    comparableCount: comparable.length,
    agreementRatio: computeAgreementRatio(matched.length, conflicting.length),
    lowSignal: matched.length + conflicting.length === 0,
    matchConfidence: meanConfidence(matched.map((p) => p.original)),
    matched: Object.freeze(matched),
    conflicting: Object.freeze(conflicting),
  });

  return { ok: true, agreement };
}
