/**
 * Fact Hierarchy Model
 *
 * Builds an immutable FactHierarchy from raw extraction output. WHAT facts and
 * claims are the primary entities; WHO/WHERE/WHEN are owned context lists.
 *
 * Accepts both the snake_case shape the extraction prompt asks for
 * (`what_facts`, `related_who`, ...) and camelCase.
 *
 * @module analyzer/fact-hierarchy
 */

import { z } from "zod";
import { MalformedExtractionError } from "./errors";
import type { Entity, EntityKind, FactHierarchy } from "./types";

export type ExtractionResult =
  | { ok: true; hierarchy: FactHierarchy }
  | { ok: false; error: MalformedExtractionError };

// ============================================================================
// FIELD NORMALIZATION
// ============================================================================

// Out-of-range levels clamp to "medium" instead of failing the whole item.
const LevelSchema = z
  .preprocess(
    (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
    z.enum(["high", "medium", "low"]),
  )
  .catch("medium");

const RelatedListSchema = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((v): v is string => typeof v === "string")
      .map((v) => v.trim())
      .filter((v) => v.length > 0),
  );

const RawItemSchema = z.object({
  event: z.unknown().optional(),
  claim: z.unknown().optional(),
  text: z.unknown().optional(),
  related_who: z.unknown().optional(),
  relatedWho: z.unknown().optional(),
  related_where: z.unknown().optional(),
  relatedWhere: z.unknown().optional(),
  related_when: z.unknown().optional(),
  relatedWhen: z.unknown().optional(),
  importance: LevelSchema,
  confidence: LevelSchema,
});

type RawItem = z.infer<typeof RawItemSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function relatedList(primary: unknown, fallback: unknown): string[] {
  return RelatedListSchema.parse(primary ?? fallback ?? []);
}

function itemText(item: RawItem, kind: EntityKind): string {
  const candidate = kind === "event" ? item.event ?? item.text : item.claim ?? item.text;
  return typeof candidate === "string" ? candidate.replace(/\s+/g, " ").trim() : "";
}

function freezeEntity(entity: Entity): Entity {
  Object.freeze(entity.relatedWho);
  Object.freeze(entity.relatedWhere);
  Object.freeze(entity.relatedWhen);
  return Object.freeze(entity);
}

function buildEntities(items: unknown[], kind: EntityKind, sourceId: string): Entity[] {
  const prefix = kind === "event" ? "what" : "claim";
  const out: Entity[] = [];

  for (const rawItem of items) {
    if (!isPlainObject(rawItem)) continue;
    const parsed = RawItemSchema.safeParse(rawItem);
    if (!parsed.success) continue;

    const item = parsed.data;
    const text = itemText(item, kind);
    if (!text) continue;

    out.push(
      freezeEntity({
        id: `${sourceId}#${prefix}-${out.length + 1}`,
        text,
        kind,
        importance: item.importance,
        confidence: item.confidence,
        relatedWho: relatedList(item.related_who, item.relatedWho),
        relatedWhere: relatedList(item.related_where, item.relatedWhere),
        relatedWhen: relatedList(item.related_when, item.relatedWhen),
        sourceId,
      }),
    );
  }

  return out;
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Construct a FactHierarchy from extraction output.
 *
 * Empty hierarchies are valid (degraded evidence). Only an undecomposable
 * shape yields MalformedExtractionError.
 */
export function buildFactHierarchy(raw: unknown, sourceId: string): ExtractionResult {
  if (!isPlainObject(raw)) {
    return {
      ok: false,
      error: new MalformedExtractionError("Extraction output is not an object", sourceId),
    };
  }

  const whatKey = "what_facts" in raw ? "what_facts" : "whatFacts" in raw ? "whatFacts" : null;
  const hasClaims = "claims" in raw;

  if (!whatKey && !hasClaims) {
    return {
      ok: false,
      error: new MalformedExtractionError(
        "Extraction output has neither what_facts nor claims",
        sourceId,
      ),
    };
  }

  const whatRaw = whatKey ? raw[whatKey] : [];
  const claimsRaw = hasClaims ? raw.claims : [];

  if (!Array.isArray(whatRaw) || !Array.isArray(claimsRaw)) {
    return {
      ok: false,
      error: new MalformedExtractionError(
        `Extraction output field ${Array.isArray(whatRaw) ? "claims" : whatKey} is not an array`,
        sourceId,
      ),
    };
  }

  const hierarchy: FactHierarchy = Object.freeze({
    sourceId,
    whatFacts: Object.freeze(buildEntities(whatRaw, "event", sourceId)),
    claims: Object.freeze(buildEntities(claimsRaw, "claim", sourceId)),
  });

  return { ok: true, hierarchy };
}

/** An empty hierarchy for a source whose extraction produced nothing. */
export function emptyFactHierarchy(sourceId: string): FactHierarchy {
  return Object.freeze({
    sourceId,
    whatFacts: Object.freeze([]),
    claims: Object.freeze([]),
  });
}

/** WHAT facts followed by claims: the only independently comparable entities. */
export function listComparableEntities(hierarchy: FactHierarchy): Entity[] {
  return [...hierarchy.whatFacts, ...hierarchy.claims];
}

export function findEntity(hierarchy: FactHierarchy, id: string): Entity | undefined {
  return (
    hierarchy.whatFacts.find((e) => e.id === id) ?? hierarchy.claims.find((e) => e.id === id)
  );
}

/** Serialize a hierarchy for prompts and persistence, ids included. */
export function toPromptShape(hierarchy: FactHierarchy): {
  what_facts: Array<Record<string, unknown>>;
  claims: Array<Record<string, unknown>>;
} {
  const shape = (e: Entity) => ({
    id: e.id,
    [e.kind === "event" ? "event" : "claim"]: e.text,
    related_who: e.relatedWho,
    related_where: e.relatedWhere,
    related_when: e.relatedWhen,
    importance: e.importance,
    confidence: e.confidence,
  });
  return {
    what_facts: hierarchy.whatFacts.map(shape),
    claims: hierarchy.claims.map(shape),
  };
}
