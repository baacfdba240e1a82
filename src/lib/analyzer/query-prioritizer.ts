/**
 * Query Prioritizer
 *
 * Turns a fact hierarchy into exact-phrase search queries, highest priority first:
 *   1. high-importance WHAT facts
 *   2. high-importance claims
 *   3. medium-importance WHAT facts
 * Medium claims and anything low-importance are never queried. Within a tier the
 * hierarchy's insertion order is kept as-is (no secondary sort key).
 *
 * @module analyzer/query-prioritizer
 */

import type { Entity, FactHierarchy } from "./types";

export const DEFAULT_MAX_QUERIES = 3;
export const DEFAULT_MAX_PHRASE_WORDS = 10;

export interface QueryPrioritizerOptions {
  maxQueries?: number;
  /** Event/claim text is cut to this many words before quoting. */
  maxPhraseWords?: number;
}

function cleanPhrase(text: string, maxWords?: number): string {
  const words = text.replace(/"/g, " ").split(/\s+/).filter(Boolean);
  return (maxWords && maxWords > 0 ? words.slice(0, maxWords) : words).join(" ");
}

/**
 * `"<fact text>" "<first related who>"`, or just the quoted fact text when
 * the fact has no related WHO. Returns null when nothing quotable remains.
 */
export function buildFactQuery(entity: Entity, maxPhraseWords = DEFAULT_MAX_PHRASE_WORDS): string | null {
  const phrase = cleanPhrase(entity.text, maxPhraseWords);
  if (!phrase) return null;

  const who = entity.relatedWho.length > 0 ? cleanPhrase(entity.relatedWho[0]) : "";
  return who ? `"${phrase}" "${who}"` : `"${phrase}"`;
}

function queryTiers(hierarchy: FactHierarchy): Entity[][] {
  return [
    hierarchy.whatFacts.filter((e) => e.importance === "high"),
    hierarchy.claims.filter((e) => e.importance === "high"),
    hierarchy.whatFacts.filter((e) => e.importance === "medium"),
  ];
}

export function buildPrioritizedQueries(
  hierarchy: FactHierarchy,
  options: QueryPrioritizerOptions = {},
): string[] {
  const maxQueries = Math.max(0, Math.floor(options.maxQueries ?? DEFAULT_MAX_QUERIES));
  const maxPhraseWords = options.maxPhraseWords ?? DEFAULT_MAX_PHRASE_WORDS;
  const queries: string[] = [];

  for (const tier of queryTiers(hierarchy)) {
    for (const entity of tier) {
      if (queries.length >= maxQueries) return queries;
      const query = buildFactQuery(entity, maxPhraseWords);
      if (!query || queries.includes(query)) continue;
      queries.push(query);
    }
  }

  return queries;
}
