/**
 * Source classification and candidate de-duplication.
 *
 * Source types come from domain heuristics only; no network lookups.
 *
 * @module analyzer/source-classification
 */

import sourceDomains from "@/config/news-domains.json";
import type { SearchCandidate, SourceType } from "./types";

const MAJOR_NEWS = new Set(sourceDomains.major);
const SOCIAL = new Set(sourceDomains.social);
const BLOG_PLATFORMS = sourceDomains.blogPlatforms;

// ============================================================================
// DOMAIN UTILITIES
// ============================================================================

/**
 * Extract and normalize domain from URL
 */
export function extractDomain(url: string): string | null {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    // Strip www. prefix and trailing dots
    return hostname.replace(/^www\./, "").replace(/\.+$/, "");
  } catch {
    return null;
  }
}

/**
 * Domain + normalized path, used as the de-duplication key.
 * Query string and fragment are dropped; trailing slashes are trimmed.
 */
export function normalizeSourceKey(url: string): string | null {
  const domain = extractDomain(url);
  if (!domain) return null;
  const { pathname } = new URL(url);
  const path = pathname.toLowerCase().replace(/\/+$/, "");
  return `${domain}${path}`;
}

function matchesDomain(domain: string, candidates: Iterable<string>): boolean {
  for (const c of candidates) {
    if (domain === c || domain.endsWith(`.${c}`)) return true;
  }
  return false;
}

function isOfficialDomain(domain: string): boolean {
  if (/\.(gov|edu|mil|int)$/.test(domain)) return true;
  // Country-level government second levels: gov.uk, gouv.fr, gc.ca style hosts.
  return /(^|\.)(gov|gouv|govt)\.[a-z]{2}$/.test(domain);
}

/**
 * official > social > blog > news > unknown.
 */
export function classifySourceType(domain: string): SourceType {
  const d = domain.toLowerCase().replace(/^www\./, "");
  if (!d) return "unknown";

  if (isOfficialDomain(d)) return "official";
  if (matchesDomain(d, SOCIAL)) return "social";

  const labels = d.split(".");
  if (BLOG_PLATFORMS.some((p) => d === p || d.endsWith(`.${p}`))) return "blog";
  if (labels.some((l) => l.includes("blog"))) return "blog";

  if (matchesDomain(d, MAJOR_NEWS)) return "news";
  if (labels.slice(0, -1).some((l) => l.includes("news"))) return "news";

  return "unknown";
}

// ============================================================================
// DE-DUPLICATION
// ============================================================================

export interface DedupeOptions {
  /** URLs that must never be re-analyzed (the article itself, prior analyses). */
  excludeUrls?: Iterable<string>;
}

/**
 * Keep the first candidate per normalized key. Candidates with unparsable
 * URLs are dropped.
 */
export function dedupeCandidates<T extends Pick<SearchCandidate, "url">>(
  candidates: readonly T[],
  options: DedupeOptions = {},
): T[] {
  const seen = new Set<string>();
  for (const url of options.excludeUrls ?? []) {
    const key = normalizeSourceKey(url);
    if (key) seen.add(key);
  }

  const out: T[] = [];
  for (const candidate of candidates) {
    const key = normalizeSourceKey(candidate.url);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(candidate);
  }
  return out;
}
