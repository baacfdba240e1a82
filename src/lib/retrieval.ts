/**
 * Article retrieval.
 *
 * Fetches a page with SSRF guards (http/https only, no embedded credentials,
 * no private or loopback hosts, redirects followed manually and re-checked),
 * caps the body at 2MB and extracts title + body text with cheerio.
 *
 * @module retrieval
 */

import dns from "dns/promises";
import net from "net";
import * as cheerio from "cheerio";
import type { FetchedArticle } from "./analyzer/collaborators";
import { extractDomain } from "./analyzer/source-classification";

const MAX_BYTES = 2_000_000; // 2MB
const MAX_REDIRECTS = 5;
const FETCH_TIMEOUT_MS = 15_000;
const MAX_TEXT_CHARS = 50_000;
const FALLBACK_PARAGRAPHS = 20;

const CONTENT_SELECTORS = [
  "main",
  "[role='main']",
  ".post-content",
  ".article-content",
  ".entry-content",
  ".content",
  "#content",
];

export interface FetchArticleOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

// ============================================================================
// URL SAFETY
// ============================================================================

export function isPrivateIp(ip: string): boolean {
  if (net.isIP(ip) === 4) {
    const [a, b] = ip.split(".").map((x) => parseInt(x, 10));
    if (a === 0) return true;
    if (a === 10) return true;
    if (a === 127) return true;
    if (a === 169 && b === 254) return true;
    if (a === 172 && b >= 16 && b <= 31) return true;
    if (a === 192 && b === 168) return true;
    if (a === 100 && b >= 64 && b <= 127) return true; // CGNAT 100.64.0.0/10
    if (a === 192 && b === 0) return true;
    if (a === 198 && (b === 18 || b === 19)) return true;
    if (a >= 224) return true;
    return false;
  }
  if (net.isIP(ip) === 6) {
    const lower = ip.toLowerCase();
    if (lower === "::1" || lower === "::") return true;
    if (lower.startsWith("fe80:")) return true;
    if (lower.startsWith("fc") || lower.startsWith("fd")) return true;
    if (lower.startsWith("::ffff:")) return isPrivateIp(lower.slice("::ffff:".length));
    return false;
  }
  return true;
}

export function validateUrlForFetch(url: URL): void {
  if (!["http:", "https:"].includes(url.protocol)) {
    throw new Error("Only http/https URLs are allowed");
  }
  if (url.username || url.password) {
    throw new Error("URLs with embedded credentials are not allowed");
  }
}

async function checkHost(url: URL): Promise<void> {
  const host = url.hostname.toLowerCase().replace(/^\[|\]$/g, "");
  if (host === "localhost" || host.endsWith(".localhost")) {
    throw new Error("Blocked URL host (localhost)");
  }

  if (net.isIP(host)) {
    if (isPrivateIp(host)) throw new Error("Blocked URL host (private/loopback address)");
    return;
  }

  const addrs = await dns.lookup(host, { all: true });
  for (const a of addrs) {
    if (isPrivateIp(a.address)) {
      throw new Error("Blocked URL host (private/loopback address)");
    }
  }
}

async function fetchWithSafeRedirects(initialUrl: URL, signal: AbortSignal): Promise<{ res: Response; finalUrl: URL }> {
  let current = new URL(initialUrl.toString());

  for (let i = 0; i <= MAX_REDIRECTS; i++) {
    validateUrlForFetch(current);
    await checkHost(current);

    const res = await fetch(current.toString(), {
      redirect: "manual",
      signal,
      headers: {
        "User-Agent": "Corroborate/1.0 (fact-checking bot)",
        Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.5",
      },
    });

    if (res.status >= 300 && res.status < 400) {
      const location = res.headers.get("location");
      if (!location) throw new Error("Redirect without location header");
      current = new URL(location, current);
      continue;
    }

    return { res, finalUrl: current };
  }

  throw new Error("Too many redirects");
}

async function readBodyCapped(res: Response): Promise<string> {
  const reader = res.body?.getReader();
  if (!reader) throw new Error("No response body");

  let total = 0;
  const chunks: Uint8Array[] = [];
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.length;
    if (total > MAX_BYTES) {
      await reader.cancel();
      throw new Error("Response too large");
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

// ============================================================================
// EXTRACTION
// ============================================================================

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Title from the first `h1`, else `<title>`. Body from paragraphs inside
 * `article`, then a main/content container, then the first paragraphs of
 * the page.
 */
export function extractArticleFromHtml(html: string): { title: string; text: string } {
  const $ = cheerio.load(html);
  $("script, style, noscript, nav, footer, header, aside, .sidebar, .menu, .advertisement, .ad").remove();

  const title = collapse($("h1").first().text()) || collapse($("title").first().text());

  const paragraphsIn = (selector: string): string[] =>
    $(selector)
      .find("p")
      .toArray()
      .map((el) => collapse($(el).text()))
      .filter(Boolean);

  let paragraphs = paragraphsIn("article");
  for (const selector of CONTENT_SELECTORS) {
    if (paragraphs.length > 0) break;
    paragraphs = paragraphsIn(selector);
  }
  if (paragraphs.length === 0) {
    paragraphs = $("p")
      .toArray()
      .slice(0, FALLBACK_PARAGRAPHS)
      .map((el) => collapse($(el).text()))
      .filter(Boolean);
  }

  return { title, text: paragraphs.join(" ").slice(0, MAX_TEXT_CHARS) };
}

// ============================================================================
// PUBLIC API
// ============================================================================

export async function fetchArticle(urlStr: string, options: FetchArticleOptions = {}): Promise<FetchedArticle> {
  const url = new URL(urlStr);
  validateUrlForFetch(url);

  const timeout = AbortSignal.timeout(options.timeoutMs ?? FETCH_TIMEOUT_MS);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  const { res, finalUrl } = await fetchWithSafeRedirects(url, signal);
  if (!res.ok) throw new Error(`Fetch failed: HTTP ${res.status}`);

  const contentType = res.headers.get("content-type") ?? "";
  const raw = await readBodyCapped(res);
  const domain = extractDomain(finalUrl.toString()) ?? finalUrl.hostname;

  if (contentType.includes("html") || /^\s*<(!doctype|html)/i.test(raw)) {
    const { title, text } = extractArticleFromHtml(raw);
    if (!text) throw new Error(`No article text found at ${finalUrl.toString()}`);
    return { url: finalUrl.toString(), title: title || domain, text, domain };
  }

  const text = raw.trim().slice(0, MAX_TEXT_CHARS);
  if (!text) throw new Error(`Empty response body from ${finalUrl.toString()}`);
  console.log(`[Retrieval] Non-HTML content (${contentType || "unknown type"}) from ${domain}`);
  return { url: finalUrl.toString(), title: domain, text, domain };
}
