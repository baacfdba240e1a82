/**
 * JSON extraction utilities for recovering structured outputs from LLM text.
 *
 * These only locate and parse the first JSON object; models often wrap it in
 * prose or a markdown fence.
 */

/**
 * Extract the first JSON object substring from arbitrary text.
 * Resilient to braces inside quoted strings.
 */
export function extractFirstJsonObjectFromText(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) {
        escape = false;
        continue;
      }
      if (ch === "\\") {
        escape = true;
        continue;
      }
      if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
      continue;
    }

    if (ch === "{") depth++;
    if (ch === "}") depth--;

    if (depth === 0) return text.slice(start, i + 1);
  }

  return null;
}

export function tryParseFirstJsonObject(text: string): unknown {
  const jsonStr = extractFirstJsonObjectFromText(text);
  if (!jsonStr) return null;
  try {
    const parsed: unknown = JSON.parse(jsonStr);
    return parsed;
  } catch {
    return null;
  }
}
