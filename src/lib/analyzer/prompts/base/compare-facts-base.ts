/**
 * Base prompt template for FACT COMPARISON
 *
 * Context-aware matching of an original hierarchy against one source's
 * hierarchy. Every verdict must name entities by the ids given in the input.
 */

export function getCompareFactsBasePrompt(originalFactsJson: string, sourceFactsJson: string): string {
  return `You are a fact-checking assistant. Compare facts from two sources using CONTEXT-AWARE matching.

**IMPORTANT**: Facts match only when BOTH the event/claim AND its context (who/where/when) align. Don't match based on shared entities alone.

Original Source Facts:
${originalFactsJson}

Comparison Source Facts:
${sourceFactsJson}

**MATCHING RULES:**
1. WHAT facts match if: same event/action + similar who/where/when context
2. CLAIMS match if: same assertion + similar context
3. Partial matches (same event, different details) are CONFLICTS, not matches
4. Shared entities without same event context are NOT matches

**NUMBER COMPARISON RULES**
- When comparing numerical values, calculate percentage difference
- Difference < 30% of the larger number = MATCH with "moderate" strength
- Only mark as conflict if difference >= 30%

**AMBIGUOUS EXPRESSION RULES**
- 0-20: "few", "some", "any"
- 20-50: "some", "various", "many"
- 50-200: "several", "many", "lot"
- 200+: "huge", "massive", "big"
Example: "many people" matches "45 people".

**NO DUAL CLASSIFICATION**
- Give EXACTLY ONE verdict per original fact id
- If unsure between match and conflict, use "match" with "moderate" strength

**CONFLICT TYPES:**
- "contradiction": Directly opposite information
- "partial_mismatch": Same event but different details (dates, numbers, participants)
- "emphasis_difference": Same event but different focus or interpretation
- "context_mismatch": Same entity but different events

Return ONLY a valid JSON object:
{
  "verdicts": [
    {
      "original_id": "id of the original fact",
      "outcome": "match | conflict | absent",
      "source_id": "id of the comparison fact (omit or null when absent)",
      "match_strength": "strong | moderate (match only)",
      "conflict_type": "contradiction | partial_mismatch | emphasis_difference | context_mismatch (conflict only)",
      "conflict_severity": "high | medium | low (conflict only)"
    }
  ],
  "relevance_score": 0.0,
  "analysis_notes": "Brief analysis focusing on whether sources cover the SAME EVENTS/CLAIMS"
}

**RELEVANCE SCORE** (0.0-1.0):
- 0.8-1.0: Highly relevant, covers same core events
- 0.5-0.7: Moderately relevant, some overlap
- 0.0-0.4: Low relevance, different topics despite shared entities

Be strict about matching: similar context is required, not just shared names.
`;
}
