/**
 * Base prompt template for SEARCH QUERY OPTIMIZATION
 *
 * Used on retry attempts, after exact-phrase queries found too few sources.
 */

export function getQueryOptimizationBasePrompt(factsJson: string, attempt: number): string {
  const attemptContext =
    attempt > 1
      ? `\n**This is attempt ${attempt}** - Previous searches didn't find enough sources. Create MORE SPECIFIC and VARIED queries.\n`
      : "";

  return `You are a search query optimization assistant. Given hierarchical facts from an article, create COMPLETE, EFFECTIVE search queries for news and web search.
${attemptContext}
Facts from Article:
${factsJson}

Create search queries that will find news articles about the SAME EVENTS and CLAIMS.

**QUERY REQUIREMENTS:**
1. Use COMPLETE SENTENCES with full context
2. Include main event + key entities + location/time if relevant
3. Avoid incomplete fragments
4. Each query should be self-contained and clear

Return ONLY a valid JSON object:
{
  "primary_query": "Main complete sentence describing the core event with entities",
  "alternative_queries": [
    "Alternative phrasing of the event",
    "Query focusing on a different aspect of the same event"
  ],
  "keywords": ["keyword1", "keyword2"]
}

Bad queries: "launches new" (incomplete), "Jane Doe" (just a name), "Springfield 2024" (no context).
Good query: "Acme Corp launches electric delivery van in Springfield in March 2024".

Focus on the HIGH-IMPORTANCE WHAT facts and CLAIMS from the input.
`;
}
