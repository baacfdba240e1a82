/**
 * Base prompt template for FACT EXTRACTION
 *
 * Asks for a hierarchical structure: WHAT facts (events) and CLAIMS are primary,
 * WHO/WHERE/WHEN ride along as context of each.
 */

export const EXTRACTION_TEXT_LIMIT = 4000;

export function getExtractFactsBasePrompt(articleText: string, articleTitle?: string | null): string {
  const titleContext = articleTitle ? `\nTitle: ${articleTitle}\n` : "";

  return `You are a fact-checking assistant. Analyze the following article and extract facts using a HIERARCHICAL structure where events and claims are primary, and people/places/times are related entities.
${titleContext}
Article:
${articleText.slice(0, EXTRACTION_TEXT_LIMIT)}

Extract facts in TWO PRIMARY CATEGORIES:

1. **WHAT FACTS** (Events/Actions/Occurrences):
   - Main event or action described
   - Related WHO: entities involved (people, organizations)
   - Related WHERE: locations where it occurred
   - Related WHEN: timeframe/date when it occurred
   - Importance: high/medium/low (based on centrality to article)

2. **CLAIMS** (Assertions/Statements):
   - Main claim, statement, or assertion
   - Related WHO: who made the claim or who it's about
   - Related WHERE: where it applies or was made
   - Related WHEN: when it was made or applies
   - Importance: high/medium/low (based on significance)

**IMPORTANCE GUIDELINES:**
- HIGH: Core events/claims that define the article's main topic
- MEDIUM: Supporting details that add context
- LOW: Minor details or tangential information

Return ONLY a valid JSON object with this EXACT structure:
{
  "what_facts": [
    {
      "event": "Clear description of the main event or action (2-3 sentences max)",
      "related_who": ["Person/organization involved"],
      "related_where": ["Location"],
      "related_when": ["Timeframe or date"],
      "importance": "high",
      "confidence": "high"
    }
  ],
  "claims": [
    {
      "claim": "Specific claim or assertion made (2-3 sentences max)",
      "related_who": ["Who made it or who it's about"],
      "related_where": ["Where it applies"],
      "related_when": ["When it was made/applies"],
      "importance": "high",
      "confidence": "high"
    }
  ]
}

**CRITICAL RULES:**
1. Each WHAT fact must include the event PLUS its context (who/where/when)
2. Each CLAIM must include the assertion PLUS its context
3. Keep event/claim descriptions focused and specific
4. Include 3-7 WHAT facts and 2-5 CLAIMS (quality over quantity)
5. Confidence levels: "high" (clearly stated), "medium" (implied), "low" (uncertain)
`;
}
