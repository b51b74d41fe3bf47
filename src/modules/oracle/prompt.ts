import type { MatchCandidate } from '../../types';

export const SYSTEM_PROMPT =
    'You are an assistant that matches Australian companies between website data and ABR records. Respond ONLY with JSON.';

/**
 * Compact prompt for one web mention / registry entity pair.
 */
export function buildPrompt(candidate: MatchCandidate): string {
    const { cc, abr } = candidate;
    const webName = cc.company_name_norm || cc.company_name_raw;

    return `
You are matching Australian companies between a website (Common Crawl) and an ABR record.

Common Crawl company:
- Normalised name: ${webName}
- URL: ${cc.url}
- Domain: ${cc.domain}

ABR candidate:
- ABN: ${abr.abn}
- Entity name (normalised): ${abr.entity_name_norm}
- Entity name (raw): ${abr.entity_name_raw}
- Entity type: ${abr.entity_type}
- Status: ${abr.entity_status}
- Address: ${abr.address_full}, ${abr.suburb}, ${abr.state} ${abr.postcode}

Question:
Are these records referring to the same underlying company?

Respond **only** with a JSON object with the following shape:
{
  "is_match": true or false,
  "confidence": "low" | "medium" | "high",
  "reason": "short explanation here"
}
`.trim();
}
