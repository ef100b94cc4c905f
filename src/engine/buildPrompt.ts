import { DEFAULT_BRIEF, systemRole, type CampaignBrief } from '../prompts/system';
import type { ChatMessage, SeedSegment } from '../types';

export const CSV_COLUMNS = ['Company', 'Segment', 'Country/Region', 'WhyRelevant', 'Website', 'Priority'] as const;

export interface PromptOptions {
  batchSize: number;
  maxAvoidChars: number;
  brief?: CampaignBrief;
}

// Sorted, unique, "; "-joined and cut at maxAvoidChars.
export function formatAvoidList(avoid: readonly string[], maxAvoidChars: number): string {
  const unique = Array.from(new Set(avoid)).sort();
  return unique.join('; ').slice(0, Math.max(0, maxAvoidChars));
}

export function buildPrompt(segment: SeedSegment, avoid: readonly string[], opts: PromptOptions): string {
  const brief = opts.brief ?? DEFAULT_BRIEF;
  const avoidText = formatAvoidList(avoid, opts.maxAvoidChars);

  return `
Context:
- Client: ${brief.client}
- Focus: ${brief.focus}
- Priority: ${brief.regions}. Real companies only, no duplicates.

Segment: ${segment.title}
Description: ${segment.description}

TASK:
Name ${opts.batchSize} new, real companies in this segment that could buy or use ${brief.product}.
Return **CSV without a header line**, with exactly these columns:
${CSV_COLUMNS.join(',')}

Definitions:
- Priority: 'A' (very good fit, high likelihood), 'B' (good fit), 'C' (possible).
- WhyRelevant: one short reason (product category, protein angle, EU presence etc.).
- Country/Region: EU/DACH/UK where possible; otherwise name the country.
- Website: if known, otherwise leave empty.
- NO duplicates. NO explanations. CSV rows only.

Avoid these companies (already collected):
${avoidText}
`.trim();
}

export function buildMessages(segment: SeedSegment, avoid: readonly string[], opts: PromptOptions): ChatMessage[] {
  return [
    { role: 'system', content: systemRole(opts.brief ?? DEFAULT_BRIEF) },
    { role: 'user', content: buildPrompt(segment, avoid, opts) }
  ];
}
