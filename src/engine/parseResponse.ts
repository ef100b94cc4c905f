import { tokenizeRow } from './tokenizer';
import type { RawProspectRow } from '../types';

export const EXPECTED_FIELDS = 6;

function clean(field: string | undefined): string {
  if (field === undefined) return '';
  return field.trim().replace(/^"+|"+$/g, '');
}

/**
 * Pulls prospect rows out of free-form model output. Lines that cannot be split
 * into six fields with either delimiter are dropped. Never throws.
 */
export function parseResponse(text: string): RawProspectRow[] {
  const rows: RawProspectRow[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const parts = tokenizeRow(line, EXPECTED_FIELDS);
    if (!parts) continue;
    rows.push({
      name: clean(parts[0]),
      segment: clean(parts[1]),
      region: clean(parts[2]),
      justification: clean(parts[3]),
      website: clean(parts[4]),
      priority: clean(parts[5])
    });
  }
  return rows;
}
