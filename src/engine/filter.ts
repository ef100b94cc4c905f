import { ProspectRecordSchema } from '../schemas/prospect';
import type { ProspectRecord, RawProspectRow } from '../types';

// Placeholders and website fragments the model sometimes puts in the name column.
const NON_COMPANY_PATTERNS: RegExp[] = [
  /^siehe/i,
  /^see above/i,
  /^n\/a$/i,
  /^-$/,
  /^keine/i,
  /^none\b/i,
  /^unbekannt/i,
  /^unknown/i,
  /^sample/i,
  /^example/i,
  /http/i,
  /www\./i,
  /\.(com|de|net|org|io|eu|ch|at)\b/i,
  /\.co\.uk\b/i
];

export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function looksLikeCompany(name: string): boolean {
  const trimmed = name.trim();
  if (NON_COMPANY_PATTERNS.some(re => re.test(trimmed))) return false;
  // single short alphabetic token, e.g. a misparsed acronym
  if (/^[\p{L}]{1,3}$/u.test(trimmed)) return false;
  return true;
}

/**
 * Keeps rows whose normalized name is non-empty, unseen and company-like.
 * `seen` is updated per accepted row, so the first of two equal names wins.
 */
export function dedupeAndFilter(rows: readonly RawProspectRow[], seen: Set<string>): ProspectRecord[] {
  const clean: ProspectRecord[] = [];
  for (const row of rows) {
    const key = normalizeName(row.name);
    if (!key || seen.has(key)) continue;
    if (!looksLikeCompany(row.name)) continue;
    seen.add(key);
    clean.push(Object.freeze(ProspectRecordSchema.parse(row)));
  }
  return clean;
}
