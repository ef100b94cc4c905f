/**
 * Quote-aware row tokenizer.
 *
 * A delimiter splits the line only outside a double-quoted run. Quotes are kept
 * in the tokens; callers strip them. Escaped quotes (`""`) just toggle the state
 * twice, which leaves the split points unchanged.
 */

export type Delimiter = ',' | ';';

// Tried in order until one yields enough fields.
export const DELIMITER_FALLBACK: readonly Delimiter[] = [',', ';'];

export function splitDelimited(line: string, delimiter: Delimiter): string[] {
  const tokens: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const ch of line) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === delimiter && !inQuotes) {
      tokens.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  tokens.push(current);
  return tokens;
}

export function tokenizeRow(
  line: string,
  minFields: number,
  delimiters: readonly Delimiter[] = DELIMITER_FALLBACK
): string[] | null {
  for (const delimiter of delimiters) {
    const tokens = splitDelimited(line, delimiter);
    if (tokens.length >= minFields) return tokens;
  }
  return null;
}
