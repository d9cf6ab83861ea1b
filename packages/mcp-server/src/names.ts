const QUOTE = /"/g;

/** Removes every double quote from a field value. */
export function stripQuotes(value: string): string {
  return value.replace(QUOTE, '');
}

/**
 * Field text for display: an outer pair of quotes is removed and doubled
 * quotes inside it collapse to one.
 */
export function unquoteField(value: string): string {
  const text = value.trim();
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    return text.slice(1, -1).replace(/""/g, '"');
  }
  return text;
}

/** `ns::Type::member` -> `member`. */
export function unqualified(name: string): string {
  const idx = name.lastIndexOf('::');
  return idx === -1 ? name : name.slice(idx + 2);
}

export type MatchMode = 'strict' | 'fallback';

export const MATCH_PASSES: readonly MatchMode[] = ['strict', 'fallback'];

/**
 * Compares a raw field against a search term that is already unqualified.
 * Strict mode needs equality; fallback also accepts the term as a substring.
 */
export function nameMatches(field: string, term: string, mode: MatchMode): boolean {
  const candidate = stripQuotes(field);
  if (candidate === term) return true;
  return mode === 'fallback' && candidate.includes(term);
}

/**
 * Parses a line-number field such as `12` or `"12"`. Returns undefined for
 * an empty or non-integer field.
 */
export function parseLineNumber(field: string): number | undefined {
  const text = stripQuotes(field).trim();
  if (!/^-?\d+$/.test(text)) return undefined;
  return Number.parseInt(text, 10);
}
