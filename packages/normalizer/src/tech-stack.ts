const COLUMN_DELIMITERS = /[,;|]/;

const matcherCache = new WeakMap<readonly string[], RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * One alternation over the whole vocabulary, longest terms first so that
 * "React Native" wins over "React" at the same offset. Boundaries are
 * alphanumeric lookarounds rather than `\b`, which never matches after `+` or `#`.
 */
function vocabularyMatcher(vocabulary: readonly string[]): RegExp {
  const cached = matcherCache.get(vocabulary);
  if (cached) return cached;

  const alternatives = [...vocabulary].sort((a, b) => b.length - a.length).map(escapeRegExp);
  const matcher = new RegExp(`(?<![A-Za-z0-9_])(?:${alternatives.join('|')})(?![A-Za-z0-9_])`, 'gi');
  matcherCache.set(vocabulary, matcher);
  return matcher;
}

/**
 * Order-preserving, case-insensitive dedupe; the first spelling wins.
 */
export function dedupeTerms(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const value of values) {
    const normalized = value.trim();
    if (!normalized) continue;

    const key = normalized.toLowerCase();
    if (seen.has(key)) continue;

    seen.add(key);
    result.push(normalized);
  }

  return result;
}

export function splitTechColumn(value: string): string[] {
  return dedupeTerms(value.split(COLUMN_DELIMITERS));
}

/**
 * Vocabulary terms found in the text, in order of first appearance, spelled as the text spells them.
 */
export function scanTechTerms(text: string, vocabulary: readonly string[]): string[] {
  if (!text || vocabulary.length === 0) return [];

  const matches = Array.from(text.matchAll(vocabularyMatcher(vocabulary)), (match) => match[0]);
  return dedupeTerms(matches);
}

/**
 * A dedicated skills column wins outright; otherwise the description is scanned.
 */
export function extractTechStack(
  column: string | null | undefined,
  description: string,
  vocabulary: readonly string[],
): string[] {
  const columnTerms = column ? splitTechColumn(column) : [];
  if (columnTerms.length > 0) return columnTerms;

  return scanTechTerms(description, vocabulary);
}
