import natural from 'natural';

/**
 * Normalizes a spoken or stored name for comparison.
 * Handles:
 * - Case normalization (lowercase)
 * - Punctuation that speech engines and operators add inconsistently
 * - Repeated whitespace
 *
 * Examples:
 * - "  Elettro-Impianti S.r.l. " → "elettro impianti srl"
 * - "MEDIKA  Service" → "medika service"
 */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[.,;:'"()]/g, '')
    .replace(/[-_/]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalized edit-distance similarity in [0, 1].
 *
 * Computed as `(maxLen - distance) / maxLen`, which equals
 * `1 - distance / maxLen` but keeps exact fractions such as 3/5 and 4/5 exact
 * so threshold comparisons at 0.6 and 0.8 behave predictably.
 * Identical strings score 1; an empty string against a non-empty one scores 0.
 */
export function similarity(a: string, b: string): number {
  if (a === b) {
    return 1;
  }
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const maxLen = Math.max(a.length, b.length);
  const distance = natural.LevenshteinDistance(a, b);
  return (maxLen - distance) / maxLen;
}

/**
 * Best similarity between a query and a stored name.
 *
 * Scores the full normalized names, and when the stored name has more words
 * than the query, every contiguous window of the stored name with the query's
 * word count ("siemenz" against "siemens", "healthcare" for
 * "Siemens Healthcare"). Window scores are multiplied by `partialMatchWeight`
 * so a partial match never outranks an equally close full one.
 */
export function nameSimilarity(query: string, name: string, partialMatchWeight: number): number {
  const normalizedQuery = normalizeName(query);
  const normalizedName = normalizeName(name);
  const full = similarity(normalizedQuery, normalizedName);

  if (normalizedQuery.length === 0 || normalizedName.length === 0) {
    return full;
  }

  const queryTokens = normalizedQuery.split(' ');
  const nameTokens = normalizedName.split(' ');
  if (nameTokens.length <= queryTokens.length) {
    return full;
  }

  let best = full;
  for (let start = 0; start + queryTokens.length <= nameTokens.length; start++) {
    const window = nameTokens.slice(start, start + queryTokens.length).join(' ');
    best = Math.max(best, similarity(normalizedQuery, window) * partialMatchWeight);
  }
  return best;
}
