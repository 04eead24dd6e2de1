/**
 * Tiered name resolution
 *
 * Maps a loosely spoken name onto one record of a candidate pool:
 * 1. Exact (case-insensitive) name match
 * 2. Substring containment in either direction
 * 3. Edit-distance similarity with confidence thresholds
 *
 * Pure: the pool is only read, and the same query over the same pool always
 * yields the same Resolution.
 */

import { DEFAULT_MATCH_THRESHOLDS, type MatchThresholds } from '../../config/voice.js';
import type { Resolution } from '../../types/voice.js';
import { nameSimilarity, normalizeName } from '../../utils/similarity.js';

/** Substring hits above this count are too broad to present as a choice */
const MAX_SUBSTRING_CANDIDATES = 5;
const MAX_FUZZY_CANDIDATES = 3;
/** Scores are fractions; 0.8 - 0.6 is not exactly 0.2 in floating point */
const GAP_TOLERANCE = 1e-9;

export interface ScoredCandidate<T> {
  record: T;
  score: number;
}

export function resolve<T extends { name: string }>(
  query: string,
  pool: readonly T[],
  thresholds: MatchThresholds = DEFAULT_MATCH_THRESHOLDS
): Resolution<T> {
  const normalizedQuery = normalizeName(query);
  if (normalizedQuery.length === 0 || pool.length === 0) {
    return { outcome: 'not-found', query };
  }

  // Tier 1: exact
  const exact = pool.find((record) => normalizeName(record.name) === normalizedQuery);
  if (exact) {
    return { outcome: 'found', record: exact };
  }

  // Tier 2: substring either way
  const containing = pool.filter((record) => {
    const name = normalizeName(record.name);
    return name.length > 0 && (name.includes(normalizedQuery) || normalizedQuery.includes(name));
  });
  if (containing.length === 1) {
    return { outcome: 'found', record: containing[0] };
  }
  if (containing.length > 1 && containing.length <= MAX_SUBSTRING_CANDIDATES) {
    return { outcome: 'ambiguous', candidates: containing, query };
  }

  // Tier 3: similarity
  const scored = scoreCandidates(query, pool, thresholds);
  if (scored.length === 0) {
    return { outcome: 'not-found', query };
  }

  const [top, second] = scored;
  if (!second) {
    return top.score >= thresholds.highConfidenceSimilarity
      ? { outcome: 'found', record: top.record }
      : { outcome: 'needs-confirmation', candidate: top.record, similarity: top.score, query };
  }

  if (top.score - second.score > thresholds.confidenceGap + GAP_TOLERANCE) {
    return { outcome: 'needs-confirmation', candidate: top.record, similarity: top.score, query };
  }

  return {
    outcome: 'ambiguous',
    candidates: scored.slice(0, MAX_FUZZY_CANDIDATES).map((candidate) => candidate.record),
    query,
  };
}

/**
 * Candidates scoring at least `minSimilarity`, best first. Ties keep pool order.
 */
export function scoreCandidates<T extends { name: string }>(
  query: string,
  pool: readonly T[],
  thresholds: MatchThresholds = DEFAULT_MATCH_THRESHOLDS
): ScoredCandidate<T>[] {
  return pool
    .map((record) => ({
      record,
      score: nameSimilarity(query, record.name, thresholds.partialMatchWeight),
    }))
    .filter((candidate) => candidate.score >= thresholds.minSimilarity)
    .sort((a, b) => b.score - a.score);
}
