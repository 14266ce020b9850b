/**
 * Distance metric normalization and result ordering.
 */

import type { QueryMatch } from './types.js';

/** Standard distance metric names */
export type DistanceMetric = 'cosine' | 'euclidean' | 'dot';

/**
 * Convert server distance-space names to standard strings.
 *
 * - "cosine" → "cosine"
 * - "l2" or "euclidean" → "euclidean"
 * - "ip" or "dot" → "dot"
 * - Unknown values → returned unchanged
 *
 * @example
 * ```typescript
 * normalizeDistance('l2');  // "euclidean"
 * normalizeDistance('ip');  // "dot"
 * normalizeDistance('custom'); // "custom" (unchanged)
 * ```
 */
export function normalizeDistance(metric: string): DistanceMetric | string {
  if (metric === 'ip' || metric === 'dot') {
    return 'dot';
  }
  if (metric === 'cosine') {
    return 'cosine';
  }
  if (metric === 'l2' || metric === 'euclidean') {
    return 'euclidean';
  }
  return metric;
}

/**
 * Order matches by ascending distance, then ascending id.
 * Ids compare by code unit so the order does not depend on locale.
 */
export function compareMatches(a: QueryMatch, b: QueryMatch): number {
  if (a.distance !== b.distance) {
    return a.distance - b.distance;
  }
  if (a.item.id === b.item.id) {
    return 0;
  }
  return a.item.id < b.item.id ? -1 : 1;
}

/** Sorted copy of the matches */
export function sortMatches(matches: readonly QueryMatch[]): QueryMatch[] {
  return [...matches].sort(compareMatches);
}

/**
 * Whether a sorted answer of `limit` nearest matches could hide items tied
 * with the match at position `topK`. Servers break distance ties in their
 * own order, so a full answer whose last distance equals the cutoff distance
 * must be widened before the id tie-break can apply.
 */
export function tiedAtCutoff(
  sorted: readonly QueryMatch[],
  topK: number,
  limit: number
): boolean {
  if (sorted.length < limit) {
    return false;
  }
  const cutoff = sorted[topK - 1];
  const last = sorted[sorted.length - 1];
  return (
    cutoff !== undefined &&
    last !== undefined &&
    last.distance === cutoff.distance
  );
}
