/**
 * Blends cosine similarity with a BM25 score into one ranking score.
 *
 * BM25 has no upper bound, so it is squashed with a fixed `/10` clamp to
 * [0, 1]. This is a coarse heuristic, not a calibrated probability, and it
 * is kept as-is so scores stay comparable across versions.
 */

import {
  BM25_NORMALIZATION_DIVISOR,
  PURE_TEXT_WEIGHT,
  PURE_VECTOR_WEIGHT,
} from '../constants.js';

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Map a raw BM25 score to [0, 1].
 */
export function normalizeBm25(bm25Score: number): number {
  return clamp(bm25Score / BM25_NORMALIZATION_DIVISOR, 0, 1);
}

/**
 * Final ranking score for one document.
 *
 * - `weight >= 0.999`: pure vector score.
 * - `weight <= 0.001`: normalized BM25, falling back to the vector score
 *   when BM25 is 0 so that an exact match still ranks first.
 * - otherwise: `weight * vector + (1 - weight) * normalizedBm25`.
 *
 * Without a text query (`bm25Score` undefined) the vector score is returned.
 *
 * @example
 * ```ts
 * hybridScore(0.8, 5, 0.5); // 0.5 * 0.8 + 0.5 * 0.5 = 0.65
 * hybridScore(0.8, 0, 0);   // 0.8
 * ```
 */
export function hybridScore(vectorScore: number, bm25Score: number | undefined, weight: number): number {
  if (bm25Score === undefined || weight >= PURE_VECTOR_WEIGHT) {
    return vectorScore;
  }

  if (weight <= PURE_TEXT_WEIGHT) {
    if (bm25Score === 0) {
      return vectorScore;
    }
    return normalizeBm25(bm25Score);
  }

  return weight * vectorScore + (1 - weight) * normalizeBm25(bm25Score);
}
