/**
 * Vector utilities for similarity search.
 * Stored embeddings are normalized once so that the search loop is a
 * single dot product per document.
 */

import { NORMALIZATION_EPSILON } from '../constants.js';

/**
 * Euclidean (L2) norm of a vector.
 */
export function l2Norm(v: readonly number[]): number {
  let sumSquares = 0;
  for (let i = 0; i < v.length; i++) {
    sumSquares += v[i] * v[i];
  }
  return Math.sqrt(sumSquares);
}

/**
 * Scales a vector to unit length: `v / (‖v‖₂ + 1e-9)`.
 * An all-zero vector stays all-zero instead of producing NaN.
 *
 * @example
 * ```ts
 * normalize([3, 4]); // [0.6, 0.8] (within 1e-9)
 * normalize([0, 0]); // [0, 0]
 * ```
 */
export function normalize(v: readonly number[]): number[] {
  const divisor = l2Norm(v) + NORMALIZATION_EPSILON;
  const out = new Array<number>(v.length);
  for (let i = 0; i < v.length; i++) {
    out[i] = v[i] / divisor;
  }
  return out;
}

/**
 * Dot product. For two normalized vectors this is their cosine similarity.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Cosine similarity of two raw vectors, between -1 and 1.
 * Prefer `dot` over cached normalized vectors in hot loops.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  return dot(normalize(a), normalize(b));
}
