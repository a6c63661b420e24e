import { describe, it, expect } from 'vitest';
import { hybridScore, normalizeBm25 } from '../../src/search/hybrid.js';

describe('normalizeBm25', () => {
  it('divides by 10 and clamps to [0, 1]', () => {
    expect(normalizeBm25(5)).toBe(0.5);
    expect(normalizeBm25(25)).toBe(1);
    expect(normalizeBm25(-3)).toBe(0);
  });
});

describe('hybridScore', () => {
  it('blends vector and normalized BM25 scores', () => {
    expect(hybridScore(0.8, 5, 0.5)).toBeCloseTo(0.65, 10);
    expect(hybridScore(0.2, 20, 0.7)).toBeCloseTo(0.44, 10);
  });

  it('returns the vector score for pure vector weights', () => {
    expect(hybridScore(0.8, 5, 1)).toBe(0.8);
    expect(hybridScore(0.8, 5, 0.999)).toBe(0.8);
  });

  it('returns normalized BM25 for pure text weights', () => {
    expect(hybridScore(0.8, 5, 0)).toBe(0.5);
    expect(hybridScore(0.8, 5, 0.001)).toBe(0.5);
  });

  it('falls back to the vector score when pure text scoring finds no match', () => {
    expect(hybridScore(0.8, 0, 0)).toBe(0.8);
  });

  it('returns the vector score without a text query', () => {
    expect(hybridScore(0.3, undefined, 0.5)).toBe(0.3);
  });
});
