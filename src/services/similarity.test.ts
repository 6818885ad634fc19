import { describe, expect, it } from 'vitest';
import { compareScoresDesc, cosineSimilarity } from './similarity.js';

describe('cosineSimilarity', () => {
  it('is 1 for a vector compared with itself', () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBe(1);
    expect(cosineSimilarity([0.3, -0.7, 0.2, 0.9], [0.3, -0.7, 0.2, 0.9])).toBeCloseTo(1, 12);
  });

  it('is symmetric', () => {
    const a = [1, 0, 2];
    const b = [0.5, -1, 3];

    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });

  it('covers the full [-1, 1] range', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [-1, -2])).toBe(-1);
    expect(cosineSimilarity([1, 1], [1, 0])).toBeCloseTo(Math.SQRT1_2, 12);
  });

  it('ignores magnitude', () => {
    expect(cosineSimilarity([1, 2], [10, 20])).toBeCloseTo(1, 12);
  });

  it('returns the undefined score (null) for degenerate input', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBeNull();
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBeNull();
    expect(cosineSimilarity([], [])).toBeNull();
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBeNull();
  });
});

describe('compareScoresDesc', () => {
  it('sorts defined scores descending and undefined scores last', () => {
    const scores: (number | null)[] = [0.2, null, 0.9, -1, null];

    expect([...scores].sort(compareScoresDesc)).toEqual([0.9, 0.2, -1, null, null]);
  });
});
