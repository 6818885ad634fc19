import { describe, expect, it } from 'vitest';
import { CORRECT_THRESHOLD, PARTIAL_THRESHOLD, formatFeedback, gradeSimilarity } from './grading.js';

describe('gradeSimilarity', () => {
  it('maps scores to feedback bands', () => {
    expect(gradeSimilarity(0.9)).toBe('correct');
    expect(gradeSimilarity(0.7)).toBe('partial');
    expect(gradeSimilarity(0.3)).toBe('incorrect');
    expect(gradeSimilarity(-1)).toBe('incorrect');
  });

  it('treats both thresholds as exclusive lower bounds', () => {
    expect(CORRECT_THRESHOLD).toBe(0.85);
    expect(PARTIAL_THRESHOLD).toBe(0.6);
    expect(gradeSimilarity(0.85)).toBe('partial');
    expect(gradeSimilarity(0.6)).toBe('incorrect');
    expect(gradeSimilarity(0.8500001)).toBe('correct');
    expect(gradeSimilarity(0.6000001)).toBe('partial');
  });

  it('leaves a missing or undefined similarity unscored', () => {
    expect(gradeSimilarity(null)).toBe('unscored');
    expect(gradeSimilarity(Number.NaN)).toBe('unscored');
  });
});

describe('formatFeedback', () => {
  it('appends the similarity with two decimals', () => {
    expect(formatFeedback('correct', 0.9)).toBe('Correct! (Similarity: 0.90)');
    expect(formatFeedback('partial', 0.7234)).toBe('Partially correct. (Similarity: 0.72)');
    expect(formatFeedback('incorrect', 0.1)).toBe('Incorrect or unrelated. (Similarity: 0.10)');
  });

  it('has no similarity suffix when unscored', () => {
    expect(formatFeedback('unscored', null)).toBe('Could not compute feedback for your answer.');
  });
});
