// src/services/grading.ts
// What: Maps an answer/model-answer similarity to a feedback band.
// How: Two fixed thresholds; both bounds are exclusive on the upper band (0.85 is partial, 0.6 is incorrect).

import type { FeedbackBand } from '../models/types.js';

export const CORRECT_THRESHOLD = 0.85;
export const PARTIAL_THRESHOLD = 0.6;

export const FEEDBACK_MESSAGES: Record<FeedbackBand, string> = {
  correct: 'Correct!',
  partial: 'Partially correct.',
  incorrect: 'Incorrect or unrelated.',
  unscored: 'Could not compute feedback for your answer.',
};

export function gradeSimilarity(similarity: number | null): FeedbackBand {
  if (similarity === null || Number.isNaN(similarity)) return 'unscored';
  if (similarity > CORRECT_THRESHOLD) return 'correct';
  if (similarity > PARTIAL_THRESHOLD) return 'partial';
  return 'incorrect';
}

export function formatFeedback(band: FeedbackBand, similarity: number | null): string {
  const message = FEEDBACK_MESSAGES[band];
  return similarity === null ? message : `${message} (Similarity: ${similarity.toFixed(2)})`;
}
