// src/services/similarity.ts
// What: Cosine similarity between two embeddings.
// How: dot(a, b) / sqrt(|a|^2 * |b|^2). A zero-norm vector, an empty vector or a length mismatch has no defined
//      cosine; that case returns null (the "undefined" score), which callers rank below every defined score and
//      grade as unscored.

import type { Embedding } from '../models/types.js';

export function cosineSimilarity(a: Embedding, b: Embedding): number | null {
  if (a.length === 0 || a.length !== b.length) return null;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return null;
  // Floating-point drift can push |x| marginally past 1
  return Math.max(-1, Math.min(1, dot / Math.sqrt(normA * normB)));
}

/**
 * Orders scores descending with null after every number. Use as a comparator's primary key.
 */
export function compareScoresDesc(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}
