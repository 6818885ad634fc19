// src/models/types.ts
// What: Shared TypeScript types for chunks, embeddings, retrieval results and conversation turns.
// How: Plain interfaces; absent embeddings and undefined similarity scores are modelled as null.

export type Embedding = number[];

export interface Chunk {
  index: number; // position in the source, 0-based
  text: string;
  sourceId: string;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number | null; // cosine similarity in [-1, 1]; null when undefined (zero-norm vector)
}

export type FeedbackBand = 'correct' | 'partial' | 'incorrect' | 'unscored';

export interface ConversationTurn {
  question: string;
  userAnswer: string;
  modelAnswer: string;
  feedbackBand: FeedbackBand;
  similarity: number | null;
}

export interface ChapterEmbeddingRecord {
  chapter: string;
  chunkIndex: number;
  text: string;
  embedding: Embedding;
}
