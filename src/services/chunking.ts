// src/services/chunking.ts
// What: Word-window chunking for the chapter text, plus sentence-aware packing for the offline store script.
// How: chunkWords slides a window of chunkSize words forward by (chunkSize - overlap) words and joins each window
//      with single spaces. chunkSentences splits on sentence punctuation and packs whole sentences into chunks of at
//      most chunkSize words, seeding each new chunk with the previous chunk's last `overlap` words.

import { ConfigurationError } from '../errors.js';

export function assertChunkParams(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
  }
}

function toWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Lazily yields the word windows of `text`. Validation happens on the first `next()` call.
 */
export function* iterateWordChunks(text: string, chunkSize: number, overlap: number): Generator<string> {
  assertChunkParams(chunkSize, overlap);
  const words = toWords(text);
  const step = chunkSize - overlap;
  for (let start = 0; start < words.length; start += step) {
    const chunk = words.slice(start, start + chunkSize).join(' ');
    if (chunk) yield chunk;
  }
}

export function chunkWords(text: string, chunkSize: number, overlap: number): string[] {
  assertChunkParams(chunkSize, overlap);
  return Array.from(iterateWordChunks(text, chunkSize, overlap));
}

export function chunkSentences(text: string, chunkSize: number, overlap: number): string[] {
  assertChunkParams(chunkSize, overlap);
  const sentences = text.split(/(?<=[.!?]) +/);
  const chunks: string[] = [];
  let current: string[] = [];

  for (const sentence of sentences) {
    const words = toWords(sentence);
    if (words.length === 0) continue;
    if (current.length + words.length <= chunkSize) {
      current.push(...words);
      continue;
    }
    if (current.length > 0) {
      chunks.push(current.join(' '));
      current = overlap > 0 ? current.slice(-overlap) : [];
    }
    current = [...current, ...words];
  }
  if (current.length > 0) chunks.push(current.join(' '));
  return chunks;
}
