// src/services/retriever.ts
// What: In-memory retriever over one chapter: chunks, their embeddings, and brute-force cosine ranking.
// How: fromFile/fromText chunk the source with chunkWords and embed every chunk sequentially, keeping a null slot
//      for each failed embedding so embeddings[i] always belongs to chunks[i]. retrieve() embeds the query, scores
//      every embedded chunk, and sorts by score desc (null scores last), then chunk index asc. A ranked result can
//      still be empty (no chunk embedded); a failed query embedding is reported as its own status.

import fs from 'fs/promises';
import path from 'path';
import defaultLogger, { type Logger } from '../logging.js';
import { SourceNotFoundError } from '../errors.js';
import type { Chunk, Embedding, ScoredChunk } from '../models/types.js';
import { chunkWords } from './chunking.js';
import type { EmbeddingClient } from './embeddings.js';
import { compareScoresDesc, cosineSimilarity } from './similarity.js';

/** `query_unembedded`: the query had no embedding, so nothing could be ranked. */
export type Retrieval =
  | { status: 'ranked'; chunks: ScoredChunk[] }
  | { status: 'query_unembedded'; chunks: [] };

export interface Retriever {
  retrieve(query: string, topK: number): Promise<Retrieval>;
}

export interface RetrieverOptions {
  embedder: EmbeddingClient;
  chunkSize: number;
  overlap: number;
  logger?: Logger;
}

export class ChapterRetriever implements Retriever {
  readonly sourceId: string;

  readonly chunks: readonly Chunk[];

  private readonly embeddings: readonly (Embedding | null)[];

  private readonly embedder: EmbeddingClient;

  private readonly logger: Logger;

  private constructor(
    sourceId: string,
    chunks: Chunk[],
    embeddings: (Embedding | null)[],
    embedder: EmbeddingClient,
    logger: Logger,
  ) {
    this.sourceId = sourceId;
    this.chunks = Object.freeze(chunks.map((c) => Object.freeze(c)));
    this.embeddings = Object.freeze(embeddings);
    this.embedder = embedder;
    this.logger = logger;
  }

  static async fromFile(filePath: string, options: RetrieverOptions): Promise<ChapterRetriever> {
    const logger = options.logger ?? defaultLogger;
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      logger.error({ err, filePath }, 'Source text could not be read');
      throw new SourceNotFoundError(filePath, err);
    }
    return ChapterRetriever.fromText(text, path.basename(filePath), options);
  }

  static async fromText(text: string, sourceId: string, options: RetrieverOptions): Promise<ChapterRetriever> {
    const logger = options.logger ?? defaultLogger;
    const chunks: Chunk[] = chunkWords(text, options.chunkSize, options.overlap).map((chunkText, index) => ({
      index,
      text: chunkText,
      sourceId,
    }));

    logger.info({ sourceId, chunks: chunks.length }, 'Chunking and embedding source text');

    const embeddings: (Embedding | null)[] = [];
    for (const chunk of chunks) {
      const vec = await options.embedder.embed(chunk.text);
      if (!vec) {
        logger.warn({ sourceId, chunkIndex: chunk.index }, 'Chunk has no embedding; excluded from ranking');
      }
      embeddings.push(vec);
    }

    const retriever = new ChapterRetriever(sourceId, chunks, embeddings, options.embedder, logger);
    logger.info({ sourceId, chunks: chunks.length, embedded: retriever.embeddedCount }, 'Retriever ready');
    return retriever;
  }

  get embeddedCount(): number {
    return this.embeddings.filter((e) => e !== null).length;
  }

  async retrieve(query: string, topK: number): Promise<Retrieval> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new RangeError(`topK must be a positive integer, got ${topK}`);
    }
    this.logger.info({ query, topK }, 'Retrieving chunks');

    const queryVec = await this.embedder.embed(query);
    if (!queryVec) {
      this.logger.error({ query }, 'Could not compute query embedding; no retrieval possible');
      return { status: 'query_unembedded', chunks: [] };
    }

    const scored: ScoredChunk[] = [];
    this.chunks.forEach((chunk, i) => {
      const vec = this.embeddings[i];
      if (!vec) return;
      scored.push({ chunk, score: cosineSimilarity(queryVec, vec) });
    });

    scored.sort((a, b) => compareScoresDesc(a.score, b.score) || a.chunk.index - b.chunk.index);
    const top = scored.slice(0, topK);
    this.logger.info({ query, retrieved: top.length }, 'Retrieved chunks');
    return { status: 'ranked', chunks: top };
  }
}

/**
 * Builds each source's retriever at most once and shares the read-only instance. A failed build is evicted so the
 * next call can try again.
 */
export class RetrieverCache {
  private readonly entries = new Map<string, Promise<ChapterRetriever>>();

  constructor(private readonly options: RetrieverOptions) {}

  get(filePath: string): Promise<ChapterRetriever> {
    const key = path.resolve(filePath);
    const existing = this.entries.get(key);
    if (existing) return existing;

    const pending = ChapterRetriever.fromFile(key, this.options);
    this.entries.set(key, pending);
    void pending.catch(() => {
      this.entries.delete(key);
    });
    return pending;
  }
}
