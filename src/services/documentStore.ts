// src/services/documentStore.ts
// What: Insert-only store of chapter chunk embeddings, and the offline embed-and-store pipeline that fills it.
// How: ChapterEmbeddingStore issues one INSERT per record with ::vector casting. embedAndStoreChunks embeds chunks
//      one at a time; a chunk without an embedding is logged and skipped, a failed insert is logged and counted,
//      and neither stops the run. chunk_index is 1-based.

import { v4 as uuidv4 } from 'uuid';
import defaultLogger, { type Logger } from '../logging.js';
import { errorMessage } from '../errors.js';
import type { ChapterEmbeddingRecord } from '../models/types.js';
import { vectorToParam } from '../util/sql.js';
import type { EmbeddingClient } from './embeddings.js';

/** The part of pg's Pool/Client the store needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rowCount: number | null }>;
}

export class ChapterEmbeddingStore {
  constructor(private readonly db: Queryable) {}

  async insert(record: ChapterEmbeddingRecord): Promise<string> {
    const id = uuidv4();
    await this.db.query(
      'INSERT INTO chapter_embeddings (id, chapter, chunk_index, content, embedding) VALUES ($1, $2, $3, $4, $5::vector)',
      [id, record.chapter, record.chunkIndex, record.text, vectorToParam(record.embedding)],
    );
    return id;
  }
}

export interface EmbedAndStoreResult {
  chapter: string;
  total: number;
  stored: number;
  skipped: number[]; // chunk indexes without an embedding
  failed: { chunkIndex: number; error: string }[];
}

export async function embedAndStoreChunks(
  chapter: string,
  chunks: readonly string[],
  deps: { embedder: EmbeddingClient; store: ChapterEmbeddingStore; logger?: Logger },
): Promise<EmbedAndStoreResult> {
  const logger = deps.logger ?? defaultLogger;
  const result: EmbedAndStoreResult = { chapter, total: chunks.length, stored: 0, skipped: [], failed: [] };

  for (const [i, text] of chunks.entries()) {
    const chunkIndex = i + 1;
    logger.info({ chapter, chunkIndex, total: chunks.length }, 'Processing chunk');

    const embedding = await deps.embedder.embed(text);
    if (!embedding) {
      logger.warn({ chapter, chunkIndex }, 'Skipping chunk due to missing embedding');
      result.skipped.push(chunkIndex);
      continue;
    }

    try {
      await deps.store.insert({ chapter, chunkIndex, text, embedding });
      result.stored += 1;
      logger.info({ chapter, chunkIndex }, 'Chunk stored');
    } catch (err) {
      logger.error({ err, chapter, chunkIndex }, 'Error storing chunk');
      result.failed.push({ chunkIndex, error: errorMessage(err) });
    }
  }

  return result;
}
