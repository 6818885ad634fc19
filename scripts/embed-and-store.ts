// scripts/embed-and-store.ts
// What: Offline population of the chapter_embeddings table.
// How: Reads CHAPTER_FILE, packs it into sentence-aligned chunks, embeds each chunk in turn and inserts the ones
//      that embedded. Logs a summary; exits non-zero if the source is missing or configuration is invalid.

import fs from 'fs/promises';
import { loadConfig } from '../src/config/env.js';
import { createPool } from '../src/db/pool.js';
import { SourceNotFoundError } from '../src/errors.js';
import logger from '../src/logging.js';
import { chunkSentences } from '../src/services/chunking.js';
import { ChapterEmbeddingStore, embedAndStoreChunks } from '../src/services/documentStore.js';
import { OpenAIEmbeddingClient, createOpenAIClient } from '../src/services/embeddings.js';

const STORE_CHUNK_SIZE = 500;
const STORE_CHUNK_OVERLAP = 50;

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.DATABASE_URL);

  let text: string;
  try {
    text = await fs.readFile(config.CHAPTER_FILE, 'utf8');
  } catch (err) {
    throw new SourceNotFoundError(config.CHAPTER_FILE, err);
  }

  const chunks = chunkSentences(text, STORE_CHUNK_SIZE, STORE_CHUNK_OVERLAP);
  logger.info({ chapter: config.CHAPTER_NAME, chunks: chunks.length }, 'Created chunks');

  const embedder = new OpenAIEmbeddingClient({
    api: createOpenAIClient(config),
    model: config.OPENAI_EMBED_MODEL,
    maxAttempts: config.API_MAX_ATTEMPTS,
  });

  try {
    const result = await embedAndStoreChunks(config.CHAPTER_NAME, chunks, {
      embedder,
      store: new ChapterEmbeddingStore(pool),
    });
    logger.info(result, 'All chunks processed');
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Embed and store failed');
  process.exitCode = 1;
});
