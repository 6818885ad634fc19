// src/server.ts
// What: HTTP server entrypoint.
// How: Validates configuration, builds the OpenAI-backed embedding and generation clients, loads the chapter
//      retriever (embedding every chunk once) and the question bank, then serves the quiz API. Any failure before
//      listening (bad config, missing chapter file, port in use) is logged and exits the process.

import path from 'path';
import { createApp, listen } from './app.js';
import { loadConfig } from './config/env.js';
import logger, { createResponseLogger } from './logging.js';
import { OpenAIEmbeddingClient, createOpenAIClient } from './services/embeddings.js';
import { OpenAIGenerationClient } from './services/generation.js';
import { QuestionBank } from './services/questionBank.js';
import { RetrieverCache } from './services/retriever.js';
import { SessionStore } from './services/session.js';

const QUESTIONS_FILE = path.resolve(process.cwd(), 'data/questions.json');

async function main(): Promise<void> {
  const config = loadConfig();
  const openai = createOpenAIClient(config);

  const embedder = new OpenAIEmbeddingClient({
    api: openai,
    model: config.OPENAI_EMBED_MODEL,
    maxAttempts: config.API_MAX_ATTEMPTS,
  });
  const generator = new OpenAIGenerationClient({
    api: openai,
    model: config.OPENAI_CHAT_MODEL,
    maxAttempts: config.API_MAX_ATTEMPTS,
  });

  const retrievers = new RetrieverCache({
    embedder,
    chunkSize: config.CHUNK_SIZE,
    overlap: config.CHUNK_OVERLAP,
  });
  const retriever = await retrievers.get(config.CHAPTER_FILE);
  const questions = await QuestionBank.fromFile(QUESTIONS_FILE);

  const sessions = new SessionStore(
    {
      retriever,
      embedder,
      generator,
      questions,
      topK: config.TOP_K,
      responseLog: createResponseLogger(config.RESPONSE_LOG_FILE),
    },
    { ttlMs: config.SESSION_TTL_MINUTES * 60_000, maxSessions: config.MAX_SESSIONS },
  );

  await listen(createApp({ sessions }), config.PORT);
  logger.info({ port: config.PORT, chapter: config.CHAPTER_NAME }, 'Server listening');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exitCode = 1;
});
