// src/services/embeddings.ts
// What: Embedding client over an OpenAI-compatible embeddings API.
// How: One embeddings.create request per attempt, up to maxAttempts (see util/retry.ts). Any failure,
//      including a malformed response, is logged and resolves to null; embed() never rejects.

import OpenAI from 'openai';
import { z } from 'zod';
import type { AppConfig } from '../config/env.js';
import defaultLogger, { type Logger } from '../logging.js';
import type { Embedding } from '../models/types.js';
import { withBackoff } from '../util/retry.js';

export interface EmbeddingClient {
  embed(text: string): Promise<Embedding | null>;
}

/** The slice of the OpenAI SDK this client calls; fakes in tests implement the same shape. */
export interface EmbeddingsApi {
  embeddings: {
    create(body: { model: string; input: string }): Promise<{ data: Array<{ embedding: unknown }> }>;
  };
}

const embeddingSchema = z.array(z.number().finite()).min(1);

export interface OpenAIEmbeddingClientOptions {
  api: EmbeddingsApi;
  model: string;
  maxAttempts?: number;
  initialDelayMs?: number;
  logger?: Logger;
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  private readonly api: EmbeddingsApi;

  private readonly model: string;

  private readonly maxAttempts: number;

  private readonly initialDelayMs: number;

  private readonly logger: Logger;

  constructor({ api, model, maxAttempts = 3, initialDelayMs = 500, logger = defaultLogger }: OpenAIEmbeddingClientOptions) {
    this.api = api;
    this.model = model;
    this.maxAttempts = Math.max(1, maxAttempts);
    this.initialDelayMs = initialDelayMs;
    this.logger = logger;
  }

  private async request(text: string): Promise<Embedding> {
    const res = await this.api.embeddings.create({ model: this.model, input: text });
    const parsed = embeddingSchema.safeParse(res.data[0]?.embedding);
    if (!parsed.success) {
      throw new Error('Embedding response did not include a numeric vector');
    }
    return parsed.data;
  }

  async embed(text: string): Promise<Embedding | null> {
    try {
      return await withBackoff(() => this.request(text), {
        label: 'Embedding',
        maxAttempts: this.maxAttempts,
        initialDelayMs: this.initialDelayMs,
        logger: this.logger,
      });
    } catch (err) {
      this.logger.error({ err, model: this.model, textLength: text.length }, 'Embedding failed');
      return null;
    }
  }
}

/** SDK-level retries are disabled: withBackoff in the clients is the only retry layer, bounded by API_MAX_ATTEMPTS. */
export function createOpenAIClient(config: Pick<AppConfig, 'OPENAI_API_KEY' | 'OPENAI_BASE_URL'>): OpenAI {
  return new OpenAI({ apiKey: config.OPENAI_API_KEY, baseURL: config.OPENAI_BASE_URL, maxRetries: 0 });
}
