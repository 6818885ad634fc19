/**
 * src/config/env.ts
 * What: Environment configuration loader/validator.
 * How: Loads .env via dotenv, validates with zod and returns a typed AppConfig. Validation failures throw a
 *      ConfigurationError listing every issue; the server calls loadConfig() once at boot and refuses to start
 *      on error. Chunking parameters are cross-checked here (CHUNK_OVERLAP < CHUNK_SIZE) so a bad pair never
 *      reaches the chunker at request time.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : undefined),
    z.number().int().positive().default(def),
  );

const nonNegativeIntWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : undefined),
    z.number().int().nonnegative().default(def),
  );

// Treat blank values in .env ("KEY=") as unset
const optionalString = () =>
  z.preprocess((v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v), z.string().optional());

const schema = z
  .object({
    OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY is required'),
    OPENAI_BASE_URL: optionalString().pipe(z.string().url().optional()),
    OPENAI_EMBED_MODEL: z.string().min(1).default('text-embedding-3-small'),
    OPENAI_CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    CHAPTER_FILE: z.string().min(1).default('data/understanding-media.txt'),
    CHAPTER_NAME: z.string().min(1).default('Understanding Media'),
    CHUNK_SIZE: intWithDefault(300),
    CHUNK_OVERLAP: nonNegativeIntWithDefault(50),
    TOP_K: intWithDefault(3),
    PORT: intWithDefault(3000),
    API_MAX_ATTEMPTS: intWithDefault(3),
    SESSION_TTL_MINUTES: intWithDefault(30),
    MAX_SESSIONS: intWithDefault(1000),
    RESPONSE_LOG_FILE: z.string().min(1).default('logs/responses.log'),
    DATABASE_URL: optionalString(),
    NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
  })
  .refine((c) => c.CHUNK_OVERLAP < c.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export interface AppConfig {
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL?: string;
  OPENAI_EMBED_MODEL: string;
  OPENAI_CHAT_MODEL: string;
  CHAPTER_FILE: string;
  CHAPTER_NAME: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  PORT: number;
  API_MAX_ATTEMPTS: number;
  SESSION_TTL_MINUTES: number;
  MAX_SESSIONS: number;
  RESPONSE_LOG_FILE: string;
  DATABASE_URL?: string; // only the offline store script needs it
  NODE_ENV: 'production' | 'development' | 'test';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}
