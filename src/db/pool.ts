// src/db/pool.ts
// What: Postgres connection pool for the chapter embedding store.
// How: Creates a pg Pool from DATABASE_URL with a small pool size. Only the offline scripts open one; the quiz
//      server never touches the database.

import { Pool } from 'pg';
import { ConfigurationError } from '../errors.js';

export function createPool(databaseUrl: string | undefined): Pool {
  if (!databaseUrl) {
    throw new ConfigurationError('DATABASE_URL is required to use the embedding store');
  }
  return new Pool({
    connectionString: databaseUrl,
    max: 2,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
}
