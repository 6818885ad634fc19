// scripts/run-migrations.ts
// What: Applies the SQL files in src/db/migrations to DATABASE_URL.
// How: Loads .env, sorts *.sql by filename and runs each on a single connection. Every file wraps itself in
//      BEGIN/COMMIT and uses IF NOT EXISTS, so re-running is safe. Exits non-zero on the first failure.

import 'dotenv/config';
import { promises as fs } from 'fs';
import path from 'path';
import { createPool } from '../src/db/pool.js';

async function main(): Promise<void> {
  const migrationsDir = path.resolve(process.cwd(), 'src/db/migrations');
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));

  if (files.length === 0) {
    console.log('No migrations found.');
    return;
  }

  const pool = createPool(process.env.DATABASE_URL);
  try {
    const client = await pool.connect();
    console.log('[migrate] Connected to database');
    try {
      for (const file of files) {
        const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
        console.log(`Applying migration: ${file}`);
        await client.query(sql);
        console.log(`Applied: ${file}`);
      }
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }

  console.log('Migrations complete.');
}

main().catch((err: unknown) => {
  console.error('[migrate] Migration failed:', err);
  process.exit(1);
});
