/**
 * Create the pgvector extension, the analytics tables and the chat tables.
 *
 * Usage:
 *   tsx scripts/setup-database.ts
 *
 * Safe to run repeatedly: every statement is `if not exists`.
 */

import { readFile } from 'node:fs/promises';

import { sql } from 'kysely';

import { parseEnv, createConfig } from '../src/infra/config/index.js';
import { initDatabase } from '../src/infra/database/client.js';

const SCHEMA_FILE = new URL('../src/infra/database/fira/schema.sql', import.meta.url);

async function main(): Promise<void> {
  const config = createConfig(parseEnv(process.env));
  const db = initDatabase(config);

  try {
    const schema = await readFile(SCHEMA_FILE, 'utf-8');
    // No parameters: pg sends the file as one simple query with several statements
    await sql.raw(schema).execute(db);
    console.log('Database schema is up to date');
  } finally {
    await db.destroy();
  }
}

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  console.error(`Database setup failed: ${msg}`);
  process.exit(1);
});
