/**
 * Delete ingested records from one table.
 *
 * Usage:
 *   tsx scripts/purge-data.ts --table <table> [--source-file <name>]
 *
 * Without --source-file every row of the table is deleted.
 */

import { parseEnv, createConfig } from '../src/infra/config/index.js';
import { initDatabase } from '../src/infra/database/client.js';
import { createLogger } from '../src/infra/logger/index.js';
import { makeHybridStoreRepo } from '../src/modules/hybrid-store/index.js';
import { loadLabelCatalog, TABLE_NAMES } from '../src/modules/labels/index.js';

import type { PurgeInput } from '../src/modules/hybrid-store/index.js';
import type { TableName } from '../src/modules/labels/index.js';

const isTableName = (value: string): value is TableName =>
  TABLE_NAMES.some((table) => table === value);

/**
 * Parse command line arguments
 */
function parseArgs(): PurgeInput {
  const args = process.argv.slice(2);
  let table: string | undefined;
  let sourceFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--table':
        table = nextArg;
        i++;
        break;
      case '--source-file':
        sourceFile = nextArg;
        i++;
        break;
    }
  }

  if (table === undefined || !isTableName(table)) {
    throw new Error(`--table is required and must be one of: ${TABLE_NAMES.join(', ')}`);
  }

  return sourceFile === undefined ? { table } : { table, sourceFile };
}

async function main(): Promise<void> {
  const input = parseArgs();
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'fira-purge',
    pretty: config.logger.pretty,
  });

  const catalog = await loadLabelCatalog(config.labels.path);
  if (catalog.isErr()) {
    throw new Error(catalog.error.message);
  }

  const db = initDatabase(config);
  try {
    const store = makeHybridStoreRepo({
      db,
      catalog: catalog.value,
      logger,
      queryTimeoutMs: config.database.queryTimeoutMs,
    });

    const result = await store.purge(input);
    if (result.isErr()) {
      console.error(`Purge failed: ${result.error.type}: ${result.error.message}`);
      process.exitCode = 1;
      return;
    }

    const scope = input.sourceFile === undefined ? 'all sources' : input.sourceFile;
    console.log(`Deleted ${String(result.value)} row(s) from ${input.table} (${scope})`);
  } finally {
    await db.destroy();
  }
}

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  console.error(msg);
  process.exit(1);
});
