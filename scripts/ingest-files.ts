/**
 * Ingest spreadsheets into the hybrid store.
 *
 * Usage:
 *   tsx scripts/ingest-files.ts <file> [<file> ...]
 *
 * The category of each file (OpEx, demand, priority) is detected from its
 * name. Re-ingesting a file replaces its records instead of duplicating them.
 * Exits with code 1 when any file is aborted or has failed records.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { initServices } from '../src/app/services.js';
import { parseEnv, createConfig } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { cryptoHasher, ingestFiles, readWorkbook } from '../src/modules/ingestion/index.js';

import type { IngestionSummary, SourceFile } from '../src/modules/ingestion/index.js';

function printSummary(summary: IngestionSummary): void {
  console.log(`${summary.file} [${summary.category ?? 'unknown'}]: ${summary.status}`);
  console.log(`  Succeeded: ${String(summary.succeeded)}`);
  console.log(`  Failed:    ${String(summary.failed.length)}`);
  console.log(`  Warnings:  ${String(summary.warnings.length)}`);
  for (const failure of summary.failed.slice(0, 10)) {
    console.log(`    - ${failure.ref}: ${failure.reason}`);
  }
  if (summary.failed.length > 10) {
    console.log(`    ... and ${String(summary.failed.length - 10)} more`);
  }
  if (summary.error !== undefined) {
    console.log(`  Error: ${summary.error.type}: ${summary.error.message}`);
  }
}

async function main(): Promise<void> {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    console.error('Usage: tsx scripts/ingest-files.ts <file> [<file> ...]');
    process.exit(1);
  }

  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'fira-ingest',
    pretty: config.logger.pretty,
  });
  const services = await initServices(config, logger);

  try {
    const sources: SourceFile[] = await Promise.all(
      files.map(async (file) => ({
        filename: path.basename(file),
        content: new Uint8Array(await readFile(file)),
      }))
    );

    console.log(`Ingesting ${String(sources.length)} file(s)`);
    console.log();

    const summaries = await ingestFiles(
      {
        catalog: services.catalog,
        hasher: cryptoHasher,
        readWorkbook,
        embeddings: services.embeddings,
        store: services.store,
        logger,
        batchSize: config.ingestion.batchSize,
        concurrency: config.ingestion.fileConcurrency,
      },
      sources
    );

    for (const summary of summaries) {
      printSummary(summary);
    }

    const incomplete = summaries.filter(
      (summary) => summary.status === 'aborted' || summary.failed.length > 0
    );
    if (incomplete.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await services.db.destroy();
  }
}

main().catch((error: unknown) => {
  console.error('Ingestion failed:', error);
  process.exit(1);
});
