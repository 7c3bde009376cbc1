/**
 * Ingestion pipeline: normalize → embed (OpEx only) → upsert.
 *
 * Rows of one file are upserted sequentially in file order, so identity
 * collisions inside a file resolve to the later row. An embedding failure or
 * a store outage stops the file; the batch in flight is reported as failed and
 * later rows are not attempted. Independent files may run concurrently (see
 * `ingestFiles`).
 */

import pLimit from 'p-limit';

import { normalizeSource, type NormalizeSourceDeps } from './normalize-source.js';
import { describeParseError } from '../errors.js';
import { renderEmbeddingText } from '../render.js';

import type {
  FailedRecord,
  IngestionSummary,
  NormalizedSource,
  RowOutcome,
  RowWarning,
  SourceFile,
} from '../types.js';
import type {
  DemandRecord,
  FinancialRecord,
  PriorityRecord,
} from '../../../../common/types/records.js';
import type { EmbeddingGateway } from '../../../embeddings/index.js';
import type { HybridStore, StorableRecord } from '../../../hybrid-store/index.js';
import type { Logger } from 'pino';

export interface IngestFileDeps extends NormalizeSourceDeps {
  embeddings: EmbeddingGateway;
  store: HybridStore;
  logger: Logger;
  /** Records per embedding call and upsert batch */
  batchSize: number;
}

interface PreparedBatch {
  readonly storable: StorableRecord[];
  readonly failed: FailedRecord[];
  /** Set when the file cannot continue */
  readonly aborted?: { type: string; message: string };
}

type PrepareBatch<R> = (batch: readonly R[]) => Promise<PreparedBatch>;

interface PipelineState {
  succeeded: number;
  readonly failed: FailedRecord[];
  readonly warnings: RowWarning[];
  aborted?: { type: string; message: string };
}

const embedBatch =
  (deps: IngestFileDeps, log: Logger): PrepareBatch<FinancialRecord> =>
  async (batch) => {
    const vectors = await deps.embeddings.embedBatch(batch.map(renderEmbeddingText));
    if (vectors.isErr()) {
      log.error(
        { err: vectors.error, identities: batch.map((record) => record.uuid) },
        'Embedding failed, aborting file'
      );
      return {
        storable: [],
        failed: batch.map((record) => ({
          ref: record.uuid,
          reason: `Embedding failed: ${vectors.error.message}`,
        })),
        aborted: { type: vectors.error.type, message: vectors.error.message },
      };
    }

    const storable: StorableRecord[] = [];
    const failed: FailedRecord[] = [];
    batch.forEach((record, index) => {
      const embedding = vectors.value[index];
      if (embedding === undefined) {
        failed.push({ ref: record.uuid, reason: 'Embedding missing from provider response' });
      } else {
        storable.push({ kind: 'opex', record, embedding });
      }
    });
    return { storable, failed };
  };

const passThrough = async (
  batch: readonly (DemandRecord | PriorityRecord)[]
): Promise<PreparedBatch> => ({ storable: [...batch], failed: [] });

async function runPipeline<R extends FinancialRecord | DemandRecord | PriorityRecord>(
  deps: IngestFileDeps,
  log: Logger,
  outcomes: Iterable<RowOutcome<R>>,
  prepare: PrepareBatch<R>
): Promise<PipelineState> {
  const state: PipelineState = { succeeded: 0, failed: [], warnings: [] };
  let batch: R[] = [];

  const flush = async (): Promise<void> => {
    if (batch.length === 0) {
      return;
    }
    const current = batch;
    batch = [];

    const prepared = await prepare(current);
    state.failed.push(...prepared.failed);
    if (prepared.aborted !== undefined) {
      state.aborted = prepared.aborted;
      return;
    }
    if (prepared.storable.length === 0) {
      return;
    }

    const report = await deps.store.upsertBatch(prepared.storable);
    state.succeeded += report.succeeded.length;
    for (const failure of report.failed) {
      state.failed.push({ ref: failure.identity, reason: failure.error.message });
    }
    if (report.aborted !== undefined) {
      log.error(
        { err: report.aborted, identities: report.failed.map((failure) => failure.identity) },
        'Store unavailable, aborting file'
      );
      state.aborted = { type: report.aborted.type, message: report.aborted.message };
      return;
    }
    for (const failure of report.failed) {
      log.warn({ identity: failure.identity, err: failure.error }, 'Record upsert failed');
    }
  };

  for (const outcome of outcomes) {
    if (outcome.kind === 'warning') {
      state.warnings.push(outcome.warning);
      continue;
    }
    batch.push(outcome.record);
    if (batch.length >= deps.batchSize) {
      await flush();
      if (state.aborted !== undefined) {
        return state;
      }
    }
  }
  await flush();

  return state;
}

const runForSource = (
  deps: IngestFileDeps,
  log: Logger,
  source: NormalizedSource
): Promise<PipelineState> => {
  switch (source.category) {
    case 'opex':
      return runPipeline(deps, log, source.outcomes, embedBatch(deps, log));
    case 'demand':
      return runPipeline(deps, log, source.outcomes, passThrough);
    case 'priority':
      return runPipeline(deps, log, source.outcomes, passThrough);
  }
};

/**
 * Ingests one file and reports what happened to every row. Never rejects:
 * structural problems, embedding failures and store outages are reported as
 * an aborted summary.
 */
export async function ingestFile(deps: IngestFileDeps, source: SourceFile): Promise<IngestionSummary> {
  const log = deps.logger.child({ component: 'ingestion', file: source.filename });

  const normalized = normalizeSource(deps, source);
  if (normalized.isErr()) {
    const message = describeParseError(normalized.error);
    log.warn({ error: normalized.error.message, sheet: normalized.error.sheet }, 'File rejected');
    return {
      file: source.filename,
      category: null,
      status: 'aborted',
      succeeded: 0,
      failed: [],
      warnings: [],
      error: { type: normalized.error.type, message },
    };
  }

  const { value } = normalized;
  log.info({ category: value.category }, 'Ingesting file');

  const state = await runForSource(deps, log, value);

  const summary: IngestionSummary = {
    file: source.filename,
    category: value.category,
    status: state.aborted === undefined ? 'completed' : 'aborted',
    succeeded: state.succeeded,
    failed: state.failed,
    warnings: state.warnings,
    ...(state.aborted !== undefined && { error: state.aborted }),
  };

  log.info(
    {
      status: summary.status,
      succeeded: summary.succeeded,
      failed: summary.failed.length,
      warnings: summary.warnings.length,
    },
    'File ingested'
  );

  return summary;
}

export interface IngestFilesDeps extends IngestFileDeps {
  /** Files processed at the same time */
  concurrency: number;
}

/**
 * Ingests independent files concurrently; summaries follow input order.
 */
export async function ingestFiles(
  deps: IngestFilesDeps,
  sources: readonly SourceFile[]
): Promise<IngestionSummary[]> {
  const limit = pLimit(deps.concurrency);
  return Promise.all(sources.map((source) => limit(() => ingestFile(deps, source))));
}
