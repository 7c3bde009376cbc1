/**
 * In-memory hybrid store
 *
 * Same port and the same query semantics as the Postgres repository, with
 * exact (not approximate) nearest-neighbour search. Used for local runs
 * without a database and in tests.
 */

import { err, ok, type Result } from 'neverthrow';

import { createTimeoutError } from '../../../../common/types/errors.js';
import { TABLE_NAMES } from '../../../labels/index.js';
import {
  createInvalidQueryError,
  createQueryExecutionError,
  isStoreAbortError,
  type StoreError,
} from '../../core/errors.js';
import { evaluateQuery, matchesFilters } from '../../core/evaluate.js';
import { resolveFilters, resolveQuery } from '../../core/resolve-query.js';
import { identityOf, toStoredRow, type StoredRow } from '../../core/rows.js';
import { cosineDistance, isZeroVector } from '../../core/vector.js';

import type { HybridStore, UpsertFailure, UpsertReport } from '../../core/ports.js';
import type {
  Filter,
  PurgeInput,
  QuerySpec,
  ResultSet,
  SimilarityHit,
  StorableRecord,
  StoreCallOptions,
  StoreHealth,
} from '../../core/types.js';
import type { FinancialRecord } from '../../../../common/types/records.js';
import type { LabelCatalog, TableName } from '../../../labels/index.js';

export interface InMemoryHybridStoreOptions {
  catalog: LabelCatalog;
  /** Rejects embeddings of any other length, like a vector(n) column */
  dimensions?: number;
}

interface Entry {
  readonly row: StoredRow;
  readonly record: StorableRecord;
}

const compareIdentity = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

class InMemoryHybridStore implements HybridStore {
  private readonly catalog: LabelCatalog;
  private readonly dimensions: number | undefined;
  private readonly tables = new Map<TableName, Map<string, Entry>>(
    TABLE_NAMES.map((table) => [table, new Map<string, Entry>()])
  );

  constructor(options: InMemoryHybridStoreOptions) {
    this.catalog = options.catalog;
    this.dimensions = options.dimensions;
  }

  private table(name: TableName): Map<string, Entry> {
    let table = this.tables.get(name);
    if (table === undefined) {
      table = new Map();
      this.tables.set(name, table);
    }
    return table;
  }

  private *allRows(): Generator<StoredRow> {
    for (const table of this.tables.values()) {
      for (const entry of table.values()) {
        yield entry.row;
      }
    }
  }

  private expired(operation: string, options?: StoreCallOptions): Result<void, StoreError> {
    return options?.deadline?.isExpired() === true ? err(createTimeoutError(operation)) : ok(undefined);
  }

  async upsert(
    record: StorableRecord,
    options?: StoreCallOptions
  ): Promise<Result<string, StoreError>> {
    const guard = this.expired('upsert', options);
    if (guard.isErr()) {
      return err(guard.error);
    }

    if (
      record.kind === 'opex' &&
      this.dimensions !== undefined &&
      record.embedding.length !== this.dimensions
    ) {
      return err(
        createQueryExecutionError(
          'upsert',
          `expected ${String(this.dimensions)} dimensions, not ${String(record.embedding.length)}`,
          '22000'
        )
      );
    }

    const row = toStoredRow(record);
    this.table(row.table).set(row.identity, { row, record });
    return ok(row.identity);
  }

  async upsertBatch(
    records: readonly StorableRecord[],
    options?: StoreCallOptions
  ): Promise<UpsertReport> {
    const succeeded: string[] = [];
    const failed: UpsertFailure[] = [];

    for (const [index, record] of records.entries()) {
      const result = await this.upsert(record, options);
      if (result.isOk()) {
        succeeded.push(result.value);
        continue;
      }
      const error = result.error;
      if (isStoreAbortError(error)) {
        for (const remaining of records.slice(index)) {
          failed.push({ identity: identityOf(remaining), error });
        }
        return { succeeded, failed, aborted: error };
      }
      failed.push({ identity: identityOf(record), error });
    }

    return { succeeded, failed };
  }

  async query(spec: QuerySpec, options?: StoreCallOptions): Promise<Result<ResultSet, StoreError>> {
    const guard = this.expired('query', options);
    if (guard.isErr()) {
      return err(guard.error);
    }
    return resolveQuery(this.catalog, spec).map((query) => evaluateQuery(this.allRows(), query));
  }

  async similaritySearch(
    vector: readonly number[],
    k: number,
    filters: readonly Filter[] = [],
    options?: StoreCallOptions
  ): Promise<Result<SimilarityHit[], StoreError>> {
    const guard = this.expired('similaritySearch', options);
    if (guard.isErr()) {
      return err(guard.error);
    }
    if (!Number.isInteger(k) || k < 1) {
      return err(createInvalidQueryError(`k must be a positive integer, got ${String(k)}`));
    }
    if (isZeroVector(vector)) {
      return err(createInvalidQueryError('Query vector has zero magnitude'));
    }
    const resolved = resolveFilters(this.catalog, 'opex_data_hybrid', filters);
    if (resolved.isErr()) {
      return err(resolved.error);
    }

    const hits: SimilarityHit[] = [];
    for (const entry of this.table('opex_data_hybrid').values()) {
      if (entry.record.kind !== 'opex' || !matchesFilters(entry.row, resolved.value)) {
        continue;
      }
      if (entry.record.embedding.length !== vector.length) {
        return err(
          createQueryExecutionError(
            'similaritySearch',
            `different vector dimensions ${String(entry.record.embedding.length)} and ${String(vector.length)}`,
            '22000'
          )
        );
      }
      hits.push({
        record: entry.record.record,
        distance: cosineDistance(entry.record.embedding, vector),
      });
    }

    hits.sort(
      (a, b) => a.distance - b.distance || compareIdentity(a.record.uuid, b.record.uuid)
    );
    return ok(hits.slice(0, k));
  }

  async getFinancialRecord(
    uuid: string,
    options?: StoreCallOptions
  ): Promise<Result<FinancialRecord | null, StoreError>> {
    const guard = this.expired('getFinancialRecord', options);
    if (guard.isErr()) {
      return err(guard.error);
    }
    const entry = this.table('opex_data_hybrid').get(uuid);
    return ok(entry?.record.kind === 'opex' ? entry.record.record : null);
  }

  async health(options?: StoreCallOptions): Promise<Result<StoreHealth, StoreError>> {
    const guard = this.expired('health', options);
    if (guard.isErr()) {
      return err(guard.error);
    }
    return ok({
      tables: {
        opex_data_hybrid: this.table('opex_data_hybrid').size,
        bpafg_demand: this.table('bpafg_demand').size,
        priority_template: this.table('priority_template').size,
      },
      latencyMs: 0,
    });
  }

  async purge(input: PurgeInput, options?: StoreCallOptions): Promise<Result<number, StoreError>> {
    const guard = this.expired('purge', options);
    if (guard.isErr()) {
      return err(guard.error);
    }
    const table = this.table(input.table);
    let deleted = 0;
    for (const [identity, entry] of table) {
      if (input.sourceFile === undefined || entry.row.columns['source_file'] === input.sourceFile) {
        table.delete(identity);
        deleted++;
      }
    }
    return ok(deleted);
  }
}

/**
 * Create an in-memory hybrid store.
 */
export const makeInMemoryHybridStore = (options: InMemoryHybridStoreOptions): HybridStore => {
  return new InMemoryHybridStore(options);
};
