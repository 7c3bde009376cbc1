/**
 * Hybrid Store Module - Ports
 */

import type { StoreAbortError, StoreError } from './errors.js';
import type {
  Filter,
  PurgeInput,
  QuerySpec,
  ResultSet,
  SimilarityHit,
  StorableRecord,
  StoreCallOptions,
  StoreHealth,
} from './types.js';
import type { FinancialRecord } from '../../../common/types/records.js';
import type { Result } from 'neverthrow';

export interface UpsertFailure {
  readonly identity: string;
  readonly error: StoreError;
}

/**
 * Outcome of a batch upsert. Every record is its own transaction: records in
 * `succeeded` are committed, records in `failed` left their prior state intact.
 */
export interface UpsertReport {
  readonly succeeded: readonly string[];
  readonly failed: readonly UpsertFailure[];
  /**
   * Set when the store became unreachable (or the budget ran out) mid-batch.
   * The failing record and every record after it are listed in `failed`.
   */
  readonly aborted?: StoreAbortError;
}

/**
 * Relational + vector persistence for the three analytics tables.
 */
export interface HybridStore {
  /** Inserts or wholly replaces the record with the same identity */
  upsert(record: StorableRecord, options?: StoreCallOptions): Promise<Result<string, StoreError>>;

  /** Applies records in order, one transaction each */
  upsertBatch(records: readonly StorableRecord[], options?: StoreCallOptions): Promise<UpsertReport>;

  query(spec: QuerySpec, options?: StoreCallOptions): Promise<Result<ResultSet, StoreError>>;

  /**
   * k nearest OpEx records by cosine distance, after applying `filters`.
   * Equal distances are ordered by identity.
   */
  similaritySearch(
    vector: readonly number[],
    k: number,
    filters?: readonly Filter[],
    options?: StoreCallOptions
  ): Promise<Result<SimilarityHit[], StoreError>>;

  getFinancialRecord(
    uuid: string,
    options?: StoreCallOptions
  ): Promise<Result<FinancialRecord | null, StoreError>>;

  /** Connectivity check with row counts per table; read only */
  health(options?: StoreCallOptions): Promise<Result<StoreHealth, StoreError>>;

  /** Administrative delete; returns the number of rows removed */
  purge(input: PurgeInput, options?: StoreCallOptions): Promise<Result<number, StoreError>>;
}
