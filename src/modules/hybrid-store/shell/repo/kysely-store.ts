/**
 * Hybrid Store Repository Implementation
 *
 * Kysely over pg with the pgvector extension. Each operation is its own
 * transaction with `SET LOCAL statement_timeout` bounded by the remaining
 * request budget. Upserts use ON CONFLICT DO UPDATE, so concurrent writers of
 * one identity serialize on the row lock and the later commit wins.
 */

import { sql } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import { runWithReconnect } from './pg-errors.js';
import {
  mapOpexRow,
  OPEX_SELECT,
  toAggregateValue,
  toAttributeBag,
  toColumnValue,
} from './row-mapping.js';
import { compileQuery, filterCondition } from './sql-compiler.js';
import { raceDeadline } from '../../../../common/deadline.js';
import { createTimeoutError } from '../../../../common/types/errors.js';
import { withStatementTimeout } from '../../../../infra/database/query-builders/timeout.js';
import { TABLE_NAMES } from '../../../labels/index.js';
import {
  createInvalidQueryError,
  isStoreAbortError,
  type StoreError,
} from '../../core/errors.js';
import {
  ATTRIBUTES_COLUMN,
  outputColumns,
  resolveFilters,
  resolveQuery,
} from '../../core/resolve-query.js';
import { identityOf } from '../../core/rows.js';
import { SIMILARITY_CANDIDATE_FACTOR } from '../../core/types.js';
import { isZeroVector, toVectorLiteral } from '../../core/vector.js';

import type { HybridStore, UpsertFailure, UpsertReport } from '../../core/ports.js';
import type {
  Filter,
  PurgeInput,
  QuerySpec,
  ResolvedQuery,
  ResultRow,
  ResultSet,
  ResultValue,
  SimilarityHit,
  StorableRecord,
  StoreCallOptions,
  StoreHealth,
} from '../../core/types.js';
import type { FinancialRecord } from '../../../../common/types/records.js';
import type { FiraDatabase, FiraDbClient } from '../../../../infra/database/client.js';
import type { LabelCatalog, TableName } from '../../../labels/index.js';
import type { Kysely } from 'kysely';
import type { Logger } from 'pino';

type Transaction = Kysely<FiraDatabase>;

/**
 * Options for creating the hybrid store repository.
 */
export interface HybridStoreRepoOptions {
  db: FiraDbClient;
  catalog: LabelCatalog;
  logger: Logger;
  /** Upper bound for any single statement */
  queryTimeoutMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyHybridStore implements HybridStore {
  private readonly db: FiraDbClient;
  private readonly catalog: LabelCatalog;
  private readonly log: Logger;
  private readonly queryTimeoutMs: number;

  constructor(options: HybridStoreRepoOptions) {
    this.db = options.db;
    this.catalog = options.catalog;
    this.log = options.logger.child({ repo: 'HybridStore' });
    this.queryTimeoutMs = options.queryTimeoutMs;
  }

  /**
   * Runs one logical operation in its own transaction, with the reconnect
   * policy and the request deadline applied.
   */
  private async run<T>(
    operation: string,
    options: StoreCallOptions | undefined,
    work: (trx: Transaction) => Promise<T>
  ): Promise<Result<T, StoreError>> {
    const deadline = options?.deadline;
    if (deadline?.isExpired() === true) {
      return err(createTimeoutError(operation));
    }

    const attempt = (): Promise<T> => {
      const budget =
        deadline === undefined
          ? this.queryTimeoutMs
          : Math.min(this.queryTimeoutMs, deadline.remainingMs());
      return withStatementTimeout(this.db, budget, work);
    };

    const outcome = runWithReconnect(operation, this.log, attempt);
    if (deadline === undefined) {
      return outcome;
    }

    // Pool acquisition is not covered by statement_timeout
    const raced = await raceDeadline(outcome, deadline, operation);
    return raced.isErr() ? err(raced.error) : raced.value;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Writes
  // ───────────────────────────────────────────────────────────────────────────

  private async write(trx: Transaction, item: StorableRecord): Promise<void> {
    switch (item.kind) {
      case 'opex': {
        const { record } = item;
        await trx
          .insertInto('opex_data_hybrid')
          .values({
            uuid: record.uuid,
            source_file: record.sourceFile,
            source_sheet: record.sourceSheet,
            data_type: record.dataType,
            fiscal_year: record.fiscalYear,
            project_number: record.projectNumber,
            dept_lead: record.deptLead,
            hw_sw: record.hwSw,
            planned_cost: record.plannedCost,
            actual_cost: record.actualCost,
            additional_data: JSON.stringify(record.attributes),
            vector: toVectorLiteral(item.embedding),
          })
          .onConflict((oc) =>
            oc.column('uuid').doUpdateSet((eb) => ({
              source_file: eb.ref('excluded.source_file'),
              source_sheet: eb.ref('excluded.source_sheet'),
              data_type: eb.ref('excluded.data_type'),
              fiscal_year: eb.ref('excluded.fiscal_year'),
              project_number: eb.ref('excluded.project_number'),
              dept_lead: eb.ref('excluded.dept_lead'),
              hw_sw: eb.ref('excluded.hw_sw'),
              planned_cost: eb.ref('excluded.planned_cost'),
              actual_cost: eb.ref('excluded.actual_cost'),
              additional_data: eb.ref('excluded.additional_data'),
              vector: eb.ref('excluded.vector'),
              updated_at: sql<Date>`now()`,
            }))
          )
          .execute();
        return;
      }
      case 'demand':
        await trx
          .insertInto('bpafg_demand')
          .values({
            record_key: item.recordKey,
            resource_name: item.resourceName,
            project_name: item.projectName,
            task_name: item.taskName,
            homegroup: item.homegroup,
            resource_security_group: item.resourceSecurityGroup,
            primary_bl: item.primaryBl,
            dept_country: item.deptCountry,
            demand_type: item.demandType,
            month: item.month,
            value: item.value,
            source_file: item.sourceFile,
          })
          .onConflict((oc) =>
            oc.column('record_key').doUpdateSet((eb) => ({
              resource_name: eb.ref('excluded.resource_name'),
              project_name: eb.ref('excluded.project_name'),
              task_name: eb.ref('excluded.task_name'),
              homegroup: eb.ref('excluded.homegroup'),
              resource_security_group: eb.ref('excluded.resource_security_group'),
              primary_bl: eb.ref('excluded.primary_bl'),
              dept_country: eb.ref('excluded.dept_country'),
              demand_type: eb.ref('excluded.demand_type'),
              month: eb.ref('excluded.month'),
              value: eb.ref('excluded.value'),
              source_file: eb.ref('excluded.source_file'),
              updated_at: sql<Date>`now()`,
            }))
          )
          .execute();
        return;
      case 'priority':
        await trx
          .insertInto('priority_template')
          .values({
            record_key: item.recordKey,
            project: item.project,
            priority: item.priority,
            country: item.country,
            target_capacity: item.targetCapacity,
            country_cost: item.countryCost,
            month: item.month,
            monthly_capacity: item.monthlyCapacity,
            source_file: item.sourceFile,
          })
          .onConflict((oc) =>
            oc.column('record_key').doUpdateSet((eb) => ({
              project: eb.ref('excluded.project'),
              priority: eb.ref('excluded.priority'),
              country: eb.ref('excluded.country'),
              target_capacity: eb.ref('excluded.target_capacity'),
              country_cost: eb.ref('excluded.country_cost'),
              month: eb.ref('excluded.month'),
              monthly_capacity: eb.ref('excluded.monthly_capacity'),
              source_file: eb.ref('excluded.source_file'),
              updated_at: sql<Date>`now()`,
            }))
          )
          .execute();
        return;
    }
  }

  async upsert(
    record: StorableRecord,
    options?: StoreCallOptions
  ): Promise<Result<string, StoreError>> {
    const identity = identityOf(record);
    const result = await this.run('upsert', options, (trx) => this.write(trx, record));
    if (result.isErr()) {
      this.log.error({ err: result.error, identity, kind: record.kind }, 'Upsert failed');
      return err(result.error);
    }
    return ok(identity);
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

  // ───────────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────────

  async query(spec: QuerySpec, options?: StoreCallOptions): Promise<Result<ResultSet, StoreError>> {
    const resolved = resolveQuery(this.catalog, spec);
    if (resolved.isErr()) {
      this.log.debug({ err: resolved.error, table: spec.table }, 'Query rejected');
      return err(resolved.error);
    }
    const query = resolved.value;

    const rows = await this.run('query', options, async (trx) => {
      const result = await compileQuery(query, query.limit + 1).execute(trx);
      return result.rows;
    });
    if (rows.isErr()) {
      this.log.error({ err: rows.error, table: spec.table }, 'Query failed');
      return err(rows.error);
    }

    return ok({
      table: query.table,
      columns: outputColumns(query),
      rows: rows.value.slice(0, query.limit).map((row) => convertRow(query, row)),
      truncated: rows.value.length > query.limit,
    });
  }

  async similaritySearch(
    vector: readonly number[],
    k: number,
    filters: readonly Filter[] = [],
    options?: StoreCallOptions
  ): Promise<Result<SimilarityHit[], StoreError>> {
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
    const literal = toVectorLiteral(vector);

    const rows = await this.run('similaritySearch', options, async (trx) => {
      const distance = sql<number>`vector <=> ${literal}::vector`;
      let candidates = trx
        .selectFrom('opex_data_hybrid')
        .select([...OPEX_SELECT, distance.as('distance')])
        .orderBy(distance)
        .orderBy(sql`uuid collate "C"`)
        .limit(k * SIMILARITY_CANDIDATE_FACTOR);
      for (const filter of resolved.value) {
        candidates = candidates.where(filterCondition(filter));
      }

      return trx
        .selectFrom(candidates.as('candidates'))
        .selectAll()
        .orderBy('distance')
        .orderBy(sql`uuid collate "C"`)
        .limit(k)
        .execute();
    });
    if (rows.isErr()) {
      this.log.error({ err: rows.error, k }, 'Similarity search failed');
      return err(rows.error);
    }

    return ok(rows.value.map((row) => ({ record: mapOpexRow(row), distance: Number(row.distance) })));
  }

  async getFinancialRecord(
    uuid: string,
    options?: StoreCallOptions
  ): Promise<Result<FinancialRecord | null, StoreError>> {
    const row = await this.run('getFinancialRecord', options, (trx) =>
      trx.selectFrom('opex_data_hybrid').select(OPEX_SELECT).where('uuid', '=', uuid).executeTakeFirst()
    );
    if (row.isErr()) {
      this.log.error({ err: row.error, uuid }, 'Failed to load financial record');
      return err(row.error);
    }
    return ok(row.value === undefined ? null : mapOpexRow(row.value));
  }

  async health(options?: StoreCallOptions): Promise<Result<StoreHealth, StoreError>> {
    const startTime = Date.now();
    const counts = await this.run('health', options, async (trx) => {
      const tables: Partial<Record<TableName, number>> = {};
      for (const table of TABLE_NAMES) {
        const result = await sql<{ count: string }>`select count(*) as count from ${sql.table(table)}`.execute(trx);
        tables[table] = Number(result.rows[0]?.count ?? 0);
      }
      return tables;
    });
    if (counts.isErr()) {
      return err(counts.error);
    }

    const { opex_data_hybrid = 0, bpafg_demand = 0, priority_template = 0 } = counts.value;
    return ok({
      tables: { opex_data_hybrid, bpafg_demand, priority_template },
      latencyMs: Date.now() - startTime,
    });
  }

  async purge(input: PurgeInput, options?: StoreCallOptions): Promise<Result<number, StoreError>> {
    const where =
      input.sourceFile === undefined ? sql`` : sql` where source_file = ${input.sourceFile}`;
    const result = await this.run('purge', options, (trx) =>
      sql`delete from ${sql.table(input.table)}${where}`.execute(trx)
    );
    if (result.isErr()) {
      this.log.error({ err: result.error, table: input.table }, 'Purge failed');
      return err(result.error);
    }

    const deleted = Number(result.value.numAffectedRows ?? 0n);
    this.log.info({ table: input.table, sourceFile: input.sourceFile, deleted }, 'Purged rows');
    return ok(deleted);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Result Conversion
// ─────────────────────────────────────────────────────────────────────────────

const convertRow = (query: ResolvedQuery, row: Record<string, unknown>): ResultRow => {
  const output: Record<string, ResultValue> = {};
  if (query.mode === 'rows') {
    for (const column of query.select) {
      output[column.alias] = toColumnValue(column.ref.type, row[column.alias]);
    }
    if (query.includeAttributes) {
      output[ATTRIBUTES_COLUMN] = toAttributeBag(row[ATTRIBUTES_COLUMN]);
    }
    return output;
  }
  for (const column of query.groupBy) {
    output[column.alias] = toColumnValue(column.ref.type, row[column.alias]);
  }
  for (const aggregate of query.aggregates) {
    output[aggregate.alias] = toAggregateValue(aggregate, row[aggregate.alias]);
  }
  return output;
};

/**
 * Create a Postgres-backed hybrid store.
 */
export const makeHybridStoreRepo = (options: HybridStoreRepoOptions): HybridStore => {
  return new KyselyHybridStore(options);
};
