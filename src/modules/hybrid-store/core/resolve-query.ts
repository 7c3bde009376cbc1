/**
 * Query resolution
 *
 * Checks every name in a QuerySpec against the label catalog and turns it into
 * a ResolvedQuery both store implementations execute. Unknown names fail with
 * SchemaError naming the column; nothing is silently dropped.
 */

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidQueryError,
  createSchemaError,
  type InvalidQueryError,
  type QueryError,
  type SchemaError,
} from './errors.js';
import {
  DEFAULT_QUERY_LIMIT,
  QuerySpecSchema,
  type ColumnRef,
  type Filter,
  type FilterScalar,
  type OutputColumn,
  type QuerySpec,
  type ResolvedAggregate,
  type ResolvedFilter,
  type ResolvedQuery,
  type SortKey,
} from './types.js';
import { ATTRIBUTE_PREFIX, findAttribute, findColumn } from '../../labels/index.js';

import type { ColumnType, LabelCatalog, TableName } from '../../labels/index.js';

const ATTRIBUTE_KEY_PATTERN = /^[a-z0-9_]+$/;

/** Output column carrying the whole OpEx attribute bag */
export const ATTRIBUTES_COLUMN = 'attributes';

/**
 * Default ordering per table; the last entry is always the identity column.
 */
export const DEFAULT_ORDER: Readonly<Record<TableName, readonly string[]>> = {
  opex_data_hybrid: ['uuid'],
  bpafg_demand: ['record_key'],
  priority_template: ['priority', 'project', 'country', 'month', 'record_key'],
};

export const isNumericType = (type: ColumnType): boolean =>
  type === 'integer' || type === 'bigint' || type === 'numeric';

export const refName = (ref: ColumnRef): string =>
  ref.kind === 'column' ? ref.name : `${ATTRIBUTE_PREFIX}${ref.key}`;

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates an untrusted document (model output, request body) as a QuerySpec.
 */
export const validateQuerySpec = (input: unknown): Result<QuerySpec, InvalidQueryError> => {
  if (Value.Check(QuerySpecSchema, input)) {
    return ok(input);
  }
  const details = [...Value.Errors(QuerySpecSchema, input)]
    .slice(0, 5)
    .map((error) => `${error.path === '' ? '/' : error.path}: ${error.message}`);
  return err(createInvalidQueryError(`Invalid query: ${details.join('; ')}`));
};

// ─────────────────────────────────────────────────────────────────────────────
// Names and Values
// ─────────────────────────────────────────────────────────────────────────────

export const resolveColumnRef = (
  catalog: LabelCatalog,
  table: TableName,
  name: string
): Result<ColumnRef, SchemaError> => {
  if (name.startsWith(ATTRIBUTE_PREFIX)) {
    const key = name.slice(ATTRIBUTE_PREFIX.length);
    if (table !== 'opex_data_hybrid' || !ATTRIBUTE_KEY_PATTERN.test(key)) {
      return err(createSchemaError(table, name));
    }
    const declared = findAttribute(catalog, table, key);
    return ok({ kind: 'attribute', key, type: declared?.type ?? 'text' });
  }

  const column = findColumn(catalog, table, name);
  if (column === undefined) {
    return err(createSchemaError(table, name));
  }
  return ok({ kind: 'column', name: column.name, type: column.type });
};

/**
 * Coerces a filter value to the column's declared type so that both store
 * implementations compare like with like.
 */
export const coerceFilterValue = (
  ref: ColumnRef,
  value: FilterScalar
): Result<FilterScalar, InvalidQueryError> => {
  if (!isNumericType(ref.type)) {
    return ok(String(value));
  }
  if (typeof value === 'number') {
    return Number.isFinite(value)
      ? ok(value)
      : err(createInvalidQueryError(`Non-finite value for column '${refName(ref)}'`));
  }
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    return err(
      createInvalidQueryError(
        `Value '${String(value)}' is not valid for ${ref.type} column '${refName(ref)}'`
      )
    );
  }
  return ok(parsed);
};

const resolveFilter = (
  catalog: LabelCatalog,
  table: TableName,
  filter: Filter
): Result<ResolvedFilter, QueryError> =>
  resolveColumnRef(catalog, table, filter.column).andThen<ResolvedFilter, QueryError>((ref) => {
    switch (filter.op) {
      case 'eq':
      case 'neq':
      case 'gt':
      case 'gte':
      case 'lt':
      case 'lte': {
        const { op } = filter;
        return coerceFilterValue(ref, filter.value).map((value) => ({ ref, op, value }));
      }
      case 'in': {
        const values: FilterScalar[] = [];
        for (const raw of filter.values) {
          const coerced = coerceFilterValue(ref, raw);
          if (coerced.isErr()) {
            return err(coerced.error);
          }
          values.push(coerced.value);
        }
        return ok({ ref, op: 'in', values });
      }
      case 'between': {
        const from = coerceFilterValue(ref, filter.from);
        const to = coerceFilterValue(ref, filter.to);
        if (from.isErr()) {
          return err(from.error);
        }
        if (to.isErr()) {
          return err(to.error);
        }
        return ok({ ref, op: 'between', from: from.value, to: to.value });
      }
      case 'contains':
        return ok({ ref, op: 'contains', value: filter.value });
      case 'is_null':
        return ok({ ref, op: 'is_null', value: filter.value ?? true });
    }
  });

export const resolveFilters = (
  catalog: LabelCatalog,
  table: TableName,
  filters: readonly Filter[]
): Result<ResolvedFilter[], QueryError> => {
  const resolved: ResolvedFilter[] = [];
  for (const filter of filters) {
    const result = resolveFilter(catalog, table, filter);
    if (result.isErr()) {
      return err(result.error);
    }
    resolved.push(result.value);
  }
  return ok(resolved);
};

const resolveOutputColumns = (
  catalog: LabelCatalog,
  table: TableName,
  names: readonly string[]
): Result<OutputColumn[], QueryError> => {
  const columns: OutputColumn[] = [];
  for (const name of names) {
    const ref = resolveColumnRef(catalog, table, name);
    if (ref.isErr()) {
      return err(ref.error);
    }
    if (columns.some((column) => column.alias === name)) {
      return err(createInvalidQueryError(`Column '${name}' is listed twice`));
    }
    columns.push({ ref: ref.value, alias: name });
  }
  return ok(columns);
};

const defaultSortKeys = (
  catalog: LabelCatalog,
  table: TableName,
  taken: ReadonlySet<string>
): SortKey[] =>
  DEFAULT_ORDER[table]
    .filter((name) => !taken.has(name))
    .flatMap((name) => {
      const column = findColumn(catalog, table, name);
      return column === undefined
        ? []
        : [
            {
              kind: 'ref' as const,
              ref: { kind: 'column' as const, name: column.name, type: column.type },
              direction: 'asc' as const,
            },
          ];
    });

// ─────────────────────────────────────────────────────────────────────────────
// Query Resolution
// ─────────────────────────────────────────────────────────────────────────────

const resolveRowsQuery = (
  catalog: LabelCatalog,
  spec: QuerySpec,
  filters: ResolvedFilter[]
): Result<ResolvedQuery, QueryError> => {
  const { table } = spec;
  const requested = spec.select ?? catalog.tables[table].columns.map((column) => column.name);
  const wantsAttributes =
    table === 'opex_data_hybrid' &&
    (spec.select === undefined || spec.select.includes(ATTRIBUTES_COLUMN));

  const select = resolveOutputColumns(
    catalog,
    table,
    requested.filter((name) => !(wantsAttributes && name === ATTRIBUTES_COLUMN))
  );
  if (select.isErr()) {
    return err(select.error);
  }

  const orderBy: SortKey[] = [];
  const taken = new Set<string>();
  for (const order of spec.orderBy ?? []) {
    const ref = resolveColumnRef(catalog, table, order.column);
    if (ref.isErr()) {
      return err(ref.error);
    }
    orderBy.push({ kind: 'ref', ref: ref.value, direction: order.direction ?? 'asc' });
    taken.add(order.column);
  }
  orderBy.push(...defaultSortKeys(catalog, table, taken));

  return ok({
    mode: 'rows',
    table,
    select: select.value,
    includeAttributes: wantsAttributes,
    filters,
    orderBy,
    limit: spec.limit ?? DEFAULT_QUERY_LIMIT,
  });
};

const resolveAggregateQuery = (
  catalog: LabelCatalog,
  spec: QuerySpec,
  filters: ResolvedFilter[]
): Result<ResolvedQuery, QueryError> => {
  const { table } = spec;

  const groupBy = resolveOutputColumns(catalog, table, spec.groupBy ?? []);
  if (groupBy.isErr()) {
    return err(groupBy.error);
  }
  const groupNames = new Set(groupBy.value.map((column) => column.alias));

  const aggregates: ResolvedAggregate[] = [];
  for (const aggregate of spec.aggregates ?? []) {
    if (groupNames.has(aggregate.alias) || aggregates.some((a) => a.alias === aggregate.alias)) {
      return err(createInvalidQueryError(`Output name '${aggregate.alias}' is used twice`));
    }
    if (aggregate.column === undefined) {
      if (aggregate.fn !== 'count') {
        return err(createInvalidQueryError(`${aggregate.fn} requires a column`));
      }
      aggregates.push({ fn: 'count', ref: null, alias: aggregate.alias });
      continue;
    }
    const ref = resolveColumnRef(catalog, table, aggregate.column);
    if (ref.isErr()) {
      return err(ref.error);
    }
    if ((aggregate.fn === 'sum' || aggregate.fn === 'avg') && !isNumericType(ref.value.type)) {
      return err(
        createInvalidQueryError(`${aggregate.fn} requires a numeric column, got '${aggregate.column}'`)
      );
    }
    aggregates.push({ fn: aggregate.fn, ref: ref.value, alias: aggregate.alias });
  }
  const aggregateNames = new Set(aggregates.map((aggregate) => aggregate.alias));

  for (const name of spec.select ?? []) {
    if (!groupNames.has(name) && !aggregateNames.has(name)) {
      const ref = resolveColumnRef(catalog, table, name);
      if (ref.isErr()) {
        return err(ref.error);
      }
      return err(
        createInvalidQueryError(`Column '${name}' must appear in groupBy or be an aggregate alias`)
      );
    }
  }

  const orderBy: SortKey[] = [];
  const taken = new Set<string>();
  for (const order of spec.orderBy ?? []) {
    const direction = order.direction ?? 'asc';
    if (aggregateNames.has(order.column)) {
      orderBy.push({ kind: 'alias', alias: order.column, direction });
    } else {
      const group = groupBy.value.find((column) => column.alias === order.column);
      if (group === undefined) {
        const ref = resolveColumnRef(catalog, table, order.column);
        if (ref.isErr()) {
          return err(ref.error);
        }
        return err(
          createInvalidQueryError(
            `Cannot order by '${order.column}': not a groupBy column or aggregate alias`
          )
        );
      }
      orderBy.push({ kind: 'ref', ref: group.ref, direction });
    }
    taken.add(order.column);
  }
  for (const column of groupBy.value) {
    if (!taken.has(column.alias)) {
      orderBy.push({ kind: 'ref', ref: column.ref, direction: 'asc' });
    }
  }

  return ok({
    mode: 'aggregate',
    table,
    groupBy: groupBy.value,
    aggregates,
    filters,
    orderBy,
    limit: spec.limit ?? DEFAULT_QUERY_LIMIT,
  });
};

/**
 * Resolves a validated QuerySpec. A spec with `groupBy` or `aggregates`
 * produces one row per group; otherwise one row per record.
 */
export const resolveQuery = (
  catalog: LabelCatalog,
  spec: QuerySpec
): Result<ResolvedQuery, QueryError> => {
  const filters = resolveFilters(catalog, spec.table, spec.filters ?? []);
  if (filters.isErr()) {
    return err(filters.error);
  }

  const isAggregate =
    (spec.groupBy !== undefined && spec.groupBy.length > 0) ||
    (spec.aggregates !== undefined && spec.aggregates.length > 0);

  return isAggregate
    ? resolveAggregateQuery(catalog, spec, filters.value)
    : resolveRowsQuery(catalog, spec, filters.value);
};

/**
 * Output column names in result order.
 */
export const outputColumns = (query: ResolvedQuery): string[] =>
  query.mode === 'rows'
    ? [
        ...query.select.map((column) => column.alias),
        ...(query.includeAttributes ? [ATTRIBUTES_COLUMN] : []),
      ]
    : [
        ...query.groupBy.map((column) => column.alias),
        ...query.aggregates.map((aggregate) => aggregate.alias),
      ];
