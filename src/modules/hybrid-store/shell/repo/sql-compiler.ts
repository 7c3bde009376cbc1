/**
 * SQL compilation for resolved queries
 *
 * Every identifier comes from the label catalog (checked by resolveQuery) and
 * every value is bound as a parameter. Attribute keys are inlined as string
 * literals so that SELECT, GROUP BY and ORDER BY share identical expressions;
 * they are restricted to [a-z0-9_] during resolution.
 */

import { sql, type RawBuilder } from 'kysely';

import { ATTRIBUTES_COLUMN, isNumericType } from '../../core/resolve-query.js';

import type {
  ColumnRef,
  ResolvedAggregate,
  ResolvedFilter,
  ResolvedQuery,
  SortKey,
} from '../../core/types.js';

const EMPTY = sql``;

export const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, '\\$&');

export const refExpression = (ref: ColumnRef): RawBuilder<unknown> => {
  if (ref.kind === 'column') {
    return sql.ref(ref.name);
  }
  const text = sql`(additional_data->>${sql.lit(ref.key)})`;
  return isNumericType(ref.type) ? sql`${text}::numeric` : text;
};

/** Text compares by code unit, like the in-memory store */
const orderedExpression = (ref: ColumnRef): RawBuilder<unknown> =>
  isNumericType(ref.type) ? refExpression(ref) : sql`${refExpression(ref)} collate "C"`;

export const filterCondition = (filter: ResolvedFilter): RawBuilder<boolean> => {
  const expression = refExpression(filter.ref);

  switch (filter.op) {
    case 'eq':
      return sql<boolean>`${expression} = ${filter.value}`;
    case 'neq':
      return sql<boolean>`${expression} <> ${filter.value}`;
    case 'gt':
      return sql<boolean>`${orderedExpression(filter.ref)} > ${filter.value}`;
    case 'gte':
      return sql<boolean>`${orderedExpression(filter.ref)} >= ${filter.value}`;
    case 'lt':
      return sql<boolean>`${orderedExpression(filter.ref)} < ${filter.value}`;
    case 'lte':
      return sql<boolean>`${orderedExpression(filter.ref)} <= ${filter.value}`;
    case 'in':
      return sql<boolean>`${expression} in (${sql.join(filter.values)})`;
    case 'between':
      return sql<boolean>`${orderedExpression(filter.ref)} between ${filter.from} and ${filter.to}`;
    case 'contains':
      return sql<boolean>`${expression}::text ilike ${`%${escapeLikePattern(filter.value)}%`}`;
    case 'is_null':
      return filter.value
        ? sql<boolean>`${expression} is null`
        : sql<boolean>`${expression} is not null`;
  }
};

const whereClause = (filters: readonly ResolvedFilter[]): RawBuilder<unknown> =>
  filters.length === 0 ? EMPTY : sql` where ${sql.join(filters.map(filterCondition), sql` and `)}`;

const aggregateExpression = (aggregate: ResolvedAggregate): RawBuilder<unknown> =>
  sql`${sql.raw(aggregate.fn)}(${aggregate.ref === null ? sql`*` : refExpression(aggregate.ref)})`;

const isTextAggregate = (aggregate: ResolvedAggregate): boolean =>
  (aggregate.fn === 'min' || aggregate.fn === 'max') &&
  aggregate.ref !== null &&
  !isNumericType(aggregate.ref.type);

const sortExpression = (key: SortKey, aggregates: readonly ResolvedAggregate[]): RawBuilder<unknown> => {
  const direction = sql.raw(key.direction);
  if (key.kind === 'ref') {
    return sql`${orderedExpression(key.ref)} ${direction}`;
  }
  const textual = aggregates.some((a) => a.alias === key.alias && isTextAggregate(a));
  return textual
    ? sql`${sql.id(key.alias)} collate "C" ${direction}`
    : sql`${sql.id(key.alias)} ${direction}`;
};

/**
 * Compiles a resolved query. `fetchLimit` is the query limit plus one so the
 * caller can tell whether rows were cut off.
 */
export const compileQuery = (
  query: ResolvedQuery,
  fetchLimit: number
): RawBuilder<Record<string, unknown>> => {
  let selections: RawBuilder<unknown>[];
  let groupBy = EMPTY;
  let aggregates: readonly ResolvedAggregate[] = [];

  if (query.mode === 'rows') {
    selections = query.select.map(
      (column) => sql`${refExpression(column.ref)} as ${sql.id(column.alias)}`
    );
    if (query.includeAttributes) {
      selections.push(sql`additional_data as ${sql.id(ATTRIBUTES_COLUMN)}`);
    }
  } else {
    aggregates = query.aggregates;
    selections = [
      ...query.groupBy.map((column) => sql`${refExpression(column.ref)} as ${sql.id(column.alias)}`),
      ...query.aggregates.map(
        (aggregate) => sql`${aggregateExpression(aggregate)} as ${sql.id(aggregate.alias)}`
      ),
    ];
    if (query.groupBy.length > 0) {
      groupBy = sql` group by ${sql.join(query.groupBy.map((column) => refExpression(column.ref)))}`;
    }
  }

  const orderBy =
    query.orderBy.length === 0
      ? EMPTY
      : sql` order by ${sql.join(query.orderBy.map((key) => sortExpression(key, aggregates)))}`;

  return sql<Record<string, unknown>>`select ${sql.join(selections)} from ${sql.table(query.table)}${whereClause(query.filters)}${groupBy}${orderBy} limit ${fetchLimit}`;
};
