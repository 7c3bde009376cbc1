/**
 * In-memory query evaluation
 *
 * Executes a ResolvedQuery over StoredRows with the same semantics the
 * Postgres compiler produces: NULL never matches a comparison, ascending
 * order puts NULLs last, text compares by code unit (COLLATE "C").
 */

import { Decimal } from 'decimal.js';

import { ATTRIBUTES_COLUMN, isNumericType, outputColumns } from './resolve-query.js';

import type { StoredRow } from './rows.js';
import type {
  ColumnRef,
  FilterScalar,
  ResolvedAggregate,
  ResolvedFilter,
  ResolvedQuery,
  ResultRow,
  ResultSet,
  ResultValue,
  SortKey,
} from './types.js';
import type { AttributeValue } from '../../../common/types/records.js';

// ─────────────────────────────────────────────────────────────────────────────
// Values
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reads a column or attribute, typed the way `additional_data->>'key'` (cast
 * for numeric attributes) would return it.
 */
export const readRef = (row: StoredRow, ref: ColumnRef): AttributeValue => {
  if (ref.kind === 'column') {
    return row.columns[ref.name] ?? null;
  }
  const raw = row.attributes[ref.key];
  if (raw === undefined || raw === null) {
    return null;
  }
  if (isNumericType(ref.type)) {
    const value = typeof raw === 'number' ? raw : Number(raw);
    return Number.isFinite(value) ? value : null;
  }
  return String(raw);
};

const compareScalars = (a: AttributeValue | FilterScalar, b: AttributeValue | FilterScalar): number => {
  if (typeof a === 'number' && typeof b === 'number') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  const left = String(a);
  const right = String(b);
  return left === right ? 0 : left < right ? -1 : 1;
};

/** NULL sorts after every value */
const compareNullable = (a: AttributeValue, b: AttributeValue): number => {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? 1 : -1;
  }
  return compareScalars(a, b);
};

// ─────────────────────────────────────────────────────────────────────────────
// Filtering
// ─────────────────────────────────────────────────────────────────────────────

const matchesFilter = (row: StoredRow, filter: ResolvedFilter): boolean => {
  const value = readRef(row, filter.ref);

  if (filter.op === 'is_null') {
    return (value === null) === filter.value;
  }
  if (value === null) {
    return false;
  }

  switch (filter.op) {
    case 'eq':
      return compareScalars(value, filter.value) === 0;
    case 'neq':
      return compareScalars(value, filter.value) !== 0;
    case 'gt':
      return compareScalars(value, filter.value) > 0;
    case 'gte':
      return compareScalars(value, filter.value) >= 0;
    case 'lt':
      return compareScalars(value, filter.value) < 0;
    case 'lte':
      return compareScalars(value, filter.value) <= 0;
    case 'in':
      return filter.values.some((candidate) => compareScalars(value, candidate) === 0);
    case 'between':
      return compareScalars(value, filter.from) >= 0 && compareScalars(value, filter.to) <= 0;
    case 'contains':
      return String(value).toLowerCase().includes(filter.value.toLowerCase());
  }
};

export const matchesFilters = (row: StoredRow, filters: readonly ResolvedFilter[]): boolean =>
  filters.every((filter) => matchesFilter(row, filter));

// ─────────────────────────────────────────────────────────────────────────────
// Ordering
// ─────────────────────────────────────────────────────────────────────────────

const compareBy = <T>(
  keys: readonly SortKey[],
  read: (item: T, key: SortKey) => AttributeValue
): ((a: T, b: T) => number) => {
  return (a, b) => {
    for (const key of keys) {
      const order = compareNullable(read(a, key), read(b, key));
      if (order !== 0) {
        return key.direction === 'asc' ? order : -order;
      }
    }
    return 0;
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Aggregation
// ─────────────────────────────────────────────────────────────────────────────

const aggregateValue = (rows: readonly StoredRow[], aggregate: ResolvedAggregate): AttributeValue => {
  const { ref } = aggregate;
  if (ref === null) {
    return rows.length;
  }

  const values = rows.map((row) => readRef(row, ref)).filter((value) => value !== null);
  if (aggregate.fn === 'count') {
    return values.length;
  }
  if (values.length === 0) {
    return null;
  }

  switch (aggregate.fn) {
    case 'sum':
    case 'avg': {
      const total = values.reduce<Decimal>((sum, value) => sum.plus(Number(value)), new Decimal(0));
      return (aggregate.fn === 'sum' ? total : total.div(values.length)).toNumber();
    }
    case 'min':
      return values.reduce((min, value) => (compareScalars(value, min) < 0 ? value : min));
    case 'max':
      return values.reduce((max, value) => (compareScalars(value, max) > 0 ? value : max));
  }
};

type GroupRow = Record<string, AttributeValue>;

const evaluateAggregate = (
  rows: readonly StoredRow[],
  query: Extract<ResolvedQuery, { mode: 'aggregate' }>
): GroupRow[] => {
  const groups = new Map<string, { values: AttributeValue[]; rows: StoredRow[] }>();

  for (const row of rows) {
    const values = query.groupBy.map((column) => readRef(row, column.ref));
    const key = JSON.stringify(values);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, { values, rows: [row] });
    } else {
      group.rows.push(row);
    }
  }

  // Without GROUP BY an aggregate always yields exactly one row
  if (query.groupBy.length === 0 && groups.size === 0) {
    groups.set('[]', { values: [], rows: [] });
  }

  return [...groups.values()].map((group) => {
    const output: GroupRow = {};
    query.groupBy.forEach((column, index) => {
      output[column.alias] = group.values[index] ?? null;
    });
    for (const aggregate of query.aggregates) {
      output[aggregate.alias] = aggregateValue(group.rows, aggregate);
    }
    return output;
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

export const evaluateQuery = (rows: Iterable<StoredRow>, query: ResolvedQuery): ResultSet => {
  const matched = [...rows].filter(
    (row) => row.table === query.table && matchesFilters(row, query.filters)
  );
  const columns = outputColumns(query);

  if (query.mode === 'rows') {
    const sorted = matched.sort(
      compareBy<StoredRow>(query.orderBy, (row, key) =>
        key.kind === 'ref' ? readRef(row, key.ref) : null
      )
    );
    const page = sorted.slice(0, query.limit).map((row): ResultRow => {
      const output: Record<string, ResultValue> = {};
      for (const column of query.select) {
        output[column.alias] = readRef(row, column.ref);
      }
      if (query.includeAttributes) {
        output[ATTRIBUTES_COLUMN] = row.attributes;
      }
      return output;
    });
    return { table: query.table, columns, rows: page, truncated: sorted.length > query.limit };
  }

  const aliasOf = new Map<ColumnRef, string>(
    query.groupBy.map((column) => [column.ref, column.alias])
  );
  const sorted = evaluateAggregate(matched, query).sort(
    compareBy<GroupRow>(query.orderBy, (row, key) =>
      key.kind === 'alias' ? (row[key.alias] ?? null) : (row[aliasOf.get(key.ref) ?? ''] ?? null)
    )
  );
  return {
    table: query.table,
    columns,
    rows: sorted.slice(0, query.limit),
    truncated: sorted.length > query.limit,
  };
};
