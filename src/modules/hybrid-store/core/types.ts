/**
 * Hybrid Store Module - Types
 *
 * The query model is a small JSON document (`QuerySpec`) rather than SQL text:
 * the SQL agent asks the model for one, the store validates it against the
 * label catalog and compiles it for Postgres or evaluates it in memory.
 */

import { Type, type Static } from '@sinclair/typebox';

import type { Deadline } from '../../../common/deadline.js';
import type {
  AttributeBag,
  AttributeValue,
  DemandRecord,
  EmbeddedFinancialRecord,
  FinancialRecord,
  PriorityRecord,
} from '../../../common/types/records.js';
import type { ColumnType, TableName } from '../../labels/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_QUERY_LIMIT = 200;
export const MAX_QUERY_LIMIT = 1000;

/** Candidates fetched from the vector index per requested neighbour */
export const SIMILARITY_CANDIDATE_FACTOR = 4;

// ─────────────────────────────────────────────────────────────────────────────
// Query Model (validated with TypeBox)
// ─────────────────────────────────────────────────────────────────────────────

const ScalarSchema = Type.Union([Type.String(), Type.Number(), Type.Boolean()]);

export type FilterScalar = Static<typeof ScalarSchema>;

const ColumnNameSchema = Type.String({ minLength: 1, maxLength: 128 });

export const FilterSchema = Type.Union([
  Type.Object(
    {
      column: ColumnNameSchema,
      op: Type.Union([
        Type.Literal('eq'),
        Type.Literal('neq'),
        Type.Literal('gt'),
        Type.Literal('gte'),
        Type.Literal('lt'),
        Type.Literal('lte'),
      ]),
      value: ScalarSchema,
    },
    { additionalProperties: false }
  ),
  Type.Object(
    {
      column: ColumnNameSchema,
      op: Type.Literal('in'),
      values: Type.Array(ScalarSchema, { minItems: 1, maxItems: 500 }),
    },
    { additionalProperties: false }
  ),
  Type.Object(
    {
      column: ColumnNameSchema,
      op: Type.Literal('between'),
      from: ScalarSchema,
      to: ScalarSchema,
    },
    { additionalProperties: false }
  ),
  Type.Object(
    {
      column: ColumnNameSchema,
      op: Type.Literal('contains'),
      value: Type.String({ minLength: 1 }),
    },
    { additionalProperties: false }
  ),
  Type.Object(
    {
      column: ColumnNameSchema,
      op: Type.Literal('is_null'),
      /** false selects non-null values */
      value: Type.Optional(Type.Boolean()),
    },
    { additionalProperties: false }
  ),
]);

export type Filter = Static<typeof FilterSchema>;

export const AggregateFnSchema = Type.Union([
  Type.Literal('sum'),
  Type.Literal('avg'),
  Type.Literal('min'),
  Type.Literal('max'),
  Type.Literal('count'),
]);

export type AggregateFn = Static<typeof AggregateFnSchema>;

export const AggregateSchema = Type.Object(
  {
    fn: AggregateFnSchema,
    /** Omitted only for count(*) */
    column: Type.Optional(ColumnNameSchema),
    alias: Type.String({ pattern: '^[a-z][a-z0-9_]{0,62}$' }),
  },
  { additionalProperties: false }
);

export type Aggregate = Static<typeof AggregateSchema>;

export const OrderSchema = Type.Object(
  {
    /** Column, `attributes.<key>` or aggregate alias */
    column: ColumnNameSchema,
    direction: Type.Optional(Type.Union([Type.Literal('asc'), Type.Literal('desc')])),
  },
  { additionalProperties: false }
);

export type Order = Static<typeof OrderSchema>;

export const QuerySpecSchema = Type.Object(
  {
    table: Type.Union([
      Type.Literal('opex_data_hybrid'),
      Type.Literal('bpafg_demand'),
      Type.Literal('priority_template'),
    ]),
    select: Type.Optional(Type.Array(ColumnNameSchema, { minItems: 1 })),
    filters: Type.Optional(Type.Array(FilterSchema)),
    groupBy: Type.Optional(Type.Array(ColumnNameSchema)),
    aggregates: Type.Optional(Type.Array(AggregateSchema)),
    orderBy: Type.Optional(Type.Array(OrderSchema)),
    limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_QUERY_LIMIT })),
  },
  { additionalProperties: false }
);

export type QuerySpec = Static<typeof QuerySpecSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Resolved Query (names checked against the catalog)
// ─────────────────────────────────────────────────────────────────────────────

export type ColumnRef =
  | { readonly kind: 'column'; readonly name: string; readonly type: ColumnType }
  | { readonly kind: 'attribute'; readonly key: string; readonly type: ColumnType };

export type ResolvedFilter =
  | {
      readonly ref: ColumnRef;
      readonly op: 'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte';
      readonly value: FilterScalar;
    }
  | { readonly ref: ColumnRef; readonly op: 'in'; readonly values: readonly FilterScalar[] }
  | {
      readonly ref: ColumnRef;
      readonly op: 'between';
      readonly from: FilterScalar;
      readonly to: FilterScalar;
    }
  | { readonly ref: ColumnRef; readonly op: 'contains'; readonly value: string }
  | { readonly ref: ColumnRef; readonly op: 'is_null'; readonly value: boolean };

export interface OutputColumn {
  readonly ref: ColumnRef;
  readonly alias: string;
}

export interface ResolvedAggregate {
  readonly fn: AggregateFn;
  /** null for count(*) */
  readonly ref: ColumnRef | null;
  readonly alias: string;
}

export type SortKey =
  | { readonly kind: 'ref'; readonly ref: ColumnRef; readonly direction: 'asc' | 'desc' }
  | { readonly kind: 'alias'; readonly alias: string; readonly direction: 'asc' | 'desc' };

export type ResolvedQuery =
  | {
      readonly mode: 'rows';
      readonly table: TableName;
      readonly select: readonly OutputColumn[];
      /** Whole attribute bag requested as an `attributes` output column */
      readonly includeAttributes: boolean;
      readonly filters: readonly ResolvedFilter[];
      readonly orderBy: readonly SortKey[];
      readonly limit: number;
    }
  | {
      readonly mode: 'aggregate';
      readonly table: TableName;
      readonly groupBy: readonly OutputColumn[];
      readonly aggregates: readonly ResolvedAggregate[];
      readonly filters: readonly ResolvedFilter[];
      readonly orderBy: readonly SortKey[];
      readonly limit: number;
    };

// ─────────────────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────────────────

export type ResultValue = AttributeValue | AttributeBag;

export type ResultRow = Readonly<Record<string, ResultValue>>;

export interface ResultSet {
  readonly table: TableName;
  readonly columns: readonly string[];
  readonly rows: readonly ResultRow[];
  /** More rows matched than the limit allowed */
  readonly truncated: boolean;
}

export interface SimilarityHit {
  readonly record: FinancialRecord;
  /** Cosine distance, lower is closer */
  readonly distance: number;
}

export interface StoreHealth {
  readonly tables: Readonly<Record<TableName, number>>;
  readonly latencyMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Writes
// ─────────────────────────────────────────────────────────────────────────────

export type StorableRecord = EmbeddedFinancialRecord | DemandRecord | PriorityRecord;

export interface PurgeInput {
  readonly table: TableName;
  /** Restricts the purge to rows ingested from this file */
  readonly sourceFile?: string;
}

export interface StoreCallOptions {
  /** Overall request budget; the statement timeout never exceeds what is left */
  readonly deadline?: Deadline;
}
