/**
 * Labels Module - Types
 *
 * The label catalog describes the three analytics tables: declared columns with
 * their types and descriptions, the spreadsheet header variants that feed each
 * column, and the business vocabulary used to rewrite questions.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Document Schema (YAML)
// ─────────────────────────────────────────────────────────────────────────────

export const TABLE_NAMES = ['opex_data_hybrid', 'bpafg_demand', 'priority_template'] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export const ColumnTypeSchema = Type.Union([
  Type.Literal('text'),
  Type.Literal('integer'),
  Type.Literal('bigint'),
  Type.Literal('numeric'),
  Type.Literal('date'),
]);

export type ColumnType = Static<typeof ColumnTypeSchema>;

const ColumnDocSchema = Type.Object({
  type: ColumnTypeSchema,
  description: Type.String(),
  headers: Type.Optional(Type.Array(Type.String())),
});

const AttributeDocSchema = Type.Object({
  type: ColumnTypeSchema,
  description: Type.String(),
});

const TableDocSchema = Type.Object({
  description: Type.String(),
  identity: Type.String(),
  columns: Type.Record(Type.String(), ColumnDocSchema),
  attributes: Type.Optional(Type.Record(Type.String(), AttributeDocSchema)),
});

export const LabelDocumentSchema = Type.Object({
  tables: Type.Object({
    opex_data_hybrid: TableDocSchema,
    bpafg_demand: TableDocSchema,
    priority_template: TableDocSchema,
  }),
  vocabulary: Type.Optional(Type.Record(Type.String(), Type.String())),
});

export type LabelDocument = Static<typeof LabelDocumentSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

export interface ColumnDef {
  readonly name: string;
  readonly type: ColumnType;
  readonly description: string;
  /** Normalized spreadsheet header variants */
  readonly headers: readonly string[];
}

export interface AttributeDef {
  readonly key: string;
  readonly type: ColumnType;
  readonly description: string;
}

export interface TableDef {
  readonly name: TableName;
  readonly description: string;
  readonly identity: string;
  readonly columns: readonly ColumnDef[];
  readonly attributes: readonly AttributeDef[];
}

export interface VocabularyEntry {
  /** Lowercased business term, single spaces */
  readonly term: string;
  /** Column name or `attributes.<key>` */
  readonly target: string;
}

export interface LabelCatalog {
  readonly tables: Readonly<Record<TableName, TableDef>>;
  /** Sorted longest term first */
  readonly vocabulary: readonly VocabularyEntry[];
}

export interface RelevantColumn {
  readonly table: TableName;
  readonly column: string;
  readonly description: string;
}

/** Prefix used to address attribute-bag keys in queries */
export const ATTRIBUTE_PREFIX = 'attributes.';
