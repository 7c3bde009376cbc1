/**
 * Label catalog construction and lookups.
 *
 * The catalog is built once at startup and frozen; every component receives
 * the same instance through its dependencies.
 */

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { createConfigError, type ConfigError } from './errors.js';
import {
  ATTRIBUTE_PREFIX,
  LabelDocumentSchema,
  TABLE_NAMES,
  type AttributeDef,
  type ColumnDef,
  type LabelCatalog,
  type LabelDocument,
  type TableDef,
  type TableName,
  type VocabularyEntry,
} from './types.js';

const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]*$/;
const TERM_PATTERN = /^[a-z0-9](?:[a-z0-9 '&/-]*[a-z0-9])?$/;

// ─────────────────────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Strips Excel formula wrappers such as `="Oct 25"`.
 */
export const stripFormulaWrapper = (raw: string): string => {
  const match = /^="(.*)"$/.exec(raw.trim());
  return match?.[1] ?? raw.trim();
};

/**
 * Normalizes a spreadsheet header for matching: lowercase, every run of
 * non-alphanumerics collapsed to one space.
 */
export const normalizeHeader = (raw: string): string =>
  stripFormulaWrapper(raw)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();

/**
 * Normalizes a business term: lowercase, single spaces.
 */
export const normalizeTerm = (raw: string): string => raw.trim().toLowerCase().replace(/\s+/g, ' ');

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Builds the source of a case-insensitive, word-bounded alternation over
 * `terms`, longest first. Spaces inside a term match any whitespace run.
 */
export const buildTermPatternSource = (terms: readonly string[]): string | null => {
  if (terms.length === 0) {
    return null;
  }
  const alternatives = [...terms]
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
    .map((term) => escapeRegExp(term).replace(/ /g, '\\s+'));
  return `\\b(?:${alternatives.join('|')})\\b`;
};

// ─────────────────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────────────────

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

const targetExists = (tables: Record<TableName, TableDef>, target: string): boolean => {
  if (target.startsWith(ATTRIBUTE_PREFIX)) {
    const key = target.slice(ATTRIBUTE_PREFIX.length);
    return TABLE_NAMES.some((name) => tables[name].attributes.some((a) => a.key === key));
  }
  return TABLE_NAMES.some((name) => tables[name].columns.some((c) => c.name === target));
};

type TableDocument = LabelDocument['tables'][TableName];

const buildTableDef = (
  source: string,
  name: TableName,
  doc: TableDocument
): Result<TableDef, ConfigError> => {
  const columns: ColumnDef[] = [];
  for (const [columnName, column] of Object.entries(doc.columns)) {
    if (!IDENTIFIER_PATTERN.test(columnName)) {
      return err(createConfigError(source, `Invalid column name '${columnName}' in ${name}`));
    }
    columns.push({
      name: columnName,
      type: column.type,
      description: column.description,
      headers: [...new Set((column.headers ?? []).map(normalizeHeader))],
    });
  }

  if (!columns.some((c) => c.name === doc.identity)) {
    return err(
      createConfigError(source, `Identity column '${doc.identity}' is not declared in ${name}`)
    );
  }

  const attributes: AttributeDef[] = [];
  for (const [key, attribute] of Object.entries(doc.attributes ?? {})) {
    if (!IDENTIFIER_PATTERN.test(key)) {
      return err(createConfigError(source, `Invalid attribute key '${key}' in ${name}`));
    }
    attributes.push({ key, type: attribute.type, description: attribute.description });
  }

  return ok({ name, description: doc.description, identity: doc.identity, columns, attributes });
};

/**
 * Validates an already-parsed label document and builds the frozen catalog.
 */
export const buildLabelCatalog = (
  document: unknown,
  source = 'labels'
): Result<LabelCatalog, ConfigError> => {
  if (!Value.Check(LabelDocumentSchema, document)) {
    const details = [...Value.Errors(LabelDocumentSchema, document)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ');
    return err(createConfigError(source, `Invalid label catalog: ${details}`));
  }

  const opex = buildTableDef(source, 'opex_data_hybrid', document.tables.opex_data_hybrid);
  if (opex.isErr()) {
    return err(opex.error);
  }
  const demand = buildTableDef(source, 'bpafg_demand', document.tables.bpafg_demand);
  if (demand.isErr()) {
    return err(demand.error);
  }
  const priority = buildTableDef(source, 'priority_template', document.tables.priority_template);
  if (priority.isErr()) {
    return err(priority.error);
  }

  const tables: Record<TableName, TableDef> = {
    opex_data_hybrid: opex.value,
    bpafg_demand: demand.value,
    priority_template: priority.value,
  };

  const vocabulary: VocabularyEntry[] = [];
  for (const [rawTerm, target] of Object.entries(document.vocabulary ?? {})) {
    const term = normalizeTerm(rawTerm);
    if (!TERM_PATTERN.test(term)) {
      return err(createConfigError(source, `Invalid vocabulary term '${rawTerm}'`));
    }
    if (!targetExists(tables, target)) {
      return err(
        createConfigError(source, `Vocabulary term '${rawTerm}' maps to unknown column '${target}'`)
      );
    }
    if (targetExists(tables, term) && term !== target) {
      return err(
        createConfigError(source, `Vocabulary term '${rawTerm}' shadows the column '${term}'`)
      );
    }
    vocabulary.push({ term, target });
  }

  // A rewritten question only contains targets; none of them may match a term again.
  const patternSource = buildTermPatternSource(vocabulary.map((v) => v.term));
  if (patternSource !== null) {
    for (const { target } of vocabulary) {
      const inner = new RegExp(patternSource, 'i').exec(target);
      if (inner !== null && inner[0].toLowerCase() !== target) {
        return err(
          createConfigError(
            source,
            `Vocabulary term '${inner[0]}' occurs inside the column reference '${target}'`
          )
        );
      }
    }
  }

  vocabulary.sort((a, b) => b.term.length - a.term.length || (a.term < b.term ? -1 : 1));

  return ok(deepFreeze({ tables, vocabulary }));
};

// ─────────────────────────────────────────────────────────────────────────────
// Lookups
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolves a raw spreadsheet header to a declared column of `table`.
 */
export const matchHeader = (
  catalog: LabelCatalog,
  table: TableName,
  rawHeader: string
): string | undefined => {
  const header = normalizeHeader(rawHeader);
  if (header === '') {
    return undefined;
  }
  const columns = catalog.tables[table].columns;
  const byVariant = columns.find((c) => c.headers.includes(header));
  if (byVariant !== undefined) {
    return byVariant.name;
  }
  return columns.find((c) => normalizeHeader(c.name) === header)?.name;
};

export const findColumn = (
  catalog: LabelCatalog,
  table: TableName,
  column: string
): ColumnDef | undefined => catalog.tables[table].columns.find((c) => c.name === column);

export const findAttribute = (
  catalog: LabelCatalog,
  table: TableName,
  key: string
): AttributeDef | undefined => catalog.tables[table].attributes.find((a) => a.key === key);

export const isTableName = (value: string): value is TableName =>
  TABLE_NAMES.some((name) => name === value);
