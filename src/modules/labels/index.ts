/**
 * Labels Module - Public API
 *
 * Immutable schema and vocabulary catalog shared by ingestion, routing and
 * query agents.
 */

export {
  TABLE_NAMES,
  ATTRIBUTE_PREFIX,
  LabelDocumentSchema,
  type TableName,
  type ColumnType,
  type ColumnDef,
  type AttributeDef,
  type TableDef,
  type VocabularyEntry,
  type LabelCatalog,
  type LabelDocument,
  type RelevantColumn,
} from './core/types.js';

export { createConfigError, type ConfigError } from './core/errors.js';

export {
  buildLabelCatalog,
  matchHeader,
  findColumn,
  findAttribute,
  isTableName,
  normalizeHeader,
  normalizeTerm,
  stripFormulaWrapper,
} from './core/catalog.js';

export {
  rewriteQuestion,
  findRelevantColumns,
  formatRelevantColumns,
  describeSchema,
} from './core/vocabulary.js';

export { parseLabelCatalog, loadLabelCatalog } from './shell/yaml-loader.js';
