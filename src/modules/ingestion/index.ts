/**
 * Ingestion Module - Public API
 *
 * Turns OpEx, demand and priority spreadsheets into canonical records and
 * loads them into the hybrid store.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CellValue,
  SheetTable,
  Workbook,
  SourceFile,
  FileCategory,
  RowWarning,
  RowOutcome,
  NormalizedSource,
  Hasher,
  WorkbookReader,
  NormalizeDeps,
  FailedRecord,
  IngestionSummary,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  createParseError,
  describeParseError,
  type ParseError,
  type ParseErrorLocation,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Pure Helpers
// ─────────────────────────────────────────────────────────────────────────────

export { parseMonthLabel, toMonthKey, monthFromName } from './core/months.js';
export { parseAmount, parseFiscalYear, toAttributeKey } from './core/values.js';
export { computeIdentity, canonicalizeIdentityFields } from './core/identity.js';
export { detectFileCategory, deriveDataType } from './core/file-category.js';
export { renderRecordText, renderEmbeddingText } from './core/render.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  normalizeSource,
  collectRecords,
  type NormalizeSourceDeps,
} from './core/usecases/normalize-source.js';

export {
  ingestFile,
  ingestFiles,
  type IngestFileDeps,
  type IngestFilesDeps,
} from './core/usecases/ingest-file.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { readWorkbook, readStream } from './shell/readers/workbook-reader.js';
export { cryptoHasher } from './shell/crypto/hasher.js';
