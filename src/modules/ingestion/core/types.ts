/**
 * Ingestion Module - Types
 */

import type { ParseError } from './errors.js';
import type {
  DemandRecord,
  FinancialRecord,
  PriorityRecord,
} from '../../../common/types/records.js';
import type { LabelCatalog } from '../../labels/index.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Source Files
// ─────────────────────────────────────────────────────────────────────────────

export type CellValue = string | number | boolean | Date | null;

export interface SheetTable {
  readonly name: string;
  /** Raw grid, header row included */
  readonly rows: readonly (readonly CellValue[])[];
}

export interface Workbook {
  readonly filename: string;
  readonly sheets: readonly SheetTable[];
}

export interface SourceFile {
  readonly filename: string;
  readonly content: Uint8Array;
}

export type FileCategory = 'opex' | 'demand' | 'priority';

// ─────────────────────────────────────────────────────────────────────────────
// Normalization Output
// ─────────────────────────────────────────────────────────────────────────────

export interface RowWarning {
  readonly sheet: string;
  /** 1-based spreadsheet row number, 0 for sheet-level notices */
  readonly row: number;
  readonly message: string;
  /** True when the row produced no record */
  readonly skipped: boolean;
}

export type RowOutcome<R> =
  | { readonly kind: 'record'; readonly sheet: string; readonly row: number; readonly record: R }
  | { readonly kind: 'warning'; readonly warning: RowWarning };

/**
 * Result of normalizing one file. `outcomes` is restartable: every iteration
 * re-derives the records from the parsed workbook.
 */
export type NormalizedSource =
  | {
      readonly category: 'opex';
      readonly filename: string;
      readonly outcomes: Iterable<RowOutcome<FinancialRecord>>;
    }
  | {
      readonly category: 'demand';
      readonly filename: string;
      readonly outcomes: Iterable<RowOutcome<DemandRecord>>;
    }
  | {
      readonly category: 'priority';
      readonly filename: string;
      readonly outcomes: Iterable<RowOutcome<PriorityRecord>>;
    };

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Interface for hashing operations, keeping the core free of crypto imports.
 */
export interface Hasher {
  /** Hex-encoded SHA-256 */
  sha256(data: string): string;
}

/**
 * Parses raw bytes into sheets; chosen by file extension.
 */
export type WorkbookReader = (source: SourceFile) => Result<Workbook, ParseError>;

export interface NormalizeDeps {
  catalog: LabelCatalog;
  hasher: Hasher;
}

// ─────────────────────────────────────────────────────────────────────────────
// Ingestion Summary
// ─────────────────────────────────────────────────────────────────────────────

export interface FailedRecord {
  /** Record identity, or sheet/row reference */
  readonly ref: string;
  readonly reason: string;
}

export interface IngestionSummary {
  readonly file: string;
  readonly category: FileCategory | null;
  readonly status: 'completed' | 'aborted';
  readonly succeeded: number;
  readonly failed: readonly FailedRecord[];
  readonly warnings: readonly RowWarning[];
  readonly error?: { readonly type: string; readonly message: string };
}
