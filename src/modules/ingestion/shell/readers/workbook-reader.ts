/**
 * Workbook reader: SheetJS for Excel files, csv-parse for CSV.
 */

import { extname } from 'node:path';

import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import * as XLSX from 'xlsx';

import { createParseError, type ParseError } from '../../core/errors.js';

import type { CellValue, SheetTable, SourceFile, Workbook, WorkbookReader } from '../../core/types.js';

const EXCEL_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls', '.xlsb']);

const toCellValue = (value: unknown): CellValue => {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return value === undefined ? null : String(value);
};

const readExcel = (source: SourceFile): Result<Workbook, ParseError> => {
  let book: XLSX.WorkBook;
  try {
    book = XLSX.read(Buffer.from(source.content), { type: 'buffer', cellDates: true });
  } catch (error) {
    return err(createParseError(source.filename, 'Unreadable Excel workbook', {}, error));
  }

  const sheets: SheetTable[] = [];
  for (const name of book.SheetNames) {
    const sheet = book.Sheets[name];
    if (sheet === undefined) {
      continue;
    }
    const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      raw: true,
      defval: null,
      blankrows: true,
    });
    sheets.push({ name, rows: grid.map((row) => row.map(toCellValue)) });
  }

  return ok({ filename: source.filename, sheets });
};

const readCsv = (source: SourceFile): Result<Workbook, ParseError> => {
  let grid: string[][];
  try {
    grid = parseCsv(Buffer.from(source.content), {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: false,
      trim: true,
    });
  } catch (error) {
    return err(createParseError(source.filename, 'Malformed CSV', {}, error));
  }

  return ok({
    filename: source.filename,
    sheets: [{ name: 'csv', rows: grid.map((row) => row.map((cell) => (cell === '' ? null : cell))) }],
  });
};

/**
 * Chooses the parser by file extension.
 */
export const readWorkbook: WorkbookReader = (source) => {
  const extension = extname(source.filename).toLowerCase();
  if (extension === '.csv') {
    return readCsv(source);
  }
  if (EXCEL_EXTENSIONS.has(extension)) {
    return readExcel(source);
  }
  return err(createParseError(source.filename, `Unsupported file type '${extension}'`));
};

/**
 * Drains a byte stream into memory.
 */
export const readStream = async (stream: AsyncIterable<Uint8Array | string>): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
};
