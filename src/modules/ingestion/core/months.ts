/**
 * Month label parsing.
 *
 * Spreadsheet month headers arrive in many shapes ("Jan-25", "January 2025",
 * "2025-01", "01/2025", "25-Jan", date cells, Excel serials). All of them map
 * to a canonical `YYYY-MM` key.
 */

import { stripFormulaWrapper } from '../../labels/index.js';

import type { CellValue } from './types.js';

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

const MIN_YEAR = 1900;
const MAX_YEAR = 2199;

/** Excel serial day 0 (1899-12-30, accounting for the 1900 leap-year bug) */
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const DAY_MS = 86_400_000;
const MIN_EXCEL_SERIAL = 20_000; // 1954
const MAX_EXCEL_SERIAL = 80_000; // 2119

const NUMERIC_YEAR_MONTH = /^(\d{4})[-/.](\d{1,2})(?:[-/.]\d{1,2})?(?:[t ].*)?$/;
const NUMERIC_MONTH_YEAR = /^(\d{1,2})[-/.](\d{4})$/;
const NAME_YEAR = /^([a-z]+)[\s\-/.',]*(\d{4}|\d{2})$/;
const YEAR_NAME = /^(\d{4}|\d{2})[\s\-/.',]*([a-z]+)$/;

export const toMonthKey = (year: number, month: number): string =>
  `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;

const expandYear = (raw: string): number => {
  const year = Number.parseInt(raw, 10);
  return raw.length === 2 ? 2000 + year : year;
};

/**
 * Resolves a month name or abbreviation of at least three letters ("sep",
 * "sept", "september") to 1..12.
 */
export const monthFromName = (name: string): number | null => {
  if (name.length < 3) {
    return null;
  }
  const index = MONTH_NAMES.findIndex((full) => full.startsWith(name));
  return index === -1 ? null : index + 1;
};

const validKey = (year: number, month: number | null): string | null => {
  if (month === null || month < 1 || month > 12 || year < MIN_YEAR || year > MAX_YEAR) {
    return null;
  }
  return toMonthKey(year, month);
};

const fromText = (raw: string): string | null => {
  const text = stripFormulaWrapper(raw).trim().toLowerCase();
  if (text === '') {
    return null;
  }

  let match = NUMERIC_YEAR_MONTH.exec(text);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return validKey(Number.parseInt(match[1], 10), Number.parseInt(match[2], 10));
  }

  match = NUMERIC_MONTH_YEAR.exec(text);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return validKey(Number.parseInt(match[2], 10), Number.parseInt(match[1], 10));
  }

  match = NAME_YEAR.exec(text);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return validKey(expandYear(match[2]), monthFromName(match[1]));
  }

  match = YEAR_NAME.exec(text);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return validKey(expandYear(match[1]), monthFromName(match[2]));
  }

  return null;
};

/**
 * Parses a month label or date cell into `YYYY-MM`; null when the value is not
 * recognizably a month.
 *
 * @example
 * parseMonthLabel('Jan-25');       // '2025-01'
 * parseMonthLabel('January 2025'); // '2025-01'
 * parseMonthLabel('01/2025');      // '2025-01'
 */
export const parseMonthLabel = (value: CellValue): string | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? null
      : validKey(value.getFullYear(), value.getMonth() + 1);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < MIN_EXCEL_SERIAL || value > MAX_EXCEL_SERIAL) {
      return null;
    }
    const date = new Date(EXCEL_EPOCH_MS + Math.floor(value) * DAY_MS);
    return validKey(date.getUTCFullYear(), date.getUTCMonth() + 1);
  }

  if (typeof value === 'string') {
    return fromText(value);
  }

  return null;
};
