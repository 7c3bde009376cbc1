/**
 * Cell value coercion.
 */

import { Decimal } from 'decimal.js';

import { normalizeHeader, stripFormulaWrapper } from '../../labels/index.js';

import type { CellValue } from './types.js';
import type { AttributeValue } from '../../../common/types/records.js';

export type ParsedNumber =
  | { readonly kind: 'blank' }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'invalid'; readonly raw: string };

const BLANK: ParsedNumber = { kind: 'blank' };

/**
 * Formats a date cell as `YYYY-MM-DD` (local calendar date, as shown in the sheet).
 */
export const formatDateCell = (date: Date): string =>
  `${String(date.getFullYear())}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`;

/**
 * Text form of a cell; null for blanks.
 */
export const cellText = (value: CellValue | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatDateCell(value);
  }
  if (typeof value === 'string') {
    const text = stripFormulaWrapper(value).replace(/\s+/g, ' ').trim();
    return text === '' ? null : text;
  }
  return String(value);
};

export const isBlankRow = (cells: readonly CellValue[]): boolean =>
  cells.every((cell) => cellText(cell) === null);

/**
 * Parses an amount: accepts thousands separators, a leading currency sign,
 * decimals and accounting negatives such as `(3.5)`.
 */
export const parseAmount = (value: CellValue | undefined): ParsedNumber => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'number', value } : { kind: 'invalid', raw: String(value) };
  }
  const text = cellText(value);
  if (text === null || text === '-') {
    return BLANK;
  }

  let cleaned = text.replace(/[$€£,\s]/g, '');
  let negative = false;
  const accounting = /^\((.*)\)$/.exec(cleaned);
  if (accounting?.[1] !== undefined) {
    negative = true;
    cleaned = accounting[1];
  }

  if (!/^[-+]?(\d+(\.\d+)?|\.\d+)(e[-+]?\d+)?$/i.test(cleaned)) {
    return { kind: 'invalid', raw: text };
  }

  const parsed = new Decimal(cleaned);
  return { kind: 'number', value: (negative ? parsed.negated() : parsed).toNumber() };
};

/**
 * Parses a whole number (project numbers, priorities).
 */
export const parseInteger = (value: CellValue | undefined): ParsedNumber => {
  const parsed = parseAmount(value);
  if (parsed.kind === 'number' && !Number.isInteger(parsed.value)) {
    return { kind: 'invalid', raw: String(parsed.value) };
  }
  return parsed;
};

/**
 * Parses a fiscal year: `2025`, `FY25`, `FY 2025`, `FY2025`.
 */
export const parseFiscalYear = (value: CellValue | undefined): ParsedNumber => {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 1900 && value <= 2199
      ? { kind: 'number', value }
      : { kind: 'invalid', raw: String(value) };
  }
  const text = cellText(value);
  if (text === null) {
    return BLANK;
  }
  const match = /^(?:fy\s*'?)?(\d{4}|\d{2})$/i.exec(text);
  if (match?.[1] === undefined) {
    return { kind: 'invalid', raw: text };
  }
  const year = Number.parseInt(match[1], 10);
  return { kind: 'number', value: match[1].length === 2 ? 2000 + year : year };
};

/**
 * Attribute-bag key for an unmapped header: snake_case of the normalized text.
 */
export const toAttributeKey = (header: CellValue | undefined, index: number): string => {
  const base = normalizeHeader(cellText(header ?? null) ?? '').replace(/ /g, '_');
  if (base === '') {
    return `column_${String(index + 1)}`;
  }
  return /^[0-9]/.test(base) ? `col_${base}` : base;
};

/**
 * Value stored in the attribute bag.
 */
export const toAttributeValue = (value: CellValue | undefined): AttributeValue => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  return cellText(value);
};
