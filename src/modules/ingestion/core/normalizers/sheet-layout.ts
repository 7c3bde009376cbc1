/**
 * Header detection shared by the sheet normalizers.
 */

import { matchHeader, type LabelCatalog, type TableName } from '../../../labels/index.js';
import { parseMonthLabel } from '../months.js';
import { cellText, isBlankRow, toAttributeKey } from '../values.js';

import type { CellValue, SheetTable } from '../types.js';

export interface MonthColumn {
  readonly index: number;
  readonly month: string;
}

export interface ExtraColumn {
  readonly index: number;
  readonly key: string;
  readonly header: string;
}

export interface SheetLayout {
  readonly sheet: string;
  /** Index into `rows` of the header row */
  readonly headerIndex: number;
  /** Declared column name → cell index (first matching header wins) */
  readonly columns: ReadonlyMap<string, number>;
  readonly months: readonly MonthColumn[];
  readonly extras: readonly ExtraColumn[];
}

export interface LayoutOptions {
  /** Treat headers that parse as month labels as month columns */
  detectMonths: boolean;
}

/**
 * Locates the header row (first non-blank row) and classifies every header.
 * Returns null for sheets without any non-blank row.
 */
export const layoutSheet = (
  catalog: LabelCatalog,
  table: TableName,
  sheet: SheetTable,
  options: LayoutOptions
): SheetLayout | null => {
  const headerIndex = sheet.rows.findIndex((row) => !isBlankRow(row));
  const headerRow = sheet.rows[headerIndex];
  if (headerIndex === -1 || headerRow === undefined) {
    return null;
  }

  const columns = new Map<string, number>();
  const months: MonthColumn[] = [];
  const extras: ExtraColumn[] = [];
  const usedKeys = new Set<string>();

  headerRow.forEach((header: CellValue, index) => {
    const text = cellText(header);
    if (text === null) {
      return;
    }

    if (options.detectMonths) {
      const month = parseMonthLabel(header);
      if (month !== null) {
        months.push({ index, month });
        return;
      }
    }

    const column = matchHeader(catalog, table, text);
    if (column !== undefined && !columns.has(column)) {
      columns.set(column, index);
      return;
    }

    let key = toAttributeKey(header, index);
    while (usedKeys.has(key)) {
      key = `${key}_${String(index + 1)}`;
    }
    usedKeys.add(key);
    extras.push({ index, key, header: text });
  });

  return { sheet: sheet.name, headerIndex, columns, months, extras };
};

/**
 * Reads the cell mapped to `column`, if the sheet has that column.
 */
export const cellFor = (
  layout: SheetLayout,
  row: readonly CellValue[],
  column: string
): CellValue | undefined => {
  const index = layout.columns.get(column);
  return index === undefined ? undefined : row[index];
};

export const missingColumns = (layout: SheetLayout, required: readonly string[]): string[] =>
  required.filter((column) => !layout.columns.has(column));
