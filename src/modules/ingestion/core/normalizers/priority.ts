/**
 * Priority template normalizer.
 *
 * Accepts either wide month columns (each cell is the monthly capacity for that
 * month) or long form with an optional Month column. Duplicate
 * (project, country, month) rows are left to the store, where the later row in
 * file order wins.
 */

import { err, ok, type Result } from 'neverthrow';

import { cellFor, layoutSheet, missingColumns, type SheetLayout } from './sheet-layout.js';
import { createParseError, type ParseError } from '../errors.js';
import { computeIdentity } from '../identity.js';
import { parseMonthLabel } from '../months.js';
import { cellText, isBlankRow, parseAmount, parseInteger, type ParsedNumber } from '../values.js';

import type { PriorityRecord } from '../../../../common/types/records.js';
import type { CellValue, NormalizeDeps, RowOutcome, Workbook } from '../types.js';

export const PRIORITY_REQUIRED_COLUMNS = ['project', 'priority'] as const;

interface PreparedSheet {
  readonly layout: SheetLayout;
  readonly rows: readonly (readonly CellValue[])[];
}

export const priorityKeyFields = (
  record: Pick<PriorityRecord, 'project' | 'country' | 'month'>
): Record<string, string | null> => ({
  project: record.project,
  country: record.country,
  month: record.month,
});

const numberOrNull = (parsed: ParsedNumber): number | null =>
  parsed.kind === 'number' ? parsed.value : null;

type RowBuild =
  | { readonly ok: true; readonly records: PriorityRecord[] }
  | { readonly ok: false; readonly message: string };

const buildRecords = (
  deps: NormalizeDeps,
  filename: string,
  layout: SheetLayout,
  cells: readonly CellValue[]
): RowBuild => {
  const project = cellText(cellFor(layout, cells, 'project'));
  if (project === null) {
    return { ok: false, message: 'Missing project' };
  }

  const priority = parseInteger(cellFor(layout, cells, 'priority'));
  if (priority.kind !== 'number') {
    return {
      ok: false,
      message: priority.kind === 'blank' ? 'Missing priority' : `Invalid priority '${priority.raw}'`,
    };
  }

  const targetCapacity = parseAmount(cellFor(layout, cells, 'target_capacity'));
  const countryCost = parseAmount(cellFor(layout, cells, 'country_cost'));
  if (targetCapacity.kind === 'invalid' || countryCost.kind === 'invalid') {
    return { ok: false, message: 'Invalid target capacity or country cost' };
  }

  const base = {
    kind: 'priority' as const,
    project,
    priority: priority.value,
    country: cellText(cellFor(layout, cells, 'country')),
    targetCapacity: numberOrNull(targetCapacity),
    countryCost: numberOrNull(countryCost),
    sourceFile: filename,
  };

  const make = (month: string | null, monthlyCapacity: number | null): PriorityRecord => ({
    ...base,
    month,
    monthlyCapacity,
    recordKey: computeIdentity(deps.hasher, priorityKeyFields({ ...base, month })),
  });

  if (layout.months.length > 0) {
    const records: PriorityRecord[] = [];
    for (const column of layout.months) {
      const capacity = parseAmount(cells[column.index]);
      if (capacity.kind === 'invalid') {
        return {
          ok: false,
          message: `Invalid monthly capacity '${capacity.raw}' for ${column.month}`,
        };
      }
      if (capacity.kind === 'number') {
        records.push(make(column.month, capacity.value));
      }
    }
    return { ok: true, records };
  }

  const monthCell = cellFor(layout, cells, 'month') ?? null;
  const monthText = cellText(monthCell);
  const month = monthText === null ? null : parseMonthLabel(monthCell);
  if (monthText !== null && month === null) {
    return { ok: false, message: `Unrecognized month '${monthText}'` };
  }
  const monthly = parseAmount(cellFor(layout, cells, 'monthly_capacity'));
  if (monthly.kind === 'invalid') {
    return { ok: false, message: `Invalid monthly capacity '${monthly.raw}'` };
  }
  return { ok: true, records: [make(month, numberOrNull(monthly))] };
};

/**
 * Validates structure and returns a restartable sequence of priority records.
 */
export const normalizePriorityWorkbook = (
  deps: NormalizeDeps,
  workbook: Workbook
): Result<Iterable<RowOutcome<PriorityRecord>>, ParseError> => {
  const prepared: PreparedSheet[] = [];

  for (const sheet of workbook.sheets) {
    const layout = layoutSheet(deps.catalog, 'priority_template', sheet, { detectMonths: true });
    if (layout === null) {
      continue;
    }
    const missing = missingColumns(layout, PRIORITY_REQUIRED_COLUMNS);
    if (missing.length > 0) {
      return err(
        createParseError(workbook.filename, `Missing required column(s): ${missing.join(', ')}`, {
          sheet: sheet.name,
          row: layout.headerIndex + 1,
        })
      );
    }
    prepared.push({ layout, rows: sheet.rows });
  }

  if (prepared.length === 0) {
    return err(createParseError(workbook.filename, 'File contains no data'));
  }

  function* outcomes(): Generator<RowOutcome<PriorityRecord>> {
    for (const { layout, rows } of prepared) {
      for (let index = layout.headerIndex + 1; index < rows.length; index++) {
        const cells = rows[index];
        if (cells === undefined || isBlankRow(cells)) {
          continue;
        }
        const built = buildRecords(deps, workbook.filename, layout, cells);
        if (!built.ok) {
          yield {
            kind: 'warning',
            warning: { sheet: layout.sheet, row: index + 1, message: built.message, skipped: true },
          };
          continue;
        }
        for (const record of built.records) {
          yield { kind: 'record', sheet: layout.sheet, row: index + 1, record };
        }
      }
    }
  }

  return ok({ [Symbol.iterator]: outcomes });
};
