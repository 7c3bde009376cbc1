/**
 * Demand (bpafg) normalizer.
 *
 * Melts one-row-per-key, many-month-columns sheets into one DemandRecord per
 * key tuple and month. Files already in long form (Month + Value columns) are
 * accepted as well. Blank month cells count as 0 so that a re-run overwrites a
 * month that has been cleared.
 *
 * Duplicate keys inside one file are summed: a resource split across several
 * task lines of the same project contributes its total demand. Across files
 * and runs the store keeps the last write for a key.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { cellFor, layoutSheet, missingColumns, type SheetLayout } from './sheet-layout.js';
import { createParseError, type ParseError } from '../errors.js';
import { computeIdentity } from '../identity.js';
import { parseMonthLabel } from '../months.js';
import { cellText, isBlankRow, parseAmount } from '../values.js';

import type { DemandRecord } from '../../../../common/types/records.js';
import type { CellValue, NormalizeDeps, RowOutcome, SheetTable, Workbook } from '../types.js';

export const DEMAND_REQUIRED_COLUMNS = ['resource_name', 'project_name'] as const;

interface PreparedSheet {
  readonly layout: SheetLayout;
  readonly rows: readonly (readonly CellValue[])[];
  readonly format: 'wide' | 'long';
}

interface MonthValue {
  readonly month: string;
  readonly value: number;
}

type DemandFields = Omit<DemandRecord, 'recordKey' | 'month' | 'value'>;

/**
 * Identity of a demand row: the unique key tuple.
 */
export const demandKeyFields = (
  record: Pick<DemandRecord, 'projectName' | 'resourceName' | 'deptCountry' | 'demandType' | 'month'>
): Record<string, string | null> => ({
  project_name: record.projectName,
  resource_name: record.resourceName,
  dept_country: record.deptCountry,
  demand_type: record.demandType,
  month: record.month,
});

const prepareSheet = (
  deps: NormalizeDeps,
  filename: string,
  sheet: SheetTable
): Result<PreparedSheet | null, ParseError> => {
  const layout = layoutSheet(deps.catalog, 'bpafg_demand', sheet, { detectMonths: true });
  if (layout === null) {
    return ok(null);
  }
  const location = { sheet: sheet.name, row: layout.headerIndex + 1 };

  const missing = missingColumns(layout, DEMAND_REQUIRED_COLUMNS);
  if (missing.length > 0) {
    return err(
      createParseError(filename, `Missing required column(s): ${missing.join(', ')}`, location)
    );
  }

  if (layout.months.length > 0) {
    return ok({ layout, rows: sheet.rows, format: 'wide' });
  }
  if (layout.columns.has('month') && layout.columns.has('value')) {
    return ok({ layout, rows: sheet.rows, format: 'long' });
  }
  return err(
    createParseError(
      filename,
      'No month columns recognized and no Month/Value columns to fall back on',
      location
    )
  );
};

/**
 * Validates structure and returns a restartable sequence of merged records.
 */
export const normalizeDemandWorkbook = (
  deps: NormalizeDeps,
  workbook: Workbook
): Result<Iterable<RowOutcome<DemandRecord>>, ParseError> => {
  const prepared: PreparedSheet[] = [];
  for (const sheet of workbook.sheets) {
    const result = prepareSheet(deps, workbook.filename, sheet);
    if (result.isErr()) {
      return err(result.error);
    }
    if (result.value !== null) {
      prepared.push(result.value);
    }
  }

  if (prepared.length === 0) {
    return err(createParseError(workbook.filename, 'File contains no data'));
  }

  function* outcomes(): Generator<RowOutcome<DemandRecord>> {
    // Keyed by record key; Map keeps first-seen order
    const merged = new Map<string, { record: DemandRecord; sheet: string; row: number }>();

    for (const { layout, rows, format } of prepared) {
      const sheet = layout.sheet;

      for (let index = layout.headerIndex + 1; index < rows.length; index++) {
        const cells = rows[index];
        if (cells === undefined || isBlankRow(cells)) {
          continue;
        }
        const rowNumber = index + 1;

        const resourceName = cellText(cellFor(layout, cells, 'resource_name'));
        const projectName = cellText(cellFor(layout, cells, 'project_name'));
        if (resourceName === null || projectName === null) {
          yield {
            kind: 'warning',
            warning: {
              sheet,
              row: rowNumber,
              message: resourceName === null ? 'Missing resource_name' : 'Missing project_name',
              skipped: true,
            },
          };
          continue;
        }

        const fields: DemandFields = {
          kind: 'demand',
          resourceName,
          projectName,
          taskName: cellText(cellFor(layout, cells, 'task_name')),
          homegroup: cellText(cellFor(layout, cells, 'homegroup')),
          resourceSecurityGroup: cellText(cellFor(layout, cells, 'resource_security_group')),
          primaryBl: cellText(cellFor(layout, cells, 'primary_bl')),
          deptCountry: cellText(cellFor(layout, cells, 'dept_country')),
          demandType: cellText(cellFor(layout, cells, 'demand_type')),
          sourceFile: workbook.filename,
        };

        const values: MonthValue[] = [];
        if (format === 'wide') {
          for (const column of layout.months) {
            const parsed = parseAmount(cells[column.index]);
            if (parsed.kind === 'invalid') {
              yield {
                kind: 'warning',
                warning: {
                  sheet,
                  row: rowNumber,
                  message: `Ignored non-numeric demand '${parsed.raw}' for ${column.month}`,
                  skipped: false,
                },
              };
            } else {
              values.push({ month: column.month, value: parsed.kind === 'number' ? parsed.value : 0 });
            }
          }
        } else {
          const month = parseMonthLabel(cellFor(layout, cells, 'month') ?? null);
          const parsed = parseAmount(cellFor(layout, cells, 'value'));
          if (month === null || parsed.kind === 'invalid') {
            yield {
              kind: 'warning',
              warning: {
                sheet,
                row: rowNumber,
                message: month === null ? 'Unrecognized month' : 'Invalid demand value',
                skipped: true,
              },
            };
            continue;
          }
          values.push({ month, value: parsed.kind === 'number' ? parsed.value : 0 });
        }

        for (const { month, value } of values) {
          const keyFields = { ...fields, month };
          const recordKey = computeIdentity(deps.hasher, demandKeyFields(keyFields));
          const existing = merged.get(recordKey);

          if (existing === undefined) {
            merged.set(recordKey, {
              record: { ...fields, month, value, recordKey },
              sheet,
              row: rowNumber,
            });
            continue;
          }

          merged.set(recordKey, {
            ...existing,
            record: {
              ...existing.record,
              value: new Decimal(existing.record.value).plus(value).toNumber(),
            },
          });
          yield {
            kind: 'warning',
            warning: {
              sheet,
              row: rowNumber,
              message: `Duplicate demand key for ${projectName}/${resourceName}/${month} merged into row ${String(existing.row)} (summed)`,
              skipped: false,
            },
          };
        }
      }
    }

    for (const { record, sheet, row } of merged.values()) {
      yield { kind: 'record', sheet, row, record };
    }
  }

  return ok({ [Symbol.iterator]: outcomes });
};
