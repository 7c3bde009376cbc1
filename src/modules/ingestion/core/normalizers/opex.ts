/**
 * OpEx workbook normalizer.
 *
 * Every worksheet row becomes a FinancialRecord. Headers are mapped onto the
 * declared `opex_data_hybrid` columns through the label catalog; unmapped
 * headers land in the attribute bag.
 */

import { err, ok, type Result } from 'neverthrow';

import { cellFor, layoutSheet, missingColumns, type SheetLayout } from './sheet-layout.js';
import { createParseError, type ParseError } from '../errors.js';
import { deriveDataType } from '../file-category.js';
import { computeIdentity, formatDigestAsUuid, type IdentityValue } from '../identity.js';
import { cellText, isBlankRow, parseAmount, parseFiscalYear, parseInteger, toAttributeValue } from '../values.js';

import type {
  AttributeValue,
  FinancialRecord,
  OpexDataType,
} from '../../../../common/types/records.js';
import type { CellValue, NormalizeDeps, RowOutcome, RowWarning, Workbook } from '../types.js';

export const OPEX_REQUIRED_COLUMNS = ['fiscal_year', 'project_number'] as const;

interface PreparedSheet {
  readonly layout: SheetLayout;
  readonly rows: readonly (readonly CellValue[])[];
  readonly dataType: OpexDataType;
}

const skip = (sheet: string, row: number, message: string): RowOutcome<FinancialRecord> => ({
  kind: 'warning',
  warning: { sheet, row, message, skipped: true },
});

/**
 * Builds the identity-relevant field set: every dimension, the unit and the
 * attribute bag. Measures and provenance are excluded so that a corrected
 * amount replaces the earlier row instead of adding a new one.
 */
export const opexIdentityFields = (
  record: Omit<FinancialRecord, 'uuid'>
): Record<string, IdentityValue> => {
  const fields: Record<string, IdentityValue> = {
    data_type: record.dataType,
    fiscal_year: record.fiscalYear,
    project_number: record.projectNumber,
    dept_lead: record.deptLead,
    hw_sw: record.hwSw,
  };
  for (const [key, value] of Object.entries(record.attributes)) {
    fields[`attributes.${key}`] = value;
  }
  return fields;
};

const normalizeRow = (
  deps: NormalizeDeps,
  filename: string,
  prepared: PreparedSheet,
  cells: readonly CellValue[],
  rowNumber: number
): RowOutcome<FinancialRecord> => {
  const { layout, dataType } = prepared;
  const sheet = layout.sheet;

  const fiscalYear = parseFiscalYear(cellFor(layout, cells, 'fiscal_year'));
  if (fiscalYear.kind !== 'number') {
    return skip(
      sheet,
      rowNumber,
      fiscalYear.kind === 'blank'
        ? 'Missing fiscal_year'
        : `Invalid fiscal_year '${fiscalYear.raw}'`
    );
  }

  const projectNumber = parseInteger(cellFor(layout, cells, 'project_number'));
  if (projectNumber.kind !== 'number') {
    return skip(
      sheet,
      rowNumber,
      projectNumber.kind === 'blank'
        ? 'Missing project_number'
        : `Invalid project_number '${projectNumber.raw}'`
    );
  }

  const planned = parseAmount(cellFor(layout, cells, 'planned_cost'));
  if (planned.kind === 'invalid') {
    return skip(sheet, rowNumber, `Invalid planned_cost '${planned.raw}'`);
  }
  const actual = parseAmount(cellFor(layout, cells, 'actual_cost'));
  if (actual.kind === 'invalid') {
    return skip(sheet, rowNumber, `Invalid actual_cost '${actual.raw}'`);
  }

  const attributes: Record<string, AttributeValue> = {};
  for (const extra of layout.extras) {
    const value = toAttributeValue(cells[extra.index]);
    if (value !== null) {
      attributes[extra.key] = value;
    }
  }

  const content: Omit<FinancialRecord, 'uuid'> = {
    kind: 'opex',
    sourceFile: filename,
    sourceSheet: sheet,
    dataType,
    fiscalYear: fiscalYear.value,
    projectNumber: projectNumber.value,
    deptLead: cellText(cellFor(layout, cells, 'dept_lead')),
    hwSw: cellText(cellFor(layout, cells, 'hw_sw')),
    plannedCost: planned.kind === 'number' ? planned.value : null,
    actualCost: actual.kind === 'number' ? actual.value : null,
    attributes,
  };

  const uuid = formatDigestAsUuid(computeIdentity(deps.hasher, opexIdentityFields(content)));

  return { kind: 'record', sheet, row: rowNumber, record: { ...content, uuid } };
};

/**
 * Validates the workbook structure and returns a restartable record sequence.
 *
 * Fails with a ParseError naming the sheet when a sheet has a header row but
 * lacks a required column. Sheets with no content are reported as notices.
 */
export const normalizeOpexWorkbook = (
  deps: NormalizeDeps,
  workbook: Workbook
): Result<Iterable<RowOutcome<FinancialRecord>>, ParseError> => {
  const prepared: PreparedSheet[] = [];
  const notices: RowWarning[] = [];

  for (const sheet of workbook.sheets) {
    const layout = layoutSheet(deps.catalog, 'opex_data_hybrid', sheet, { detectMonths: false });
    if (layout === null) {
      notices.push({ sheet: sheet.name, row: 0, message: 'Sheet is empty', skipped: false });
      continue;
    }

    const missing = missingColumns(layout, OPEX_REQUIRED_COLUMNS);
    if (missing.length > 0) {
      return err(
        createParseError(workbook.filename, `Missing required column(s): ${missing.join(', ')}`, {
          sheet: sheet.name,
          row: layout.headerIndex + 1,
        })
      );
    }

    prepared.push({ layout, rows: sheet.rows, dataType: deriveDataType(sheet.name) });
  }

  if (prepared.length === 0) {
    return err(createParseError(workbook.filename, 'Workbook contains no data sheets'));
  }

  function* outcomes(): Generator<RowOutcome<FinancialRecord>> {
    for (const warning of notices) {
      yield { kind: 'warning', warning };
    }
    for (const sheet of prepared) {
      for (let index = sheet.layout.headerIndex + 1; index < sheet.rows.length; index++) {
        const cells = sheet.rows[index];
        if (cells === undefined || isBlankRow(cells)) {
          continue;
        }
        yield normalizeRow(deps, workbook.filename, sheet, cells, index + 1);
      }
    }
  }

  return ok({ [Symbol.iterator]: outcomes });
};
