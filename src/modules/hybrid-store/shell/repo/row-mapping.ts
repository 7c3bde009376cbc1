/**
 * Conversion of pg result values into canonical records and result values.
 *
 * pg returns NUMERIC and BIGINT as strings and JSONB as parsed objects.
 */

import { isNumericType } from '../../core/resolve-query.js';

import type { ColumnType } from '../../../labels/index.js';
import type { ResolvedAggregate, ResultValue } from '../../core/types.js';
import type {
  AttributeBag,
  AttributeValue,
  FinancialRecord,
} from '../../../../common/types/records.js';

export const OPEX_SELECT = [
  'uuid',
  'source_file',
  'source_sheet',
  'data_type',
  'fiscal_year',
  'project_number',
  'dept_lead',
  'hw_sw',
  'planned_cost',
  'actual_cost',
  'additional_data',
] as const;

export interface OpexRow {
  uuid: string;
  source_file: string | null;
  source_sheet: string | null;
  data_type: string;
  fiscal_year: number;
  project_number: string;
  dept_lead: string | null;
  hw_sw: string | null;
  planned_cost: string | null;
  actual_cost: string | null;
  additional_data: Record<string, unknown>;
}

export const toNumberOrNull = (value: unknown): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

export const toAttributeBag = (value: unknown): AttributeBag => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  const bag: Record<string, AttributeValue> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (
      entry === null ||
      typeof entry === 'string' ||
      typeof entry === 'number' ||
      typeof entry === 'boolean'
    ) {
      bag[key] = entry;
    }
  }
  return bag;
};

export const toColumnValue = (type: ColumnType, value: unknown): AttributeValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (isNumericType(type)) {
    return toNumberOrNull(value);
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return typeof value === 'boolean' ? value : String(value);
};

export const toAggregateValue = (aggregate: ResolvedAggregate, value: unknown): ResultValue => {
  if (aggregate.fn === 'min' || aggregate.fn === 'max') {
    return aggregate.ref === null ? toNumberOrNull(value) : toColumnValue(aggregate.ref.type, value);
  }
  return toNumberOrNull(value);
};

export const mapOpexRow = (row: OpexRow): FinancialRecord => ({
  kind: 'opex',
  uuid: row.uuid,
  sourceFile: row.source_file,
  sourceSheet: row.source_sheet,
  dataType: row.data_type === 'mm' ? 'mm' : 'dollar',
  fiscalYear: row.fiscal_year,
  projectNumber: Number(row.project_number),
  deptLead: row.dept_lead,
  hwSw: row.hw_sw,
  plannedCost: toNumberOrNull(row.planned_cost),
  actualCost: toNumberOrNull(row.actual_cost),
  attributes: toAttributeBag(row.additional_data),
});
