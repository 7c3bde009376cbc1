/**
 * Row-derived narrative, data-quality warnings and chart data.
 *
 * Everything stated here is computed from the result set; the question text
 * is never consulted.
 */

import { Decimal } from 'decimal.js';

import type { ChartData, ChartType, ResultSummary } from './types.js';
import type { ResolvedQuery, ResultRow, ResultSet, ResultValue } from '../../hybrid-store/index.js';

export interface Measure {
  readonly column: string;
  /** Totals across rows are meaningful (plain amounts, sums, counts) */
  readonly additive: boolean;
}

const TIME_COLUMNS = new Set(['month', 'fiscal_year', 'attributes.fiscal_quarter']);
const MONTH_KEY = /^\d{4}-\d{2}$/;

export const measuresOf = (query: ResolvedQuery): Measure[] =>
  query.mode === 'rows'
    ? query.select
        .filter((column) => column.ref.type === 'numeric')
        .map((column) => ({ column: column.alias, additive: true }))
    : query.aggregates.map((aggregate) => ({
        column: aggregate.alias,
        additive: aggregate.fn === 'sum' || aggregate.fn === 'count',
      }));

export const formatAmount = (value: Decimal.Value): string =>
  new Decimal(value)
    .toDecimalPlaces(2)
    .toNumber()
    .toLocaleString('en-US', { maximumFractionDigits: 2 });

const numberIn = (row: ResultRow, column: string): number | null => {
  const value = row[column];
  return typeof value === 'number' ? value : null;
};

const labelText = (value: ResultValue | undefined): string => {
  if (value === null || value === undefined) {
    return '(blank)';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
};

const pickLabelColumn = (result: ResultSet, measures: readonly Measure[]): string | null =>
  result.columns.find(
    (column) => column !== 'attributes' && !measures.some((measure) => measure.column === column)
  ) ?? null;

const buildChart = (
  result: ResultSet,
  measures: readonly Measure[],
  labelColumn: string | null,
  requested: ChartType | null
): ChartData | null => {
  if (requested === 'table' || labelColumn === null || measures.length === 0) {
    return null;
  }
  if (result.rows.length === 0) {
    return null;
  }

  const labels = result.rows.map((row) => labelText(row[labelColumn]));
  const looksTemporal =
    TIME_COLUMNS.has(labelColumn) || labels.every((label) => MONTH_KEY.test(label));

  return {
    type: requested ?? (looksTemporal ? 'line' : 'bar'),
    labelColumn,
    labels,
    series: measures.map((measure) => ({
      name: measure.column,
      values: result.rows.map((row) => numberIn(row, measure.column)),
    })),
  };
};

export const summarizeResult = (
  result: ResultSet,
  measures: readonly Measure[],
  chartType: ChartType | null
): ResultSummary => {
  const { rows } = result;
  const count = rows.length;
  const labelColumn = pickLabelColumn(result, measures);

  if (count === 0) {
    return {
      narrative: 'The query returned no rows.',
      warnings: ['No rows matched the query filters.'],
      chart: null,
    };
  }

  const parts = [
    `The query returned ${String(count)} ${count === 1 ? 'row' : 'rows'}${result.truncated ? ' (more rows matched than were returned)' : ''}.`,
  ];
  const warnings: string[] = [];
  if (result.truncated) {
    warnings.push(`Only the first ${String(count)} rows are shown; more rows matched.`);
  }

  for (const measure of measures) {
    const values = rows
      .map((row) => numberIn(row, measure.column))
      .filter((value): value is number => value !== null);

    const missing = count - values.length;
    if (missing > 0) {
      warnings.push(`${String(missing)} of ${String(count)} rows have no value for ${measure.column}.`);
    }
    if (values.length === 0) {
      continue;
    }

    if (count === 1) {
      parts.push(`${measure.column}: ${formatAmount(values[0] ?? 0)}.`);
    } else if (measure.additive) {
      const total = values.reduce((sum, value) => sum.plus(value), new Decimal(0));
      parts.push(`Total ${measure.column}: ${formatAmount(total)}.`);
    }
  }

  const [primary] = measures;
  if (primary !== undefined && count > 1) {
    let bestIndex = -1;
    let bestValue = 0;
    for (const [index, row] of rows.entries()) {
      const value = numberIn(row, primary.column);
      if (value !== null && (bestIndex === -1 || value > bestValue)) {
        bestIndex = index;
        bestValue = value;
      }
    }
    if (bestIndex !== -1) {
      const index = bestIndex;
      const value = bestValue;
      const label =
        labelColumn === null ? `row ${String(index + 1)}` : labelText(rows[index]?.[labelColumn]);
      parts.push(`Highest ${primary.column}: ${formatAmount(value)} (${label}).`);
    }
  }

  return {
    narrative: parts.join(' '),
    warnings,
    chart: buildChart(result, measures, labelColumn, chartType),
  };
};
