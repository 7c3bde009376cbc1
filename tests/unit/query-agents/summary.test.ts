import { describe, it, expect } from 'vitest';

import { resolveQuery, type ResultSet } from '@/modules/hybrid-store/index.js';
import { formatAmount, measuresOf, summarizeResult } from '@/modules/query-agents/index.js';

import { loadTestCatalog } from '../../fixtures/fakes.js';

const byLead: ResultSet = {
  table: 'opex_data_hybrid',
  columns: ['dept_lead', 'total_actual'],
  rows: [
    { dept_lead: 'Alice', total_actual: 10.1 },
    { dept_lead: 'Bob', total_actual: 5 },
    { dept_lead: null, total_actual: null },
  ],
  truncated: false,
};

describe('measuresOf', () => {
  it('treats numeric row columns as additive measures', () => {
    const query = resolveQuery(loadTestCatalog(), {
      table: 'opex_data_hybrid',
      select: ['dept_lead', 'fiscal_year', 'planned_cost', 'actual_cost'],
    })._unsafeUnwrap();

    expect(measuresOf(query)).toEqual([
      { column: 'planned_cost', additive: true },
      { column: 'actual_cost', additive: true },
    ]);
  });

  it('treats only sums and counts as additive', () => {
    const query = resolveQuery(loadTestCatalog(), {
      table: 'opex_data_hybrid',
      groupBy: ['dept_lead'],
      aggregates: [
        { fn: 'avg', column: 'actual_cost', alias: 'avg_actual' },
        { fn: 'count', alias: 'lines' },
      ],
    })._unsafeUnwrap();

    expect(measuresOf(query)).toEqual([
      { column: 'avg_actual', additive: false },
      { column: 'lines', additive: true },
    ]);
  });
});

describe('formatAmount', () => {
  it('rounds to two decimals with grouping', () => {
    expect(formatAmount(1234.567)).toBe('1,234.57');
    expect(formatAmount(5)).toBe('5');
  });
});

describe('summarizeResult', () => {
  it('states totals, the highest row and missing values', () => {
    const summary = summarizeResult(byLead, [{ column: 'total_actual', additive: true }], null);

    expect(summary.narrative).toBe(
      'The query returned 3 rows. Total total_actual: 15.1. Highest total_actual: 10.1 (Alice).'
    );
    expect(summary.warnings).toEqual(['1 of 3 rows have no value for total_actual.']);
    expect(summary.chart).toEqual({
      type: 'bar',
      labelColumn: 'dept_lead',
      labels: ['Alice', 'Bob', '(blank)'],
      series: [{ name: 'total_actual', values: [10.1, 5, null] }],
    });
  });

  it('omits totals for averages', () => {
    const summary = summarizeResult(byLead, [{ column: 'total_actual', additive: false }], null);

    expect(summary.narrative).toBe('The query returned 3 rows. Highest total_actual: 10.1 (Alice).');
  });

  it('charts months as a line unless another type is requested', () => {
    const byMonth: ResultSet = {
      table: 'bpafg_demand',
      columns: ['month', 'demand'],
      rows: [
        { month: '2025-01', demand: 3.5 },
        { month: '2025-02', demand: 1 },
      ],
      truncated: false,
    };
    const measures = [{ column: 'demand', additive: true }];

    expect(summarizeResult(byMonth, measures, null).chart?.type).toBe('line');
    expect(summarizeResult(byMonth, measures, 'pie').chart?.type).toBe('pie');
    expect(summarizeResult(byMonth, measures, 'table').chart).toBeNull();
  });

  it('reports single values without a chart when there is no label column', () => {
    const totals: ResultSet = {
      table: 'opex_data_hybrid',
      columns: ['lines', 'total'],
      rows: [{ lines: 4, total: 15.1 }],
      truncated: false,
    };

    const summary = summarizeResult(
      totals,
      [
        { column: 'lines', additive: true },
        { column: 'total', additive: true },
      ],
      'bar'
    );

    expect(summary).toEqual({
      narrative: 'The query returned 1 row. lines: 4. total: 15.1.',
      warnings: [],
      chart: null,
    });
  });

  it('warns when the result was truncated', () => {
    const summary = summarizeResult(
      {
        table: 'opex_data_hybrid',
        columns: ['uuid'],
        rows: [{ uuid: 'a' }, { uuid: 'b' }],
        truncated: true,
      },
      [],
      null
    );

    expect(summary).toEqual({
      narrative: 'The query returned 2 rows (more rows matched than were returned).',
      warnings: ['Only the first 2 rows are shown; more rows matched.'],
      chart: null,
    });
  });

  it('explains an empty result', () => {
    const summary = summarizeResult({ ...byLead, rows: [] }, [{ column: 'total_actual', additive: true }], 'bar');

    expect(summary).toEqual({
      narrative: 'The query returned no rows.',
      warnings: ['No rows matched the query filters.'],
      chart: null,
    });
  });
});
