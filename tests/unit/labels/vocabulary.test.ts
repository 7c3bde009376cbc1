import { describe, it, expect } from 'vitest';

import {
  describeSchema,
  findRelevantColumns,
  formatRelevantColumns,
  rewriteQuestion,
} from '@/modules/labels/index.js';

import { loadTestCatalog } from '../../fixtures/fakes.js';

describe('rewriteQuestion', () => {
  const catalog = loadTestCatalog();

  it('rewrites business terms to column names', () => {
    expect(rewriteQuestion(catalog, 'total spend last quarter')).toBe(
      'total actual_cost last quarter'
    );
  });

  it('prefers the longest matching term', () => {
    expect(rewriteQuestion(catalog, 'actual spend by manager')).toBe('actual_cost by dept_lead');
    expect(rewriteQuestion(catalog, 'planned spend for FY25')).toBe('planned_cost for FY25');
  });

  it('matches terms case-insensitively and across whitespace runs', () => {
    expect(rewriteQuestion(catalog, 'Budget per  Department   Lead')).toBe(
      'planned_cost per dept_lead'
    );
  });

  it('rewrites attribute terms to attribute references', () => {
    expect(rewriteQuestion(catalog, 'spend by region')).toBe(
      'actual_cost by attributes.home_dept_region_r1'
    );
  });

  it('leaves words that only contain a term untouched', () => {
    expect(rewriteQuestion(catalog, 'planning offsite spendthrift')).toBe(
      'planning offsite spendthrift'
    );
  });

  it('is idempotent', () => {
    const questions = [
      'total spend last quarter',
      'budget versus actuals by manager and region',
      'headcount per project ranked by rank',
      'fiscal year 2025 project number 100 spending',
    ];

    for (const question of questions) {
      const once = rewriteQuestion(catalog, question);
      expect(rewriteQuestion(catalog, once)).toBe(once);
    }
  });
});

describe('findRelevantColumns', () => {
  const catalog = loadTestCatalog();

  it('finds columns named through vocabulary terms', () => {
    const columns = findRelevantColumns(catalog, 'total spend by manager');

    expect(columns.map((c) => `${c.table}.${c.column}`)).toEqual([
      'opex_data_hybrid.dept_lead',
      'opex_data_hybrid.actual_cost',
    ]);
  });

  it('finds columns referenced by their literal name', () => {
    const columns = findRelevantColumns(catalog, 'sum of actual_cost');

    expect(columns).toContainEqual({
      table: 'opex_data_hybrid',
      column: 'actual_cost',
      description: 'Actual cost (ODS actuals), in the unit given by data_type',
    });
  });

  it('formats an empty list with a fixed notice', () => {
    expect(formatRelevantColumns([])).toBe('No specific schema mappings found for this question.');
  });

  it('formats one line per column', () => {
    expect(
      formatRelevantColumns([{ table: 'bpafg_demand', column: 'value', description: 'Demand' }])
    ).toBe('Relevant schema information:\n- bpafg_demand.value: Demand');
  });
});

describe('describeSchema', () => {
  it('lists every table, attribute and vocabulary term', () => {
    const digest = describeSchema(loadTestCatalog());
    const lines = digest.split('\n');

    expect(lines[0]).toBe(
      'Table opex_data_hybrid: OpEx ledger lines per fiscal period, project and department, with an embedding for semantic search'
    );
    expect(lines).toContain('  - fiscal_year (integer): Fiscal year of the ledger line');
    expect(lines).toContain(
      '  - attributes.location (text, attribute bag): Site or location of the cost'
    );
    expect(lines[lines.length - 1]).toMatch(/^Business vocabulary: actual spend -> actual_cost; actuals -> actual_cost; /);
  });
});
