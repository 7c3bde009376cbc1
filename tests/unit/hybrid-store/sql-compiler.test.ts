import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from 'kysely';
import { describe, it, expect } from 'vitest';

import { compileQuery, resolveQuery, type QuerySpec } from '@/modules/hybrid-store/index.js';

import { loadTestCatalog } from '../../fixtures/fakes.js';

// Compiles without a connection
const db = new Kysely<Record<string, never>>({
  dialect: {
    createAdapter: () => new PostgresAdapter(),
    createDriver: () => new DummyDriver(),
    createIntrospector: (kysely) => new PostgresIntrospector(kysely),
    createQueryCompiler: () => new PostgresQueryCompiler(),
  },
});

const compile = (spec: QuerySpec, fetchLimit = 201) => {
  const query = resolveQuery(loadTestCatalog(), spec)._unsafeUnwrap();
  const compiled = compileQuery(query, fetchLimit).compile(db);
  return { sql: compiled.sql, parameters: compiled.parameters };
};

describe('compileQuery', () => {
  it('compiles a row query with bound filter values', () => {
    const { sql, parameters } = compile(
      {
        table: 'opex_data_hybrid',
        select: ['fiscal_year', 'attributes.location'],
        filters: [{ column: 'fiscal_year', op: 'eq', value: 2025 }],
        limit: 10,
      },
      11
    );

    expect(sql).toBe(
      'select "fiscal_year" as "fiscal_year", (additional_data->>\'location\') as "attributes.location" from "opex_data_hybrid" where "fiscal_year" = $1 order by "uuid" collate "C" asc limit $2'
    );
    expect(parameters).toEqual([2025, 11]);
  });

  it('compiles an aggregate query with alias ordering and group tie-break', () => {
    const { sql, parameters } = compile({
      table: 'opex_data_hybrid',
      groupBy: ['dept_lead'],
      aggregates: [{ fn: 'sum', column: 'actual_cost', alias: 'total' }],
      orderBy: [{ column: 'total', direction: 'desc' }],
    });

    expect(sql).toBe(
      'select "dept_lead" as "dept_lead", sum("actual_cost") as "total" from "opex_data_hybrid" group by "dept_lead" order by "total" desc, "dept_lead" collate "C" asc limit $1'
    );
    expect(parameters).toEqual([201]);
  });

  it('compiles count(*) without a group', () => {
    const { sql } = compile({
      table: 'bpafg_demand',
      aggregates: [{ fn: 'count', alias: 'n' }],
    });

    expect(sql).toBe('select count(*) as "n" from "bpafg_demand" limit $1');
  });

  it('escapes LIKE wildcards in contains filters', () => {
    const { sql, parameters } = compile({
      table: 'opex_data_hybrid',
      select: ['uuid'],
      filters: [{ column: 'dept_lead', op: 'contains', value: '50%_off' }],
    });

    expect(sql).toContain('where "dept_lead"::text ilike $1 ');
    expect(parameters[0]).toBe('%50\\%\\_off%');
  });

  it('binds every value of an in filter', () => {
    const { sql, parameters } = compile({
      table: 'opex_data_hybrid',
      select: ['uuid'],
      filters: [
        { column: 'project_number', op: 'in', values: [101, 102] },
        { column: 'hw_sw', op: 'is_null', value: false },
      ],
    });

    expect(sql).toContain('where "project_number" in ($1, $2) and "hw_sw" is not null order by');
    expect(parameters).toEqual([101, 102, 201]);
  });

  it('compares text ranges by code unit', () => {
    const { sql, parameters } = compile({
      table: 'bpafg_demand',
      select: ['record_key'],
      filters: [{ column: 'month', op: 'between', from: '2025-01', to: '2025-03' }],
    });

    expect(sql).toContain('where "month" collate "C" between $1 and $2');
    expect(parameters).toEqual(['2025-01', '2025-03', 201]);
  });

  it('selects the attribute bag for default OpEx row queries', () => {
    const { sql } = compile({ table: 'opex_data_hybrid', limit: 5 }, 6);

    expect(sql).toContain('"actual_cost" as "actual_cost", additional_data as "attributes" from');
  });
});
