import { describe, it, expect, beforeEach } from 'vitest';

import { createDeadline } from '@/common/deadline.js';
import {
  cosineDistance,
  makeInMemoryHybridStore,
  toVectorLiteral,
  type HybridStore,
} from '@/modules/hybrid-store/index.js';

import {
  embedded,
  makeDemandRecord,
  makeFinancialRecord,
  makeManualClock,
} from '../../fixtures/builders.js';
import { loadTestCatalog } from '../../fixtures/fakes.js';

const uuid = (n: number): string => `00000000-0000-0000-0000-00000000000${String(n)}`;

const alice = makeFinancialRecord({
  uuid: uuid(1),
  deptLead: 'Alice',
  actualCost: 8,
  attributes: { location: 'Austin' },
});
const bob = makeFinancialRecord({
  uuid: uuid(2),
  projectNumber: 102,
  deptLead: 'Bob',
  plannedCost: null,
  actualCost: 5,
  attributes: { location: 'Boston' },
});
const aliceSoftware = makeFinancialRecord({
  uuid: uuid(3),
  projectNumber: 103,
  deptLead: 'Alice',
  hwSw: 'SW',
  actualCost: 2.1,
});
const unassigned = makeFinancialRecord({
  uuid: uuid(4),
  projectNumber: 104,
  deptLead: null,
  actualCost: null,
});

describe('InMemoryHybridStore', () => {
  let store: HybridStore;

  beforeEach(async () => {
    store = makeInMemoryHybridStore({ catalog: loadTestCatalog(), dimensions: 3 });
    const report = await store.upsertBatch([
      embedded(alice, [1, 0, 0]),
      embedded(bob, [0, 1, 0]),
      embedded(aliceSoftware, [1, 1, 0]),
      embedded(unassigned, [1, 0, 0]),
    ]);
    expect(report.failed).toEqual([]);
  });

  describe('upsert', () => {
    it('replaces the record with the same identity', async () => {
      await store.upsert(embedded({ ...alice, actualCost: 9 }));

      const record = (await store.getFinancialRecord(alice.uuid))._unsafeUnwrap();
      expect(record?.actualCost).toBe(9);
      expect((await store.health())._unsafeUnwrap().tables.opex_data_hybrid).toBe(4);
    });

    it('rejects embeddings of the wrong dimension', async () => {
      const error = (await store.upsert(embedded(alice, [1, 0])))._unsafeUnwrapErr();

      expect(error).toMatchObject({
        type: 'QueryExecutionError',
        message: 'expected 3 dimensions, not 2',
        sqlState: '22000',
      });
    });

    it('reports per-record failures without stopping the batch', async () => {
      const report = await store.upsertBatch([
        embedded(makeFinancialRecord({ uuid: uuid(5) }), [1, 0]),
        makeDemandRecord(),
      ]);

      expect(report.succeeded).toEqual(['demand-1']);
      expect(report.failed.map((failure) => [failure.identity, failure.error.type])).toEqual([
        [uuid(5), 'QueryExecutionError'],
      ]);
      expect(report.aborted).toBeUndefined();
    });

    it('aborts the batch once the deadline has passed', async () => {
      const clock = makeManualClock();
      const deadline = createDeadline(5, clock);
      clock.advance(5);

      const report = await store.upsertBatch([makeDemandRecord(), makeDemandRecord({ recordKey: 'demand-2' })], {
        deadline,
      });

      expect(report.succeeded).toEqual([]);
      expect(report.failed.map((failure) => failure.identity)).toEqual(['demand-1', 'demand-2']);
      expect(report.aborted?.type).toBe('TimeoutError');
    });
  });

  describe('query', () => {
    it('filters on columns and attributes', async () => {
      const result = await store.query({
        table: 'opex_data_hybrid',
        select: ['uuid', 'attributes.location'],
        filters: [
          { column: 'fiscal_year', op: 'eq', value: 2025 },
          { column: 'attributes.location', op: 'contains', value: 'AUS' },
        ],
      });

      expect(result._unsafeUnwrap()).toEqual({
        table: 'opex_data_hybrid',
        columns: ['uuid', 'attributes.location'],
        rows: [{ uuid: alice.uuid, 'attributes.location': 'Austin' }],
        truncated: false,
      });
    });

    it('orders rows by identity by default and flags truncation', async () => {
      const result = (
        await store.query({ table: 'opex_data_hybrid', select: ['project_number'], limit: 2 })
      )._unsafeUnwrap();

      expect(result.rows).toEqual([{ project_number: 101 }, { project_number: 102 }]);
      expect(result.truncated).toBe(true);
    });

    it('sums exactly per group, placing null groups first when descending', async () => {
      const result = (
        await store.query({
          table: 'opex_data_hybrid',
          groupBy: ['dept_lead'],
          aggregates: [{ fn: 'sum', column: 'actual_cost', alias: 'total_actual' }],
          orderBy: [{ column: 'total_actual', direction: 'desc' }],
        })
      )._unsafeUnwrap();

      expect(result.rows).toEqual([
        { dept_lead: null, total_actual: null },
        { dept_lead: 'Alice', total_actual: 10.1 },
        { dept_lead: 'Bob', total_actual: 5 },
      ]);
    });

    it('places nulls last when ascending', async () => {
      const result = (
        await store.query({
          table: 'opex_data_hybrid',
          select: ['dept_lead'],
          orderBy: [{ column: 'dept_lead' }],
        })
      )._unsafeUnwrap();

      expect(result.rows.map((row) => row['dept_lead'])).toEqual(['Alice', 'Alice', 'Bob', null]);
    });

    it('returns one row for an ungrouped aggregate over no rows', async () => {
      const result = (
        await store.query({
          table: 'opex_data_hybrid',
          filters: [{ column: 'fiscal_year', op: 'eq', value: 1999 }],
          aggregates: [
            { fn: 'count', alias: 'lines' },
            { fn: 'sum', column: 'actual_cost', alias: 'total' },
          ],
        })
      )._unsafeUnwrap();

      expect(result.rows).toEqual([{ lines: 0, total: null }]);
    });

    it('computes min and max over text', async () => {
      const result = (
        await store.query({
          table: 'opex_data_hybrid',
          aggregates: [
            { fn: 'min', column: 'dept_lead', alias: 'first_lead' },
            { fn: 'max', column: 'dept_lead', alias: 'last_lead' },
            { fn: 'count', column: 'dept_lead', alias: 'leads' },
          ],
        })
      )._unsafeUnwrap();

      expect(result.rows).toEqual([{ first_lead: 'Alice', last_lead: 'Bob', leads: 3 }]);
    });

    it('never matches nulls in comparisons', async () => {
      const result = (
        await store.query({
          table: 'opex_data_hybrid',
          select: ['uuid'],
          filters: [{ column: 'dept_lead', op: 'neq', value: 'Alice' }],
        })
      )._unsafeUnwrap();

      expect(result.rows).toEqual([{ uuid: bob.uuid }]);
    });

    it('queries demand records', async () => {
      await store.upsertBatch([
        makeDemandRecord({ recordKey: 'k1', month: '2025-01', value: 1.5 }),
        makeDemandRecord({ recordKey: 'k2', month: '2025-01', value: 2 }),
        makeDemandRecord({ recordKey: 'k3', month: '2025-02', value: 1 }),
      ]);

      const result = (
        await store.query({
          table: 'bpafg_demand',
          groupBy: ['month'],
          aggregates: [{ fn: 'sum', column: 'value', alias: 'demand' }],
        })
      )._unsafeUnwrap();

      expect(result.rows).toEqual([
        { month: '2025-01', demand: 3.5 },
        { month: '2025-02', demand: 1 },
      ]);
    });

    it('reports unknown columns', async () => {
      const error = (
        await store.query({ table: 'opex_data_hybrid', select: ['spend'] })
      )._unsafeUnwrapErr();

      expect(error.type).toBe('SchemaError');
    });

    it('fails with TimeoutError once the deadline has passed', async () => {
      const clock = makeManualClock();
      const deadline = createDeadline(1, clock);
      clock.advance(1);

      const error = (await store.query({ table: 'bpafg_demand' }, { deadline }))._unsafeUnwrapErr();

      expect(error).toMatchObject({ type: 'TimeoutError', operation: 'query' });
    });
  });

  describe('similaritySearch', () => {
    it('orders by distance and breaks ties by identity', async () => {
      const hits = (await store.similaritySearch([1, 0, 0], 3))._unsafeUnwrap();

      expect(hits.map((hit) => hit.record.uuid)).toEqual([alice.uuid, unassigned.uuid, aliceSoftware.uuid]);
      expect(hits[0]?.distance).toBe(0);
      expect(hits[2]?.distance).toBeCloseTo(1 - 1 / Math.sqrt(2), 10);
    });

    it('returns the same hits for the same query', async () => {
      const first = await store.similaritySearch([0.3, 0.7, 0], 4);
      const second = await store.similaritySearch([0.3, 0.7, 0], 4);

      expect(first._unsafeUnwrap()).toEqual(second._unsafeUnwrap());
    });

    it('applies filters before ranking', async () => {
      const hits = (
        await store.similaritySearch([0, 1, 0], 5, [{ column: 'dept_lead', op: 'eq', value: 'Alice' }])
      )._unsafeUnwrap();

      expect(hits.map((hit) => hit.record.uuid)).toEqual([aliceSoftware.uuid, alice.uuid]);
    });

    it('rejects a non-positive k', async () => {
      const error = (await store.similaritySearch([1, 0, 0], 0))._unsafeUnwrapErr();

      expect(error).toEqual({
        type: 'InvalidQueryError',
        message: 'k must be a positive integer, got 0',
      });
    });

    it('rejects a query vector of another dimension', async () => {
      const error = (await store.similaritySearch([1, 0], 2))._unsafeUnwrapErr();

      expect(error.message).toBe('different vector dimensions 3 and 2');
    });

    it('rejects a zero query vector', async () => {
      const error = (await store.similaritySearch([0, 0, 0], 2))._unsafeUnwrapErr();

      expect(error).toEqual({
        type: 'InvalidQueryError',
        message: 'Query vector has zero magnitude',
      });
    });
  });

  describe('getFinancialRecord', () => {
    it('returns null for an unknown identity', async () => {
      expect((await store.getFinancialRecord(uuid(9)))._unsafeUnwrap()).toBeNull();
    });
  });

  describe('purge', () => {
    it('deletes only rows from the named file', async () => {
      await store.upsertBatch([
        makeDemandRecord({ recordKey: 'k1', sourceFile: 'a.csv' }),
        makeDemandRecord({ recordKey: 'k2', sourceFile: 'b.csv' }),
      ]);

      const deleted = await store.purge({ table: 'bpafg_demand', sourceFile: 'a.csv' });

      expect(deleted._unsafeUnwrap()).toBe(1);
      expect((await store.health())._unsafeUnwrap().tables).toEqual({
        opex_data_hybrid: 4,
        bpafg_demand: 1,
        priority_template: 0,
      });
    });

    it('empties a whole table', async () => {
      expect((await store.purge({ table: 'opex_data_hybrid' }))._unsafeUnwrap()).toBe(4);
      expect((await store.similaritySearch([1, 0, 0], 1))._unsafeUnwrap()).toEqual([]);
    });
  });
});

describe('cosineDistance', () => {
  it('is zero for vectors pointing the same way', () => {
    expect(cosineDistance([1, 2, 3], [2, 4, 6])).toBeCloseTo(0, 12);
  });

  it('is two for opposite vectors', () => {
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
  });

  it('treats a zero vector as orthogonal', () => {
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });

  it('throws on a dimension mismatch', () => {
    expect(() => cosineDistance([1], [1, 0])).toThrow('Vector dimensions differ: 1 vs 2');
  });

  it('formats the pgvector literal', () => {
    expect(toVectorLiteral([0.5, -1, 2])).toBe('[0.5,-1,2]');
  });
});
