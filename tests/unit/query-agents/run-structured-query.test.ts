import { err, type Result } from 'neverthrow';
import { describe, it, expect, beforeEach } from 'vitest';

import { createDeadline } from '@/common/deadline.js';
import { createProviderError } from '@/common/types/errors.js';
import {
  createQueryExecutionError,
  createStoreUnavailableError,
  makeInMemoryHybridStore,
  type HybridStore,
} from '@/modules/hybrid-store/index.js';
import { createEmptyCompletionError } from '@/modules/llm/index.js';
import {
  MAX_QUERY_ATTEMPTS,
  runStructuredQuery,
  type StructuredAnswer,
  type StructuredOutcome,
  type StructuredQueryError,
  type StructuredQueryOptions,
} from '@/modules/query-agents/index.js';

import { embedded, makeFinancialRecord } from '../../fixtures/builders.js';
import {
  hangingCompletion,
  loadTestCatalog,
  makeFakeCompletion,
  makeSilentLogger,
  overrideStore,
  type CompletionStep,
} from '../../fixtures/fakes.js';

const TOTAL_BY_LEAD =
  '{"query": {"table": "opex_data_hybrid", "groupBy": ["dept_lead"], "aggregates": [{"fn": "sum", "column": "actual_cost", "alias": "total_actual"}], "orderBy": [{"column": "total_actual", "direction": "desc"}]}, "explanation": "Sums actuals per lead", "chartType": "bar"}';
const UNKNOWN_COLUMN = '{"query": {"table": "opex_data_hybrid", "select": ["total_cost"]}}';
const UNKNOWN_COLUMN_ERROR = "Unknown column 'total_cost' for table 'opex_data_hybrid'";
const VAGUE =
  '{"isClear": false, "confidence": 0.3, "interpretedAs": "total spend", "issues": ["No period given"], "clarifyingQuestions": ["Which fiscal year?", " which fiscal year? "], "suggestions": ["total actual_cost by dept_lead for FY2025"]}';
const CLEAR_ENOUGH =
  '{"isClear": false, "confidence": 0.7, "interpretedAs": "actual cost per lead", "clarifyingQuestions": ["Which year?"]}';

const answered = async (
  result: Promise<Result<StructuredOutcome, StructuredQueryError>>
): Promise<StructuredAnswer> => {
  const outcome = (await result)._unsafeUnwrap();
  if (outcome.kind !== 'answer') {
    throw new Error(`Expected an answer, got ${outcome.kind}`);
  }
  return outcome;
};

describe('runStructuredQuery', () => {
  let store: HybridStore;

  beforeEach(async () => {
    store = makeInMemoryHybridStore({ catalog: loadTestCatalog(), dimensions: 3 });
    await store.upsertBatch([
      embedded(
        makeFinancialRecord({
          uuid: '00000000-0000-0000-0000-000000000001',
          deptLead: 'Alice',
          actualCost: 8,
        })
      ),
      embedded(
        makeFinancialRecord({
          uuid: '00000000-0000-0000-0000-000000000002',
          projectNumber: 102,
          deptLead: 'Bob',
          actualCost: 5,
        })
      ),
    ]);
  });

  const run = (
    script: CompletionStep[],
    overrides: {
      store?: HybridStore;
      options?: Partial<StructuredQueryOptions>;
      deadlineMs?: number;
    } = {}
  ) => {
    const completion = makeFakeCompletion(script);
    const result = runStructuredQuery(
      {
        completion,
        store: overrides.store ?? store,
        catalog: loadTestCatalog(),
        logger: makeSilentLogger(),
        ...(overrides.options !== undefined && { options: overrides.options }),
      },
      {
        question: 'total spend by manager',
        refinedQuestion: 'total actual_cost by dept_lead',
        ...(overrides.deadlineMs !== undefined && { deadline: createDeadline(overrides.deadlineMs) }),
      }
    );
    return { completion, result };
  };

  it('answers on the first attempt', async () => {
    const { result, completion } = run([TOTAL_BY_LEAD]);

    const answer = await answered(result);

    expect(answer.attempts).toBe(1);
    expect(answer.question).toBe('total spend by manager');
    expect(answer.refinedQuestion).toBe('total actual_cost by dept_lead');
    expect(answer.explanation).toBe('Sums actuals per lead');
    expect(answer.result.rows).toEqual([
      { dept_lead: 'Alice', total_actual: 8 },
      { dept_lead: 'Bob', total_actual: 5 },
    ]);
    expect(answer.narrative).toBe(
      'The query returned 2 rows. Total total_actual: 13. Highest total_actual: 8 (Alice).'
    );
    expect(answer.chart).toEqual({
      type: 'bar',
      labelColumn: 'dept_lead',
      labels: ['Alice', 'Bob'],
      series: [{ name: 'total_actual', values: [8, 5] }],
    });
    expect(answer).toMatchObject({ interpretedAs: null, analysis: null, followUps: [] });
    expect(completion.calls).toHaveLength(1);
    expect(completion.calls[0]?.prompt).toContain('Question: total actual_cost by dept_lead');
  });

  it('repairs a query using the error from the previous attempt', async () => {
    const { result, completion } = run([UNKNOWN_COLUMN, TOTAL_BY_LEAD]);

    const answer = await answered(result);

    expect(answer.attempts).toBe(2);
    expect(completion.calls[1]?.prompt).toContain(
      `Attempt 1 failed.\nQuery: {"table":"opex_data_hybrid","select":["total_cost"]}\nError: ${UNKNOWN_COLUMN_ERROR}\n\nReturn a corrected query.`
    );
  });

  it('fails with QueryFailedError after the last attempt', async () => {
    const { result, completion } = run([UNKNOWN_COLUMN, UNKNOWN_COLUMN, UNKNOWN_COLUMN, TOTAL_BY_LEAD]);

    const error = (await result)._unsafeUnwrapErr();

    expect(completion.calls).toHaveLength(MAX_QUERY_ATTEMPTS);
    expect(error).toMatchObject({
      type: 'QueryFailedError',
      message: `Query failed after 3 attempts: ${UNKNOWN_COLUMN_ERROR}`,
      lastError: UNKNOWN_COLUMN_ERROR,
      lastQuery: '{"table":"opex_data_hybrid","select":["total_cost"]}',
    });
    expect(error.type === 'QueryFailedError' && error.attempts.map((a) => a.attempt)).toEqual([1, 2, 3]);
  });

  it('counts unusable and empty completions as attempts', async () => {
    const { result } = run(['I am not sure.', createEmptyCompletionError(), '{"query": {"table": "payroll"}}']);

    const error = (await result)._unsafeUnwrapErr();

    expect(error.type === 'QueryFailedError' && error.attempts).toMatchObject([
      { attempt: 1, query: 'I am not sure.', errorType: 'MalformedCompletionError' },
      { attempt: 2, query: null, errorType: 'EmptyCompletionError' },
      { attempt: 3, query: '{"query": {"table": "payroll"}}', errorType: 'InvalidQueryError' },
    ]);
  });

  it('retries after an execution error', async () => {
    let failed = false;
    const flaky = overrideStore(store, {
      query: async (spec, options) => {
        if (!failed) {
          failed = true;
          return err(createQueryExecutionError('query', 'division by zero', '22012'));
        }
        return store.query(spec, options);
      },
    });

    const { result } = run([TOTAL_BY_LEAD, TOTAL_BY_LEAD], { store: flaky });

    expect((await answered(result)).attempts).toBe(2);
  });

  it('stops at once when the provider fails', async () => {
    const { result, completion } = run([createProviderError('completion', 'quota exceeded')]);

    const error = (await result)._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'ProviderError', message: 'quota exceeded' });
    expect(completion.calls).toHaveLength(1);
  });

  it('stops at once when the store is unavailable', async () => {
    const down = overrideStore(store, {
      query: async () => err(createStoreUnavailableError('query')),
    });

    const { result, completion } = run([TOTAL_BY_LEAD, TOTAL_BY_LEAD], { store: down });

    const error = (await result)._unsafeUnwrapErr();

    expect(error.type).toBe('StoreUnavailableError');
    expect(completion.calls).toHaveLength(1);
  });

  describe('clarity check', () => {
    const options = { checkClarity: true };

    it('asks for clarification instead of querying a vague question', async () => {
      const { result, completion } = run([VAGUE, TOTAL_BY_LEAD], { options });

      expect((await result)._unsafeUnwrap()).toEqual({
        kind: 'clarification',
        question: 'total spend by manager',
        refinedQuestion: 'total actual_cost by dept_lead',
        interpretedAs: 'total spend',
        issues: ['No period given'],
        clarifyingQuestions: ['Which fiscal year?'],
        suggestions: ['total actual_cost by dept_lead for FY2025'],
      });
      expect(completion.calls).toHaveLength(1);
      expect(completion.calls[0]?.prompt).toMatch(/\n\nQuestion: total actual_cost by dept_lead$/);
    });

    it('plans the question when the check is confident enough', async () => {
      const { result, completion } = run([CLEAR_ENOUGH, TOTAL_BY_LEAD], { options });

      const answer = await answered(result);

      expect(answer.attempts).toBe(1);
      expect(answer.interpretedAs).toBe('actual cost per lead');
      expect(completion.calls).toHaveLength(2);
    });

    it('plans the question as asked when the check fails', async () => {
      const { result } = run([createProviderError('completion', 'quota exceeded'), TOTAL_BY_LEAD], {
        options,
      });

      const answer = await answered(result);

      expect(answer.attempts).toBe(1);
      expect(answer.interpretedAs).toBeNull();
    });

    it('plans the question as asked when the check is unusable', async () => {
      const { result } = run(['{"isClear": "maybe"}', TOTAL_BY_LEAD], { options });

      expect((await answered(result)).attempts).toBe(1);
    });

    it('fails with TimeoutError when the check runs out of time', async () => {
      const { result } = run([hangingCompletion], { options, deadlineMs: 50 });

      expect((await result)._unsafeUnwrapErr().type).toBe('TimeoutError');
    });
  });

  describe('analysis and follow-up questions', () => {
    const options = { analyze: true, followUps: 2 };

    it('adds the analysis and distinct follow-up questions', async () => {
      const { result, completion } = run(
        [
          TOTAL_BY_LEAD,
          ' Alice accounts for most of the actual spend. ',
          '["Which projects drive Alice\'s spend?", "Total spend by manager", "which projects drive alice\'s spend?", "How did spend change by quarter?", "What about Bob?"]',
        ],
        { options }
      );

      const answer = await answered(result);

      expect(answer.analysis).toBe('Alice accounts for most of the actual spend.');
      expect(answer.followUps).toEqual([
        "Which projects drive Alice's spend?",
        'How did spend change by quarter?',
      ]);
      expect(completion.calls[1]?.prompt).toMatch(/^Question: total spend by manager\nQuery: \{"table":"opex_data_hybrid"/);
      expect(completion.calls[1]?.prompt).toContain('\nExplanation: Sums actuals per lead\nResult: [{');
      expect(completion.calls[2]?.prompt).toMatch(
        /^Suggest 2 follow-up questions\.\nQuestion: total spend by manager\nResult: \[\{/
      );
    });

    it('keeps the answer when the extras fail', async () => {
      const { result } = run(
        [TOTAL_BY_LEAD, createProviderError('completion', 'quota exceeded'), 'Nothing to add.'],
        { options }
      );

      const answer = await answered(result);

      expect(answer.narrative).toBe(
        'The query returned 2 rows. Total total_actual: 13. Highest total_actual: 8 (Alice).'
      );
      expect(answer.analysis).toBeNull();
      expect(answer.followUps).toEqual([]);
    });

    it('caps follow-up questions at three', async () => {
      const { result, completion } = run([TOTAL_BY_LEAD, '["A?", "B?", "C?", "D?"]'], {
        options: { followUps: 9 },
      });

      const answer = await answered(result);

      expect(answer.followUps).toEqual(['A?', 'B?', 'C?']);
      expect(completion.calls[1]?.prompt).toMatch(/^Suggest 3 follow-up questions\./);
    });

    it('fails with TimeoutError when the analysis runs out of time', async () => {
      const { result } = run([TOTAL_BY_LEAD, hangingCompletion], { options, deadlineMs: 50 });

      expect((await result)._unsafeUnwrapErr().type).toBe('TimeoutError');
    });
  });
});
