import { ok, type Result } from 'neverthrow';
import { describe, it, expect, beforeEach } from 'vitest';

import { makeInMemoryHybridStore, type HybridStore } from '@/modules/hybrid-store/index.js';
import {
  CANNED_REPLY,
  CAPABILITIES_MESSAGE,
  buildClarification,
  createOrchestrator,
  degradationMessage,
  type Orchestrator,
} from '@/modules/orchestrator/index.js';

import { embedded, makeFinancialRecord, makeManualClock } from '../../fixtures/builders.js';
import {
  hangingCompletion,
  loadTestCatalog,
  makeFakeChatHistory,
  makeFakeCompletion,
  makeFakeEmbeddingGateway,
  makeSilentLogger,
  overrideStore,
  type CompletionStep,
  type FakeChatHistoryOptions,
} from '../../fixtures/fakes.js';

import type { ChatHistoryRepository } from '@/modules/chat-history/index.js';
import type { CompletionError } from '@/modules/llm/index.js';
import type { StructuredQueryOptions } from '@/modules/query-agents/index.js';

const STRUCTURED = '{"route": "STRUCTURED_QUERY", "confidence": 0.9, "reasoning": "totals"}';
const SEMANTIC = '{"route": "SEMANTIC_SEARCH", "confidence": 0.8}';
const CONVERSATIONAL = '{"route": "CONVERSATIONAL", "confidence": 0.9}';
const TOTAL_BY_LEAD =
  '{"query": {"table": "opex_data_hybrid", "groupBy": ["dept_lead"], "aggregates": [{"fn": "sum", "column": "actual_cost", "alias": "total_actual"}]}}';
const UNKNOWN_COLUMN = '{"query": {"table": "opex_data_hybrid", "select": ["total_cost"]}}';

describe('Orchestrator', () => {
  let store: HybridStore;
  let chatHistory: ChatHistoryRepository;
  let sessionId: string;

  beforeEach(async () => {
    store = makeInMemoryHybridStore({ catalog: loadTestCatalog(), dimensions: 3 });
    await store.upsert(
      embedded(makeFinancialRecord({ attributes: { project_desc: 'Apollo migration' } }))
    );
    chatHistory = makeFakeChatHistory();
    sessionId = (await chatHistory.createSession())._unsafeUnwrap().sessionId;
  });

  const build = (
    script: CompletionStep[],
    overrides: {
      store?: HybridStore;
      chatHistory?: ChatHistoryRepository;
      requestTimeoutMs?: number;
      structured?: Partial<StructuredQueryOptions>;
    } = {}
  ): Orchestrator =>
    createOrchestrator({
      completion: makeFakeCompletion(script),
      embeddings: makeFakeEmbeddingGateway(),
      store: overrides.store ?? store,
      catalog: loadTestCatalog(),
      chatHistory: overrides.chatHistory ?? chatHistory,
      logger: makeSilentLogger(),
      requestTimeoutMs: overrides.requestTimeoutMs ?? 5_000,
      retrieval: { topK: 2, topN: 2, paraphrases: 0 },
      ...(overrides.structured !== undefined && { structured: overrides.structured }),
      clock: makeManualClock(),
    });

  const messages = async () =>
    (await chatHistory.listMessages(sessionId))._unsafeUnwrap().map((m) => [m.role, m.content]);

  describe('structured questions', () => {
    it('answers with the query narrative and records the exchange', async () => {
      const orchestrator = build([STRUCTURED, TOTAL_BY_LEAD]);

      const response = await orchestrator.ask({ sessionId, question: ' total spend by manager ' });

      expect(response).toMatchObject({
        sessionId,
        question: 'total spend by manager',
        kind: 'structured',
        route: 'STRUCTURED_QUERY',
        answer: 'The query returned 1 row. total_actual: 8.',
        warnings: [],
        durationMs: 0,
      });
      expect(response.kind === 'structured' && response.structured.refinedQuestion).toBe(
        'total actual_cost by dept_lead'
      );

      const saved = (await chatHistory.listMessages(sessionId))._unsafeUnwrap();
      expect(saved.map((m) => [m.role, m.content])).toEqual([
        ['user', 'total spend by manager'],
        ['assistant', 'The query returned 1 row. total_actual: 8.'],
      ]);
      expect(saved[1]?.extra).toEqual({ kind: 'structured', route: 'STRUCTURED_QUERY', warnings: [] });
      expect((await chatHistory.getSession(sessionId))._unsafeUnwrap().summary).toBe(
        'total spend by manager'
      );
    });

    it('appends the analysis and returns follow-up questions', async () => {
      const orchestrator = build(
        [STRUCTURED, TOTAL_BY_LEAD, 'Alice is the only lead with spend.', '["Spend by project?"]'],
        { structured: { analyze: true, followUps: 1 } }
      );

      const response = await orchestrator.ask({ sessionId, question: 'total spend by manager' });

      expect(response.answer).toBe(
        'The query returned 1 row. total_actual: 8.\n\nAlice is the only lead with spend.'
      );
      expect(response.kind === 'structured' && response.structured.followUps).toEqual([
        'Spend by project?',
      ]);
    });

    it('asks the user to clarify a vague question', async () => {
      const orchestrator = build(
        [
          STRUCTURED,
          '{"isClear": false, "confidence": 0.2, "interpretedAs": "total actual cost", "clarifyingQuestions": ["Which fiscal year?"], "suggestions": ["total actual cost by dept_lead for FY2025"]}',
        ],
        { structured: { checkClarity: true } }
      );

      const response = await orchestrator.ask({ sessionId, question: 'total spend by manager' });

      const expected = [
        'To answer this accurately I need a little more detail:',
        '- Which fiscal year?',
        '',
        'My best reading of the question: total actual cost',
        '',
        'You could also ask:',
        '- total actual cost by dept_lead for FY2025',
      ].join('\n');
      expect(response).toMatchObject({
        kind: 'clarification',
        route: 'STRUCTURED_QUERY',
        answer: expected,
        clarification: { clarifyingQuestions: ['Which fiscal year?'] },
      });
      const saved = (await chatHistory.listMessages(sessionId))._unsafeUnwrap();
      expect(saved[1]?.extra).toEqual({ kind: 'clarification', route: 'STRUCTURED_QUERY', warnings: [] });
    });

    it('degrades when every query attempt fails', async () => {
      const orchestrator = build([STRUCTURED, UNKNOWN_COLUMN, UNKNOWN_COLUMN, UNKNOWN_COLUMN]);

      const response = await orchestrator.ask({ sessionId, question: 'total spend by manager' });

      expect(response).toMatchObject({
        kind: 'degraded',
        route: 'STRUCTURED_QUERY',
        answer: degradationMessage('QueryFailedError'),
        error: { type: 'QueryFailedError' },
      });
      const saved = (await chatHistory.listMessages(sessionId))._unsafeUnwrap();
      expect(saved[1]?.extra).toMatchObject({
        kind: 'degraded',
        error: { type: 'QueryFailedError' },
      });
    });

    it('degrades instead of rejecting when the store throws', async () => {
      const broken = overrideStore(store, {
        query: async () => {
          throw new Error('boom');
        },
      });
      const orchestrator = build([STRUCTURED, TOTAL_BY_LEAD], { store: broken });

      const response = await orchestrator.ask({ sessionId, question: 'total spend by manager' });

      expect(response).toMatchObject({
        kind: 'degraded',
        route: null,
        answer: 'Something went wrong while answering. Please try again.',
        error: { type: 'UnexpectedError', message: 'boom' },
      });
    });
  });

  describe('semantic questions', () => {
    it('answers with citations', async () => {
      const orchestrator = build([SEMANTIC, 'Apollo migration is the main line [R1].']);

      const response = await orchestrator.ask({ sessionId, question: 'describe the Apollo work' });

      expect(response.kind).toBe('semantic');
      expect(response.answer).toBe('Apollo migration is the main line [R1].');
      expect(response.kind === 'semantic' && response.semantic.references.map((r) => r.label)).toEqual([
        'R1',
      ]);
    });
  });

  describe('conversational questions', () => {
    it('asks for clarification when routing is unsure', async () => {
      const orchestrator = build(['{"route": "STRUCTURED_QUERY", "confidence": 0.4}']);

      const response = await orchestrator.ask({ sessionId, question: 'numbers?' });

      expect(response).toMatchObject({
        kind: 'conversational',
        lowConfidence: true,
        answer: buildClarification(),
      });
    });

    it('lists capabilities for help requests', async () => {
      const orchestrator = build([CONVERSATIONAL]);

      const response = await orchestrator.ask({ sessionId, question: 'What can you do?' });

      expect(response.answer).toBe(CAPABILITIES_MESSAGE);
    });

    it('includes earlier messages in the prompt', async () => {
      const completion = makeFakeCompletion([CONVERSATIONAL, CONVERSATIONAL, ' Hello! ']);
      const orchestrator = createOrchestrator({
        completion,
        embeddings: makeFakeEmbeddingGateway(),
        store,
        catalog: loadTestCatalog(),
        chatHistory,
        logger: makeSilentLogger(),
        requestTimeoutMs: 5_000,
        retrieval: { topK: 2, topN: 2, paraphrases: 0 },
      });

      await orchestrator.ask({ sessionId, question: 'what can you do?' });
      const response = await orchestrator.ask({ sessionId, question: 'hello there' });

      expect(response.answer).toBe('Hello!');
      const prompt = completion.calls[2]?.prompt ?? '';
      expect(prompt.startsWith('Conversation so far:\nuser: what can you do?\nassistant: I can help with:')).toBe(
        true
      );
      expect(prompt.endsWith('\n\nUser: hello there')).toBe(true);
    });

    it('falls back to a canned reply when the model fails', async () => {
      const orchestrator = build([CONVERSATIONAL]);

      const response = await orchestrator.ask({ sessionId, question: 'hello there' });

      expect(response).toMatchObject({
        kind: 'conversational',
        answer: CANNED_REPLY,
        warnings: ['The assistant could not generate a reply.'],
      });
    });

    it('replies to an empty question without recording it', async () => {
      const orchestrator = build([]);

      const response = await orchestrator.ask({ sessionId, question: '   ' });

      expect(response).toMatchObject({ kind: 'conversational', classification: null });
      expect(await messages()).toEqual([]);
    });
  });

  describe('failures', () => {
    it('degrades when routing runs out of time', async () => {
      const orchestrator = build([hangingCompletion], { requestTimeoutMs: 20 });

      const response = await orchestrator.ask({ sessionId, question: 'total spend' });

      expect(response).toMatchObject({
        kind: 'degraded',
        route: null,
        classification: null,
        answer: 'That question took too long to answer. Try a narrower question.',
        error: { type: 'TimeoutError' },
      });
    });

    it('degrades when the conversational reply runs out of time', async () => {
      const orchestrator = build([CONVERSATIONAL, hangingCompletion], { requestTimeoutMs: 50 });

      const response = await orchestrator.ask({ sessionId, question: 'hello there' });

      expect(response).toMatchObject({
        kind: 'degraded',
        route: 'CONVERSATIONAL',
        answer: 'That question took too long to answer. Try a narrower question.',
        error: { type: 'TimeoutError' },
      });
    });

    it.each<[string, FakeChatHistoryOptions]>([
      ['appends fail', { failAppend: true }],
      ['the database is down', { simulateDbError: true }],
    ])('still answers when %s', async (_label, options) => {
      const orchestrator = build([CONVERSATIONAL], { chatHistory: makeFakeChatHistory(options) });

      const response = await orchestrator.ask({ sessionId, question: 'what can you do?' });

      expect(response.answer).toBe(CAPABILITIES_MESSAGE);
    });
  });

  describe('ordering', () => {
    it('answers questions of one session in the order they were asked', async () => {
      const slowClassification = (): Promise<Result<string, CompletionError>> =>
        new Promise((resolve) => {
          setTimeout(() => {
            resolve(ok(CONVERSATIONAL));
          }, 20);
        });
      const orchestrator = build([slowClassification, CONVERSATIONAL, 'Hi!']);

      const [first, second] = await Promise.all([
        orchestrator.ask({ sessionId, question: 'help' }),
        orchestrator.ask({ sessionId, question: 'hello there' }),
      ]);

      expect(first.answer).toBe(CAPABILITIES_MESSAGE);
      expect(second.answer).toBe('Hi!');
      expect(await messages()).toEqual([
        ['user', 'help'],
        ['assistant', CAPABILITIES_MESSAGE],
        ['user', 'hello there'],
        ['assistant', 'Hi!'],
      ]);
    });
  });
});
