/**
 * Integration tests for the chat REST API
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { makeInMemoryHybridStore } from '@/modules/hybrid-store/index.js';

import { embedded, makeFinancialRecord, makeTestConfig } from '../fixtures/builders.js';
import {
  loadTestCatalog,
  makeFakeChatHistory,
  makeFakeCompletion,
  makeFakeEmbeddingGateway,
  makeSilentLogger,
  type CompletionStep,
  type FakeChatHistoryOptions,
} from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

const STRUCTURED = '{"route": "STRUCTURED_QUERY", "confidence": 0.9}';
const TOTAL_BY_LEAD =
  '{"query": {"table": "opex_data_hybrid", "groupBy": ["dept_lead"], "aggregates": [{"fn": "sum", "column": "actual_cost", "alias": "total_actual"}]}, "chartType": "bar"}';
const CLEAR = '{"isClear": true, "confidence": 0.9, "interpretedAs": "actual cost per lead"}';
const ANALYSIS = 'Alice is the only lead with recorded spend.';
const FOLLOW_UPS = '["Which projects make up Alice\'s spend?", "How does planned compare to actual?"]';
const ANSWER = `The query returned 1 row. total_actual: 8.\n\n${ANALYSIS}`;
const MISSING_SESSION = '3f1c2b9a-8d4e-4f6a-9b1c-2d3e4f5a6b7c';

describe('Chat REST API', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app !== undefined) {
      await app.close();
      app = undefined;
    }
  });

  const start = async (
    script: CompletionStep[] = [],
    chatOptions: FakeChatHistoryOptions = {}
  ): Promise<FastifyInstance> => {
    const catalog = loadTestCatalog();
    const store = makeInMemoryHybridStore({ catalog, dimensions: 3 });
    await store.upsert(embedded(makeFinancialRecord()));

    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        config: makeTestConfig(),
        logger: makeSilentLogger(),
        catalog,
        store,
        chatHistory: makeFakeChatHistory(chatOptions),
        completion: makeFakeCompletion(script),
        embeddings: makeFakeEmbeddingGateway(),
      },
    });
    return app;
  };

  const createSession = async (server: FastifyInstance): Promise<string> => {
    const response = await server.inject({ method: 'POST', url: '/api/v1/chat/sessions' });
    const body: { data: { sessionId: string } } = response.json();
    return body.data.sessionId;
  };

  describe('POST /api/v1/chat/sessions', () => {
    it('creates a session', async () => {
      const server = await start();

      const response = await server.inject({ method: 'POST', url: '/api/v1/chat/sessions' });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toMatchObject({ ok: true, data: { summary: null } });
    });

    it('returns 500 when the history store fails', async () => {
      const server = await start([], { simulateDbError: true });

      const response = await server.inject({ method: 'POST', url: '/api/v1/chat/sessions' });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ChatDatabaseError',
        message: 'Simulated database error',
      });
    });
  });

  describe('POST /api/v1/chat/sessions/:sessionId/questions', () => {
    it('answers a structured question and records the exchange', async () => {
      const server = await start([STRUCTURED, CLEAR, TOTAL_BY_LEAD, ANALYSIS, FOLLOW_UPS]);
      const sessionId = await createSession(server);

      const response = await server.inject({
        method: 'POST',
        url: `/api/v1/chat/sessions/${sessionId}/questions`,
        payload: { question: 'total spend by manager' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        ok: true,
        data: {
          sessionId,
          kind: 'structured',
          route: 'STRUCTURED_QUERY',
          answer: ANSWER,
          structured: {
            refinedQuestion: 'total actual_cost by dept_lead',
            attempts: 1,
            interpretedAs: 'actual cost per lead',
            analysis: ANALYSIS,
            followUps: ["Which projects make up Alice's spend?", 'How does planned compare to actual?'],
            chart: { type: 'bar', labels: ['Alice'] },
          },
        },
      });

      const history = await server.inject({
        method: 'GET',
        url: `/api/v1/chat/sessions/${sessionId}/messages`,
      });
      const messages: { data: { role: string; content: string }[] } = history.json();
      expect(messages.data.map((m) => [m.role, m.content])).toEqual([
        ['user', 'total spend by manager'],
        ['assistant', ANSWER],
      ]);

      const sessions = await server.inject({ method: 'GET', url: '/api/v1/chat/sessions' });
      expect(sessions.json()).toMatchObject({
        ok: true,
        data: [{ sessionId, summary: 'total spend by manager' }],
      });
    });

    it('returns 200 with a degraded answer when the model is down', async () => {
      const server = await start([]);
      const sessionId = await createSession(server);

      const response = await server.inject({
        method: 'POST',
        url: `/api/v1/chat/sessions/${sessionId}/questions`,
        payload: { question: 'total spend last quarter' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        ok: true,
        data: {
          kind: 'degraded',
          route: 'STRUCTURED_QUERY',
          error: { type: 'ProviderError' },
        },
      });
    });

    it('returns 404 for an unknown session', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: `/api/v1/chat/sessions/${MISSING_SESSION}/questions`,
        payload: { question: 'total spend' },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'NotFoundError',
        message: `Chat session with id '${MISSING_SESSION}' not found`,
      });
    });

    it('rejects an empty question', async () => {
      const server = await start();
      const sessionId = await createSession(server);

      const response = await server.inject({
        method: 'POST',
        url: `/api/v1/chat/sessions/${sessionId}/questions`,
        payload: { question: '' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ ok: false, error: 'ValidationError' });
    });

    it('rejects a session id that is not a UUID', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/chat/sessions/not-a-uuid/questions',
        payload: { question: 'total spend' },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /api/v1/chat/sessions', () => {
    it('rejects a page size out of range', async () => {
      const server = await start();

      const response = await server.inject({ method: 'GET', url: '/api/v1/chat/sessions?limit=0' });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('DELETE /api/v1/chat/sessions/:sessionId', () => {
    it('deletes the session and its messages', async () => {
      const server = await start();
      const sessionId = await createSession(server);

      const deleted = await server.inject({
        method: 'DELETE',
        url: `/api/v1/chat/sessions/${sessionId}`,
      });
      const history = await server.inject({
        method: 'GET',
        url: `/api/v1/chat/sessions/${sessionId}/messages`,
      });

      expect(deleted.statusCode).toBe(200);
      expect(deleted.json()).toEqual({ ok: true });
      expect(history.statusCode).toBe(404);
    });
  });

  it('returns 404 for unknown routes', async () => {
    const server = await start();

    const response = await server.inject({ method: 'GET', url: '/api/v1/unknown' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: 'NotFoundError',
      message: 'Route GET /api/v1/unknown not found',
    });
  });
});
