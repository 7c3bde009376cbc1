import { describe, it, expect } from 'vitest';

import { createDeadline } from '@/common/deadline.js';
import {
  CONFIDENCE_THRESHOLD,
  classifyByKeywords,
  decideRoute,
  routeQuestion,
  type Classification,
} from '@/modules/intent-router/index.js';
import { rewriteQuestion } from '@/modules/labels/index.js';

import {
  hangingCompletion,
  loadTestCatalog,
  makeFakeCompletion,
  makeSilentLogger,
  type CompletionStep,
} from '../../fixtures/fakes.js';

const classification = (overrides: Partial<Classification> = {}): Classification => ({
  route: 'STRUCTURED_QUERY',
  confidence: 0.9,
  reasoning: 'test',
  source: 'model',
  ...overrides,
});

const route = (script: CompletionStep[], question: string, deadlineMs?: number) => {
  const completion = makeFakeCompletion(script);
  const result = routeQuestion(
    { completion, catalog: loadTestCatalog(), logger: makeSilentLogger() },
    { question, ...(deadlineMs !== undefined && { deadline: createDeadline(deadlineMs) }) }
  );
  return { completion, result };
};

describe('decideRoute', () => {
  const catalog = loadTestCatalog();

  it('answers conversationally below the confidence threshold', () => {
    const decision = decideRoute(catalog, 'total spend', classification({ confidence: 0.59 }));

    expect(decision.route).toBe('CONVERSATIONAL');
    expect(decision.route === 'CONVERSATIONAL' && decision.lowConfidence).toBe(true);
  });

  it('accepts a classification at exactly the threshold', () => {
    const decision = decideRoute(
      catalog,
      'total spend',
      classification({ confidence: CONFIDENCE_THRESHOLD })
    );

    expect(decision.route).toBe('STRUCTURED_QUERY');
  });

  it('does not flag a low-confidence conversational prediction', () => {
    const decision = decideRoute(
      catalog,
      'hmm',
      classification({ route: 'CONVERSATIONAL', confidence: 0.3 })
    );

    expect(decision).toMatchObject({ route: 'CONVERSATIONAL', lowConfidence: false });
  });

  it('keeps the question unchanged for semantic search', () => {
    const decision = decideRoute(
      catalog,
      'describe spend on Apollo',
      classification({ route: 'SEMANTIC_SEARCH', confidence: 0.7 })
    );

    expect(decision).toEqual({
      route: 'SEMANTIC_SEARCH',
      question: 'describe spend on Apollo',
      classification: classification({ route: 'SEMANTIC_SEARCH', confidence: 0.7 }),
    });
  });
});

describe('classifyByKeywords', () => {
  it.each([
    ['total spend last quarter', 'STRUCTURED_QUERY', 0.75],
    ['top 5 projects by actual cost', 'STRUCTURED_QUERY', 0.75],
    ['Describe the Apollo migration work', 'SEMANTIC_SEARCH', 0.7],
    ['hello there', 'CONVERSATIONAL', 0.8],
    ['tell a joke', 'CONVERSATIONAL', 0.5],
  ])('classifies %s', (question, expectedRoute, expectedConfidence) => {
    const result = classifyByKeywords(question);

    expect(result.route).toBe(expectedRoute);
    expect(result.confidence).toBe(expectedConfidence);
    expect(result.source).toBe('keywords');
  });
});

describe('routeQuestion', () => {
  it('routes a confident structured question with the rewritten copy', async () => {
    const { result, completion } = route(
      ['{"route": "STRUCTURED_QUERY", "confidence": 0.82, "reasoning": "aggregate over a period"}'],
      'total spend last quarter'
    );

    const decision = (await result)._unsafeUnwrap();

    expect(decision).toEqual({
      route: 'STRUCTURED_QUERY',
      question: 'total spend last quarter',
      refinedQuestion: 'total actual_cost last quarter',
      classification: {
        route: 'STRUCTURED_QUERY',
        confidence: 0.82,
        reasoning: 'aggregate over a period',
        source: 'model',
      },
    });
    expect(completion.calls).toHaveLength(1);
    expect(completion.calls[0]?.prompt).toMatch(/\n\nQuestion: total spend last quarter$/);
    expect(completion.calls[0]?.systemInstructions).toContain('STRUCTURED_QUERY');
  });

  it('produces a refined question that rewriting leaves unchanged', async () => {
    const { result } = route(
      ['{"route": "STRUCTURED_QUERY", "confidence": 0.9}'],
      'budget versus actuals by manager'
    );

    const decision = (await result)._unsafeUnwrap();

    expect(decision.route).toBe('STRUCTURED_QUERY');
    if (decision.route === 'STRUCTURED_QUERY') {
      expect(decision.refinedQuestion).toBe('planned_cost versus actual_cost by dept_lead');
      expect(rewriteQuestion(loadTestCatalog(), decision.refinedQuestion)).toBe(
        decision.refinedQuestion
      );
    }
  });

  it('reads a classification wrapped in a code fence', async () => {
    const { result } = route(
      ['```json\n{"route": "SEMANTIC_SEARCH", "confidence": 0.7}\n```'],
      'what did the Apollo team buy'
    );

    const decision = (await result)._unsafeUnwrap();

    expect(decision.route).toBe('SEMANTIC_SEARCH');
    expect(decision.classification.reasoning).toBe('');
  });

  it('answers conversationally when the model is unsure', async () => {
    const { result } = route(
      ['{"route": "SEMANTIC_SEARCH", "confidence": 0.4}'],
      'anything interesting?'
    );

    const decision = (await result)._unsafeUnwrap();

    expect(decision).toMatchObject({ route: 'CONVERSATIONAL', lowConfidence: true });
  });

  it('falls back to keywords when the provider fails', async () => {
    const { result } = route([], 'total spend last quarter');

    const decision = (await result)._unsafeUnwrap();

    expect(decision.route).toBe('STRUCTURED_QUERY');
    expect(decision.classification).toMatchObject({ confidence: 0.75, source: 'keywords' });
  });

  it('falls back to keywords when the reply is not a classification', async () => {
    const { result } = route(['{"route": "SQL", "confidence": 0.9}'], 'hello');

    const decision = (await result)._unsafeUnwrap();

    expect(decision.route).toBe('CONVERSATIONAL');
    expect(decision.classification.source).toBe('keywords');
  });

  it('fails with TimeoutError when the budget runs out', async () => {
    const { result } = route([hangingCompletion], 'total spend', 20);

    const error = (await result)._unsafeUnwrapErr();

    expect(error.type).toBe('TimeoutError');
  });
});
