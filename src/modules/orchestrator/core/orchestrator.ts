/**
 * Orchestrator
 *
 * Entry point for one user question:
 *
 *   persist question ─▶ route ─▶ SQL agent | semantic agent | conversation
 *                                     │
 *                  persist answer ◀───┘
 *
 * `ask` never rejects. Agent failures become a degraded response carrying a
 * user-facing message and the error type; persistence failures are logged.
 * Questions of one session are answered strictly in order.
 */

import { createDeadline, type Clock, type Deadline } from '../../../common/deadline.js';
import { describeError } from '../../../common/types/errors.js';
import { routeQuestion } from '../../intent-router/index.js';
import { completeWithin } from '../../llm/index.js';
import { runSemanticSearch, runStructuredQuery } from '../../query-agents/index.js';
import {
  buildClarification,
  buildConversationPrompt,
  CANNED_REPLY,
  CAPABILITIES_MESSAGE,
  CONVERSATION_SYSTEM_INSTRUCTIONS,
  degradationMessage,
  formatClarificationRequest,
  isHelpRequest,
  structuredAnswerText,
} from './replies.js';
import { createKeyedQueue } from './session-queue.js';

import type { AskInput, OrchestratorResponse } from './types.js';
import type { ChatHistoryRepository, ChatRole } from '../../chat-history/index.js';
import type { EmbeddingGateway } from '../../embeddings/index.js';
import type { HybridStore } from '../../hybrid-store/index.js';
import type { Classification, Route, RoutingDecision } from '../../intent-router/index.js';
import type { LabelCatalog } from '../../labels/index.js';
import type { CompletionProvider } from '../../llm/index.js';
import type { SemanticSearchOptions, StructuredQueryOptions } from '../../query-agents/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface OrchestratorDeps {
  completion: CompletionProvider;
  embeddings: EmbeddingGateway;
  store: HybridStore;
  catalog: LabelCatalog;
  chatHistory: ChatHistoryRepository;
  logger: Logger;
  /** Budget for one question, retries and repairs included */
  requestTimeoutMs: number;
  retrieval: SemanticSearchOptions;
  /** Optional SQL agent steps; all off when omitted */
  structured?: Partial<StructuredQueryOptions>;
  clock?: Clock;
}

export interface Orchestrator {
  ask(input: AskInput): Promise<OrchestratorResponse>;
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type Draft = DistributiveOmit<OrchestratorResponse, 'durationMs'>;

/** Longest session summary, taken from the first question */
const SUMMARY_LENGTH = 120;

const EMPTY_QUESTION_REPLY = 'Please type a question about the OpEx, demand or priority data.';

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const createOrchestrator = (deps: OrchestratorDeps): Orchestrator => {
  const log = deps.logger.child({ component: 'Orchestrator' });
  const clock = deps.clock ?? Date.now;
  const queue = createKeyedQueue();

  const persist = async (
    sessionId: string,
    role: ChatRole,
    content: string,
    extra?: Record<string, unknown>
  ): Promise<string | null> => {
    try {
      const saved = await deps.chatHistory.appendMessage(sessionId, role, content, extra);
      if (saved.isErr()) {
        log.warn({ sessionId, role, err: saved.error }, 'Failed to persist chat message');
        return null;
      }
      return saved.value.id;
    } catch (error) {
      log.warn({ sessionId, role, err: error }, 'Failed to persist chat message');
      return null;
    }
  };

  const summarizeSession = async (sessionId: string, question: string): Promise<void> => {
    try {
      const session = await deps.chatHistory.getSession(sessionId);
      if (session.isErr() || session.value.summary !== null) {
        return;
      }
      const updated = await deps.chatHistory.updateSummary(
        sessionId,
        question.slice(0, SUMMARY_LENGTH)
      );
      if (updated.isErr()) {
        log.warn({ sessionId, err: updated.error }, 'Failed to update session summary');
      }
    } catch (error) {
      log.warn({ sessionId, err: error }, 'Failed to update session summary');
    }
  };

  const degrade = (
    base: { sessionId: string; question: string },
    route: Route | null,
    classification: Classification | null,
    error: { type: string; message: string }
  ): Draft => ({
    ...base,
    kind: 'degraded',
    route,
    classification,
    answer: degradationMessage(error.type),
    warnings: [],
    error: { type: error.type, message: error.message },
  });

  const converse = async (
    base: { sessionId: string; question: string },
    decision: Extract<RoutingDecision, { route: 'CONVERSATIONAL' }>,
    questionMessageId: string | null,
    deadline: Deadline
  ): Promise<Draft> => {
    const reply = (answer: string, warnings: string[] = []): Draft => ({
      ...base,
      kind: 'conversational',
      route: 'CONVERSATIONAL',
      classification: decision.classification,
      lowConfidence: decision.lowConfidence,
      answer,
      warnings,
    });

    if (decision.lowConfidence) {
      return reply(buildClarification());
    }
    if (isHelpRequest(base.question)) {
      return reply(CAPABILITIES_MESSAGE);
    }

    const history = await deps.chatHistory.listMessages(base.sessionId);
    const earlier = history.isOk()
      ? history.value.filter((message) => message.id !== questionMessageId)
      : [];

    const completion = await completeWithin(
      deps.completion,
      buildConversationPrompt(base.question, earlier),
      CONVERSATION_SYSTEM_INSTRUCTIONS,
      deadline
    );
    if (completion.isErr()) {
      if (completion.error.type === 'TimeoutError') {
        return degrade(base, 'CONVERSATIONAL', decision.classification, completion.error);
      }
      log.warn({ err: completion.error }, 'Conversational reply failed, using canned reply');
      return reply(CANNED_REPLY, ['The assistant could not generate a reply.']);
    }
    return reply(completion.value.trim());
  };

  const answer = async (
    base: { sessionId: string; question: string },
    questionMessageId: string | null,
    deadline: Deadline
  ): Promise<Draft> => {
    const routed = await routeQuestion(
      { completion: deps.completion, catalog: deps.catalog, logger: deps.logger },
      { question: base.question, deadline }
    );
    if (routed.isErr()) {
      return degrade(base, null, null, routed.error);
    }

    const decision = routed.value;
    const { classification } = decision;

    switch (decision.route) {
      case 'STRUCTURED_QUERY': {
        const result = await runStructuredQuery(
          {
            completion: deps.completion,
            store: deps.store,
            catalog: deps.catalog,
            logger: deps.logger,
            ...(deps.structured !== undefined && { options: deps.structured }),
          },
          { question: base.question, refinedQuestion: decision.refinedQuestion, deadline }
        );
        if (result.isErr()) {
          return degrade(base, decision.route, classification, result.error);
        }
        const outcome = result.value;
        if (outcome.kind === 'clarification') {
          return {
            ...base,
            kind: 'clarification',
            route: 'STRUCTURED_QUERY',
            classification,
            answer: formatClarificationRequest(outcome),
            warnings: [],
            clarification: outcome,
          };
        }
        return {
          ...base,
          kind: 'structured',
          route: 'STRUCTURED_QUERY',
          classification,
          answer: structuredAnswerText(outcome),
          warnings: outcome.warnings,
          structured: outcome,
        };
      }

      case 'SEMANTIC_SEARCH': {
        const result = await runSemanticSearch(
          {
            completion: deps.completion,
            embeddings: deps.embeddings,
            store: deps.store,
            logger: deps.logger,
            options: deps.retrieval,
          },
          { question: base.question, deadline }
        );
        if (result.isErr()) {
          return degrade(base, decision.route, classification, result.error);
        }
        return {
          ...base,
          kind: 'semantic',
          route: 'SEMANTIC_SEARCH',
          classification,
          answer: result.value.answer,
          warnings: result.value.warnings,
          semantic: result.value,
        };
      }

      case 'CONVERSATIONAL':
        return converse(base, decision, questionMessageId, deadline);
    }
  };

  const handle = async (input: AskInput): Promise<OrchestratorResponse> => {
    const startedAt = clock();
    const base = { sessionId: input.sessionId, question: input.question.trim() };

    let draft: Draft;
    if (base.question === '') {
      draft = {
        ...base,
        kind: 'conversational',
        route: 'CONVERSATIONAL',
        classification: null,
        lowConfidence: false,
        answer: EMPTY_QUESTION_REPLY,
        warnings: [],
      };
    } else {
      const questionMessageId = await persist(base.sessionId, 'user', base.question);
      try {
        draft = await answer(base, questionMessageId, createDeadline(deps.requestTimeoutMs, clock));
      } catch (error) {
        log.error({ err: error, sessionId: base.sessionId }, 'Unexpected failure while answering');
        draft = degrade(base, null, null, { type: 'UnexpectedError', message: describeError(error) });
      }

      await persist(base.sessionId, 'assistant', draft.answer, {
        kind: draft.kind,
        route: draft.route,
        warnings: draft.warnings,
        ...(draft.kind === 'degraded' && { error: draft.error }),
      });
      await summarizeSession(base.sessionId, base.question);
    }

    const response: OrchestratorResponse = { ...draft, durationMs: clock() - startedAt };
    log.info(
      {
        sessionId: response.sessionId,
        kind: response.kind,
        route: response.route,
        durationMs: response.durationMs,
      },
      'Question answered'
    );
    return response;
  };

  return {
    ask(input: AskInput): Promise<OrchestratorResponse> {
      return queue.run(input.sessionId, async () => {
        try {
          return await handle(input);
        } catch (error) {
          // Only reachable if logging or persistence wrappers themselves throw
          return {
            sessionId: input.sessionId,
            question: input.question,
            kind: 'degraded',
            route: null,
            classification: null,
            answer: degradationMessage('UnexpectedError'),
            warnings: [],
            error: { type: 'UnexpectedError', message: describeError(error) },
            durationMs: 0,
          };
        }
      });
    },
  };
};
