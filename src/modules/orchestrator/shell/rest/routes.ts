/**
 * Chat REST Routes
 *
 * Sessions, their message history, and questions answered by the orchestrator.
 */

import {
  AnswerResponseSchema,
  AskBodySchema,
  ErrorResponseSchema,
  ListSessionsQuerySchema,
  MessageListResponseSchema,
  OkResponseSchema,
  SessionIdParamsSchema,
  SessionListResponseSchema,
  SessionResponseSchema,
  type AskBody,
  type ListSessionsQuery,
  type SessionIdParams,
} from './schemas.js';
import { getHttpStatusForError } from '../../../chat-history/index.js';

import type { Orchestrator } from '../../core/orchestrator.js';
import type {
  ChatHistoryError,
  ChatHistoryRepository,
  ChatMessage,
  ChatSession,
} from '../../../chat-history/index.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeChatRoutesDeps {
  chatHistory: ChatHistoryRepository;
  orchestrator: Orchestrator;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function formatSession(session: ChatSession) {
  return {
    sessionId: session.sessionId,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
    summary: session.summary,
  };
}

function formatMessage(message: ChatMessage) {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
    createdAt: message.createdAt.toISOString(),
    extra: message.extra,
  };
}

function sendError(reply: FastifyReply, error: ChatHistoryError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeChatRoutes = (deps: MakeChatRoutesDeps): FastifyPluginAsync => {
  const { chatHistory, orchestrator } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/chat/sessions - Start a session
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      '/api/v1/chat/sessions',
      {
        schema: {
          response: {
            201: SessionResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const result = await chatHistory.createSession();
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply.status(201).send({ ok: true, data: formatSession(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/chat/sessions - Recent sessions
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ListSessionsQuery }>(
      '/api/v1/chat/sessions',
      {
        schema: {
          querystring: ListSessionsQuerySchema,
          response: {
            200: SessionListResponseSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await chatHistory.listSessions(request.query.limit ?? 20);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: result.value.map(formatSession) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/chat/sessions/:sessionId/messages - History, oldest first
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: SessionIdParams }>(
      '/api/v1/chat/sessions/:sessionId/messages',
      {
        schema: {
          params: SessionIdParamsSchema,
          response: {
            200: MessageListResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await chatHistory.listMessages(request.params.sessionId);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: result.value.map(formatMessage) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/chat/sessions/:sessionId/questions - Ask a question
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: SessionIdParams; Body: AskBody }>(
      '/api/v1/chat/sessions/:sessionId/questions',
      {
        schema: {
          params: SessionIdParamsSchema,
          body: AskBodySchema,
          response: {
            200: AnswerResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { sessionId } = request.params;

        const session = await chatHistory.getSession(sessionId);
        if (session.isErr()) {
          return sendError(reply, session.error);
        }

        // Degraded answers are still answers: always 200
        const response = await orchestrator.ask({ sessionId, question: request.body.question });
        return reply.status(200).send({ ok: true, data: response });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // DELETE /api/v1/chat/sessions/:sessionId - Delete a session and its messages
    // ─────────────────────────────────────────────────────────────────────────
    fastify.delete<{ Params: SessionIdParams }>(
      '/api/v1/chat/sessions/:sessionId',
      {
        schema: {
          params: SessionIdParamsSchema,
          response: {
            200: OkResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await chatHistory.deleteSession(request.params.sessionId);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply.status(200).send({ ok: true });
      }
    );
  };
};
