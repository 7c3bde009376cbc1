/**
 * Chat REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the chat endpoints.
 */

import { Type, type Static } from '@sinclair/typebox';

import { MAX_SESSION_PAGE } from '../../../chat-history/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const SessionIdParamsSchema = Type.Object({
  sessionId: Type.String({ format: 'uuid' }),
});

export type SessionIdParams = Static<typeof SessionIdParamsSchema>;

export const ListSessionsQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_SESSION_PAGE, default: 20 })),
});

export type ListSessionsQuery = Static<typeof ListSessionsQuerySchema>;

export const AskBodySchema = Type.Object(
  {
    question: Type.String({ minLength: 1, maxLength: 4000 }),
  },
  { additionalProperties: false }
);

export type AskBody = Static<typeof AskBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const SessionSchema = Type.Object({
  sessionId: Type.String(),
  createdAt: Type.String(),
  updatedAt: Type.String(),
  summary: Type.Union([Type.String(), Type.Null()]),
});

export const MessageSchema = Type.Object({
  id: Type.String(),
  role: Type.Union([Type.Literal('user'), Type.Literal('assistant')]),
  content: Type.String(),
  createdAt: Type.String(),
  extra: Type.Union([Type.Record(Type.String(), Type.Unknown()), Type.Null()]),
});

export const SessionResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: SessionSchema,
});

export const SessionListResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(SessionSchema),
});

export const MessageListResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(MessageSchema),
});

/** The answer payload varies by kind and is passed through as is */
export const AnswerResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Unknown(),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});

export const OkResponseSchema = Type.Object({
  ok: Type.Literal(true),
});
