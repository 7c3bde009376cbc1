/**
 * Chat History Module - Errors
 */

import { createNotFoundError, type NotFoundError } from '../../../common/types/errors.js';

/**
 * Database-related error.
 */
export interface ChatDatabaseError {
  readonly type: 'ChatDatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export type ChatHistoryError = ChatDatabaseError | NotFoundError;

export const createChatDatabaseError = (
  message: string,
  cause?: unknown,
  retryable = true
): ChatDatabaseError => ({
  type: 'ChatDatabaseError',
  message,
  retryable,
  ...(cause !== undefined && { cause }),
});

export const createSessionNotFoundError = (sessionId: string): NotFoundError =>
  createNotFoundError('Chat session', sessionId);

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

const CHAT_HISTORY_ERROR_HTTP_STATUS: Record<ChatHistoryError['type'], number> = {
  ChatDatabaseError: 500,
  NotFoundError: 404,
};

export const getHttpStatusForError = (error: ChatHistoryError): number => {
  return CHAT_HISTORY_ERROR_HTTP_STATUS[error.type];
};
