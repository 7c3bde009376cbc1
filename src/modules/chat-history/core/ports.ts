/**
 * Chat History Module - Ports
 */

import type { ChatHistoryError } from './errors.js';
import type { ChatMessage, ChatRole, ChatSession } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Persistence of chat sessions and their messages.
 *
 * Messages are returned oldest first. Deleting a session deletes its messages.
 */
export interface ChatHistoryRepository {
  createSession(): Promise<Result<ChatSession, ChatHistoryError>>;

  getSession(sessionId: string): Promise<Result<ChatSession, ChatHistoryError>>;

  /** Most recently updated first */
  listSessions(limit: number): Promise<Result<ChatSession[], ChatHistoryError>>;

  appendMessage(
    sessionId: string,
    role: ChatRole,
    content: string,
    extra?: Record<string, unknown>
  ): Promise<Result<ChatMessage, ChatHistoryError>>;

  listMessages(sessionId: string): Promise<Result<ChatMessage[], ChatHistoryError>>;

  updateSummary(sessionId: string, summary: string): Promise<Result<void, ChatHistoryError>>;

  deleteSession(sessionId: string): Promise<Result<void, ChatHistoryError>>;
}
