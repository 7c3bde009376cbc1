/**
 * Chat History Repository Implementation
 *
 * Kysely-based implementation over chat_sessions and chat_messages.
 * Messages reference their session with ON DELETE CASCADE.
 */

import { sql } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import {
  createChatDatabaseError,
  createSessionNotFoundError,
  type ChatHistoryError,
} from '../../core/errors.js';
import { CHAT_ROLES, MAX_SESSION_PAGE } from '../../core/types.js';

import type { ChatHistoryRepository } from '../../core/ports.js';
import type { ChatMessage, ChatRole, ChatSession } from '../../core/types.js';
import type { FiraDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

interface SessionRow {
  session_id: string;
  created_at: Date | string;
  updated_at: Date | string;
  summary: string | null;
}

interface MessageRow {
  id: string;
  session_id: string;
  role: string;
  content: string;
  created_at: Date | string;
  extra: Record<string, unknown> | null;
}

export interface ChatHistoryRepoOptions {
  db: FiraDbClient;
  logger: Logger;
}

// invalid_text_representation, raised when a session id is not a UUID
const INVALID_TEXT_REPRESENTATION = '22P02';

const SESSION_COLUMNS = ['session_id', 'created_at', 'updated_at', 'summary'] as const;

const sqlStateOf = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

const toDate = (value: Date | string): Date => (value instanceof Date ? value : new Date(value));

const isChatRole = (value: string): value is ChatRole => CHAT_ROLES.some((role) => role === value);

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyChatHistoryRepo implements ChatHistoryRepository {
  private readonly db: FiraDbClient;
  private readonly log: Logger;

  constructor(options: ChatHistoryRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'ChatHistoryRepo' });
  }

  async createSession(): Promise<Result<ChatSession, ChatHistoryError>> {
    try {
      const row = await this.db
        .insertInto('chat_sessions')
        .defaultValues()
        .returning(SESSION_COLUMNS)
        .executeTakeFirstOrThrow();

      this.log.debug({ sessionId: row.session_id }, 'Chat session created');
      return ok(this.mapSession(row));
    } catch (error) {
      this.log.error({ err: error }, 'Failed to create chat session');
      return err(createChatDatabaseError('Failed to create chat session', error));
    }
  }

  async getSession(sessionId: string): Promise<Result<ChatSession, ChatHistoryError>> {
    try {
      const row = await this.db
        .selectFrom('chat_sessions')
        .select(SESSION_COLUMNS)
        .where('session_id', '=', sessionId)
        .executeTakeFirst();

      return row === undefined ? err(createSessionNotFoundError(sessionId)) : ok(this.mapSession(row));
    } catch (error) {
      return this.failure('Failed to load chat session', sessionId, error);
    }
  }

  async listSessions(limit: number): Promise<Result<ChatSession[], ChatHistoryError>> {
    try {
      const rows = await this.db
        .selectFrom('chat_sessions')
        .select(SESSION_COLUMNS)
        .orderBy('updated_at', 'desc')
        .orderBy('session_id')
        .limit(Math.min(Math.max(1, limit), MAX_SESSION_PAGE))
        .execute();

      return ok(rows.map((row) => this.mapSession(row)));
    } catch (error) {
      this.log.error({ err: error }, 'Failed to list chat sessions');
      return err(createChatDatabaseError('Failed to list chat sessions', error));
    }
  }

  async appendMessage(
    sessionId: string,
    role: ChatRole,
    content: string,
    extra?: Record<string, unknown>
  ): Promise<Result<ChatMessage, ChatHistoryError>> {
    try {
      const row = await this.db.transaction().execute(async (trx) => {
        const touched = await trx
          .updateTable('chat_sessions')
          .set({ updated_at: sql<Date>`now()` })
          .where('session_id', '=', sessionId)
          .returning('session_id')
          .executeTakeFirst();

        if (touched === undefined) {
          return null;
        }

        return trx
          .insertInto('chat_messages')
          .values({
            session_id: sessionId,
            role,
            content,
            extra: extra === undefined ? null : JSON.stringify(extra),
          })
          .returning(['id', 'session_id', 'role', 'content', 'created_at', 'extra'])
          .executeTakeFirstOrThrow();
      });

      if (row === null) {
        return err(createSessionNotFoundError(sessionId));
      }
      return ok(this.mapMessage(row));
    } catch (error) {
      return this.failure('Failed to append chat message', sessionId, error);
    }
  }

  async listMessages(sessionId: string): Promise<Result<ChatMessage[], ChatHistoryError>> {
    const session = await this.getSession(sessionId);
    if (session.isErr()) {
      return err(session.error);
    }

    try {
      const rows = await this.db
        .selectFrom('chat_messages')
        .select(['id', 'session_id', 'role', 'content', 'created_at', 'extra'])
        .where('session_id', '=', sessionId)
        .orderBy('id')
        .execute();

      return ok(rows.map((row) => this.mapMessage(row)));
    } catch (error) {
      return this.failure('Failed to list chat messages', sessionId, error);
    }
  }

  async updateSummary(sessionId: string, summary: string): Promise<Result<void, ChatHistoryError>> {
    try {
      const result = await this.db
        .updateTable('chat_sessions')
        .set({ summary, updated_at: sql<Date>`now()` })
        .where('session_id', '=', sessionId)
        .executeTakeFirst();

      return result.numUpdatedRows === 0n ? err(createSessionNotFoundError(sessionId)) : ok(undefined);
    } catch (error) {
      return this.failure('Failed to update chat summary', sessionId, error);
    }
  }

  async deleteSession(sessionId: string): Promise<Result<void, ChatHistoryError>> {
    try {
      const result = await this.db
        .deleteFrom('chat_sessions')
        .where('session_id', '=', sessionId)
        .executeTakeFirst();

      if (result.numDeletedRows === 0n) {
        return err(createSessionNotFoundError(sessionId));
      }
      this.log.debug({ sessionId }, 'Chat session deleted');
      return ok(undefined);
    } catch (error) {
      return this.failure('Failed to delete chat session', sessionId, error);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private failure<T>(message: string, sessionId: string, error: unknown): Result<T, ChatHistoryError> {
    if (sqlStateOf(error) === INVALID_TEXT_REPRESENTATION) {
      return err(createSessionNotFoundError(sessionId));
    }
    this.log.error({ err: error, sessionId }, message);
    return err(createChatDatabaseError(message, error));
  }

  private mapSession(row: SessionRow): ChatSession {
    return {
      sessionId: row.session_id,
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
      summary: row.summary,
    };
  }

  private mapMessage(row: MessageRow): ChatMessage {
    return {
      id: String(row.id),
      sessionId: row.session_id,
      role: isChatRole(row.role) ? row.role : 'assistant',
      content: row.content,
      createdAt: toDate(row.created_at),
      extra: row.extra,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a chat history repository.
 */
export const makeChatHistoryRepo = (options: ChatHistoryRepoOptions): ChatHistoryRepository => {
  return new KyselyChatHistoryRepo(options);
};
