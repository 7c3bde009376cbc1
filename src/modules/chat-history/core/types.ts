/**
 * Chat History Module - Types
 */

export type ChatRole = 'user' | 'assistant';

export const CHAT_ROLES: readonly ChatRole[] = ['user', 'assistant'];

/** Largest page returned by listSessions */
export const MAX_SESSION_PAGE = 100;

export interface ChatSession {
  readonly sessionId: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly summary: string | null;
}

export interface ChatMessage {
  /** Monotonic per database; orders messages within a session */
  readonly id: string;
  readonly sessionId: string;
  readonly role: ChatRole;
  readonly content: string;
  readonly createdAt: Date;
  /** Route, warnings and similar metadata attached by the orchestrator */
  readonly extra: Readonly<Record<string, unknown>> | null;
}
