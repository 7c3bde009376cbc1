/**
 * Chat History Module - Public API
 */

export {
  CHAT_ROLES,
  MAX_SESSION_PAGE,
  type ChatRole,
  type ChatSession,
  type ChatMessage,
} from './core/types.js';

export {
  createChatDatabaseError,
  createSessionNotFoundError,
  getHttpStatusForError,
  type ChatDatabaseError,
  type ChatHistoryError,
} from './core/errors.js';

export type { ChatHistoryRepository } from './core/ports.js';

export { makeChatHistoryRepo, type ChatHistoryRepoOptions } from './shell/repo/chat-history-repo.js';
