/**
 * Orchestrator Module - Public API
 *
 * Question entry point and the chat REST surface.
 */

export type {
  AskInput,
  DegradationInfo,
  OrchestratorResponse,
  ResponseKind,
} from './core/types.js';

export {
  createOrchestrator,
  type Orchestrator,
  type OrchestratorDeps,
} from './core/orchestrator.js';

export { createKeyedQueue, type KeyedQueue } from './core/session-queue.js';

export {
  CAPABILITIES_MESSAGE,
  CANNED_REPLY,
  buildClarification,
  degradationMessage,
  formatClarificationRequest,
  isHelpRequest,
  structuredAnswerText,
} from './core/replies.js';

export { makeChatRoutes, type MakeChatRoutesDeps } from './shell/rest/routes.js';
