/**
 * Orchestrator Module - Types
 */

import type { Classification, Route } from '../../intent-router/index.js';
import type {
  ClarificationRequest,
  SemanticAnswer,
  StructuredAnswer,
} from '../../query-agents/index.js';

export interface AskInput {
  sessionId: string;
  question: string;
}

/** Error details attached to a degraded response */
export interface DegradationInfo {
  readonly type: string;
  readonly message: string;
}

interface ResponseBase {
  readonly sessionId: string;
  readonly question: string;
  /** Text shown to the user */
  readonly answer: string;
  readonly warnings: readonly string[];
  /** null when routing itself could not complete */
  readonly classification: Classification | null;
  readonly durationMs: number;
}

/**
 * Outcome of one question. `kind` tells how it was answered; a degraded
 * response still carries a user-facing answer.
 */
export type OrchestratorResponse =
  | (ResponseBase & {
      readonly kind: 'structured';
      readonly route: 'STRUCTURED_QUERY';
      readonly structured: StructuredAnswer;
    })
  | (ResponseBase & {
      readonly kind: 'clarification';
      readonly route: 'STRUCTURED_QUERY';
      readonly clarification: ClarificationRequest;
    })
  | (ResponseBase & {
      readonly kind: 'semantic';
      readonly route: 'SEMANTIC_SEARCH';
      readonly semantic: SemanticAnswer;
    })
  | (ResponseBase & {
      readonly kind: 'conversational';
      readonly route: 'CONVERSATIONAL';
      readonly lowConfidence: boolean;
    })
  | (ResponseBase & {
      readonly kind: 'degraded';
      readonly route: Route | null;
      readonly error: DegradationInfo;
    });

export type ResponseKind = OrchestratorResponse['kind'];
