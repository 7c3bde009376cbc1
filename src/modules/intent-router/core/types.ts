/**
 * Intent Router Module - Types
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Routes
// ─────────────────────────────────────────────────────────────────────────────

export const ROUTES = ['STRUCTURED_QUERY', 'SEMANTIC_SEARCH', 'CONVERSATIONAL'] as const;

export type Route = (typeof ROUTES)[number];

/** Below this confidence the router answers conversationally */
export const CONFIDENCE_THRESHOLD = 0.6;

// ─────────────────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────────────────

export const ClassificationOutputSchema = Type.Object({
  route: Type.Union([
    Type.Literal('STRUCTURED_QUERY'),
    Type.Literal('SEMANTIC_SEARCH'),
    Type.Literal('CONVERSATIONAL'),
  ]),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
  reasoning: Type.Optional(Type.String()),
});

export type ClassificationOutput = Static<typeof ClassificationOutputSchema>;

export interface Classification {
  readonly route: Route;
  readonly confidence: number;
  readonly reasoning: string;
  /** 'keywords' when the model call failed or returned unusable output */
  readonly source: 'model' | 'keywords';
}

// ─────────────────────────────────────────────────────────────────────────────
// Decisions
// ─────────────────────────────────────────────────────────────────────────────

export type RoutingDecision =
  | {
      readonly route: 'STRUCTURED_QUERY';
      readonly question: string;
      /** Business terms rewritten to column names */
      readonly refinedQuestion: string;
      readonly classification: Classification;
    }
  | {
      readonly route: 'SEMANTIC_SEARCH';
      readonly question: string;
      readonly classification: Classification;
    }
  | {
      readonly route: 'CONVERSATIONAL';
      readonly question: string;
      readonly classification: Classification;
      /** The classifier predicted another route below the confidence threshold */
      readonly lowConfidence: boolean;
    };
