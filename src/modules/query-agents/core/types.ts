/**
 * Query Agents Module - Types
 */

import { Type, type Static } from '@sinclair/typebox';

import type { FinancialRecord } from '../../../common/types/records.js';
import type { QuerySpec, ResultSet } from '../../hybrid-store/index.js';

/** Generate → execute attempts before the SQL agent gives up */
export const MAX_QUERY_ATTEMPTS = 3;

/** Follow-up questions suggested with an answer, at most */
export const MAX_FOLLOW_UPS = 3;

/** An unclear question below this confidence is sent back for clarification */
export const CLARIFICATION_CONFIDENCE = 0.5;

// ─────────────────────────────────────────────────────────────────────────────
// Structured Queries
// ─────────────────────────────────────────────────────────────────────────────

export const ChartTypeSchema = Type.Union([
  Type.Literal('bar'),
  Type.Literal('line'),
  Type.Literal('pie'),
  Type.Literal('table'),
]);

export type ChartType = Static<typeof ChartTypeSchema>;

/** Shape the model is asked to return; `query` is validated separately */
export const QueryPlanOutputSchema = Type.Object({
  query: Type.Unknown(),
  explanation: Type.Optional(Type.String()),
  chartType: Type.Optional(ChartTypeSchema),
});

export interface QueryPlan {
  readonly spec: QuerySpec;
  readonly explanation: string;
  readonly chartType: ChartType | null;
}

export interface ChartSeries {
  readonly name: string;
  readonly values: readonly (number | null)[];
}

/** Chart-ready projection of a result set */
export interface ChartData {
  readonly type: Exclude<ChartType, 'table'>;
  readonly labelColumn: string;
  readonly labels: readonly string[];
  readonly series: readonly ChartSeries[];
}

export interface ResultSummary {
  /** Narrative built only from the returned rows */
  readonly narrative: string;
  readonly warnings: readonly string[];
  readonly chart: ChartData | null;
}

/** Shape the model is asked to return when checking a question */
export const ClarityCheckOutputSchema = Type.Object({
  isClear: Type.Boolean(),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
  interpretedAs: Type.Optional(Type.String()),
  issues: Type.Optional(Type.Array(Type.String())),
  clarifyingQuestions: Type.Optional(Type.Array(Type.String())),
  suggestions: Type.Optional(Type.Array(Type.String())),
});

export interface ClarityCheck {
  readonly isClear: boolean;
  readonly confidence: number;
  /** How the model read the question, null when it did not say */
  readonly interpretedAs: string | null;
  readonly issues: readonly string[];
  readonly clarifyingQuestions: readonly string[];
  readonly suggestions: readonly string[];
}

export interface StructuredQueryOptions {
  /** Ask the model whether the question is answerable before planning */
  checkClarity: boolean;
  /** Ask the model for a short analysis of the returned rows */
  analyze: boolean;
  /** Follow-up questions to suggest, 0 to MAX_FOLLOW_UPS */
  followUps: number;
}

/** The question was too vague to plan a query for */
export interface ClarificationRequest {
  readonly kind: 'clarification';
  readonly question: string;
  readonly refinedQuestion: string;
  readonly interpretedAs: string | null;
  readonly issues: readonly string[];
  readonly clarifyingQuestions: readonly string[];
  readonly suggestions: readonly string[];
}

export interface StructuredAnswer extends ResultSummary {
  readonly kind: 'answer';
  readonly question: string;
  readonly refinedQuestion: string;
  readonly query: QuerySpec;
  readonly explanation: string;
  readonly result: ResultSet;
  /** Attempts used, 1 to MAX_QUERY_ATTEMPTS */
  readonly attempts: number;
  /** From the clarity check, when it ran */
  readonly interpretedAs: string | null;
  /** Model commentary on the rows; null when not requested or unavailable */
  readonly analysis: string | null;
  readonly followUps: readonly string[];
}

export type StructuredOutcome = StructuredAnswer | ClarificationRequest;

// ─────────────────────────────────────────────────────────────────────────────
// Semantic Search
// ─────────────────────────────────────────────────────────────────────────────

export const ParaphraseOutputSchema = Type.Array(Type.String({ minLength: 1 }));

export interface RetrievedRecord {
  readonly record: FinancialRecord;
  /** Best (lowest) cosine distance over all query variants */
  readonly distance: number;
  /** Indexes into the query variants that found this record */
  readonly matchedQueries: readonly number[];
}

export interface Citation {
  /** Reference label used in the answer text, e.g. R1 */
  readonly label: string;
  readonly uuid: string;
  readonly distance: number;
  readonly summary: string;
}

export interface SemanticAnswer {
  readonly question: string;
  /** Original question followed by the paraphrases that were searched */
  readonly queries: readonly string[];
  readonly answer: string;
  readonly references: readonly Citation[];
  readonly retrieved: readonly RetrievedRecord[];
  readonly warnings: readonly string[];
}
