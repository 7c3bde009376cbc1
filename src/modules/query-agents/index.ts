/**
 * Query Agents Module - Public API
 *
 * SQL agent (structured questions) and semantic agent (retrieval questions).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export {
  MAX_QUERY_ATTEMPTS,
  MAX_FOLLOW_UPS,
  CLARIFICATION_CONFIDENCE,
  ChartTypeSchema,
  type ChartType,
  type ChartData,
  type ChartSeries,
  type QueryPlan,
  type ResultSummary,
  type StructuredAnswer,
  type StructuredOutcome,
  type StructuredQueryOptions,
  type ClarificationRequest,
  type ClarityCheck,
  type RetrievedRecord,
  type Citation,
  type SemanticAnswer,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  createQueryFailedError,
  type QueryAttempt,
  type QueryFailedError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export {
  parseQueryPlan,
  parseParaphrases,
  parseStringList,
  parseFollowUps,
  parseClarityCheck,
  type PlanError,
} from './core/plan.js';
export { buildSqlPrompt, previewRows } from './core/prompts.js';
export { summarizeResult, measuresOf, formatAmount, type Measure } from './core/summary.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  runStructuredQuery,
  needsClarification,
  type RunStructuredQueryDeps,
  type RunStructuredQueryInput,
  type StructuredQueryError,
} from './core/usecases/run-structured-query.js';

export {
  runSemanticSearch,
  buildQueryVariants,
  mergeHits,
  citedLabels,
  summarizeRecord,
  type RunSemanticSearchDeps,
  type RunSemanticSearchInput,
  type SemanticSearchError,
  type SemanticSearchOptions,
} from './core/usecases/run-semantic-search.js';
