/**
 * SQL agent: generate a query, validate it, execute it, repair on failure.
 *
 * clarity ─▶ generate ─▶ resolve ─▶ execute ─ok─▶ summarize ─▶ analysis, follow-ups
 *               ▲                      │
 *               └──── feedback ◀─fail──┘   (at most MAX_QUERY_ATTEMPTS times)
 *
 * Provider failures, an unavailable store and an exhausted deadline end the
 * loop at once; they are not something a different query could fix. The
 * clarity check, analysis and follow-ups are optional and best effort: only a
 * timeout in one of them fails the question.
 */

import { err, ok, type Result } from 'neverthrow';

import { resolveQuery } from '../../../hybrid-store/index.js';
import {
  describeSchema,
  findRelevantColumns,
  formatRelevantColumns,
} from '../../../labels/index.js';
import { completeWithin } from '../../../llm/index.js';
import { createQueryFailedError, type QueryAttempt, type QueryFailedError } from '../errors.js';
import { parseClarityCheck, parseFollowUps, parseQueryPlan } from '../plan.js';
import {
  ANALYSIS_SYSTEM_INSTRUCTIONS,
  buildAnalysisPrompt,
  buildClarityPrompt,
  buildFollowUpPrompt,
  buildSqlPrompt,
  CLARITY_SYSTEM_INSTRUCTIONS,
  FOLLOW_UP_SYSTEM_INSTRUCTIONS,
  SQL_AGENT_SYSTEM_INSTRUCTIONS,
} from '../prompts.js';
import { measuresOf, summarizeResult } from '../summary.js';
import {
  CLARIFICATION_CONFIDENCE,
  MAX_FOLLOW_UPS,
  MAX_QUERY_ATTEMPTS,
  type ClarityCheck,
  type StructuredOutcome,
  type StructuredQueryOptions,
} from '../types.js';

import type { Deadline } from '../../../../common/deadline.js';
import type { ProviderError, TimeoutError } from '../../../../common/types/errors.js';
import type { HybridStore, ResultRow, StoreUnavailableError } from '../../../hybrid-store/index.js';
import type { LabelCatalog } from '../../../labels/index.js';
import type { CompletionProvider } from '../../../llm/index.js';
import type { Logger } from 'pino';

export interface RunStructuredQueryDeps {
  completion: CompletionProvider;
  store: HybridStore;
  catalog: LabelCatalog;
  logger: Logger;
  options?: Partial<StructuredQueryOptions>;
}

export interface RunStructuredQueryInput {
  question: string;
  /** Question with business terms rewritten to columns */
  refinedQuestion: string;
  deadline?: Deadline;
}

export type StructuredQueryError =
  | QueryFailedError
  | ProviderError
  | StoreUnavailableError
  | TimeoutError;

const DEFAULT_OPTIONS: StructuredQueryOptions = { checkClarity: false, analyze: false, followUps: 0 };

/**
 * True when the question should go back to the user instead of to the store.
 */
export const needsClarification = (check: ClarityCheck): boolean =>
  !check.isClear &&
  check.confidence < CLARIFICATION_CONFIDENCE &&
  check.clarifyingQuestions.length > 0;

type Step<T> = Result<T, TimeoutError>;

async function checkClarity(
  deps: RunStructuredQueryDeps,
  log: Logger,
  input: RunStructuredQueryInput,
  schemaDigest: string
): Promise<Step<ClarityCheck | null>> {
  const completion = await completeWithin(
    deps.completion,
    buildClarityPrompt(input.refinedQuestion, schemaDigest),
    CLARITY_SYSTEM_INSTRUCTIONS,
    input.deadline
  );
  if (completion.isErr()) {
    if (completion.error.type === 'TimeoutError') {
      return err(completion.error);
    }
    log.warn({ err: completion.error }, 'Clarity check failed, planning the question as asked');
    return ok(null);
  }
  const check = parseClarityCheck(completion.value);
  if (check === null) {
    log.warn('Unusable clarity check, planning the question as asked');
  }
  return ok(check);
}

async function analyzeRows(
  deps: RunStructuredQueryDeps,
  log: Logger,
  input: RunStructuredQueryInput,
  plan: { query: string; explanation: string; rows: readonly ResultRow[] }
): Promise<Step<string | null>> {
  const completion = await completeWithin(
    deps.completion,
    buildAnalysisPrompt({ question: input.question, ...plan }),
    ANALYSIS_SYSTEM_INSTRUCTIONS,
    input.deadline
  );
  if (completion.isErr()) {
    if (completion.error.type === 'TimeoutError') {
      return err(completion.error);
    }
    log.warn({ err: completion.error }, 'Result analysis failed');
    return ok(null);
  }
  const analysis = completion.value.trim();
  return ok(analysis === '' ? null : analysis);
}

async function suggestFollowUps(
  deps: RunStructuredQueryDeps,
  log: Logger,
  input: RunStructuredQueryInput,
  rows: readonly ResultRow[],
  count: number
): Promise<Step<string[]>> {
  const completion = await completeWithin(
    deps.completion,
    buildFollowUpPrompt(input.question, rows, count),
    FOLLOW_UP_SYSTEM_INSTRUCTIONS,
    input.deadline
  );
  if (completion.isErr()) {
    if (completion.error.type === 'TimeoutError') {
      return err(completion.error);
    }
    log.warn({ err: completion.error }, 'Follow-up suggestions failed');
    return ok([]);
  }
  const followUps = parseFollowUps(completion.value, input.question, count);
  if (followUps === null) {
    log.warn('Unusable follow-up suggestions');
    return ok([]);
  }
  return ok(followUps);
}

export async function runStructuredQuery(
  deps: RunStructuredQueryDeps,
  input: RunStructuredQueryInput
): Promise<Result<StructuredOutcome, StructuredQueryError>> {
  const log = deps.logger.child({ component: 'SqlAgent' });
  const { catalog, store } = deps;
  const options = { ...DEFAULT_OPTIONS, ...deps.options };
  const followUpCount = Math.min(Math.max(options.followUps, 0), MAX_FOLLOW_UPS);

  const schemaDigest = describeSchema(catalog);

  let clarity: ClarityCheck | null = null;
  if (options.checkClarity) {
    const checked = await checkClarity(deps, log, input, schemaDigest);
    if (checked.isErr()) {
      return err(checked.error);
    }
    clarity = checked.value;
    if (clarity !== null && needsClarification(clarity)) {
      log.info(
        { confidence: clarity.confidence, issues: clarity.issues.length },
        'Question needs clarification'
      );
      return ok({
        kind: 'clarification',
        question: input.question,
        refinedQuestion: input.refinedQuestion,
        interpretedAs: clarity.interpretedAs,
        issues: clarity.issues,
        clarifyingQuestions: clarity.clarifyingQuestions,
        suggestions: clarity.suggestions,
      });
    }
  }

  const relevantColumns = formatRelevantColumns(findRelevantColumns(catalog, input.refinedQuestion));
  const attempts: QueryAttempt[] = [];

  for (let attempt = 1; attempt <= MAX_QUERY_ATTEMPTS; attempt++) {
    const completion = await completeWithin(
      deps.completion,
      buildSqlPrompt({
        question: input.refinedQuestion,
        schemaDigest,
        relevantColumns,
        previousAttempts: attempts,
      }),
      SQL_AGENT_SYSTEM_INSTRUCTIONS,
      input.deadline
    );

    if (completion.isErr()) {
      const error = completion.error;
      if (error.type !== 'EmptyCompletionError') {
        return err(error);
      }
      attempts.push({ attempt, query: null, errorType: error.type, error: error.message });
      log.warn({ attempt }, 'Empty query completion');
      continue;
    }

    const plan = parseQueryPlan(completion.value);
    if (plan.isErr()) {
      attempts.push({
        attempt,
        query: completion.value,
        errorType: plan.error.type,
        error: plan.error.message,
      });
      log.warn({ attempt, error: plan.error.message }, 'Unusable query plan');
      continue;
    }

    const { spec, explanation, chartType } = plan.value;
    const queryText = JSON.stringify(spec);

    const resolved = resolveQuery(catalog, spec);
    if (resolved.isErr()) {
      attempts.push({
        attempt,
        query: queryText,
        errorType: resolved.error.type,
        error: resolved.error.message,
      });
      log.warn({ attempt, query: queryText, error: resolved.error.message }, 'Query rejected');
      continue;
    }

    const result = await store.query(spec, { deadline: input.deadline });
    if (result.isErr()) {
      const error = result.error;
      if (error.type === 'StoreUnavailableError' || error.type === 'TimeoutError') {
        return err(error);
      }
      attempts.push({ attempt, query: queryText, errorType: error.type, error: error.message });
      log.warn({ attempt, query: queryText, error: error.message }, 'Query execution failed');
      continue;
    }

    log.info(
      { attempt, table: spec.table, rows: result.value.rows.length, truncated: result.value.truncated },
      'Structured query answered'
    );

    let analysis: string | null = null;
    if (options.analyze) {
      const analyzed = await analyzeRows(deps, log, input, {
        query: queryText,
        explanation,
        rows: result.value.rows,
      });
      if (analyzed.isErr()) {
        return err(analyzed.error);
      }
      analysis = analyzed.value;
    }

    let followUps: string[] = [];
    if (followUpCount > 0) {
      const suggested = await suggestFollowUps(deps, log, input, result.value.rows, followUpCount);
      if (suggested.isErr()) {
        return err(suggested.error);
      }
      followUps = suggested.value;
    }

    return ok({
      kind: 'answer',
      question: input.question,
      refinedQuestion: input.refinedQuestion,
      query: spec,
      explanation,
      result: result.value,
      attempts: attempt,
      interpretedAs: clarity?.interpretedAs ?? null,
      analysis,
      followUps,
      ...summarizeResult(result.value, measuresOf(resolved.value), chartType),
    });
  }

  const failure = createQueryFailedError(attempts);
  log.error({ attempts: attempts.length, lastError: failure.lastError }, 'Query attempts exhausted');
  return err(failure);
}
