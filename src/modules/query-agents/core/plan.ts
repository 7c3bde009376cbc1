/**
 * Parsing of the agents' model output: query plans, clarity checks and
 * string lists (paraphrases, follow-up questions).
 */

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  ClarityCheckOutputSchema,
  QueryPlanOutputSchema,
  type ClarityCheck,
  type QueryPlan,
} from './types.js';
import {
  createInvalidQueryError,
  validateQuerySpec,
  type InvalidQueryError,
} from '../../hybrid-store/index.js';
import { extractJson, type MalformedCompletionError } from '../../llm/index.js';

export type PlanError = MalformedCompletionError | InvalidQueryError;

export const parseQueryPlan = (text: string): Result<QueryPlan, PlanError> => {
  const parsed = extractJson(text);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const output = parsed.value;
  if (!Value.Check(QueryPlanOutputSchema, output)) {
    return err(
      createInvalidQueryError('Expected an object with "query", "explanation" and "chartType"')
    );
  }

  return validateQuerySpec(output.query).map((spec) => ({
    spec,
    explanation: output.explanation ?? '',
    chartType: output.chartType ?? null,
  }));
};

/**
 * Non-blank strings of a JSON array, or null when the text holds no array.
 */
export const parseStringList = (text: string): string[] | null => {
  const parsed = extractJson(text);
  if (parsed.isErr()) {
    return null;
  }
  const output = parsed.value;
  if (!Array.isArray(output)) {
    return null;
  }
  return output.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
};

export const parseParaphrases = parseStringList;

const distinctTrimmed = (items: readonly string[]): string[] => {
  const seen = new Set<string>();
  const kept: string[] = [];
  for (const item of items) {
    const text = item.trim();
    const key = text.toLowerCase();
    if (text === '' || seen.has(key)) {
      continue;
    }
    seen.add(key);
    kept.push(text);
  }
  return kept;
};

/**
 * Distinct follow-up questions other than the one just asked, at most `limit`.
 */
export const parseFollowUps = (text: string, question: string, limit: number): string[] | null => {
  const items = parseStringList(text);
  if (items === null) {
    return null;
  }
  const asked = question.trim().toLowerCase();
  return distinctTrimmed(items)
    .filter((item) => item.toLowerCase() !== asked)
    .slice(0, limit);
};

export const parseClarityCheck = (text: string): ClarityCheck | null => {
  const parsed = extractJson(text);
  if (parsed.isErr()) {
    return null;
  }
  const output = parsed.value;
  if (!Value.Check(ClarityCheckOutputSchema, output)) {
    return null;
  }
  const interpretedAs = output.interpretedAs?.trim() ?? '';
  return {
    isClear: output.isClear,
    confidence: output.confidence,
    interpretedAs: interpretedAs === '' ? null : interpretedAs,
    issues: distinctTrimmed(output.issues ?? []),
    clarifyingQuestions: distinctTrimmed(output.clarifyingQuestions ?? []),
    suggestions: distinctTrimmed(output.suggestions ?? []),
  };
};
