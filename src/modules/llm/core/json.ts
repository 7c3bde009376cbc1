/**
 * Extraction of JSON payloads from model completions, which may wrap them in
 * markdown fences or surrounding prose.
 */

import { err, ok, type Result } from 'neverthrow';

import { createMalformedCompletionError, type MalformedCompletionError } from './errors.js';

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Parses the first JSON object or array found in `text`.
 */
export const extractJson = (text: string): Result<unknown, MalformedCompletionError> => {
  const fenced = FENCE.exec(text);
  const body = (fenced?.[1] ?? text).trim();

  const start = body.search(/[[{]/);
  if (start === -1) {
    return err(createMalformedCompletionError('Completion contains no JSON value', text));
  }
  const closing = body[start] === '{' ? '}' : ']';
  const end = body.lastIndexOf(closing);
  if (end < start) {
    return err(createMalformedCompletionError('Completion contains truncated JSON', text));
  }

  try {
    const parsed: unknown = JSON.parse(body.slice(start, end + 1));
    return ok(parsed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'invalid JSON';
    return err(createMalformedCompletionError(`Completion is not valid JSON: ${reason}`, text));
  }
};
