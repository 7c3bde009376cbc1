/**
 * Routes a question to one of the three terminal routes.
 *
 * START ─classify─▶ STRUCTURED_QUERY | SEMANTIC_SEARCH | CONVERSATIONAL
 *
 * A confidence below the threshold always ends in CONVERSATIONAL. Structured
 * questions carry a refined copy with business terms rewritten to columns.
 */

import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { describeSchema, rewriteQuestion } from '../../../labels/index.js';
import { completeWithin, extractJson } from '../../../llm/index.js';
import { classifyByKeywords } from '../keywords.js';
import { buildRouterPrompt, ROUTER_SYSTEM_INSTRUCTIONS } from '../prompts.js';
import {
  CONFIDENCE_THRESHOLD,
  ClassificationOutputSchema,
  type Classification,
  type RoutingDecision,
} from '../types.js';

import type { Deadline } from '../../../../common/deadline.js';
import type { TimeoutError } from '../../../../common/types/errors.js';
import type { LabelCatalog } from '../../../labels/index.js';
import type { CompletionProvider } from '../../../llm/index.js';
import type { Logger } from 'pino';

export interface RouteQuestionDeps {
  completion: CompletionProvider;
  catalog: LabelCatalog;
  logger: Logger;
}

export interface RouteQuestionInput {
  question: string;
  deadline?: Deadline;
}

/**
 * Applies the confidence threshold and builds the routing decision.
 */
export const decideRoute = (
  catalog: LabelCatalog,
  question: string,
  classification: Classification
): RoutingDecision => {
  if (classification.confidence < CONFIDENCE_THRESHOLD) {
    return {
      route: 'CONVERSATIONAL',
      question,
      classification,
      lowConfidence: classification.route !== 'CONVERSATIONAL',
    };
  }

  switch (classification.route) {
    case 'STRUCTURED_QUERY':
      return {
        route: 'STRUCTURED_QUERY',
        question,
        refinedQuestion: rewriteQuestion(catalog, question),
        classification,
      };
    case 'SEMANTIC_SEARCH':
      return { route: 'SEMANTIC_SEARCH', question, classification };
    case 'CONVERSATIONAL':
      return { route: 'CONVERSATIONAL', question, classification, lowConfidence: false };
  }
};

const parseClassification = (text: string): Classification | null => {
  const parsed = extractJson(text);
  if (parsed.isErr()) {
    return null;
  }
  const output = parsed.value;
  if (!Value.Check(ClassificationOutputSchema, output)) {
    return null;
  }
  return {
    route: output.route,
    confidence: output.confidence,
    reasoning: output.reasoning ?? '',
    source: 'model',
  };
};

/**
 * Classifies and routes a question. Model failures fall back to keyword
 * classification; only an exhausted request budget is an error.
 */
export async function routeQuestion(
  deps: RouteQuestionDeps,
  input: RouteQuestionInput
): Promise<Result<RoutingDecision, TimeoutError>> {
  const log = deps.logger.child({ component: 'IntentRouter' });
  const { question } = input;

  const completion = await completeWithin(
    deps.completion,
    buildRouterPrompt(question, describeSchema(deps.catalog)),
    ROUTER_SYSTEM_INSTRUCTIONS,
    input.deadline
  );

  let classification: Classification | null = null;
  if (completion.isErr()) {
    if (completion.error.type === 'TimeoutError') {
      return err(completion.error);
    }
    log.warn({ err: completion.error }, 'Classification call failed, using keywords');
  } else {
    classification = parseClassification(completion.value);
    if (classification === null) {
      log.warn({ completion: completion.value.slice(0, 200) }, 'Unusable classification, using keywords');
    }
  }

  const decision = decideRoute(deps.catalog, question, classification ?? classifyByKeywords(question));
  log.info(
    {
      route: decision.route,
      predicted: decision.classification.route,
      confidence: decision.classification.confidence,
      source: decision.classification.source,
    },
    'Question routed'
  );
  return ok(decision);
}
