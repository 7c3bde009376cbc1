/**
 * Keyword classifier used when the model cannot classify a question.
 */

import type { Classification } from './types.js';

const STRUCTURED_PATTERN =
  /\b(?:total|sum|average|avg|mean|count|how\s+many|how\s+much|top\s+\d+|highest|lowest|largest|smallest|maximum|minimum|max|min|group(?:ed)?\s+by|per|breakdown|compare|trend|by\s+(?:month|quarter|year|project|department|country)|list\s+all|rank(?:ed|ing)?)\b/i;

const RETRIEVAL_PATTERN =
  /\b(?:describe|explain|about|related|similar|like|mention(?:s|ed)?|involv(?:e|es|ing)|tell\s+me\s+about|what\s+is|context|details?|summari[sz]e)\b/i;

const GREETING_PATTERN =
  /^\s*(?:hi|hello|hey|thanks|thank\s+you|good\s+(?:morning|afternoon|evening)|who\s+are\s+you|help)\b/i;

export const KEYWORD_CONFIDENCE = {
  structured: 0.75,
  retrieval: 0.7,
  greeting: 0.8,
  unknown: 0.5,
} as const;

export const classifyByKeywords = (question: string): Classification => {
  if (STRUCTURED_PATTERN.test(question)) {
    return {
      route: 'STRUCTURED_QUERY',
      confidence: KEYWORD_CONFIDENCE.structured,
      reasoning: 'Question asks for an aggregate, ranking or listing',
      source: 'keywords',
    };
  }
  if (RETRIEVAL_PATTERN.test(question)) {
    return {
      route: 'SEMANTIC_SEARCH',
      confidence: KEYWORD_CONFIDENCE.retrieval,
      reasoning: 'Question asks for descriptive context',
      source: 'keywords',
    };
  }
  if (GREETING_PATTERN.test(question)) {
    return {
      route: 'CONVERSATIONAL',
      confidence: KEYWORD_CONFIDENCE.greeting,
      reasoning: 'Greeting or small talk',
      source: 'keywords',
    };
  }
  return {
    route: 'CONVERSATIONAL',
    confidence: KEYWORD_CONFIDENCE.unknown,
    reasoning: 'No recognizable intent',
    source: 'keywords',
  };
};
