/**
 * Fixed texts and prompts for conversational and degraded replies.
 */

import type { ChatMessage } from '../../chat-history/index.js';
import type { ClarificationRequest, StructuredAnswer } from '../../query-agents/index.js';

/** Earlier messages included in a conversational prompt */
export const CONVERSATION_HISTORY_LIMIT = 6;

export const CONVERSATION_SYSTEM_INSTRUCTIONS = [
  'You are a financial and resource analytics assistant for operating expenses, headcount demand and project priorities.',
  'Keep a professional tone and answer briefly.',
  'If the user greets you, reply warmly and mention what you can analyse.',
  'If the question is outside finance or resource planning, redirect politely.',
  'Never invent figures; suggest a concrete data question instead.',
].join('\n');

export const CAPABILITIES_MESSAGE = [
  'I can help with:',
  '',
  'OpEx analytics',
  '- "What is the total actual cost per project for FY25?"',
  '- "Compare planned vs actual cost by department."',
  '- "Show the top 5 projects by spend."',
  '',
  'Resource demand and capacity',
  '- "What is the total headcount demand by country for 2025-03?"',
  '- "List projects ranked by priority with their target capacity."',
  '',
  'Record search',
  '- "Which projects mention cloud migration?"',
  '- "Describe the hardware spend for the Austin lab."',
].join('\n');

export const CANNED_REPLY =
  'I am having trouble responding right now. You can still ask for figures, for example "total actual cost by project for FY25".';

const HELP_PATTERN = /\b(?:help|what\s+can\s+you\s+do|capabilities|features|menu)\b/i;

export const isHelpRequest = (question: string): boolean => HELP_PATTERN.test(question);

/**
 * Reply for questions the router could not classify with enough confidence.
 */
export const buildClarification = (): string =>
  [
    'I am not sure whether you want figures from the data or details about specific records. Could you rephrase the question? For example:',
    '- "Total actual cost by department for FY25" for figures',
    '- "Which projects involve network hardware?" for record details',
  ].join('\n');

/**
 * Reply for a structured question the SQL agent found too vague to plan.
 */
export const formatClarificationRequest = (request: ClarificationRequest): string => {
  const lines = ['To answer this accurately I need a little more detail:'];
  lines.push(...request.clarifyingQuestions.map((question) => `- ${question}`));
  if (request.interpretedAs !== null) {
    lines.push('', `My best reading of the question: ${request.interpretedAs}`);
  }
  if (request.suggestions.length > 0) {
    lines.push('', 'You could also ask:', ...request.suggestions.map((text) => `- ${text}`));
  }
  return lines.join('\n');
};

/**
 * Narrative, followed by the model's analysis when there is one.
 */
export const structuredAnswerText = (answer: StructuredAnswer): string =>
  answer.analysis === null ? answer.narrative : `${answer.narrative}\n\n${answer.analysis}`;

export const buildConversationPrompt = (
  question: string,
  history: readonly ChatMessage[]
): string => {
  const recent = history.slice(-CONVERSATION_HISTORY_LIMIT);
  if (recent.length === 0) {
    return question;
  }
  const transcript = recent.map((message) => `${message.role}: ${message.content}`).join('\n');
  return `Conversation so far:\n${transcript}\n\nUser: ${question}`;
};

/**
 * User-facing text for a failure, by error type.
 */
export const degradationMessage = (errorType: string): string => {
  switch (errorType) {
    case 'QueryFailedError':
      return 'I could not build a working query for that question. Try naming the measure and the grouping you want, for example "total actual cost by project".';
    case 'StoreUnavailableError':
      return 'The data store is unavailable right now. Please try again shortly.';
    case 'TimeoutError':
      return 'That question took too long to answer. Try a narrower question.';
    case 'ProviderError':
      return 'The language model service is unavailable right now. Please try again shortly.';
    default:
      return 'Something went wrong while answering. Please try again.';
  }
};
