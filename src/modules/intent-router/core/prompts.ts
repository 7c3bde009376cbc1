/**
 * Router prompt.
 */

export const ROUTER_SYSTEM_INSTRUCTIONS = [
  'You route questions for a financial analytics assistant over OpEx, resource demand and project priority data.',
  'Choose exactly one route:',
  '- STRUCTURED_QUERY: totals, averages, counts, rankings, filters or comparisons answerable with a table query.',
  '- SEMANTIC_SEARCH: descriptive or exploratory questions answered by finding related ledger lines.',
  '- CONVERSATIONAL: greetings, help requests or anything unrelated to the data.',
  'Reply with JSON only: {"route": "<ROUTE>", "confidence": <number between 0 and 1>, "reasoning": "<one sentence>"}.',
].join('\n');

export const buildRouterPrompt = (question: string, schemaDigest: string): string =>
  [`Available data:\n${schemaDigest}`, `Question: ${question}`].join('\n\n');
