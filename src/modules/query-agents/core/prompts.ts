/**
 * Prompts for the SQL and semantic agents.
 */

import type { QueryAttempt } from './errors.js';
import type { ResultRow } from '../../hybrid-store/index.js';

export const SQL_AGENT_SYSTEM_INSTRUCTIONS = [
  'You translate analytics questions into a JSON query over a fixed schema.',
  'Use only the tables and columns listed. Attribute-bag fields are written as attributes.<key> and exist only on opex_data_hybrid.',
  'Query format:',
  '{"table": "<table>", "select": ["<column>"], "filters": [{"column": "<column>", "op": "eq|neq|gt|gte|lt|lte", "value": <value>}, {"column": "<column>", "op": "in", "values": [<value>]}, {"column": "<column>", "op": "between", "from": <value>, "to": <value>}, {"column": "<column>", "op": "contains", "value": "<text>"}, {"column": "<column>", "op": "is_null", "value": true}], "groupBy": ["<column>"], "aggregates": [{"fn": "sum|avg|min|max|count", "column": "<column>", "alias": "<snake_case_name>"}], "orderBy": [{"column": "<column or alias>", "direction": "asc|desc"}], "limit": <1-1000>}',
  'Every key except "table" is optional. With groupBy or aggregates, each row is a group.',
  'Reply with JSON only: {"query": <query>, "explanation": "<one sentence>", "chartType": "bar|line|pie|table"}.',
].join('\n');

export interface SqlPromptInput {
  question: string;
  schemaDigest: string;
  relevantColumns: string;
  previousAttempts: readonly QueryAttempt[];
}

export const buildSqlPrompt = (input: SqlPromptInput): string => {
  const sections = [
    `Schema:\n${input.schemaDigest}`,
    input.relevantColumns,
    `Question: ${input.question}`,
  ];

  if (input.previousAttempts.length > 0) {
    const feedback = input.previousAttempts.map(
      (attempt) =>
        `Attempt ${String(attempt.attempt)} failed.\nQuery: ${attempt.query ?? '(none)'}\nError: ${attempt.error}`
    );
    sections.push(`${feedback.join('\n\n')}\n\nReturn a corrected query.`);
  }

  return sections.join('\n\n');
};

export const CLARITY_SYSTEM_INSTRUCTIONS = [
  'You decide whether an analytics question can be answered with one query over the schema given.',
  'A question is unclear when it leaves out which measure, period or grouping it means and the schema allows several readings.',
  'Reply with JSON only: {"isClear": true|false, "confidence": <0 to 1>, "interpretedAs": "<the question as you read it>", "issues": ["<problem>"], "clarifyingQuestions": ["<question for the user>"], "suggestions": ["<better phrasing>"]}.',
].join('\n');

export const buildClarityPrompt = (question: string, schemaDigest: string): string =>
  `Schema:\n${schemaDigest}\n\nQuestion: ${question}`;

/** Rows sent to the model for analysis and follow-ups, as JSON, cut at this length */
export const ANALYSIS_ROWS_CHARS = 3000;
export const FOLLOW_UP_ROWS_CHARS = 1500;

export const previewRows = (rows: readonly ResultRow[], maxChars: number): string => {
  if (rows.length === 0) {
    return 'No rows returned.';
  }
  const text = JSON.stringify(rows);
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
};

export const ANALYSIS_SYSTEM_INSTRUCTIONS = [
  'You are a financial analyst reviewing the result of a query over OpEx, demand and priority data.',
  'In at most five sentences, point out the largest contributors, trends over time and values that look unusual.',
  'Use only the figures in the result; do not invent numbers.',
].join('\n');

export interface AnalysisPromptInput {
  question: string;
  query: string;
  explanation: string;
  rows: readonly ResultRow[];
}

export const buildAnalysisPrompt = (input: AnalysisPromptInput): string =>
  [
    `Question: ${input.question}`,
    `Query: ${input.query}`,
    `Explanation: ${input.explanation === '' ? '(none)' : input.explanation}`,
    `Result: ${previewRows(input.rows, ANALYSIS_ROWS_CHARS)}`,
  ].join('\n');

export const FOLLOW_UP_SYSTEM_INSTRUCTIONS =
  'You suggest follow-up questions a finance team would ask next about their ledger data. Name the period, measure or grouping to look at. Reply with a JSON array of strings only.';

export const buildFollowUpPrompt = (
  question: string,
  rows: readonly ResultRow[],
  count: number
): string =>
  `Suggest ${String(count)} follow-up questions.\nQuestion: ${question}\nResult: ${previewRows(rows, FOLLOW_UP_ROWS_CHARS)}`;

export const PARAPHRASE_SYSTEM_INSTRUCTIONS =
  'You rewrite search questions about financial ledger data. Reply with a JSON array of strings only.';

export const buildParaphrasePrompt = (question: string, count: number): string =>
  `Write ${String(count)} alternative phrasings of this question, using synonyms a finance team would use:\n${question}`;

export const ANSWER_SYSTEM_INSTRUCTIONS = [
  'You answer questions about financial ledger lines using only the numbered references provided.',
  'Cite the references that support each statement as [R1], [R2] and so on.',
  'If the references do not answer the question, say so.',
].join('\n');

export const buildAnswerPrompt = (
  question: string,
  references: readonly { label: string; text: string }[]
): string => {
  const blocks = references.map((reference) => `[${reference.label}]\n${reference.text}`);
  return `References:\n${blocks.join('\n\n')}\n\nQuestion: ${question}`;
};
