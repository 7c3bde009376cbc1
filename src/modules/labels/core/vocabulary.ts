/**
 * Business vocabulary: question rewriting and schema context for prompts.
 */

import { buildTermPatternSource, normalizeHeader, normalizeTerm } from './catalog.js';
import { ATTRIBUTE_PREFIX, TABLE_NAMES, type LabelCatalog, type RelevantColumn } from './types.js';

/**
 * Rewrites recognized business terms to literal column references.
 *
 * Single left-to-right pass, longest term first, so replaced text is never
 * scanned again. Catalog construction guarantees that no term occurs inside a
 * column reference, which makes the rewrite idempotent.
 *
 * @example
 * rewriteQuestion(catalog, 'total spend last quarter');
 * // => 'total actual_cost last quarter'
 */
export const rewriteQuestion = (catalog: LabelCatalog, question: string): string => {
  const source = buildTermPatternSource(catalog.vocabulary.map((v) => v.term));
  if (source === null) {
    return question;
  }

  const targets = new Map(catalog.vocabulary.map((v) => [v.term, v.target]));
  return question.replace(new RegExp(source, 'gi'), (match) => {
    return targets.get(normalizeTerm(match)) ?? match;
  });
};

const containsPhrase = (text: string, phrase: string): boolean => {
  const source = buildTermPatternSource([phrase]);
  return source !== null && new RegExp(source, 'i').test(text);
};

/**
 * Lists the columns a question refers to, by column name, spreadsheet header
 * variant or vocabulary term.
 */
export const findRelevantColumns = (
  catalog: LabelCatalog,
  question: string
): RelevantColumn[] => {
  const text = question.toLowerCase();
  const spaced = normalizeHeader(question);
  const found = new Map<string, RelevantColumn>();

  const add = (entry: RelevantColumn): void => {
    const key = `${entry.table}.${entry.column}`;
    if (!found.has(key)) {
      found.set(key, entry);
    }
  };

  const termTargets = catalog.vocabulary
    .filter((v) => containsPhrase(text, v.term))
    .map((v) => v.target);

  for (const tableName of TABLE_NAMES) {
    const table = catalog.tables[tableName];

    for (const column of table.columns) {
      const mentioned =
        text.includes(column.name) ||
        containsPhrase(spaced, normalizeHeader(column.name)) ||
        column.headers.some((h) => containsPhrase(spaced, h)) ||
        termTargets.includes(column.name);
      if (mentioned) {
        add({ table: tableName, column: column.name, description: column.description });
      }
    }

    for (const attribute of table.attributes) {
      const reference = `${ATTRIBUTE_PREFIX}${attribute.key}`;
      const mentioned =
        text.includes(reference) ||
        containsPhrase(spaced, normalizeHeader(attribute.key)) ||
        termTargets.includes(reference);
      if (mentioned) {
        add({ table: tableName, column: reference, description: attribute.description });
      }
    }
  }

  return [...found.values()];
};

/**
 * Renders the relevant-column list for a prompt.
 */
export const formatRelevantColumns = (columns: readonly RelevantColumn[]): string => {
  if (columns.length === 0) {
    return 'No specific schema mappings found for this question.';
  }
  const lines = ['Relevant schema information:'];
  for (const column of columns) {
    lines.push(`- ${column.table}.${column.column}: ${column.description}`);
  }
  return lines.join('\n');
};

/**
 * Digest of every table, column and vocabulary term, used by the router and
 * the SQL agent.
 */
export const describeSchema = (catalog: LabelCatalog): string => {
  const lines: string[] = [];

  for (const tableName of TABLE_NAMES) {
    const table = catalog.tables[tableName];
    lines.push(`Table ${table.name}: ${table.description}`);
    for (const column of table.columns) {
      lines.push(`  - ${column.name} (${column.type}): ${column.description}`);
    }
    for (const attribute of table.attributes) {
      lines.push(
        `  - ${ATTRIBUTE_PREFIX}${attribute.key} (${attribute.type}, attribute bag): ${attribute.description}`
      );
    }
  }

  if (catalog.vocabulary.length > 0) {
    const terms = [...catalog.vocabulary]
      .sort((a, b) => (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
      .map((v) => `${v.term} -> ${v.target}`);
    lines.push(`Business vocabulary: ${terms.join('; ')}`);
  }

  return lines.join('\n');
};
