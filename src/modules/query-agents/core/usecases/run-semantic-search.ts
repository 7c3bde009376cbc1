/**
 * Semantic agent: paraphrase, retrieve, merge and answer with citations.
 *
 * The question and its paraphrases are embedded together, each variant is
 * searched separately, and hits are merged by record identity keeping the
 * closest distance. The merged list is ordered by (distance, uuid), so the
 * same store contents always produce the same references.
 */

import { err, ok, type Result } from 'neverthrow';

import { raceDeadline, type Deadline } from '../../../../common/deadline.js';
import { renderRecordText } from '../../../ingestion/index.js';
import { completeWithin } from '../../../llm/index.js';
import { parseParaphrases } from '../plan.js';
import {
  ANSWER_SYSTEM_INSTRUCTIONS,
  buildAnswerPrompt,
  buildParaphrasePrompt,
  PARAPHRASE_SYSTEM_INSTRUCTIONS,
} from '../prompts.js';

import type { Citation, RetrievedRecord, SemanticAnswer } from '../types.js';
import type { ProviderError, TimeoutError } from '../../../../common/types/errors.js';
import type { FinancialRecord } from '../../../../common/types/records.js';
import type { EmbeddingGateway } from '../../../embeddings/index.js';
import type { HybridStore, StoreError } from '../../../hybrid-store/index.js';
import type { CompletionProvider } from '../../../llm/index.js';
import type { Logger } from 'pino';

export interface SemanticSearchOptions {
  /** Neighbours fetched per query variant */
  topK: number;
  /** References kept after merging */
  topN: number;
  /** Paraphrases requested in addition to the question */
  paraphrases: number;
}

export interface RunSemanticSearchDeps {
  completion: CompletionProvider;
  embeddings: EmbeddingGateway;
  store: HybridStore;
  logger: Logger;
  options: SemanticSearchOptions;
}

export interface RunSemanticSearchInput {
  question: string;
  deadline?: Deadline;
}

export type SemanticSearchError = ProviderError | StoreError;

const NO_MATCHES_ANSWER = 'No matching records were found for this question.';
const CITATION_PATTERN = /\[R(\d+)\]/g;

const compareUuid = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const normalizeVariant = (text: string): string => text.trim().replace(/\s+/g, ' ').toLowerCase();

/**
 * Question first, then distinct paraphrases up to `limit`.
 */
export const buildQueryVariants = (
  question: string,
  paraphrases: readonly string[],
  limit: number
): string[] => {
  const seen = new Set([normalizeVariant(question)]);
  const variants = [question];
  for (const paraphrase of paraphrases) {
    if (variants.length > limit) {
      break;
    }
    const key = normalizeVariant(paraphrase);
    if (key === '' || seen.has(key)) {
      continue;
    }
    seen.add(key);
    variants.push(paraphrase.trim());
  }
  return variants;
};

/**
 * Merges per-variant hits by uuid, keeping the lowest distance, and returns
 * the `topN` closest.
 */
export const mergeHits = (
  hitsPerQuery: readonly (readonly { record: FinancialRecord; distance: number }[])[],
  topN: number
): RetrievedRecord[] => {
  const merged = new Map<string, { record: FinancialRecord; distance: number; matched: number[] }>();

  hitsPerQuery.forEach((hits, queryIndex) => {
    for (const hit of hits) {
      const existing = merged.get(hit.record.uuid);
      if (existing === undefined) {
        merged.set(hit.record.uuid, {
          record: hit.record,
          distance: hit.distance,
          matched: [queryIndex],
        });
        continue;
      }
      existing.distance = Math.min(existing.distance, hit.distance);
      if (!existing.matched.includes(queryIndex)) {
        existing.matched.push(queryIndex);
      }
    }
  });

  return [...merged.values()]
    .sort((a, b) => a.distance - b.distance || compareUuid(a.record.uuid, b.record.uuid))
    .slice(0, topN)
    .map((entry) => ({
      record: entry.record,
      distance: entry.distance,
      matchedQueries: entry.matched,
    }));
};

const formatCost = (value: number | null): string => (value === null ? 'n/a' : String(value));

/**
 * One-line description used in citation lists.
 */
export const summarizeRecord = (record: FinancialRecord): string => {
  const description = record.attributes['project_desc'];
  const project =
    typeof description === 'string' && description !== ''
      ? `${description} (${String(record.projectNumber)})`
      : `Project ${String(record.projectNumber)}`;
  const unit = record.dataType === 'mm' ? ' MM' : " $'M";
  return `${project}, FY${String(record.fiscalYear)}: planned ${formatCost(record.plannedCost)}${unit}, actual ${formatCost(record.actualCost)}${unit}`;
};

/**
 * Labels (R1, R2, ...) cited in the answer, in order of first appearance.
 */
export const citedLabels = (answer: string): string[] => {
  const labels: string[] = [];
  for (const match of answer.matchAll(CITATION_PATTERN)) {
    const label = `R${match[1] ?? ''}`;
    if (!labels.includes(label)) {
      labels.push(label);
    }
  }
  return labels;
};

const extractiveAnswer = (citations: readonly Citation[]): string =>
  ['Closest matching records:', ...citations.map((c) => `[${c.label}] ${c.summary}`)].join('\n');

const embedWithin = async (
  embeddings: EmbeddingGateway,
  texts: readonly string[],
  deadline?: Deadline
): Promise<Result<number[][], ProviderError | TimeoutError>> => {
  const call = embeddings.embedBatch(texts);
  if (deadline === undefined) {
    return call;
  }
  const raced = await raceDeadline(call, deadline, 'embedding');
  return raced.isErr() ? err(raced.error) : raced.value;
};

export async function runSemanticSearch(
  deps: RunSemanticSearchDeps,
  input: RunSemanticSearchInput
): Promise<Result<SemanticAnswer, SemanticSearchError>> {
  const log = deps.logger.child({ component: 'SemanticAgent' });
  const { question, deadline } = input;
  const { topK, topN, paraphrases } = deps.options;
  const warnings: string[] = [];

  // 1. Paraphrases (best effort)
  let suggestions: string[] = [];
  if (paraphrases > 0) {
    const completion = await completeWithin(
      deps.completion,
      buildParaphrasePrompt(question, paraphrases),
      PARAPHRASE_SYSTEM_INSTRUCTIONS,
      deadline
    );
    if (completion.isErr()) {
      if (completion.error.type === 'TimeoutError') {
        return err(completion.error);
      }
      log.warn({ err: completion.error }, 'Paraphrasing failed, searching the question only');
    } else {
      const parsed = parseParaphrases(completion.value);
      if (parsed === null) {
        log.warn('Unusable paraphrases, searching the question only');
      } else {
        suggestions = parsed;
      }
    }
  }
  const queries = buildQueryVariants(question, suggestions, paraphrases);

  // 2. Embed every variant in one call
  const embedding = await embedWithin(deps.embeddings, queries, deadline);
  if (embedding.isErr()) {
    return err(embedding.error);
  }

  // 3. Search per variant
  const hitsPerQuery: { record: FinancialRecord; distance: number }[][] = [];
  for (const vector of embedding.value) {
    const hits = await deps.store.similaritySearch(vector, topK, [], { deadline });
    if (hits.isErr()) {
      return err(hits.error);
    }
    hitsPerQuery.push(hits.value);
  }

  const retrieved = mergeHits(hitsPerQuery, topN);
  log.info(
    { queries: queries.length, hits: hitsPerQuery.flat().length, kept: retrieved.length },
    'Semantic retrieval finished'
  );

  if (retrieved.length === 0) {
    return ok({
      question,
      queries,
      answer: NO_MATCHES_ANSWER,
      references: [],
      retrieved,
      warnings: ['No indexed records matched the question.'],
    });
  }

  const citations: Citation[] = retrieved.map((entry, index) => ({
    label: `R${String(index + 1)}`,
    uuid: entry.record.uuid,
    distance: entry.distance,
    summary: summarizeRecord(entry.record),
  }));

  // 4. Grounded answer, or the references themselves when the model is unavailable
  const completion = await completeWithin(
    deps.completion,
    buildAnswerPrompt(
      question,
      retrieved.map((entry, index) => ({
        label: `R${String(index + 1)}`,
        text: renderRecordText(entry.record),
      }))
    ),
    ANSWER_SYSTEM_INSTRUCTIONS,
    deadline
  );

  if (completion.isErr()) {
    if (completion.error.type === 'TimeoutError') {
      return err(completion.error);
    }
    log.warn({ err: completion.error }, 'Answer generation failed, returning references');
    warnings.push('The answer could not be generated; the closest records are listed instead.');
    return ok({
      question,
      queries,
      answer: extractiveAnswer(citations),
      references: citations,
      retrieved,
      warnings,
    });
  }

  const answer = completion.value.trim();
  const cited = citedLabels(answer);
  const references = citations.filter((citation) => cited.includes(citation.label));
  if (references.length === 0) {
    warnings.push('The answer does not cite any reference.');
  }

  return ok({
    question,
    queries,
    answer,
    references: references.length > 0 ? references : citations,
    retrieved,
    warnings,
  });
}
