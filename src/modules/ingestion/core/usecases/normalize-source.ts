import { err, type Result } from 'neverthrow';

import { detectFileCategory } from '../file-category.js';
import { normalizeDemandWorkbook } from '../normalizers/demand.js';
import { normalizeOpexWorkbook } from '../normalizers/opex.js';
import { normalizePriorityWorkbook } from '../normalizers/priority.js';

import type { ParseError } from '../errors.js';
import type { NormalizeDeps, NormalizedSource, SourceFile, WorkbookReader } from '../types.js';

export interface NormalizeSourceDeps extends NormalizeDeps {
  readWorkbook: WorkbookReader;
}

/**
 * Parses one file and normalizes it according to its category.
 *
 * Pure with respect to its input: normalizing the same bytes twice yields the
 * same records in the same order.
 */
export function normalizeSource(
  deps: NormalizeSourceDeps,
  source: SourceFile
): Result<NormalizedSource, ParseError> {
  const workbook = deps.readWorkbook(source);
  if (workbook.isErr()) {
    return err(workbook.error);
  }

  const filename = source.filename;

  switch (detectFileCategory(filename)) {
    case 'opex':
      return normalizeOpexWorkbook(deps, workbook.value).map<NormalizedSource>((outcomes) => ({
        category: 'opex',
        filename,
        outcomes,
      }));
    case 'demand':
      return normalizeDemandWorkbook(deps, workbook.value).map<NormalizedSource>((outcomes) => ({
        category: 'demand',
        filename,
        outcomes,
      }));
    case 'priority':
      return normalizePriorityWorkbook(deps, workbook.value).map<NormalizedSource>((outcomes) => ({
        category: 'priority',
        filename,
        outcomes,
      }));
  }
}

/**
 * Collects the records of a normalized source, discarding warnings.
 */
export const collectRecords = <R>(
  outcomes: Iterable<{ kind: 'record'; record: R } | { kind: 'warning' }>
): R[] => {
  const records: R[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind === 'record') {
      records.push(outcome.record);
    }
  }
  return records;
};
