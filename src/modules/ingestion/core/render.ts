/**
 * Text rendering of OpEx records for embedding and for citations.
 */

import type { AttributeValue, FinancialRecord } from '../../../common/types/records.js';

/** Attributes rendered on their own lines; the rest go under "Details" */
const HEADLINE_ATTRIBUTES = ['project_desc', 'fiscal_quarter', 'home_dept_desc'] as const;

const show = (value: AttributeValue | undefined): string =>
  value === null || value === undefined ? 'N/A' : String(value);

const unitLabel = (record: FinancialRecord): string =>
  record.dataType === 'mm' ? 'man-months' : "$'M";

/**
 * Multi-line description of a record. Pure: the same record always renders the
 * same text, so embeddings are reproducible.
 */
export const renderRecordText = (record: FinancialRecord): string => {
  const attrs = record.attributes;
  const quarter = attrs['fiscal_quarter'];
  const lines = [
    `Data Type: ${record.dataType === 'mm' ? 'Man-Months (MM)' : "Spend ($'M)"}`,
    `Project: ${show(attrs['project_desc'])} (${String(record.projectNumber)})`,
    `Fiscal Year: ${String(record.fiscalYear)}${quarter !== undefined && quarter !== null ? ` ${String(quarter)}` : ''}`,
    `Department: ${show(attrs['home_dept_desc'])} (Lead: ${record.deptLead ?? 'N/A'})`,
    `Category: ${record.hwSw ?? 'N/A'}`,
    `Planned: ${show(record.plannedCost)} ${unitLabel(record)}, Actual: ${show(record.actualCost)} ${unitLabel(record)}`,
  ];

  const details = Object.keys(attrs)
    .filter((key) => !HEADLINE_ATTRIBUTES.some((headline) => headline === key))
    .sort()
    .map((key) => `${key}: ${show(attrs[key])}`);
  if (details.length > 0) {
    lines.push(`Details: ${details.join(', ')}`);
  }

  return lines.join('\n');
};

/**
 * Embedding input: the rendered text on one line.
 */
export const renderEmbeddingText = (record: FinancialRecord): string =>
  renderRecordText(record).replace(/\n+/g, ' ');
