import { ABUNDANCE_LABELS, type AbundanceLabel, type Batch } from '../types/index.js';

/** A run this small most likely read only the first page. */
export const SINGLE_PAGE_ROW_LIMIT = 50;

export function countLabels(batch: Batch): Record<AbundanceLabel, number> {
  const counts: Record<AbundanceLabel, number> = { none: 0, few: 0, moderate: 0, many: 0, veryMany: 0, unknown: 0 };
  for (const result of batch) {
    counts[result.label] += 1;
  }
  return counts;
}

/** One line per label, lowest intensity first and `unknown` last, each with its share of the batch. */
export function formatLabelSummary(batch: Batch): string[] {
  const counts = countLabels(batch);
  return ABUNDANCE_LABELS.map((label) => {
    const share = batch.length === 0 ? 0 : (counts[label] / batch.length) * 100;
    return `${label}: ${counts[label]} (${share.toFixed(1)}%)`;
  });
}

/** Warning for suspiciously small runs, or undefined when the row count looks normal. */
export function rowCountWarning(rows: number): string | undefined {
  if (rows === 0) {
    return 'No comments were collected.';
  }
  if (rows <= SINGLE_PAGE_ROW_LIMIT) {
    return `Only ${rows} rows were collected; pagination may have failed and only the first page was read.`;
  }
  return undefined;
}
