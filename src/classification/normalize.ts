import { collapseWhitespace } from '../utils/text.js';

/**
 * Canonical form every matcher runs against: NFKC folds full-width digits,
 * letters and punctuation (`５０匹？` becomes `50匹?`), then whitespace runs
 * collapse to single spaces.
 */
export function normalizeText(raw: string): string {
  return collapseWhitespace(raw.normalize('NFKC'));
}
