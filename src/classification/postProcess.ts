import type { AbundanceLabel, Batch, ClassificationResult } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { preview } from '../utils/text.js';
import { normalizeText } from './normalize.js';
import { extractQuantity } from './numbers.js';
import { matchesCategory, type RuleTable } from './rules.js';
import { labelForQuantity } from './scorer.js';

export interface PostProcessOutcome {
  batch: Batch;
  overridden: number;
}

interface Override {
  label: AbundanceLabel;
  reason: string;
}

/**
 * Second pass over a finished batch. Rules run in order against the running
 * label:
 *
 * 1. an `unknown` label with a count in the text takes the count's label;
 * 2. strong very-large vocabulary lifts anything below `many` to `veryMany`;
 * 3. strong zero vocabulary forces `none`.
 *
 * Rule 3 runs last and only ever moves to `none`, so a second pass finds
 * nothing left to change.
 */
export function postProcessBatch(batch: Batch, rules: RuleTable, logger: Logger = silentLogger): PostProcessOutcome {
  let overridden = 0;
  const revised = batch.map((result) => {
    const override = reviseLabel(result, rules);
    if (!override) {
      return result;
    }
    overridden += 1;
    logger.info(`${preview(result.comment.text)} -> ${override.label} (${override.reason}, was ${result.label})`);
    return { ...result, label: override.label, reason: `${result.reason}; post-process: ${override.reason}` };
  });

  return { batch: revised, overridden };
}

function reviseLabel(result: ClassificationResult, rules: RuleTable): Override | null {
  const text = normalizeText(result.comment.text);
  let current: Override = { label: result.label, reason: '' };

  if (current.label === 'unknown') {
    const quantity = extractQuantity(text);
    if (quantity !== undefined) {
      current = { label: labelForQuantity(quantity), reason: `quantity ${quantity}` };
    }
  }

  if (
    matchesCategory(rules, 'strongVeryLarge', text) &&
    current.label !== 'many' &&
    current.label !== 'veryMany'
  ) {
    current = { label: 'veryMany', reason: 'strong very-large cue' };
  }

  if (matchesCategory(rules, 'strongNegation', text) && current.label !== 'none') {
    current = { label: 'none', reason: 'strong negation cue' };
  }

  return current.label === result.label ? null : current;
}
