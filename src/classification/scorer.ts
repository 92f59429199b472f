import type { AbundanceLabel, DetectorSignals, LocalClassification, ScoringMode } from '../types/index.js';
import { detectSignals } from './detectors.js';
import { normalizeText } from './normalize.js';
import { extractQuantity } from './numbers.js';
import { defaultRuleTable, type RuleTable, type WeightedCategory } from './rules.js';

export interface ScoredLabel {
  label: AbundanceLabel;
  reason: string;
}

export const REASON_UNRELATED = 'off-topic/question';
export const REASON_NO_SIGNAL = 'no signal matched';

/** Fixed count thresholds shared by the scorer and the post-processor. */
export function labelForQuantity(quantity: number): AbundanceLabel {
  if (quantity <= 0) {
    return 'none';
  }
  if (quantity <= 10) {
    return 'few';
  }
  if (quantity <= 30) {
    return 'moderate';
  }
  if (quantity <= 70) {
    return 'many';
  }
  return 'veryMany';
}

const INTENSITY_CUES: ReadonlyArray<{ signal: keyof DetectorSignals; label: AbundanceLabel; reason: string }> = [
  { signal: 'veryLarge', label: 'veryMany', reason: 'very-large cue' },
  { signal: 'large', label: 'many', reason: 'large cue' },
  { signal: 'normal', label: 'moderate', reason: 'normal cue' },
  { signal: 'small', label: 'few', reason: 'small cue' },
];

/**
 * First matching rule wins: off-topic, then an explicit count, then
 * negation, then the strongest intensity cue present.
 */
export function scoreByPriority(quantity: number | undefined, signals: DetectorSignals): ScoredLabel {
  if (signals.unrelated) {
    return { label: 'unknown', reason: REASON_UNRELATED };
  }
  if (quantity !== undefined) {
    return { label: labelForQuantity(quantity), reason: `quantity ${quantity}` };
  }
  if (signals.negation) {
    return { label: 'none', reason: 'negation cue' };
  }
  const cue = INTENSITY_CUES.find(({ signal }) => signals[signal]);
  if (cue) {
    return { label: cue.label, reason: cue.reason };
  }
  return { label: 'unknown', reason: REASON_NO_SIGNAL };
}

const WEIGHTED_SIGNALS: readonly WeightedCategory[] = ['veryLarge', 'large', 'normal', 'small', 'negation'];

export function quantityScore(quantity: number): number {
  if (quantity <= 0) {
    return -3;
  }
  if (quantity <= 10) {
    return -1;
  }
  if (quantity <= 30) {
    return 1;
  }
  if (quantity <= 70) {
    return 2;
  }
  return 3;
}

export function labelForScore(score: number): AbundanceLabel {
  if (score <= -2) {
    return 'none';
  }
  if (score === -1) {
    return 'few';
  }
  if (score <= 1) {
    return 'moderate';
  }
  if (score === 2) {
    return 'many';
  }
  return 'veryMany';
}

/**
 * Sums the rule table's category weights over the signals that fired. An
 * explicit count replaces the lexical sum with its own score, so numbers
 * still decide whenever they are present.
 */
export function scoreByWeight(quantity: number | undefined, signals: DetectorSignals, rules: RuleTable): ScoredLabel {
  if (signals.unrelated) {
    return { label: 'unknown', reason: REASON_UNRELATED };
  }

  let score: number;
  if (quantity !== undefined) {
    score = quantityScore(quantity);
  } else {
    const fired = WEIGHTED_SIGNALS.filter((signal) => signals[signal]);
    if (fired.length === 0) {
      return { label: 'unknown', reason: REASON_NO_SIGNAL };
    }
    score = fired.reduce((sum, signal) => sum + rules.categories[signal].weight, 0);
  }

  return { label: labelForScore(score), reason: `score ${score}` };
}

export function scoreComment(
  quantity: number | undefined,
  signals: DetectorSignals,
  mode: ScoringMode,
  rules: RuleTable,
): ScoredLabel {
  return mode === 'score' ? scoreByWeight(quantity, signals, rules) : scoreByPriority(quantity, signals);
}

/** Rule-based classification of one comment from its normalized text. */
export function classifyNormalized(normalized: string, mode: ScoringMode, rules: RuleTable): LocalClassification {
  const quantity = extractQuantity(normalized);
  const signals = detectSignals(normalized, rules);
  return { ...scoreComment(quantity, signals, mode, rules), quantity, signals };
}

export function classifyLocally(
  text: string,
  mode: ScoringMode = 'priority',
  rules: RuleTable = defaultRuleTable(),
): LocalClassification {
  return classifyNormalized(normalizeText(text), mode, rules);
}
