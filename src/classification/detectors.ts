import type { DetectorSignals } from '../types/index.js';
import { countMatchingGroups, matchesCategory, type RuleTable } from './rules.js';

export function detectNegation(text: string, rules: RuleTable): boolean {
  return matchesCategory(rules, 'negation', text);
}

export function detectSmallAmount(text: string, rules: RuleTable): boolean {
  return matchesCategory(rules, 'small', text);
}

export function detectNormalAmount(text: string, rules: RuleTable): boolean {
  return matchesCategory(rules, 'normal', text);
}

export function detectLargeAmount(text: string, rules: RuleTable): boolean {
  return matchesCategory(rules, 'large', text);
}

export function detectVeryLargeAmount(text: string, rules: RuleTable): boolean {
  return matchesCategory(rules, 'veryLarge', text);
}

/**
 * A comment says nothing about the catch when it links elsewhere, is too
 * short to mention squid at all, asks a question, or mostly talks about
 * weather, travel or parking.
 *
 * A question that also reports an empty beach (`いないですよね?`) is still a
 * report and is not treated as a question.
 */
export function detectUnrelated(text: string, rules: RuleTable): boolean {
  if (matchesCategory(rules, 'link', text)) {
    return true;
  }

  if (text.length < rules.minRelevantLength && !matchesCategory(rules, 'topic', text)) {
    return true;
  }

  if (matchesCategory(rules, 'question', text) && !matchesCategory(rules, 'negativeReport', text)) {
    return true;
  }

  return (
    countMatchingGroups(rules, 'offTopic', text) >= rules.offTopicThreshold && !matchesCategory(rules, 'catch', text)
  );
}

/** Runs every detector over already-normalized text. */
export function detectSignals(normalized: string, rules: RuleTable): DetectorSignals {
  return {
    negation: detectNegation(normalized, rules),
    small: detectSmallAmount(normalized, rules),
    normal: detectNormalAmount(normalized, rules),
    large: detectLargeAmount(normalized, rules),
    veryLarge: detectVeryLargeAmount(normalized, rules),
    unrelated: detectUnrelated(normalized, rules),
  };
}
