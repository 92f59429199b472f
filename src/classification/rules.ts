import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { jot, type InferJot } from '../jot.js';

/**
 * The heuristic vocabulary lives in one versioned JSON table: category →
 * weight + pattern groups. Detectors, the score mode and the post-processor
 * all read from it, so changing a cue never means touching control flow.
 */

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../rules/abundance-rules.json', import.meta.url));

const categoryNode = jot.object({
  weight: jot.number({ integer: true }),
  groups: jot.array(jot.string({ minLength: 1 }), { minItems: 1 }),
});

const ruleFileNode = jot.object({
  version: jot.string({ minLength: 1 }),
  minRelevantLength: jot.number({ integer: true }),
  offTopicThreshold: jot.number({ integer: true }),
  categories: jot.object({
    negation: categoryNode,
    small: categoryNode,
    normal: categoryNode,
    large: categoryNode,
    veryLarge: categoryNode,
    topic: categoryNode,
    question: categoryNode,
    negativeReport: categoryNode,
    offTopic: categoryNode,
    catch: categoryNode,
    link: categoryNode,
    strongVeryLarge: categoryNode,
    strongNegation: categoryNode,
  }),
});

export type RuleFile = InferJot<typeof ruleFileNode>;

export type RuleCategory = keyof RuleFile['categories'];

export type WeightedCategory = 'negation' | 'small' | 'normal' | 'large' | 'veryLarge';

export interface CompiledCategory {
  weight: number;
  groups: RegExp[];
}

export interface RuleTable {
  version: string;
  minRelevantLength: number;
  offTopicThreshold: number;
  categories: Record<RuleCategory, CompiledCategory>;
}

export function compileRules(raw: unknown, source: string = 'rules'): RuleTable {
  const parsed = ruleFileNode.parse(raw, source);
  const compile = (name: RuleCategory): CompiledCategory => {
    const category = parsed.categories[name];
    return {
      weight: category.weight,
      groups: category.groups.map((pattern, index) => compilePattern(pattern, `${source}.categories.${name}.groups[${index}]`)),
    };
  };

  return {
    version: parsed.version,
    minRelevantLength: parsed.minRelevantLength,
    offTopicThreshold: parsed.offTopicThreshold,
    categories: {
      negation: compile('negation'),
      small: compile('small'),
      normal: compile('normal'),
      large: compile('large'),
      veryLarge: compile('veryLarge'),
      topic: compile('topic'),
      question: compile('question'),
      negativeReport: compile('negativeReport'),
      offTopic: compile('offTopic'),
      catch: compile('catch'),
      link: compile('link'),
      strongVeryLarge: compile('strongVeryLarge'),
      strongNegation: compile('strongNegation'),
    },
  };
}

export function loadRules(filePath: string = DEFAULT_RULES_PATH): RuleTable {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new Error(`Unable to read rule table at ${filePath}`, { cause: error });
  }
  return compileRules(JSON.parse(raw), filePath);
}

let defaultRules: RuleTable | undefined;

/** The bundled rule table, read once per process. */
export function defaultRuleTable(): RuleTable {
  defaultRules ??= loadRules();
  return defaultRules;
}

export function matchesCategory(rules: RuleTable, category: RuleCategory, text: string): boolean {
  return rules.categories[category].groups.some((pattern) => pattern.test(text));
}

/** Number of distinct groups of a category that match, used for threshold rules. */
export function countMatchingGroups(rules: RuleTable, category: RuleCategory, text: string): number {
  return rules.categories[category].groups.filter((pattern) => pattern.test(text)).length;
}

function compilePattern(pattern: string, path: string): RegExp {
  try {
    // No `g` flag: `test` must stay stateless across calls.
    return new RegExp(pattern, 'iu');
  } catch (error) {
    throw new Error(`${path} is not a valid regular expression: ${pattern}`, { cause: error });
  }
}
