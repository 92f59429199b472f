const COUNTER = '(?:匹|杯|尾|個|つ)';
// Units that make a number a time or a measurement rather than a count.
const NOT_A_COUNT = '(?![\\d.])(?!\\s*(?:時|分|秒|日|月|年|m|cm|km|度|%|円))';

const KANJI_DIGITS: Record<string, number> = {
  二: 2,
  三: 3,
  四: 4,
  五: 5,
  六: 6,
  七: 7,
  八: 8,
  九: 9,
  十: 10,
};

export type QuantityKind = 'counter' | 'about' | 'approximate' | 'perUnit' | 'range' | 'kanji';

export interface QuantityMatch {
  kind: QuantityKind;
  value: number;
  text: string;
}

interface QuantityPattern {
  kind: QuantityKind;
  pattern: RegExp;
  read(match: RegExpMatchArray): number | undefined;
}

const readFirst = (match: RegExpMatchArray) => toInteger(match[1]);

const QUANTITY_PATTERNS: readonly QuantityPattern[] = [
  { kind: 'counter', pattern: new RegExp(`(\\d+)\\s*${COUNTER}`, 'gu'), read: readFirst },
  { kind: 'about', pattern: new RegExp(`約\\s*(\\d+)${NOT_A_COUNT}`, 'gu'), read: readFirst },
  { kind: 'approximate', pattern: /(\d+)\s*(?:くらい|ぐらい|ほど|程度|位|前後)/gu, read: readFirst },
  { kind: 'perUnit', pattern: /(\d+)\s*(?:ずつ|づつ)/gu, read: readFirst },
  {
    kind: 'range',
    pattern: new RegExp(`(\\d+)\\s*[〜~–]\\s*(\\d+)${NOT_A_COUNT}`, 'gu'),
    read: (match) => {
      const low = toInteger(match[1]);
      const high = toInteger(match[2]);
      return low === undefined || high === undefined ? undefined : Math.floor((low + high) / 2);
    },
  },
  {
    kind: 'kanji',
    pattern: new RegExp(`(?<![一二三四五六七八九十百千])([二三四五六七八九十])\\s*${COUNTER}`, 'gu'),
    read: (match) => (match[1] === undefined ? undefined : KANJI_DIGITS[match[1]]),
  },
];

/** `0匹`, `ゼロ杯`, `1匹も`, `一匹も`: an explicit report of nothing caught. */
export const ZERO_CUE =
  /(?<![\d.])0\s*(?:匹|杯|尾|個)|(?:ゼロ|零)\s*(?:匹|杯|尾|個)|(?<![\d.])1\s*(?:匹|杯|尾|個)も|(?<![一二三四五六七八九十百千])一\s*(?:匹|杯|尾|個)も/u;

/** Every quantity expression in the text, in pattern-class order. */
export function findQuantities(normalized: string): QuantityMatch[] {
  const found: QuantityMatch[] = [];
  for (const { kind, pattern, read } of QUANTITY_PATTERNS) {
    for (const match of normalized.matchAll(pattern)) {
      const value = read(match);
      if (value !== undefined) {
        found.push({ kind, value, text: match[0] });
      }
    }
  }
  return found;
}

export function hasZeroCue(normalized: string): boolean {
  return ZERO_CUE.test(normalized);
}

/**
 * The representative count of a comment: 0 when it carries a zero cue,
 * otherwise the largest quantity mentioned anywhere in it, or undefined when
 * it mentions none. The whole comment is scanned; a later, smaller figure
 * does not displace an earlier, larger one.
 */
export function extractQuantity(normalized: string): number | undefined {
  if (hasZeroCue(normalized)) {
    return 0;
  }

  let best: number | undefined;
  for (const { value } of findQuantities(normalized)) {
    if (best === undefined || value > best) {
      best = value;
    }
  }
  return best;
}

function toInteger(digits: string | undefined): number | undefined {
  if (digits === undefined) {
    return undefined;
  }
  const value = Number.parseInt(digits, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}
