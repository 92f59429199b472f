import { describe, it, expect } from 'vitest';
import { normalizeText } from './normalize.js';

describe('normalizeText', () => {
  it('folds full-width characters and collapses whitespace', () => {
    expect(normalizeText('５０匹？ 　すごい\n')).toBe('50匹? すごい');
  });

  it('is idempotent', () => {
    const once = normalizeText('  ＡＢＣ　３０杯\t\tでした ');
    expect(normalizeText(once)).toBe(once);
  });
});
