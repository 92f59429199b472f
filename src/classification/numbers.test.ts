import { describe, it, expect } from 'vitest';
import { extractQuantity, findQuantities, hasZeroCue } from './numbers.js';

describe('findQuantities', () => {
  it('reads counts attached to a counter word', () => {
    expect(findQuantities('10分で50匹ぐらい')).toEqual([{ kind: 'counter', value: 50, text: '50匹' }]);
  });

  it('reads approximate and per-unit figures', () => {
    expect(findQuantities('40くらい')).toEqual([{ kind: 'approximate', value: 40, text: '40くらい' }]);
    expect(findQuantities('5ずつ')).toEqual([{ kind: 'perUnit', value: 5, text: '5ずつ' }]);
  });

  it('takes the floor of the midpoint of a range', () => {
    expect(findQuantities('20〜31')).toEqual([{ kind: 'range', value: 25, text: '20〜31' }]);
  });

  it('does not read time spans as ranges', () => {
    expect(findQuantities('21〜23時に行った')).toEqual([]);
    expect(findQuantities('2〜3時間粘った')).toEqual([]);
    expect(findQuantities('10~20分待った')).toEqual([]);
  });

  it('does not read times or lengths after 約 as counts', () => {
    expect(findQuantities('約3時に到着')).toEqual([]);
    expect(findQuantities('約30分待った')).toEqual([]);
    expect(findQuantities('約30')).toEqual([{ kind: 'about', value: 30, text: '約30' }]);
  });

  it('reads single kanji numerals but not compounds', () => {
    expect(findQuantities('三匹だけ')).toEqual([{ kind: 'kanji', value: 3, text: '三匹' }]);
    expect(findQuantities('二十匹')).toEqual([]);
  });
});

describe('extractQuantity', () => {
  it('returns the largest quantity in the comment', () => {
    expect(extractQuantity('最初は5匹、後半で40匹、最後に3匹')).toBe(40);
  });

  it('ignores times when the only count comes later', () => {
    expect(extractQuantity('0時から2時までゼロでしたが、3時過ぎに28匹でした')).toBe(28);
  });

  it('lets a zero cue win over larger numbers', () => {
    expect(extractQuantity('0匹の人もいたが隣は30匹')).toBe(0);
    expect(extractQuantity('今日はゼロ匹')).toBe(0);
  });

  it('reads "not even one" as zero in both spellings', () => {
    expect(extractQuantity('1匹も獲れなかった')).toBe(0);
    expect(extractQuantity('一匹も獲れなかった')).toBe(0);
    expect(extractQuantity('11匹も獲れた')).toBe(11);
    expect(extractQuantity('十一匹も獲れた')).toBeUndefined();
  });

  it('returns undefined without any count', () => {
    expect(extractQuantity('大量でした')).toBeUndefined();
  });
});

describe('hasZeroCue', () => {
  it('does not treat the last digit of a larger number as zero', () => {
    expect(hasZeroCue('10匹')).toBe(false);
    expect(hasZeroCue('0匹')).toBe(true);
  });
});
