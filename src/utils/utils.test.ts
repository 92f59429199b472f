import { describe, it, expect } from 'vitest';
import { checksumFrom, stableStringify } from './hash.js';
import { preview, truncate } from './text.js';
import { elapsedSince, extractPostedAt, fileStamp } from './time.js';

describe('time', () => {
  it('extracts the forum timestamp from a header line', () => {
    expect(extractPostedAt('投稿日: 2025年04月01日 23:15 名前: test')).toBe('2025年04月01日 23:15');
    expect(extractPostedAt('投稿日：2025年04月01日  03:05')).toBe('2025年04月01日 03:05');
    expect(extractPostedAt('名前: test')).toBeNull();
  });

  it('formats file stamps without colons or milliseconds', () => {
    expect(fileStamp(new Date('2025-04-01T12:34:56.789Z'))).toBe('2025-04-01T12-34-56Z');
  });

  it('formats elapsed time', () => {
    expect(elapsedSince(0, 42_000)).toBe('42s');
    expect(elapsedSince(0, 65_000)).toBe('1m5s');
  });
});

describe('hash', () => {
  it('serializes objects with sorted keys and without undefined values', () => {
    expect(stableStringify({ b: 1, a: { d: undefined, c: [2, 1] } })).toBe('{"a":{"c":[2,1]},"b":1}');
  });

  it('hashes equal payloads equally', () => {
    expect(checksumFrom({ url: 'u', method: 'GET' })).toBe(checksumFrom({ method: 'GET', url: 'u' }));
    expect(checksumFrom({ url: 'u' })).not.toBe(checksumFrom({ url: 'v' }));
  });
});

describe('text', () => {
  it('truncates with an ellipsis', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
    expect(truncate('abc', 4)).toBe('abc');
  });

  it('previews on a single line', () => {
    expect(preview('今夜は\n  30匹', 50)).toBe('今夜は 30匹');
  });
});
