import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { isFresh } from './cache.js';
import { FileCache } from './fileCache.js';
import { MemoryCache } from './memoryCache.js';

describe('FileCache', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(path.join(os.tmpdir(), 'surge-cache-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('returns null for a missing entry', async () => {
    await expect(new FileCache({ baseDir }).read('pages', 'abc')).resolves.toBeNull();
  });

  it('round-trips body and metadata', async () => {
    const cache = new FileCache({ baseDir });
    await cache.write('pages', { checksum: 'abc', body: '<html>イカ</html>', metadata: { url: 'https://example.test/' } });

    const entry = await cache.read('pages', 'abc');
    expect(entry?.body).toBe('<html>イカ</html>');
    expect(entry?.metadata).toEqual({ url: 'https://example.test/' });
    expect(Number.isNaN(Date.parse(entry?.storedAt ?? ''))).toBe(false);
  });

  it('keeps namespaces inside the base directory', async () => {
    const cache = new FileCache({ baseDir });
    await cache.write('../llm responses', { checksum: 'abc', body: '{}' });
    expect(await readdir(baseDir)).toEqual(['..-llm-responses']);
  });
});

describe('MemoryCache', () => {
  it('stamps entries with its clock', async () => {
    const cache = new MemoryCache(() => new Date('2025-04-01T00:00:00.000Z'));
    await cache.write('pages', { checksum: 'abc', body: 'x' });
    expect(await cache.read('pages', 'abc')).toEqual({ checksum: 'abc', body: 'x', storedAt: '2025-04-01T00:00:00.000Z' });
    expect(cache.size).toBe(1);
  });
});

describe('isFresh', () => {
  const entry = { checksum: 'abc', body: 'x', storedAt: '2025-04-01T00:00:00.000Z' };
  const storedMs = Date.parse(entry.storedAt);

  it('compares the entry age with the limit', () => {
    expect(isFresh(entry, 1000, storedMs + 999)).toBe(true);
    expect(isFresh(entry, 1000, storedMs + 1000)).toBe(false);
  });

  it('treats an unreadable timestamp as stale', () => {
    expect(isFresh({ ...entry, storedAt: 'yesterday' }, 1000, storedMs)).toBe(false);
  });
});
