import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

/** Process-local cache, used for `--no-cache` runs and in tests. */
export class MemoryCache implements CacheClient {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    return this.entries.get(`${namespace}/${checksum}`) ?? null;
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    this.entries.set(`${namespace}/${entry.checksum}`, {
      checksum: entry.checksum,
      body: entry.body,
      storedAt: this.now().toISOString(),
      ...(entry.metadata ? { metadata: entry.metadata } : {}),
    });
  }

  get size(): number {
    return this.entries.size;
  }
}
