export interface CacheEntry {
  checksum: string;
  /** ISO timestamp of the write. */
  storedAt: string;
  metadata?: Record<string, unknown>;
  body: string;
}

export interface CacheWriteInput {
  checksum: string;
  body: string;
  metadata?: Record<string, unknown>;
}

export interface CacheClient {
  read(namespace: string, checksum: string): Promise<CacheEntry | null>;
  write(namespace: string, entry: CacheWriteInput): Promise<void>;
}

/** True when the entry is younger than `maxAgeMs`. A missing or unparsable timestamp counts as stale. */
export function isFresh(entry: CacheEntry, maxAgeMs: number, nowMs: number = Date.now()): boolean {
  const storedMs = Date.parse(entry.storedAt);
  if (Number.isNaN(storedMs)) {
    return false;
  }
  return nowMs - storedMs < maxAgeMs;
}
