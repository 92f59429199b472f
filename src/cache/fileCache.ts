import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

interface MetadataFile {
  storedAt: string;
  metadata?: Record<string, unknown>;
}

export interface FileCacheOptions {
  baseDir?: string;
}

/** Stores each entry as `<baseDir>/<namespace>/<checksum>.body` plus a `.meta.json` sidecar. */
export class FileCache implements CacheClient {
  private readonly baseDir: string;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
  }

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    const { bodyPath, metaPath } = this.paths(namespace, checksum);

    let body: string;
    let metaRaw: string;
    try {
      [body, metaRaw] = await Promise.all([fs.readFile(bodyPath, 'utf8'), fs.readFile(metaPath, 'utf8')]);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const meta: MetadataFile = JSON.parse(metaRaw);
    return {
      checksum,
      body,
      storedAt: meta.storedAt,
      ...(meta.metadata ? { metadata: meta.metadata } : {}),
    };
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const { dir, bodyPath, metaPath } = this.paths(namespace, entry.checksum);
    await fs.mkdir(dir, { recursive: true });

    const meta: MetadataFile = { storedAt: new Date().toISOString() };
    if (entry.metadata) {
      meta.metadata = entry.metadata;
    }

    // Body first: a reader only trusts an entry once its metadata exists.
    await fs.writeFile(bodyPath, entry.body, 'utf8');
    await fs.writeFile(metaPath, JSON.stringify(meta, null, 2), 'utf8');
  }

  private paths(namespace: string, checksum: string) {
    const dir = path.join(this.baseDir, namespace.replace(/[^a-zA-Z0-9._-]+/g, '-'));
    return {
      dir,
      bodyPath: path.join(dir, `${checksum}.body`),
      metaPath: path.join(dir, `${checksum}.meta.json`),
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
