import type { CacheClient } from '../cache/cache.js';
import type { JotSchema } from '../jot.js';
import { checksumFrom } from '../utils/hash.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { describeError } from '../utils/retry.js';

/**
 * Memoizes model calls by a checksum of their request payload. Cached bodies
 * are re-validated with the caller's schema, so an entry written by an older
 * schema is recomputed instead of trusted.
 */
export class LlmCache {
  constructor(
    private readonly cache: CacheClient,
    private readonly logger: Logger = silentLogger,
    private readonly namespace: string = 'llm-responses',
  ) {}

  async getOrCompute<T>(payload: { type: string } & Record<string, unknown>, schema: JotSchema<T>, compute: () => Promise<T>): Promise<T> {
    const checksum = checksumFrom(payload);
    const cached = await this.cache.read(this.namespace, checksum);
    if (cached) {
      const reused = tryParse(schema, cached.body);
      if (reused !== undefined) {
        return reused;
      }
    }

    const result = await compute();
    // A paid answer is returned even when it cannot be stored.
    try {
      await this.cache.write(this.namespace, {
        checksum,
        body: JSON.stringify(result),
        metadata: { payloadType: payload.type },
      });
    } catch (error) {
      this.logger.warn(`Could not cache ${payload.type} response: ${describeError(error)}`);
    }

    return result;
  }
}

function tryParse<T>(schema: JotSchema<T>, body: string): T | undefined {
  try {
    return schema.parse(JSON.parse(body));
  } catch {
    return undefined;
  }
}
