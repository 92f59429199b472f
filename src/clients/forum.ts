import type { CacheClient } from '../cache/cache.js';
import { isFresh } from '../cache/cache.js';
import type { ForumComment } from '../types/index.js';
import { checksumFrom } from '../utils/hash.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { describeError, linearBackoff, RetryPolicy } from '../utils/retry.js';
import { sleep as realSleep, type Sleeper } from '../utils/sleep.js';
import { parseForumPage, parsePaginationLinks, type SkippedPost } from './forumParser.js';

export interface ForumClientOptions {
  baseUrl: string;
  cache: CacheClient;
  maxPages?: number;
  requestSpacingMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  pageCacheTtlMs?: number;
  maxAttempts?: number;
  retryBackoffMs?: number;
  namespace?: string;
  fetchImpl?: typeof fetch;
  sleep?: Sleeper;
  now?: () => number;
  logger?: Logger;
}

export interface ForumPage {
  url: string;
  /** 1-based position in the discovered page list. */
  pageIndex: number;
  comments: ForumComment[];
  skipped: SkippedPost[];
}

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly retryAfterMs: number | undefined,
  ) {
    super(`GET ${url} failed with status ${status}`);
    this.name = 'HttpStatusError';
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  // Network failures and timeouts.
  return true;
}

export class ForumClient {
  private readonly baseUrl: string;
  private readonly cache: CacheClient;
  private readonly maxPages: number;
  private readonly requestSpacingMs: number;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly pageCacheTtlMs: number;
  private readonly namespace: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleeper;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private lastRequestAt: number | undefined;

  constructor(options: ForumClientOptions) {
    this.baseUrl = options.baseUrl;
    this.cache = options.cache;
    this.maxPages = options.maxPages ?? 5;
    this.requestSpacingMs = options.requestSpacingMs ?? 3000;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.userAgent = options.userAgent ?? 'hotaruika-surge/0.1.0';
    this.pageCacheTtlMs = options.pageCacheTtlMs ?? 10 * 60 * 1000;
    this.namespace = options.namespace ?? 'forum-pages';
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.retry = new RetryPolicy({
      maxAttempts: options.maxAttempts ?? 3,
      backoff: linearBackoff(options.retryBackoffMs ?? 5000),
      sleep: this.sleep,
      shouldRetry: isRetryable,
      delayFor: (error) => (error instanceof HttpStatusError ? error.retryAfterMs : undefined),
      onRetry: (error, attempt, waitMs) =>
        this.logger.warn(`Fetch attempt ${attempt} failed (${describeError(error)}). Retrying in ${waitMs}ms.`),
    });
  }

  /** The base page followed by the numbered pages its pagination strip links to, capped at `maxPages`. */
  async discoverPageUrls(): Promise<string[]> {
    const urls = [this.baseUrl];
    let links: string[] = [];
    try {
      links = parsePaginationLinks(await this.fetchPage(this.baseUrl), this.baseUrl);
    } catch (error) {
      this.logger.warn(`Could not read pagination from ${this.baseUrl}: ${describeError(error)}`);
    }

    for (const link of links) {
      if (urls.length >= this.maxPages) {
        break;
      }
      if (!urls.includes(link)) {
        urls.push(link);
      }
    }
    this.logger.info(`Found ${urls.length} page${urls.length === 1 ? '' : 's'} to scrape.`);
    return urls;
  }

  /** Parsed posts page by page. A page that cannot be fetched is logged and skipped. */
  async *fetchComments(): AsyncGenerator<ForumPage> {
    const urls = await this.discoverPageUrls();
    for (const [index, url] of urls.entries()) {
      const pageIndex = index + 1;
      let html: string;
      try {
        html = await this.fetchPage(url);
      } catch (error) {
        this.logger.error(`Skipping page ${pageIndex} (${url}): ${describeError(error)}`);
        continue;
      }

      const { comments, skipped } = parseForumPage(html, url, pageIndex);
      for (const post of skipped) {
        this.logger.warn(`Page ${pageIndex}: skipped post #${post.position + 1} (${post.reason}) "${post.preview}"`);
      }
      this.logger.info(`Page ${pageIndex}: ${comments.length} comments.`);
      yield { url, pageIndex, comments, skipped };
    }
  }

  /** Page HTML from the cache while it is fresh, otherwise fetched with spacing and retries. */
  async fetchPage(url: string): Promise<string> {
    const checksum = checksumFrom({ url, method: 'GET' });
    const cached = await this.cache.read(this.namespace, checksum);
    if (cached && isFresh(cached, this.pageCacheTtlMs, this.now())) {
      this.logger.debug(`Cache hit for ${url}`);
      return cached.body;
    }

    const html = await this.retry.run(() => this.fetchLive(url));
    await this.cache.write(this.namespace, { checksum, body: html, metadata: { url } });
    return html;
  }

  private async fetchLive(url: string): Promise<string> {
    if (this.lastRequestAt !== undefined) {
      const elapsed = this.now() - this.lastRequestAt;
      if (this.requestSpacingMs > 0 && elapsed < this.requestSpacingMs) {
        await this.sleep(this.requestSpacingMs - elapsed);
      }
    }

    this.logger.debug(`GET ${url}`);
    this.lastRequestAt = this.now();
    const response = await this.fetchImpl(url, {
      headers: { 'User-Agent': this.userAgent, Accept: 'text/html' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, url, parseRetryAfter(response.headers.get('retry-after')));
    }
    return decodeHtml(new Uint8Array(await response.arrayBuffer()), response.headers.get('content-type'));
  }
}

export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Decodes with the charset from the Content-Type header, then from a
 * `<meta charset>` in the first bytes, then as UTF-8.
 */
export function decodeHtml(bytes: Uint8Array, contentType: string | null): string {
  const charset = charsetFrom(contentType) ?? charsetFrom(new TextDecoder('latin1').decode(bytes.subarray(0, 2048)));
  if (charset) {
    try {
      return new TextDecoder(charset).decode(bytes);
    } catch (error) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
      // Unknown label; fall through to UTF-8.
    }
  }
  return new TextDecoder('utf-8').decode(bytes);
}

function charsetFrom(text: string | null): string | undefined {
  const match = text ? /charset\s*=\s*["']?([\w-]+)/i.exec(text) : null;
  return match?.[1]?.toLowerCase();
}
