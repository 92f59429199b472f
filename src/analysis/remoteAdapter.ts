import OpenAI from 'openai';
import type { CacheClient } from '../cache/cache.js';
import type { PipelineConfig } from '../config.js';
import type { ClassificationResult, ForumComment, LocalClassification, RemoteClassification } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { describeError, fixedBackoff, RetryPolicy } from '../utils/retry.js';
import type { Sleeper } from '../utils/sleep.js';
import { preview } from '../utils/text.js';
import { LlmCache } from './llmCache.js';
import { OpenAiAbundanceClient, type AbundanceModelClient } from './openaiClassifier.js';

/**
 * Turns a local classification into the final one. Which variant a run uses
 * is decided once, when the analyzer is built.
 */
export interface RemoteAdapter {
  readonly kind: 'configured' | 'unavailable';
  reconcile(comment: ForumComment, local: LocalClassification): Promise<ClassificationResult>;
}

function localResult(comment: ForumComment, local: LocalClassification, note?: string): ClassificationResult {
  return {
    comment,
    label: local.label,
    source: 'local',
    reason: note ? `${local.reason} (${note})` : local.reason,
  };
}

/** Local-only mode: no model is configured, the rule-based label stands. */
export class UnavailableRemoteAdapter implements RemoteAdapter {
  readonly kind = 'unavailable';

  constructor(readonly why: string) {}

  async reconcile(comment: ForumComment, local: LocalClassification): Promise<ClassificationResult> {
    return localResult(comment, local);
  }
}

export class ConfiguredRemoteAdapter implements RemoteAdapter {
  readonly kind = 'configured';

  constructor(
    private readonly client: AbundanceModelClient,
    private readonly retry: RetryPolicy,
    private readonly logger: Logger,
  ) {}

  /**
   * The model's label wins whenever the call succeeds. A disagreement between
   * two confident labels is logged, not raised. When every attempt fails the
   * local label is returned unchanged.
   */
  async reconcile(comment: ForumComment, local: LocalClassification): Promise<ClassificationResult> {
    let remote: RemoteClassification;
    try {
      remote = await this.retry.run(() => this.client.classify(comment.text));
    } catch (error) {
      this.logger.warn(`Model call failed for "${preview(comment.text)}", keeping local label ${local.label}: ${describeError(error)}`);
      return localResult(comment, local, 'remote failed');
    }

    this.logger.debug(`Model: ${remote.label} (${remote.reason}); local: ${local.label} (${local.reason})`);

    if (remote.label === local.label) {
      return { comment, label: remote.label, source: 'reconciled', reason: `${local.reason}; model: ${remote.reason}` };
    }

    if (remote.label !== 'unknown' && local.label !== 'unknown') {
      this.logger.warn(
        `Discrepancy: model=${remote.label}, local=${local.label} (${local.reason}), text="${preview(comment.text)}"`,
      );
    }
    return { comment, label: remote.label, source: 'remote', reason: `model: ${remote.reason}` };
  }
}

export interface RemoteAdapterDeps {
  cache: CacheClient;
  logger: Logger;
  sleep?: Sleeper;
}

export function createRemoteAdapter(config: PipelineConfig, deps: RemoteAdapterDeps): RemoteAdapter {
  const { remote } = config;
  if (!remote.enabled) {
    deps.logger.info(`Model classification unavailable (${remote.reason}); using local rules only.`);
    return new UnavailableRemoteAdapter(remote.reason);
  }

  // Retries belong to the adapter's policy, not to the SDK.
  const openai = new OpenAI({
    apiKey: remote.apiKey,
    baseURL: remote.baseUrl,
    timeout: remote.timeoutMs,
    maxRetries: 0,
  });
  const client = new OpenAiAbundanceClient(openai, new LlmCache(deps.cache, deps.logger), { model: remote.model });
  const retry = new RetryPolicy({
    maxAttempts: config.remoteRetry.maxAttempts,
    backoff: fixedBackoff(config.remoteRetry.backoffMs),
    sleep: deps.sleep,
    onRetry: (error, attempt, waitMs) =>
      deps.logger.warn(`Model attempt ${attempt} failed (${describeError(error)}); retrying in ${waitMs}ms.`),
  });
  deps.logger.info(`Model classification enabled with ${remote.model}.`);
  return new ConfiguredRemoteAdapter(client, retry, deps.logger);
}
