import path from 'node:path';
import type { ScoringMode } from './types/index.js';
import { fileStamp } from './utils/time.js';

export const DEFAULT_BASE_URL = 'https://rara.jp/hotaruika-toyama/';
export const DEFAULT_MODEL = 'gpt-5-nano-2025-08-07';
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface RetrySettings {
  maxAttempts: number;
  backoffMs: number;
}

export type RemoteConfig =
  | { enabled: true; apiKey: string; baseUrl: string | undefined; model: string; timeoutMs: number }
  | { enabled: false; reason: string };

export interface PipelineConfig {
  scoringMode: ScoringMode;
  /** Rule table to load; undefined means the bundled one. */
  rulesPath: string | undefined;
  remote: RemoteConfig;
  remoteRetry: RetrySettings;
}

export interface ScrapeConfig {
  baseUrl: string;
  maxPages: number;
  requestSpacingMs: number;
  timeoutMs: number;
  userAgent: string;
  pageCacheTtlMs: number;
  fetchRetry: RetrySettings;
}

export interface RunConfig {
  pipeline: PipelineConfig;
  scrape: ScrapeConfig;
  outputPath: string;
  backupPath: string;
  /** null keeps every cache in memory for this run only. */
  cacheDir: string | null;
  verbose: boolean;
}

/** Options as commander hands them over: strings for values, booleans for switches. */
export interface RawRunOptions {
  baseUrl?: string;
  maxPages?: string;
  requestSpacing?: string;
  timeout?: string;
  output?: string;
  backup?: string;
  scoring?: string;
  rules?: string;
  model?: string;
  remote?: boolean;
  cacheDir?: string;
  cache?: boolean;
  verbose?: boolean;
}

export type Environment = Record<string, string | undefined>;

export function buildRunConfig(raw: RawRunOptions, env: Environment, now: Date = new Date()): RunConfig {
  const outputPath = path.resolve(raw.output?.trim() || path.join('output', `${fileStamp(now)}_surge-levels.csv`));
  const backupPath = path.resolve(raw.backup?.trim() || outputPath.replace(/\.csv$/i, '') + '.backup.csv');
  if (backupPath === outputPath) {
    throw new Error('Option --backup must differ from --output.');
  }

  return {
    pipeline: buildPipelineConfig(raw, env),
    scrape: {
      baseUrl: parseUrl(raw.baseUrl, DEFAULT_BASE_URL, 'base-url'),
      maxPages: parsePositiveInteger(raw.maxPages, 5, 'max-pages'),
      requestSpacingMs: parseNonNegativeInteger(raw.requestSpacing, 3000, 'request-spacing'),
      timeoutMs: parsePositiveInteger(raw.timeout, 15000, 'timeout'),
      userAgent: DEFAULT_USER_AGENT,
      pageCacheTtlMs: 10 * 60 * 1000,
      fetchRetry: { maxAttempts: 3, backoffMs: 5000 },
    },
    outputPath,
    backupPath,
    cacheDir: parseCacheDir(raw),
    verbose: raw.verbose ?? false,
  };
}

export function buildPipelineConfig(
  raw: Pick<RawRunOptions, 'scoring' | 'rules' | 'model' | 'remote'>,
  env: Environment,
): PipelineConfig {
  return {
    scoringMode: parseScoringMode(raw.scoring),
    rulesPath: raw.rules?.trim() ? path.resolve(raw.rules.trim()) : undefined,
    remote: buildRemoteConfig(raw, env),
    remoteRetry: { maxAttempts: 3, backoffMs: 1000 },
  };
}

function buildRemoteConfig(raw: Pick<RawRunOptions, 'model' | 'remote'>, env: Environment): RemoteConfig {
  if (raw.remote === false) {
    return { enabled: false, reason: 'disabled with --no-remote' };
  }
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    return { enabled: false, reason: 'OPENAI_API_KEY is not set' };
  }
  return {
    enabled: true,
    apiKey,
    baseUrl: env.OPENAI_BASE_URL?.trim() || undefined,
    model: raw.model?.trim() || env.OPENAI_MODEL?.trim() || DEFAULT_MODEL,
    timeoutMs: 30000,
  };
}

/** null when caching is switched off with `--no-cache`. */
export function parseCacheDir(raw: Pick<RawRunOptions, 'cache' | 'cacheDir'>): string | null {
  return raw.cache === false ? null : path.resolve(raw.cacheDir?.trim() || '.cache');
}

export function parseScoringMode(value: string | undefined): ScoringMode {
  const mode = value?.trim().toLowerCase() || 'priority';
  if (mode !== 'priority' && mode !== 'score') {
    throw new Error(`Option --scoring must be "priority" or "score", got "${value}".`);
  }
  return mode;
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}

export function parseNonNegativeInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Option --${flagName} must be zero or a positive number.`);
  }
  return Math.floor(parsed);
}

function parseUrl(value: string | undefined, fallback: string, flagName: string): string {
  const candidate = value?.trim() || fallback;
  try {
    return new URL(candidate).toString();
  } catch {
    throw new Error(`Option --${flagName} must be an absolute URL, got "${candidate}".`);
  }
}
