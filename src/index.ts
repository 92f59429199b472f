#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import { AbundanceAnalyzer } from './analysis/abundanceAnalyzer.js';
import { createRemoteAdapter } from './analysis/remoteAdapter.js';
import { formatLabelSummary, rowCountWarning } from './analysis/summary.js';
import type { CacheClient } from './cache/cache.js';
import { FileCache } from './cache/fileCache.js';
import { MemoryCache } from './cache/memoryCache.js';
import { ForumClient } from './clients/forum.js';
import {
  buildPipelineConfig,
  buildRunConfig,
  parseCacheDir,
  type PipelineConfig,
  type RawRunOptions,
} from './config.js';
import { CsvStreamWriter, resultToRow, writeCsv } from './csv/writer.js';
import type { ForumComment } from './types/index.js';
import { createLogger, type Logger } from './utils/logger.js';
import { describeError } from './utils/retry.js';
import { elapsedSince } from './utils/time.js';

dotenv.config();

type RawClassifyOptions = Pick<RawRunOptions, 'scoring' | 'rules' | 'model' | 'remote' | 'cacheDir' | 'cache' | 'verbose'>;

const program = new Command();
program
  .name('surge')
  .description('Scrape the Toyama firefly squid forum and label how many squid each report describes.');

configurePipelineOptions(
  program
    .command('scrape')
    .description('Scrape the forum, classify every post and export the labels to CSV.')
    .option('--base-url <url>', 'First page of the forum board.')
    .option('--max-pages <number>', 'Pages to scrape, including the first (default 5).')
    .option('--request-spacing <ms>', 'Minimum delay between page requests in ms (default 3000).')
    .option('--timeout <ms>', 'Page request timeout in ms (default 15000).')
    .option('--output <path>', 'CSV to write (default output/<timestamp>_surge-levels.csv).')
    .option('--backup <path>', 'CSV that receives rows as they are classified (default <output>.backup.csv).'),
).action(async (rawOptions: RawRunOptions) => {
  await handleScrape(rawOptions);
});

configurePipelineOptions(
  program
    .command('classify')
    .description('Classify the given text and print its label, source and reason.')
    .argument('<text...>', 'Report text; several words are joined with spaces.'),
).action(async (words: string[], rawOptions: RawClassifyOptions) => {
  await handleClassify(words.join(' '), rawOptions);
});

program.parseAsync().catch((error: unknown) => {
  console.error(`[surge] ${describeError(error)}`);
  process.exitCode = 1;
});

function configurePipelineOptions(command: Command): Command {
  return command
    .option('--scoring <mode>', 'Local scoring: "priority" or "score" (default priority).')
    .option('--rules <path>', 'Rule table JSON (default rules/abundance-rules.json).')
    .option('--model <id>', 'OpenAI model (default gpt-5-nano-2025-08-07, or OPENAI_MODEL).')
    .option('--no-remote', 'Use the local rules only, even when OPENAI_API_KEY is set.')
    .option('--cache-dir <path>', 'Directory for cached pages and model responses (default .cache).')
    .option('--no-cache', 'Keep caches in memory for this run only.')
    .option('--verbose', 'Print debug logging.');
}

async function handleScrape(raw: RawRunOptions): Promise<void> {
  const startedAt = Date.now();
  const config = buildRunConfig(raw, process.env);
  const logger = createLogger('surge', { verbose: config.verbose });
  const cache = createCache(config.cacheDir);

  const forum = new ForumClient({
    baseUrl: config.scrape.baseUrl,
    cache,
    maxPages: config.scrape.maxPages,
    requestSpacingMs: config.scrape.requestSpacingMs,
    timeoutMs: config.scrape.timeoutMs,
    userAgent: config.scrape.userAgent,
    pageCacheTtlMs: config.scrape.pageCacheTtlMs,
    maxAttempts: config.scrape.fetchRetry.maxAttempts,
    retryBackoffMs: config.scrape.fetchRetry.backoffMs,
    logger: createLogger('forum', { verbose: config.verbose }),
  });

  logger.info(`Scraping up to ${config.scrape.maxPages} pages from ${config.scrape.baseUrl}...`);
  const comments: ForumComment[] = [];
  for await (const page of forum.fetchComments()) {
    comments.push(...page.comments);
  }
  logger.info(`Collected ${comments.length} comments.`);

  const warning = rowCountWarning(comments.length);
  if (comments.length === 0) {
    logger.warn(`${warning ?? 'No comments were collected.'} Nothing to write.`);
    return;
  }

  const analyzer = createAnalyzer(config.pipeline, cache, config.verbose);
  const backup = await CsvStreamWriter.create(config.backupPath);
  const analysis = await analyzer
    .analyze(comments, {
      onClassification: async (result) => {
        await backup.writeRow(resultToRow(result));
      },
    })
    .finally(() => backup.close());
  logger.info(`Backup written to ${backup.path}`);

  await writeCsv(config.outputPath, analysis.batch.map(resultToRow));
  logger.info(`Wrote ${analysis.batch.length} rows to ${config.outputPath}`);

  logger.info('Labels:');
  for (const line of formatLabelSummary(analysis.batch)) {
    logger.info(`  ${line}`);
  }
  if (warning) {
    logger.warn(warning);
  }
  logger.info(`Done in ${elapsedSince(startedAt)}.`);
}

async function handleClassify(text: string, raw: RawClassifyOptions): Promise<void> {
  const pipeline = buildPipelineConfig(raw, process.env);
  const cache = createCache(parseCacheDir(raw));
  const analyzer = createAnalyzer(pipeline, cache, raw.verbose ?? false);

  const comment: ForumComment = { text, postedAt: new Date().toISOString(), sourceUrl: 'cli', pageIndex: 0 };
  const { batch } = await analyzer.analyze([comment]);
  for (const result of batch) {
    console.log(`label:  ${result.label}`);
    console.log(`source: ${result.source}`);
    console.log(`reason: ${result.reason}`);
  }
}

function createAnalyzer(pipeline: PipelineConfig, cache: CacheClient, verbose: boolean): AbundanceAnalyzer {
  const logger: Logger = createLogger('analysis', { verbose });
  const remote = createRemoteAdapter(pipeline, { cache, logger: createLogger('model', { verbose }) });
  return new AbundanceAnalyzer(pipeline, { remote, logger });
}

function createCache(cacheDir: string | null): CacheClient {
  return cacheDir === null ? new MemoryCache() : new FileCache({ baseDir: cacheDir });
}
