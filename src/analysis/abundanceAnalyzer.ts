import type { PipelineConfig } from '../config.js';
import { normalizeText } from '../classification/normalize.js';
import { postProcessBatch } from '../classification/postProcess.js';
import { defaultRuleTable, loadRules, type RuleTable } from '../classification/rules.js';
import { classifyNormalized } from '../classification/scorer.js';
import type { Batch, ClassificationResult, ForumComment, ScoringMode } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { preview } from '../utils/text.js';
import type { RemoteAdapter } from './remoteAdapter.js';

export interface AbundanceAnalyzerDeps {
  remote: RemoteAdapter;
  /** Overrides `config.rulesPath`; mostly for tests. */
  rules?: RuleTable;
  logger?: Logger;
}

export interface AnalyzeOptions {
  /** Called with each first-pass result as soon as it exists, in input order. */
  onClassification?: (result: ClassificationResult, index: number) => Promise<void> | void;
}

export interface AnalysisResult {
  /** Labels after the corrective second pass. */
  batch: Batch;
  firstPass: Batch;
  overridden: number;
}

export class AbundanceAnalyzer {
  readonly rules: RuleTable;
  readonly scoringMode: ScoringMode;
  private readonly remote: RemoteAdapter;
  private readonly logger: Logger;

  constructor(config: PipelineConfig, deps: AbundanceAnalyzerDeps) {
    this.rules = deps.rules ?? (config.rulesPath ? loadRules(config.rulesPath) : defaultRuleTable());
    this.scoringMode = config.scoringMode;
    this.remote = deps.remote;
    this.logger = deps.logger ?? silentLogger;
  }

  get remoteMode(): RemoteAdapter['kind'] {
    return this.remote.kind;
  }

  /**
   * Local rules first, then the remote adapter. Never rejects: the adapter
   * falls back to the local label on its own, and anything unexpected past it
   * does the same here.
   */
  async classify(comment: ForumComment): Promise<ClassificationResult> {
    const local = classifyNormalized(normalizeText(comment.text), this.scoringMode, this.rules);
    this.logger.debug(`Local: ${local.label} (${local.reason}) for "${preview(comment.text)}"`);

    try {
      return await this.remote.reconcile(comment, local);
    } catch (error) {
      this.logger.error(`Unexpected failure reconciling "${preview(comment.text)}": ${String(error)}`);
      return { comment, label: local.label, source: 'local', reason: local.reason };
    }
  }

  /** Classifies comments one at a time, then runs the post-processing pass over the whole batch. */
  async analyze(comments: ForumComment[], options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    if (comments.length === 0) {
      return { batch: [], firstPass: [], overridden: 0 };
    }

    this.logger.info(
      `Classifying ${comments.length} comments (rules ${this.rules.version}, ${this.scoringMode} scoring, model ${this.remote.kind})...`,
    );

    const firstPass: Batch = [];
    for (const [index, comment] of comments.entries()) {
      const result = await this.classify(comment);
      firstPass.push(result);
      this.logger.info(`${index + 1}/${comments.length} ${comment.postedAt} -> ${result.label} [${result.source}]`);
      if (options.onClassification) {
        await options.onClassification(result, index);
      }
    }

    const { batch, overridden } = postProcessBatch(firstPass, this.rules, this.logger);
    this.logger.info(`Post-processing changed ${overridden} of ${batch.length} labels.`);
    return { batch, firstPass, overridden };
  }
}
