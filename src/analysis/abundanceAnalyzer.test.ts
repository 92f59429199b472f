import { describe, it, expect } from 'vitest';
import type { PipelineConfig } from '../config.js';
import type { ClassificationResult, ForumComment } from '../types/index.js';
import { AbundanceAnalyzer } from './abundanceAnalyzer.js';
import { UnavailableRemoteAdapter, type RemoteAdapter } from './remoteAdapter.js';

const config: PipelineConfig = {
  scoringMode: 'priority',
  rulesPath: undefined,
  remote: { enabled: false, reason: 'test' },
  remoteRetry: { maxAttempts: 1, backoffMs: 0 },
};

function comment(text: string): ForumComment {
  return { text, postedAt: '2025年04月01日 23:15', sourceUrl: 'https://example.test/board/', pageIndex: 1 };
}

describe('AbundanceAnalyzer', () => {
  it('classifies in order and post-processes the batch', async () => {
    const analyzer = new AbundanceAnalyzer(config, { remote: new UnavailableRemoteAdapter('test') });
    const seen: Array<[number, string]> = [];

    const { batch, firstPass, overridden } = await analyzer.analyze(
      [comment('10分で50匹ぐらい'), comment('今夜は爆寄りでした')],
      { onClassification: (result, index) => void seen.push([index, result.label]) },
    );

    expect(seen).toEqual([
      [0, 'many'],
      [1, 'unknown'],
    ]);
    expect(firstPass.map((result) => result.label)).toEqual(['many', 'unknown']);
    expect(batch.map((result) => result.label)).toEqual(['many', 'veryMany']);
    expect(overridden).toBe(1);
  });

  it('returns an empty analysis for no comments', async () => {
    const analyzer = new AbundanceAnalyzer(config, { remote: new UnavailableRemoteAdapter('test') });
    await expect(analyzer.analyze([])).resolves.toEqual({ batch: [], firstPass: [], overridden: 0 });
  });

  it('falls back to the local label when the adapter rejects', async () => {
    const broken: RemoteAdapter = {
      kind: 'configured',
      reconcile: async () => {
        throw new Error('unexpected');
      },
    };
    const analyzer = new AbundanceAnalyzer({ ...config, scoringMode: 'score' }, { remote: broken });
    const result: ClassificationResult = await analyzer.classify(comment('10分で50匹ぐらい'));
    expect(result).toMatchObject({ label: 'many', source: 'local', reason: 'score 2' });
    expect(analyzer.remoteMode).toBe('configured');
  });
});
