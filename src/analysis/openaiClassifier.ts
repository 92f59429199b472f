import type OpenAI from 'openai';
import type { RemoteClassification } from '../types/index.js';
import { LlmCache } from './llmCache.js';
import { abundanceFormat, abundanceNode } from './schemas.js';

export const PROMPT_VERSION = 2;

/** Anything that can turn one comment into a remote label. */
export interface AbundanceModelClient {
  readonly model: string;
  classify(text: string): Promise<RemoteClassification>;
}

export interface OpenAiAbundanceClientOptions {
  model: string;
}

export class OpenAiAbundanceClient implements AbundanceModelClient {
  readonly model: string;

  constructor(
    private readonly client: OpenAI,
    private readonly llmCache: LlmCache,
    options: OpenAiAbundanceClientOptions,
  ) {
    this.model = options.model;
  }

  async classify(text: string): Promise<RemoteClassification> {
    const cachePayload = {
      type: 'abundance-classification',
      version: PROMPT_VERSION,
      model: this.model,
      text,
    } as const;

    const parsed = await this.llmCache.getOrCompute(cachePayload, abundanceNode, async () => {
      const response = await this.client.responses.parse({
        model: this.model,
        input: [
          { role: 'system', content: [{ type: 'input_text', text: buildSystemPrompt() }] },
          { role: 'user', content: [{ type: 'input_text', text: buildUserPrompt(text) }] },
        ],
        text: { format: abundanceFormat },
      });

      if (!response.output_parsed) {
        throw new Error('Model response did not include a parsed abundance level.');
      }
      return response.output_parsed;
    });

    return { label: parsed.surge_level, reason: parsed.reason };
  }
}

export function buildSystemPrompt(): string {
  return [
    'You classify Japanese sighting reports from a firefly squid (ホタルイカ) scooping forum in Toyama Bay.',
    'Answer with how many squid the writer saw or caught, using exactly one of these levels:',
    '- none: nothing caught or seen, 0匹, いない, ゼロ, なし.',
    '- few: 1 to 10 squid, or 数匹, ちらほら, 少し.',
    '- moderate: 11 to 30 squid, or まあまあ, そこそこ, 例年並み.',
    '- many: 31 to 70 squid, or たくさん, いっぱい, 堪能.',
    '- veryMany: 71 or more squid, or 大量, 爆寄り, イカだらけ.',
    '- unknown: the comment reports no catch (weather, waves, parking, links, questions).',
    'Priorities, highest first: an explicit count decides the level; then negation means none;',
    'then questions and weather-only remarks are unknown; then intensity words decide.',
    'With several counts, use the largest one. Use unknown only when nothing else fits.',
  ].join('\n');
}

export function buildUserPrompt(text: string): string {
  return `Comment:\n${text}`;
}
