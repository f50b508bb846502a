import Anthropic from '@anthropic-ai/sdk';
import type { Env } from '../config/env.js';
import { OracleUnavailableError, errorMessage } from '../errors.js';
import type { ReasoningOracle } from './types.js';

export interface AnthropicOracleOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxTokens?: number;
}

export class AnthropicOracle implements ReasoningOracle {
  readonly name = 'anthropic';
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(options: AnthropicOracleOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 1 });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 2048;
  }

  async call(prompt: string, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal },
      );

      return response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
    } catch (err) {
      throw new OracleUnavailableError(`oracle request failed: ${errorMessage(err)}`, err);
    }
  }
}

/** Null when no API key is configured; the recommender then stays heuristic. */
export function createOracle(env: Env): ReasoningOracle | null {
  if (!env.ANTHROPIC_API_KEY) return null;
  return new AnthropicOracle({
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.AUTOAPPLY_ORACLE_MODEL,
    timeoutMs: env.AUTOAPPLY_ORACLE_TIMEOUT_MS,
  });
}
