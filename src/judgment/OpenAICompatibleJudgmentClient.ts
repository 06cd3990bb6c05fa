/**
 * Judgment backend for any OpenAI-compatible chat completions endpoint
 * (OpenAI, Ollama, vLLM, LM Studio).
 */

import { BaseAPIClient } from '../clients/BaseAPIClient.js';
import type { APIClientConfig } from '../clients/BaseAPIClient.js';
import type { JudgmentBackend } from './types.js';
import { APIError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('JUDGMENT');

export interface OpenAICompatibleJudgmentConfig extends APIClientConfig {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `choices[0].message.content` of a chat completion, or null
 */
export function extractCompletionText(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null;

  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;

  const content = first.message.content;
  return typeof content === 'string' ? content : null;
}

export class OpenAICompatibleJudgmentClient extends BaseAPIClient implements JudgmentBackend {
  readonly name = 'JudgmentModel';
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(config: OpenAICompatibleJudgmentConfig) {
    // completions are never cached
    super({ ...config, cacheTTL: 0 });
    this.model = config.model;
    this.temperature = config.temperature ?? 0;
    this.maxTokens = config.maxTokens ?? 512;
  }

  async complete(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string> {
    log.debug(`Requesting judgment from ${this.model}`);

    const body = await this.requestWithRetry('/chat/completions', {
      method: 'POST',
      body: {
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
      },
      signal,
    });

    const text = extractCompletionText(body);
    if (text === null) {
      throw new APIError(`${this.name} returned no completion text`, 200, this.name, false);
    }
    return text;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.request('/models', { skipCache: true });
      return true;
    } catch (error) {
      log.debug(`Health check failed: ${describeError(error)}`);
      return false;
    }
  }
}

/**
 * Client from JUDGMENT_LLM_URL / JUDGMENT_LLM_API_KEY / JUDGMENT_LLM_MODEL,
 * or null when no URL is set
 */
export function createJudgmentClientFromEnv(
  env: NodeJS.ProcessEnv = process.env
): OpenAICompatibleJudgmentClient | null {
  const baseUrl = env.JUDGMENT_LLM_URL;
  if (!baseUrl) {
    return null;
  }

  return new OpenAICompatibleJudgmentClient({
    baseUrl,
    apiKey: env.JUDGMENT_LLM_API_KEY,
    model: env.JUDGMENT_LLM_MODEL ?? 'gpt-4o-mini',
    timeout: 30000,
    maxRetries: 2,
  });
}
