import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  OpenAICompatibleJudgmentClient,
  createJudgmentClientFromEnv,
  extractCompletionText,
} from '../OpenAICompatibleJudgmentClient.js';
import { APIError } from '../../utils/errors.js';

const { request } = vi.hoisted(() => ({ request: vi.fn() }));

vi.mock('axios', async importOriginal => {
  const actual = await importOriginal<typeof import('axios')>();
  return { ...actual, default: { ...actual.default, request } };
});

function completion(content: unknown) {
  return { data: { choices: [{ message: { role: 'assistant', content } }] } };
}

describe('OpenAICompatibleJudgmentClient', () => {
  const client = new OpenAICompatibleJudgmentClient({
    baseUrl: 'https://llm.test/v1',
    apiKey: 'test-secret',
    model: 'test-model',
    retryDelayMs: 0,
  });

  beforeEach(() => {
    request.mockReset();
  });

  it('posts a chat completion and returns the text', async () => {
    request.mockResolvedValue(completion('{"decision":"REJECT"}'));

    const text = await client.complete('system text', 'user text');

    expect(text).toBe('{"decision":"REJECT"}');
    expect(request.mock.calls[0][0]).toMatchObject({
      url: 'https://llm.test/v1/chat/completions',
      method: 'POST',
      headers: { Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' },
      data: {
        model: 'test-model',
        temperature: 0,
        max_tokens: 512,
        messages: [
          { role: 'system', content: 'system text' },
          { role: 'user', content: 'user text' },
        ],
      },
    });
  });

  it('never caches completions', async () => {
    request.mockResolvedValue(completion('AUTO_APPROVE'));

    await client.complete('s', 'u');
    await client.complete('s', 'u');

    expect(request).toHaveBeenCalledTimes(2);
  });

  it('fails when the reply carries no text', async () => {
    request.mockResolvedValue(completion(null));

    await expect(client.complete('s', 'u')).rejects.toBeInstanceOf(APIError);
    await expect(client.complete('s', 'u')).rejects.toThrow('JudgmentModel returned no completion text');
  });
});

describe('extractCompletionText', () => {
  it('reads the first choice', () => {
    expect(extractCompletionText(completion('hi').data)).toBe('hi');
  });

  it('returns null for other shapes', () => {
    expect(extractCompletionText({})).toBeNull();
    expect(extractCompletionText({ choices: [] })).toBeNull();
    expect(extractCompletionText('text')).toBeNull();
  });
});

describe('createJudgmentClientFromEnv', () => {
  it('returns null without a URL', () => {
    expect(createJudgmentClientFromEnv({})).toBeNull();
  });

  it('builds a client when a URL is set', () => {
    expect(createJudgmentClientFromEnv({ JUDGMENT_LLM_URL: 'https://llm.test/v1' }))
      .toBeInstanceOf(OpenAICompatibleJudgmentClient);
  });
});
