import type OpenAI from 'openai';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { isRetryable, type RetryPolicy } from '../src/openai/client';
import { OpenAIProspectGenerator } from '../src/openai/generator';
import type { ChatMessage } from '../src/types';

function completion(content: string | null): OpenAI.Chat.Completions.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null }
      }
    ],
    usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 }
  };
}

function apiError(status: number): Error {
  return Object.assign(new Error(`status ${status}`), { status });
}

const messages: ChatMessage[] = [
  { role: 'system', content: 'system role' },
  { role: 'user', content: 'give me rows' }
];

describe('OpenAIProspectGenerator', () => {
  let sleep: Mock<(ms: number) => Promise<void>>;
  let retry: RetryPolicy;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    sleep = vi.fn(async (_ms: number) => {});
    retry = { maxRetries: 2, throttleMs: 0, backoffBaseMs: 10, backoffMaxMs: 100, sleep };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends model, temperature and messages and returns the text', async () => {
    const complete = vi.fn(async () => completion('Acme GmbH,Snacks,Germany,Bars,,A'));
    const generator = new OpenAIProspectGenerator({ model: 'test-model', temperature: 0.6, retry, complete });

    await expect(generator.generate(messages)).resolves.toBe('Acme GmbH,Snacks,Germany,Bars,,A');
    expect(complete).toHaveBeenCalledWith({ model: 'test-model', messages, temperature: 0.6 });
  });

  it('tracks token usage across calls', async () => {
    const complete = vi.fn(async () => completion('x'));
    const generator = new OpenAIProspectGenerator({ model: 'test-model', retry, complete });

    await generator.generate(messages);
    await generator.generate(messages);

    expect(generator.getTokenUsage()).toEqual({ inputTokens: 240, outputTokens: 60, requestCount: 2 });
  });

  it('returns an empty string when the model sends no content', async () => {
    const generator = new OpenAIProspectGenerator({ model: 'test-model', retry, complete: async () => completion(null) });

    await expect(generator.generate(messages)).resolves.toBe('');
  });

  it('retries rate-limited calls with backoff', async () => {
    const complete = vi
      .fn<() => Promise<OpenAI.Chat.Completions.ChatCompletion>>()
      .mockRejectedValueOnce(apiError(429))
      .mockResolvedValueOnce(completion('ok'));
    const generator = new OpenAIProspectGenerator({ model: 'test-model', retry, complete });

    await expect(generator.generate(messages)).resolves.toBe('ok');
    expect(complete).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    const delay = sleep.mock.calls[0][0];
    expect(delay).toBeGreaterThanOrEqual(10);
    expect(delay).toBeLessThanOrEqual(13);
  });

  it('gives up after the retry budget', async () => {
    const complete = vi.fn(async () => {
      throw apiError(503);
    });
    const generator = new OpenAIProspectGenerator({ model: 'test-model', retry, complete });

    await expect(generator.generate(messages)).rejects.toThrow('status 503');
    expect(complete).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const complete = vi.fn(async () => {
      throw apiError(401);
    });
    const generator = new OpenAIProspectGenerator({ model: 'test-model', retry, complete });

    await expect(generator.generate(messages)).rejects.toThrow('status 401');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('isRetryable', () => {
  it('retries 429, 5xx and rate_limit_exceeded only', () => {
    expect(isRetryable(apiError(429))).toBe(true);
    expect(isRetryable(apiError(500))).toBe(true);
    expect(isRetryable(Object.assign(new Error('slow down'), { code: 'rate_limit_exceeded' }))).toBe(true);
    expect(isRetryable(apiError(400))).toBe(false);
    expect(isRetryable(new Error('socket hang up'))).toBe(false);
    expect(isRetryable('nope')).toBe(false);
  });
});
