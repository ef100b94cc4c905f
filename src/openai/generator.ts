import type OpenAI from 'openai';
import { CFG, EFFECTIVE_CHAT_MODEL } from '../config';
import {
  DEFAULT_RETRY_POLICY,
  RequestThrottle,
  createOpenAIClient,
  emptyTokenTracker,
  withRetryAndBackoff,
  type RetryPolicy,
  type TokenTracker
} from './client';
import type { ChatMessage } from '../types';

/** The one thing the collection loop needs from a text model. */
export interface ProspectGenerator {
  generate(messages: ChatMessage[]): Promise<string>;
}

export type CompletionFn = (
  params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming
) => Promise<OpenAI.Chat.Completions.ChatCompletion>;

export interface OpenAIGeneratorOptions {
  model?: string;
  temperature?: number;
  retry?: RetryPolicy;
  complete?: CompletionFn;
}

export class OpenAIProspectGenerator implements ProspectGenerator {
  private readonly model: string;
  private readonly temperature: number;
  private readonly retry: RetryPolicy;
  private readonly complete: CompletionFn;
  private readonly throttle: RequestThrottle;
  private readonly usage: TokenTracker = emptyTokenTracker();

  constructor(opts: OpenAIGeneratorOptions = {}) {
    this.model = opts.model ?? EFFECTIVE_CHAT_MODEL;
    this.temperature = opts.temperature ?? CFG.TEMPERATURE;
    this.retry = opts.retry ?? DEFAULT_RETRY_POLICY;
    this.throttle = new RequestThrottle(this.retry.throttleMs);
    if (opts.complete) {
      this.complete = opts.complete;
    } else {
      const client = createOpenAIClient();
      this.complete = params => client.chat.completions.create(params);
    }
  }

  async generate(messages: ChatMessage[]): Promise<string> {
    const result = await withRetryAndBackoff(
      () => this.complete({ model: this.model, messages, temperature: this.temperature }),
      `chat completion (${this.model})`,
      this.retry,
      this.throttle
    );

    if (result.usage) {
      this.usage.inputTokens += result.usage.prompt_tokens;
      this.usage.outputTokens += result.usage.completion_tokens;
    }
    this.usage.requestCount += 1;

    return result.choices[0]?.message.content ?? '';
  }

  getTokenUsage(): TokenTracker {
    return { ...this.usage };
  }
}
