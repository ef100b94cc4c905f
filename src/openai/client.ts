import OpenAI from 'openai';
import { CFG, requireApiKey } from '../config';
import { createLogger } from '../util/logger';

const logger = createLogger('OpenAI');

export function createOpenAIClient(apiKey: string = requireApiKey()): OpenAI {
  return new OpenAI({
    apiKey,
    timeout: CFG.TIMEOUT_MS,
    maxRetries: 0 // retries are handled by withRetryAndBackoff
  });
}

export interface RetryPolicy {
  maxRetries: number;
  throttleMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: CFG.MAX_RETRIES,
  throttleMs: CFG.REQUEST_THROTTLE_MS,
  backoffBaseMs: CFG.BACKOFF_BASE_MS,
  backoffMaxMs: CFG.BACKOFF_MAX_MS
};

export interface TokenTracker {
  inputTokens: number;
  outputTokens: number;
  requestCount: number;
}

export function emptyTokenTracker(): TokenTracker {
  return { inputTokens: 0, outputTokens: 0, requestCount: 0 };
}

const wait = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isRetryable(error: unknown): boolean {
  const status = errorStatus(error);
  const isRateLimit = status === 429 || errorCode(error) === 'rate_limit_exceeded';
  return isRateLimit || (status !== undefined && status >= 500);
}

// Minimum spacing between requests made through one throttle.
export class RequestThrottle {
  private lastRequestTime = 0;

  constructor(private readonly minIntervalMs: number) {}

  async acquire(sleep: (ms: number) => Promise<void>): Promise<void> {
    const timeSinceLastRequest = Date.now() - this.lastRequestTime;
    if (this.lastRequestTime > 0 && timeSinceLastRequest < this.minIntervalMs) {
      await sleep(this.minIntervalMs - timeSinceLastRequest);
    }
    this.lastRequestTime = Date.now();
  }
}

// Exponential backoff with jitter for 429 and 5xx
export async function withRetryAndBackoff<T>(
  operation: () => Promise<T>,
  context: string,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  throttle: RequestThrottle = new RequestThrottle(policy.throttleMs)
): Promise<T> {
  const sleep = policy.sleep ?? wait;
  for (let attempt = 0; ; attempt++) {
    await throttle.acquire(sleep);
    try {
      const result = await operation();
      if (attempt > 0) {
        logger.info(`${context} succeeded after ${attempt} retries`);
      }
      return result;
    } catch (error) {
      if (!isRetryable(error) || attempt >= policy.maxRetries) {
        logger.error(`${context} failed after ${attempt + 1} attempts:`, error instanceof Error ? error.message : error);
        throw error;
      }

      const baseDelay = policy.backoffBaseMs * Math.pow(2, attempt);
      const jitter = Math.random() * 0.3 * baseDelay; // 30% jitter
      const delay = Math.min(baseDelay + jitter, policy.backoffMaxMs);

      logger.warn(`${context} attempt ${attempt + 1} failed (${errorStatus(error) ?? 'unknown'}), retrying in ${delay.toFixed(0)}ms...`);
      await sleep(delay);
    }
  }
}
