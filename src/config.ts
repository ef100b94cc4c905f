import 'dotenv/config';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const CFG = {
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  CHAT_MODEL: process.env.OPENAI_MODEL || 'gpt-4.1-mini',
  TEMPERATURE: Number(process.env.OPENAI_TEMPERATURE || 0.6),
  TIMEOUT_MS: Number(process.env.REQUEST_TIMEOUT_MS || 60000),
  MAX_RETRIES: Number(process.env.MAX_RETRIES || 3), // 429 / 5xx only

  // Production model pinning (set PRODUCTION_MODE=true to enforce exact versions)
  PRODUCTION_MODE: process.env.PRODUCTION_MODE === 'true',
  PINNED_CHAT_MODEL: 'gpt-4.1-mini-2025-04-14',

  // Rate limiting
  REQUEST_THROTTLE_MS: Number(process.env.REQUEST_THROTTLE_MS || 1000),
  BACKOFF_BASE_MS: Number(process.env.BACKOFF_BASE_MS || 2000),
  BACKOFF_MAX_MS: Number(process.env.BACKOFF_MAX_MS || 60000),

  // Collection loop
  TARGET_COUNT: Number(process.env.TARGET_COUNT || 1000),
  BATCH_SIZE: Number(process.env.BATCH_SIZE || 40), // companies requested per call
  MAX_CALLS: Number(process.env.MAX_CALLS || 40), // safety cap
  AVOID_ROLLING_MAX: Number(process.env.AVOID_ROLLING_MAX || 300),
  AVOID_TEXT_MAX_CHARS: Number(process.env.AVOID_TEXT_MAX_CHARS || 6000),
  PACING_MS: Number(process.env.PACING_MS || 800),
  EMPTY_BATCH_PAUSE_MS: Number(process.env.EMPTY_BATCH_PAUSE_MS || 2000),

  // Output
  OUTPUT_CSV: process.env.OUTPUT_CSV || 'prospects_pea_protein.csv',
  RUNS_DIR: process.env.RUNS_DIR || './runs'
};

export const EFFECTIVE_CHAT_MODEL = CFG.PRODUCTION_MODE ? CFG.PINNED_CHAT_MODEL : CFG.CHAT_MODEL;

export function requireApiKey(): string {
  if (!CFG.OPENAI_API_KEY) {
    throw new ConfigError('OPENAI_API_KEY is not set (export it or add it to .env)');
  }
  return CFG.OPENAI_API_KEY;
}
