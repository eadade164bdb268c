import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type ParseMethod = 'manual' | 'together';
export type RecoveryMode = 'off' | 'reset' | 'fail';

interface EnvConfig {
  NODE_ENV: string;
  PORT: number;
  MONGODB_URI: string;
  UPLOAD_DIR: string;
  SHEETS_DIR: string;
  MAX_UPLOAD_MB: number;
  DEFAULT_PARSE_METHOD: ParseMethod;
  TOGETHER_API_KEY?: string;
  TOGETHER_BASE_URL: string;
  TOGETHER_MODEL: string;
  LLM_TIMEOUT_MS: number;
  JOB_MAX_CONCURRENT: number;
  JOB_POLL_INTERVAL_MS: number;
  JOB_ERROR_BACKOFF_MS: number;
  WEBHOOK_TIMEOUT_MS: number;
  JOB_RECOVER_ON_STARTUP: RecoveryMode;
}

function readInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
  const raw = process.env[key];
  if (!raw) return fallback;

  const match = choices.find(choice => choice === raw.toLowerCase());
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got "${raw}"`);
  }
  return match;
}

function validateEnv(): EnvConfig {
  const required = ['MONGODB_URI'];

  for (const key of required) {
    if (!process.env[key]) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
  }

  const MONGODB_URI = process.env.MONGODB_URI;
  if (!MONGODB_URI) {
    throw new Error('Environment validation failed');
  }

  return {
    NODE_ENV: process.env.NODE_ENV || 'development',
    PORT: readInt('PORT', 5000),
    MONGODB_URI,
    UPLOAD_DIR: process.env.UPLOAD_DIR || 'data/uploads',
    SHEETS_DIR: process.env.SHEETS_DIR || 'data/sheets',
    MAX_UPLOAD_MB: readInt('MAX_UPLOAD_MB', 25),
    DEFAULT_PARSE_METHOD: readChoice('DEFAULT_PARSE_METHOD', ['manual', 'together'] as const, 'together'),
    TOGETHER_API_KEY: process.env.TOGETHER_API_KEY || undefined,
    TOGETHER_BASE_URL: process.env.TOGETHER_BASE_URL || 'https://api.together.xyz/v1',
    TOGETHER_MODEL: process.env.TOGETHER_MODEL || 'meta-llama/Llama-3.3-70B-Instruct-Turbo',
    LLM_TIMEOUT_MS: readInt('LLM_TIMEOUT_MS', 120000),
    JOB_MAX_CONCURRENT: readInt('JOB_MAX_CONCURRENT', 5),
    JOB_POLL_INTERVAL_MS: readInt('JOB_POLL_INTERVAL_MS', 5000),
    JOB_ERROR_BACKOFF_MS: readInt('JOB_ERROR_BACKOFF_MS', 10000),
    WEBHOOK_TIMEOUT_MS: readInt('WEBHOOK_TIMEOUT_MS', 30000),
    JOB_RECOVER_ON_STARTUP: readChoice('JOB_RECOVER_ON_STARTUP', ['off', 'reset', 'fail'] as const, 'off'),
  };
}

export const env = validateEnv();
