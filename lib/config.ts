/**
 * Runtime Configuration
 *
 * Reads API keys and tuning knobs from the environment once and hands an
 * explicit AppConfig to every factory. Nothing below lib/ reads process.env.
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { ContextConfig } from '../config/context-config';
import { ValidationError } from './errors';
import { LogLevel } from './logger';
import { LLMProviderType, LLM_PROVIDER_TYPES } from './llm/types';

export interface ProviderConfig {
  apiKey: string | null;
  baseUrl: string;
  timeoutMs: number;
}

export interface SummaryConfig {
  provider: LLMProviderType;
  apiKey: string | null;
  model?: string;
}

export interface AppConfig {
  stockData: ProviderConfig;
  newsApi: ProviderConfig;
  summary: SummaryConfig;
  sentiment: {
    threshold: number;
  };
  logLevel: LogLevel;
}

const SUMMARY_KEY_VARIABLES: Record<LLMProviderType, string> = {
  openai: 'OPENAI_API_KEY',
  claude: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

/**
 * Load .env from the project root, falling back to the working directory
 *
 * @returns Path of the file that was loaded, or null when neither exists
 */
export function loadEnvFile(): string | null {
  const candidates = [
    path.resolve(__dirname, '..', '.env'),
    path.resolve(process.cwd(), '.env'),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return candidate;
    }
  }

  return null;
}

function readString(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ValidationError(name, `expected a number between ${min} and ${max}, got "${raw}"`);
  }

  return value;
}

function readProvider(env: NodeJS.ProcessEnv): LLMProviderType {
  const raw = (readString(env, 'SUMMARY_PROVIDER') || 'openai').toLowerCase();
  const match = LLM_PROVIDER_TYPES.find((type) => type === raw);

  if (!match) {
    throw new ValidationError('SUMMARY_PROVIDER', `expected one of ${LLM_PROVIDER_TYPES.join(', ')}, got "${raw}"`);
  }

  return match;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = (readString(env, 'LOG_LEVEL') || LogLevel.INFO).toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === raw);

  if (!match) {
    throw new ValidationError('LOG_LEVEL', `expected debug, info, warn or error, got "${raw}"`);
  }

  return match;
}

/**
 * Build the application config from environment variables
 *
 * @throws ValidationError when a variable is present but malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const timeoutMs = readNumber(env, 'HTTP_TIMEOUT_MS', ContextConfig.DEFAULT_TIMEOUT_MS, 1, 300000);
  const provider = readProvider(env);
  const model = readString(env, 'SUMMARY_MODEL');

  return {
    stockData: {
      apiKey: readString(env, 'STOCKDATA_API_KEY'),
      baseUrl: ContextConfig.STOCKDATA_BASE_URL,
      timeoutMs,
    },
    newsApi: {
      apiKey: readString(env, 'NEWS_API_KEY'),
      baseUrl: ContextConfig.NEWSAPI_BASE_URL,
      timeoutMs,
    },
    summary: {
      provider,
      apiKey: readString(env, SUMMARY_KEY_VARIABLES[provider]),
      ...(model ? { model } : {}),
    },
    sentiment: {
      threshold: readNumber(
        env,
        'SENTIMENT_THRESHOLD',
        ContextConfig.DEFAULT_SENTIMENT_THRESHOLD,
        0,
        ContextConfig.MAX_SENTIMENT_THRESHOLD
      ),
    },
    logLevel: readLogLevel(env),
  };
}
