import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors.js';

/**
 * Runtime Settings
 *
 * Read once from the environment (and .env) at startup, then passed
 * explicitly to everything that needs it.
 */

export type ExtractorProvider = 'openai' | 'anthropic';

export interface Settings {
  readonly useLlm: boolean;
  readonly llmProvider: ExtractorProvider;
  readonly llmModel: string;
  readonly llmMaxConcurrentCalls: number;
  readonly llmTimeoutMs: number;
  readonly llmMaxRetries: number;
  readonly confidenceThreshold: number;
  readonly openaiApiKey?: string;
  readonly anthropicApiKey?: string;
}

type Env = Record<string, string | undefined>;

const DEFAULT_MODELS: Record<ExtractorProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ConfigError(key, `expected true or false, got '${env[key]}'`);
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(key, `expected an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readRatio(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(key, `expected a number between 0 and 1, got '${raw}'`);
  }
  return value;
}

function isProvider(value: string): value is ExtractorProvider {
  return value === 'openai' || value === 'anthropic';
}

function readProvider(env: Env): ExtractorProvider {
  const raw = env.LLM_PROVIDER?.trim().toLowerCase() || 'openai';
  if (!isProvider(raw)) {
    throw new ConfigError('LLM_PROVIDER', `expected 'openai' or 'anthropic', got '${raw}'`);
  }
  return raw;
}

/**
 * Build settings from an environment map (defaults to process.env)
 */
export function loadSettings(env: Env = process.env): Settings {
  const llmProvider = readProvider(env);

  return Object.freeze({
    useLlm: readBoolean(env, 'USE_LLM', false),
    llmProvider,
    llmModel: env.LLM_MODEL?.trim() || DEFAULT_MODELS[llmProvider],
    llmMaxConcurrentCalls: readInteger(env, 'LLM_MAX_CONCURRENT_CALLS', 4, 1),
    llmTimeoutMs: readInteger(env, 'LLM_TIMEOUT_MS', 60000, 1),
    llmMaxRetries: readInteger(env, 'LLM_MAX_RETRIES', 3, 0),
    confidenceThreshold: readRatio(env, 'CONFIDENCE_THRESHOLD', 0.6),
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
  });
}

/**
 * Load .env into process.env, then build settings from it
 */
export function loadSettingsFromEnvironment(): Settings {
  dotenv.config();
  return loadSettings(process.env);
}
