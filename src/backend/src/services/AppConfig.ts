/**
 * AppConfig
 * Reads process configuration once at startup into an immutable object
 */

import { AppConfig } from '../models/types';
import { DEFAULT_MODEL, isSupportedModel } from '../models/defaults';

const DEFAULTS = {
  streamIdleTimeoutMs: 30000,
  port: 5000,
  host: '0.0.0.0'
} as const;

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const value = readString(env, name);
  if (value === null || !/^\d+$/.test(value)) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : fallback;
}

/**
 * Builds the configuration from environment variables
 * @param env - Defaults to process.env
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const model = readString(env, 'DIXER_DEFAULT_MODEL');
  if (model && !isSupportedModel(model)) {
    console.warn(`Ignoring unsupported DIXER_DEFAULT_MODEL "${model}", using ${DEFAULT_MODEL}`);
  }

  return Object.freeze({
    apiKey: readString(env, 'CEREBRAS_API_KEY'),
    baseURL: readString(env, 'CEREBRAS_BASE_URL'),
    defaultModel: model && isSupportedModel(model) ? model : DEFAULT_MODEL,
    streamIdleTimeoutMs: readPositiveInt(env, 'STREAM_IDLE_TIMEOUT_MS', DEFAULTS.streamIdleTimeoutMs),
    port: readPositiveInt(env, 'PORT', DEFAULTS.port),
    host: readString(env, 'HOST') ?? DEFAULTS.host
  });
}

/**
 * True when an upstream API key is present
 */
export function isApiKeyConfigured(config: AppConfig): boolean {
  return !!config.apiKey && config.apiKey.trim().length > 0;
}
