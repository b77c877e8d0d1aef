/**
 * Environment variable configuration
 */

import * as path from 'path';
import { ConfigurationError } from '../lib/utils/errors';

export interface EnvironmentConfig {
  // OpenAI
  OPENAI_API_KEY?: string;
  OPENAI_MAX_TOKENS?: string;

  // HTTP server
  HOST?: string;
  PORT?: string;
  CORS_ORIGINS?: string;
  STATIC_DIR?: string;

  // Monitoring
  SENTRY_DSN?: string;
  SENTRY_ENVIRONMENT?: string;
  SENTRY_RELEASE?: string;
  APPLICATIONINSIGHTS_CONNECTION_STRING?: string;
}

/**
 * Application configuration, built once at startup and passed to
 * everything that needs it.
 */
export interface AppConfig {
  openaiApiKey?: string;
  host: string;
  port: number;
  corsOrigins: string[];
  staticDir: string;
  maxTokens: number;
}

export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8000;
export const DEFAULT_MAX_TOKENS = 2000;
export const DEFAULT_CORS_ORIGINS = ['http://localhost:8000', 'http://127.0.0.1:8000'];

type Environment = Record<string, string | undefined>;

/**
 * Gets configuration value from environment with default fallback
 */
export function getConfig<K extends keyof EnvironmentConfig>(
  key: K,
  defaultValue?: string,
  env: Environment = process.env
): string {
  const value = env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${key} is not set`);
  }
  return value;
}

function parsePositiveInt(key: keyof EnvironmentConfig, raw: string, max?: number): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || value < 1 || (max !== undefined && value > max)) {
    throw new ConfigurationError(`Invalid value for ${key}: "${raw}"`, key);
  }
  return value;
}

function parseOrigins(raw: string): string[] {
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Builds the application configuration from the environment.
 *
 * A missing OpenAI key is allowed: the server still starts, and /chat
 * reports that the provider is not configured.
 *
 * @throws ConfigurationError if PORT or OPENAI_MAX_TOKENS is malformed
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  const apiKey = getConfig('OPENAI_API_KEY', '', env).trim();

  return {
    openaiApiKey: apiKey || undefined,
    host: getConfig('HOST', DEFAULT_HOST, env),
    port: parsePositiveInt('PORT', getConfig('PORT', String(DEFAULT_PORT), env), 65535),
    corsOrigins: parseOrigins(getConfig('CORS_ORIGINS', DEFAULT_CORS_ORIGINS.join(','), env)),
    staticDir: path.resolve(process.cwd(), getConfig('STATIC_DIR', 'static', env)),
    maxTokens: parsePositiveInt(
      'OPENAI_MAX_TOKENS',
      getConfig('OPENAI_MAX_TOKENS', String(DEFAULT_MAX_TOKENS), env)
    ),
  };
}

export function hasOpenAIKey(config: AppConfig): boolean {
  return Boolean(config.openaiApiKey);
}
