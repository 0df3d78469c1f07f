/**
 * Environment Configuration
 *
 * Loads environment variables (via dotenv) into a typed configuration object.
 * Credentials are read lazily: a provider asks for its key when it is
 * constructed, so a run that only uses OpenAI never needs a Gemini key.
 *
 * Usage:
 *   import { env, requireApiKey } from './config';
 *   const key = requireApiKey('openai');
 */

import 'dotenv/config';
import { ConfigurationError } from './errors/types';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';

export type ProviderName = 'openai' | 'anthropic' | 'gemini';

export interface EnvConfig {
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  logLevel: string;
  resultsDir: string;
}

/**
 * Environment variable holding each vendor's credential
 */
export const API_KEY_ENV_VARS: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY'
};

// =============================================================================
// Helpers
// =============================================================================

function getEnvWithDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function parseNodeEnv(value: string): NodeEnv {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

/**
 * Get a numeric environment variable, throwing on malformed input
 */
export function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`,
      { key }
    );
  }
  return parsed;
}

// =============================================================================
// Loader
// =============================================================================

function loadEnvConfig(): EnvConfig {
  // Vitest sets NODE_ENV=test, keeping the logger silent during tests
  const nodeEnv = parseNodeEnv(getEnvWithDefault('NODE_ENV', 'development'));

  return {
    nodeEnv,
    isDevelopment: nodeEnv === 'development',
    isProduction: nodeEnv === 'production',
    isTest: nodeEnv === 'test',
    logLevel: getEnvWithDefault('LOG_LEVEL', nodeEnv === 'test' ? 'silent' : 'info'),
    resultsDir: getEnvWithDefault('RANK_RESULTS_DIR', 'results')
  };
}

export const env: EnvConfig = loadEnvConfig();

/**
 * Read the credential for a vendor.
 * Missing credentials are a fatal configuration error.
 */
export function requireApiKey(provider: ProviderName): string {
  const key = API_KEY_ENV_VARS[provider];
  const value = process.env[key];
  if (!value) {
    throw new ConfigurationError(
      `Missing required environment variable: ${key}. ` +
      'Please set it in your .env file or environment.',
      { provider, key }
    );
  }
  return value;
}
