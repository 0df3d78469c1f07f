/**
 * LLM Types
 *
 * Type definitions for the text-completion capability.
 * Supports OpenAI, Anthropic and Gemini backends.
 */

import type { ProviderName } from '../config';

export type { ProviderName };

/**
 * Generation parameters for a single completion call
 */
export interface GenerationConfig {
  temperature: number;
  maxTokens: number;
}

/**
 * Backend construction options
 */
export interface ProviderOptions extends Partial<GenerationConfig> {
  model: string;
  /** Overrides the key read from the environment */
  apiKey?: string;
}

/**
 * Default generation parameters.
 * Temperature 1.0 so that GPT-5 family models (which reject other values)
 * run under the same settings as the rest.
 */
export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
  temperature: 1.0,
  maxTokens: 2000
};

/**
 * Default model for each provider
 */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-sonnet-20240620',
  gemini: 'gemini-1.5-pro-latest'
};

/**
 * Token accounting for one call
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Result of a completion call
 */
export interface CompletionResult {
  text: string;
  usage: TokenUsage;
  finishReason?: string;
  /** Model that actually served the request */
  model: string;
}

export const EMPTY_USAGE: TokenUsage = {
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0
};

/**
 * Sum two usage records
 */
export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens
  };
}
