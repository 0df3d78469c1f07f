/**
 * Provider Factory
 *
 * Routes a model string to its vendor backend.
 */

import { AnthropicProvider } from './anthropicProvider';
import { GeminiProvider } from './geminiProvider';
import { OpenAIProvider } from './openaiProvider';
import type { BaseProvider } from './provider';
import type { GenerationConfig, ProviderName } from './types';

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'anthropic', 'gemini'];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some(name => name === value);
}

/**
 * Decide which vendor serves a model.
 * An explicit mapping wins; otherwise `gemini*` goes to Gemini, `claude*`
 * to Anthropic and everything else to OpenAI.
 */
export function resolveProviderName(
  model: string,
  explicit: Record<string, ProviderName> = {}
): ProviderName {
  const mapped = explicit[model];
  if (mapped) {
    return mapped;
  }
  const lower = model.toLowerCase();
  if (lower.startsWith('gemini')) return 'gemini';
  if (lower.startsWith('claude')) return 'anthropic';
  return 'openai';
}

/**
 * Construct the backend for a model. Throws ConfigurationError when the
 * vendor's credential is missing.
 */
export function createProvider(
  provider: ProviderName,
  model: string,
  generation: Partial<GenerationConfig> = {}
): BaseProvider {
  const options = { model, ...generation };
  switch (provider) {
    case 'openai':
      return new OpenAIProvider(options);
    case 'anthropic':
      return new AnthropicProvider(options);
    case 'gemini':
      return new GeminiProvider(options);
  }
}
