/**
 * Completion Provider
 *
 * The capability every vendor backend implements. Pipelines depend only on
 * this interface; vendor quirks stay inside the implementations.
 */

import type {
  CompletionResult,
  GenerationConfig,
  ProviderName,
  ProviderOptions
} from './types';
import { DEFAULT_GENERATION_CONFIG } from './types';
import { requireApiKey } from '../config';
import { ErrorHandler } from '../errors/handler';
import { loggers } from '../logging/logger';

/**
 * Text-completion capability
 */
export interface CompletionProvider {
  generate(prompt: string, config?: Partial<GenerationConfig>): Promise<CompletionResult>;
  providerName(): string;
  modelName(): string;
}

/**
 * Shared plumbing for the vendor backends: credential lookup, generation
 * defaults, error classification and debug logging.
 */
export abstract class BaseProvider implements CompletionProvider {
  protected model: string;
  protected readonly generation: GenerationConfig;
  protected readonly apiKey: string;

  protected constructor(
    protected readonly name: ProviderName,
    options: ProviderOptions
  ) {
    // Throws ConfigurationError before any client is built
    this.apiKey = options.apiKey ?? requireApiKey(name);
    this.model = options.model;
    this.generation = {
      temperature: options.temperature ?? DEFAULT_GENERATION_CONFIG.temperature,
      maxTokens: options.maxTokens ?? DEFAULT_GENERATION_CONFIG.maxTokens
    };
  }

  providerName(): string {
    return this.name;
  }

  modelName(): string {
    return this.model;
  }

  async generate(prompt: string, config: Partial<GenerationConfig> = {}): Promise<CompletionResult> {
    const settings: GenerationConfig = { ...this.generation, ...config };
    const start = Date.now();

    loggers.llm.debug(
      { provider: this.name, model: this.model, temperature: settings.temperature, maxTokens: settings.maxTokens },
      'request start'
    );

    try {
      const result = await this.complete(prompt, settings);
      loggers.llm.debug(
        {
          provider: this.name,
          model: result.model,
          finish: result.finishReason ?? 'unknown',
          elapsedMs: Date.now() - start,
          totalTokens: result.usage.totalTokens
        },
        'request end'
      );
      return result;
    } catch (error) {
      throw ErrorHandler.classifyProviderError(this.name, error, { model: this.model });
    }
  }

  /**
   * Models the credential can see, for the CLI `models` command
   */
  abstract listModels(): Promise<string[]>;

  protected abstract complete(prompt: string, settings: GenerationConfig): Promise<CompletionResult>;
}
