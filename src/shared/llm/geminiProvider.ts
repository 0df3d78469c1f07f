/**
 * Gemini Provider
 *
 * Google Gemini models through the Gen AI SDK.
 *
 * Gemini model names drift (`-latest`, `-001`, `models/` prefixes), so the
 * configured name is resolved against the models the key can see before the
 * first call, and a "model not found" answer falls back to the first model
 * that supports content generation.
 */

import { GoogleGenAI } from '@google/genai';
import { BaseProvider } from './provider';
import { SYSTEM_INSTRUCTION } from './prompts';
import type { CompletionResult, GenerationConfig, ProviderOptions } from './types';
import { loggers, serializeError } from '../logging/logger';

function stripModelsPrefix(name: string): string {
  return name.replace(/^models\//, '');
}

/**
 * Pick the available model that best matches the requested name:
 * exact match, then base-name match (`gemini-1.5-pro` ↔ `gemini-1.5-pro-001`),
 * then the first available model. Returns the request unchanged when
 * nothing is available.
 */
export function matchGeminiModel(requested: string, available: string[]): string {
  const names = available.map(stripModelsPrefix);
  if (names.length === 0) {
    return requested;
  }

  const wanted = stripModelsPrefix(requested);
  if (names.includes(wanted)) {
    return wanted;
  }

  const base = wanted.replace(/-latest$/, '');
  const byBase = names.find(name => name.includes(base) || name.startsWith(base));
  return byBase ?? names[0];
}

function isModelNotFound(error: unknown): boolean {
  const status = typeof error === 'object' && error !== null ? Reflect.get(error, 'status') : undefined;
  const message = error instanceof Error ? error.message : String(error);
  return status === 404 || /not found|does not exist/i.test(message);
}

export class GeminiProvider extends BaseProvider {
  private client: GoogleGenAI;
  private resolution?: Promise<void>;

  constructor(options: ProviderOptions) {
    super('gemini', options);
    this.client = new GoogleGenAI({ apiKey: this.apiKey });
  }

  async listModels(): Promise<string[]> {
    const names: string[] = [];
    const pager = await this.client.models.list();
    for await (const model of pager) {
      const supportsGeneration = model.supportedActions?.includes('generateContent') ?? true;
      if (model.name && supportsGeneration) {
        names.push(stripModelsPrefix(model.name));
      }
    }
    return names;
  }

  protected async complete(prompt: string, settings: GenerationConfig): Promise<CompletionResult> {
    await this.resolveModel();

    try {
      return await this.callModel(prompt, settings);
    } catch (error) {
      if (!isModelNotFound(error)) {
        throw error;
      }
      const [fallback] = await this.listModels();
      if (!fallback || fallback === this.model) {
        throw error;
      }
      loggers.llm.warn({ requested: this.model, fallback }, 'Gemini model not found, using first available model');
      this.model = fallback;
      return this.callModel(prompt, settings);
    }
  }

  /**
   * Resolve the configured model name once; concurrent callers share the lookup
   */
  private resolveModel(): Promise<void> {
    if (!this.resolution) {
      this.resolution = this.listModels().then(
        available => {
          const resolved = matchGeminiModel(this.model, available);
          if (resolved !== this.model) {
            loggers.llm.info({ requested: this.model, resolved }, 'Resolved Gemini model name');
          }
          this.model = resolved;
        },
        (error: unknown) => {
          // Keep the configured name; the call itself reports a real failure
          loggers.llm.warn({ err: serializeError(error), model: this.model }, 'Could not list Gemini models');
        }
      );
    }
    return this.resolution;
  }

  private async callModel(prompt: string, settings: GenerationConfig): Promise<CompletionResult> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: prompt,
      config: {
        systemInstruction: SYSTEM_INSTRUCTION,
        temperature: settings.temperature,
        maxOutputTokens: settings.maxTokens
      }
    });

    const usage = response.usageMetadata;
    return {
      text: response.text ?? '',
      model: this.model,
      usage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0
      },
      finishReason: response.candidates?.[0]?.finishReason
    };
  }
}
