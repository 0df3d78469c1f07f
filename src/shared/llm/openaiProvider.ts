/**
 * OpenAI Provider
 *
 * GPT models through Chat Completions.
 */

import OpenAI from 'openai';
import { BaseProvider } from './provider';
import { SYSTEM_INSTRUCTION } from './prompts';
import type { CompletionResult, GenerationConfig, ProviderOptions } from './types';

/**
 * GPT-5 and the o-series reject `max_tokens` and take
 * `max_completion_tokens` instead.
 */
export function usesCompletionTokenLimit(model: string): boolean {
  return /^(gpt-5|o1|o3|o4)/.test(model);
}

export class OpenAIProvider extends BaseProvider {
  private client: OpenAI;

  constructor(options: ProviderOptions) {
    super('openai', options);
    this.client = new OpenAI({ apiKey: this.apiKey });
  }

  protected async complete(prompt: string, settings: GenerationConfig): Promise<CompletionResult> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [
        { role: 'system', content: SYSTEM_INSTRUCTION },
        { role: 'user', content: prompt }
      ],
      temperature: settings.temperature
    };

    if (usesCompletionTokenLimit(this.model)) {
      params.max_completion_tokens = settings.maxTokens;
    } else {
      params.max_tokens = settings.maxTokens;
    }

    const response = await this.client.chat.completions.create(params);
    const choice = response.choices[0];

    return {
      text: choice?.message.content ?? '',
      model: response.model,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens
          }
        : { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      finishReason: choice?.finish_reason ?? undefined
    };
  }

  async listModels(): Promise<string[]> {
    const names: string[] = [];
    for await (const model of this.client.models.list()) {
      names.push(model.id);
    }
    return names;
  }
}
