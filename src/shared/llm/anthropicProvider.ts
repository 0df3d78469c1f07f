/**
 * Anthropic Provider
 *
 * Claude models through the Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider } from './provider';
import { SYSTEM_INSTRUCTION } from './prompts';
import type { CompletionResult, GenerationConfig, ProviderOptions } from './types';

export class AnthropicProvider extends BaseProvider {
  private client: Anthropic;

  constructor(options: ProviderOptions) {
    super('anthropic', options);
    this.client = new Anthropic({ apiKey: this.apiKey });
  }

  protected async complete(prompt: string, settings: GenerationConfig): Promise<CompletionResult> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: settings.maxTokens,
      temperature: settings.temperature,
      system: SYSTEM_INSTRUCTION,
      messages: [{ role: 'user', content: prompt }]
    });

    // A response can carry several text blocks
    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      model: response.model,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason ?? undefined
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
