/**
 * LLM Module
 *
 * Text-completion capability with OpenAI, Anthropic and Gemini backends.
 */

export * from './types';
export * from './provider';
export * from './prompts';
export * from './factory';
export { AnthropicProvider } from './anthropicProvider';
export { OpenAIProvider, usesCompletionTokenLimit } from './openaiProvider';
export { GeminiProvider, matchGeminiModel } from './geminiProvider';
