/**
 * In-process CompletionProvider for pipeline tests
 */

import { vi } from 'vitest';
import type { CompletionProvider } from '../../shared/llm/provider';
import type { CompletionResult, TokenUsage } from '../../shared/llm/types';

export const FAKE_USAGE: TokenUsage = { promptTokens: 10, completionTokens: 5, totalTokens: 15 };

export type Responder = (prompt: string) => string | Promise<string>;

export function createFakeProvider(respond: Responder, model = 'fake-model') {
  const generate = vi.fn(async (prompt: string): Promise<CompletionResult> => {
    const text = await respond(prompt);
    return { text, usage: { ...FAKE_USAGE }, model };
  });

  const provider: CompletionProvider = {
    generate,
    providerName: () => 'fake',
    modelName: () => model
  };

  return { provider, generate };
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Prompts sent to a mocked generate, in call order
 */
export function promptsOf(generate: ReturnType<typeof createFakeProvider>['generate']): string[] {
  return generate.mock.calls.map(call => call[0]);
}

/**
 * Deterministic [0, 1) sequence for shuffles and ids
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}
