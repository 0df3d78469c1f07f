/**
 * LLM Prompts
 *
 * Prompt utilities shared by every backend and pipeline.
 */

/**
 * System instruction sent by every backend with each request
 */
export const SYSTEM_INSTRUCTION =
  'You are an expert CV analyst with deep knowledge of recruitment and talent assessment.';

/**
 * Normalize text for inclusion in a prompt
 */
export function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')  // Normalize line endings
    .replace(/\r/g, '\n')
    .trim();
}
