/**
 * Token budget helpers.
 *
 * Everything here uses the same rough heuristic of 4 characters per token.
 * It is not a tokenizer; it only keeps inputs under the model's context window.
 */

import type { Message } from '../types.js';

/** Approximate characters per token. */
export const CHARS_PER_TOKEN = 4;

/** Default input budget for analysis requests. */
export const MAX_TEXT_TOKENS = 4000;

/**
 * Overhead tokens for message formatting.
 * Each chat message carries role and separator tokens.
 */
const MESSAGE_OVERHEAD = 4;

/**
 * Truncate text to roughly `maxTokens` tokens.
 * Returns the first `maxTokens * 4` characters, with no attempt to cut on word
 * or sentence boundaries.
 */
export function truncateText(text: string, maxTokens: number = MAX_TEXT_TOKENS): string {
  const maxChars = Math.max(0, maxTokens) * CHARS_PER_TOKEN;
  return text.slice(0, maxChars);
}

/**
 * Estimate tokens for a string.
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Estimate tokens for a message array.
 */
export function estimateTokensForMessages(messages: Message[]): number {
  let total = 0;

  for (const message of messages) {
    total += estimateTokens(message.content) + MESSAGE_OVERHEAD;
  }

  // priming tokens
  return total + 3;
}
