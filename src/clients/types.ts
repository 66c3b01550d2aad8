import type { Message, CompletionOptions, CompletionResult, TokenUsage } from '../types.js';

/**
 * Base interface for LLM clients.
 * Anything that turns chat messages into a text completion can back the dispatcher.
 */
export interface LLMClient {
  /** Provider name (e.g., 'openai') */
  readonly provider: string;

  /** Model identifier */
  readonly model: string;

  /**
   * Generate a completion for the given messages.
   * Provider failures reject with an EXTERNAL_API_ERROR.
   */
  completion(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;
}

/**
 * Configuration for creating an LLM client.
 */
export interface LLMClientConfig {
  apiKey?: string;
  baseUrl?: string;
  timeout?: number;
}

/**
 * Model pricing information for cost estimation.
 * Prices are in USD per 1M tokens.
 */
export interface ModelPricing {
  inputPer1M: number;
  outputPer1M: number;
}

/**
 * Model pricing lookup table.
 */
export const MODEL_PRICING: Record<string, ModelPricing> = {
  'gpt-3.5-turbo': { inputPer1M: 0.5, outputPer1M: 1.5 },
  'gpt-4': { inputPer1M: 30, outputPer1M: 60 },
  'gpt-4-turbo': { inputPer1M: 10, outputPer1M: 30 },
  'gpt-4o': { inputPer1M: 2.5, outputPer1M: 10 },
  'gpt-4o-mini': { inputPer1M: 0.15, outputPer1M: 0.6 },
};

/**
 * Calculate estimated cost for token usage.
 */
export function calculateCost(model: string, usage: TokenUsage): number {
  const pricing = MODEL_PRICING[model];
  if (!pricing) {
    return 0;
  }

  const inputCost = (usage.promptTokens / 1_000_000) * pricing.inputPer1M;
  const outputCost = (usage.completionTokens / 1_000_000) * pricing.outputPer1M;

  return inputCost + outputCost;
}
