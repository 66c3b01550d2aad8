import type { OpenAIModel } from '../types.js';
import type { LLMClient, LLMClientConfig } from './types.js';
import { OpenAIClient } from './openai.js';
import { setupLLMEnvironment, type LLMSettings } from '../config.js';

export type { LLMClient, LLMClientConfig, ModelPricing } from './types.js';
export { OpenAIClient } from './openai.js';
export { BaseLLMClient } from './base.js';
export { calculateCost, MODEL_PRICING } from './types.js';

/**
 * Create a completion client for the given model.
 *
 * The resolved API key is written back into the environment first,
 * so the SDK and anything else reading OPENAI_API_KEY agree on it.
 */
export function createClient(
  model: OpenAIModel,
  settings?: LLMSettings,
  config: Omit<LLMClientConfig, 'apiKey' | 'baseUrl'> = {}
): LLMClient {
  const resolved = setupLLMEnvironment(settings);

  return new OpenAIClient(model, {
    ...config,
    apiKey: resolved.apiKey,
    baseUrl: resolved.baseUrl,
  });
}
