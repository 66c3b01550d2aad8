import type { Message, CompletionOptions, CompletionResult, ModelProvider } from '../types.js';
import type { LLMClient, LLMClientConfig } from './types.js';
import { estimateTokensForMessages } from '../utils/tokens.js';
import { externalApiError, isDocPromptError } from '../utils/errors.js';

/**
 * Abstract base class for LLM clients.
 * Normalizes configuration and funnels provider failures into one error type.
 * No retries: each call yields one completion or one error.
 */
export abstract class BaseLLMClient implements LLMClient {
  abstract readonly provider: ModelProvider;
  abstract readonly model: string;

  protected config: Required<LLMClientConfig>;

  constructor(config: LLMClientConfig = {}) {
    this.config = {
      apiKey: config.apiKey ?? '',
      baseUrl: config.baseUrl ?? '',
      timeout: config.timeout ?? 60000,
    };
  }

  abstract completion(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;

  /**
   * Rough prompt size for a message array.
   */
  countTokens(messages: Message[]): number {
    return estimateTokensForMessages(messages);
  }

  /**
   * Run a provider call, converting provider errors to EXTERNAL_API_ERROR.
   */
  protected async callProvider<T>(
    fn: () => Promise<T>,
    isProviderError: (error: unknown) => error is Error
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isDocPromptError(error)) {
        throw error;
      }
      if (isProviderError(error)) {
        throw externalApiError(error.message, error);
      }
      throw error;
    }
  }
}
