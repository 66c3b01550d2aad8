import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { Message, CompletionOptions, CompletionResult, OpenAIModel } from '../types.js';
import { BaseLLMClient } from './base.js';
import type { LLMClientConfig } from './types.js';
import { externalApiError, invalidConfigError } from '../utils/errors.js';

/**
 * Auth, rate-limit, connection and other HTTP failures all extend APIError.
 */
function isOpenAIError(error: unknown): error is Error {
  return error instanceof OpenAI.APIError;
}

/**
 * OpenAI client implementation.
 */
export class OpenAIClient extends BaseLLMClient {
  readonly provider = 'openai' as const;
  readonly model: OpenAIModel;

  private client: OpenAI;

  constructor(model: OpenAIModel, config: LLMClientConfig = {}) {
    super(config);
    this.model = model;

    const apiKey = config.apiKey || process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw invalidConfigError('OpenAI API key is required');
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl || undefined,
      timeout: this.config.timeout,
      maxRetries: 0,
    });
  }

  /**
   * Convert our Message array to OpenAI's message format.
   */
  private convertMessages(messages: Message[]): ChatCompletionMessageParam[] {
    return messages.map((m): ChatCompletionMessageParam => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
        case 'assistant':
          return { role: 'assistant', content: m.content };
      }
    });
  }

  /**
   * Generate a completion using OpenAI's chat API.
   */
  async completion(messages: Message[], options: CompletionOptions = {}): Promise<CompletionResult> {
    return this.callProvider(async () => {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: this.convertMessages(messages),
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      });

      const choice = response.choices[0];
      if (!choice) {
        throw externalApiError('No completion choice returned from OpenAI');
      }

      return {
        content: choice.message.content ?? '',
        usage: {
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0,
          totalTokens: response.usage?.total_tokens ?? 0,
        },
        finishReason: this.mapFinishReason(choice.finish_reason),
      };
    }, isOpenAIError);
  }

  /**
   * Map OpenAI finish reason to our standard format.
   */
  private mapFinishReason(reason: string | null): CompletionResult['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'unknown';
    }
  }
}
