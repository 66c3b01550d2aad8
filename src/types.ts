// =============================================================================
// LLM Client Types
// =============================================================================

export type ModelProvider = 'openai';

export type OpenAIModel =
  | 'gpt-3.5-turbo'
  | 'gpt-4'
  | 'gpt-4-turbo'
  | 'gpt-4o'
  | 'gpt-4o-mini'
  | (string & {});

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionResult {
  content: string;
  usage: TokenUsage;
  finishReason?: 'stop' | 'length' | 'content_filter' | 'unknown';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

// =============================================================================
// Errors
// =============================================================================

export type DocPromptErrorCode =
  | 'NOT_FOUND'
  | 'STORAGE_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'SCHEMA_VIOLATION'
  | 'EXTERNAL_API_ERROR'
  | 'INVALID_KIND'
  | 'INVALID_TEMPLATE'
  | 'INVALID_CONFIG'
  | 'ANALYSIS_FAILED';

export class DocPromptError extends Error {
  /** User-friendly suggestion for resolving the error */
  suggestion?: string;

  constructor(
    message: string,
    public code: DocPromptErrorCode,
    public cause?: Error
  ) {
    super(message);
    this.name = 'DocPromptError';
  }
}
