// Template exports
export {
  createTemplate,
  slugify,
  toRecord,
  fromRecord,
  toSummary,
  formatTemplate,
  substitute,
  toChatMessages,
  findMissingParameters,
  extractParameters,
  TemplateStore,
  TemplateManager,
  TemplateRecordSchema,
  TemplateExampleSchema,
  DEFAULT_TEMPLATE_VERSION,
  DEFAULT_TEMPLATES,
  getDefaultTemplate,
  seedDefaultTemplates,
} from './templates/index.js';

// Analysis exports
export {
  analyze,
  analyzeFile,
  generateMetadata,
  isAnalysisFailure,
  isAnalysisKind,
  getAnalysisHelp,
  formatAnalysis,
  ANALYSIS_KINDS,
  ANALYSIS_CATALOG,
} from './analysis/index.js';

// Type exports
export type {
  // Core types
  OpenAIModel,
  ModelProvider,
  DocPromptErrorCode,

  // Message types
  Message,
  MessageRole,
  CompletionOptions,
  CompletionResult,
  TokenUsage,
} from './types.js';

export type {
  PromptTemplate,
  TemplateInput,
  TemplateExample,
  TemplateSummary,
  TemplateValues,
  TemplateRecord,
  ChatMessage,
  TemplateManagerOptions,
} from './templates/index.js';

export type {
  AnalysisKind,
  AnalysisResult,
  AnalysisResultMap,
  AnalysisFailure,
  AnalysisErrorCode,
  AnalysisOutcome,
  AnalyzeOptions,
  SentimentAnalysis,
  EntityExtraction,
  KeyPointsExtraction,
  ContentStructure,
  ActionItemExtraction,
  DocumentMetadata,
} from './analysis/index.js';

// Client exports
export { createClient, OpenAIClient, BaseLLMClient, calculateCost, MODEL_PRICING } from './clients/index.js';
export type { LLMClient, LLMClientConfig, ModelPricing } from './clients/index.js';

// Config exports
export {
  DEFAULT_CONFIG,
  ENV_VARS,
  MOCK_OPENAI_API_KEY,
  loadEnvConfig,
  loadLLMSettings,
  setupLLMEnvironment,
  resolveConfig,
  getConfigSummary,
} from './config.js';
export type { ConfigOptions, ResolvedConfig, LLMSettings } from './config.js';

// Logger exports
export { Logger } from './logger/index.js';
export type { LogEntry, LogLevel } from './logger/index.js';

// Utility exports
export {
  truncateText,
  estimateTokens,
  estimateTokensForMessages,
  parseJSONResponse,
  isPlainObject,
  CHARS_PER_TOKEN,
  MAX_TEXT_TOKENS,
} from './utils/index.js';

// Error exports
export {
  DocPromptError,
  notFoundError,
  storageError,
  malformedResponseError,
  schemaViolationError,
  externalApiError,
  invalidKindError,
  invalidTemplateError,
  invalidConfigError,
  isDocPromptError,
  isDocPromptErrorCode,
  wrapError,
  formatError,
} from './utils/index.js';

// CLI exports
export { runCli, parseParamArgs } from './commands/index.js';
export type { ParsedParams } from './commands/index.js';
