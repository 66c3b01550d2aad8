import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import type { OpenAIModel } from './types.js';
import { invalidConfigError } from './utils/errors.js';

/**
 * Placeholder credential used when OPENAI_API_KEY is not set.
 * Good enough for local runs against a mock; real calls will fail with an auth error.
 */
export const MOCK_OPENAI_API_KEY = 'mock_openai_api_key_12345';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
  model: 'gpt-3.5-turbo' as OpenAIModel,
  templateDir: join(homedir(), '.docprompt', 'templates'),
  verbose: false,
  timeout: 60000,
} as const;

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  OPENAI_API_KEY: 'OPENAI_API_KEY',
  OPENAI_BASE_URL: 'OPENAI_BASE_URL',
  DOCPROMPT_MODEL: 'DOCPROMPT_MODEL',
  DOCPROMPT_TEMPLATE_DIR: 'DOCPROMPT_TEMPLATE_DIR',
  DOCPROMPT_VERBOSE: 'DOCPROMPT_VERBOSE',
  DOCPROMPT_TIMEOUT: 'DOCPROMPT_TIMEOUT',
} as const;

/**
 * Credentials and endpoint for the completion API.
 */
export interface LLMSettings {
  apiKey: string;
  baseUrl?: string;
}

export interface ConfigOptions {
  model?: OpenAIModel;
  templateDir?: string;
  verbose?: boolean;
  timeout?: number;
  apiKey?: string;
  baseUrl?: string;
}

/**
 * Resolved configuration with all values set.
 */
export interface ResolvedConfig {
  model: OpenAIModel;
  templateDir: string;
  verbose: boolean;
  timeout: number;
  llm: LLMSettings;
}

/**
 * Read LLM credentials from the environment, falling back to the placeholder key.
 */
export function loadLLMSettings(env: NodeJS.ProcessEnv = process.env): LLMSettings {
  return {
    apiKey: env[ENV_VARS.OPENAI_API_KEY] || MOCK_OPENAI_API_KEY,
    baseUrl: env[ENV_VARS.OPENAI_BASE_URL] || undefined,
  };
}

/**
 * Resolve LLM settings and write the key back into the environment
 * so the OpenAI SDK sees the same credential.
 */
export function setupLLMEnvironment(settings: LLMSettings = loadLLMSettings()): LLMSettings {
  process.env[ENV_VARS.OPENAI_API_KEY] = settings.apiKey;
  return settings;
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigOptions {
  const config: ConfigOptions = {};

  const model = env[ENV_VARS.DOCPROMPT_MODEL];
  if (model) {
    config.model = model;
  }

  const templateDir = env[ENV_VARS.DOCPROMPT_TEMPLATE_DIR];
  if (templateDir) {
    config.templateDir = templateDir;
  }

  const verbose = env[ENV_VARS.DOCPROMPT_VERBOSE];
  if (verbose) {
    config.verbose = verbose.toLowerCase() === 'true';
  }

  const timeout = env[ENV_VARS.DOCPROMPT_TIMEOUT];
  if (timeout) {
    const parsed = parseInt(timeout, 10);
    if (!isNaN(parsed)) config.timeout = parsed;
  }

  return config;
}

/**
 * Resolve and validate configuration.
 * Precedence: defaults < environment < explicit options.
 */
export function resolveConfig(
  options: ConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const envConfig = loadEnvConfig(env);

  // `??` rather than spread so undefined options don't override defaults
  const merged = {
    model: options.model ?? envConfig.model ?? DEFAULT_CONFIG.model,
    templateDir: options.templateDir ?? envConfig.templateDir ?? DEFAULT_CONFIG.templateDir,
    verbose: options.verbose ?? envConfig.verbose ?? DEFAULT_CONFIG.verbose,
    timeout: options.timeout ?? envConfig.timeout ?? DEFAULT_CONFIG.timeout,
    apiKey: options.apiKey,
    baseUrl: options.baseUrl,
  };

  if (merged.model.trim() === '') {
    throw invalidConfigError('model must not be empty');
  }

  if (merged.timeout < 1000) {
    throw invalidConfigError('timeout must be at least 1000ms');
  }

  const llm = loadLLMSettings(env);

  return {
    model: merged.model,
    templateDir: resolve(merged.templateDir),
    verbose: merged.verbose,
    timeout: merged.timeout,
    llm: {
      apiKey: merged.apiKey ?? llm.apiKey,
      baseUrl: merged.baseUrl ?? llm.baseUrl,
    },
  };
}

/**
 * Get a summary of current configuration.
 */
export function getConfigSummary(config: ResolvedConfig): string {
  const usingPlaceholder = config.llm.apiKey === MOCK_OPENAI_API_KEY;
  return [
    `Model: ${config.model}`,
    `Template directory: ${config.templateDir}`,
    `Timeout: ${config.timeout}ms`,
    `API key: ${usingPlaceholder ? 'placeholder (OPENAI_API_KEY not set)' : 'set'}`,
  ].join('\n');
}
