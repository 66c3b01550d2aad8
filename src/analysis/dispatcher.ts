import { readFile } from 'node:fs/promises';
import type { Message } from '../types.js';
import type {
  AnalysisFailure,
  AnalysisKind,
  AnalysisOutcome,
  AnalyzeOptions,
} from './types.js';
import { ANALYSIS_KINDS } from './types.js';
import { ANALYSIS_CATALOG, ANALYSIS_TEMPERATURE, isAnalysisKind } from './catalog.js';
import { createClient } from '../clients/index.js';
import { DEFAULT_CONFIG } from '../config.js';
import { Logger } from '../logger/index.js';
import { MAX_TEXT_TOKENS, truncateText } from '../utils/tokens.js';
import { parseJSONResponse } from '../utils/parser.js';
import {
  invalidKindError,
  isDocPromptError,
  notFoundError,
  schemaViolationError,
  wrapError,
} from '../utils/errors.js';

/**
 * Check whether an analysis call failed.
 */
export function isAnalysisFailure(value: unknown): value is AnalysisFailure {
  return typeof value === 'object' && value !== null && 'error' in value;
}

/**
 * Run one analysis over `text`.
 *
 * The text is cut to the input budget, sent with the kind's system prompt,
 * and the reply is parsed as JSON and validated against the kind's schema.
 * Never rejects: every failure comes back as an `AnalysisFailure`.
 */
export async function analyze<K extends AnalysisKind>(
  text: string,
  kind: K,
  options?: AnalyzeOptions
): Promise<AnalysisOutcome<K>>;
export async function analyze(
  text: string,
  kind: string,
  options?: AnalyzeOptions
): Promise<AnalysisOutcome>;
export async function analyze(
  text: string,
  kind: string,
  options: AnalyzeOptions = {}
): Promise<AnalysisOutcome> {
  const logger = options.logger ?? new Logger();

  if (!isAnalysisKind(kind)) {
    const error = invalidKindError(kind, ANALYSIS_KINDS);
    logger.error(error.message);
    return { error: error.message, code: 'INVALID_KIND' };
  }

  return runAnalysis(text, kind, options, logger);
}

/**
 * Read a UTF-8 file and analyze its contents.
 */
export async function analyzeFile<K extends AnalysisKind>(
  path: string,
  kind: K,
  options?: AnalyzeOptions
): Promise<AnalysisOutcome<K>>;
export async function analyzeFile(
  path: string,
  kind: string,
  options?: AnalyzeOptions
): Promise<AnalysisOutcome>;
export async function analyzeFile(
  path: string,
  kind: string,
  options: AnalyzeOptions = {}
): Promise<AnalysisOutcome> {
  const logger = options.logger ?? new Logger();

  if (!isAnalysisKind(kind)) {
    return analyze('', kind, { ...options, logger });
  }

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const notFound = notFoundError(`file ${path}`);
    logger.error(notFound.message, {
      cause: error instanceof Error ? error.message : String(error),
    });
    return { error: notFound.message, code: 'NOT_FOUND' };
  }

  logger.info(`Performing ${kind} analysis on: ${path}`);
  return runAnalysis(text, kind, options, logger);
}

/**
 * Generate a title, summary, keywords and topics for a document.
 */
export function generateMetadata(
  text: string,
  options: AnalyzeOptions = {}
): Promise<AnalysisOutcome<'metadata'>> {
  return analyze(text, 'metadata', options);
}

async function runAnalysis<K extends AnalysisKind>(
  text: string,
  kind: K,
  options: AnalyzeOptions,
  logger: Logger
): Promise<AnalysisOutcome<K>> {
  const config = ANALYSIS_CATALOG[kind];

  try {
    const client =
      options.client ??
      createClient(options.model ?? DEFAULT_CONFIG.model, options.settings, {
        timeout: options.timeout ?? DEFAULT_CONFIG.timeout,
      });

    const input = truncateText(text, options.maxInputTokens ?? MAX_TEXT_TOKENS);
    if (input.length < text.length) {
      logger.debug(`Input truncated from ${text.length} to ${input.length} characters`);
    }

    const messages: Message[] = [
      { role: 'system', content: config.systemPrompt },
      { role: 'user', content: input },
    ];

    logger.info(`Requesting ${kind} analysis from ${client.model}`);
    const response = await client.completion(messages, {
      temperature: ANALYSIS_TEMPERATURE,
      maxTokens: config.maxTokens,
    });
    logger.logLLMCall(client.model, messages, response.content, response.usage);

    const parsed = parseJSONResponse(response.content);
    const validated = config.schema.safeParse(parsed);

    if (!validated.success) {
      const issue = validated.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
      const violation = schemaViolationError(field, issue?.message ?? 'invalid value');
      logger.error(violation.message);
      return { error: violation.message, code: 'SCHEMA_VIOLATION', field };
    }

    return validated.data;
  } catch (error) {
    return toFailure(error, kind, logger);
  }
}

function toFailure(error: unknown, kind: AnalysisKind, logger: Logger): AnalysisFailure {
  if (isDocPromptError(error)) {
    switch (error.code) {
      case 'EXTERNAL_API_ERROR':
      case 'MALFORMED_RESPONSE':
        logger.error(error.message);
        return { error: error.message, code: error.code };
    }
  }

  const wrapped = wrapError(error, 'ANALYSIS_FAILED');
  logger.error(`Error in ${kind} analysis: ${wrapped.message}`, { stack: wrapped.stack });
  return { error: `Analysis failed: ${wrapped.message}`, code: 'ANALYSIS_FAILED' };
}
