import { DocPromptError, type DocPromptErrorCode } from '../types.js';

export { DocPromptError } from '../types.js';

/**
 * User-friendly error suggestions for common issues.
 */
const ERROR_SUGGESTIONS: Record<DocPromptErrorCode, string> = {
  NOT_FOUND: 'Check the spelling of the name or path. Use `docprompt templates list` to see what is available.',
  STORAGE_ERROR:
    'Check that the template directory exists and is writable, or point DOCPROMPT_TEMPLATE_DIR elsewhere.',
  MALFORMED_RESPONSE: 'The model did not return valid JSON. Try again or use a more capable model.',
  SCHEMA_VIOLATION:
    'The model returned JSON with missing or mistyped fields. Try again or use a more capable model.',
  EXTERNAL_API_ERROR:
    'Check your API key and network connection. If the issue persists, try again later.',
  INVALID_KIND: 'Use one of the listed analysis kinds.',
  INVALID_TEMPLATE: 'A template needs at least a non-empty name.',
  INVALID_CONFIG: 'Check your configuration options for typos or invalid values.',
  ANALYSIS_FAILED: 'Re-run with --verbose to see the full error.',
};

/**
 * Create a not-found error.
 */
export function notFoundError(what: string): DocPromptError {
  const error = new DocPromptError(`Not found: ${what}`, 'NOT_FOUND');
  error.suggestion = ERROR_SUGGESTIONS.NOT_FOUND;
  return error;
}

/**
 * Create a storage error for the template directory.
 */
export function storageError(message: string, cause?: Error): DocPromptError {
  const error = new DocPromptError(`Template storage error: ${message}`, 'STORAGE_ERROR', cause);
  error.suggestion = ERROR_SUGGESTIONS.STORAGE_ERROR;
  return error;
}

/**
 * Create an error for a completion that is not valid JSON.
 */
export function malformedResponseError(message: string, cause?: Error): DocPromptError {
  const error = new DocPromptError(
    `Invalid JSON returned by the LLM: ${message}`,
    'MALFORMED_RESPONSE',
    cause
  );
  error.suggestion = ERROR_SUGGESTIONS.MALFORMED_RESPONSE;
  return error;
}

/**
 * Create an error for JSON that does not match the expected result shape.
 */
export function schemaViolationError(field: string, message: string): DocPromptError {
  const error = new DocPromptError(
    `Response does not match schema at "${field}": ${message}`,
    'SCHEMA_VIOLATION'
  );
  error.suggestion = ERROR_SUGGESTIONS.SCHEMA_VIOLATION;
  return error;
}

/**
 * Create a completion API error.
 */
export function externalApiError(message: string, cause?: Error): DocPromptError {
  const error = new DocPromptError(
    `Completion API error: ${message}`,
    'EXTERNAL_API_ERROR',
    cause
  );
  error.suggestion = classifyApiError(message);
  return error;
}

/**
 * Classify a provider error message and pick a specific suggestion.
 */
function classifyApiError(message: string): string {
  const lower = message.toLowerCase();

  if (lower.includes('rate limit') || lower.includes('too many requests') || lower.includes('429')) {
    return 'You are being rate limited. Wait a moment before running the command again.';
  }

  if (
    lower.includes('unauthorized') ||
    lower.includes('incorrect api key') ||
    lower.includes('invalid api key') ||
    lower.includes('401')
  ) {
    return 'Your API key is invalid or missing. Check that OPENAI_API_KEY is set correctly.';
  }

  if (lower.includes('insufficient') || lower.includes('quota') || lower.includes('billing')) {
    return "Your API account may have insufficient credits. Check your billing status at the provider's dashboard.";
  }

  if (lower.includes('timeout') || lower.includes('timed out')) {
    return 'The API request timed out. Try again or check your network connection.';
  }

  if (lower.includes('network') || lower.includes('connection') || lower.includes('enotfound')) {
    return 'Network error - check your internet connection and firewall settings.';
  }

  return ERROR_SUGGESTIONS.EXTERNAL_API_ERROR;
}

/**
 * Create an unknown analysis kind error.
 */
export function invalidKindError(kind: string, known: readonly string[]): DocPromptError {
  const error = new DocPromptError(`Invalid analysis type: ${kind}`, 'INVALID_KIND');
  error.suggestion = `Known analysis types: ${known.join(', ')}`;
  return error;
}

/**
 * Create an invalid template error.
 */
export function invalidTemplateError(message: string): DocPromptError {
  const error = new DocPromptError(`Invalid template: ${message}`, 'INVALID_TEMPLATE');
  error.suggestion = ERROR_SUGGESTIONS.INVALID_TEMPLATE;
  return error;
}

/**
 * Create an invalid configuration error.
 */
export function invalidConfigError(message: string): DocPromptError {
  const error = new DocPromptError(`Invalid configuration: ${message}`, 'INVALID_CONFIG');
  error.suggestion = ERROR_SUGGESTIONS.INVALID_CONFIG;
  return error;
}

/**
 * Check if an error is a DocPromptError.
 */
export function isDocPromptError(error: unknown): error is DocPromptError {
  return error instanceof DocPromptError;
}

/**
 * Check if an error is of a specific type.
 */
export function isDocPromptErrorCode(error: unknown, code: DocPromptErrorCode): boolean {
  return isDocPromptError(error) && error.code === code;
}

/**
 * Wrap an unknown error as a DocPromptError.
 */
export function wrapError(
  error: unknown,
  defaultCode: DocPromptErrorCode = 'ANALYSIS_FAILED'
): DocPromptError {
  if (isDocPromptError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const wrapped = new DocPromptError(error.message, defaultCode, error);
    wrapped.suggestion = ERROR_SUGGESTIONS[defaultCode];
    return wrapped;
  }

  const wrapped = new DocPromptError(String(error), defaultCode);
  wrapped.suggestion = ERROR_SUGGESTIONS[defaultCode];
  return wrapped;
}

/**
 * Format an error for display to the user.
 */
export function formatError(error: unknown): string {
  if (isDocPromptError(error)) {
    const lines = [`Error [${error.code}]: ${error.message}`];

    if (error.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${error.suggestion}`);
    }

    if (error.cause) {
      lines.push('');
      lines.push(`Caused by: ${error.cause.message}`);
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
