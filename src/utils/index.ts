export { parseJSONResponse, isPlainObject } from './parser.js';

export {
  CHARS_PER_TOKEN,
  MAX_TEXT_TOKENS,
  truncateText,
  estimateTokens,
  estimateTokensForMessages,
} from './tokens.js';

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
} from './errors.js';
