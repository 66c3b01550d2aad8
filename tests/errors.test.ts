import { describe, it, expect } from 'vitest';
import {
  DocPromptError,
  externalApiError,
  formatError,
  invalidKindError,
  isDocPromptError,
  isDocPromptErrorCode,
  notFoundError,
  storageError,
  wrapError,
} from '../src/utils/errors.js';

describe('error factories', () => {
  it('attach codes and messages', () => {
    expect(notFoundError('template Foo')).toMatchObject({
      message: 'Not found: template Foo',
      code: 'NOT_FOUND',
    });
    expect(invalidKindError('vibes', ['sentiment', 'entities'])).toMatchObject({
      message: 'Invalid analysis type: vibes',
      code: 'INVALID_KIND',
      suggestion: 'Known analysis types: sentiment, entities',
    });
  });

  it('keeps the cause', () => {
    const cause = new Error('EACCES: permission denied');
    const error = storageError('cannot write /x.json', cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Template storage error: cannot write /x.json');
  });

  it('picks a suggestion for API failures', () => {
    expect(externalApiError('429 Too Many Requests').suggestion).toContain('rate limited');
    expect(externalApiError('401 Incorrect API key provided').suggestion).toContain('OPENAI_API_KEY');
    expect(externalApiError('Request timed out.').suggestion).toContain('timed out');
  });
});

describe('guards', () => {
  it('recognise DocPromptError', () => {
    expect(isDocPromptError(notFoundError('x'))).toBe(true);
    expect(isDocPromptError(new Error('x'))).toBe(false);
    expect(isDocPromptErrorCode(notFoundError('x'), 'NOT_FOUND')).toBe(true);
    expect(isDocPromptErrorCode(notFoundError('x'), 'STORAGE_ERROR')).toBe(false);
  });
});

describe('wrapError', () => {
  it('returns DocPromptErrors unchanged', () => {
    const error = notFoundError('x');
    expect(wrapError(error)).toBe(error);
  });

  it('wraps plain errors with the default code', () => {
    const wrapped = wrapError(new Error('boom'), 'STORAGE_ERROR');
    expect(wrapped).toBeInstanceOf(DocPromptError);
    expect(wrapped).toMatchObject({ message: 'boom', code: 'STORAGE_ERROR' });
  });

  it('wraps non-errors', () => {
    expect(wrapError('plain string')).toMatchObject({ message: 'plain string', code: 'ANALYSIS_FAILED' });
  });
});

describe('formatError', () => {
  it('shows code, suggestion and cause', () => {
    const error = storageError('cannot write /x.json', new Error('disk full'));

    expect(formatError(error).split('\n')).toEqual([
      'Error [STORAGE_ERROR]: Template storage error: cannot write /x.json',
      '',
      'Suggestion: Check that the template directory exists and is writable, or point DOCPROMPT_TEMPLATE_DIR elsewhere.',
      '',
      'Caused by: disk full',
    ]);
  });

  it('falls back to the message for other errors', () => {
    expect(formatError(new Error('plain'))).toBe('plain');
    expect(formatError(42)).toBe('42');
  });
});
