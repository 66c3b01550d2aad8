import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger } from '../src/logger/index.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Logger', () => {
  it('prints info and debug only when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Logger(false).info('quiet');
    expect(log).not.toHaveBeenCalled();

    new Logger(true).info('loud');
    expect(log).toHaveBeenCalledWith('[docprompt] loud');
  });

  it('always prints warnings and errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger(false);

    logger.warn('careful');
    logger.error('broken');

    expect(warn).toHaveBeenCalledWith('[docprompt] Warning: careful');
    expect(error).toHaveBeenCalledWith('[docprompt] Error: broken');
  });

  it('records every entry regardless of verbosity', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new Logger(false);

    logger.debug('one', { n: 1 });
    logger.info('two');
    logger.warn('three');

    expect(logger.getEntries().map((e) => [e.level, e.message])).toEqual([
      ['debug', 'one'],
      ['info', 'two'],
      ['warn', 'three'],
    ]);
    expect(logger.getEntries('debug')[0].data).toEqual({ n: 1 });
    expect(logger.getEntries('info')[0].data).toBeUndefined();
  });

  it('summarizes completion calls', () => {
    const logger = new Logger();

    logger.logLLMCall(
      'gpt-4o',
      [
        { role: 'system', content: 'abc' },
        { role: 'user', content: 'defgh' },
      ],
      'response',
      { promptTokens: 10, completionTokens: 5, totalTokens: 15 }
    );

    expect(logger.getEntries()).toHaveLength(1);
    expect(logger.getEntries()[0]).toMatchObject({
      level: 'debug',
      message: 'LLM call (model=gpt-4o)',
      data: { promptLength: 8, responseLength: 8, tokens: 15 },
    });
  });

  it('clears and exports entries', () => {
    const logger = new Logger();
    logger.info('a');
    logger.info('b');

    expect(logger.toJSONL().split('\n')).toHaveLength(2);
    logger.clear();
    expect(logger.getEntries()).toEqual([]);
  });

  it('exposes verbosity', () => {
    expect(new Logger(true).isVerbose).toBe(true);
    expect(new Logger().isVerbose).toBe(false);
  });
});
