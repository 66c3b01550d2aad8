import type { Message, TokenUsage } from '../types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  data?: Record<string, unknown>;
}

const PREFIX = '[docprompt]';

/**
 * Console logger that also keeps a trace of everything it was given.
 *
 * `debug` and `info` only reach the console in verbose mode;
 * warnings and errors are always printed.
 */
export class Logger {
  private entries: LogEntry[] = [];
  private verbose: boolean;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  get isVerbose(): boolean {
    return this.verbose;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.addEntry('debug', message, data);
    if (this.verbose) {
      console.log(`${PREFIX} ${message}`, ...(data ? [data] : []));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.addEntry('info', message, data);
    if (this.verbose) {
      console.log(`${PREFIX} ${message}`, ...(data ? [data] : []));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.addEntry('warn', message, data);
    console.warn(`${PREFIX} Warning: ${message}`);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.addEntry('error', message, data);
    console.error(`${PREFIX} Error: ${message}`);
  }

  /**
   * Log a completion call.
   */
  logLLMCall(model: string, messages: Message[], response: string, usage: TokenUsage): void {
    this.debug(`LLM call (model=${model})`, {
      promptLength: messages.reduce((acc, m) => acc + m.content.length, 0),
      responseLength: response.length,
      tokens: usage.totalTokens,
    });
  }

  private addEntry(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      timestamp: Date.now(),
      ...(data ? { data } : {}),
    });
  }

  /**
   * Get all recorded entries.
   */
  getEntries(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter((e) => e.level === level) : [...this.entries];
  }

  /**
   * Clear all entries.
   */
  clear(): void {
    this.entries = [];
  }

  /**
   * Export entries as JSONL string.
   */
  toJSONL(): string {
    return this.entries.map((e) => JSON.stringify(e)).join('\n');
  }
}
