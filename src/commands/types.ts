import type { OpenAIModel } from '../types.js';
import type { LLMClient } from '../clients/types.js';
import type { ResolvedConfig } from '../config.js';
import type { Logger } from '../logger/index.js';

/**
 * Where command output goes. The CLI passes the console.
 */
export interface Output {
  log(message?: string): void;
  error(message?: string): void;
}

/**
 * Line-at-a-time input for interactive commands.
 * `ask` resolves to null once the input is exhausted.
 */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export interface CommandContext {
  config: ResolvedConfig;
  logger: Logger;
  out: Output;
  /** Client factory (default: createClient with the configured credentials) */
  createClient?: (model: OpenAIModel) => LLMClient;
  /** Input for `templates create` (default: stdin) */
  prompter?: Prompter;
}

/** Process exit code */
export type ExitCode = 0 | 1;

export const consoleOutput: Output = {
  log: (message = '') => console.log(message),
  error: (message = '') => console.error(message),
};
