export { parseArgs, parseParamArgs, getHelpText } from './args.js';
export type { CLIOptions, ParsedParams } from './args.js';
export { runTemplatesCommand, RUN_DEFAULTS, TEMPLATE_SUBCOMMANDS } from './templates.js';
export { runAnalyzeCommand, runMetadataCommand } from './analyze.js';
export { createStdinPrompter } from './prompter.js';
export { consoleOutput } from './types.js';
export type { CommandContext, ExitCode, Output, Prompter } from './types.js';
export { runCli } from './run.js';
export type { CLIOverrides } from './run.js';
