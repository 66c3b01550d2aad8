import { getHelpText, parseArgs, type CLIOptions } from './args.js';
import { consoleOutput, type CommandContext, type ExitCode } from './types.js';
import { runTemplatesCommand } from './templates.js';
import { runAnalyzeCommand, runMetadataCommand } from './analyze.js';
import { getConfigSummary, resolveConfig } from '../config.js';
import { Logger } from '../logger/index.js';
import { formatError } from '../utils/errors.js';

export type CLIOverrides = Partial<Pick<CommandContext, 'out' | 'createClient' | 'prompter'>>;

const COMMANDS = ['templates', 'analyze', 'metadata'] as const;

/**
 * Parse `args`, resolve configuration and run one command.
 * Errors are reported through the output and turned into exit code 1.
 */
export async function runCli(
  args: readonly string[],
  overrides: CLIOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<ExitCode> {
  const out = overrides.out ?? consoleOutput;

  let options: CLIOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    out.error(formatError(error));
    return 1;
  }

  if (options.help) {
    out.log(getHelpText());
    return 0;
  }

  if (options.command === undefined) {
    out.log(getHelpText());
    return 1;
  }

  try {
    const config = resolveConfig(
      {
        ...(options.dir !== undefined ? { templateDir: options.dir } : {}),
        ...(options.verbose ? { verbose: true } : {}),
      },
      env
    );
    const logger = new Logger(config.verbose);

    if (config.verbose) {
      out.log('\n--- Configuration ---');
      out.log(getConfigSummary(config));
      out.log('---\n');
    }

    const ctx: CommandContext = { ...overrides, config, logger, out };

    switch (options.command) {
      case 'templates':
        return await runTemplatesCommand(options, ctx);
      case 'analyze':
        return await runAnalyzeCommand(options, ctx);
      case 'metadata':
        return await runMetadataCommand(options, ctx);
      default:
        out.error(`Error: Unknown command "${options.command}"`);
        out.error(`Available commands: ${COMMANDS.join(', ')}`);
        return 1;
    }
  } catch (error) {
    out.error(formatError(error));
    return 1;
  }
}
