import type { CLIOptions } from './args.js';
import type { CommandContext, ExitCode } from './types.js';
import type { AnalysisKind, AnalysisOutcome, AnalyzeOptions } from '../analysis/types.js';
import { analyzeFile, isAnalysisFailure } from '../analysis/dispatcher.js';
import { getAnalysisHelp, isAnalysisKind } from '../analysis/catalog.js';
import { formatAnalysis } from '../analysis/format.js';

function analyzeOptions(options: CLIOptions, ctx: CommandContext): AnalyzeOptions {
  const model = options.model ?? ctx.config.model;
  return {
    model,
    settings: ctx.config.llm,
    logger: ctx.logger,
    timeout: ctx.config.timeout,
    ...(ctx.createClient ? { client: ctx.createClient(model) } : {}),
  };
}

function report<K extends AnalysisKind>(
  kind: K,
  outcome: AnalysisOutcome<K>,
  options: CLIOptions,
  ctx: CommandContext
): ExitCode {
  if (isAnalysisFailure(outcome)) {
    ctx.out.error(`Error [${outcome.code}]: ${outcome.error}`);
    return 1;
  }

  ctx.out.log(options.json ? JSON.stringify(outcome, null, 2) : formatAnalysis(kind, outcome));
  return 0;
}

/**
 * `docprompt analyze <kind> <file>`.
 */
export async function runAnalyzeCommand(options: CLIOptions, ctx: CommandContext): Promise<ExitCode> {
  const [kind, file] = options.positionals;

  if (kind === undefined || file === undefined) {
    ctx.out.error('Error: analyze requires an analysis type and a file');
    ctx.out.error(getAnalysisHelp());
    return 1;
  }

  if (!isAnalysisKind(kind)) {
    ctx.out.error(`Error: Invalid analysis type: ${kind}`);
    ctx.out.error(getAnalysisHelp());
    return 1;
  }

  const outcome = await analyzeFile(file, kind, analyzeOptions(options, ctx));
  return report(kind, outcome, options, ctx);
}

/**
 * `docprompt metadata <file>`.
 */
export async function runMetadataCommand(options: CLIOptions, ctx: CommandContext): Promise<ExitCode> {
  const [file] = options.positionals;

  if (file === undefined) {
    ctx.out.error('Error: metadata requires a file');
    return 1;
  }

  const outcome = await analyzeFile(file, 'metadata', analyzeOptions(options, ctx));
  return report('metadata', outcome, options, ctx);
}
