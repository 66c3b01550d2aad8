import { invalidConfigError } from '../utils/errors.js';

export interface CLIOptions {
  /** First positional argument: templates, analyze or metadata */
  command?: string;
  /** Remaining positional arguments, in order */
  positionals: string[];
  dir?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  tags: string[];
  json: boolean;
  verbose: boolean;
  help: boolean;
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw invalidConfigError(`${flag} requires a value`);
  }
  return value;
}

function parseNumber(value: string, flag: string, parse: (value: string) => number): number {
  const parsed = parse(value);
  if (isNaN(parsed)) {
    throw invalidConfigError(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws DocPromptError (INVALID_CONFIG) on unknown flags or bad values
 */
export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    positionals: [],
    tags: [],
    json: false,
    verbose: false,
    help: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--dir' || arg === '-d') {
      options.dir = requireValue(args, ++i, arg);
    } else if (arg === '--model' || arg === '-m') {
      options.model = requireValue(args, ++i, arg);
    } else if (arg === '--temperature' || arg === '-t') {
      options.temperature = parseNumber(requireValue(args, ++i, arg), arg, parseFloat);
    } else if (arg === '--max-tokens') {
      options.maxTokens = parseNumber(requireValue(args, ++i, arg), arg, (v) => parseInt(v, 10));
    } else if (arg === '--tag') {
      options.tags.push(requireValue(args, ++i, arg));
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg.startsWith('-') && arg.length > 1) {
      throw invalidConfigError(`unknown option "${arg}"`);
    } else if (options.command === undefined) {
      options.command = arg;
    } else {
      options.positionals.push(arg);
    }

    i++;
  }

  return options;
}

export interface ParsedParams {
  params: Record<string, string>;
  /** Arguments without an `=` */
  invalid: string[];
}

/**
 * Parse `key=value` arguments. Only the first `=` splits; the value may contain more.
 */
export function parseParamArgs(args: readonly string[]): ParsedParams {
  const params: Record<string, string> = {};
  const invalid: string[] = [];

  for (const arg of args) {
    const eqIndex = arg.indexOf('=');
    if (eqIndex === -1) {
      invalid.push(arg);
      continue;
    }
    params[arg.slice(0, eqIndex)] = arg.slice(eqIndex + 1);
  }

  return { params, invalid };
}

export function getHelpText(): string {
  return `
docprompt - prompt templates and document analysis

Usage:
  docprompt <command> [arguments] [options]

Commands:
  templates list                  List templates (filter with --tag)
  templates show <name>           Show one template in full
  templates run <name> [k=v ...]  Render a template and send it to the model
  templates create                Create a template interactively
  templates remove <name>         Delete a template
  templates init                  Write the default templates into an empty directory
  analyze <kind> <file>           Run one analysis over a text file
  metadata <file>                 Generate title, summary, keywords and topics

Options:
  -d, --dir <path>          Template directory (default: ~/.docprompt/templates)
  -m, --model <model>       Model to use (default: gpt-3.5-turbo)
  -t, --temperature <n>     Sampling temperature for templates run (default: 0.7)
  --max-tokens <n>          Completion budget for templates run (default: 500)
  --tag <tag>               Only list templates with this tag (repeatable)
  --json                    Print raw JSON instead of formatted text
  -v, --verbose             Enable verbose output
  -h, --help                Show this help message

Environment:
  OPENAI_API_KEY            API key for the completion service
  OPENAI_BASE_URL           Alternative API endpoint
  DOCPROMPT_MODEL           Default model
  DOCPROMPT_TEMPLATE_DIR    Default template directory
  DOCPROMPT_VERBOSE         Set to "true" for verbose output
  DOCPROMPT_TIMEOUT         Request timeout in milliseconds

Examples:
  # List code-related templates
  docprompt templates list --tag code

  # Summarize a document through a template
  docprompt templates run "Document Summary" document="$(cat notes.txt)"

  # Extract action items from meeting notes
  docprompt analyze action_items meeting.txt

  # Metadata as JSON
  docprompt metadata article.txt --json
`;
}
