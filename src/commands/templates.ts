import { parseParamArgs, type CLIOptions } from './args.js';
import type { CommandContext, ExitCode, Output, Prompter } from './types.js';
import type { PromptTemplate } from '../templates/types.js';
import { TemplateManager } from '../templates/manager.js';
import { seedDefaultTemplates } from '../templates/builtin.js';
import { createTemplate, toRecord, toSummary } from '../templates/template.js';
import {
  extractParameters,
  findMissingParameters,
  formatTemplate,
  toChatMessages,
} from '../templates/render.js';
import { calculateCost, createClient, MODEL_PRICING } from '../clients/index.js';
import { createStdinPrompter } from './prompter.js';

/** Defaults for `templates run` */
export const RUN_DEFAULTS = {
  temperature: 0.7,
  maxTokens: 500,
} as const;

/** Characters of the rendered prompt echoed before the response */
const PROMPT_PREVIEW_CHARS = 500;

/** Ends a multi-line answer in `templates create` */
const END_OF_TEXT = '.';

export const TEMPLATE_SUBCOMMANDS = ['list', 'show', 'run', 'create', 'remove', 'init'] as const;

/**
 * `docprompt templates <subcommand>`.
 *
 * The default templates are written first when the directory is empty.
 */
export async function runTemplatesCommand(options: CLIOptions, ctx: CommandContext): Promise<ExitCode> {
  const [subcommand, ...rest] = options.positionals;
  const { config, logger, out } = ctx;

  if (subcommand === 'init') {
    const written = await seedDefaultTemplates(config.templateDir, logger);
    if (written.length === 0) {
      out.log(`Template directory ${config.templateDir} already has templates; nothing written.`);
    } else {
      out.log(`Wrote ${written.length} default templates to ${config.templateDir}`);
    }
    return 0;
  }

  await seedDefaultTemplates(config.templateDir, logger);
  const manager = await TemplateManager.open(config.templateDir, { logger });

  switch (subcommand) {
    case 'list':
      return listTemplates(manager, options, out);
    case 'show':
      return showTemplate(manager, rest[0], options, out);
    case 'run':
      return runTemplate(manager, rest, options, ctx);
    case 'create':
      return createTemplateInteractive(manager, ctx);
    case 'remove':
      return removeTemplate(manager, rest[0], out);
    default:
      out.error(
        subcommand === undefined
          ? 'Error: templates requires a subcommand'
          : `Error: Unknown templates subcommand "${subcommand}"`
      );
      out.error(`Available subcommands: ${TEMPLATE_SUBCOMMANDS.join(', ')}`);
      return 1;
  }
}

function listTemplates(manager: TemplateManager, options: CLIOptions, out: Output): ExitCode {
  const summaries =
    options.tags.length > 0 ? manager.filterByTags(options.tags).map(toSummary) : manager.list();

  if (options.json) {
    out.log(JSON.stringify(summaries, null, 2));
    return 0;
  }

  if (summaries.length === 0) {
    out.log('No templates found.');
    return 0;
  }

  out.log(`\nFound ${summaries.length} templates:\n`);
  summaries.forEach((summary, i) => {
    out.log(`${i + 1}. ${summary.name}`);
    out.log(`   Description: ${summary.description}`);
    if (summary.parameters.length > 0) {
      out.log(`   Parameters: ${summary.parameters.map((p) => `$${p}`).join(', ')}`);
    }
    if (summary.tags.length > 0) {
      out.log(`   Tags: ${summary.tags.join(', ')}`);
    }
    out.log();
  });
  return 0;
}

function lookup(manager: TemplateManager, name: string | undefined, out: Output): PromptTemplate | undefined {
  if (name === undefined) {
    out.error('Error: Template name is required');
    return undefined;
  }

  const template = manager.get(name);
  if (!template) {
    out.error(`Error: Template not found: ${name}`);
  }
  return template;
}

function showTemplate(
  manager: TemplateManager,
  name: string | undefined,
  options: CLIOptions,
  out: Output
): ExitCode {
  const template = lookup(manager, name, out);
  if (!template) {
    return 1;
  }

  if (options.json) {
    out.log(JSON.stringify(toRecord(template), null, 2));
    return 0;
  }

  out.log(`\n===== ${template.name} =====`);
  out.log(`Description: ${template.description}`);
  out.log(`Version: ${template.version}`);
  if (template.tags.length > 0) {
    out.log(`Tags: ${template.tags.join(', ')}`);
  }

  out.log('\nParameters:');
  const params = Object.entries(template.parameters);
  if (params.length === 0) {
    out.log('  None');
  }
  for (const [param, description] of params) {
    out.log(`  $${param}: ${description}`);
  }

  out.log('\nSystem Message:');
  out.log(`  ${template.systemMessage ?? 'None'}`);

  out.log('\nTemplate:');
  out.log(`  ${template.template}`);

  if (template.examples.length > 0) {
    out.log('\nExamples:');
    template.examples.forEach((example, i) => {
      out.log(`  Example ${i + 1}:`);
      out.log(`    Parameters: ${JSON.stringify(example.parameters)}`);
      if (example.output !== undefined) {
        const output =
          typeof example.output === 'string' ? example.output : JSON.stringify(example.output);
        out.log(`    Output: ${output.slice(0, 100)}...`);
      }
    });
  }
  out.log();
  return 0;
}

async function runTemplate(
  manager: TemplateManager,
  args: string[],
  options: CLIOptions,
  ctx: CommandContext
): Promise<ExitCode> {
  const { config, logger, out } = ctx;
  const [name, ...paramArgs] = args;

  const template = lookup(manager, name, out);
  if (!template) {
    return 1;
  }

  const { params, invalid } = parseParamArgs(paramArgs);
  for (const arg of invalid) {
    logger.warn(`Ignoring invalid parameter format: ${arg}`);
  }

  const missing = findMissingParameters(template, params);
  if (missing.length > 0) {
    out.error(`Error: Missing required parameters: ${missing.map((p) => `$${p}`).join(', ')}`);
    return 1;
  }

  const model = options.model ?? config.model;
  const temperature = options.temperature ?? RUN_DEFAULTS.temperature;
  const maxTokens = options.maxTokens ?? RUN_DEFAULTS.maxTokens;

  const client = ctx.createClient
    ? ctx.createClient(model)
    : createClient(model, config.llm, { timeout: config.timeout });
  const messages = toChatMessages(template, params);
  const prompt = formatTemplate(template, params);

  if (!options.json) {
    out.log(`\nRunning template: ${template.name}`);
    out.log(`Model: ${model}, Temperature: ${temperature}\n`);
    out.log('===== PROMPT =====');
    out.log(prompt.slice(0, PROMPT_PREVIEW_CHARS) + (prompt.length > PROMPT_PREVIEW_CHARS ? '...' : ''));
  }

  const result = await client.completion(messages, { temperature, maxTokens });
  logger.logLLMCall(client.model, messages, result.content, result.usage);

  if (options.json) {
    out.log(
      JSON.stringify(
        { template: template.name, model, prompt, response: result.content, usage: result.usage },
        null,
        2
      )
    );
    return 0;
  }

  out.log('\n===== RESPONSE =====');
  out.log(result.content);
  out.log('\n===== USAGE =====');
  out.log(`Prompt tokens: ${result.usage.promptTokens}`);
  out.log(`Completion tokens: ${result.usage.completionTokens}`);
  out.log(`Total tokens: ${result.usage.totalTokens}`);
  if (MODEL_PRICING[model]) {
    out.log(`Estimated cost: $${calculateCost(model, result.usage).toFixed(4)}`);
  }
  return 0;
}

async function readBlock(prompter: Prompter): Promise<string[]> {
  const lines: string[] = [];
  let line = await prompter.ask('');
  while (line !== null && line !== END_OF_TEXT) {
    lines.push(line);
    line = await prompter.ask('');
  }
  return lines;
}

async function createTemplateInteractive(manager: TemplateManager, ctx: CommandContext): Promise<ExitCode> {
  const { out } = ctx;
  const prompter = ctx.prompter ?? createStdinPrompter();

  try {
    out.log('\n===== CREATE NEW TEMPLATE =====\n');

    const name = (await prompter.ask('Template name: '))?.trim() ?? '';
    if (!name) {
      out.error('Error: Template name is required.');
      return 1;
    }

    const description = (await prompter.ask('Description: ')) ?? '';

    out.log('\nSystem message (optional, for chat models):');
    out.log(`Enter text below, finish with a line containing only '${END_OF_TEXT}'`);
    const systemLines = await readBlock(prompter);

    out.log('\nTemplate text (use $parameter or ${parameter} for variables):');
    out.log(`Enter text below, finish with a line containing only '${END_OF_TEXT}'`);
    const body = (await readBlock(prompter)).join('\n');

    const parameters: Record<string, string> = {};
    const names = extractParameters(body);
    if (names.length > 0) {
      out.log('\nParameter descriptions:');
      for (const param of names) {
        parameters[param] = (await prompter.ask(`Description for $${param}: `)) ?? '';
      }
    }

    const tagsInput = (await prompter.ask('\nTags (comma-separated): ')) ?? '';
    const tags = tagsInput
      .split(',')
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);

    const template = createTemplate({
      name,
      description,
      template: body,
      parameters,
      systemMessage: systemLines.length > 0 ? systemLines.join('\n') : null,
      tags,
    });

    const path = await manager.save(template);
    out.log(`\nTemplate saved to ${path}`);
    return 0;
  } finally {
    prompter.close();
  }
}

async function removeTemplate(
  manager: TemplateManager,
  name: string | undefined,
  out: Output
): Promise<ExitCode> {
  if (name === undefined) {
    out.error('Error: Template name is required');
    return 1;
  }

  if (!(await manager.remove(name))) {
    out.error(`Error: Template not found: ${name}`);
    return 1;
  }

  out.log(`Removed template: ${name}`);
  return 0;
}
