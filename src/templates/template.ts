import type {
  PromptTemplate,
  TemplateExample,
  TemplateInput,
  TemplateRecord,
  TemplateSummary,
} from './types.js';
import { DEFAULT_TEMPLATE_VERSION } from './types.js';
import { invalidTemplateError } from '../utils/errors.js';

/**
 * Build an immutable template, filling in defaults.
 *
 * @throws DocPromptError (INVALID_TEMPLATE) when the name is blank
 */
export function createTemplate(input: TemplateInput): PromptTemplate {
  if (!input.name || input.name.trim() === '') {
    throw invalidTemplateError('name must not be empty');
  }

  const examples: TemplateExample[] = (input.examples ?? []).map((example) =>
    Object.freeze({ ...example, parameters: Object.freeze({ ...example.parameters }) })
  );

  const template: PromptTemplate = {
    name: input.name,
    description: input.description,
    template: input.template,
    parameters: Object.freeze({ ...(input.parameters ?? {}) }),
    ...(input.systemMessage ? { systemMessage: input.systemMessage } : {}),
    tags: Object.freeze([...(input.tags ?? [])]),
    examples: Object.freeze(examples),
    version: input.version ?? DEFAULT_TEMPLATE_VERSION,
  };

  return Object.freeze(template);
}

/**
 * Filesystem-safe identifier for a template name: lowercased, spaces become underscores.
 * Distinct names can share a slug ("Code Review" and "code review").
 */
export function slugify(name: string): string {
  return name.toLowerCase().replaceAll(' ', '_');
}

/**
 * Convert a template to its on-disk record shape.
 */
export function toRecord(template: PromptTemplate): TemplateRecord {
  return {
    name: template.name,
    description: template.description,
    template: template.template,
    parameters: { ...template.parameters },
    system_message: template.systemMessage ?? null,
    tags: [...template.tags],
    examples: template.examples.map((example) => ({ ...example, parameters: { ...example.parameters } })),
    version: template.version,
  };
}

/**
 * Build a template from a validated on-disk record.
 */
export function fromRecord(record: TemplateRecord): PromptTemplate {
  return createTemplate({
    name: record.name,
    description: record.description,
    template: record.template,
    parameters: record.parameters,
    systemMessage: record.system_message,
    tags: record.tags,
    examples: record.examples,
    version: record.version,
  });
}

/**
 * Listing view of a template: parameter names instead of descriptions.
 */
export function toSummary(template: PromptTemplate): TemplateSummary {
  return {
    name: template.name,
    description: template.description,
    parameters: Object.keys(template.parameters),
    tags: [...template.tags],
    version: template.version,
  };
}
