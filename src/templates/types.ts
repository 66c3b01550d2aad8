/**
 * Prompt Template Types
 *
 * A template is a parameterized prompt: a body with `$name` / `${name}`
 * placeholders, an optional system message and descriptive metadata.
 */

import { z } from 'zod';
import type { Message } from '../types.js';

/**
 * Example usage of a template. Documentation only, never executed.
 */
export interface TemplateExample {
  /** Example parameter values */
  parameters: Record<string, string>;
  /** What the model is expected to produce, as text or structured data */
  output?: unknown;
  [key: string]: unknown;
}

/**
 * A prompt template definition.
 */
export interface PromptTemplate {
  /** Unique, case-sensitive name within a store */
  readonly name: string;
  /** Description of what this template does */
  readonly description: string;
  /** The body with $parameter placeholders */
  readonly template: string;
  /** Parameter name to human-readable description */
  readonly parameters: Readonly<Record<string, string>>;
  /** Sent as a leading system message when present */
  readonly systemMessage?: string;
  /** Tags for filtering */
  readonly tags: readonly string[];
  readonly examples: readonly Readonly<TemplateExample>[];
  readonly version: string;
}

/**
 * Input accepted by `createTemplate`; everything but the name, description and body is optional.
 */
export interface TemplateInput {
  name: string;
  description: string;
  template: string;
  parameters?: Record<string, string>;
  systemMessage?: string | null;
  tags?: string[];
  examples?: TemplateExample[];
  version?: string;
}

/**
 * What `TemplateManager.list()` returns per template.
 */
export interface TemplateSummary {
  name: string;
  description: string;
  /** Parameter names only */
  parameters: string[];
  tags: string[];
  version: string;
}

/**
 * Values substituted into placeholders. Non-string values are stringified.
 */
export type TemplateValues = Record<string, string | number | boolean>;

/**
 * A chat message produced by rendering a template.
 */
export interface ChatMessage extends Message {
  role: 'system' | 'user';
}

// =============================================================================
// On-disk record
// =============================================================================

export const DEFAULT_TEMPLATE_VERSION = '1.0';

export const TemplateExampleSchema = z
  .object({
    parameters: z.record(z.string(), z.coerce.string()).default({}),
    output: z.unknown().optional(),
  })
  .passthrough();

/**
 * One JSON file per template. Field names follow the record format,
 * so the system message is stored as `system_message`.
 */
export const TemplateRecordSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  template: z.string(),
  parameters: z.record(z.string(), z.string()).default({}),
  system_message: z.string().nullable().default(null),
  tags: z.array(z.string()).default([]),
  examples: z.array(TemplateExampleSchema).default([]),
  version: z.string().default(DEFAULT_TEMPLATE_VERSION),
});

export type TemplateRecord = z.infer<typeof TemplateRecordSchema>;
