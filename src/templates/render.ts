/**
 * Template rendering.
 *
 * Substitution is tolerant: a placeholder with no supplied value is left in the
 * output exactly as written, and supplied values with no placeholder are ignored.
 * Callers that care about completeness check `findMissingParameters` first.
 */

import type { ChatMessage, PromptTemplate, TemplateValues } from './types.js';

/**
 * `$$` escape, `$name`, or `${name}`. Identifiers are ASCII letters, digits and underscores
 * and never start with a digit; the unbraced form takes the longest such run.
 */
const PLACEHOLDER_REGEX = /\$(?:(\$)|([_a-zA-Z][_a-zA-Z0-9]*)|\{([_a-zA-Z][_a-zA-Z0-9]*)\})/g;

/**
 * Substitute parameter values into a template body.
 *
 * - `$name` / `${name}` with a supplied value → the value
 * - `$name` / `${name}` without one → left verbatim
 * - `$$` → `$`
 * - any other `$` → left as is
 */
export function formatTemplate(template: PromptTemplate, values: TemplateValues = {}): string {
  return substitute(template.template, values);
}

/**
 * Tolerant substitution on a raw string.
 */
export function substitute(body: string, values: TemplateValues = {}): string {
  return body.replace(
    PLACEHOLDER_REGEX,
    (match: string, escaped: string | undefined, named: string | undefined, braced: string | undefined) => {
      if (escaped !== undefined) {
        return '$';
      }

      const name = named ?? braced;
      if (name !== undefined && Object.hasOwn(values, name)) {
        return String(values[name]);
      }

      return match;
    }
  );
}

/**
 * Render a template as chat messages: the system message (if any), then the user prompt.
 */
export function toChatMessages(template: PromptTemplate, values: TemplateValues = {}): ChatMessage[] {
  const messages: ChatMessage[] = [];

  if (template.systemMessage) {
    messages.push({ role: 'system', content: template.systemMessage });
  }

  messages.push({ role: 'user', content: formatTemplate(template, values) });

  return messages;
}

/**
 * Declared parameters with no supplied value, in declaration order.
 */
export function findMissingParameters(template: PromptTemplate, values: TemplateValues): string[] {
  return Object.keys(template.parameters).filter((name) => !Object.hasOwn(values, name));
}

/**
 * Distinct placeholder names in a body, in order of first appearance. `$$` escapes are skipped.
 */
export function extractParameters(body: string): string[] {
  const names = new Set<string>();

  for (const match of body.matchAll(PLACEHOLDER_REGEX)) {
    const name = match[2] ?? match[3];
    if (name !== undefined) {
      names.add(name);
    }
  }

  return [...names];
}
