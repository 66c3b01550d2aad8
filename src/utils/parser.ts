import { malformedResponseError } from './errors.js';

/**
 * Parse a completion as a JSON object.
 *
 * The text must be a JSON object as a whole; surrounding prose or markdown
 * fences are not stripped. Throws a MALFORMED_RESPONSE error otherwise.
 */
export function parseJSONResponse(raw: string): Record<string, unknown> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw malformedResponseError(cause?.message ?? 'unparseable output', cause);
  }

  if (!isPlainObject(parsed)) {
    throw malformedResponseError(`expected a JSON object, got ${describeJSON(parsed)}`);
  }

  return parsed;
}

/**
 * Check whether a value is a non-array object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeJSON(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
