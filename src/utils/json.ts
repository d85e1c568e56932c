/**
 * JSON Utilities
 *
 * Parse-and-validate for JSON coming from outside the process (scraped
 * files, request bodies, vector index metadata).
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it against a schema.
 *
 * Returns `null` (and reports through `onError`) when the text is not JSON
 * or does not match the schema. Callers decide whether that is fatal.
 *
 * @example
 * ```typescript
 * const topic = safeJsonParse(raw, DiscourseTopicSchema, (err) => {
 *   logger.warn(`Skipping ${file}: ${err.message}`);
 * });
 * if (!topic) continue;
 * ```
 */
export function safeJsonParse<S extends z.ZodTypeAny>(
  json: string | null | undefined,
  schema: S,
  onError?: (error: Error, rawValue: string) => void
): z.output<S> | null {
  if (json === null || json === undefined) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return null;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    onError?.(new Error(`Unexpected JSON shape: ${issues}`), json);
    return null;
  }

  return result.data;
}
