/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments as strings; these schemas coerce and
 * range-check them before a command touches config or the network.
 */

import { z } from 'zod';
import { ValidationError, formatZodIssues } from '../errors/index.js';

// ============================================================================
// SHARED
// ============================================================================

/** Integer option given as a string, e.g. "--top-k 10" */
function integerOption(name: string, min: number, max: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${name} must be an integer`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= min && val <= max, {
      message: `${name} must be between ${min} and ${max}`,
    });
}

// ============================================================================
// ASK COMMAND SCHEMA
// ============================================================================

export const AskOptionsSchema = z.object({
  topK: integerOption('top-k', 1, 100).optional(),
  image: z.array(z.string().min(1)).optional(),
  contextOnly: z.boolean().optional(),
});

export const AskArgsSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question cannot be empty')
    .max(4000, 'Question too long (max 4000 chars)'),
});

// ============================================================================
// SERVE COMMAND SCHEMA
// ============================================================================

export const ServeOptionsSchema = z.object({
  host: z.string().trim().min(1, 'host cannot be empty').optional(),
  port: integerOption('port', 1, 65535).optional(),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(AskOptionsSchema, cmdOptions);
 * if (!result.success) {
 *   ctx.error(result.error);
 *   return;
 * }
 * const { topK } = result.data;
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, error: `Validation failed:\n  ${formatZodIssues(result.error).join('\n  ')}` };
}

/**
 * Parse input with a Zod schema, throwing a ValidationError (exit code 1)
 * that lists every issue.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, hint?: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod('Validation failed', result.error, hint);
  }
  return result.data;
}
