/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime, so a file written
 * by an older or foreign schema fails loudly instead of yielding garbage
 * vectors.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM passages WHERE id = ?').get(id);
 * return row ? validateRow(PassageRowSchema, row, `passages.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

/**
 * Matches the `PassageRow` interface in schema.ts.
 */
export const PassageRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  title: z.string(),
  url: z.string(),
  embedding: z.instanceof(Buffer),
  dimensions: z.number().int().positive(),
  indexed_at: z.string(),
});

/** Rows read during similarity search (no timestamp needed) */
export const PassageSearchRowSchema = PassageRowSchema.omit({ indexed_at: true });

export const IndexMetaRowSchema = z.object({
  key: z.string(),
  value: z.string(),
});

export const CountRowSchema = z.object({
  count: z.number().int().nonnegative(),
});

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when a row does not match the expected schema.
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe index file may come from another version. Rebuild it with: fta index <dir>`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Validate a single database row.
 *
 * @param context - Description for error messages (e.g. "passages.id=42-1-0")
 * @throws SchemaValidationError if the row does not match
 */
export function validateRow<T extends z.ZodTypeAny>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows; the first bad row is reported with its index.
 */
export function validateRows<T extends z.ZodTypeAny>(schema: T, rows: unknown[], context: string): Array<z.output<T>> {
  return rows.map((row, index) => validateRow(schema, row, `${context}[${index}]`));
}
