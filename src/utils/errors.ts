/**
 * Helpers for turning `unknown` catch values into something printable.
 */

/**
 * Get a human-readable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize any thrown value to an Error instance (for `cause` fields).
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
