/**
 * Error type definitions for the forum-ta CLI
 *
 * Every error a command can raise on purpose carries:
 * - a recovery hint shown under the message
 * - an exit code so scripts can tell failures apart
 *
 * Errors inside the answer pipeline are a separate family
 * (see agent/types.ts); they never reach the user as exit codes because the
 * pipeline turns them into an apology answer.
 */

import type { ZodError } from 'zod';

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    // Keeps `instanceof` working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory given on the command line doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (bad TOML, unknown keys,
 * out-of-range values).
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: fta config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key needed by the selected services is missing or
 * malformed. The hint names the exact environment variable.
 *
 * Exit code 4
 */
export class APIKeyError extends CLIError {
  /** The environment variable the user has to set */
  public readonly envVar: string;

  constructor(service: string, envVar: string, detail?: string) {
    super(
      detail ? `${service} API key is invalid: ${detail}` : `${service} API key not configured`,
      `Set ${envVar} in your environment or in a .env file`,
      4
    );
    this.name = 'APIKeyError';
    this.envVar = envVar;
  }
}

/**
 * Thrown when the local SQLite passage index can't be opened or written.
 *
 * Exit code 5
 */
export class DatabaseError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, 'Check the [index] sqlite_path setting and file permissions', 5, cause);
    this.name = 'DatabaseError';
  }
}

/**
 * One line per zod issue: "path: message", or the bare message at the root.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Thrown when user input fails validation. The issues are listed under
 * the message.
 *
 * Exit code 1
 */
export class ValidationError extends CLIError {
  /** Individual validation issues, one per offending field */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], hint = 'Check your input and try again') {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError, hint?: string): ValidationError {
    return new ValidationError(message, formatZodIssues(error), hint);
  }
}
