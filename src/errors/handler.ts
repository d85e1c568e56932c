/**
 * Error handler for CLI error formatting and display
 *
 * - Colored error output for the terminal
 * - JSON output for `--json`
 * - Stack traces with `--verbose`
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Normalize any thrown value into the fields we display.
 */
function describeError(error: unknown): ErrorOutput {
  if (error instanceof CLIError) {
    return { error: error.message, code: error.code, hint: error.hint, stack: error.stack };
  }
  if (error instanceof Error) {
    return { error: error.message, code: 1, stack: error.stack };
  }
  return { error: String(error), code: 1 };
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const described = describeError(error);

  if (json) {
    const output: ErrorOutput = {
      error: described.error,
      code: described.code,
      hint: described.hint,
      stack: verbose ? described.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + described.error];

  if (described.hint) {
    lines.push(chalk.dim('Hint: ') + described.hint);
  }

  if (verbose && described.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(described.stack));
  } else if (!described.hint && error instanceof Error && !(error instanceof CLIError)) {
    // Unexpected errors get a pointer to the stack trace
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print an error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for `uncaughtException` / `unhandledRejection`.
 *
 * Options are read through the getter when the error happens, so flags
 * parsed after registration still apply.
 */
export function createGlobalErrorHandler(
  getOptions: () => ErrorHandlerOptions
): (error: unknown) => never {
  return (error: unknown) => handleError(error, getOptions());
}
