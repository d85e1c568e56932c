/**
 * Error handling module for the forum-ta CLI
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: fta config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  formatZodIssues,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
