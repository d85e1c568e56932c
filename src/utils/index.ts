/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Logging interface for library code
export {
  type Logger,
  consoleLogger,
  silentLogger,
} from './logger.js';

// Safe JSON parsing
export { safeJsonParse } from './json.js';

// Bounded waits for network calls
export { withTimeout } from './timeout.js';

// Error message extraction
export { errorMessage, toError } from './errors.js';
