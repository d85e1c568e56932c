/**
 * Startup Configuration Validation
 *
 * Validates API keys and configuration at CLI startup, before a command
 * spends time loading topics or opening the index.
 *
 * This is a WARNING system, not a hard block: `config`, `check` and
 * `index --dry-run` work without any keys.
 */

import chalk from 'chalk';
import { loadConfig } from './loader.js';
import type { Config } from './schema.js';
import { validateOpenAIKey, validatePineconeKey } from '../providers/validation.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  /** Whether all required keys are valid */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Issues that will make the command fail */
  errors: string[];
  /** Setup instructions for each error */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip the OpenAI key check (commands that never embed or generate) */
  skipOpenAI?: boolean;
  /** Skip vector index checks (commands that never touch the index) */
  skipIndex?: boolean;
  /** Config to validate against; loaded from disk when omitted */
  config?: Config;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration at CLI startup.
 *
 * Checks:
 * 1. OPENAI_API_KEY (format checked only against api.openai.com)
 * 2. PINECONE_API_KEY when the Pinecone backend is selected
 *
 * Returns warnings/errors rather than throwing.
 */
export function validateStartupConfig(options: StartupValidationOptions = {}): StartupValidationResult {
  const { skipOpenAI = false, skipIndex = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  let config = options.config ?? null;
  if (config === null) {
    try {
      config = loadConfig(false);
    } catch (error) {
      // The command itself reports the ConfigError with its hint
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`Config could not be loaded: ${message}`);
    }
  }

  if (!skipOpenAI) {
    const validation = validateOpenAIKey(config?.llm.base_url);
    if (!validation.valid) {
      errors.push(`OpenAI API key issue: ${validation.error}`);
      hints.push(validation.setupInstructions);
    }
  }

  if (!skipIndex && config?.index.backend === 'pinecone') {
    const validation = validatePineconeKey();
    if (!validation.valid) {
      errors.push(`Pinecone API key issue: ${validation.error}`);
      hints.push(validation.setupInstructions);
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation warnings/errors to stderr.
 *
 * @param verbose - Whether to show warnings (errors are always shown)
 */
export function printStartupValidation(result: StartupValidationResult, verbose = false): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that call the OpenAI API.
 */
export const COMMANDS_REQUIRING_OPENAI = ['ask', 'serve', 'index'];

/**
 * Commands that query or write the vector index.
 */
export const COMMANDS_REQUIRING_INDEX = ['ask', 'serve', 'index'];

/**
 * Validation options for a command.
 *
 * @param command - Command name (e.g., 'ask', 'config')
 */
export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    skipOpenAI: !COMMANDS_REQUIRING_OPENAI.includes(command),
    skipIndex: !COMMANDS_REQUIRING_INDEX.includes(command),
  };
}
