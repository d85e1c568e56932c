/**
 * forum-ta CLI Entry Point
 *
 * This is the main entry point for the `fta` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createServeCommand } from './commands/serve.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createCheckCommand } from './commands/check.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

// Version injected at build time via tsup define
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('fta')
  .description('Forum teaching assistant - answers questions from indexed forum posts')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('fta index ./topics')}                    Index scraped topic_*.json files
  ${chalk.cyan('fta ask "When is GA3 due?"')}             Answer a question with sources
  ${chalk.cyan('fta ask "What is this?" -i shot.png')}    Ask about a screenshot
  ${chalk.cyan('fta serve --port 8000')}                 Start the HTTP API
  ${chalk.cyan('fta check')}                             Check keys and index
  ${chalk.cyan('fta config set rag.top_k 10')}           Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createServeCommand(getContext));
program.addCommand(createIndexCommand(getContext));
program.addCommand(createConfigCommand(getContext));
program.addCommand(createCheckCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: fta --help  to see available commands');
});

// Validate API keys before commands that call OpenAI or the index
program.hook('preAction', (_thisCommand, actionCommand) => {
  const commandName = actionCommand.name();
  const opts = getGlobalOptions();

  // A dry run never embeds, so it needs no keys
  const dryRun = actionCommand.opts<{ dryRun?: boolean }>().dryRun === true;
  const validationOptions = dryRun ? { skipOpenAI: true, skipIndex: true } : getValidationOptionsForCommand(commandName);

  if (validationOptions.skipOpenAI && validationOptions.skipIndex) {
    return;
  }

  const result = validateStartupConfig(validationOptions);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError('Configuration validation failed', 'Fix the issues above and try again', 4);
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  const globalHandler = createGlobalErrorHandler(getErrorOptions);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
