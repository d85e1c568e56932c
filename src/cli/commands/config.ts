/**
 * Config Command
 *
 * `fta config` reads and edits ~/.forum-ta/config.toml. Keys are the
 * `section.field` pairs of the config schema, so `get` and `set` refuse
 * anything the loader would not read. Values an environment variable
 * replaces at load time (OPENAI_BASE_URL, PORT) are flagged.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, unlinkSync } from 'node:fs';
import type { z } from 'zod';
import { ConfigSchema } from '../../config/schema.js';
import { activeEnvOverride, getConfigValue, listConfig, loadConfig, setConfigValue } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { ConfigError, getExitCode } from '../../errors/index.js';
import { errorMessage } from '../../utils/errors.js';
import type { CommandContext } from '../types.js';

export interface ConfigKey {
  /** Dotted key, e.g. `rag.top_k` */
  key: string;
  section: string;
  description?: string;
}

/**
 * Every settable key, in schema order.
 */
export function configKeys(): ConfigKey[] {
  const sections: Record<string, z.AnyZodObject> = ConfigSchema.shape;
  return Object.entries(sections).flatMap(([section, schema]) => {
    const fields: Record<string, z.ZodTypeAny> = schema.shape;
    return Object.entries(fields).map(([field, fieldSchema]) => ({
      key: `${section}.${field}`,
      section,
      description: fieldSchema.description,
    }));
  });
}

function requireKey(key: string): ConfigKey {
  const known = configKeys().find((entry) => entry.key === key);
  if (!known) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }
  return known;
}

export function formatValue(value: unknown): string {
  if (value === undefined) return '(unset)';
  if (value === '') return '""';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Run an action, turning thrown errors into a message and an exit code
 * (2 for ConfigError).
 */
function runAction(ctx: CommandContext, action: () => void): void {
  try {
    action();
  } catch (error) {
    ctx.error(errorMessage(error));
    process.exitCode = getExitCode(error);
  }
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Show or change settings in config.toml');

  configCmd
    .command('get <key>')
    .description('Print one value (e.g. fta config get llm.text_model)')
    .action((key: string) => {
      const ctx = getContext();
      runAction(ctx, () => {
        requireKey(key);
        const value = getConfigValue(key);
        const override = activeEnvOverride(key);

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value: value ?? null, ...(override ? { env: override } : {}) }));
          return;
        }
        ctx.log(formatValue(value));
        if (override) {
          ctx.warn(`${key} comes from ${override}, not config.toml`);
        }
      });
    });

  configCmd
    .command('set <key> <value>')
    .description('Validate and write one value (e.g. fta config set rag.top_k 10)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      runAction(ctx, () => {
        requireKey(key);
        const previous = getConfigValue(key);
        setConfigValue(key, value);
        const current = getConfigValue(key);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, previous: previous ?? null, value: current ?? null }));
          return;
        }
        ctx.log(`${chalk.green('✓')} ${chalk.cyan(key)}: ${formatValue(previous)} → ${chalk.yellow(formatValue(current))}`);

        const override = activeEnvOverride(key);
        if (override) {
          ctx.warn(`${override} is set and still overrides ${key}`);
        }
      });
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('Show every setting, grouped by section')
    .action(() => {
      const ctx = getContext();
      runAction(ctx, () => {
        const values = new Map(listConfig());
        const keys = configKeys();

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(keys.map(({ key }) => [key, values.get(key) ?? null])), null, 2));
          return;
        }

        let section = '';
        for (const { key, section: keySection, description } of keys) {
          if (keySection !== section) {
            if (section !== '') ctx.log('');
            ctx.log(chalk.bold(`[${keySection}]`));
            section = keySection;
          }
          const field = key.slice(keySection.length + 1);
          const override = activeEnvOverride(key);
          const note = override ? chalk.dim(`  (${override})`) : '';
          ctx.log(`  ${field} = ${chalk.yellow(formatValue(values.get(key)))}${note}`);
          if (ctx.options.verbose && description) {
            ctx.log(chalk.dim(`    # ${description}`));
          }
        }
        ctx.log('');
        ctx.log(chalk.dim(getConfigPath()));
      });
    });

  configCmd
    .command('path')
    .description('Print where config.toml lives')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();
      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Replace config.toml with the commented defaults')
    .option('-f, --force', 'Confirm the reset')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();
      runAction(ctx, () => {
        if (!options.force) {
          throw new ConfigError(`Refusing to overwrite ${getConfigPath()} without --force`);
        }
        const configPath = getConfigPath();
        if (existsSync(configPath)) {
          unlinkSync(configPath);
        }
        loadConfig(true);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, path: configPath }));
        } else {
          ctx.log(`${chalk.green('✓')} Wrote default settings to ${configPath}`);
        }
      });
    });

  return configCmd;
}
