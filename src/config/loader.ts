/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.forum-ta)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Apply environment overrides (OPENAI_BASE_URL, PORT)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { ZodError } from 'zod';
import { PartialConfigSchema, ValidatedConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getDefaultIndexPath, getHomeDir } from './paths.js';
import { loadEnv, type EnvVars } from './env.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return isPlainObject(value);
}

/**
 * Ensure the config directory exists
 */
function ensureHomeDir(): void {
  const dir = getHomeDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested tables merge key by key; everything else is replaced.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(`Invalid TOML in config file: ${message}`, `Fix the syntax in ${configPath}`);
  }
}

/**
 * Merge a sparse user config over the defaults and validate the result.
 */
function resolveConfig(userConfig: PlainObject): Config {
  const partial = PartialConfigSchema.safeParse(userConfig);
  if (!partial.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(partial.error)}`);
  }

  const result = ValidatedConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Config keys an environment variable replaces at load time
 */
export const ENV_OVERRIDES = {
  'llm.base_url': 'OPENAI_BASE_URL',
  'server.port': 'PORT',
} as const satisfies Record<string, keyof EnvVars>;

/**
 * Name of the environment variable currently overriding `key`, if any.
 */
export function activeEnvOverride(key: string): keyof EnvVars | undefined {
  const name = Object.entries(ENV_OVERRIDES).find(([overridden]) => overridden === key)?.[1];
  return name !== undefined && loadEnv()[name] !== undefined ? name : undefined;
}

/**
 * Environment variables win over the file for deployment-specific values.
 */
function applyEnvOverrides(config: Config): Config {
  const env = loadEnv();
  return {
    ...config,
    llm: env.OPENAI_BASE_URL ? { ...config.llm, base_url: env.OPENAI_BASE_URL } : config.llm,
    server: env.PORT !== undefined ? { ...config.server, port: env.PORT } : config.server,
  };
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides + env overrides).
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureHomeDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return applyEnvOverrides(resolveConfig({}));
  }

  return applyEnvOverrides(resolveConfig(readConfigFile(configPath)));
}

/**
 * Path of the local SQLite index for this config.
 */
export function resolveIndexPath(config: Config): string {
  return config.index.sqlite_path ?? getDefaultIndexPath();
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('rag.top_k') => 7
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path.
 * The merged result is validated before the file is written.
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  const configPath = getConfigPath();
  ensureHomeDir();
  const config = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const table: TOML.JsonMap = {};
      current[part] = table;
      current = table;
    }
  }
  current[lastPart] = parseValue(value);

  const partial = PartialConfigSchema.strict().safeParse(config);
  const merged = partial.success
    ? ValidatedConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data))
    : partial;
  if (!merged.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(merged.error)}`,
      'Run: fta config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Parse a command-line string into a boolean, number or string
 */
export function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['llm.text_model', 'gpt-3.5-turbo']
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
