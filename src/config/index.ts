/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `fta config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ValidatedConfigSchema,
  LLMConfigSchema,
  EmbeddingConfigSchema,
  IndexConfigSchema,
  ServerConfigSchema,
  ForumConfigSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  LLMConfig,
  EmbeddingConfig,
  IndexConfig,
  ServerConfig,
  ForumConfig,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  parseValue,
  resolveIndexPath,
} from './loader.js';

// Paths
export { getHomeDir, getConfigPath, getDefaultIndexPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars, ApiKeyService } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_OPENAI,
  COMMANDS_REQUIRING_INDEX,
} from './startup-validation.js';
export type { StartupValidationResult, StartupValidationOptions } from './startup-validation.js';
