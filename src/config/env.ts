/**
 * Environment Variable Handler
 *
 * Loads and provides access to API keys and deployment overrides.
 * Supports .env files for local development via dotenv.
 *
 * Keys are never logged or included in error messages; only presence
 * and format validity are reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema.
 * Keys are optional at load time; only the services a command actually
 * touches need their key (see startup-validation.ts).
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  PINECONE_API_KEY: z.string().optional(),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

export type ApiKeyService = 'openai' | 'pinecone';

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Tests reset it through _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

/** Treat `FOO=` in a .env file the same as an unset variable */
function readVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Malformed overrides (a non-URL OPENAI_BASE_URL, a non-numeric PORT)
 * are dropped rather than failing every command.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    OPENAI_API_KEY: readVar('OPENAI_API_KEY'),
    OPENAI_BASE_URL: readVar('OPENAI_BASE_URL'),
    PINECONE_API_KEY: readVar('PINECONE_API_KEY'),
    PORT: readVar('PORT'),
  };

  const result = EnvSchema.safeParse(raw);
  if (result.success) {
    _envCache = result.data;
    return _envCache;
  }

  const invalid = new Set(result.error.issues.map((issue) => issue.path[0]));
  _envCache = EnvSchema.parse({
    OPENAI_API_KEY: raw.OPENAI_API_KEY,
    PINECONE_API_KEY: raw.PINECONE_API_KEY,
    OPENAI_BASE_URL: invalid.has('OPENAI_BASE_URL') ? undefined : raw.OPENAI_BASE_URL,
    PORT: invalid.has('PORT') ? undefined : raw.PORT,
  });
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  const env = loadEnv();
  return env[key];
}

/**
 * Check if an API key is configured (non-empty),
 * without exposing the key value.
 */
export function hasApiKey(service: ApiKeyService): boolean {
  const env = loadEnv();
  switch (service) {
    case 'openai':
      return Boolean(env.OPENAI_API_KEY);
    case 'pinecone':
      return Boolean(env.PINECONE_API_KEY);
  }
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when a required API key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<ApiKeyService, string> = {
  openai: `
To answer questions and build the index, an OpenAI key is required:

1. Get your API key from https://platform.openai.com/api-keys
   (or from the operator of your OpenAI-compatible proxy)
2. Set the environment variable, or add it to a .env file:

   export OPENAI_API_KEY="sk-..."

3. For a proxy, also set its URL:

   export OPENAI_BASE_URL="https://proxy.example.org/v1"
`.trim(),

  pinecone: `
The Pinecone backend is selected ([index] backend = "pinecone"):

1. Get your API key from https://app.pinecone.io/
2. Set the environment variable, or add it to a .env file:

   export PINECONE_API_KEY="..."

3. Or switch to the local index:

   fta config set index.backend sqlite
`.trim(),
};
