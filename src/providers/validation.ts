/**
 * API Key Validators
 *
 * Validates API key presence and format without exposing key values.
 * These functions never log or return the key itself, except
 * getApiKey(), which hands it to a client constructor.
 */

import { z } from 'zod';
import { getEnv, hasApiKey, SETUP_INSTRUCTIONS, type ApiKeyService } from '../config/env.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { APIKeyError } from '../errors/index.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Result of validating a service's API key.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error: string, setupInstructions: string }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/**
 * OpenAI API key format: sk-... (legacy, sk-proj-..., sk-svcacct-...)
 *
 * Only enforced against api.openai.com; OpenAI-compatible proxies issue
 * keys in their own formats.
 */
export const OpenAIKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('sk-'), 'Invalid OpenAI API key format (should start with "sk-")');

export const PineconeKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => !/\s/.test(key), 'Invalid Pinecone API key format (contains whitespace)');

const ENV_VARS: Record<ApiKeyService, 'OPENAI_API_KEY' | 'PINECONE_API_KEY'> = {
  openai: 'OPENAI_API_KEY',
  pinecone: 'PINECONE_API_KEY',
};

/**
 * True when requests go to OpenAI itself rather than a compatible proxy
 */
export function isDefaultOpenAIEndpoint(baseUrl: string): boolean {
  return baseUrl.replace(/\/+$/, '') === DEFAULT_CONFIG.llm.base_url;
}

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

function validateKey(service: ApiKeyService, schema: z.ZodType<string>): ValidationResult {
  const envVar = ENV_VARS[service];
  const key = getEnv(envVar);
  if (!hasApiKey(service) || key === undefined) {
    return {
      valid: false,
      error: `${envVar} environment variable is not set`,
      setupInstructions: SETUP_INSTRUCTIONS[service],
    };
  }

  const result = schema.safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS[service],
    };
  }

  return { valid: true };
}

/**
 * Validate that the OpenAI API key exists and, for api.openai.com,
 * has the expected format.
 */
export function validateOpenAIKey(baseUrl: string = DEFAULT_CONFIG.llm.base_url): ValidationResult {
  const schema = isDefaultOpenAIEndpoint(baseUrl) ? OpenAIKeySchema : z.string().min(1);
  return validateKey('openai', schema);
}

export function validatePineconeKey(): ValidationResult {
  return validateKey('pinecone', PineconeKeySchema);
}

// ============================================================================
// SECURE KEY ACCESS
// ============================================================================

/**
 * Get the API key for a service after validation.
 * Use it only when passing to an API client, never for logging.
 *
 * @throws APIKeyError if the key is missing or malformed
 */
export function getApiKey(service: ApiKeyService, baseUrl?: string): string {
  const validation = service === 'openai' ? validateOpenAIKey(baseUrl) : validatePineconeKey();
  const envVar = ENV_VARS[service];
  const label = service === 'openai' ? 'OpenAI' : 'Pinecone';

  if (!validation.valid) {
    throw new APIKeyError(label, envVar, hasApiKey(service) ? validation.error : undefined);
  }

  const key = getEnv(envVar);
  if (key === undefined) {
    throw new APIKeyError(label, envVar);
  }
  return key;
}
