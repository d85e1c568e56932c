/**
 * OpenAI Client Factory
 *
 * Creates the single OpenAI client shared by the embedder and the answer
 * generator. Works against api.openai.com or any OpenAI-compatible proxy.
 *
 * The API key is retrieved only after validation passes and is never
 * logged or included in error messages.
 */

import OpenAI from 'openai';
import type { LLMConfig } from '../config/schema.js';
import { getApiKey } from './validation.js';

// ============================================================================
// TYPES
// ============================================================================

export interface OpenAIClientOptions {
  /**
   * Explicit API key to use.
   * If provided, skips environment variable lookup (OPENAI_API_KEY).
   */
  apiKey?: string;
}

export interface OpenAIClientResult {
  client: OpenAI;
  /** Endpoint the client talks to, for diagnostics */
  baseURL: string;
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a configured OpenAI client.
 *
 * Request retries are delegated to the client (`llm.max_retries`); per-call
 * deadlines are enforced by the pipeline stages.
 *
 * @throws APIKeyError if the key is missing or malformed
 *
 * @example
 * ```typescript
 * const { client } = createOpenAIClient(config.llm);
 * const embedder = new OpenAIEmbedder(client.embeddings, config.embedding);
 * ```
 */
export function createOpenAIClient(llm: LLMConfig, options: OpenAIClientOptions = {}): OpenAIClientResult {
  const apiKey = options.apiKey ?? getApiKey('openai', llm.base_url);

  const client = new OpenAI({
    apiKey,
    baseURL: llm.base_url,
    timeout: llm.timeout_ms,
    maxRetries: llm.max_retries,
  });

  return { client, baseURL: llm.base_url };
}
