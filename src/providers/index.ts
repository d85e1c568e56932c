/**
 * Providers Module
 *
 * Bridges the config system with the API clients the pipeline needs.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createOpenAIClient } from './providers';
 * const { client } = createOpenAIClient(config.llm);
 * ```
 */

export {
  validateOpenAIKey,
  validatePineconeKey,
  isDefaultOpenAIEndpoint,
  getApiKey,
  OpenAIKeySchema,
  PineconeKeySchema,
  type ValidationResult,
} from './validation.js';

export { createOpenAIClient, type OpenAIClientOptions, type OpenAIClientResult } from './openai.js';

export { createPineconeClient } from './pinecone.js';
