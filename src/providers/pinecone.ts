/**
 * Pinecone Client Factory
 */

import { Pinecone } from '@pinecone-database/pinecone';
import { getApiKey } from './validation.js';

/**
 * Create a Pinecone client from PINECONE_API_KEY (or an explicit key).
 *
 * @throws APIKeyError if the key is missing or malformed
 */
export function createPineconeClient(apiKey: string = getApiKey('pinecone')): Pinecone {
  return new Pinecone({ apiKey });
}
