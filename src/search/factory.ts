/**
 * Vector index selection from config.
 */

import type { Pinecone } from '@pinecone-database/pinecone';
import type { Config } from '../config/schema.js';
import { resolveIndexPath } from '../config/loader.js';
import { createPineconeClient } from '../providers/pinecone.js';
import { PineconeVectorIndex } from './pinecone-store.js';
import { SqliteVectorIndex } from './sqlite-store.js';
import type { VectorIndex } from './types.js';

export interface CreateVectorIndexOptions {
  /** Pinecone client to reuse (default: one built from PINECONE_API_KEY) */
  pinecone?: Pinecone;
}

/**
 * Open the backend named by `[index] backend`.
 *
 * @throws APIKeyError for the Pinecone backend without PINECONE_API_KEY
 * @throws DatabaseError if the SQLite file cannot be opened
 */
export function createVectorIndex(config: Config, options: CreateVectorIndexOptions = {}): VectorIndex {
  switch (config.index.backend) {
    case 'pinecone':
      return PineconeVectorIndex.fromClient(
        options.pinecone ?? createPineconeClient(),
        config.index.pinecone_index,
        config.index.namespace
      );
    case 'sqlite':
      return SqliteVectorIndex.open(resolveIndexPath(config), { embeddingModel: config.embedding.model });
  }
}
