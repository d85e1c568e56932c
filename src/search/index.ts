/**
 * Search Module
 *
 * Vector index backends and the retriever that ranks their matches.
 */

export type { VectorIndex, VectorMatch, IndexedPassage, PassageMetadata } from './types.js';
export { PassageMetadataSchema, DEFAULT_TITLE, DEFAULT_URL } from './types.js';
export { Retriever, type RetrieverOptions } from './retriever.js';
export { PineconeVectorIndex, PINECONE_UPSERT_BATCH, type PineconeIndexLike } from './pinecone-store.js';
export { SqliteVectorIndex, cosineSimilarity, type SqliteVectorIndexOptions } from './sqlite-store.js';
export { createVectorIndex, type CreateVectorIndexOptions } from './factory.js';
export { IndexDimensionMismatchError } from './errors.js';
export {
  formatScore,
  truncateSnippet,
  formatPassage,
  formatPassages,
  formatPassageJSON,
  type PassageFormatOptions,
} from './formatter.js';
