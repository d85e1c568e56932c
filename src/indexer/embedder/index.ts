/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * import { OpenAIEmbedder, embedPassages } from './embedder';
 *
 * const embedder = new OpenAIEmbedder(client.embeddings, config.embedding);
 * const vector = await embedder.embed('When is the week 3 deadline?');
 *
 * const embedded = await embedPassages(passages, embedder, { batchSize: 64 });
 * ```
 */

export { OpenAIEmbedder, getModelDimensions, supportsDimensionsParam } from './provider.js';

export { embedPassages } from './embedder.js';

export type { Embedder, EmbeddingsAPI, EmbeddableItem, Embedded, EmbedderOptions } from './types.js';
