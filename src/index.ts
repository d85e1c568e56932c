/**
 * forum-ta - Library Entry Point
 *
 * The CLI (`fta`) covers indexing, asking and serving. This module exports
 * the same building blocks for embedding the answer pipeline or the HTTP
 * API in another program.
 *
 * @example Answer a question
 * ```typescript
 * import { createRAGEngine, loadConfig } from 'forum-ta';
 *
 * const engine = createRAGEngine(loadConfig());
 * const { answer, sources } = await engine.answer({ question: 'Is GA2 graded?' });
 * ```
 *
 * @example Mount the API with a custom engine
 * ```typescript
 * import { consoleLogger, createApp, startServer } from 'forum-ta';
 *
 * const app = createApp({ engine, logger: consoleLogger });
 * await startServer(app, '127.0.0.1', 8000);
 * ```
 *
 * @packageDocumentation
 */

// Answer pipeline
export * from './agent/index.js';

// HTTP API
export * from './server/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Vector index backends and retrieval
export {
  Retriever,
  PineconeVectorIndex,
  SqliteVectorIndex,
  createVectorIndex,
  IndexDimensionMismatchError,
  type VectorIndex,
  type VectorMatch,
  type IndexedPassage,
  type RetrieverOptions,
} from './search/index.js';

// Indexing scraped topics
export {
  runIndexPipeline,
  IndexingCancelledError,
  loadTopicFiles,
  topicToPosts,
  htmlToText,
  chunkPosts,
  OpenAIEmbedder,
  type IndexPipelineOptions,
  type IndexPipelineResult,
  type IndexTarget,
  type Embedder,
  type ForumPost,
  type ForumPassage,
} from './indexer/index.js';

// API clients
export { createOpenAIClient, createPineconeClient } from './providers/index.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';

// CLI types
export type { GlobalOptions, CommandContext } from './cli/types.js';
