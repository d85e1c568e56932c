/**
 * Index Pipeline
 *
 * Orchestrates the indexing workflow:
 * Load → Chunk → Embed → Store
 *
 * The pipeline does not display anything; it fires callbacks at the right
 * moments and the CLI's index reporter renders them.
 *
 * - Bad topic files and passages that fail to embed are collected, not thrown
 * - Without a `target` the run stops after chunking (dry run)
 */

import type { TokenCounter } from '../agent/tokenizer.js';
import type { VectorIndex } from '../search/types.js';
import { embedPassages, type Embedder } from './embedder/index.js';
import { chunkPosts } from './chunker/index.js';
import { loadTopicFiles, topicToPosts } from './topics.js';
import type { ForumPassage, ForumPost, IndexingStage, IndexPipelineResult, StageStats } from './types.js';

/** Passages written per upsert call */
export const STORE_BATCH_SIZE = 100;

/**
 * Where embedded passages go. Omitted for a dry run.
 */
export interface IndexTarget {
  embedder: Embedder;
  index: VectorIndex;
}

/**
 * Options for running the index pipeline.
 */
export interface IndexPipelineOptions {
  /** Directory holding `topic_{id}.json` files */
  dir: string;

  /** Forum root used to build post permalinks */
  forumBaseUrl: string;

  /** Upper bound per passage */
  chunkTokens: number;

  countTokens: TokenCounter;

  /** Embedder and index to write to; omit for a dry run */
  target?: IndexTarget;

  /** Texts per embeddings request (default: 32) */
  embeddingBatchSize?: number;

  /**
   * When aborted, the pipeline stops at the next checkpoint (between stages
   * or between batches) with IndexingCancelledError.
   */
  signal?: AbortSignal;

  // Progress callbacks
  onStageStart?: (stage: IndexingStage, total: number) => void;
  onProgress?: (stage: IndexingStage, processed: number, total: number, current?: string) => void;
  onStageComplete?: (stage: IndexingStage, stats: StageStats) => void;
  onWarning?: (message: string, context?: string) => void;
  onError?: (error: Error, context?: string) => void;
}

/**
 * Error thrown when indexing is cancelled via AbortSignal.
 */
export class IndexingCancelledError extends Error {
  constructor() {
    super('Indexing cancelled');
    this.name = 'IndexingCancelledError';
  }
}

function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new IndexingCancelledError();
  }
}

/**
 * Run the indexing pipeline.
 *
 * @example
 * ```typescript
 * const reporter = createIndexReporter({ json: false, verbose: true });
 *
 * const result = await runIndexPipeline({
 *   dir: './topics',
 *   forumBaseUrl: config.forum.base_url,
 *   chunkTokens: config.forum.chunk_tokens,
 *   countTokens: createTokenCounter(config.embedding.model),
 *   target: { embedder, index },
 *   ...reporter.callbacks,
 * });
 *
 * reporter.summary(result);
 * ```
 *
 * @throws if the directory cannot be read, the index rejects a write,
 *         or the run is cancelled
 */
export async function runIndexPipeline(options: IndexPipelineOptions): Promise<IndexPipelineResult> {
  const { target, signal, onStageStart, onProgress, onStageComplete, onWarning, onError } = options;

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<IndexingStage, number>> = {};
  const warnings: string[] = [];
  const errors: string[] = [];

  // =========================================================================
  // STAGE 1: LOADING
  // =========================================================================
  checkCancelled(signal);
  const loadStartTime = performance.now();
  onStageStart?.('loading', 0);

  const loaded = await loadTopicFiles(options.dir, (file, index, total) => {
    onProgress?.('loading', index, total, file);
  });

  for (const { file, message } of loaded.errors) {
    warnings.push(`${file}: ${message}`);
    onWarning?.(message, file);
  }

  const posts: ForumPost[] = loaded.topics.flatMap(({ topic }) => topicToPosts(topic, options.forumBaseUrl));

  stageDurations.loading = Math.round(performance.now() - loadStartTime);
  onStageComplete?.('loading', {
    stage: 'loading',
    processed: loaded.topics.length,
    total: loaded.files.length,
    durationMs: stageDurations.loading,
    details: { posts: posts.length, skippedFiles: loaded.errors.length },
  });

  // =========================================================================
  // STAGE 2: CHUNKING
  // =========================================================================
  checkCancelled(signal);
  const chunkStartTime = performance.now();
  onStageStart?.('chunking', posts.length);

  const passages: ForumPassage[] = [];
  for (const [i, post] of posts.entries()) {
    passages.push(...chunkPosts([post], { maxTokens: options.chunkTokens, countTokens: options.countTokens }));
    onProgress?.('chunking', i + 1, posts.length, post.url);
  }

  stageDurations.chunking = Math.round(performance.now() - chunkStartTime);
  onStageComplete?.('chunking', {
    stage: 'chunking',
    processed: passages.length,
    total: passages.length,
    durationMs: stageDurations.chunking,
    details: { posts: posts.length },
  });

  const counts = {
    filesFound: loaded.files.length,
    topicsLoaded: loaded.topics.length,
    postsFound: posts.length,
    passagesCreated: passages.length,
  };

  if (!target) {
    return {
      ...counts,
      passagesEmbedded: 0,
      passagesStored: 0,
      dryRun: true,
      totalDurationMs: Math.round(performance.now() - pipelineStartTime),
      stageDurations,
      warnings,
      errors,
    };
  }

  // =========================================================================
  // STAGE 3: EMBEDDING
  // =========================================================================
  checkCancelled(signal);
  const embedStartTime = performance.now();
  onStageStart?.('embedding', passages.length);

  const embedded = await embedPassages(passages, target.embedder, {
    batchSize: options.embeddingBatchSize,
    signal,
    onProgress: (processed, total) => onProgress?.('embedding', processed, total),
    onError: (error, passageId) => {
      errors.push(`Passage ${passageId}: ${error.message}`);
      onError?.(error, passageId);
    },
  });

  stageDurations.embedding = Math.round(performance.now() - embedStartTime);
  onStageComplete?.('embedding', {
    stage: 'embedding',
    processed: embedded.length,
    total: passages.length,
    durationMs: stageDurations.embedding,
    details: {
      model: target.embedder.model,
      successRate:
        passages.length > 0 ? ((embedded.length / passages.length) * 100).toFixed(1) + '%' : '100%',
    },
  });

  // =========================================================================
  // STAGE 4: STORING
  // =========================================================================
  checkCancelled(signal);
  const storeStartTime = performance.now();
  onStageStart?.('storing', embedded.length);

  let passagesStored = 0;
  for (let i = 0; i < embedded.length; i += STORE_BATCH_SIZE) {
    checkCancelled(signal);
    passagesStored += await target.index.upsert(embedded.slice(i, i + STORE_BATCH_SIZE));
    onProgress?.('storing', passagesStored, embedded.length);
  }

  stageDurations.storing = Math.round(performance.now() - storeStartTime);
  onStageComplete?.('storing', {
    stage: 'storing',
    processed: passagesStored,
    total: embedded.length,
    durationMs: stageDurations.storing,
    details: { backend: target.index.backend },
  });

  return {
    ...counts,
    passagesEmbedded: embedded.length,
    passagesStored,
    dryRun: false,
    totalDurationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
    warnings,
    errors,
  };
}
