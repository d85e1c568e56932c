/**
 * Indexer Module
 *
 * Turns scraped Discourse topic files into embedded passages in the
 * vector index.
 *
 * ```typescript
 * import { runIndexPipeline } from './indexer/index.js';
 *
 * const result = await runIndexPipeline({ dir, forumBaseUrl, chunkTokens, countTokens, target });
 * ```
 */

export {
  runIndexPipeline,
  IndexingCancelledError,
  STORE_BATCH_SIZE,
  type IndexPipelineOptions,
  type IndexTarget,
} from './pipeline.js';

export {
  loadTopicFiles,
  parseTopic,
  topicToPosts,
  postUrl,
  htmlToText,
  TOPIC_FILE_PATTERN,
  type TopicLoadResult,
} from './topics.js';

export { splitText, chunkPosts, passageId, type ChunkOptions } from './chunker/index.js';

export {
  DiscoursePostSchema,
  DiscourseTopicSchema,
  SMALL_ACTION_POST_TYPE,
  type DiscoursePost,
  type DiscourseTopic,
  type LoadedTopic,
  type ForumPost,
  type ForumPassage,
  type IndexingStage,
  type StageStats,
  type IndexPipelineResult,
} from './types.js';

export * from './embedder/index.js';
