/**
 * Indexer Types
 *
 * Shapes of the scraped Discourse topic files, the passages built from
 * them, and the pipeline's progress/result types.
 */

import { z } from 'zod';

// ============================================================================
// DISCOURSE TOPIC FILES
// ============================================================================

/** Discourse post_type for "small action" posts ("closed this topic", ...) */
export const SMALL_ACTION_POST_TYPE = 3;

/**
 * One post from a topic's `post_stream`. Unknown fields are ignored.
 */
export const DiscoursePostSchema = z.object({
  id: z.number().int(),
  post_number: z.number().int().positive(),
  /** Rendered HTML */
  cooked: z.string().default(''),
  username: z.string().optional(),
  created_at: z.string().optional(),
  post_type: z.number().int().optional(),
  hidden: z.boolean().optional(),
});

/**
 * A full topic as served by `/t/{slug}/{id}.json` and saved as `topic_{id}.json`.
 */
export const DiscourseTopicSchema = z.object({
  id: z.number().int(),
  slug: z.string().min(1),
  title: z.string(),
  post_stream: z.object({
    posts: z.array(DiscoursePostSchema),
  }),
});

export type DiscoursePost = z.infer<typeof DiscoursePostSchema>;
export type DiscourseTopic = z.infer<typeof DiscourseTopicSchema>;

/**
 * A topic file that parsed and validated.
 */
export interface LoadedTopic {
  /** Absolute path of the source file */
  file: string;
  topic: DiscourseTopic;
}

// ============================================================================
// POSTS AND PASSAGES
// ============================================================================

/**
 * A post reduced to plain text with its permalink.
 */
export interface ForumPost {
  topicId: number;
  topicTitle: string;
  postNumber: number;
  author?: string;
  createdAt?: string;
  text: string;
  url: string;
}

/**
 * A token-bounded piece of a post, ready to embed.
 */
export interface ForumPassage {
  /** "{topic_id}-{post_number}-{chunk}" */
  id: string;
  text: string;
  /** Topic title */
  title: string;
  /** Post permalink */
  url: string;
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Stages in the indexing pipeline, in order.
 */
export type IndexingStage = 'loading' | 'chunking' | 'embedding' | 'storing';

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  stage: IndexingStage;
  processed: number;
  total: number;
  durationMs: number;
  details?: Record<string, unknown>;
}

/**
 * Final result of the indexing pipeline.
 */
export interface IndexPipelineResult {
  /** `topic_*.json` files found */
  filesFound: number;
  /** Files that parsed and validated */
  topicsLoaded: number;
  /** Posts with text after HTML stripping */
  postsFound: number;
  passagesCreated: number;
  passagesEmbedded: number;
  passagesStored: number;
  /** True when nothing was embedded or written */
  dryRun: boolean;
  totalDurationMs: number;
  stageDurations: Partial<Record<IndexingStage, number>>;
  warnings: string[];
  errors: string[];
}
