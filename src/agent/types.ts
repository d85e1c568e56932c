/**
 * RAG Pipeline Types
 *
 * Type definitions for the answer pipeline: the [rag] config section,
 * passages, packed context, answers, per-stage results and the pipeline
 * error taxonomy.
 */

import { z } from 'zod';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

/**
 * What the orchestrator does when the vector index cannot be queried.
 *
 * - 'apologize': return the internal-error answer (no generation call)
 * - 'continue': answer from the model's own knowledge with zero passages
 */
export const RetrievalErrorPolicySchema = z.enum(['apologize', 'continue']);
export type RetrievalErrorPolicy = z.infer<typeof RetrievalErrorPolicySchema>;

/**
 * RAG configuration schema for config.toml [rag] section.
 *
 * @example config.toml
 * ```toml
 * [rag]
 * top_k = 7
 * max_context_tokens = 4096
 * reserved_tokens = 500
 * ```
 */
export const RAGConfigSchema = z.object({
  /** Passages requested from the vector index per question */
  top_k: z.number().int().min(1).max(100).default(7),

  /**
   * Token budget for the whole prompt: system instructions, question and
   * packed passages. Passages are admitted while the total stays strictly
   * below this value.
   */
  max_context_tokens: z.number().int().min(256).max(1_000_000).default(4096),

  /** Tokens held back from the budget for the answer and message framing */
  reserved_tokens: z.number().int().min(0).default(500),

  on_retrieval_error: RetrievalErrorPolicySchema.default('apologize'),
});

export type RAGConfig = z.infer<typeof RAGConfigSchema>;

// ============================================================================
// DATA MODEL
// ============================================================================

/**
 * A retrieved forum passage, ordered by score descending.
 */
export interface PassageRecord {
  id: string;
  /** Similarity score reported by the vector index (higher = closer) */
  score: number;
  text: string;
  title: string;
  url: string;
}

/** Title/URL pair shown to the user for each passage used in the answer */
export interface Citation {
  title: string;
  url: string;
}

/**
 * Output of the context packer.
 *
 * `citedSources` is 1:1 with the blocks in `contextText`, in the same order.
 */
export interface PackedContext {
  contextText: string;
  citedSources: Citation[];
  /** Base tokens plus every admitted block */
  estimatedTokens: number;
  /** Passages rejected once the budget was reached */
  droppedCount: number;
}

/**
 * A question, optionally with images (base64, with or without a data: URL prefix).
 */
export interface Query {
  question: string;
  images?: string[];
}

/**
 * Pipeline output. `answer` is never empty (failures yield an apology)
 * and `sources` is always an array.
 */
export interface AnswerResult {
  answer: string;
  sources: Citation[];
}

/** `/ask` presentation of an AnswerResult */
export interface LinkResult {
  answer: string;
  links: Array<{ url: string; text: string }>;
}

export const INTERNAL_ERROR_ANSWER = "I'm sorry, an internal error occurred in the RAG system.";

export const GENERATION_ERROR_ANSWER =
  "I'm sorry, I encountered an error while trying to generate a response.";

// ============================================================================
// STAGE RESULTS
// ============================================================================

export type PipelineStage = 'embed' | 'retrieve' | 'pack' | 'generate' | 'orchestrate';

/**
 * Outcome of one pipeline stage. The orchestrator matches on `ok`
 * instead of catching exceptions across stages.
 */
export type StageResult<T, E extends PipelineError = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function stageOk<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function stageFailed<E extends PipelineError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Timing breakdown for one answer.
 */
export interface AnswerTimings {
  embedMs: number;
  retrievalMs: number;
  packMs: number;
  generationMs: number;
  totalMs: number;
}

/**
 * Diagnostics for one answer. Shown by the CLI in verbose mode, never
 * returned over HTTP.
 */
export interface AnswerTrace {
  /** Stage that failed, or 'done' */
  outcome: PipelineStage | 'done';
  /** Chat model selected for this question */
  model: string;
  retrievedCount: number;
  admittedCount: number;
  droppedCount: number;
  estimatedTokens: number;
  /** True when retrieval failed and the 'continue' policy applied */
  degraded: boolean;
  /** Message of the error behind a fallback answer */
  error?: string;
  timings: AnswerTimings;
}

// ============================================================================
// ERROR TYPES
// ============================================================================

/**
 * Base class for failures inside the answer pipeline.
 *
 * These never reach users directly: the orchestrator turns them into
 * one of the fallback answers.
 */
export class PipelineError extends Error {
  public readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'PipelineError';
    this.stage = stage;
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Empty input, transport, auth, timeout or dimension failures while embedding */
export class EmbeddingError extends PipelineError {
  constructor(message: string, cause?: Error) {
    super('embed', message, cause);
    this.name = 'EmbeddingError';
  }
}

/** Vector index failures, timeouts and malformed matches */
export class RetrievalError extends PipelineError {
  constructor(message: string, cause?: Error) {
    super('retrieve', message, cause);
    this.name = 'RetrievalError';
  }
}

/** Chat completion failures, timeouts and empty completions */
export class GenerationError extends PipelineError {
  constructor(message: string, cause?: Error) {
    super('generate', message, cause);
    this.name = 'GenerationError';
  }
}

/** Anything the orchestrator did not expect */
export class OrchestrationError extends PipelineError {
  constructor(message: string, cause?: Error) {
    super('orchestrate', message, cause);
    this.name = 'OrchestrationError';
  }
}
