/**
 * RAG Engine
 *
 * Answers a forum question end to end:
 *
 * ```
 * Query
 *   │
 *   ▼
 * embed ──► retrieve ──► pack ──► generate ──► AnswerResult
 *   │          │                     │
 *   ▼          ▼                     ▼
 * internal   policy:              generation
 * error      apologize → internal  error
 * answer     continue  → 0 passages answer
 * ```
 *
 * Each stage is turned into a StageResult and matched explicitly, so the
 * failure policy lives in one place. `answer()` never throws: every path
 * ends in a non-empty answer and a (possibly empty) source list.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const engine = createRAGEngine(config);
 *
 * const { answer, sources } = await engine.answer({ question: 'When is the week 3 deadline?' });
 * ```
 */

import type OpenAI from 'openai';

import type { Config } from '../config/schema.js';
import { createOpenAIClient } from '../providers/openai.js';
import { OpenAIEmbedder, type Embedder } from '../indexer/embedder/index.js';
import { Retriever } from '../search/retriever.js';
import { createVectorIndex } from '../search/factory.js';
import type { VectorIndex } from '../search/types.js';
import { errorMessage, toError, silentLogger, type Logger } from '../utils/index.js';
import { AnswerGenerator } from './generator.js';
import { ContextPacker } from './packer.js';
import { SYSTEM_PROMPT } from './prompts.js';
import { createTokenCounter, type TokenCounter } from './tokenizer.js';
import {
  EmbeddingError,
  GenerationError,
  INTERNAL_ERROR_ANSWER,
  GENERATION_ERROR_ANSWER,
  OrchestrationError,
  RetrievalError,
  stageFailed,
  stageOk,
  type AnswerResult,
  type AnswerTrace,
  type PackedContext,
  type PassageRecord,
  type PipelineError,
  type PipelineStage,
  type Query,
  type RAGConfig,
  type StageResult,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RAGEngineDeps {
  embedder: Pick<Embedder, 'embed'>;
  retriever: Pick<Retriever, 'retrieve'>;
  generator: Pick<AnswerGenerator, 'generate' | 'selectModel'>;
  config: RAGConfig;
  /** Token counter for the chat model in use (default: tiktoken encoding for the model) */
  tokenCounterFor?: (model: string) => TokenCounter;
  /** Instructions counted by the packer; must match the generator's */
  systemPrompt?: string;
  logger?: Logger;
}

/**
 * Per-call overrides.
 */
export interface AnswerOptions {
  /** Passages to request (default: rag.top_k) */
  topK?: number;
}

/**
 * Retrieved and packed context for a question, without generation.
 */
export interface PreparedContext {
  passages: PassageRecord[];
  packed: PackedContext;
  /** Chat model the context was packed for */
  model: string;
}

export interface TracedAnswer {
  result: AnswerResult;
  trace: AnswerTrace;
}

// ============================================================================
// STAGE HELPERS
// ============================================================================

/**
 * Run one stage, turning a thrown error into the stage's error kind.
 */
async function settle<T, E extends PipelineError>(
  operation: () => Promise<T>,
  toStageError: (error: Error) => E
): Promise<StageResult<T, E>> {
  try {
    return stageOk(await operation());
  } catch (error) {
    return stageFailed(toStageError(toError(error)));
  }
}

function elapsed(since: number): number {
  return Math.round(performance.now() - since);
}

// ============================================================================
// ENGINE
// ============================================================================

export class ForumRAGEngine {
  private readonly embedder: Pick<Embedder, 'embed'>;
  private readonly retriever: Pick<Retriever, 'retrieve'>;
  private readonly generator: Pick<AnswerGenerator, 'generate' | 'selectModel'>;
  private readonly config: RAGConfig;
  private readonly tokenCounterFor: (model: string) => TokenCounter;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(deps: RAGEngineDeps) {
    this.embedder = deps.embedder;
    this.retriever = deps.retriever;
    this.generator = deps.generator;
    this.config = deps.config;
    this.tokenCounterFor = deps.tokenCounterFor ?? createTokenCounter;
    this.systemPrompt = deps.systemPrompt ?? SYSTEM_PROMPT;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Answer a question. Never throws.
   */
  async answer(query: Query, options: AnswerOptions = {}): Promise<AnswerResult> {
    const { result } = await this.answerWithTrace(query, options);
    return result;
  }

  /**
   * Answer a question and report how the answer was produced. Never throws.
   */
  async answerWithTrace(query: Query, options: AnswerOptions = {}): Promise<TracedAnswer> {
    const started = performance.now();
    const trace: AnswerTrace = {
      outcome: 'done',
      model: '',
      retrievedCount: 0,
      admittedCount: 0,
      droppedCount: 0,
      estimatedTokens: 0,
      degraded: false,
      timings: { embedMs: 0, retrievalMs: 0, packMs: 0, generationMs: 0, totalMs: 0 },
    };

    try {
      return await this.run(query, options, trace, started);
    } catch (error) {
      const failure = new OrchestrationError(`Unexpected pipeline failure: ${errorMessage(error)}`, toError(error));
      return this.fallback(trace, started, 'orchestrate', failure, INTERNAL_ERROR_ANSWER);
    }
  }

  /**
   * Embed, retrieve and pack without calling the chat model.
   *
   * @throws EmbeddingError or RetrievalError when those stages fail
   */
  async prepareContext(query: Query, options: AnswerOptions = {}): Promise<PreparedContext> {
    const model = this.generator.selectModel(query.images);
    const vector = await this.embedder.embed(query.question);
    const passages = await this.retriever.retrieve(vector, options.topK ?? this.config.top_k);
    return { passages, packed: this.pack(model, query.question, passages), model };
  }

  private async run(query: Query, options: AnswerOptions, trace: AnswerTrace, started: number): Promise<TracedAnswer> {
    const { question, images } = query;
    const { timings } = trace;
    trace.model = this.generator.selectModel(images);

    // Embed
    let stageStart = performance.now();
    const embedded = await settle(
      () => this.embedder.embed(question),
      (error) => (error instanceof EmbeddingError ? error : new EmbeddingError(error.message, error))
    );
    timings.embedMs = elapsed(stageStart);
    if (!embedded.ok) {
      return this.fallback(trace, started, 'embed', embedded.error, INTERNAL_ERROR_ANSWER);
    }

    // Retrieve
    stageStart = performance.now();
    const retrieved = await settle(
      () => this.retriever.retrieve(embedded.value, options.topK ?? this.config.top_k),
      (error) => (error instanceof RetrievalError ? error : new RetrievalError(error.message, error))
    );
    timings.retrievalMs = elapsed(stageStart);

    let passages: PassageRecord[];
    if (retrieved.ok) {
      passages = retrieved.value;
    } else if (this.config.on_retrieval_error === 'continue') {
      this.logger.warn(`Retrieval failed, answering without forum context: ${retrieved.error.message}`);
      trace.degraded = true;
      trace.error = retrieved.error.message;
      passages = [];
    } else {
      return this.fallback(trace, started, 'retrieve', retrieved.error, INTERNAL_ERROR_ANSWER);
    }
    trace.retrievedCount = passages.length;

    // Pack
    stageStart = performance.now();
    const packed = this.pack(trace.model, question, passages);
    timings.packMs = elapsed(stageStart);
    trace.admittedCount = packed.citedSources.length;
    trace.droppedCount = packed.droppedCount;
    trace.estimatedTokens = packed.estimatedTokens;
    this.logger.debug?.(
      `Packed ${packed.citedSources.length}/${passages.length} passages (${packed.estimatedTokens} tokens, budget ${this.config.max_context_tokens})`
    );

    // Generate
    stageStart = performance.now();
    const generated = await settle(
      () => this.generator.generate(question, packed, images),
      (error) => (error instanceof GenerationError ? error : new GenerationError(error.message, error))
    );
    timings.generationMs = elapsed(stageStart);
    if (!generated.ok) {
      return this.fallback(trace, started, 'generate', generated.error, GENERATION_ERROR_ANSWER);
    }

    timings.totalMs = elapsed(started);
    return { result: { answer: generated.value, sources: packed.citedSources }, trace };
  }

  private pack(model: string, question: string, passages: readonly PassageRecord[]): PackedContext {
    const packer = new ContextPacker({ countTokens: this.tokenCounterFor(model), systemPrompt: this.systemPrompt });
    return packer.pack(question, passages, this.config.max_context_tokens, this.config.reserved_tokens);
  }

  private fallback(
    trace: AnswerTrace,
    started: number,
    stage: PipelineStage,
    error: PipelineError,
    answer: string
  ): TracedAnswer {
    this.logger.warn(`${error.name} in ${stage} stage: ${error.message}`);
    trace.outcome = stage;
    trace.error = error.message;
    trace.timings.totalMs = elapsed(started);
    return { result: { answer, sources: [] }, trace };
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

export interface CreateRAGEngineOptions {
  /** OpenAI client to reuse (default: one built from config.llm and OPENAI_API_KEY) */
  openai?: OpenAI;
  /** Vector index to query (default: the backend named in config.index) */
  index?: VectorIndex;
  logger?: Logger;
}

/**
 * Wire the pipeline from configuration:
 * 1. OpenAI client (embeddings + chat completions)
 * 2. Vector index (Pinecone or SQLite) behind a Retriever
 * 3. Answer generator with the config's models
 *
 * @throws APIKeyError when a required key is missing
 * @throws DatabaseError if the SQLite index cannot be opened
 */
export function createRAGEngine(config: Config, options: CreateRAGEngineOptions = {}): ForumRAGEngine {
  const logger = options.logger ?? silentLogger;
  const openai = options.openai ?? createOpenAIClient(config.llm).client;
  const index = options.index ?? createVectorIndex(config);

  return new ForumRAGEngine({
    embedder: new OpenAIEmbedder(openai.embeddings, config.embedding),
    retriever: new Retriever(index, {
      dimensions: config.embedding.dimensions,
      timeoutMs: config.index.timeout_ms,
      logger,
    }),
    generator: new AnswerGenerator(openai.chat.completions, config.llm, { systemPrompt: SYSTEM_PROMPT, logger }),
    config: config.rag,
    systemPrompt: SYSTEM_PROMPT,
    logger,
  });
}
