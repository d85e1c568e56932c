/**
 * Agent Module
 *
 * The answer pipeline: embed the question, retrieve forum passages, pack
 * them into a token budget and generate an answer with citations.
 *
 * @example
 * ```typescript
 * import { createRAGEngine } from './agent';
 * import { loadConfig } from './config';
 *
 * const config = loadConfig();
 * const engine = createRAGEngine(config);
 *
 * const { answer, sources } = await engine.answer({ question: 'Is GA2 graded?' });
 * ```
 *
 * @packageDocumentation
 */

export {
  createRAGEngine,
  ForumRAGEngine,
  type RAGEngineDeps,
  type AnswerOptions,
  type PreparedContext,
  type TracedAnswer,
  type CreateRAGEngineOptions,
} from './rag-engine.js';

export { ContextPacker, formatPassageBlock, BLOCK_SEPARATOR, type ContextPackerOptions } from './packer.js';

export {
  AnswerGenerator,
  stripDataUrlPrefix,
  normalizeImages,
  type ChatCompletionsAPI,
  type GeneratorSettings,
  type AnswerGeneratorOptions,
} from './generator.js';

export { SYSTEM_PROMPT, buildSystemMessage } from './prompts.js';

export { countTokens, createTokenCounter, encodingForModel, type TokenCounter } from './tokenizer.js';

export {
  toLinks,
  citationLabel,
  formatCitation,
  formatCitations,
  formatCitationsJSON,
  type CitationJSON,
  type CitationsOutputJSON,
} from './citations.js';

export {
  RAGConfigSchema,
  RetrievalErrorPolicySchema,
  INTERNAL_ERROR_ANSWER,
  GENERATION_ERROR_ANSWER,
  PipelineError,
  EmbeddingError,
  RetrievalError,
  GenerationError,
  OrchestrationError,
  stageOk,
  stageFailed,
  type RAGConfig,
  type RetrievalErrorPolicy,
  type PassageRecord,
  type Citation,
  type PackedContext,
  type Query,
  type AnswerResult,
  type LinkResult,
  type PipelineStage,
  type StageResult,
  type AnswerTimings,
  type AnswerTrace,
} from './types.js';
