/**
 * Configuration Schema
 *
 * Defines the shape of ~/.forum-ta/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 *
 * Secrets (API keys) never live here - see env.ts.
 */

import { z } from 'zod';
import { RAGConfigSchema } from '../agent/types.js';

/**
 * Chat completion settings
 * Works against api.openai.com or any OpenAI-compatible proxy via base_url
 */
export const LLMConfigSchema = z.object({
  base_url: z.string().url().describe('Base URL of the OpenAI-compatible API'),
  text_model: z.string().min(1).describe('Model used when the question has no images'),
  vision_model: z.string().min(1).describe('Model used when the question has images'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature (0-2)'),
  max_completion_tokens: z
    .number()
    .int()
    .min(1)
    .max(16384)
    .describe('Upper bound on tokens in the generated answer'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for one chat completion request (1000-600000)'),
  max_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .describe('Client-level retries for failed requests (embeddings and chat)'),
});

/**
 * Embedding settings
 * `dimensions` must match the dimensionality the vector index was built with
 */
export const EmbeddingConfigSchema = z.object({
  model: z.string().min(1).describe('Embedding model name'),
  dimensions: z.number().int().min(1).max(8192).describe('Vector length produced by the model'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(512)
    .describe('Number of texts to embed per request when indexing (1-512)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for one embedding request (1000-600000)'),
});

/**
 * Vector index settings
 */
export const IndexConfigSchema = z.object({
  backend: z
    .enum(['sqlite', 'pinecone'], {
      errorMap: () => ({ message: "backend must be 'sqlite' or 'pinecone'" }),
    })
    .describe('Where passages and their vectors are stored'),
  pinecone_index: z.string().min(1).describe('Pinecone index name'),
  namespace: z.string().describe('Pinecone namespace (empty for the default namespace)'),
  sqlite_path: z
    .string()
    .optional()
    .describe('SQLite file for the local backend (defaults to ~/.forum-ta/passages.db)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for one vector query (1000-600000)'),
});

/**
 * HTTP server settings
 */
export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  body_limit: z.string().min(1).describe('Largest accepted JSON body (express size string, e.g. "10mb")'),
});

/**
 * Forum settings used when indexing scraped topics
 */
export const ForumConfigSchema = z.object({
  base_url: z.string().url().describe('Forum root used to build post links'),
  chunk_tokens: z
    .number()
    .int()
    .min(50)
    .max(8000)
    .describe('Largest passage (in tokens) produced from a single post'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  index: IndexConfigSchema,
  rag: RAGConfigSchema,
  server: ServerConfigSchema,
  forum: ForumConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type IndexConfig = z.infer<typeof IndexConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ForumConfig = z.infer<typeof ForumConfigSchema>;

/**
 * Cross-field rules checked on the merged config.
 */
export const ValidatedConfigSchema = ConfigSchema.superRefine((config, ctx) => {
  if (config.rag.reserved_tokens >= config.rag.max_context_tokens) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['rag', 'reserved_tokens'],
      message: 'reserved_tokens must be smaller than max_context_tokens',
    });
  }
});

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
