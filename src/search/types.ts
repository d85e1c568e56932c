/**
 * Search Module Types
 *
 * The vector index abstraction shared by the Pinecone and SQLite backends,
 * and the zod schema that validates match metadata at the boundary.
 */

import { z } from 'zod';

// ============================================================================
// VECTOR INDEX
// ============================================================================

/**
 * A passage ready to be written to the index.
 */
export interface IndexedPassage {
  id: string;
  text: string;
  title: string;
  url: string;
  embedding: number[];
}

/**
 * A raw match as returned by a backend, before metadata validation.
 */
export interface VectorMatch {
  id: string;
  score: number;
  metadata: unknown;
}

/**
 * Minimal contract of a vector store: nearest-neighbour query and upsert.
 *
 * Ordering among equal scores is whatever the backend returns.
 */
export interface VectorIndex {
  /** Backend name for logs ("pinecone", "sqlite") */
  readonly backend: string;

  /** Top `topK` matches for `vector`, highest score first */
  query(vector: readonly number[], topK: number): Promise<VectorMatch[]>;

  /** Insert or replace passages by id; resolves to the number written */
  upsert(passages: readonly IndexedPassage[]): Promise<number>;

  /** Number of stored passages */
  count(): Promise<number>;
}

// ============================================================================
// METADATA
// ============================================================================

export const DEFAULT_TITLE = 'No Title';
export const DEFAULT_URL = '#';

/**
 * Metadata stored alongside each vector. Missing (or null) fields fall back
 * to the defaults; fields of the wrong type fail validation.
 */
export const PassageMetadataSchema = z
  .object({
    text: z.string().nullish(),
    title: z.string().nullish(),
    url: z.string().nullish(),
  })
  .nullish()
  .transform((metadata) => ({
    text: metadata?.text ?? '',
    title: metadata?.title ?? DEFAULT_TITLE,
    url: metadata?.url ?? DEFAULT_URL,
  }));

export type PassageMetadata = z.output<typeof PassageMetadataSchema>;
