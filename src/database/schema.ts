/**
 * Database Schema Types
 *
 * TypeScript interfaces matching the SQLite tables of the local index,
 * plus helpers for the embedding BLOB encoding.
 */

// ============================================================================
// Passages Table
// ============================================================================

/**
 * A forum passage with its embedding, as stored in SQLite.
 */
export interface PassageRow {
  /** Stable id: "{topic_id}-{post_number}-{chunk}" */
  id: string;
  text: string;
  title: string;
  url: string;
  /** Float32Array embedding (BLOB, little-endian) */
  embedding: Buffer;
  /** Number of floats in `embedding` */
  dimensions: number;
  /** ISO timestamp of the last upsert */
  indexed_at: string;
}

// ============================================================================
// Index Metadata Table
// ============================================================================

/**
 * Key/value facts about the index, e.g. the embedding model it was built with.
 */
export interface IndexMetaRow {
  key: string;
  value: string;
}

export const META_EMBEDDING_MODEL = 'embedding_model';
export const META_EMBEDDING_DIMENSIONS = 'embedding_dimensions';

// ============================================================================
// Embedding Encoding
// ============================================================================

/**
 * Convert an embedding to a Buffer for BLOB storage.
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob([0.1, 0.2, 0.3]);
 * db.prepare('UPDATE passages SET embedding = ? WHERE id = ?').run(blob, id);
 * ```
 */
export function embeddingToBlob(embedding: readonly number[] | Float32Array): Buffer {
  const floats = embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert a BLOB back to a Float32Array.
 * Copies the bytes, since SQLite buffers are not guaranteed to be 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const bytes = new Uint8Array(blob.byteLength);
  bytes.set(blob);
  return new Float32Array(bytes.buffer);
}
