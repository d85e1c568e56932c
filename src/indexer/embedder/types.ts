/**
 * Embedder Types
 *
 * Type definitions for turning text into vectors.
 */

/**
 * The slice of `client.embeddings` the embedder needs.
 * The real OpenAI client satisfies it; tests pass a vi.fn() fake.
 */
export interface EmbeddingsAPI {
  create(
    body: { model: string; input: string | string[]; dimensions?: number },
    options?: { timeout?: number; signal?: AbortSignal }
  ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
}

/**
 * Text → fixed-length vector.
 */
export interface Embedder {
  /** Model name, recorded in the index */
  readonly model: string;
  /** Length of every vector this embedder returns */
  readonly dimensions: number;

  /** @throws EmbeddingError */
  embed(text: string): Promise<number[]>;

  /** One vector per text, in input order. @throws EmbeddingError */
  embedBatch(texts: readonly string[]): Promise<number[][]>;
}

/**
 * Anything with an id and text to embed.
 */
export interface EmbeddableItem {
  id: string;
  text: string;
}

export type Embedded<T extends EmbeddableItem> = T & { embedding: number[] };

/**
 * Options for the embedPassages orchestration function.
 */
export interface EmbedderOptions {
  /**
   * Number of texts per request.
   * @default 32
   */
  batchSize?: number;

  /** Stop before the next batch once aborted; results so far are returned */
  signal?: AbortSignal;

  /**
   * Progress callback, fired after each batch (or fallback item) completes.
   */
  onProgress?: (processed: number, total: number) => void;

  /**
   * Called for each item that could not be embedded; processing continues.
   */
  onError?: (error: Error, itemId: string) => void;
}
