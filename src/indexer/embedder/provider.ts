/**
 * OpenAI Embedder
 *
 * Embeds text through the OpenAI embeddings endpoint (or a compatible
 * proxy). Retries are left to the client's `maxRetries`; each request is
 * bounded by `embedding.timeout_ms`.
 */

import type { EmbeddingConfig } from '../../config/schema.js';
import { EmbeddingError } from '../../agent/types.js';
import { toError, withTimeout } from '../../utils/index.js';
import type { Embedder, EmbeddingsAPI } from './types.js';

/**
 * Native dimensionality of known OpenAI embedding models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/**
 * Native dimensions of a known model, or undefined for unknown models.
 */
export function getModelDimensions(model: string): number | undefined {
  return MODEL_DIMENSIONS[model.slice(model.lastIndexOf('/') + 1)];
}

/**
 * Only the text-embedding-3 family accepts a `dimensions` parameter.
 */
export function supportsDimensionsParam(model: string): boolean {
  return model.slice(model.lastIndexOf('/') + 1).startsWith('text-embedding-3');
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly embeddings: EmbeddingsAPI;
  private readonly timeoutMs: number;

  constructor(embeddings: EmbeddingsAPI, config: Pick<EmbeddingConfig, 'model' | 'dimensions' | 'timeout_ms'>) {
    this.embeddings = embeddings;
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.timeoutMs = config.timeout_ms;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new EmbeddingError('Embedding response contained no vectors');
    }
    return vector;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const emptyAt = texts.findIndex((text) => text.trim().length === 0);
    if (emptyAt !== -1) {
      throw new EmbeddingError(
        texts.length === 1 ? 'Cannot embed empty text' : `Cannot embed empty text (item ${emptyAt})`
      );
    }

    const controller = new AbortController();
    let data: Array<{ embedding: number[]; index: number }>;
    try {
      const response = await withTimeout(
        this.embeddings.create(
          {
            model: this.model,
            input: texts.length === 1 && texts[0] !== undefined ? texts[0] : [...texts],
            ...(supportsDimensionsParam(this.model) ? { dimensions: this.dimensions } : {}),
          },
          { timeout: this.timeoutMs, signal: controller.signal }
        ),
        this.timeoutMs,
        () => {
          controller.abort();
          return new EmbeddingError(`Embedding request timed out after ${this.timeoutMs}ms`);
        }
      );
      data = response.data;
    } catch (error) {
      if (error instanceof EmbeddingError) throw error;
      const cause = toError(error);
      throw new EmbeddingError(`Embedding request failed (${this.model}): ${cause.message}`, cause);
    }

    if (data.length !== texts.length) {
      throw new EmbeddingError(`Expected ${texts.length} embeddings, received ${data.length}`);
    }

    const ordered = [...data].sort((a, b) => a.index - b.index);
    return ordered.map(({ embedding }) => {
      if (embedding.length !== this.dimensions) {
        throw new EmbeddingError(
          `Embedding has ${embedding.length} dimensions, expected ${this.dimensions} (check embedding.dimensions)`
        );
      }
      return embedding;
    });
  }
}
