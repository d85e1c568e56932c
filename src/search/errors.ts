/**
 * Search Module Errors
 *
 * Errors the user can act on while building or opening an index.
 * Query-time failures are RetrievalErrors (see agent/types.ts).
 */

import { CLIError } from '../errors/index.js';

/**
 * Thrown when vectors of one length are written to an index built with another.
 *
 * Exit code 6: index/embedding mismatch
 *
 * @example
 * ```typescript
 * if (stored !== config.embedding.dimensions) {
 *   throw new IndexDimensionMismatchError(stored, config.embedding.dimensions);
 * }
 * ```
 */
export class IndexDimensionMismatchError extends CLIError {
  public readonly indexDimensions: number;
  public readonly embeddingDimensions: number;

  constructor(indexDimensions: number, embeddingDimensions: number) {
    super(
      `Index holds ${indexDimensions}-dimensional vectors but the embedding model produces ${embeddingDimensions}`,
      `Set embedding.dimensions = ${indexDimensions}, or point [index] at a new location and re-index.`,
      6
    );
    this.name = 'IndexDimensionMismatchError';
    this.indexDimensions = indexDimensions;
    this.embeddingDimensions = embeddingDimensions;
  }
}
