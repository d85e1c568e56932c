/**
 * Retriever
 *
 * Query vector → top-K PassageRecords from a VectorIndex.
 *
 * Results are sorted by score descending with a stable sort, so passages
 * with equal scores keep the order the backend returned them in.
 */

import { RetrievalError, type PassageRecord } from '../agent/types.js';
import { toError, withTimeout, silentLogger, type Logger } from '../utils/index.js';
import { PassageMetadataSchema, type VectorIndex, type VectorMatch } from './types.js';

export interface RetrieverOptions {
  /** Expected query vector length (embedding.dimensions) */
  dimensions: number;
  /** Upper bound for one index query (0 disables) */
  timeoutMs: number;
  logger?: Logger;
}

export class Retriever {
  private readonly index: VectorIndex;
  private readonly dimensions: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(index: VectorIndex, options: RetrieverOptions) {
    this.index = index;
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Retrieve up to `topK` passages for a query vector.
   *
   * @throws RangeError if topK is not a positive integer
   * @throws RetrievalError on dimension mismatch, backend failure, timeout
   *   or malformed match metadata
   */
  async retrieve(queryVector: readonly number[], topK: number): Promise<PassageRecord[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new RangeError(`topK must be a positive integer, got ${topK}`);
    }
    if (queryVector.length !== this.dimensions) {
      throw new RetrievalError(
        `Query vector has ${queryVector.length} dimensions, index expects ${this.dimensions}`
      );
    }

    let matches: VectorMatch[];
    try {
      matches = await withTimeout(
        this.index.query(queryVector, topK),
        this.timeoutMs,
        () => new RetrievalError(`Vector query timed out after ${this.timeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof RetrievalError) throw error;
      const cause = toError(error);
      throw new RetrievalError(`Vector query failed (${this.index.backend}): ${cause.message}`, cause);
    }

    const passages = matches.map((match) => this.toPassage(match));
    passages.sort((a, b) => b.score - a.score);

    this.logger.debug?.(`Retrieved ${passages.length} passages from ${this.index.backend}`);
    return passages.slice(0, topK);
  }

  private toPassage(match: VectorMatch): PassageRecord {
    const metadata = PassageMetadataSchema.safeParse(match.metadata);
    if (!metadata.success) {
      const issue = metadata.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid metadata';
      throw new RetrievalError(`Malformed metadata for match ${match.id}: ${detail}`);
    }
    if (!Number.isFinite(match.score)) {
      throw new RetrievalError(`Match ${match.id} has no usable score`);
    }

    return { id: match.id, score: match.score, ...metadata.data };
  }
}
