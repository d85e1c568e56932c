/**
 * Pinecone Vector Index
 *
 * Stores passage text, title and url as record metadata next to each vector.
 */

import type { Pinecone } from '@pinecone-database/pinecone';
import type { IndexedPassage, VectorIndex, VectorMatch } from './types.js';

/** Records per upsert request */
export const PINECONE_UPSERT_BATCH = 100;

/**
 * The slice of a Pinecone `Index` this backend uses.
 * `pc.index(name).namespace(ns)` satisfies it; tests pass a fake.
 */
export interface PineconeIndexLike {
  query(options: { vector: number[]; topK: number; includeMetadata: boolean }): Promise<{
    matches?: Array<{ id: string; score?: number; metadata?: unknown }>;
  }>;
  upsert(records: Array<{ id: string; values: number[]; metadata: Record<string, string> }>): Promise<void>;
  describeIndexStats(): Promise<{
    totalRecordCount?: number;
    namespaces?: Record<string, { recordCount?: number }>;
  }>;
}

export class PineconeVectorIndex implements VectorIndex {
  readonly backend = 'pinecone';
  private readonly index: PineconeIndexLike;
  private readonly namespace: string;

  constructor(index: PineconeIndexLike, namespace = '') {
    this.index = index;
    this.namespace = namespace;
  }

  /**
   * Bind to a named index (and namespace) on a Pinecone client.
   */
  static fromClient(client: Pinecone, indexName: string, namespace = ''): PineconeVectorIndex {
    const index = client.index(indexName);
    return new PineconeVectorIndex(namespace ? index.namespace(namespace) : index, namespace);
  }

  async query(vector: readonly number[], topK: number): Promise<VectorMatch[]> {
    const response = await this.index.query({ vector: [...vector], topK, includeMetadata: true });

    // Pinecone omits `score` only when it has none to report; treat as NaN so
    // the retriever rejects the match instead of ranking it silently
    return (response.matches ?? []).map((match) => ({
      id: match.id,
      score: match.score ?? Number.NaN,
      metadata: match.metadata,
    }));
  }

  async upsert(passages: readonly IndexedPassage[]): Promise<number> {
    for (let start = 0; start < passages.length; start += PINECONE_UPSERT_BATCH) {
      const batch = passages.slice(start, start + PINECONE_UPSERT_BATCH);
      await this.index.upsert(
        batch.map((passage) => ({
          id: passage.id,
          values: passage.embedding,
          metadata: { text: passage.text, title: passage.title, url: passage.url },
        }))
      );
    }
    return passages.length;
  }

  async count(): Promise<number> {
    const stats = await this.index.describeIndexStats();
    if (this.namespace) {
      return stats.namespaces?.[this.namespace]?.recordCount ?? 0;
    }
    return stats.totalRecordCount ?? 0;
  }
}
