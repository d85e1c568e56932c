/**
 * SQLite Vector Index
 *
 * Local backend for development and small forums: passages and Float32
 * embeddings in one better-sqlite3 table, ranked by brute-force cosine
 * similarity. Rows are scanned in insertion order, so equal scores keep
 * that order.
 */

import type Database from 'better-sqlite3';
import {
  blobToEmbedding,
  embeddingToBlob,
  getDb,
  CountRowSchema,
  IndexMetaRowSchema,
  PassageSearchRowSchema,
  META_EMBEDDING_DIMENSIONS,
  META_EMBEDDING_MODEL,
  validateRow,
  validateRows,
} from '../database/index.js';
import { IndexDimensionMismatchError } from './errors.js';
import type { IndexedPassage, VectorIndex, VectorMatch } from './types.js';

/**
 * Cosine similarity; 0 when either vector has zero length.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface SqliteVectorIndexOptions {
  /** Recorded with the first upsert so `fta check` can report it */
  embeddingModel?: string;
}

export class SqliteVectorIndex implements VectorIndex {
  readonly backend = 'sqlite';
  private readonly db: Database.Database;
  private readonly embeddingModel: string | undefined;

  constructor(db: Database.Database, options: SqliteVectorIndexOptions = {}) {
    this.db = db;
    this.embeddingModel = options.embeddingModel;
  }

  /**
   * Open (or create) the index file through the shared connection.
   */
  static open(path: string, options: SqliteVectorIndexOptions = {}): SqliteVectorIndex {
    return new SqliteVectorIndex(getDb(path), options);
  }

  async query(vector: readonly number[], topK: number): Promise<VectorMatch[]> {
    const rows = validateRows(
      PassageSearchRowSchema,
      this.db.prepare('SELECT id, text, title, url, embedding, dimensions FROM passages ORDER BY rowid').all(),
      'passages'
    );

    const scored: VectorMatch[] = [];
    for (const row of rows) {
      if (row.dimensions !== vector.length) continue;
      scored.push({
        id: row.id,
        score: cosineSimilarity(vector, blobToEmbedding(row.embedding)),
        metadata: { text: row.text, title: row.title, url: row.url },
      });
    }

    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, topK);
  }

  /**
   * Insert or replace passages in one transaction.
   *
   * @throws IndexDimensionMismatchError if the vectors do not match the
   *   dimensionality the index was built with
   */
  async upsert(passages: readonly IndexedPassage[]): Promise<number> {
    const first = passages[0];
    if (!first) return 0;

    const dimensions = first.embedding.length;
    const stored = this.getDimensions();
    if (stored !== null && stored !== dimensions) {
      throw new IndexDimensionMismatchError(stored, dimensions);
    }
    for (const passage of passages) {
      if (passage.embedding.length !== dimensions) {
        throw new IndexDimensionMismatchError(dimensions, passage.embedding.length);
      }
    }

    const insert = this.db.prepare(`
      INSERT INTO passages (id, text, title, url, embedding, dimensions)
      VALUES (@id, @text, @title, @url, @embedding, @dimensions)
      ON CONFLICT(id) DO UPDATE SET
        text = excluded.text,
        title = excluded.title,
        url = excluded.url,
        embedding = excluded.embedding,
        dimensions = excluded.dimensions,
        indexed_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
    `);
    const setMeta = this.db.prepare(
      'INSERT INTO index_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
    );

    this.db.transaction(() => {
      for (const passage of passages) {
        insert.run({
          id: passage.id,
          text: passage.text,
          title: passage.title,
          url: passage.url,
          embedding: embeddingToBlob(passage.embedding),
          dimensions,
        });
      }
      setMeta.run(META_EMBEDDING_DIMENSIONS, String(dimensions));
      if (this.embeddingModel) {
        setMeta.run(META_EMBEDDING_MODEL, this.embeddingModel);
      }
    })();

    return passages.length;
  }

  async count(): Promise<number> {
    const row = validateRow(CountRowSchema, this.db.prepare('SELECT COUNT(*) AS count FROM passages').get(), 'passages count');
    return row.count;
  }

  /** Dimensionality recorded by the first upsert, or null for an empty index */
  getDimensions(): number | null {
    const value = this.getMeta(META_EMBEDDING_DIMENSIONS);
    return value === null ? null : Number(value);
  }

  /** Embedding model recorded at index time, if any */
  getEmbeddingModel(): string | null {
    return this.getMeta(META_EMBEDDING_MODEL);
  }

  private getMeta(key: string): string | null {
    const row = this.db.prepare('SELECT key, value FROM index_meta WHERE key = ?').get(key);
    return row === undefined ? null : validateRow(IndexMetaRowSchema, row, `index_meta.key=${key}`).value;
  }
}
