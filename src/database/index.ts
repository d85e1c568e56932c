/**
 * Database Module
 *
 * SQLite storage for the local vector index.
 */

export { openDatabase, getDb, closeDb, IN_MEMORY } from './connection.js';
export { runMigrations, type MigrationResult } from './migrate.js';
export {
  embeddingToBlob,
  blobToEmbedding,
  META_EMBEDDING_MODEL,
  META_EMBEDDING_DIMENSIONS,
  type PassageRow,
  type IndexMetaRow,
} from './schema.js';
export {
  PassageRowSchema,
  PassageSearchRowSchema,
  IndexMetaRowSchema,
  CountRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
