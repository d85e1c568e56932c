/**
 * Database Connection Module
 *
 * Opens the SQLite file behind the local vector index with better-sqlite3.
 * `getDb()` keeps one connection per process for the CLI and server;
 * tests open their own `:memory:` databases through `openDatabase()`.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from './migrate.js';
import { DatabaseError } from '../errors/index.js';

export const IN_MEMORY = ':memory:';

// Module-level singleton instance
let db: Database.Database | null = null;
let dbPath: string | null = null;

/**
 * Open a connection, create the parent directory and apply migrations.
 *
 * @throws DatabaseError if the file cannot be opened or migrated
 */
export function openDatabase(path: string): Database.Database {
  let connection: Database.Database;
  try {
    if (path !== IN_MEMORY) {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    connection = new Database(path);
  } catch (error) {
    throw new DatabaseError(
      `Cannot open index database at ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  if (path !== IN_MEMORY) {
    // WAL lets `fta serve` read while `fta index` writes
    connection.pragma('journal_mode = WAL');
  }

  const migrations = runMigrations(connection);
  const failed = migrations.failed[0];
  if (failed) {
    connection.close();
    throw new DatabaseError(`Migration ${failed.name} failed: ${failed.error}`);
  }

  return connection;
}

/**
 * Get the shared connection for `path`, opening it on first use.
 * Asking for a different path closes the previous connection.
 */
export function getDb(path: string): Database.Database {
  if (db && dbPath === path) {
    return db;
  }

  closeDb();
  db = openDatabase(path);
  dbPath = path;

  process.once('exit', closeDb);

  return db;
}

/**
 * Close the shared connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
    dbPath = null;
  }
}
