/**
 * Database Migration Runner
 *
 * Applies embedded SQL migrations in order, tracking which have been
 * applied in a `_migrations` table. Safe to run on every open.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Embedded so the bundled CLI needs no SQL files on disk
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-passages.sql',
    sql: `
CREATE TABLE IF NOT EXISTS passages (
  id TEXT PRIMARY KEY,
  text TEXT NOT NULL,
  title TEXT NOT NULL,
  url TEXT NOT NULL,
  embedding BLOB NOT NULL,
  dimensions INTEGER NOT NULL,
  indexed_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS index_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
    `.trim(),
  },
  {
    name: '002-passages-url-index.sql',
    sql: `CREATE INDEX IF NOT EXISTS idx_passages_url ON passages(url);`,
  },
];

const MigrationRowSchema = z.object({ name: z.string() });

/**
 * Apply every migration not yet recorded in `_migrations`.
 * Each migration runs in its own transaction; the first failure stops the run.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const rows = validateRows(MigrationRowSchema, db.prepare('SELECT name FROM _migrations').all(), '_migrations');
  const alreadyApplied = new Set(rows.map((row) => row.name));
  const result: MigrationResult = { applied: [], failed: [] };

  for (const migration of MIGRATIONS) {
    if (alreadyApplied.has(migration.name)) continue;

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      result.applied.push(migration.name);
    } catch (error) {
      result.failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
      break;
    }
  }

  return result;
}
