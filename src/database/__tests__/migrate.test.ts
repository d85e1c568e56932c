/**
 * Migration and Connection Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { runMigrations } from '../migrate.js';
import { openDatabase, getDb, closeDb, IN_MEMORY } from '../connection.js';

function tableNames(db: Database.Database): string[] {
  return db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .pluck()
    .all()
    .map(String);
}

describe('runMigrations', () => {
  it('creates the passages and metadata tables on a fresh database', () => {
    const db = new Database(IN_MEMORY);

    const result = runMigrations(db);

    expect(result).toEqual({ applied: ['001-passages.sql', '002-passages-url-index.sql'], failed: [] });
    expect(tableNames(db)).toEqual(['_migrations', 'index_meta', 'passages']);
    db.close();
  });

  it('applies nothing the second time', () => {
    const db = new Database(IN_MEMORY);
    runMigrations(db);

    expect(runMigrations(db)).toEqual({ applied: [], failed: [] });
    db.close();
  });
});

describe('openDatabase', () => {
  let tempDir: string | undefined;

  afterEach(() => {
    closeDb();
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  it('opens a migrated in-memory database', () => {
    const db = openDatabase(IN_MEMORY);

    expect(tableNames(db)).toContain('passages');
    db.close();
  });

  it('creates missing parent directories for a file database', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'fta-db-'));
    const path = join(tempDir, 'nested', 'passages.db');

    const db = openDatabase(path);

    expect(existsSync(path)).toBe(true);
    db.close();
  });

  it('shares one connection per path', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'fta-db-'));
    const path = join(tempDir, 'passages.db');

    expect(getDb(path)).toBe(getDb(path));
  });
});
