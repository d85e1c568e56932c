/**
 * Centralized Path Definitions
 *
 * ~/.forum-ta/
 * ├── config.toml   (user configuration)
 * └── passages.db   (local SQLite vector index)
 *
 * FORUM_TA_HOME moves the whole directory (used by tests and containers).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the forum-ta directory path
 */
export function getHomeDir(): string {
  const override = process.env.FORUM_TA_HOME?.trim();
  return override ? override : join(homedir(), '.forum-ta');
}

/**
 * Get the config file path (<home>/config.toml)
 */
export function getConfigPath(): string {
  return join(getHomeDir(), 'config.toml');
}

/**
 * Get the default SQLite index path (<home>/passages.db)
 */
export function getDefaultIndexPath(): string {
  return join(getHomeDir(), 'passages.db');
}
