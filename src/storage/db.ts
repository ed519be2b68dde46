/**
 * SQLite connection to the externally maintained index.
 *
 * The indexer owns the database; the retrieval core opens it read-only and
 * never runs migrations. `applySchema()` exists for tests and for tooling
 * that builds a fresh index.
 */

import Database from 'better-sqlite3';
import { resolvePath } from '../config/retrieval-config.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { loadSchemaStatements } from './schema-loader.js';

const log = createLogger('db');

export interface OpenDatabaseOptions {
  /** Open for writing and create the file when missing (default: false) */
  writable?: boolean;
}

/**
 * Open an index database.
 *
 * Read-only connections require the file to exist.
 *
 * @throws StorageError with code DB_OPEN_FAILED
 */
export function openDatabase(path: string, options: OpenDatabaseOptions = {}): Database.Database {
  const resolvedPath = resolvePath(path);
  const readonly = !options.writable;

  try {
    const database = new Database(resolvedPath, { readonly, fileMustExist: readonly });
    log.debug('Database opened', { path: resolvedPath, readonly });
    return database;
  } catch (error) {
    throw new StorageError(`Cannot open index database at ${resolvedPath}`, 'DB_OPEN_FAILED', error);
  }
}

/**
 * Create the index tables on a writable connection.
 */
export function applySchema(database: Database.Database): void {
  const apply = database.transaction((statements: string[]) => {
    for (const statement of statements) {
      database.exec(statement);
    }
  });
  apply(loadSchemaStatements());
}

/**
 * Check whether the index tables exist.
 */
export function hasIndexTables(database: Database.Database): boolean {
  const rows = database
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE name IN ('chunks', 'chunks_fts', 'vectors')",
    )
    .all();
  return rows.length === 3;
}

/**
 * Get index statistics.
 */
export function getIndexStats(database: Database.Database): {
  chunks: number;
  vectors: number;
  files: number;
} {
  const count = (sql: string): number =>
    database.prepare<[], { count: number }>(sql).get()?.count ?? 0;

  return {
    chunks: count('SELECT COUNT(*) as count FROM chunks'),
    vectors: count('SELECT COUNT(*) as count FROM vectors'),
    files: count('SELECT COUNT(DISTINCT file_path) as count FROM chunks'),
  };
}
