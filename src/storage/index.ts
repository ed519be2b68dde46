/**
 * Storage layer exports.
 */

// Database
export {
  openDatabase,
  applySchema,
  hasIndexTables,
  getIndexStats,
} from './db.js';
export type { OpenDatabaseOptions } from './db.js';

// Types
export type {
  ChunkFilters,
  StoredChunk,
  KeywordMatch,
  VectorMatch,
} from './types.js';

// Chunk store
export { ChunkStore, makeDocRef, buildFilterClause, hasFilters } from './chunk-store.js';

// Keyword store
export { KeywordStore, sanitizeQuery } from './keyword-store.js';

// Vector store
export { VectorStore } from './vector-store.js';
export type { VectorStoreOptions } from './vector-store.js';
