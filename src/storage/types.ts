/**
 * Types for the storage layer.
 *
 * The storage layer reads the index written by the external indexer:
 * - **Chunks**: passages of a source document with their metadata
 * - **FTS index**: `chunks_fts`, kept in sync with chunks by triggers
 * - **Vectors**: one embedding per chunk
 *
 * @module storage/types
 */

/**
 * Metadata filters shared by both stores.
 *
 * Values are bound as given. A vault no chunk lives in, or a range that
 * excludes every date, matches nothing. Dates compare as ISO `YYYY-MM-DD`
 * prefixes; the range is inclusive. A chunk without a date never matches a
 * date filter.
 */
export interface ChunkFilters {
  /** `work`, `personal`, or `all` for every vault */
  vault?: string;
  category?: string;
  /** Matches when the chunk's people list contains this name */
  person?: string;
  dateFrom?: string;
  dateTo?: string;
}

/**
 * A chunk stored in the database.
 */
export interface StoredChunk {
  /** `<filePath>#<chunkIndex>` */
  id: string;
  /** Path of the source document, relative to its vault */
  filePath: string;
  /** Position of the chunk within its document (0-based) */
  chunkIndex: number;
  title: string;
  content: string;
  vault: string;
  category: string;
  /** People mentioned in or attending the source document */
  people: string[];
  /** ISO date of the source document, if known */
  date: string | null;
}

/** Raw `chunks` row. */
export interface ChunkRow {
  id: string;
  file_path: string;
  chunk_index: number;
  title: string;
  content: string;
  vault: string;
  category: string;
  people: string;
  date: string | null;
}

/**
 * Keyword search match.
 *
 * `score` is the negated FTS5 bm25() value: higher is better, unbounded.
 */
export interface KeywordMatch {
  chunk: StoredChunk;
  score: number;
  /** FTS5 snippet with the matched terms, empty when none could be built */
  snippet: string;
}

/**
 * Vector search match.
 *
 * `score` is cosine similarity in [-1, 1].
 */
export interface VectorMatch {
  chunk: StoredChunk;
  score: number;
}
