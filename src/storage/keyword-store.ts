/**
 * FTS5-backed keyword search for chunks.
 *
 * Provides BM25-ranked full-text search using SQLite FTS5 with porter stemming.
 * Metadata filters are bound parameters on the joined `chunks` row, so they
 * never change the MATCH expression.
 */

import type Database from 'better-sqlite3';
import { buildFilterClause, CHUNK_COLUMNS, rowToChunk } from './chunk-store.js';
import type { ChunkFilters, ChunkRow, KeywordMatch } from './types.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('keyword-store');

/** Tokens around each match in a snippet. */
const SNIPPET_TOKENS = 32;

type KeywordRow = ChunkRow & { score: number; snippet: string | null };

/**
 * Sanitize a query string for FTS5 MATCH syntax.
 *
 * Strips FTS5 operators and special characters, then quotes each term so the
 * result is a plain implicit-AND of literal tokens.
 */
export function sanitizeQuery(query: string): string {
  if (!query || !query.trim()) return '';

  const sanitized = query
    // Boolean operators as full words
    .replace(/\b(AND|OR|NOT|NEAR)\b/g, '')
    .replace(/[*"(){}^~\-:+.,;!?'[\]]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (!sanitized) return '';

  const terms = sanitized.split(/\s+/).filter(Boolean);
  if (terms.length === 0) return '';

  return terms.map((t) => `"${t}"`).join(' ');
}

export class KeywordStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * Full-text search with BM25 ranking.
   *
   * Results are ordered best first; equal scores are ordered by chunk ID.
   * A query with no searchable terms returns no matches.
   *
   * @throws StorageError with code FTS_QUERY_FAILED when the index cannot be queried
   */
  search(query: string, filters: ChunkFilters, limit: number): KeywordMatch[] {
    const sanitized = sanitizeQuery(query);
    if (!sanitized || limit <= 0) return [];

    const clause = buildFilterClause(filters);
    const filterSql = clause.sql ? `AND ${clause.sql}` : '';

    let rows: KeywordRow[];
    try {
      rows = this.db
        .prepare<Array<string | number>, KeywordRow>(
          `
          SELECT ${CHUNK_COLUMNS},
            bm25(chunks_fts) as score,
            snippet(chunks_fts, 1, '', '', '...', ${SNIPPET_TOKENS}) as snippet
          FROM chunks_fts
          JOIN chunks ON chunks.rowid = chunks_fts.rowid
          WHERE chunks_fts MATCH ?
            ${filterSql}
          ORDER BY bm25(chunks_fts), chunks.id
          LIMIT ?
        `,
        )
        .all(sanitized, ...clause.params, limit);
    } catch (error) {
      throw new StorageError('Keyword search failed', 'FTS_QUERY_FAILED', error);
    }

    log.debug('Keyword search', { terms: sanitized, filters: clause.params.length, hits: rows.length });

    // bm25() returns negative scores (lower = better match), negate for conventional scoring
    return rows.map((row) => ({
      chunk: rowToChunk(row),
      score: -row.score,
      snippet: row.snippet ?? '',
    }));
  }
}
