/**
 * Read access to indexed chunks and filter composition.
 */

import type Database from 'better-sqlite3';
import type { ChunkFilters, ChunkRow, StoredChunk } from './types.js';

/** Columns selected for a StoredChunk, qualified by the `chunks` table. */
export const CHUNK_COLUMNS = [
  'chunks.id',
  'chunks.file_path',
  'chunks.chunk_index',
  'chunks.title',
  'chunks.content',
  'chunks.vault',
  'chunks.category',
  'chunks.people',
  'chunks.date',
].join(', ');

/**
 * Build the stable document reference for a chunk.
 */
export function makeDocRef(filePath: string, chunkIndex: number): string {
  return `${filePath}#${chunkIndex}`;
}

function parsePeople(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((p): p is string => typeof p === 'string') : [];
  } catch {
    // Malformed people column reads as nobody
    return [];
  }
}

/**
 * Convert a database row to a StoredChunk.
 */
export function rowToChunk(row: ChunkRow): StoredChunk {
  return {
    id: row.id,
    filePath: row.file_path,
    chunkIndex: row.chunk_index,
    title: row.title,
    content: row.content,
    vault: row.vault,
    category: row.category,
    people: parsePeople(row.people),
    date: row.date,
  };
}

/** A parameterized SQL condition. */
export interface FilterClause {
  /** Conditions joined with AND, or '' when there are none */
  sql: string;
  params: string[];
}

/**
 * Translate filters into a parameterized condition on the `chunks` table.
 *
 * Every value is bound, so a filter composes with any MATCH expression
 * without touching the query text.
 */
export function buildFilterClause(filters: ChunkFilters = {}): FilterClause {
  const conditions: string[] = [];
  const params: string[] = [];

  if (filters.vault && filters.vault !== 'all') {
    conditions.push('chunks.vault = ?');
    params.push(filters.vault);
  }
  if (filters.category) {
    conditions.push('chunks.category = ?');
    params.push(filters.category);
  }
  if (filters.person) {
    conditions.push('EXISTS (SELECT 1 FROM json_each(chunks.people) WHERE json_each.value = ?)');
    params.push(filters.person);
  }
  if (filters.dateFrom) {
    conditions.push('substr(chunks.date, 1, 10) >= ?');
    params.push(filters.dateFrom.slice(0, 10));
  }
  if (filters.dateTo) {
    conditions.push('substr(chunks.date, 1, 10) <= ?');
    params.push(filters.dateTo.slice(0, 10));
  }

  return { sql: conditions.join(' AND '), params };
}

/**
 * True when the filters restrict anything.
 */
export function hasFilters(filters: ChunkFilters = {}): boolean {
  return buildFilterClause(filters).params.length > 0;
}

export class ChunkStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * Get a chunk by ID.
   */
  getById(id: string): StoredChunk | null {
    const row = this.db
      .prepare<[string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks WHERE chunks.id = ?`)
      .get(id);
    return row ? rowToChunk(row) : null;
  }

  /**
   * Get chunks by ID, in no particular order. Unknown IDs are skipped.
   */
  getByIds(ids: string[]): StoredChunk[] {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => '?').join(',');
    return this.db
      .prepare<string[], ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM chunks WHERE chunks.id IN (${placeholders})`,
      )
      .all(...ids)
      .map(rowToChunk);
  }

  /**
   * IDs of every chunk matching the filters.
   */
  getIdsMatching(filters: ChunkFilters): Set<string> {
    const clause = buildFilterClause(filters);
    const where = clause.sql ? `WHERE ${clause.sql}` : '';
    const rows = this.db
      .prepare<string[], { id: string }>(`SELECT chunks.id FROM chunks ${where}`)
      .all(...clause.params);
    return new Set(rows.map((r) => r.id));
  }

  /**
   * Number of indexed chunks.
   */
  count(): number {
    return (
      this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM chunks').get()
        ?.count ?? 0
    );
  }
}
