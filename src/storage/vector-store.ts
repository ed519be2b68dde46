/**
 * In-memory vector index over the SQLite `vectors` table.
 *
 * Embeddings are stored as Float32Array blobs by the indexer and loaded into
 * memory on first search for brute-force cosine search.
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────┐
 * │                     VectorStore                             │
 * │  ┌──────────────────────────┐   ┌────────────────────────┐  │
 * │  │  Snapshot                │   │  SQLite (read-only)    │  │
 * │  │  Map<id, Float32Array>   │◄──┤  vectors (id, model,   │  │
 * │  └──────────────────────────┘   │           embedding)   │  │
 * │                                 └────────────────────────┘  │
 * └─────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Snapshots
 *
 * The indexer keeps writing while the core serves requests. A loaded snapshot
 * stays consistent until `invalidate()` is called; the next search reloads.
 *
 * ## Performance Notes
 *
 * - Load: O(n) to deserialize all vectors
 * - Search: O(n) brute-force, filtered candidates only when filters are set
 * - Memory: ~3KB per vector (768 dimensions × 4 bytes)
 *
 * @module storage/vector-store
 */

import type Database from 'better-sqlite3';
import { ChunkStore, hasFilters } from './chunk-store.js';
import type { ChunkFilters, VectorMatch } from './types.js';
import { cosineSimilarity } from '../utils/similarity.js';
import { deserializeEmbedding } from '../utils/embedding-utils.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('vector-store');

export interface VectorStoreOptions {
  /** Only load embeddings written by this model */
  model?: string;
}

export class VectorStore {
  private vectors: Map<string, Float32Array> | null = null;
  private readonly chunks: ChunkStore;

  constructor(
    private readonly db: Database.Database,
    private readonly options: VectorStoreOptions = {},
  ) {
    this.chunks = new ChunkStore(db);
  }

  /**
   * Load the snapshot if it is not loaded yet.
   *
   * @throws StorageError with code VECTOR_LOAD_FAILED
   */
  load(): Map<string, Float32Array> {
    if (this.vectors) return this.vectors;

    const vectors = new Map<string, Float32Array>();
    try {
      const rows = this.options.model
        ? this.db
            .prepare<[string], { id: string; embedding: Buffer }>(
              'SELECT id, embedding FROM vectors WHERE model = ?',
            )
            .all(this.options.model)
        : this.db
            .prepare<[], { id: string; embedding: Buffer }>('SELECT id, embedding FROM vectors')
            .all();

      for (const row of rows) {
        vectors.set(row.id, deserializeEmbedding(row.embedding));
      }
    } catch (error) {
      throw new StorageError('Failed to load vectors', 'VECTOR_LOAD_FAILED', error);
    }

    log.debug('Vector snapshot loaded', { count: vectors.size, model: this.options.model });
    this.vectors = vectors;
    return vectors;
  }

  /**
   * Drop the snapshot so the next search sees the indexer's latest writes.
   */
  invalidate(): void {
    this.vectors = null;
  }

  /**
   * Search for the chunks most similar to `query`.
   *
   * Results are ordered by cosine similarity descending, ties by chunk ID.
   * Vectors whose chunk no longer exists are skipped.
   */
  async search(query: ArrayLike<number>, filters: ChunkFilters, limit: number): Promise<VectorMatch[]> {
    if (limit <= 0) return [];

    const vectors = this.load();
    const allowed = hasFilters(filters) ? this.chunks.getIdsMatching(filters) : null;

    const scored: Array<{ id: string; score: number }> = [];
    for (const [id, embedding] of vectors) {
      if (allowed && !allowed.has(id)) continue;
      scored.push({ id, score: cosineSimilarity(query, embedding) });
    }

    scored.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    const top = scored.slice(0, limit);

    const chunksById = new Map(this.chunks.getByIds(top.map((s) => s.id)).map((c) => [c.id, c]));

    const matches: VectorMatch[] = [];
    for (const { id, score } of top) {
      const chunk = chunksById.get(id);
      if (chunk) matches.push({ chunk, score });
    }
    return matches;
  }

  /**
   * Number of vectors in the current snapshot.
   */
  count(): number {
    return this.load().size;
  }
}
