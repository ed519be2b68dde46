/**
 * Retrieval backends and their store adapters.
 *
 * The orchestrator sees two narrow interfaces. The store adapters implement
 * them over the read-only SQLite index and translate storage and embedding
 * failures into `BackendError`.
 */

import { makeDocRef } from '../storage/chunk-store.js';
import type { KeywordStore } from '../storage/keyword-store.js';
import type { KeywordMatch, StoredChunk, VectorMatch } from '../storage/types.js';
import type { VectorStore } from '../storage/vector-store.js';
import type { EmbeddingProvider } from '../models/embedding-provider.js';
import { compareDocRefs } from './rrf.js';
import type { BackendName, HitMetadata, QueryFilters, RetrievalHit } from './types.js';
import { BackendError, RetrievalError, isErrorWithCode } from '../utils/errors.js';

/** Characters of chunk content used as a vector hit's snippet. */
const SNIPPET_CHARS = 300;

export interface SearchCallOptions {
  signal?: AbortSignal;
}

/**
 * Full-text search over the externally maintained index.
 *
 * Returns `[]` for no matches; throws `BackendError('BACKEND_UNAVAILABLE')`
 * when the index cannot be queried.
 */
export interface KeywordSearch {
  search(
    text: string,
    filters: QueryFilters,
    limit: number,
    options?: SearchCallOptions,
  ): Promise<RetrievalHit[]>;
}

/**
 * Similarity search over the externally maintained vector index.
 *
 * Embeds `text` itself; the orchestrator never handles vectors.
 */
export interface VectorSearch {
  search(
    text: string,
    filters: QueryFilters,
    limit: number,
    options?: SearchCallOptions,
  ): Promise<RetrievalHit[]>;
}

/**
 * Put one backend list in canonical form.
 *
 * Orders by score descending, ties by docRef ascending; keeps the best hit
 * of a repeated docRef; assigns contiguous 0-based ranks and stamps the
 * backend and variant.
 */
export function rankHits(
  hits: readonly RetrievalHit[],
  backend: BackendName,
  variantIndex: number,
): RetrievalHit[] {
  const sorted = [...hits].sort((a, b) => b.score - a.score || compareDocRefs(a.docRef, b.docRef));
  const seen = new Set<string>();
  const ranked: RetrievalHit[] = [];

  for (const hit of sorted) {
    if (seen.has(hit.docRef)) continue;
    seen.add(hit.docRef);
    ranked.push({ ...hit, rank: ranked.length, backend, variantIndex });
  }
  return ranked;
}

export function chunkMetadata(chunk: StoredChunk): HitMetadata {
  return {
    filePath: chunk.filePath,
    chunkIndex: chunk.chunkIndex,
    title: chunk.title,
    vault: chunk.vault,
    category: chunk.category,
    people: chunk.people,
    date: chunk.date,
  };
}

function excerpt(content: string): string {
  return content.length > SNIPPET_CHARS ? `${content.slice(0, SNIPPET_CHARS)}...` : content;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RetrievalError('Search aborted', 'CANCELLED');
  }
}

/**
 * KeywordSearch over the FTS5 index.
 */
export class StoreKeywordSearch implements KeywordSearch {
  constructor(private readonly store: KeywordStore) {}

  async search(
    text: string,
    filters: QueryFilters,
    limit: number,
    options: SearchCallOptions = {},
  ): Promise<RetrievalHit[]> {
    throwIfAborted(options.signal);

    let matches: KeywordMatch[];
    try {
      matches = this.store.search(text, filters, limit);
    } catch (error) {
      throw new BackendError('Keyword index unavailable', 'BACKEND_UNAVAILABLE', error);
    }

    return matches.map(
      ({ chunk, score, snippet }, rank): RetrievalHit => ({
        docRef: makeDocRef(chunk.filePath, chunk.chunkIndex),
        score,
        rank,
        backend: 'keyword',
        variantIndex: 0,
        snippet: snippet || excerpt(chunk.content),
        content: chunk.content,
        metadata: chunkMetadata(chunk),
      }),
    );
  }
}

/**
 * VectorSearch over the in-memory vector snapshot.
 */
export class StoreVectorSearch implements VectorSearch {
  constructor(
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingProvider,
  ) {}

  async search(
    text: string,
    filters: QueryFilters,
    limit: number,
    options: SearchCallOptions = {},
  ): Promise<RetrievalHit[]> {
    let embedding: number[];
    try {
      embedding = await this.embedder.embed(text, { signal: options.signal });
    } catch (error) {
      throwIfAborted(options.signal);
      const code = isErrorWithCode(error, 'LLM_TIMEOUT') ? 'BACKEND_TIMEOUT' : 'BACKEND_UNAVAILABLE';
      throw new BackendError(`Query embedding failed (${this.embedder.modelId})`, code, error);
    }

    throwIfAborted(options.signal);

    let matches: VectorMatch[];
    try {
      matches = await this.store.search(embedding, filters, limit);
    } catch (error) {
      throw new BackendError('Vector index unavailable', 'BACKEND_UNAVAILABLE', error);
    }

    return matches.map(
      ({ chunk, score }, rank): RetrievalHit => ({
        docRef: makeDocRef(chunk.filePath, chunk.chunkIndex),
        score,
        rank,
        backend: 'vector',
        variantIndex: 0,
        snippet: excerpt(chunk.content),
        content: chunk.content,
        metadata: chunkMetadata(chunk),
      }),
    );
  }
}
