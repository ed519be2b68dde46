/**
 * Data model of the retrieval pipeline.
 *
 * Everything here is created per request and discarded with the response.
 *
 * @module retrieval/types
 */

import type { ChunkFilters } from '../storage/types.js';

/** Supported retrieval modes, fastest first. */
export const RETRIEVAL_MODES = ['bm25', 'vector', 'hybrid', 'query'] as const;

/**
 * - `bm25`: keyword backend only
 * - `vector`: vector backend only
 * - `hybrid`: both backends for the original text, fused
 * - `query`: expansion, both backends per variant, fusion, rerank
 */
export type RetrievalMode = (typeof RETRIEVAL_MODES)[number];

/** Retrieval backends in fusion order. */
export const BACKENDS = ['keyword', 'vector'] as const;

export type BackendName = (typeof BACKENDS)[number];

/** Filters forwarded to both backends as given. */
export type QueryFilters = ChunkFilters;

/**
 * An immutable retrieval request.
 */
export interface Query {
  readonly text: string;
  readonly filters: Readonly<QueryFilters>;
  readonly limit: number;
  readonly mode: RetrievalMode;
}

/**
 * One phrasing of a query.
 *
 * The original is always index 0 with weight 1.0; expanded variants weigh less.
 */
export interface QueryVariant {
  text: string;
  weight: number;
  origin: 'original' | 'expanded';
  index: number;
}

/** Chunk metadata carried on hits and results. */
export interface HitMetadata {
  filePath: string;
  chunkIndex: number;
  title: string;
  vault: string;
  category: string;
  people: string[];
  date: string | null;
}

/**
 * One candidate from a single backend call.
 *
 * Scores are backend-specific and not comparable across backends.
 */
export interface RetrievalHit {
  /** `<filePath>#<chunkIndex>` */
  docRef: string;
  score: number;
  /** 0-based position in its list */
  rank: number;
  backend: BackendName;
  variantIndex: number;
  snippet?: string;
  content?: string;
  metadata?: HitMetadata;
}

/**
 * One entry of the fused (and possibly reranked) output.
 */
export interface RankedResult {
  docRef: string;
  fusedScore: number;
  /** Position in the fused list, before reranking */
  fusedRank: number;
  /** Relevance judgment in [0, 1]; set only for reranked candidates */
  rerankScore?: number;
  finalScore: number;
  /** Contributing backends, in backend order */
  backends: BackendName[];
  /** Number of list appearances summed into fusedScore */
  appearances: number;
  snippet?: string;
  content?: string;
  metadata?: HitMetadata;
}

/**
 * Per-backend outcome of one request.
 *
 * - `ok`: every call succeeded
 * - `partial`: some calls failed
 * - `timeout`: unavailable, and every failure was a timeout
 * - `unavailable`: every call failed
 */
export type BackendStatus = 'ok' | 'partial' | 'unavailable' | 'timeout';

export interface BackendDiagnostics {
  status: BackendStatus;
  /** False when no call succeeded (`timeout` or `unavailable`) */
  available: boolean;
  calls: number;
  failures: number;
  timeouts: number;
  /** Hits returned across all calls */
  hits: number;
}

/** Outcome of the expansion stage. */
export type ExpansionStatus = 'skipped' | 'ok' | 'degraded';

export interface RerankStats {
  /** Candidates sent for judgment */
  judged: number;
  /** Judgments that failed or timed out (scored 0.5) */
  failed: number;
  /** Judgments whose answer could not be parsed (scored 0.5) */
  unparseable: number;
}

export interface StageTimings {
  expansionMs: number;
  retrievalMs: number;
  fusionMs: number;
  rerankMs: number;
  totalMs: number;
}

export interface RetrievalDiagnostics {
  requestedMode: RetrievalMode;
  /** Mode actually run */
  mode: RetrievalMode;
  timings: StageTimings;
  backends: Partial<Record<BackendName, BackendDiagnostics>>;
  variants: QueryVariant[];
  /** Lists passed to fusion, duplicates included */
  listsFused: number;
  /** Distinct documents before truncation */
  candidates: number;
  expansion: ExpansionStatus;
  rerank?: RerankStats;
}

export interface RetrievalResponse {
  results: RankedResult[];
  diagnostics: RetrievalDiagnostics;
}

export interface RetrieveOptions {
  /** Cancels every in-flight sub-call of the request */
  signal?: AbortSignal;
}
