/**
 * Reciprocal Rank Fusion (RRF) for combining ranked lists from different
 * backends and query variants.
 *
 * Every appearance of a document at 0-based rank r contributes
 *   1 / (k + r + 1)
 * plus, with the top-rank bonus enabled, +0.05 at rank 0 and +0.02 at
 * ranks 1-2. Contributions are summed per document across all lists.
 *
 * Fusion uses rank only; raw backend scores are ignored.
 */

import { BACKENDS, type BackendName, type RankedResult, type RetrievalHit } from './types.js';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_K = 60;

/** Bonus per list appearance at rank 0. */
export const TOP_RANK_BONUS = 0.05;
/** Bonus per list appearance at ranks 1-2. */
export const NEAR_TOP_RANK_BONUS = 0.02;

export interface FuseOptions {
  /** RRF constant (default: 60). Higher values flatten the rank curve. */
  k?: number;
  /** Add the per-appearance top-rank bonus (default: false) */
  topRankBonus?: boolean;
}

/**
 * Contribution of one appearance at `rank`.
 */
export function rrfContribution(rank: number, k: number = DEFAULT_K, topRankBonus = false): number {
  let score = 1 / (k + rank + 1);
  if (topRankBonus) {
    if (rank === 0) score += TOP_RANK_BONUS;
    else if (rank <= 2) score += NEAR_TOP_RANK_BONUS;
  }
  return score;
}

/**
 * Lexical comparison of document references.
 */
export function compareDocRefs(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

interface Accumulator {
  score: number;
  appearances: number;
  backends: Set<BackendName>;
  snippet?: string;
  content?: string;
  metadata?: RetrievalHit['metadata'];
}

/**
 * Fuse ranked lists using Reciprocal Rank Fusion.
 *
 * A hit's rank is its position in its list. Lists are consumed in the given
 * order, so the same input always sums in the same order. Payload fields
 * (snippet, content, metadata) come from the first appearance that has them.
 *
 * @param lists - Ranked lists; empty lists are skipped. A list passed twice counts twice.
 * @returns Deduplicated results sorted by fused score descending, ties by docRef ascending
 * @throws ConfigError when k is not a positive integer
 */
export function fuseRRF(lists: ReadonlyArray<readonly RetrievalHit[]>, options: FuseOptions = {}): RankedResult[] {
  const k = options.k ?? DEFAULT_K;
  if (!Number.isInteger(k) || k < 1) {
    throw new ConfigError(`RRF constant k must be a positive integer, got ${k}`, 'INVALID_VALUE');
  }
  const topRankBonus = options.topRankBonus ?? false;

  const scoreMap = new Map<string, Accumulator>();

  for (const list of lists) {
    for (let rank = 0; rank < list.length; rank++) {
      const hit = list[rank];
      const contribution = rrfContribution(rank, k, topRankBonus);

      let entry = scoreMap.get(hit.docRef);
      if (!entry) {
        entry = { score: 0, appearances: 0, backends: new Set() };
        scoreMap.set(hit.docRef, entry);
      }
      entry.score += contribution;
      entry.appearances++;
      entry.backends.add(hit.backend);
      entry.snippet ??= hit.snippet;
      entry.content ??= hit.content;
      entry.metadata ??= hit.metadata;
    }
  }

  const fused = [...scoreMap.entries()].sort(
    ([refA, a], [refB, b]) => b.score - a.score || compareDocRefs(refA, refB),
  );

  return fused.map(([docRef, entry], index) => {
    const result: RankedResult = {
      docRef,
      fusedScore: entry.score,
      fusedRank: index,
      finalScore: entry.score,
      backends: BACKENDS.filter((b) => entry.backends.has(b)),
      appearances: entry.appearances,
    };
    if (entry.snippet !== undefined) result.snippet = entry.snippet;
    if (entry.content !== undefined) result.content = entry.content;
    if (entry.metadata !== undefined) result.metadata = entry.metadata;
    return result;
  });
}

/**
 * Min-max normalize fused scores to [0, 1].
 *
 * Order is unchanged. When every score is equal, all become 1.0.
 * `finalScore` follows the normalized fused score.
 */
export function normalizeScores(results: readonly RankedResult[]): RankedResult[] {
  if (results.length === 0) return [];

  let min = Infinity;
  let max = -Infinity;
  for (const r of results) {
    min = Math.min(min, r.fusedScore);
    max = Math.max(max, r.fusedScore);
  }
  const range = max - min;

  return results.map((r) => {
    const fusedScore = range === 0 ? 1 : (r.fusedScore - min) / range;
    return { ...r, fusedScore, finalScore: fusedScore };
  });
}
