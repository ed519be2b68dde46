/**
 * LLM relevance reranking with position-aware blending.
 *
 * The top `budget` fused candidates are each judged by a text generator.
 * A judgment's score is blended with the candidate's fused score using
 * weights that depend on the candidate's pre-rerank rank:
 *
 * | pre-rerank rank | fused | rerank |
 * |-----------------|-------|--------|
 * | 0-2             | 0.75  | 0.25   |
 * | 3-9             | 0.60  | 0.40   |
 * | 10+             | 0.40  | 0.60   |
 *
 * Candidates beyond the budget keep their fused score and order and follow
 * the reranked prefix.
 */

import type { TextGenerator } from '../llm/text-generator.js';
import type { RankedResult, RerankStats } from './types.js';
import { mapWithConcurrency, settle } from '../utils/async.js';
import { RetrievalError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('reranker');

export const DEFAULT_RERANK_BUDGET = 30;
export const DEFAULT_RERANK_CONCURRENCY = 5;
export const DEFAULT_MAX_DOCUMENT_CHARS = 2000;

/** Score given to a candidate whose judgment failed or was unreadable. */
export const NEUTRAL_SCORE = 0.5;

export const RERANK_PROMPT = `You are a relevance judge. Given a query and a document, determine if the document is relevant.

Query: {query}

Document:
{document}

Is this document relevant to the query? Answer with only YES or NO.`;

/**
 * Parse outcome of a judgment response.
 */
export type JudgmentParse = { kind: 'parsed'; score: number } | { kind: 'unparseable'; raw: string };

const LEADING_NUMBER = /^\d+(?:\.\d+)?/;

/**
 * Parse a relevance judgment.
 *
 * `YES…` is 1 and `NO…` is 0. A leading number in [0, 1] is taken as is;
 * one in (1, 10] is read as a 10-point score.
 */
export function parseJudgment(response: string): JudgmentParse {
  const text = response.trim();
  const upper = text.toUpperCase();

  if (upper.startsWith('YES')) return { kind: 'parsed', score: 1 };
  if (upper.startsWith('NO')) return { kind: 'parsed', score: 0 };

  const match = LEADING_NUMBER.exec(text);
  if (match) {
    const value = Number(match[0]);
    if (value <= 1) return { kind: 'parsed', score: value };
    if (value <= 10) return { kind: 'parsed', score: value / 10 };
  }

  return { kind: 'unparseable', raw: text.slice(0, 80) };
}

/**
 * Blend weights for a candidate at 0-based pre-rerank `rank`.
 */
export function blendWeights(rank: number): { fused: number; rerank: number } {
  if (rank <= 2) return { fused: 0.75, rerank: 0.25 };
  if (rank <= 9) return { fused: 0.6, rerank: 0.4 };
  return { fused: 0.4, rerank: 0.6 };
}

/**
 * Position-aware blend of a fused score and a rerank score.
 */
export function blendScore(fusedScore: number, rerankScore: number, rank: number): number {
  const w = blendWeights(rank);
  return w.fused * fusedScore + w.rerank * rerankScore;
}

/**
 * Render the judgment prompt for one candidate.
 */
export function buildJudgmentPrompt(query: string, document: string): string {
  return RERANK_PROMPT.replace('{query}', query).replace('{document}', document);
}

export interface RerankerOptions {
  generator: TextGenerator;
  model: string;
  /** Timeout of each judgment */
  timeoutMs: number;
  /** Judgments in flight at once (default: 5) */
  concurrency?: number;
  /** Document characters included in a prompt (default: 2000) */
  maxDocumentChars?: number;
}

export interface RerankOptions {
  /** Candidates judged (default: 30) */
  budget?: number;
  signal?: AbortSignal;
}

export interface RerankResult {
  results: RankedResult[];
  stats: RerankStats;
}

export class Reranker {
  private readonly concurrency: number;
  private readonly maxDocumentChars: number;

  constructor(private readonly options: RerankerOptions) {
    this.concurrency = options.concurrency ?? DEFAULT_RERANK_CONCURRENCY;
    this.maxDocumentChars = options.maxDocumentChars ?? DEFAULT_MAX_DOCUMENT_CHARS;
  }

  /**
   * Judge and reorder the top `budget` candidates.
   *
   * `candidates` must be in fused order; a candidate's index is its pre-rerank rank.
   *
   * @throws RetrievalError with code CANCELLED when `signal` aborts
   */
  async rerank(
    query: string,
    candidates: readonly RankedResult[],
    options: RerankOptions = {},
  ): Promise<RerankResult> {
    const budget = Math.max(0, Math.min(options.budget ?? DEFAULT_RERANK_BUDGET, candidates.length));
    const prefix = candidates.slice(0, budget);
    const remainder = candidates.slice(budget);
    const stats: RerankStats = { judged: prefix.length, failed: 0, unparseable: 0 };

    const scores = await mapWithConcurrency(prefix, this.concurrency, async (candidate) => {
      const outcome = await this.judge(query, candidate, options.signal);
      if (outcome.kind === 'failed') {
        stats.failed++;
        return NEUTRAL_SCORE;
      }
      if (outcome.kind === 'unparseable') {
        stats.unparseable++;
        log.debug('Unparseable judgment', { docRef: candidate.docRef, response: outcome.raw });
        return NEUTRAL_SCORE;
      }
      return outcome.score;
    });

    if (options.signal?.aborted) {
      throw new RetrievalError('Request cancelled during reranking', 'CANCELLED');
    }

    const reranked = prefix
      .map((candidate, rank) => ({
        candidate: {
          ...candidate,
          rerankScore: scores[rank],
          finalScore: blendScore(candidate.fusedScore, scores[rank], rank),
        },
        rank,
      }))
      .sort((a, b) => b.candidate.finalScore - a.candidate.finalScore || a.rank - b.rank)
      .map(({ candidate }) => candidate);

    if (stats.failed > 0) {
      log.warn('Some relevance judgments failed; scored as neutral', {
        failed: stats.failed,
        judged: stats.judged,
      });
    }

    return { results: [...reranked, ...remainder], stats };
  }

  private async judge(
    query: string,
    candidate: RankedResult,
    signal: AbortSignal | undefined,
  ): Promise<JudgmentParse | { kind: 'failed' }> {
    const { generator, model, timeoutMs } = this.options;
    const document = (candidate.content ?? candidate.snippet ?? candidate.metadata?.title ?? '').slice(
      0,
      this.maxDocumentChars,
    );

    const outcome = await settle(
      (callSignal) =>
        generator.generate(buildJudgmentPrompt(query, document), {
          model,
          timeoutMs,
          signal: callSignal,
          temperature: 0,
          maxTokens: 10,
        }),
      timeoutMs,
      signal,
    );

    if (outcome.status !== 'fulfilled') {
      if (outcome.status === 'rejected') {
        log.debug('Judgment failed', { docRef: candidate.docRef, error: outcome.error.message });
      }
      return { kind: 'failed' };
    }
    return parseJudgment(outcome.value);
  }
}
