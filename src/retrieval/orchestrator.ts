/**
 * End-to-end retrieval: mode dispatch, fan-out/fan-in, fusion, reranking.
 *
 * Each request runs in stages. Every backend call of a stage is issued at
 * once, each with its own timeout, and the stage waits for all of them to
 * settle before fusing, so arrival order never changes a ranking. A failed
 * or timed-out call only removes its own list; the request fails only when
 * every backend call of the retrieval stage failed.
 *
 * ```
 * bm25 / vector   query ─► one backend ───────────────────────────► limit
 * hybrid          query ─► keyword ┐
 *                        ─► vector  ┴► fuse ───────────────────────► limit
 * query           query ─► expand ─► (keyword, vector) × variants
 *                        ─► fuse ─► normalize ─► rerank top slice ─► limit
 * ```
 */

import { DEFAULT_CONFIG, type RetrievalConfig } from '../config/retrieval-config.js';
import { rankHits, type KeywordSearch, type VectorSearch } from './backends.js';
import { createQuery, type QueryInput } from './query.js';
import type { QueryExpander } from './query-expander.js';
import type { Reranker } from './reranker.js';
import { fuseRRF, normalizeScores } from './rrf.js';
import type {
  BackendDiagnostics,
  BackendName,
  ExpansionStatus,
  Query,
  QueryVariant,
  RankedResult,
  RerankStats,
  RetrievalDiagnostics,
  RetrievalHit,
  RetrievalMode,
  RetrievalResponse,
  RetrieveOptions,
  StageTimings,
} from './types.js';
import { settle, type Settled } from '../utils/async.js';
import { RetrievalError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orchestrator');

export type OrchestratorSettings = Pick<
  RetrievalConfig,
  | 'fusion'
  | 'candidateLimit'
  | 'variantCount'
  | 'originalQueryMultiplicity'
  | 'normalizeBeforeRerank'
  | 'rerank'
  | 'timeouts'
>;

export interface RetrievalOrchestratorDeps {
  keyword: KeywordSearch;
  vector: VectorSearch;
  /** Enables expansion in `query` mode */
  expander?: QueryExpander;
  /** Enables reranking in `query` mode */
  reranker?: Reranker;
  /** Defaults to DEFAULT_CONFIG */
  settings?: OrchestratorSettings;
}

/** One backend call of the retrieval stage. */
interface BackendCall {
  variant: QueryVariant;
  backend: BackendName;
  outcome: Settled<RetrievalHit[]>;
}

interface RetrievalStage {
  /** Canonical lists in (variant, backend) order; failed calls give [] */
  lists: Array<{ variant: QueryVariant; backend: BackendName; hits: RetrievalHit[] }>;
  backends: Partial<Record<BackendName, BackendDiagnostics>>;
}

/**
 * Summarize the calls made to one backend.
 */
export function summarizeBackend(outcomes: ReadonlyArray<Settled<RetrievalHit[]>>): BackendDiagnostics {
  let failures = 0;
  let timeouts = 0;
  let hits = 0;

  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') {
      hits += outcome.value.length;
    } else {
      failures++;
      if (outcome.status === 'timeout') timeouts++;
    }
  }

  const calls = outcomes.length;
  let status: BackendDiagnostics['status'] = 'ok';
  if (failures === calls && calls > 0) {
    status = timeouts === failures ? 'timeout' : 'unavailable';
  } else if (failures > 0) {
    status = 'partial';
  }

  const available = status === 'ok' || status === 'partial';
  return { status, available, calls, failures, timeouts, hits };
}

/**
 * Times each variant's lists are counted in fusion.
 *
 * With a single variant every list counts once. Otherwise a variant counts
 * `round(weight × multiplicity)` times, at least once.
 */
export function listMultiplicity(variant: QueryVariant, variantCount: number, multiplicity: number): number {
  if (variantCount <= 1) return 1;
  return Math.max(1, Math.round(variant.weight * multiplicity));
}

function elapsed(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

/**
 * Turn a single backend list into results, keeping raw scores.
 */
function hitsToResults(hits: readonly RetrievalHit[]): RankedResult[] {
  return hits.map((hit) => {
    const result: RankedResult = {
      docRef: hit.docRef,
      fusedScore: hit.score,
      fusedRank: hit.rank,
      finalScore: hit.score,
      backends: [hit.backend],
      appearances: 1,
    };
    if (hit.snippet !== undefined) result.snippet = hit.snippet;
    if (hit.content !== undefined) result.content = hit.content;
    if (hit.metadata !== undefined) result.metadata = hit.metadata;
    return result;
  });
}

export class RetrievalOrchestrator {
  private readonly settings: OrchestratorSettings;

  constructor(private readonly deps: RetrievalOrchestratorDeps) {
    this.settings = deps.settings ?? DEFAULT_CONFIG;
  }

  /**
   * Mode the orchestrator will actually run for `requested`.
   *
   * `query` without an expander or a reranker runs as `hybrid`.
   */
  effectiveMode(requested: RetrievalMode): RetrievalMode {
    if (requested === 'query' && !this.deps.expander && !this.deps.reranker) {
      return 'hybrid';
    }
    return requested;
  }

  /**
   * Retrieve ranked results for a query.
   *
   * @throws RetrievalError INVALID_QUERY before any backend call,
   *   ALL_BACKENDS_FAILED when no backend call succeeded,
   *   CANCELLED when `signal` aborts
   */
  async retrieve(input: Query | QueryInput, options: RetrieveOptions = {}): Promise<RetrievalResponse> {
    const query = createQuery(input);
    const { signal } = options;
    const startTime = performance.now();

    if (signal?.aborted) {
      throw new RetrievalError('Request cancelled before retrieval', 'CANCELLED');
    }

    const mode = this.effectiveMode(query.mode);
    if (mode !== query.mode) {
      log.info(`Mode ${query.mode} degraded to ${mode}: no expander or reranker configured`);
    }

    const timings: StageTimings = { expansionMs: 0, retrievalMs: 0, fusionMs: 0, rerankMs: 0, totalMs: 0 };
    const original: QueryVariant = { text: query.text, weight: 1.0, origin: 'original', index: 0 };

    // Expansion
    let variants: QueryVariant[] = [original];
    let expansion: ExpansionStatus = 'skipped';
    if (mode === 'query' && this.deps.expander) {
      const stageStart = performance.now();
      const expanded = await this.deps.expander.expandDetailed(query.text, this.settings.variantCount, {
        signal,
      });
      variants = expanded.variants;
      expansion = expanded.status;
      timings.expansionMs = elapsed(stageStart);
    }

    // Retrieval
    const backends: BackendName[] =
      mode === 'bm25' ? ['keyword'] : mode === 'vector' ? ['vector'] : ['keyword', 'vector'];
    const depth =
      mode === 'bm25' || mode === 'vector'
        ? query.limit
        : Math.max(this.settings.candidateLimit, query.limit);

    let stageStart = performance.now();
    const stage = await this.runRetrievalStage(query, variants, backends, depth, signal);
    timings.retrievalMs = elapsed(stageStart);

    // Fusion
    stageStart = performance.now();
    let results: RankedResult[];
    let listsFused = 0;
    if (mode === 'bm25' || mode === 'vector') {
      results = hitsToResults(stage.lists[0]?.hits ?? []);
    } else {
      const fusionLists: RetrievalHit[][] = [];
      for (const { variant, hits } of stage.lists) {
        const times = listMultiplicity(variant, variants.length, this.settings.originalQueryMultiplicity);
        for (let i = 0; i < times; i++) fusionLists.push(hits);
      }
      listsFused = fusionLists.length;
      results = fuseRRF(fusionLists, this.settings.fusion);
    }
    const candidates = results.length;
    timings.fusionMs = elapsed(stageStart);

    // Rerank
    let rerank: RerankStats | undefined;
    if (mode === 'query') {
      if (this.settings.normalizeBeforeRerank) {
        results = normalizeScores(results);
      }
      if (this.deps.reranker && results.length > 0) {
        stageStart = performance.now();
        const reranked = await this.deps.reranker.rerank(query.text, results, {
          budget: this.settings.rerank.budget,
          signal,
        });
        results = reranked.results;
        rerank = reranked.stats;
        timings.rerankMs = elapsed(stageStart);
      }
    }

    results = results.slice(0, query.limit);
    timings.totalMs = elapsed(startTime);

    const diagnostics: RetrievalDiagnostics = {
      requestedMode: query.mode,
      mode,
      timings,
      backends: stage.backends,
      variants,
      listsFused,
      candidates,
      expansion,
    };
    if (rerank) diagnostics.rerank = rerank;

    log.debug('Retrieval complete', {
      mode,
      results: results.length,
      candidates,
      totalMs: timings.totalMs,
    });

    return { results, diagnostics };
  }

  private async runRetrievalStage(
    query: Query,
    variants: readonly QueryVariant[],
    backends: readonly BackendName[],
    depth: number,
    signal: AbortSignal | undefined,
  ): Promise<RetrievalStage> {
    const pending: Array<Promise<BackendCall>> = [];

    for (const variant of variants) {
      for (const backend of backends) {
        const search = backend === 'keyword' ? this.deps.keyword : this.deps.vector;
        const timeoutMs =
          backend === 'keyword' ? this.settings.timeouts.keywordMs : this.settings.timeouts.vectorMs;

        pending.push(
          settle(
            (callSignal) => search.search(variant.text, query.filters, depth, { signal: callSignal }),
            timeoutMs,
            signal,
          ).then((outcome) => ({ variant, backend, outcome })),
        );
      }
    }

    const calls = await Promise.all(pending);

    if (signal?.aborted || calls.some((c) => c.outcome.status === 'cancelled')) {
      throw new RetrievalError('Request cancelled during retrieval', 'CANCELLED');
    }

    const diagnostics: Partial<Record<BackendName, BackendDiagnostics>> = {};
    for (const backend of backends) {
      const summary = summarizeBackend(calls.filter((c) => c.backend === backend).map((c) => c.outcome));
      diagnostics[backend] = summary;
      if (summary.status !== 'ok') {
        log.warn(`Backend ${backend} ${summary.status}`, {
          failures: summary.failures,
          calls: summary.calls,
        });
      }
    }

    const failed = calls.filter((c) => c.outcome.status !== 'fulfilled');
    for (const call of failed) {
      if (call.outcome.status === 'rejected') {
        log.debug(`Backend ${call.backend} call failed`, {
          variant: call.variant.index,
          error: call.outcome.error.message,
        });
      }
    }

    if (calls.length > 0 && failed.length === calls.length) {
      const firstFailure = failed
        .map((c) => c.outcome)
        .find((o): o is Extract<Settled<RetrievalHit[]>, { status: 'rejected' }> => o.status === 'rejected');
      const summary = backends.map((b) => `${b}: ${diagnostics[b]?.status ?? 'unknown'}`).join(', ');
      throw new RetrievalError(
        `All backend calls failed (${summary})`,
        'ALL_BACKENDS_FAILED',
        firstFailure?.error,
      );
    }

    const lists = calls.map(({ variant, backend, outcome }) => ({
      variant,
      backend,
      hits: outcome.status === 'fulfilled' ? rankHits(outcome.value, backend, variant.index) : [],
    }));

    return { lists, backends: diagnostics };
  }
}
