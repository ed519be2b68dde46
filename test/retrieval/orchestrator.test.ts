/**
 * Tests for the retrieval orchestrator: mode dispatch, failure isolation,
 * query-mode expansion and reranking, cancellation.
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import {
  RetrievalOrchestrator,
  listMultiplicity,
  summarizeBackend,
  type OrchestratorSettings,
} from '../../src/retrieval/orchestrator.js';
import type { KeywordSearch, VectorSearch } from '../../src/retrieval/backends.js';
import { QueryExpander } from '../../src/retrieval/query-expander.js';
import { Reranker } from '../../src/retrieval/reranker.js';
import type { QueryVariant, RetrievalHit } from '../../src/retrieval/types.js';
import { DEFAULT_CONFIG } from '../../src/config/retrieval-config.js';
import { BackendError, RetrievalError } from '../../src/utils/errors.js';
import { setTimeout as sleep } from 'node:timers/promises';
import { createFakeGenerator, createHit, untilAborted, type FakeGenerator } from './test-utils.js';

type SearchFn = KeywordSearch['search'];

interface FakeSearch extends KeywordSearch, VectorSearch {
  search: Mock<SearchFn>;
}

function fakeSearch(impl: SearchFn): FakeSearch {
  return { search: vi.fn(impl) };
}

/** Returns hits for docRefs in order, with content naming each doc. */
function returning(docRefs: string[], backend: 'keyword' | 'vector'): FakeSearch {
  return fakeSearch(async () =>
    docRefs.map((docRef, rank) => createHit(docRef, rank, backend, { content: `${docRef} content` })),
  );
}

function failing(message = 'index offline'): FakeSearch {
  return fakeSearch(async () => {
    throw new BackendError(message, 'BACKEND_UNAVAILABLE');
  });
}

const SETTINGS: OrchestratorSettings = {
  ...DEFAULT_CONFIG,
  fusion: { k: 60, topRankBonus: false },
};

function withTimeouts(timeouts: Partial<OrchestratorSettings['timeouts']>): OrchestratorSettings {
  return { ...SETTINGS, timeouts: { ...SETTINGS.timeouts, ...timeouts } };
}

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('orchestrator', () => {
  describe('listMultiplicity', () => {
    const original: QueryVariant = { text: 'q', weight: 1, origin: 'original', index: 0 };
    const expanded: QueryVariant = { text: 'alt', weight: 0.5, origin: 'expanded', index: 1 };

    it('counts every list once for a single variant', () => {
      expect(listMultiplicity(original, 1, 2)).toBe(1);
    });

    it('weights variants by multiplicity', () => {
      expect(listMultiplicity(original, 3, 2)).toBe(2);
      expect(listMultiplicity(expanded, 3, 2)).toBe(1);
      expect(listMultiplicity(expanded, 3, 4)).toBe(2);
    });

    it('counts a low-weight variant at least once', () => {
      expect(listMultiplicity({ ...expanded, weight: 0.1 }, 2, 1)).toBe(1);
    });
  });

  describe('summarizeBackend', () => {
    const ok = { status: 'fulfilled' as const, value: [createHit('a', 0)], durationMs: 1 };
    const timeout = { status: 'timeout' as const, durationMs: 5 };
    const rejected = { status: 'rejected' as const, error: new Error('x'), durationMs: 1 };

    it('reports ok, partial, timeout, and unavailable', () => {
      expect(summarizeBackend([ok, ok])).toEqual({
        status: 'ok',
        available: true,
        calls: 2,
        failures: 0,
        timeouts: 0,
        hits: 2,
      });
      expect(summarizeBackend([ok, timeout]).status).toBe('partial');
      expect(summarizeBackend([timeout, timeout]).status).toBe('timeout');
      expect(summarizeBackend([timeout, rejected])).toEqual({
        status: 'unavailable',
        available: false,
        calls: 2,
        failures: 2,
        timeouts: 1,
        hits: 0,
      });
    });

    it('marks a backend unavailable only when no call succeeded', () => {
      expect(summarizeBackend([ok, timeout]).available).toBe(true);
      expect(summarizeBackend([timeout, timeout]).available).toBe(false);
    });
  });

  describe('hybrid mode', () => {
    it('fuses keyword and vector lists by rank', async () => {
      const orchestrator = new RetrievalOrchestrator({
        keyword: returning(['A', 'B', 'C'], 'keyword'),
        vector: returning(['B', 'D', 'A'], 'vector'),
        settings: SETTINGS,
      });

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'roadmap' });

      expect(results.map((r) => r.docRef)).toEqual(['B', 'A', 'D', 'C']);
      expect(results[0].finalScore).toBeCloseTo(1 / 62 + 1 / 61, 12);
      expect(results[0].backends).toEqual(['keyword', 'vector']);
      expect(diagnostics.mode).toBe('hybrid');
      expect(diagnostics.listsFused).toBe(2);
      expect(diagnostics.candidates).toBe(4);
      expect(diagnostics.expansion).toBe('skipped');
      expect(diagnostics.rerank).toBeUndefined();
      expect(diagnostics.backends.keyword?.status).toBe('ok');
      expect(diagnostics.backends.vector?.hits).toBe(3);
    });

    it('requests candidateLimit hits from each backend and truncates to limit', async () => {
      const keyword = returning(['A', 'B', 'C'], 'keyword');
      const vector = returning(['D'], 'vector');
      const orchestrator = new RetrievalOrchestrator({ keyword, vector, settings: SETTINGS });

      const { results } = await orchestrator.retrieve({ text: 'q', limit: 2, filters: { vault: 'work' } });

      expect(results).toHaveLength(2);
      expect(keyword.search).toHaveBeenCalledWith('q', { vault: 'work' }, 30, expect.anything());
      expect(vector.search).toHaveBeenCalledWith('q', { vault: 'work' }, 30, expect.anything());
    });

    it('applies the top-rank bonus when configured', async () => {
      const orchestrator = new RetrievalOrchestrator({
        keyword: returning(['A'], 'keyword'),
        vector: returning([], 'vector'),
        settings: { ...SETTINGS, fusion: { k: 60, topRankBonus: true } },
      });

      const { results } = await orchestrator.retrieve({ text: 'q' });

      expect(results[0].fusedScore).toBeCloseTo(1 / 61 + 0.05, 12);
    });

    it('returns the same ranking whichever backend answers first', async () => {
      const run = async (keywordDelay: number, vectorDelay: number) => {
        const orchestrator = new RetrievalOrchestrator({
          keyword: fakeSearch(async () => {
            await sleep(keywordDelay);
            return [createHit('A', 0), createHit('B', 1), createHit('C', 2)];
          }),
          vector: fakeSearch(async () => {
            await sleep(vectorDelay);
            return [createHit('C', 0, 'vector'), createHit('A', 1, 'vector'), createHit('B', 2, 'vector')];
          }),
          settings: SETTINGS,
        });
        return (await orchestrator.retrieve({ text: 'q' })).results;
      };

      expect(await run(15, 0)).toEqual(await run(0, 15));
    });

    it('returns an empty result when every backend finds nothing', async () => {
      const orchestrator = new RetrievalOrchestrator({
        keyword: returning([], 'keyword'),
        vector: returning([], 'vector'),
        settings: SETTINGS,
      });

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'nothing matches' });

      expect(results).toEqual([]);
      expect(diagnostics.backends.keyword?.status).toBe('ok');
      expect(diagnostics.backends.vector?.status).toBe('ok');
    });
  });

  describe('single-backend modes', () => {
    it('bm25 calls only the keyword backend and keeps raw scores', async () => {
      const keyword = fakeSearch(async () => [
        createHit('A', 0, 'keyword', { score: 12.5 }),
        createHit('B', 1, 'keyword', { score: 3.25 }),
      ]);
      const vector = returning(['X'], 'vector');
      const orchestrator = new RetrievalOrchestrator({ keyword, vector, settings: SETTINGS });

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'q', mode: 'bm25', limit: 5 });

      expect(results.map((r) => [r.docRef, r.finalScore])).toEqual([
        ['A', 12.5],
        ['B', 3.25],
      ]);
      expect(keyword.search).toHaveBeenCalledWith('q', {}, 5, expect.anything());
      expect(vector.search).not.toHaveBeenCalled();
      expect(diagnostics.listsFused).toBe(0);
      expect(diagnostics.backends.vector).toBeUndefined();
    });

    it('vector calls only the vector backend', async () => {
      const keyword = returning(['A'], 'keyword');
      const vector = fakeSearch(async () => [createHit('V', 0, 'vector', { score: 0.91 })]);
      const orchestrator = new RetrievalOrchestrator({ keyword, vector, settings: SETTINGS });

      const { results } = await orchestrator.retrieve({ text: 'q', mode: 'vector' });

      expect(results.map((r) => [r.docRef, r.finalScore, r.backends])).toEqual([['V', 0.91, ['vector']]]);
      expect(keyword.search).not.toHaveBeenCalled();
    });

    it('fails when the only backend fails', async () => {
      const orchestrator = new RetrievalOrchestrator({
        keyword: failing(),
        vector: returning(['X'], 'vector'),
        settings: SETTINGS,
      });

      const error = await catchError(orchestrator.retrieve({ text: 'q', mode: 'bm25' }));

      expect(error).toMatchObject({
        code: 'ALL_BACKENDS_FAILED',
        message: 'All backend calls failed (keyword: unavailable)',
      });
    });
  });

  describe('failure isolation', () => {
    it('returns keyword results when vector search times out', async () => {
      const orchestrator = new RetrievalOrchestrator({
        keyword: returning(['A', 'B'], 'keyword'),
        vector: fakeSearch((_text, _filters, _limit, options) => untilAborted(options?.signal)),
        settings: withTimeouts({ vectorMs: 20 }),
      });

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'q' });

      expect(results.map((r) => r.docRef)).toEqual(['A', 'B']);
      expect(diagnostics.backends.vector).toEqual({
        status: 'timeout',
        available: false,
        calls: 1,
        failures: 1,
        timeouts: 1,
        hits: 0,
      });
      expect(diagnostics.backends.keyword?.status).toBe('ok');
    });

    it('returns vector results when keyword search is unavailable', async () => {
      const orchestrator = new RetrievalOrchestrator({
        keyword: failing(),
        vector: returning(['V1', 'V2'], 'vector'),
        settings: SETTINGS,
      });

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'q' });

      expect(results.map((r) => r.docRef)).toEqual(['V1', 'V2']);
      expect(diagnostics.backends.keyword?.status).toBe('unavailable');
    });

    it('fails with ALL_BACKENDS_FAILED when both backends are unavailable', async () => {
      const orchestrator = new RetrievalOrchestrator({
        keyword: failing('fts offline'),
        vector: failing('vectors offline'),
        settings: SETTINGS,
      });

      const error = await catchError(orchestrator.retrieve({ text: 'q' }));

      expect(error).toBeInstanceOf(RetrievalError);
      expect(error).toMatchObject({
        code: 'ALL_BACKENDS_FAILED',
        message: 'All backend calls failed (keyword: unavailable, vector: unavailable)',
      });
      if (error instanceof RetrievalError) {
        expect(error.cause?.message).toBe('fts offline');
      }
    });

    it('reports timeouts in the failure message', async () => {
      const hang: SearchFn = (_text, _filters, _limit, options) => untilAborted(options?.signal);
      const orchestrator = new RetrievalOrchestrator({
        keyword: fakeSearch(hang),
        vector: failing(),
        settings: withTimeouts({ keywordMs: 20 }),
      });

      const error = await catchError(orchestrator.retrieve({ text: 'q' }));

      expect(error).toMatchObject({
        message: 'All backend calls failed (keyword: timeout, vector: unavailable)',
      });
    });
  });

  describe('validation and cancellation', () => {
    it('rejects an invalid query before any backend call', async () => {
      const keyword = returning(['A'], 'keyword');
      const vector = returning(['B'], 'vector');
      const orchestrator = new RetrievalOrchestrator({ keyword, vector, settings: SETTINGS });

      await expect(orchestrator.retrieve({ text: '  ' })).rejects.toMatchObject({ code: 'INVALID_QUERY' });
      await expect(orchestrator.retrieve({ text: 'q', mode: 'fuzzy' })).rejects.toMatchObject({
        code: 'INVALID_QUERY',
      });
      expect(keyword.search).not.toHaveBeenCalled();
      expect(vector.search).not.toHaveBeenCalled();
    });

    it('throws CANCELLED for an already-aborted signal', async () => {
      const keyword = returning(['A'], 'keyword');
      const controller = new AbortController();
      controller.abort();
      const orchestrator = new RetrievalOrchestrator({ keyword, vector: returning([], 'vector'), settings: SETTINGS });

      await expect(orchestrator.retrieve({ text: 'q' }, { signal: controller.signal })).rejects.toMatchObject({
        code: 'CANCELLED',
      });
      expect(keyword.search).not.toHaveBeenCalled();
    });

    it('throws CANCELLED when aborted during retrieval', async () => {
      const controller = new AbortController();
      const orchestrator = new RetrievalOrchestrator({
        keyword: fakeSearch((_text, _filters, _limit, options) => {
          controller.abort();
          return untilAborted(options?.signal);
        }),
        vector: fakeSearch((_text, _filters, _limit, options) => untilAborted(options?.signal)),
        settings: SETTINGS,
      });

      await expect(orchestrator.retrieve({ text: 'q' }, { signal: controller.signal })).rejects.toMatchObject({
        code: 'CANCELLED',
      });
    });
  });

  describe('query mode', () => {
    /** Expansion prompts get two phrasings; judgments say YES only for doc C. */
    function queryGenerator(): FakeGenerator {
      return createFakeGenerator(async (prompt) => {
        if (prompt.includes('alternative search queries')) return 'alt one\nalt two';
        return prompt.includes('C content') ? 'YES' : 'NO';
      });
    }

    function queryOrchestrator(generator: FakeGenerator, keyword: FakeSearch, vector: FakeSearch) {
      return new RetrievalOrchestrator({
        keyword,
        vector,
        expander: new QueryExpander({ generator, model: 'm', timeoutMs: 1000 }),
        reranker: new Reranker({ generator, model: 'm', timeoutMs: 1000 }),
        settings: SETTINGS,
      });
    }

    it('searches every variant and weights the original twice', async () => {
      const keyword = returning(['A', 'B'], 'keyword');
      const vector = returning(['B', 'C'], 'vector');
      const orchestrator = queryOrchestrator(queryGenerator(), keyword, vector);

      const { diagnostics } = await orchestrator.retrieve({ text: 'q', mode: 'query' });

      expect(keyword.search.mock.calls.map(([text]) => text)).toEqual(['q', 'alt one', 'alt two']);
      expect(vector.search).toHaveBeenCalledTimes(3);
      expect(diagnostics.variants.map((v) => [v.text, v.weight])).toEqual([
        ['q', 1],
        ['alt one', 0.5],
        ['alt two', 0.5],
      ]);
      // original: 2 backends x 2, each expanded variant: 2 backends x 1
      expect(diagnostics.listsFused).toBe(8);
      expect(diagnostics.expansion).toBe('ok');
      expect(diagnostics.backends.keyword?.calls).toBe(3);
    });

    it('normalizes fused scores and reranks the candidates', async () => {
      const orchestrator = queryOrchestrator(
        queryGenerator(),
        returning(['A', 'B'], 'keyword'),
        returning(['B', 'C'], 'vector'),
      );

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'q', mode: 'query' });

      // Normalized fused: B 1, A 1/62, C 0. Blended: B 0.75, C 0.25, A 0.75/62
      expect(results.map((r) => r.docRef)).toEqual(['B', 'C', 'A']);
      expect(results[0].fusedScore).toBe(1);
      expect(results[0].finalScore).toBeCloseTo(0.75, 12);
      expect(results[1].rerankScore).toBe(1);
      expect(results[1].finalScore).toBeCloseTo(0.25, 12);
      expect(results[2].finalScore).toBeCloseTo(0.75 / 62, 12);
      expect(diagnostics.rerank).toEqual({ judged: 3, failed: 0, unparseable: 0 });
    });

    it('still answers when expansion fails', async () => {
      const generator = createFakeGenerator(async (prompt) => {
        if (prompt.includes('alternative search queries')) throw new Error('model missing');
        return 'YES';
      });
      const keyword = returning(['A'], 'keyword');
      const orchestrator = queryOrchestrator(generator, keyword, returning(['B'], 'vector'));

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'q', mode: 'query' });

      expect(diagnostics.expansion).toBe('degraded');
      expect(diagnostics.variants).toHaveLength(1);
      expect(diagnostics.listsFused).toBe(2);
      expect(keyword.search).toHaveBeenCalledTimes(1);
      expect(results.map((r) => r.docRef)).toEqual(['A', 'B']);
    });

    it('runs as hybrid without an expander or reranker', async () => {
      const orchestrator = new RetrievalOrchestrator({
        keyword: returning(['A', 'B', 'C'], 'keyword'),
        vector: returning(['B', 'D', 'A'], 'vector'),
        settings: SETTINGS,
      });

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'q', mode: 'query' });

      expect(orchestrator.effectiveMode('query')).toBe('hybrid');
      expect(diagnostics.requestedMode).toBe('query');
      expect(diagnostics.mode).toBe('hybrid');
      expect(results.map((r) => r.docRef)).toEqual(['B', 'A', 'D', 'C']);
      expect(results[0].fusedScore).toBeCloseTo(1 / 62 + 1 / 61, 12);
    });

    it('reranks without expansion when only a reranker is configured', async () => {
      const generator = createFakeGenerator(async () => 'NO');
      const keyword = returning(['A', 'B'], 'keyword');
      const orchestrator = new RetrievalOrchestrator({
        keyword,
        vector: returning([], 'vector'),
        reranker: new Reranker({ generator, model: 'm', timeoutMs: 1000 }),
        settings: SETTINGS,
      });

      const { results, diagnostics } = await orchestrator.retrieve({ text: 'q', mode: 'query' });

      expect(diagnostics.mode).toBe('query');
      expect(diagnostics.expansion).toBe('skipped');
      expect(keyword.search).toHaveBeenCalledTimes(1);
      expect(results.map((r) => [r.docRef, r.finalScore])).toEqual([
        ['A', 0.75],
        ['B', 0],
      ]);
    });

    it('leaves fused scores raw when normalization is off', async () => {
      const generator = createFakeGenerator(async () => 'NO');
      const orchestrator = new RetrievalOrchestrator({
        keyword: returning(['A'], 'keyword'),
        vector: returning([], 'vector'),
        reranker: new Reranker({ generator, model: 'm', timeoutMs: 1000 }),
        settings: { ...SETTINGS, normalizeBeforeRerank: false },
      });

      const { results } = await orchestrator.retrieve({ text: 'q', mode: 'query' });

      expect(results[0].fusedScore).toBeCloseTo(1 / 61, 12);
      expect(results[0].finalScore).toBeCloseTo(0.75 / 61, 12);
    });
  });
});
