/**
 * Tests for Reciprocal Rank Fusion (RRF).
 */

import { describe, it, expect } from 'vitest';
import {
  fuseRRF,
  normalizeScores,
  rrfContribution,
  compareDocRefs,
  DEFAULT_K,
} from '../../src/retrieval/rrf.js';
import { ConfigError } from '../../src/utils/errors.js';
import { createHit, createList, createMetadata, createResult } from './test-utils.js';

describe('rrf', () => {
  describe('rrfContribution', () => {
    it('is 1/(k + rank + 1)', () => {
      expect(DEFAULT_K).toBe(60);
      expect(rrfContribution(0)).toBe(1 / 61);
      expect(rrfContribution(4, 10)).toBe(1 / 15);
    });

    it('adds the top-rank bonus by position', () => {
      expect(rrfContribution(0, 60, true)).toBeCloseTo(1 / 61 + 0.05, 12);
      expect(rrfContribution(1, 60, true)).toBeCloseTo(1 / 62 + 0.02, 12);
      expect(rrfContribution(2, 60, true)).toBeCloseTo(1 / 63 + 0.02, 12);
      expect(rrfContribution(3, 60, true)).toBe(1 / 64);
    });
  });

  describe('compareDocRefs', () => {
    it('orders lexically', () => {
      expect(compareDocRefs('a.md#0', 'b.md#0')).toBe(-1);
      expect(compareDocRefs('b.md#0', 'a.md#0')).toBe(1);
      expect(compareDocRefs('a.md#0', 'a.md#0')).toBe(0);
    });
  });

  describe('fuseRRF', () => {
    it('returns empty for no lists or only empty lists', () => {
      expect(fuseRRF([])).toEqual([]);
      expect(fuseRRF([[], []])).toEqual([]);
    });

    it('passes a single list through in order', () => {
      const result = fuseRRF([createList(['a', 'b', 'c'], 'vector')]);

      expect(result.map((r) => r.docRef)).toEqual(['a', 'b', 'c']);
      expect(result.map((r) => r.fusedRank)).toEqual([0, 1, 2]);
      expect(result[0].backends).toEqual(['vector']);
      expect(result[0].fusedScore).toBe(1 / 61);
      expect(result[0].finalScore).toBe(result[0].fusedScore);
    });

    it('fuses keyword and vector lists by rank', () => {
      const keyword = createList(['A', 'B', 'C'], 'keyword');
      const vector = createList(['B', 'D', 'A'], 'vector');

      const result = fuseRRF([keyword, vector], { k: 60 });

      expect(result.map((r) => r.docRef)).toEqual(['B', 'A', 'D', 'C']);
      expect(result[0].fusedScore).toBeCloseTo(1 / 62 + 1 / 61, 12);
      expect(result[0].fusedScore).toBeCloseTo(0.032522, 6);
      expect(result[1].fusedScore).toBeCloseTo(1 / 61 + 1 / 63, 12);
      expect(result[1].fusedScore).toBeCloseTo(0.032266, 6);
      expect(result[2].fusedScore).toBeCloseTo(1 / 62, 12);
      expect(result[3].fusedScore).toBeCloseTo(1 / 63, 12);
      expect(result[0].backends).toEqual(['keyword', 'vector']);
      expect(result[0].appearances).toBe(2);
      expect(result[3].backends).toEqual(['keyword']);
    });

    it('ignores raw backend scores', () => {
      const keyword = [
        createHit('x', 0, 'keyword', { score: 0.001 }),
        createHit('y', 1, 'keyword', { score: 999 }),
      ];

      expect(fuseRRF([keyword]).map((r) => r.docRef)).toEqual(['x', 'y']);
    });

    it('breaks score ties by docRef', () => {
      const result = fuseRRF([createList(['zeta'], 'keyword'), createList(['alpha'], 'vector')]);

      expect(result.map((r) => r.docRef)).toEqual(['alpha', 'zeta']);
      expect(result[0].fusedScore).toBe(result[1].fusedScore);
    });

    it('is deterministic', () => {
      const lists = [createList(['a', 'b', 'c', 'd']), createList(['d', 'c', 'e'], 'vector')];

      expect(fuseRRF(lists)).toEqual(fuseRRF(lists));
    });

    it('never ranks a document below one that appears in fewer lists at the same rank', () => {
      const lists = [
        createList(['solo', 'other'], 'keyword'),
        createList(['shared', 'x'], 'vector'),
        createList(['shared', 'y'], 'vector'),
      ];
      // "solo" and "shared" both sit at rank 0; "shared" appears twice
      const result = fuseRRF(lists);

      expect(result[0].docRef).toBe('shared');
      expect(result.findIndex((r) => r.docRef === 'solo')).toBe(1);
    });

    it('counts a list passed twice twice', () => {
      const list = createList(['a']);

      expect(fuseRRF([list, list])[0].fusedScore).toBeCloseTo(2 / 61, 12);
      expect(fuseRRF([list, list])[0].appearances).toBe(2);
    });

    it('adds the bonus per appearance', () => {
      const result = fuseRRF([createList(['a', 'b']), createList(['a'], 'vector')], {
        topRankBonus: true,
      });

      expect(result[0].fusedScore).toBeCloseTo(2 / 61 + 0.1, 12);
      expect(result[1].fusedScore).toBeCloseTo(1 / 62 + 0.02, 12);
    });

    it('keeps the first payload seen', () => {
      const metadata = createMetadata({ title: 'From vector' });
      const keyword = [createHit('a', 0, 'keyword')];
      const vector = [createHit('a', 0, 'vector', { snippet: 'vector snippet', metadata })];
      const again = [createHit('a', 0, 'keyword', { snippet: 'later snippet' })];

      const [result] = fuseRRF([keyword, vector, again]);

      expect(result.snippet).toBe('vector snippet');
      expect(result.metadata?.title).toBe('From vector');
      expect(result.content).toBeUndefined();
    });

    it('rejects a non-positive k', () => {
      expect(() => fuseRRF([createList(['a'])], { k: 0 })).toThrow(ConfigError);
      expect(() => fuseRRF([createList(['a'])], { k: 1.5 })).toThrow(ConfigError);
    });
  });

  describe('normalizeScores', () => {
    it('maps the range to [0, 1] without reordering', () => {
      const results = [
        createResult('a', 0, { fusedScore: 0.04 }),
        createResult('b', 1, { fusedScore: 0.03 }),
        createResult('c', 2, { fusedScore: 0.02 }),
      ];

      const normalized = normalizeScores(results);

      expect(normalized.map((r) => r.docRef)).toEqual(['a', 'b', 'c']);
      expect(normalized[0].fusedScore).toBe(1);
      expect(normalized[1].fusedScore).toBeCloseTo(0.5, 12);
      expect(normalized[2].fusedScore).toBe(0);
      expect(normalized[1].finalScore).toBe(normalized[1].fusedScore);
    });

    it('sets equal scores to 1', () => {
      const normalized = normalizeScores([
        createResult('a', 0, { fusedScore: 0.02 }),
        createResult('b', 1, { fusedScore: 0.02 }),
      ]);

      expect(normalized.map((r) => r.fusedScore)).toEqual([1, 1]);
    });

    it('returns empty for empty input', () => {
      expect(normalizeScores([])).toEqual([]);
    });

    it('does not mutate its input', () => {
      const results = [createResult('a', 0, { fusedScore: 0.5 }), createResult('b', 1, { fusedScore: 0.1 })];
      normalizeScores(results);

      expect(results[0].fusedScore).toBe(0.5);
    });
  });
});
