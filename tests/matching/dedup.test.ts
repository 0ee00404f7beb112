/**
 * Tests for Cross-Source Deduplication
 */

import { describe, it, expect } from 'vitest';
import {
  deduplicate,
  normalizeLink,
  normalizeTitle,
  compareDuplicates,
} from '../../src/matching/dedup';
import type { CanonicalRecord } from '../../src/types';

const createRecord = (overrides: Partial<CanonicalRecord> = {}): CanonicalRecord => ({
  title: 'Markups and Inflation',
  link: 'https://example.org/papers/markups',
  summary: '',
  publishedAt: new Date('2026-10-07T00:00:00Z'),
  sourceId: 'alpha',
  sourceLabel: 'Alpha',
  authors: '',
  score: 1,
  matchedKeywords: ['markup'],
  ...overrides,
});

const order = (id: string): number => ['alpha', 'beta', 'gamma'].indexOf(id);

// Every arrangement of a small list
function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]];
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map(rest => [item, ...rest])
  );
}

describe('Deduplication', () => {
  describe('normalizeLink', () => {
    it('should drop tracking parameters and the fragment', () => {
      expect(normalizeLink('https://example.org/paper/42?utm_source=newsletter&utm_medium=email#abstract'))
        .toBe('https://example.org/paper/42');
    });

    it('should keep and sort other parameters', () => {
      expect(normalizeLink('https://example.org/paper?id=42&fbclid=xyz&a=1'))
        .toBe('https://example.org/paper?a=1&id=42');
    });

    it('should lowercase scheme and host but not the path', () => {
      expect(normalizeLink('HTTPS://Example.ORG/Papers/WP-42/')).toBe('https://example.org/Papers/WP-42');
    });

    it('should fall back to the trimmed lowercase text for unparseable links', () => {
      expect(normalizeLink('  Not A URL ')).toBe('not a url');
    });
  });

  describe('normalizeTitle', () => {
    it('should ignore case and whitespace differences', () => {
      expect(normalizeTitle('  Markups   and\nInflation ')).toBe('markups and inflation');
    });
  });

  describe('compareDuplicates', () => {
    it('should prefer the higher score', () => {
      const a = createRecord({ score: 5 });
      const b = createRecord({ score: 3 });

      expect(compareDuplicates(a, b, order)).toBeLessThan(0);
      expect(compareDuplicates(b, a, order)).toBeGreaterThan(0);
    });

    it('should prefer the more recent record on equal scores', () => {
      const newer = createRecord({ publishedAt: new Date('2026-10-09T00:00:00Z') });
      const older = createRecord({ publishedAt: new Date('2026-10-01T00:00:00Z') });
      const undated = createRecord({ publishedAt: undefined });

      expect(compareDuplicates(newer, older, order)).toBeLessThan(0);
      expect(compareDuplicates(older, undated, order)).toBeLessThan(0);
    });

    it('should fall back to source order', () => {
      const fromAlpha = createRecord({ sourceId: 'alpha' });
      const fromBeta = createRecord({ sourceId: 'beta' });

      expect(compareDuplicates(fromBeta, fromAlpha, order)).toBeGreaterThan(0);
    });

    it('should order otherwise identical records by content', () => {
      const a = createRecord({ link: 'https://example.org/a' });
      const b = createRecord({ link: 'https://example.org/b' });

      expect(compareDuplicates(a, b, order)).toBeLessThan(0);
      expect(compareDuplicates(a, a, order)).toBe(0);
    });
  });

  describe('deduplicate', () => {
    it('should merge links that differ only by tracking parameters', () => {
      const result = deduplicate(
        [
          createRecord({ link: 'https://example.org/paper/42?utm_source=newsletter', title: 'Paper 42', score: 3, sourceId: 'alpha' }),
          createRecord({ link: 'https://example.org/paper/42', title: 'Working Paper 42', score: 5, sourceId: 'beta' }),
        ],
        order
      );

      expect(result.records).toHaveLength(1);
      expect(result.records[0].score).toBe(5);
      expect(result.records[0].sourceId).toBe('beta');
      expect(result.duplicateCount).toBe(1);
      expect(result.mergedGroups).toBe(1);
      expect(result.totalProcessed).toBe(2);
    });

    it('should merge records with the same title under different links', () => {
      const result = deduplicate(
        [
          createRecord({ link: 'https://alpha.example.org/markups', sourceId: 'alpha' }),
          createRecord({ link: 'https://beta.example.org/markups', title: 'MARKUPS AND INFLATION', sourceId: 'beta' }),
        ],
        order
      );

      expect(result.records).toHaveLength(1);
      expect(result.records[0].sourceId).toBe('alpha');
    });

    it('should merge transitively through a shared link and a shared title', () => {
      const a = createRecord({ title: 'Title One', link: 'https://example.org/one', score: 1 });
      const b = createRecord({ title: 'Title Two', link: 'https://example.org/one', score: 2 });
      const c = createRecord({ title: 'Title Two', link: 'https://example.org/two', score: 4 });

      const result = deduplicate([a, b, c], order);

      expect(result.records).toEqual([c]);
      expect(result.duplicateCount).toBe(2);
    });

    it('should pick the same winner for every input order', () => {
      const group = [
        createRecord({ link: 'https://example.org/p?utm_campaign=x', score: 2, sourceId: 'gamma' }),
        createRecord({ link: 'https://example.org/p', score: 2, sourceId: 'beta' }),
        createRecord({ link: 'https://example.org/p#top', score: 2, sourceId: 'alpha', publishedAt: undefined }),
      ];

      const winners = permutations(group).map(records => deduplicate(records, order).records);

      for (const records of winners) {
        expect(records).toHaveLength(1);
        expect(records[0].sourceId).toBe('beta');
      }
    });

    it('should break ties between same-source records on the raw link', () => {
      const tracked = createRecord({ link: 'https://example.org/p?utm_source=x' });
      const plain = createRecord({ link: 'https://example.org/p' });

      expect(deduplicate([tracked, plain], order).records).toEqual([plain]);
      expect(deduplicate([plain, tracked], order).records).toEqual([plain]);
    });

    it('should give the same verdict in both directions', () => {
      const a = createRecord({ link: 'https://example.org/x?ref=rss' });
      const b = createRecord({ link: 'https://example.org/x', title: 'Different title' });

      expect(deduplicate([a, b], order).records).toHaveLength(1);
      expect(deduplicate([b, a], order).records).toHaveLength(1);
    });

    it('should keep distinct records in first-seen order', () => {
      const first = createRecord({ title: 'First', link: 'https://example.org/1' });
      const second = createRecord({ title: 'Second', link: 'https://example.org/2' });
      const duplicateOfFirst = createRecord({ title: 'First', link: 'https://example.org/1?utm_source=feed', score: 9 });

      const result = deduplicate([first, second, duplicateOfFirst], order);

      expect(result.records).toEqual([duplicateOfFirst, second]);
      expect(result.mergedGroups).toBe(1);
    });

    it('should return winners unchanged', () => {
      const record = createRecord();

      expect(deduplicate([record], order).records[0]).toBe(record);
    });

    it('should handle an empty list', () => {
      expect(deduplicate([], order)).toEqual({
        records: [],
        duplicateCount: 0,
        mergedGroups: 0,
        totalProcessed: 0,
      });
    });
  });
});
