/**
 * Tests for Entry Normalizer
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeEntry,
  normalizeEntries,
  stripHtml,
  collapseWhitespace,
  parsePublished,
  windowCutoff,
  isWithinWindow,
  MAX_SUMMARY_LENGTH,
} from '../../src/feeds/normalizer';
import { createSourceRegistry } from '../../src/feeds/registry';
import type { CanonicalRecord, RawEntry, SourceDescriptor } from '../../src/types';

const registry = createSourceRegistry([
  { id: 'ny-fed', label: 'Liberty Street Economics', endpoint: 'https://libertystreeteconomics.newyorkfed.org/feed/', parser: 'rss' },
]);

function nyFed(): SourceDescriptor {
  const found = registry.get('ny-fed');
  if (!found) throw new Error('missing fixture source');
  return found;
}

const createRaw = (overrides: Partial<RawEntry> = {}): RawEntry => ({
  sourceId: 'ny-fed',
  title: 'Inflation Expectations and Wages',
  link: 'https://libertystreeteconomics.newyorkfed.org/2026/10/inflation-expectations/',
  summary: 'Survey evidence on expectations.',
  published: '2026-10-05T14:00:00Z',
  authors: 'Staff Economist',
  ...overrides,
});

function normalized(raw: RawEntry): CanonicalRecord {
  const result = normalizeEntry(raw, nyFed());
  if (!result.ok) throw new Error(`unexpected skip: ${result.reason}`);
  return result.record;
}

describe('Entry Normalizer', () => {
  describe('text helpers', () => {
    it('should collapse runs of whitespace', () => {
      expect(collapseWhitespace('  Monetary\n\tpolicy   rules ')).toBe('Monetary policy rules');
    });

    it('should strip tags and decode entities', () => {
      expect(stripHtml('Wages &amp; <b>prices</b>')).toBe('Wages & prices');
    });

    it('should keep words in separate blocks apart', () => {
      expect(collapseWhitespace(stripHtml('<p>First paragraph.</p><p>Second.</p>'))).toBe('First paragraph. Second.');
    });

    it('should return plain text unchanged', () => {
      expect(stripHtml('Plain abstract')).toBe('Plain abstract');
    });

    it('should parse timestamps and drop unparseable ones', () => {
      expect(parsePublished('2026-10-05T14:00:00Z')?.toISOString()).toBe('2026-10-05T14:00:00.000Z');
      expect(parsePublished('sometime last week')).toBeUndefined();
      expect(parsePublished('   ')).toBeUndefined();
      expect(parsePublished(undefined)).toBeUndefined();
    });
  });

  describe('normalizeEntry', () => {
    it('should build a canonical record with score defaults', () => {
      const record = normalized(createRaw());

      expect(record).toEqual({
        title: 'Inflation Expectations and Wages',
        link: 'https://libertystreeteconomics.newyorkfed.org/2026/10/inflation-expectations/',
        summary: 'Survey evidence on expectations.',
        publishedAt: new Date('2026-10-05T14:00:00Z'),
        sourceId: 'ny-fed',
        sourceLabel: 'Liberty Street Economics',
        authors: 'Staff Economist',
        score: 0,
        matchedKeywords: [],
      });
    });

    it('should clean markup out of titles and summaries', () => {
      const record = normalized(createRaw({
        title: '  The <em>Phillips</em>\n Curve ',
        summary: '<p>Slope &lt; 0.1</p>',
      }));

      expect(record.title).toBe('The Phillips Curve');
      expect(record.summary).toBe('Slope < 0.1');
    });

    it('should cap summaries', () => {
      const record = normalized(createRaw({ summary: 'word '.repeat(200) }));

      expect(record.summary.length).toBeLessThanOrEqual(MAX_SUMMARY_LENGTH);
      expect(record.summary.endsWith(' ')).toBe(false);
    });

    it('should not split a surrogate pair at the summary cap', () => {
      const record = normalized(createRaw({ summary: `${'x'.repeat(499)}\u{1F600} tail` }));

      expect(record.summary).toBe('x'.repeat(499));
    });

    it('should normalize the link into URL form', () => {
      const record = normalized(createRaw({ link: ' https://Example.ORG/papers/42 ' }));

      expect(record.link).toBe('https://example.org/papers/42');
    });

    it('should fill absent optional fields with empty values', () => {
      const record = normalized(createRaw({ summary: undefined, authors: undefined, published: undefined }));

      expect(record.summary).toBe('');
      expect(record.authors).toBe('');
      expect(record.publishedAt).toBeUndefined();
    });

    it('should skip entries without a title', () => {
      expect(normalizeEntry(createRaw({ title: ' <b> </b> ' }), nyFed())).toEqual({ ok: false, reason: 'missing title' });
    });

    it('should skip entries without a link', () => {
      expect(normalizeEntry(createRaw({ link: undefined }), nyFed())).toEqual({ ok: false, reason: 'missing link' });
    });

    it('should skip entries whose link is not an http(s) URL', () => {
      expect(normalizeEntry(createRaw({ link: 'mailto:desk@example.org' }), nyFed())).toEqual({
        ok: false,
        reason: 'invalid link "mailto:desk@example.org"',
      });
    });
  });

  describe('normalizeEntries', () => {
    it('should keep valid entries in order and count skips', () => {
      const { records, skipped } = normalizeEntries(
        [
          createRaw({ title: 'First' }),
          createRaw({ title: '' }),
          createRaw({ title: 'Second', link: 'not a url' }),
          createRaw({ title: 'Third' }),
        ],
        nyFed()
      );

      expect(records.map(r => r.title)).toEqual(['First', 'Third']);
      expect(skipped).toBe(2);
    });
  });

  describe('lookback window', () => {
    const now = new Date('2026-10-12T00:00:00Z');
    const cutoff = windowCutoff(now, 7);

    it('should start the window the given number of days before now', () => {
      expect(cutoff.toISOString()).toBe('2026-10-05T00:00:00.000Z');
    });

    it('should keep records on or after the cutoff and undated records', () => {
      const onCutoff = normalized(createRaw({ published: '2026-10-05T00:00:00Z' }));
      const before = normalized(createRaw({ published: '2026-10-04T23:59:59Z' }));
      const undated = normalized(createRaw({ published: undefined }));

      expect(isWithinWindow(onCutoff, cutoff)).toBe(true);
      expect(isWithinWindow(before, cutoff)).toBe(false);
      expect(isWithinWindow(undated, cutoff)).toBe(true);
    });
  });
});
