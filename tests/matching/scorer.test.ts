/**
 * Tests for Keyword Set and Relevance Scorer
 */

import { describe, it, expect } from 'vitest';
import { createKeywordSet } from '../../src/matching/keywords';
import { scoreRecord, scoreRecords, filterByScore } from '../../src/matching/scorer';
import { ConfigError } from '../../src/lib/errors';
import type { CanonicalRecord } from '../../src/types';

const createRecord = (overrides: Partial<CanonicalRecord> = {}): CanonicalRecord => ({
  title: 'Corporate Power and Housing Costs',
  link: 'https://example.org/papers/corporate-power',
  summary: 'How concentrated landlords shape rents.',
  publishedAt: new Date('2026-10-08T00:00:00Z'),
  sourceId: 'epi',
  sourceLabel: 'Economic Policy Institute',
  authors: '',
  score: 0,
  matchedKeywords: [],
  ...overrides,
});

describe('Keyword Set', () => {
  it('should lowercase terms and collapse inner whitespace', () => {
    const keywords = createKeywordSet(['  Market   Power ', 'RENT']);

    expect(keywords).toEqual([
      { term: 'market power', weight: 1 },
      { term: 'rent', weight: 1 },
    ]);
  });

  it('should accept weighted terms', () => {
    const keywords = createKeywordSet([{ term: 'antitrust', weight: 3 }, { term: 'merger' }]);

    expect(keywords).toEqual([
      { term: 'antitrust', weight: 3 },
      { term: 'merger', weight: 1 },
    ]);
  });

  it('should accept an empty set', () => {
    expect(createKeywordSet([])).toEqual([]);
  });

  it('should reject empty terms, bad weights and repeated terms', () => {
    let caught: unknown;
    try {
      createKeywordSet(['rent', '   ', { term: 'wage', weight: 0 }, 'Rent']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues).toEqual([
      'keywords[1]: Keyword term cannot be empty',
      'keywords[2]: Keyword weight must be positive',
      'keywords[3]: duplicate keyword "rent"',
    ]);
  });
});

describe('Relevance Scorer', () => {
  const keywords = createKeywordSet(['corporate power', 'housing', 'rent', 'inflation']);

  it('should count each matching keyword once', () => {
    const scored = scoreRecord(
      createRecord({ summary: 'Housing, housing and more housing.' }),
      keywords
    );

    expect(scored.score).toBe(2);
    expect(scored.matchedKeywords).toEqual(['corporate power', 'housing']);
  });

  it('should match title and summary case-insensitively', () => {
    const scored = scoreRecord(
      createRecord({ title: 'INFLATION Outlook', summary: 'Rents keep rising.' }),
      keywords
    );

    expect(scored.score).toBe(2);
    expect(scored.matchedKeywords).toEqual(['rent', 'inflation']);
  });

  it('should match a phrase that runs from the title into the summary', () => {
    const scored = scoreRecord(
      createRecord({ title: 'Measuring corporate', summary: 'power in markets' }),
      keywords
    );

    expect(scored.matchedKeywords).toEqual(['corporate power']);
  });

  it('should add keyword weights', () => {
    const weighted = createKeywordSet([{ term: 'housing', weight: 4 }, 'corporate power']);

    expect(scoreRecord(createRecord(), weighted).score).toBe(5);
  });

  it('should score zero with an empty keyword set', () => {
    const scored = scoreRecord(createRecord(), createKeywordSet([]));

    expect(scored.score).toBe(0);
    expect(scored.matchedKeywords).toEqual([]);
  });

  it('should score a single-keyword set by that keyword alone', () => {
    const single = createKeywordSet(['landlords']);

    expect(scoreRecord(createRecord(), single)).toMatchObject({ score: 1, matchedKeywords: ['landlords'] });
    expect(scoreRecord(createRecord({ summary: 'No match here.' }), single).score).toBe(0);
  });

  it('should never lower a score when keywords are added', () => {
    const record = createRecord();
    const terms = ['wage', 'housing', 'monopsony', 'rent', 'corporate power', 'tariff'];

    let previous = 0;
    for (let i = 1; i <= terms.length; i++) {
      const score = scoreRecord(record, createKeywordSet(terms.slice(0, i))).score;
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    }
    expect(previous).toBe(3);
  });

  it('should not modify the input record', () => {
    const record = createRecord();
    const scored = scoreRecord(record, keywords);

    expect(record.score).toBe(0);
    expect(record.matchedKeywords).toEqual([]);
    expect(scored).not.toBe(record);
    expect(Object.isFrozen(scored)).toBe(true);
  });

  it('should score every record', () => {
    const scored = scoreRecords([createRecord(), createRecord({ title: 'Trade', summary: '' })], keywords);

    expect(scored.map(r => r.score)).toEqual([3, 0]);
  });

  describe('filterByScore', () => {
    const records = [
      createRecord({ title: 'zero', score: 0 }),
      createRecord({ title: 'one', score: 1 }),
      createRecord({ title: 'three', score: 3 }),
    ];

    it('should drop zero-score records by default', () => {
      expect(filterByScore(records).map(r => r.title)).toEqual(['one', 'three']);
    });

    it('should apply a higher minimum', () => {
      expect(filterByScore(records, 2).map(r => r.title)).toEqual(['three']);
    });

    it('should never let zero through', () => {
      expect(filterByScore(records, 0).map(r => r.title)).toEqual(['one', 'three']);
    });
  });
});
