/**
 * EconDigest — Relevance Scorer
 *
 * Deterministic keyword matching over title and summary.
 * Each keyword counts once per record, however often it appears.
 */

import type { CanonicalRecord, KeywordSet } from '../types';

/**
 * Score one record. Returns a new record; the input is not touched.
 */
export function scoreRecord(record: CanonicalRecord, keywords: KeywordSet): CanonicalRecord {
  const text = `${record.title} ${record.summary}`.toLowerCase();
  const matchedKeywords: string[] = [];
  let score = 0;

  for (const keyword of keywords) {
    if (text.includes(keyword.term.toLowerCase())) {
      matchedKeywords.push(keyword.term);
      score += keyword.weight;
    }
  }

  return Object.freeze({
    ...record,
    score,
    matchedKeywords: Object.freeze(matchedKeywords),
  });
}

export function scoreRecords(
  records: readonly CanonicalRecord[],
  keywords: KeywordSet
): CanonicalRecord[] {
  return records.map(record => scoreRecord(record, keywords));
}

/**
 * Keep records scoring at least `minScore`. Zero never passes.
 */
export function filterByScore(
  records: readonly CanonicalRecord[],
  minScore: number = 1
): CanonicalRecord[] {
  const threshold = Math.max(1, minScore);
  return records.filter(record => record.score >= threshold);
}
