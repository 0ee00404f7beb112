/**
 * EconDigest — Digest Ranker
 *
 * Orders deduplicated records and assembles the Digest value.
 * The ordering is total, so identical input always yields identical output.
 */

import type { CanonicalRecord, Digest, KeywordCount, SourceFailure } from '../types';
import { compareStrings, normalizeLink } from './dedup';

// ============================================================
// ORDERING
// ============================================================

/**
 * Digest order:
 * 1. score, descending
 * 2. publishedAt, descending (unset last)
 * 3. title, ascending, case-insensitive
 * 4. normalized link, ascending
 */
export function compareForDigest(a: CanonicalRecord, b: CanonicalRecord): number {
  if (a.score !== b.score) return b.score - a.score;

  const aTime = a.publishedAt?.getTime();
  const bTime = b.publishedAt?.getTime();
  if (aTime !== bTime) {
    if (aTime === undefined) return 1;
    if (bTime === undefined) return -1;
    return bTime - aTime;
  }

  return (
    compareStrings(a.title.toLowerCase(), b.title.toLowerCase()) ||
    compareStrings(normalizeLink(a.link), normalizeLink(b.link))
  );
}

export function rankRecords(records: readonly CanonicalRecord[]): CanonicalRecord[] {
  return [...records].sort(compareForDigest);
}

/**
 * How many entries matched each keyword, most frequent first.
 */
export function countKeywords(entries: readonly CanonicalRecord[]): KeywordCount[] {
  const counts = new Map<string, number>();

  for (const entry of entries) {
    for (const keyword of entry.matchedKeywords) {
      counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
    }
  }

  return Array.from(counts, ([keyword, count]) => ({ keyword, count }))
    .sort((a, b) => b.count - a.count || compareStrings(a.keyword, b.keyword));
}

// ============================================================
// DIGEST
// ============================================================

export interface DigestInput {
  generatedAt: Date;
  /** Deduplicated records, any order */
  records: readonly CanonicalRecord[];
  totalConsidered: number;
  totalMatched: number;
  totalSkipped?: number;
  totalStale?: number;
  duplicatesRemoved?: number;
  sourcesChecked: number;
  failures?: readonly SourceFailure[];
  windowDays?: number;
}

/**
 * Rank the records and freeze everything into a Digest.
 */
export function buildDigest(input: DigestInput): Digest {
  const entries = Object.freeze(rankRecords(input.records));

  return Object.freeze({
    generatedAt: new Date(input.generatedAt.getTime()),
    entries,
    totalConsidered: input.totalConsidered,
    totalMatched: input.totalMatched,
    totalSkipped: input.totalSkipped ?? 0,
    totalStale: input.totalStale ?? 0,
    duplicatesRemoved: input.duplicatesRemoved ?? 0,
    sourcesChecked: input.sourcesChecked,
    failures: Object.freeze([...(input.failures ?? [])]),
    windowDays: input.windowDays,
    keywordCounts: Object.freeze(countKeywords(entries)),
  });
}
