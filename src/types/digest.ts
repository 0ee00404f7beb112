/**
 * EconDigest — Digest Types
 */

import type { CanonicalRecord } from './feed-entry';

export interface SourceFailure {
  readonly sourceId: string;
  readonly sourceLabel: string;
  readonly error: string;
}

export interface KeywordCount {
  readonly keyword: string;
  readonly count: number;
}

/**
 * Output of one run. Frozen once built.
 */
export interface Digest {
  readonly generatedAt: Date;
  readonly entries: readonly CanonicalRecord[];
  /** Records handed to the scorer */
  readonly totalConsidered: number;
  /** Records that passed the score filter, before dedup */
  readonly totalMatched: number;
  /** Entries dropped by the normalizer (no title, bad link) */
  readonly totalSkipped: number;
  /** Entries older than the lookback window */
  readonly totalStale: number;
  readonly duplicatesRemoved: number;
  readonly sourcesChecked: number;
  readonly failures: readonly SourceFailure[];
  /** Lookback window in days; undefined means no window */
  readonly windowDays?: number;
  readonly keywordCounts: readonly KeywordCount[];
}
