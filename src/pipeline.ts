/**
 * EconDigest — Digest Pipeline
 *
 * Source Registry → Fetcher → Normalizer → Scorer → Dedup → Ranker.
 *
 * Everything the run depends on comes in through PipelineOptions;
 * nothing here reads module-level configuration. Only fetching does I/O,
 * and assembleDigest can be driven directly from recorded fetch outcomes.
 */

import type { CanonicalRecord, Digest, KeywordSet, SourceFailure } from './types';
import {
  fetchAllSources,
  normalizeEntries,
  windowCutoff,
  isWithinWindow,
  DEFAULT_FETCHER_OPTIONS,
  type FetcherOptions,
  type FetchOutcome,
  type SourceRegistry,
} from './feeds';
import { scoreRecords, filterByScore, deduplicate, buildDigest } from './matching';
import { ConfigError } from './lib/errors';
import { logger, timeOperation } from './lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface PipelineOptions {
  registry: SourceRegistry;
  keywords: KeywordSet;
  /** Lowest score that reaches the digest (>= 1) */
  minScore?: number;
  /** Drop records published before now - windowDays; omit for no window */
  windowDays?: number;
  fetcher?: Partial<FetcherOptions>;
  /** Run clock; also the digest's generatedAt */
  now?: Date;
}

export interface PipelineResult {
  digest: Digest;
  outcomes: FetchOutcome[];
}

const log = logger.child({ module: 'pipeline' });

// ============================================================
// VALIDATION
// ============================================================

function validateOptions(options: PipelineOptions): void {
  const issues: string[] = [];

  if (options.registry.sources.length === 0) {
    issues.push('no sources registered');
  }
  if (options.minScore !== undefined && (!Number.isInteger(options.minScore) || options.minScore < 1)) {
    issues.push(`minScore must be an integer >= 1, got ${options.minScore}`);
  }
  if (options.windowDays !== undefined && !(options.windowDays > 0)) {
    issues.push(`windowDays must be positive, got ${options.windowDays}`);
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid pipeline options', issues);
  }
}

// ============================================================
// PURE STAGES
// ============================================================

/**
 * Turn fetch outcomes into a Digest. Pure: same outcomes and options,
 * same Digest.
 */
export function assembleDigest(
  outcomes: readonly FetchOutcome[],
  options: Omit<PipelineOptions, 'fetcher'> & { now: Date }
): Digest {
  const failures: SourceFailure[] = [];
  const normalized: CanonicalRecord[] = [];
  let totalSkipped = 0;

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push({
        sourceId: outcome.source.id,
        sourceLabel: outcome.source.label,
        error: outcome.error,
      });
      continue;
    }

    const { records, skipped } = normalizeEntries(outcome.entries, outcome.source);
    normalized.push(...records);
    totalSkipped += skipped;
  }

  let considered = normalized;
  if (options.windowDays !== undefined) {
    const cutoff = windowCutoff(options.now, options.windowDays);
    considered = normalized.filter(record => isWithinWindow(record, cutoff));
  }
  const totalStale = normalized.length - considered.length;

  const scored = scoreRecords(considered, options.keywords);
  const matched = filterByScore(scored, options.minScore ?? 1);
  const dedup = deduplicate(matched, id => options.registry.orderOf(id));

  const digest = buildDigest({
    generatedAt: options.now,
    records: dedup.records,
    totalConsidered: considered.length,
    totalMatched: matched.length,
    totalSkipped,
    totalStale,
    duplicatesRemoved: dedup.duplicateCount,
    sourcesChecked: outcomes.length,
    failures,
    windowDays: options.windowDays,
  });

  log.info('Digest assembled', {
    considered: digest.totalConsidered,
    matched: digest.totalMatched,
    entries: digest.entries.length,
    skipped: totalSkipped,
    stale: totalStale,
    duplicates: dedup.duplicateCount,
    failedSources: failures.length,
  });

  return digest;
}

// ============================================================
// RUN
// ============================================================

/**
 * Run the complete pipeline once.
 * Throws ConfigError before any fetch when the options are unusable;
 * source failures end up in digest.failures instead.
 */
export async function runDigestPipeline(options: PipelineOptions): Promise<PipelineResult> {
  validateOptions(options);

  const now = options.now ?? new Date();
  const fetcherOptions: FetcherOptions = { ...DEFAULT_FETCHER_OPTIONS, ...options.fetcher };

  log.info('Starting digest run', {
    sources: options.registry.sources.length,
    keywords: options.keywords.length,
    windowDays: options.windowDays ?? 'none',
    minScore: options.minScore ?? 1,
  });

  if (options.keywords.length === 0) {
    log.warn('Keyword set is empty; the digest will have no entries');
  }

  const outcomes = await timeOperation('Fetch phase', () =>
    fetchAllSources(options.registry, fetcherOptions)
  );

  const digest = assembleDigest(outcomes, { ...options, now });

  return { digest, outcomes };
}
