/**
 * EconDigest — Feed Fetcher
 *
 * One bounded-time attempt per source. A source either yields its
 * parsed entries or a failure value; nothing it does can reach another
 * source's result. Fetches share a small worker pool.
 */

import pLimit from 'p-limit';
import type { RawEntry, SourceDescriptor } from '../types';
import type { SourceRegistry } from './registry';
import { getParser } from './parsers';
import { logger, errorMessage } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export type FetchImpl = (input: string, init: RequestInit) => Promise<Response>;

export interface FetcherOptions {
  /** Per-source budget covering request, body and parse */
  timeoutMs: number;
  /** Maximum sources fetched at once */
  concurrency: number;
  userAgent: string;
  /** Injected HTTP client; defaults to global fetch */
  fetchImpl?: FetchImpl;
}

export type FetchOutcome =
  | {
      ok: true;
      source: SourceDescriptor;
      entries: RawEntry[];
      durationMs: number;
    }
  | {
      ok: false;
      source: SourceDescriptor;
      error: string;
      durationMs: number;
    };

export const DEFAULT_FETCHER_OPTIONS: FetcherOptions = {
  timeoutMs: 15_000,
  concurrency: 4,
  userAgent: 'Mozilla/5.0 (compatible; econ-research-digest/1.0)',
};

const log = logger.child({ module: 'fetcher' });

// ============================================================
// SINGLE SOURCE
// ============================================================

/**
 * Fetch and parse one source. Never rejects.
 */
export async function fetchSource(
  source: SourceDescriptor,
  options: FetcherOptions = DEFAULT_FETCHER_OPTIONS
): Promise<FetchOutcome> {
  const startTime = Date.now();
  const signal = AbortSignal.timeout(options.timeoutMs);
  const fetchImpl = options.fetchImpl ?? fetch;

  try {
    const parser = getParser(source.parser);
    if (!parser) {
      throw new Error(`No parser registered for "${source.parser}"`);
    }

    const res = await fetchImpl(source.endpoint.href, {
      headers: {
        'User-Agent': options.userAgent,
        'Accept': parser.accept,
      },
      redirect: 'follow',
      signal,
    });

    if (!res.ok) {
      throw new Error(`HTTP ${res.status} from ${source.endpoint.host}`);
    }

    const body = await res.text();
    const entries = await parser.parse(body, source);

    // A parse that finishes after the deadline still counts as a timeout
    if (signal.aborted) {
      throw new Error('aborted');
    }

    const durationMs = Date.now() - startTime;
    log.info('Source fetch completed', { source: source.id, entries: entries.length, durationMs });

    return { ok: true, source, entries, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const message = signal.aborted
      ? `Timeout after ${options.timeoutMs}ms`
      : errorMessage(error);

    log.warn('Source fetch failed', { source: source.id, error: message, durationMs });

    return { ok: false, source, error: message, durationMs };
  }
}

// ============================================================
// ALL SOURCES
// ============================================================

/**
 * Fetch every registered source through a bounded pool.
 * Results come back in registry order, one slot per source.
 */
export async function fetchAllSources(
  registry: SourceRegistry,
  options: FetcherOptions = DEFAULT_FETCHER_OPTIONS
): Promise<FetchOutcome[]> {
  const limit = pLimit(Math.max(1, options.concurrency));

  log.info('Fetching sources', {
    sources: registry.sources.length,
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
  });

  const outcomes = await Promise.all(
    registry.sources.map(source => limit(() => fetchSource(source, options)))
  );

  const failed = outcomes.filter(o => !o.ok).length;
  log.info('Source fetch phase completed', {
    succeeded: outcomes.length - failed,
    failed,
  });

  return outcomes;
}
