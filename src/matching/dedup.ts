/**
 * EconDigest — Cross-Source Deduplication
 *
 * Two records are the same paper when their normalized links match or
 * their normalized titles match. Groups are the transitive closure of
 * that relation; each group keeps exactly one winner, unchanged.
 */

import type { CanonicalRecord } from '../types';
import { logger } from '../lib/logger';

/**
 * Result of deduplication process.
 */
export interface DedupResult {
  records: CanonicalRecord[];
  duplicateCount: number;
  /** Groups that had more than one member */
  mergedGroups: number;
  totalProcessed: number;
}

export type SourceOrder = (sourceId: string) => number;

const log = logger.child({ module: 'dedup' });

// ============================================================
// KEYS
// ============================================================

const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'dclid',
  'mc_cid',
  'mc_eid',
  'ref',
  'ref_src',
  'cmpid',
  '_hsenc',
  '_hsmi',
  'mkt_tok',
]);

function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith('utm_') || TRACKING_PARAMS.has(lower);
}

/**
 * Normalize URL for comparison: scheme and host lowercased, fragment
 * and tracking parameters dropped, remaining parameters sorted,
 * trailing slash removed. Path case is kept.
 */
export function normalizeLink(link: string): string {
  let url: URL;
  try {
    url = new URL(link.trim());
  } catch {
    return link.trim().toLowerCase();
  }

  const kept = Array.from(url.searchParams.entries())
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a, av], [b, bv]) => compareStrings(a, b) || compareStrings(av, bv));

  const query = new URLSearchParams(kept).toString();
  const path = url.pathname.replace(/\/+$/, '');

  return `${url.protocol}//${url.host}${path}${query ? `?${query}` : ''}`;
}

export function normalizeTitle(title: string): string {
  return title.replace(/\s+/g, ' ').trim().toLowerCase();
}

// ============================================================
// WINNER SELECTION
// ============================================================

/**
 * Plain code-unit ordering; independent of the host locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Order two duplicates. Negative means `a` wins.
 *
 * 1. Higher score
 * 2. More recent publishedAt (unset loses)
 * 3. Earlier source in registry order
 * 4. Normalized link, raw link, title, summary, authors (total order, so input order never matters)
 */
export function compareDuplicates(
  a: CanonicalRecord,
  b: CanonicalRecord,
  sourceOrder: SourceOrder = () => 0
): number {
  if (a.score !== b.score) return b.score - a.score;

  const aTime = a.publishedAt?.getTime();
  const bTime = b.publishedAt?.getTime();
  if (aTime !== bTime) {
    if (aTime === undefined) return 1;
    if (bTime === undefined) return -1;
    return bTime - aTime;
  }

  const orderDiff = sourceOrder(a.sourceId) - sourceOrder(b.sourceId);
  if (orderDiff !== 0) return orderDiff;

  return (
    compareStrings(normalizeLink(a.link), normalizeLink(b.link)) ||
    compareStrings(a.link, b.link) ||
    compareStrings(a.title, b.title) ||
    compareStrings(a.summary, b.summary) ||
    compareStrings(a.authors, b.authors)
  );
}

// ============================================================
// DEDUPLICATION
// ============================================================

/**
 * Collapse duplicate records across sources.
 * Winners come back in the order their group was first seen.
 */
export function deduplicate(
  records: readonly CanonicalRecord[],
  sourceOrder: SourceOrder = () => 0
): DedupResult {
  const parent = records.map((_, index) => index);

  const find = (index: number): number => {
    let root = index;
    while (parent[root] !== root) root = parent[root];
    // Path compression
    let current = index;
    while (parent[current] !== root) {
      const next = parent[current];
      parent[current] = root;
      current = next;
    }
    return root;
  };

  const union = (a: number, b: number): void => {
    const rootA = find(a);
    const rootB = find(b);
    if (rootA === rootB) return;
    // Lower index stays root so groups keep first-seen order
    if (rootA < rootB) parent[rootB] = rootA;
    else parent[rootA] = rootB;
  };

  const byLink = new Map<string, number>();
  const byTitle = new Map<string, number>();

  records.forEach((record, index) => {
    const linkKey = normalizeLink(record.link);
    const titleKey = normalizeTitle(record.title);

    const linkMatch = byLink.get(linkKey);
    if (linkMatch === undefined) byLink.set(linkKey, index);
    else union(linkMatch, index);

    const titleMatch = byTitle.get(titleKey);
    if (titleMatch === undefined) byTitle.set(titleKey, index);
    else union(titleMatch, index);
  });

  const groups = new Map<number, CanonicalRecord[]>();
  records.forEach((record, index) => {
    const root = find(index);
    const group = groups.get(root);
    if (group) group.push(record);
    else groups.set(root, [record]);
  });

  const winners: CanonicalRecord[] = [];
  let mergedGroups = 0;

  for (const group of groups.values()) {
    if (group.length > 1) mergedGroups++;
    winners.push(
      group.reduce((best, candidate) =>
        compareDuplicates(candidate, best, sourceOrder) < 0 ? candidate : best
      )
    );
  }

  const result: DedupResult = {
    records: winners,
    duplicateCount: records.length - winners.length,
    mergedGroups,
    totalProcessed: records.length,
  };

  log.debug('Deduplication completed', {
    total: result.totalProcessed,
    duplicates: result.duplicateCount,
    mergedGroups,
  });

  return result;
}
