/**
 * EconDigest — Entry Normalizer
 *
 * Converts raw parser output into CanonicalRecord values.
 * An entry without a usable title or link is skipped, not failed.
 */

import { parse as parseHtml } from 'node-html-parser';
import { isHttpUrl, type CanonicalRecord, type NormalizeResult, type RawEntry, type SourceDescriptor } from '../types';
import { logger } from '../lib/logger';
import { sliceText } from '../lib/text';

/** Summaries are abstracts, not full text */
export const MAX_SUMMARY_LENGTH = 500;

const log = logger.child({ module: 'normalizer' });

// ============================================================
// TEXT HELPERS
// ============================================================

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Plain text of an HTML fragment, entities decoded.
 */
export function stripHtml(fragment: string): string {
  if (!/[<&]/.test(fragment)) return fragment;
  // Block-level tags would otherwise glue neighbouring words together
  const spaced = fragment.replace(/<(br|\/p|\/div|\/li|\/h\d)[^>]*>/gi, ' $&');
  return parseHtml(spaced).text;
}

/**
 * Parse a feed timestamp. Unparseable values come back undefined.
 */
export function parsePublished(value: string | undefined): Date | undefined {
  if (!value || !value.trim()) return undefined;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? undefined : date;
}

// ============================================================
// NORMALIZATION
// ============================================================

/**
 * Normalize one raw entry against the source it came from.
 */
export function normalizeEntry(raw: RawEntry, source: SourceDescriptor): NormalizeResult {
  const title = collapseWhitespace(stripHtml(raw.title ?? ''));
  if (!title) {
    return { ok: false, reason: 'missing title' };
  }

  const link = raw.link?.trim() ?? '';
  if (!link) {
    return { ok: false, reason: 'missing link' };
  }
  if (!isHttpUrl(link)) {
    return { ok: false, reason: `invalid link "${link}"` };
  }

  const cleaned = collapseWhitespace(stripHtml(raw.summary ?? ''));
  const summary = sliceText(cleaned, MAX_SUMMARY_LENGTH).trim();

  const record: CanonicalRecord = {
    title,
    link: new URL(link).href,
    summary,
    publishedAt: parsePublished(raw.published),
    sourceId: source.id,
    sourceLabel: source.label,
    authors: collapseWhitespace(raw.authors ?? ''),
    score: 0,
    matchedKeywords: [],
  };

  return { ok: true, record };
}

/**
 * Normalize every entry of one source, tallying skips.
 */
export function normalizeEntries(
  rawEntries: readonly RawEntry[],
  source: SourceDescriptor
): { records: CanonicalRecord[]; skipped: number } {
  const records: CanonicalRecord[] = [];
  let skipped = 0;

  for (const raw of rawEntries) {
    const result = normalizeEntry(raw, source);
    if (result.ok) {
      records.push(result.record);
    } else {
      skipped++;
      log.debug('Entry skipped', { source: source.id, reason: result.reason });
    }
  }

  return { records, skipped };
}

// ============================================================
// LOOKBACK WINDOW
// ============================================================

/**
 * Start of the lookback window ending at `now`.
 */
export function windowCutoff(now: Date, windowDays: number): Date {
  return new Date(now.getTime() - windowDays * 24 * 60 * 60 * 1000);
}

/**
 * Records without a timestamp are always inside the window.
 */
export function isWithinWindow(record: CanonicalRecord, cutoff: Date): boolean {
  return record.publishedAt === undefined || record.publishedAt.getTime() >= cutoff.getTime();
}
