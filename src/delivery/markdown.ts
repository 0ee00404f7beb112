/**
 * EconDigest — Markdown Digest Renderer
 *
 * Renders a Digest as the weekly markdown document.
 * Pure: output depends on the Digest value and options only.
 */

import type { CanonicalRecord, Digest } from '../types';
import { sliceText } from '../lib/text';

// ============================================================
// OPTIONS
// ============================================================

export interface RenderOptions {
  /** Entries shown per relevance tier */
  maxPerTier?: number;
  /** Keywords listed in the summary */
  maxKeywords?: number;
}

export const DEFAULT_RENDER_OPTIONS: Required<RenderOptions> = {
  maxPerTier: 10,
  maxKeywords: 15,
};

export interface RelevanceTier {
  key: 'high' | 'medium' | 'low';
  heading: string;
  minScore: number;
  maxScore: number;
}

export const RELEVANCE_TIERS: readonly RelevanceTier[] = [
  { key: 'high', heading: '🔴 High Priority', minScore: 5, maxScore: Number.POSITIVE_INFINITY },
  { key: 'medium', heading: '🟡 Worth Reading', minScore: 2, maxScore: 4 },
  { key: 'low', heading: '🟢 Also Relevant', minScore: 1, maxScore: 1 },
];

export function entriesInTier(entries: readonly CanonicalRecord[], tier: RelevanceTier): CanonicalRecord[] {
  return entries.filter(e => e.score >= tier.minScore && e.score <= tier.maxScore);
}

// ============================================================
// FORMAT HELPERS
// ============================================================

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** "October 05, 2026" (UTC) */
export function formatLongDate(date: Date): string {
  return `${MONTHS[date.getUTCMonth()]} ${pad2(date.getUTCDate())}, ${date.getUTCFullYear()}`;
}

/** "Oct 05" (UTC) */
export function formatShortDate(date: Date): string {
  return `${MONTHS[date.getUTCMonth()].slice(0, 3)} ${pad2(date.getUTCDate())}`;
}

/** "20261005" (UTC) */
export function formatCompactDate(date: Date): string {
  return `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}`;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${sliceText(text, max)}...` : text;
}

/**
 * Cut at the last word boundary before `max`.
 */
export function excerpt(text: string, max: number): string {
  if (text.length <= max) return text;
  const cut = sliceText(text, max);
  const lastSpace = cut.lastIndexOf(' ');
  return `${lastSpace > 0 ? cut.slice(0, lastSpace) : cut}...`;
}

export function windowLabel(windowDays: number | undefined): string {
  if (windowDays === undefined) return 'All available papers';
  return `Papers from last ${windowDays} day${windowDays === 1 ? '' : 's'}`;
}

function escapeLinkText(text: string): string {
  return text.replace(/([[\]])/g, '\\$1');
}

// Emphasis markers in feed text would otherwise open or close spans
function escapeEmphasis(text: string): string {
  return text.replace(/([\\*_])/g, '\\$1');
}

function escapeLinkTarget(url: string): string {
  return url.replace(/\(/g, '%28').replace(/\)/g, '%29').replace(/ /g, '%20');
}

// ============================================================
// RENDER
// ============================================================

function renderEntry(entry: CanonicalRecord): string[] {
  const lines: string[] = [];

  lines.push(`**[${escapeLinkText(entry.title)}](${escapeLinkTarget(entry.link)})**`);

  const meta = [`*${escapeEmphasis(entry.sourceLabel)}*`];
  if (entry.authors) meta.push(escapeEmphasis(truncate(entry.authors, 60)));
  meta.push(entry.publishedAt ? formatShortDate(entry.publishedAt) : 'Recent');
  lines.push(meta.join(' | '));

  if (entry.summary) {
    lines.push(`> ${excerpt(entry.summary, 300)}`);
  }

  if (entry.matchedKeywords.length > 0) {
    lines.push(`**Keywords:** ${entry.matchedKeywords.slice(0, 5).join(', ')}`);
  }

  lines.push('');
  return lines;
}

/**
 * Render digest as a markdown document.
 */
export function renderDigestMarkdown(digest: Digest, options: RenderOptions = {}): string {
  const { maxPerTier, maxKeywords } = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const lines: string[] = [];

  lines.push('# Economics Research Digest');
  lines.push(`**Week of ${formatLongDate(digest.generatedAt)}** | ${windowLabel(digest.windowDays)}`);
  lines.push('');
  lines.push(`*Generated ${digest.generatedAt.toISOString()}*`);
  lines.push('');
  lines.push('---');
  lines.push('');
  lines.push('## Top Papers by Relevance');
  lines.push('');

  if (digest.entries.length === 0) {
    lines.push('*No relevant papers found this period. Consider expanding keywords or timeframe.*');
    lines.push('');
  }

  for (const tier of RELEVANCE_TIERS) {
    const tierEntries = entriesInTier(digest.entries, tier);
    if (tierEntries.length === 0) continue;

    lines.push(`### ${tier.heading}`);
    lines.push('');
    for (const entry of tierEntries.slice(0, maxPerTier)) {
      lines.push(...renderEntry(entry));
    }
    if (tierEntries.length > maxPerTier) {
      lines.push(`*+ ${tierEntries.length - maxPerTier} more in this tier*`);
      lines.push('');
    }
  }

  if (digest.failures.length > 0) {
    lines.push('---');
    lines.push('');
    lines.push('## Sources Unavailable');
    lines.push('');
    for (const failure of digest.failures) {
      lines.push(`- **${escapeEmphasis(failure.sourceLabel)}** (\`${failure.sourceId}\`): ${failure.error}`);
    }
    lines.push('');
  }

  const highCount = digest.entries.filter(e => e.score >= RELEVANCE_TIERS[0].minScore).length;

  lines.push('---');
  lines.push('');
  lines.push('## Summary');
  lines.push('');
  lines.push(`- **Total papers scanned:** ${digest.totalConsidered}`);
  lines.push(`- **Relevant papers found:** ${digest.entries.length}`);
  lines.push(`- **High priority:** ${highCount}`);
  lines.push(`- **Duplicates merged:** ${digest.duplicatesRemoved}`);
  lines.push(
    `- **Sources checked:** ${digest.sourcesChecked}` +
      (digest.failures.length > 0 ? ` (${digest.failures.length} unavailable)` : '')
  );

  if (digest.keywordCounts.length > 0) {
    lines.push('');
    lines.push('### Keywords Matched This Week');
    lines.push('');
    for (const { keyword, count } of digest.keywordCounts.slice(0, maxKeywords)) {
      lines.push(`- ${keyword}: ${count} paper${count === 1 ? '' : 's'}`);
    }
  }

  return lines.join('\n') + '\n';
}
