/**
 * EconDigest — Feed Entry Types
 *
 * RawEntry is what a parser hands back, field for field.
 * CanonicalRecord is the normalized unit the rest of the pipeline works on.
 */

/**
 * Unmodified item as read from a feed document.
 */
export interface RawEntry {
  sourceId: string;
  title?: string;
  link?: string;
  summary?: string;
  published?: string;
  authors?: string;
}

/**
 * Normalized record. `score` and `matchedKeywords` stay at their defaults
 * until the scorer fills them in.
 */
export interface CanonicalRecord {
  readonly title: string;
  readonly link: string;
  readonly summary: string;
  readonly publishedAt?: Date;
  readonly sourceId: string;
  readonly sourceLabel: string;
  readonly authors: string;
  readonly score: number;
  readonly matchedKeywords: readonly string[];
}

export type NormalizeResult =
  | { ok: true; record: CanonicalRecord }
  | { ok: false; reason: string };
