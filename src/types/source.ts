/**
 * EconDigest — Source Types
 *
 * A source is one syndication endpoint plus the parser that understands it.
 * Descriptors are loaded once per run and frozen.
 */

import { z } from 'zod';

// ============================================================
// PARSER KIND
// ============================================================

export const ParserKindSchema = z.enum([
  'rss',   // RSS 0.9x/1.0/2.0 and Atom
  'ssrn',  // SSRN journal listing (HTML)
]);
export type ParserKind = z.infer<typeof ParserKindSchema>;

// ============================================================
// SOURCE DESCRIPTOR
// ============================================================

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export const SourceDescriptorSchema = z.object({
  id: z
    .string()
    .trim()
    .min(1, 'Source id cannot be empty')
    .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Source id must be lowercase letters, digits, "-" or "_"'),
  label: z.string().trim().min(1, 'Source label cannot be empty'),
  endpoint: z.string().trim().refine(isHttpUrl, 'Source endpoint must be a valid http(s) URL'),
  parser: ParserKindSchema,
  focusTags: z.array(z.string().trim().min(1)).default([]),
});

export type SourceDescriptorInput = z.input<typeof SourceDescriptorSchema>;

export interface SourceDescriptor {
  readonly id: string;
  readonly label: string;
  readonly endpoint: URL;
  readonly parser: ParserKind;
  readonly focusTags: readonly string[];
}
