/**
 * EconDigest — Keyword Types
 *
 * Keywords are lowercase terms or phrases with an integer weight.
 * A bare string in configuration means weight 1.
 */

import { z } from 'zod';

export const KeywordSchema = z.union([
  z.string(),
  z.object({
    term: z.string(),
    weight: z.number().int('Keyword weight must be an integer').positive('Keyword weight must be positive').default(1),
  }),
]).transform(value => (typeof value === 'string' ? { term: value, weight: 1 } : value))
  .transform(value => ({ term: value.term.trim().replace(/\s+/g, ' ').toLowerCase(), weight: value.weight }))
  .refine(value => value.term.length > 0, 'Keyword term cannot be empty');

export type KeywordInput = z.input<typeof KeywordSchema>;

export interface Keyword {
  readonly term: string;
  readonly weight: number;
}

/** Ordered, immutable for the run. */
export type KeywordSet = readonly Keyword[];

export const KeywordsFileSchema = z.object({
  keywords: z.array(KeywordSchema),
});
