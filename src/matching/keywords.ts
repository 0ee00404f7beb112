/**
 * EconDigest — Keyword Set
 *
 * Validates configured keywords into an ordered, frozen KeywordSet.
 */

import { KeywordSchema, type Keyword, type KeywordInput, type KeywordSet } from '../types';
import { ConfigError } from '../lib/errors';

/**
 * Build a keyword set. An empty input is valid and matches nothing.
 * Throws ConfigError on empty terms, bad weights or repeated terms.
 */
export function createKeywordSet(inputs: readonly KeywordInput[]): KeywordSet {
  const issues: string[] = [];
  const keywords: Keyword[] = [];
  const seen = new Set<string>();

  inputs.forEach((input, index) => {
    const parsed = KeywordSchema.safeParse(input);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`keywords[${index}]: ${issue.message}`);
      }
      return;
    }

    const { term, weight } = parsed.data;
    // A repeated term would count twice for one match
    if (seen.has(term)) {
      issues.push(`keywords[${index}]: duplicate keyword "${term}"`);
      return;
    }
    seen.add(term);
    keywords.push(Object.freeze({ term, weight }));
  });

  if (issues.length > 0) {
    throw new ConfigError('Malformed keyword set', issues);
  }

  return Object.freeze(keywords);
}
