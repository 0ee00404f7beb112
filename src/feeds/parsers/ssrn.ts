/**
 * EconDigest — SSRN Listing Parser
 *
 * SSRN has no usable feed for its economics journals, so the journal
 * browse page is scraped. The markup varies between page versions;
 * both known result layouts are tried.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { FeedParser, registerParser } from '../base';
import type { ParserKind, RawEntry, SourceDescriptor } from '../../types';

const RESULT_SELECTOR = '.paper-result, .result-item';
const TITLE_SELECTOR = '.title a, h3 a';
const AUTHORS_SELECTOR = '.authors, .author';
const ABSTRACT_SELECTOR = '.abstract, .description';
const DATE_SELECTOR = '.date, .posted';

/** The browse page lists the newest papers first */
const MAX_RESULTS = 20;

function textOf(item: HTMLElement, selector: string): string | undefined {
  const element = item.querySelector(selector);
  const value = element?.text.trim();
  return value ? value : undefined;
}

export class SsrnParser extends FeedParser {
  readonly kind: ParserKind = 'ssrn';
  readonly accept = 'text/html, application/xhtml+xml;q=0.9';

  async parse(document: string, source: SourceDescriptor): Promise<RawEntry[]> {
    const root = parse(document);

    if (!root.querySelector('body')) {
      throw new Error('Document is not an HTML page');
    }

    const results = root.querySelectorAll(RESULT_SELECTOR).slice(0, MAX_RESULTS);
    const entries: RawEntry[] = [];

    for (const item of results) {
      const anchor = item.querySelector(TITLE_SELECTOR);
      if (!anchor) continue;

      const href = anchor.getAttribute('href')?.trim();

      entries.push({
        sourceId: source.id,
        title: anchor.text.trim(),
        link: href ? resolveLink(href, source.endpoint) : undefined,
        summary: textOf(item, ABSTRACT_SELECTOR),
        published: textOf(item, DATE_SELECTOR)?.replace(/^(posted|date)\s*:?\s*/i, ''),
        authors: textOf(item, AUTHORS_SELECTOR),
      });
    }

    if (results.length === 0) {
      this.logger.warn('No listing results found', { source: source.id });
    }

    return entries;
  }
}

/**
 * Resolve a listing href against the page it came from.
 * Unresolvable values are passed through for the normalizer to reject.
 */
function resolveLink(href: string, base: URL): string {
  try {
    return new URL(href, base).href;
  } catch {
    return href;
  }
}

registerParser(new SsrnParser());
