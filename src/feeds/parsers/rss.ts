/**
 * EconDigest — RSS / Atom Parser
 *
 * Handles RSS 0.9x, 1.0, 2.0 and Atom documents through rss-parser.
 * Most research outlets (VoxEU, EPI, the Fed banks, Brookings) publish one of these.
 */

import Parser from 'rss-parser';
import { FeedParser, registerParser } from '../base';
import type { ParserKind, RawEntry, SourceDescriptor } from '../../types';

interface ItemExtras {
  author?: unknown;
}

// xml2js hands back objects for elements with attributes; keep strings only
function text(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export class RssParser extends FeedParser {
  readonly kind: ParserKind = 'rss';
  readonly accept = 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8';

  private readonly parser = new Parser<Record<string, unknown>, ItemExtras>();

  async parse(document: string, source: SourceDescriptor): Promise<RawEntry[]> {
    const feed = await this.parser.parseString(document);

    this.logger.debug('Feed parsed', { source: source.id, items: feed.items.length });

    return feed.items.map(item => ({
      sourceId: source.id,
      title: text(item.title),
      link: text(item.link),
      // Atom carries the abstract in <summary>, RSS in <description>
      summary: text(item.summary) ?? text(item.content) ?? text(item.contentSnippet),
      published: text(item.isoDate) ?? text(item.pubDate),
      authors: text(item.creator) ?? text(item.author),
    }));
  }
}

registerParser(new RssParser());
