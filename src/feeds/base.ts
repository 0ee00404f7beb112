/**
 * EconDigest — Feed Parser Base
 *
 * Abstract base class for feed dialects.
 * Every parser turns a fetched document into RawEntry values;
 * the source descriptor picks the parser by its declared kind.
 */

import type { ParserKind, RawEntry, SourceDescriptor } from '../types';
import { logger } from '../lib/logger';

/**
 * Abstract base class for feed parsers.
 */
export abstract class FeedParser {
  abstract readonly kind: ParserKind;

  /** Accept header sent when fetching documents for this parser */
  abstract readonly accept: string;

  protected logger = logger.child({ parser: this.constructor.name });

  /**
   * Parse a fetched document. Throws when the document is malformed;
   * the fetcher reports that as a source failure.
   */
  abstract parse(document: string, source: SourceDescriptor): Promise<RawEntry[]>;
}

/**
 * Registry of available parsers, one per kind.
 */
const parserRegistry: Map<ParserKind, FeedParser> = new Map();

/**
 * Register a feed parser.
 */
export function registerParser(parser: FeedParser): void {
  parserRegistry.set(parser.kind, parser);
  logger.debug('Parser registered', { kind: parser.kind });
}

/**
 * Get the parser for a kind.
 */
export function getParser(kind: ParserKind): FeedParser | undefined {
  return parserRegistry.get(kind);
}

/**
 * Kinds that currently have a parser.
 */
export function getRegisteredKinds(): ParserKind[] {
  return Array.from(parserRegistry.keys());
}
