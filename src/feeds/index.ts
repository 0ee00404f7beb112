/**
 * EconDigest — Feeds Module
 *
 * Source registry, fetching, parsing and normalization.
 */

// Import all parsers to register them
import './parsers';

export {
  FeedParser,
  registerParser,
  getParser,
  getRegisteredKinds,
} from './base';

export {
  createSourceRegistry,
  type SourceRegistry,
} from './registry';

export {
  fetchSource,
  fetchAllSources,
  DEFAULT_FETCHER_OPTIONS,
  type FetchImpl,
  type FetcherOptions,
  type FetchOutcome,
} from './fetcher';

export {
  normalizeEntry,
  normalizeEntries,
  collapseWhitespace,
  stripHtml,
  parsePublished,
  windowCutoff,
  isWithinWindow,
  MAX_SUMMARY_LENGTH,
} from './normalizer';
