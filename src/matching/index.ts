/**
 * EconDigest — Matching Module
 *
 * Scoring, deduplication and ranking. All pure, no I/O.
 */

export { createKeywordSet } from './keywords';

export {
  scoreRecord,
  scoreRecords,
  filterByScore,
} from './scorer';

export {
  deduplicate,
  normalizeLink,
  normalizeTitle,
  compareDuplicates,
  compareStrings,
  type DedupResult,
  type SourceOrder,
} from './dedup';

export {
  compareForDigest,
  rankRecords,
  countKeywords,
  buildDigest,
  type DigestInput,
} from './ranker';
