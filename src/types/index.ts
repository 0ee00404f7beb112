/**
 * EconDigest — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Sources
export type { ParserKind, SourceDescriptor, SourceDescriptorInput } from './source';
export { ParserKindSchema, SourceDescriptorSchema, isHttpUrl } from './source';

// Keywords
export type { Keyword, KeywordInput, KeywordSet } from './keyword';
export { KeywordSchema, KeywordsFileSchema } from './keyword';

// Feed entries
export type { RawEntry, CanonicalRecord, NormalizeResult } from './feed-entry';

// Digest
export type { Digest, SourceFailure, KeywordCount } from './digest';
