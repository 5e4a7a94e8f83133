/**
 * DealRelay — Type Exports
 */

export type { MediaKind, MediaRef, CanonicalMessage, MessageIdentity } from './message';
export { identityOf, identityKey } from './message';

export type { RuleSet, ScoreResult } from './scoring';
export { RuleSetSchema, KeywordWeightsSchema, DEFAULT_INCLUDE_WEIGHT } from './scoring';

export type { DedupOutcome, Cursor, DedupEntry } from './state';
export { DedupOutcomeSchema, CursorSchema, DedupEntrySchema } from './state';
