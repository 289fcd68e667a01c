/**
 * FeedSync — Type Exports
 *
 * Re-exports all types from the types module.
 */

export type {
  CandidateEntry,
  ParsedFeed,
  Feed,
  Entry,
  FeedMetadataUpdate,
  SyncOutcome,
  FeedSyncResult,
  SyncAllResult,
} from './feed';
export { CandidateEntrySchema, ParsedFeedSchema } from './feed';
