/**
 * FeedSync — Storage Capability
 *
 * The only surface the sync engine uses to persist feeds and entries.
 * Implementations throw StorageFailedError for persistence failures.
 */

import type { Entry, Feed, FeedMetadataUpdate } from '../types';

export interface FeedStorage {
  /** All tracked feeds, oldest first */
  listFeeds(): Promise<Feed[]>;

  getFeed(id: string): Promise<Feed | null>;

  getFeedByUrl(url: string): Promise<Feed | null>;

  /**
   * Create a feed together with its initial entries in one atomic step.
   * Readers never observe the feed without its entries.
   */
  addFeed(feed: Feed, entries: Entry[]): Promise<Feed>;

  /**
   * Insert entries for a feed, skipping any (feedId, naturalId) already
   * stored. Returns how many rows were actually inserted.
   */
  upsertEntries(feedId: string, entries: Entry[]): Promise<number>;

  updateFeedMetadata(feedId: string, update: FeedMetadataUpdate): Promise<void>;

  /** Natural identifiers already stored for the feed */
  listEntryIds(feedId: string): Promise<Set<string>>;

  /**
   * Entries of one feed, newest first. Unapproved entries are left out
   * unless requested.
   */
  listEntries(feedId: string, includeUnapproved: boolean): Promise<Entry[]>;

  /** Returns false when the entry does not exist */
  setApproval(feedId: string, naturalId: string, approved: boolean): Promise<boolean>;

  /** Removes the feed and all of its entries. Returns false when absent. */
  deleteFeed(id: string): Promise<boolean>;
}
