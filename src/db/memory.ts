/**
 * FeedSync — In-Memory Storage
 *
 * Process-local FeedStorage. Default backend, and the fake the engine
 * tests run against. Records are copied on the way in and out so callers
 * cannot mutate stored state.
 */

import type { Entry, Feed, FeedMetadataUpdate } from '../types';
import { StorageFailedError } from '../lib/errors';
import { compareStrings, orderEntries } from '../sync/views';
import type { FeedStorage } from './storage';

export class InMemoryStorage implements FeedStorage {
  private readonly feeds = new Map<string, Feed>();
  // Inner maps keep insertion (source document) order
  private readonly entries = new Map<string, Map<string, Entry>>();

  async listFeeds(): Promise<Feed[]> {
    return Array.from(this.feeds.values())
      .sort((a, b) => a.createdAt - b.createdAt || compareStrings(a.id, b.id))
      .map(feed => ({ ...feed }));
  }

  async getFeed(id: string): Promise<Feed | null> {
    const feed = this.feeds.get(id);
    return feed ? { ...feed } : null;
  }

  async getFeedByUrl(url: string): Promise<Feed | null> {
    for (const feed of this.feeds.values()) {
      if (feed.url === url) return { ...feed };
    }
    return null;
  }

  async addFeed(feed: Feed, entries: Entry[]): Promise<Feed> {
    if (this.feeds.has(feed.id)) {
      throw new StorageFailedError(`Duplicate feed id: ${feed.id}`);
    }
    if (await this.getFeedByUrl(feed.url)) {
      throw new StorageFailedError(`Duplicate feed url: ${feed.url}`);
    }

    const stored = new Map<string, Entry>();
    for (const entry of entries) {
      if (!stored.has(entry.naturalId)) {
        stored.set(entry.naturalId, { ...entry, feedId: feed.id });
      }
    }

    this.feeds.set(feed.id, { ...feed });
    this.entries.set(feed.id, stored);
    return { ...feed };
  }

  async upsertEntries(feedId: string, entries: Entry[]): Promise<number> {
    const stored = this.entries.get(feedId);
    if (!stored) {
      throw new StorageFailedError(`Cannot insert entries for unknown feed: ${feedId}`);
    }

    let inserted = 0;
    for (const entry of entries) {
      if (stored.has(entry.naturalId)) continue;
      stored.set(entry.naturalId, { ...entry, feedId });
      inserted++;
    }
    return inserted;
  }

  async updateFeedMetadata(feedId: string, update: FeedMetadataUpdate): Promise<void> {
    const feed = this.feeds.get(feedId);
    if (!feed) {
      throw new StorageFailedError(`Cannot update unknown feed: ${feedId}`);
    }
    this.feeds.set(feedId, {
      ...feed,
      title: update.title,
      description: update.description,
      lastSyncedAt: update.lastSyncedAt,
      updatedAt: update.lastSyncedAt,
    });
  }

  async listEntryIds(feedId: string): Promise<Set<string>> {
    return new Set(this.entries.get(feedId)?.keys() ?? []);
  }

  async listEntries(feedId: string, includeUnapproved: boolean): Promise<Entry[]> {
    const stored = this.entries.get(feedId);
    if (!stored) return [];
    return orderEntries(Array.from(stored.values()), includeUnapproved).map(entry => ({
      ...entry,
    }));
  }

  async setApproval(feedId: string, naturalId: string, approved: boolean): Promise<boolean> {
    const entry = this.entries.get(feedId)?.get(naturalId);
    if (!entry) return false;
    entry.approved = approved;
    return true;
  }

  async deleteFeed(id: string): Promise<boolean> {
    if (!this.feeds.has(id)) return false;
    this.feeds.delete(id);
    this.entries.delete(id);
    return true;
  }
}
