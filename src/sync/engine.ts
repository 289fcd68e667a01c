/**
 * FeedSync — Sync Engine
 *
 * Orchestrates the feed lifecycle:
 * 1. Fetch the document (outside the write lock)
 * 2. Merge candidates against stored identifiers
 * 3. Persist new entries under the write lock
 * 4. Serve approval-filtered read views
 *
 * Fetch failures are reported, never retried here.
 */

import { nanoid } from 'nanoid';
import pLimit from 'p-limit';
import type {
  Entry,
  Feed,
  FeedSyncResult,
  ParsedFeed,
  SyncAllResult,
  SyncOutcome,
} from '../types';
import { ParsedFeedSchema } from '../types';
import type { FeedStorage } from '../db/storage';
import type { FeedFetcher } from '../feeds/fetcher';
import {
  FetchFailedError,
  InvalidInputError,
  NotFoundError,
  StorageFailedError,
  isFeedSyncError,
  toErrorMessage,
} from '../lib/errors';
import { createWriteLock, type WriteLock } from '../lib/lock';
import { logger, timeOperation } from '../lib/logger';
import { fallbackTitle, normalizeFeedUrl } from './feed-url';
import { mergeCandidates } from './merge';
import { buildTimeline, orderEntries } from './views';

// ============================================================
// TYPES
// ============================================================

export interface SyncEngineOptions {
  storage: FeedStorage;
  fetcher: FeedFetcher;
  /** Current time in Unix seconds */
  clock?: () => number;
  /** Id for newly added feeds */
  generateId?: () => string;
  /** Feeds fetched in parallel by syncAll */
  concurrency?: number;
}

const DEFAULT_CONCURRENCY = 4;

const systemClock = (): number => Math.floor(Date.now() / 1000);

type SyncSuccess = Extract<FeedSyncResult, { status: 'success' }>;

function isSuccess(result: FeedSyncResult): result is SyncSuccess {
  return result.status === 'success';
}

// ============================================================
// ENGINE
// ============================================================

export class SyncEngine {
  private readonly storage: FeedStorage;
  private readonly fetcher: FeedFetcher;
  private readonly clock: () => number;
  private readonly generateId: () => string;
  private readonly concurrency: number;
  private readonly withWriteLock: WriteLock = createWriteLock();
  private readonly log = logger.child({ component: 'SyncEngine' });

  constructor(options: SyncEngineOptions) {
    this.storage = options.storage;
    this.fetcher = options.fetcher;
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? (() => nanoid());
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new InvalidInputError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
  }

  // ----------------------------------------------------------
  // Feed lifecycle
  // ----------------------------------------------------------

  /**
   * Start tracking a feed. All-or-nothing: if the fetch fails, nothing
   * is stored.
   */
  async addFeed(url: string): Promise<Feed> {
    const feedUrl = normalizeFeedUrl(url);

    if (await this.withWriteLock(() => this.store(() => this.storage.getFeedByUrl(feedUrl)))) {
      throw new InvalidInputError(`Feed already tracked: ${feedUrl}`);
    }

    const parsed = await this.fetchFeed(feedUrl);

    return this.withWriteLock(async () => {
      // Another caller may have added it while we were fetching
      if (await this.store(() => this.storage.getFeedByUrl(feedUrl))) {
        throw new InvalidInputError(`Feed already tracked: ${feedUrl}`);
      }

      const now = this.clock();
      const feed: Feed = {
        id: this.generateId(),
        url: feedUrl,
        title: parsed.title ?? fallbackTitle(feedUrl),
        description: parsed.description,
        lastSyncedAt: now,
        createdAt: now,
        updatedAt: now,
      };

      const merge = mergeCandidates(feed.id, parsed.entries, new Set(), now);
      const created = await this.store(() => this.storage.addFeed(feed, merge.newEntries));

      this.log.info('Feed added', {
        feedId: created.id,
        url: created.url,
        entries: merge.newEntries.length,
        batchDuplicates: merge.batchDuplicateCount,
      });

      return created;
    });
  }

  /**
   * Fetch one feed and merge its new entries.
   */
  async sync(feedId: string): Promise<SyncOutcome> {
    const feed = await this.getFeed(feedId);
    const parsed = await this.fetchFeed(feed.url);
    return this.withWriteLock(() => this.mergeFetched(feed.id, parsed));
  }

  /**
   * Sync every tracked feed. One feed's failure is reported in its own
   * result; only a storage failure rejects the whole batch.
   */
  async syncAll(): Promise<SyncAllResult> {
    const startTime = Date.now();
    const feeds = await this.listFeeds();
    const limit = pLimit(this.concurrency);

    const results = await timeOperation(
      'syncAll',
      () => Promise.all(feeds.map(feed => limit(() => this.syncOne(feed)))),
      this.log
    );

    const succeeded = results.filter(isSuccess);
    const result: SyncAllResult = {
      results,
      succeeded: succeeded.length,
      failed: results.length - succeeded.length,
      totalNewEntries: succeeded.reduce((sum, r) => sum + r.newEntries, 0),
      durationMs: Date.now() - startTime,
      completedAt: new Date().toISOString(),
    };

    this.log.info('Sync completed', {
      feeds: feeds.length,
      succeeded: result.succeeded,
      failed: result.failed,
      newEntries: result.totalNewEntries,
    });

    return result;
  }

  /**
   * Stop tracking a feed; its entries go with it.
   */
  async deleteFeed(feedId: string): Promise<void> {
    await this.withWriteLock(async () => {
      const deleted = await this.store(() => this.storage.deleteFeed(feedId));
      if (!deleted) throw new NotFoundError('feed', feedId);
      this.log.info('Feed deleted', { feedId });
    });
  }

  /**
   * The external approval action. Syncs never call this.
   */
  async setApproval(feedId: string, naturalId: string, approved: boolean): Promise<void> {
    await this.withWriteLock(async () => {
      await this.requireFeed(feedId);
      const updated = await this.store(() =>
        this.storage.setApproval(feedId, naturalId, approved)
      );
      if (!updated) throw new NotFoundError('entry', naturalId);
    });
  }

  // ----------------------------------------------------------
  // Read views
  // ----------------------------------------------------------

  async listFeeds(): Promise<Feed[]> {
    return this.withWriteLock(() => this.store(() => this.storage.listFeeds()));
  }

  async getFeed(feedId: string): Promise<Feed> {
    return this.withWriteLock(() => this.requireFeed(feedId));
  }

  async listEntries(feedId: string, includeUnapproved = false): Promise<Entry[]> {
    return this.withWriteLock(async () => {
      await this.requireFeed(feedId);
      const entries = await this.store(() =>
        this.storage.listEntries(feedId, includeUnapproved)
      );
      return orderEntries(entries, includeUnapproved);
    });
  }

  /**
   * Entries of every feed in one deterministic order.
   */
  async timeline(includeUnapproved = false): Promise<Entry[]> {
    return this.withWriteLock(async () => {
      const feeds = await this.store(() => this.storage.listFeeds());
      const perFeed = await Promise.all(
        feeds.map(feed => this.store(() => this.storage.listEntries(feed.id, includeUnapproved)))
      );
      return buildTimeline(perFeed, includeUnapproved);
    });
  }

  // ----------------------------------------------------------
  // Internals
  // ----------------------------------------------------------

  private async syncOne(feed: Feed): Promise<FeedSyncResult> {
    try {
      const parsed = await this.fetchFeed(feed.url);
      const outcome = await this.withWriteLock(() => this.mergeFetched(feed.id, parsed));
      return { status: 'success', feedId: feed.id, url: feed.url, newEntries: outcome.newEntries };
    } catch (error) {
      if (error instanceof StorageFailedError) throw error;

      this.log.warn('Feed sync failed', {
        feedId: feed.id,
        url: feed.url,
        error: toErrorMessage(error),
      });

      return {
        status: 'failure',
        feedId: feed.id,
        url: feed.url,
        error: toErrorMessage(error),
        code: isFeedSyncError(error) ? error.code : 'UNKNOWN',
      };
    }
  }

  /**
   * Must run under the write lock.
   */
  private async mergeFetched(feedId: string, parsed: ParsedFeed): Promise<SyncOutcome> {
    // The feed may have been deleted while its fetch was in flight
    const feed = await this.requireFeed(feedId);
    const now = this.clock();

    const storedIds = await this.store(() => this.storage.listEntryIds(feedId));
    const merge = mergeCandidates(feedId, parsed.entries, storedIds, now);
    const inserted = await this.store(() => this.storage.upsertEntries(feedId, merge.newEntries));

    await this.store(() =>
      this.storage.updateFeedMetadata(feedId, {
        title: parsed.title ?? feed.title,
        description: parsed.description ?? feed.description,
        lastSyncedAt: now,
      })
    );

    this.log.info('Feed synced', {
      feedId,
      newEntries: inserted,
      knownEntries: merge.knownCount,
    });

    return { feedId, newEntries: inserted, knownEntries: merge.knownCount };
  }

  private async requireFeed(feedId: string): Promise<Feed> {
    const feed = await this.store(() => this.storage.getFeed(feedId));
    if (!feed) throw new NotFoundError('feed', feedId);
    return feed;
  }

  /**
   * Call the fetch capability and check what it returned.
   */
  private async fetchFeed(url: string): Promise<ParsedFeed> {
    let raw: unknown;
    try {
      raw = await this.fetcher.fetch(url);
    } catch (error) {
      if (error instanceof FetchFailedError) throw error;
      throw new FetchFailedError('network', toErrorMessage(error), { cause: error });
    }

    const parsed = ParsedFeedSchema.safeParse(raw);
    if (!parsed.success) {
      throw new FetchFailedError('unparseable', `Fetcher returned an invalid feed for ${url}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * Run a storage call, reporting anything that isn't already one of
   * ours as a StorageFailedError.
   */
  private async store<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isFeedSyncError(error)) throw error;
      throw new StorageFailedError(toErrorMessage(error), { cause: error });
    }
  }
}
