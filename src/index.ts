/**
 * FeedSync — Public API
 *
 * createSyncEngine wires the configured storage and the HTTP fetcher
 * into a SyncEngine. Bindings and scripts should go through here.
 */

import 'dotenv/config';
import { createServiceClient } from './db/client';
import { InMemoryStorage } from './db/memory';
import type { FeedStorage } from './db/storage';
import { SupabaseStorage } from './db/supabase';
import { HttpFeedFetcher } from './feeds/http-fetcher';
import { loadConfig, type FeedSyncConfig, type StorageConfig } from './lib/config';
import { SyncEngine } from './sync/engine';

export function createStorage(config: StorageConfig): FeedStorage {
  switch (config.backend) {
    case 'supabase':
      return new SupabaseStorage(createServiceClient(config.url, config.serviceRoleKey));
    case 'memory':
      return new InMemoryStorage();
  }
}

export function createSyncEngine(config: FeedSyncConfig = loadConfig()): SyncEngine {
  return new SyncEngine({
    storage: createStorage(config.storage),
    fetcher: new HttpFeedFetcher({
      timeoutMs: config.fetchTimeoutMs,
      userAgent: config.userAgent,
    }),
    concurrency: config.syncConcurrency,
  });
}

export { SyncEngine, type SyncEngineOptions } from './sync/engine';
export type { FeedStorage } from './db/storage';
export type { FeedFetcher } from './feeds/fetcher';
export { InMemoryStorage } from './db/memory';
export { SupabaseStorage } from './db/supabase';
export { checkDatabaseHealth, createServiceClient } from './db/client';
export { HttpFeedFetcher, type HttpFeedFetcherOptions } from './feeds/http-fetcher';
export { parseFeedDocument } from './feeds/parser';
export { naturalIdOf } from './sync/identity';
export { compareEntries } from './sync/views';
export { loadConfig, type FeedSyncConfig, type StorageConfig } from './lib/config';
export {
  FeedSyncError,
  InvalidInputError,
  NotFoundError,
  FetchFailedError,
  StorageFailedError,
  type FeedSyncErrorCode,
  type FetchFailureKind,
} from './lib/errors';
export * from './types';
