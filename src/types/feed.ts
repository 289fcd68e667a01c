/**
 * FeedSync — Feed & Entry Types v1.0
 *
 * Stored feeds and entries, plus the normalized shape every fetcher
 * must return before the sync engine sees it.
 */

import { z } from 'zod';

// ============================================================
// PARSED FEED (fetch capability output)
// ============================================================

export const CandidateEntrySchema = z.object({
  guid: z.string().optional(),
  link: z.string().optional(),
  title: z.string(),
  publishedAt: z.number().int().optional(), // Unix seconds
  summary: z.string().optional(),
});
export type CandidateEntry = z.infer<typeof CandidateEntrySchema>;

export const ParsedFeedSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  entries: z.array(CandidateEntrySchema),
});
export type ParsedFeed = z.infer<typeof ParsedFeedSchema>;

// ============================================================
// STORED RECORDS
// ============================================================

/**
 * A tracked RSS/Atom source.
 * Timestamps are Unix seconds.
 */
export interface Feed {
  id: string;
  url: string;
  title: string;
  description?: string;
  lastSyncedAt?: number;
  createdAt: number;
  updatedAt: number;
}

/**
 * One item of a feed, keyed within the feed by its natural identifier.
 */
export interface Entry {
  feedId: string;
  naturalId: string;
  title: string;
  link?: string;
  summary?: string;
  publishedAt: number;
  approved: boolean;
  firstSeenAt: number; // Immutable after insert
}

/**
 * Metadata refreshed on every successful sync.
 */
export interface FeedMetadataUpdate {
  title: string;
  description?: string;
  lastSyncedAt: number;
}

// ============================================================
// SYNC RESULTS
// ============================================================

export interface SyncOutcome {
  feedId: string;
  newEntries: number;
  knownEntries: number;
}

export type FeedSyncResult =
  | { status: 'success'; feedId: string; url: string; newEntries: number }
  | { status: 'failure'; feedId: string; url: string; error: string; code: string };

export interface SyncAllResult {
  results: FeedSyncResult[];
  succeeded: number;
  failed: number;
  totalNewEntries: number;
  durationMs: number;
  completedAt: string;
}
