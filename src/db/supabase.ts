/**
 * FeedSync — Supabase Storage
 *
 * FeedStorage backed by the `feeds` and `feed_entries` tables
 * (see supabase/schema.sql). Atomic feed creation goes through the
 * `create_feed_with_entries` function; dedup-on-write relies on the
 * (feed_id, natural_id) primary key.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Entry, Feed, FeedMetadataUpdate } from '../types';
import { handleSupabaseError } from './client';
import type { FeedStorage } from './storage';

// ============================================================
// ROW SHAPES
// ============================================================

const FeedRowSchema = z.object({
  id: z.string(),
  url: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  last_synced_at: z.number().nullable(),
  created_at: z.number(),
  updated_at: z.number(),
});
type FeedRow = z.infer<typeof FeedRowSchema>;

const EntryRowSchema = z.object({
  feed_id: z.string(),
  natural_id: z.string(),
  title: z.string(),
  link: z.string().nullable(),
  summary: z.string().nullable(),
  published_at: z.number(),
  approved: z.boolean(),
  first_seen_at: z.number(),
});
type EntryRow = z.infer<typeof EntryRowSchema>;

const FEED_COLUMNS = 'id, url, title, description, last_synced_at, created_at, updated_at';
const ENTRY_COLUMNS =
  'feed_id, natural_id, title, link, summary, published_at, approved, first_seen_at';

function parseRows<T>(schema: z.ZodType<T>, data: unknown): T[] {
  const parsed = z.array(schema).safeParse(data ?? []);
  if (!parsed.success) {
    throw handleSupabaseError({ message: `Unexpected row shape: ${parsed.error.message}` });
  }
  return parsed.data;
}

function toFeed(row: FeedRow): Feed {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    description: row.description ?? undefined,
    lastSyncedAt: row.last_synced_at ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toFeedRow(feed: Feed): FeedRow {
  return {
    id: feed.id,
    url: feed.url,
    title: feed.title,
    description: feed.description ?? null,
    last_synced_at: feed.lastSyncedAt ?? null,
    created_at: feed.createdAt,
    updated_at: feed.updatedAt,
  };
}

function toEntry(row: EntryRow): Entry {
  return {
    feedId: row.feed_id,
    naturalId: row.natural_id,
    title: row.title,
    link: row.link ?? undefined,
    summary: row.summary ?? undefined,
    publishedAt: row.published_at,
    approved: row.approved,
    firstSeenAt: row.first_seen_at,
  };
}

function toEntryRow(feedId: string, entry: Entry): EntryRow {
  return {
    feed_id: feedId,
    natural_id: entry.naturalId,
    title: entry.title,
    link: entry.link ?? null,
    summary: entry.summary ?? null,
    published_at: entry.publishedAt,
    approved: entry.approved,
    first_seen_at: entry.firstSeenAt,
  };
}

// ============================================================
// STORAGE
// ============================================================

export class SupabaseStorage implements FeedStorage {
  constructor(private readonly client: SupabaseClient) {}

  async listFeeds(): Promise<Feed[]> {
    const { data, error } = await this.client
      .from('feeds')
      .select(FEED_COLUMNS)
      .order('created_at', { ascending: true })
      .order('id', { ascending: true });

    if (error) throw handleSupabaseError(error);
    return parseRows(FeedRowSchema, data).map(toFeed);
  }

  async getFeed(id: string): Promise<Feed | null> {
    const { data, error } = await this.client
      .from('feeds')
      .select(FEED_COLUMNS)
      .eq('id', id)
      .maybeSingle();

    if (error) throw handleSupabaseError(error);
    return data ? toFeed(parseRows(FeedRowSchema, [data])[0]) : null;
  }

  async getFeedByUrl(url: string): Promise<Feed | null> {
    const { data, error } = await this.client
      .from('feeds')
      .select(FEED_COLUMNS)
      .eq('url', url)
      .maybeSingle();

    if (error) throw handleSupabaseError(error);
    return data ? toFeed(parseRows(FeedRowSchema, [data])[0]) : null;
  }

  async addFeed(feed: Feed, entries: Entry[]): Promise<Feed> {
    const { data, error } = await this.client.rpc('create_feed_with_entries', {
      p_feed: toFeedRow(feed),
      p_entries: entries.map(entry => toEntryRow(feed.id, entry)),
    });

    if (error) throw handleSupabaseError(error);
    const [row] = parseRows(FeedRowSchema, data);
    if (!row) throw handleSupabaseError({ message: 'create_feed_with_entries returned no row' });
    return toFeed(row);
  }

  async upsertEntries(feedId: string, entries: Entry[]): Promise<number> {
    if (entries.length === 0) return 0;

    const { data, error } = await this.client
      .from('feed_entries')
      .upsert(
        entries.map(entry => toEntryRow(feedId, entry)),
        { onConflict: 'feed_id,natural_id', ignoreDuplicates: true }
      )
      .select('natural_id');

    if (error) throw handleSupabaseError(error);
    return data?.length ?? 0;
  }

  async updateFeedMetadata(feedId: string, update: FeedMetadataUpdate): Promise<void> {
    const { error } = await this.client
      .from('feeds')
      .update({
        title: update.title,
        description: update.description ?? null,
        last_synced_at: update.lastSyncedAt,
        updated_at: update.lastSyncedAt,
      })
      .eq('id', feedId);

    if (error) throw handleSupabaseError(error);
  }

  async listEntryIds(feedId: string): Promise<Set<string>> {
    const { data, error } = await this.client
      .from('feed_entries')
      .select('natural_id')
      .eq('feed_id', feedId);

    if (error) throw handleSupabaseError(error);
    const rows = parseRows(z.object({ natural_id: z.string() }), data);
    return new Set(rows.map(row => row.natural_id));
  }

  async listEntries(feedId: string, includeUnapproved: boolean): Promise<Entry[]> {
    let query = this.client
      .from('feed_entries')
      .select(ENTRY_COLUMNS)
      .eq('feed_id', feedId);

    if (!includeUnapproved) {
      query = query.eq('approved', true);
    }

    const { data, error } = await query
      .order('published_at', { ascending: false })
      .order('first_seen_at', { ascending: false })
      .order('natural_id', { ascending: true });

    if (error) throw handleSupabaseError(error);
    return parseRows(EntryRowSchema, data).map(toEntry);
  }

  async setApproval(feedId: string, naturalId: string, approved: boolean): Promise<boolean> {
    const { data, error } = await this.client
      .from('feed_entries')
      .update({ approved })
      .eq('feed_id', feedId)
      .eq('natural_id', naturalId)
      .select('natural_id');

    if (error) throw handleSupabaseError(error);
    return (data?.length ?? 0) > 0;
  }

  async deleteFeed(id: string): Promise<boolean> {
    // feed_entries rows go with it through ON DELETE CASCADE
    const { data, error } = await this.client
      .from('feeds')
      .delete()
      .eq('id', id)
      .select('id');

    if (error) throw handleSupabaseError(error);
    return (data?.length ?? 0) > 0;
  }
}
