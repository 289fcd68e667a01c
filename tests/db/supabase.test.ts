/**
 * Tests for the Supabase storage backend
 *
 * The service client talks to a fake PostgREST through its fetch
 * option; nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import { SupabaseStorage } from '../../src/db/supabase';
import { checkDatabaseHealth, createServiceClient } from '../../src/db/client';
import { StorageFailedError } from '../../src/lib/errors';
import type { Entry } from '../../src/types';

interface RestCall {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

type RestReply = { status: number; body: unknown };

function fakeRest(reply: (call: RestCall) => RestReply) {
  const calls: RestCall[] = [];
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const call: RestCall = {
      method: init?.method ?? 'GET',
      url: new URL(input instanceof Request ? input.url : input.toString()),
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    calls.push(call);
    const { status, body } = reply(call);
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const client = createServiceClient('https://project.supabase.test', 'test-secret', {
    fetch: fetchMock,
  });

  return { client, calls, storage: new SupabaseStorage(client) };
}

const FEED_ROW = {
  id: 'feed-1',
  url: 'https://x.test/rss',
  title: 'X',
  description: null,
  last_synced_at: 2000,
  created_at: 1000,
  updated_at: 2000,
};

const ENTRY: Entry = {
  feedId: 'feed-1',
  naturalId: 'a',
  title: 'A',
  publishedAt: 100,
  approved: false,
  firstSeenAt: 2000,
};

describe('SupabaseStorage', () => {
  it('should map a feed row to a Feed', async () => {
    const { storage, calls } = fakeRest(() => ({ status: 200, body: [FEED_ROW] }));

    expect(await storage.getFeed('feed-1')).toEqual({
      id: 'feed-1',
      url: 'https://x.test/rss',
      title: 'X',
      description: undefined,
      lastSyncedAt: 2000,
      createdAt: 1000,
      updatedAt: 2000,
    });
    expect(calls[0].url.pathname).toBe('/rest/v1/feeds');
    expect(calls[0].url.searchParams.get('id')).toBe('eq.feed-1');
  });

  it('should return null for a missing feed', async () => {
    const { storage } = fakeRest(() => ({ status: 200, body: [] }));

    expect(await storage.getFeed('missing')).toBeNull();
  });

  it('should create a feed and its entries in one call', async () => {
    const { storage, calls } = fakeRest(() => ({ status: 200, body: [FEED_ROW] }));

    const created = await storage.addFeed(
      { id: 'feed-1', url: 'https://x.test/rss', title: 'X', lastSyncedAt: 2000, createdAt: 1000, updatedAt: 2000 },
      [ENTRY]
    );

    expect(created.id).toBe('feed-1');
    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe('POST');
    expect(calls[0].url.pathname).toBe('/rest/v1/rpc/create_feed_with_entries');
    expect(calls[0].body).toEqual({
      p_feed: FEED_ROW,
      p_entries: [
        {
          feed_id: 'feed-1',
          natural_id: 'a',
          title: 'A',
          link: null,
          summary: null,
          published_at: 100,
          approved: false,
          first_seen_at: 2000,
        },
      ],
    });
  });

  it('should insert entries ignoring stored duplicates', async () => {
    const { storage, calls } = fakeRest(() => ({ status: 201, body: [{ natural_id: 'b' }] }));

    const inserted = await storage.upsertEntries('feed-1', [ENTRY, { ...ENTRY, naturalId: 'b' }]);

    expect(inserted).toBe(1);
    expect(calls[0].url.pathname).toBe('/rest/v1/feed_entries');
    expect(calls[0].url.searchParams.get('on_conflict')).toBe('feed_id,natural_id');
    expect(calls[0].headers.get('Prefer')).toContain('resolution=ignore-duplicates');
  });

  it('should skip the request when there is nothing to insert', async () => {
    const { storage, calls } = fakeRest(() => ({ status: 201, body: [] }));

    expect(await storage.upsertEntries('feed-1', [])).toBe(0);
    expect(calls).toHaveLength(0);
  });

  it('should filter to approved entries unless asked', async () => {
    const { storage, calls } = fakeRest(() => ({ status: 200, body: [] }));

    await storage.listEntries('feed-1', false);
    await storage.listEntries('feed-1', true);

    expect(calls[0].url.searchParams.get('approved')).toBe('eq.true');
    expect(calls[1].url.searchParams.has('approved')).toBe(false);
  });

  it('should report whether an approval matched a row', async () => {
    const { storage } = fakeRest(call => ({
      status: 200,
      body: call.url.searchParams.get('natural_id') === 'eq.a' ? [{ natural_id: 'a' }] : [],
    }));

    expect(await storage.setApproval('feed-1', 'a', true)).toBe(true);
    expect(await storage.setApproval('feed-1', 'zzz', true)).toBe(false);
  });

  it('should wrap PostgREST errors as storage failures', async () => {
    const { storage } = fakeRest(() => ({
      status: 409,
      body: { message: 'duplicate key value violates unique constraint', code: '23505' },
    }));

    const error = await storage.addFeed(
      { id: 'feed-2', url: 'https://x.test/rss', title: 'X', createdAt: 1, updatedAt: 1 },
      []
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StorageFailedError);
    expect(error).toMatchObject({
      message: 'Supabase error: duplicate key value violates unique constraint (code: 23505)',
    });
  });

  it('should reject rows of an unexpected shape', async () => {
    const { storage } = fakeRest(() => ({ status: 200, body: [{ id: 'feed-1' }] }));

    await expect(storage.listFeeds()).rejects.toBeInstanceOf(StorageFailedError);
  });
});

describe('createServiceClient', () => {
  it('should build a client without opening a realtime socket', () => {
    const client = createServiceClient('https://project.supabase.test', 'test-secret');

    expect(client.from('feeds')).toBeDefined();
  });
});

describe('checkDatabaseHealth', () => {
  it('should report a reachable database as healthy', async () => {
    const { client } = fakeRest(() => ({ status: 200, body: [] }));

    expect(await checkDatabaseHealth(client)).toMatchObject({ healthy: true });
  });

  it('should report query errors', async () => {
    const { client } = fakeRest(() => ({
      status: 500,
      body: { message: 'relation "feeds" does not exist', code: '42P01' },
    }));

    expect(await checkDatabaseHealth(client)).toMatchObject({
      healthy: false,
      error: 'relation "feeds" does not exist',
    });
  });
});
