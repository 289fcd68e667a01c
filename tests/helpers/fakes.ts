/**
 * Test doubles for the fetch capability, plus a controllable clock.
 */

import { InMemoryStorage } from '../../src/db/memory';
import type { FeedFetcher } from '../../src/feeds/fetcher';
import { FetchFailedError } from '../../src/lib/errors';
import type { CandidateEntry, Entry, ParsedFeed } from '../../src/types';

type ScriptedResponse = ParsedFeed | Error;

/**
 * Serves canned documents per URL. Unknown URLs fail as network errors.
 */
export class ScriptedFetcher implements FeedFetcher {
  readonly calls: string[] = [];
  private readonly responses = new Map<string, ScriptedResponse>();
  private readonly gates = new Map<string, Promise<void>>();

  respond(url: string, response: ScriptedResponse): this {
    this.responses.set(url, response);
    return this;
  }

  /** Hold fetches of `url` until the returned release function is called */
  hold(url: string): () => void {
    let release: () => void = () => undefined;
    this.gates.set(url, new Promise<void>(resolve => {
      release = resolve;
    }));
    return release;
  }

  async fetch(url: string): Promise<ParsedFeed> {
    this.calls.push(url);

    const gate = this.gates.get(url);
    if (gate) await gate;

    const response = this.responses.get(url);
    if (!response) throw new FetchFailedError('network', `no route to ${url}`);
    if (response instanceof Error) throw response;
    return { ...response, entries: response.entries.map(entry => ({ ...entry })) };
  }
}

export function feedOf(entries: CandidateEntry[], title?: string): ParsedFeed {
  return { title, entries };
}

export class TestClock {
  constructor(public now: number) {}

  readonly read = (): number => this.now;
}

export function sequentialIds(prefix = 'feed'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/**
 * In-memory storage whose entry inserts can be paused mid-merge.
 */
export class GatedStorage extends InMemoryStorage {
  upsertStarted = false;
  private gate: Promise<void> | undefined;

  holdUpserts(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>(resolve => {
      release = resolve;
    });
    return release;
  }

  async upsertEntries(feedId: string, entries: Entry[]): Promise<number> {
    this.upsertStarted = true;
    if (this.gate) await this.gate;
    return super.upsertEntries(feedId, entries);
  }
}
