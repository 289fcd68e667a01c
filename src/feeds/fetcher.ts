/**
 * FeedSync — Fetch Capability
 *
 * Given a URL, retrieve and parse a feed document. Implementations
 * reject with FetchFailedError (network, timeout or unparseable).
 */

import type { ParsedFeed } from '../types';

export interface FeedFetcher {
  fetch(url: string): Promise<ParsedFeed>;
}
