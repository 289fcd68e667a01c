/**
 * FeedSync — HTTP Feed Fetcher
 *
 * Fetches a feed over HTTP with a per-request timeout and parses the body.
 * The timeout covers both the response and reading the body.
 */

import type { ParsedFeed } from '../types';
import { FetchFailedError, toErrorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import type { FeedFetcher } from './fetcher';
import { parseFeedDocument } from './parser';

export interface HttpFeedFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
}

const ACCEPT =
  'application/rss+xml, application/atom+xml, application/rdf+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8';

export class HttpFeedFetcher implements FeedFetcher {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly log = logger.child({ component: 'HttpFeedFetcher' });

  constructor(options: HttpFeedFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.userAgent = options.userAgent ?? 'FeedSync/1.0';
  }

  async fetch(url: string): Promise<ParsedFeed> {
    const body = await this.download(url);
    const parsed = parseFeedDocument(body);

    this.log.debug('Feed parsed', { url, entries: parsed.entries.length });
    return parsed;
  }

  private async download(url: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url, {
        signal: controller.signal,
        redirect: 'follow',
        headers: {
          'User-Agent': this.userAgent,
          Accept: ACCEPT,
        },
      });

      if (!res.ok) {
        throw new FetchFailedError('network', `HTTP ${res.status} from ${url}`);
      }

      return await res.text();
    } catch (error) {
      if (error instanceof FetchFailedError) throw error;
      if (controller.signal.aborted) {
        throw new FetchFailedError('timeout', `No response from ${url} within ${this.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new FetchFailedError('network', toErrorMessage(error), { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
