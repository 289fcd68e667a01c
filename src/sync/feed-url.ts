/**
 * FeedSync — Feed URL handling
 */

import { InvalidInputError } from '../lib/errors';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Validate an absolute http(s) URL and return its normalized form.
 */
export function normalizeFeedUrl(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidInputError('Feed URL is empty');
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new InvalidInputError(`Not an absolute URL: ${input}`);
  }

  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new InvalidInputError(`Unsupported URL scheme "${url.protocol}" in ${input}`);
  }
  if (!url.host) {
    throw new InvalidInputError(`URL has no host: ${input}`);
  }

  return url.href;
}

/**
 * Title used when the feed document carries none.
 */
export function fallbackTitle(feedUrl: string): string {
  return new URL(feedUrl).host;
}
