/**
 * FeedSync — Read Views
 *
 * Ordering and approval filtering shared by per-feed listings and the
 * cross-feed timeline. The order is total: published-at desc,
 * first-seen-at desc, feed id asc, natural id asc.
 */

import type { Entry } from '../types';

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareEntries(a: Entry, b: Entry): number {
  return (
    b.publishedAt - a.publishedAt ||
    b.firstSeenAt - a.firstSeenAt ||
    compareStrings(a.feedId, b.feedId) ||
    compareStrings(a.naturalId, b.naturalId)
  );
}

export function filterByApproval(entries: readonly Entry[], includeUnapproved: boolean): Entry[] {
  return includeUnapproved ? [...entries] : entries.filter(entry => entry.approved);
}

/**
 * Filter then sort. Returns a new array; the input is left untouched.
 */
export function orderEntries(entries: readonly Entry[], includeUnapproved = false): Entry[] {
  return filterByApproval(entries, includeUnapproved).sort(compareEntries);
}

/**
 * Merge per-feed entry lists into one timeline.
 */
export function buildTimeline(
  entriesByFeed: ReadonlyArray<readonly Entry[]>,
  includeUnapproved = false
): Entry[] {
  return orderEntries(entriesByFeed.flat(), includeUnapproved);
}
