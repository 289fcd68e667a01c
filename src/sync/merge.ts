/**
 * FeedSync — Merge
 *
 * Reconciles freshly fetched candidates against the identifiers already
 * stored for a feed. History is frozen at first ingestion: a known
 * candidate never overwrites its stored entry.
 */

import type { CandidateEntry, Entry } from '../types';
import { naturalIdOf } from './identity';

export interface MergeResult {
  /** New entries, in source document order */
  newEntries: Entry[];
  /** Candidates already stored for this feed */
  knownCount: number;
  /** Repeats of an identifier earlier in the same batch */
  batchDuplicateCount: number;
  totalProcessed: number;
}

export function toEntry(
  feedId: string,
  naturalId: string,
  candidate: CandidateEntry,
  now: number
): Entry {
  return {
    feedId,
    naturalId,
    title: candidate.title,
    link: candidate.link,
    summary: candidate.summary,
    publishedAt: candidate.publishedAt ?? now,
    approved: false,
    firstSeenAt: now,
  };
}

/**
 * Split candidates into new and known. The first occurrence of an
 * identifier within the batch wins.
 */
export function mergeCandidates(
  feedId: string,
  candidates: CandidateEntry[],
  storedIds: ReadonlySet<string>,
  now: number
): MergeResult {
  const newEntries: Entry[] = [];
  const seen = new Set<string>();
  let knownCount = 0;
  let batchDuplicateCount = 0;

  for (const candidate of candidates) {
    const naturalId = naturalIdOf(candidate);

    if (storedIds.has(naturalId)) {
      knownCount++;
      continue;
    }
    if (seen.has(naturalId)) {
      batchDuplicateCount++;
      continue;
    }

    seen.add(naturalId);
    newEntries.push(toEntry(feedId, naturalId, candidate, now));
  }

  return {
    newEntries,
    knownCount,
    batchDuplicateCount,
    totalProcessed: candidates.length,
  };
}
