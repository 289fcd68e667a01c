/**
 * FeedSync — Natural Identifier
 *
 * Dedup key of an entry within its feed.
 * Priority: guid, then link, then a hash of title and publish time.
 */

import { createHash } from 'crypto';
import type { CandidateEntry } from '../types';

export const HASH_ID_PREFIX = 'sha256:';

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Hash fallback for entries with neither guid nor link.
 * An absent publish time hashes as the empty string.
 */
export function hashIdentity(title: string, publishedAt: number | undefined): string {
  const digest = createHash('sha256')
    .update(`${title}\n${publishedAt ?? ''}`)
    .digest('hex');
  return `${HASH_ID_PREFIX}${digest}`;
}

export function naturalIdOf(candidate: CandidateEntry): string {
  return (
    present(candidate.guid) ??
    present(candidate.link) ??
    hashIdentity(candidate.title, candidate.publishedAt)
  );
}
