/**
 * FeedSync — Write Lock
 *
 * A single-slot queue: tasks run one at a time in submission order.
 * Guards every storage write and the reads that must not see a partial merge.
 */

import pLimit from 'p-limit';

export type WriteLock = <T>(task: () => Promise<T>) => Promise<T>;

export function createWriteLock(): WriteLock {
  const limit = pLimit(1);
  return <T>(task: () => Promise<T>) => limit(task);
}
