/**
 * FeedSync — Errors
 *
 * Every failure the engine reports carries a stable code so callers
 * (scripts, bindings, outcome lists) can branch without parsing messages.
 */

export type FeedSyncErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'FETCH_FAILED'
  | 'STORAGE_FAILED';

export type FetchFailureKind = 'network' | 'timeout' | 'unparseable';

export abstract class FeedSyncError extends Error {
  abstract readonly code: FeedSyncErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends FeedSyncError {
  readonly code = 'INVALID_INPUT' as const;
}

export class NotFoundError extends FeedSyncError {
  readonly code = 'NOT_FOUND' as const;

  constructor(
    readonly resource: 'feed' | 'entry',
    readonly id: string
  ) {
    super(`${resource} not found: ${id}`);
  }
}

export class FetchFailedError extends FeedSyncError {
  readonly code = 'FETCH_FAILED' as const;

  constructor(
    readonly kind: FetchFailureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`fetch failed (${kind}): ${message}`, options);
  }
}

/**
 * Underlying persistence failure. Never retried by the engine.
 */
export class StorageFailedError extends FeedSyncError {
  readonly code = 'STORAGE_FAILED' as const;
}

export function isFeedSyncError(error: unknown): error is FeedSyncError {
  return error instanceof FeedSyncError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
