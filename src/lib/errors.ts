/**
 * Error taxonomy for sync runs and tracker calls
 */

import type { SyncReport } from './types';

export class SyncError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Invalid configuration; fatal before planning */
export class ConfigurationError extends SyncError {}

/** A story failed validation; only that story's operations are dropped */
export class EntityValidationError extends SyncError {
  constructor(readonly storyId: string, message: string) {
    super(`${storyId}: ${message}`);
  }
}

/** No candidate cleared the match threshold; the story will be created */
export class MatchAmbiguityError extends SyncError {
  constructor(
    readonly storyId: string,
    readonly bestScore: number | null,
    readonly threshold: number
  ) {
    super(
      bestScore === null
        ? `${storyId}: no remote candidates left to match`
        : `${storyId}: best title match scored ${bestScore.toFixed(2)} (threshold ${threshold})`
    );
  }
}

/** Retries were exhausted on a transient tracker failure */
export class TransientTrackerError extends SyncError {
  constructor(message: string, readonly attempts: number, cause?: unknown) {
    super(message, cause);
  }
}

/** Authentication or connectivity lost; the run halts and the session is kept for resume */
export class AuthOrConnectionFatalError extends SyncError {
  report: SyncReport | null = null;
}

export class StaleSessionError extends SyncError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} was planned against a different document; re-plan instead of resuming`);
  }
}

export class ConflictError extends SyncError {
  constructor(readonly storyId: string) {
    super(`${storyId}: changed both locally and remotely since last sync and no conflict strategy is set`);
  }
}

export class SessionNotFoundError extends SyncError {
  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export class BackupNotFoundError extends SyncError {}

/**
 * Base for errors raised by IssueTrackerPort implementations
 */
export class TrackerError extends SyncError {
  constructor(message: string, readonly issueKey: string | null = null, cause?: unknown) {
    super(message, cause);
  }
}

export class NotFoundError extends TrackerError {}

export class AuthError extends TrackerError {}

export class ConnectionError extends TrackerError {}

export class TransientNetworkError extends TrackerError {}

export class RateLimitedError extends TrackerError {
  constructor(message: string, readonly retryAfterMs: number | null, issueKey: string | null = null) {
    super(message, issueKey);
  }
}

export class TrackerValidationError extends TrackerError {
  constructor(readonly field: string, readonly reason: string, issueKey: string | null = null) {
    super(`Invalid ${field}: ${reason}`, issueKey);
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof RateLimitedError || error instanceof TransientNetworkError;
}

export function isFatal(error: unknown): boolean {
  return (
    error instanceof AuthError ||
    error instanceof ConnectionError ||
    error instanceof AuthOrConnectionFatalError
  );
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
