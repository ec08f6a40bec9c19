/**
 * ReadQueue Error Types
 * Structured errors carry enough context for the caller to build a message;
 * the core never formats UI text.
 */

import type { CacheKind } from './types.js';

export type RetrievalFailure = 'blocked' | 'timeout' | 'not_found';

export abstract class ReadQueueError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Source list unreachable, blocked by the anti-bot layer, or absent */
export class RetrievalError extends ReadQueueError {
  readonly code = 'RETRIEVAL_FAILED';

  constructor(
    readonly username: string,
    readonly reason: RetrievalFailure,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not retrieve to-read list for ${username} (${reason})${detail ? `: ${detail}` : ''}`, options);
  }
}

/** A single library lookup failed */
export class ManagerQueryError extends ReadQueueError {
  readonly code = 'MANAGER_QUERY_FAILED';

  constructor(
    readonly title: string,
    readonly author: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Library lookup failed for "${title}"${author ? ` by ${author}` : ''}: ${detail}`, options);
  }
}

/** A stored cache record could not be read back */
export class CacheCorruptionError extends ReadQueueError {
  readonly code = 'CACHE_CORRUPT';

  constructor(
    readonly username: string,
    readonly kind: CacheKind,
    options?: { cause?: unknown },
  ) {
    super(`Cache entry ${kind} for ${username} is unreadable`, options);
  }
}

/** Thrown when the LazyLibrarian circuit breaker is open - a "skip me", not an infra failure */
export class LibraryCircuitOpenError extends ReadQueueError {
  readonly code = 'LIBRARY_CIRCUIT_OPEN';

  constructor() {
    super('LazyLibrarian circuit breaker is open');
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
