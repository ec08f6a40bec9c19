/**
 * ReadQueue Resilience Utilities
 * Fetch timeouts, retry logic, and crash handlers.
 */

// =============================================================================
// Fetch with Timeout
// =============================================================================

export class FetchTimeoutError extends Error {
  constructor(readonly url: string, readonly timeout: number) {
    super(`Request to ${url} timed out after ${timeout}ms`);
    this.name = 'FetchTimeoutError';
  }
}

/**
 * Wrapper around fetch() with an AbortController timeout.
 * A caller-supplied signal is honoured as well; its abort reason is rethrown unchanged.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeout?: number } = {}
): Promise<Response> {
  const { timeout = 15000, signal: callerSignal, ...fetchOptions } = options;

  callerSignal?.throwIfAborted();

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeout);

  const onCallerAbort = () => controller.abort(callerSignal?.reason);
  callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    return await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (timedOut) {
      throw new FetchTimeoutError(url, timeout);
    }
    if (callerSignal?.aborted) {
      throw callerSignal.reason;
    }
    throw error;
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  }
}

// =============================================================================
// Retry with Exponential Backoff
// =============================================================================

export interface RetryOptions {
  maxRetries?: number;       // Default: 3
  baseDelay?: number;        // Default: 1000ms, doubled per attempt
  maxDelay?: number;         // Default: 30000ms
  signal?: AbortSignal;      // Stops retrying once aborted
}

const RETRYABLE_STATUSES = new Set([429, 502, 503, 504]);

/**
 * Timeouts, connection failures from fetch and gateway/rate-limit statuses.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof FetchTimeoutError) return true;
  if (error instanceof TypeError && error.message === 'fetch failed') return true;
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return RETRYABLE_STATUSES.has(error.status);
  }
  return false;
}

/**
 * Retry a transiently failing call with exponential backoff and jitter.
 * Throws the last error once retries run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelay = 1000, maxDelay = 30000, signal } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || signal?.aborted || !isTransientError(error)) {
        throw error;
      }

      const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);
      const waitMs = Math.round(delay + delay * 0.1 * Math.random());

      console.log(`[Retry] Attempt ${attempt + 1}/${maxRetries} failed, retrying in ${waitMs}ms...`);
      await new Promise(resolve => setTimeout(resolve, waitMs));
    }
  }
}

// =============================================================================
// Process Crash Handlers
// =============================================================================

type CleanupFn = () => void;
const cleanupHandlers: CleanupFn[] = [];
let handlersInstalled = false;

/**
 * Register a cleanup function to run on process exit/crash.
 * Call this once per module that needs cleanup (e.g., database close).
 */
export function registerCleanup(fn: CleanupFn): void {
  cleanupHandlers.push(fn);

  if (handlersInstalled) return;
  handlersInstalled = true;

  const runCleanup = (reason: string) => {
    console.log(`\n[ReadQueue] Shutting down (${reason})...`);
    for (const handler of cleanupHandlers) {
      try {
        handler();
      } catch (error) {
        console.error('[ReadQueue] Cleanup handler failed:', error);
      }
    }
  };

  // Graceful signals (Docker sends SIGTERM)
  process.on('SIGTERM', () => {
    runCleanup('SIGTERM');
    process.exit(0);
  });

  process.on('SIGINT', () => {
    runCleanup('SIGINT');
    process.exit(0);
  });

  // Crash handlers (log before dying)
  process.on('uncaughtException', (error) => {
    console.error(`\n[ReadQueue] UNCAUGHT EXCEPTION:`, error);
    runCleanup('uncaughtException');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error(`\n[ReadQueue] UNHANDLED REJECTION:`, reason);
    runCleanup('unhandledRejection');
    process.exit(1);
  });
}
