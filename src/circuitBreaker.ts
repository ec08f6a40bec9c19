/**
 * Circuit Breaker for LazyLibrarian
 *
 * Separates "the manager is down" from "the manager has no such book":
 * - HTTP 5xx/429, timeouts, connection errors → counted as failures
 * - HTTP 200 with empty results → NOT failures
 *
 * CLOSED → OPEN after N consecutive failures; OPEN → HALF_OPEN once the
 * cooldown expires; a failed probe reopens with a longer cooldown.
 */

import { LibraryCircuitOpenError } from './errors.js';
import { FetchTimeoutError } from './utils/resilience.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Name for logging */
  name: string;
  /** Number of consecutive failures before opening (default: 5) */
  failureThreshold?: number;
  /** Initial cooldown in ms before half-open probe (default: 30s) */
  cooldownMs?: number;
  /** Max cooldown in ms (default: 5 min) */
  maxCooldownMs?: number;
  /** Cooldown multiplier after each failed probe (default: 2) */
  cooldownMultiplier?: number;
  /** Injectable clock for tests */
  now?: () => number;
}

export interface CircuitStatus {
  state: CircuitState;
  consecutiveFailures: number;
  cooldownMs: number;
  cooldownRemainingMs: number;
  totalTrips: number;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private lastFailureTime = 0;
  private currentCooldownMs: number;
  private totalTrips = 0;

  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly baseCooldownMs: number;
  private readonly maxCooldownMs: number;
  private readonly cooldownMultiplier: number;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? 5;
    this.baseCooldownMs = options.cooldownMs ?? 30_000;
    this.maxCooldownMs = options.maxCooldownMs ?? 300_000;
    this.cooldownMultiplier = options.cooldownMultiplier ?? 2;
    this.now = options.now ?? Date.now;
    this.currentCooldownMs = this.baseCooldownMs;
  }

  allowRequest(): boolean {
    if (this.state === 'CLOSED') return true;

    if (this.state === 'OPEN') {
      const elapsed = this.now() - this.lastFailureTime;
      if (elapsed >= this.currentCooldownMs) {
        this.state = 'HALF_OPEN';
        console.log(`[CircuitBreaker:${this.name}] → HALF_OPEN (probing after ${Math.round(this.currentCooldownMs / 1000)}s cooldown)`);
        return true;
      }
      return false;
    }

    // HALF_OPEN: allow one probe
    return true;
  }

  recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      console.log(`[CircuitBreaker:${this.name}] → CLOSED (probe succeeded, service recovered)`);
      this.currentCooldownMs = this.baseCooldownMs;
    }
    this.state = 'CLOSED';
    this.consecutiveFailures = 0;
  }

  recordFailure(): void {
    this.consecutiveFailures++;
    this.lastFailureTime = this.now();

    if (this.state === 'HALF_OPEN') {
      this.state = 'OPEN';
      this.currentCooldownMs = Math.min(
        this.currentCooldownMs * this.cooldownMultiplier,
        this.maxCooldownMs
      );
      console.log(`[CircuitBreaker:${this.name}] → OPEN (probe failed, cooldown ${Math.round(this.currentCooldownMs / 1000)}s)`);
      return;
    }

    if (this.consecutiveFailures >= this.failureThreshold) {
      this.state = 'OPEN';
      this.totalTrips++;
      console.log(
        `[CircuitBreaker:${this.name}] → OPEN (${this.consecutiveFailures} consecutive failures, ` +
        `cooldown ${Math.round(this.currentCooldownMs / 1000)}s, trip #${this.totalTrips})`
      );
    }
  }

  /**
   * Run an HTTP call through the breaker.
   * Infra failures and 5xx/429 responses count against it; anything else resets it.
   */
  async execute(fn: () => Promise<Response>): Promise<Response> {
    if (!this.allowRequest()) {
      throw new LibraryCircuitOpenError();
    }

    try {
      const response = await fn();
      if (CircuitBreaker.isHttpFailure(response.status)) {
        this.recordFailure();
      } else {
        this.recordSuccess();
      }
      return response;
    } catch (error) {
      if (CircuitBreaker.isInfraFailure(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  getStatus(): CircuitStatus {
    let cooldownRemainingMs = 0;
    if (this.state === 'OPEN') {
      cooldownRemainingMs = Math.max(0, this.currentCooldownMs - (this.now() - this.lastFailureTime));
    }

    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      cooldownMs: this.currentCooldownMs,
      cooldownRemainingMs,
      totalTrips: this.totalTrips,
    };
  }

  static isInfraFailure(error: unknown): boolean {
    if (error instanceof FetchTimeoutError) return true;
    if (error instanceof Error) {
      const msg = error.message.toLowerCase();
      return (
        msg.includes('econnrefused') ||
        msg.includes('econnreset') ||
        msg.includes('etimedout') ||
        msg.includes('epipe') ||
        msg.includes('enetunreach') ||
        msg.includes('enotfound') ||
        msg.includes('fetch failed') ||
        msg.includes('socket hang up')
      );
    }
    return false;
  }

  static isHttpFailure(status: number): boolean {
    return status >= 500 || status === 429;
  }
}

// Shared breaker for every LazyLibrarian call in this process
export const llCircuitBreaker = new CircuitBreaker({
  name: 'LazyLibrarian',
  failureThreshold: 5,
  cooldownMs: 30_000,        // Start at 30s
  maxCooldownMs: 300_000,    // Max 5 min
  cooldownMultiplier: 2,     // 30s → 60s → 120s → 240s → 300s
});
