/**
 * Scheduled refresh
 *
 * Re-reconciles every configured user on a fixed interval so the cache is
 * warm before anyone asks. Users are processed one at a time; a failure
 * for one user is logged and the batch moves on.
 */

import { config } from '../config.js';
import { describeError } from '../errors.js';
import type { Reconciler } from '../reconciler/orchestrator.js';
import type { Format } from '../types.js';

export interface RefreshSummary {
  username: string;
  ok: boolean;
  checked: number;
  missing: number;
  failures: number;
  sourceListStale: boolean;
  error?: string;
  durationMs: number;
}

export interface RefreshJobOptions {
  usernames?: readonly string[];
  intervalMinutes?: number;
  formats?: readonly Format[];
  maxBooks?: number | null;
}

export class RefreshJob {
  private readonly usernames: readonly string[];
  private readonly intervalMs: number;
  private readonly formats?: readonly Format[];
  private readonly maxBooks: number | null;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<RefreshSummary[]> | null = null;
  private controller: AbortController | null = null;

  constructor(private readonly reconciler: Reconciler, options: RefreshJobOptions = {}) {
    this.usernames = options.usernames ?? config.schedule.usernames;
    this.intervalMs = (options.intervalMinutes ?? config.schedule.intervalMinutes) * 60 * 1000;
    this.formats = options.formats;
    this.maxBooks = options.maxBooks === undefined ? config.reconcile.defaultMaxBooks : options.maxBooks;
  }

  /**
   * One pass over every user with a forced refresh.
   * A pass already in progress is joined rather than started twice.
   */
  runOnce(): Promise<RefreshSummary[]> {
    if (!this.running) {
      this.controller = new AbortController();
      this.running = this.runBatch(this.controller.signal).finally(() => {
        this.running = null;
        this.controller = null;
      });
    }
    return this.running;
  }

  private async runBatch(signal: AbortSignal): Promise<RefreshSummary[]> {
    const startTime = Date.now();
    console.log(`[RefreshJob] Refreshing ${this.usernames.length} users`);

    const summaries: RefreshSummary[] = [];
    for (const username of this.usernames) {
      if (signal.aborted) {
        console.log('[RefreshJob] Stopped before finishing the batch');
        break;
      }
      summaries.push(await this.refreshUser(username, signal));
    }

    const failed = summaries.filter(s => !s.ok).length;
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`[RefreshJob] Batch complete in ${elapsed}s (${summaries.length - failed} ok, ${failed} failed)`);
    return summaries;
  }

  private async refreshUser(username: string, signal: AbortSignal): Promise<RefreshSummary> {
    const start = Date.now();
    try {
      const report = await this.reconciler.reconcileWithReport(username, {
        formats: this.formats,
        forceRefresh: true,
        maxBooks: this.maxBooks,
        signal,
      });
      const missing = report.results.filter(r => r.libraryMatches.length === 0).length;
      const summary: RefreshSummary = {
        username,
        ok: true,
        checked: report.totalChecked,
        missing,
        failures: report.failures.length,
        sourceListStale: report.sourceListStale,
        durationMs: Date.now() - start,
      };
      console.log(
        `[RefreshJob] ${username}: ${summary.checked} checked, ${summary.missing} missing, ` +
        `${summary.failures} lookup failures${summary.sourceListStale ? ' (stale list)' : ''}`,
      );
      return summary;
    } catch (error) {
      console.error(`[RefreshJob] ${username} failed:`, describeError(error));
      return {
        username,
        ok: false,
        checked: 0,
        missing: 0,
        failures: 0,
        sourceListStale: false,
        error: describeError(error),
        durationMs: Date.now() - start,
      };
    }
  }

  /**
   * Run now, then every interval until stop()
   */
  start(): void {
    if (this.timer) return;
    console.log(`[RefreshJob] Scheduled every ${this.intervalMs / 60000} minutes for: ${this.usernames.join(', ') || '(none)'}`);

    const tick = (): void => {
      void this.runOnce()
        .catch(error => console.error('[RefreshJob] Batch error:', describeError(error)))
        .finally(() => {
          if (this.timer) {
            this.timer = setTimeout(tick, this.intervalMs);
          }
        });
    };

    this.timer = setTimeout(tick, 0);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    if (this.running) {
      await this.running;
    }
  }

  isRunning(): boolean {
    return this.running !== null;
  }
}
