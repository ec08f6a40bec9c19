/**
 * Reconciliation Orchestrator
 *
 * Resolves a user's to-read list (cache first, then the source), looks each
 * entry up in the library manager and caches the full result set. Each
 * (username, kind) entry has at most one writer at a time; a caller that
 * waited on the lock re-reads the cache before doing any work.
 */

import pLimit from 'p-limit';
import { config } from '../config.js';
import type { CacheService } from '../cache/cacheService.js';
import { RetrievalError, describeError } from '../errors.js';
import type {
  CacheEntry,
  CandidateProvider,
  Format,
  ItemFailure,
  MatchResult,
  ReconcileOptions,
  ReconcileReport,
  SourceItem,
  SourceListProvider,
} from '../types.js';
import { match, missingResult } from './matcher.js';
import { isIdentityEquivalent } from './normalizer.js';

export interface ReconcilerDeps {
  cache: CacheService;
  source: SourceListProvider;
  candidates: CandidateProvider;
  ttlSeconds?: number;
  concurrency?: number;
  defaultFormats?: readonly Format[];
}

export interface SourceListResult {
  entry: CacheEntry<'source-list'>;
  fromCache: boolean;
  stale: boolean;
}

/**
 * A cached reconciliation can stand in for a new pass only if it was built
 * for the same books in the same order and carries every requested format.
 */
export function coversRequest(results: MatchResult[], items: SourceItem[], formats: readonly Format[]): boolean {
  if (results.length !== items.length) return false;
  return results.every((result, index) =>
    isIdentityEquivalent(result.sourceItem, items[index]) &&
    formats.every(format => result.perFormatStatus[format] !== undefined),
  );
}

/**
 * Restrict each result to the requested formats, in request order
 */
export function projectFormats(results: MatchResult[], formats: readonly Format[]): MatchResult[] {
  return results.map(result => {
    const perFormatStatus: MatchResult['perFormatStatus'] = {};
    for (const format of formats) {
      perFormatStatus[format] = result.perFormatStatus[format];
    }
    return { ...result, perFormatStatus };
  });
}

function uniqueFormats(formats: readonly Format[] | undefined, fallback: readonly Format[]): Format[] {
  const requested = formats && formats.length > 0 ? formats : fallback;
  return [...new Set(requested)];
}

function truncate(items: SourceItem[], maxBooks: number | null | undefined): SourceItem[] {
  if (maxBooks === null || maxBooks === undefined || maxBooks < 0) return items;
  return items.slice(0, maxBooks);
}

export class Reconciler {
  private readonly cache: CacheService;
  private readonly source: SourceListProvider;
  private readonly candidates: CandidateProvider;
  private readonly ttlSeconds: number;
  private readonly concurrency: number;
  private readonly defaultFormats: readonly Format[];

  get cacheTtlSeconds(): number {
    return this.ttlSeconds;
  }

  constructor(deps: ReconcilerDeps) {
    this.cache = deps.cache;
    this.source = deps.source;
    this.candidates = deps.candidates;
    this.ttlSeconds = deps.ttlSeconds ?? config.cache.ttlSeconds;
    this.concurrency = Math.max(1, deps.concurrency ?? config.reconcile.concurrency);
    this.defaultFormats = deps.defaultFormats ?? config.reconcile.formats;
  }

  async reconcile(username: string, options: ReconcileOptions = {}): Promise<MatchResult[]> {
    const report = await this.reconcileWithReport(username, options);
    return report.results;
  }

  async reconcileWithReport(username: string, options: ReconcileOptions = {}): Promise<ReconcileReport> {
    const { forceRefresh = false, signal } = options;
    const formats = uniqueFormats(options.formats, this.defaultFormats);

    return this.cache.withLock(username, 'reconciliation', async () => {
      signal?.throwIfAborted();

      const sourceList = await this.resolveSourceList(username, { forceRefresh, signal });
      const items = truncate(sourceList.entry.payload, options.maxBooks);

      if (!forceRefresh) {
        const cached = this.cache.getFresh(username, 'reconciliation', this.ttlSeconds);
        if (cached && coversRequest(cached.payload, items, formats)) {
          console.log(`[Reconciler] Serving cached reconciliation for ${username} (${items.length} books)`);
          return {
            username,
            results: projectFormats(cached.payload, formats),
            totalChecked: items.length,
            fromCache: true,
            fetchedAt: cached.fetchedAt,
            sourceListFetchedAt: sourceList.entry.fetchedAt,
            sourceListStale: sourceList.stale,
            failures: [],
          };
        }
      } else {
        this.candidates.invalidate?.();
      }

      console.log(`[Reconciler] Checking ${items.length} books for ${username} (${formats.join(', ')})`);
      const { results, failures } = await this.checkItems(items, formats, signal);

      // Only a complete pass reaches the cache
      signal?.throwIfAborted();
      const entry = this.cache.put(username, 'reconciliation', results);

      const missing = results.filter(r => r.libraryMatches.length === 0).length;
      console.log(
        `[Reconciler] ${username}: ${items.length} checked, ${items.length - missing} in library, ` +
        `${missing} missing, ${failures.length} lookup failures`,
      );

      return {
        username,
        results,
        totalChecked: items.length,
        fromCache: false,
        fetchedAt: entry.fetchedAt,
        sourceListFetchedAt: sourceList.entry.fetchedAt,
        sourceListStale: sourceList.stale,
        failures,
      };
    });
  }

  /**
   * The user's to-read list: a fresh cache entry, else a new retrieval.
   * When retrieval fails any cached list is used, however old.
   */
  async resolveSourceList(
    username: string,
    options: { forceRefresh?: boolean; ttlSeconds?: number; signal?: AbortSignal } = {},
  ): Promise<SourceListResult> {
    const { forceRefresh = false, signal } = options;
    const ttlSeconds = options.ttlSeconds ?? this.ttlSeconds;

    if (!forceRefresh) {
      const fresh = this.cache.getFresh(username, 'source-list', ttlSeconds);
      if (fresh) return { entry: fresh, fromCache: true, stale: false };
    }

    return this.cache.withLock(username, 'source-list', async () => {
      if (!forceRefresh) {
        const fresh = this.cache.getFresh(username, 'source-list', ttlSeconds);
        if (fresh) return { entry: fresh, fromCache: true, stale: false };
      }

      try {
        const items = await this.source.fetchSourceList(username, signal);
        signal?.throwIfAborted();
        return { entry: this.cache.put(username, 'source-list', items), fromCache: false, stale: false };
      } catch (error) {
        signal?.throwIfAborted();

        const fallback = this.cache.get(username, 'source-list');
        if (fallback) {
          console.warn(
            `[Reconciler] Retrieval failed for ${username}, using list from ${fallback.fetchedAt.toISOString()}: ${describeError(error)}`,
          );
          return { entry: fallback, fromCache: true, stale: this.cache.isStale(fallback, ttlSeconds) };
        }

        if (error instanceof RetrievalError) throw error;
        throw new RetrievalError(username, 'blocked', describeError(error), { cause: error });
      }
    });
  }

  private async checkItems(
    items: SourceItem[],
    formats: readonly Format[],
    signal?: AbortSignal,
  ): Promise<{ results: MatchResult[]; failures: ItemFailure[] }> {
    const limit = pLimit(this.concurrency);
    const failures: ItemFailure[] = [];

    const results = await Promise.all(items.map((item, index) => limit(async () => {
      signal?.throwIfAborted();
      try {
        const candidates = await this.candidates.searchLibraryCandidates(item.title, item.author, signal);
        return match(item, candidates, formats);
      } catch (error) {
        signal?.throwIfAborted();
        console.warn(`[Reconciler] Lookup failed for "${item.title}" - marking missing: ${describeError(error)}`);
        failures.push({ index, title: item.title, author: item.author, error: describeError(error) });
        return missingResult(item, formats);
      }
    })));

    failures.sort((a, b) => a.index - b.index);
    return { results, failures };
  }
}
