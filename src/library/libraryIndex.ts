/**
 * LazyLibrarian catalog index
 *
 * LazyLibrarian has no title+author search over its own database, so the
 * whole catalog (getAllBooks) is held in memory for a short TTL and searched
 * locally. Concurrent callers share one in-flight load.
 */

import { config } from '../config.js';
import { ManagerQueryError, describeError } from '../errors.js';
import { identityKey, normalize, wordSet } from '../reconciler/normalizer.js';
import type { CandidateProvider, LibraryCandidate } from '../types.js';
import { toLibraryCandidates } from './candidates.js';
import type { LazyLibrarianClient } from './lazyLibrarian.js';

export interface LibraryIndexOptions {
  ttlSeconds?: number;
  now?: () => number;
}

export interface FindBooksResult {
  source: 'local' | 'remote';
  results: LibraryCandidate[];
}

function isSubset(a: Set<string>, b: Set<string>): boolean {
  for (const word of a) {
    if (!b.has(word)) return false;
  }
  return true;
}

/**
 * Catalog entries worth handing to the matcher for a title/author query,
 * in catalog order: same title, same title+author, or one title's words
 * contained in the other's.
 */
export function selectCandidates(catalog: LibraryCandidate[], title: string, author: string): LibraryCandidate[] {
  const queryTitle = normalize(title);
  if (!queryTitle) return [];

  const queryKey = identityKey(title, author);
  const queryWords = wordSet(title);

  return catalog.filter(candidate => {
    const candidateTitle = normalize(candidate.title);
    if (!candidateTitle) return false;
    if (candidateTitle === queryTitle) return true;
    if (identityKey(candidate.title, candidate.author) === queryKey) return true;
    const candidateWords = wordSet(candidate.title);
    return isSubset(queryWords, candidateWords) || isSubset(candidateWords, queryWords);
  });
}

function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}

export class LibraryIndex implements CandidateProvider {
  private catalog: LibraryCandidate[] | null = null;
  private loadedAt = 0;
  private inflight: Promise<LibraryCandidate[]> | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private readonly client: LazyLibrarianClient, options: LibraryIndexOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? config.lazyLibrarian.indexTtl) * 1000;
    this.now = options.now ?? Date.now;
  }

  invalidate(): void {
    this.catalog = null;
    this.loadedAt = 0;
  }

  /**
   * Current catalog; reloads when older than the TTL.
   * A failed reload falls back to the previous snapshot if there is one.
   * The load is shared and never cancelled; `signal` only stops this caller waiting.
   */
  async load(signal?: AbortSignal): Promise<LibraryCandidate[]> {
    signal?.throwIfAborted();
    if (this.catalog && this.now() - this.loadedAt <= this.ttlMs) {
      return this.catalog;
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return untilAborted(this.inflight, signal);
  }

  private async refresh(): Promise<LibraryCandidate[]> {
    try {
      const records = await this.client.getAllBooks();
      this.catalog = toLibraryCandidates(records);
      this.loadedAt = this.now();
      console.log(`[LibraryIndex] Loaded ${this.catalog.length} books from LazyLibrarian`);
      return this.catalog;
    } catch (error) {
      if (this.catalog) {
        console.warn(`[LibraryIndex] Reload failed, serving previous catalog: ${describeError(error)}`);
        return this.catalog;
      }
      throw error;
    }
  }

  async searchLibraryCandidates(title: string, author: string, signal?: AbortSignal): Promise<LibraryCandidate[]> {
    let catalog: LibraryCandidate[];
    try {
      catalog = await this.load(signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new ManagerQueryError(title, author, describeError(error), { cause: error });
    }
    return selectCandidates(catalog, title, author);
  }

  /**
   * Interactive lookup: local catalog first, then LazyLibrarian's remote
   * findBook when nothing local matched and `remote` is set.
   */
  async findBooks(title: string, author: string, options: { remote?: boolean; limit?: number } = {}): Promise<FindBooksResult> {
    const limit = options.limit ?? 10;
    const local = await this.searchLibraryCandidates(title, author);
    if (local.length > 0 || !options.remote) {
      return { source: 'local', results: local.slice(0, limit) };
    }

    let remote: LibraryCandidate[];
    try {
      remote = toLibraryCandidates(await this.client.findBook(title));
    } catch (error) {
      throw new ManagerQueryError(title, author, describeError(error), { cause: error });
    }
    return { source: 'remote', results: remote.slice(0, limit) };
  }
}
