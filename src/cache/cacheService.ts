/**
 * Snapshot Cache
 *
 * Holds the last fetched to-read list and the last reconciliation per user.
 * Entries are replaced wholesale; a record that fails validation is logged
 * and treated as a miss so the caller fetches fresh data.
 */

import { CacheCorruptionError, describeError } from '../errors.js';
import type { CacheEntry, CacheKind, CachePayloads } from '../types.js';
import { KeyedMutex } from './keyedMutex.js';
import { parsePayload, StoredRecordSchema } from './schema.js';
import type { CacheStorage } from './storage.js';

export type Clock = () => Date;

export class CacheService {
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly storage: CacheStorage,
    private readonly clock: Clock = () => new Date(),
  ) {}

  get<K extends CacheKind>(username: string, kind: K): CacheEntry<K> | null {
    try {
      const raw = this.storage.load(username, kind);
      if (raw === null || raw === undefined) return null;

      const record = StoredRecordSchema.safeParse(raw);
      if (!record.success) {
        throw new CacheCorruptionError(username, kind, { cause: record.error });
      }

      const payload = parsePayload(kind, record.data.payload);
      return { payload, fetchedAt: new Date(record.data.fetchedAt) };
    } catch (error) {
      const corruption = error instanceof CacheCorruptionError
        ? error
        : new CacheCorruptionError(username, kind, { cause: error });
      console.warn(`[Cache] ${corruption.message} - treating as miss (${describeError(corruption.cause)})`);
      return null;
    }
  }

  /**
   * Store a payload stamped with the current time, replacing any prior entry
   */
  put<K extends CacheKind>(username: string, kind: K, payload: CachePayloads[K]): CacheEntry<K> {
    const fetchedAt = this.clock();
    this.storage.save(username, kind, { fetchedAt: fetchedAt.toISOString(), payload });
    return { payload, fetchedAt };
  }

  /**
   * Stale once strictly more than `thresholdSeconds` have passed since the fetch
   */
  isStale(entry: CacheEntry, thresholdSeconds: number, now: Date = this.clock()): boolean {
    return now.getTime() - entry.fetchedAt.getTime() > thresholdSeconds * 1000;
  }

  /**
   * Latest entry only if it is still fresh
   */
  getFresh<K extends CacheKind>(username: string, kind: K, thresholdSeconds: number): CacheEntry<K> | null {
    const entry = this.get(username, kind);
    if (!entry || this.isStale(entry, thresholdSeconds)) return null;
    return entry;
  }

  /**
   * Run `fn` while holding the (username, kind) writer lock.
   * The lock is released when `fn` settles, including on error.
   */
  withLock<T>(username: string, kind: CacheKind, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(`${kind}:${username}`, fn);
  }

  isLocked(username: string, kind: CacheKind): boolean {
    return this.mutex.isLocked(`${kind}:${username}`);
  }

  now(): Date {
    return this.clock();
  }
}
