/**
 * Cache storage backends
 * Storage only moves `{ fetchedAt, payload }` records; validation happens in CacheService.
 */

import type Database from 'better-sqlite3';
import { CacheCorruptionError } from '../errors.js';
import type { CacheKind } from '../types.js';
import type { StoredRecord } from './schema.js';

export interface CacheStorage {
  /** Raw record for a key, or null when absent. May throw CacheCorruptionError. */
  load(username: string, kind: CacheKind): unknown;
  save(username: string, kind: CacheKind, record: StoredRecord): void;
  size(): number;
}

export interface StorageOptions {
  capacity?: number;    // Max entries; oldest fetchedAt evicted first. 0 = unbounded
}

// =============================================================================
// In-memory
// =============================================================================

export class MemoryCacheStorage implements CacheStorage {
  private records = new Map<string, StoredRecord>();
  private readonly capacity: number;

  constructor(options: StorageOptions = {}) {
    this.capacity = options.capacity ?? 0;
  }

  private static key(username: string, kind: CacheKind): string {
    return `${kind}:${username}`;
  }

  load(username: string, kind: CacheKind): unknown {
    const record = this.records.get(MemoryCacheStorage.key(username, kind));
    // Copy so callers never mutate the stored snapshot
    return record ? structuredClone(record) : null;
  }

  save(username: string, kind: CacheKind, record: StoredRecord): void {
    const key = MemoryCacheStorage.key(username, kind);
    this.records.delete(key);
    this.records.set(key, structuredClone(record));
    this.evict();
  }

  size(): number {
    return this.records.size;
  }

  private evict(): void {
    if (this.capacity <= 0) return;
    while (this.records.size > this.capacity) {
      let oldestKey: string | null = null;
      let oldestTime = Infinity;
      for (const [key, record] of this.records) {
        const time = Date.parse(record.fetchedAt);
        if (time < oldestTime) {
          oldestTime = time;
          oldestKey = key;
        }
      }
      if (oldestKey === null) return;
      console.log(`[Cache] Evicting ${oldestKey} (capacity ${this.capacity})`);
      this.records.delete(oldestKey);
    }
  }
}

// =============================================================================
// SQLite
// =============================================================================

interface CacheRow {
  fetched_at: string;
  payload: string;
}

export class SqliteCacheStorage implements CacheStorage {
  private readonly capacity: number;

  constructor(private readonly db: Database.Database, options: StorageOptions = {}) {
    this.capacity = options.capacity ?? 0;
    initCacheTable(db);
  }

  load(username: string, kind: CacheKind): unknown {
    const row = this.db.prepare(
      'SELECT fetched_at, payload FROM cache_entries WHERE username = ? AND kind = ?'
    ).get(username, kind) as CacheRow | undefined;

    if (!row) return null;

    try {
      return { fetchedAt: row.fetched_at, payload: JSON.parse(row.payload) };
    } catch (error) {
      throw new CacheCorruptionError(username, kind, { cause: error });
    }
  }

  save(username: string, kind: CacheKind, record: StoredRecord): void {
    const upsert = this.db.prepare(`
      INSERT INTO cache_entries (username, kind, fetched_at, payload)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(username, kind) DO UPDATE SET
        fetched_at = excluded.fetched_at,
        payload = excluded.payload
    `);

    const evict = this.db.prepare(`
      DELETE FROM cache_entries WHERE rowid IN (
        SELECT rowid FROM cache_entries ORDER BY fetched_at ASC, rowid ASC LIMIT ?
      )
    `);

    // One transaction so readers never see the upsert without its eviction
    this.db.transaction(() => {
      upsert.run(username, kind, record.fetchedAt, JSON.stringify(record.payload));
      const excess = this.capacity > 0 ? this.size() - this.capacity : 0;
      if (excess > 0) {
        const removed = evict.run(excess).changes;
        console.log(`[Cache] Evicted ${removed} entries (capacity ${this.capacity})`);
      }
    })();
  }

  size(): number {
    const row = this.db.prepare('SELECT COUNT(*) as count FROM cache_entries').get() as { count: number };
    return row.count;
  }
}

/**
 * Ensure the cache_entries table exists
 */
export function initCacheTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS cache_entries (
      username TEXT NOT NULL,
      kind TEXT NOT NULL,
      fetched_at TEXT NOT NULL,
      payload TEXT NOT NULL,
      PRIMARY KEY (username, kind)
    )
  `);
}
