/**
 * ReadQueue Database
 * SQLite connection backing the snapshot cache
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config.js';
import { initCacheTable } from '../cache/storage.js';
import { registerCleanup } from '../utils/resilience.js';

let db: Database.Database | null = null;

/**
 * Initialize database connection and schema
 */
export function initDatabase(path: string = config.database.path): Database.Database {
  if (db) return db;

  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }

    db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000'); // Wait up to 5s if DB is locked

    initCacheTable(db);

    // Register cleanup so DB closes on crash/signal
    registerCleanup(() => closeDatabase());

    console.log(`[ReadQueue] Database initialized at ${path}`);
    return db;
  } catch (error) {
    console.error(`[ReadQueue] FATAL: Failed to initialize database at ${path}:`, error);
    throw error;
  }
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Check database health; returns { ok, details } for health endpoints.
 */
export function checkDatabaseHealth(): { ok: boolean; details: Record<string, unknown> } {
  try {
    const instance = initDatabase();
    const result = instance.prepare('SELECT COUNT(*) as count FROM cache_entries').get() as { count: number };
    const walMode = (instance.pragma('journal_mode') as Array<{ journal_mode: string }>)[0]?.journal_mode;
    return {
      ok: true,
      details: {
        cacheEntries: result.count,
        journalMode: walMode,
        path: config.database.path,
      },
    };
  } catch (error) {
    return {
      ok: false,
      details: {
        error: error instanceof Error ? error.message : String(error),
        path: config.database.path,
      },
    };
  }
}
