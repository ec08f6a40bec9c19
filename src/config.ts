/**
 * ReadQueue Configuration
 * Reading-list reconciliation against LazyLibrarian
 */

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  return ['1', 'true', 'yes'].includes(raw.toLowerCase());
}

export const config = {
  // Database (cache persistence)
  database: {
    path: process.env.READQUEUE_DB_PATH || './data/readqueue.db',
  },

  // Snapshot cache
  cache: {
    ttlSeconds: envInt('SG_CACHE_TTL', 3600),   // 1 hour before a snapshot is stale
    capacity: envInt('CACHE_CAPACITY', 0),      // 0 = unbounded
  },

  // Reconciliation pass
  reconcile: {
    concurrency: envInt('RECONCILE_CONCURRENCY', 4),  // parallel LazyLibrarian lookups
    defaultMaxBooks: envInt('RECONCILE_MAX_BOOKS', 50),
    formats: ['eBook', 'AudioBook'] as const,
  },

  // StoryGraph to-read list
  storyGraph: {
    baseUrl: 'https://app.thestorygraph.com',
    pageSize: 10,
    maxPages: 50,   // cap for iterative pagination
  },

  // FlareSolverr for Cloudflare bypass
  flareSolverr: {
    url: process.env.FLARESOLVERR_URL || 'http://flaresolverr:8191/v1',
    timeout: envInt('FLARESOLVERR_TIMEOUT', 120000),  // 2 minutes max for Cloudflare challenges
  },

  // LazyLibrarian API
  lazyLibrarian: {
    host: process.env.LL_HOST || 'localhost',
    port: envInt('LL_PORT', 5299),
    apiKey: process.env.LL_API_KEY || '',
    https: envBool('LL_HTTPS', false),
    timeout: envInt('LL_TIMEOUT', 60000),
    indexTtl: envInt('LL_CACHE_TTL', 60),   // seconds to reuse getAllBooks
  },

  // HTTP API
  api: {
    port: envInt('READQUEUE_PORT', 5058),
  },

  // Scheduled refresh of configured users
  schedule: {
    intervalMinutes: envInt('REFRESH_INTERVAL_MINUTES', 360),
    usernames: (process.env.SG_USERNAMES || '')
      .split(',')
      .map(name => name.trim())
      .filter(name => name.length > 0),
  },
};

export type Config = typeof config;
