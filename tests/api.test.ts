/**
 * API Server Tests
 * Routes exercised through an in-process HTTP server on an ephemeral port
 */

import { createServer, type Server } from 'http';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHandler, type ApiDeps, type LibraryService } from '../src/api.js';
import { CacheService } from '../src/cache/cacheService.js';
import { MemoryCacheStorage } from '../src/cache/storage.js';
import { ManagerQueryError, RetrievalError } from '../src/errors.js';
import { Reconciler } from '../src/reconciler/orchestrator.js';
import type { CandidateProvider, LibraryCandidate, SourceItem, SourceListProvider } from '../src/types.js';
import { candidate, item } from './fixtures.js';

const shelf: SourceItem[] = [item('Dune', 'Frank Herbert'), item('Kindred', 'Octavia E. Butler')];
const dune = candidate('Dune', 'Frank Herbert', { eBook: { present: true, libraryLabel: 'Calibre' } }, '101');

class FakeSource implements SourceListProvider {
  failure: Error | null = null;
  fetchSourceList = vi.fn(async (): Promise<SourceItem[]> => {
    if (this.failure) throw this.failure;
    return shelf;
  });
}

class FakeCandidates implements CandidateProvider {
  async searchLibraryCandidates(title: string): Promise<LibraryCandidate[]> {
    return title === 'Dune' ? [dune] : [];
  }
}

function fakeLibrary(): LibraryService & { configured: boolean } {
  return {
    configured: true,
    isConfigured() {
      return this.configured;
    },
    findBooks: vi.fn(async () => ({ source: 'local' as const, results: [dune] })),
    markWanted: vi.fn(async () => ({ success: true, message: 'OK' })),
    forceSearch: vi.fn(async () => ({ success: false, message: 'No providers' })),
    requestBook: vi.fn(async () => ({
      wanted: { success: true, message: 'OK' },
      search: { success: false, message: 'No providers' },
    })),
    addBook: vi.fn(async () => ({ success: false, message: 'LazyLibrarian addBook failed: HTTP 500' })),
  };
}

describe('API', () => {
  let now: Date;
  let source: FakeSource;
  let library: ReturnType<typeof fakeLibrary>;
  let healthy: boolean;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    now = new Date('2026-05-10T12:00:00.000Z');
    healthy = true;
    source = new FakeSource();
    library = fakeLibrary();
    const cache = new CacheService(new MemoryCacheStorage(), () => now);
    const deps: ApiDeps = {
      reconciler: new Reconciler({ cache, source, candidates: new FakeCandidates(), ttlSeconds: 3600 }),
      cache,
      library,
      health: () => ({ ok: healthy, details: { cacheEntries: 0 } }),
    };

    const handler = createHandler(deps);
    server = createServer((req, res) => {
      void handler(req, res);
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  async function call(method: string, path: string, body?: unknown): Promise<{ status: number; json: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
    });
    const text = await res.text();
    return { status: res.status, json: text ? JSON.parse(text) : null };
  }

  describe('health', () => {
    it('reports ok with database details', async () => {
      const { status, json } = await call('GET', '/api/health');

      expect(status).toBe(200);
      expect(json).toMatchObject({ status: 'ok', service: 'readqueue', database: { cacheEntries: 0 } });
    });

    it('answers 503 when the database is down', async () => {
      healthy = false;

      const { status, json } = await call('GET', '/health');

      expect(status).toBe(503);
      expect(json).toMatchObject({ status: 'degraded' });
    });
  });

  it('answers preflight requests with 204', async () => {
    const res = await fetch(`${baseUrl}/api/match`, { method: 'OPTIONS' });

    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  describe('GET /api/books/:username', () => {
    it('fetches the list once and then serves it from cache', async () => {
      const first = await call('GET', '/api/books/alice');
      const second = await call('GET', '/api/books/alice');

      expect(first).toEqual({
        status: 200,
        json: {
          username: 'alice',
          cached: false,
          stale: false,
          fetchedAt: '2026-05-10T12:00:00.000Z',
          count: 2,
          books: shelf,
        },
      });
      expect(second.json).toMatchObject({ cached: true, count: 2 });
      expect(source.fetchSourceList).toHaveBeenCalledTimes(1);
    });

    it('refetches when refresh is set', async () => {
      await call('GET', '/api/books/alice');
      const { json } = await call('GET', '/api/books/alice?refresh=true');

      expect(json).toMatchObject({ cached: false });
      expect(source.fetchSourceList).toHaveBeenCalledTimes(2);
    });

    it('rejects a bad ttl', async () => {
      expect(await call('GET', '/api/books/alice?ttl=soon')).toEqual({
        status: 400,
        json: { error: 'ttl must be a non-negative integer' },
      });
    });

    it('rejects a username with a malformed escape', async () => {
      expect(await call('GET', '/api/books/%E0')).toEqual({ status: 400, json: { error: 'Invalid username' } });
      expect(source.fetchSourceList).not.toHaveBeenCalled();
    });

    it('maps a retrieval failure to 502', async () => {
      source.failure = new RetrievalError('alice', 'not_found');

      expect(await call('GET', '/api/books/alice')).toEqual({
        status: 502,
        json: {
          error: 'Could not retrieve to-read list for alice (not_found)',
          code: 'RETRIEVAL_FAILED',
          reason: 'not_found',
        },
      });
    });
  });

  describe('POST /api/match', () => {
    it('returns the reconciliation report', async () => {
      const { status, json } = await call('POST', '/api/match', { username: 'alice' });

      expect(status).toBe(200);
      expect(json).toMatchObject({
        username: 'alice',
        totalChecked: 2,
        fromCache: false,
        fetchedAt: '2026-05-10T12:00:00.000Z',
        sourceListFetchedAt: '2026-05-10T12:00:00.000Z',
        sourceListStale: false,
        failures: [],
        results: [
          { sourceItem: shelf[0], perFormatStatus: { eBook: 'Have', AudioBook: 'Missing' } },
          { sourceItem: shelf[1], libraryMatches: [], perFormatStatus: { eBook: 'Missing', AudioBook: 'Missing' } },
        ],
      });
    });

    it('limits formats and book count', async () => {
      const { json } = await call('POST', '/api/match', { username: 'alice', types: ['AudioBook'], maxBooks: 1 });

      expect(json).toMatchObject({
        totalChecked: 1,
        results: [{ perFormatStatus: { AudioBook: 'Missing' } }],
      });
    });

    it('validates the body', async () => {
      expect(await call('POST', '/api/match', { username: '' })).toEqual({
        status: 400,
        json: { error: 'username: username is required' },
      });

      const badFormat = await call('POST', '/api/match', { username: 'alice', types: ['PDF'] });
      expect(badFormat.status).toBe(400);

      expect(await call('POST', '/api/match', '{"username":')).toEqual({
        status: 400,
        json: { error: 'Request body is not valid JSON' },
      });
    });

    it('requires a configured library', async () => {
      library.configured = false;

      expect(await call('POST', '/api/match', { username: 'alice' })).toEqual({
        status: 400,
        json: { error: 'LazyLibrarian API key is not configured' },
      });
    });
  });

  describe('GET /api/cache/:username', () => {
    it('is 404 before any reconciliation', async () => {
      expect(await call('GET', '/api/cache/alice')).toEqual({ status: 404, json: { error: 'No cached results' } });
    });

    it('serves the last reconciliation while fresh', async () => {
      await call('POST', '/api/match', { username: 'alice' });

      const { status, json } = await call('GET', '/api/cache/alice');

      expect(status).toBe(200);
      expect(json).toMatchObject({ username: 'alice', fetchedAt: '2026-05-10T12:00:00.000Z' });
      expect(source.fetchSourceList).toHaveBeenCalledTimes(1);
    });

    it('is 410 once the entry is older than the ttl', async () => {
      await call('POST', '/api/match', { username: 'alice' });
      now = new Date('2026-05-10T13:00:01.000Z');

      expect(await call('GET', '/api/cache/alice')).toEqual({
        status: 410,
        json: { error: 'Cached results expired', fetchedAt: '2026-05-10T12:00:00.000Z' },
      });
    });

    it('rejects an empty username', async () => {
      expect(await call('GET', '/api/cache/%20')).toEqual({ status: 400, json: { error: 'Invalid username' } });
    });
  });

  describe('library routes', () => {
    it('finds books with a count', async () => {
      const { status, json } = await call('POST', '/api/library/find', { title: 'Dune' });

      expect(status).toBe(200);
      expect(json).toEqual({ source: 'local', results: [dune], count: 1 });
      expect(library.findBooks).toHaveBeenCalledWith('Dune', '', { remote: undefined });
    });

    it('maps a failed catalog lookup to 502', async () => {
      vi.mocked(library.findBooks).mockRejectedValueOnce(new ManagerQueryError('Dune', '', 'HTTP 502'));

      expect(await call('POST', '/api/library/find', { title: 'Dune' })).toEqual({
        status: 502,
        json: { error: 'Library lookup failed for "Dune": HTTP 502', code: 'MANAGER_QUERY_FAILED' },
      });
    });

    it('marks a book wanted as an eBook by default', async () => {
      expect(await call('POST', '/api/library/want', { bookId: '42' })).toEqual({
        status: 200,
        json: { bookId: '42', format: 'eBook', success: true, message: 'OK' },
      });
      expect(library.markWanted).toHaveBeenCalledWith('42', 'eBook');
    });

    it('reports 502 when the follow-up search fails', async () => {
      expect(await call('POST', '/api/library/want', { bookId: '42', format: 'AudioBook', search: true })).toEqual({
        status: 502,
        json: {
          bookId: '42',
          format: 'AudioBook',
          wanted: { success: true, message: 'OK' },
          search: { success: false, message: 'No providers' },
        },
      });
      expect(library.requestBook).toHaveBeenCalledWith('42', 'AudioBook');
    });

    it('passes failed actions through as 502', async () => {
      expect(await call('POST', '/api/library/search', { bookId: '42' })).toEqual({
        status: 502,
        json: { bookId: '42', format: 'eBook', success: false, message: 'No providers' },
      });
      expect(await call('POST', '/api/library/add', { bookId: '7' })).toEqual({
        status: 502,
        json: { bookId: '7', success: false, message: 'LazyLibrarian addBook failed: HTTP 500' },
      });
    });

    it('requires a book id', async () => {
      expect(await call('POST', '/api/library/add', {})).toEqual({
        status: 400,
        json: { error: 'bookId: Required' },
      });
    });
  });

  it('answers unknown routes with 404', async () => {
    expect(await call('GET', '/api/nothing')).toEqual({ status: 404, json: { error: 'Not found' } });
  });
});
