/**
 * ReadQueue API Server
 * HTTP API over the reconciliation engine and the LazyLibrarian actions
 */

import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { URL } from 'url';
import { z } from 'zod';
import { config } from './config.js';
import type { CacheService } from './cache/cacheService.js';
import type { CircuitStatus } from './circuitBreaker.js';
import { ManagerQueryError, RetrievalError, describeError } from './errors.js';
import type { FindBooksResult } from './library/libraryIndex.js';
import type { RequestBookResult } from './library/actions.js';
import type { Reconciler } from './reconciler/orchestrator.js';
import { FORMATS } from './types.js';
import type { ActionResult, Format } from './types.js';

const MAX_BODY_BYTES = 1024 * 1024;

// CORS headers for cross-origin requests
const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Content-Type': 'application/json',
};

const FormatSchema = z.enum(FORMATS);

const MatchBodySchema = z.object({
  username: z.string().trim().min(1, 'username is required'),
  types: z.array(FormatSchema).min(1).optional(),
  maxBooks: z.number().int().min(0).nullable().optional(),
  refresh: z.boolean().optional(),
});

const FindBodySchema = z.object({
  title: z.string().trim().min(1, 'title is required'),
  author: z.string().optional(),
  remote: z.boolean().optional(),
});

const BookActionSchema = z.object({
  bookId: z.string().trim().min(1, 'bookId is required'),
  format: FormatSchema.optional(),
  search: z.boolean().optional(),
});

const AddBodySchema = z.object({
  bookId: z.string().trim().min(1, 'bookId is required'),
});

/**
 * Library operations the API needs; LibraryIndex and LibraryActions provide them
 */
export interface LibraryService {
  isConfigured(): boolean;
  findBooks(title: string, author: string, options: { remote?: boolean }): Promise<FindBooksResult>;
  markWanted(id: string, format: Format): Promise<ActionResult>;
  forceSearch(id: string, format: Format): Promise<ActionResult>;
  requestBook(id: string, format: Format): Promise<RequestBookResult>;
  addBook(id: string): Promise<ActionResult>;
}

export interface ApiDeps {
  reconciler: Reconciler;
  cache: CacheService;
  library: LibraryService;
  health: () => { ok: boolean; details: Record<string, unknown> };
  breakerStatus?: () => CircuitStatus;
}

class HttpError extends Error {
  constructor(readonly status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpError';
  }
}

function sendJSON(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, CORS_HEADERS);
  res.end(JSON.stringify(data));
}

function sendError(res: ServerResponse, message: string, status = 400, extra: Record<string, unknown> = {}): void {
  res.writeHead(status, CORS_HEADERS);
  res.end(JSON.stringify({ error: message, ...extra }));
}

async function readBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, 'Request body too large');
    }
    chunks.push(buffer);
  }
  const text = Buffer.concat(chunks).toString('utf8').trim();
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new HttpError(400, 'Request body is not valid JSON');
  }
}

async function parseBody<T>(req: IncomingMessage, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const parsed = schema.safeParse(await readBody(req));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (!issue) throw new HttpError(400, 'Invalid request body');
    const field = issue.path.join('.');
    throw new HttpError(400, field ? `${field}: ${issue.message}` : issue.message);
  }
  return parsed.data;
}

function parseTtl(raw: string | null, fallback: number): number {
  if (raw === null) return fallback;
  const ttl = parseInt(raw, 10);
  if (Number.isNaN(ttl) || ttl < 0) {
    throw new HttpError(400, 'ttl must be a non-negative integer');
  }
  return ttl;
}

function isTruthyParam(raw: string | null): boolean {
  return raw !== null && ['1', 'true', 'yes'].includes(raw.toLowerCase());
}

function userFromPath(path: string, prefix: string): string {
  let username: string;
  try {
    username = decodeURIComponent(path.slice(prefix.length)).trim();
  } catch (error) {
    throw new HttpError(400, 'Invalid username', { cause: error });
  }
  if (!username || username.includes('/')) {
    throw new HttpError(400, 'Invalid username');
  }
  return username;
}

/**
 * Request handler bound to its collaborators; startServer() wires the real ones
 */
export function createHandler(deps: ApiDeps): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const startedAt = new Date().toISOString();

  function requireLibrary(): void {
    if (!deps.library.isConfigured()) {
      throw new HttpError(400, 'LazyLibrarian API key is not configured');
    }
  }

  return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Handle CORS preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    const url = new URL(req.url || '/', 'http://localhost');
    const path = url.pathname;
    const method = req.method ?? 'GET';
    const requestStart = Date.now();
    const isHealthCheck = path === '/health' || path === '/api/health';

    try {
      // Health check, verifies DB connectivity
      if (isHealthCheck && method === 'GET') {
        const dbHealth = deps.health();
        const uptimeMs = Date.now() - new Date(startedAt).getTime();
        sendJSON(res, {
          status: dbHealth.ok ? 'ok' : 'degraded',
          service: 'readqueue',
          uptime: Math.floor(uptimeMs / 1000),
          startedAt,
          database: dbHealth.details,
          circuitBreaker: deps.breakerStatus ? { lazyLibrarian: deps.breakerStatus() } : undefined,
        }, dbHealth.ok ? 200 : 503);
        return;
      }

      // To-read list, cached unless refresh is asked for
      if (path.startsWith('/api/books/') && method === 'GET') {
        const username = userFromPath(path, '/api/books/');
        const ttlSeconds = parseTtl(url.searchParams.get('ttl'), deps.reconciler.cacheTtlSeconds);
        const list = await deps.reconciler.resolveSourceList(username, {
          forceRefresh: isTruthyParam(url.searchParams.get('refresh')),
          ttlSeconds,
        });
        sendJSON(res, {
          username,
          cached: list.fromCache,
          stale: list.stale,
          fetchedAt: list.entry.fetchedAt.toISOString(),
          count: list.entry.payload.length,
          books: list.entry.payload,
        });
        return;
      }

      // Reconcile a user's list against the library
      if (path === '/api/match' && method === 'POST') {
        const body = await parseBody(req, MatchBodySchema);
        requireLibrary();
        console.log(`[API] Match request for ${body.username}${body.refresh ? ' (refresh)' : ''}`);
        const report = await deps.reconciler.reconcileWithReport(body.username, {
          formats: body.types,
          forceRefresh: body.refresh ?? false,
          maxBooks: body.maxBooks === undefined ? config.reconcile.defaultMaxBooks : body.maxBooks,
        });
        sendJSON(res, {
          ...report,
          fetchedAt: report.fetchedAt.toISOString(),
          sourceListFetchedAt: report.sourceListFetchedAt.toISOString(),
        });
        return;
      }

      // Last reconciliation, without touching either service
      if (path.startsWith('/api/cache/') && method === 'GET') {
        const username = userFromPath(path, '/api/cache/');
        const ttlSeconds = parseTtl(url.searchParams.get('ttl'), deps.reconciler.cacheTtlSeconds);
        const entry = deps.cache.get(username, 'reconciliation');
        if (!entry) {
          sendError(res, 'No cached results', 404);
          return;
        }
        if (deps.cache.isStale(entry, ttlSeconds)) {
          sendError(res, 'Cached results expired', 410, { fetchedAt: entry.fetchedAt.toISOString() });
          return;
        }
        sendJSON(res, { username, fetchedAt: entry.fetchedAt.toISOString(), results: entry.payload });
        return;
      }

      // Library lookup: local catalog, optionally LazyLibrarian's remote search
      if (path === '/api/library/find' && method === 'POST') {
        const body = await parseBody(req, FindBodySchema);
        requireLibrary();
        const found = await deps.library.findBooks(body.title, body.author ?? '', { remote: body.remote });
        sendJSON(res, { ...found, count: found.results.length });
        return;
      }

      // Mark wanted, optionally followed by a search
      if (path === '/api/library/want' && method === 'POST') {
        const body = await parseBody(req, BookActionSchema);
        requireLibrary();
        const format = body.format ?? 'eBook';
        if (body.search) {
          const result = await deps.library.requestBook(body.bookId, format);
          const ok = result.wanted.success && (result.search?.success ?? false);
          sendJSON(res, { bookId: body.bookId, format, ...result }, ok ? 200 : 502);
          return;
        }
        const result = await deps.library.markWanted(body.bookId, format);
        sendJSON(res, { bookId: body.bookId, format, ...result }, result.success ? 200 : 502);
        return;
      }

      if (path === '/api/library/search' && method === 'POST') {
        const body = await parseBody(req, BookActionSchema);
        requireLibrary();
        const format = body.format ?? 'eBook';
        const result = await deps.library.forceSearch(body.bookId, format);
        sendJSON(res, { bookId: body.bookId, format, ...result }, result.success ? 200 : 502);
        return;
      }

      if (path === '/api/library/add' && method === 'POST') {
        const body = await parseBody(req, AddBodySchema);
        requireLibrary();
        const result = await deps.library.addBook(body.bookId);
        sendJSON(res, { bookId: body.bookId, ...result }, result.success ? 200 : 502);
        return;
      }

      sendError(res, 'Not found', 404);
    } catch (error) {
      if (error instanceof HttpError) {
        sendError(res, error.message, error.status);
      } else if (error instanceof RetrievalError) {
        console.warn(`[API] ${error.message}`);
        sendError(res, error.message, 502, { code: error.code, reason: error.reason });
      } else if (error instanceof ManagerQueryError) {
        console.warn(`[API] ${error.message}`);
        sendError(res, error.message, 502, { code: error.code });
      } else {
        console.error('[API] Error:', error);
        sendError(res, 'Internal server error', 500, { detail: describeError(error) });
      }
    } finally {
      if (!isHealthCheck) {
        const elapsed = Date.now() - requestStart;
        console.log(`[API] ${method} ${path} -> ${res.statusCode} (${elapsed}ms)`);
      }
    }
  };
}

export function startServer(deps: ApiDeps, port: number = config.api.port): Server {
  const handler = createHandler(deps);
  const server = createServer((req, res) => {
    handler(req, res).catch(error => {
      console.error('[API] Unhandled handler error:', error);
      if (!res.headersSent) sendError(res, 'Internal server error', 500);
    });
  });

  server.listen(port, () => {
    console.log('');
    console.log(`[API] ReadQueue listening on port ${port}`);
    console.log('');
    console.log('Endpoints:');
    console.log('  GET  /api/health               - Health check');
    console.log('  GET  /api/books/:username      - To-read list (?refresh=1&ttl=N)');
    console.log('  POST /api/match                - Reconcile a to-read list with LazyLibrarian');
    console.log('  GET  /api/cache/:username      - Last reconciliation (404 absent, 410 expired)');
    console.log('  POST /api/library/find         - Find books in LazyLibrarian');
    console.log('  POST /api/library/want         - Mark a book wanted (search: true to also search)');
    console.log('  POST /api/library/search       - Force a search for a book');
    console.log('  POST /api/library/add          - Add a book to LazyLibrarian');
    console.log('');
  });

  return server;
}
