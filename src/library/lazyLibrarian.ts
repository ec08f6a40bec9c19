/**
 * LazyLibrarian API Client
 *
 * Every command is a GET on /api with `cmd` and `apikey` query parameters.
 * Responses are inconsistent across commands: plain "OK", JSON lists,
 * JSON objects, or free text. `request()` folds them into one shape.
 */

import { config } from '../config.js';
import { CircuitBreaker, llCircuitBreaker } from '../circuitBreaker.js';
import type { Format } from '../types.js';
import { fetchWithTimeout, withRetry } from '../utils/resilience.js';

export type LLRecord = Record<string, unknown>;

export interface LLResponse {
  success: boolean;
  message?: string;
  data?: LLRecord[];
  raw: unknown;
}

export class LazyLibrarianHttpError extends Error {
  constructor(readonly status: number, readonly command: string) {
    super(`LazyLibrarian ${command} failed: HTTP ${status}`);
    this.name = 'LazyLibrarianHttpError';
  }
}

export interface LazyLibrarianOptions {
  host?: string;
  port?: number;
  apiKey?: string;
  https?: boolean;
  timeout?: number;
  breaker?: CircuitBreaker;
  maxRetries?: number;
}

export function isRecord(value: unknown): value is LLRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the record list out of a response: a bare list, `{ data: [...] }`,
 * or the first list-valued property.
 */
export function unwrapRecords(value: unknown): LLRecord[] {
  if (Array.isArray(value)) {
    return value.filter(isRecord);
  }
  if (isRecord(value)) {
    if (Array.isArray(value.data)) {
      return value.data.filter(isRecord);
    }
    for (const v of Object.values(value)) {
      if (Array.isArray(v)) return v.filter(isRecord);
    }
  }
  return [];
}

/**
 * Normalize a response body into `{ success, message?, data? }`
 */
export function normalizeResponse(text: string): LLResponse {
  const body = text.trim();
  if (body === 'OK') {
    return { success: true, message: 'OK', raw: body };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    // Free-text replies ("Invalid id", "Missing parameter") are still answers
    return { success: !/^(invalid|missing|unknown|error)/i.test(body), message: body, raw: body };
  }

  if (Array.isArray(parsed)) {
    return { success: true, data: unwrapRecords(parsed), raw: parsed };
  }

  if (isRecord(parsed)) {
    const flag = parsed.success ?? parsed.Success;
    const message = parsed.message ?? parsed.Message;
    const error = parsed.error ?? parsed.Error;
    return {
      success: typeof flag === 'boolean' ? flag : error === undefined,
      message: typeof message === 'string' ? message
        : typeof error === 'string' ? error
        : isRecord(error) && typeof error.message === 'string' ? error.message
        : undefined,
      data: unwrapRecords(parsed),
      raw: parsed,
    };
  }

  return { success: true, message: String(parsed), raw: parsed };
}

export class LazyLibrarianClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeout: number;
  private readonly breaker: CircuitBreaker;
  private readonly maxRetries: number;

  constructor(options: LazyLibrarianOptions = {}) {
    const host = options.host ?? config.lazyLibrarian.host;
    const port = options.port ?? config.lazyLibrarian.port;
    const protocol = (options.https ?? config.lazyLibrarian.https) ? 'https' : 'http';
    this.baseUrl = `${protocol}://${host}:${port}/api`;
    this.apiKey = options.apiKey ?? config.lazyLibrarian.apiKey;
    this.timeout = options.timeout ?? config.lazyLibrarian.timeout;
    this.breaker = options.breaker ?? llCircuitBreaker;
    this.maxRetries = options.maxRetries ?? 2;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async request(
    command: string,
    params: Record<string, string> = {},
    options: { wait?: boolean; signal?: AbortSignal } = {},
  ): Promise<LLResponse> {
    const query = new URLSearchParams({ ...params, cmd: command, apikey: this.apiKey });
    if (options.wait) query.set('wait', '1');
    const url = `${this.baseUrl}?${query.toString()}`;

    const response = await withRetry(
      async () => {
        const res = await this.breaker.execute(
          () => fetchWithTimeout(url, { timeout: this.timeout, signal: options.signal }),
        );
        if (!res.ok) {
          throw new LazyLibrarianHttpError(res.status, command);
        }
        return res;
      },
      { maxRetries: this.maxRetries, baseDelay: 1000, signal: options.signal },
    );

    const text = await response.text();
    console.log(`[LazyLibrarian] ${command} → ${text.slice(0, 80).replace(/\s+/g, ' ')}${text.length > 80 ? '…' : ''}`);
    return normalizeResponse(text);
  }

  async getAllBooks(signal?: AbortSignal): Promise<LLRecord[]> {
    const response = await this.request('getAllBooks', {}, { signal });
    return response.data ?? [];
  }

  async getWanted(signal?: AbortSignal): Promise<LLRecord[]> {
    const response = await this.request('getWanted', {}, { signal });
    return response.data ?? [];
  }

  /** Remote search by name (goes out to LazyLibrarian's metadata providers) */
  async findBook(name: string, signal?: AbortSignal): Promise<LLRecord[]> {
    const response = await this.request('findBook', { name }, { signal });
    return response.data ?? [];
  }

  async addBook(bookId: string): Promise<LLResponse> {
    console.log(`[LazyLibrarian] Adding book ${bookId}`);
    return this.request('addBook', { id: bookId });
  }

  /**
   * Mark a book as wanted. Skips the call when the wanted list already has
   * it with an open/wanted status.
   */
  async queueBook(bookId: string, format: Format): Promise<LLResponse> {
    try {
      const wanted = await this.getWanted();
      const existing = wanted.find(w => recordId(w) === bookId);
      if (existing) {
        const status = stringField(existing, 'Status', 'status').toLowerCase();
        if (status.includes('open') || status.includes('want')) {
          console.log(`[LazyLibrarian] Book ${bookId} already wanted (${status}) - skipping queue`);
          return { success: true, message: 'Already wanted', raw: existing };
        }
      }
    } catch (error) {
      console.warn(`[LazyLibrarian] Could not inspect wanted list before queueing ${bookId}:`, error instanceof Error ? error.message : error);
    }

    console.log(`[LazyLibrarian] Queueing book ${bookId} (${format})`);
    return this.request('queueBook', { id: bookId, type: format });
  }

  async searchBook(bookId: string, format: Format, wait = false): Promise<LLResponse> {
    console.log(`[LazyLibrarian] Searching for book ${bookId} (${format}, wait: ${wait})`);
    return this.request('searchBook', { id: bookId, type: format }, { wait });
  }

  async getVersion(): Promise<LLResponse> {
    return this.request('getVersion');
  }
}

/**
 * First non-empty string among the given keys
 */
export function stringField(record: LLRecord, ...keys: string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return '';
}

export function recordId(record: LLRecord): string {
  return stringField(record, 'BookID', 'bookid', 'id', 'book_id');
}
