/**
 * FlareSolverr Client
 * Fetches Cloudflare-protected pages through a FlareSolverr proxy
 */

import { config } from '../config.js';
import { fetchWithTimeout, FetchTimeoutError } from '../utils/resilience.js';

interface FlareSolverrResponse {
  status: string;
  message: string;
  session?: string;
  solution?: {
    url: string;
    status: number;
    response: string;
    userAgent: string;
  };
}

export type FlareSolverrFailure = 'timeout' | 'challenge' | 'unavailable';

export class FlareSolverrError extends Error {
  constructor(readonly failure: FlareSolverrFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FlareSolverrError';
  }
}

export interface SolvedPage {
  html: string;
  status: number;
}

export interface FlareSolverrOptions {
  url?: string;
  timeout?: number;
}

export class FlareSolverrClient {
  private readonly endpoint: string;
  private readonly timeout: number;

  constructor(options: FlareSolverrOptions = {}) {
    this.endpoint = options.url ?? config.flareSolverr.url;
    this.timeout = options.timeout ?? config.flareSolverr.timeout;
  }

  private async command(body: Record<string, unknown>, signal?: AbortSignal): Promise<FlareSolverrResponse> {
    let response: Response;
    try {
      response = await fetchWithTimeout(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        // Proxy gets a little longer than its own challenge timeout
        timeout: this.timeout + 5000,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      if (error instanceof FetchTimeoutError) {
        throw new FlareSolverrError('timeout', error.message, { cause: error });
      }
      throw new FlareSolverrError('unavailable', `FlareSolverr unreachable at ${this.endpoint}`, { cause: error });
    }

    let data: FlareSolverrResponse;
    try {
      data = await response.json() as FlareSolverrResponse;
    } catch (error) {
      throw new FlareSolverrError('unavailable', `FlareSolverr returned HTTP ${response.status} without JSON`, { cause: error });
    }

    if (data.status !== 'ok') {
      const message = data.message || `HTTP ${response.status}`;
      const failure: FlareSolverrFailure = /timeout/i.test(message) ? 'timeout' : 'challenge';
      console.error(`[FlareSolverr] Error: ${message}`);
      throw new FlareSolverrError(failure, message);
    }

    return data;
  }

  async createSession(signal?: AbortSignal): Promise<string> {
    const data = await this.command({ cmd: 'sessions.create', maxTimeout: this.timeout }, signal);
    if (!data.session) {
      throw new FlareSolverrError('unavailable', 'FlareSolverr did not return a session id');
    }
    console.log(`[FlareSolverr] Session created: ${data.session}`);
    return data.session;
  }

  async destroySession(session: string): Promise<void> {
    try {
      await this.command({ cmd: 'sessions.destroy', session });
      console.log(`[FlareSolverr] Session destroyed: ${session}`);
    } catch (error) {
      console.warn(`[FlareSolverr] Failed to destroy session ${session}:`, error);
    }
  }

  /**
   * Fetch a URL through FlareSolverr, optionally inside an existing session
   */
  async get(url: string, session?: string, signal?: AbortSignal): Promise<SolvedPage> {
    console.log(`[FlareSolverr] Fetching: ${url}`);

    const data = await this.command({
      cmd: 'request.get',
      url,
      maxTimeout: this.timeout,
      ...(session ? { session } : {}),
    }, signal);

    if (!data.solution) {
      throw new FlareSolverrError('unavailable', 'FlareSolverr response had no solution');
    }

    console.log(`[FlareSolverr] Success - Status: ${data.solution.status}`);
    return { html: data.solution.response, status: data.solution.status };
  }

  /**
   * Check if FlareSolverr is available
   */
  async check(): Promise<boolean> {
    try {
      const response = await fetchWithTimeout(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ cmd: 'sessions.list' }),
        timeout: 5000,
      });
      return response.ok;
    } catch (error) {
      console.warn('[FlareSolverr] Health check failed:', error instanceof Error ? error.message : error);
      return false;
    }
  }
}
