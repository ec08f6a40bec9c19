/**
 * StoryGraph Source
 * Scrapes a user's to-read list through FlareSolverr
 *
 * The to-read page shows 10 books per page and usually announces the total
 * in `<p class="search-results-count">N books</p>`. When the count is missing
 * we walk `?page=N` until a page yields nothing new.
 */

import * as cheerio from 'cheerio';
import { config } from '../config.js';
import { RetrievalError } from '../errors.js';
import type { SourceItem, SourceListProvider } from '../types.js';
import { FlareSolverrClient, FlareSolverrError } from './flareSolverr.js';

const BOOK_BLOCK_SELECTOR = 'div.book-pane, div.book-pane-content, div.book-title-author-and-series, article.book-tile';
const CHALLENGE_MARKERS = ['cf-challenge', 'challenge-platform', 'Just a moment...'];

/**
 * Total book count announced on the first page, or null when absent
 */
export function parseBookCount(html: string): number | null {
  const match = html.match(/<p class="search-results-count">\s*([\d,]+) books?\s*<\/p>/);
  if (!match) return null;
  return parseInt(match[1].replace(/,/g, ''), 10);
}

export function looksLikeChallenge(html: string): boolean {
  return CHALLENGE_MARKERS.some(marker => html.includes(marker));
}

function absolutize(href: string, baseUrl: string): string {
  return href.startsWith('/') ? `${baseUrl}${href}` : href;
}

/**
 * Extract to-read entries from one page.
 * `seen` is shared across pages and mutated so repeated books are dropped.
 */
export function parseToReadPage(
  html: string,
  seen: Set<string>,
  baseUrl: string = config.storyGraph.baseUrl,
): SourceItem[] {
  const $ = cheerio.load(html);
  const found: SourceItem[] = [];

  let blocks = $(BOOK_BLOCK_SELECTOR).toArray();

  if (blocks.length === 0) {
    // Layout fallback: any container with a heading plus an author reference
    blocks = $('div, article, section').filter((_, el) => {
      const block = $(el);
      return block.find('h3').length > 0 &&
        (block.find('p.font-body').length > 0 || block.find("a[href^='/authors/']").length > 0);
    }).toArray();
  }

  for (const el of blocks) {
    const block = $(el);

    let bookLink = block.find("a[href^='/books/']").first();
    if (bookLink.length === 0) bookLink = block.find('h3 a').first();
    if (bookLink.length === 0) bookLink = block.find('a').first();
    if (bookLink.length === 0) continue;

    const href = bookLink.attr('href') ?? '';
    const title = bookLink.text().trim();
    if (!title) continue;

    let authorLink = block.find("a[href^='/authors/']").first();
    if (authorLink.length === 0) authorLink = block.find('p.font-body a').first();
    const author = authorLink.length > 0 ? authorLink.text().trim() : '';

    const link = href ? absolutize(href, baseUrl) : null;
    const identifier = link ?? `${title}|${author}`;
    if (seen.has(identifier)) continue;

    seen.add(identifier);
    found.push({ link, title, author });
  }

  return found;
}

export interface StoryGraphSourceOptions {
  client?: FlareSolverrClient;
  baseUrl?: string;
  pageSize?: number;
  maxPages?: number;
}

export class StoryGraphSource implements SourceListProvider {
  private readonly client: FlareSolverrClient;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly maxPages: number;

  constructor(options: StoryGraphSourceOptions = {}) {
    this.client = options.client ?? new FlareSolverrClient();
    this.baseUrl = options.baseUrl ?? config.storyGraph.baseUrl;
    this.pageSize = options.pageSize ?? config.storyGraph.pageSize;
    this.maxPages = options.maxPages ?? config.storyGraph.maxPages;
  }

  async fetchSourceList(username: string, signal?: AbortSignal): Promise<SourceItem[]> {
    const listUrl = `${this.baseUrl}/to-read/${encodeURIComponent(username)}`;
    console.log(`[StoryGraph] Fetching to-read list for ${username}`);

    let session: string | null = null;
    try {
      session = await this.client.createSession(signal);
      const books = await this.collect(username, listUrl, session, signal);
      console.log(`[StoryGraph] Extracted ${books.length} books for ${username}`);
      return books;
    } catch (error) {
      throw this.toRetrievalError(username, error, signal);
    } finally {
      if (session) {
        await this.client.destroySession(session);
      }
    }
  }

  private async collect(username: string, listUrl: string, session: string, signal?: AbortSignal): Promise<SourceItem[]> {
    const first = await this.client.get(listUrl, session, signal);

    if (first.status === 404) {
      throw new RetrievalError(username, 'not_found', `no to-read page at ${listUrl}`);
    }
    if (first.status === 403 || first.status === 503 || looksLikeChallenge(first.html)) {
      throw new RetrievalError(username, 'blocked', `challenge page returned (HTTP ${first.status})`);
    }

    const seen = new Set<string>();
    const books = parseToReadPage(first.html, seen, this.baseUrl);
    const count = parseBookCount(first.html);

    if (count !== null) {
      const pages = Math.min(Math.ceil(count / this.pageSize), this.maxPages);
      console.log(`[StoryGraph] ${count} books across ${pages} pages`);

      for (let page = 2; page <= pages; page++) {
        signal?.throwIfAborted();
        const result = await this.client.get(`${listUrl}?page=${page}`, session, signal);
        if (result.status !== 200) {
          console.warn(`[StoryGraph] Failed to fetch page ${page}: ${result.status}`);
          continue;
        }
        books.push(...parseToReadPage(result.html, seen, this.baseUrl));
      }
      return books;
    }

    console.warn('[StoryGraph] No book count on first page, paginating until exhausted');
    for (let page = 2; page <= this.maxPages; page++) {
      signal?.throwIfAborted();
      const result = await this.client.get(`${listUrl}?page=${page}`, session, signal);
      if (result.status !== 200) {
        console.warn(`[StoryGraph] Failed to fetch page ${page}: ${result.status}`);
        break;
      }
      const fresh = parseToReadPage(result.html, seen, this.baseUrl);
      if (fresh.length === 0) break;
      books.push(...fresh);
    }
    return books;
  }

  private toRetrievalError(username: string, error: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted) return error;
    if (error instanceof RetrievalError) return error;
    if (error instanceof FlareSolverrError) {
      const reason = error.failure === 'timeout' ? 'timeout' : 'blocked';
      return new RetrievalError(username, reason, error.message, { cause: error });
    }
    return new RetrievalError(username, 'blocked', error instanceof Error ? error.message : String(error), { cause: error });
  }
}
