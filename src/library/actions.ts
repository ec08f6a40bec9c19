/**
 * Acquisition actions against LazyLibrarian
 */

import { describeError } from '../errors.js';
import type { AcquisitionProvider, ActionResult, Format } from '../types.js';
import type { LazyLibrarianClient, LLResponse } from './lazyLibrarian.js';

function toActionResult(response: LLResponse, fallback: string): ActionResult {
  return {
    success: response.success,
    message: response.message ?? fallback,
  };
}

async function attempt(label: string, fn: () => Promise<LLResponse>): Promise<ActionResult> {
  try {
    return toActionResult(await fn(), label);
  } catch (error) {
    console.error(`[Actions] ${label} failed:`, describeError(error));
    return { success: false, message: describeError(error) };
  }
}

export interface RequestBookResult {
  wanted: ActionResult;
  search: ActionResult | null;    // Not attempted when marking wanted failed
}

export class LibraryActions implements AcquisitionProvider {
  constructor(private readonly client: LazyLibrarianClient) {}

  markWanted(id: string, format: Format): Promise<ActionResult> {
    return attempt(`queueBook ${id} (${format})`, () => this.client.queueBook(id, format));
  }

  forceSearch(id: string, format: Format): Promise<ActionResult> {
    return attempt(`searchBook ${id} (${format})`, () => this.client.searchBook(id, format));
  }

  addBook(id: string): Promise<ActionResult> {
    return attempt(`addBook ${id}`, () => this.client.addBook(id));
  }

  /**
   * Mark wanted, then kick off a search so the download starts right away
   */
  async requestBook(id: string, format: Format): Promise<RequestBookResult> {
    const wanted = await this.markWanted(id, format);
    if (!wanted.success) {
      return { wanted, search: null };
    }
    const search = await this.forceSearch(id, format);
    return { wanted, search };
  }
}
