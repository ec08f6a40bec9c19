/**
 * In-process stand-in for the LazyLibrarian client
 */

import { CircuitBreaker } from '../src/circuitBreaker.js';
import { LazyLibrarianClient } from '../src/library/lazyLibrarian.js';
import type { LLRecord, LLResponse } from '../src/library/lazyLibrarian.js';
import type { Format } from '../src/types.js';

export class FakeLazyLibrarian extends LazyLibrarianClient {
  books: LLRecord[] = [];
  remote: LLRecord[] = [];
  loadFailure: Error | null = null;
  loadGate: Promise<void> | null = null;
  loadSignals: Array<AbortSignal | undefined> = [];
  loads = 0;
  commands: string[] = [];
  replies = new Map<string, LLResponse | Error>();

  constructor() {
    super({ host: 'll.test', apiKey: 'test-secret', breaker: new CircuitBreaker({ name: 'fake' }) });
  }

  async getAllBooks(signal?: AbortSignal): Promise<LLRecord[]> {
    this.loads++;
    this.loadSignals.push(signal);
    if (this.loadGate) await this.loadGate;
    signal?.throwIfAborted();
    if (this.loadFailure) throw this.loadFailure;
    return this.books;
  }

  async findBook(name: string): Promise<LLRecord[]> {
    this.commands.push(`findBook ${name}`);
    return this.remote;
  }

  async queueBook(bookId: string, format: Format): Promise<LLResponse> {
    return this.reply(`queueBook ${bookId} ${format}`, 'queueBook');
  }

  async searchBook(bookId: string, format: Format): Promise<LLResponse> {
    return this.reply(`searchBook ${bookId} ${format}`, 'searchBook');
  }

  async addBook(bookId: string): Promise<LLResponse> {
    return this.reply(`addBook ${bookId}`, 'addBook');
  }

  private reply(command: string, name: string): LLResponse {
    this.commands.push(command);
    const reply = this.replies.get(name);
    if (reply instanceof Error) throw reply;
    return reply ?? { success: true, message: 'OK', raw: 'OK' };
  }
}
