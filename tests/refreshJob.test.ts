/**
 * Refresh Job Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CacheService } from '../src/cache/cacheService.js';
import { MemoryCacheStorage } from '../src/cache/storage.js';
import { RetrievalError } from '../src/errors.js';
import { RefreshJob } from '../src/jobs/refreshJob.js';
import { Reconciler } from '../src/reconciler/orchestrator.js';
import type { CandidateProvider, LibraryCandidate, SourceItem, SourceListProvider } from '../src/types.js';
import { candidate, deferred, item } from './fixtures.js';

const shelf: SourceItem[] = [item('Dune', 'Frank Herbert'), item('Kindred', 'Octavia E. Butler')];

class FakeSource implements SourceListProvider {
  fetchSourceList = vi.fn(async (username: string, _signal?: AbortSignal): Promise<SourceItem[]> => {
    if (username === 'bob') throw new RetrievalError(username, 'not_found');
    return shelf;
  });
}

class FakeCandidates implements CandidateProvider {
  invalidate = vi.fn();
  async searchLibraryCandidates(title: string): Promise<LibraryCandidate[]> {
    return title === 'Dune' ? [candidate('Dune', 'Frank Herbert', { eBook: { present: true } }, '1')] : [];
  }
}

describe('RefreshJob', () => {
  let source: FakeSource;
  let candidates: FakeCandidates;
  let reconciler: Reconciler;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    source = new FakeSource();
    candidates = new FakeCandidates();
    const cache = new CacheService(new MemoryCacheStorage());
    reconciler = new Reconciler({ cache, source, candidates, ttlSeconds: 3600 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('refreshes users one at a time and carries on past a failure', async () => {
    const job = new RefreshJob(reconciler, { usernames: ['alice', 'bob', 'carol'], maxBooks: null });

    const summaries = await job.runOnce();

    expect(source.fetchSourceList.mock.calls.map(call => call[0])).toEqual(['alice', 'bob', 'carol']);
    expect(summaries.map(({ durationMs: _, ...rest }) => rest)).toEqual([
      { username: 'alice', ok: true, checked: 2, missing: 1, failures: 0, sourceListStale: false },
      {
        username: 'bob',
        ok: false,
        checked: 0,
        missing: 0,
        failures: 0,
        sourceListStale: false,
        error: 'Could not retrieve to-read list for bob (not_found)',
      },
      { username: 'carol', ok: true, checked: 2, missing: 1, failures: 0, sourceListStale: false },
    ]);
  });

  it('forces a refresh on every pass', async () => {
    const job = new RefreshJob(reconciler, { usernames: ['alice'] });

    await job.runOnce();
    await job.runOnce();

    expect(source.fetchSourceList).toHaveBeenCalledTimes(2);
    expect(candidates.invalidate).toHaveBeenCalledTimes(2);
  });

  it('applies the configured book limit', async () => {
    const job = new RefreshJob(reconciler, { usernames: ['alice'], maxBooks: 1 });

    const [summary] = await job.runOnce();

    expect(summary).toMatchObject({ ok: true, checked: 1, missing: 0 });
  });

  it('joins a pass already in progress', async () => {
    const job = new RefreshJob(reconciler, { usernames: ['alice'] });

    const first = job.runOnce();
    const second = job.runOnce();

    expect(second).toBe(first);
    await first;
    expect(source.fetchSourceList).toHaveBeenCalledTimes(1);
    expect(job.isRunning()).toBe(false);
  });

  it('stop() aborts the pass and skips the remaining users', async () => {
    const gate = deferred<SourceItem[]>();
    source.fetchSourceList.mockImplementationOnce(() => gate.promise);
    const job = new RefreshJob(reconciler, { usernames: ['alice', 'carol'] });

    const pass = job.runOnce();
    await vi.waitFor(() => expect(source.fetchSourceList).toHaveBeenCalledTimes(1));
    const stopped = job.stop();
    gate.resolve(shelf);
    await stopped;

    const summaries = await pass;
    expect(summaries.map(s => [s.username, s.ok])).toEqual([['alice', false]]);
    expect(source.fetchSourceList).toHaveBeenCalledTimes(1);
    expect(job.isRunning()).toBe(false);
  });
});
