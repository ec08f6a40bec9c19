#!/usr/bin/env node
/**
 * ReadQueue - to-read list reconciliation
 * Checks a StoryGraph to-read list against a LazyLibrarian catalog
 */

import { initDatabase, closeDatabase, checkDatabaseHealth } from './database/db.js';
import { CacheService } from './cache/cacheService.js';
import { SqliteCacheStorage } from './cache/storage.js';
import { llCircuitBreaker } from './circuitBreaker.js';
import { config } from './config.js';
import { describeError, RetrievalError } from './errors.js';
import { RefreshJob } from './jobs/refreshJob.js';
import { LibraryActions } from './library/actions.js';
import { LazyLibrarianClient } from './library/lazyLibrarian.js';
import { LibraryIndex } from './library/libraryIndex.js';
import { displayLabel } from './reconciler/matcher.js';
import { Reconciler } from './reconciler/orchestrator.js';
import { FlareSolverrClient } from './sources/flareSolverr.js';
import { StoryGraphSource } from './sources/storygraph.js';
import { isFormat, FORMATS } from './types.js';
import { registerCleanup } from './utils/resilience.js';
import type { Format, ReconcileReport } from './types.js';
import type { LibraryService } from './api.js';

interface Services {
  cache: CacheService;
  reconciler: Reconciler;
  client: LazyLibrarianClient;
  flareSolverr: FlareSolverrClient;
  library: LibraryService;
}

function createServices(): Services {
  const storage = new SqliteCacheStorage(initDatabase(), { capacity: config.cache.capacity });
  const cache = new CacheService(storage);

  const flareSolverr = new FlareSolverrClient();
  const client = new LazyLibrarianClient();
  const index = new LibraryIndex(client);
  const actions = new LibraryActions(client);

  const reconciler = new Reconciler({
    cache,
    source: new StoryGraphSource({ client: flareSolverr }),
    candidates: index,
  });

  const library: LibraryService = {
    isConfigured: () => client.isConfigured(),
    findBooks: (title, author, findOptions) => index.findBooks(title, author, findOptions),
    markWanted: (id, format) => actions.markWanted(id, format),
    forceSearch: (id, format) => actions.forceSearch(id, format),
    requestBook: (id, format) => actions.requestBook(id, format),
    addBook: id => actions.addBook(id),
  };

  return { cache, reconciler, client, flareSolverr, library };
}

function flagValue(args: string[], name: string): string | undefined {
  return args.find(a => a.startsWith(`--${name}=`))?.split('=')[1];
}

function parseFormats(raw: string | undefined): Format[] {
  if (!raw) return [...FORMATS];
  const formats: Format[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim();
    if (!isFormat(name)) {
      throw new Error(`Unknown format "${name}" (expected ${FORMATS.join(', ')})`);
    }
    formats.push(name);
  }
  return formats;
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0] || 'status';

  console.log('╔══════════════════════════════════════════════════════════════════╗');
  console.log('║                          READQUEUE                               ║');
  console.log('║         StoryGraph to-read  ↔  LazyLibrarian reconciliation      ║');
  console.log('╚══════════════════════════════════════════════════════════════════╝');
  console.log('');

  switch (command) {
    case 'status':
      await showStatus();
      break;

    case 'reconcile': {
      const username = args.slice(1).find(a => !a.startsWith('--'));
      if (!username) {
        console.log('Usage: reconcile <username> [--refresh] [--max=N] [--formats=eBook,AudioBook]');
        process.exitCode = 1;
        break;
      }
      const maxRaw = flagValue(args, 'max');
      const maxBooks = maxRaw === undefined ? config.reconcile.defaultMaxBooks : parseInt(maxRaw, 10);
      await runReconcile(username, {
        forceRefresh: args.includes('--refresh'),
        maxBooks: Number.isNaN(maxBooks) ? config.reconcile.defaultMaxBooks : maxBooks,
        formats: parseFormats(flagValue(args, 'formats')),
      });
      break;
    }

    case 'schedule':
      await runSchedule();
      return; // Runs until signalled

    case 'serve':
    case 'api': {
      const { startServer } = await import('./api.js');
      const services = createServices();
      startServer({
        reconciler: services.reconciler,
        cache: services.cache,
        library: services.library,
        health: checkDatabaseHealth,
        breakerStatus: () => llCircuitBreaker.getStatus(),
      });
      return; // Don't close database or exit
    }

    default:
      console.log('Usage: readqueue <command>');
      console.log('');
      console.log('Commands:');
      console.log('  status              Check database, FlareSolverr and LazyLibrarian');
      console.log('  serve / api         Start the HTTP API server');
      console.log('  reconcile <user>    Reconcile a StoryGraph to-read list');
      console.log('  schedule            Refresh SG_USERNAMES every REFRESH_INTERVAL_MINUTES');
      console.log('');
      console.log('Options:');
      console.log('  --refresh           Ignore cached data');
      console.log('  --max=N             Only check the first N books');
      console.log('  --formats=LIST      eBook, AudioBook or both (comma-separated)');
      break;
  }

  closeDatabase();
}

async function showStatus() {
  console.log('📊 Status');
  console.log('─'.repeat(50));

  initDatabase();
  const db = checkDatabaseHealth();
  console.log(`Database:       ${db.ok ? 'ok' : 'unavailable'} (${config.database.path})`);
  if (db.ok) {
    console.log(`Cache entries:  ${String(db.details.cacheEntries)}`);
  }

  const { client, flareSolverr } = createServices();

  const fsUp = await flareSolverr.check();
  console.log(`FlareSolverr:   ${fsUp ? 'reachable' : 'unreachable'} (${config.flareSolverr.url})`);

  if (!client.isConfigured()) {
    console.log('LazyLibrarian:  LL_API_KEY not set');
  } else {
    try {
      const version = await client.getVersion();
      console.log(`LazyLibrarian:  ${version.success ? 'reachable' : 'error'}${version.message ? ` (${version.message})` : ''}`);
    } catch (error) {
      console.log(`LazyLibrarian:  unreachable (${describeError(error)})`);
    }
  }

  const breaker = llCircuitBreaker.getStatus();
  console.log(`Circuit:        ${breaker.state}`);
  console.log('');
  console.log(`Scheduled users: ${config.schedule.usernames.join(', ') || '(none)'}`);
}

async function runReconcile(
  username: string,
  options: { forceRefresh: boolean; maxBooks: number; formats: Format[] },
) {
  const { reconciler, client } = createServices();
  if (!client.isConfigured()) {
    console.log('❌ LL_API_KEY is not set');
    process.exitCode = 1;
    return;
  }

  let report: ReconcileReport;
  try {
    report = await reconciler.reconcileWithReport(username, options);
  } catch (error) {
    if (error instanceof RetrievalError) {
      console.log(`❌ ${error.message}`);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  printReport(report, options.formats);
}

function printReport(report: ReconcileReport, formats: Format[]) {
  console.log('');
  console.log(`📚 ${report.username}: ${report.totalChecked} books${report.fromCache ? ' (cached)' : ''}`);
  if (report.sourceListStale) {
    console.log(`⚠️  StoryGraph unavailable, using list from ${report.sourceListFetchedAt.toISOString()}`);
  }
  console.log('─'.repeat(60));

  for (const result of report.results) {
    const statuses = formats.map(f => `${f}: ${result.perFormatStatus[f] ?? '-'}`).join('  ');
    const author = result.sourceItem.author ? ` by ${result.sourceItem.author}` : '';
    console.log(`  ${result.sourceItem.title}${author}`);
    console.log(`      ${statuses}`);

    const primary = result.libraryMatches[0];
    if (primary) {
      const labels = formats
        .map(f => displayLabel(primary.formatStatuses[f]))
        .filter((label): label is string => label !== null);
      console.log(`      LazyLibrarian #${primary.id || '?'}${labels.length > 0 ? ` [${labels.join(', ')}]` : ''}`);
    }
  }

  console.log('─'.repeat(60));
  const missing = report.results.filter(r => r.libraryMatches.length === 0).length;
  console.log(`  In library: ${report.totalChecked - missing}   Missing: ${missing}`);
  if (report.failures.length > 0) {
    console.log(`  ⚠️  ${report.failures.length} lookups failed:`);
    for (const failure of report.failures) {
      console.log(`      #${failure.index + 1} ${failure.title}: ${failure.error}`);
    }
  }
}

async function runSchedule() {
  if (config.schedule.usernames.length === 0) {
    console.log('❌ SG_USERNAMES is empty - nothing to schedule');
    process.exitCode = 1;
    closeDatabase();
    return;
  }

  const { reconciler } = createServices();
  const job = new RefreshJob(reconciler);

  // Abort the pass in flight; the database closes after this handler
  registerCleanup(() => {
    job.stop().catch(error => console.error('[RefreshJob] Stop failed:', describeError(error)));
  });

  job.start();
}

main().catch(error => {
  console.error(error);
  closeDatabase();
  process.exitCode = 1;
});
