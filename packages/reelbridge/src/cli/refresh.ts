/**
 * reelbridge refresh
 * Re-fetch IMDb ratings for every stored movie with an IMDb id.
 */

import { Command } from 'commander';

import { MovieStore } from '../db/client.js';
import { createImdbResolver } from '../imdb/resolver.js';
import { createLogger } from '../shared/logger.js';
import { refreshStoredRatings } from '../metadata/refreshQueue.js';
import { getConfigPath } from '../shared/config.js';
import { expandHome, fail, interruptSignal, loadCliConfig, parseConcurrency } from './context.js';

export function refreshCommand(baseDir: string): Command {
  return new Command('refresh')
    .description('Refresh IMDb ratings of stored movies')
    .option('-d, --db <path>', 'SQLite DB path (default: store.dbPath from config)')
    .option('-j, --concurrency <n>', 'Parallel workers (default: refresh.concurrency from config)')
    .action(async (opts: { db?: string; concurrency?: string }) => {
      try {
        const config = loadCliConfig(baseDir);
        const concurrency = opts.concurrency ? parseConcurrency(opts.concurrency) : config.refresh.concurrency;

        const dbPath = expandHome(opts.db ?? config.store.dbPath);
        const store = new MovieStore(dbPath);
        const log = createLogger('refresh');
        try {
          console.log(`Config   : ${getConfigPath(baseDir) ?? '(defaults)'}`);
          console.log(`DB       : ${dbPath}`);
          console.log(`Stored   : ${store.count()}`);
          console.log(`Workers  : ${concurrency}`);

          let worker = 0;
          const summary = await refreshStoredRatings(
            store,
            () => createImdbResolver(config, log.child(`w${++worker}`)),
            {
              concurrency,
              signal: interruptSignal(),
              onResult: (r) => {
                if (r.error) {
                  log.warn(`#${r.sourceId} ${r.imdbId}: ${r.error}`);
                } else if (r.unchanged) {
                  log.warn(`#${r.sourceId} ${r.imdbId}: no rating on IMDb, kept the stored one`);
                } else {
                  log.info(`#${r.sourceId} ${r.imdbId}: ${r.rating ?? '-'} (${r.ratingCount ?? 0})`);
                }
              },
            }
          );

          console.log('\n── Refresh complete ─────────────────────────────────────');
          console.log(`  Total     : ${summary.total}`);
          console.log(`  Refreshed : ${summary.refreshed}`);
          console.log(`  Unchanged : ${summary.unchanged}`);
          console.log(`  Failed    : ${summary.failed}`);
        } finally {
          store.close();
        }
      } catch (err) {
        fail(err);
      }
    });
}
