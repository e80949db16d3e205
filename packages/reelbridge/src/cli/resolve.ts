/**
 * reelbridge resolve <seed.json>
 * Resolve the IMDb id for a primary-source record, merge it with optional
 * supplemental data and store the result.
 */

import { Command } from 'commander';

import type { MergedMovie } from '../shared/types.js';
import { MovieStore } from '../db/client.js';
import { createImdbResolver } from '../imdb/resolver.js';
import { MovieMetadataOrchestrator } from '../metadata/orchestrator.js';
import {
  loadPrimaryPage,
  loadSupplementalMovies,
  StaticPrimarySource,
  StaticSupplementalSource,
} from '../metadata/staticSources.js';
import { expandHome, fail, interruptSignal, loadCliConfig } from './context.js';

interface ResolveOptions {
  source?: string;
  supplemental?: string;
  db?: string;
  store: boolean;
  json?: boolean;
}

export function printMovie(movie: MergedMovie): void {
  const line = (label: string, value: string | number | undefined) =>
    console.log(`  ${label.padEnd(12)}: ${value ?? '-'}`);

  console.log(`\n── #${movie.sourceId} ${movie.title ?? ''} ────────────────────────────`);
  line('Original', movie.originalTitle);
  line('Year', movie.year);
  line('Directors', movie.directors.join(', ') || undefined);
  line('Origin', movie.originCountryCodes.join(', ') || movie.origin);
  line('IMDb', movie.imdbId);
  line('IMDb rating', movie.imdbRating !== undefined
    ? `${movie.imdbRating} (${movie.imdbRatingCount ?? 0} votes)`
    : undefined);
  line('TMDB', movie.tmdbId);
  line('Released', movie.releaseDate);
  line('Poster', movie.posterUrl);
}

export function resolveCommand(baseDir: string): Command {
  return new Command('resolve')
    .description('Resolve the IMDb id of a primary-source record and merge it')
    .argument('<seed>', 'Primary-source record (JSON)')
    .option('--source <html>', 'Saved primary-source page, searched for a direct IMDb link')
    .option('--supplemental <json>', 'Supplemental (TMDB) record or list of records')
    .option('-d, --db <path>', 'SQLite DB path (default: store.dbPath from config)')
    .option('--no-store', 'Do not write the merged record to the DB')
    .option('--json', 'Output as JSON')
    .action(async (seedFile: string, opts: ResolveOptions) => {
      try {
        const config = loadCliConfig(baseDir);
        const page = loadPrimaryPage(seedFile, opts.source);
        const supplemental = opts.supplemental
          ? new StaticSupplementalSource(loadSupplementalMovies(opts.supplemental))
          : undefined;

        const store = opts.store ? new MovieStore(expandHome(opts.db ?? config.store.dbPath)) : undefined;
        try {
          const orchestrator = new MovieMetadataOrchestrator({
            primary: new StaticPrimarySource([page]),
            resolver: createImdbResolver(config),
            supplemental,
          });

          const existing = store?.get(page.movie.id);
          const merged = await orchestrator.resolveMovieMetadata(page.movie.id, existing, interruptSignal());
          store?.upsert(merged);

          if (opts.json) {
            console.log(JSON.stringify(merged, null, 2));
          } else {
            printMovie(merged);
          }
        } finally {
          store?.close();
        }
      } catch (err) {
        fail(err);
      }
    });
}
