/**
 * reelbridge merge <seed.json> [supplemental.json]
 * Offline merge of a primary record with a supplemental one; no network.
 */

import { Command } from 'commander';

import { mergeMovie } from '../merge/merge.js';
import { loadPrimaryPage, loadSupplementalMovies, StaticSupplementalSource } from '../metadata/staticSources.js';
import { fail } from './context.js';
import { printMovie } from './resolve.js';

export function mergeCommand(): Command {
  return new Command('merge')
    .description('Merge a primary-source record with a supplemental record')
    .argument('<seed>', 'Primary-source record (JSON)')
    .argument('[supplemental]', 'Supplemental (TMDB) record or list of records')
    .option('--json', 'Output as JSON')
    .action(async (seedFile: string, supplementalFile: string | undefined, opts: { json?: boolean }) => {
      try {
        const { movie } = loadPrimaryPage(seedFile);
        const supplemental = supplementalFile
          ? await new StaticSupplementalSource(loadSupplementalMovies(supplementalFile)).resolve(movie)
          : undefined;

        const merged = mergeMovie(movie, supplemental);
        if (opts.json) {
          console.log(JSON.stringify(merged, null, 2));
        } else {
          printMovie(merged);
        }
      } catch (err) {
        fail(err);
      }
    });
}
