/**
 * reelbridge rating <imdbId>
 */

import { Command } from 'commander';

import { createImdbResolver } from '../imdb/resolver.js';
import { fail, interruptSignal, loadCliConfig } from './context.js';

export function ratingCommand(baseDir: string): Command {
  return new Command('rating')
    .description('Fetch the IMDb rating of a known title')
    .argument('<imdbId>', 'IMDb title id (e.g. tt0091849)')
    .option('--json', 'Output as JSON')
    .action(async (imdbId: string, opts: { json?: boolean }) => {
      try {
        const config = loadCliConfig(baseDir);
        const result = await createImdbResolver(config).fetchRating(imdbId.trim(), interruptSignal());

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else if (!result.imdbId) {
          console.log(`${imdbId}: not a movie title, no rating`);
        } else if (result.rating === undefined) {
          console.log(`${imdbId}: no rating published`);
        } else {
          console.log(`${imdbId}: ${result.rating} (${result.ratingCount ?? 0} votes)`);
        }
      } catch (err) {
        fail(err);
      }
    });
}
