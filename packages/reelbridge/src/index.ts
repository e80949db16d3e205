#!/usr/bin/env node
/**
 * reelbridge - match regional film-database records to IMDb titles
 * and merge them with supplemental catalog data.
 */

import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { mergeCommand } from './cli/merge.js';
import { ratingCommand } from './cli/rating.js';
import { refreshCommand } from './cli/refresh.js';
import { resolveCommand } from './cli/resolve.js';

const baseDir = fileURLToPath(new URL('..', import.meta.url));

const program = new Command();

program
  .name('reelbridge')
  .description('Match regional film-database records to IMDb titles')
  .version('0.1.0');

program.addCommand(resolveCommand(baseDir));
program.addCommand(ratingCommand(baseDir));
program.addCommand(refreshCommand(baseDir));
program.addCommand(mergeCommand());

await program.parseAsync(process.argv);
