/**
 * In-memory sources for records supplied as files (CLI) or fixtures (tests).
 */

import fs from 'node:fs';

import type { PrimaryMovie, SupplementalMovie } from '../shared/types.js';
import { parsePrimaryMovie, parseSupplementalMovie } from '../shared/records.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { normalizeTitle } from '../matching/normalize.js';
import type { PrimaryPage, PrimarySource, SupplementalSource } from './orchestrator.js';

export class StaticPrimarySource implements PrimarySource {
  private readonly pages = new Map<number, PrimaryPage>();

  constructor(pages: Iterable<PrimaryPage>) {
    for (const page of pages) this.pages.set(page.movie.id, page);
  }

  async scrape(sourceId: number): Promise<PrimaryPage> {
    const page = this.pages.get(sourceId);
    if (!page) throw new Error(`No primary record for #${sourceId}`);
    return page;
  }
}

/**
 * resolve() matches on title or original title; a source holding a single
 * movie returns it for any query, with a warning when the titles differ.
 */
export class StaticSupplementalSource implements SupplementalSource {
  constructor(
    private readonly movies: readonly SupplementalMovie[],
    private readonly log: Logger = createLogger('supplemental')
  ) {}

  async findById(tmdbId: number): Promise<SupplementalMovie | undefined> {
    return this.movies.find(m => m.id === tmdbId);
  }

  async resolve(movie: PrimaryMovie): Promise<SupplementalMovie | undefined> {
    const wanted = new Set(
      [movie.title, movie.originalTitle, ...Object.values(movie.localizedTitles)]
        .map(t => normalizeTitle(t))
        .filter(t => t !== '')
    );
    const hit = this.movies.find(m => wanted.has(normalizeTitle(m.title)) || wanted.has(normalizeTitle(m.originalTitle)));
    if (hit) return hit;
    if (this.movies.length !== 1) return undefined;

    const only = this.movies[0];
    this.log.warn(
      `Supplemental #${only.id} "${only.title ?? ''}" does not match #${movie.id} "${movie.title ?? ''}"; using it anyway`
    );
    return only;
  }
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

/** Seed JSON plus the optional saved source page */
export function loadPrimaryPage(seedFile: string, htmlFile?: string): PrimaryPage {
  return {
    movie: parsePrimaryMovie(readJson(seedFile)),
    html: htmlFile ? fs.readFileSync(htmlFile, 'utf-8') : '',
  };
}

/** One supplemental record or a list of them */
export function loadSupplementalMovies(file: string): SupplementalMovie[] {
  const doc = readJson(file);
  return Array.isArray(doc) ? doc.map(parseSupplementalMovie) : [parseSupplementalMovie(doc)];
}
