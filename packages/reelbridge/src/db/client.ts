/**
 * reelbridge DB client
 * Typed wrapper around better-sqlite3 for the movie document store.
 */

import fs from 'node:fs';
import path from 'node:path';

import BetterSqlite3 from 'better-sqlite3';
import type Database from 'better-sqlite3';

import type { MergedMovie } from '../shared/types.js';
import { parseMergedMovie } from '../shared/records.js';
import { applySchema } from './schema.js';

export interface MovieRow {
  source_id: number;
  imdb_id: string | null;
  tmdb_id: number | null;
  document: string;        // JSON MergedMovie
  created_at: string;
  updated_at: string;
}

export class MovieStore {
  private db: Database.Database;

  /** `:memory:` gives a throwaway store */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new BetterSqlite3(dbPath);
    applySchema(this.db);
  }

  upsert(movie: MergedMovie): void {
    this.db.prepare<[number, string | null, number | null, string]>(`
      INSERT INTO movies (source_id, imdb_id, tmdb_id, document)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(source_id) DO UPDATE SET
        imdb_id    = excluded.imdb_id,
        tmdb_id    = excluded.tmdb_id,
        document   = excluded.document,
        updated_at = datetime('now')
    `).run(movie.sourceId, movie.imdbId ?? null, movie.tmdbId ?? null, JSON.stringify(movie));
  }

  get(sourceId: number): MergedMovie | undefined {
    const row = this.db.prepare<[number], MovieRow>('SELECT * FROM movies WHERE source_id = ?').get(sourceId);
    return row ? parseMergedMovie(JSON.parse(row.document)) : undefined;
  }

  /** Movies with an IMDb id, oldest update first */
  listResolved(): MergedMovie[] {
    return this.db
      .prepare<[], MovieRow>('SELECT * FROM movies WHERE imdb_id IS NOT NULL ORDER BY updated_at ASC, source_id ASC')
      .all()
      .map(row => parseMergedMovie(JSON.parse(row.document)));
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM movies').get();
    return row?.n ?? 0;
  }

  /** Returns false when the movie is not stored */
  updateImdbRating(sourceId: number, rating: number | undefined, ratingCount: number | undefined): boolean {
    return this.db.transaction(() => {
      const movie = this.get(sourceId);
      if (!movie) return false;
      this.upsert({ ...movie, imdbRating: rating, imdbRatingCount: ratingCount });
      return true;
    })();
  }

  close(): void {
    this.db.close();
  }
}
