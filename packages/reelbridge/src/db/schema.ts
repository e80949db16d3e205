/**
 * reelbridge SQLite schema
 * Merged movies are stored as JSON documents; the ids used for lookups are
 * mirrored into their own columns.
 */

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

export function applySchema(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL
    );

    -- One row per primary-source movie
    CREATE TABLE IF NOT EXISTS movies (
      source_id   INTEGER PRIMARY KEY,    -- primary-source numeric id
      imdb_id     TEXT,                   -- tt…, null until resolved
      tmdb_id     INTEGER,
      document    TEXT NOT NULL,          -- MergedMovie as JSON
      created_at  TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at  TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_movies_imdb_id ON movies(imdb_id);
    CREATE INDEX IF NOT EXISTS idx_movies_tmdb_id ON movies(tmdb_id);
  `);

  const row = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
  if (!row) {
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  }
}
