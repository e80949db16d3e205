/**
 * Parsers for records that arrive as JSON: seed files, supplemental dumps and
 * documents read back from the store. Unknown keys are ignored; a wrong type
 * on a known key throws RecordError naming the field.
 */

import type { CrewMember, MergedMovie, PrimaryMovie, SupplementalMovie } from './types.js';

export class RecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordError';
  }
}

type Doc = Record<string, unknown>;

function asDoc(value: unknown, what: string): Doc {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new RecordError(`${what} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function optString(doc: Doc, key: string, what: string): string | undefined {
  const v = doc[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v === 'number') return String(v);
  if (typeof v !== 'string') throw new RecordError(`${what}.${key} must be a string`);
  return v;
}

function optNumber(doc: Doc, key: string, what: string): number | undefined {
  const v = doc[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'number' || !Number.isFinite(v)) throw new RecordError(`${what}.${key} must be a number`);
  return v;
}

function reqNumber(doc: Doc, key: string, what: string): number {
  const v = optNumber(doc, key, what);
  if (v === undefined) throw new RecordError(`${what}.${key} is required`);
  return v;
}

function optBoolean(doc: Doc, key: string, what: string): boolean | undefined {
  const v = doc[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'boolean') throw new RecordError(`${what}.${key} must be true or false`);
  return v;
}

function stringList(doc: Doc, key: string, what: string): string[] {
  const v = doc[key];
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v) || !v.every((s): s is string => typeof s === 'string')) {
    throw new RecordError(`${what}.${key} must be a list of strings`);
  }
  return [...v];
}

function stringMap(doc: Doc, key: string, what: string): Record<string, string> {
  const v = doc[key];
  if (v === undefined || v === null) return {};
  const out: Record<string, string> = {};
  for (const [k, title] of Object.entries(asDoc(v, `${what}.${key}`))) {
    if (typeof title !== 'string') throw new RecordError(`${what}.${key}.${k} must be a string`);
    if (title.trim() !== '') out[k] = title;
  }
  return out;
}

function crewList(doc: Doc, key: string, what: string): CrewMember[] {
  const v = doc[key];
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v)) throw new RecordError(`${what}.${key} must be a list`);
  return v.map((item, i) => {
    const where = `${what}.${key}[${i}]`;
    const member = asDoc(item, where);
    return {
      tmdbId: reqNumber(member, 'tmdbId', where),
      name: optString(member, 'name', where) ?? '',
      role: optString(member, 'role', where) ?? '',
      photoUrl: optString(member, 'photoUrl', where),
    };
  });
}

export function parsePrimaryMovie(value: unknown): PrimaryMovie {
  const what = 'movie';
  const doc = asDoc(value, what);
  return {
    id: reqNumber(doc, 'id', what),
    title: optString(doc, 'title', what),
    originalTitle: optString(doc, 'originalTitle', what),
    year: optString(doc, 'year', what),
    directors: stringList(doc, 'directors', what),
    localizedTitles: stringMap(doc, 'localizedTitles', what),
    origin: optString(doc, 'origin', what),
    genres: stringList(doc, 'genres', what),
    cast: stringList(doc, 'cast', what),
    duration: optString(doc, 'duration', what),
    description: optString(doc, 'description', what),
    posterUrl: optString(doc, 'posterUrl', what),
    rating: optString(doc, 'rating', what),
    imdbId: optString(doc, 'imdbId', what),
    imdbRating: optNumber(doc, 'imdbRating', what),
    imdbRatingCount: optNumber(doc, 'imdbRatingCount', what),
  };
}

export function parseSupplementalMovie(value: unknown): SupplementalMovie {
  const what = 'supplemental';
  const doc = asDoc(value, what);
  return {
    id: reqNumber(doc, 'id', what),
    title: optString(doc, 'title', what),
    originalTitle: optString(doc, 'originalTitle', what),
    overview: optString(doc, 'overview', what),
    releaseDate: optString(doc, 'releaseDate', what),
    posterPath: optString(doc, 'posterPath', what),
    backdropPath: optString(doc, 'backdropPath', what),
    voteAverage: optNumber(doc, 'voteAverage', what),
    voteCount: optNumber(doc, 'voteCount', what),
    popularity: optNumber(doc, 'popularity', what),
    originalLanguage: optString(doc, 'originalLanguage', what),
    adult: optBoolean(doc, 'adult', what),
    homepage: optString(doc, 'homepage', what),
    trailerUrl: optString(doc, 'trailerUrl', what),
    credits: crewList(doc, 'credits', what),
  };
}

export function parseMergedMovie(value: unknown): MergedMovie {
  const what = 'document';
  const doc = asDoc(value, what);
  return {
    sourceId: reqNumber(doc, 'sourceId', what),
    tmdbId: optNumber(doc, 'tmdbId', what),
    tmdbTitle: optString(doc, 'tmdbTitle', what),
    imdbId: optString(doc, 'imdbId', what),
    title: optString(doc, 'title', what),
    originalTitle: optString(doc, 'originalTitle', what),
    year: optString(doc, 'year', what),
    duration: optString(doc, 'duration', what),
    rating: optString(doc, 'rating', what),
    imdbRating: optNumber(doc, 'imdbRating', what),
    imdbRatingCount: optNumber(doc, 'imdbRatingCount', what),
    descriptionPrimary: optString(doc, 'descriptionPrimary', what),
    descriptionSecondary: optString(doc, 'descriptionSecondary', what),
    origin: optString(doc, 'origin', what),
    originCountryCodes: stringList(doc, 'originCountryCodes', what),
    genres: stringList(doc, 'genres', what),
    directors: stringList(doc, 'directors', what),
    cast: stringList(doc, 'cast', what),
    localizedTitles: stringMap(doc, 'localizedTitles', what),
    posterUrl: optString(doc, 'posterUrl', what),
    primaryPosterUrl: optString(doc, 'primaryPosterUrl', what),
    backdropUrl: optString(doc, 'backdropUrl', what),
    voteAverage: optNumber(doc, 'voteAverage', what),
    voteCount: optNumber(doc, 'voteCount', what),
    popularity: optNumber(doc, 'popularity', what),
    originalLanguage: optString(doc, 'originalLanguage', what),
    adult: optBoolean(doc, 'adult', what),
    homepage: optString(doc, 'homepage', what),
    trailerUrl: optString(doc, 'trailerUrl', what),
    credits: crewList(doc, 'credits', what),
    releaseDate: optString(doc, 'releaseDate', what),
    imdbUrl: optString(doc, 'imdbUrl', what),
    tmdbUrl: optString(doc, 'tmdbUrl', what),
  };
}
