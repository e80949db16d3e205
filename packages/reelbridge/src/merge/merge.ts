/**
 * Primary + supplemental record merge.
 * Text comes from the primary source, media and audience metrics from the
 * supplemental one. Pure: the same inputs always give an equal record.
 */

import { format, isValid, parseISO } from 'date-fns';

import type { MergedMovie, PrimaryMovie, SupplementalMovie } from '../shared/types.js';
import { parseOriginCountries } from '../matching/titles.js';
import { mapCountriesToIso } from './countryCodes.js';

export const TMDB_IMAGE_BASE = 'https://image.tmdb.org/t/p/original';

export type CountryMapper = (names: readonly string[]) => string[];

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function tmdbImageUrl(path: string | undefined): string | undefined {
  const p = nonBlank(path);
  return p ? `${TMDB_IMAGE_BASE}${p}` : undefined;
}

/** "2024-03-15T00:00:00Z" → "2024-03-15"; blank or unparsable → undefined */
export function toReleaseDate(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;
  const datePart = /^\d{4}-\d{2}-\d{2}/.exec(trimmed)?.[0] ?? trimmed;
  const parsed = parseISO(datePart);
  return isValid(parsed) ? format(parsed, 'yyyy-MM-dd') : undefined;
}

export function imdbTitleUrl(imdbId: string | undefined): string | undefined {
  return imdbId ? `https://www.imdb.com/title/${imdbId}/` : undefined;
}

export function tmdbMovieUrl(tmdbId: number | undefined): string | undefined {
  return tmdbId !== undefined ? `https://www.themoviedb.org/movie/${tmdbId}` : undefined;
}

export function mergeMovie(
  primary: PrimaryMovie,
  supplemental?: SupplementalMovie,
  mapCountries: CountryMapper = mapCountriesToIso
): MergedMovie {
  const tmdbId = supplemental?.id;

  return {
    sourceId: primary.id,
    tmdbId,
    tmdbTitle: supplemental?.title,
    imdbId: primary.imdbId,

    title: nonBlank(primary.title) ?? supplemental?.title,
    originalTitle: nonBlank(primary.originalTitle) ?? supplemental?.originalTitle,
    year: primary.year,
    duration: primary.duration,
    rating: primary.rating,
    imdbRating: primary.imdbRating,
    imdbRatingCount: primary.imdbRatingCount,
    descriptionPrimary: primary.description,
    descriptionSecondary: supplemental?.overview,

    origin: primary.origin,
    originCountryCodes: mapCountries(parseOriginCountries(primary.origin)),
    genres: [...primary.genres],
    directors: [...primary.directors],
    cast: [...primary.cast],
    localizedTitles: { ...primary.localizedTitles },

    posterUrl: tmdbImageUrl(supplemental?.posterPath) ?? primary.posterUrl,
    primaryPosterUrl: primary.posterUrl,
    backdropUrl: tmdbImageUrl(supplemental?.backdropPath),

    voteAverage: supplemental?.voteAverage,
    voteCount: supplemental?.voteCount,
    popularity: supplemental?.popularity,
    originalLanguage: supplemental?.originalLanguage,
    adult: supplemental?.adult,
    homepage: supplemental?.homepage,
    trailerUrl: supplemental?.trailerUrl,
    credits: supplemental ? supplemental.credits.map(c => ({ ...c })) : [],

    releaseDate: toReleaseDate(supplemental?.releaseDate),
    imdbUrl: imdbTitleUrl(primary.imdbId),
    tmdbUrl: tmdbMovieUrl(tmdbId),
  };
}
