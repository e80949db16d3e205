import { describe, expect, it } from 'vitest';

import type { PrimaryMovie, SupplementalMovie } from '../../shared/types.js';
import { mergeMovie, toReleaseDate } from '../merge.js';

const primary: PrimaryMovie = {
  id: 8653,
  title: 'Krysař',
  originalTitle: 'Krysař',
  year: '1986',
  directors: ['Jiří Barta'],
  localizedTitles: { 'angličtina': 'The Pied Piper' },
  origin: 'Československo / Západní Německo',
  genres: ['Animovaný', 'Fantasy'],
  cast: ['Oldřich Kaiser'],
  duration: '53 min',
  description: 'Loutkový film podle pověsti.',
  posterUrl: 'https://img.example.test/krysar.jpg',
  rating: '84%',
  imdbId: 'tt0091849',
  imdbRating: 7.6,
  imdbRatingCount: 2786,
};

const supplemental: SupplementalMovie = {
  id: 41000,
  title: 'The Pied Piper',
  originalTitle: 'Krysař',
  overview: 'A puppet film after the legend.',
  releaseDate: '1986-04-01T00:00:00Z',
  posterPath: '/poster.jpg',
  backdropPath: '/backdrop.jpg',
  voteAverage: 7.4,
  voteCount: 120,
  popularity: 3.2,
  originalLanguage: 'cs',
  adult: false,
  trailerUrl: 'https://video.example.test/trailer',
  credits: [{ tmdbId: 7, name: 'Jiří Barta', role: 'Director' }],
};

describe('mergeMovie', () => {
  it('takes text from the primary record and media from the supplemental one', () => {
    const merged = mergeMovie(primary, supplemental);

    expect(merged).toMatchObject({
      sourceId: 8653,
      tmdbId: 41000,
      tmdbTitle: 'The Pied Piper',
      imdbId: 'tt0091849',
      title: 'Krysař',
      year: '1986',
      descriptionPrimary: 'Loutkový film podle pověsti.',
      descriptionSecondary: 'A puppet film after the legend.',
      originCountryCodes: ['CS', 'DE'],
      posterUrl: 'https://image.tmdb.org/t/p/original/poster.jpg',
      primaryPosterUrl: 'https://img.example.test/krysar.jpg',
      backdropUrl: 'https://image.tmdb.org/t/p/original/backdrop.jpg',
      voteAverage: 7.4,
      releaseDate: '1986-04-01',
      imdbUrl: 'https://www.imdb.com/title/tt0091849/',
      tmdbUrl: 'https://www.themoviedb.org/movie/41000',
    });
    expect(merged.credits).toEqual(supplemental.credits);
  });

  it('falls back to supplemental titles and the primary poster', () => {
    const merged = mergeMovie({ ...primary, title: ' ', posterUrl: undefined }, { ...supplemental, posterPath: '' });
    expect(merged.title).toBe('The Pied Piper');
    expect(merged.posterUrl).toBeUndefined();

    const withPrimaryPoster = mergeMovie(primary, { ...supplemental, posterPath: undefined });
    expect(withPrimaryPoster.posterUrl).toBe('https://img.example.test/krysar.jpg');
  });

  it('works without supplemental data', () => {
    const merged = mergeMovie(primary);
    expect(merged.tmdbId).toBeUndefined();
    expect(merged.credits).toEqual([]);
    expect(merged.tmdbUrl).toBeUndefined();
    expect(merged.posterUrl).toBe('https://img.example.test/krysar.jpg');
  });

  it('uses an injected country mapper', () => {
    const merged = mergeMovie(primary, undefined, names => names.map(n => n.slice(0, 2).toUpperCase()));
    expect(merged.originCountryCodes).toEqual(['ČE', 'ZÁ']);
  });

  it('is deterministic and does not share arrays with its input', () => {
    const a = mergeMovie(primary, supplemental);
    const b = mergeMovie(primary, supplemental);
    expect(a).toEqual(b);
    a.genres.push('Drama');
    expect(primary.genres).toEqual(['Animovaný', 'Fantasy']);
  });
});

describe('toReleaseDate', () => {
  it('keeps the date part', () => {
    expect(toReleaseDate('2024-03-15')).toBe('2024-03-15');
    expect(toReleaseDate('2024-03-15T23:30:00+02:00')).toBe('2024-03-15');
  });

  it('drops blank and invalid dates', () => {
    expect(toReleaseDate('')).toBeUndefined();
    expect(toReleaseDate('not a date')).toBeUndefined();
    expect(toReleaseDate('2024-02-30')).toBeUndefined();
  });
});
