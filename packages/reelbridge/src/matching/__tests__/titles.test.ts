import { describe, expect, it } from 'vitest';

import type { SeedRecord } from '../../shared/types.js';
import {
  buildNormalizedTitleSet,
  getLocalizedTitle,
  getSearchTitles,
  parseOriginCountries,
  stripYearTokens,
  titlesShareYear,
} from '../titles.js';

const krysar: SeedRecord = {
  id: 8653,
  title: 'Krysař',
  year: '1986',
  directors: ['Jiří Barta'],
  localizedTitles: { 'angličtina': 'The Pied Piper' },
  origin: 'Československo / Západní Německo',
};

describe('getSearchTitles', () => {
  it('puts the English title first', () => {
    expect(getSearchTitles(krysar)).toEqual(['The Pied Piper', 'Krysař']);
  });

  it('orders origin titles, USA, UK, primary, then the rest', () => {
    const seed: SeedRecord = {
      id: 1,
      title: 'Pelíšky',
      directors: [],
      localizedTitles: {
        'Francie': 'Les Cosy',
        'Slovensko': 'Pelíšky SK',
        'Česko': 'Pelíšky CZ',
        'USA': 'Cosy Dens',
        'Velká Británie': 'Cosy Dens UK',
      },
      origin: 'Česko / Slovensko',
    };
    expect(getSearchTitles(seed)).toEqual([
      'Cosy Dens',
      'Pelíšky SK',
      'Pelíšky CZ',
      'Cosy Dens UK',
      'Pelíšky',
      'Les Cosy',
    ]);
  });

  it('dedupes case-insensitively and skips blanks', () => {
    const seed: SeedRecord = {
      id: 2,
      title: '  ',
      directors: [],
      localizedTitles: { 'USA': 'Alien', 'Kanada': 'ALIEN' },
    };
    expect(getSearchTitles(seed)).toEqual(['Alien']);
  });
});

describe('getLocalizedTitle', () => {
  it('matches keys case-insensitively', () => {
    expect(getLocalizedTitle(krysar, 'ANGLIČTINA')).toBe('The Pied Piper');
    expect(getLocalizedTitle(krysar, 'USA')).toBeUndefined();
  });
});

describe('parseOriginCountries', () => {
  it('splits on slash and comma', () => {
    expect(parseOriginCountries('Česko / Slovensko, Polsko')).toEqual(['Česko', 'Slovensko', 'Polsko']);
    expect(parseOriginCountries(undefined)).toEqual([]);
  });
});

describe('buildNormalizedTitleSet', () => {
  it('holds normalised primary, query and localized titles', () => {
    expect([...buildNormalizedTitleSet(krysar, 'Pied Piper')]).toEqual(['krysar', 'piedpiper', 'thepiedpiper']);
  });
});

describe('stripYearTokens', () => {
  it('removes standalone years only', () => {
    expect(stripYearTokens('Krysař 1986')).toBe('Krysař');
    expect(stripYearTokens('Blade Runner 2049')).toBe('Blade Runner');
    expect(stripYearTokens('Apollo 13')).toBe('Apollo 13');
  });
});

describe('titlesShareYear', () => {
  it('is true without a seed year', () => {
    expect(titlesShareYear(undefined, { id: 'tt1', title: 'X', year: '1950' }, 2)).toBe(true);
  });

  it('checks the hit year within tolerance', () => {
    expect(titlesShareYear('1986', { id: 'tt1', title: 'X', year: '1988' }, 2)).toBe(true);
    expect(titlesShareYear('1986', { id: 'tt1', title: 'X', year: '1989' }, 2)).toBe(false);
  });

  it('falls back to years in the raw text', () => {
    const hit = { id: 'tt1', title: 'X', year: '2010', rawText: ' 2010 TV Series 1986' };
    expect(titlesShareYear('1986', hit, 0)).toBe(true);
  });

  it('reduces a noisy seed year', () => {
    expect(titlesShareYear('1986 (festival)', { id: 'tt1', title: 'X', year: '1986' }, 0)).toBe(true);
  });
});
