import { describe, expect, it } from 'vitest';

import { mapCountriesToIso, mapCountryToIso } from '../countryCodes.js';

describe('mapCountriesToIso', () => {
  it('maps Czech names including historical states', () => {
    expect(mapCountriesToIso(['Česko', 'Československo', 'Rakousko-Uhersko', 'SSSR'])).toEqual(['CZ', 'CS', 'AH', 'SU']);
  });

  it('maps English historical aliases', () => {
    expect(mapCountriesToIso(['Soviet Union', 'Austria Hungary', 'German Empire', 'Yugoslavia', 'East Germany']))
      .toEqual(['SU', 'AH', 'DE', 'YU', 'DD']);
  });

  it('keeps existing codes and removes duplicates', () => {
    expect(mapCountriesToIso(['US', 'usa', 'Spojené státy', 'US'])).toEqual(['US']);
  });

  it('separates the protectorate and the Reich from their successors', () => {
    expect(mapCountriesToIso(['Česko', 'Protektorát Čechy a Morava'])).toEqual(['CZ', 'XM']);
    expect(mapCountriesToIso(['Germany', 'Německá říše', 'Third Reich'])).toEqual(['DE', 'XR']);
  });

  it('drops names it does not know', () => {
    expect(mapCountriesToIso(['Atlantida', 'Nepál', ''])).toEqual(['NP']);
  });
});

describe('mapCountryToIso', () => {
  it('ignores case and surrounding space', () => {
    expect(mapCountryToIso('  velká británie ')).toBe('GB');
    expect(mapCountryToIso('fr')).toBe('FR');
  });
});
