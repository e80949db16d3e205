import { describe, expect, it, vi } from 'vitest';

import type { PrimaryMovie, SupplementalMovie } from '../../shared/types.js';
import type { Logger } from '../../shared/logger.js';
import { StaticPrimarySource, StaticSupplementalSource } from '../staticSources.js';

const movie: PrimaryMovie = {
  id: 8653,
  title: 'Krysař',
  directors: [],
  localizedTitles: { 'angličtina': 'The Pied Piper' },
  genres: [],
  cast: [],
};

const piper: SupplementalMovie = { id: 41000, title: 'The Pied Piper', credits: [] };
const other: SupplementalMovie = { id: 500, title: 'Something Else', credits: [] };

function spyLogger() {
  const warn = vi.fn<(message: string) => void>();
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn,
    error: () => {},
    child: () => logger,
  };
  return { logger, warn };
}

describe('StaticSupplementalSource', () => {
  it('matches on a localized title', async () => {
    const { logger, warn } = spyLogger();
    expect(await new StaticSupplementalSource([other, piper], logger).resolve(movie)).toBe(piper);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns when falling back to a single unrelated record', async () => {
    const { logger, warn } = spyLogger();
    expect(await new StaticSupplementalSource([other], logger).resolve(movie)).toBe(other);
    expect(warn).toHaveBeenCalledWith(
      'Supplemental #500 "Something Else" does not match #8653 "Krysař"; using it anyway'
    );
  });

  it('finds nothing among several unrelated records', async () => {
    const { logger } = spyLogger();
    expect(await new StaticSupplementalSource([other, { ...other, id: 501 }], logger).resolve(movie)).toBeUndefined();
    expect(await new StaticSupplementalSource([other], logger).findById(41000)).toBeUndefined();
  });
});

describe('StaticPrimarySource', () => {
  it('rejects unknown ids', async () => {
    const source = new StaticPrimarySource([{ movie, html: '' }]);
    expect((await source.scrape(8653)).movie).toBe(movie);
    await expect(source.scrape(1)).rejects.toThrow('No primary record for #1');
  });
});
