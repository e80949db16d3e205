import { describe, expect, it } from 'vitest';

import type { SeedRecord, TitleMetadata } from '../../shared/types.js';
import { silentLogger } from '../../shared/logger.js';
import {
  areDirectorsValid,
  ImdbValidator,
  isRejectedTypeHint,
  isTitleTypeAcceptable,
  isYearValid,
  judge,
  toYearInfo,
} from '../validator.js';
import { FakeTransport, ldJsonPage, titleUrl } from './fakeTransport.js';

const seed = (over: Partial<SeedRecord> = {}): SeedRecord => ({
  id: 8653,
  title: 'Krysař',
  year: '1986',
  directors: ['Jiří Barta'],
  localizedTitles: {},
  ...over,
});

const meta = (over: Partial<TitleMetadata> = {}): TitleMetadata => ({
  year: '1986',
  directors: ['Jiri Barta'],
  titleType: 'Movie',
  ...over,
});

const opts = { yearTolerance: 1, acceptWhenMetadataMissing: true };

describe('title type gate', () => {
  it('rejects series, episodes, podcasts, games and music videos', () => {
    for (const t of ['PodcastSeries', 'PodcastEpisode', 'TVSeries', 'tvepisode', 'VideoGame', 'MusicVideoObject']) {
      expect(isTitleTypeAcceptable(t)).toBe(false);
    }
  });

  it('lets movies and unknown types through', () => {
    expect(isTitleTypeAcceptable('Movie')).toBe(true);
    expect(isTitleTypeAcceptable('TVMiniSeries')).toBe(true);
    expect(isTitleTypeAcceptable('Documentary')).toBe(true);
    expect(isTitleTypeAcceptable(undefined)).toBe(true);
  });

  it('reads search-result labels', () => {
    expect(isRejectedTypeHint('TV Series')).toBe(true);
    expect(isRejectedTypeHint('Podcast Episode')).toBe(true);
    expect(isRejectedTypeHint('Music Video')).toBe(true);
    expect(isRejectedTypeHint('TV Mini Series')).toBe(false);
    expect(isRejectedTypeHint('Video')).toBe(false);
    expect(isRejectedTypeHint(undefined)).toBe(false);
  });
});

describe('isYearValid', () => {
  it('accepts years within tolerance', () => {
    expect(isYearValid('1986', '1987', 1)).toBe(true);
    expect(isYearValid('1986', '1988', 1)).toBe(false);
  });

  it('treats a seed without a year as valid and a candidate without one as invalid', () => {
    expect(isYearValid('neznámý', undefined, 1)).toBe(true);
    expect(isYearValid('1986', undefined, 1)).toBe(false);
  });

  it('falls back to the search-result year', () => {
    expect(isYearValid('1986', '1990', 1, '1986')).toBe(true);
    expect(isYearValid('1986', '1990', 1, '1984')).toBe(false);
  });

  it('reduces noisy years to four digits', () => {
    expect(toYearInfo('(1986)')).toEqual({ kind: 'year', value: 1986 });
    expect(toYearInfo('')).toEqual({ kind: 'unknown' });
  });
});

describe('areDirectorsValid', () => {
  it('ignores diacritics and case', () => {
    expect(areDirectorsValid(['Jiří Barta'], ['JIRI BARTA'])).toBe(true);
  });

  it('ignores word order', () => {
    expect(areDirectorsValid(['Wong Kar-wai'], ['Kar-wai Wong'])).toBe(true);
  });

  it('matches Czech transcriptions of Japanese names', () => {
    expect(areDirectorsValid(['Tacuja Jošihara'], ['Tatsuya Yoshihara'])).toBe(true);
  });

  it('requires every seed director', () => {
    expect(areDirectorsValid(['Jiří Barta', 'Jan Švankmajer'], ['Jiří Barta'])).toBe(false);
    expect(areDirectorsValid(['Jiří Barta'], ['Jiří Barta', 'Jan Švankmajer'])).toBe(true);
  });

  it('handles empty lists', () => {
    expect(areDirectorsValid([], [])).toBe(true);
    expect(areDirectorsValid(['Jiří Barta'], [])).toBe(false);
  });
});

describe('judge', () => {
  it('accepts a matching year and director with metadata', () => {
    const m = meta();
    expect(judge(seed(), { kind: 'present', metadata: m }, opts)).toEqual({ accepted: true, metadata: m });
  });

  it('rejects a disallowed type before anything else', () => {
    const m = meta({ titleType: 'TVSeries' });
    expect(judge(seed({ year: undefined, directors: [] }), { kind: 'present', metadata: m }, opts))
      .toEqual({ accepted: false });
  });

  it('accepts anything of an allowed type for a seed with nothing to check', () => {
    const m = meta({ year: '1950' });
    expect(judge(seed({ year: undefined, directors: [] }), { kind: 'present', metadata: m }, opts))
      .toEqual({ accepted: true, metadata: m });
  });

  it('follows the missing-metadata policy', () => {
    expect(judge(seed(), { kind: 'absent' }, opts)).toEqual({ accepted: true });
    expect(judge(seed(), { kind: 'absent' }, { ...opts, acceptWhenMetadataMissing: false }))
      .toEqual({ accepted: false });
  });

  it('accepts on year alone when the candidate lists no directors', () => {
    const m = meta({ directors: [] });
    expect(judge(seed(), { kind: 'present', metadata: m }, opts)).toEqual({ accepted: true, metadata: m });
  });

  it('rejects when the listed directors differ', () => {
    const m = meta({ directors: ['Someone Else'] });
    expect(judge(seed(), { kind: 'present', metadata: m }, opts)).toEqual({ accepted: false });
  });

  it('rejects a year mismatch unless the search year rescues it', () => {
    const m = meta({ year: '1990' });
    const yearOnly = seed({ directors: [] });
    expect(judge(yearOnly, { kind: 'present', metadata: m }, opts)).toEqual({ accepted: false });
    expect(judge(yearOnly, { kind: 'present', metadata: m }, { ...opts, searchResultYear: '1986' }))
      .toEqual({ accepted: true, metadata: m });
  });

  it('rejects a year mismatch even when the directors match', () => {
    const m = meta({ year: '2005', directors: ['Jan Sverak'] });
    const both = seed({ year: '1999', directors: ['Jan Svěrák'] });
    expect(areDirectorsValid(both.directors, m.directors)).toBe(true);
    expect(judge(both, { kind: 'present', metadata: m }, opts)).toEqual({ accepted: false });
  });

  it('accepts a matching year when the seed lists no directors', () => {
    const m = meta({ year: '2000' });
    expect(judge(seed({ year: '2000', directors: [] }), { kind: 'present', metadata: m }, opts))
      .toEqual({ accepted: true, metadata: m });
  });

  it('decides on directors alone when the seed has no year', () => {
    const m = meta({ year: '2020' });
    expect(judge(seed({ year: undefined }), { kind: 'present', metadata: m }, opts))
      .toEqual({ accepted: true, metadata: m });
  });
});

describe('ImdbValidator', () => {
  it('fetches the title page and validates it', async () => {
    const transport = new FakeTransport().on(titleUrl('tt0091849'), {
      status: 200,
      body: ldJsonPage({ '@type': 'Movie', datePublished: '1986-04-01', director: { name: 'Jiří Barta' } }),
    });
    const validator = new ImdbValidator(transport, { softBlockRetryDelayMs: 0, logger: silentLogger });

    const outcome = await validator.validateAndGetMetadata('tt0091849', seed());
    expect(outcome).toEqual({
      accepted: true,
      metadata: { year: '1986', directors: ['Jiří Barta'], titleType: 'Movie' },
    });
    expect(transport.requests).toEqual([titleUrl('tt0091849')]);
  });

  it('treats a failed fetch as missing metadata', async () => {
    const transport = new FakeTransport().on(titleUrl('tt0000001'), { status: 503 });
    const strict = new ImdbValidator(transport, {
      softBlockRetryDelayMs: 0,
      acceptWhenMetadataMissing: false,
      logger: silentLogger,
    });

    expect(await strict.fetchMetadata('tt0000001')).toEqual({ kind: 'absent' });
    expect(await strict.validateAndGetMetadata('tt0000001', seed())).toEqual({ accepted: false });
  });
});
