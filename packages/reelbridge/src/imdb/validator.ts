/**
 * Candidate validation against a seed record.
 *
 * The title-type gate runs first and is absolute; year and director checks
 * follow. Everything except the page fetch is pure and exported for tests.
 */

import type {
  MetadataState,
  SeedRecord,
  TitleMetadata,
  ValidationOutcome,
  YearInfo,
} from '../shared/types.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { extractYear, normalizePersonName, sortNameWords, yearsMatch } from '../matching/normalize.js';
import { transliterateToEnglish } from '../matching/romanization.js';
import { fetchPage, ImdbHttpError, type HttpTransport } from './transport.js';
import { parseTitlePage } from './titlePage.js';

// JSON-LD @type values that are never a cinema release
const REJECTED_TITLE_TYPES = new Set(
  ['PodcastSeries', 'PodcastEpisode', 'TVSeries', 'TVEpisode', 'VideoGame', 'MusicVideoObject'].map(t =>
    t.toLowerCase()
  )
);

/** Unknown and missing types pass */
export function isTitleTypeAcceptable(titleType: string | undefined): boolean {
  if (!titleType || titleType.trim() === '') return true;
  return !REJECTED_TITLE_TYPES.has(titleType.trim().toLowerCase());
}

/** Search-result labels ("TV Series", "Music Video") checked against the same gate */
export function isRejectedTypeHint(label: string | undefined): boolean {
  if (!label) return false;
  const compact = label.replace(/\s+/g, '');
  return !isTitleTypeAcceptable(/^musicvideo$/i.test(compact) ? 'MusicVideoObject' : compact);
}

export function toYearInfo(value: string | undefined): YearInfo {
  const year = extractYear(value);
  return year ? { kind: 'year', value: Number.parseInt(year, 10) } : { kind: 'unknown' };
}

/**
 * Seed year vs title-page year. A seed without a usable year is valid; a
 * candidate without one is not, unless the search-result year hint matches.
 */
export function isYearValid(
  seedYear: string | undefined,
  imdbYear: string | undefined,
  tolerance: number,
  searchResultYear?: string
): boolean {
  const seed = toYearInfo(seedYear);
  if (seed.kind === 'unknown') return true;

  const matches = (other: string | undefined) => {
    const info = toYearInfo(other);
    return info.kind === 'year' && yearsMatch(String(seed.value), String(info.value), tolerance);
  };

  return matches(imdbYear) || matches(searchResultYear);
}

function directorForms(name: string): string[] {
  const normalized = normalizePersonName(name);
  if (!normalized) return [];
  const romanized = normalizePersonName(transliterateToEnglish(name.toLowerCase()));
  return [...new Set([normalized, sortNameWords(normalized), sortNameWords(romanized)])].filter(f => f !== '');
}

/** Every seed director must appear among the candidate's directors */
export function areDirectorsValid(seedDirectors: readonly string[], imdbDirectors: readonly string[]): boolean {
  if (seedDirectors.length === 0) return true;
  if (imdbDirectors.length === 0) return false;

  const known = new Set<string>();
  for (const name of imdbDirectors) {
    const normalized = normalizePersonName(name);
    if (!normalized) continue;
    known.add(normalized);
    known.add(sortNameWords(normalized));
  }
  if (known.size === 0) return false;

  return seedDirectors.every(name => {
    const forms = directorForms(name);
    return forms.length === 0 || forms.some(f => known.has(f));
  });
}

export interface JudgeOptions {
  yearTolerance: number;
  acceptWhenMetadataMissing: boolean;
  searchResultYear?: string;
}

/** Acceptance decision over already fetched metadata */
export function judge(seed: SeedRecord, state: MetadataState, opts: JudgeOptions): ValidationOutcome {
  const metadata: TitleMetadata | undefined = state.kind === 'present' ? state.metadata : undefined;

  if (metadata && !isTitleTypeAcceptable(metadata.titleType)) {
    return { accepted: false };
  }

  const hasYear = seed.year !== undefined && seed.year.trim() !== '';
  const hasDirectors = seed.directors.length > 0;

  if (!hasYear && !hasDirectors) return { accepted: true, metadata };
  if (!metadata) return { accepted: opts.acceptWhenMetadataMissing };

  const yearValid = isYearValid(seed.year, metadata.year, opts.yearTolerance, opts.searchResultYear);
  const directorsValid = areDirectorsValid(seed.directors, metadata.directors);

  let accepted: boolean;
  if (hasYear && hasDirectors) {
    // title-tag fallback yields no directors; the year alone decides then
    accepted = yearValid && (directorsValid || metadata.directors.length === 0);
  } else if (hasYear) {
    accepted = yearValid;
  } else {
    accepted = directorsValid;
  }

  return accepted ? { accepted, metadata } : { accepted };
}

export interface ImdbValidatorOptions {
  baseUrl?: string;
  softBlockRetryDelayMs?: number;
  yearTolerance?: number;
  acceptWhenMetadataMissing?: boolean;
  logger?: Logger;
}

export class ImdbValidator {
  private readonly baseUrl: string;
  private readonly softBlockRetryDelayMs: number | undefined;
  private readonly yearTolerance: number;
  private readonly acceptWhenMetadataMissing: boolean;
  private readonly log: Logger;

  constructor(
    private readonly transport: HttpTransport,
    opts: ImdbValidatorOptions = {}
  ) {
    this.baseUrl = opts.baseUrl ?? 'https://www.imdb.com';
    this.softBlockRetryDelayMs = opts.softBlockRetryDelayMs;
    this.yearTolerance = opts.yearTolerance ?? 1;
    this.acceptWhenMetadataMissing = opts.acceptWhenMetadataMissing ?? true;
    this.log = opts.logger ?? createLogger('imdb:validate');
  }

  titleUrl(imdbId: string): string {
    return `${this.baseUrl}/title/${imdbId}/`;
  }

  /** Title page metadata; transport failures count as absent */
  async fetchMetadata(imdbId: string, signal?: AbortSignal): Promise<MetadataState> {
    signal?.throwIfAborted();
    try {
      const html = await fetchPage(this.transport, this.titleUrl(imdbId), {
        referer: `${this.baseUrl}/`,
        signal,
        softBlockRetryDelayMs: this.softBlockRetryDelayMs,
      });
      return parseTitlePage(html);
    } catch (err) {
      if (err instanceof ImdbHttpError) {
        this.log.warn(`Title page ${imdbId} unavailable: ${err.message}`);
        return { kind: 'absent' };
      }
      throw err;
    }
  }

  async validateAndGetMetadata(
    imdbId: string,
    seed: SeedRecord,
    searchResultYear?: string,
    signal?: AbortSignal
  ): Promise<ValidationOutcome> {
    const state = await this.fetchMetadata(imdbId, signal);
    const outcome = judge(seed, state, {
      yearTolerance: this.yearTolerance,
      acceptWhenMetadataMissing: this.acceptWhenMetadataMissing,
      searchResultYear,
    });

    if (state.kind === 'absent') {
      this.log.debug(`${imdbId}: no metadata, ${outcome.accepted ? 'accepted' : 'rejected'}`);
    } else {
      const m = state.metadata;
      this.log.debug(
        `${imdbId}: type=${m.titleType ?? '?'} year=${m.year ?? '?'} (seed ${seed.year ?? '-'}, hint ${searchResultYear ?? '-'}) ` +
          `directors=[${m.directors.join(', ')}] → ${outcome.accepted ? 'accepted' : 'rejected'}`
      );
    }
    return outcome;
  }
}
