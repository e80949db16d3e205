/**
 * IMDb identity resolution for a primary-source movie.
 *
 * Order of attempts:
 *   1. a direct IMDb link on the source page
 *   2. each search title in turn: title-matched hits, then same-year hits
 * The first validated candidate wins. Running out of candidates yields `{}`.
 */

import type { ReelbridgeConfig, ResolutionResult, SearchCandidate, SeedRecord } from '../shared/types.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { normalizeTitle } from '../matching/normalize.js';
import { buildNormalizedTitleSet, getSearchTitles, stripYearTokens, titlesShareYear } from '../matching/titles.js';
import { BrowserTransport, type HttpTransport } from './transport.js';
import { ImdbSearchClient } from './search.js';
import { findDirectImdbLink } from './searchParser.js';
import { ImdbValidator, isRejectedTypeHint } from './validator.js';

export interface ImdbResolverOptions {
  baseUrl?: string;
  softBlockRetryDelayMs?: number;
  yearTolerance?: number;
  candidateYearTolerance?: number;
  acceptWhenMetadataMissing?: boolean;
  logger?: Logger;
}

const IMDB_ID_RE = /^tt\d+$/;

export class ImdbResolver {
  private readonly search: ImdbSearchClient;
  private readonly validator: ImdbValidator;
  private readonly candidateYearTolerance: number;
  private readonly log: Logger;

  constructor(transport: HttpTransport, opts: ImdbResolverOptions = {}) {
    this.log = opts.logger ?? createLogger('imdb');
    this.candidateYearTolerance = opts.candidateYearTolerance ?? 2;
    this.search = new ImdbSearchClient(transport, {
      baseUrl: opts.baseUrl,
      softBlockRetryDelayMs: opts.softBlockRetryDelayMs,
      logger: this.log.child('search'),
    });
    this.validator = new ImdbValidator(transport, {
      baseUrl: opts.baseUrl,
      softBlockRetryDelayMs: opts.softBlockRetryDelayMs,
      yearTolerance: opts.yearTolerance,
      acceptWhenMetadataMissing: opts.acceptWhenMetadataMissing,
      logger: this.log.child('validate'),
    });
  }

  async resolveExternalId(sourceHtml: string, seed: SeedRecord, signal?: AbortSignal): Promise<ResolutionResult> {
    const directId = findDirectImdbLink(sourceHtml);
    if (directId) {
      this.log.debug(`Direct IMDb link on source page: ${directId}`);
      const outcome = await this.validator.validateAndGetMetadata(directId, seed, undefined, signal);
      if (outcome.accepted) {
        return { imdbId: directId, rating: outcome.metadata?.rating, ratingCount: outcome.metadata?.ratingCount };
      }
    }

    for (const title of getSearchTitles(seed)) {
      const result = await this.tryTitle(title, seed, signal);
      if (result) return result;
    }

    this.log.info(`No IMDb match for #${seed.id} "${seed.title ?? ''}"`);
    return {};
  }

  private async tryTitle(query: string, seed: SeedRecord, signal?: AbortSignal): Promise<ResolutionResult | undefined> {
    this.log.debug(`Searching IMDb for "${query}"`);
    const hits = await this.search.search(query, undefined, signal);
    this.log.debug(`  ${hits.length} results`);
    for (const hit of hits.slice(0, 3)) {
      this.log.debug(`    ${hit.id}: "${hit.title}" (${hit.year ?? '?'}) ${hit.titleType ?? ''}`.trimEnd());
    }

    const { prioritized, secondary } = this.partition(hits, query, seed);

    for (const candidate of [...prioritized, ...secondary]) {
      const outcome = await this.validator.validateAndGetMetadata(candidate.id, seed, candidate.year, signal);
      if (outcome.accepted) {
        this.log.info(`Resolved #${seed.id} → ${candidate.id} via "${query}"`);
        return { imdbId: candidate.id, rating: outcome.metadata?.rating, ratingCount: outcome.metadata?.ratingCount };
      }
    }
    return undefined;
  }

  /** Title matches first, then hits that merely share the seed's year; the rest are dropped */
  partition(
    hits: readonly SearchCandidate[],
    query: string,
    seed: SeedRecord
  ): { prioritized: SearchCandidate[]; secondary: SearchCandidate[] } {
    const targets = buildNormalizedTitleSet(seed, stripYearTokens(query));
    const prioritized: SearchCandidate[] = [];
    const secondary: SearchCandidate[] = [];

    for (const hit of hits) {
      if (isRejectedTypeHint(hit.titleType)) {
        this.log.debug(`  skipping ${hit.id}: ${hit.titleType ?? ''}`);
        continue;
      }
      if (targets.has(normalizeTitle(hit.title))) {
        prioritized.push(hit);
      } else if (titlesShareYear(seed.year, hit, this.candidateYearTolerance)) {
        secondary.push(hit);
      }
    }
    return { prioritized, secondary };
  }

  /** Rating for an id already known; only the title-type gate applies */
  async fetchRating(imdbId: string, signal?: AbortSignal): Promise<ResolutionResult> {
    if (!IMDB_ID_RE.test(imdbId)) {
      throw new Error(`Invalid IMDb id "${imdbId}" (expected tt followed by digits)`);
    }

    const emptySeed: SeedRecord = { id: 0, directors: [], localizedTitles: {} };
    const outcome = await this.validator.validateAndGetMetadata(imdbId, emptySeed, undefined, signal);
    if (!outcome.accepted) return {};
    return { imdbId, rating: outcome.metadata?.rating, ratingCount: outcome.metadata?.ratingCount };
  }
}

/** Resolver over a fresh browser-like transport (own cookies) configured from config */
export function createImdbResolver(config: ReelbridgeConfig, logger?: Logger): ImdbResolver {
  const transport = new BrowserTransport({
    userAgents: config.imdb.userAgents,
    minDelayMs: config.imdb.minDelayMs,
    maxDelayMs: config.imdb.maxDelayMs,
    timeoutMs: config.imdb.timeoutMs,
  });
  return new ImdbResolver(transport, {
    baseUrl: config.imdb.baseUrl,
    softBlockRetryDelayMs: config.imdb.softBlockRetryDelayMs,
    yearTolerance: config.matching.yearTolerance,
    candidateYearTolerance: config.matching.candidateYearTolerance,
    acceptWhenMetadataMissing: config.matching.acceptWhenMetadataMissing,
    logger,
  });
}
