/**
 * Per-movie metadata pipeline:
 *   scrape → resolve (or refresh) IMDb → supplemental lookup → merge →
 *   carry over fields from the previously stored record.
 */

import type { MergedMovie, PrimaryMovie, ResolutionResult, SeedRecord, SupplementalMovie } from '../shared/types.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { imdbTitleUrl, mergeMovie, tmdbMovieUrl, type CountryMapper } from '../merge/merge.js';

export interface PrimaryPage {
  html: string;
  movie: PrimaryMovie;
}

export interface PrimarySource {
  scrape(sourceId: number, signal?: AbortSignal): Promise<PrimaryPage>;
}

export interface SupplementalSource {
  findById(tmdbId: number, signal?: AbortSignal): Promise<SupplementalMovie | undefined>;
  resolve(movie: PrimaryMovie, signal?: AbortSignal): Promise<SupplementalMovie | undefined>;
}

/** The slice of ImdbResolver the pipeline needs */
export interface ExternalIdResolver {
  resolveExternalId(sourceHtml: string, seed: SeedRecord, signal?: AbortSignal): Promise<ResolutionResult>;
  fetchRating(imdbId: string, signal?: AbortSignal): Promise<ResolutionResult>;
}

export interface OrchestratorDeps {
  primary: PrimarySource;
  resolver: ExternalIdResolver;
  supplemental?: SupplementalSource;
  mapCountries?: CountryMapper;
  logger?: Logger;
}

export class MovieMetadataOrchestrator {
  private readonly log: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.log = deps.logger ?? createLogger('metadata');
  }

  async resolveMovieMetadata(sourceId: number, existing?: MergedMovie, signal?: AbortSignal): Promise<MergedMovie> {
    signal?.throwIfAborted();
    const { html, movie: scraped } = await this.deps.primary.scrape(sourceId, signal);
    const movie: PrimaryMovie = { ...scraped };

    // 1. IMDb
    if (existing?.imdbId) {
      movie.imdbId = existing.imdbId;
      const refreshed = await this.deps.resolver.fetchRating(existing.imdbId, signal);
      movie.imdbRating = refreshed.rating;
      movie.imdbRatingCount = refreshed.ratingCount;
    } else {
      const resolved = await this.deps.resolver.resolveExternalId(html, movie, signal);
      if (resolved.imdbId) {
        movie.imdbId = resolved.imdbId;
        movie.imdbRating = resolved.rating;
        movie.imdbRatingCount = resolved.ratingCount;
      }
    }

    // 2. Supplemental
    const supplemental = await this.lookupSupplemental(movie, existing, signal);

    // 3. Merge
    const merged = mergeMovie(movie, supplemental, this.deps.mapCountries);

    // 4. Keep what an earlier run knew and this one did not find
    if (existing) preserveExisting(merged, existing);
    return merged;
  }

  private async lookupSupplemental(
    movie: PrimaryMovie,
    existing: MergedMovie | undefined,
    signal?: AbortSignal
  ): Promise<SupplementalMovie | undefined> {
    const source = this.deps.supplemental;
    if (!source) return undefined;

    try {
      return existing?.tmdbId !== undefined
        ? await source.findById(existing.tmdbId, signal)
        : await source.resolve(movie, signal);
    } catch (err) {
      signal?.throwIfAborted();
      this.log.warn(`Supplemental lookup for #${movie.id} failed: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  }
}

export function preserveExisting(merged: MergedMovie, existing: MergedMovie): void {
  if (merged.tmdbId === undefined && existing.tmdbId !== undefined) merged.tmdbId = existing.tmdbId;
  if (!merged.imdbId?.trim() && existing.imdbId?.trim()) merged.imdbId = existing.imdbId;
  if (!merged.primaryPosterUrl?.trim() && existing.primaryPosterUrl?.trim()) {
    merged.primaryPosterUrl = existing.primaryPosterUrl;
  }
  if (merged.originCountryCodes.length === 0 && existing.originCountryCodes.length > 0) {
    merged.originCountryCodes = [...existing.originCountryCodes];
  }
  if (merged.imdbRating === undefined && existing.imdbRating !== undefined) {
    merged.imdbRating = existing.imdbRating;
    merged.imdbRatingCount = existing.imdbRatingCount;
  }
  if (!merged.trailerUrl?.trim() && existing.trailerUrl?.trim()) merged.trailerUrl = existing.trailerUrl;

  if (!merged.imdbUrl) merged.imdbUrl = imdbTitleUrl(merged.imdbId);
  if (!merged.tmdbUrl) merged.tmdbUrl = tmdbMovieUrl(merged.tmdbId);
}
