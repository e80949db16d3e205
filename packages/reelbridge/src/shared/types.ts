/**
 * reelbridge shared types
 * Domain records for the primary source, the IMDb catalog and the merged output.
 */

// ============================================================================
// Configuration
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface ReelbridgeConfig {
  imdb: {
    baseUrl: string;
    minDelayMs: number;            // randomized pre-request delay, lower bound
    maxDelayMs: number;
    softBlockRetryDelayMs: number; // wait before the single 202 retry
    timeoutMs: number;
    userAgents: string[];
  };

  matching: {
    yearTolerance: number;          // title-page year vs seed year
    candidateYearTolerance: number; // search-hit year sharing (prioritization)
    acceptWhenMetadataMissing: boolean;
  };

  store: {
    dbPath: string;
  };

  refresh: {
    concurrency: number;
  };

  logging: {
    level: LogLevel;
  };
}

// ============================================================================
// Primary source (regional film database)
// ============================================================================

/** The movie as known from the primary source, before IMDb resolution. */
export interface SeedRecord {
  id: number;
  title?: string;
  originalTitle?: string;
  year?: string;                            // free text, may carry noise
  directors: string[];
  localizedTitles: Record<string, string>;  // country/locale → title
  origin?: string;                          // "Česko / Slovensko"
}

export interface PrimaryMovie extends SeedRecord {
  genres: string[];
  cast: string[];
  duration?: string;
  description?: string;
  posterUrl?: string;
  rating?: string;
  imdbId?: string;
  imdbRating?: number;
  imdbRatingCount?: number;
}

// ============================================================================
// IMDb
// ============================================================================

export interface SearchCandidate {
  id: string;          // tt\d+
  title: string;
  year?: string;
  rawText?: string;
  titleType?: string;  // "TV Series", "Podcast Episode", ...
}

export interface TitleMetadata {
  year?: string;
  directors: string[];
  rating?: number;
  ratingCount?: number;
  titleType?: string;  // JSON-LD @type, e.g. "Movie", "TVSeries"
}

export type YearInfo =
  | { kind: 'unknown' }
  | { kind: 'year'; value: number };

export type MetadataState =
  | { kind: 'absent' }
  | { kind: 'present'; metadata: TitleMetadata };

export interface ValidationOutcome {
  accepted: boolean;
  metadata?: TitleMetadata;
}

export interface ResolutionResult {
  imdbId?: string;
  rating?: number;
  ratingCount?: number;
}

// ============================================================================
// Supplemental source (TMDB)
// ============================================================================

export interface CrewMember {
  tmdbId: number;
  name: string;
  role: string;
  photoUrl?: string;
}

export interface SupplementalMovie {
  id: number;
  title?: string;
  originalTitle?: string;
  overview?: string;
  releaseDate?: string;
  posterPath?: string;
  backdropPath?: string;
  voteAverage?: number;
  voteCount?: number;
  popularity?: number;
  originalLanguage?: string;
  adult?: boolean;
  homepage?: string;
  trailerUrl?: string;
  credits: CrewMember[];
}

// ============================================================================
// Merged output
// ============================================================================

export interface MergedMovie {
  sourceId: number;
  tmdbId?: number;
  tmdbTitle?: string;
  imdbId?: string;

  title?: string;
  originalTitle?: string;
  year?: string;
  duration?: string;
  rating?: string;
  imdbRating?: number;
  imdbRatingCount?: number;
  descriptionPrimary?: string;
  descriptionSecondary?: string;

  origin?: string;
  originCountryCodes: string[];
  genres: string[];
  directors: string[];
  cast: string[];
  localizedTitles: Record<string, string>;

  posterUrl?: string;
  primaryPosterUrl?: string;
  backdropUrl?: string;

  voteAverage?: number;
  voteCount?: number;
  popularity?: number;
  originalLanguage?: string;
  adult?: boolean;
  homepage?: string;
  trailerUrl?: string;
  credits: CrewMember[];

  releaseDate?: string;  // YYYY-MM-DD
  imdbUrl?: string;
  tmdbUrl?: string;
}
