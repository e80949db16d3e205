/**
 * reelbridge library surface
 */

export type * from './shared/types.js';
export { ConfigError, buildConfig, defaultConfig, loadConfig } from './shared/config.js';
export { createLogger, silentLogger, setDefaultLogLevel, type Logger } from './shared/logger.js';
export { RecordError, parseMergedMovie, parsePrimaryMovie, parseSupplementalMovie } from './shared/records.js';

export { normalizeTitle, normalizePersonName, extractYear, yearsMatch } from './matching/normalize.js';
export { japaneseToHepburn, koreanToRevised, transliterateToEnglish } from './matching/romanization.js';
export { getSearchTitles, buildNormalizedTitleSet, titlesShareYear } from './matching/titles.js';

export {
  BrowserTransport,
  ImdbHttpError,
  fetchPage,
  type HttpTransport,
  type TransportResponse,
} from './imdb/transport.js';
export { ImdbSearchClient } from './imdb/search.js';
export { parseSearchResults } from './imdb/searchParser.js';
export { parseTitlePage } from './imdb/titlePage.js';
export { ImdbValidator, judge } from './imdb/validator.js';
export { ImdbResolver, createImdbResolver, type ImdbResolverOptions } from './imdb/resolver.js';

export { mergeMovie, type CountryMapper } from './merge/merge.js';
export { mapCountriesToIso } from './merge/countryCodes.js';

export {
  MovieMetadataOrchestrator,
  type ExternalIdResolver,
  type PrimarySource,
  type SupplementalSource,
} from './metadata/orchestrator.js';
export { refreshStoredRatings, runRatingRefresh, type RefreshResult, type RefreshSummary } from './metadata/refreshQueue.js';
export { StaticPrimarySource, StaticSupplementalSource } from './metadata/staticSources.js';

export { MovieStore } from './db/client.js';
