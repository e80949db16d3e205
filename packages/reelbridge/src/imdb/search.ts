/**
 * IMDb title search.
 * A failed request is logged and reported as zero results; the resolver then
 * simply moves on to its next search title.
 */

import type { SearchCandidate } from '../shared/types.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { fetchPage, ImdbHttpError, type HttpTransport } from './transport.js';
import { parseSearchResults } from './searchParser.js';

export interface ImdbSearchOptions {
  baseUrl?: string;
  softBlockRetryDelayMs?: number;
  logger?: Logger;
}

export class ImdbSearchClient {
  private readonly baseUrl: string;
  private readonly softBlockRetryDelayMs: number | undefined;
  private readonly log: Logger;

  constructor(
    private readonly transport: HttpTransport,
    opts: ImdbSearchOptions = {}
  ) {
    this.baseUrl = opts.baseUrl ?? 'https://www.imdb.com';
    this.softBlockRetryDelayMs = opts.softBlockRetryDelayMs;
    this.log = opts.logger ?? createLogger('imdb:search');
  }

  searchUrl(query: string, titleType?: string): string {
    let url = `${this.baseUrl}/find/?q=${encodeURIComponent(query)}`;
    if (titleType) url += `&s=tt&ttype=${encodeURIComponent(titleType)}`;
    return url;
  }

  async search(query: string, titleType?: string, signal?: AbortSignal): Promise<SearchCandidate[]> {
    signal?.throwIfAborted();
    const url = this.searchUrl(query, titleType);

    let html: string;
    try {
      html = await fetchPage(this.transport, url, {
        referer: `${this.baseUrl}/`,
        signal,
        softBlockRetryDelayMs: this.softBlockRetryDelayMs,
      });
    } catch (err) {
      if (err instanceof ImdbHttpError) {
        this.log.warn(`Search "${query}" failed: ${err.message}`);
        return [];
      }
      throw err;
    }

    return parseSearchResults(html);
  }
}
