/**
 * Rating refresh for already-resolved movies.
 * A small worker pool drains a shared queue. Each worker owns its resolver,
 * so every worker keeps its own cookies and request pacing.
 */

import type { MergedMovie } from '../shared/types.js';
import type { MovieStore } from '../db/client.js';
import type { ExternalIdResolver } from './orchestrator.js';

export type RatingResolver = Pick<ExternalIdResolver, 'fetchRating'>;

export interface RefreshResult {
  sourceId: number;
  imdbId: string;
  rating?: number;
  ratingCount?: number;
  // the title page gave no rating; the stored one stays
  unchanged?: boolean;
  error?: string;
}

export interface RefreshOptions {
  concurrency?: number;  // default 2
  signal?: AbortSignal;
  onResult?: (result: RefreshResult) => void;
}

export interface RefreshSummary {
  total: number;
  refreshed: number;
  unchanged: number;
  failed: number;
}

export async function runRatingRefresh(
  records: readonly MergedMovie[],
  createResolver: () => RatingResolver,
  opts: RefreshOptions = {}
): Promise<RefreshSummary> {
  const concurrency = Math.max(1, opts.concurrency ?? 2);
  const signal = opts.signal;

  const queue = records.flatMap(r => (r.imdbId ? [{ sourceId: r.sourceId, imdbId: r.imdbId }] : []));
  const total = queue.length;
  let refreshed = 0;
  let unchanged = 0;
  let failed = 0;

  async function processOne(resolver: RatingResolver, item: { sourceId: number; imdbId: string }): Promise<void> {
    let result: RefreshResult;
    try {
      const { rating, ratingCount } = await resolver.fetchRating(item.imdbId, signal);
      if (rating === undefined) {
        result = { ...item, unchanged: true };
        unchanged++;
      } else {
        result = { ...item, rating, ratingCount };
        refreshed++;
      }
    } catch (err) {
      if (signal?.aborted) return;
      result = { ...item, error: err instanceof Error ? err.message : String(err) };
      failed++;
    }
    opts.onResult?.(result);
  }

  async function worker(): Promise<void> {
    const resolver = createResolver();
    while (queue.length > 0 && !signal?.aborted) {
      const item = queue.shift();
      if (item) await processOne(resolver, item);
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, total); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return { total, refreshed, unchanged, failed };
}

export type RatingStore = Pick<MovieStore, 'listResolved' | 'updateImdbRating'>;

/** Refresh every resolved movie in the store and write back the new ratings */
export async function refreshStoredRatings(
  store: RatingStore,
  createResolver: () => RatingResolver,
  opts: RefreshOptions = {}
): Promise<RefreshSummary> {
  return runRatingRefresh(store.listResolved(), createResolver, {
    ...opts,
    onResult: (result) => {
      if (result.rating !== undefined) {
        store.updateImdbRating(result.sourceId, result.rating, result.ratingCount);
      }
      opts.onResult?.(result);
    },
  });
}
