/**
 * IMDb title page metadata extraction.
 *
 * JSON-LD first: every `application/ld+json` block (and its `@graph` nodes) is
 * tried until one typed node carries a release year. Pages without one fall
 * back to the `<title>` tag, e.g. "Krysař (1986) - IMDb" or
 * "Some Show (TV Series 2020– ) - IMDb".
 */

import * as cheerio from 'cheerio';

import type { MetadataState, TitleMetadata } from '../shared/types.js';
import { extractYear } from '../matching/normalize.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(node: JsonObject, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' ? value : undefined;
}

function toNumber(value: unknown, integer: boolean): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const n = integer ? Number.parseInt(value.replace(/,/g, ''), 10) : Number.parseFloat(value);
  return Number.isFinite(n) ? n : undefined;
}

// ──────────────────────────────────────────────────────────────────
// JSON-LD fields
// ──────────────────────────────────────────────────────────────────

function yearOf(node: JsonObject): string | undefined {
  for (const key of ['datePublished', 'releaseDate']) {
    const year = extractYear(stringField(node, key));
    if (year) return year;
  }

  const events = node.releasedEvent;
  if (Array.isArray(events)) {
    for (const ev of events) {
      if (!isObject(ev)) continue;
      const year = extractYear(stringField(ev, 'startDate'));
      if (year) return year;
    }
  }
  return undefined;
}

function directorName(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (isObject(value)) return stringField(value, 'name');
  return undefined;
}

function directorsOf(node: JsonObject): string[] {
  const raw = node.director;
  if (raw === undefined || raw === null) return [];
  const items = Array.isArray(raw) ? raw : [raw];
  return items
    .map(directorName)
    .filter((name): name is string => name !== undefined && name.trim() !== '');
}

interface Rating {
  rating?: number;
  ratingCount?: number;
}

function ratingOf(node: JsonObject): Rating {
  const agg = node.aggregateRating;
  if (!isObject(agg)) return {};
  return {
    rating: toNumber(agg.ratingValue, false),
    ratingCount: toNumber(agg.ratingCount, true),
  };
}

/** First typed node (graph nodes before the node itself) that carries a year */
function metadataFromNode(node: unknown): TitleMetadata | undefined {
  if (!isObject(node)) return undefined;

  if (Array.isArray(node['@graph'])) {
    for (const child of node['@graph']) {
      const found = metadataFromNode(child);
      if (found) return found;
    }
  }

  const type = stringField(node, '@type');
  if (!type || type.trim() === '') return undefined;

  const year = yearOf(node);
  if (!year) return undefined;

  return { year, directors: directorsOf(node), ...ratingOf(node), titleType: type };
}

function ratingFromNode(node: unknown): Rating | undefined {
  if (!isObject(node)) return undefined;

  if (Array.isArray(node['@graph'])) {
    for (const child of node['@graph']) {
      const found = ratingFromNode(child);
      if (found) return found;
    }
  }

  const rating = ratingOf(node);
  return rating.rating !== undefined ? rating : undefined;
}

// ──────────────────────────────────────────────────────────────────
// <title> fallback
// ──────────────────────────────────────────────────────────────────

const PAGE_TITLE_TYPES: ReadonlyArray<[RegExp, string]> = [
  [/\(Podcast Series\b/i, 'PodcastSeries'],
  [/\(Podcast Episode\b/i, 'PodcastEpisode'],
  [/\(TV Series\b/i, 'TVSeries'],
  [/\(TV Episode\b/i, 'TVEpisode'],
  [/\(TV Mini Series\b/i, 'TVMiniSeries'],
  [/\(TV Movie\b/i, 'TVMovie'],
  [/\(TV Special\b/i, 'TVSpecial'],
  [/\(TV Short\b/i, 'TVShort'],
  [/\(Video Game\b/i, 'VideoGame'],
  [/\(Video\b/i, 'Video'],
  [/\(Short\b/i, 'Short'],
  [/\(Music Video\b/i, 'MusicVideoObject'],
];

export function titleTypeFromPageTitle(title: string | undefined): string | undefined {
  if (!title || title.trim() === '') return undefined;
  for (const [pattern, type] of PAGE_TITLE_TYPES) {
    if (pattern.test(title)) return type;
  }
  return undefined;
}

// ──────────────────────────────────────────────────────────────────

export function parseTitlePage(html: string): MetadataState {
  const $ = cheerio.load(html);
  let fallbackRating: Rating = {};

  for (const script of $('script[type="application/ld+json"]').toArray()) {
    const raw = $(script).text();
    if (raw.trim() === '') continue;

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch {
      continue; // malformed block, try the next one
    }

    const metadata = metadataFromNode(doc);
    if (metadata) return { kind: 'present', metadata };

    if (fallbackRating.rating === undefined) {
      fallbackRating = ratingFromNode(doc) ?? {};
    }
  }

  const pageTitle = $('title').first().text();
  const yearMatch = /\((\d{4})\)/.exec(pageTitle);
  if (!yearMatch) return { kind: 'absent' };

  return {
    kind: 'present',
    metadata: {
      year: yearMatch[1],
      directors: [],
      ...fallbackRating,
      titleType: titleTypeFromPageTitle(pageTitle),
    },
  };
}
