/**
 * Search-title generation and candidate title/year matching.
 * Pure functions over a SeedRecord; no network.
 */

import type { SearchCandidate, SeedRecord } from '../shared/types.js';
import { extractAllYears, extractYear, normalizeTitle, yearsMatch } from './normalize.js';

// Localized-title keys as the primary source writes them (Czech) plus English forms
const ENGLISH_KEYS = ['angličtina', 'English', 'USA', 'United States', 'UK', 'United Kingdom'];
const USA_KEYS = ['USA', 'United States', 'Spojené státy'];
const UK_KEYS = ['Velká Británie', 'United Kingdom', 'UK', 'Spojené království'];

/** Look a localized title up under the first alias present (case-insensitive keys) */
export function getLocalizedTitle(seed: SeedRecord, ...keys: string[]): string | undefined {
  const entries = Object.entries(seed.localizedTitles);
  for (const key of keys) {
    const wanted = key.toLocaleLowerCase();
    const hit = entries.find(([k, v]) => k.toLocaleLowerCase() === wanted && v.trim() !== '');
    if (hit) return hit[1];
  }
  return undefined;
}

export function parseOriginCountries(origin: string | undefined): string[] {
  if (!origin) return [];
  return origin
    .split(/[/,]/)
    .map(c => c.trim())
    .filter(c => c !== '');
}

/**
 * Titles to search for, most promising first:
 * English title, origin-country titles, USA, UK, primary title, everything else.
 */
export function getSearchTitles(seed: SeedRecord): string[] {
  const candidates: Array<string | undefined> = [
    getLocalizedTitle(seed, ...USA_KEYS),
    getLocalizedTitle(seed, ...UK_KEYS),
    seed.title,
  ];

  for (const country of parseOriginCountries(seed.origin)) {
    const originTitle = getLocalizedTitle(seed, country);
    if (originTitle) candidates.unshift(originTitle);
  }

  const englishTitle = getLocalizedTitle(seed, ...ENGLISH_KEYS);
  if (englishTitle) candidates.unshift(englishTitle);

  candidates.push(...Object.values(seed.localizedTitles));

  const seen = new Set<string>();
  const titles: string[] = [];
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (!trimmed) continue;
    const key = trimmed.toLocaleLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    titles.push(trimmed);
  }
  return titles;
}

/** Normalised titles a search hit may carry to count as a title match */
export function buildNormalizedTitleSet(seed: SeedRecord, queryTitle: string): Set<string> {
  const normalized = new Set<string>();
  for (const t of [seed.title, queryTitle, ...Object.values(seed.localizedTitles)]) {
    const norm = normalizeTitle(t);
    if (norm) normalized.add(norm);
  }
  return normalized;
}

/** Drop standalone year tokens: "Krysař 1985" → "Krysař" */
export function stripYearTokens(query: string): string {
  return query
    .split(/\s+/)
    .filter(part => part !== '' && !/^\d{4}$/.test(part))
    .join(' ');
}

/**
 * Does the hit plausibly come from the seed's year? Checks the hit's year and,
 * when that misses, every 4-digit number in its raw text (series entries show
 * the series start year while the episode year sits elsewhere in the text).
 */
export function titlesShareYear(
  seedYear: string | undefined,
  candidate: SearchCandidate,
  tolerance: number
): boolean {
  if (!seedYear || seedYear.trim() === '') return true;
  const year = extractYear(seedYear) ?? seedYear.trim();

  if (candidate.year && yearsMatch(year, candidate.year, tolerance)) return true;

  return extractAllYears(candidate.rawText).some(y => yearsMatch(year, y, tolerance));
}
