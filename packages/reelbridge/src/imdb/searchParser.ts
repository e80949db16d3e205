/**
 * IMDb /find result extraction.
 * Two layouts are understood: the legacy `table.findList` and the current
 * `ipc-metadata-list-summary-item` cards. Both are read; legacy rows come first
 * and the first occurrence of an id wins.
 */

import * as cheerio from 'cheerio';

import type { SearchCandidate } from '../shared/types.js';

const TITLE_ID_RE = /tt\d+/;
const TITLE_TYPE_RE =
  /\b(TV Series|TV Mini Series|TV Movie|TV Episode|TV Special|TV Short|Podcast Series|Podcast Episode|Video Game|Video|Short|Music Video)\b/i;

/** "(TV Series)", "Podcast Episode", ... found anywhere in result text */
export function extractTitleTypeFromText(text: string | undefined): string | undefined {
  if (!text || text.trim() === '') return undefined;
  const m = TITLE_TYPE_RE.exec(text);
  return m ? m[1] : undefined;
}

function titleIdFromHref(href: string | undefined): string | undefined {
  if (!href) return undefined;
  const m = TITLE_ID_RE.exec(href);
  return m ? m[0] : undefined;
}

function extractLegacyResults($: cheerio.CheerioAPI): SearchCandidate[] {
  const results: SearchCandidate[] = [];

  $('table.findList tr').each((_, row) => {
    const textCell = $(row).find('td.result_text').first();
    const link = textCell.find('a').first();
    if (textCell.length === 0 || link.length === 0) return;

    const id = titleIdFromHref(link.attr('href'));
    if (!id) return;

    const rawText = textCell.text();
    const yearMatch = /\((\d{4})\)/.exec(rawText);
    results.push({
      id,
      title: link.text().trim(),
      year: yearMatch ? yearMatch[1] : undefined,
      rawText,
      titleType: extractTitleTypeFromText(rawText),
    });
  });

  return results;
}

function findResultsSection($: cheerio.CheerioAPI) {
  const sections = $('section[data-testid="find-results-section-title"]');
  const byHeading = (heading: string) =>
    sections.filter((_, el) => $(el).find('h3').toArray().some(h => $(h).text().trim() === heading)).first();

  // "Movies" when the search was filtered by type, "Titles" otherwise
  const movies = byHeading('Movies');
  return movies.length > 0 ? movies : byHeading('Titles');
}

function extractModernResults($: cheerio.CheerioAPI): SearchCandidate[] {
  const section = findResultsSection($);
  if (section.length === 0) return [];

  const results: SearchCandidate[] = [];

  section.find('li.ipc-metadata-list-summary-item').each((_, item) => {
    const $item = $(item);
    const link = $item.find('a[href*="/title/tt"]').first();
    if (link.length === 0) return;

    const id = titleIdFromHref(link.attr('href'));
    if (!id) return;

    const ariaLabel = link.attr('aria-label') ?? '';
    let title = ariaLabel.replace(/^View title page for /, '').trim();
    if (!title) title = link.text().trim();

    let year: string | undefined;
    const rawParts: string[] = [];
    $item.find('span.cli-title-metadata-item').each((_, span) => {
      const text = $(span).text();
      if (text.trim() === '') return;
      rawParts.push(text);
      if (!year) {
        const m = /\b(\d{4})\b/.exec(text);
        if (m) year = m[1];
      }
    });
    const rawText = rawParts.map(p => ` ${p}`).join('');

    const typeLabel = $item
      .find('span.ipc-metadata-list-summary-item__tl, label.ipc-metadata-list-summary-item__tl')
      .first()
      .text()
      .trim();

    results.push({
      id,
      title,
      year,
      rawText,
      titleType: typeLabel || extractTitleTypeFromText(rawText),
    });
  });

  return results;
}

/** Candidates from a /find page, legacy layout first, deduplicated by id */
export function parseSearchResults(html: string): SearchCandidate[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const results: SearchCandidate[] = [];

  for (const result of [...extractLegacyResults($), ...extractModernResults($)]) {
    const key = result.id.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    results.push(result);
  }
  return results;
}

/** `tt` id of the first IMDb title link in a primary-source page, if any */
export function findDirectImdbLink(html: string): string | undefined {
  const $ = cheerio.load(html);
  return titleIdFromHref($('a[href*="imdb.com/title/tt"]').first().attr('href'));
}
