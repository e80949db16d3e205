import { describe, expect, it } from 'vitest';

import { extractTitleTypeFromText, findDirectImdbLink, parseSearchResults } from '../searchParser.js';
import { modernSearchPage } from './fakeTransport.js';

const LEGACY = `<html><body><table class="findList">
<tr><td class="primary_photo"></td><td class="result_text"> <a href="/title/tt0091849/">Krysař</a> (1986) </td></tr>
<tr><td class="primary_photo"></td><td class="result_text"> <a href="/title/tt1111111/">Krysař</a> (2003) (TV Episode) </td></tr>
<tr><td class="result_text"> <a href="/name/nm0057468/">Jiří Barta</a></td></tr>
</table></body></html>`;

describe('extractTitleTypeFromText', () => {
  it('finds the first known type label', () => {
    expect(extractTitleTypeFromText('(2019) (TV Series)')).toBe('TV Series');
    expect(extractTitleTypeFromText('2020 podcast episode')).toBe('podcast episode');
    expect(extractTitleTypeFromText('(1986)')).toBeUndefined();
    expect(extractTitleTypeFromText(undefined)).toBeUndefined();
  });
});

describe('parseSearchResults', () => {
  it('reads the legacy table layout', () => {
    expect(parseSearchResults(LEGACY)).toEqual([
      { id: 'tt0091849', title: 'Krysař', year: '1986', rawText: ' Krysař (1986) ', titleType: undefined },
      { id: 'tt1111111', title: 'Krysař', year: '2003', rawText: ' Krysař (2003) (TV Episode) ', titleType: 'TV Episode' },
    ]);
  });

  it('reads the card layout', () => {
    const html = modernSearchPage([
      { id: 'tt0091849', title: 'The Pied Piper', meta: ['1986', '53m'] },
      { id: 'tt7654321', title: 'Pied Piper', meta: ['2019–2021'], type: 'TV Series' },
    ]);

    expect(parseSearchResults(html)).toEqual([
      { id: 'tt0091849', title: 'The Pied Piper', year: '1986', rawText: ' 1986 53m', titleType: undefined },
      { id: 'tt7654321', title: 'Pied Piper', year: '2019', rawText: ' 2019–2021', titleType: 'TV Series' },
    ]);
  });

  it('falls back to link text without an aria-label', () => {
    const html = `<section data-testid="find-results-section-title"><h3>Titles</h3><ul>
<li class="ipc-metadata-list-summary-item"><a href="/title/tt0000042/">Plain Link</a></li></ul></section>`;
    expect(parseSearchResults(html)).toEqual([
      { id: 'tt0000042', title: 'Plain Link', year: undefined, rawText: '', titleType: undefined },
    ]);
  });

  it('prefers the Movies section over Titles', () => {
    const html =
      modernSearchPage([{ id: 'tt0000001', title: 'From Titles' }], 'Titles') +
      modernSearchPage([{ id: 'tt0000002', title: 'From Movies' }], 'Movies');
    expect(parseSearchResults(html).map(r => r.id)).toEqual(['tt0000002']);
  });

  it('lists legacy rows first and drops repeated ids', () => {
    const html = LEGACY + modernSearchPage([
      { id: 'tt0091849', title: 'The Pied Piper', meta: ['1986'] },
      { id: 'tt0000003', title: 'The Piper', meta: ['1987'] },
    ]);
    const results = parseSearchResults(html);
    expect(results.map(r => r.id)).toEqual(['tt0091849', 'tt1111111', 'tt0000003']);
    expect(results[0].title).toBe('Krysař');
  });

  it('returns nothing for a page without results', () => {
    expect(parseSearchResults('<html><body>No results</body></html>')).toEqual([]);
  });
});

describe('findDirectImdbLink', () => {
  it('takes the id from the first IMDb title link', () => {
    const html = `<div><a href="https://www.csfd.cz/film/8653">CSFD</a>
<a href="https://www.imdb.com/title/tt0091849/" target="_blank">IMDb profil</a></div>`;
    expect(findDirectImdbLink(html)).toBe('tt0091849');
    expect(findDirectImdbLink('<p>none</p>')).toBeUndefined();
  });
});
