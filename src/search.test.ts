import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FatalError } from './errors.js';
import {
  MISSING_TITLE,
  extractSearchResults,
  formatSearchResults,
  preparePhrase,
  search,
  stripNumericEntities,
} from './search.js';
import type { ProviderRule } from './types.js';

vi.mock('./http.js', () => ({
  fetchPage: vi.fn(),
}));

import { fetchPage } from './http.js';

const provider: ProviderRule = {
  urlPrefix: 'https://books.example/',
  searchTemplate: 'https://books.example/?s=%q',
  searchLinkPattern: /<h2><a href="(.*?)">/,
  searchTitlePattern: /<h2><a href=".*?">(.*?)<\/a>/,
};

describe('preparePhrase', () => {
  it('replaces spaces and slashes with +', () => {
    expect(preparePhrase('war and peace')).toBe('war+and+peace');
    expect(preparePhrase('AC/DC live')).toBe('AC+DC+live');
  });
});

describe('stripNumericEntities', () => {
  it('removes numeric character references', () => {
    expect(stripNumericEntities('Tom&#8217;s Story &#038; More')).toBe('Toms Story  More');
  });

  it('leaves named entities alone', () => {
    expect(stripNumericEntities('A &amp; B')).toBe('A &amp; B');
  });
});

describe('extractSearchResults', () => {
  it('pairs links and titles by position', () => {
    const html = '<h2><a href="https://books.example/one/">One</a></h2><h2><a href="https://books.example/two/">Two</a></h2>';

    expect(extractSearchResults(html, provider)).toEqual([
      { link: 'https://books.example/one/', title: 'One', provider: 'https://books.example/' },
      { link: 'https://books.example/two/', title: 'Two', provider: 'https://books.example/' },
    ]);
  });

  it('prepends the link prefix and strips entities from titles', () => {
    const prefixed: ProviderRule = { ...provider, searchLinkPrefix: 'https://books.example' };
    const html = '<h2><a href="/details/abc">Abc&#8217;s Tale</a></h2>';

    expect(extractSearchResults(html, prefixed)).toEqual([
      { link: 'https://books.example/details/abc', title: 'Abcs Tale', provider: 'https://books.example/' },
    ]);
  });

  it('uses the error marker when a title is missing', () => {
    const linksOnly: ProviderRule = { ...provider, searchTitlePattern: /<h3>(.*?)<\/h3>/ };
    const html = '<h2><a href="/a">A</a></h2><h3>First</h3><h2><a href="/b">B</a></h2>';

    expect(extractSearchResults(html, linksOnly).map((result) => result.title)).toEqual(['First', MISSING_TITLE]);
  });

  it('skips empty links', () => {
    const html = '<h2><a href="">Empty</a></h2><h2><a href="/b">B</a></h2>';

    expect(extractSearchResults(html, provider)).toEqual([
      { link: '/b', title: 'B', provider: 'https://books.example/' },
    ]);
  });

  it('returns nothing for providers without search patterns', () => {
    expect(extractSearchResults('<h2></h2>', { urlPrefix: 'https://x.example/' })).toEqual([]);
  });
});

describe('search', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('queries every provider with a template and concatenates results in order', async () => {
    const second: ProviderRule = { ...provider, urlPrefix: 'https://more.example/', searchTemplate: 'https://more.example/find?q=%q' };
    const noSearch: ProviderRule = { urlPrefix: 'https://plain.example/' };

    vi.mocked(fetchPage)
      .mockResolvedValueOnce('<h2><a href="/first">First</a></h2>')
      .mockResolvedValueOnce('<h2><a href="/second">Second</a></h2>');

    const results = await search('dark tower', [provider, noSearch, second]);

    expect(fetchPage).toHaveBeenNthCalledWith(1, 'https://books.example/?s=dark+tower');
    expect(fetchPage).toHaveBeenNthCalledWith(2, 'https://more.example/find?q=dark+tower');
    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(results).toEqual([
      { link: '/first', title: 'First', provider: 'https://books.example/' },
      { link: '/second', title: 'Second', provider: 'https://more.example/' },
    ]);
  });

  it('rejects an empty phrase without fetching', async () => {
    await expect(search('   ', [provider])).rejects.toBeInstanceOf(FatalError);
    await expect(search('', [provider])).rejects.toThrow('No search phrase given!');
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('propagates search page failures', async () => {
    vi.mocked(fetchPage).mockRejectedValueOnce(new FatalError('page-fetch', 'Error downloading main page'));

    await expect(search('x', [provider])).rejects.toThrow('Error downloading main page');
  });
});

describe('formatSearchResults', () => {
  it('reports no matches', () => {
    expect(formatSearchResults([])).toEqual(['No matching audiobooks found!']);
  });

  it('lists title and link of every result', () => {
    expect(
      formatSearchResults([
        { link: 'https://books.example/one/', title: 'One', provider: 'https://books.example/' },
        { link: 'https://books.example/two/', title: 'Two', provider: 'https://books.example/' },
      ]),
    ).toEqual([
      'Found 2 matching audiobooks:',
      '',
      'One  ---->https://books.example/one/',
      'Two  ---->https://books.example/two/',
    ]);
  });
});
