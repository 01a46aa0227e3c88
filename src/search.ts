/**
 * Search all providers for audiobooks matching a phrase
 */

import { FatalError } from './errors.js';
import { fetchPage } from './http.js';
import { PROVIDERS } from './providers.js';
import type { ProviderRule, SearchResult } from './types.js';
import { findAllCaptures } from './utils.js';

/** Title shown when a link has no title at the same position */
export const MISSING_TITLE = '<ERROR>';

/** Placeholder in a search template that receives the phrase */
const QUERY_PLACEHOLDER = '%q';

/**
 * Make a phrase safe for a search URL by replacing spaces and slashes with '+'.
 *
 * @example
 * preparePhrase('war and peace') // 'war+and+peace'
 * preparePhrase('AC/DC') // 'AC+DC'
 */
export function preparePhrase(phrase: string): string {
  return phrase.replace(/[ /]/g, '+');
}

/**
 * Remove HTML numeric character references such as `&#8217;`.
 */
export function stripNumericEntities(text: string): string {
  return text.replace(/&#.*?;/g, '');
}

/**
 * Pair links and titles from one provider's search page.
 * Links and titles are matched separately and paired by position.
 *
 * @param html - Search results page
 * @param provider - Provider the page came from
 * @returns Results in page order, without empty links
 */
export function extractSearchResults(html: string, provider: ProviderRule): SearchResult[] {
  if (!provider.searchLinkPattern || !provider.searchTitlePattern) return [];

  const links = findAllCaptures(provider.searchLinkPattern, html);
  const titles = findAllCaptures(provider.searchTitlePattern, html);
  const prefix = provider.searchLinkPrefix ?? '';

  const results: SearchResult[] = [];
  links.forEach((link, index) => {
    if (link === '') return;
    results.push({
      link: `${prefix}${link}`,
      title: stripNumericEntities(titles[index] ?? MISSING_TITLE),
      provider: provider.urlPrefix,
    });
  });
  return results;
}

/**
 * Search every provider that has a search template.
 * Results are concatenated in registry order, without ranking or dedup.
 *
 * @param phrase - Words to search for
 * @param registry - Providers to search
 * @throws {FatalError} If the phrase is empty or a search page cannot be fetched
 */
export async function search(phrase: string, registry: readonly ProviderRule[] = PROVIDERS): Promise<SearchResult[]> {
  if (phrase.trim() === '') {
    throw new FatalError('missing-phrase', 'No search phrase given!');
  }

  const query = preparePhrase(phrase);
  const results: SearchResult[] = [];

  for (const provider of registry) {
    if (!provider.searchTemplate || !provider.searchLinkPattern || !provider.searchTitlePattern) continue;

    const html = await fetchPage(provider.searchTemplate.replaceAll(QUERY_PLACEHOLDER, query));
    results.push(...extractSearchResults(html, provider));
  }

  return results;
}

/**
 * Render search results for the terminal.
 *
 * @returns Lines to print
 */
export function formatSearchResults(results: readonly SearchResult[]): string[] {
  if (results.length === 0) {
    return ['No matching audiobooks found!'];
  }
  return [`Found ${results.length} matching audiobooks:`, '', ...results.map(({ title, link }) => `${title}  ---->${link}`)];
}
