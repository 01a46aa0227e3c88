/**
 * Provider registry and URL matching
 *
 * Each provider describes how chapters (and search results) are laid out in
 * one site's markup. Patterns are applied to raw HTML, so they are written
 * against the exact markup the sites serve.
 */

import { FatalError } from './errors.js';
import type { ProviderRule, ResolvedRule } from './types.js';

/** Extension used when a rule does not name one */
const UNKNOWN_EXTENSION = 'unknown';

/** WordPress search result heading used by the fulllengthaudiobooks family */
const WP_ENTRY_LINK = /<h2 class="entry-title"><a href="(.*?)".*?rel="bookmark">.*?<\/a><\/h2>/;
const WP_ENTRY_TITLE = /<h2 class="entry-title"><a href=".*?".*?rel="bookmark">(.*?)<\/a><\/h2>/;

export const PROVIDERS: readonly ProviderRule[] = [
  {
    urlPrefix: 'https://fulllengthaudiobooks.com/',
    extension: 'mp3',
    chapterPattern: / src="(https:\/\/.*?mp3.*?)"/,
    searchTemplate: 'https://fulllengthaudiobooks.com/?s=%q',
    searchLinkPattern: /<h2 class="entry-title post-title"><a href="(.*?)".*?rel="bookmark">.*?<\/a><\/h2>/,
    searchTitlePattern: /<h2 class="entry-title post-title"><a href=".*?".*?rel="bookmark">(.*?)<\/a><\/h2>/,
  },
  {
    urlPrefix: 'https://librivox.org/',
    extension: 'mp3',
    chapterPattern: /<tr>(.*?)<\/tr>/s,
    hrefPattern: /<\/td>.*?<td><a href="(.*?\.mp3.*?)" class="chapter-name">/s,
    titlePattern: /class="chapter-name">(.*?)<\/a><\/td>/s,
    titleFromHref: true,
  },
  {
    urlPrefix: 'https://goldenaudiobooks.com/',
    aliasOf: 'https://fulllengthaudiobooks.com/',
    searchTemplate: 'https://goldenaudiobooks.com/?s=%q',
    searchLinkPattern: WP_ENTRY_LINK,
    searchTitlePattern: WP_ENTRY_TITLE,
  },
  {
    urlPrefix: 'https://bookaudiobooks.com/',
    aliasOf: 'https://fulllengthaudiobooks.com/',
    searchTemplate: 'https://bookaudiobooks.com/?s=%q',
    searchLinkPattern: WP_ENTRY_LINK,
    searchTitlePattern: WP_ENTRY_TITLE,
  },
  {
    urlPrefix: 'https://archive.org',
    extension: 'mp3',
    chapterPattern: /<div itemprop="(.*?)<\/div>/s,
    hrefPattern: /<link itemprop="associatedMedia" href="([^<]*?\.mp3)">/s,
    titlePattern: /content="(.*?)"/,
    titleFromHref: false,
    searchTemplate:
      'https://archive.org/search.php?query=%q&and[]=mediatype%3A%22audio%22&and[]=subject%3A%22audiobook%22',
    searchLinkPattern:
      /<a href="([^<]*?)" title=".*?".*?data-event-click-tracking="(?:GenericNonCollection|ItemTile)">/s,
    searchTitlePattern:
      /<a href="[^<]*?" title="(.*?)".*?data-event-click-tracking="(?:GenericNonCollection|ItemTile)">/s,
    searchLinkPrefix: 'https://archive.org',
  },
];

/**
 * Follow a rule's alias chain and flatten it into extraction fields.
 * The resolved rule keeps the matching rule's own prefix.
 *
 * @param rule - Rule that matched the input URL
 * @param registry - Rules that aliases are looked up in
 * @returns Alias-free rule
 * @throws {FatalError} If an alias target is missing or the chain loops
 */
export function resolveRule(rule: ProviderRule, registry: readonly ProviderRule[] = PROVIDERS): ResolvedRule {
  const seen = new Set<string>([rule.urlPrefix]);
  let target = rule;

  while (target.aliasOf !== undefined) {
    const aliasOf: string = target.aliasOf;
    if (seen.has(aliasOf)) {
      throw new FatalError('invalid-registry', `Provider alias loop at ${aliasOf}`);
    }
    seen.add(aliasOf);

    const next = registry.find((candidate) => candidate.urlPrefix === aliasOf);
    if (!next) {
      throw new FatalError('invalid-registry', `Provider ${target.urlPrefix} is an alias of unknown provider ${aliasOf}`);
    }
    target = next;
  }

  return {
    urlPrefix: rule.urlPrefix,
    chapterPattern: target.chapterPattern ?? null,
    hrefPattern: target.hrefPattern ?? null,
    titlePattern: target.titlePattern ?? null,
    titleFromHref: target.titleFromHref ?? false,
    extension: target.extension ?? UNKNOWN_EXTENSION,
  };
}

/**
 * Find every provider that handles a URL.
 * All matches are returned in registry order; their chapters are combined.
 *
 * @param url - Page URL given by the user
 * @param registry - Rules to match against
 * @returns Resolved rules of all matching providers
 * @throws {FatalError} If no provider matches
 *
 * @example
 * matchProviders('https://goldenaudiobooks.com/some-book/')
 * // [{ urlPrefix: 'https://goldenaudiobooks.com/', chapterPattern: / src="(https:\/\/.*?mp3.*?)"/, ... }]
 */
export function matchProviders(url: string, registry: readonly ProviderRule[] = PROVIDERS): ResolvedRule[] {
  const matched = registry.filter((rule) => url.startsWith(rule.urlPrefix)).map((rule) => resolveRule(rule, registry));

  if (matched.length === 0) {
    throw new FatalError('unsupported-provider', 'Provider not supported. Aborting...');
  }

  return matched;
}

/**
 * List the URL prefixes of all supported providers.
 */
export function listProviders(registry: readonly ProviderRule[] = PROVIDERS): string[] {
  return registry.map((rule) => rule.urlPrefix);
}
