/**
 * Shared type definitions for the downloader
 */

/**
 * Site definition from the provider registry.
 * An alias rule (`aliasOf` set) carries only its own prefix and search fields;
 * its extraction fields come from the target rule.
 */
export interface ProviderRule {
  /** Input URLs starting with this string are handled by the rule */
  urlPrefix: string;
  /** `urlPrefix` of another rule whose extraction fields are used instead */
  aliasOf?: string;
  /** Matched repeatedly against the page; one match per candidate chapter */
  chapterPattern?: RegExp;
  /** First capture is the resource URL; absent means the fragment is the URL */
  hrefPattern?: RegExp;
  /** First capture is the chapter title */
  titlePattern?: RegExp;
  /** Take the title from the last path segment of the resource URL */
  titleFromHref?: boolean;
  /** File extension for downloaded chapters */
  extension?: string;
  /** Search page URL, `%q` is replaced with the query phrase */
  searchTemplate?: string;
  searchLinkPattern?: RegExp;
  searchTitlePattern?: RegExp;
  /** Prepended to every extracted search link (for relative URLs) */
  searchLinkPrefix?: string;
}

/** Alias-free extraction fields, ready for the manifest builder */
export interface ResolvedRule {
  urlPrefix: string;
  chapterPattern: RegExp | null;
  hrefPattern: RegExp | null;
  titlePattern: RegExp | null;
  titleFromHref: boolean;
  extension: string;
}

/** Outcome of the download stage for one entry */
export type DownloadStatus = 'pending' | 'success' | 'failed' | 'skipped';

/** One chapter of the manifest */
export interface ManifestEntry {
  /** Derived filename, unique within a manifest */
  filename: string;
  /** Location the chapter is fetched from */
  sourceUrl: string;
  /** Display title used for the playlist and title tag */
  title: string;
  /** Destination path, set once the output directory is known */
  localPath?: string;
  status: DownloadStatus;
}

/** Chapters keyed by filename, in discovery order */
export type Manifest = Map<string, ManifestEntry>;

/** A page found by searching a provider */
export interface SearchResult {
  link: string;
  title: string;
  /** `urlPrefix` of the provider that returned the result */
  provider: string;
}
