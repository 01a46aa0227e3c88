/**
 * Build the chapter manifest of a page
 *
 * A manifest maps derived filenames to chapter entries, in the order the
 * chapters appear on the page.
 */

import { fetchPage } from './http.js';
import { matchProviders } from './providers.js';
import type { Manifest, ResolvedRule } from './types.js';
import { findAllCaptures, firstCapture, zeroPad } from './utils.js';

/**
 * Derive a chapter title from the last path segment of its URL,
 * cut at the first dot.
 *
 * @example
 * titleFromUrl('https://example.org/files/chapter_01_doe_64kb.mp3') // 'chapter_01_doe_64kb'
 */
export function titleFromUrl(url: string): string {
  const segment = url.split('/').at(-1) ?? '';
  return segment.split('.')[0];
}

/**
 * Collapse runs of whitespace (including line breaks) and trim.
 */
export function cleanTitle(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}

/**
 * Build the filename for a chapter.
 *
 * @param title - Chapter title, may be empty
 * @param ordinal - 1-based position of the candidate on the page
 * @param extension - File extension without the dot
 *
 * @example
 * chapterFilename('Intro', 1, 'mp3') // 'Intro (001).mp3'
 * chapterFilename('', 7, 'mp3') // 'Part 007.mp3'
 */
export function chapterFilename(title: string, ordinal: number, extension: string): string {
  const number = zeroPad(ordinal, 3);
  const safeTitle = cleanTitle(title).replace(/[/\\]/g, '-');
  return safeTitle === '' ? `Part ${number}.${extension}` : `${safeTitle} (${number}).${extension}`;
}

/**
 * Apply provider rules to page HTML.
 *
 * Every chapter-pattern match is a candidate and takes the next ordinal,
 * including candidates dropped because the href pattern found nothing.
 * Without an href pattern the fragment itself is the URL, even when empty.
 * Rules are applied in order and append to the same manifest; a repeated
 * filename replaces the earlier entry's content.
 *
 * @param html - Page markup
 * @param rules - Resolved rules of the providers matching the page URL
 * @returns Chapters keyed by filename
 */
export function buildManifest(html: string, rules: readonly ResolvedRule[]): Manifest {
  const manifest: Manifest = new Map();
  let ordinal = 0;

  for (const rule of rules) {
    if (!rule.chapterPattern) continue;

    for (const fragment of findAllCaptures(rule.chapterPattern, html)) {
      ordinal++;

      let sourceUrl = fragment;
      if (rule.hrefPattern) {
        sourceUrl = firstCapture(rule.hrefPattern, fragment);
        if (sourceUrl === '') continue;
      }

      let title = '';
      if (rule.titleFromHref) {
        title = cleanTitle(titleFromUrl(sourceUrl));
      } else if (rule.titlePattern) {
        title = cleanTitle(firstCapture(rule.titlePattern, fragment));
      }

      const filename = chapterFilename(title, ordinal, rule.extension);
      manifest.set(filename, {
        filename,
        sourceUrl,
        title: title === '' ? filename : title,
        status: 'pending',
      });
    }
  }

  return manifest;
}

/**
 * Fetch a page and build its manifest.
 *
 * @param url - Page listing the chapters
 * @throws {FatalError} If no provider supports the URL or the page cannot be fetched
 */
export async function createManifest(url: string): Promise<Manifest> {
  const rules = matchProviders(url);
  const html = await fetchPage(url);
  return buildManifest(html, rules);
}
