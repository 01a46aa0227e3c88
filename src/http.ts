/**
 * HTTP fetching for provider pages and chapter files
 *
 * Page fetches are fatal on failure (there is nothing to work on without the
 * page); resource fetches throw a plain Error for the caller to record.
 */

import { FatalError, errorMessage } from './errors.js';

/**
 * Fixed user agent sent with every request.
 * Some providers reject requests without a browser-like agent.
 */
export const USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64; rv:10.0) Gecko/20100101 Firefox/10.0';

/** Request headers shared by all fetches */
export const DEFAULT_HEADERS = { 'User-Agent': USER_AGENT };

async function get(url: string): Promise<Response> {
  const response = await fetch(url, { headers: DEFAULT_HEADERS, redirect: 'follow' });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
  }
  return response;
}

/**
 * Download a page and decode it as UTF-8 text.
 *
 * @param url - Page to download
 * @returns Page HTML
 * @throws {FatalError} On any transport, status or decoding failure
 */
export async function fetchPage(url: string): Promise<string> {
  try {
    const response = await get(url);
    const bytes = await response.arrayBuffer();
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new FatalError('page-fetch', `Error downloading main page from ${url}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Download a chapter file.
 *
 * @param url - Resource to download
 * @returns File contents
 * @throws {Error} On any transport or status failure
 */
export async function fetchResource(url: string): Promise<Buffer> {
  const response = await get(url);
  return Buffer.from(await response.arrayBuffer());
}
