/**
 * Write a playlist of the manifest's chapters
 *
 * Format (PLS):
 *
 *   [playlist]
 *
 *   File1=Intro (001).mp3
 *   Title1=Intro
 *
 *   NumberOfEntries=1
 *   Version=2
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errorMessage } from './errors.js';
import { pathExists } from './download.js';
import type { Manifest } from './types.js';

export type PlaylistFormat = 'pls';

export interface PlaylistOptions {
  /** Report the target path without writing */
  dryRun?: boolean;
}

export type PlaylistResult =
  | { written: true; path: string }
  | { written: false; path: string; reason: 'exists' | 'dry-run' | 'error' };

/** A (filename, title) pair read back from a playlist */
export interface PlaylistItem {
  filename: string;
  title: string;
}

/**
 * Render a manifest as playlist text, one entry per chapter in manifest order.
 *
 * @param manifest - Chapters to list
 * @param format - Playlist format
 * @returns Playlist file contents
 */
export function renderPlaylist(manifest: Manifest, format: PlaylistFormat = 'pls'): string {
  switch (format) {
    case 'pls': {
      let text = '[playlist]\n\n';
      let n = 1;
      for (const { filename, title } of manifest.values()) {
        text += `File${n}=${filename}\nTitle${n}=${title}\n\n`;
        n++;
      }
      return `${text}NumberOfEntries=${manifest.size}\nVersion=2\n`;
    }
  }
}

/**
 * Read the (filename, title) pairs back from PLS text.
 * Blocks without a File line (header, footer) are ignored.
 */
export function parsePlaylist(text: string): PlaylistItem[] {
  const items: PlaylistItem[] = [];

  for (const block of text.split(/\n\s*\n/)) {
    let filename: string | null = null;
    let title = '';
    for (const line of block.split('\n')) {
      const match = line.match(/^(File|Title)\d+=(.*)$/);
      if (!match) continue;
      if (match[1] === 'File') filename = match[2];
      else title = match[2];
    }
    if (filename !== null) items.push({ filename, title });
  }

  return items;
}

/**
 * Get the playlist path for an output directory.
 *
 * @example
 * playlistPath('/music/book', 'pls') // '/music/book/playlist.pls'
 */
export function playlistPath(outputDir: string, format: PlaylistFormat): string {
  return path.join(outputDir, `playlist.${format}`);
}

/**
 * Write the manifest's playlist into the output directory.
 * An existing playlist is left alone.
 *
 * @param manifest - Chapters to list
 * @param outputDir - Directory the chapters were downloaded to
 * @param format - Playlist format
 * @param options - Dry run setting
 */
export async function writePlaylist(
  manifest: Manifest,
  outputDir: string,
  format: PlaylistFormat = 'pls',
  options: PlaylistOptions = {},
): Promise<PlaylistResult> {
  const file = playlistPath(outputDir, format);

  if (await pathExists(file)) {
    console.log(`File ${file} already exists! Ignoring...`);
    return { written: false, path: file, reason: 'exists' };
  }

  if (options.dryRun) {
    console.log(`Playlist would be saved to ${file}`);
    return { written: false, path: file, reason: 'dry-run' };
  }

  try {
    await fs.writeFile(file, renderPlaylist(manifest, format), { encoding: 'utf-8', flag: 'wx' });
  } catch (error) {
    console.error(`Error writing to ${file}: ${errorMessage(error)}`);
    return { written: false, path: file, reason: 'error' };
  }

  console.log(`Playlist saved to ${file}`);
  return { written: true, path: file };
}
