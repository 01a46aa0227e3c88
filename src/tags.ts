/**
 * Append chapter titles to the title tag of downloaded files
 *
 * Media players often sort and display by the title tag alone; adding the
 * chapter title keeps chapters distinguishable.
 */

import NodeID3 from 'node-id3';
import { errorMessage } from './errors.js';
import type { Manifest } from './types.js';

export type TagField = 'title';

/** Tags of one loaded file */
export interface TagHandle {
  get(field: TagField): string | undefined;
  set(field: TagField, value: string): void;
  save(): Promise<void>;
}

/** Loads tag handles for files on disk */
export interface TagStore {
  load(path: string): Promise<TagHandle>;
}

/**
 * Tag store for MP3 files, backed by ID3 tags.
 */
export const id3TagStore: TagStore = {
  async load(path: string): Promise<TagHandle> {
    const tags = await NodeID3.Promise.read(path);
    let title = tags.title;

    return {
      get: () => title,
      set: (_field, value) => {
        title = value;
      },
      save: async () => {
        await NodeID3.Promise.update({ title }, path);
      },
    };
  },
};

/**
 * Combine an existing title tag with a chapter title.
 * Returns null when the chapter title is already part of the tag.
 *
 * @example
 * mergeTitle('My Book', 'Chapter 1') // 'My Book Chapter 1'
 * mergeTitle('My Book Chapter 1', 'Chapter 1') // null
 * mergeTitle(undefined, 'Chapter 1') // 'Chapter 1'
 */
export function mergeTitle(current: string | undefined, chapterTitle: string): string | null {
  const existing = current ?? '';
  if (existing.includes(chapterTitle)) return null;
  return existing === '' ? chapterTitle : `${existing} ${chapterTitle}`;
}

/**
 * Rewrite the title tag of every chapter file on disk, in manifest order:
 * downloaded ones and ones that were already there.
 * A file that cannot be tagged is logged and skipped.
 *
 * @param manifest - Chapters after the download stage
 * @param store - Tag library to use
 * @returns Number of files whose title changed
 */
export async function retag(manifest: Manifest, store: TagStore = id3TagStore): Promise<number> {
  let changed = 0;

  for (const entry of manifest.values()) {
    if ((entry.status !== 'success' && entry.status !== 'skipped') || !entry.localPath) continue;

    try {
      const tags = await store.load(entry.localPath);
      const title = mergeTitle(tags.get('title'), entry.title);
      if (title === null) continue;

      tags.set('title', title);
      await tags.save();
      changed++;
      console.log(`File ${entry.localPath}: Title tag changed to "${title}"`);
    } catch (error) {
      console.error(`Error tagging ${entry.localPath}: ${errorMessage(error)}`);
    }
  }

  return changed;
}
