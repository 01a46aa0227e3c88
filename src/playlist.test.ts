import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parsePlaylist, playlistPath, renderPlaylist, writePlaylist } from './playlist.js';
import type { Manifest, ManifestEntry } from './types.js';

function entry(filename: string, title: string): ManifestEntry {
  return { filename, sourceUrl: `https://cdn.example/${filename}`, title, status: 'success' };
}

const manifest: Manifest = new Map([
  ['Intro (001).mp3', entry('Intro (001).mp3', 'Intro')],
  ['Ch1 (002).mp3', entry('Ch1 (002).mp3', 'Ch1')],
  ['Part 003.mp3', entry('Part 003.mp3', 'Part 003.mp3')],
]);

describe('renderPlaylist', () => {
  it('writes numbered File/Title pairs in manifest order', () => {
    expect(renderPlaylist(manifest, 'pls')).toBe(
      '[playlist]\n\n' +
        'File1=Intro (001).mp3\nTitle1=Intro\n\n' +
        'File2=Ch1 (002).mp3\nTitle2=Ch1\n\n' +
        'File3=Part 003.mp3\nTitle3=Part 003.mp3\n\n' +
        'NumberOfEntries=3\nVersion=2\n',
    );
  });

  it('renders an empty manifest', () => {
    expect(renderPlaylist(new Map())).toBe('[playlist]\n\nNumberOfEntries=0\nVersion=2\n');
  });
});

describe('parsePlaylist', () => {
  it("recovers the manifest's filenames and titles in order", () => {
    const items = parsePlaylist(renderPlaylist(manifest));
    expect(items).toEqual([...manifest.values()].map(({ filename, title }) => ({ filename, title })));
  });
});

describe('playlistPath', () => {
  it('places the playlist in the output directory', () => {
    expect(playlistPath('/music/book', 'pls')).toBe(path.join('/music/book', 'playlist.pls'));
  });
});

describe('writePlaylist', () => {
  let outputDir: string;
  let mockConsoleLog: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'playlist-test-'));
    mockConsoleLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    mockConsoleLog.mockRestore();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('writes playlist.pls', async () => {
    const result = await writePlaylist(manifest, outputDir, 'pls');
    const file = path.join(outputDir, 'playlist.pls');

    expect(result).toEqual({ written: true, path: file });
    expect(await fs.readFile(file, 'utf-8')).toBe(renderPlaylist(manifest));
    expect(mockConsoleLog).toHaveBeenCalledWith(`Playlist saved to ${file}`);
  });

  it('refuses to overwrite an existing playlist', async () => {
    const file = path.join(outputDir, 'playlist.pls');
    await fs.writeFile(file, 'keep me');

    const result = await writePlaylist(manifest, outputDir, 'pls');

    expect(result).toEqual({ written: false, path: file, reason: 'exists' });
    expect(await fs.readFile(file, 'utf-8')).toBe('keep me');
  });

  it('only reports the path in dry run mode', async () => {
    const result = await writePlaylist(manifest, outputDir, 'pls', { dryRun: true });

    expect(result).toEqual({ written: false, path: path.join(outputDir, 'playlist.pls'), reason: 'dry-run' });
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('reports write errors without throwing', async () => {
    const mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const missing = path.join(outputDir, 'missing');

    const result = await writePlaylist(manifest, missing, 'pls');

    expect(result).toEqual({ written: false, path: path.join(missing, 'playlist.pls'), reason: 'error' });
    expect(mockConsoleError).toHaveBeenCalledTimes(1);
    mockConsoleError.mockRestore();
  });
});
