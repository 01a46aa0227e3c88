/**
 * Download the chapters of a manifest into an output directory
 *
 * Every entry is attempted once. A failed chapter is logged and recorded on
 * its entry; it never stops the remaining downloads.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import pLimit from 'p-limit';
import { FatalError, errorMessage } from './errors.js';
import { fetchResource } from './http.js';
import type { Manifest, ManifestEntry } from './types.js';
import { onInterrupt } from './utils.js';

/** Chapters fetched at the same time unless configured otherwise */
export const DEFAULT_CONCURRENCY = 1;

export interface DownloadOptions {
  /** Only report planned downloads; no network or filesystem writes */
  dryRun?: boolean;
  /** Maximum simultaneous chapter fetches */
  concurrency?: number;
}

/** A download that would happen without --dry-run */
export interface PlannedDownload {
  path: string;
  url: string;
}

export interface DownloadSummary {
  success: number;
  failed: number;
  skipped: number;
  planned: PlannedDownload[];
}

/** Targets being written; removed if the process is interrupted mid-download */
const inFlight = new Set<string>();

onInterrupt(async () => {
  await Promise.all([...inFlight].map((file) => fs.rm(file, { force: true })));
});

interface LogLine {
  level: 'info' | 'error';
  message: string;
}

/**
 * Check that the output directory exists.
 *
 * @throws {FatalError} If the path is missing or not a directory
 */
export async function assertOutputDir(outputDir: string): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(outputDir)).isDirectory();
  } catch (error) {
    throw new FatalError('output-dir', `Target directory ${outputDir} does not exist! Aborting...`, { cause: error });
  }
  if (!isDirectory) {
    throw new FatalError('output-dir', `Target ${outputDir} is not a directory! Aborting...`);
  }
}

/**
 * Check whether anything (file or directory) exists at a path.
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Download one entry and record the outcome on it.
 * Never throws; problems become log lines and a failed status.
 */
async function downloadEntry(entry: ManifestEntry, outputDir: string, dryRun: boolean): Promise<LogLine[]> {
  const log: LogLine[] = [];

  if (entry.sourceUrl === '') {
    entry.status = 'failed';
    log.push({ level: 'error', message: `Empty URL for ${entry.filename}. Ignoring...` });
    return log;
  }

  const target = path.join(outputDir, entry.filename);
  entry.localPath = target;

  if (dryRun) {
    log.push({ level: 'info', message: `${target}:  <--- ${entry.sourceUrl}` });
    return log;
  }

  if (await pathExists(target)) {
    entry.status = 'skipped';
    log.push({ level: 'info', message: `File ${target} already exists! Ignoring...` });
    return log;
  }

  log.push({ level: 'info', message: `Downloading: ${entry.sourceUrl}` });
  let bytes: Buffer;
  try {
    bytes = await fetchResource(entry.sourceUrl);
  } catch (error) {
    entry.status = 'failed';
    log.push({ level: 'error', message: `Error downloading ${entry.sourceUrl}: ${errorMessage(error)}` });
    return log;
  }

  inFlight.add(target);
  try {
    // wx: never replace a file that appeared while fetching
    await fs.writeFile(target, bytes, { flag: 'wx' });
    entry.status = 'success';
    log.push({ level: 'info', message: 'Done...' });
  } catch (error) {
    entry.status = 'failed';
    log.push({ level: 'error', message: `Error downloading ${entry.sourceUrl}: ${errorMessage(error)}` });
    // EEXIST: the file belongs to someone else; anything else leaves a partial chapter behind
    if (!isAlreadyExists(error)) {
      try {
        await fs.rm(target, { force: true });
      } catch (rmError) {
        log.push({ level: 'error', message: `Error removing ${target}: ${errorMessage(rmError)}` });
      }
    }
  } finally {
    inFlight.delete(target);
  }

  return log;
}

/**
 * Download every chapter of a manifest.
 *
 * Entries are updated in place (`status`, `localPath`). With a concurrency
 * above 1 the fetches overlap, but log output still follows manifest order.
 *
 * @param manifest - Chapters to download
 * @param outputDir - Existing directory to save into
 * @param options - Dry run and concurrency settings
 * @returns Counts per outcome and, for dry runs, the planned downloads
 * @throws {FatalError} If the output directory does not exist (before any fetch)
 */
export async function downloadAll(
  manifest: Manifest,
  outputDir: string,
  options: DownloadOptions = {},
): Promise<DownloadSummary> {
  const { dryRun = false, concurrency = DEFAULT_CONCURRENCY } = options;

  await assertOutputDir(outputDir);

  const entries = [...manifest.values()];
  const reports: (LogLine[] | undefined)[] = new Array(entries.length);
  let nextReport = 0;

  const flushReports = () => {
    while (nextReport < entries.length) {
      const report = reports[nextReport];
      if (!report) return;
      for (const { level, message } of report) {
        const line = `  [${nextReport + 1}/${entries.length}] ${message}`;
        if (level === 'error') console.error(line);
        else console.log(line);
      }
      nextReport++;
    }
  };

  const limit = pLimit(Math.max(1, concurrency));
  await Promise.all(
    entries.map((entry, index) =>
      limit(async () => {
        reports[index] = await downloadEntry(entry, outputDir, dryRun);
        flushReports();
      }),
    ),
  );

  const summary: DownloadSummary = { success: 0, failed: 0, skipped: 0, planned: [] };
  for (const entry of entries) {
    if (entry.status === 'success') summary.success++;
    else if (entry.status === 'failed') summary.failed++;
    else if (entry.status === 'skipped') summary.skipped++;
    else if (dryRun && entry.localPath) summary.planned.push({ path: entry.localPath, url: entry.sourceUrl });
  }
  return summary;
}
