#!/usr/bin/env node
/**
 * Download audiobook chapters: manifest → download → playlist → retag
 *
 * Usage: npm start -- [options] <url...>
 *        npm start -- --search "<phrase>"
 */

import { assertOutputDir, downloadAll, DEFAULT_CONCURRENCY, type DownloadSummary } from './download.js';
import { FatalError } from './errors.js';
import { createManifest } from './manifest.js';
import { writePlaylist } from './playlist.js';
import { listProviders } from './providers.js';
import { formatSearchResults, search } from './search.js';
import { retag } from './tags.js';
import {
  getNumberArg,
  getPositionalArgs,
  getStringArg,
  hasHelpFlag,
  setupSignalHandlers,
  validateUrl,
} from './utils.js';

export const VERSION = '1.0.0';

/**
 * Format duration in milliseconds to human-readable string
 * Exported for testing
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

export interface CliOptions {
  urls: string[];
  outputDir: string;
  dryRun: boolean;
  playlist: boolean;
  noTag: boolean;
  concurrency: number;
  /** Phrase after --search; null when not searching */
  searchPhrase: string | null;
  listSupported: boolean;
  showVersion: boolean;
  showHelp: boolean;
}

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = ['--output-dir', '--concurrency', '--search'];

/**
 * Print usage information.
 */
function showUsage(): void {
  console.log('Usage: npm start -- [options] <url...>');
  console.log('       npm start -- --search <phrase>');
  console.log('');
  console.log('Download audiobook chapters listed on a page, tag them and create a playlist.');
  console.log('');
  console.log('Options:');
  console.log('  --output-dir <dir>   Directory to download into (default: current directory)');
  console.log('  --pls                Create playlist.pls in the output directory');
  console.log('  --no-tag             Do not append chapter titles to the title tag');
  console.log('  --dry-run            Only list files and source URLs, download nothing');
  console.log(`  --concurrency <n>    Chapters downloaded at the same time (default: ${DEFAULT_CONCURRENCY})`);
  console.log('  --search <phrase>    Search supported providers for audiobooks');
  console.log('  --supported          List supported providers');
  console.log('  --version            Show version');
  console.log('  --help, -h           Show this help message');
  console.log('');
  console.log('Example:');
  console.log('  npm start -- --pls --output-dir ./book "https://librivox.org/some-book/"');
}

/**
 * Parse command line arguments from an array
 * Exported for testing
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    urls: getPositionalArgs(args, VALUE_FLAGS),
    outputDir: getStringArg(args, '--output-dir', process.cwd()),
    dryRun: args.includes('--dry-run'),
    playlist: args.includes('--pls'),
    noTag: args.includes('--no-tag'),
    concurrency: getNumberArg(args, '--concurrency', DEFAULT_CONCURRENCY),
    searchPhrase: args.includes('--search') ? getStringArg(args, '--search', '') : null,
    listSupported: args.includes('--supported'),
    showVersion: args.includes('--version'),
    showHelp: hasHelpFlag(args),
  };
}

function printSummary(summary: DownloadSummary, dryRun: boolean): void {
  if (dryRun) {
    console.log(`\nDry run: ${summary.planned.length} file(s) would be downloaded.`);
    return;
  }
  console.log(`\nDownloaded ${summary.success}, skipped ${summary.skipped}, failed ${summary.failed}.`);
}

/**
 * Run the full pipeline for one page URL.
 *
 * @throws {FatalError} On an invalid or unsupported URL, unreadable page or missing output directory
 */
export async function processUrl(url: string, options: CliOptions): Promise<void> {
  const validation = validateUrl(url);
  if (!validation.isValid) {
    throw new FatalError('unsupported-provider', `${validation.error}: ${url}`);
  }

  await assertOutputDir(options.outputDir);

  const start = Date.now();
  console.log(`\nReading chapters from ${url}`);

  const manifest = await createManifest(url);
  console.log(`Found ${manifest.size} chapters.\n`);

  const summary = await downloadAll(manifest, options.outputDir, {
    dryRun: options.dryRun,
    concurrency: options.concurrency,
  });
  printSummary(summary, options.dryRun);

  if (options.playlist) {
    await writePlaylist(manifest, options.outputDir, 'pls', { dryRun: options.dryRun });
  }

  if (!options.noTag && !options.dryRun) {
    await retag(manifest);
  }

  console.log(`\nCompleted in ${formatDuration(Date.now() - start)}`);
}

/**
 * Execute the parsed command line. Fatal conditions are thrown to the caller.
 */
export async function run(options: CliOptions): Promise<void> {
  if (options.showVersion) {
    console.log(VERSION);
  }

  if (options.listSupported) {
    for (const prefix of listProviders()) {
      console.log(prefix);
    }
  }

  if (options.searchPhrase !== null) {
    const results = await search(options.searchPhrase);
    for (const line of formatSearchResults(results)) {
      console.log(line);
    }
    return;
  }

  for (const url of options.urls) {
    await processUrl(url, options);
  }
}

/**
 * Main entry point.
 * Exits with code 1 on fatal errors or when there is nothing to do.
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  const options = parseArgs(args);

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  const hasWork =
    options.urls.length > 0 || options.searchPhrase !== null || options.listSupported || options.showVersion;
  if (!hasWork) {
    showUsage();
    process.exit(1);
  }

  try {
    await run(options);
  } catch (error) {
    if (error instanceof FatalError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Error:', error);
    }
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers('Download');
  void main();
}
