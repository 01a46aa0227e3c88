/**
 * Utility functions for the downloader
 * Extracted for testability
 */

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Download")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: string) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        console.error('Cleanup failed:', error);
      }
    }

    // 128 + signal number: SIGINT = 2, SIGTERM = 15
    const exitCode = signal === 'SIGINT' ? 130 : 143;
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void handler('SIGINT'));
  process.on('SIGTERM', () => void handler('SIGTERM'));
}

// ============================================================================
// Pattern Helpers
// ============================================================================

/**
 * Copy a pattern with the global flag set, so it can be used with matchAll.
 */
function toGlobal(pattern: RegExp): RegExp {
  return pattern.flags.includes('g') ? new RegExp(pattern.source, pattern.flags) : new RegExp(pattern.source, `${pattern.flags}g`);
}

/**
 * Find all non-overlapping matches of a pattern, in order.
 * Yields the first capture group when the pattern has one (empty string if
 * the group did not take part in the match), otherwise the whole match.
 *
 * @param pattern - Pattern to apply; its own global flag is not required
 * @param text - Text to search
 * @returns Captured strings in document order
 *
 * @example
 * findAllCaptures(/<b>(.*?)<\/b>/, '<b>a</b><b>b</b>') // ['a', 'b']
 * findAllCaptures(/\d+/, 'a1b22') // ['1', '22']
 */
export function findAllCaptures(pattern: RegExp, text: string): string[] {
  const results: string[] = [];
  for (const match of text.matchAll(toGlobal(pattern))) {
    results.push(match.length > 1 ? (match[1] ?? '') : match[0]);
  }
  return results;
}

/**
 * Get the capture of the first match of a pattern, or an empty string.
 *
 * @example
 * firstCapture(/href="(.*?)"/, '<a href="x.mp3">') // 'x.mp3'
 * firstCapture(/href="(.*?)"/, '<a>') // ''
 */
export function firstCapture(pattern: RegExp, text: string): string {
  return findAllCaptures(pattern, text)[0] ?? '';
}

/**
 * Left-pad a number with zeros.
 *
 * @example
 * zeroPad(7, 3) // '007'
 * zeroPad(1234, 3) // '1234'
 */
export function zeroPad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--output-dir')
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith('--')) {
      result = args[i + 1];
    }
  }
  return result;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--concurrency')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1]) {
      const parsed = parseInt(args[i + 1], 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get all positional (non-flag) arguments.
 * Skips values that follow flags (e.g., in '--output-dir out', skips 'out').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns Non-flag arguments in order
 */
export function getPositionalArgs(args: string[], knownFlags: string[] = []): string[] {
  const positional: string[] = [];
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }
  return positional;
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @param url - URL string to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: 'URL is required' };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return { isValid: false, error: 'URL must use http or https protocol' };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: 'Invalid URL format' };
  }
}
