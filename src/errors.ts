/**
 * Conditions that end the whole run.
 *
 * The core modules throw these instead of exiting; `main()` in index.ts
 * prints the message and exits with code 1.
 */

export type FatalErrorKind =
  | 'unsupported-provider'
  | 'page-fetch'
  | 'output-dir'
  | 'missing-phrase'
  | 'invalid-registry';

export class FatalError extends Error {
  readonly kind: FatalErrorKind;

  constructor(kind: FatalErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalError';
    this.kind = kind;
  }
}

/**
 * Get a printable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
