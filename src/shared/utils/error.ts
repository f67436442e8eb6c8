/**
 * Error handling utilities
 */

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fatal run-level failure (working directory, output file).
 * The CLI aborts the whole run when this is thrown.
 */
export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SetupError';
  }
}

/** Why a single package was skipped. */
export type PackageFailureReason =
  | 'input-not-found'
  | 'extraction-failed'
  | 'manifest-not-found'
  | 'manifest-unreadable'
  | 'manifest-malformed';

/**
 * Per-package failure. The batch reports it and moves on to the next input.
 */
export class PackageAnalysisError extends Error {
  readonly reason: PackageFailureReason;

  constructor(reason: PackageFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PackageAnalysisError';
    this.reason = reason;
  }
}
