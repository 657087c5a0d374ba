import type { RunSummary } from '../types.js';

/**
 * Process exit codes. Stable: scripts wrapping the CLI depend on them.
 */
export const EXIT_CODES = {
  SUCCESS: 0,                 // Every phase finished without per-file errors
  RUN_FAILURE: 1,             // At least one file failed, or embedding failed
  INVALID_USAGE: 2,           // Bad flags, extra arguments, missing target directory
  CAPABILITY_UNAVAILABLE: 3   // Format detector or embedder cannot be run
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

/**
 * Errors that end the run before any file is touched.
 */
export class ReconcileError extends Error {
  constructor(message: string, readonly exitCode: ExitCode) {
    super(message);
    this.name = new.target.name;
  }
}

export class UsageError extends ReconcileError {
  constructor(message: string) {
    super(message, EXIT_CODES.INVALID_USAGE);
  }
}

export class CapabilityUnavailableError extends ReconcileError {
  constructor(message: string) {
    super(message, EXIT_CODES.CAPABILITY_UNAVAILABLE);
  }
}

export interface IssueCounts {
  warnings: number;
  errors: number;
}

export function countIssues(summary: RunSummary): IssueCounts {
  return summary.phases.reduce<IssueCounts>(
    (counts, phase) => ({
      warnings: counts.warnings + phase.warnings.length,
      errors: counts.errors + phase.errors.length
    }),
    { warnings: 0, errors: 0 }
  );
}

/**
 * Warnings are per-item and expected on real exports; only errors fail the run.
 */
export function exitCodeForSummary(summary: RunSummary): ExitCode {
  return countIssues(summary).errors > 0 ? EXIT_CODES.RUN_FAILURE : EXIT_CODES.SUCCESS;
}

export function exitCodeForError(error: unknown): ExitCode {
  return error instanceof ReconcileError ? error.exitCode : EXIT_CODES.RUN_FAILURE;
}
