/**
 * Type definitions for export sidecar reconciliation
 */

// ============================================================================
// Configuration Types
// ============================================================================

export interface ReconcileConfig {
  rootDir: string; // absolute path of the export tree
  dryRun: boolean;
  correctExtensions: boolean; // false disables the extension phase
  embedMetadata: boolean; // false skips the final exiftool pass
  excludeSubstring: string; // names containing this are left out of embedding
  exiftoolPath: string;
  logFile?: string; // persistent JSON-lines diagnostic log
  reportFile?: string; // YAML run report
  debug: boolean;
}

// ============================================================================
// Core Domain Types
// ============================================================================

export type FileKind = 'sidecar' | 'content';

export interface FileEntry {
  path: string;
  dir: string;
  name: string;
  kind: FileKind;
}

/**
 * A filename split at its last dot. `extension` excludes the dot and is empty
 * when the name has none.
 */
export interface NameParts {
  base: string;
  extension: string;
}

export const MATCH_RESULTS = [
  'AlreadyCorrect',
  'UniqueCandidateFound',
  'MultipleCandidatesFound',
  'LegacyTruncatedMatch',
  'AbbreviatedSuffixMatch',
  'NoMatchFound'
] as const;

export type MatchResult = typeof MATCH_RESULTS[number];

export interface MatchOutcome {
  content: string;
  result: MatchResult;
  canonical: string;
  source?: string; // sidecar that was (or would be) renamed
  candidates?: string[]; // every candidate when ambiguous
  renamed: boolean;
}

// ============================================================================
// Rename Types
// ============================================================================

export type RenameStatus =
  | 'renamed' // moved on disk
  | 'planned' // dry-run: would move
  | 'unchanged' // source equals destination
  | 'skipped-exists'; // destination already taken

export interface RenameAction {
  from: string;
  to: string;
  status: RenameStatus;
  phase: PhaseName;
  reason: string;
}

// ============================================================================
// Phase Types
// ============================================================================

export type PhaseName = 'normalize' | 'extensions' | 'match' | 'embed';

export interface PhaseIssue {
  path: string;
  message: string;
}

export interface PhaseSummary {
  phase: PhaseName;
  processed: number;
  renamed: number;
  warnings: PhaseIssue[];
  errors: PhaseIssue[];
  matches?: MatchOutcome[]; // match phase only
}

export interface RunSummary {
  rootDir: string;
  dryRun: boolean;
  startedAt: Date;
  finishedAt: Date;
  phases: PhaseSummary[];
  actions: RenameAction[];
}
