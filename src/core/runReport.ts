import { stringify } from 'yaml';
import { atomicWriteFile } from '../fs/atomicWriter.js';
import { logger } from '../logger.js';
import type { MatchResult, PhaseIssue, PhaseName, RenameAction, RunSummary } from '../types.js';

export interface PhaseReportEntry {
  phase: PhaseName;
  processed: number;
  renamed: number;
  warnings: number;
  errors: number;
}

export interface PhaseReportIssue extends PhaseIssue {
  phase: PhaseName;
}

export interface RunReport {
  root: string;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string;
  phases: PhaseReportEntry[];
  matchResults: Record<MatchResult, number>;
  actions: RenameAction[];
  warnings: PhaseReportIssue[];
  errors: PhaseReportIssue[];
}

export function tallyMatchResults(summary: RunSummary): Record<MatchResult, number> {
  const tally: Record<MatchResult, number> = {
    AlreadyCorrect: 0,
    UniqueCandidateFound: 0,
    MultipleCandidatesFound: 0,
    LegacyTruncatedMatch: 0,
    AbbreviatedSuffixMatch: 0,
    NoMatchFound: 0
  };
  for (const phase of summary.phases) {
    for (const match of phase.matches ?? []) {
      tally[match.result]++;
    }
  }
  return tally;
}

export function buildRunReport(summary: RunSummary): RunReport {
  return {
    root: summary.rootDir,
    dryRun: summary.dryRun,
    startedAt: summary.startedAt.toISOString(),
    finishedAt: summary.finishedAt.toISOString(),
    phases: summary.phases.map(phase => ({
      phase: phase.phase,
      processed: phase.processed,
      renamed: phase.renamed,
      warnings: phase.warnings.length,
      errors: phase.errors.length
    })),
    matchResults: tallyMatchResults(summary),
    actions: summary.actions,
    warnings: summary.phases.flatMap(phase => phase.warnings.map(w => ({ phase: phase.phase, ...w }))),
    errors: summary.phases.flatMap(phase => phase.errors.map(e => ({ phase: phase.phase, ...e })))
  };
}

export async function writeRunReport(filePath: string, summary: RunSummary): Promise<void> {
  await atomicWriteFile(filePath, stringify(buildRunReport(summary)));
  logger.info('Run report written', { path: filePath });
}
