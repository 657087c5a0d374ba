/**
 * Phase-related type definitions
 */

import type { Capabilities } from '../capabilities/types.js';
import type { FileTree } from '../fs/fileTree.js';
import type { RenameExecutor } from '../fs/renameExecutor.js';
import type { PhaseIssue, PhaseName, PhaseSummary, ReconcileConfig } from '../types.js';

export interface PhaseContext {
  config: ReconcileConfig;
  tree: FileTree;
  renamer: RenameExecutor;
  capabilities: Capabilities;
}

export interface PhaseHandler {
  readonly name: PhaseName;
  readonly title: string;
  execute(context: PhaseContext): Promise<PhaseSummary>;
}

export function emptySummary(phase: PhaseName): PhaseSummary {
  return { phase, processed: 0, renamed: 0, warnings: [], errors: [] };
}

export function issue(path: string, message: string): PhaseIssue {
  return { path, message };
}
