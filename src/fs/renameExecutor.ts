import { rename } from 'fs/promises';
import { resolve } from 'path';
import type { PhaseName, RenameAction } from '../types.js';
import { FileTree } from './fileTree.js';
import { logger } from '../logger.js';

export interface RenameExecutorOptions {
  dryRun: boolean;
}

/**
 * Single place where the tree is mutated. Never overwrites: a destination
 * that already exists leaves the source where it is.
 */
export class RenameExecutor {
  private readonly history: RenameAction[] = [];

  constructor(
    private readonly tree: FileTree,
    private readonly options: RenameExecutorOptions
  ) {}

  get dryRun(): boolean {
    return this.options.dryRun;
  }

  get actions(): readonly RenameAction[] {
    return this.history;
  }

  async move(from: string, to: string, phase: PhaseName, reason: string): Promise<RenameAction> {
    const source = resolve(from);
    const destination = resolve(to);
    const action: RenameAction = { from: source, to: destination, status: 'unchanged', phase, reason };

    if (source === destination) {
      logger.debug('Rename is a no-op', { path: source });
      return this.record(action);
    }

    if (await this.tree.exists(destination)) {
      logger.warn('Destination already exists, not renaming', { from: source, to: destination, phase });
      return this.record({ ...action, status: 'skipped-exists' });
    }

    if (this.options.dryRun) {
      this.tree.recordVirtualMove(source, destination);
      logger.info(`Would rename: ${source} -> ${destination}`, { phase, reason });
      return this.record({ ...action, status: 'planned' });
    }

    await rename(source, destination);
    logger.info(`Renamed: ${source} -> ${destination}`, { phase, reason });
    return this.record({ ...action, status: 'renamed' });
  }

  private record(action: RenameAction): RenameAction {
    this.history.push(action);
    return action;
  }
}

export function isApplied(action: RenameAction): boolean {
  return action.status === 'renamed' || action.status === 'planned';
}
