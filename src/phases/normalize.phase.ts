/**
 * Normalize phase - repairs sidecar names with a truncated marker or a
 * counter placed after the marker.
 */

import { join } from 'path';
import {
  hasTrailingCounter,
  repairAbbreviatedName,
  repairMisplacedCounter
} from '../core/sidecarNames.js';
import { isApplied } from '../fs/renameExecutor.js';
import { logger } from '../logger.js';
import type { FileEntry, PhaseName, PhaseSummary } from '../types.js';
import { errorMessage } from '../utils.js';
import { emptySummary, issue, type PhaseContext, type PhaseHandler } from './types.js';

interface RepairPass {
  reason: string;
  repair: (name: string) => string | undefined;
  onUnmatched?: (entry: FileEntry) => void;
}

export class NormalizePhase implements PhaseHandler {
  readonly name: PhaseName = 'normalize';
  readonly title = 'Normalizing sidecar names';

  private readonly passes: RepairPass[] = [
    { reason: 'abbreviated metadata marker', repair: repairAbbreviatedName },
    {
      reason: 'counter after metadata marker',
      repair: repairMisplacedCounter,
      onUnmatched: entry => {
        if (hasTrailingCounter(entry.name)) {
          logger.info('Unhandled counter pattern, leaving sidecar as is', { path: entry.path });
        }
      }
    }
  ];

  async execute(context: PhaseContext): Promise<PhaseSummary> {
    const summary = emptySummary(this.name);
    for (const pass of this.passes) {
      await this.runPass(pass, context, summary);
    }
    return summary;
  }

  private async runPass(pass: RepairPass, { tree, renamer }: PhaseContext, summary: PhaseSummary): Promise<void> {
    // Re-list per pass so the counter pass sees names the abbreviation pass fixed.
    const sidecars = (await tree.walk()).filter(entry => entry.kind === 'sidecar');

    for (const entry of sidecars) {
      const repaired = pass.repair(entry.name);
      if (repaired === undefined) {
        pass.onUnmatched?.(entry);
        continue;
      }

      summary.processed++;
      try {
        const action = await renamer.move(entry.path, join(entry.dir, repaired), this.name, pass.reason);
        if (isApplied(action)) {
          summary.renamed++;
        } else if (action.status === 'skipped-exists') {
          summary.warnings.push(issue(entry.path, `Destination already exists: ${action.to}`));
        }
      } catch (error) {
        logger.error('Failed to normalize sidecar', { path: entry.path, error: errorMessage(error) });
        summary.errors.push(issue(entry.path, errorMessage(error)));
      }
    }
  }
}
