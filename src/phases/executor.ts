/**
 * Phase executor - runs phases one after another over the shared tree
 */

import { logger } from '../logger.js';
import type { PhaseSummary, ReconcileConfig } from '../types.js';
import { PhaseRegistry } from './registry.js';
import type { PhaseContext, PhaseHandler } from './types.js';

export class PhaseExecutor {
  constructor(private readonly registry: PhaseRegistry = new PhaseRegistry()) {}

  phasesFor(config: ReconcileConfig): PhaseHandler[] {
    return this.registry.phasesFor(config);
  }

  /**
   * Execute phases strictly in sequence; each awaits the previous one's renames.
   */
  async executePhases(phases: PhaseHandler[], context: PhaseContext): Promise<PhaseSummary[]> {
    const summaries: PhaseSummary[] = [];

    for (let i = 0; i < phases.length; i++) {
      const phase = phases[i];

      if (i > 0) {
        console.log('\n' + '─'.repeat(60) + '\n');
      }

      logger.info(`${phase.title}...`);
      const summary = await phase.execute(context);
      summaries.push(summary);

      logger.info(`✓ ${phase.title} done`, {
        processed: summary.processed,
        renamed: summary.renamed,
        warnings: summary.warnings.length,
        errors: summary.errors.length
      });
    }

    return summaries;
  }
}
