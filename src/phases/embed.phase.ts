/**
 * Embed phase - hands the reconciled tree to the metadata embedder.
 */

import { logger } from '../logger.js';
import type { PhaseName, PhaseSummary } from '../types.js';
import { emptySummary, issue, type PhaseContext, type PhaseHandler } from './types.js';

export class EmbedPhase implements PhaseHandler {
  readonly name: PhaseName = 'embed';
  readonly title = 'Embedding sidecar metadata';

  async execute({ config, capabilities }: PhaseContext): Promise<PhaseSummary> {
    const summary = emptySummary(this.name);
    const request = { rootDir: config.rootDir, excludeSubstring: config.excludeSubstring };

    if (config.dryRun) {
      logger.info(`Would embed sidecar metadata under ${config.rootDir}`, { exclude: config.excludeSubstring });
      return summary;
    }

    summary.processed = 1;
    const result = capabilities.embedder.embed(request);
    if (!result.ok) {
      logger.error('Metadata embedding failed', { root: config.rootDir, output: result.output });
      summary.errors.push(issue(config.rootDir, result.output || 'embedder reported failure'));
      return summary;
    }

    logger.debug('Embedder output', { output: result.output });
    logger.success('Embedded sidecar metadata', { root: config.rootDir });
    return summary;
  }
}
