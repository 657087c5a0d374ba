/**
 * Extensions phase - renames content files whose extension disagrees with
 * the detected encoded format.
 */

import { join } from 'path';
import { extensionForContentType, isTrustedExtension } from '../core/extensionMap.js';
import { isApplied } from '../fs/renameExecutor.js';
import { logger } from '../logger.js';
import type { FileEntry, PhaseName, PhaseSummary } from '../types.js';
import { errorMessage, joinName, splitName } from '../utils.js';
import { emptySummary, issue, type PhaseContext, type PhaseHandler } from './types.js';

export class ExtensionsPhase implements PhaseHandler {
  readonly name: PhaseName = 'extensions';
  readonly title = 'Correcting content file extensions';

  async execute(context: PhaseContext): Promise<PhaseSummary> {
    const summary = emptySummary(this.name);
    const candidates = (await context.tree.walk()).filter(
      entry => entry.kind === 'content' && !isTrustedExtension(splitName(entry.name).extension)
    );

    for (const entry of candidates) {
      summary.processed++;
      try {
        await this.correct(entry, context, summary);
      } catch (error) {
        logger.error('Failed to correct extension', { path: entry.path, error: errorMessage(error) });
        summary.errors.push(issue(entry.path, errorMessage(error)));
      }
    }

    return summary;
  }

  private async correct(entry: FileEntry, { capabilities, renamer }: PhaseContext, summary: PhaseSummary): Promise<void> {
    const contentType = capabilities.detector.detect(entry.path);
    if (!contentType) {
      logger.warn('Could not detect content type, leaving extension', { path: entry.path });
      summary.warnings.push(issue(entry.path, 'Content type not detected'));
      return;
    }

    const mapped = extensionForContentType(contentType);
    if (!mapped) {
      logger.warn('Unknown content type, leaving extension', { path: entry.path, contentType });
      summary.warnings.push(issue(entry.path, `Unknown content type: ${contentType}`));
      return;
    }

    const { base, extension } = splitName(entry.name);
    if (mapped === extension.toLowerCase()) {
      logger.debug('Extension already matches content', { path: entry.path, contentType });
      return;
    }

    const target = join(entry.dir, joinName({ base, extension: mapped }));
    const action = await renamer.move(entry.path, target, this.name, `content type ${contentType}`);
    if (isApplied(action)) {
      summary.renamed++;
    } else if (action.status === 'skipped-exists') {
      summary.warnings.push(issue(entry.path, `Destination already exists: ${target}`));
    }
  }
}
