/**
 * Match phase - gives every content file its sidecar under the canonical
 * name, recovering it from a differently named sidecar where one exists.
 *
 * Lookup order, first hit wins:
 *   1. canonical name already present
 *   2. `<base>.*.supplemental-metadata.json` (several hits: report, rename none)
 *   3. legacy truncated `<base minus last char>.json`
 *   4. `<name>.supplemental-meta.json`, `-metadat`, `.supplem`
 *
 * Only the content file's own directory is searched.
 */

import { join } from 'path';
import {
  abbreviatedSidecarNames,
  canonicalSidecarName,
  legacyTruncatedName,
  sidecarPattern
} from '../core/sidecarNames.js';
import { isApplied } from '../fs/renameExecutor.js';
import { logger } from '../logger.js';
import type { FileEntry, MatchOutcome, MatchResult, PhaseName, PhaseSummary } from '../types.js';
import { errorMessage } from '../utils.js';
import { emptySummary, issue, type PhaseContext, type PhaseHandler } from './types.js';

export class MatchPhase implements PhaseHandler {
  readonly name: PhaseName = 'match';
  readonly title = 'Matching sidecars to content files';

  async execute(context: PhaseContext): Promise<PhaseSummary> {
    const summary: PhaseSummary = { ...emptySummary(this.name), matches: [] };
    const contents = (await context.tree.walk()).filter(entry => entry.kind === 'content');

    for (const entry of contents) {
      summary.processed++;
      try {
        const outcome = await this.matchContentFile(entry, context);
        summary.matches?.push(outcome);
        if (outcome.renamed) {
          summary.renamed++;
        }
        if (outcome.result === 'MultipleCandidatesFound') {
          summary.warnings.push(issue(entry.path, `Ambiguous sidecars: ${(outcome.candidates ?? []).join(', ')}`));
        } else if (outcome.source && !outcome.renamed) {
          summary.warnings.push(issue(entry.path, `Could not move ${outcome.source} to ${outcome.canonical}`));
        }
      } catch (error) {
        logger.error('Failed to match sidecar', { path: entry.path, error: errorMessage(error) });
        summary.errors.push(issue(entry.path, errorMessage(error)));
      }
    }

    return summary;
  }

  async matchContentFile(entry: FileEntry, { tree, renamer }: PhaseContext): Promise<MatchOutcome> {
    const canonical = join(entry.dir, canonicalSidecarName(entry.name));
    const outcome = (result: MatchResult, extra: Partial<MatchOutcome> = {}): MatchOutcome => ({
      content: entry.path,
      canonical,
      result,
      renamed: false,
      ...extra
    });

    const siblings = await tree.listDir(entry.dir);
    const present = new Set(siblings.map(sibling => sibling.path));

    if (present.has(canonical)) {
      logger.debug('Sidecar already canonical', { path: canonical });
      return outcome('AlreadyCorrect');
    }

    const adopt = async (source: string, result: MatchResult): Promise<MatchOutcome> => {
      const action = await renamer.move(source, canonical, this.name, result);
      return outcome(result, { source, renamed: isApplied(action) });
    };

    // A sidecar already carrying another content file's canonical name belongs to that file.
    const claimed = new Set(
      siblings
        .filter(sibling => sibling.kind === 'content')
        .map(sibling => join(sibling.dir, canonicalSidecarName(sibling.name)))
    );
    const pattern = sidecarPattern(entry.name);
    const candidates = siblings
      .filter(sibling => sibling.kind === 'sidecar' && pattern.test(sibling.name) && !claimed.has(sibling.path))
      .map(sibling => sibling.path);

    if (candidates.length > 1) {
      logger.warn('Multiple sidecar candidates, leaving all in place', { content: entry.path, candidates });
      return outcome('MultipleCandidatesFound', { candidates });
    }
    if (candidates.length === 1) {
      return adopt(candidates[0], 'UniqueCandidateFound');
    }

    const legacy = legacyTruncatedName(entry.name);
    if (legacy && present.has(join(entry.dir, legacy))) {
      return adopt(join(entry.dir, legacy), 'LegacyTruncatedMatch');
    }

    for (const name of abbreviatedSidecarNames(entry.name)) {
      const source = join(entry.dir, name);
      if (present.has(source)) {
        return adopt(source, 'AbbreviatedSuffixMatch');
      }
    }

    logger.info('No sidecar found', { content: entry.path });
    return outcome('NoMatchFound');
  }
}
