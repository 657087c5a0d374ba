#!/usr/bin/env node
/**
 * Export sidecar reconciler - CLI Entry Point
 */

import { ExifTool } from './capabilities/exiftool.js';
import { showHelp } from './cli/help.js';
import { countIssues, exitCodeForError, exitCodeForSummary, UsageError } from './core/exitStatus.js';
import { ReconcileRunner } from './core/reconcileRunner.js';
import { writeRunReport } from './core/runReport.js';
import { isApplied } from './fs/renameExecutor.js';
import { logger } from './logger.js';
import type { ReconcileConfig } from './types.js';
import { buildConfig, loadEnvironment, parseArgs } from './util/config.js';
import { errorMessage } from './utils.js';

async function main() {
  const env = loadEnvironment();
  const flags = parseArgs(process.argv.slice(2));

  if (flags.help) {
    showHelp();
    process.exit(0);
  }

  let config: ReconcileConfig;
  try {
    config = buildConfig(env, flags);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}\n`);
    if (error instanceof UsageError) {
      showHelp();
    }
    process.exit(exitCodeForError(error));
  }

  logger.setDebug(config.debug);
  logger.setLogFile(config.logFile);

  const exiftool = new ExifTool(config.exiftoolPath);
  const runner = new ReconcileRunner(config, { detector: exiftool, embedder: exiftool });

  try {
    const summary = await runner.run();
    if (config.reportFile) {
      await writeRunReport(config.reportFile, summary);
    }

    const { warnings, errors } = countIssues(summary);
    const verb = summary.dryRun ? 'would be renamed' : 'renamed';
    const planned = summary.actions.filter(isApplied).length;
    logger.success(`Reconciliation finished: ${planned} file(s) ${verb}`, { warnings, errors });

    process.exit(exitCodeForSummary(summary));
  } catch (error) {
    logger.error('Reconciliation failed', { error: errorMessage(error) });
    process.exit(exitCodeForError(error));
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected failure:', errorMessage(error));
  process.exit(1);
});
