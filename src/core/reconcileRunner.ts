import type { Capabilities } from '../capabilities/types.js';
import { FileTree } from '../fs/fileTree.js';
import { RenameExecutor } from '../fs/renameExecutor.js';
import { logger } from '../logger.js';
import { PhaseExecutor } from '../phases/executor.js';
import type { ReconcileConfig, RunSummary } from '../types.js';
import { CapabilityUnavailableError } from './exitStatus.js';

/**
 * Runs every enabled phase over one export tree and collects the results.
 */
export class ReconcileRunner {
  constructor(
    private readonly config: ReconcileConfig,
    private readonly capabilities: Capabilities,
    private readonly executor: PhaseExecutor = new PhaseExecutor()
  ) {}

  /**
   * Throws CapabilityUnavailableError when a phase that will run needs a tool
   * that cannot be started. Called before any rename.
   */
  checkCapabilities(): void {
    if (this.config.correctExtensions && !this.capabilities.detector.isAvailable()) {
      throw new CapabilityUnavailableError(
        `Format detector not available (tried "${this.config.exiftoolPath}"). Install exiftool or pass --no-extensions.`
      );
    }
    if (this.config.embedMetadata && !this.config.dryRun && !this.capabilities.embedder.isAvailable()) {
      throw new CapabilityUnavailableError(
        `Metadata embedder not available (tried "${this.config.exiftoolPath}"). Install exiftool or pass --no-embed.`
      );
    }
  }

  async run(): Promise<RunSummary> {
    this.checkCapabilities();

    const ignore = [this.config.logFile, this.config.reportFile].filter(
      (path): path is string => typeof path === 'string'
    );
    const tree = new FileTree(this.config.rootDir, { ignore });
    const renamer = new RenameExecutor(tree, { dryRun: this.config.dryRun });
    const phases = this.executor.phasesFor(this.config);

    logger.info('Starting reconciliation', {
      root: this.config.rootDir,
      dryRun: this.config.dryRun,
      phases: phases.map(phase => phase.name)
    });

    const startedAt = new Date();
    const summaries = await this.executor.executePhases(phases, {
      config: this.config,
      tree,
      renamer,
      capabilities: this.capabilities
    });

    return {
      rootDir: this.config.rootDir,
      dryRun: this.config.dryRun,
      startedAt,
      finishedAt: new Date(),
      phases: summaries,
      actions: [...renamer.actions]
    };
  }
}
