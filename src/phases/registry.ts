/**
 * Phase registry - maps phase names to handlers, in execution order
 */

import type { PhaseName, ReconcileConfig } from '../types.js';
import { EmbedPhase } from './embed.phase.js';
import { ExtensionsPhase } from './extensions.phase.js';
import { MatchPhase } from './match.phase.js';
import { NormalizePhase } from './normalize.phase.js';
import type { PhaseHandler } from './types.js';

export class PhaseRegistry {
  private handlers: Map<PhaseName, PhaseHandler>;

  constructor() {
    // Insertion order is execution order; later phases read what earlier ones renamed.
    this.handlers = new Map<PhaseName, PhaseHandler>([
      ['normalize', new NormalizePhase()],
      ['extensions', new ExtensionsPhase()],
      ['match', new MatchPhase()],
      ['embed', new EmbedPhase()]
    ]);
  }

  getHandler(name: PhaseName): PhaseHandler | undefined {
    return this.handlers.get(name);
  }

  getPhaseNames(): PhaseName[] {
    return Array.from(this.handlers.keys());
  }

  /**
   * Phases enabled by the configuration, in execution order.
   */
  phasesFor(config: ReconcileConfig): PhaseHandler[] {
    return Array.from(this.handlers.values()).filter(handler => {
      if (handler.name === 'extensions') return config.correctExtensions;
      if (handler.name === 'embed') return config.embedMetadata;
      return true;
    });
  }
}
