import { Injectable, Logger } from '@nestjs/common';
import type { Action, StateDiff, WorldState } from '../../types/index.js';
import { EngineConfigService } from '../engine-config.service.js';
import { PhaseFactoryService } from '../phases/phase-factory.service.js';
import { InMemoryStateAuthority } from '../state/state-authority.js';
import { StateDiffService } from '../state/state-diff.service.js';
import { PhaseManager } from '../turn/phase-manager.js';

export interface ReplayStep {
  action: Action;
  success: boolean;
  errors: string[];
  changes: StateDiff[];
}

export interface ReplayResult {
  steps: ReplayStep[];
  state: WorldState;
}

/**
 * Resubmits a logged action sequence against a fresh authority. Dice come from
 * the seed and cursor in the world state, so the same inputs give the same diffs.
 */
@Injectable()
export class ReplayService {
  private readonly logger = new Logger(ReplayService.name);

  constructor(
    private readonly phases: PhaseFactoryService,
    private readonly applier: StateDiffService,
    private readonly configService: EngineConfigService,
  ) {}

  /** A fresh session over `initial`, already entered into its first phase. */
  createSession(initial: WorldState): { authority: InMemoryStateAuthority; manager: PhaseManager } {
    const authority = new InMemoryStateAuthority(initial, this.applier);
    const manager = new PhaseManager(authority, this.phases, this.configService);
    manager.start();
    return { authority, manager };
  }

  replay(initial: WorldState, actions: Action[]): ReplayResult {
    const { authority, manager } = this.createSession(initial);
    const steps = actions.map((action, i): ReplayStep => {
      const { result, changes } = manager.submit(action);
      if (!result.success) {
        this.logger.warn(`Replayed action #${i + 1} (${action.type}) was rejected: ${result.errors.join('; ')}`);
      }
      return { action, success: result.success, errors: result.errors, changes };
    });
    return { steps, state: authority.createSnapshot() };
  }
}
