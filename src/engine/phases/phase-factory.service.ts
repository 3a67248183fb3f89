import { Inject, Injectable } from '@nestjs/common';
import type { Measurement, PhaseType, RulesEngine } from '../../types/index.js';
import { KillHandlerService } from '../combat/kill-handler.service.js';
import { ResolutionPipeline } from '../combat/resolution-pipeline.js';
import { EngineConfigService } from '../engine-config.service.js';
import { EngagementService } from '../geometry/engagement.service.js';
import { MovementValidatorService } from '../geometry/movement-validator.service.js';
import type { DiceFactory } from '../rng/rng.service.js';
import { DICE_FACTORY, MEASUREMENT, RULES_ENGINE } from '../rules/rules.tokens.js';
import { StateDiffService } from '../state/state-diff.service.js';
import { DeploymentPhase } from './deployment-phase.js';
import { FightPhase } from './fight/fight-phase.js';
import type { Phase, PhaseDeps } from './phase.js';
import { RollOffPhase } from './roll-off-phase.js';
import { ScoutPhase } from './scout-phase.js';
import { ShootingPhase } from './shooting-phase.js';

/** Builds a fresh phase object per phase entry; phases hold transient state. */
@Injectable()
export class PhaseFactoryService {
  readonly deps: PhaseDeps;

  constructor(
    config: EngineConfigService,
    applier: StateDiffService,
    @Inject(MEASUREMENT) measurement: Measurement,
    @Inject(RULES_ENGINE) rules: RulesEngine,
    @Inject(DICE_FACTORY) dice: DiceFactory,
    movement: MovementValidatorService,
    engagement: EngagementService,
    pipeline: ResolutionPipeline,
    killHandler: KillHandlerService,
  ) {
    this.deps = { config, applier, measurement, rules, dice, movement, engagement, pipeline, killHandler };
  }

  /** GAME_OVER has no phase object. */
  create(type: PhaseType): Phase | null {
    switch (type) {
      case 'DEPLOYMENT':
        return new DeploymentPhase(this.deps);
      case 'ROLL_OFF':
        return new RollOffPhase(this.deps);
      case 'SCOUT':
        return new ScoutPhase(this.deps);
      case 'SHOOTING':
        return new ShootingPhase(this.deps);
      case 'FIGHT':
        return new FightPhase(this.deps);
      case 'GAME_OVER':
        return null;
    }
  }
}
