import type { Action, WorldState } from '../../types/index.js';
import { KillHandlerService } from '../combat/kill-handler.service.js';
import { ResolutionPipeline } from '../combat/resolution-pipeline.js';
import { EngagementService } from '../geometry/engagement.service.js';
import { MeasurementService } from '../geometry/measurement.service.js';
import { MovementValidatorService } from '../geometry/movement-validator.service.js';
import { PhaseFactoryService } from '../phases/phase-factory.service.js';
import type { Phase, PhaseDeps } from '../phases/phase.js';
import { StateDiffService } from '../state/state-diff.service.js';
import { contextFrom } from '../turn/turn-context.js';
import type { TurnContext } from '../turn/turn-context.js';
import { FakeRulesEngine } from './fake-rules-engine.js';
import { ScriptedDiceFactory } from './scripted-dice.js';
import { testConfig } from './fixtures.js';

export interface TestDeps extends PhaseDeps {
  rules: FakeRulesEngine;
  dice: ScriptedDiceFactory;
}

/** Real geometry and pipeline over the fake rules engine and scripted dice. */
export function makePhaseDeps(rolls: number[] = []): TestDeps {
  const config = testConfig();
  const measurement = new MeasurementService(config);
  const rules = new FakeRulesEngine();
  const dice = new ScriptedDiceFactory(rolls);
  const killHandler = new KillHandlerService(rules, measurement, config);
  return {
    config,
    applier: new StateDiffService(),
    measurement,
    rules,
    dice,
    movement: new MovementValidatorService(measurement, config),
    engagement: new EngagementService(measurement),
    pipeline: new ResolutionPipeline(rules, dice, killHandler),
    killHandler,
  };
}

export function makePhaseFactory(deps: PhaseDeps): PhaseFactoryService {
  return new PhaseFactoryService(
    deps.config,
    deps.applier,
    deps.measurement,
    deps.rules,
    deps.dice,
    deps.movement,
    deps.engagement,
    deps.pipeline,
    deps.killHandler,
  );
}

/**
 * Drives a phase the way the orchestrator does: validate, process, then mirror
 * accepted diffs back into the phase and the test's own world copy.
 */
export class PhaseHarness<P extends Phase> {
  state: WorldState;

  constructor(
    readonly phase: P,
    initial: WorldState,
    private readonly deps: PhaseDeps,
  ) {
    this.state = structuredClone(initial);
  }

  get ctx(): TurnContext {
    return contextFrom(this.state);
  }

  enter() {
    return this.phase.enter(this.state, this.ctx);
  }

  validate(action: Action) {
    return this.phase.validateAction(action, this.ctx);
  }

  /** Throws on a validation failure so specs fail at the offending step. */
  submit(action: Action) {
    const validation = this.phase.validateAction(action, this.ctx);
    if (!validation.valid) {
      throw new Error(`${action.type} rejected: ${validation.errors.join('; ')}`);
    }
    const result = this.phase.processAction(action, this.ctx);
    if (result.success) {
      this.state = this.deps.applier.apply(this.state, result.changes);
      this.phase.applyLocalChanges(result.changes);
    }
    return result;
  }
}
