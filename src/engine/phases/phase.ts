// Phase contract shared by every game phase. The orchestrator calls
// validateAction before processAction, then mirrors the accepted diffs into the
// phase through applyLocalChanges. processAction re-checks on its own.

import { Logger } from '@nestjs/common';
import { EngineInvariantError } from '../../common/errors/game-errors.js';
import type {
  Action,
  ActionOf,
  AttackAssignment,
  ActionResult,
  AvailableAction,
  FlowSignal,
  Measurement,
  PhaseType,
  PlayerId,
  ResolutionState,
  ResultMetadata,
  RulesEngine,
  StateDiff,
  ValidationResult,
  WorldState,
} from '../../types/index.js';
import type { ResolutionPipeline } from '../combat/resolution-pipeline.js';
import type { KillHandlerService } from '../combat/kill-handler.service.js';
import type { EngineConfigService } from '../engine-config.service.js';
import type { EngagementService } from '../geometry/engagement.service.js';
import type { MovementValidatorService } from '../geometry/movement-validator.service.js';
import type { DiceFactory } from '../rng/rng.service.js';
import type { StateDiffService } from '../state/state-diff.service.js';
import { StateDraft } from '../state/state-draft.js';
import { getUnit, modelIndex, paths } from '../state/world-queries.js';
import type { TurnContext } from '../turn/turn-context.js';
import type { ActivationRecord } from './fight/activation-sequencer.js';

/** AUTO phases end on a structural condition; MANUAL ones on an END_* action. */
export type PhaseCompletion = 'AUTO' | 'MANUAL';

export interface PhaseEntry {
  complete: boolean;
}

export type ShootingRecord = {
  kind: 'SHOOTING';
  active_unit: string | null;
  assignments: AttackAssignment[];
  resolution: ResolutionState | null;
};

export type FightStep =
  | 'STANCE'
  | 'CHALLENGE_RESPONSE'
  | 'PILE_IN'
  | 'ASSIGN'
  | 'RESOLVING'
  | 'CONSOLIDATE';

export type FightActivation = {
  unit_id: string;
  player: PlayerId;
  step: FightStep;
  challenge_declared: boolean;
  assignments: AttackAssignment[];
  resolution: ResolutionState | null;
};

export type FightRecord = {
  kind: 'FIGHT';
  activation_record: ActivationRecord;
  active: FightActivation | null;
  epic_challenge_used: { '1': boolean; '2': boolean };
  counter_offensive_used: { '1': boolean; '2': boolean };
  last_completed_by: PlayerId | null;
};

/** Transient phase state that survives an in-memory save/restore. */
export type PhaseRecord = ShootingRecord | FightRecord;

export interface Phase {
  readonly type: PhaseType;
  readonly completion: PhaseCompletion;
  enter(snapshot: WorldState, ctx: TurnContext): PhaseEntry;
  validateAction(action: Action, ctx: TurnContext): ValidationResult;
  processAction(action: Action, ctx: TurnContext): ActionResult;
  availableActions(ctx: TurnContext): AvailableAction[];
  shouldCompletePhase(): boolean;
  applyLocalChanges(diffs: StateDiff[]): void;
  exit(): void;
  exportState(): PhaseRecord | null;
  restoreState(record: PhaseRecord, snapshot: WorldState, ctx: TurnContext): void;
  readonly snapshot: WorldState;
}

/** Services a phase composes; wired by PhaseFactoryService. */
export interface PhaseDeps {
  config: EngineConfigService;
  applier: StateDiffService;
  measurement: Measurement;
  rules: RulesEngine;
  dice: DiceFactory;
  movement: MovementValidatorService;
  engagement: EngagementService;
  pipeline: ResolutionPipeline;
  killHandler: KillHandlerService;
}

export function valid(): ValidationResult {
  return { valid: true, errors: [] };
}

export function validation(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

export function succeed(
  changes: StateDiff[],
  metadata: ResultMetadata = {},
  flow: FlowSignal = { kind: 'CONTINUE' },
): ActionResult {
  return { success: true, changes, errors: [], flow, metadata };
}

export function failed(errors: string | string[]): ActionResult {
  const list = Array.isArray(errors) ? errors : [errors];
  return {
    success: false,
    changes: [],
    error: list[0],
    errors: list,
    flow: { kind: 'CONTINUE' },
    metadata: {},
  };
}

/** Result that ends a MANUAL phase. */
export function phaseComplete(changes: StateDiff[] = []): ActionResult {
  return succeed(changes, { phase_complete: true }, { kind: 'COMPLETE' });
}

/**
 * Universal pre-check ahead of phase rules. Returns null when the action is not
 * an override and phase validation should run.
 */
export function validateWithOverrides(
  action: Action,
  ctx: TurnContext,
  state: WorldState,
  deps: Pick<PhaseDeps, 'config'>,
): ValidationResult | null {
  switch (action.type) {
    case 'TOGGLE_DEBUG_MODE':
      return deps.config.get().debugModeAllowed
        ? valid()
        : validation(['Debug mode is disabled on this server']);
    case 'DEBUG_MOVE':
      return validation(validateDebugMove(action, ctx, state));
    default:
      return null;
  }
}

function validateDebugMove(
  action: ActionOf<'DEBUG_MOVE'>,
  ctx: TurnContext,
  state: WorldState,
): string[] {
  if (!ctx.debugMode) return ['Debug mode is not active'];
  const unit = getUnit(state, action.unit_id);
  if (!unit) return [`Unknown unit ${action.unit_id}`];
  const errors: string[] = [];
  const model = unit.models.find((m) => m.id === action.model_id);
  if (!model || !model.alive) {
    errors.push(`Model ${action.model_id} is not an alive model of ${unit.id}`);
  }
  const { x, y } = action.position;
  if (x < 0 || y < 0 || x > state.board.width || y > state.board.height) {
    errors.push('Position is outside the battlefield');
  }
  return errors;
}

/**
 * Common plumbing: override handling, the local mirror, and logging of failed
 * processing. Concrete phases supply the phase rules.
 */
export abstract class BasePhase implements Phase {
  abstract readonly type: PhaseType;
  abstract readonly completion: PhaseCompletion;
  protected readonly logger: Logger;
  private mirror: WorldState | null = null;

  constructor(protected readonly deps: PhaseDeps) {
    this.logger = new Logger(this.constructor.name);
  }

  get snapshot(): WorldState {
    return this.state;
  }

  protected get state(): WorldState {
    if (!this.mirror) throw new EngineInvariantError(`${this.type} phase has not been entered`);
    return this.mirror;
  }

  enter(snapshot: WorldState, ctx: TurnContext): PhaseEntry {
    this.mirror = structuredClone(snapshot);
    return { complete: this.onEnter(ctx) };
  }

  validateAction(action: Action, ctx: TurnContext): ValidationResult {
    const override = validateWithOverrides(action, ctx, this.state, this.deps);
    if (override) return override;
    return validation(this.validatePhaseAction(action, ctx));
  }

  /** Fails closed: an action that does not validate against the current state produces no diffs. */
  processAction(action: Action, ctx: TurnContext): ActionResult {
    const check = this.validateAction(action, ctx);
    const result = !check.valid
      ? failed(check.errors)
      : action.type === 'TOGGLE_DEBUG_MODE' || action.type === 'DEBUG_MOVE'
        ? this.processOverride(action)
        : this.processPhaseAction(action, ctx);
    if (!result.success) {
      this.logger.warn(`${action.type} from player ${action.player} failed: ${result.errors.join('; ')}`);
    }
    return result;
  }

  applyLocalChanges(diffs: StateDiff[]): void {
    if (diffs.length === 0) return;
    this.mirror = this.deps.applier.apply(this.state, diffs);
  }

  shouldCompletePhase(): boolean {
    return false;
  }

  exit(): void {}

  exportState(): PhaseRecord | null {
    return null;
  }

  restoreState(_record: PhaseRecord, snapshot: WorldState, _ctx: TurnContext): void {
    this.mirror = structuredClone(snapshot);
  }

  /** Working copy seeded from the mirror. */
  protected draft(): StateDraft {
    return new StateDraft(this.state, this.deps.applier);
  }

  /** Returns true when there is nothing to do in this phase. */
  protected abstract onEnter(ctx: TurnContext): boolean;
  protected abstract validatePhaseAction(action: Action, ctx: TurnContext): string[];
  protected abstract processPhaseAction(action: Action, ctx: TurnContext): ActionResult;
  abstract availableActions(ctx: TurnContext): AvailableAction[];

  private processOverride(
    action: ActionOf<'TOGGLE_DEBUG_MODE'> | ActionOf<'DEBUG_MOVE'>,
  ): ActionResult {
    if (action.type === 'TOGGLE_DEBUG_MODE') {
      return succeed([{ op: 'set', path: 'meta.debug_mode', value: action.enabled }], {
        log: [`Debug mode ${action.enabled ? 'enabled' : 'disabled'} by player ${action.player}`],
      });
    }
    const unit = getUnit(this.state, action.unit_id);
    const index = unit ? modelIndex(unit, action.model_id) : -1;
    if (index === -1) return failed(`Model ${action.model_id} no longer exists`);
    return succeed([
      {
        op: 'set',
        path: paths.modelField(action.unit_id, index, 'position'),
        value: { ...action.position },
      },
    ]);
  }
}
