import type {
  Action,
  ActionOf,
  ActionResult,
  AttackAssignment,
  AvailableAction,
  PlayerId,
  ResolutionState,
  Unit,
  WorldState,
} from '../../types/index.js';
import { mergeAssignments, toAssignment } from '../combat/attack-assignments.js';
import { createResolution, remainingWeapons } from '../combat/resolution-pipeline.js';
import type { PipelineStep } from '../combat/resolution-pipeline.js';
import type { StateDraft } from '../state/state-draft.js';
import {
  aliveModels,
  getUnit,
  isDestroyed,
  isOnBoard,
  otherPlayer,
  paths,
  unitsOf,
} from '../state/world-queries.js';
import type { TurnContext } from '../turn/turn-context.js';
import { BasePhase, failed, phaseComplete, succeed } from './phase.js';
import type { PhaseCompletion, PhaseRecord, ShootingRecord } from './phase.js';

/**
 * The active player picks shooters one at a time in any order:
 * select → assign targets → confirm → resolve (with save pauses) → done.
 */
export class ShootingPhase extends BasePhase {
  readonly type = 'SHOOTING' as const;
  readonly completion: PhaseCompletion = 'MANUAL';

  private activeUnit: string | null = null;
  private assignments: AttackAssignment[] = [];
  private resolution: ResolutionState | null = null;

  protected onEnter(ctx: TurnContext): boolean {
    this.clearActivation();
    const shooters = this.eligibleShooters(ctx.activePlayer);
    this.logger.log(`Shooting phase: ${shooters.length} eligible shooters for player ${ctx.activePlayer}`);
    return shooters.length === 0;
  }

  /** Shooter that has not fired, is out of combat and can see a target. */
  shooterError(unit: Unit, state: WorldState = this.state): string | null {
    if (!isOnBoard(unit)) return `Unit ${unit.id} is not on the battlefield`;
    if (unit.effects.has_shot) return `Unit ${unit.id} has already shot this phase`;
    if (!unit.meta.weapons.some((id) => this.deps.rules.getWeaponProfile(id)?.type === 'RANGED')) {
      return `Unit ${unit.id} has no ranged weapons`;
    }
    if (this.deps.engagement.isInCombat(unit, state)) {
      return `Unit ${unit.id} is within engagement range and cannot shoot`;
    }
    if (this.deps.rules.getEligibleTargets(unit.id, state, 'SHOOTING').length === 0) {
      return `Unit ${unit.id} has no eligible targets`;
    }
    return null;
  }

  private eligibleShooters(player: PlayerId): Unit[] {
    return unitsOf(this.state, player).filter((u) => this.shooterError(u) === null);
  }

  // --- validation ---

  protected validatePhaseAction(action: Action, ctx: TurnContext): string[] {
    switch (action.type) {
      case 'SELECT_SHOOTER':
        return this.validateSelect(action, ctx);
      case 'ASSIGN_TARGET':
        return this.validateAssign(action);
      case 'CLEAR_ASSIGNMENTS':
        return this.beforeConfirm(action.unit_id, action.player);
      case 'CONFIRM_TARGETS': {
        const errors = this.beforeConfirm(action.unit_id, action.player);
        if (errors.length === 0 && this.assignments.length === 0) {
          errors.push('No targets have been assigned');
        }
        return errors;
      }
      case 'RESOLVE_SHOOTING': {
        const errors = this.activeErrors(action.unit_id, action.player);
        const res = this.resolution;
        if (errors.length > 0) return errors;
        if (!res) return ['Targets have not been confirmed'];
        if (res.mode !== null) return ['The weapon order has already been chosen'];
        return this.deps.pipeline.validateWeaponOrder(res, action.weapon_order);
      }
      case 'APPLY_SAVES': {
        const res = this.resolution;
        if (!res) return ['No attacks are awaiting saves'];
        const defender = otherPlayer(res.attacker);
        if (action.player !== defender) return [`Saves are rolled by player ${defender}`];
        return this.deps.pipeline.validateSaves(res, action.save_results);
      }
      case 'CONTINUE_SEQUENCE': {
        const errors = this.activeErrors(action.unit_id, action.player);
        if (errors.length > 0) return errors;
        if (!this.resolution) return ['Nothing is resolving'];
        return this.deps.pipeline.validateContinue(this.resolution, action.weapon_order);
      }
      case 'SKIP_UNIT':
        return this.validateSkip(action, ctx);
      case 'END_SHOOTING':
        if (action.player !== ctx.activePlayer) {
          return [`Only the active player (${ctx.activePlayer}) can end the shooting phase`];
        }
        return this.resolution?.dice_rolled
          ? [`Unit ${this.resolution.unit_id} must finish shooting first`]
          : [];
      default:
        return [`${action.type} is not allowed in the SHOOTING phase`];
    }
  }

  private validateSelect(action: ActionOf<'SELECT_SHOOTER'>, ctx: TurnContext): string[] {
    if (action.player !== ctx.activePlayer) return [`Player ${ctx.activePlayer} is shooting`];
    if (this.activeUnit) return [`Unit ${this.activeUnit} is already shooting`];
    const unit = getUnit(this.state, action.unit_id);
    if (!unit) return [`Unknown unit ${action.unit_id}`];
    if (unit.owner !== action.player) {
      return [`Unit ${unit.id} does not belong to player ${action.player}`];
    }
    const reason = this.shooterError(unit);
    return reason ? [reason] : [];
  }

  private validateAssign(action: ActionOf<'ASSIGN_TARGET'>): string[] {
    const errors = this.beforeConfirm(action.unit_id, action.player);
    const unit = getUnit(this.state, action.unit_id);
    if (errors.length > 0 || !unit) return errors;

    const profile = this.deps.rules.getWeaponProfile(action.weapon_id);
    if (!unit.meta.weapons.includes(action.weapon_id)) {
      errors.push(`Unit ${unit.id} has no weapon ${action.weapon_id}`);
    } else if (!profile) {
      errors.push(`Unknown weapon ${action.weapon_id}`);
    } else if (profile.type !== 'RANGED') {
      errors.push(`${profile.name} is not a ranged weapon`);
    }
    if (!this.deps.rules.getEligibleTargets(unit.id, this.state, 'SHOOTING').includes(action.target_unit_id)) {
      errors.push(`Unit ${action.target_unit_id} is not an eligible target for ${unit.id}`);
    }
    const alive = new Set(aliveModels(unit).map((m) => m.id));
    for (const id of action.model_ids ?? []) {
      if (!alive.has(id)) errors.push(`Model ${id} is not an alive model of ${unit.id}`);
    }
    return errors;
  }

  private validateSkip(action: ActionOf<'SKIP_UNIT'>, ctx: TurnContext): string[] {
    if (this.activeUnit) {
      if (this.activeUnit !== action.unit_id) return [`Unit ${this.activeUnit} is already shooting`];
      if (action.player !== ctx.activePlayer) return [`Player ${ctx.activePlayer} is shooting`];
      return this.resolution?.dice_rolled
        ? ['A unit cannot be skipped once its dice have been rolled']
        : [];
    }
    return this.validateSelect({ type: 'SELECT_SHOOTER', player: action.player, unit_id: action.unit_id }, ctx);
  }

  private activeErrors(unitId: string, player: PlayerId): string[] {
    if (!this.activeUnit) return ['No unit is shooting'];
    if (this.activeUnit !== unitId) return [`Unit ${unitId} is not the active shooter`];
    const unit = getUnit(this.state, unitId);
    return unit && unit.owner !== player ? [`Unit ${unitId} does not belong to player ${player}`] : [];
  }

  /** Assignments may change only until the targets are confirmed. */
  private beforeConfirm(unitId: string, player: PlayerId): string[] {
    const errors = this.activeErrors(unitId, player);
    if (errors.length === 0 && this.resolution) errors.push('Targets have already been confirmed');
    return errors;
  }

  // --- processing ---

  protected processPhaseAction(action: Action): ActionResult {
    const draft = this.draft();
    switch (action.type) {
      case 'SELECT_SHOOTER':
        this.clearActivation();
        this.activeUnit = action.unit_id;
        return succeed([], { log: [`${action.unit_id} selected to shoot`] });
      case 'ASSIGN_TARGET': {
        const unit = getUnit(this.state, action.unit_id);
        if (!unit) return failed(`Unknown unit ${action.unit_id}`);
        this.assignments = mergeAssignments(this.assignments, [toAssignment(unit, action)]);
        return succeed([]);
      }
      case 'CLEAR_ASSIGNMENTS':
        this.assignments = [];
        return succeed([]);
      case 'CONFIRM_TARGETS': {
        const unit = getUnit(this.state, action.unit_id);
        if (!unit) return failed(`Unknown unit ${action.unit_id}`);
        const res = createResolution(unit.id, unit.owner, 'SHOOTING', this.assignments);
        return this.afterPipeline(this.deps.pipeline.confirm(res, draft), draft);
      }
      case 'RESOLVE_SHOOTING':
        return this.withResolution((res) =>
          this.afterPipeline(this.deps.pipeline.start(res, draft, action.mode, action.weapon_order), draft),
        );
      case 'APPLY_SAVES':
        return this.withResolution((res) =>
          this.afterPipeline(this.deps.pipeline.applySaves(res, draft, action.save_results), draft),
        );
      case 'CONTINUE_SEQUENCE':
        return this.withResolution((res) =>
          this.afterPipeline(this.deps.pipeline.continue(res, draft, action.weapon_order), draft),
        );
      case 'SKIP_UNIT':
        draft.push([{ op: 'set', path: paths.unitEffect(action.unit_id, 'has_shot'), value: true }]);
        this.clearActivation();
        return succeed(draft.changes, { log: [`${action.unit_id} does not shoot`] });
      case 'END_SHOOTING':
        this.clearActivation();
        this.logger.log(`Shooting phase ended by player ${action.player}`);
        return phaseComplete();
      default:
        return failed(`${action.type} is not allowed in the SHOOTING phase`);
    }
  }

  private afterPipeline(step: PipelineStep, draft: StateDraft): ActionResult {
    if (step.rejected) return failed(step.rejected);
    this.resolution = step.resolution;
    if (!step.done) return succeed(draft.changes, step.metadata, step.flow);

    draft.push([{ op: 'set', path: paths.unitEffect(step.resolution.unit_id, 'has_shot'), value: true }]);
    this.logger.debug(`${step.resolution.unit_id} finished shooting`);
    this.clearActivation();
    return succeed(draft.changes, step.metadata);
  }

  private withResolution(fn: (res: ResolutionState) => ActionResult): ActionResult {
    return this.resolution ? fn(this.resolution) : failed('Nothing is resolving');
  }

  private clearActivation(): void {
    this.activeUnit = null;
    this.assignments = [];
    this.resolution = null;
  }

  // --- queries ---

  get activeShooter(): string | null {
    return this.activeUnit;
  }

  availableActions(ctx: TurnContext): AvailableAction[] {
    const player = ctx.activePlayer;
    const unitId = this.activeUnit;
    const end: AvailableAction = { type: 'END_SHOOTING', player, description: 'End the shooting phase' };
    if (!unitId) {
      const select = this.eligibleShooters(player).flatMap((u): AvailableAction[] => [
        { type: 'SELECT_SHOOTER', player, unit_id: u.id, description: `Shoot with ${u.meta.name}` },
        { type: 'SKIP_UNIT', player, unit_id: u.id, description: `Skip ${u.meta.name}` },
      ]);
      return [...select, end];
    }

    const res = this.resolution;
    const skip: AvailableAction = { type: 'SKIP_UNIT', player, unit_id: unitId, description: `Skip ${unitId}` };
    if (!res) {
      const out: AvailableAction[] = [
        { type: 'ASSIGN_TARGET', player, unit_id: unitId, description: 'Assign a weapon to a target' },
      ];
      if (this.assignments.length > 0) {
        out.push(
          { type: 'CLEAR_ASSIGNMENTS', player, unit_id: unitId, description: 'Clear assignments' },
          { type: 'CONFIRM_TARGETS', player, unit_id: unitId, description: 'Confirm targets' },
        );
      }
      return [...out, skip, end];
    }
    if (res.awaiting_saves) {
      return [
        { type: 'APPLY_SAVES', player: otherPlayer(player), unit_id: unitId, description: 'Roll saving throws' },
      ];
    }
    if (res.mode === null) {
      return [
        { type: 'RESOLVE_SHOOTING', player, unit_id: unitId, description: 'Choose how to resolve weapons' },
        skip,
        end,
      ];
    }
    return [
      {
        type: 'CONTINUE_SEQUENCE',
        player,
        unit_id: unitId,
        description: `Resolve next weapon (${remainingWeapons(res).join(', ')})`,
      },
    ];
  }

  // --- lifecycle ---

  exit(): void {
    if (this.resolution?.awaiting_saves) {
      this.logger.warn(`Discarding pending saves for ${this.resolution.unit_id}`);
    }
    this.clearActivation();
  }

  exportState(): ShootingRecord {
    return {
      kind: 'SHOOTING',
      active_unit: this.activeUnit,
      assignments: structuredClone(this.assignments),
      resolution: this.resolution ? structuredClone(this.resolution) : null,
    };
  }

  restoreState(record: PhaseRecord, snapshot: WorldState, ctx: TurnContext): void {
    super.restoreState(record, snapshot, ctx);
    this.clearActivation();
    if (record.kind !== 'SHOOTING' || record.active_unit === null) return;

    const unit = getUnit(this.state, record.active_unit);
    if (!unit || isDestroyed(unit) || unit.owner !== ctx.activePlayer) {
      this.logger.warn(`Discarding shooting activation of ${record.active_unit}`);
      return;
    }
    this.activeUnit = unit.id;
    const live = (a: AttackAssignment) => {
      const target = getUnit(this.state, a.target_unit_id);
      return target !== undefined && !isDestroyed(target);
    };
    const res = record.resolution;
    if (res && (res.unit_id !== unit.id || !res.assignments.every(live))) {
      this.logger.warn(`Discarding stale resolution for ${unit.id}`);
      return;
    }
    this.assignments = structuredClone(record.assignments);
    this.resolution = res ? structuredClone(res) : null;
  }
}
