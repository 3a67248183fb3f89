import type {
  Action,
  ActionOf,
  ActionResult,
  AvailableAction,
  FlowSignal,
  Model,
  ModelMovements,
  PlayerId,
  ResultMetadata,
  StateDiff,
  Unit,
  WorldState,
} from '../../../types/index.js';
import {
  mergeAssignments,
  toAssignment,
} from '../../combat/attack-assignments.js';
import { createResolution, remainingWeapons } from '../../combat/resolution-pipeline.js';
import type { PipelineStep } from '../../combat/resolution-pipeline.js';
import type { StateDraft } from '../../state/state-draft.js';
import {
  aliveModels,
  enemyUnitsOnBoard,
  getUnit,
  isDestroyed,
  isOnBoard,
  modelIndex,
  otherPlayer,
  paths,
  placedModels,
  playerKey,
} from '../../state/world-queries.js';
import type { TurnContext } from '../../turn/turn-context.js';
import {
  BasePhase,
  failed,
  phaseComplete,
  succeed,
} from '../phase.js';
import type {
  FightActivation,
  FightRecord,
  FightStep,
  PhaseCompletion,
  PhaseRecord,
} from '../phase.js';
import { ActivationSequencer } from './activation-sequencer.js';
import type { EligibilityCheck } from './activation-sequencer.js';
import {
  COUNTER_OFFENSIVE_CP,
  counterOffensiveErrors,
  EPIC_CHALLENGE_CP,
  epicChallengeErrors,
  needsStance,
  resolveDreadFoe,
  spendCp,
} from './fight-interrupts.js';
import type { PerPlayerFlag } from './fight-interrupts.js';

export type ConsolidateMode = 'ENGAGEMENT' | 'OBJECTIVE' | 'NONE';

const ACTIVATION_EFFECTS = ['stance', 'precision', 'challenge_declined'] as const;

function noFlags(): PerPlayerFlag {
  return { '1': false, '2': false };
}

function movementDiffs(unit: Unit, movements: ModelMovements): StateDiff[] {
  return Object.entries(movements).map(([modelId, position]): StateDiff => ({
    op: 'set',
    path: paths.modelField(unit.id, modelIndex(unit, modelId), 'position'),
    value: { ...position },
  }));
}

/**
 * Fight phase: tiered alternating activations, each running
 * select → interrupts → pile in → assign → resolve → consolidate.
 */
export class FightPhase extends BasePhase {
  readonly type = 'FIGHT' as const;
  readonly completion: PhaseCompletion = 'MANUAL';

  private sequencer: ActivationSequencer | null = null;
  private active: FightActivation | null = null;
  private epicUsed: PerPlayerFlag = noFlags();
  private counterUsed: PerPlayerFlag = noFlags();
  private lastCompletedBy: PlayerId | null = null;

  /** Current turn order; exposed for the host's activation view. */
  get activationRecord() {
    return this.seq.toRecord();
  }

  get activeActivation(): FightActivation | null {
    return this.active ? structuredClone(this.active) : null;
  }

  protected onEnter(ctx: TurnContext): boolean {
    this.active = null;
    this.epicUsed = noFlags();
    this.counterUsed = noFlags();
    this.lastCompletedBy = null;
    const eligible = this.eligibility(this.state);
    const inCombat = Object.values(this.state.units).filter((u) => eligible(u.id));
    this.sequencer = ActivationSequencer.build(inCombat, otherPlayer(ctx.activePlayer), eligible);
    this.logger.log(
      `Fight phase: ${inCombat.length} units in combat, ${this.seq.subphase} opens with player ${this.seq.selectingPlayer}`,
    );
    return inCombat.length === 0;
  }

  // --- validation ---

  protected validatePhaseAction(action: Action, ctx: TurnContext): string[] {
    switch (action.type) {
      case 'SELECT_FIGHTER':
        return this.validateSelect(action);
      case 'USE_COUNTER_OFFENSIVE':
        return this.validateCounterOffensive(action);
      case 'SELECT_STANCE':
        return this.activeErrors(action.unit_id, action.player, 'STANCE');
      case 'DECLARE_EPIC_CHALLENGE':
        return this.validateDeclareChallenge(action);
      case 'RESPOND_EPIC_CHALLENGE':
        return this.validateRespondChallenge(action);
      case 'PILE_IN':
        return this.validatePileIn(action);
      case 'ASSIGN_ATTACKS':
        return this.validateAssign(action);
      case 'CONFIRM_AND_RESOLVE_ATTACKS': {
        const errors = this.activeErrors(action.unit_id, action.player, 'ASSIGN');
        if (errors.length === 0 && this.active?.assignments.length === 0) {
          errors.push('No attacks have been assigned');
        }
        return errors;
      }
      case 'RESOLVE_WEAPON_SEQUENCE':
        return this.validateWeaponSequence(action);
      case 'APPLY_SAVES':
        return this.validateSaves(action);
      case 'CONTINUE_SEQUENCE': {
        const errors = this.activeErrors(action.unit_id, action.player, 'RESOLVING');
        const res = this.active?.resolution;
        if (errors.length > 0 || !res) return errors.length > 0 ? errors : ['Nothing is resolving'];
        return this.deps.pipeline.validateContinue(res, action.weapon_order);
      }
      case 'CONSOLIDATE':
        return this.validateConsolidate(action);
      case 'SKIP_UNIT':
        return this.validateSkip(action);
      case 'END_FIGHT':
        if (action.player !== ctx.activePlayer) {
          return [`Only the active player (${ctx.activePlayer}) can end the fight phase`];
        }
        return this.active ? [`Unit ${this.active.unit_id} must finish its activation first`] : [];
      default:
        return [`${action.type} is not allowed in the FIGHT phase`];
    }
  }

  private validateSelect(action: ActionOf<'SELECT_FIGHTER'>): string[] {
    if (this.active) return [`Unit ${this.active.unit_id} is mid-activation`];
    const unit = getUnit(this.state, action.unit_id);
    if (!unit) return [`Unknown unit ${action.unit_id}`];
    if (unit.owner !== action.player) {
      return [`Unit ${unit.id} does not belong to player ${action.player}`];
    }
    const reason = this.seq.selectionError(unit.id, action.player, this.eligibility(this.state));
    return reason ? [reason] : [];
  }

  private validateCounterOffensive(action: ActionOf<'USE_COUNTER_OFFENSIVE'>): string[] {
    if (this.active) return [`Unit ${this.active.unit_id} is mid-activation`];
    const unit = getUnit(this.state, action.unit_id);
    if (!unit) return [`Unknown unit ${action.unit_id}`];
    const errors = counterOffensiveErrors(
      action.player,
      this.state,
      this.counterUsed,
      this.lastCompletedBy,
    );
    if (unit.owner !== action.player) {
      errors.push(`Unit ${unit.id} does not belong to player ${action.player}`);
    }
    if (this.seq.isActivated(unit.id)) errors.push(`Unit ${unit.id} has already fought this phase`);
    else if (!this.eligibility(this.state)(unit.id)) errors.push(`Unit ${unit.id} is not in combat`);
    return errors;
  }

  private validateDeclareChallenge(action: ActionOf<'DECLARE_EPIC_CHALLENGE'>): string[] {
    const errors = this.activeErrors(action.unit_id, action.player, 'PILE_IN');
    if (errors.length > 0 || !this.active) return errors;
    if (this.active.challenge_declared) return ['An Epic Challenge has already been declared'];
    const unit = getUnit(this.state, action.unit_id);
    return unit ? epicChallengeErrors(unit, action.player, this.state, this.epicUsed) : [];
  }

  private validateRespondChallenge(action: ActionOf<'RESPOND_EPIC_CHALLENGE'>): string[] {
    const active = this.active;
    if (!active || active.unit_id !== action.unit_id) {
      return [`Unit ${action.unit_id} is not the active unit`];
    }
    if (active.step !== 'CHALLENGE_RESPONSE') return ['No Epic Challenge awaits a response'];
    const responder = otherPlayer(active.player);
    return action.player === responder
      ? []
      : [`The challenge is answered by player ${responder}`];
  }

  private validatePileIn(action: ActionOf<'PILE_IN'>): string[] {
    const errors = this.activeErrors(action.unit_id, action.player, 'PILE_IN');
    const unit = getUnit(this.state, action.unit_id);
    if (errors.length > 0 || !unit) return errors;
    if (Object.keys(action.movements).length === 0) return [];

    const config = this.deps.config.get();
    const moveErrors = this.deps.movement.validateMove({
      unit,
      movements: action.movements,
      maxInches: config.pileInInches,
      state: this.state,
      label: 'Pile-in',
    });
    if (moveErrors.length > 0) return moveErrors;

    const enemies = this.enemyModels(unit, this.state);
    for (const [modelId, dest] of Object.entries(action.movements)) {
      const model = unit.models.find((m) => m.id === modelId);
      if (model && !this.deps.movement.endsNoFarther(model, dest, enemies)) {
        errors.push(`Pile-in: model ${modelId} must end no farther from the closest enemy model`);
      }
    }
    return errors;
  }

  private validateAssign(action: ActionOf<'ASSIGN_ATTACKS'>): string[] {
    const errors = this.activeErrors(action.unit_id, action.player, 'ASSIGN');
    const unit = getUnit(this.state, action.unit_id);
    if (errors.length > 0 || !unit) return errors;
    if (action.assignments.length === 0) return ['At least one assignment is required'];

    const targets = this.deps.rules.getEligibleTargets(unit.id, this.state, 'MELEE');
    const alive = new Set(aliveModels(unit).map((m) => m.id));
    for (const a of action.assignments) {
      const profile = this.deps.rules.getWeaponProfile(a.weapon_id);
      if (!unit.meta.weapons.includes(a.weapon_id)) {
        errors.push(`Unit ${unit.id} has no weapon ${a.weapon_id}`);
      } else if (!profile) {
        errors.push(`Unknown weapon ${a.weapon_id}`);
      } else if (profile.type !== 'MELEE') {
        errors.push(`${profile.name} is not a melee weapon`);
      }
      if (!targets.includes(a.target_unit_id)) {
        errors.push(`Unit ${a.target_unit_id} is not within engagement range of ${unit.id}`);
      }
      for (const id of a.model_ids ?? []) {
        if (!alive.has(id)) errors.push(`Model ${id} is not an alive model of ${unit.id}`);
      }
    }
    return errors;
  }

  private validateWeaponSequence(action: ActionOf<'RESOLVE_WEAPON_SEQUENCE'>): string[] {
    const errors = this.activeErrors(action.unit_id, action.player, 'RESOLVING');
    const res = this.active?.resolution;
    if (errors.length > 0 || !res) return errors.length > 0 ? errors : ['Nothing is resolving'];
    if (res.mode !== null) return ['The weapon order has already been chosen'];
    return this.deps.pipeline.validateWeaponOrder(res, action.weapon_order);
  }

  private validateSaves(action: ActionOf<'APPLY_SAVES'>): string[] {
    const active = this.active;
    const res = active?.resolution;
    if (!active || !res) return ['No attacks are awaiting saves'];
    const defender = otherPlayer(active.player);
    if (action.player !== defender) return [`Saves are rolled by player ${defender}`];
    return this.deps.pipeline.validateSaves(res, action.save_results);
  }

  private validateConsolidate(action: ActionOf<'CONSOLIDATE'>): string[] {
    const errors = this.activeErrors(action.unit_id, action.player, 'CONSOLIDATE');
    const unit = getUnit(this.state, action.unit_id);
    if (errors.length > 0 || !unit) return errors;
    if (Object.keys(action.movements).length === 0) return [];

    const mode = this.consolidateMode(unit, this.state);
    if (mode === 'NONE') {
      return ['Consolidate: no enemy or objective is within reach, only an empty move is allowed'];
    }
    const moveErrors = this.deps.movement.validateMove({
      unit,
      movements: action.movements,
      maxInches: this.deps.config.get().consolidateInches,
      state: this.state,
      label: 'Consolidate',
    });
    if (moveErrors.length > 0) return moveErrors;

    for (const [modelId, dest] of Object.entries(action.movements)) {
      const model = unit.models.find((m) => m.id === modelId);
      if (!model) continue;
      const closer =
        mode === 'ENGAGEMENT'
          ? this.deps.movement.endsNoFarther(model, dest, this.enemyModels(unit, this.state))
          : this.deps.movement.endsNoFartherFromPoint(
              model,
              dest,
              this.state.board.objectives.map((o) => o.position),
            );
      if (!closer) {
        const what = mode === 'ENGAGEMENT' ? 'enemy model' : 'objective';
        errors.push(`Consolidate: model ${modelId} must end no farther from the closest ${what}`);
      }
    }
    if (mode === 'ENGAGEMENT') {
      const projected = this.deps.movement.project(unit, action.movements);
      const engaged = this.deps.engagement.modelsEngaged(
        projected,
        this.enemyModels(unit, this.state),
        this.state,
      );
      if (!engaged) {
        errors.push(`Consolidate: unit ${unit.id} must end within engagement range of an enemy unit`);
      }
    }
    return errors;
  }

  private validateSkip(action: ActionOf<'SKIP_UNIT'>): string[] {
    const active = this.active;
    if (active) {
      if (active.unit_id !== action.unit_id) return [`Unit ${active.unit_id} is mid-activation`];
      if (active.player !== action.player) {
        return [`Unit ${active.unit_id} does not belong to player ${action.player}`];
      }
      return active.resolution?.dice_rolled
        ? ['A unit cannot be skipped once its dice have been rolled']
        : [];
    }
    const unit = getUnit(this.state, action.unit_id);
    if (!unit) return [`Unknown unit ${action.unit_id}`];
    if (unit.owner !== action.player) {
      return [`Unit ${unit.id} does not belong to player ${action.player}`];
    }
    const reason = this.seq.selectionError(unit.id, action.player, this.eligibility(this.state));
    return reason ? [reason] : [];
  }

  /** The action must target the active unit, from its owner, at the given step. */
  private activeErrors(unitId: string, player: PlayerId, step: FightStep): string[] {
    const active = this.active;
    if (!active) return ['No unit is activating'];
    if (active.unit_id !== unitId) return [`Unit ${unitId} is not the active unit`];
    const errors: string[] = [];
    if (active.player !== player) {
      errors.push(`Unit ${unitId} does not belong to player ${player}`);
    }
    if (active.step !== step) {
      errors.push(`Unit ${unitId} is at ${active.step}, not ${step}`);
    }
    return errors;
  }

  // --- processing ---

  protected processPhaseAction(action: Action, ctx: TurnContext): ActionResult {
    const draft = this.draft();
    switch (action.type) {
      case 'SELECT_FIGHTER':
        return this.beginActivation(action.unit_id, action.player, draft, ctx);
      case 'USE_COUNTER_OFFENSIVE':
      {
        draft.push([spendCp(draft.state, action.player, COUNTER_OFFENSIVE_CP)]);
        const result = this.beginActivation(action.unit_id, action.player, draft, ctx);
        if (result.success) {
          this.counterUsed[playerKey(action.player)] = true;
          this.logger.log(`Player ${action.player} uses Counter-Offensive on ${action.unit_id}`);
        }
        return result;
      }
      case 'SELECT_STANCE':
        return this.withActive((active) => {
          draft.push([
            { op: 'set', path: paths.unitEffect(active.unit_id, 'stance'), value: action.stance },
          ]);
          active.step = 'PILE_IN';
          return succeed(draft.changes, { trigger_pile_in: true }, this.awaitPileIn(active));
        });
      case 'DECLARE_EPIC_CHALLENGE':
        return this.withActive((active) => {
          draft.push([spendCp(draft.state, action.player, EPIC_CHALLENGE_CP)]);
          this.epicUsed[playerKey(action.player)] = true;
          active.challenge_declared = true;
          active.step = 'CHALLENGE_RESPONSE';
          return succeed(draft.changes, {}, {
            kind: 'AWAITING_INPUT',
            input: 'EPIC_CHALLENGE_RESPONSE',
            player: otherPlayer(active.player),
            payload: { unit_id: active.unit_id },
          });
        });
      case 'RESPOND_EPIC_CHALLENGE':
        return this.withActive((active) => {
          const effect = action.accept ? 'precision' : 'challenge_declined';
          draft.push([{ op: 'set', path: paths.unitEffect(active.unit_id, effect), value: true }]);
          active.step = 'PILE_IN';
          return succeed(
            draft.changes,
            { trigger_pile_in: true, log: [`Epic Challenge ${action.accept ? 'accepted' : 'declined'}`] },
            this.awaitPileIn(active),
          );
        });
      case 'PILE_IN':
        return this.withActive((active, unit) => {
          draft.push(movementDiffs(unit, action.movements));
          active.step = 'ASSIGN';
          return succeed(draft.changes, {}, {
            kind: 'AWAITING_INPUT',
            input: 'ASSIGN_ATTACKS',
            player: active.player,
            payload: {
              unit_id: active.unit_id,
              targets: this.deps.rules.getEligibleTargets(active.unit_id, draft.state, 'MELEE'),
            },
          });
        });
      case 'ASSIGN_ATTACKS':
        return this.withActive((active, unit) => {
          active.assignments = mergeAssignments(
            active.assignments,
            action.assignments.map((a) => toAssignment(unit, a)),
          );
          return succeed([]);
        });
      case 'CONFIRM_AND_RESOLVE_ATTACKS':
        return this.withActive((active) => {
          const res = createResolution(active.unit_id, active.player, 'MELEE', active.assignments);
          active.step = 'RESOLVING';
          return this.afterPipeline(active, this.deps.pipeline.confirm(res, draft), draft);
        });
      case 'RESOLVE_WEAPON_SEQUENCE':
        return this.withResolution((active, res) =>
          this.afterPipeline(
            active,
            this.deps.pipeline.start(res, draft, action.mode, action.weapon_order),
            draft,
          ),
        );
      case 'APPLY_SAVES':
        return this.withResolution((active, res) =>
          this.afterPipeline(active, this.deps.pipeline.applySaves(res, draft, action.save_results), draft),
        );
      case 'CONTINUE_SEQUENCE':
        return this.withResolution((active, res) =>
          this.afterPipeline(active, this.deps.pipeline.continue(res, draft, action.weapon_order), draft),
        );
      case 'CONSOLIDATE':
        return this.withActive((active, unit) => {
          draft.push(movementDiffs(unit, action.movements));
          return this.finishActivation(active, draft, action.movements, {});
        });
      case 'SKIP_UNIT':
        // a skipped unit does not open a Counter-Offensive window
        if (this.active) {
          const result = this.withActive((active) => this.finishActivation(active, draft, {}, {}));
          this.lastCompletedBy = null;
          return result;
        }
        this.seq.completeActivation(action.unit_id, this.eligibility(draft.state), action.player);
        this.lastCompletedBy = null;
        return succeed(draft.changes, { log: [`${action.unit_id} does not fight`] });
      case 'END_FIGHT':
        this.logger.log(`Fight phase ended by player ${action.player}`);
        return phaseComplete();
      default:
        return failed(`${action.type} is not allowed in the FIGHT phase`);
    }
  }

  private beginActivation(
    unitId: string,
    player: PlayerId,
    draft: StateDraft,
    ctx: TurnContext,
  ): ActionResult {
    const unit = getUnit(draft.state, unitId);
    if (!unit || isDestroyed(unit)) return failed(`Unit ${unitId} can no longer fight`);
    this.lastCompletedBy = null;
    const active: FightActivation = {
      unit_id: unitId,
      player,
      step: needsStance(unit) ? 'STANCE' : 'PILE_IN',
      challenge_declared: false,
      assignments: [],
      resolution: null,
    };
    this.active = active;
    this.logger.debug(`Player ${player} activates ${unitId}`);

    const dreadFoe = resolveDreadFoe(unitId, draft, ctx, this.deps);
    const metadata: ResultMetadata = {
      dice: dreadFoe.dice,
      kills: dreadFoe.kills,
      log: dreadFoe.log,
    };
    if (active.step === 'STANCE') {
      return succeed(draft.changes, metadata, {
        kind: 'AWAITING_INPUT',
        input: 'STANCE',
        player,
        payload: { unit_id: unitId },
      });
    }
    return succeed(draft.changes, { ...metadata, trigger_pile_in: true }, this.awaitPileIn(active));
  }

  private afterPipeline(
    active: FightActivation,
    step: PipelineStep,
    draft: StateDraft,
  ): ActionResult {
    if (step.rejected) return failed(step.rejected);
    active.resolution = step.resolution;
    if (!step.done) return succeed(draft.changes, step.metadata, step.flow);

    draft.push([{ op: 'set', path: paths.unitEffect(active.unit_id, 'has_fought'), value: true }]);
    const unit = getUnit(draft.state, active.unit_id);
    if (!unit || isDestroyed(unit)) {
      return this.finishActivation(active, draft, {}, step.metadata);
    }
    active.step = 'CONSOLIDATE';
    return succeed(
      draft.changes,
      { ...step.metadata, trigger_consolidate: true },
      {
        kind: 'AWAITING_INPUT',
        input: 'CONSOLIDATE',
        player: active.player,
        payload: { unit_id: active.unit_id, mode: this.consolidateMode(unit, draft.state) },
      },
    );
  }

  /**
   * Ends the activation: clears activation-only effects, hands selection over
   * and runs the re-eligibility scan against the proposed positions.
   */
  private finishActivation(
    active: FightActivation,
    draft: StateDraft,
    movements: ModelMovements,
    metadata: ResultMetadata,
  ): ActionResult {
    const unit = getUnit(draft.state, active.unit_id);
    if (unit) {
      draft.push(
        ACTIVATION_EFFECTS.filter((e) => unit.effects[e] !== undefined).map(
          (e): StateDiff => ({ op: 'remove', path: paths.unitEffect(unit.id, e) }),
        ),
      );
    }

    const seq = this.seq;
    seq.completeActivation(active.unit_id, this.eligibility(draft.state), active.player);
    const candidates = Object.values(this.state.units).filter(
      (u) => u.id !== active.unit_id && isOnBoard(u) && !seq.isActivated(u.id) && seq.tierOf(u.id) === null,
    );
    const engaged = new Set(
      this.deps.engagement.scanNewlyEngaged(candidates, { [active.unit_id]: movements }, this.state),
    );
    const added = seq.addNewlyEligible(
      candidates.filter((u) => engaged.has(u.id)),
      this.eligibility(draft.state),
    );
    if (added.length > 0) this.logger.log(`Newly engaged units join the fight: ${added.join(', ')}`);

    this.active = null;
    this.lastCompletedBy = active.player;
    return succeed(draft.changes, { ...metadata, newly_eligible_units: added });
  }

  private withActive(fn: (active: FightActivation, unit: Unit) => ActionResult): ActionResult {
    const active = this.active;
    const unit = active ? getUnit(this.state, active.unit_id) : undefined;
    if (!active || !unit) return failed('No unit is activating');
    return fn(active, unit);
  }

  private withResolution(
    fn: (active: FightActivation, res: NonNullable<FightActivation['resolution']>) => ActionResult,
  ): ActionResult {
    const active = this.active;
    if (!active || !active.resolution) return failed('Nothing is resolving');
    return fn(active, active.resolution);
  }

  private awaitPileIn(active: FightActivation): FlowSignal {
    return {
      kind: 'AWAITING_INPUT',
      input: 'PILE_IN',
      player: active.player,
      payload: { unit_id: active.unit_id, max_inches: this.deps.config.get().pileInInches },
    };
  }

  // --- queries ---

  /** Judged from the unit's positions before it moves. */
  consolidateMode(unit: Unit, state: WorldState): ConsolidateMode {
    const config = this.deps.config.get();
    const models = placedModels(unit);
    const enemies = this.enemyModels(unit, state);
    const { measurement } = this.deps;
    const inReach = (m: Model, e: Model) =>
      measurement.distance(m, e) <=
      config.consolidateInches + measurement.engagementRangeFor(m, e, state.board);
    if (models.some((m) => enemies.some((e) => inReach(m, e)))) {
      return 'ENGAGEMENT';
    }
    const objectiveInReach = state.board.objectives.some((o) =>
      models.some(
        (m) =>
          this.deps.measurement.distanceToPoint(m, o.position) <= config.consolidateInches + o.radius,
      ),
    );
    return objectiveInReach ? 'OBJECTIVE' : 'NONE';
  }

  private enemyModels(unit: Unit, state: WorldState): Model[] {
    return enemyUnitsOnBoard(state, unit.owner).flatMap(placedModels);
  }

  private eligibility(state: WorldState): EligibilityCheck {
    return (unitId) => {
      const unit = getUnit(state, unitId);
      return unit !== undefined && isOnBoard(unit) && this.deps.engagement.isInCombat(unit, state);
    };
  }

  private get seq(): ActivationSequencer {
    if (!this.sequencer) {
      this.sequencer = ActivationSequencer.build([], 1, () => false);
    }
    return this.sequencer;
  }

  availableActions(ctx: TurnContext): AvailableAction[] {
    const active = this.active;
    if (!active) return this.selectionActions(ctx);
    const unitId = active.unit_id;
    const owner = active.player;
    const out: AvailableAction[] = [];
    const skip = (): AvailableAction => ({
      type: 'SKIP_UNIT',
      player: owner,
      unit_id: unitId,
      description: `Skip ${unitId}`,
    });

    switch (active.step) {
      case 'STANCE':
        out.push({ type: 'SELECT_STANCE', player: owner, unit_id: unitId, description: 'Choose a stance' });
        break;
      case 'CHALLENGE_RESPONSE':
        out.push({
          type: 'RESPOND_EPIC_CHALLENGE',
          player: otherPlayer(owner),
          unit_id: unitId,
          description: 'Accept or decline the Epic Challenge',
        });
        break;
      case 'PILE_IN': {
        out.push({ type: 'PILE_IN', player: owner, unit_id: unitId, description: 'Pile in' });
        const unit = getUnit(this.state, unitId);
        if (
          unit &&
          !active.challenge_declared &&
          epicChallengeErrors(unit, owner, this.state, this.epicUsed).length === 0
        ) {
          out.push({
            type: 'DECLARE_EPIC_CHALLENGE',
            player: owner,
            unit_id: unitId,
            description: `Declare an Epic Challenge (${EPIC_CHALLENGE_CP} CP)`,
          });
        }
        out.push(skip());
        break;
      }
      case 'ASSIGN':
        out.push({ type: 'ASSIGN_ATTACKS', player: owner, unit_id: unitId, description: 'Assign melee attacks' });
        if (active.assignments.length > 0) {
          out.push({
            type: 'CONFIRM_AND_RESOLVE_ATTACKS',
            player: owner,
            unit_id: unitId,
            description: 'Confirm and roll attacks',
          });
        }
        out.push(skip());
        break;
      case 'RESOLVING': {
        const res = active.resolution;
        if (!res) break;
        if (res.awaiting_saves) {
          out.push({
            type: 'APPLY_SAVES',
            player: otherPlayer(owner),
            unit_id: unitId,
            description: 'Roll saving throws',
          });
        } else if (res.mode === null) {
          out.push({
            type: 'RESOLVE_WEAPON_SEQUENCE',
            player: owner,
            unit_id: unitId,
            description: 'Choose how to resolve weapons',
          });
        } else if (res.awaiting_continue) {
          out.push({
            type: 'CONTINUE_SEQUENCE',
            player: owner,
            unit_id: unitId,
            description: `Resolve next weapon (${remainingWeapons(res).join(', ')})`,
          });
        }
        if (!res.dice_rolled) out.push(skip());
        break;
      }
      case 'CONSOLIDATE':
        out.push({ type: 'CONSOLIDATE', player: owner, unit_id: unitId, description: 'Consolidate' });
        break;
    }
    return out;
  }

  private selectionActions(ctx: TurnContext): AvailableAction[] {
    const out: AvailableAction[] = [];
    const eligible = this.eligibility(this.state);
    const seq = this.seq;
    const selecting = seq.selectingPlayer;
    for (const unitId of seq.pending(selecting, eligible)) {
      out.push(
        { type: 'SELECT_FIGHTER', player: selecting, unit_id: unitId, description: `Fight with ${unitId}` },
        { type: 'SKIP_UNIT', player: selecting, unit_id: unitId, description: `Skip ${unitId}` },
      );
    }
    if (this.lastCompletedBy !== null) {
      const player = otherPlayer(this.lastCompletedBy);
      const blocked = counterOffensiveErrors(player, this.state, this.counterUsed, this.lastCompletedBy);
      if (blocked.length === 0) {
        for (const unit of Object.values(this.state.units)) {
          if (unit.owner !== player || seq.isActivated(unit.id) || !eligible(unit.id)) continue;
          out.push({
            type: 'USE_COUNTER_OFFENSIVE',
            player,
            unit_id: unit.id,
            description: `Counter-Offensive with ${unit.id} (${COUNTER_OFFENSIVE_CP} CP)`,
          });
        }
      }
    }
    out.push({ type: 'END_FIGHT', player: ctx.activePlayer, description: 'End the fight phase' });
    return out;
  }

  // --- lifecycle ---

  exit(): void {
    if (this.active?.resolution?.awaiting_saves) {
      this.logger.warn(`Discarding pending saves for ${this.active.unit_id}`);
    }
    this.active = null;
    this.sequencer = null;
  }

  exportState(): FightRecord {
    return {
      kind: 'FIGHT',
      activation_record: this.seq.toRecord(),
      active: this.active ? structuredClone(this.active) : null,
      epic_challenge_used: { ...this.epicUsed },
      counter_offensive_used: { ...this.counterUsed },
      last_completed_by: this.lastCompletedBy,
    };
  }

  restoreState(record: PhaseRecord, snapshot: WorldState, ctx: TurnContext): void {
    super.restoreState(record, snapshot, ctx);
    if (record.kind !== 'FIGHT') return;
    this.sequencer = new ActivationSequencer(record.activation_record, otherPlayer(ctx.activePlayer));
    this.epicUsed = { ...record.epic_challenge_used };
    this.counterUsed = { ...record.counter_offensive_used };
    this.lastCompletedBy = record.last_completed_by;
    this.active = record.active ? this.revalidate(structuredClone(record.active)) : null;
  }

  /** Drops a resolution that no longer matches the board. */
  private revalidate(active: FightActivation): FightActivation | null {
    const unit = getUnit(this.state, active.unit_id);
    if (!unit || isDestroyed(unit)) {
      this.logger.warn(`Discarding activation of ${active.unit_id}: unit is gone`);
      return null;
    }
    const res = active.resolution;
    if (!res) return active;
    const live = res.assignments.every((a) => {
      const target = getUnit(this.state, a.target_unit_id);
      return target !== undefined && !isDestroyed(target);
    });
    if (res.unit_id === active.unit_id && live) return active;
    this.logger.warn(`Discarding stale resolution for ${active.unit_id}`);
    return { ...active, step: 'ASSIGN', assignments: [], resolution: null };
  }
}
