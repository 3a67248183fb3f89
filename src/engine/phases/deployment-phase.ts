import type {
  Action,
  ActionOf,
  ActionResult,
  AvailableAction,
  Model,
  PlayerId,
  StateDiff,
  Unit,
  WorldState,
} from '../../types/index.js';
import {
  aliveModels,
  getUnit,
  modelIndex,
  otherPlayer,
  paths,
  placedModels,
  playerKey,
  unitsOf,
} from '../state/world-queries.js';
import type { TurnContext } from '../turn/turn-context.js';
import { BasePhase, failed, succeed } from './phase.js';
import type { PhaseCompletion } from './phase.js';

function undeployed(state: WorldState, player: PlayerId): Unit[] {
  return unitsOf(state, player).filter((u) => u.status === 'UNDEPLOYED');
}

/**
 * Players take turns placing one unit each. `meta.active_player` tracks whose
 * turn it is; a player with nothing left to place passes.
 */
export class DeploymentPhase extends BasePhase {
  readonly type = 'DEPLOYMENT' as const;
  readonly completion: PhaseCompletion = 'AUTO';

  protected onEnter(): boolean {
    const remaining = Object.values(this.state.units).filter((u) => u.status === 'UNDEPLOYED');
    this.logger.log(`Deployment: ${remaining.length} units to place`);
    return remaining.length === 0;
  }

  shouldCompletePhase(): boolean {
    return Object.values(this.state.units).every((u) => u.status !== 'UNDEPLOYED');
  }

  /** The active player, unless they have nothing left to place. */
  deployer(ctx: TurnContext): PlayerId {
    const other = otherPlayer(ctx.activePlayer);
    return undeployed(this.state, ctx.activePlayer).length === 0 &&
      undeployed(this.state, other).length > 0
      ? other
      : ctx.activePlayer;
  }

  protected validatePhaseAction(action: Action, ctx: TurnContext): string[] {
    switch (action.type) {
      case 'DEPLOY_UNIT': {
        const errors = this.turnErrors(action.unit_id, action.player, ctx);
        const unit = getUnit(this.state, action.unit_id);
        if (errors.length > 0 || !unit) return errors;
        return this.placementErrors(unit, action);
      }
      case 'PLACE_IN_RESERVES':
        return this.turnErrors(action.unit_id, action.player, ctx);
      default:
        return [`${action.type} is not allowed in the DEPLOYMENT phase`];
    }
  }

  private turnErrors(unitId: string, player: PlayerId, ctx: TurnContext): string[] {
    const deployer = this.deployer(ctx);
    if (player !== deployer) return [`Player ${deployer} is deploying`];
    const unit = getUnit(this.state, unitId);
    if (!unit) return [`Unknown unit ${unitId}`];
    const errors: string[] = [];
    if (unit.owner !== player) errors.push(`Unit ${unitId} does not belong to player ${player}`);
    if (unit.status !== 'UNDEPLOYED') errors.push(`Unit ${unitId} is already ${unit.status}`);
    return errors;
  }

  private placementErrors(unit: Unit, action: ActionOf<'DEPLOY_UNIT'>): string[] {
    const models = aliveModels(unit);
    const errors: string[] = [];
    if (action.positions.length !== models.length) {
      return [`Expected ${models.length} positions for unit ${unit.id}, got ${action.positions.length}`];
    }
    if (action.rotations && action.rotations.length !== models.length) {
      errors.push(`Expected ${models.length} rotations for unit ${unit.id}, got ${action.rotations.length}`);
    }

    const zone = this.state.board.deployment_zones[playerKey(unit.owner)];
    const placed = this.place(models, action);
    for (const model of placed) {
      if (model.position && !this.deps.measurement.pointInZone(model.position, zone)) {
        errors.push(`Model ${model.id} is outside player ${unit.owner}'s deployment zone`);
      }
    }

    const others = Object.values(this.state.units)
      .filter((u) => u.id !== unit.id)
      .flatMap(placedModels);
    placed.forEach((model, i) => {
      const clash =
        others.find((o) => this.deps.measurement.modelsOverlap(model, o)) ??
        placed.slice(i + 1).find((o) => this.deps.measurement.modelsOverlap(model, o));
      if (clash) errors.push(`Model ${model.id} would overlap ${clash.id}`);
    });

    if (!this.deps.movement.isCoherent(placed)) {
      errors.push(`Unit ${unit.id} would not be in coherency`);
    }
    return errors;
  }

  private place(models: Model[], action: ActionOf<'DEPLOY_UNIT'>): Model[] {
    return models.map((m, i) => ({
      ...m,
      position: { ...action.positions[i] },
      rotation: action.rotations?.[i] ?? m.rotation,
    }));
  }

  protected processPhaseAction(action: Action, ctx: TurnContext): ActionResult {
    const unit =
      action.type === 'DEPLOY_UNIT' || action.type === 'PLACE_IN_RESERVES'
        ? getUnit(this.state, action.unit_id)
        : undefined;
    if (!unit || unit.status !== 'UNDEPLOYED') {
      return failed(`${action.type} has nothing to place`);
    }

    const draft = this.draft();
    if (action.type === 'DEPLOY_UNIT') {
      const diffs: StateDiff[] = [];
      for (const model of this.place(aliveModels(unit), action)) {
        const index = modelIndex(unit, model.id);
        diffs.push(
          { op: 'set', path: paths.modelField(unit.id, index, 'position'), value: model.position },
          { op: 'set', path: paths.modelField(unit.id, index, 'rotation'), value: model.rotation },
        );
      }
      diffs.push({ op: 'set', path: paths.unitStatus(unit.id), value: 'DEPLOYED' });
      draft.push(diffs);
    } else {
      draft.push([{ op: 'set', path: paths.unitStatus(unit.id), value: 'IN_RESERVES' }]);
    }

    const opponent = otherPlayer(action.player);
    if (undeployed(draft.state, opponent).length > 0) {
      draft.push([{ op: 'set', path: 'meta.active_player', value: opponent }]);
    } else if (ctx.activePlayer !== action.player) {
      draft.push([{ op: 'set', path: 'meta.active_player', value: action.player }]);
    }

    const verb = action.type === 'DEPLOY_UNIT' ? 'deployed' : 'placed in reserves';
    this.logger.debug(`${unit.id} ${verb} by player ${action.player}`);
    return succeed(draft.changes, { log: [`${unit.meta.name} ${verb}`] });
  }

  availableActions(ctx: TurnContext): AvailableAction[] {
    const player = this.deployer(ctx);
    return undeployed(this.state, player).flatMap((u): AvailableAction[] => [
      { type: 'DEPLOY_UNIT', player, unit_id: u.id, description: `Deploy ${u.meta.name}` },
      { type: 'PLACE_IN_RESERVES', player, unit_id: u.id, description: `Place ${u.meta.name} in reserves` },
    ]);
  }
}
