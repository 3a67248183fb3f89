import type {
  Action,
  ActionOf,
  ActionResult,
  AvailableAction,
  StateDiff,
  Unit,
} from '../../types/index.js';
import {
  enemyUnitsOnBoard,
  findAbility,
  getUnit,
  isOnBoard,
  modelIndex,
  paths,
  placedModels,
} from '../state/world-queries.js';
import type { TurnContext } from '../turn/turn-context.js';
import { BasePhase, failed, phaseComplete, succeed } from './phase.js';
import type { PhaseCompletion } from './phase.js';

const EPSILON = 1e-6;

/** Pre-battle moves for units with the SCOUT ability, once each. */
export class ScoutPhase extends BasePhase {
  readonly type = 'SCOUT' as const;
  readonly completion: PhaseCompletion = 'MANUAL';

  private readonly moved = new Set<string>();

  protected onEnter(): boolean {
    this.moved.clear();
    const scouts = this.scouts();
    this.logger.log(`Scout phase: ${scouts.length} units may move`);
    return scouts.length === 0;
  }

  private scouts(): Unit[] {
    return Object.values(this.state.units).filter(
      (u) => isOnBoard(u) && findAbility(u, 'SCOUT') !== undefined,
    );
  }

  protected validatePhaseAction(action: Action, ctx: TurnContext): string[] {
    switch (action.type) {
      case 'SCOUT_MOVE':
        return this.validateMove(action);
      case 'END_SCOUT_PHASE':
        return action.player === ctx.activePlayer
          ? []
          : [`Only the active player (${ctx.activePlayer}) can end the scout phase`];
      default:
        return [`${action.type} is not allowed in the SCOUT phase`];
    }
  }

  private validateMove(action: ActionOf<'SCOUT_MOVE'>): string[] {
    const unit = getUnit(this.state, action.unit_id);
    if (!unit) return [`Unknown unit ${action.unit_id}`];
    if (unit.owner !== action.player) {
      return [`Unit ${unit.id} does not belong to player ${action.player}`];
    }
    const ability = findAbility(unit, 'SCOUT');
    if (!ability) return [`Unit ${unit.id} does not have the Scout ability`];
    if (!isOnBoard(unit)) return [`Unit ${unit.id} is not on the battlefield`];
    if (this.moved.has(unit.id)) return [`Unit ${unit.id} has already made its scout move`];

    const errors = this.deps.movement.validateMove({
      unit,
      movements: action.movements,
      maxInches: ability.inches,
      state: this.state,
      label: 'Scout',
    });
    if (errors.length > 0) return errors;

    const buffer = this.deps.config.get().scoutEnemyBufferInches;
    const enemies = enemyUnitsOnBoard(this.state, unit.owner).flatMap(placedModels);
    for (const model of this.deps.movement.project(unit, action.movements)) {
      if (!Object.prototype.hasOwnProperty.call(action.movements, model.id)) continue;
      const near = enemies.find((e) => this.deps.measurement.distance(model, e) <= buffer + EPSILON);
      if (near) {
        errors.push(`Scout: model ${model.id} would end within ${buffer}" of enemy model ${near.id}`);
      }
    }
    return errors;
  }

  protected processPhaseAction(action: Action): ActionResult {
    if (action.type === 'END_SCOUT_PHASE') {
      this.logger.log(`Scout phase ended by player ${action.player}`);
      return phaseComplete();
    }
    if (action.type !== 'SCOUT_MOVE') {
      return failed(`${action.type} is not allowed in the SCOUT phase`);
    }
    const unit = getUnit(this.state, action.unit_id);
    if (!unit || this.moved.has(unit.id)) {
      return failed(`Unit ${action.unit_id} cannot make a scout move`);
    }

    const changes = Object.entries(action.movements).map(
      ([modelId, position]): StateDiff => ({
        op: 'set',
        path: paths.modelField(unit.id, modelIndex(unit, modelId), 'position'),
        value: { ...position },
      }),
    );
    this.moved.add(unit.id);
    return succeed(changes, { log: [`${unit.meta.name} scouts`] });
  }

  availableActions(ctx: TurnContext): AvailableAction[] {
    const moves = this.scouts()
      .filter((u) => !this.moved.has(u.id))
      .map((u): AvailableAction => ({
        type: 'SCOUT_MOVE',
        player: u.owner,
        unit_id: u.id,
        description: `Scout move with ${u.meta.name}`,
      }));
    return [
      ...moves,
      { type: 'END_SCOUT_PHASE', player: ctx.activePlayer, description: 'End the scout phase' },
    ];
  }
}
