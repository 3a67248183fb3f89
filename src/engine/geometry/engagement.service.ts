import { Inject, Injectable } from '@nestjs/common';
import type {
  Measurement,
  Model,
  ModelMovements,
  Unit,
  WorldState,
} from '../../types/index.js';
import { isOnBoard, placedModels } from '../state/world-queries.js';
import { MEASUREMENT } from '../rules/rules.tokens.js';

@Injectable()
export class EngagementService {
  constructor(@Inject(MEASUREMENT) private readonly measurement: Measurement) {}

  modelsEngaged(a: Model[], b: Model[], state: WorldState): boolean {
    return a.some((ma) =>
      b.some((mb) =>
        this.measurement.isInEngagementRange(
          ma,
          mb,
          this.measurement.engagementRangeFor(ma, mb, state.board),
        ),
      ),
    );
  }

  unitsEngaged(a: Unit, b: Unit, state: WorldState): boolean {
    return this.modelsEngaged(placedModels(a), placedModels(b), state);
  }

  /** Ids of enemy units within engagement range of the unit. */
  engagedEnemies(unit: Unit, state: WorldState): string[] {
    if (!isOnBoard(unit)) return [];
    return Object.values(state.units)
      .filter((u) => u.owner !== unit.owner && isOnBoard(u))
      .filter((u) => this.unitsEngaged(unit, u, state))
      .map((u) => u.id);
  }

  isInCombat(unit: Unit, state: WorldState): boolean {
    return this.engagedEnemies(unit, state).length > 0;
  }

  /**
   * Re-eligibility scan. Applies the proposed (not yet committed) model
   * positions to a hypothetical board and returns the candidates that are now
   * within engagement range of an enemy. Pure: neither input is modified.
   */
  scanNewlyEngaged(
    candidates: Unit[],
    proposed: Record<string, ModelMovements>,
    state: WorldState,
  ): string[] {
    const hypothetical = (unit: Unit): Model[] => {
      const moves = proposed[unit.id];
      const models = placedModels(unit);
      if (!moves) return models;
      return models.map((m) =>
        Object.prototype.hasOwnProperty.call(moves, m.id)
          ? { ...m, position: { ...moves[m.id] } }
          : m,
      );
    };

    const board = Object.values(state.units).filter(isOnBoard);
    return candidates
      .filter(isOnBoard)
      .filter((candidate) =>
        board.some(
          (other) =>
            other.owner !== candidate.owner &&
            this.modelsEngaged(hypothetical(candidate), hypothetical(other), state),
        ),
      )
      .map((u) => u.id);
  }
}
