import { Inject, Injectable } from '@nestjs/common';
import type {
  Measurement,
  Model,
  ModelMovements,
  Position,
  Unit,
  WorldState,
} from '../../types/index.js';
import { EngineConfigService } from '../engine-config.service.js';
import { MEASUREMENT } from '../rules/rules.tokens.js';

const EPSILON = 1e-6;

export interface MoveCheck {
  unit: Unit;
  movements: ModelMovements;
  maxInches: number;
  state: WorldState;
  /** Prefix for error strings, e.g. "Pile-in". */
  label: string;
}

function fmt(inches: number): string {
  return `${Math.round(inches * 100) / 100}"`;
}

@Injectable()
export class MovementValidatorService {
  constructor(
    @Inject(MEASUREMENT) private readonly measurement: Measurement,
    private readonly configService: EngineConfigService,
  ) {}

  /** The unit's alive models with the proposed destinations applied. */
  project(unit: Unit, movements: ModelMovements): Model[] {
    return unit.models
      .filter((m) => m.alive)
      .map((m) =>
        Object.prototype.hasOwnProperty.call(movements, m.id)
          ? { ...m, position: { ...movements[m.id] } }
          : m,
      );
  }

  /**
   * Movement cap, board edges, overlap and coherency. Returns every violation.
   */
  validateMove(check: MoveCheck): string[] {
    const { unit, movements, maxInches, state, label } = check;
    const errors: string[] = [];
    const byId = new Map(unit.models.map((m) => [m.id, m]));

    for (const [modelId, dest] of Object.entries(movements)) {
      const model = byId.get(modelId);
      if (!model || !model.alive) {
        errors.push(`${label}: model ${modelId} is not an alive model of ${unit.id}`);
        continue;
      }
      if (!model.position) {
        errors.push(`${label}: model ${modelId} is not on the table`);
        continue;
      }
      const moved = Math.hypot(dest.x - model.position.x, dest.y - model.position.y);
      if (moved > maxInches + EPSILON) {
        errors.push(`${label}: model ${modelId} moves ${fmt(moved)} (max ${fmt(maxInches)})`);
      }
      if (!this.withinBoard(dest, state)) {
        errors.push(`${label}: model ${modelId} would leave the battlefield`);
      }
    }
    if (errors.length > 0) return errors;

    const projected = this.project(unit, movements);
    const others = Object.values(state.units)
      .filter((u) => u.id !== unit.id)
      .flatMap((u) => u.models.filter((m) => m.alive && m.position !== null));

    for (const model of projected) {
      if (!Object.prototype.hasOwnProperty.call(movements, model.id)) continue;
      const clash =
        others.find((o) => this.measurement.modelsOverlap(model, o)) ??
        projected.find((o) => o.id !== model.id && this.measurement.modelsOverlap(model, o));
      if (clash) {
        errors.push(`${label}: model ${model.id} would overlap ${clash.id}`);
      }
    }

    if (!this.isCoherent(projected)) {
      errors.push(`${label}: unit ${unit.id} would break coherency`);
    }
    return errors;
  }

  /** Every model within coherency range of at least one other model. */
  isCoherent(models: Model[]): boolean {
    const placed = models.filter((m) => m.alive && m.position !== null);
    if (placed.length < 2) return true;
    const range = this.configService.get().coherencyInches;
    return placed.every((m) =>
      placed.some((o) => o.id !== m.id && this.measurement.distance(m, o) <= range + EPSILON),
    );
  }

  /** Destination no farther from the closest target than the starting point. */
  endsNoFarther(model: Model, dest: Position, targets: Model[]): boolean {
    if (!model.position || targets.length === 0) return false;
    const before = this.closestDistance(model, targets);
    const after = this.closestDistance({ ...model, position: dest }, targets);
    return after <= before + EPSILON;
  }

  /** Destination no farther from the closest point than the starting point. */
  endsNoFartherFromPoint(model: Model, dest: Position, points: Position[]): boolean {
    if (!model.position || points.length === 0) return false;
    const moved = { ...model, position: dest };
    const before = Math.min(...points.map((p) => this.measurement.distanceToPoint(model, p)));
    const after = Math.min(...points.map((p) => this.measurement.distanceToPoint(moved, p)));
    return after <= before + EPSILON;
  }

  closestDistance(model: Model, targets: Model[]): number {
    return Math.min(
      Number.POSITIVE_INFINITY,
      ...targets.map((t) => this.measurement.distance(model, t)),
    );
  }

  private withinBoard(p: Position, state: WorldState): boolean {
    return p.x >= 0 && p.y >= 0 && p.x <= state.board.width && p.y <= state.board.height;
  }
}
