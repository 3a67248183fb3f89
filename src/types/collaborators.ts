// Capability surfaces the orchestration consumes. Concrete implementations are
// bound through the injection tokens in engine/rules/rules.tokens.ts.

import type { SaveResultInput } from './action.js';
import type {
  AttackRequest,
  DamageOutcome,
  SaveRequest,
  WeaponProfile,
  WoundsOutcome,
} from './combat.js';
import type { AttackKind } from './enums.js';
import type { StateDiff } from './state-diff.js';
import type { Board, Model, Position, WorldState } from './world-state.js';

export interface DiceSource {
  d6(): number;
  d3(): number;
  readonly cursor: number;
}

export interface Measurement {
  /** Edge-to-edge distance in inches. */
  distance(a: Model, b: Model): number;
  /** Distance in inches from the model's base edge to a point (0 when covering it). */
  distanceToPoint(model: Model, point: Position): number;
  isInEngagementRange(a: Model, b: Model, rangeInches: number): boolean;
  /** Engagement range that applies between two models on this board. */
  engagementRangeFor(a: Model, b: Model, board: Board): number;
  pointInZone(point: Position, polygon: Position[]): boolean;
  modelsOverlap(a: Model, b: Model): boolean;
}

export interface RulesEngine {
  getWeaponProfile(weaponId: string): WeaponProfile | undefined;
  /** Hit and wound rolls only; saves are collected from the defender. */
  resolveAttacksUntilWounds(
    request: AttackRequest,
    state: WorldState,
    dice: DiceSource,
  ): WoundsOutcome;
  applySaveDamage(
    result: SaveResultInput,
    request: SaveRequest,
    state: WorldState,
  ): DamageOutcome;
  applyMortalWounds(
    unitId: string,
    amount: number,
    state: WorldState,
  ): DamageOutcome;
  getEligibleTargets(unitId: string, state: WorldState, kind: AttackKind): string[];
}

export interface StateAuthority {
  applyStateChanges(diffs: StateDiff[]): void;
  createSnapshot(): WorldState;
}
