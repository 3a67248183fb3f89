// Read-only helpers over the world tree. Nothing here mutates state.

import type {
  Model,
  PlayerId,
  PlayerKey,
  Unit,
  UnitAbility,
  WorldState,
} from '../../types/index.js';

export function playerKey(player: PlayerId): PlayerKey {
  return player === 1 ? '1' : '2';
}

export function otherPlayer(player: PlayerId): PlayerId {
  return player === 1 ? 2 : 1;
}

export function getUnit(state: WorldState, unitId: string): Unit | undefined {
  return Object.prototype.hasOwnProperty.call(state.units, unitId)
    ? state.units[unitId]
    : undefined;
}

export function aliveModels(unit: Unit): Model[] {
  return unit.models.filter((m) => m.alive);
}

/** Alive models that are physically on the table. */
export function placedModels(unit: Unit): Model[] {
  return unit.models.filter((m) => m.alive && m.position !== null);
}

export function isDestroyed(unit: Unit): boolean {
  return unit.status === 'DESTROYED' || aliveModels(unit).length === 0;
}

export function isOnBoard(unit: Unit): boolean {
  return unit.status === 'DEPLOYED' && placedModels(unit).length > 0;
}

export function unitsOf(state: WorldState, player: PlayerId): Unit[] {
  return Object.values(state.units).filter((u) => u.owner === player);
}

export function enemyUnitsOnBoard(state: WorldState, player: PlayerId): Unit[] {
  return Object.values(state.units).filter(
    (u) => u.owner !== player && isOnBoard(u),
  );
}

export function modelIndex(unit: Unit, modelId: string): number {
  return unit.models.findIndex((m) => m.id === modelId);
}

export function findAbility<K extends UnitAbility['kind']>(
  unit: Unit,
  kind: K,
): Extract<UnitAbility, { kind: K }> | undefined {
  for (const ability of unit.meta.abilities) {
    if (isAbilityOf(ability, kind)) return ability;
  }
  return undefined;
}

function isAbilityOf<K extends UnitAbility['kind']>(
  ability: UnitAbility,
  kind: K,
): ability is Extract<UnitAbility, { kind: K }> {
  return ability.kind === kind;
}

export function hasKeyword(unit: Unit, keyword: string): boolean {
  return unit.meta.keywords.some((k) => k.toUpperCase() === keyword.toUpperCase());
}

export const paths = {
  unitStatus: (unitId: string) => `units.${unitId}.status`,
  unitEffect: (unitId: string, effect: string) => `units.${unitId}.effects.${effect}`,
  modelField: (unitId: string, index: number, field: string) =>
    `units.${unitId}.models.${index}.${field}`,
  playerField: (player: PlayerId, field: string) =>
    `players.${playerKey(player)}.${field}`,
} as const;
