// Builders for specs. Positions are inches; a 32mm base is ~1.26" across, so
// centres 2" apart sit 0.74" edge to edge (engaged) and 3" apart sit 1.74" (not).

import type {
  PlayerId,
  Position,
  Unit,
  UnitAbility,
  UnitEffects,
  UnitStats,
  UnitStatus,
  WeaponProfile,
  WorldState,
} from '../../types/index.js';
import { EngineConfigService } from '../engine-config.service.js';

export interface UnitOverrides {
  status?: UnitStatus;
  effects?: UnitEffects;
  keywords?: string[];
  abilities?: UnitAbility[];
  weapons?: string[];
  stats?: Partial<UnitStats>;
  name?: string;
}

export function makeUnit(
  id: string,
  owner: PlayerId,
  positions: Array<Position | null>,
  overrides: UnitOverrides = {},
): Unit {
  const stats: UnitStats = {
    movement: 6,
    toughness: 4,
    save: 3,
    invuln_save: null,
    wounds: 1,
    ...overrides.stats,
  };
  return {
    id,
    owner,
    status: overrides.status ?? 'DEPLOYED',
    models: positions.map((position, i) => ({
      id: `${id}-m${i}`,
      position: position ? { ...position } : null,
      rotation: 0,
      base_mm: 32,
      base_type: 'circular',
      alive: true,
      current_wounds: stats.wounds,
    })),
    effects: { ...overrides.effects },
    meta: {
      name: overrides.name ?? id,
      keywords: overrides.keywords ?? ['INFANTRY'],
      abilities: overrides.abilities ?? [],
      weapons: overrides.weapons ?? ['close_combat_weapon'],
      stats,
    },
  };
}

export function makeWorld(
  units: Unit[],
  meta: Partial<WorldState['meta']> = {},
): WorldState {
  return {
    meta: {
      game_id: 'test-game',
      battle_round: 1,
      active_player: 1,
      phase: 'FIGHT',
      first_player: 1,
      debug_mode: false,
      game_over: false,
      rng: { seed: 'test-seed', cursor: 0 },
      roll_off: null,
      ...meta,
    },
    board: {
      width: 60,
      height: 44,
      deployment_zones: {
        '1': [
          { x: 0, y: 0 },
          { x: 60, y: 0 },
          { x: 60, y: 12 },
          { x: 0, y: 12 },
        ],
        '2': [
          { x: 0, y: 32 },
          { x: 60, y: 32 },
          { x: 60, y: 44 },
          { x: 0, y: 44 },
        ],
      },
      objectives: [],
      terrain: [],
    },
    players: {
      '1': { cp: 3, kills: 0 },
      '2': { cp: 3, kills: 0 },
    },
    units: Object.fromEntries(units.map((u) => [u.id, u])),
  };
}

export const TEST_WEAPONS: WeaponProfile[] = [
  { id: 'close_combat_weapon', name: 'Close combat weapon', type: 'MELEE', range: 0, attacks: 3, skill: 3, strength: 4, ap: 0, damage: 1, keywords: [] },
  { id: 'power_fist', name: 'Power fist', type: 'MELEE', range: 0, attacks: 3, skill: 3, strength: 8, ap: -2, damage: 2, keywords: [] },
  { id: 'bolt_rifle', name: 'Bolt rifle', type: 'RANGED', range: 24, attacks: 2, skill: 3, strength: 4, ap: -1, damage: 1, keywords: [] },
  { id: 'plasma_gun', name: 'Plasma gun', type: 'RANGED', range: 24, attacks: 1, skill: 3, strength: 7, ap: -2, damage: 1, keywords: [] },
];

export function testConfig(): EngineConfigService {
  const config = new EngineConfigService();
  config.update({ debugModeAllowed: true });
  return config;
}
