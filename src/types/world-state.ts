// World state tree. Every record is a type alias so the tree stays assignable to
// the generic diff applier's node type.

import type {
  BaseType,
  PhaseType,
  PlayerId,
  Stance,
  UnitStatus,
} from './enums.js';

export type Position = {
  x: number;
  y: number;
};

export type Model = {
  id: string;
  position: Position | null;
  rotation: number;
  base_mm: number;
  base_type: BaseType;
  /** Long axis for oval bases; base_mm is the short axis. */
  base_length_mm?: number;
  alive: boolean;
  current_wounds: number;
};

export type UnitAbility =
  | { kind: 'FIGHTS_FIRST' }
  | { kind: 'SCOUT'; inches: number }
  | { kind: 'STANCES' }
  | { kind: 'DREAD_FOE'; mortal_wounds: number }
  | { kind: 'DEADLY_DEMISE'; mortal_wounds: number };

/**
 * Named effects instead of a free-form flag bag.
 *
 * Lifetimes:
 * - turn: charged_this_turn, charge_from_intervention, has_shot, has_fought
 * - phase: fights_last (cleared when the Fight phase exits)
 * - activation: stance, precision, challenge_declined
 * - round: dread_foe_used_round
 */
export type UnitEffects = {
  charged_this_turn?: boolean;
  charge_from_intervention?: boolean;
  has_shot?: boolean;
  has_fought?: boolean;
  fights_last?: boolean;
  stance?: Stance;
  precision?: boolean;
  challenge_declined?: boolean;
  dread_foe_used_round?: number;
};

export type UnitStats = {
  movement: number;
  toughness: number;
  save: number;
  invuln_save: number | null;
  wounds: number;
};

export type UnitMeta = {
  name: string;
  keywords: string[];
  abilities: UnitAbility[];
  weapons: string[];
  stats: UnitStats;
};

export type Unit = {
  id: string;
  owner: PlayerId;
  status: UnitStatus;
  models: Model[];
  effects: UnitEffects;
  meta: UnitMeta;
};

export type Objective = {
  id: string;
  position: Position;
  /** Control radius in inches. */
  radius: number;
};

export type TerrainFeature = {
  id: string;
  polygon: Position[];
  multi_level: boolean;
};

export type RollOffRecord = {
  rolls: Array<{ player_1: number; player_2: number }>;
  winner: PlayerId;
};

export type PlayerState = {
  cp: number;
  kills: number;
};

export type WorldMeta = {
  game_id: string;
  battle_round: number;
  active_player: PlayerId;
  phase: PhaseType;
  first_player: PlayerId | null;
  debug_mode: boolean;
  game_over: boolean;
  rng: {
    seed: string;
    cursor: number;
  };
  roll_off: RollOffRecord | null;
};

export type Board = {
  width: number;
  height: number;
  deployment_zones: { '1': Position[]; '2': Position[] };
  objectives: Objective[];
  terrain: TerrainFeature[];
};

export type WorldState = {
  meta: WorldMeta;
  board: Board;
  players: { '1': PlayerState; '2': PlayerState };
  units: Record<string, Unit>;
};
