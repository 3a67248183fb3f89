// Combat records exchanged between the phases, the resolution pipeline and the
// rules collaborator.

import type {
  AttackKind,
  KillCause,
  PlayerId,
  ResolutionMode,
  WeaponType,
} from './enums.js';
import type { StateDiff } from './state-diff.js';

export type WeaponProfile = {
  id: string;
  name: string;
  type: WeaponType;
  /** Inches; 0 for melee weapons. */
  range: number;
  attacks: number;
  /** BS/WS target, e.g. 3 for 3+. */
  skill: number;
  strength: number;
  /** Zero or negative. */
  ap: number;
  damage: number;
  keywords: string[];
};

export type AttackAssignment = {
  weapon_id: string;
  target_unit_id: string;
  model_ids: string[];
};

export type AttackModifiers = {
  hit: number;
  wound: number;
};

export type AttackRequest = {
  attacker_unit_id: string;
  kind: AttackKind;
  assignments: AttackAssignment[];
  modifiers: AttackModifiers;
};

export type DiceRoll = {
  context: string;
  rolls: number[];
  threshold?: number;
  successes: number;
};

export type SaveRequest = {
  target_unit_id: string;
  attacker_unit_id: string;
  weapon_id: string;
  weapon_name: string;
  wounds: number;
  ap: number;
  damage: number;
  /** Armour save after AP, or the invulnerable save when that is better. 7 = no save. */
  save_target: number;
  invuln_save: number | null;
};

export type WoundsOutcome = {
  dice: DiceRoll[];
  hits: number;
  wounds: number;
  save_requests: SaveRequest[];
  log: string[];
};

export type DamageOutcome = {
  diffs: StateDiff[];
  casualties: number;
  destroyed_model_ids: string[];
  log: string[];
};

export type WeaponResultSummary = {
  weapon_ids: string[];
  target_unit_ids: string[];
  hits: number;
  wounds: number;
  saves_failed: number;
  casualties: number;
};

export type WeaponChoice = {
  weapon_id: string;
  weapon_name: string;
  target_unit_ids: string[];
};

export type KillEvent = {
  unit_id: string;
  owner: PlayerId;
  destroyed_by: PlayerId;
  cause: KillCause;
};

/** Transient per-activation record; never outlives the owning activation. */
export type ResolutionState = {
  unit_id: string;
  attacker: PlayerId;
  kind: AttackKind;
  mode: ResolutionMode | null;
  assignments: AttackAssignment[];
  weapon_order: string[];
  current_index: number;
  completed_weapons: WeaponResultSummary[];
  awaiting_saves: boolean;
  pending_save_data: SaveRequest[];
  /** hits/wounds of the step whose saves are pending */
  pending_step: { weapon_ids: string[]; hits: number; wounds: number } | null;
  awaiting_continue: boolean;
  dice_rolled: boolean;
};
