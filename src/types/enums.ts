// Canonical enums shared by the engine, the phases and the HTTP layer

export const PLAYER_ID = [1, 2] as const;
export type PlayerId = (typeof PLAYER_ID)[number];

/** Players are keyed by their number as a string inside the world tree. */
export type PlayerKey = '1' | '2';

export const UNIT_STATUS = [
  'UNDEPLOYED',
  'DEPLOYED',
  'IN_RESERVES',
  'DESTROYED',
] as const;
export type UnitStatus = (typeof UNIT_STATUS)[number];

export const PHASE_TYPE = [
  'DEPLOYMENT',
  'ROLL_OFF',
  'SCOUT',
  'SHOOTING',
  'FIGHT',
  'GAME_OVER',
] as const;
export type PhaseType = (typeof PHASE_TYPE)[number];

export const FIGHT_TIER = ['FIGHTS_FIRST', 'NORMAL', 'FIGHTS_LAST'] as const;
export type FightTier = (typeof FIGHT_TIER)[number];
export type FightSubphase = FightTier | 'COMPLETE';

export const BASE_TYPE = ['circular', 'oval'] as const;
export type BaseType = (typeof BASE_TYPE)[number];

export const WEAPON_TYPE = ['RANGED', 'MELEE'] as const;
export type WeaponType = (typeof WEAPON_TYPE)[number];

export const ATTACK_KIND = ['SHOOTING', 'MELEE'] as const;
export type AttackKind = (typeof ATTACK_KIND)[number];

export const RESOLUTION_MODE = ['fast', 'sequential'] as const;
export type ResolutionMode = (typeof RESOLUTION_MODE)[number];

export const STANCE = ['AGGRESSIVE', 'PRECISE'] as const;
export type Stance = (typeof STANCE)[number];

export const KILL_CAUSE = ['ATTACK', 'MORTAL_WOUNDS', 'DEADLY_DEMISE'] as const;
export type KillCause = (typeof KILL_CAUSE)[number];
