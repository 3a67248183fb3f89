// Player intents. One variant per action name; each carries only what it needs.

import type {
  PlayerId,
  ResolutionMode,
  Stance,
} from './enums.js';
import type { Position } from './world-state.js';

type Base<T extends string> = {
  type: T;
  player: PlayerId;
  timestamp?: number;
};

/** model id → destination */
export type ModelMovements = Record<string, Position>;

export type AttackAssignmentInput = {
  weapon_id: string;
  target_unit_id: string;
  /** Attacking models carrying the weapon; all alive models when omitted. */
  model_ids?: string[];
};

export type SaveOutcome = {
  roll: number;
  passed: boolean;
};

export type SaveResultInput = {
  target_unit_id: string;
  weapon_id: string;
  outcomes: SaveOutcome[];
};

export type ToggleDebugModeAction = Base<'TOGGLE_DEBUG_MODE'> & { enabled: boolean };
export type DebugMoveAction = Base<'DEBUG_MOVE'> & {
  unit_id: string;
  model_id: string;
  position: Position;
};

export type DeployUnitAction = Base<'DEPLOY_UNIT'> & {
  unit_id: string;
  positions: Position[];
  rotations?: number[];
};
export type PlaceInReservesAction = Base<'PLACE_IN_RESERVES'> & { unit_id: string };

export type RollOffAction = Base<'ROLL_OFF'>;
export type ChooseFirstTurnAction = Base<'CHOOSE_FIRST_TURN'> & { first_player: PlayerId };

export type ScoutMoveAction = Base<'SCOUT_MOVE'> & {
  unit_id: string;
  movements: ModelMovements;
};
export type EndScoutPhaseAction = Base<'END_SCOUT_PHASE'>;

export type SelectShooterAction = Base<'SELECT_SHOOTER'> & { unit_id: string };
export type AssignTargetAction = Base<'ASSIGN_TARGET'> & {
  unit_id: string;
  weapon_id: string;
  target_unit_id: string;
  model_ids?: string[];
};
export type ClearAssignmentsAction = Base<'CLEAR_ASSIGNMENTS'> & { unit_id: string };
export type ConfirmTargetsAction = Base<'CONFIRM_TARGETS'> & { unit_id: string };
export type ResolveShootingAction = Base<'RESOLVE_SHOOTING'> & {
  unit_id: string;
  mode: ResolutionMode;
  weapon_order?: string[];
};
export type EndShootingAction = Base<'END_SHOOTING'>;

export type SelectFighterAction = Base<'SELECT_FIGHTER'> & { unit_id: string };
export type SelectStanceAction = Base<'SELECT_STANCE'> & {
  unit_id: string;
  stance: Stance;
};
export type DeclareEpicChallengeAction = Base<'DECLARE_EPIC_CHALLENGE'> & { unit_id: string };
export type RespondEpicChallengeAction = Base<'RESPOND_EPIC_CHALLENGE'> & {
  unit_id: string;
  accept: boolean;
};
export type UseCounterOffensiveAction = Base<'USE_COUNTER_OFFENSIVE'> & { unit_id: string };
export type PileInAction = Base<'PILE_IN'> & {
  unit_id: string;
  movements: ModelMovements;
};
export type AssignAttacksAction = Base<'ASSIGN_ATTACKS'> & {
  unit_id: string;
  assignments: AttackAssignmentInput[];
};
export type ConfirmAndResolveAttacksAction = Base<'CONFIRM_AND_RESOLVE_ATTACKS'> & {
  unit_id: string;
};
export type ResolveWeaponSequenceAction = Base<'RESOLVE_WEAPON_SEQUENCE'> & {
  unit_id: string;
  mode: ResolutionMode;
  weapon_order?: string[];
};
export type ConsolidateAction = Base<'CONSOLIDATE'> & {
  unit_id: string;
  movements: ModelMovements;
};
export type EndFightAction = Base<'END_FIGHT'>;

export type ApplySavesAction = Base<'APPLY_SAVES'> & {
  save_results: SaveResultInput[];
};
export type ContinueSequenceAction = Base<'CONTINUE_SEQUENCE'> & {
  unit_id: string;
  /** New order for the weapons not yet resolved. */
  weapon_order?: string[];
};
export type SkipUnitAction = Base<'SKIP_UNIT'> & { unit_id: string };

export type Action =
  | ToggleDebugModeAction
  | DebugMoveAction
  | DeployUnitAction
  | PlaceInReservesAction
  | RollOffAction
  | ChooseFirstTurnAction
  | ScoutMoveAction
  | EndScoutPhaseAction
  | SelectShooterAction
  | AssignTargetAction
  | ClearAssignmentsAction
  | ConfirmTargetsAction
  | ResolveShootingAction
  | EndShootingAction
  | SelectFighterAction
  | SelectStanceAction
  | DeclareEpicChallengeAction
  | RespondEpicChallengeAction
  | UseCounterOffensiveAction
  | PileInAction
  | AssignAttacksAction
  | ConfirmAndResolveAttacksAction
  | ResolveWeaponSequenceAction
  | ConsolidateAction
  | EndFightAction
  | ApplySavesAction
  | ContinueSequenceAction
  | SkipUnitAction;

export type ActionType = Action['type'];

export type ActionOf<T extends ActionType> = Extract<Action, { type: T }>;
