// Value types produced by every phase operation.

import type { ActionType } from './action.js';
import type {
  DiceRoll,
  KillEvent,
  SaveRequest,
  WeaponChoice,
  WeaponResultSummary,
} from './combat.js';
import type { PlayerId } from './enums.js';
import type { StateDiff } from './state-diff.js';

export type ValidationResult = {
  valid: boolean;
  errors: string[];
};

export const INPUT_KIND = [
  'SAVES',
  'WEAPON_ORDER',
  'CONTINUE_SEQUENCE',
  'STANCE',
  'EPIC_CHALLENGE_RESPONSE',
  'PILE_IN',
  'ASSIGN_ATTACKS',
  'CONSOLIDATE',
  'FIRST_TURN_CHOICE',
] as const;
export type InputKind = (typeof INPUT_KIND)[number];

/** What the driver must do next. */
export type FlowSignal =
  | { kind: 'CONTINUE' }
  | {
      kind: 'AWAITING_INPUT';
      input: InputKind;
      player: PlayerId;
      payload: Record<string, unknown>;
    }
  | { kind: 'COMPLETE' };

export type ResultMetadata = {
  phase_complete?: boolean;
  trigger_pile_in?: boolean;
  trigger_consolidate?: boolean;
  weapon_order_required?: boolean;
  weapons?: WeaponChoice[];
  sequential_pause?: boolean;
  remaining_weapons?: string[];
  completed_weapons?: WeaponResultSummary[];
  save_requests?: SaveRequest[];
  dice?: DiceRoll[];
  kills?: KillEvent[];
  newly_eligible_units?: string[];
  log?: string[];
};

export type ActionResult = {
  success: boolean;
  changes: StateDiff[];
  error?: string;
  errors: string[];
  flow: FlowSignal;
  metadata: ResultMetadata;
};

export type AvailableAction = {
  type: ActionType;
  player: PlayerId;
  unit_id?: string;
  description: string;
};
