import { z } from 'zod';
import { RESOLUTION_MODE, STANCE } from '../../types/index.js';
import { playerIdSchema, positionSchema } from './create-game.dto.js';

const base = { player: playerIdSchema, timestamp: z.number().optional() };
const unitId = z.string().min(1).max(80);
const movements = z.record(z.string(), positionSchema);
const weaponOrder = z.array(z.string().min(1)).optional();

const attackAssignment = z.object({
  weapon_id: z.string().min(1),
  target_unit_id: unitId,
  model_ids: z.array(z.string().min(1)).optional(),
});

const saveResult = z.object({
  target_unit_id: unitId,
  weapon_id: z.string().min(1),
  outcomes: z.array(z.object({ roll: z.number().int().min(1).max(6), passed: z.boolean() })),
});

export const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('TOGGLE_DEBUG_MODE'), ...base, enabled: z.boolean() }),
  z.object({
    type: z.literal('DEBUG_MOVE'),
    ...base,
    unit_id: unitId,
    model_id: z.string().min(1),
    position: positionSchema,
  }),
  z.object({
    type: z.literal('DEPLOY_UNIT'),
    ...base,
    unit_id: unitId,
    positions: z.array(positionSchema).min(1),
    rotations: z.array(z.number()).optional(),
  }),
  z.object({ type: z.literal('PLACE_IN_RESERVES'), ...base, unit_id: unitId }),
  z.object({ type: z.literal('ROLL_OFF'), ...base }),
  z.object({ type: z.literal('CHOOSE_FIRST_TURN'), ...base, first_player: playerIdSchema }),
  z.object({ type: z.literal('SCOUT_MOVE'), ...base, unit_id: unitId, movements }),
  z.object({ type: z.literal('END_SCOUT_PHASE'), ...base }),
  z.object({ type: z.literal('SELECT_SHOOTER'), ...base, unit_id: unitId }),
  z.object({ type: z.literal('ASSIGN_TARGET'), ...base, unit_id: unitId, ...attackAssignment.shape }),
  z.object({ type: z.literal('CLEAR_ASSIGNMENTS'), ...base, unit_id: unitId }),
  z.object({ type: z.literal('CONFIRM_TARGETS'), ...base, unit_id: unitId }),
  z.object({
    type: z.literal('RESOLVE_SHOOTING'),
    ...base,
    unit_id: unitId,
    mode: z.enum(RESOLUTION_MODE),
    weapon_order: weaponOrder,
  }),
  z.object({ type: z.literal('END_SHOOTING'), ...base }),
  z.object({ type: z.literal('SELECT_FIGHTER'), ...base, unit_id: unitId }),
  z.object({ type: z.literal('SELECT_STANCE'), ...base, unit_id: unitId, stance: z.enum(STANCE) }),
  z.object({ type: z.literal('DECLARE_EPIC_CHALLENGE'), ...base, unit_id: unitId }),
  z.object({ type: z.literal('RESPOND_EPIC_CHALLENGE'), ...base, unit_id: unitId, accept: z.boolean() }),
  z.object({ type: z.literal('USE_COUNTER_OFFENSIVE'), ...base, unit_id: unitId }),
  z.object({ type: z.literal('PILE_IN'), ...base, unit_id: unitId, movements }),
  z.object({
    type: z.literal('ASSIGN_ATTACKS'),
    ...base,
    unit_id: unitId,
    assignments: z.array(attackAssignment).min(1),
  }),
  z.object({ type: z.literal('CONFIRM_AND_RESOLVE_ATTACKS'), ...base, unit_id: unitId }),
  z.object({
    type: z.literal('RESOLVE_WEAPON_SEQUENCE'),
    ...base,
    unit_id: unitId,
    mode: z.enum(RESOLUTION_MODE),
    weapon_order: weaponOrder,
  }),
  z.object({ type: z.literal('CONSOLIDATE'), ...base, unit_id: unitId, movements }),
  z.object({ type: z.literal('END_FIGHT'), ...base }),
  z.object({ type: z.literal('APPLY_SAVES'), ...base, save_results: z.array(saveResult).min(1) }),
  z.object({ type: z.literal('CONTINUE_SEQUENCE'), ...base, unit_id: unitId, weapon_order: weaponOrder }),
  z.object({ type: z.literal('SKIP_UNIT'), ...base, unit_id: unitId }),
]);

export const SubmitActionBodySchema = z.object({
  action: ActionSchema,
  /** Number of actions the client has seen accepted. */
  expectedSeq: z.number().int().min(0),
});

export type SubmitActionBody = z.infer<typeof SubmitActionBodySchema>;
