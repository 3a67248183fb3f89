import type {
  AttackAssignment,
  AttackAssignmentInput,
  AttackModifiers,
  Unit,
  WeaponChoice,
  WeaponProfile,
} from '../../types/index.js';
import { aliveModels } from '../state/world-queries.js';

/** Fills in the carrying models: every alive model when none are named. */
export function toAssignment(unit: Unit, input: AttackAssignmentInput): AttackAssignment {
  return {
    weapon_id: input.weapon_id,
    target_unit_id: input.target_unit_id,
    model_ids: input.model_ids ? [...input.model_ids] : aliveModels(unit).map((m) => m.id),
  };
}

/**
 * Same weapon against the same target collapses into one entry whose model
 * ids are the union of both, in first-seen order.
 */
export function mergeAssignments(
  existing: AttackAssignment[],
  incoming: AttackAssignment[],
): AttackAssignment[] {
  const merged = existing.map((a) => ({ ...a, model_ids: [...a.model_ids] }));
  for (const next of incoming) {
    const match = merged.find(
      (a) => a.weapon_id === next.weapon_id && a.target_unit_id === next.target_unit_id,
    );
    if (!match) {
      merged.push({ ...next, model_ids: [...next.model_ids] });
      continue;
    }
    for (const id of next.model_ids) {
      if (!match.model_ids.includes(id)) match.model_ids.push(id);
    }
  }
  return merged;
}

export function distinctWeaponIds(assignments: AttackAssignment[]): string[] {
  return [...new Set(assignments.map((a) => a.weapon_id))];
}

export function weaponChoices(
  assignments: AttackAssignment[],
  profileOf: (id: string) => WeaponProfile | undefined,
): WeaponChoice[] {
  return distinctWeaponIds(assignments).map((weaponId) => ({
    weapon_id: weaponId,
    weapon_name: profileOf(weaponId)?.name ?? weaponId,
    target_unit_ids: [
      ...new Set(
        assignments.filter((a) => a.weapon_id === weaponId).map((a) => a.target_unit_id),
      ),
    ],
  }));
}

/** Roll modifiers granted by the attacker's activation effects. */
export function attackModifiers(unit: Unit): AttackModifiers {
  const { stance, precision, challenge_declined } = unit.effects;
  return {
    hit: (stance === 'AGGRESSIVE' ? 1 : 0) + (challenge_declined ? 1 : 0),
    wound: (stance === 'PRECISE' ? 1 : 0) + (precision ? 1 : 0),
  };
}
