// d6 roll-off math shared by the hit and wound steps

import type { DiceRoll, DiceSource } from '../../types/index.js';

/** Roll modifiers never exceed +1 or -1 in total. */
export function clampModifier(modifier: number): number {
  return Math.max(-1, Math.min(1, modifier));
}

/**
 * Unmodified 1 always fails, unmodified 6 always succeeds; otherwise the
 * modified roll must reach the threshold.
 */
export function isSuccess(roll: number, threshold: number, modifier: number): boolean {
  if (roll === 1) return false;
  if (roll === 6) return true;
  return roll + clampModifier(modifier) >= threshold;
}

/** Strength against toughness. */
export function woundTarget(strength: number, toughness: number): number {
  if (strength >= toughness * 2) return 2;
  if (strength > toughness) return 3;
  if (strength === toughness) return 4;
  if (strength * 2 <= toughness) return 6;
  return 5;
}

/** Armour save worsened by AP, or the invulnerable save if better. 7 = no save. */
export function saveTarget(save: number, ap: number, invuln: number | null): number {
  const armour = save - ap;
  const best = invuln !== null ? Math.min(armour, invuln) : armour;
  return best > 6 ? 7 : best;
}

export function rollPool(
  dice: DiceSource,
  count: number,
  threshold: number,
  modifier: number,
  context: string,
): DiceRoll {
  const rolls: number[] = [];
  for (let i = 0; i < count; i++) rolls.push(dice.d6());
  return {
    context,
    rolls,
    threshold,
    successes: rolls.filter((r) => isSuccess(r, threshold, modifier)).length,
  };
}
