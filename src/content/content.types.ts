// Content seed types (content/*.json)

import { z } from 'zod';
import { WEAPON_TYPE } from '../types/index.js';
import type { WeaponProfile } from '../types/index.js';

export const weaponProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.enum(WEAPON_TYPE),
  range: z.number().min(0),
  attacks: z.number().int().min(1),
  skill: z.number().int().min(2).max(6),
  strength: z.number().int().min(1),
  ap: z.number().int().max(0),
  damage: z.number().int().min(1),
  keywords: z.array(z.string()).default([]),
});

export const weaponListSchema = z.array(weaponProfileSchema);

/** Read side of the weapon content consumed by the rules engine. */
export interface WeaponCatalog {
  getWeapon(id: string): WeaponProfile | undefined;
}
