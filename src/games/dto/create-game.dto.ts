import { z } from 'zod';
import { BASE_TYPE } from '../../types/index.js';

export const playerIdSchema = z.union([z.literal(1), z.literal(2)]);

export const positionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const polygonSchema = z.array(positionSchema).min(3);

const abilitySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('FIGHTS_FIRST') }),
  z.object({ kind: z.literal('SCOUT'), inches: z.number().positive() }),
  z.object({ kind: z.literal('STANCES') }),
  z.object({ kind: z.literal('DREAD_FOE'), mortal_wounds: z.number().int().min(1) }),
  z.object({ kind: z.literal('DEADLY_DEMISE'), mortal_wounds: z.number().int().min(1) }),
]);

const modelSchema = z.object({
  id: z.string().min(1).max(80).optional(),
  base_mm: z.number().positive().default(32),
  base_type: z.enum(BASE_TYPE).default('circular'),
  base_length_mm: z.number().positive().optional(),
  position: positionSchema.optional(),
  rotation: z.number().default(0),
});

const unitSchema = z.object({
  id: z.string().min(1).max(80).regex(/^[^.]+$/, 'must not contain "."'),
  owner: playerIdSchema,
  name: z.string().min(1).max(120),
  keywords: z.array(z.string()).default([]),
  abilities: z.array(abilitySchema).default([]),
  weapons: z.array(z.string().min(1)).min(1),
  stats: z.object({
    movement: z.number().min(0),
    toughness: z.number().int().min(1),
    save: z.number().int().min(2).max(7),
    invuln_save: z.number().int().min(2).max(6).nullable().default(null),
    wounds: z.number().int().min(1),
  }),
  models: z.array(modelSchema).min(1),
  /** Set by the scenario; only meaningful when the game starts in battle. */
  charged_this_turn: z.boolean().optional(),
});

export const CreateGameBodySchema = z
  .object({
    seed: z.string().min(1).max(80).optional(),
    start_phase: z.enum(['DEPLOYMENT', 'SHOOTING', 'FIGHT']).default('DEPLOYMENT'),
    first_player: playerIdSchema.default(1),
    debug_mode: z.boolean().default(false),
    board: z.object({
      width: z.number().positive(),
      height: z.number().positive(),
      deployment_zones: z.object({ '1': polygonSchema, '2': polygonSchema }),
      objectives: z
        .array(z.object({ id: z.string().min(1), position: positionSchema, radius: z.number().min(0) }))
        .default([]),
      terrain: z
        .array(z.object({ id: z.string().min(1), polygon: polygonSchema, multi_level: z.boolean().default(false) }))
        .default([]),
    }),
    units: z.array(unitSchema).min(1),
  })
  .superRefine((body, ctx) => {
    const seen = new Set<string>();
    body.units.forEach((unit, i) => {
      if (seen.has(unit.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['units', i, 'id'], message: `duplicate unit id ${unit.id}` });
      }
      seen.add(unit.id);
      if (body.start_phase === 'DEPLOYMENT') return;
      unit.models.forEach((model, j) => {
        if (!model.position) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['units', i, 'models', j, 'position'],
            message: `required when starting in ${body.start_phase}`,
          });
        }
      });
    });
  });

export type CreateGameBody = z.infer<typeof CreateGameBodySchema>;
