import { z } from 'zod';
import { BUFF_TARGET, ELEMENT_TYPE, SHADOW_TYPE } from '../../../model/index.js';

const MoveIdSchema = z.string().min(1).max(80);

export const FastMoveSchema = z.object({
  moveId: MoveIdSchema,
  name: z.string().optional(),
  type: z.enum(ELEMENT_TYPE),
  power: z.number().min(0),
  energyGain: z.number().int().min(0).max(100),
  turns: z.number().int().min(0).max(10),
});

export const BuffEffectSchema = z.object({
  multipliers: z.tuple([z.number().min(0), z.number().min(0)]),
  target: z.enum(BUFF_TARGET),
  chance: z.number().min(0).max(1).default(1),
});

export const ChargedMoveSchema = z.object({
  moveId: MoveIdSchema,
  name: z.string().optional(),
  type: z.enum(ELEMENT_TYPE),
  power: z.number().min(0),
  energyCost: z.number().int().min(0).max(100),
  buff: BuffEffectSchema.optional(),
});

const IvSchema = z.number().int().min(0).max(15);
const StageSchema = z.number().int().min(-4).max(4);

export const CombatantConfigSchema = z.object({
  id: z.string().min(1).max(80),
  name: z.string().max(80).optional(),
  types: z.array(z.enum(ELEMENT_TYPE)).min(1).max(2),
  baseStats: z.object({
    atk: z.number().positive(),
    def: z.number().positive(),
    hp: z.number().int().positive(),
  }),
  ivs: z
    .object({ atk: IvSchema, def: IvSchema, hp: IvSchema })
    .default({ atk: 0, def: 0, hp: 0 }),
  level: z.number().min(1).multipleOf(0.5),
  shadowType: z.enum(SHADOW_TYPE).default('NORMAL'),
  fastMove: FastMoveSchema,
  chargedMoves: z.array(ChargedMoveSchema).max(2).default([]),
  startingEnergy: z.number().int().min(0).max(100).default(0),
  startingBuffs: z.object({ atk: StageSchema, def: StageSchema }).default({ atk: 0, def: 0 }),
  startingHp: z.number().int().positive().optional(),
  shields: z.number().int().min(0).max(10).optional(),
  farmEnergy: z.boolean().default(false),
  baitShields: z.boolean().default(false),
  optimizeMoveTiming: z.boolean().default(false),
});

export type CombatantConfig = z.input<typeof CombatantConfigSchema>;
