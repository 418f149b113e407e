import { z } from 'zod';
import { DECISION_MODE } from '../../../model/index.js';

const ShieldCountSchema = z.number().int().min(0).max(10);
const ModeSchema = z.enum(DECISION_MODE);

export const SimulationOptionsSchema = z.object({
  seed: z.string().min(1),
  shields: z.union([ShieldCountSchema, z.tuple([ShieldCountSchema, ShieldCountSchema])]).optional(),
  maxTurns: z.number().int().positive().optional(),
  modes: z.union([ModeSchema, z.tuple([ModeSchema, ModeSchema])]).optional(),
  recordTimeline: z.boolean().optional(),
});
