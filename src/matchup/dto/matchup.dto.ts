import { z } from 'zod';
import { CombatantConfigSchema } from '../../engine/combatant/dto/combatant-config.dto.js';
import { SimulationOptionsSchema } from '../../engine/battle/dto/simulation-options.dto.js';

/** 매치업 파일 — 시뮬레이션 옵션 + 전투원 구성 2개 */
export const MatchupSchema = SimulationOptionsSchema.extend({
  name: z.string().optional(),
  combatants: z.tuple([CombatantConfigSchema, CombatantConfigSchema]),
});

export type Matchup = z.output<typeof MatchupSchema>;
