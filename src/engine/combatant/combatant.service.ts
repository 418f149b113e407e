// 전투원 생성/초기화 — 구성 오류는 턴 진행 전에 여기서만 발생

import { Injectable, Logger } from '@nestjs/common';
import { ConfigurationError } from '../../common/errors/battle-errors.js';
import { parseWithSchema } from '../../common/validation/zod-parse.js';
import type { Combatant } from '../../model/index.js';
import { StatsService } from '../stats/stats.service.js';
import { CombatantConfigSchema } from './dto/combatant-config.dto.js';

@Injectable()
export class CombatantService {
  private readonly logger = new Logger(CombatantService.name);

  constructor(private readonly statsService: StatsService) {}

  /** 검증 실패 시 ConfigurationError (issue 목록 포함) */
  create(config: unknown): Combatant {
    const parsed = parseWithSchema(
      CombatantConfigSchema,
      config,
      'Combatant config',
      (message, details) => new ConfigurationError(message, details),
    );

    const statInput = {
      baseStats: parsed.baseStats,
      ivs: parsed.ivs,
      level: parsed.level,
      shadowType: parsed.shadowType,
    };
    const stats = this.statsService.effectiveStats(statInput);
    const cp = this.statsService.combatPower(statInput);

    if (parsed.startingHp !== undefined && parsed.startingHp > stats.hp) {
      throw new ConfigurationError('Starting hp exceeds max hp', {
        combatantId: parsed.id,
        startingHp: parsed.startingHp,
        maxHp: stats.hp,
      });
    }
    if (stats.hp < 1) {
      throw new ConfigurationError('Combatant has no hp at this level', {
        combatantId: parsed.id,
        level: parsed.level,
      });
    }

    const start = {
      hp: parsed.startingHp ?? stats.hp,
      energy: parsed.startingEnergy,
      buffs: { ...parsed.startingBuffs },
      shields: parsed.shields,
    };

    const combatant: Combatant = {
      id: parsed.id,
      name: parsed.name ?? parsed.id,
      types: [...parsed.types],
      baseStats: { ...parsed.baseStats },
      ivs: { ...parsed.ivs },
      level: parsed.level,
      shadowType: parsed.shadowType,
      stats,
      cp,
      hp: start.hp,
      energy: start.energy,
      shields: start.shields ?? 0,
      buffs: { ...start.buffs },
      cooldown: 0,
      fastMove: { ...parsed.fastMove },
      chargedMoves: parsed.chargedMoves.map((m) => ({ ...m })),
      flags: {
        farmEnergy: parsed.farmEnergy,
        baitShields: parsed.baitShields,
        optimizeMoveTiming: parsed.optimizeMoveTiming,
      },
      start,
    };

    this.logger.debug(
      `Combatant ${combatant.id} created: CP ${cp}, hp ${stats.hp}, ` +
        `moves ${[combatant.fastMove.moveId, ...combatant.chargedMoves.map((m) => m.moveId)].join('/')}`,
    );
    return combatant;
  }

  /** 시작 상태로 되돌림 — 실드는 전투원 지정값 우선 */
  reset(combatant: Combatant, defaultShields: number): Combatant {
    combatant.hp = combatant.start.hp;
    combatant.energy = combatant.start.energy;
    combatant.buffs = { ...combatant.start.buffs };
    combatant.shields = combatant.start.shields ?? defaultShields;
    combatant.cooldown = 0;
    return combatant;
  }

  /** 배틀 전용 독립 사본. 기술 템플릿은 공유 */
  clone(combatant: Combatant): Combatant {
    return {
      ...combatant,
      types: [...combatant.types],
      baseStats: { ...combatant.baseStats },
      ivs: { ...combatant.ivs },
      stats: { ...combatant.stats },
      buffs: { ...combatant.buffs },
      flags: { ...combatant.flags },
      chargedMoves: [...combatant.chargedMoves],
      start: { ...combatant.start, buffs: { ...combatant.start.buffs } },
    };
  }
}
