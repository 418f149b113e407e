// 스탯 파이프라인 — CP 배율표, 그림자 보정, 버프 단계 배율

import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { ConfigurationError } from '../../common/errors/battle-errors.js';
import { parseWithSchema } from '../../common/validation/zod-parse.js';
import type { ShadowType, StatTriple } from '../../model/index.js';
import cpMultipliersJson from './cp-multipliers.json';

export const MIN_STAGE = -4;
export const MAX_STAGE = 4;
export const MIN_CP = 10;

const SHADOW_MULTIPLIERS: Record<ShadowType, { atk: number; def: number }> = {
  NORMAL: { atk: 1, def: 1 },
  SHADOW: { atk: 1.2, def: 0.833333 },
  PURIFIED: { atk: 1, def: 1 },
};

export interface StatInput {
  baseStats: StatTriple;
  ivs: StatTriple;
  level: number;
  shadowType: ShadowType;
}

export function clampStage(stage: number): number {
  return Math.max(MIN_STAGE, Math.min(MAX_STAGE, Math.trunc(stage)));
}

/**
 * 버프 단계 → 배율
 * 양수: max(2, 2+s)/2, 음수: 2/max(2, 2-s)
 */
export function stageMultiplier(stage: number): number {
  const s = clampStage(stage);
  if (s >= 0) return Math.max(2, 2 + s) / 2;
  return 2 / Math.max(2, 2 - s);
}

@Injectable()
export class StatsService {
  private readonly cpMultipliers: number[] = parseWithSchema(
    z.array(z.number().positive()).min(1),
    cpMultipliersJson,
    'CP multiplier table',
    (message, details) => new ConfigurationError(message, details),
  );

  get minLevel(): number {
    return 1;
  }

  get maxLevel(): number {
    return 1 + (this.cpMultipliers.length - 1) / 2;
  }

  /** 레벨 1부터 0.5 간격. 표 밖이면 ConfigurationError */
  cpMultiplier(level: number): number {
    const index = (level - 1) * 2;
    const cpm = Number.isInteger(index) ? this.cpMultipliers[index] : undefined;
    if (cpm === undefined) {
      throw new ConfigurationError(`Unsupported level ${level}`, {
        level,
        minLevel: this.minLevel,
        maxLevel: this.maxLevel,
      });
    }
    return cpm;
  }

  /** 실효 스탯: (기본 + IV) × CPM × 그림자 보정, hp는 내림 */
  effectiveStats(input: StatInput): StatTriple {
    const cpm = this.cpMultiplier(input.level);
    const shadow = SHADOW_MULTIPLIERS[input.shadowType];
    return {
      atk: (input.baseStats.atk + input.ivs.atk) * cpm * shadow.atk,
      def: (input.baseStats.def + input.ivs.def) * cpm * shadow.def,
      hp: Math.floor((input.baseStats.hp + input.ivs.hp) * cpm),
    };
  }

  /** CP = max(10, floor(atk × √def × √hp × cpm² / 10)) */
  combatPower(input: StatInput): number {
    const cpm = this.cpMultiplier(input.level);
    const shadow = SHADOW_MULTIPLIERS[input.shadowType];
    const atk = (input.baseStats.atk + input.ivs.atk) * shadow.atk;
    const def = (input.baseStats.def + input.ivs.def) * shadow.def;
    const hp = input.baseStats.hp + input.ivs.hp;
    const cp = Math.floor((atk * Math.sqrt(def) * Math.sqrt(hp) * cpm ** 2) / 10);
    return Math.max(MIN_CP, cp);
  }
}
