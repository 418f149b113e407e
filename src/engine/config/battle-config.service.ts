// 배틀 설정 서비스 — 환경변수 기본값 + 런타임 변경 지원

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { z } from 'zod';
import { ConfigurationError } from '../../common/errors/battle-errors.js';
import { parseWithSchema } from '../../common/validation/zod-parse.js';
import type { BattleConfig, DecisionPolicy } from '../../model/index.js';

export const TURN_DURATION_MS = 500;

/** 테스트/임베딩용 환경변수 주입 토큰 — 없으면 process.env */
export const BATTLE_ENV = Symbol('BATTLE_ENV');

export type BattleEnv = Record<string, string | undefined>;

const EnvSchema = z.object({
  BATTLE_DEFAULT_SHIELDS: z.coerce.number().int().min(0).max(10).default(2),
  BATTLE_TIME_LIMIT_MS: z.coerce.number().int().positive().multipleOf(TURN_DURATION_MS).default(240000),
  BATTLE_MAX_SEARCH_STATES: z.coerce.number().int().positive().default(500),
  BATTLE_BAIT_DPE_RATIO: z.coerce.number().positive().default(1.5),
  BATTLE_BAIT_SHIELD_WEIGHT: z.coerce.number().positive().default(1.3),
  BATTLE_FARM_COMPLETION_WEIGHT: z.coerce.number().positive().default(1.2),
});

export type BattleConfigPatch = Partial<Omit<BattleConfig, 'policy' | 'turnDurationMs'>> & {
  policy?: Partial<DecisionPolicy>;
};

@Injectable()
export class BattleConfigService {
  private readonly logger = new Logger(BattleConfigService.name);
  private config: BattleConfig;

  constructor(@Optional() @Inject(BATTLE_ENV) env?: BattleEnv) {
    const parsed = parseWithSchema(
      EnvSchema,
      pickBattleEnv(env ?? process.env),
      'Battle environment',
      (message, details) => new ConfigurationError(message, details),
    );

    this.config = {
      defaultShields: parsed.BATTLE_DEFAULT_SHIELDS,
      timeLimitMs: parsed.BATTLE_TIME_LIMIT_MS,
      turnDurationMs: TURN_DURATION_MS,
      maxSearchStates: parsed.BATTLE_MAX_SEARCH_STATES,
      policy: {
        baitDpeRatio: parsed.BATTLE_BAIT_DPE_RATIO,
        baitShieldWeight: parsed.BATTLE_BAIT_SHIELD_WEIGHT,
        farmCompletionWeight: parsed.BATTLE_FARM_COMPLETION_WEIGHT,
        farmCompletionMargin: 5,
        deferEnergyFactor: 2,
        selfBuffEnergyMargin: 10,
        nearEqualCostMargin: 5,
        comparableEnergyMargin: 10,
        healthyRatio: 0.5,
        lowHealthRatio: 0.25,
        lowHealthEnergy: 70,
      },
    };
  }

  get(): BattleConfig {
    return this.config;
  }

  get policy(): DecisionPolicy {
    return this.config.policy;
  }

  /** 시간 제한 기준 최대 턴 수 */
  get maxTurns(): number {
    return Math.floor(this.config.timeLimitMs / this.config.turnDurationMs);
  }

  /** 런타임 설정 변경 — 다음 simulate 호출부터 반영 */
  update(patch: BattleConfigPatch): BattleConfig {
    const { policy, ...rest } = patch;
    this.config = {
      ...this.config,
      ...rest,
      policy: { ...this.config.policy, ...policy },
    };
    this.logger.log(`Battle config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}

function pickBattleEnv(env: BattleEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    // 빈 문자열은 미설정으로 취급
    if (key.startsWith('BATTLE_') && value !== undefined && value !== '') {
      picked[key] = value;
    }
  }
  return picked;
}
