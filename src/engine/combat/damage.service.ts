// 피해 계산 — floor(0.5 × 위력 × 공/방 × 상성 × 자속) + 1

import { Injectable } from '@nestjs/common';
import type { AttackMove, DamageActor } from '../../model/index.js';
import { stageMultiplier } from '../stats/stats.service.js';
import { TypeEffectivenessService } from '../typing/type-effectiveness.service.js';

export const STAB_MULTIPLIER = 1.2;
export const SHIELDED_DAMAGE = 1;
export const MAX_RATING = 1000;

export interface DamageOptions {
  /** 탐색 중 가정한 공격 단계 (기본: 공격자 현재 단계) */
  attackStage?: number;
}

@Injectable()
export class DamageService {
  constructor(private readonly typeService: TypeEffectivenessService) {}

  effectiveAttack(actor: DamageActor, attackStage: number = actor.buffs.atk): number {
    return actor.stats.atk * stageMultiplier(attackStage);
  }

  effectiveDefense(actor: DamageActor): number {
    return actor.stats.def * stageMultiplier(actor.buffs.def);
  }

  calculateDamage(
    attacker: DamageActor,
    defender: DamageActor,
    move: AttackMove,
    options: DamageOptions = {},
  ): number {
    const attack = this.effectiveAttack(attacker, options.attackStage);
    const defense = this.effectiveDefense(defender);
    const effectiveness = this.typeService.getEffectiveness(move.type, defender.types);
    const stab = attacker.types.includes(move.type) ? STAB_MULTIPLIER : 1;

    return Math.floor(0.5 * move.power * (attack / defense) * effectiveness * stab) + 1;
  }

  /** 실드 시 원래 피해와 관계없이 1 */
  resolveChargedDamage(rawDamage: number, shielded: boolean): number {
    return shielded ? SHIELDED_DAMAGE : rawDamage;
  }

  /**
   * 배틀 평가 (0~1000, 500 = 동률)
   * 500 × (내 잔여 체력 비율 + 상대에게 준 피해 비율)
   */
  duelRating(hp: number, maxHp: number, opponentHp: number, opponentMaxHp: number): number {
    const hpRatio = maxHp > 0 ? hp / maxHp : 0;
    const opponentRatio = opponentMaxHp > 0 ? opponentHp / opponentMaxHp : 0;
    const rating = Math.floor(500 * (hpRatio + (1 - opponentRatio)));
    return Math.max(0, Math.min(MAX_RATING, rating));
  }
}
