// 실드 판단 휴리스틱 — 사용 여부 + 사용/미사용 가중치

import { Injectable } from '@nestjs/common';
import type { ChargedMove, Combatant, DamageActor } from '../../model/index.js';
import { isSelfAttackDebuffing } from '../moves/move-metrics.js';
import { DamageService } from './damage.service.js';

export interface ShieldDecision {
  value: boolean;
  shieldWeight: number;
  noShieldWeight: number;
}

export type ShieldAttacker = DamageActor & Pick<Combatant, 'energy' | 'fastMove' | 'chargedMoves'>;
export type ShieldDefender = DamageActor & Pick<Combatant, 'hp' | 'shields'>;

/** 가정 상황 질의용 (탐색/보류 판단) */
export interface ShieldOverrides {
  defenderHp?: number;
  defenderShields?: number;
  attackerEnergy?: number;
}

const DEFAULT_SHIELD_WEIGHT = 1;
const DEFAULT_NO_SHIELD_WEIGHT = 2;

@Injectable()
export class ShieldDecisionService {
  constructor(private readonly damageService: DamageService) {}

  wouldShield(
    attacker: ShieldAttacker,
    defender: ShieldDefender,
    move: ChargedMove,
    overrides: ShieldOverrides = {},
  ): ShieldDecision {
    const hp = overrides.defenderHp ?? defender.hp;
    const shields = overrides.defenderShields ?? defender.shields;
    const energy = overrides.attackerEnergy ?? attacker.energy;

    let value = false;
    let shieldWeight = DEFAULT_SHIELD_WEIGHT;
    const noShieldWeight = DEFAULT_NO_SHIELD_WEIGHT;

    if (shields <= 0) {
      return { value, shieldWeight, noShieldWeight };
    }

    const damage = this.damageService.calculateDamage(attacker, defender, move);
    const postMoveHp = hp - damage;
    const fastDamage = this.damageService.calculateDamage(attacker, defender, attacker.fastMove);

    // 다음 사이클까지 버틸 수 있는지 — 사이클당 누적 피해
    const gain = attacker.fastMove.energyGain;
    const fastAttacks =
      gain > 0 ? Math.ceil((move.energyCost - Math.max(energy - move.energyCost, 0)) / gain) + 1 : 1;
    const cycleDamage = (fastAttacks * fastDamage + 1) * shields;

    if (postMoveHp <= cycleDamage) {
      value = true;
      shieldWeight = 2;
    }

    if (damage >= hp) {
      value = true;
      shieldWeight = 4;
    }

    const fastDpt = attacker.fastMove.turns > 0 ? fastDamage / attacker.fastMove.turns : 0;

    for (const chargedMove of attacker.chargedMoves) {
      const chargedDamage = this.damageService.calculateDamage(attacker, defender, chargedMove);

      if (chargedDamage >= hp / 1.4 && fastDpt > 1.5) {
        value = true;
        shieldWeight = 4;
      }

      if (chargedDamage >= hp - cycleDamage) {
        value = true;
        shieldWeight = 4;
      }

      if (chargedDamage >= hp / 2 && fastDpt > 2) {
        shieldWeight = 12;
      }
    }

    // 연속 공격 디버프 기술의 첫 타가 크면 막는다
    if (isSelfAttackDebuffing(move) && hp > 0 && damage / hp > 0.55) {
      value = true;
      shieldWeight = 4;
    }

    return { value, shieldWeight, noShieldWeight };
  }
}
