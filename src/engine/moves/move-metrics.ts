// 기술 파생 지표 + 버프 분류 — 저장하지 않고 계산

import type { ChargedMove, FastMove } from '../../model/index.js';

export const TURN_MS = 500;

export function cooldownMs(move: FastMove): number {
  return move.turns * TURN_MS;
}

/** 초당 피해. 쿨다운 0이면 0 */
export function dps(move: FastMove): number {
  const cooldown = cooldownMs(move);
  return cooldown > 0 ? move.power / (cooldown / 1000) : 0;
}

/** 초당 에너지. 쿨다운 0이면 0 */
export function eps(move: FastMove): number {
  const cooldown = cooldownMs(move);
  return cooldown > 0 ? move.energyGain / (cooldown / 1000) : 0;
}

/** 에너지당 피해. 비용 0이면 0 */
export function dpe(move: ChargedMove): number {
  return move.energyCost > 0 ? move.power / move.energyCost : 0;
}

/** 버프 배율 → 단계 변화량 */
export function buffStageDelta(multiplier: number): number {
  if (multiplier >= 2) return 2;
  if (multiplier >= 1.5) return 1;
  if (multiplier <= 0.5) return -2;
  if (multiplier <= 0.75) return -1;
  return 0;
}

export function stageDeltas(move: ChargedMove): { atk: number; def: number } {
  if (!move.buff) return { atk: 0, def: 0 };
  return {
    atk: buffStageDelta(move.buff.multipliers[0]),
    def: buffStageDelta(move.buff.multipliers[1]),
  };
}

// 발동 확률 0이면 어떤 분류에도 속하지 않는다
function activeBuff(move: ChargedMove) {
  return move.buff && move.buff.chance > 0 ? move.buff : undefined;
}

export function isSelfDebuffing(move: ChargedMove): boolean {
  const buff = activeBuff(move);
  return !!buff && buff.target === 'SELF' && (buff.multipliers[0] < 1 || buff.multipliers[1] < 1);
}

export function isSelfBuffing(move: ChargedMove): boolean {
  const buff = activeBuff(move);
  return !!buff && buff.target === 'SELF' && (buff.multipliers[0] > 1 || buff.multipliers[1] > 1);
}

export function isOpponentDebuffing(move: ChargedMove): boolean {
  const buff = activeBuff(move);
  return !!buff && buff.target === 'OPPONENT' && (buff.multipliers[0] < 1 || buff.multipliers[1] < 1);
}

export function isSelfAttackDebuffing(move: ChargedMove): boolean {
  const buff = activeBuff(move);
  return !!buff && buff.target === 'SELF' && buff.multipliers[0] < 1;
}

/** 자신에게 걸리는 단계 합 — 양수면 순수 강화 */
export function netSelfStageDelta(move: ChargedMove): number {
  const buff = activeBuff(move);
  if (!buff || buff.target !== 'SELF') return 0;
  const deltas = stageDeltas(move);
  return deltas.atk + deltas.def;
}
