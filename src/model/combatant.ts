// 배틀 1회가 독점 소유하는 전투원 상태

import type { ElementType, ShadowType } from './enums.js';
import type { ChargedMove, FastMove } from './move.js';

export type StatTriple = {
  atk: number;
  def: number;
  hp: number;
};

/** 버프 단계 [-4, 4] */
export type StatStages = {
  atk: number;
  def: number;
};

export type BehaviorFlags = {
  farmEnergy: boolean;
  baitShields: boolean;
  optimizeMoveTiming: boolean;
};

export type Combatant = {
  id: string;
  name: string;
  types: ElementType[];
  baseStats: StatTriple;
  ivs: StatTriple;
  level: number;
  shadowType: ShadowType;
  /** 레벨/IV/그림자 반영된 실효 스탯 (hp는 최대 체력) */
  stats: StatTriple;
  cp: number;

  hp: number;
  energy: number;
  shields: number;
  buffs: StatStages;
  cooldown: number; // ms, 진행 중인 일반 기술의 남은 시간

  fastMove: FastMove;
  chargedMoves: ChargedMove[];
  flags: BehaviorFlags;

  // reset 기준값
  start: {
    hp: number;
    energy: number;
    buffs: StatStages;
    shields?: number;
  };
};

/** 피해 계산에 필요한 최소 능력 */
export type DamageActor = Pick<Combatant, 'types' | 'stats' | 'buffs'>;
