// 기술 템플릿 — 배틀 간 공유되는 읽기 전용 값

import type { BuffTarget, ElementType } from './enums.js';

export type FastMove = {
  moveId: string;
  name?: string;
  type: ElementType;
  power: number;
  energyGain: number;
  turns: number; // 1턴 = 500ms
};

export type BuffEffect = {
  multipliers: [atk: number, def: number];
  target: BuffTarget;
  chance: number; // 0~1
};

export type ChargedMove = {
  moveId: string;
  name?: string;
  type: ElementType;
  power: number;
  energyCost: number;
  buff?: BuffEffect;
};

export type AttackMove = FastMove | ChargedMove;
