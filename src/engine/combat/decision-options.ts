// 가중치 기반 선택 — 누적합 탐색

import { InternalError } from '../../common/errors/battle-errors.js';
import type { Rng } from '../rng/rng.service.js';

export interface DecisionOption<T = undefined> {
  name: string;
  weight: number;
  value?: T;
}

/**
 * [0, 총합) 균등 추출 후 누적합으로 선택.
 * 총합 0이면 난수 소비 없이 첫 번째 옵션.
 */
export function chooseOption<T>(options: ReadonlyArray<DecisionOption<T>>, rng: Rng): DecisionOption<T> {
  const [first] = options;
  if (first === undefined) {
    throw new InternalError('chooseOption called with no options');
  }

  const total = options.reduce((sum, o) => sum + Math.max(0, o.weight), 0);
  if (total <= 0) return first;

  const roll = rng.next() * total;
  let cumulative = 0;
  for (const option of options) {
    cumulative += Math.max(0, option.weight);
    if (roll < cumulative) return option;
  }

  // 부동소수 오차로 끝까지 간 경우 — 가중치가 있는 마지막 옵션
  for (let i = options.length - 1; i >= 0; i--) {
    if (options[i].weight > 0) return options[i];
  }
  return first;
}
