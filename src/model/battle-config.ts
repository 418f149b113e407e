// 배틀 규칙 + 의사결정 정책 상수

export type DecisionPolicy = {
  /** 싼 기술 dpe × ratio ≥ 비싼 기술 dpe 이면 미끼 사용 */
  baitDpeRatio: number;
  /** 실드를 유도할 것으로 예측되는 후보 가중치 배율 */
  baitShieldWeight: number;
  /** 가장 비싼 기술에 근접했을 때 가중치 배율 */
  farmCompletionWeight: number;
  farmCompletionMargin: number;
  /** 디버프 기술 보류 에너지 기준 = min(100, maxCost × factor) */
  deferEnergyFactor: number;
  selfBuffEnergyMargin: number;
  nearEqualCostMargin: number;
  comparableEnergyMargin: number;
  /** 양측 체력 비율이 이 이상이면 급할 것 없음 */
  healthyRatio: number;
  lowHealthRatio: number;
  lowHealthEnergy: number;
};

export type BattleConfig = {
  defaultShields: number;
  timeLimitMs: number;
  turnDurationMs: number;
  maxSearchStates: number;
  policy: DecisionPolicy;
};
