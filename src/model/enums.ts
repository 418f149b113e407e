// 배틀 엔진 공용 열거형

export const ELEMENT_TYPE = [
  'normal',
  'fighting',
  'flying',
  'poison',
  'ground',
  'rock',
  'bug',
  'ghost',
  'steel',
  'fire',
  'water',
  'grass',
  'electric',
  'psychic',
  'ice',
  'dragon',
  'dark',
  'fairy',
] as const;
export type ElementType = (typeof ELEMENT_TYPE)[number];

export const BUFF_TARGET = ['SELF', 'OPPONENT'] as const;
export type BuffTarget = (typeof BUFF_TARGET)[number];

export const SHADOW_TYPE = ['NORMAL', 'SHADOW', 'PURIFIED'] as const;
export type ShadowType = (typeof SHADOW_TYPE)[number];

export const DECISION_MODE = ['AI', 'RANDOM'] as const;
export type DecisionMode = (typeof DECISION_MODE)[number];

export const BATTLE_OUTCOME = ['KO', 'TIMEOUT'] as const;
export type BattleOutcome = (typeof BATTLE_OUTCOME)[number];

export const TIMELINE_ACTION = ['FAST', 'CHARGED'] as const;
export type TimelineAction = (typeof TIMELINE_ACTION)[number];

export const DECISION_REASON = [
  'NO_CHARGED_MOVES',
  'CHARGING',
  'FARMING',
  'SURVIVAL',
  'LETHAL',
  'TIMING',
  'DEFERRED',
  'SEARCH',
  'SEARCH_EXHAUSTED',
  'RANDOM',
] as const;
export type DecisionReason = (typeof DECISION_REASON)[number];
