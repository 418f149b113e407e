import type {
  BattleOutcome,
  DecisionMode,
  DecisionReason,
  TimelineAction,
} from './enums.js';

export type Side = 0 | 1;

export type TimelineEvent = {
  turn: number;
  actor: Side;
  action: TimelineAction;
  moveId: string;
  damage: number;
  shielded: boolean;
  energyDelta: number;
  buffsApplied: boolean;
  reason?: DecisionReason;
};

export type BattleResult = {
  winner: Side | null;
  outcome: BattleOutcome;
  finalHp: [number, number];
  ratings: [number, number];
  turns: number;
  timeRemainingMs: number;
  timeline: TimelineEvent[];
};

export type SimulationOptions = {
  seed: string;
  shields?: number | [number, number];
  maxTurns?: number;
  modes?: DecisionMode | [DecisionMode, DecisionMode];
  recordTimeline?: boolean;
};
