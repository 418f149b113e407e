// 특수 기술 선택 — 유한 상태 탐색(턴 순 큐 + 지배 가지치기) + 미끼/파밍/보류 정책

import { Injectable, Logger } from '@nestjs/common';
import type { ChargedMove, Combatant, DecisionReason } from '../../model/index.js';
import { BattleConfigService } from '../config/battle-config.service.js';
import { dpe, isSelfDebuffing, netSelfStageDelta, stageDeltas } from '../moves/move-metrics.js';
import type { Rng } from '../rng/rng.service.js';
import { clampStage } from '../stats/stats.service.js';
import { DamageService } from './damage.service.js';
import { chooseOption, type DecisionOption } from './decision-options.js';
import { ShieldDecisionService } from './shield-decision.service.js';

export const MAX_ENERGY = 100;
const EV_EPSILON = 1e-9;

/** 탐색 전용 상태 — 한 번의 판단 안에서만 존재 */
interface SearchState {
  energy: number;
  oppHealth: number;
  turn: number;
  oppShields: number;
  moves: ChargedMove[];
  atkStage: number;
  buffDelta: number;
  chance: number;
  /** 첫 기술을 파밍 없이 바로 쓸 수 있었는지 */
  rootReady: boolean;
}

interface Branch {
  p: number;
}

export interface SearchCandidate {
  move: ChargedMove;
  expectedValue: number;
  koTurn: number;
  damage: number;
  dpe: number;
}

export interface MoveSearchResult {
  candidates: SearchCandidate[];
  koTurn: number | null;
  exhausted: boolean;
  statesExplored: number;
}

export type MoveSelection =
  | { kind: 'FAST'; reason: DecisionReason }
  | { kind: 'CHARGED'; move: ChargedMove; reason: DecisionReason };

@Injectable()
export class MoveSelectionService {
  private readonly logger = new Logger(MoveSelectionService.name);

  constructor(
    private readonly configService: BattleConfigService,
    private readonly damageService: DamageService,
    private readonly shieldService: ShieldDecisionService,
  ) {}

  /**
   * 정책 적용 순서: 미끼(1) → 파밍(2) → 디버프 보류(3) → 탐색 + 기대값/dpe 정렬(4)
   * 이후 재정렬, 동률 그룹은 가중치 추첨
   */
  selectMove(self: Combatant, opponent: Combatant, rng: Rng): MoveSelection {
    const moves = self.chargedMoves;
    if (moves.length === 0) return { kind: 'FAST', reason: 'NO_CHARGED_MOVES' };

    let roots: ChargedMove[];
    if (self.flags.farmEnergy) {
      roots = [mostExpensive(moves)];
    } else {
      const bait = this.baitRoots(self, opponent);
      if (bait === 'FARM') return { kind: 'FAST', reason: 'FARMING' };
      roots = bait ?? [...moves];
    }

    roots = roots.filter((move) => !this.shouldDefer(self, opponent, move));
    if (roots.length === 0) return { kind: 'FAST', reason: 'DEFERRED' };

    const result = this.search(self, opponent, roots);

    if (result.candidates.length === 0) {
      if (result.exhausted) return this.exhaustedFallback(self, roots);
      return { kind: 'FAST', reason: 'SEARCH' };
    }

    const ordered = this.reorderCandidates(self, opponent, result.candidates);
    const [lead] = ordered;
    const ties = ordered.filter(
      (c) =>
        c === lead ||
        (this.compareCandidates(opponent, lead, c) === 0 &&
          Math.abs(c.expectedValue - lead.expectedValue) < EV_EPSILON &&
          isSelfDebuffing(c.move) === isSelfDebuffing(lead.move)),
    );

    if (ties.length === 1) {
      return { kind: 'CHARGED', move: lead.move, reason: 'SEARCH' };
    }

    const options = this.weightCandidates(self, opponent, ties);
    const picked = chooseOption(options, rng).value ?? lead.move;
    this.logger.debug(
      `${self.id} tie between ${ties.map((t) => t.move.moveId).join(', ')} → ${picked.moveId}`,
    );
    return { kind: 'CHARGED', move: picked, reason: 'SEARCH' };
  }

  /**
   * 턴 순으로 정렬된 인덱스 큐 위의 유한 탐색.
   * 루트 기술별로 가장 빠른 KO 턴과 그 턴의 확률 합(기대값)을 모은다.
   */
  search(self: Combatant, opponent: Combatant, roots: ReadonlyArray<ChargedMove>): MoveSearchResult {
    const { maxSearchStates } = this.configService.get();

    if (opponent.hp <= 0 || roots.length === 0) {
      return { candidates: [], koTurn: null, exhausted: false, statesExplored: 0 };
    }

    const arena: SearchState[] = [];
    const queue: number[] = [];
    arena.push({
      energy: self.energy,
      oppHealth: opponent.hp,
      turn: 0,
      oppShields: opponent.shields,
      moves: [],
      atkStage: self.buffs.atk,
      buffDelta: 0,
      chance: 1,
      rootReady: false,
    });
    queue.push(0);

    const finals = new Map<ChargedMove, { koTurn: number; ev: number; rootReady: boolean }>();
    let koTurn: number | null = null;
    let explored = 0;
    let exhausted = false;

    while (queue.length > 0) {
      if (explored >= maxSearchStates) {
        exhausted = true;
        break;
      }
      const index = queue.shift();
      if (index === undefined) break;
      const state = arena[index];
      explored++;

      // 큐는 턴 순 — 최단 KO 턴을 넘으면 더 볼 필요 없음
      if (koTurn !== null && state.turn > koTurn) break;

      if (state.oppHealth <= 0) {
        const [root] = state.moves;
        if (root === undefined) continue;
        if (koTurn === null) koTurn = state.turn;
        const entry = finals.get(root);
        if (!entry) {
          finals.set(root, { koTurn: state.turn, ev: state.chance, rootReady: state.rootReady });
        } else if (entry.koTurn === state.turn) {
          entry.ev += state.chance;
        }
        continue;
      }

      const nextMoves = state.moves.length === 0 ? roots : self.chargedMoves;
      for (const move of nextMoves) {
        for (const child of this.expand(self, opponent, state, move)) {
          insertByTurn(arena, queue, child);
        }
      }
    }

    const candidates: SearchCandidate[] = [];
    for (const [move, entry] of finals) {
      if (entry.koTurn !== koTurn || !entry.rootReady) continue;
      candidates.push({
        move,
        expectedValue: entry.ev,
        koTurn: entry.koTurn,
        damage: this.damageService.calculateDamage(self, opponent, move),
        dpe: dpe(move),
      });
    }
    candidates.sort((a, b) => b.expectedValue - a.expectedValue || b.dpe - a.dpe);

    if (exhausted) {
      this.logger.debug(`${self.id} search hit the ${maxSearchStates}-state cap`);
    }
    return { candidates, koTurn, exhausted, statesExplored: explored };
  }

  /**
   * 재정렬: 상대 실드 0 → 피해 내림차순, 실드 있음 → 비용 오름차순(비슷한 비용은 dpe).
   * 양측 체력이 넉넉하면 자기 디버프 기술은 비슷한 에너지의 일반 기술 뒤로.
   */
  reorderCandidates(
    self: Combatant,
    opponent: Combatant,
    candidates: ReadonlyArray<SearchCandidate>,
  ): SearchCandidate[] {
    const { policy } = this.configService.get();
    const ordered = [...candidates].sort((a, b) => this.compareCandidates(opponent, a, b));

    const healthy =
      ratio(self.hp, self.stats.hp) >= policy.healthyRatio &&
      ratio(opponent.hp, opponent.stats.hp) >= policy.healthyRatio;
    if (!healthy) return ordered;

    for (let i = 0; i < ordered.length; i++) {
      const candidate = ordered[i];
      if (!isSelfDebuffing(candidate.move) || candidate.damage >= opponent.hp) continue;

      let target = -1;
      for (let j = i + 1; j < ordered.length; j++) {
        const other = ordered[j];
        if (
          !isSelfDebuffing(other.move) &&
          Math.abs(other.move.energyCost - candidate.move.energyCost) <= policy.comparableEnergyMargin
        ) {
          target = j;
        }
      }
      if (target > i) {
        ordered.splice(i, 1);
        ordered.splice(target, 0, candidate);
        i--;
      }
    }
    return ordered;
  }

  compareCandidates(opponent: Combatant, a: SearchCandidate, b: SearchCandidate): number {
    const { policy } = this.configService.get();
    if (opponent.shields === 0) {
      return b.damage - a.damage;
    }
    const costDiff = a.move.energyCost - b.move.energyCost;
    if (Math.abs(costDiff) <= policy.nearEqualCostMargin) {
      return b.dpe - a.dpe;
    }
    return costDiff;
  }

  /**
   * 디버프 기술 보류 — 내 실드 0, 에너지 부족, 상대가 최강 기술 사용 가능,
   * 그 기술을 내가 막지 못할 것으로 예측될 때. 순수 강화 + 에너지 여유면 예외.
   */
  shouldDefer(self: Combatant, opponent: Combatant, move: ChargedMove): boolean {
    if (!isSelfDebuffing(move)) return false;
    if (self.shields > 0) return false;

    const { policy } = this.configService.get();
    const maxCost = mostExpensive(self.chargedMoves).energyCost;
    const threshold = Math.min(MAX_ENERGY, maxCost * policy.deferEnergyFactor);
    if (self.energy >= threshold) return false;

    const threat = this.strongestMove(opponent, self);
    if (!threat || opponent.energy < threat.energyCost) return false;
    if (this.shieldService.wouldShield(opponent, self, threat).value) return false;

    if (netSelfStageDelta(move) > 0 && self.energy >= move.energyCost + policy.selfBuffEnergyMargin) {
      return false;
    }

    this.logger.debug(`${self.id} defers ${move.moveId}: ${opponent.id} threatens ${threat.moveId}`);
    return true;
  }

  /** 상대에게 가장 큰 피해를 주는 특수 기술 */
  strongestMove(attacker: Combatant, defender: Combatant): ChargedMove | undefined {
    let best: ChargedMove | undefined;
    let bestDamage = -1;
    for (const move of attacker.chargedMoves) {
      const damage = this.damageService.calculateDamage(attacker, defender, move);
      if (damage > bestDamage) {
        best = move;
        bestDamage = damage;
      }
    }
    return best;
  }

  /**
   * 미끼: 싼 기술이 비싼 기술 대비 지나치게 비효율적이지 않으면 싼 기술 먼저.
   * null = 미끼 조건 아님, 'FARM' = 싼 기술조차 에너지 부족
   */
  private baitRoots(self: Combatant, opponent: Combatant): ChargedMove[] | 'FARM' | null {
    const { policy } = this.configService.get();
    if (!self.flags.baitShields || opponent.shields <= 0 || self.chargedMoves.length < 2) return null;

    const lowHealth =
      ratio(self.hp, self.stats.hp) < policy.lowHealthRatio && self.energy < policy.lowHealthEnergy;
    if (lowHealth) return null;

    const byCost = [...self.chargedMoves].sort((a, b) => a.energyCost - b.energyCost);
    const cheap = byCost[0];
    const costly = byCost[byCost.length - 1];
    if (cheap.energyCost === costly.energyCost) return null;

    if (dpe(cheap) * policy.baitDpeRatio < dpe(costly)) return null;
    if (self.energy < cheap.energyCost) return 'FARM';
    return [cheap];
  }

  /** 동률 후보 가중치 — 실드 유도 ×baitShieldWeight, 최고 비용 기술로 에너지 소진 ×farmCompletionWeight */
  weightCandidates(
    self: Combatant,
    opponent: Combatant,
    candidates: ReadonlyArray<SearchCandidate>,
  ): DecisionOption<ChargedMove>[] {
    const { policy } = this.configService.get();
    const maxCost = mostExpensive(self.chargedMoves).energyCost;

    return candidates.map((c) => {
      let weight = 1;
      if (opponent.shields > 0 && this.shieldService.wouldShield(self, opponent, c.move).value) {
        weight *= policy.baitShieldWeight;
      }
      if (
        c.move.energyCost === maxCost &&
        self.energy - c.move.energyCost <= policy.farmCompletionMargin
      ) {
        weight *= policy.farmCompletionWeight;
      }
      return { name: c.move.moveId, weight, value: c.move };
    });
  }

  /** 상태 상한 도달 — 다음 일반 기술로 에너지가 넘치면 dpe 최고 기술 사용 */
  private exhaustedFallback(self: Combatant, roots: ReadonlyArray<ChargedMove>): MoveSelection {
    const affordable = roots.filter((m) => self.energy >= m.energyCost);
    if (self.energy + self.fastMove.energyGain > MAX_ENERGY && affordable.length > 0) {
      const best = affordable.reduce((a, b) => (dpe(b) > dpe(a) ? b : a));
      this.logger.warn(`${self.id} search exhausted; throwing ${best.moveId} to avoid energy overflow`);
      return { kind: 'CHARGED', move: best, reason: 'SEARCH_EXHAUSTED' };
    }
    return { kind: 'FAST', reason: 'SEARCH_EXHAUSTED' };
  }

  private expand(
    self: Combatant,
    opponent: Combatant,
    state: SearchState,
    move: ChargedMove,
  ): SearchState[] {
    const gain = self.fastMove.energyGain;
    const fastTurns = Math.max(1, self.fastMove.turns);
    const ready = state.energy >= move.energyCost;

    let energy = state.energy;
    let turn = state.turn;
    let health = state.oppHealth;

    if (!ready) {
      if (gain <= 0) return [];
      const farmTurns = Math.ceil((move.energyCost - state.energy) / gain);
      const fastDamage = this.damageService.calculateDamage(self, opponent, self.fastMove, {
        attackStage: state.atkStage,
      });
      energy = Math.min(MAX_ENERGY, state.energy + farmTurns * gain);
      turn += farmTurns * fastTurns;
      health -= farmTurns * fastDamage;
    }

    const moveDamage = this.damageService.calculateDamage(self, opponent, move, {
      attackStage: state.atkStage,
    });
    const shieldBranches = this.shieldBranches(self, opponent, state, move, health, energy);
    const buffBranches = this.buffBranches(state, move);

    const base = {
      energy: energy - move.energyCost,
      turn: turn + 1,
      moves: [...state.moves, move],
      rootReady: state.moves.length === 0 ? ready : state.rootReady,
    };

    const children: SearchState[] = [];
    for (const shield of shieldBranches) {
      for (const buff of buffBranches) {
        children.push({
          ...base,
          oppHealth: health - (shield.shielded ? 1 : moveDamage),
          oppShields: state.oppShields - (shield.shielded ? 1 : 0),
          atkStage: buff.atkStage,
          buffDelta: buff.buffDelta,
          chance: state.chance * shield.p * buff.p,
        });
      }
    }
    return children;
  }

  // 실드 예측: 막는다 → 단일 분기, 안 막는다 → 가중치 비율로 두 분기
  private shieldBranches(
    self: Combatant,
    opponent: Combatant,
    state: SearchState,
    move: ChargedMove,
    health: number,
    energy: number,
  ): Array<Branch & { shielded: boolean }> {
    if (state.oppShields <= 0 || health <= 0) return [{ shielded: false, p: 1 }];

    const prediction = this.shieldService.wouldShield(self, opponent, move, {
      defenderHp: health,
      defenderShields: state.oppShields,
      attackerEnergy: energy,
    });
    if (prediction.value) return [{ shielded: true, p: 1 }];

    const total = prediction.shieldWeight + prediction.noShieldWeight;
    return [
      { shielded: false, p: prediction.noShieldWeight / total },
      { shielded: true, p: prediction.shieldWeight / total },
    ];
  }

  private buffBranches(
    state: SearchState,
    move: ChargedMove,
  ): Array<Branch & { atkStage: number; buffDelta: number }> {
    const unchanged = { atkStage: state.atkStage, buffDelta: state.buffDelta };
    const buff = move.buff;
    if (!buff || buff.chance <= 0 || buff.target !== 'SELF') return [{ ...unchanged, p: 1 }];

    const delta = stageDeltas(move);
    const applied = {
      atkStage: clampStage(state.atkStage + delta.atk),
      buffDelta: state.buffDelta + delta.atk + delta.def,
    };
    if (buff.chance >= 1) return [{ ...applied, p: 1 }];
    return [
      { ...applied, p: buff.chance },
      { ...unchanged, p: 1 - buff.chance },
    ];
  }
}

/**
 * 턴 오름차순 위치에 삽입. 같은 루트 기술의 다른 수순이 모든 면에서
 * 같거나 나으면 버린다 (같은 수순의 확률 분기끼리는 비교하지 않음).
 */
function insertByTurn(arena: SearchState[], queue: number[], child: SearchState): void {
  let i = 0;
  while (i < queue.length && arena[queue[i]].turn <= child.turn) {
    const other = arena[queue[i]];
    if (
      other.moves[0] === child.moves[0] &&
      !sameSequence(other.moves, child.moves) &&
      other.oppHealth <= child.oppHealth &&
      other.energy >= child.energy &&
      other.atkStage >= child.atkStage &&
      other.oppShields <= child.oppShields &&
      other.chance >= child.chance
    ) {
      return;
    }
    i++;
  }
  arena.push(child);
  queue.splice(i, 0, arena.length - 1);
}

function sameSequence(a: ReadonlyArray<ChargedMove>, b: ReadonlyArray<ChargedMove>): boolean {
  return a.length === b.length && a.every((move, i) => move === b[i]);
}

export function mostExpensive(moves: ReadonlyArray<ChargedMove>): ChargedMove {
  return moves.reduce((a, b) => (b.energyCost > a.energyCost ? b : a));
}

function ratio(hp: number, maxHp: number): number {
  return maxHp > 0 ? hp / maxHp : 0;
}
