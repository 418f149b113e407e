// 턴별 행동 결정 — 생존 → 치명타 → 타이밍 → 기술 선택 탐색 순

import { Injectable, Logger } from '@nestjs/common';
import type { ChargedMove, Combatant, DecisionMode } from '../../model/index.js';
import { isSelfDebuffing, TURN_MS } from '../moves/move-metrics.js';
import type { Rng } from '../rng/rng.service.js';
import { DamageService } from './damage.service.js';
import { chooseOption, type DecisionOption } from './decision-options.js';
import { MAX_ENERGY, MoveSelectionService, mostExpensive, type MoveSelection } from './move-selection.service.js';
import { ShieldDecisionService } from './shield-decision.service.js';

export type ActionDecision = MoveSelection;

/** 생존 추정 스택 상한 */
const MAX_SURVIVAL_STATES = 1000;

interface ThreatState {
  hp: number;
  oppEnergy: number;
  turn: number;
  shields: number;
}

/** 실제 진행 시간 — 0턴 기술도 1턴은 걸린다 */
export function fastCooldown(combatant: Pick<Combatant, 'fastMove'>): number {
  return Math.max(1, combatant.fastMove.turns) * TURN_MS;
}

@Injectable()
export class ActionDecisionService {
  private readonly logger = new Logger(ActionDecisionService.name);

  constructor(
    private readonly damageService: DamageService,
    private readonly shieldService: ShieldDecisionService,
    private readonly moveSelection: MoveSelectionService,
  ) {}

  decide(self: Combatant, opponent: Combatant, rng: Rng, mode: DecisionMode = 'AI'): ActionDecision {
    if (mode === 'RANDOM') return this.decideRandom(self, rng);

    const moves = self.chargedMoves;
    if (moves.length === 0) return { kind: 'FAST', reason: 'NO_CHARGED_MOVES' };

    const cheapest = moves.reduce((a, b) => (b.energyCost < a.energyCost ? b : a));
    if (self.energy < cheapest.energyCost) return { kind: 'FAST', reason: 'CHARGING' };

    if (self.flags.farmEnergy && self.energy < mostExpensive(moves).energyCost) {
      return { kind: 'FAST', reason: 'FARMING' };
    }

    const turnsToLive = this.turnsToLive(self, opponent);
    const survival = this.survivalMove(self, opponent, turnsToLive);
    if (survival) {
      this.logger.debug(`${self.id} throws ${survival.moveId}: ${turnsToLive} turn(s) to live`);
      return { kind: 'CHARGED', move: survival, reason: 'SURVIVAL' };
    }

    const lethal = this.lethalMove(self, opponent);
    if (lethal) {
      this.logger.debug(`${self.id} throws lethal ${lethal.moveId}`);
      return { kind: 'CHARGED', move: lethal, reason: 'LETHAL' };
    }

    if (this.shouldOptimizeTiming(self, opponent, turnsToLive)) {
      this.logger.debug(`${self.id} delays for timing (opponent cooldown ${opponent.cooldown}ms)`);
      return { kind: 'FAST', reason: 'TIMING' };
    }

    return this.moveSelection.selectMove(self, opponent, rng);
  }

  /** 휴리스틱 없이 일반 기술 + 사용 가능한 특수 기술 균등 추첨 */
  decideRandom(self: Combatant, rng: Rng): ActionDecision {
    const options: DecisionOption<ChargedMove>[] = [{ name: self.fastMove.moveId, weight: 1 }];
    for (const move of self.chargedMoves) {
      if (self.energy >= move.energyCost) {
        options.push({ name: move.moveId, weight: 1, value: move });
      }
    }
    const picked = chooseOption(options, rng).value;
    return picked
      ? { kind: 'CHARGED', move: picked, reason: 'RANDOM' }
      : { kind: 'FAST', reason: 'RANDOM' };
  }

  /**
   * 상대 일반/특수 기술 순서를 스택으로 펼쳐 KO까지 남은 턴 추정.
   * 위협이 없으면 Infinity.
   */
  turnsToLive(self: Combatant, opponent: Combatant): number {
    const winsCmp = self.stats.atk >= opponent.stats.atk;
    const ownTurns = Math.max(1, self.fastMove.turns);
    const oppTurns = Math.max(1, opponent.fastMove.turns);
    const oppFastDamage = this.damageService.calculateDamage(opponent, self, opponent.fastMove);
    const oppMoves = opponent.chargedMoves;
    const oppCheapest = oppMoves.length > 0 ? Math.min(...oppMoves.map((m) => m.energyCost)) : Infinity;

    let turnsToLive = Infinity;
    const stack: ThreatState[] = [
      opponent.cooldown > 0
        ? {
            hp: self.hp - oppFastDamage,
            oppEnergy: opponent.energy + opponent.fastMove.energyGain,
            turn: opponent.cooldown / TURN_MS,
            shields: self.shields,
          }
        : { hp: self.hp, oppEnergy: opponent.energy, turn: 0, shields: self.shields },
    ];

    let visited = 0;
    while (stack.length > 0 && visited < MAX_SURVIVAL_STATES) {
      const state = stack.pop();
      if (state === undefined) break;
      visited++;

      // 내가 먼저 움직일 수 있는 구간 밖이면 볼 필요 없음
      if (state.hp > oppFastDamage && state.turn > ownTurns + (winsCmp ? 0 : 1)) continue;

      if (state.shields > 0) {
        if (state.oppEnergy >= oppCheapest) {
          stack.push({
            hp: state.hp - 1,
            oppEnergy: state.oppEnergy - oppCheapest,
            turn: state.turn + 1,
            shields: state.shields - 1,
          });
        }
      } else {
        for (const move of oppMoves) {
          if (state.oppEnergy < move.energyCost) continue;
          const damage = this.damageService.calculateDamage(opponent, self, move);
          if (damage >= state.hp) {
            turnsToLive = Math.min(turnsToLive, state.turn);
            if (self.stats.atk > opponent.stats.atk && (oppTurns % ownTurns) === 0) {
              turnsToLive += 1;
            }
            break;
          }
          stack.push({
            hp: state.hp - damage,
            oppEnergy: state.oppEnergy - move.energyCost,
            turn: state.turn + 1,
            shields: state.shields,
          });
        }
      }

      if (state.hp - oppFastDamage <= 0) {
        turnsToLive = Math.min(turnsToLive, state.turn + oppTurns);
        break;
      }
      stack.push({
        hp: state.hp - oppFastDamage,
        oppEnergy: Math.min(MAX_ENERGY, state.oppEnergy + opponent.fastMove.energyGain),
        turn: state.turn + oppTurns,
        shields: state.shields,
      });
    }

    return this.adjustTurnsToLive(self, opponent, turnsToLive, oppFastDamage);
  }

  /**
   * 일반 기술 한 번도 못 버티면 가장 센 기술.
   * 일반 기술이 대안으로 남아 있으면 디버프 보류 대상은 제외.
   */
  survivalMove(self: Combatant, opponent: Combatant, turnsToLive: number): ChargedMove | undefined {
    const cooldown = fastCooldown(self);
    const winsCmp = self.stats.atk >= opponent.stats.atk;
    const oppFastDamage = this.damageService.calculateDamage(opponent, self, opponent.fastMove);
    const window = turnsToLive * TURN_MS;

    const doomed =
      window < cooldown ||
      (window === cooldown && !winsCmp) ||
      (window === cooldown && self.hp <= oppFastDamage);
    if (!doomed) return undefined;

    const affordable = self.chargedMoves.filter((m) => self.energy >= m.energyCost);
    const allowed = affordable.filter((m) => !this.moveSelection.shouldDefer(self, opponent, m));
    const pool = allowed.length > 0 ? allowed : affordable;

    let best: ChargedMove | undefined;
    let bestDamage = -1;
    for (const move of [...pool].reverse()) {
      const damage = this.damageService.calculateDamage(self, opponent, move);
      if (damage > bestDamage) {
        best = move;
        bestDamage = damage;
      }
      // 두 번 연속 쓸 수 있고 CMP를 이기면 2배 피해로 비교
      if (self.energy >= move.energyCost * 2 && self.stats.atk > opponent.stats.atk && damage * 2 > bestDamage) {
        best = move;
        bestDamage = damage * 2;
      }
    }
    return best;
  }

  /** 바로 KO 가능한 기술 — 자기 디버프 기술 제외, 저비용 우선 */
  lethalMove(self: Combatant, opponent: Combatant): ChargedMove | undefined {
    if (self.flags.farmEnergy) return undefined;

    const fastDamage = this.damageService.calculateDamage(self, opponent, self.fastMove);
    if (opponent.hp <= fastDamage) return undefined;

    const lethal = self.chargedMoves.filter((move) => {
      if (self.energy < move.energyCost || isSelfDebuffing(move)) return false;
      if (this.damageService.calculateDamage(self, opponent, move) < opponent.hp) return false;
      return opponent.shields === 0 || !this.shieldService.wouldShield(self, opponent, move).value;
    });

    return [...lethal].sort((a, b) => a.energyCost - b.energyCost)[0];
  }

  /** 상대 일반 기술 도중에 던지도록 타이밍을 미룰지 */
  shouldOptimizeTiming(self: Combatant, opponent: Combatant, turnsToLive: number): boolean {
    if (!self.flags.optimizeMoveTiming) return false;

    const target = this.disablesTiming(self, opponent) ? 0 : this.targetCooldown(self, opponent);
    if (target <= 0) return false;
    if (!(opponent.cooldown === 0 || opponent.cooldown > target)) return false;

    return (
      this.survivesDelay(self, opponent) &&
      self.energy + self.fastMove.energyGain <= MAX_ENERGY &&
      this.strategicDelayAllowed(self, opponent, turnsToLive)
    );
  }

  targetCooldown(self: Combatant, opponent: Combatant): number {
    const own = fastCooldown(self);
    const opp = fastCooldown(opponent);
    if (own >= 2000) return 1000;
    if (own >= 1500 && opp === 2500) return 1000;
    if (own === 1000 && opp === 2000) return 1000;
    return 500;
  }

  private disablesTiming(self: Combatant, opponent: Combatant): boolean {
    const own = fastCooldown(self);
    const opp = fastCooldown(opponent);
    return own === opp || (own > opp && own % opp === 0);
  }

  private survivesDelay(self: Combatant, opponent: Combatant): boolean {
    const oppFastDamage = this.damageService.calculateDamage(opponent, self, opponent.fastMove);
    if (self.hp <= oppFastDamage) return false;
    const hitsInWindow = Math.floor((fastCooldown(self) + TURN_MS) / fastCooldown(opponent));
    return self.hp > oppFastDamage * hitsInWindow;
  }

  private strategicDelayAllowed(self: Combatant, opponent: Combatant, turnsToLive: number): boolean {
    const [first] = self.chargedMoves;
    if (first === undefined) return false;

    let plannedTurns = self.fastMove.turns + (first.energyCost > 0 ? Math.floor(self.energy / first.energyCost) : 0);
    if (self.stats.atk < opponent.stats.atk) plannedTurns += 1;
    if (plannedTurns > turnsToLive) return false;

    if (opponent.shields === 0) {
      const canKo = self.chargedMoves.some(
        (m) => self.energy >= m.energyCost && this.damageService.calculateDamage(self, opponent, m) >= opponent.hp,
      );
      if (canKo) return false;
    }

    const oppFastDamage = this.damageService.calculateDamage(opponent, self, opponent.fastMove);
    const hitsInWindow = Math.floor(fastCooldown(self) / fastCooldown(opponent));
    const gain = opponent.fastMove.energyGain;

    for (const move of opponent.chargedMoves) {
      if (gain <= 0 && opponent.energy < move.energyCost) continue;
      const fastNeeded = gain > 0 ? Math.ceil((move.energyCost - opponent.energy) / gain) : 0;
      const turnsUntilThrow = fastNeeded * opponent.fastMove.turns + 1;
      const hit = self.shields > 0 ? 1 : this.damageService.calculateDamage(opponent, self, move);
      const total = hit + oppFastDamage * hitsInWindow;
      if (turnsUntilThrow <= self.fastMove.turns && total >= self.hp) return false;
    }
    return true;
  }

  // 특수 타이밍 보정 — 이미 시작된 상대 일반 기술, 1턴 기술 연타
  private adjustTurnsToLive(
    self: Combatant,
    opponent: Combatant,
    turnsToLive: number,
    oppFastDamage: number,
  ): number {
    let adjusted = turnsToLive;
    const fastDamage = this.damageService.calculateDamage(self, opponent, self.fastMove);
    const oppCooldown = fastCooldown(opponent);

    if (self.hp <= oppFastDamage * 2 && oppCooldown === TURN_MS) adjusted -= 1;

    if (self.hp <= oppFastDamage && opponent.cooldown > 0 && oppCooldown > TURN_MS) {
      adjusted = opponent.cooldown / TURN_MS;
      if (opponent.hp > fastDamage) adjusted -= 1;
    }

    if (
      self.hp <= oppFastDamage &&
      opponent.cooldown === 0 &&
      oppCooldown <= fastCooldown(self) + TURN_MS &&
      opponent.hp > fastDamage
    ) {
      adjusted -= 1;
    }
    return adjusted;
  }
}
