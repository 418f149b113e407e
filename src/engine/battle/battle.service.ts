// 배틀 상태 기계 — 턴 단위 진행, 결과/평가/타임라인 생성

import { Injectable, Logger } from '@nestjs/common';
import { parseWithSchema } from '../../common/validation/zod-parse.js';
import type {
  BattleResult,
  ChargedMove,
  Combatant,
  DecisionMode,
  DecisionReason,
  Side,
  SimulationOptions,
  TimelineEvent,
} from '../../model/index.js';
import { ActionDecisionService, fastCooldown } from '../combat/action-decision.service.js';
import { DamageService, MAX_RATING } from '../combat/damage.service.js';
import { chooseOption } from '../combat/decision-options.js';
import { MAX_ENERGY } from '../combat/move-selection.service.js';
import { ShieldDecisionService } from '../combat/shield-decision.service.js';
import { CombatantService } from '../combatant/combatant.service.js';
import { BattleConfigService } from '../config/battle-config.service.js';
import { stageDeltas } from '../moves/move-metrics.js';
import { RngService, type Rng } from '../rng/rng.service.js';
import { clampStage } from '../stats/stats.service.js';
import { SimulationOptionsSchema } from './dto/simulation-options.dto.js';

const SIDES: readonly Side[] = [0, 1];

interface PendingFast {
  landsAt: number;
  reason: DecisionReason;
}

interface QueuedCharged {
  side: Side;
  move: ChargedMove;
  reason: DecisionReason;
}

type Pair<T> = [T, T];

function other(side: Side): Side {
  return side === 0 ? 1 : 0;
}

@Injectable()
export class BattleService {
  private readonly logger = new Logger(BattleService.name);

  constructor(
    private readonly configService: BattleConfigService,
    private readonly rngService: RngService,
    private readonly combatantService: CombatantService,
    private readonly damageService: DamageService,
    private readonly shieldService: ShieldDecisionService,
    private readonly actionDecision: ActionDecisionService,
  ) {}

  /**
   * 한 판 전체 진행. 입력 전투원은 건드리지 않고 사본으로 진행.
   * 같은 전투원 + 같은 seed → 같은 결과/타임라인
   */
  simulate(a: Combatant, b: Combatant, options: SimulationOptions): BattleResult {
    const opts = parseWithSchema(SimulationOptionsSchema, options, 'Simulation options');
    const config = this.configService.get();
    const maxTurns = opts.maxTurns ?? this.configService.maxTurns;
    const modes: Pair<DecisionMode> =
      opts.modes === undefined ? ['AI', 'AI'] : typeof opts.modes === 'string' ? [opts.modes, opts.modes] : opts.modes;
    const rng = this.rngService.create(opts.seed);

    const sides: Pair<Combatant> = [this.combatantService.clone(a), this.combatantService.clone(b)];
    sides.forEach((c) => this.combatantService.reset(c, config.defaultShields));
    // 옵션으로 준 실드 수가 전투원 지정값보다 우선
    if (opts.shields !== undefined) {
      const shields: Pair<number> = typeof opts.shields === 'number' ? [opts.shields, opts.shields] : opts.shields;
      sides[0].shields = shields[0];
      sides[1].shields = shields[1];
    }

    const timeline: TimelineEvent[] = [];
    const record = (event: TimelineEvent) => {
      if (opts.recordTimeline) timeline.push(event);
    };
    const pending: Pair<PendingFast | null> = [null, null];

    let turn = 0;
    let fainted = false;

    while (turn < maxTurns && !fainted) {
      turn++;
      const charged: QueuedCharged[] = [];

      // 1. 결정 — 양측 모두 이전 턴 상태를 본다
      for (const side of SIDES) {
        const self = sides[side];
        if (self.cooldown > 0 || pending[side] !== null) continue;

        const decision = this.actionDecision.decide(self, sides[other(side)], rng, modes[side]);
        if (decision.kind === 'FAST') {
          const turns = Math.max(1, self.fastMove.turns);
          self.cooldown = fastCooldown(self);
          pending[side] = { landsAt: turn + turns - 1, reason: decision.reason };
        } else {
          charged.push({ side, move: decision.move, reason: decision.reason });
        }
      }

      // 2. 일반 기술 착탄 (동시)
      for (const side of SIDES) {
        const fast = pending[side];
        if (!fast || fast.landsAt !== turn) continue;
        pending[side] = null;

        const self = sides[side];
        const target = sides[other(side)];
        const damage = this.damageService.calculateDamage(self, target, self.fastMove);
        target.hp = Math.max(0, target.hp - damage);
        const before = self.energy;
        self.energy = Math.min(MAX_ENERGY, self.energy + self.fastMove.energyGain);

        record({
          turn,
          actor: side,
          action: 'FAST',
          moveId: self.fastMove.moveId,
          damage,
          shielded: false,
          energyDelta: self.energy - before,
          buffsApplied: false,
          reason: fast.reason,
        });
      }

      // 3. 특수 기술 — 실효 공격력 높은 쪽 먼저, 같으면 0번
      charged.sort(
        (x, y) =>
          this.damageService.effectiveAttack(sides[y.side]) - this.damageService.effectiveAttack(sides[x.side]) ||
          x.side - y.side,
      );
      for (const action of charged) {
        if (sides[0].hp <= 0 || sides[1].hp <= 0) break;
        const event = this.resolveCharged(sides, action, modes, rng, turn);
        if (event) record(event);
      }

      // 4. 쿨다운 진행
      for (const c of sides) {
        c.cooldown = Math.max(0, c.cooldown - config.turnDurationMs);
      }

      // 5. 기절 판정
      fainted = sides[0].hp <= 0 || sides[1].hp <= 0;
    }

    const result = this.buildResult(sides, turn, fainted, timeline);
    this.logger.debug(
      `Battle ${sides[0].id} vs ${sides[1].id} (seed ${opts.seed}): ` +
        `${result.outcome} after ${result.turns} turns, winner ${result.winner ?? 'draw'}, ` +
        `ratings ${result.ratings.join('/')}`,
    );
    return result;
  }

  private resolveCharged(
    sides: Pair<Combatant>,
    action: QueuedCharged,
    modes: Pair<DecisionMode>,
    rng: Rng,
    turn: number,
  ): TimelineEvent | null {
    const defenderSide = other(action.side);
    const attacker = sides[action.side];
    const defender = sides[defenderSide];
    const { move } = action;

    if (attacker.energy < move.energyCost) {
      this.logger.warn(`${attacker.id} cannot pay ${move.moveId} (${attacker.energy}/${move.energyCost})`);
      return null;
    }

    const shielded = defender.shields > 0 && this.decideShield(attacker, defender, move, modes[defenderSide], rng);
    const raw = this.damageService.calculateDamage(attacker, defender, move);
    const damage = this.damageService.resolveChargedDamage(raw, shielded);

    defender.hp = Math.max(0, defender.hp - damage);
    if (shielded) defender.shields -= 1;
    attacker.energy -= move.energyCost;

    const buffsApplied = this.applyBuff(attacker, defender, move, rng);

    return {
      turn,
      actor: action.side,
      action: 'CHARGED',
      moveId: move.moveId,
      damage,
      shielded,
      energyDelta: -move.energyCost,
      buffsApplied,
      reason: action.reason,
    };
  }

  private decideShield(
    attacker: Combatant,
    defender: Combatant,
    move: ChargedMove,
    mode: DecisionMode,
    rng: Rng,
  ): boolean {
    const decision = this.shieldService.wouldShield(attacker, defender, move);
    if (mode === 'AI') return decision.value;

    const choice = chooseOption(
      [
        { name: 'SHIELD', weight: decision.shieldWeight, value: true },
        { name: 'NO_SHIELD', weight: decision.noShieldWeight, value: false },
      ],
      rng,
    );
    return choice.value ?? false;
  }

  /** 발동 확률 1 미만이면 한 번 추첨 */
  private applyBuff(attacker: Combatant, defender: Combatant, move: ChargedMove, rng: Rng): boolean {
    const buff = move.buff;
    if (!buff || buff.chance <= 0) return false;
    if (buff.chance < 1 && rng.next() >= buff.chance) return false;

    const target = buff.target === 'SELF' ? attacker : defender;
    const delta = stageDeltas(move);
    target.buffs = {
      atk: clampStage(target.buffs.atk + delta.atk),
      def: clampStage(target.buffs.def + delta.def),
    };
    return true;
  }

  private buildResult(
    sides: Pair<Combatant>,
    turns: number,
    fainted: boolean,
    timeline: TimelineEvent[],
  ): BattleResult {
    const config = this.configService.get();
    const [first, second] = sides;

    let winner: Side | null;
    if (fainted) {
      if (first.hp <= 0 && second.hp <= 0) winner = null;
      else winner = first.hp <= 0 ? 1 : 0;
    } else {
      const firstRatio = first.hp / first.stats.hp;
      const secondRatio = second.hp / second.stats.hp;
      winner = firstRatio === secondRatio ? null : firstRatio > secondRatio ? 0 : 1;
    }

    // 평가 쌍은 합이 항상 MAX_RATING
    const rating = this.damageService.duelRating(first.hp, first.stats.hp, second.hp, second.stats.hp);

    return {
      winner,
      outcome: fainted ? 'KO' : 'TIMEOUT',
      finalHp: [first.hp, second.hp],
      ratings: [rating, MAX_RATING - rating],
      turns,
      timeRemainingMs: Math.max(0, config.timeLimitMs - turns * config.turnDurationMs),
      timeline,
    };
  }
}
