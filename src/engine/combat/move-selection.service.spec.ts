import { MoveSelectionService, type SearchCandidate } from './move-selection.service.js';
import { DamageService } from './damage.service.js';
import { ShieldDecisionService } from './shield-decision.service.js';
import { BattleConfigService } from '../config/battle-config.service.js';
import { TypeEffectivenessService } from '../typing/type-effectiveness.service.js';
import { Rng } from '../rng/rng.service.js';
import type { ChargedMove, Combatant } from '../../model/index.js';

// 무자속 물 기술 vs 노말 (공=방) → 피해 floor(위력/2) + 1
const strike: ChargedMove = { moveId: 'TIDAL_STRIKE', type: 'water', power: 60, energyCost: 50 };
const jab: ChargedMove = { moveId: 'AQUA_JAB', type: 'water', power: 20, energyCost: 35 };
const reckless: ChargedMove = {
  moveId: 'RECKLESS_SURGE',
  type: 'water',
  power: 100,
  energyCost: 40,
  buff: { multipliers: [1, 0.5], target: 'SELF', chance: 1 },
};

function makeCombatant(overrides: Partial<Combatant> = {}): Combatant {
  const stats = { atk: 100, def: 100, hp: 200 };
  return {
    id: 'tester',
    name: 'tester',
    types: ['normal'],
    baseStats: stats,
    ivs: { atk: 0, def: 0, hp: 0 },
    level: 20,
    shadowType: 'NORMAL',
    stats,
    cp: 500,
    hp: 200,
    energy: 0,
    shields: 0,
    buffs: { atk: 0, def: 0 },
    cooldown: 0,
    fastMove: { moveId: 'DRIP', type: 'water', power: 2, energyGain: 10, turns: 1 },
    chargedMoves: [strike, jab],
    flags: { farmEnergy: false, baitShields: false, optimizeMoveTiming: false },
    start: { hp: 200, energy: 0, buffs: { atk: 0, def: 0 } },
    ...overrides,
  };
}

function candidate(move: ChargedMove, damage: number): SearchCandidate {
  return {
    move,
    expectedValue: 1,
    koTurn: 1,
    damage,
    dpe: move.power / move.energyCost,
  };
}

describe('MoveSelectionService', () => {
  let config: BattleConfigService;
  let service: MoveSelectionService;
  let rng: Rng;

  beforeEach(() => {
    config = new BattleConfigService({});
    const damage = new DamageService(new TypeEffectivenessService());
    service = new MoveSelectionService(config, damage, new ShieldDecisionService(damage));
    rng = new Rng('move-selection', 0);
  });

  describe('search', () => {
    it('지금 바로 KO 가능한 기술 → 1턴 후보', () => {
      const self = makeCombatant({ energy: 50 });
      const opponent = makeCombatant({ id: 'target', hp: 30 });

      const result = service.search(self, opponent, self.chargedMoves);

      expect(result.koTurn).toBe(1);
      expect(result.exhausted).toBe(false);
      expect(result.candidates.map((c) => c.move.moveId)).toEqual(['TIDAL_STRIKE']);
      expect(result.candidates[0].expectedValue).toBe(1);
      expect(result.candidates[0].damage).toBe(31);
    });

    it('가장 빠른 KO가 파밍을 거쳐야 하면 후보 없음', () => {
      // TIDAL_STRIKE: 2턴 파밍 후 3턴째 KO, AQUA_JAB 선사용은 6턴 이후
      const self = makeCombatant({ energy: 35, chargedMoves: [strike, { ...jab, power: 2 }] });
      const opponent = makeCombatant({ id: 'target', hp: 30 });

      const result = service.search(self, opponent, self.chargedMoves);

      expect(result.koTurn).toBe(3);
      expect(result.candidates).toEqual([]);
    });

    it('상대 체력 0 → 빈 결과', () => {
      const result = service.search(makeCombatant({ energy: 50 }), makeCombatant({ hp: 0 }), [strike]);
      expect(result).toEqual({ candidates: [], koTurn: null, exhausted: false, statesExplored: 0 });
    });

    it('상태 상한 도달 → exhausted', () => {
      config.update({ maxSearchStates: 1 });
      const result = service.search(makeCombatant({ energy: 50 }), makeCombatant(), [strike]);

      expect(result.exhausted).toBe(true);
      expect(result.statesExplored).toBe(1);
      expect(result.candidates).toEqual([]);
    });

    it('실드 예측 시 1 피해 분기로 진행', () => {
      // 첫 타는 실드에 막히고 두 번째 AQUA_JAB(1턴 파밍)로 KO
      const self = makeCombatant({ energy: 60, chargedMoves: [jab] });
      const opponent = makeCombatant({ id: 'target', hp: 10, shields: 1 });

      const result = service.search(self, opponent, self.chargedMoves);

      expect(result.koTurn).toBe(3);
      expect(result.candidates.map((c) => c.move.moveId)).toEqual(['AQUA_JAB']);
    });
  });

  describe('selectMove', () => {
    it('특수 기술 없음 → 일반 기술', () => {
      const decision = service.selectMove(makeCombatant({ chargedMoves: [] }), makeCombatant(), rng);
      expect(decision).toEqual({ kind: 'FAST', reason: 'NO_CHARGED_MOVES' });
    });

    it('탐색 결과 → 특수 기술', () => {
      const decision = service.selectMove(makeCombatant({ energy: 50 }), makeCombatant({ hp: 30 }), rng);
      expect(decision).toEqual({ kind: 'CHARGED', move: strike, reason: 'SEARCH' });
    });

    it('파밍 먼저가 최선 → 일반 기술', () => {
      const self = makeCombatant({ energy: 35, chargedMoves: [strike, { ...jab, power: 2 }] });
      const decision = service.selectMove(self, makeCombatant({ hp: 30 }), rng);
      expect(decision).toEqual({ kind: 'FAST', reason: 'SEARCH' });
    });

    describe('미끼', () => {
      // dpe: 50/35 ≈ 1.43, 100/50 = 2 → 1.43 × 1.5 ≥ 2
      const cheap: ChargedMove = { moveId: 'SPRAY', type: 'water', power: 50, energyCost: 35 };
      const costly: ChargedMove = { moveId: 'DELUGE', type: 'water', power: 100, energyCost: 50 };
      const baitFlags = { farmEnergy: false, baitShields: true, optimizeMoveTiming: false };

      it('싼 기술 에너지 부족 → FARMING', () => {
        const self = makeCombatant({ energy: 30, chargedMoves: [cheap, costly], flags: baitFlags });
        const decision = service.selectMove(self, makeCombatant({ shields: 1 }), rng);
        expect(decision).toEqual({ kind: 'FAST', reason: 'FARMING' });
      });

      it('미끼 성향 없음 → 탐색으로 넘어감', () => {
        const self = makeCombatant({ energy: 30, chargedMoves: [cheap, costly] });
        const decision = service.selectMove(self, makeCombatant({ hp: 10, shields: 1 }), rng);
        expect(decision).toEqual({ kind: 'FAST', reason: 'SEARCH' });
      });

      it('체력/에너지 모두 낮으면 미끼 생략', () => {
        const self = makeCombatant({ hp: 40, energy: 30, chargedMoves: [cheap, costly], flags: baitFlags });
        const decision = service.selectMove(self, makeCombatant({ hp: 10, shields: 1 }), rng);
        expect(decision).toEqual({ kind: 'FAST', reason: 'SEARCH' });
      });

      it('에너지 충분 → 싼 기술 사용', () => {
        const self = makeCombatant({ energy: 60, chargedMoves: [cheap, costly], flags: baitFlags });
        const decision = service.selectMove(self, makeCombatant({ hp: 10, shields: 1 }), rng);
        expect(decision).toEqual({ kind: 'CHARGED', move: cheap, reason: 'SEARCH' });
      });
    });

    it('farmEnergy → 가장 비싼 기술만 고려', () => {
      // AQUA_JAB만으로도 KO지만 TIDAL_STRIKE로 제한
      const self = makeCombatant({
        energy: 50,
        flags: { farmEnergy: true, baitShields: false, optimizeMoveTiming: false },
      });
      const decision = service.selectMove(self, makeCombatant({ hp: 10 }), rng);
      expect(decision).toEqual({ kind: 'CHARGED', move: strike, reason: 'SEARCH' });
    });

    describe('자기 디버프 보류', () => {
      const threat: ChargedMove = { moveId: 'RIPTIDE', type: 'water', power: 60, energyCost: 50 };

      function setup(selfShields: number) {
        const self = makeCombatant({ energy: 50, shields: selfShields, chargedMoves: [reckless, strike] });
        const opponent = makeCombatant({ id: 'threat', hp: 30, energy: 60, chargedMoves: [threat] });
        return { self, opponent };
      }

      it('실드 없음 + 상대 최강 기술 준비 → 디버프 기술 제외', () => {
        const { self, opponent } = setup(0);
        expect(service.shouldDefer(self, opponent, reckless)).toBe(true);
        expect(service.shouldDefer(self, opponent, strike)).toBe(false);

        const decision = service.selectMove(self, opponent, rng);
        expect(decision).toEqual({ kind: 'CHARGED', move: strike, reason: 'SEARCH' });
      });

      it('실드 있음 → 보류 안 함, 피해 큰 디버프 기술 선택', () => {
        const { self, opponent } = setup(1);
        expect(service.shouldDefer(self, opponent, reckless)).toBe(false);

        const decision = service.selectMove(self, opponent, rng);
        expect(decision).toEqual({ kind: 'CHARGED', move: reckless, reason: 'SEARCH' });
      });

      it('상대 에너지 부족 → 보류 안 함', () => {
        const { self, opponent } = setup(0);
        opponent.energy = 40;
        expect(service.shouldDefer(self, opponent, reckless)).toBe(false);
      });

      it('에너지가 기준 이상 → 보류 안 함', () => {
        const { self, opponent } = setup(0);
        self.energy = 100;
        expect(service.shouldDefer(self, opponent, reckless)).toBe(false);
      });

      it('순수 강화 + 에너지 여유 → 예외', () => {
        const { self, opponent } = setup(0);
        const surge: ChargedMove = {
          ...reckless,
          moveId: 'POWER_SHIFT',
          buff: { multipliers: [2, 0.75], target: 'SELF', chance: 1 },
        };
        self.energy = 50;
        expect(service.shouldDefer(self, opponent, surge)).toBe(false);
        self.energy = 45;
        expect(service.shouldDefer(self, opponent, surge)).toBe(true);
      });

      it('디버프 기술만 있으면 일반 기술로 대기', () => {
        const { self, opponent } = setup(0);
        self.chargedMoves = [reckless];
        const decision = service.selectMove(self, opponent, rng);
        expect(decision).toEqual({ kind: 'FAST', reason: 'DEFERRED' });
      });
    });

    it('탐색 상한 + 에너지 넘침 → dpe 최고 기술', () => {
      config.update({ maxSearchStates: 1 });
      const self = makeCombatant({ energy: 95 });
      const decision = service.selectMove(self, makeCombatant(), rng);
      // dpe: TIDAL_STRIKE 1.2, AQUA_JAB 0.57
      expect(decision).toEqual({ kind: 'CHARGED', move: strike, reason: 'SEARCH_EXHAUSTED' });
    });

    it('탐색 상한 + 에너지 여유 → 일반 기술', () => {
      config.update({ maxSearchStates: 1 });
      const decision = service.selectMove(makeCombatant({ energy: 60 }), makeCombatant(), rng);
      expect(decision).toEqual({ kind: 'FAST', reason: 'SEARCH_EXHAUSTED' });
    });

    it('완전 동률 후보 → 가중치 추첨, 같은 seed면 같은 선택', () => {
      const twinA: ChargedMove = { moveId: 'TWIN_A', type: 'water', power: 60, energyCost: 50 };
      const twinB: ChargedMove = { moveId: 'TWIN_B', type: 'water', power: 60, energyCost: 50 };
      const self = makeCombatant({ energy: 50, chargedMoves: [twinA, twinB] });
      const opponent = makeCombatant({ hp: 30 });

      const first = service.selectMove(self, opponent, new Rng('tie-seed', 0));
      const second = service.selectMove(self, opponent, new Rng('tie-seed', 0));

      expect(first.kind).toBe('CHARGED');
      expect(second).toEqual(first);
      if (first.kind === 'CHARGED') {
        expect(['TWIN_A', 'TWIN_B']).toContain(first.move.moveId);
      }
    });
  });

  describe('weightCandidates', () => {
    // dpe 모두 2 — ALPHA 46 피해, BETA 51 피해
    const alpha: ChargedMove = { moveId: 'ALPHA', type: 'water', power: 90, energyCost: 45 };
    const beta: ChargedMove = { moveId: 'BETA', type: 'water', power: 100, energyCost: 50 };

    function weights(selfEnergy: number, opponent: Combatant): Record<string, number> {
      const self = makeCombatant({ energy: selfEnergy, chargedMoves: [alpha, beta] });
      const options = service.weightCandidates(self, opponent, [candidate(alpha, 46), candidate(beta, 51)]);
      return Object.fromEntries(options.map((o) => [o.name, o.weight]));
    }

    it('실드 없는 상대 + 최고 비용 기술로 에너지 소진 → 1.2배', () => {
      expect(weights(50, makeCombatant({ hp: 50 }))).toEqual({ ALPHA: 1, BETA: 1.2 });
    });

    it('실드를 쓸 상대 → 양쪽 1.3배, 에너지 소진까지 겹치면 1.56배', () => {
      const result = weights(50, makeCombatant({ hp: 50, shields: 1 }));
      expect(result.ALPHA).toBeCloseTo(1.3);
      expect(result.BETA).toBeCloseTo(1.56);
    });

    it('남는 에너지가 여유 범위 초과 → 소진 가중치 없음', () => {
      expect(weights(60, makeCombatant({ hp: 50 }))).toEqual({ ALPHA: 1, BETA: 1 });
    });

    it('실드를 쓰지 않을 상황 → 실드 가중치 없음', () => {
      expect(weights(60, makeCombatant({ hp: 200, shields: 1 }))).toEqual({ ALPHA: 1, BETA: 1 });
    });
  });

  describe('reorderCandidates', () => {
    const heavy: ChargedMove = { moveId: 'HEAVY', type: 'water', power: 100, energyCost: 50 };
    const light: ChargedMove = { moveId: 'LIGHT', type: 'water', power: 40, energyCost: 35 };

    it('상대 실드 0 → 피해 내림차순', () => {
      const ordered = service.reorderCandidates(
        makeCombatant(),
        makeCombatant({ hp: 40 }),
        [candidate(light, 21), candidate(heavy, 51)],
      );
      expect(ordered.map((c) => c.move.moveId)).toEqual(['HEAVY', 'LIGHT']);
    });

    it('상대 실드 있음 → 비용 오름차순', () => {
      const ordered = service.reorderCandidates(
        makeCombatant(),
        makeCombatant({ hp: 40, shields: 2 }),
        [candidate(heavy, 51), candidate(light, 21)],
      );
      expect(ordered.map((c) => c.move.moveId)).toEqual(['LIGHT', 'HEAVY']);
    });

    it('비용이 비슷하면 dpe 높은 쪽 먼저', () => {
      const efficient: ChargedMove = { moveId: 'EFFICIENT', type: 'water', power: 90, energyCost: 45 };
      const plain: ChargedMove = { moveId: 'PLAIN', type: 'water', power: 60, energyCost: 40 };
      const ordered = service.reorderCandidates(
        makeCombatant(),
        makeCombatant({ hp: 40, shields: 1 }),
        [candidate(plain, 31), candidate(efficient, 46)],
      );
      expect(ordered.map((c) => c.move.moveId)).toEqual(['EFFICIENT', 'PLAIN']);
    });

    it('양측 체력 여유 → 디버프 기술을 비슷한 일반 기술 뒤로', () => {
      const steady: ChargedMove = { moveId: 'STEADY', type: 'water', power: 80, energyCost: 45 };
      const ordered = service.reorderCandidates(
        makeCombatant(),
        makeCombatant({ hp: 150 }),
        [candidate(reckless, 51), candidate(steady, 41)],
      );
      expect(ordered.map((c) => c.move.moveId)).toEqual(['STEADY', 'RECKLESS_SURGE']);
    });

    it('상대 체력 낮으면 디버프 기술 유지', () => {
      const steady: ChargedMove = { moveId: 'STEADY', type: 'water', power: 80, energyCost: 45 };
      const ordered = service.reorderCandidates(
        makeCombatant(),
        makeCombatant({ hp: 80 }),
        [candidate(reckless, 51), candidate(steady, 41)],
      );
      expect(ordered.map((c) => c.move.moveId)).toEqual(['RECKLESS_SURGE', 'STEADY']);
    });
  });
});
