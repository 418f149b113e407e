import { join } from 'path';
import { MatchupLoaderService } from './matchup-loader.service.js';
import { InvalidInputError, NotFoundError } from '../common/errors/battle-errors.js';

const SAMPLE_PATH = join(__dirname, '..', '..', 'content', 'sample-matchup.json');

function minimalCombatant(id: string) {
  return {
    id,
    types: ['water'],
    baseStats: { atk: 120, def: 120, hp: 120 },
    level: 20,
    fastMove: { moveId: 'SPLASH_JAB', type: 'water', power: 5, energyGain: 8, turns: 1 },
  };
}

describe('MatchupLoaderService', () => {
  let service: MatchupLoaderService;

  beforeEach(() => {
    service = new MatchupLoaderService();
  });

  it('샘플 파일 로드 + 기본값 적용', async () => {
    const matchup = await service.load(SAMPLE_PATH);

    expect(matchup.seed).toBe('sample-001');
    expect(matchup.combatants.map((c) => c.id)).toEqual(['emberfox', 'tidecrab']);
    expect(matchup.combatants[0].ivs).toEqual({ atk: 1, def: 14, hp: 15 });
    expect(matchup.combatants[1].shadowType).toBe('SHADOW');
    expect(matchup.combatants[1].chargedMoves[1].buff?.chance).toBe(0.5);
  });

  it('없는 파일 → NotFoundError', async () => {
    await expect(service.load(join(__dirname, 'missing-matchup.json'))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('JSON 아님 → InvalidInputError', () => {
    expect(() => service.parse('{ not json')).toThrow(InvalidInputError);
  });

  it('전투원 1명뿐 → issue 경로 포함', () => {
    const raw = JSON.stringify({ seed: 'x', combatants: [minimalCombatant('solo')] });
    try {
      service.parse(raw);
      throw new Error('expected InvalidInputError');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.message).toBe('Matchup validation failed');
        expect(String(err.details?.issues)).toContain('combatants');
      }
    }
  });

  it('최소 구성 → 기본값 채움', () => {
    const raw = JSON.stringify({ seed: 'min', combatants: [minimalCombatant('a'), minimalCombatant('b')] });
    const matchup = service.parse(raw);

    expect(matchup.shields).toBeUndefined();
    expect(matchup.combatants[0]).toEqual(
      expect.objectContaining({
        ivs: { atk: 0, def: 0, hp: 0 },
        chargedMoves: [],
        startingEnergy: 0,
        farmEnergy: false,
        baitShields: false,
      }),
    );
  });
});
