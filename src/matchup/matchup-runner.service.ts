// 매치업 실행 — 전투원 생성 → 시뮬레이션 → 요약 로그

import { Injectable, Logger } from '@nestjs/common';
import { BattleService } from '../engine/battle/battle.service.js';
import { CombatantService } from '../engine/combatant/combatant.service.js';
import type { BattleResult } from '../model/index.js';
import type { Matchup } from './dto/matchup.dto.js';

export interface MatchupReport {
  name: string;
  combatants: [{ id: string; cp: number }, { id: string; cp: number }];
  result: BattleResult;
}

@Injectable()
export class MatchupRunnerService {
  private readonly logger = new Logger(MatchupRunnerService.name);

  constructor(
    private readonly combatantService: CombatantService,
    private readonly battleService: BattleService,
  ) {}

  run(matchup: Matchup): MatchupReport {
    const { combatants, name, ...options } = matchup;
    const first = this.combatantService.create(combatants[0]);
    const second = this.combatantService.create(combatants[1]);

    const result = this.battleService.simulate(first, second, options);
    const label = name ?? `${first.id} vs ${second.id}`;

    const winner = result.winner === null ? 'draw' : result.winner === 0 ? first.id : second.id;
    this.logger.log(
      `${label}: ${result.outcome} in ${result.turns} turns, winner ${winner}, ` +
        `hp ${result.finalHp.join('/')}, ratings ${result.ratings.join('/')}`,
    );

    return {
      name: label,
      combatants: [
        { id: first.id, cp: first.cp },
        { id: second.id, cp: second.cp },
      ],
      result,
    };
  }
}
