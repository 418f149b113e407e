import { Module } from '@nestjs/common';
import { BattleConfigService } from './config/battle-config.service.js';
import { RngService } from './rng/rng.service.js';
import { TypeEffectivenessService } from './typing/type-effectiveness.service.js';
import { StatsService } from './stats/stats.service.js';
import { CombatantService } from './combatant/combatant.service.js';
import { DamageService } from './combat/damage.service.js';
import { ShieldDecisionService } from './combat/shield-decision.service.js';
import { MoveSelectionService } from './combat/move-selection.service.js';
import { ActionDecisionService } from './combat/action-decision.service.js';
import { BattleService } from './battle/battle.service.js';

const providers = [
  // Layer 1 — 설정/난수
  BattleConfigService,
  RngService,
  // Layer 2 — 정적 데이터
  TypeEffectivenessService,
  StatsService,
  // Layer 3
  CombatantService,
  // Layer 4 — 전투 계산
  DamageService,
  ShieldDecisionService,
  // Layer 5 — 의사결정
  MoveSelectionService,
  ActionDecisionService,
  // Layer 6 — 상태 기계
  BattleService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
