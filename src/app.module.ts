import { Module } from '@nestjs/common';
import { EngineModule } from './engine/engine.module.js';
import { MatchupModule } from './matchup/matchup.module.js';

@Module({
  imports: [EngineModule, MatchupModule],
})
export class AppModule {}
