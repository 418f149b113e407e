import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { MatchupLoaderService } from './matchup-loader.service.js';
import { MatchupRunnerService } from './matchup-runner.service.js';

@Module({
  imports: [EngineModule],
  providers: [MatchupLoaderService, MatchupRunnerService],
  exports: [MatchupLoaderService, MatchupRunnerService],
})
export class MatchupModule {}
