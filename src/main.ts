#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { BattleError } from './common/errors/battle-errors.js';
import { MatchupLoaderService } from './matchup/matchup-loader.service.js';
import { MatchupRunnerService } from './matchup/matchup-runner.service.js';

async function bootstrap() {
  const [path] = process.argv.slice(2);
  if (!path) {
    process.stderr.write('usage: matchup-engine <matchup.json>\n');
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: process.env.LOG_LEVEL === 'debug' ? ['error', 'warn', 'log', 'debug'] : ['error', 'warn', 'log'],
  });
  try {
    const matchup = await app.get(MatchupLoaderService).load(path);
    const report = app.get(MatchupRunnerService).run(matchup);
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  const logger = new Logger('Bootstrap');
  if (err instanceof BattleError) {
    logger.error(`${err.code}: ${err.message}${err.details ? ` ${JSON.stringify(err.details)}` : ''}`);
  } else {
    logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  }
  process.exitCode = 1;
});
