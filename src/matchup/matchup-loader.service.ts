// 매치업 JSON 로드 + 검증

import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { InvalidInputError, NotFoundError } from '../common/errors/battle-errors.js';
import { parseWithSchema } from '../common/validation/zod-parse.js';
import { MatchupSchema, type Matchup } from './dto/matchup.dto.js';

@Injectable()
export class MatchupLoaderService {
  private readonly logger = new Logger(MatchupLoaderService.name);

  async load(path: string): Promise<Matchup> {
    const fullPath = resolve(process.cwd(), path);

    let raw: string;
    try {
      raw = await readFile(fullPath, 'utf-8');
    } catch (err) {
      throw new NotFoundError(`Matchup file not readable: ${path}`, {
        path: fullPath,
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    const matchup = this.parse(raw, path);
    this.logger.log(
      `Loaded matchup ${matchup.name ?? path}: ${matchup.combatants[0].id} vs ${matchup.combatants[1].id}`,
    );
    return matchup;
  }

  parse(raw: string, source = 'inline'): Matchup {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new InvalidInputError(`Matchup is not valid JSON: ${source}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    return parseWithSchema(MatchupSchema, json, 'Matchup');
  }
}
