// 타입 상성표 — 방어측 타입별 배율의 곱

import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { ConfigurationError } from '../../common/errors/battle-errors.js';
import { parseWithSchema } from '../../common/validation/zod-parse.js';
import { ELEMENT_TYPE, type ElementType } from '../../model/index.js';
import typeChartJson from './type-chart.json';

export const SUPER_EFFECTIVE = 1.6;
export const NEUTRAL = 1.0;
export const RESISTED = 0.625;
export const DOUBLE_RESISTED = 0.390625;

const Multiplier = z.union([
  z.literal(SUPER_EFFECTIVE),
  z.literal(RESISTED),
  z.literal(DOUBLE_RESISTED),
]);

const TypeChartSchema = z.record(
  z.enum(ELEMENT_TYPE),
  z.record(z.enum(ELEMENT_TYPE), Multiplier),
);

export type TypeChart = z.infer<typeof TypeChartSchema>;

@Injectable()
export class TypeEffectivenessService {
  private readonly chart: TypeChart = parseWithSchema(
    TypeChartSchema,
    typeChartJson,
    'Type chart',
    (message, details) => new ConfigurationError(message, details),
  );

  /** 두 번째 타입이 없거나 빈 값이면 중립(1.0) */
  getEffectiveness(
    attackType: ElementType,
    defenderTypes: ReadonlyArray<ElementType | null | undefined>,
  ): number {
    let multiplier = NEUTRAL;
    for (const defenderType of defenderTypes) {
      if (!defenderType) continue;
      multiplier *= this.chart[attackType]?.[defenderType] ?? NEUTRAL;
    }
    return multiplier;
  }

  /** 18개 공격 타입 전부의 배율 */
  getAllEffectiveness(
    defenderTypes: ReadonlyArray<ElementType | null | undefined>,
  ): Map<ElementType, number> {
    return new Map(
      ELEMENT_TYPE.map((attackType) => [
        attackType,
        this.getEffectiveness(attackType, defenderTypes),
      ]),
    );
  }
}
