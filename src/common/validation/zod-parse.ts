import type { z, ZodTypeAny } from 'zod';
import { BattleError, InvalidInputError } from '../errors/battle-errors.js';

type ErrorFactory = (message: string, details: Record<string, unknown>) => BattleError;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}

/** safeParse 실패 시 issue 목록을 담아 throw */
export function parseWithSchema<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string,
  toError: ErrorFactory = (message, details) => new InvalidInputError(message, details),
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw toError(`${label} validation failed`, {
      issues: formatIssues(result.error),
    });
  }
  return result.data;
}
