// 엔진 오류 체계 — 코드 + 메시지 + 상세

export class BattleError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BattleError';
  }
}

export class InvalidInputError extends BattleError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
  }
}

/** 전투원 구성 오류 — 턴 진행 전에만 발생 */
export class ConfigurationError extends BattleError {
  constructor(message = 'Invalid configuration', details?: Record<string, unknown>) {
    super('INVALID_CONFIGURATION', message, details);
  }
}

export class NotFoundError extends BattleError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
  }
}

export class InternalError extends BattleError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, details);
  }
}
