import { HttpStatus } from '@nestjs/common';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class UnauthorizedError extends GameError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class ForbiddenError extends GameError {
  constructor(message = 'Forbidden', details?: Record<string, unknown>) {
    super('FORBIDDEN', message, HttpStatus.FORBIDDEN, details);
  }
}

export class InsufficientEnergyError extends GameError {
  constructor(required: number, available: number) {
    super('INSUFFICIENT_ENERGY', 'Not enough energy', HttpStatus.CONFLICT, {
      required,
      available,
    });
  }
}

/** 알 수 없는 퀘스트, 또는 선행 퀘스트 미완료 */
export class InvalidQuestError extends GameError {
  constructor(message = 'Invalid quest', details?: Record<string, unknown>) {
    super('INVALID_QUEST', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class InsufficientSoulShardsError extends GameError {
  constructor(required: number, available: number) {
    super('INSUFFICIENT_SOUL_SHARDS', 'Not enough soul shards', HttpStatus.CONFLICT, {
      required,
      available,
    });
  }
}

/** ROUND_CONFLICT: 제출/저장 시점의 라운드가 기대값과 다름 (중복 제출) */
export class EncounterConflictError extends GameError {
  constructor(
    code: 'ENCOUNTER_ACTIVE' | 'ENCOUNTER_ENDED' | 'ROUND_CONFLICT' = 'ENCOUNTER_ACTIVE',
    message = 'Encounter conflict',
    details?: Record<string, unknown>,
  ) {
    super(code, message, HttpStatus.CONFLICT, details);
  }
}

export class AbilityUnavailableError extends GameError {
  constructor(abilityId: string) {
    super('ABILITY_UNAVAILABLE', `Ability not available: ${abilityId}`, HttpStatus.UNPROCESSABLE_ENTITY, {
      abilityId,
    });
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}
