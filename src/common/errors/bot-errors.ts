import { HttpStatus } from '@nestjs/common';

export class BotError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BotError';
  }
}

export class NotFoundError extends BotError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

/** 시작 조건 미충족 (예: hp_indicator 미로드): 상태 변경 없음 */
export class PreconditionFailedError extends BotError {
  constructor(message = 'Precondition failed', details?: Record<string, unknown>) {
    super('PRECONDITION_FAILED', message, HttpStatus.CONFLICT, details);
  }
}

export class InvalidInputError extends BotError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}

/** 기준 비트맵 파일을 읽거나 디코딩하지 못함: 기존 비트맵은 그대로 */
export class ReferenceLoadError extends BotError {
  constructor(name: string, path: string) {
    super('REFERENCE_UNREADABLE', `Could not load ${name} from ${path}`, 422, { name, path });
  }
}

export class InternalError extends BotError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}
