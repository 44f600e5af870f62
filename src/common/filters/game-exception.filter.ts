import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { GameError } from '../errors/game-errors.js';

type ErrorBody = {
  code: string;
  message: string;
  details: unknown;
};

@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const [status, body] = this.toResponse(exception);
    res.status(status).json(body);
  }

  toResponse(exception: unknown): [number, ErrorBody] {
    if (exception instanceof GameError) {
      if (exception.httpStatus >= 500) {
        this.logger.error(exception.message, exception.stack);
      }
      return [
        exception.httpStatus,
        {
          code: exception.code,
          message: exception.message,
          details: exception.details ?? null,
        },
      ];
    }

    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      return [
        exception.getStatus(),
        {
          code: 'HTTP_ERROR',
          message: typeof body === 'string' ? body : exception.message,
          details: typeof body === 'object' ? body : null,
        },
      ];
    }

    this.logger.error(
      exception instanceof Error ? exception.message : String(exception),
      exception instanceof Error ? exception.stack : undefined,
    );
    return [
      HttpStatus.INTERNAL_SERVER_ERROR,
      {
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
        details: null,
      },
    ];
  }
}
