import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { BotError, InternalError } from '../errors/bot-errors.js';

@Catch()
export class BotExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(BotExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();

    if (exception instanceof BotError) {
      res.status(exception.httpStatus).json({
        code: exception.code,
        message: exception.message,
        details: exception.details ?? null,
      });
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      res.status(status).json({
        code: 'HTTP_ERROR',
        message: typeof body === 'string' ? body : messageOf(body),
        details: typeof body === 'object' ? body : null,
      });
      return;
    }

    this.logger.error('Unhandled exception', exception instanceof Error ? exception.stack : String(exception));
    const internal = new InternalError('Internal server error');
    res.status(internal.httpStatus).json({
      code: internal.code,
      message: internal.message,
      details: null,
    });
  }
}

function messageOf(body: object): unknown {
  return 'message' in body ? body.message : 'Unknown error';
}
