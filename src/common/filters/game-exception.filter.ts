import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { GameError, type ErrorBody } from '../errors/game-errors.js';

@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const [status, body] = this.render(exception);
    res.status(status).json(body);
  }

  render(exception: unknown): [number, ErrorBody] {
    if (exception instanceof GameError) {
      if (exception.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);
      }
      return [exception.status, exception.toBody()];
    }

    // Nest's own 404 for unknown routes, malformed JSON bodies
    if (exception instanceof HttpException) {
      return [
        exception.getStatus(),
        { code: 'HTTP_ERROR', message: exception.message, details: null },
      ];
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    return [
      HttpStatus.INTERNAL_SERVER_ERROR,
      { code: 'INTERNAL_ERROR', message: 'Internal server error', details: null },
    ];
  }
}
