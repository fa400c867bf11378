import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';
import { AppError } from './app.error.js';

const STATUS_BY_CODE: Record<string, HttpStatus> = {
  UNSUPPORTED_FILE_TYPE: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
  EMBEDDING_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  COMPLETION_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  DIMENSION_MISMATCH: HttpStatus.CONFLICT,
  INCOMPLETE_RESPONSE: HttpStatus.UNPROCESSABLE_ENTITY,
};

export function statusForAppError(error: AppError): HttpStatus {
  return STATUS_BY_CODE[error.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;
}

export function formatZodError(error: ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    .join('; ');
}

/**
 * Maps domain errors and request validation failures to JSON responses.
 * Nest's own HttpExceptions are left to the default handler.
 */
@Catch(AppError, ZodError)
export class AppErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(AppErrorFilter.name);

  catch(error: AppError | ZodError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const requestId = randomUUID();

    if (error instanceof ZodError) {
      const message = formatZodError(error);
      this.logger.warn(`Request ${requestId} rejected: ${message}`);
      response.status(HttpStatus.BAD_REQUEST).json({
        code: 'BAD_REQUEST',
        message,
        requestId,
      });
      return;
    }

    const status = statusForAppError(error);
    this.logger.error(
      `Request ${requestId} failed [${error.code}]: ${error.message}`,
      error.stack,
    );
    response.status(status).json({
      code: error.code,
      message: error.message,
      requestId,
    });
  }
}
