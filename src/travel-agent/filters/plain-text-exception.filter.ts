import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ValidationError, describeError } from '../errors/travel-agent.errors';

export interface PlainTextError {
  status: number;
  message: string;
}

// body-parser rejects oversized or undecodable payloads with http-errors
// instances, which carry a 4xx `status` but are not HttpExceptions.
function clientErrorStatus(exception: unknown): number | undefined {
  if (typeof exception !== 'object' || exception === null) {
    return undefined;
  }
  const status =
    'status' in exception && typeof exception.status === 'number'
      ? exception.status
      : 'statusCode' in exception && typeof exception.statusCode === 'number'
        ? exception.statusCode
        : undefined;
  if (status === undefined || status < 400 || status >= 500) {
    return undefined;
  }
  return status;
}

export function toPlainTextError(exception: unknown): PlainTextError {
  if (exception instanceof ValidationError) {
    return { status: exception.getStatus(), message: exception.message };
  }
  // Raised by the framework when the JSON body parser rejects the payload.
  if (exception instanceof BadRequestException) {
    return { status: exception.getStatus(), message: `Invalid JSON: ${exception.message}` };
  }
  if (exception instanceof HttpException) {
    return { status: exception.getStatus(), message: exception.message };
  }
  const clientStatus = clientErrorStatus(exception);
  if (clientStatus !== undefined) {
    return { status: clientStatus, message: describeError(exception) };
  }
  return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: describeError(exception) };
}

/** Every error leaves as `text/plain` carrying its message verbatim. */
@Catch()
export class PlainTextExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PlainTextExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, message } = toPlainTextError(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(message, exception instanceof Error ? exception.stack : undefined);
    }

    response.status(status).type('text/plain').send(message);
  }
}
