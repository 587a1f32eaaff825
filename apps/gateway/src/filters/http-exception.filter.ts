import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { CORRELATION_ID_HEADER } from '@app/shared-types';
import { readHeader } from '../decorators/correlation-id.decorator';

export interface ErrorResponseBody {
  statusCode: number;
  timestamp: string;
  path: string;
  method: string;
  message: string;
  errors?: string[];
  correlationId: string;
}

/**
 * Split an HttpException response into a headline and detail messages.
 * ValidationPipe puts its per-field messages in `message`.
 */
function describeResponse(body: string | object): {
  message: string;
  errors?: string[];
} {
  if (typeof body === 'string') {
    return { message: body };
  }
  const error = 'error' in body && typeof body.error === 'string' ? body.error : undefined;
  const detail = 'message' in body ? body.message : undefined;

  if (Array.isArray(detail)) {
    return {
      message: error ?? 'Bad Request',
      errors: detail.filter((item): item is string => typeof item === 'string'),
    };
  }
  if (typeof detail === 'string') {
    return { message: detail };
  }
  return { message: error ?? 'Internal Server Error' };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const { message, errors } =
      exception instanceof HttpException
        ? describeResponse(exception.getResponse())
        : { message: 'Internal server error', errors: undefined };

    const correlationId = readHeader(request, CORRELATION_ID_HEADER) ?? 'unknown';

    const errorResponse: ErrorResponseBody = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      message,
      errors,
      correlationId,
    };

    if (status >= 500) {
      this.logger.error(
        `[${correlationId}] ${request.method} ${request.url} - ${status}`,
        exception instanceof Error ? exception.stack : 'Unknown error',
      );
    } else {
      this.logger.warn(
        `[${correlationId}] ${request.method} ${request.url} - ${status}: ${message}`,
      );
    }

    response.status(status).json(errorResponse);
  }
}
