import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { v4 as uuidv4 } from 'uuid';
import type { Request, Response } from 'express';
import { CORRELATION_ID_HEADER } from '@app/shared-types';
import { readHeader } from '../decorators/correlation-id.decorator';

/**
 * Gives every request a correlation id and logs one line per request.
 * The id is written back onto the request headers, so @CorrelationId()
 * and HttpExceptionFilter see the same value the client gets back.
 */
@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor {
  private readonly logger = new Logger(CorrelationIdInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const correlationId = readHeader(request, CORRELATION_ID_HEADER) ?? uuidv4();
    request.headers[CORRELATION_ID_HEADER] = correlationId;
    if (!response.headersSent) {
      response.setHeader('X-Correlation-Id', correlationId);
    }

    const route = `${request.method} ${request.url}`;
    const startedAt = Date.now();
    const elapsed = () => `${Date.now() - startedAt}ms`;

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(
            `[${correlationId}] ${route} ${response.statusCode} ${elapsed()}`,
          );
        },
        error: (error: unknown) => {
          // 4xx are expected outcomes (validation, duplicates, unknown ids)
          if (error instanceof HttpException && error.getStatus() < 500) {
            this.logger.log(
              `[${correlationId}] ${route} ${error.getStatus()} ${elapsed()}`,
            );
            return;
          }
          this.logger.error(
            `[${correlationId}] ${route} failed ${elapsed()}`,
            error instanceof Error ? error.stack : undefined,
          );
        },
      }),
    );
  }
}
