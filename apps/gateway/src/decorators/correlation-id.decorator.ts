import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { CORRELATION_ID_HEADER } from '@app/shared-types';

/**
 * First value of a request header, if any
 */
export function readHeader(request: Request, name: string): string | undefined {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.length > 0 ? first : undefined;
}

/**
 * Correlation id of the current request, as normalized by
 * CorrelationIdInterceptor
 */
export const CorrelationId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string =>
    readHeader(ctx.switchToHttp().getRequest<Request>(), CORRELATION_ID_HEADER) ??
    'unknown',
);
