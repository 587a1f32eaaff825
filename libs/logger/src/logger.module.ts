/**
 * @fileoverview Structured logging module using nestjs-pino.
 *
 * JSON lines in production, pino-pretty in development, silent-ish in tests.
 * Every HTTP log line carries the request's correlation id.
 *
 * @example
 * ```typescript
 * @Module({ imports: [LoggerModule] })
 * export class GatewayModule {}
 *
 * const app = await NestFactory.create(GatewayModule, { bufferLogs: true });
 * app.useLogger(app.get(Logger));
 * ```
 *
 * @module @app/logger
 */
import { Module, Global } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import type { IncomingMessage, ServerResponse } from 'http';
import * as crypto from 'crypto';
import { CORRELATION_ID_HEADER } from '@app/shared-types';

/** Probe endpoints polled by the orchestrator; logging them is noise */
export const UNLOGGED_PATH_PREFIXES = ['/health'];

export function resolveLogLevel(configService: ConfigService): string {
  const env = configService.get<string>('NODE_ENV');
  const explicit = configService.get<string>('LOG_LEVEL');
  if (explicit) {
    return explicit;
  }
  if (env === 'test') {
    return 'warn';
  }
  return env === 'production' ? 'info' : 'debug';
}

/**
 * Reuse the caller's correlation id, or mint one
 */
export function resolveRequestId(req: IncomingMessage): string {
  const header = req.headers[CORRELATION_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value || crypto.randomUUID();
}

/**
 * 5xx and thrown errors log at error, 4xx at warn
 */
export function resolveResponseLevel(
  _req: IncomingMessage,
  res: ServerResponse,
  error?: Error,
): 'error' | 'warn' | 'info' {
  if (error || res.statusCode >= 500) {
    return 'error';
  }
  return res.statusCode >= 400 ? 'warn' : 'info';
}

export function isUnloggedRequest(req: IncomingMessage): boolean {
  const url = req.url ?? '';
  return UNLOGGED_PATH_PREFIXES.some((prefix) => url.startsWith(prefix));
}

/**
 * Creates logger configuration for nestjs-pino at runtime, after
 * ConfigModule has loaded .env values.
 */
export function createLoggerConfig(configService: ConfigService): Params {
  const env = configService.get<string>('NODE_ENV');
  const pretty = env !== 'production' && env !== 'test';

  return {
    pinoHttp: {
      level: resolveLogLevel(configService),

      transport: pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:HH:MM:ss.l',
              ignore: 'pid,hostname',
              singleLine: false,
            },
          }
        : undefined,

      // Runs before the interceptors; CorrelationIdInterceptor reads req.id back
      genReqId: resolveRequestId,

      customProps: (req) => ({
        correlationId: req.id,
      }),

      customLogLevel: resolveResponseLevel,

      autoLogging: {
        ignore: isUnloggedRequest,
      },

      serializers: {
        req: (req: { method?: string; url?: string }) => ({
          method: req.method,
          url: req.url,
        }),
        res: (res: { statusCode?: number }) => ({
          statusCode: res.statusCode,
        }),
      },

      redact: ['req.headers.authorization', 'req.headers.cookie'],

      customAttributeKeys: {
        responseTime: 'duration',
      },
    },

    renameContext: 'service',
  };
}

/**
 * Global logging module. Import once in each application's root module.
 *
 * Environment Variables:
 * - `NODE_ENV`: 'production' for JSON output, 'test' for warn-level output
 * - `LOG_LEVEL`: Override default log level (trace/debug/info/warn/error/fatal)
 */
@Global()
@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: createLoggerConfig,
    }),
  ],
  exports: [PinoLoggerModule],
})
export class LoggerModule {}
