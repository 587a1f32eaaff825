import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger as PinoLogger } from 'nestjs-pino';
import { Logger } from '@nestjs/common';
import {
  RABBITMQ_CONSTANTS,
  buildRabbitMqUrl,
  buildRmqOptions,
  getSanitizedRabbitMqUrl,
} from '@app/rabbitmq';
import { AnalysisModule } from './analysis.module';

/**
 * Hybrid app: the RabbitMQ job consumer plus an HTTP port for health probes
 */
async function bootstrap() {
  const logger = new Logger('AnalysisBootstrap');

  const app = await NestFactory.create(AnalysisModule, { bufferLogs: true });
  app.useLogger(app.get(PinoLogger));
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const httpPort = configService.get<number>('ANALYSIS_PORT', 3002);
  const rabbitmqUrl = buildRabbitMqUrl(configService);
  const queue = RABBITMQ_CONSTANTS.QUEUES.ANALYSIS;

  app.connectMicroservice<MicroserviceOptions>(
    buildRmqOptions(rabbitmqUrl, queue, 'consumer'),
  );

  await app.startAllMicroservices();
  await app.listen(httpPort);

  logger.log(
    `Analysis worker consuming ${queue} on ${getSanitizedRabbitMqUrl(rabbitmqUrl)}; health on :${httpPort}/health`,
  );
}

bootstrap().catch((err: unknown) => {
  new Logger('AnalysisBootstrap').error(
    'Failed to start the analysis worker',
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
