import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger as PinoLogger } from 'nestjs-pino';
import { GatewayModule } from './gateway.module';
import { createValidationPipe } from './pipes/validation.pipe';

async function bootstrap() {
  const logger = new Logger('GatewayBootstrap');

  const app = await NestFactory.create(GatewayModule, { bufferLogs: true });
  app.useLogger(app.get(PinoLogger));
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const httpPort = configService.get<number>('GATEWAY_PORT', 3000);

  // Enable CORS for the browser front end
  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', 'http://localhost:5173'),
    credentials: true,
  });

  app.useGlobalPipes(createValidationPipe());

  // Swagger documentation
  const config = new DocumentBuilder()
    .setTitle('Lecture Feedback API Gateway')
    .setDescription('Survey upload, processing status and feedback summaries')
    .setVersion('1.0')
    .addTag('uploads', 'Survey file uploads and batch status')
    .addTag('lectures', 'Lecture-level read model')
    .addTag('health', 'Health check endpoints')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(httpPort);

  logger.log(
    JSON.stringify({
      event: 'service_started',
      service: 'gateway',
      version: '1.0.0',
      port: Number(httpPort),
      environment: configService.get<string>('NODE_ENV', 'development'),
      endpoints: {
        docs: '/api/docs',
        health: '/health',
      },
      timestamp: new Date().toISOString(),
      pid: process.pid,
    }),
  );
}

bootstrap().catch((err) => {
  const logger = new Logger('GatewayBootstrap');
  logger.error(
    'Failed to start application',
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
