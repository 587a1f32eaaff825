import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { DatabaseModule } from '@app/database';
import { LoggerModule } from '@app/logger';
import { RabbitmqModule } from '@app/rabbitmq';
import { StorageModule } from '@app/storage';
import { UploadsController } from './controllers/uploads.controller';
import { LecturesController } from './controllers/lectures.controller';
import { CoursesController } from './controllers/courses.controller';
import { UploadsService } from './services/uploads.service';
import { HealthModule } from './health/health.module';
import { HttpExceptionFilter } from './filters/http-exception.filter';
import { CorrelationIdInterceptor } from './interceptors/correlation-id.interceptor';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggerModule,
    DatabaseModule,
    RabbitmqModule,
    StorageModule,
    HealthModule,
  ],
  controllers: [UploadsController, LecturesController, CoursesController],
  providers: [
    UploadsService,
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: CorrelationIdInterceptor,
    },
  ],
})
export class GatewayModule {}
