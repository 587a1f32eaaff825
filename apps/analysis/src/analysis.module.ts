import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '@app/database';
import { LlmModule } from '@app/llm';
import { LoggerModule } from '@app/logger';
import { StorageModule } from '@app/storage';
import { AnalysisController } from './analysis.controller';
import { CommentClassifierService } from './classification';
import { HealthModule } from './health/health.module';
import { JobRunnerService } from './jobs';
import { UploadPipelineService } from './pipeline';
import { SummaryAggregatorService } from './summary';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggerModule,
    DatabaseModule,
    StorageModule,
    LlmModule,
    HealthModule,
  ],
  controllers: [AnalysisController],
  providers: [
    CommentClassifierService,
    UploadPipelineService,
    SummaryAggregatorService,
    JobRunnerService,
  ],
})
export class AnalysisModule {}
