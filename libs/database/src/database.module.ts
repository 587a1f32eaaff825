import { Module, Global } from '@nestjs/common';
import { DatabaseService } from './database.service';
import {
  ResponseCommentsRepository,
  SummariesRepository,
  SurveyBatchesRepository,
  SurveyResponsesRepository,
} from './repositories';

const REPOSITORIES = [
  SurveyBatchesRepository,
  SurveyResponsesRepository,
  ResponseCommentsRepository,
  SummariesRepository,
];

/**
 * Pool plus the four repositories over it; both applications import this once
 */
@Global()
@Module({
  providers: [DatabaseService, ...REPOSITORIES],
  exports: [DatabaseService, ...REPOSITORIES],
})
export class DatabaseModule {}
