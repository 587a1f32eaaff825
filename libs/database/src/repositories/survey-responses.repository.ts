import { Injectable, Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DatabaseService } from '../database.service';
import {
  surveyResponses,
  NewSurveyResponse,
  SurveyResponse,
} from '../schema';

@Injectable()
export class SurveyResponsesRepository {
  private readonly logger = new Logger(SurveyResponsesRepository.name);

  constructor(private databaseService: DatabaseService) {}

  async create(data: NewSurveyResponse): Promise<SurveyResponse> {
    const [record] = await this.databaseService.db
      .insert(surveyResponses)
      .values(data)
      .returning();
    return record;
  }

  async findByBatchId(batchId: string): Promise<SurveyResponse[]> {
    return this.databaseService.db
      .select()
      .from(surveyResponses)
      .where(eq(surveyResponses.batchId, batchId));
  }

  /**
   * Remove rows left by an earlier, interrupted run of the same job.
   * Comments linked to these rows are removed with deleteByBatchId on
   * the comments repository, not by cascade.
   */
  async deleteByBatchId(batchId: string): Promise<number> {
    const deleted = await this.databaseService.db
      .delete(surveyResponses)
      .where(eq(surveyResponses.batchId, batchId))
      .returning({ id: surveyResponses.id });

    if (deleted.length > 0) {
      this.logger.debug(
        `Deleted ${deleted.length} survey responses for batch ${batchId}`,
      );
    }
    return deleted.length;
  }
}
