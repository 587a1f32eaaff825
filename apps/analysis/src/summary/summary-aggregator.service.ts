import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ResponseCommentsRepository,
  SummariesRepository,
  SummaryWriteResult,
  SurveyResponsesRepository,
} from '@app/database';
import { NpsScale, buildBatchSummaries, parseNpsScale } from './summary.calculations';

/**
 * Summary Aggregator
 *
 * Recomputes a batch's survey_summaries and comment_summaries from its
 * current responses and comments. The result depends only on those rows,
 * so concurrent or repeated runs converge on the same stored values.
 */
@Injectable()
export class SummaryAggregatorService {
  private readonly logger = new Logger(SummaryAggregatorService.name);
  private readonly npsScale: NpsScale;

  constructor(
    private readonly responsesRepository: SurveyResponsesRepository,
    private readonly commentsRepository: ResponseCommentsRepository,
    private readonly summariesRepository: SummariesRepository,
    configService: ConfigService,
  ) {
    this.npsScale = parseNpsScale(configService.get('NPS_SCALE', 10));
  }

  async recompute(
    batchId: string,
    correlationId: string = batchId,
  ): Promise<SummaryWriteResult> {
    const [responses, comments] = await Promise.all([
      this.responsesRepository.findByBatchId(batchId),
      this.commentsRepository.findByBatchId(batchId),
    ]);

    const segments = buildBatchSummaries(batchId, responses, comments, this.npsScale);

    const result = await this.summariesRepository.upsertBatchSummaries(
      batchId,
      segments.map((segment) => segment.survey),
      segments.flatMap((segment) => segment.comments),
    );

    this.logger.log(
      `[${correlationId}] Recomputed summaries for ${segments.length} segments (${responses.length} responses, ${comments.length} comments)`,
    );
    return result;
  }
}
