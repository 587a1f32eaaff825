import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Semaphore } from 'async-mutex';
import {
  NewResponseComment,
  ResponseCommentsRepository,
  SurveyBatch,
  SurveyResponsesRepository,
} from '@app/database';
import {
  ExtractedComment,
  extractComments,
  extractRespondent,
  extractScores,
  parseSurveyCsv,
} from '@app/survey-csv';
import { CommentClassifierService } from '../classification';

export const DEFAULT_LLM_CONCURRENCY = 4;
export const DEFAULT_ANALYSIS_VERSION = 'v1';

export interface PipelineCounts {
  totalComments: number;
  processedComments: number;
  totalResponses: number;
}

interface PendingComment {
  responseId: string;
  comment: ExtractedComment;
}

/**
 * Upload Pipeline
 *
 * Turns one stored survey file into survey_responses and
 * response_comments rows. Comments are classified through a bounded pool;
 * a comment whose classification fails is still stored with fallback
 * values. Only a structurally invalid file aborts the run.
 */
@Injectable()
export class UploadPipelineService {
  private readonly logger = new Logger(UploadPipelineService.name);
  private readonly concurrency: number;
  private readonly analysisVersion: string;

  constructor(
    private readonly responsesRepository: SurveyResponsesRepository,
    private readonly commentsRepository: ResponseCommentsRepository,
    private readonly classifier: CommentClassifierService,
    configService: ConfigService,
  ) {
    const concurrency = Number(
      configService.get<number>('LLM_CONCURRENCY', DEFAULT_LLM_CONCURRENCY),
    );
    this.concurrency =
      Number.isInteger(concurrency) && concurrency > 0
        ? concurrency
        : DEFAULT_LLM_CONCURRENCY;
    this.analysisVersion = configService.get<string>(
      'ANALYSIS_VERSION',
      DEFAULT_ANALYSIS_VERSION,
    );
  }

  /**
   * @throws CsvValidationError when the file is structurally invalid;
   *   nothing is written in that case
   */
  async process(
    batch: SurveyBatch,
    content: Buffer,
    correlationId: string = batch.id,
  ): Promise<PipelineCounts> {
    const tag = `[${correlationId}]`;
    const parsed = parseSurveyCsv(content);

    // Redelivered jobs start from a clean slate
    const staleComments = await this.commentsRepository.deleteByBatchId(batch.id);
    const staleResponses = await this.responsesRepository.deleteByBatchId(batch.id);
    if (staleComments > 0 || staleResponses > 0) {
      this.logger.log(
        `${tag} Cleared ${staleResponses} responses and ${staleComments} comments from an earlier run`,
      );
    }

    const pending: PendingComment[] = [];
    for (const [index, row] of parsed.rows.entries()) {
      const response = await this.responsesRepository.create({
        batchId: batch.id,
        rowNumber: index + 1,
        ...extractRespondent(row),
        ...extractScores(row),
      });
      for (const comment of extractComments(row, parsed.commentColumns)) {
        pending.push({ responseId: response.id, comment });
      }
    }

    this.logger.log(
      `${tag} Parsed ${parsed.rows.length} responses with ${pending.length} comments; classifying with concurrency ${this.concurrency}`,
    );

    const semaphore = new Semaphore(this.concurrency);
    const rows = await Promise.all(
      pending.map((item) =>
        semaphore.runExclusive(() => this.classifyComment(batch, item, correlationId)),
      ),
    );

    const saved = await this.commentsRepository.createMany(rows);

    return {
      totalComments: pending.length,
      processedComments: saved.length,
      totalResponses: parsed.rows.length,
    };
  }

  private async classifyComment(
    batch: SurveyBatch,
    { responseId, comment }: PendingComment,
    correlationId: string,
  ): Promise<NewResponseComment> {
    const result = await this.classifier.classify(comment.text, {
      skipLlm: !comment.analyzeWithLlm,
      context: { courseName: batch.courseName, questionText: comment.column },
      correlationId,
    });

    return {
      batchId: batch.id,
      responseId,
      questionLabel: comment.column,
      questionType: comment.questionType,
      commentText: comment.text,
      category: result.category,
      sentiment: result.sentiment,
      importanceLevel: result.importanceLevel,
      importanceScore: result.importanceScore,
      riskLevel: result.riskLevel,
      isSafe: result.isSafe,
      isImprovementNeeded: result.isImprovementNeeded,
      summary: result.summary,
      tags: result.tags,
      analysisStatus: result.status,
      warnings: result.warnings,
      analysisVersion: this.analysisVersion,
      analyzedAt: new Date(),
    };
  }
}
