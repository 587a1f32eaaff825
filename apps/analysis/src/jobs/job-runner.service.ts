import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SurveyBatch, SurveyBatchesRepository } from '@app/database';
import {
  BatchNotFoundError,
  JobFailedError,
  StorageError,
  getErrorMessage,
  sanitizeForLog,
  truncateMessage,
} from '@app/shared-types';
import { STORAGE_CLIENT, StorageClient } from '@app/storage';
import { UploadPipelineService } from '../pipeline';
import { SummaryAggregatorService } from '../summary';

export const DEFAULT_JOB_MAX_RETRIES = 3;
export const DEFAULT_JOB_RETRY_DELAY_MS = 2000;
export const DEFAULT_JOB_ERROR_MESSAGE_MAX_LENGTH = 500;

function readNonNegativeInt(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const value = Number(configService.get(key, fallback));
  return Number.isInteger(value) && value >= 0 ? value : fallback;
}

/**
 * Background Job Runner
 *
 * Drives one batch through QUEUED -> PROCESSING -> COMPLETED | FAILED.
 * Each transition is written on its own so status polling sees
 * PROCESSING as soon as work starts.
 */
@Injectable()
export class JobRunnerService {
  private readonly logger = new Logger(JobRunnerService.name);
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly errorMessageMaxLength: number;

  constructor(
    private readonly batchesRepository: SurveyBatchesRepository,
    private readonly pipeline: UploadPipelineService,
    private readonly aggregator: SummaryAggregatorService,
    @Inject(STORAGE_CLIENT) private readonly storage: StorageClient,
    configService: ConfigService,
  ) {
    this.maxRetries = readNonNegativeInt(
      configService,
      'JOB_MAX_RETRIES',
      DEFAULT_JOB_MAX_RETRIES,
    );
    this.retryDelayMs = readNonNegativeInt(
      configService,
      'JOB_RETRY_DELAY_MS',
      DEFAULT_JOB_RETRY_DELAY_MS,
    );
    this.errorMessageMaxLength = Math.max(
      1,
      readNonNegativeInt(
        configService,
        'JOB_ERROR_MESSAGE_MAX_LENGTH',
        DEFAULT_JOB_ERROR_MESSAGE_MAX_LENGTH,
      ),
    );
  }

  /**
   * Process an uploaded batch end to end
   *
   * @throws BatchNotFoundError when the batch row does not exist
   * @throws JobFailedError after the batch has been marked FAILED
   */
  async run(batchId: string, correlationId: string = batchId): Promise<SurveyBatch> {
    const tag = `[${correlationId}]`;
    const startTime = Date.now();

    const batch = await this.batchesRepository.findById(batchId);
    if (!batch) {
      throw new BatchNotFoundError(batchId);
    }

    await this.batchesRepository.markProcessing(batchId);
    this.logger.log(
      `${tag} Processing batch for ${sanitizeForLog(batch.courseName)} lecture ${batch.lectureNumber}`,
    );

    try {
      const content = await this.loadWithRetry(batch.storageUri, tag);
      const counts = await this.pipeline.process(batch, content, correlationId);
      await this.aggregator.recompute(batchId, correlationId);

      const completed = await this.batchesRepository.markCompleted(batchId, counts);
      if (!completed) {
        throw new BatchNotFoundError(batchId);
      }
      this.logger.log(
        `${tag} Batch completed in ${Date.now() - startTime}ms: ${counts.processedComments}/${counts.totalComments} comments, ${counts.totalResponses} responses`,
      );
      return completed;
    } catch (error) {
      const message = truncateMessage(
        getErrorMessage(error),
        this.errorMessageMaxLength,
      );
      await this.batchesRepository.markFailed(batchId, message);
      this.logger.error(
        `${tag} Batch failed after ${Date.now() - startTime}ms: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new JobFailedError(
        batchId,
        message,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Load the stored file, retrying I/O failures with a fixed delay;
   * an invalid URI fails on the first attempt
   */
  private async loadWithRetry(uri: string, tag: string): Promise<Buffer> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.storage.load(uri);
      } catch (error) {
        if (!(error instanceof StorageError) || attempt >= this.maxRetries) {
          throw error;
        }
        this.logger.warn(
          `${tag} Storage load failed (attempt ${attempt + 1}/${this.maxRetries + 1}), retrying in ${this.retryDelayMs}ms: ${error.message}`,
        );
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      }
    }
  }
}
