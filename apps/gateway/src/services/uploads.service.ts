import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  LectureInstanceKey,
  ResponseComment,
  ResponseCommentsRepository,
  SummariesRepository,
  SurveyBatch,
  SurveyBatchesRepository,
} from '@app/database';
import { RabbitmqService } from '@app/rabbitmq';
import {
  ALL_STUDENTS,
  BatchNotFoundError,
  BatchType,
  CsvValidationError,
  DuplicateBatchError,
  MESSAGE_PATTERNS,
  ProcessUploadMessage,
  RecomputeSummaryMessage,
  StorageError,
  SummaryAnalysisType,
  getErrorMessage,
  sanitizeForLog,
  selectEffectiveBatch,
} from '@app/shared-types';
import { STORAGE_CLIENT, StorageClient } from '@app/storage';
import {
  LectureInstance,
  buildStoragePath,
  parseSurveyCsv,
} from '@app/survey-csv';
import {
  BatchStatusDto,
  CommentDto,
  CommentHistograms,
  CommentListQueryDto,
  DEFAULT_COMMENT_PAGE_SIZE,
  EffectiveLectureDto,
  RecomputeResponseDto,
  SummaryResponseDto,
  UploadMetadataDto,
  UploadResponseDto,
} from '../dtos';

export interface UploadedSurveyFile {
  originalname: string;
  buffer: Buffer;
  size: number;
  mimetype?: string;
}

export function toCommentDto(comment: ResponseComment): CommentDto {
  return {
    comment_id: comment.id,
    file_id: comment.batchId,
    response_id: comment.responseId,
    question_label: comment.questionLabel,
    question_type: comment.questionType,
    comment_text: comment.commentText,
    category: comment.category,
    sentiment: comment.sentiment,
    importance_level: comment.importanceLevel,
    importance_score: comment.importanceScore,
    risk_level: comment.riskLevel,
    is_safe: comment.isSafe,
    is_improvement_needed: comment.isImprovementNeeded,
    summary: comment.summary,
    tags: comment.tags,
    analysis_status: comment.analysisStatus,
    analyzed_at: comment.analyzedAt,
  };
}

export function toBatchStatusDto(batch: SurveyBatch): BatchStatusDto {
  return {
    file_id: batch.id,
    status: batch.status,
    course_name: batch.courseName,
    lecture_date: batch.lectureDate,
    lecture_number: batch.lectureNumber,
    batch_type: batch.batchType,
    total_responses: batch.totalResponses,
    total_comments: batch.totalComments,
    processed_comments: batch.processedComments,
    error_message: batch.errorMessage,
    uploaded_at: batch.uploadedAt,
    processing_started_at: batch.processingStartedAt,
    completed_at: batch.completedAt,
  };
}

/**
 * Upload entrypoint and read model for survey batches
 *
 * Validation and storage happen inside the request; classification is
 * handed to the analysis worker through RabbitMQ.
 */
@Injectable()
export class UploadsService {
  private readonly logger = new Logger(UploadsService.name);

  constructor(
    private readonly batchesRepository: SurveyBatchesRepository,
    private readonly summariesRepository: SummariesRepository,
    private readonly commentsRepository: ResponseCommentsRepository,
    private readonly rabbitmqService: RabbitmqService,
    @Inject(STORAGE_CLIENT) private readonly storage: StorageClient,
  ) {}

  /**
   * Validate, store and enqueue an uploaded survey file
   */
  async upload(
    file: UploadedSurveyFile | undefined,
    metadata: UploadMetadataDto,
    uploadedBy: string | null,
    correlationId: string,
  ): Promise<UploadResponseDto> {
    if (!file || file.size === 0 || file.buffer.length === 0) {
      throw new BadRequestException('Uploaded file is empty.');
    }

    try {
      parseSurveyCsv(file.buffer);
    } catch (error) {
      if (error instanceof CsvValidationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    const courseName = metadata.courseName.trim();
    if (!courseName) {
      throw new BadRequestException('courseName is required');
    }

    const lecture = {
      courseName,
      lectureDate: metadata.lectureDate,
      lectureNumber: metadata.lectureNumber,
    };
    const batchType = metadata.batchType ?? BatchType.PRELIMINARY;

    const existing = await this.batchesRepository.findByLectureInstance({
      ...lecture,
      batchType,
    });
    if (existing) {
      throw new ConflictException(new DuplicateBatchError(existing.id).message);
    }

    const storageUri = await this.saveFile(file, lecture, correlationId);

    const batch = await this.createBatch(
      { ...lecture, batchType },
      file.originalname || null,
      storageUri,
      uploadedBy,
      correlationId,
    );

    this.logger.log(
      `[${correlationId}] Batch ${batch.id} created for ${sanitizeForLog(lecture.courseName)} ${lecture.lectureDate} lecture ${lecture.lectureNumber} (${batchType})`,
    );

    const message: ProcessUploadMessage = {
      batchId: batch.id,
      storageUri,
      timestamp: new Date(),
    };
    try {
      await this.rabbitmqService.emit(MESSAGE_PATTERNS.UPLOAD_PROCESS, message, {
        correlationId,
      });
    } catch (error) {
      const reason = `Failed to enqueue processing job: ${getErrorMessage(error)}`;
      await this.batchesRepository.markFailed(batch.id, reason);
      this.logger.error(`[${correlationId}] ${reason}`);
      throw new ServiceUnavailableException(reason);
    }
    await this.batchesRepository.setTaskId(batch.id, correlationId);

    return {
      file_id: batch.id,
      status_url: `/api/uploads/${batch.id}/status`,
      message: 'Upload accepted; analysis has been queued.',
    };
  }

  async listBatches(): Promise<BatchStatusDto[]> {
    const batches = await this.batchesRepository.findAll();
    return batches.map(toBatchStatusDto);
  }

  async getStatus(batchId: string): Promise<BatchStatusDto> {
    return toBatchStatusDto(await this.findBatch(batchId));
  }

  /**
   * Remove the batch (derived rows cascade) and then its stored file
   */
  async deleteBatch(batchId: string, correlationId: string): Promise<void> {
    const deleted = await this.batchesRepository.delete(batchId);
    if (!deleted) {
      throw new NotFoundException(new BatchNotFoundError(batchId).message);
    }

    try {
      await this.storage.delete(deleted.storageUri);
    } catch (error) {
      // The row is gone; an orphaned blob is left for manual cleanup
      this.logger.warn(
        `[${correlationId}] Batch ${batchId} deleted but its file could not be removed: ${getErrorMessage(error)}`,
      );
    }
    this.logger.log(`[${correlationId}] Batch ${batchId} deleted`);
  }

  async getSummary(
    batchId: string,
    studentAttribute: string = ALL_STUDENTS,
  ): Promise<SummaryResponseDto> {
    const batch = await this.findBatch(batchId);
    return this.buildSummary(batch.id, studentAttribute);
  }

  async requestRecompute(
    batchId: string,
    correlationId: string,
  ): Promise<RecomputeResponseDto> {
    const batch = await this.findBatch(batchId);

    const message: RecomputeSummaryMessage = {
      batchId: batch.id,
      timestamp: new Date(),
    };
    await this.rabbitmqService.emit(MESSAGE_PATTERNS.SUMMARY_RECOMPUTE, message, {
      correlationId,
    });
    this.logger.log(`[${correlationId}] Summary recompute requested for ${batch.id}`);

    return {
      file_id: batch.id,
      message: 'Summary recomputation has been queued.',
    };
  }

  /**
   * The batch that represents a lecture, with its ALL summary
   */
  async getEffectiveLecture(
    courseName: string,
    lectureNumber: number,
  ): Promise<EffectiveLectureDto> {
    const name = courseName.trim();
    const candidates = await this.batchesRepository.findByLecture(
      name,
      lectureNumber,
    );
    const effective = selectEffectiveBatch(candidates);
    if (!effective) {
      throw new NotFoundException(
        `No survey batch found for ${name} lecture ${lectureNumber}`,
      );
    }

    return {
      batch: toBatchStatusDto(effective),
      summary: await this.buildSummary(effective.id, ALL_STUDENTS),
    };
  }

  /**
   * Classified comments of one batch
   */
  async listBatchComments(
    batchId: string,
    query: CommentListQueryDto,
  ): Promise<CommentDto[]> {
    await this.findBatch(batchId);
    const comments = await this.commentsRepository.findPage({
      batchId,
      sentiment: query.sentiment,
      category: query.category,
      limit: query.limit ?? DEFAULT_COMMENT_PAGE_SIZE,
      skip: query.skip ?? 0,
    });
    return comments.map(toCommentDto);
  }

  /**
   * Classified comments across every batch of a course; an unknown course
   * yields an empty page
   */
  async listCourseComments(
    courseName: string,
    query: CommentListQueryDto,
  ): Promise<CommentDto[]> {
    const name = courseName.trim();
    if (!name) {
      throw new BadRequestException('courseName is required');
    }
    const comments = await this.commentsRepository.findPage({
      courseName: name,
      sentiment: query.sentiment,
      category: query.category,
      limit: query.limit ?? DEFAULT_COMMENT_PAGE_SIZE,
      skip: query.skip ?? 0,
    });
    return comments.map(toCommentDto);
  }

  private async findBatch(batchId: string): Promise<SurveyBatch> {
    const batch = await this.batchesRepository.findById(batchId);
    if (!batch) {
      throw new NotFoundException(new BatchNotFoundError(batchId).message);
    }
    return batch;
  }

  private async buildSummary(
    batchId: string,
    studentAttribute: string,
  ): Promise<SummaryResponseDto> {
    const [survey, rows] = await Promise.all([
      this.summariesRepository.findSurveySummary(batchId, studentAttribute),
      this.summariesRepository.findCommentSummaries(batchId, studentAttribute),
    ]);

    const comments: CommentHistograms = {
      [SummaryAnalysisType.SENTIMENT]: {},
      [SummaryAnalysisType.CATEGORY]: {},
      [SummaryAnalysisType.IMPORTANCE]: {},
    };
    for (const row of rows) {
      comments[row.analysisType][row.label] = row.count;
    }

    return {
      file_id: batchId,
      student_attribute: studentAttribute,
      survey: survey ?? null,
      comments,
    };
  }

  private async createBatch(
    key: LectureInstanceKey,
    originalFilename: string | null,
    storageUri: string,
    uploadedBy: string | null,
    correlationId: string,
  ): Promise<SurveyBatch> {
    try {
      return await this.batchesRepository.create({
        ...key,
        originalFilename,
        storageUri,
        uploadedBy,
      });
    } catch (error) {
      // Lost a race with a concurrent upload of the same lecture
      try {
        await this.storage.delete(storageUri);
      } catch (cleanupError) {
        this.logger.warn(
          `[${correlationId}] Stored file ${storageUri} could not be removed: ${getErrorMessage(cleanupError)}`,
        );
      }
      if (error instanceof DuplicateBatchError) {
        throw new ConflictException(error.message);
      }
      throw error;
    }
  }

  private async saveFile(
    file: UploadedSurveyFile,
    lecture: LectureInstance,
    correlationId: string,
  ): Promise<string> {
    const path = buildStoragePath(lecture, file.originalname);
    try {
      return await this.storage.save(path, file.buffer, file.mimetype);
    } catch (error) {
      if (error instanceof StorageError) {
        this.logger.error(`[${correlationId}] ${error.message}`);
        throw new ServiceUnavailableException('File storage is unavailable.');
      }
      throw error;
    }
  }
}
