import { Injectable, Logger } from '@nestjs/common';
import { and, desc, eq } from 'drizzle-orm';
import { BatchStatus, BatchType, DuplicateBatchError } from '@app/shared-types';
import { DatabaseService } from '../database.service';
import { surveyBatches, NewSurveyBatch, SurveyBatch } from '../schema';

export type CreateSurveyBatchInput = Pick<
  NewSurveyBatch,
  | 'courseName'
  | 'lectureDate'
  | 'lectureNumber'
  | 'batchType'
  | 'originalFilename'
  | 'storageUri'
  | 'uploadedBy'
>;

export interface LectureInstanceKey {
  courseName: string;
  lectureDate: string;
  lectureNumber: number;
  batchType: BatchType;
}

export interface BatchCounts {
  totalResponses: number;
  totalComments: number;
  processedComments: number;
}

@Injectable()
export class SurveyBatchesRepository {
  private readonly logger = new Logger(SurveyBatchesRepository.name);

  constructor(private databaseService: DatabaseService) {}

  /**
   * Create a new batch in QUEUED state
   *
   * @throws DuplicateBatchError when the lecture instance already has a batch
   */
  async create(data: CreateSurveyBatchInput): Promise<SurveyBatch> {
    const [batch] = await this.databaseService.db
      .insert(surveyBatches)
      .values({ ...data, status: BatchStatus.QUEUED })
      .onConflictDoNothing({
        target: [
          surveyBatches.courseName,
          surveyBatches.lectureDate,
          surveyBatches.lectureNumber,
          surveyBatches.batchType,
        ],
      })
      .returning();

    if (!batch) {
      const existing = await this.findByLectureInstance({
        courseName: data.courseName,
        lectureDate: data.lectureDate,
        lectureNumber: data.lectureNumber,
        batchType: data.batchType ?? BatchType.PRELIMINARY,
      });
      // A concurrent delete can remove the conflicting row between the two queries
      throw new DuplicateBatchError(existing?.id ?? 'unknown');
    }

    this.logger.debug(`Created survey batch: ${batch.id}`);
    return batch;
  }

  /**
   * Find batch by ID
   */
  async findById(batchId: string): Promise<SurveyBatch | undefined> {
    const [batch] = await this.databaseService.db
      .select()
      .from(surveyBatches)
      .where(eq(surveyBatches.id, batchId));
    return batch;
  }

  async findByLectureInstance(
    key: LectureInstanceKey,
  ): Promise<SurveyBatch | undefined> {
    const [batch] = await this.databaseService.db
      .select()
      .from(surveyBatches)
      .where(
        and(
          eq(surveyBatches.courseName, key.courseName),
          eq(surveyBatches.lectureDate, key.lectureDate),
          eq(surveyBatches.lectureNumber, key.lectureNumber),
          eq(surveyBatches.batchType, key.batchType),
        ),
      );
    return batch;
  }

  /**
   * Every batch uploaded for a lecture, newest first
   */
  async findByLecture(
    courseName: string,
    lectureNumber: number,
  ): Promise<SurveyBatch[]> {
    return this.databaseService.db
      .select()
      .from(surveyBatches)
      .where(
        and(
          eq(surveyBatches.courseName, courseName),
          eq(surveyBatches.lectureNumber, lectureNumber),
        ),
      )
      .orderBy(desc(surveyBatches.uploadedAt));
  }

  /**
   * List all batches, newest first
   */
  async findAll(): Promise<SurveyBatch[]> {
    return this.databaseService.db
      .select()
      .from(surveyBatches)
      .orderBy(desc(surveyBatches.uploadedAt));
  }

  async setTaskId(batchId: string, taskId: string): Promise<void> {
    await this.databaseService.db
      .update(surveyBatches)
      .set({ taskId, updatedAt: new Date() })
      .where(eq(surveyBatches.id, batchId));
  }

  /**
   * Move to PROCESSING and clear any earlier failure
   */
  async markProcessing(batchId: string): Promise<SurveyBatch | undefined> {
    const now = new Date();
    const [batch] = await this.databaseService.db
      .update(surveyBatches)
      .set({
        status: BatchStatus.PROCESSING,
        processingStartedAt: now,
        completedAt: null,
        errorMessage: null,
        updatedAt: now,
      })
      .where(eq(surveyBatches.id, batchId))
      .returning();
    return batch;
  }

  async markCompleted(
    batchId: string,
    counts: BatchCounts,
  ): Promise<SurveyBatch | undefined> {
    const now = new Date();
    const [batch] = await this.databaseService.db
      .update(surveyBatches)
      .set({
        status: BatchStatus.COMPLETED,
        ...counts,
        errorMessage: null,
        completedAt: now,
        updatedAt: now,
      })
      .where(eq(surveyBatches.id, batchId))
      .returning();
    return batch;
  }

  async markFailed(
    batchId: string,
    errorMessage: string,
  ): Promise<SurveyBatch | undefined> {
    const now = new Date();
    const [batch] = await this.databaseService.db
      .update(surveyBatches)
      .set({
        status: BatchStatus.FAILED,
        errorMessage,
        completedAt: now,
        updatedAt: now,
      })
      .where(eq(surveyBatches.id, batchId))
      .returning();
    return batch;
  }

  /**
   * Delete a batch; child and summary rows cascade
   */
  async delete(batchId: string): Promise<SurveyBatch | undefined> {
    const [batch] = await this.databaseService.db
      .delete(surveyBatches)
      .where(eq(surveyBatches.id, batchId))
      .returning();
    return batch;
  }
}
