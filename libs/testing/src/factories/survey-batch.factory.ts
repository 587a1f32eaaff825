import { BatchStatus, BatchType } from '@app/shared-types';
import type { SurveyBatch } from '@app/database';
import { generateId } from '../utils/id.util';

/**
 * Factory for creating test batch rows
 *
 * Provides convenient methods to create batch objects
 * with sensible defaults for testing.
 */
export class SurveyBatchFactory {
  private static lectureCounter = 0;

  static create(overrides: Partial<SurveyBatch> = {}): SurveyBatch {
    const now = new Date();
    const lectureNumber = ++this.lectureCounter;
    return {
      id: generateId(),
      courseName: 'Data Science',
      lectureDate: '2024-05-01',
      lectureNumber,
      batchType: BatchType.PRELIMINARY,
      originalFilename: 'survey.csv',
      storageUri: `memory://data-science/2024-05-01-lecture-${lectureNumber}/survey.csv`,
      uploadedBy: null,
      status: BatchStatus.QUEUED,
      totalResponses: 0,
      totalComments: 0,
      processedComments: 0,
      errorMessage: null,
      taskId: null,
      uploadedAt: now,
      processingStartedAt: null,
      completedAt: null,
      updatedAt: now,
      ...overrides,
    };
  }

  static createCompleted(overrides: Partial<SurveyBatch> = {}): SurveyBatch {
    const now = new Date();
    return this.create({
      status: BatchStatus.COMPLETED,
      processingStartedAt: now,
      completedAt: now,
      ...overrides,
    });
  }

  static createFailed(
    errorMessage: string,
    overrides: Partial<SurveyBatch> = {},
  ): SurveyBatch {
    return this.create({
      status: BatchStatus.FAILED,
      errorMessage,
      completedAt: new Date(),
      ...overrides,
    });
  }

  /**
   * Reset the lecture counter (useful in beforeEach)
   */
  static resetCounter(): void {
    this.lectureCounter = 0;
  }
}
