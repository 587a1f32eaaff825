import {
  pgTable,
  uuid,
  text,
  date,
  integer,
  timestamp,
  unique,
} from 'drizzle-orm/pg-core';
import { BatchStatus, BatchType } from '@app/shared-types';

/**
 * Survey Batches table - one row per uploaded survey file
 *
 * A batch is the processing unit for one lecture instance. Its natural key
 * is (course, date, lecture number, batch type): a lecture may carry one
 * preliminary and one confirmed upload, never two of the same type.
 *
 * Key timestamps:
 * - uploadedAt: When the gateway accepted the file (drives effective-batch ordering)
 * - processingStartedAt: When the worker picked the job up
 * - completedAt: When the worker reached COMPLETED or FAILED
 */
export const surveyBatches = pgTable(
  'survey_batches',
  {
    id: uuid('id').defaultRandom().primaryKey(),

    // Lecture identity
    courseName: text('course_name').notNull(),
    lectureDate: date('lecture_date', { mode: 'string' }).notNull(),
    lectureNumber: integer('lecture_number').notNull(),
    batchType: text('batch_type', {
      enum: [BatchType.PRELIMINARY, BatchType.CONFIRMED],
    })
      .notNull()
      .default(BatchType.PRELIMINARY),

    // Stored file
    originalFilename: text('original_filename'),
    storageUri: text('storage_uri').notNull(),
    uploadedBy: text('uploaded_by'),

    // Processing lifecycle
    status: text('status', {
      enum: [
        BatchStatus.QUEUED,
        BatchStatus.PROCESSING,
        BatchStatus.COMPLETED,
        BatchStatus.FAILED,
      ],
    })
      .notNull()
      .default(BatchStatus.QUEUED),
    totalResponses: integer('total_responses').notNull().default(0),
    totalComments: integer('total_comments').notNull().default(0),
    processedComments: integer('processed_comments').notNull().default(0),
    errorMessage: text('error_message'),
    taskId: text('task_id'),

    uploadedAt: timestamp('uploaded_at').notNull().defaultNow(),
    processingStartedAt: timestamp('processing_started_at'),
    completedAt: timestamp('completed_at'),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => ({
    lectureInstance: unique('uq_survey_batches_lecture_instance').on(
      table.courseName,
      table.lectureDate,
      table.lectureNumber,
      table.batchType,
    ),
  }),
);

export type SurveyBatch = typeof surveyBatches.$inferSelect;
export type NewSurveyBatch = typeof surveyBatches.$inferInsert;
