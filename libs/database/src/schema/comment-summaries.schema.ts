import {
  pgTable,
  uuid,
  text,
  integer,
  timestamp,
  unique,
} from 'drizzle-orm/pg-core';
import { ALL_STUDENTS, SummaryAnalysisType } from '@app/shared-types';
import { surveyBatches } from './survey-batches.schema';

/**
 * Comment Summaries table - comment histograms per batch segment
 *
 * One row per (batch, segment, analysis type, label), e.g.
 * (sentiment, 'positive') or (category, 'operations'). Every label is
 * written on each recompute, zero counts included.
 */
export const commentSummaries = pgTable(
  'comment_summaries',
  {
    id: uuid('id').defaultRandom().primaryKey(),

    batchId: uuid('batch_id')
      .notNull()
      .references(() => surveyBatches.id, { onDelete: 'cascade' }),
    studentAttribute: text('student_attribute').notNull().default(ALL_STUDENTS),
    analysisType: text('analysis_type', {
      enum: [
        SummaryAnalysisType.SENTIMENT,
        SummaryAnalysisType.CATEGORY,
        SummaryAnalysisType.IMPORTANCE,
      ],
    }).notNull(),
    label: text('label').notNull(),
    count: integer('count').notNull().default(0),

    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => ({
    bucket: unique('uq_comment_summaries_bucket').on(
      table.batchId,
      table.studentAttribute,
      table.analysisType,
      table.label,
    ),
  }),
);

export type CommentSummary = typeof commentSummaries.$inferSelect;
export type NewCommentSummary = typeof commentSummaries.$inferInsert;
